/**
 * Pricing Recommendation Engine - Maps one SKU's metrics to a price and strategy
 *
 * Pure and synchronous: no logging, no I/O, no shared state. Identical
 * metrics and rule set always produce an identical recommendation.
 */

import { calculateEconomics, emptyEconomics } from './economics';
import { InvalidConfigurationError, InvalidMetricsError } from './errors';
import { roundPrice } from './formulas';
import { LADDERS, isHikeBlocked } from './ladder';
import { PLATINUM_RULE_SET } from './rulesets';
import { STRATEGY_REASONS, severityOf } from './strategies';
import type {
  DerivedEconomics,
  MarginTargetIssue,
  Recommendation,
  RuleSet,
  SkuMetrics,
  Strategy,
} from './types';
import { SKU_METRIC_FIELDS } from './types';

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Reject metrics no ladder can price: non-finite or negative values, and
 * margin targets at or above 100% (the margin formula is undefined there).
 */
export function validateMetrics(metrics: SkuMetrics): void {
  for (const field of SKU_METRIC_FIELDS) {
    const value = metrics[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidMetricsError(field, value, `${field} must be a finite number`);
    }
    if (value < 0) {
      throw new InvalidMetricsError(field, value, `${field} must not be negative (got ${value})`);
    }
  }
  if (metrics.minMarginPct >= 100) {
    throw new InvalidConfigurationError('minMarginPct must be below 100', 'minMarginPct');
  }
  if (metrics.targetMarginPct >= 100) {
    throw new InvalidConfigurationError('targetMarginPct must be below 100', 'targetMarginPct');
  }
}

/**
 * Target margin below the minimum is allowed but usually a data entry
 * mistake; callers decide whether to warn.
 */
export function checkMarginTargets(metrics: SkuMetrics): MarginTargetIssue[] {
  if (metrics.targetMarginPct < metrics.minMarginPct) {
    return [{
      field: 'targetMarginPct',
      message: `Target margin ${metrics.targetMarginPct}% is below minimum margin ${metrics.minMarginPct}%`,
    }];
  }
  return [];
}

// =============================================================================
// OUTPUT
// =============================================================================

function roundEconomics(economics: DerivedEconomics): DerivedEconomics {
  return {
    ...economics,
    cpa: roundPrice(economics.cpa),
    refundTax: roundPrice(economics.refundTax),
    totalLoadedCost: roundPrice(economics.totalLoadedCost),
    netProfit: roundPrice(economics.netProfit),
  };
}

function buildRecommendation(
  strategy: Strategy,
  price: number,
  economics: DerivedEconomics,
  rules: RuleSet,
): Recommendation {
  return {
    recommendedPrice: Math.max(0, roundPrice(price)),
    strategy,
    reason: STRATEGY_REASONS[strategy],
    severity: severityOf(strategy),
    ladder: rules.ladder,
    economics: roundEconomics(economics),
  };
}

// =============================================================================
// ENGINE
// =============================================================================

/**
 * Recommend a unit price for one SKU.
 *
 * The return-rate block is checked before anything else and returns the
 * current price untouched, so a blocked SKU priced at 0 reports BLOCK_HIKE,
 * not ERROR. An unblocked zero current price yields the ERROR sentinel
 * rather than throwing.
 */
export function recommendPrice(
  metrics: SkuMetrics,
  rules: RuleSet = PLATINUM_RULE_SET,
): Recommendation {
  validateMetrics(metrics);

  if (isHikeBlocked(metrics, rules)) {
    const economics = calculateEconomics(metrics, rules.refundTaxThreshold);
    return buildRecommendation('BLOCK_HIKE', metrics.currentPrice, economics, rules);
  }

  if (metrics.currentPrice === 0) {
    return buildRecommendation('ERROR', 0, emptyEconomics(), rules);
  }

  const economics = calculateEconomics(metrics, rules.refundTaxThreshold);
  const decision = LADDERS[rules.ladder](metrics, economics, rules);
  return buildRecommendation(decision.strategy, decision.price, economics, rules);
}
