/**
 * Strategy Ladders - Ordered pricing rules, first match wins
 *
 * platinum: returns block -> liquidate -> ad defense -> profit recovery ->
 *           offense scale -> catch up -> maintain
 * simple:   returns block -> profit recovery -> liquidate -> market catch up ->
 *           maintain (margin-only, for SKUs without advertising data)
 *
 * Prices returned here are unrounded; the engine rounds at the boundary.
 */

import { liquidationPrice, priceFromMargin } from './formulas';
import type {
  DerivedEconomics,
  LadderDecision,
  LadderKind,
  RuleSet,
  SkuMetrics,
} from './types';

export type Ladder = (
  metrics: SkuMetrics,
  economics: DerivedEconomics,
  rules: RuleSet,
) => LadderDecision;

/** Raising price on a high-return SKU is never allowed, whatever else holds. */
export function isHikeBlocked(metrics: SkuMetrics, rules: RuleSet): boolean {
  return metrics.returnRatePct > rules.returnThreshold;
}

function clearance(metrics: SkuMetrics, rules: RuleSet): number {
  return liquidationPrice(
    metrics.unitCost,
    metrics.competitorPrice,
    rules.liquidationMarkup,
    rules.liquidationUndercut,
  );
}

export const platinumLadder: Ladder = (metrics, economics, rules) => {
  const { currentPrice, competitorPrice, inventoryDays } = metrics;
  const { actualAcos, breakEvenAcos } = economics;

  if (isHikeBlocked(metrics, rules)) {
    return { strategy: 'BLOCK_HIKE', price: currentPrice };
  }

  if (inventoryDays > rules.liquidationDays) {
    return { strategy: 'LIQUIDATE', price: clearance(metrics, rules) };
  }

  if (actualAcos > breakEvenAcos) {
    return { strategy: 'DEFENSE_CUT_ADS', price: currentPrice };
  }

  if (economics.netProfit < 0) {
    return {
      strategy: 'PROFIT_RECOVERY',
      price: priceFromMargin(economics.totalLoadedCost, metrics.minMarginPct),
    };
  }

  if (
    actualAcos < breakEvenAcos * rules.offenseAcosFactor &&
    inventoryDays < rules.offenseMaxInventoryDays &&
    currentPrice < competitorPrice
  ) {
    return {
      strategy: 'OFFENSE_SCALE',
      price: Math.min(competitorPrice, currentPrice * (1 + rules.offenseStepPct / 100)),
    };
  }

  if (currentPrice < competitorPrice * rules.catchUpGapFactor) {
    return { strategy: 'CATCH_UP', price: competitorPrice * rules.catchUpPriceFactor };
  }

  return { strategy: 'MAINTAIN', price: currentPrice };
};

export const simpleLadder: Ladder = (metrics, economics, rules) => {
  const { unitCost, currentPrice, competitorPrice } = metrics;

  if (isHikeBlocked(metrics, rules)) {
    return { strategy: 'BLOCK_HIKE', price: currentPrice };
  }

  const floorPrice = priceFromMargin(unitCost, metrics.minMarginPct);
  const targetPrice = priceFromMargin(unitCost, metrics.targetMarginPct);

  if (currentPrice < floorPrice) {
    // target price bounds the recovery when targets are set below the floor
    return { strategy: 'PROFIT_RECOVERY', price: Math.min(floorPrice, targetPrice) };
  }

  if (metrics.inventoryDays > rules.liquidationDays) {
    return { strategy: 'LIQUIDATE', price: clearance(metrics, rules) };
  }

  if (
    currentPrice < competitorPrice - rules.marketCatchUpMinGap &&
    economics.currentMargin < metrics.targetMarginPct / 100
  ) {
    return {
      strategy: 'MARKET_CATCH_UP',
      price: Math.min(targetPrice, competitorPrice - rules.marketCatchUpUndercut),
    };
  }

  return { strategy: 'MAINTAIN', price: currentPrice };
};

export const LADDERS: Readonly<Record<LadderKind, Ladder>> = {
  simple: simpleLadder,
  platinum: platinumLadder,
};
