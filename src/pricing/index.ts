/**
 * Pricing Module - Recommendation engine, ladders, rule sets and formulas
 */

export { recommendPrice, validateMetrics, checkMarginTargets } from './engine';
export {
  calculateEconomics,
  costPerAcquisition,
  advertisingCostOfSale,
  refundTax,
} from './economics';
export { priceFromMargin, liquidationPrice, roundPrice, marginAt } from './formulas';
export { LADDERS, platinumLadder, simpleLadder, isHikeBlocked } from './ladder';
export type { Ladder } from './ladder';
export {
  PLATINUM_RULE_SET,
  SIMPLE_RULE_SET,
  RULE_SET_PRESETS,
  resolveRuleSet,
} from './rulesets';
export { ALL_STRATEGIES, STRATEGY_REASONS, STRATEGY_SEVERITY, severityOf } from './strategies';
export { PricingError, InvalidConfigurationError, InvalidMetricsError } from './errors';
export { SKU_METRIC_FIELDS } from './types';
export type {
  SkuMetrics,
  SkuMetricField,
  DerivedEconomics,
  LadderKind,
  LadderDecision,
  RuleSet,
  RuleSetOptions,
  Strategy,
  Severity,
  Recommendation,
  MarginTargetIssue,
} from './types';
