/**
 * Strategy metadata - severity and justification bound to each strategy
 */

import type { Severity, Strategy } from './types';

export const ALL_STRATEGIES: readonly Strategy[] = [
  'BLOCK_HIKE',
  'LIQUIDATE',
  'DEFENSE_CUT_ADS',
  'PROFIT_RECOVERY',
  'OFFENSE_SCALE',
  'CATCH_UP',
  'MARKET_CATCH_UP',
  'MAINTAIN',
  'ERROR',
];

export const STRATEGY_SEVERITY: Readonly<Record<Strategy, Severity>> = {
  BLOCK_HIKE: 'critical',
  LIQUIDATE: 'critical',
  DEFENSE_CUT_ADS: 'warning',
  PROFIT_RECOVERY: 'warning',
  OFFENSE_SCALE: 'positive',
  CATCH_UP: 'positive',
  MARKET_CATCH_UP: 'positive',
  MAINTAIN: 'neutral',
  ERROR: 'critical',
};

export const STRATEGY_REASONS: Readonly<Record<Strategy, string>> = {
  BLOCK_HIKE: 'Return rate is above the quality limit; fix quality before raising price',
  LIQUIDATE: 'Stock has aged past the liquidation window; clear it without selling below cost',
  DEFENSE_CUT_ADS: 'Advertising cost exceeds break-even ACOS; cut ad spend before changing price',
  PROFIT_RECOVERY: 'Unit loses money once ads and refunds are loaded; restore the minimum margin',
  OFFENSE_SCALE: 'Ads are efficient and stock is healthy while priced under competitor; step price up',
  CATCH_UP: 'Price sits well below competitor; move toward the market',
  MARKET_CATCH_UP: 'Underpriced against competitor and below target margin; optimize margin',
  MAINTAIN: 'Metrics are within policy; hold current price',
  ERROR: 'price is zero',
};

export function severityOf(strategy: Strategy): Severity {
  return STRATEGY_SEVERITY[strategy];
}
