/**
 * Margin floor / ceiling price algebra shared by the strategy ladders
 */

import { InvalidConfigurationError } from './errors';

export const DEFAULT_LIQUIDATION_MARKUP = 1.05;
export const DEFAULT_LIQUIDATION_UNDERCUT = 0.95;

export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Price at which `cost` yields a gross margin of `marginPct` percent.
 * `marginPct` must be strictly below 100.
 */
export function priceFromMargin(cost: number, marginPct: number): number {
  if (!Number.isFinite(marginPct) || marginPct >= 100) {
    throw new InvalidConfigurationError(
      `Margin must be below 100% to derive a price (got ${marginPct})`,
      'marginPct',
    );
  }
  return cost / (1 - marginPct / 100);
}

/**
 * Clearance price: keeps a markup over cost while undercutting the competitor.
 */
export function liquidationPrice(
  cost: number,
  competitorPrice: number,
  markup: number = DEFAULT_LIQUIDATION_MARKUP,
  undercut: number = DEFAULT_LIQUIDATION_UNDERCUT,
): number {
  return Math.max(cost * markup, competitorPrice * undercut);
}

/** Gross margin of `price` over `cost` as a fraction; 0 when price is 0. */
export function marginAt(price: number, cost: number): number {
  if (price === 0) return 0;
  return (price - cost) / price;
}
