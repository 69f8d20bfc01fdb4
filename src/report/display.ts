/**
 * Strategy display attributes
 *
 * Colour, icon and label live here, not in the engine. Renderers look a
 * strategy up instead of re-deriving it from prices.
 */

import type { Severity, Strategy } from '../pricing/types';

export type DisplayColor = 'red' | 'orange' | 'green' | 'blue' | 'gray';

export interface StrategyDisplay {
  label: string;
  icon: string;
  color: DisplayColor;
}

export const STRATEGY_DISPLAY: Readonly<Record<Strategy, StrategyDisplay>> = {
  BLOCK_HIKE: { label: 'Blocked (High Returns)', icon: '⛔', color: 'red' },
  LIQUIDATE: { label: 'Liquidate', icon: '📉', color: 'red' },
  DEFENSE_CUT_ADS: { label: 'Defense: Cut Ads', icon: '🛡', color: 'orange' },
  PROFIT_RECOVERY: { label: 'Profit Recovery', icon: '📈', color: 'orange' },
  OFFENSE_SCALE: { label: 'Offense: Scale Up', icon: '🚀', color: 'green' },
  CATCH_UP: { label: 'Catch-Up', icon: '⬆', color: 'green' },
  MARKET_CATCH_UP: { label: 'Market Catch-Up', icon: '🚀', color: 'green' },
  MAINTAIN: { label: 'Maintain', icon: '✅', color: 'blue' },
  ERROR: { label: 'Error', icon: '⚠', color: 'gray' },
};

export const SEVERITY_COLOR: Readonly<Record<Severity, DisplayColor>> = {
  critical: 'red',
  warning: 'orange',
  positive: 'green',
  neutral: 'blue',
};

const ANSI: Record<DisplayColor, string> = {
  red: '\x1b[31m',
  orange: '\x1b[33m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

export function paint(text: string, color: DisplayColor, enabled: boolean): string {
  return enabled ? `${ANSI[color]}${text}\x1b[0m` : text;
}

export function bold(text: string, enabled: boolean): string {
  return enabled ? `\x1b[1m${text}\x1b[0m` : text;
}

export function strategyBanner(strategy: Strategy, color = false): string {
  const display = STRATEGY_DISPLAY[strategy];
  return paint(`${display.icon} ${display.label}`, display.color, color);
}
