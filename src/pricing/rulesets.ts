/**
 * Rule Sets - Threshold and factor presets for the strategy ladders
 *
 * The margin-only and advertising-aware ladders drifted apart on thresholds
 * (8.0% vs 8.1% returns, 120 vs 180 days). Both are kept as presets of one
 * configuration shape so a deployment picks one by name and overrides fields.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from './errors';
import type { LadderKind, RuleSet, RuleSetOptions } from './types';

export const PLATINUM_RULE_SET: Readonly<RuleSet> = Object.freeze({
  ladder: 'platinum',
  returnThreshold: 8.1,
  refundTaxThreshold: 8.1,
  liquidationDays: 180,
  liquidationMarkup: 1.05,
  liquidationUndercut: 0.95,
  offenseAcosFactor: 0.8,
  offenseMaxInventoryDays: 90,
  offenseStepPct: 5,
  catchUpGapFactor: 0.9,
  catchUpPriceFactor: 0.95,
  marketCatchUpMinGap: 1.0,
  marketCatchUpUndercut: 0.5,
});

export const SIMPLE_RULE_SET: Readonly<RuleSet> = Object.freeze({
  ...PLATINUM_RULE_SET,
  ladder: 'simple',
  returnThreshold: 8.0,
  refundTaxThreshold: 8.0,
  liquidationDays: 120,
});

export const RULE_SET_PRESETS: Readonly<Record<LadderKind, Readonly<RuleSet>>> = {
  simple: SIMPLE_RULE_SET,
  platinum: PLATINUM_RULE_SET,
};

const nonNegative = z.number().finite().nonnegative();
const positive = z.number().finite().positive();

const ruleSetSchema = z.object({
  ladder: z.enum(['simple', 'platinum']),
  returnThreshold: nonNegative,
  refundTaxThreshold: nonNegative,
  liquidationDays: nonNegative,
  liquidationMarkup: positive,
  liquidationUndercut: positive,
  offenseAcosFactor: positive,
  offenseMaxInventoryDays: nonNegative,
  offenseStepPct: nonNegative,
  catchUpGapFactor: positive,
  catchUpPriceFactor: positive,
  marketCatchUpMinGap: nonNegative,
  marketCatchUpUndercut: nonNegative,
}).refine((rules) => rules.marketCatchUpUndercut <= rules.marketCatchUpMinGap, {
  // catch-up prices at competitor - undercut, only reached when the gap exceeds the minimum
  message: 'must not exceed marketCatchUpMinGap',
  path: ['marketCatchUpUndercut'],
});

function applyOverrides(preset: Readonly<RuleSet>, options: RuleSetOptions): RuleSet {
  return {
    ladder: preset.ladder,
    returnThreshold: options.returnThreshold ?? preset.returnThreshold,
    refundTaxThreshold: options.refundTaxThreshold
      ?? options.returnThreshold
      ?? preset.refundTaxThreshold,
    liquidationDays: options.liquidationDays ?? preset.liquidationDays,
    liquidationMarkup: options.liquidationMarkup ?? preset.liquidationMarkup,
    liquidationUndercut: options.liquidationUndercut ?? preset.liquidationUndercut,
    offenseAcosFactor: options.offenseAcosFactor ?? preset.offenseAcosFactor,
    offenseMaxInventoryDays: options.offenseMaxInventoryDays ?? preset.offenseMaxInventoryDays,
    offenseStepPct: options.offenseStepPct ?? preset.offenseStepPct,
    catchUpGapFactor: options.catchUpGapFactor ?? preset.catchUpGapFactor,
    catchUpPriceFactor: options.catchUpPriceFactor ?? preset.catchUpPriceFactor,
    marketCatchUpMinGap: options.marketCatchUpMinGap ?? preset.marketCatchUpMinGap,
    marketCatchUpUndercut: options.marketCatchUpUndercut ?? preset.marketCatchUpUndercut,
  };
}

/**
 * Build a validated rule set from a ladder preset plus overrides.
 *
 * When the return threshold is overridden without a refund-tax threshold,
 * the refund tax follows the new return threshold.
 */
export function resolveRuleSet(options: RuleSetOptions = {}): RuleSet {
  const ladder = options.ladder ?? 'platinum';
  const preset = RULE_SET_PRESETS[ladder];
  if (!preset) {
    throw new InvalidConfigurationError(`Unknown ladder: ${String(ladder)}`, 'ladder');
  }

  const candidate = applyOverrides(preset, options);
  const parsed = ruleSetSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new InvalidConfigurationError(`Invalid rule set: ${field} ${issue.message}`, field);
  }
  return parsed.data;
}
