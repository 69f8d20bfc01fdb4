/**
 * Text report for one SKU recommendation
 */

import { buildDecisionChecklist, buildPricePosition } from './analysis';
import { SEVERITY_COLOR, STRATEGY_DISPLAY, bold, paint, strategyBanner } from './display';
import { roundPrice } from '../pricing/formulas';
import type { Recommendation, RuleSet, SkuMetrics } from '../pricing/types';

export interface ReportInput {
  sku: string;
  name?: string;
  metrics: SkuMetrics;
  recommendation: Recommendation;
  rules: RuleSet;
}

export interface RenderOptions {
  /** Emit ANSI colour codes */
  color?: boolean;
}

export function formatMoney(value: number): string {
  const sign = value < 0 ? '-' : '';
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

export function formatSignedMoney(value: number): string {
  return value >= 0 ? `+${formatMoney(value)}` : formatMoney(value);
}

/** Format a fraction (0.318) as a percentage ("31.8%"). */
export function formatFraction(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function row(label: string, value: string, indent = 2, width = 20): string {
  return `${' '.repeat(indent)}${label.padEnd(width)}${value}`;
}

function detail(label: string, value: string): string {
  return row(label, value, 4, 20);
}

export function renderReport(input: ReportInput, options: RenderOptions = {}): string[] {
  const color = options.color ?? false;
  const { metrics, recommendation: rec, rules } = input;
  const position = buildPricePosition(metrics);
  const delta = rec.recommendedPrice - metrics.currentPrice;
  const title = input.name ? `${input.sku} (${input.name})` : input.sku;

  const lines: string[] = [
    bold(`SKU ${title}`, color) + `  [${rules.ladder} ladder]`,
    '',
    row('Current Margin', formatFraction(position.currentMargin)),
    row('Competitor Gap', `${formatMoney(position.competitorGap)} (${position.gapDirection})`),
    row('Strategy', strategyBanner(rec.strategy, color)),
    row('Recommended Price', `${formatMoney(rec.recommendedPrice)} (${formatSignedMoney(delta)})`),
    '',
    `  ${paint(rec.reason, SEVERITY_COLOR[rec.severity], color)}`,
    '',
    '  Price Position',
  ];

  for (const band of position.bands) {
    lines.push(detail(band.label, formatMoney(band.value)));
  }
  lines.push(detail('Est. Elasticity', position.estimatedElasticity.toFixed(1)));

  lines.push('', '  Decision Logic');
  buildDecisionChecklist(metrics, rec.economics, rules).forEach((item, i) => {
    const mark = item.passed ? paint('✓', 'green', color) : paint('✗', 'red', color);
    lines.push(`    ${i + 1}. ${mark} ${item.name}: ${item.detail}`);
  });

  const econ = rec.economics;
  lines.push(
    '',
    '  Unit Economics',
    detail('CPA', formatMoney(econ.cpa)),
    detail('ACOS', `${econ.actualAcos.toFixed(1)}%`),
    detail('Break-even ACOS', `${econ.breakEvenAcos.toFixed(1)}%`),
    detail('Refund Tax', formatMoney(econ.refundTax)),
    detail('Loaded Cost', formatMoney(econ.totalLoadedCost)),
    detail('Net Profit', formatMoney(econ.netProfit)),
    '',
    `  Final Verdict: ${strategyBanner(rec.strategy, color)}`,
  );

  return lines;
}

export interface ReportSummary {
  sku: string;
  name?: string;
  ladder: RuleSet['ladder'];
  strategy: Recommendation['strategy'];
  label: string;
  severity: Recommendation['severity'];
  reason: string;
  currentPrice: number;
  recommendedPrice: number;
  priceChange: number;
  economics: Recommendation['economics'];
}

/** Plain-data form of a report for JSON output. */
export function summarizeReport(input: ReportInput): ReportSummary {
  const rec = input.recommendation;
  return {
    sku: input.sku,
    name: input.name,
    ladder: input.rules.ladder,
    strategy: rec.strategy,
    label: STRATEGY_DISPLAY[rec.strategy].label,
    severity: rec.severity,
    reason: rec.reason,
    currentPrice: input.metrics.currentPrice,
    recommendedPrice: rec.recommendedPrice,
    priceChange: roundPrice(rec.recommendedPrice - input.metrics.currentPrice),
    economics: rec.economics,
  };
}
