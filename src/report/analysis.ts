/**
 * Price position and decision checklist for one SKU
 */

import { marginAt, priceFromMargin } from '../pricing/formulas';
import type { DerivedEconomics, RuleSet, SkuMetrics } from '../pricing/types';

export interface PriceBand {
  label: string;
  value: number;
}

export interface PricePosition {
  bands: PriceBand[];
  /** currentPrice - competitorPrice */
  competitorGap: number;
  gapDirection: 'undercut' | 'premium';
  /** Rough demand elasticity: buyers react more once within 10% of competitor */
  estimatedElasticity: number;
  currentMargin: number;
}

export function estimateElasticity(currentPrice: number, competitorPrice: number): number {
  return currentPrice > competitorPrice * 0.9 ? -1.5 : -0.8;
}

export function buildPricePosition(metrics: SkuMetrics): PricePosition {
  const { unitCost, currentPrice, competitorPrice } = metrics;
  const competitorGap = currentPrice - competitorPrice;

  return {
    bands: [
      { label: 'Unit Cost', value: unitCost },
      { label: 'Min Margin Floor', value: priceFromMargin(unitCost, metrics.minMarginPct) },
      { label: 'Current Price', value: currentPrice },
      { label: 'Target Ideal', value: priceFromMargin(unitCost, metrics.targetMarginPct) },
      { label: 'Competitor Avg', value: competitorPrice },
    ],
    competitorGap,
    gapDirection: currentPrice < competitorPrice ? 'undercut' : 'premium',
    estimatedElasticity: estimateElasticity(currentPrice, competitorPrice),
    currentMargin: marginAt(currentPrice, unitCost),
  };
}

export interface ChecklistItem {
  name: string;
  detail: string;
  passed: boolean;
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * The checks an operator reads next to the verdict. Ad and inventory checks
 * follow the thresholds of the active rule set.
 */
export function buildDecisionChecklist(
  metrics: SkuMetrics,
  economics: DerivedEconomics,
  rules: RuleSet,
): ChecklistItem[] {
  const floor = priceFromMargin(metrics.unitCost, metrics.minMarginPct);

  const items: ChecklistItem[] = [
    {
      name: 'Floor Check',
      detail: `cost / (1 - ${metrics.minMarginPct}%) = ${money(floor)}`,
      passed: metrics.currentPrice >= floor,
    },
    {
      name: 'Ceiling Check',
      detail: `Competitor @ ${money(metrics.competitorPrice)}`,
      passed: metrics.currentPrice <= metrics.competitorPrice,
    },
    {
      name: 'Health Check',
      detail: `Returns are ${metrics.returnRatePct}% (Limit: ${rules.returnThreshold}%)`,
      passed: metrics.returnRatePct <= rules.returnThreshold,
    },
    {
      name: 'Inventory Check',
      detail: `${metrics.inventoryDays} days of supply (Liquidate above ${rules.liquidationDays})`,
      passed: metrics.inventoryDays <= rules.liquidationDays,
    },
  ];

  if (rules.ladder === 'platinum') {
    items.push({
      name: 'Ad Check',
      detail: `ACOS ${economics.actualAcos.toFixed(1)}% vs break-even ${economics.breakEvenAcos.toFixed(1)}%`,
      passed: economics.actualAcos <= economics.breakEvenAcos,
    });
  }

  return items;
}
