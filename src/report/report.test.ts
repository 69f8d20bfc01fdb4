import { describe, it, expect } from 'vitest';
import { buildDecisionChecklist, buildPricePosition, estimateElasticity } from './analysis';
import { STRATEGY_DISPLAY, strategyBanner } from './display';
import { formatFraction, formatMoney, formatSignedMoney, renderReport, summarizeReport } from './render';
import { recommendPrice } from '../pricing/engine';
import { calculateEconomics } from '../pricing/economics';
import { PLATINUM_RULE_SET, SIMPLE_RULE_SET } from '../pricing/rulesets';
import { ALL_STRATEGIES } from '../pricing/strategies';
import type { SkuMetrics } from '../pricing/types';

// =============================================================================
// Helpers
// =============================================================================

function makeMetrics(overrides: Partial<SkuMetrics> = {}): SkuMetrics {
  return {
    unitCost: 15,
    currentPrice: 22,
    competitorPrice: 25,
    minMarginPct: 20,
    targetMarginPct: 40,
    returnRatePct: 2.5,
    inventoryDays: 45,
    adSpend: 0,
    adSales: 0,
    unitsSold: 0,
    ...overrides,
  };
}

// =============================================================================
// Display
// =============================================================================

describe('STRATEGY_DISPLAY', () => {
  it('covers every strategy', () => {
    for (const strategy of ALL_STRATEGIES) {
      expect(STRATEGY_DISPLAY[strategy].label.length).toBeGreaterThan(0);
    }
  });

  it('renders a banner with or without colour', () => {
    expect(strategyBanner('BLOCK_HIKE')).toBe('⛔ Blocked (High Returns)');
    expect(strategyBanner('BLOCK_HIKE', true)).toBe('\x1b[31m⛔ Blocked (High Returns)\x1b[0m');
  });
});

// =============================================================================
// Analysis
// =============================================================================

describe('buildPricePosition', () => {
  it('lays out the price bands', () => {
    const position = buildPricePosition(makeMetrics());

    expect(position.bands.map((b) => b.label)).toEqual([
      'Unit Cost', 'Min Margin Floor', 'Current Price', 'Target Ideal', 'Competitor Avg',
    ]);
    expect(position.bands[1].value).toBeCloseTo(18.75, 10);
    expect(position.bands[3].value).toBeCloseTo(25, 10);
    expect(position.competitorGap).toBe(-3);
    expect(position.gapDirection).toBe('undercut');
    expect(position.estimatedElasticity).toBe(-0.8);
  });

  it('reports a premium when priced at or above competitor', () => {
    const position = buildPricePosition(makeMetrics({ currentPrice: 26 }));
    expect(position.gapDirection).toBe('premium');
    expect(position.competitorGap).toBe(1);
  });
});

describe('estimateElasticity', () => {
  it('is more elastic within 10% of the competitor', () => {
    expect(estimateElasticity(23, 25)).toBe(-1.5);
    expect(estimateElasticity(22.5, 25)).toBe(-0.8);
  });
});

describe('buildDecisionChecklist', () => {
  it('lists floor, ceiling, health and inventory checks for the simple ladder', () => {
    const metrics = makeMetrics();
    const items = buildDecisionChecklist(
      metrics,
      calculateEconomics(metrics, SIMPLE_RULE_SET.refundTaxThreshold),
      SIMPLE_RULE_SET,
    );

    expect(items).toEqual([
      { name: 'Floor Check', detail: 'cost / (1 - 20%) = $18.75', passed: true },
      { name: 'Ceiling Check', detail: 'Competitor @ $25.00', passed: true },
      { name: 'Health Check', detail: 'Returns are 2.5% (Limit: 8%)', passed: true },
      { name: 'Inventory Check', detail: '45 days of supply (Liquidate above 120)', passed: true },
    ]);
  });

  it('adds the ad check on the platinum ladder', () => {
    const metrics = makeMetrics({ unitCost: 10, currentPrice: 20, adSpend: 500, adSales: 2000, unitsSold: 100 });
    const items = buildDecisionChecklist(
      metrics,
      calculateEconomics(metrics, PLATINUM_RULE_SET.refundTaxThreshold),
      PLATINUM_RULE_SET,
    );

    expect(items[items.length - 1]).toEqual({
      name: 'Ad Check',
      detail: 'ACOS 25.0% vs break-even 50.0%',
      passed: true,
    });
  });

  it('fails the health check above the return limit', () => {
    const metrics = makeMetrics({ returnRatePct: 9 });
    const items = buildDecisionChecklist(metrics, calculateEconomics(metrics, 8), SIMPLE_RULE_SET);
    expect(items[2].passed).toBe(false);
  });
});

// =============================================================================
// Rendering
// =============================================================================

describe('formatting', () => {
  it('formats money with sign', () => {
    expect(formatMoney(-3)).toBe('-$3.00');
    expect(formatMoney(24.5)).toBe('$24.50');
    expect(formatSignedMoney(2.5)).toBe('+$2.50');
    expect(formatSignedMoney(-0.5)).toBe('-$0.50');
  });

  it('formats fractions as percentages', () => {
    expect(formatFraction(0.5)).toBe('50.0%');
  });
});

describe('renderReport', () => {
  const metrics = makeMetrics();
  const recommendation = recommendPrice(metrics, SIMPLE_RULE_SET);
  const input = {
    sku: 'Bio-Plate-Standard',
    metrics,
    recommendation,
    rules: SIMPLE_RULE_SET,
  };

  it('renders the metrics row', () => {
    const lines = renderReport(input);

    expect(lines[0]).toBe('SKU Bio-Plate-Standard  [simple ladder]');
    expect(lines).toContain('  Current Margin      31.8%');
    expect(lines).toContain('  Competitor Gap      -$3.00 (undercut)');
    expect(lines).toContain('  Strategy            🚀 Market Catch-Up');
    expect(lines).toContain('  Recommended Price   $24.50 (+$2.50)');
  });

  it('renders price bands and decision logic', () => {
    const lines = renderReport(input);

    expect(lines).toContain('    Min Margin Floor    $18.75');
    expect(lines).toContain('    Target Ideal        $25.00');
    expect(lines).toContain('    Est. Elasticity     -0.8');
    expect(lines).toContain('    3. ✓ Health Check: Returns are 2.5% (Limit: 8%)');
    expect(lines).toContain('    Net Profit          $7.00');
    expect(lines[lines.length - 1]).toBe('  Final Verdict: 🚀 Market Catch-Up');
  });

  it('includes the product name when known', () => {
    const lines = renderReport({ ...input, name: 'Bio Plate' });
    expect(lines[0]).toBe('SKU Bio-Plate-Standard (Bio Plate)  [simple ladder]');
  });

  it('summarizes for JSON output', () => {
    expect(summarizeReport(input)).toEqual({
      sku: 'Bio-Plate-Standard',
      name: undefined,
      ladder: 'simple',
      strategy: 'MARKET_CATCH_UP',
      label: 'Market Catch-Up',
      severity: 'positive',
      reason: recommendation.reason,
      currentPrice: 22,
      recommendedPrice: 24.5,
      priceChange: 2.5,
      economics: recommendation.economics,
    });
  });
});
