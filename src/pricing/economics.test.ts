import { describe, it, expect } from 'vitest';
import {
  advertisingCostOfSale,
  calculateEconomics,
  costPerAcquisition,
  refundTax,
} from './economics';
import type { SkuMetrics } from './types';

function makeMetrics(overrides: Partial<SkuMetrics> = {}): SkuMetrics {
  return {
    unitCost: 10,
    currentPrice: 20,
    competitorPrice: 22,
    minMarginPct: 20,
    targetMarginPct: 40,
    returnRatePct: 2,
    inventoryDays: 45,
    adSpend: 500,
    adSales: 2000,
    unitsSold: 100,
    ...overrides,
  };
}

describe('calculateEconomics', () => {
  it('derives loaded cost and break-even ACOS from ad data', () => {
    const econ = calculateEconomics(makeMetrics(), 8.1);

    // cpa = 500 / 100 = 5
    // acos = 500 / 2000 * 100 = 25
    // refund tax = 0 (2% <= 8.1%)
    // loaded = 10 + 5 + 0 = 15, net = 20 - 15 = 5
    // break-even = (20 - 10) / 20 * 100 = 50
    expect(econ.cpa).toBe(5);
    expect(econ.actualAcos).toBe(25);
    expect(econ.refundTax).toBe(0);
    expect(econ.totalLoadedCost).toBe(15);
    expect(econ.netProfit).toBe(5);
    expect(econ.breakEvenAcos).toBe(50);
    expect(econ.currentMargin).toBe(0.5);
  });

  it('charges refund tax only above the threshold', () => {
    const atThreshold = calculateEconomics(makeMetrics({ returnRatePct: 8.1 }), 8.1);
    expect(atThreshold.refundTax).toBe(0);

    const above = calculateEconomics(makeMetrics({ returnRatePct: 10 }), 8.1);
    // 10 / 100 * 20 = 2
    expect(above.refundTax).toBeCloseTo(2, 10);
    // loaded = 10 + 5 + 2 = 17
    expect(above.totalLoadedCost).toBeCloseTo(17, 10);
    // break-even = (20 - 12) / 20 * 100 = 40
    expect(above.breakEvenAcos).toBeCloseTo(40, 10);
  });

  it('yields zero ratios when denominators are zero', () => {
    const econ = calculateEconomics(
      makeMetrics({ currentPrice: 0, adSpend: 300, adSales: 0, unitsSold: 0 }),
      8.1,
    );
    expect(econ.cpa).toBe(0);
    expect(econ.actualAcos).toBe(0);
    expect(econ.breakEvenAcos).toBe(0);
    expect(econ.currentMargin).toBe(0);
    expect(econ.netProfit).toBe(-10);
  });
});

describe('unit economics helpers', () => {
  it('costPerAcquisition guards units sold', () => {
    expect(costPerAcquisition(250, 50)).toBe(5);
    expect(costPerAcquisition(250, 0)).toBe(0);
  });

  it('advertisingCostOfSale guards ad sales', () => {
    expect(advertisingCostOfSale(300, 1200)).toBe(25);
    expect(advertisingCostOfSale(300, 0)).toBe(0);
  });

  it('refundTax uses a strict comparison', () => {
    expect(refundTax(8, 30, 8)).toBe(0);
    // 9 / 100 * 30 = 2.7
    expect(refundTax(9, 30, 8)).toBeCloseTo(2.7, 10);
  });
});
