/**
 * Unit Economics - Loaded cost, ad efficiency and break-even ACOS for one SKU
 *
 * Every ratio with a zero denominator is 0 rather than an error.
 */

import { marginAt } from './formulas';
import type { DerivedEconomics, SkuMetrics } from './types';

export function costPerAcquisition(adSpend: number, unitsSold: number): number {
  return unitsSold > 0 ? adSpend / unitsSold : 0;
}

export function advertisingCostOfSale(adSpend: number, adSales: number): number {
  return adSales > 0 ? (adSpend / adSales) * 100 : 0;
}

/** Charged strictly above the threshold; exactly 0 at or below it. */
export function refundTax(returnRatePct: number, currentPrice: number, threshold: number): number {
  return returnRatePct > threshold ? (returnRatePct / 100) * currentPrice : 0;
}

export function calculateEconomics(metrics: SkuMetrics, refundTaxThreshold: number): DerivedEconomics {
  const { unitCost, currentPrice } = metrics;

  const cpa = costPerAcquisition(metrics.adSpend, metrics.unitsSold);
  const actualAcos = advertisingCostOfSale(metrics.adSpend, metrics.adSales);
  const tax = refundTax(metrics.returnRatePct, currentPrice, refundTaxThreshold);
  const totalLoadedCost = unitCost + cpa + tax;
  const breakEvenAcos = currentPrice > 0
    ? ((currentPrice - (unitCost + tax)) / currentPrice) * 100
    : 0;

  return {
    currentMargin: marginAt(currentPrice, unitCost),
    cpa,
    actualAcos,
    refundTax: tax,
    totalLoadedCost,
    netProfit: currentPrice - totalLoadedCost,
    breakEvenAcos,
  };
}

export function emptyEconomics(): DerivedEconomics {
  return {
    currentMargin: 0,
    cpa: 0,
    actualAcos: 0,
    refundTax: 0,
    totalLoadedCost: 0,
    netProfit: 0,
    breakEvenAcos: 0,
  };
}
