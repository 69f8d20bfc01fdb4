/**
 * Pricing Engine Types - SKU metrics, derived economics, rule sets and results
 */

// =============================================================================
// INPUT
// =============================================================================

/** Per-SKU business metrics. Percentages are on a 0-100 scale. */
export interface SkuMetrics {
  /** True cost to produce or acquire one unit */
  unitCost: number;
  /** Current selling price; 0 yields the ERROR sentinel */
  currentPrice: number;
  /** Average price of comparable offerings */
  competitorPrice: number;
  minMarginPct: number;
  targetMarginPct: number;
  /** Units returned as a percentage of units sold over the trailing window */
  returnRatePct: number;
  /** Days of supply remaining at current sales velocity */
  inventoryDays: number;
  adSpend: number;
  /** Advertising-attributed revenue */
  adSales: number;
  unitsSold: number;
}

export type SkuMetricField = keyof SkuMetrics;

export const SKU_METRIC_FIELDS: readonly SkuMetricField[] = [
  'unitCost',
  'currentPrice',
  'competitorPrice',
  'minMarginPct',
  'targetMarginPct',
  'returnRatePct',
  'inventoryDays',
  'adSpend',
  'adSales',
  'unitsSold',
];

// =============================================================================
// DERIVED ECONOMICS
// =============================================================================

export interface DerivedEconomics {
  /** (price - cost) / price as a fraction */
  currentMargin: number;
  /** Ad spend per unit sold */
  cpa: number;
  /** Ad spend as a percentage of ad-attributed revenue */
  actualAcos: number;
  /** Expected refund loss per unit, charged only above the refund-tax threshold */
  refundTax: number;
  totalLoadedCost: number;
  netProfit: number;
  /** Highest ACOS the margin absorbs before profit turns negative */
  breakEvenAcos: number;
}

// =============================================================================
// RULE SETS
// =============================================================================

export type LadderKind = 'simple' | 'platinum';

export interface RuleSet {
  ladder: LadderKind;
  /** Return rate (%) above which price increases are blocked */
  returnThreshold: number;
  /** Return rate (%) above which the refund tax is charged */
  refundTaxThreshold: number;
  /** Days of supply above which stock is liquidated */
  liquidationDays: number;
  /** Liquidation keeps at least this multiple of unit cost */
  liquidationMarkup: number;
  /** Liquidation undercuts the competitor to this multiple of its price */
  liquidationUndercut: number;

  // platinum ladder
  /** OFFENSE_SCALE requires ACOS below break-even times this factor */
  offenseAcosFactor: number;
  /** OFFENSE_SCALE requires inventory below this many days */
  offenseMaxInventoryDays: number;
  /** OFFENSE_SCALE raises price by at most this percentage */
  offenseStepPct: number;
  /** CATCH_UP fires when price is below competitor times this factor */
  catchUpGapFactor: number;
  /** CATCH_UP moves to competitor times this factor */
  catchUpPriceFactor: number;

  // simple ladder
  /** MARKET_CATCH_UP fires when price is more than this amount under competitor */
  marketCatchUpMinGap: number;
  /** MARKET_CATCH_UP stays this amount under competitor */
  marketCatchUpUndercut: number;
}

/** Options accepted when selecting a rule set; unset fields come from the ladder preset. */
export type RuleSetOptions = Partial<RuleSet>;

// =============================================================================
// OUTPUT
// =============================================================================

export type Strategy =
  | 'BLOCK_HIKE'
  | 'LIQUIDATE'
  | 'DEFENSE_CUT_ADS'
  | 'PROFIT_RECOVERY'
  | 'OFFENSE_SCALE'
  | 'CATCH_UP'
  | 'MARKET_CATCH_UP'
  | 'MAINTAIN'
  | 'ERROR';

export type Severity = 'critical' | 'warning' | 'positive' | 'neutral';

/** Outcome of a ladder before rounding and severity are attached. */
export interface LadderDecision {
  strategy: Strategy;
  price: number;
}

export interface Recommendation {
  recommendedPrice: number;
  strategy: Strategy;
  reason: string;
  severity: Severity;
  ladder: LadderKind;
  economics: DerivedEconomics;
}

export interface MarginTargetIssue {
  field: 'targetMarginPct';
  message: string;
}
