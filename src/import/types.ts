/**
 * SKU Metrics Import Types
 */

import { SKU_METRIC_FIELDS } from '../pricing/types';
import type { SkuMetrics } from '../pricing/types';

/** Numeric columns a source table may carry. `returnQty` feeds the return rate. */
export type NumericColumn = keyof SkuMetrics | 'returnQty';

export type MetricColumn = 'sku' | 'name' | NumericColumn;

export const NUMERIC_COLUMNS: readonly NumericColumn[] = [...SKU_METRIC_FIELDS, 'returnQty'];

/**
 * How percentage columns are read: `fraction` (0-1), `percent` (0-100), or
 * `auto` to guess per column from its values.
 */
export type PercentScale = 'auto' | 'fraction' | 'percent';

/** Percentage columns that may arrive on a 0-1 scale. */
export const PERCENT_COLUMNS: readonly NumericColumn[] = [
  'minMarginPct',
  'targetMarginPct',
  'returnRatePct',
];

export type Delimiter = 'auto' | 'comma' | 'tab' | 'pipe';

export interface ColumnMapping {
  /** Index in the CSV row (0-based) */
  index: number;
  /** Target field name */
  field: MetricColumn;
}

export interface MetricRow {
  /** Row number from the original CSV (1-based, header excluded) */
  rowNumber: number;
  sku: string;
  name?: string;
  values: Partial<Record<NumericColumn, number>>;
}

export interface ImportError {
  row: number;
  column: string;
  value: string;
  message: string;
}

export interface ImportStats {
  totalRows: number;
  validRows: number;
  errorRows: number;
  skippedRows: number;
}

/** One parsed source table. */
export interface MetricTable {
  source: string;
  columns: MetricColumn[];
  /** Percentage columns whose cells carried a `%` sign, so are already 0-100 */
  percentMarked: NumericColumn[];
  percentScale: PercentScale;
  rows: MetricRow[];
  errors: ImportError[];
  stats: ImportStats;
}

/** Fully defaulted metrics for one SKU, merged across tables. */
export interface SkuRecord {
  sku: string;
  name?: string;
  metrics: SkuMetrics;
  /** Tables that contributed at least one row */
  sources: string[];
}

export interface SkuDataset {
  records: Map<string, SkuRecord>;
  errors: ImportError[];
}
