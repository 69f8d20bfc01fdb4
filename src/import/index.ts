/**
 * SKU Metrics Import - CSV tables to complete per-SKU metric records
 */

export { parseMetricsCsv, parseFields, detectDelimiter, normalizeHeader, parseNumericCell } from './csv-parser';
export type { ParseOptions, ParsedNumber } from './csv-parser';
export {
  mergeMetricTables,
  loadMetricTable,
  loadSkuDataset,
  fractionColumns,
  fingerprintSources,
  SkuDataCache,
} from './loader';
export type { DatasetLoader } from './loader';
export { DataSourceError } from './errors';
export type {
  MetricColumn,
  NumericColumn,
  MetricRow,
  MetricTable,
  ImportError,
  ImportStats,
  SkuRecord,
  SkuDataset,
  Delimiter,
  PercentScale,
} from './types';
