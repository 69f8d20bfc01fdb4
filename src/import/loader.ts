/**
 * SKU Metrics Loader - Merge metric tables by SKU into complete, defaulted records
 *
 * Tables may each cover part of a SKU's metrics (pricing sheet, inventory
 * report, returns report, ad report). Later tables override fields they
 * actually supply; anything never supplied defaults to 0.
 */

import { readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import { createLogger } from '../utils/logger';
import type { SkuMetrics } from '../pricing/types';
import { parseMetricsCsv } from './csv-parser';
import type { ParseOptions } from './csv-parser';
import { DataSourceError } from './errors';
import type {
  ImportError,
  MetricTable,
  NumericColumn,
  SkuDataset,
  SkuRecord,
} from './types';
import { NUMERIC_COLUMNS, PERCENT_COLUMNS } from './types';

const logger = createLogger('loader');

// ---------------------------------------------------------------------------
// Percentage normalisation
// ---------------------------------------------------------------------------

/**
 * Percentage columns to scale from fractions to 0-100.
 *
 * A column with `%` cells is always 0-100. Otherwise the table's declared
 * scale decides; under `auto` a column whose values all lie within [0, 1]
 * is read as fractions.
 */
export function fractionColumns(table: MetricTable): Set<NumericColumn> {
  const result = new Set<NumericColumn>();
  if (table.percentScale === 'percent') return result;

  for (const column of PERCENT_COLUMNS) {
    if (!table.columns.includes(column) || table.percentMarked.includes(column)) continue;
    if (table.percentScale === 'fraction') {
      result.add(column);
      continue;
    }

    const values = table.rows
      .map((row) => row.values[column])
      .filter((v): v is number => v !== undefined);
    if (values.length > 0 && values.every((v) => v <= 1)) {
      result.add(column);
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

interface PartialRecord {
  sku: string;
  name?: string;
  values: Partial<Record<NumericColumn, number>>;
  sources: string[];
}

function toMetrics(values: Partial<Record<NumericColumn, number>>): SkuMetrics {
  const unitsSold = values.unitsSold ?? 0;
  let returnRatePct = values.returnRatePct;
  if (returnRatePct === undefined && values.returnQty !== undefined && unitsSold > 0) {
    returnRatePct = (values.returnQty / unitsSold) * 100;
  }

  return {
    unitCost: values.unitCost ?? 0,
    currentPrice: values.currentPrice ?? 0,
    competitorPrice: values.competitorPrice ?? 0,
    minMarginPct: values.minMarginPct ?? 0,
    targetMarginPct: values.targetMarginPct ?? 0,
    returnRatePct: returnRatePct ?? 0,
    inventoryDays: values.inventoryDays ?? 0,
    adSpend: values.adSpend ?? 0,
    adSales: values.adSales ?? 0,
    unitsSold,
  };
}

/**
 * Merge parsed tables by SKU key into complete metric records.
 */
export function mergeMetricTables(tables: MetricTable[]): SkuDataset {
  const partials = new Map<string, PartialRecord>();
  const errors: ImportError[] = [];

  for (const table of tables) {
    errors.push(...table.errors);
    const fractions = fractionColumns(table);

    for (const row of table.rows) {
      let record = partials.get(row.sku);
      if (!record) {
        record = { sku: row.sku, values: {}, sources: [] };
        partials.set(row.sku, record);
      }
      if (row.name !== undefined) record.name = row.name;
      if (!record.sources.includes(table.source)) record.sources.push(table.source);

      for (const column of NUMERIC_COLUMNS) {
        const value = row.values[column];
        if (value === undefined) continue;
        record.values[column] = fractions.has(column) ? value * 100 : value;
      }
    }
  }

  const records = new Map<string, SkuRecord>();
  for (const partial of partials.values()) {
    records.set(partial.sku, {
      sku: partial.sku,
      name: partial.name,
      metrics: toMetrics(partial.values),
      sources: partial.sources,
    });
  }

  return { records, errors };
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export function loadMetricTable(path: string, options: Omit<ParseOptions, 'source'> = {}): MetricTable {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new DataSourceError(path, err instanceof Error ? err.message : String(err));
  }

  const table = parseMetricsCsv(content, { ...options, source: path });
  if (table.columns.length === 0 && table.errors.length > 0) {
    throw new DataSourceError(path, table.errors[0].message);
  }
  return table;
}

export function loadSkuDataset(paths: string[], options: Omit<ParseOptions, 'source'> = {}): SkuDataset {
  if (paths.length === 0) {
    throw new DataSourceError('(none)', 'At least one metrics file is required');
  }
  const dataset = mergeMetricTables(paths.map((p) => loadMetricTable(p, options)));
  logger.info(
    {
      files: paths.length,
      skus: dataset.records.size,
      errors: dataset.errors.length,
      percentScale: options.percentScale ?? 'auto',
    },
    'SKU metrics loaded',
  );
  return dataset;
}

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

/**
 * Identify the current contents of a set of files by path, mtime and size.
 */
export function fingerprintSources(paths: string[]): string {
  return paths
    .map((p) => {
      const absolute = resolve(p);
      try {
        const stat = statSync(absolute);
        return `${absolute}:${stat.mtimeMs}:${stat.size}`;
      } catch (err) {
        throw new DataSourceError(p, err instanceof Error ? err.message : String(err));
      }
    })
    .join('|');
}

interface CacheEntry {
  fingerprint: string;
  dataset: SkuDataset;
}

export type DatasetLoader = (paths: string[]) => SkuDataset;

/**
 * Caller-owned cache of merged datasets. An entry is reused while the
 * source files' fingerprint is unchanged and dropped on `invalidate()`.
 */
export class SkuDataCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly load: DatasetLoader;

  constructor(load: DatasetLoader = (paths) => loadSkuDataset(paths)) {
    this.load = load;
  }

  get(paths: string[]): SkuDataset {
    const key = paths.map((p) => resolve(p)).join('|');
    const fingerprint = fingerprintSources(paths);
    const cached = this.entries.get(key);

    if (cached && cached.fingerprint === fingerprint) {
      logger.debug({ key }, 'SKU dataset cache hit');
      return cached.dataset;
    }

    const dataset = this.load(paths);
    this.entries.set(key, { fingerprint, dataset });
    logger.debug({ key, refreshed: cached !== undefined }, 'SKU dataset cache miss');
    return dataset;
  }

  /** Drop the entry for `paths`, or every entry when omitted. */
  invalidate(paths?: string[]): void {
    if (paths) {
      this.entries.delete(paths.map((p) => resolve(p)).join('|'));
    } else {
      this.entries.clear();
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
