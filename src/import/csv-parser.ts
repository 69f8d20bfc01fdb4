/**
 * CSV Parser - Parse per-SKU metric tables and map columns to metric fields
 *
 * Handles:
 * - Auto-detection of delimiter (comma, tab, pipe)
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Header aliases ("Unit Cost" -> unitCost, "Days of Supply" -> inventoryDays)
 * - Quoted fields with embedded delimiters
 * - Currency symbols, thousands separators and trailing % in numeric cells
 */

import { createLogger } from '../utils/logger';
import columnAliases from './column-aliases.json';
import type {
  ColumnMapping,
  Delimiter,
  ImportError,
  MetricColumn,
  MetricRow,
  MetricTable,
  NumericColumn,
  PercentScale,
} from './types';
import { NUMERIC_COLUMNS, PERCENT_COLUMNS } from './types';

const logger = createLogger('csv-parser');

// ---------------------------------------------------------------------------
// Column name aliases -> canonical field
// ---------------------------------------------------------------------------

const METRIC_COLUMNS: readonly MetricColumn[] = ['sku', 'name', ...NUMERIC_COLUMNS];

function isMetricColumn(value: string): value is MetricColumn {
  return METRIC_COLUMNS.some((column) => column === value);
}

function buildAliasIndex(aliases: Record<string, string[]>): Map<string, MetricColumn> {
  const index = new Map<string, MetricColumn>();
  for (const [field, names] of Object.entries(aliases)) {
    if (!isMetricColumn(field)) {
      throw new Error(`column-aliases.json names unknown field "${field}"`);
    }
    for (const name of names) index.set(name, field);
  }
  return index;
}

const COLUMN_ALIASES = buildAliasIndex(columnAliases);

export function normalizeHeader(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
    .replace(/[^a-z0-9_]/g, '')
    .replace(/^_+|_+$/g, '');
}

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

const DELIMITER_MAP: Record<Exclude<Delimiter, 'auto'>, string> = {
  comma: ',',
  tab: '\t',
  pipe: '|',
};

/**
 * Auto-detect delimiter by counting unquoted occurrences in the first lines.
 * Prefers comma > tab > pipe when scores tie.
 */
export function detectDelimiter(text: string): string {
  const sampleLines = text.split(/\r?\n/).slice(0, 10).filter(Boolean);
  if (sampleLines.length === 0) return ',';

  let bestDelimiter = ',';
  let bestScore = -1;

  for (const delim of Object.values(DELIMITER_MAP)) {
    const counts = sampleLines.map((line) => {
      let count = 0;
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') inQuotes = !inQuotes;
        else if (ch === delim && !inQuotes) count++;
      }
      return count;
    });

    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;
    const consistencyBonus = new Set(counts).size === 1 ? 10 : 0;
    const score = avgCount + consistencyBonus;

    if (score > bestScore && avgCount > 0) {
      bestScore = score;
      bestDelimiter = delim;
    }
  }

  return bestDelimiter;
}

// ---------------------------------------------------------------------------
// CSV line parser (handles quoted fields)
// ---------------------------------------------------------------------------

/**
 * Split one line into trimmed fields. Quoted fields may hold the delimiter
 * and escaped quotes ("").
 */
export function parseFields(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' && current.trim().length === 0) {
      inQuotes = true;
      current = '';
    } else if (ch === delimiter) {
      fields.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }

  fields.push(current.trim());
  return fields;
}

// ---------------------------------------------------------------------------
// Column mapping
// ---------------------------------------------------------------------------

function buildColumnMappings(headers: string[]): ColumnMapping[] {
  const mappings: ColumnMapping[] = [];
  const usedFields = new Set<MetricColumn>();

  headers.forEach((raw, index) => {
    const field = COLUMN_ALIASES.get(normalizeHeader(raw));
    if (field && !usedFields.has(field)) {
      mappings.push({ index, field });
      usedFields.add(field);
    }
  });

  return mappings;
}

// ---------------------------------------------------------------------------
// Numeric cells
// ---------------------------------------------------------------------------

export interface ParsedNumber {
  value: number;
  percent: boolean;
}

/** Parse "$1,234.50", "12%", " 7 " into numbers; null when not numeric. */
export function parseNumericCell(raw: string): ParsedNumber | null {
  let cleaned = raw.replace(/[$,\s]/g, '');
  const percent = cleaned.endsWith('%');
  if (percent) cleaned = cleaned.slice(0, -1);
  if (cleaned.length === 0 || !/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(cleaned)) {
    return null;
  }
  return { value: Number(cleaned), percent };
}

// ---------------------------------------------------------------------------
// Main parse function
// ---------------------------------------------------------------------------

export interface ParseOptions {
  delimiter?: Delimiter;
  /** Label used in errors and logs, usually the file path */
  source?: string;
  /** Scale of the percentage columns; `auto` guesses from the values */
  percentScale?: PercentScale;
}

function emptyTable(
  source: string,
  percentScale: PercentScale,
  errors: ImportError[] = [],
): MetricTable {
  return {
    source,
    columns: [],
    percentMarked: [],
    percentScale,
    rows: [],
    errors,
    stats: { totalRows: 0, validRows: 0, errorRows: 0, skippedRows: 0 },
  };
}

/**
 * Parse a header-led CSV table of per-SKU metrics.
 *
 * Rows with no SKU, non-numeric or negative values are reported in
 * `errors` and left out of `rows`. Empty cells are left unset.
 */
export function parseMetricsCsv(csvData: string, options: ParseOptions = {}): MetricTable {
  const { delimiter: delimiterOption = 'auto', source = 'inline', percentScale = 'auto' } = options;

  let data = csvData;
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }
  data = data.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  const delimiter = delimiterOption === 'auto' ? detectDelimiter(data) : DELIMITER_MAP[delimiterOption];

  const lines = data.split('\n').filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    return emptyTable(source, percentScale);
  }

  const headerFields = parseFields(lines[0], delimiter);
  const mappings = buildColumnMappings(headerFields);

  if (!mappings.some((m) => m.field === 'sku')) {
    logger.warn({ source, headers: headerFields }, 'No SKU column found in header');
    return emptyTable(source, percentScale, [{
      row: 0,
      column: 'header',
      value: headerFields.join(', '),
      message: 'No SKU column found. Expected a column such as: sku, seller_sku, product_id, asin',
    }]);
  }

  logger.debug(
    { source, delimiter: delimiter === '\t' ? 'tab' : delimiter, columns: mappings.map((m) => `${m.field}[${m.index}]`) },
    'Column mappings detected',
  );

  const rows: MetricRow[] = [];
  const errors: ImportError[] = [];
  const percentMarked = new Set<NumericColumn>();
  let skippedRows = 0;
  let errorRows = 0;

  for (let i = 1; i < lines.length; i++) {
    const rowNumber = i;
    const fields = parseFields(lines[i], delimiter);

    if (fields.every((f) => f.length === 0)) {
      skippedRows++;
      continue;
    }

    const row: MetricRow = { rowNumber, sku: '', values: {} };
    const rowErrors: ImportError[] = [];

    for (const { index, field } of mappings) {
      const rawValue = fields[index] ?? '';
      if (field === 'sku') {
        row.sku = rawValue;
        continue;
      }
      if (rawValue.length === 0) continue;
      if (field === 'name') {
        row.name = rawValue;
        continue;
      }

      const parsed = parseNumericCell(rawValue);
      if (!parsed) {
        rowErrors.push({ row: rowNumber, column: field, value: rawValue, message: `${field} must be a number` });
      } else if (parsed.value < 0) {
        rowErrors.push({ row: rowNumber, column: field, value: rawValue, message: `${field} must not be negative` });
      } else {
        row.values[field] = parsed.value;
        if (parsed.percent && PERCENT_COLUMNS.includes(field)) percentMarked.add(field);
      }
    }

    if (row.sku.length === 0) {
      rowErrors.push({ row: rowNumber, column: 'sku', value: '', message: 'SKU is required and cannot be empty' });
    }

    if (rowErrors.length > 0) {
      errors.push(...rowErrors);
      errorRows++;
    } else {
      rows.push(row);
    }
  }

  const stats = {
    totalRows: lines.length - 1,
    validRows: rows.length,
    errorRows,
    skippedRows,
  };

  logger.info(
    { source, total: stats.totalRows, valid: stats.validRows, errors: stats.errorRows },
    'Metric table parsed',
  );

  return {
    source,
    columns: mappings.map((m) => m.field),
    percentMarked: [...percentMarked],
    percentScale,
    rows,
    errors,
    stats,
  };
}
