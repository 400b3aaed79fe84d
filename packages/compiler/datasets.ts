/**
 * Tabular data passed between the Reader, the compiler and the renderer,
 * plus storage-type inference and the fan-out of a combined result into
 * named datasets.
 */

import type { StatPlan } from './resolved-spec.js';
import { BASE_DATASET, SOURCE_COLUMN } from './resolved-spec.js';

// ---
// TYPES
// ---

export type StorageType = 'numeric' | 'text' | 'boolean' | 'date' | 'timestamp' | 'time' | 'unknown';

/** Unit of numeric timestamps */
export type EpochUnit = 's' | 'ms' | 'us' | 'ns';

export interface ColumnInfo {
  name: string;
  type: StorageType;
  unit?: EpochUnit;
}

export type Row = Record<string, unknown>;

export interface Dataset {
  columns: ColumnInfo[];
  rows: Row[];
}

/** Realized data, keyed by dataset name */
export type Datasets = Map<string, Dataset>;

// ---
// STORAGE TYPES
// ---

/**
 * Map a declared SQL column type to a storage type.
 * Follows SQLite's affinity rules loosely; DuckDB and BigQuery names fit too.
 */
export function storageTypeFromDeclared(declared: string | null | undefined): StorageType {
  if (!declared) return 'unknown';
  const upper = declared.toUpperCase();

  if (upper.includes('TIMESTAMP') || upper.includes('DATETIME')) return 'timestamp';
  if (upper.includes('DATE')) return 'date';
  if (upper.includes('TIME')) return 'time';
  if (upper.includes('BOOL')) return 'boolean';
  if (upper.includes('CHAR') || upper.includes('TEXT') || upper.includes('CLOB') || upper.includes('STRING')) {
    return 'text';
  }
  if (
    upper.includes('INT') ||
    upper.includes('REAL') ||
    upper.includes('FLOA') ||
    upper.includes('DOUB') ||
    upper.includes('NUM') ||
    upper.includes('DEC') ||
    upper.includes('BIGNUMERIC')
  ) {
    return 'numeric';
  }
  return 'unknown';
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}(:?\d{2})?)?$/;
const TIME_PATTERN = /^\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function isMidnightUTC(date: Date): boolean {
  return (
    date.getUTCHours() === 0 &&
    date.getUTCMinutes() === 0 &&
    date.getUTCSeconds() === 0 &&
    date.getUTCMilliseconds() === 0
  );
}

/** Unwrap `{ value }` objects some database clients return for temporal values */
export function unwrapValue(value: unknown): unknown {
  if (value !== null && typeof value === 'object' && !(value instanceof Date) && 'value' in value) {
    return value.value;
  }
  return value;
}

/**
 * Infer a storage type from the values of one column.
 */
export function inferStorageType(values: readonly unknown[]): StorageType {
  const present = values.map(unwrapValue).filter(v => v !== null && v !== undefined);
  if (present.length === 0) return 'unknown';

  if (present.every(v => typeof v === 'number' || typeof v === 'bigint')) return 'numeric';
  if (present.every(v => typeof v === 'boolean')) return 'boolean';
  if (present.every(v => v instanceof Date)) {
    return present.every(v => v instanceof Date && isMidnightUTC(v)) ? 'date' : 'timestamp';
  }

  if (present.every(v => typeof v === 'string')) {
    const strings = present.filter((v): v is string => typeof v === 'string');
    if (strings.every(s => DATE_PATTERN.test(s))) return 'date';
    if (strings.every(s => TIMESTAMP_PATTERN.test(s))) return 'timestamp';
    if (strings.every(s => TIME_PATTERN.test(s))) return 'time';
    if (strings.every(s => NUMERIC_PATTERN.test(s.trim()))) return 'numeric';
  }

  return 'text';
}

/** Fill in `unknown` column types from the values. */
export function withInferredTypes(dataset: Dataset): Dataset {
  if (dataset.columns.every(c => c.type !== 'unknown')) return dataset;
  return {
    rows: dataset.rows,
    columns: dataset.columns.map(c =>
      c.type === 'unknown' ? { ...c, type: inferStorageType(dataset.rows.map(r => r[c.name])) } : c
    ),
  };
}

// ---
// FAN-OUT
// ---

/**
 * Split the combined result of a stat plan back into its named datasets.
 * The base dataset is always present, even when no layer reads it.
 */
export function partitionResult(result: Dataset, plan: StatPlan): Datasets {
  const datasets: Datasets = new Map();

  if (!plan.rewritten) {
    datasets.set(BASE_DATASET, withInferredTypes(result));
    return datasets;
  }

  const statNames = plan.datasets.filter(d => d.kind === 'stat').map(d => d.name);
  const baseColumns = result.columns.filter(
    c => c.name !== SOURCE_COLUMN && !statNames.some(name => c.name.startsWith(name))
  );
  const byName = new Map(result.columns.map(c => [c.name, c]));

  const rowsBySource = new Map<string, Row[]>();
  for (const row of result.rows) {
    const source = String(row[SOURCE_COLUMN]);
    let bucket = rowsBySource.get(source);
    if (!bucket) {
      bucket = [];
      rowsBySource.set(source, bucket);
    }
    bucket.push(row);
  }

  datasets.set(BASE_DATASET, { columns: baseColumns, rows: [] });

  for (const definition of plan.datasets) {
    const rows = rowsBySource.get(definition.name) ?? [];

    if (definition.kind === 'stat') {
      const columns = definition.columns.map(name => ({
        ...(byName.get(definition.name + name) ?? { type: 'unknown' as const }),
        name,
      }));
      datasets.set(definition.name, {
        columns,
        rows: rows.map(row => Object.fromEntries(definition.columns.map(name => [name, row[definition.name + name]]))),
      });
    } else {
      datasets.set(definition.name, {
        columns: baseColumns,
        rows: rows.map(row => Object.fromEntries(baseColumns.map(c => [c.name, row[c.name]]))),
      });
    }
  }

  for (const [name, dataset] of datasets) {
    datasets.set(name, withInferredTypes(dataset));
  }
  return datasets;
}
