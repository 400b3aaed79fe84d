/**
 * PlotSQL Executor
 *
 * Runs SQL through a pluggable Reader and fans the combined result of a
 * stat plan back out into named datasets. Bundles a SQLite reader backed by
 * better-sqlite3; any other engine plugs in through the `Reader` contract.
 */

import Database from 'better-sqlite3';
import { ExecutionError } from '../errors.js';
import {
  type ColumnInfo,
  type Dataset,
  type Datasets,
  type Row,
  type StorageType,
  storageTypeFromDeclared,
  withInferredTypes,
  partitionResult,
} from '../compiler/datasets.js';
import type { StatPlan } from '../compiler/resolved-spec.js';
import { type SqlDialect, quoteIdentifier } from '../compiler/sql-utils.js';

const DEBUG = process.env.DEBUG_PLOTSQL === 'true';

// ---
// READER CONTRACT
// ---

export interface ReadOptions {
  /** Forwarded from the host; readers should stop as soon as it aborts */
  signal?: AbortSignal;
}

export interface Reader {
  /** Dialect the stat resolver should generate SQL for */
  readonly dialect: SqlDialect;
  execute(sql: string, options?: ReadOptions): Promise<Dataset>;
  close?(): Promise<void> | void;
}

// ---
// SQLITE READER
// ---

type SqliteDatabase = Database.Database;

export interface SqliteReaderOptions {
  type: 'sqlite';
  /** Path to the database file (default: in-memory) */
  databasePath?: string;
}

export type ReaderOptions = SqliteReaderOptions;

function toRow(value: unknown): Row {
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value));
  }
  return { value };
}

const DECLARED_TYPES: Record<StorageType, string> = {
  numeric: 'REAL',
  text: 'TEXT',
  boolean: 'BOOLEAN',
  date: 'DATE',
  timestamp: 'TIMESTAMP',
  time: 'TIME',
  unknown: '',
};

function toSqliteValue(value: unknown, type: StorageType): unknown {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) {
    return type === 'date' ? value.toISOString().slice(0, 10) : value.toISOString();
  }
  return value;
}

export class SqliteReader implements Reader {
  readonly dialect = 'sqlite' as const;
  private db: SqliteDatabase;

  constructor(databasePath = ':memory:') {
    this.db = new Database(databasePath);
  }

  async execute(sql: string, options: ReadOptions = {}): Promise<Dataset> {
    options.signal?.throwIfAborted();

    const stmt = this.db.prepare(sql);
    if (!stmt.reader) {
      stmt.run();
      return { columns: [], rows: [] };
    }

    const columns: ColumnInfo[] = stmt.columns().map(c => ({
      name: c.name,
      type: storageTypeFromDeclared(c.type),
    }));
    const rows = stmt.all().map(toRow);

    if (DEBUG) {
      console.log(`[sqlite] ${rows.length} row(s), ${columns.length} column(s)`);
    }
    return withInferredTypes({ columns, rows });
  }

  /**
   * Load in-memory rows as a table, replacing any table of that name.
   */
  register(name: string, dataset: Dataset): void {
    const q = (identifier: string) => quoteIdentifier(identifier, 'sqlite');
    const typed = withInferredTypes(dataset);
    const definitions = typed.columns.map(c => `${q(c.name)} ${DECLARED_TYPES[c.type]}`.trim());

    this.db.exec(`DROP TABLE IF EXISTS ${q(name)}`);
    this.db.exec(`CREATE TABLE ${q(name)} (${definitions.join(', ')})`);

    if (typed.columns.length === 0) return;

    const insert = this.db.prepare(
      `INSERT INTO ${q(name)} (${typed.columns.map(c => q(c.name)).join(', ')}) VALUES (${typed.columns.map(() => '?').join(', ')})`
    );
    const insertAll = this.db.transaction((rows: Row[]) => {
      for (const row of rows) {
        insert.run(typed.columns.map(c => toSqliteValue(row[c.name], c.type)));
      }
    });
    insertAll(typed.rows);
  }

  close(): void {
    this.db.close();
  }
}

// ---
// READER SETUP
// ---

let readerInstance: Reader | null = null;
let pendingOptions: ReaderOptions | null = null;

/** Swap the shared reader, closing the one it replaces. */
function replaceReader(next: Reader | null): void {
  const previous = readerInstance;
  readerInstance = next;
  if (!previous || previous === next) return;

  const closing = previous.close?.();
  if (closing instanceof Promise) {
    closing.catch(error => console.error('Reader close error:', error instanceof Error ? error.message : error));
  }
}

export function createReader(options: ReaderOptions): Reader {
  const reader = new SqliteReader(options.databasePath);
  replaceReader(reader);
  return reader;
}

/**
 * Remember reader options without opening anything. The reader is created
 * on first use by `getReader`; any reader already open is closed.
 */
export function setPendingReader(options: ReaderOptions): void {
  pendingOptions = options;
  replaceReader(null);
}

/**
 * Get the current reader or create the default one.
 *
 * Priority:
 * 1. A reader that already exists
 * 2. Options passed to setPendingReader
 * 3. SQLite at PLOTSQL_SQLITE_PATH, or in-memory
 */
export function getReader(): Reader {
  if (readerInstance) return readerInstance;
  if (pendingOptions) return createReader(pendingOptions);
  return createReader({ type: 'sqlite', databasePath: process.env.PLOTSQL_SQLITE_PATH ?? ':memory:' });
}

/** Close and forget the shared reader. */
export async function closeReader(): Promise<void> {
  const reader = readerInstance;
  readerInstance = null;
  await reader?.close?.();
}

// ---
// EXECUTION
// ---

/**
 * Run one statement, turning any reader failure into an ExecutionError.
 */
export async function executeSQL(reader: Reader, sql: string, options: ReadOptions = {}): Promise<Dataset> {
  try {
    return await reader.execute(sql, options);
  } catch (error) {
    console.error('SQL execution error:', error instanceof Error ? error.message : error);
    throw ExecutionError.from(error, sql);
  }
}

/** Run setup statements once, in order. */
export async function runStatements(reader: Reader, statements: readonly string[], options: ReadOptions = {}): Promise<void> {
  for (const sql of statements) {
    await executeSQL(reader, sql, options);
  }
}

/**
 * Execute a stat plan and split its result into the datasets its layers read.
 */
export async function executePlan(reader: Reader, plan: StatPlan, options: ReadOptions = {}): Promise<Datasets> {
  const result = await executeSQL(reader, plan.sql, options);
  const datasets = partitionResult(result, plan);

  if (DEBUG) {
    for (const [name, dataset] of datasets) {
      console.log(`[executor] ${name}: ${dataset.rows.length} row(s)`);
    }
  }
  return datasets;
}
