/**
 * PlotSQL - SQL with a VISUALISE clause
 *
 * Append a grammar-of-graphics clause to a query and get a Vega-Lite chart
 * instead of rows. Stats the chart needs (counts, bins, boxplot summaries)
 * are computed in SQL by rewriting the query.
 *
 * @example
 * ```typescript
 * import { createPlotSQL } from 'plotsql';
 *
 * const plot = createPlotSQL();
 *
 * // compile only (parsed clause + rewritten SQL)
 * const { clauses } = plot.compile(`
 *   SELECT * FROM sales
 *   VISUALISE region AS x DRAW bar
 * `);
 *
 * // full pipeline: split → parse → rewrite → execute → resolve → Vega-Lite
 * const { results } = await plot.execute(`
 *   SELECT date, revenue FROM sales
 *   VISUALISE date AS x, revenue AS y
 *   DRAW line
 *   DRAW point
 * `);
 * console.log(results[0].vegaLite);
 * ```
 */

// parser
export { parseQuery, parseQueryWithErrors, parseClause, parseClauseWithErrors, splitQuery, splitStatements, formatVisualise } from './parser/index.js';
export type {
  ParsedQuery,
  ParsedClause,
  ClauseLocation,
  VisualizationSpec,
  UnresolvedSpec,
  LayerSpec,
  GlobalMapping,
  AestheticValue,
  Geom,
  Stat,
  ScaleSpec,
  FacetSpec,
  LabelsSpec,
  ThemeSpec,
  GuideSpec,
} from './parser/index.js';

// compiler
export {
  planStats,
  effectiveStat,
  resolveMappings,
  resolveSpec,
  buildBaseQuery,
  partitionResult,
  printVizSpec,
  printStatPlan,
  BASE_DATASET,
  SOURCE_COLUMN,
} from './compiler/index.js';
export type { StatPlan, ResolvedSpec, ResolvedLayer, Dataset, Datasets, ColumnInfo, SqlDialect } from './compiler/index.js';

// renderer
export { writeVegaLite } from './renderer/index.js';
export type { VegaLiteDocument, WriteOptions } from './renderer/index.js';

// executor
export { SqliteReader, createReader, getReader, setPendingReader, closeReader, executePlan } from './executor/index.js';
export type { Reader, ReadOptions, ReaderOptions, SqliteReaderOptions } from './executor/index.js';

// errors
export * from './errors.js';

// --- internal imports ---

import { parseQuery, parseQueryWithErrors } from './parser/index.js';
import type { ClauseLocation, ParsedQuery, VisualizationSpec } from './parser/index.js';
import {
  buildBaseQuery,
  planStats,
  resolveSpec,
  splitRelational,
  validateStatDatasets,
  printStatPlan,
} from './compiler/index.js';
import type { Datasets, ResolvedSpec, SqlDialect, StatPlan } from './compiler/index.js';
import { SqliteReader, executePlan, getReader, runStatements } from './executor/index.js';
import type { Reader, ReadOptions } from './executor/index.js';
import { writeVegaLite } from './renderer/index.js';
import type { VegaLiteDocument } from './renderer/index.js';
import { SynthesisError, isPlotSQLError, type PlotSQLError } from './errors.js';

const DEBUG = process.env.DEBUG_PLOTSQL === 'true';

/**
 * Options for creating a PlotSQL instance
 */
export interface PlotSQLOptions {
  /**
   * SQL dialect of generated stat queries. Defaults to the reader's dialect
   * when executing, and to DuckDB when only compiling.
   */
  dialect?: SqlDialect;

  /** Reader to execute against (default: the shared reader from `getReader`) */
  reader?: Reader;

  /** Opens this instance's own reader on first use when no `reader` is given */
  openReader?: () => Reader;

  /** `$schema` URL written into every document */
  schema?: string;

  /** Histogram buckets for layers without a `bins` setting */
  bins?: number;
}

/**
 * One compiled clause
 */
export interface CompiledClause {
  text: string;
  location: ClauseLocation;
  spec: VisualizationSpec;
  /** rewritten SQL and dataset plan */
  plan: StatPlan;
}

export interface CompileResult {
  /** statements run once before any clause */
  setup: string[];
  clauses: CompiledClause[];
}

/**
 * One executed clause
 */
export interface ClauseResult extends CompiledClause {
  datasets: Datasets;
  resolved: ResolvedSpec;
  vegaLite: VegaLiteDocument;
}

export interface ExecuteResult {
  setup: string[];
  results: ClauseResult[];
}

export type SettledClause =
  | { status: 'fulfilled'; value: ClauseResult }
  | { status: 'rejected'; reason: PlotSQLError; text: string; location: ClauseLocation };

export interface SettledResult {
  setup: string[];
  results: SettledClause[];
}

/**
 * High-level API for parsing, compiling and executing VISUALISE queries.
 */
export class PlotSQL {
  private options: PlotSQLOptions;
  private opened: Reader | null = null;

  constructor(options: PlotSQLOptions = {}) {
    this.options = options;
  }

  /** split a query and parse every clause */
  parse(query: string): ParsedQuery {
    return parseQuery(query);
  }

  /** parse and plan every clause (no execution) */
  compile(query: string): CompileResult {
    return this.compileWith(query, this.options.dialect ?? this.options.reader?.dialect ?? 'duckdb');
  }

  /**
   * Execute every clause and write its Vega-Lite document.
   * Throws the first error any clause raises.
   */
  async execute(query: string, options: ReadOptions = {}): Promise<ExecuteResult> {
    const reader = this.reader();
    const { setup, clauses } = this.compileWith(query, this.options.dialect ?? reader.dialect);
    if (clauses.length === 0) return { setup, results: [] };

    await runStatements(reader, setup, options);

    const results: ClauseResult[] = [];
    for (const clause of clauses) {
      results.push(await this.run(reader, clause, options));
    }
    return { setup, results };
  }

  /**
   * Execute every clause independently: one clause failing to parse, plan
   * or run does not stop its siblings. Setup failures still throw.
   */
  async executeSettled(query: string, options: ReadOptions = {}): Promise<SettledResult> {
    const reader = this.reader();
    const dialect = this.options.dialect ?? reader.dialect;
    const parsed = parseQueryWithErrors(query);
    const { setup, query: baseQuery } = splitRelational(parsed.statements);
    if (parsed.clauses.length === 0) return { setup, results: [] };

    await runStatements(reader, setup, options);

    const results: SettledClause[] = [];
    for (const clause of parsed.clauses) {
      const { text, location } = clause;
      try {
        if (clause.errors.length > 0 || !clause.spec) {
          throw clause.errors[0] ?? new SynthesisError('Clause produced no specification');
        }
        const compiled = { text, location, spec: clause.spec, plan: this.plan(clause.spec, baseQuery, dialect) };
        results.push({ status: 'fulfilled', value: await this.run(reader, compiled, options) });
      } catch (error) {
        if (!isPlotSQLError(error)) throw error;
        results.push({ status: 'rejected', reason: error, text, location });
      }
    }
    return { setup, results };
  }

  /** Close the reader this instance opened for itself, if any. */
  async close(): Promise<void> {
    const reader = this.opened;
    this.opened = null;
    await reader?.close?.();
  }

  private reader(): Reader {
    if (this.options.reader) return this.options.reader;
    if (!this.options.openReader) return getReader();
    if (!this.opened) this.opened = this.options.openReader();
    return this.opened;
  }

  private compileWith(query: string, dialect: SqlDialect): CompileResult {
    const parsed = parseQuery(query);
    const { setup, query: baseQuery } = splitRelational(parsed.statements);

    return {
      setup,
      clauses: parsed.clauses.map(clause => ({
        text: clause.text,
        location: clause.location,
        spec: clause.spec,
        plan: this.plan(clause.spec, baseQuery, dialect),
      })),
    };
  }

  private plan(spec: VisualizationSpec, baseQuery: string | null, dialect: SqlDialect): StatPlan {
    const plan = planStats(spec, buildBaseQuery(baseQuery, spec.source), { dialect, bins: this.options.bins });
    if (DEBUG) console.log(printStatPlan(plan));
    return plan;
  }

  private async run(reader: Reader, clause: CompiledClause, options: ReadOptions): Promise<ClauseResult> {
    const datasets = await executePlan(reader, clause.plan, options);
    validateStatDatasets(clause.plan, datasets);
    const resolved = resolveSpec(clause.spec, clause.plan, datasets);
    const vegaLite = writeVegaLite(resolved, datasets, { schema: this.options.schema });
    return { ...clause, datasets, resolved, vegaLite };
  }
}

/**
 * Create a PlotSQL instance on its own SQLite database.
 * The database is opened lazily on first execute() call.
 */
export function createPlotSQL(options: PlotSQLOptions & { databasePath?: string } = {}): PlotSQL {
  const { databasePath, ...rest } = options;
  if (rest.reader || rest.openReader) return new PlotSQL(rest);
  const path = databasePath ?? process.env.PLOTSQL_SQLITE_PATH;
  return new PlotSQL({ ...rest, openReader: () => new SqliteReader(path) });
}
