/**
 * SQL text helpers shared by the stat resolver.
 *
 * Dialects differ in identifier quoting, flooring and quantile functions;
 * everything else generated here is plain SQL that DuckDB, SQLite and
 * BigQuery all accept.
 */

import { RewriteError } from '../errors.js';
import type { SourceReference } from '../parser/ast.js';
import { sqlTokens, type SqlToken } from '../parser/splitter.js';

export type SqlDialect = 'duckdb' | 'sqlite' | 'bigquery';

export function quoteIdentifier(name: string, dialect: SqlDialect): string {
  if (dialect === 'bigquery') {
    return '`' + name.replace(/`/g, '\\`') + '`';
  }
  return '"' + name.replace(/"/g, '""') + '"';
}

export function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Round a non-negative expression down to an integer.
 * SQLite has no FLOOR before 3.44, but CAST truncates toward zero.
 */
export function floorExpression(expr: string, dialect: SqlDialect): string {
  return dialect === 'sqlite' ? `CAST(${expr} AS INTEGER)` : `FLOOR(${expr})`;
}

/**
 * Continuous quantile as a window function.
 *
 * DuckDB: quantile_cont(value, q) OVER (PARTITION BY ...)
 * BigQuery: PERCENTILE_CONT(value, q) OVER (PARTITION BY ...)
 *
 * SQLite has no quantile function; callers use nearest rank over
 * ROW_NUMBER() instead.
 */
export function quantileWindowFunction(
  value: string,
  quantile: number,
  partitionColumns: string[],
  dialect: Exclude<SqlDialect, 'sqlite'>
): string {
  const partitionClause = partitionColumns.length > 0 ? `PARTITION BY ${partitionColumns.join(', ')}` : '';
  if (dialect === 'duckdb') {
    return `quantile_cont(${value}, ${quantile}) OVER (${partitionClause})`;
  }
  return `PERCENTILE_CONT(${value}, ${quantile}) OVER (${partitionClause})`;
}

export function indent(sql: string, spaces = 2): string {
  const pad = ' '.repeat(spaces);
  return sql
    .split('\n')
    .map(line => (line.length > 0 ? pad + line : line))
    .join('\n');
}

// ---
// BASE QUERY
// ---

function isWord(token: SqlToken | undefined, ...words: string[]): boolean {
  return token?.kind === 'word' && words.includes(token.image.toUpperCase());
}

/**
 * True when the text is a WITH list with nothing after its last CTE, so a
 * SELECT can be appended to complete it.
 */
export function isBareWithClause(sql: string): boolean {
  const tokens = sqlTokens(sql);
  if (!isWord(tokens[0], 'WITH')) return false;

  let depth = 0;
  let lastClose = -1;
  tokens.forEach((token, i) => {
    if (token.kind === 'open') {
      depth++;
    } else if (token.kind === 'close') {
      depth--;
      if (depth === 0) lastClose = i;
    }
  });

  return lastClose >= 0 && lastClose === tokens.length - 1;
}

export interface RelationalParts {
  /** Statements run once, in order, before any clause */
  setup: string[];
  /** Trailing row-returning statement, if the prefix ends with one */
  query: string | null;
}

/** True when the statement returns rows, looking past leading comments. */
export function isQueryStatement(sql: string): boolean {
  const first = sqlTokens(sql)[0];
  return first?.kind === 'open' || isWord(first, 'SELECT', 'WITH', 'VALUES', 'FROM', 'TABLE');
}

export function splitRelational(statements: string[]): RelationalParts {
  const last = statements.length > 0 ? statements[statements.length - 1] : undefined;
  if (last !== undefined && isQueryStatement(last)) {
    return { setup: statements.slice(0, -1), query: last };
  }
  return { setup: [...statements], query: null };
}

/**
 * Pick the query whose rows feed the chart: the trailing relational query,
 * or `SELECT * FROM source` for the FROM shorthand.
 */
export function buildBaseQuery(query: string | null, source: SourceReference | null): string {
  if (!source) {
    if (query === null) {
      throw new RewriteError('No data source: add a query before VISUALISE or use VISUALISE FROM <table>');
    }
    return query;
  }

  const target = source.type === 'table' ? source.name : quoteString(source.path);
  const select = `SELECT * FROM ${target}`;

  if (query === null) return select;
  if (isBareWithClause(query)) return `${query}\n${select}`;

  throw new RewriteError('VISUALISE FROM cannot follow a complete query; drop FROM or end the query with a WITH list');
}
