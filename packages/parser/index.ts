/**
 * Parser - Unified Entry Point
 *
 * Splits a query into its relational part and VISUALISE clauses and parses
 * every clause into an unresolved specification.
 */

import { parseClause, parseClauseWithErrors } from './chevrotain-parser.js';
import { splitQuery, splitStatements } from './splitter.js';
import type { ClauseLocation, ParsedQuery, VisualizationSpec } from './ast.js';
import type { ParseError } from '../errors.js';

export interface ClauseResult {
  text: string;
  location: ClauseLocation;
  spec: VisualizationSpec | null;
  errors: ParseError[];
}

export interface ParseQueryResult {
  relational: string;
  statements: string[];
  clauses: ClauseResult[];
}

/**
 * Parse a full query. Throws the first ParseError of any clause.
 */
export function parseQuery(text: string): ParsedQuery {
  const { relational, clauses } = splitQuery(text);
  return {
    relational,
    statements: splitStatements(relational),
    clauses: clauses.map(fragment => ({
      text: fragment.text,
      location: fragment.location,
      spec: parseClause(fragment.text, fragment.location),
    })),
  };
}

/**
 * Parse a full query, collecting errors per clause so one bad clause does
 * not hide its siblings.
 */
export function parseQueryWithErrors(text: string): ParseQueryResult {
  const { relational, clauses } = splitQuery(text);
  return {
    relational,
    statements: splitStatements(relational),
    clauses: clauses.map(fragment => ({
      text: fragment.text,
      location: fragment.location,
      ...parseClauseWithErrors(fragment.text, fragment.location),
    })),
  };
}

// Re-export types
export * from './ast.js';
export * from './vocabulary.js';

export { parseClause, parseClauseWithErrors, unquote } from './chevrotain-parser.js';
export type { ClauseParseResult } from './chevrotain-parser.js';
export { splitQuery, splitStatements, sqlTokens } from './splitter.js';
export type { ClauseFragment, SplitResult, SqlToken, SqlTokenKind } from './splitter.js';

// Re-export prettifier
export { formatVisualise } from './prettifier.js';
