/**
 * SQL Utility Tests
 *
 * Statement classification and base query selection look at SQL tokens,
 * so comments and quoted text never change the answer.
 */

import { describe, it, expect } from 'vitest';
import { buildBaseQuery, isBareWithClause, isQueryStatement, splitRelational } from '../packages/compiler/index.js';
import { RewriteError } from '../packages/errors.js';

describe('isBareWithClause', () => {
  it('accepts a WITH list followed only by a comment', () => {
    expect(isBareWithClause("WITH t AS (SELECT 1 AS a, 2 AS b) -- the user's table")).toBe(true);
    expect(isBareWithClause("WITH t AS (SELECT ')' AS p) /* (done */")).toBe(true);
  });

  it('rejects a complete query', () => {
    expect(isBareWithClause('WITH t AS (SELECT 1) SELECT * FROM t')).toBe(false);
    expect(isBareWithClause('SELECT (1)')).toBe(false);
  });

  it('looks past leading comments', () => {
    expect(isBareWithClause('-- setup\n/* cte */ with t as (select 1)')).toBe(true);
  });
});

describe('isQueryStatement', () => {
  it('recognizes row-returning statements after comments', () => {
    expect(isQueryStatement("-- it's the query\nSELECT 1")).toBe(true);
    expect(isQueryStatement('/* wrapped */ (SELECT 1)')).toBe(true);
    expect(isQueryStatement('values (1), (2)')).toBe(true);
  });

  it('rejects other statements, even behind a commented SELECT', () => {
    expect(isQueryStatement('CREATE TABLE t (a INT)')).toBe(false);
    expect(isQueryStatement('-- SELECT\nINSERT INTO t VALUES (1)')).toBe(false);
  });
});

describe('splitRelational', () => {
  it('keeps a trailing query apart from setup statements', () => {
    expect(splitRelational(['CREATE TABLE t (a INT)', '/* rows */ SELECT * FROM t'])).toEqual({
      setup: ['CREATE TABLE t (a INT)'],
      query: '/* rows */ SELECT * FROM t',
    });
    expect(splitRelational(['CREATE TABLE t (a INT)'])).toEqual({ setup: ['CREATE TABLE t (a INT)'], query: null });
  });
});

describe('buildBaseQuery', () => {
  it('completes a commented WITH list with the FROM source', () => {
    const query = "WITH t AS (SELECT 1 AS a, 2 AS b) -- the user's table";
    expect(buildBaseQuery(query, { type: 'table', name: 't' })).toBe(`${query}\nSELECT * FROM t`);
  });

  it('refuses FROM after a complete query', () => {
    expect(() => buildBaseQuery('SELECT 1', { type: 'table', name: 't' })).toThrow(RewriteError);
  });

  it('reads a file source as a quoted path', () => {
    expect(buildBaseQuery(null, { type: 'file', path: "it's.csv" })).toBe("SELECT * FROM 'it''s.csv'");
  });
});
