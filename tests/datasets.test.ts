/**
 * Dataset Tests
 *
 * Storage types from declared SQL types and from values, and the fan-out
 * of a combined result into named datasets.
 */

import { describe, it, expect } from 'vitest';
import { parseClause } from '../packages/parser/index.js';
import {
  inferStorageType,
  partitionResult,
  planStats,
  storageTypeFromDeclared,
  withInferredTypes,
  type Dataset,
} from '../packages/compiler/index.js';

describe('storageTypeFromDeclared', () => {
  it('maps declared SQL types', () => {
    expect(storageTypeFromDeclared('INTEGER')).toBe('numeric');
    expect(storageTypeFromDeclared('double precision')).toBe('numeric');
    expect(storageTypeFromDeclared('DECIMAL(10, 2)')).toBe('numeric');
    expect(storageTypeFromDeclared('VARCHAR(20)')).toBe('text');
    expect(storageTypeFromDeclared('STRING')).toBe('text');
    expect(storageTypeFromDeclared('BOOLEAN')).toBe('boolean');
    expect(storageTypeFromDeclared('DATE')).toBe('date');
    expect(storageTypeFromDeclared('DATETIME')).toBe('timestamp');
    expect(storageTypeFromDeclared('TIMESTAMP WITH TIME ZONE')).toBe('timestamp');
    expect(storageTypeFromDeclared('TIME')).toBe('time');
  });

  it('leaves unknown and missing types to inference', () => {
    expect(storageTypeFromDeclared('BLOB')).toBe('unknown');
    expect(storageTypeFromDeclared(null)).toBe('unknown');
    expect(storageTypeFromDeclared(undefined)).toBe('unknown');
  });
});

describe('inferStorageType', () => {
  it('infers from the values present', () => {
    expect(inferStorageType([1, 2n, null])).toBe('numeric');
    expect(inferStorageType([true, false])).toBe('boolean');
    expect(inferStorageType(['2024-01-01', '2024-02-01'])).toBe('date');
    expect(inferStorageType(['2024-01-01 10:00:00', '2024-01-02T11:30:00Z'])).toBe('timestamp');
    expect(inferStorageType(['10:30', '11:45:10'])).toBe('time');
    expect(inferStorageType(['1.5', '-2', '3e2'])).toBe('numeric');
    expect(inferStorageType(['a', 1])).toBe('text');
    expect(inferStorageType([null, undefined])).toBe('unknown');
  });

  it('tells dates from timestamps among Date objects', () => {
    expect(inferStorageType([new Date('2024-01-01T00:00:00Z')])).toBe('date');
    expect(inferStorageType([new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T06:00:00Z')])).toBe('timestamp');
  });

  it('unwraps value objects', () => {
    expect(inferStorageType([{ value: 3 }, { value: 4 }])).toBe('numeric');
  });
});

describe('withInferredTypes', () => {
  it('fills in only the unknown columns', () => {
    const dataset: Dataset = {
      columns: [
        { name: 'a', type: 'unknown' },
        { name: 'b', type: 'text' },
      ],
      rows: [{ a: 1, b: '2' }],
    };
    expect(withInferredTypes(dataset).columns).toEqual([
      { name: 'a', type: 'numeric' },
      { name: 'b', type: 'text' },
    ]);
  });
});

describe('partitionResult', () => {
  it('returns the result as the base dataset when nothing was rewritten', () => {
    const plan = planStats(parseClause('VISUALISE a AS x, c AS y DRAW point'), 'SELECT * FROM t');
    const result: Dataset = {
      columns: [
        { name: 'a', type: 'numeric' },
        { name: 'c', type: 'numeric' },
      ],
      rows: [{ a: 1, c: 2 }],
    };

    const datasets = partitionResult(result, plan);
    expect([...datasets.keys()]).toEqual(['__viz_base__']);
    expect(datasets.get('__viz_base__')).toEqual(result);
  });

  it('splits tagged rows into their datasets', () => {
    const plan = planStats(
      parseClause('VISUALISE region AS x DRAW bar DRAW point MAPPING amount AS y'),
      'SELECT * FROM sales'
    );
    const result: Dataset = {
      columns: [
        { name: '__viz_source__', type: 'text' },
        { name: 'region', type: 'text' },
        { name: 'amount', type: 'numeric' },
        { name: '__viz_layer_0__x', type: 'text' },
        { name: '__viz_layer_0__y', type: 'numeric' },
      ],
      rows: [
        { __viz_source__: '__viz_layer_0__', region: null, amount: null, __viz_layer_0__x: 'north', __viz_layer_0__y: 2 },
        { __viz_source__: '__viz_base__', region: 'north', amount: 5, __viz_layer_0__x: null, __viz_layer_0__y: null },
        { __viz_source__: '__viz_base__', region: 'north', amount: 7, __viz_layer_0__x: null, __viz_layer_0__y: null },
      ],
    };

    const datasets = partitionResult(result, plan);
    expect(datasets.get('__viz_base__')).toEqual({
      columns: [
        { name: 'region', type: 'text' },
        { name: 'amount', type: 'numeric' },
      ],
      rows: [
        { region: 'north', amount: 5 },
        { region: 'north', amount: 7 },
      ],
    });
    expect(datasets.get('__viz_layer_0__')).toEqual({
      columns: [
        { name: 'x', type: 'text' },
        { name: 'y', type: 'numeric' },
      ],
      rows: [{ x: 'north', y: 2 }],
    });
  });

  it('keeps the base schema when no layer reads the base rows', () => {
    const plan = planStats(parseClause('VISUALISE region AS x DRAW bar'), 'SELECT * FROM sales');
    const result: Dataset = {
      columns: [
        { name: '__viz_source__', type: 'text' },
        { name: 'region', type: 'text' },
        { name: '__viz_layer_0__x', type: 'unknown' },
        { name: '__viz_layer_0__y', type: 'unknown' },
      ],
      rows: [{ __viz_source__: '__viz_layer_0__', region: null, __viz_layer_0__x: 'south', __viz_layer_0__y: 3 }],
    };

    const datasets = partitionResult(result, plan);
    expect(datasets.get('__viz_base__')).toEqual({ columns: [{ name: 'region', type: 'text' }], rows: [] });
    expect(datasets.get('__viz_layer_0__')?.columns).toEqual([
      { name: 'x', type: 'text' },
      { name: 'y', type: 'numeric' },
    ]);
  });
});
