/**
 * End-to-End Tests
 *
 * Runs the complete pipeline against an in-memory SQLite database:
 *   query -> split -> parse -> plan stats -> execute -> partition
 *         -> resolve -> Vega-Lite
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ExecutionError,
  ParseError,
  PlotSQL,
  ResolutionError,
  RewriteError,
  SqliteReader,
  closeReader,
  createPlotSQL,
  createReader,
  setPendingReader,
  type Dataset,
  type Reader,
} from '../packages/index.js';
import { getField, getLayers, getRows } from '../packages/renderer/index.js';

const SALES_SETUP = `
CREATE TABLE sales (region TEXT, amount REAL);
INSERT INTO sales VALUES ('north', 10), ('north', 20), ('south', 5);
`;

let reader: SqliteReader;
let plot: PlotSQL;

beforeEach(() => {
  reader = new SqliteReader();
  plot = new PlotSQL({ reader });
});

afterEach(() => {
  reader.close();
  vi.restoreAllMocks();
});

function byX(rows: Record<string, unknown>[]): Record<string, unknown>[] {
  return [...rows].sort((a, b) => Number(a.x) - Number(b.x) || String(a.x).localeCompare(String(b.x)));
}

describe('stats computed in SQL', () => {
  it('counts rows per category for bars', async () => {
    const { setup, results } = await plot.execute(`${SALES_SETUP} SELECT * FROM sales VISUALISE region AS x DRAW bar`);

    expect(setup).toHaveLength(2);
    expect(results).toHaveLength(1);
    const counts = results[0].datasets.get('__viz_layer_0__')?.rows ?? [];
    expect(byX(counts)).toEqual([
      { x: 'north', y: 2 },
      { x: 'south', y: 1 },
    ]);
    expect(results[0].vegaLite.data).toEqual({ name: '__viz_layer_0__' });
  });

  it('bins values into equal-width buckets', async () => {
    const { results } = await plot.execute(
      `${SALES_SETUP} SELECT * FROM sales VISUALISE amount AS x DRAW histogram SETTING bins => 3`
    );

    const buckets = results[0].datasets.get('__viz_layer_0__')?.rows ?? [];
    expect(byX(buckets)).toEqual([
      { x: 7.5, xmin: 5, xmax: 10, y: 1 },
      { x: 12.5, xmin: 10, xmax: 15, y: 1 },
      { x: 17.5, xmin: 15, xmax: 20, y: 1 },
    ]);
  });

  it('refuses to bin a single distinct value', async () => {
    await expect(
      plot.execute('SELECT 3.0 AS v UNION ALL SELECT 3.0 VISUALISE v AS x DRAW histogram')
    ).rejects.toBeInstanceOf(RewriteError);
  });

  it('summarizes boxplot groups', async () => {
    const { results } = await plot.execute(`
      CREATE TABLE m (grp TEXT, val REAL);
      INSERT INTO m VALUES ('a', 1), ('a', 2), ('a', 3), ('a', 4);
      SELECT * FROM m VISUALISE grp AS x, val AS y DRAW boxplot
    `);

    expect(results[0].datasets.get('__viz_layer_0__')?.rows).toEqual([
      { x: 'a', ymin: 1, lower: 1, middle: 2, upper: 3, ymax: 4 },
    ]);
  });

  it('gives a filtered layer its own rows', async () => {
    const { results } = await plot.execute(
      `${SALES_SETUP} SELECT * FROM sales VISUALISE region AS x, amount AS y DRAW point DRAW point FILTER amount > 8`
    );

    const [result] = results;
    expect(result.plan.rewritten).toBe(true);
    expect(result.datasets.get('__viz_base__')?.rows).toHaveLength(3);
    const amounts = (result.datasets.get('__viz_layer_1__')?.rows ?? []).map(r => Number(r.amount));
    expect(amounts.sort((a, b) => a - b)).toEqual([10, 20]);
    expect(getRows(result.vegaLite, '__viz_layer_1__')).toHaveLength(2);
  });
});

describe('data sources', () => {
  it('reads the table named by FROM after setup statements', async () => {
    const { setup, results } = await plot.execute(`${SALES_SETUP} VISUALISE FROM sales DRAW bar MAPPING region AS x`);

    expect(setup).toHaveLength(2);
    expect(results[0].plan.baseQuery).toBe('SELECT * FROM sales');
    expect(results[0].datasets.get('__viz_layer_0__')?.rows).toHaveLength(2);
  });

  it('reads registered in-memory rows with their types', async () => {
    const events: Dataset = {
      columns: [
        { name: 'day', type: 'date' },
        { name: 'n', type: 'numeric' },
      ],
      rows: [{ day: new Date('2024-03-05T00:00:00Z'), n: 3 }],
    };
    reader.register('events', events);

    const { results } = await plot.execute('SELECT * FROM events VISUALISE day AS x, n AS y DRAW line');
    const doc = results[0].vegaLite;

    expect(getRows(doc)).toEqual([{ day: '2024-03-05', n: 3 }]);
    expect(getField(getLayers(doc)[0], 'x')?.type).toBe('temporal');
  });

  it('completes a WITH list followed by a comment with the FROM table', async () => {
    const query = "WITH t AS (SELECT 1 AS a, 2 AS b) -- the user's table";
    const { results } = await plot.execute(`${query}\nVISUALISE FROM t DRAW point MAPPING a AS x, b AS y`);

    expect(results[0].plan.baseQuery).toBe(`${query}\nSELECT * FROM t`);
    expect(getRows(results[0].vegaLite)).toEqual([{ a: 1, b: 2 }]);
  });

  it('hands the base query to the reader untouched when no stat runs', async () => {
    const seen: string[] = [];
    const fake: Reader = {
      dialect: 'duckdb',
      async execute(sql: string): Promise<Dataset> {
        seen.push(sql);
        return {
          columns: [
            { name: 'a', type: 'numeric' },
            { name: 'b', type: 'numeric' },
          ],
          rows: [{ a: 1, b: 2 }],
        };
      },
    };

    const { results } = await new PlotSQL({ reader: fake }).execute('SELECT a, b FROM t VISUALISE a AS x, b AS y DRAW point');
    expect(seen).toEqual(['SELECT a, b FROM t']);
    expect(results[0].vegaLite.mark).toBe('point');
  });
});

describe('results and errors', () => {
  it('returns nothing for a query without a clause', async () => {
    expect(await plot.execute('SELECT 1')).toEqual({ setup: [], results: [] });
  });

  it('rejects a clause without any DRAW layer', async () => {
    await expect(plot.execute('SELECT 1 AS date, 2 AS revenue VISUALISE date AS x, revenue AS y')).rejects.toThrow(
      new ResolutionError('VISUALISE needs at least one DRAW layer')
    );
  });

  it('resolves each clause with its own mapping', async () => {
    const { results } = await plot.execute(
      `${SALES_SETUP} SELECT * FROM sales VISUALISE region AS x, amount AS y DRAW point VISUALISE amount AS x, region AS y DRAW point`
    );

    const [first, second] = results.map(r => getLayers(r.vegaLite)[0]);
    expect([getField(first, 'x')?.field, getField(first, 'y')?.field]).toEqual(['region', 'amount']);
    expect([getField(second, 'x')?.field, getField(second, 'y')?.field]).toEqual(['amount', 'region']);
    expect(getField(second, 'x')?.type).toBe('quantitative');
  });

  it('gives every layer the global mapping', async () => {
    const { results } = await plot.execute('SELECT 1 AS a, 2 AS b VISUALISE a AS x, b AS y DRAW line DRAW point');

    const [line, point] = getLayers(results[0].vegaLite);
    expect(getField(line, 'x')).toEqual({ field: 'a', type: 'quantitative' });
    expect(getField(line, 'y')).toEqual({ field: 'b', type: 'quantitative' });
    expect(getField(point, 'x')).toEqual(getField(line, 'x'));
    expect(getField(point, 'y')).toEqual(getField(line, 'y'));
  });

  it('settles every clause on its own', async () => {
    const { results } = await plot.executeSettled(
      `${SALES_SETUP} SELECT * FROM sales VISUALISE region AS x DRAW bar VISUALISE region AS x DRAW pie`
    );

    expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
    const failed = results[1];
    if (failed.status !== 'rejected') throw new Error('expected a rejected clause');
    expect(failed.reason).toBeInstanceOf(ParseError);
    expect(failed.reason.kind).toBe('syntax');
    expect(failed.text).toBe('VISUALISE region AS x DRAW pie');
  });

  it('turns engine failures into execution errors', async () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(plot.execute('SELECT * FROM nowhere VISUALISE a AS x, b AS y DRAW point')).rejects.toMatchObject({
      kind: 'execution',
      sql: 'SELECT * FROM nowhere',
    });
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('stops when the caller aborts', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const controller = new AbortController();
    controller.abort();

    await expect(
      plot.execute('SELECT 1 AS a, 2 AS b VISUALISE a AS x, b AS y DRAW point', { signal: controller.signal })
    ).rejects.toBeInstanceOf(ExecutionError);
  });
});

describe('readers', () => {
  it('gives each createPlotSQL instance its own database', async () => {
    const a = createPlotSQL();
    try {
      await a.execute(
        'CREATE TABLE only_a (v REAL); INSERT INTO only_a VALUES (1), (2); SELECT v FROM only_a VISUALISE v AS x, v AS y DRAW point'
      );
      const b = createPlotSQL();
      try {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        await expect(b.execute('SELECT v FROM only_a VISUALISE v AS x, v AS y DRAW point')).rejects.toThrow(
          'no such table: only_a'
        );
      } finally {
        await b.close();
      }

      const { results } = await a.execute('SELECT v FROM only_a VISUALISE v AS x, v AS y DRAW point');
      expect(results[0].datasets.get('__viz_base__')?.rows).toHaveLength(2);
    } finally {
      await a.close();
    }
  });

  it('closes the shared reader it replaces', async () => {
    const first = createReader({ type: 'sqlite' });
    setPendingReader({ type: 'sqlite' });

    await expect(first.execute('SELECT 1')).rejects.toThrow('The database connection is not open');
    await closeReader();
  });
});

describe('compile', () => {
  it('plans for DuckDB unless told otherwise', () => {
    const query = 'SELECT * FROM t VISUALISE a AS x DRAW bar';
    expect(new PlotSQL().compile(query).clauses[0].plan.dialect).toBe('duckdb');
    expect(plot.compile(query).clauses[0].plan.dialect).toBe('sqlite');
    expect(new PlotSQL({ reader, dialect: 'bigquery' }).compile(query).clauses[0].plan.dialect).toBe('bigquery');
  });

  it('keeps setup statements apart from the base query', () => {
    const { setup, clauses } = plot.compile('CREATE TABLE t (a REAL); SELECT * FROM t VISUALISE a AS x, a AS y DRAW point');
    expect(setup).toEqual(['CREATE TABLE t (a REAL)']);
    expect(clauses[0].plan.sql).toBe('SELECT * FROM t');
  });
});
