/**
 * Stat Resolver Tests
 *
 * Stat inference, the SQL of each stat fragment, dataset deduplication and
 * the combined statement.
 */

import { describe, it, expect } from 'vitest';
import { parseClause } from '../packages/parser/index.js';
import {
  effectiveStat,
  declaredMapping,
  planStats,
  validateStatDatasets,
  type Datasets,
} from '../packages/compiler/index.js';
import { ResolutionError, RewriteError } from '../packages/errors.js';

function statOf(clause: string, index = 0): string {
  const spec = parseClause(clause);
  const layer = spec.layers[index];
  return effectiveStat(layer, declaredMapping(spec, layer));
}

function datasetSql(clause: string, options: Parameters<typeof planStats>[2] = {}): string {
  const plan = planStats(parseClause(clause), 'SELECT * FROM t', options);
  const [dataset] = plan.datasets.filter(d => d.kind === 'stat');
  return dataset?.sql ?? '';
}

describe('effectiveStat', () => {
  it('uses the default stat of the geom', () => {
    expect(statOf('VISUALISE a AS x DRAW bar')).toBe('count');
    expect(statOf('VISUALISE a AS x DRAW histogram')).toBe('bin');
    expect(statOf('VISUALISE a AS x, b AS y DRAW boxplot')).toBe('boxplot');
    expect(statOf('VISUALISE a AS x DRAW density')).toBe('density');
    expect(statOf('VISUALISE a AS x, b AS y DRAW smooth')).toBe('smooth');
    expect(statOf('VISUALISE a AS x, b AS y DRAW point')).toBe('identity');
  });

  it('falls back to identity when the layer maps what the stat would compute', () => {
    expect(statOf('VISUALISE a AS x, b AS y DRAW bar')).toBe('identity');
    expect(statOf('VISUALISE a AS x DRAW col MAPPING n AS y')).toBe('identity');
    expect(statOf('VISUALISE a AS x DRAW histogram MAPPING n AS y')).toBe('identity');
    expect(statOf('VISUALISE a AS x, b AS y DRAW boxplot MAPPING q1 AS lower')).toBe('identity');
  });
});

describe('count', () => {
  it('groups by the x column', () => {
    expect(datasetSql('VISUALISE region AS x DRAW bar')).toBe(
      ['SELECT', '  "region" AS "x",', '  COUNT(*) AS "y"', 'FROM "__viz_base__"', 'GROUP BY "region"'].join('\n')
    );
  });

  it('also groups by grouping aesthetics, facets and partitions', () => {
    const spec = parseClause('VISUALISE region AS x, channel AS fill DRAW bar PARTITION BY year FACET WRAP country');
    const plan = planStats(spec, 'SELECT * FROM t');

    expect(plan.datasets[0].sql).toBe(
      [
        'SELECT',
        '  "region" AS "x",',
        '  "channel" AS "fill",',
        '  "country" AS "country",',
        '  "year" AS "year",',
        '  COUNT(*) AS "y"',
        'FROM "__viz_base__"',
        'GROUP BY "region", "channel", "country", "year"',
      ].join('\n')
    );
    expect(plan.datasets[0].columns).toEqual(['x', 'fill', 'country', 'year', 'y']);
    expect(plan.layers[0].outputs).toEqual({ x: 'x', y: 'y', fill: 'fill' });
    expect(plan.layers[0].titles).toEqual({ x: 'region', y: 'count', fill: 'channel' });
  });

  it('applies the layer filter before counting', () => {
    expect(datasetSql("VISUALISE region AS x DRAW bar FILTER region <> 'north'")).toContain(
      `FROM "__viz_base__"\nWHERE region <> 'north'\nGROUP BY "region"`
    );
  });

  it('quotes identifiers for BigQuery', () => {
    expect(datasetSql('VISUALISE region AS x DRAW bar', { dialect: 'bigquery' })).toBe(
      ['SELECT', '  `region` AS `x`,', '  COUNT(*) AS `y`', 'FROM `__viz_base__`', 'GROUP BY `region`'].join('\n')
    );
  });
});

describe('bin', () => {
  it('uses the bins setting, then the option, then 30', () => {
    expect(datasetSql('VISUALISE v AS x DRAW histogram SETTING bins => 10')).toContain(
      'NULLIF((MAX("v") - MIN("v")) / 10.0, 0) AS "__viz_width__"'
    );
    expect(datasetSql('VISUALISE v AS x DRAW histogram', { bins: 12 })).toContain('/ 12.0, 0)');
    expect(datasetSql('VISUALISE v AS x DRAW histogram')).toContain('/ 30.0, 0)');
  });

  it('clamps the top edge into the last bucket', () => {
    const sql = datasetSql('VISUALISE v AS x DRAW histogram SETTING bins => 10');
    expect(sql).toContain(
      'CASE WHEN FLOOR(("v" - r."__viz_lo__") / r."__viz_width__") >= 10 THEN 9 ELSE FLOOR(("v" - r."__viz_lo__") / r."__viz_width__") END AS "__viz_idx__"'
    );
  });

  it('truncates with CAST on SQLite', () => {
    const sql = datasetSql('VISUALISE v AS x DRAW histogram', { dialect: 'sqlite' });
    expect(sql).toContain('CAST(("v" - r."__viz_lo__") / r."__viz_width__" AS INTEGER)');
    expect(sql).not.toContain('FLOOR(');
  });

  it('outputs bucket centre, edges and count', () => {
    const plan = planStats(parseClause('VISUALISE v AS x DRAW histogram'), 'SELECT * FROM t');
    expect(plan.datasets[0].columns).toEqual(['x', 'xmin', 'xmax', 'y']);
    expect(plan.layers[0].outputs).toEqual({ x: 'x', xmin: 'xmin', xmax: 'xmax', y: 'y' });
  });
});

describe('boxplot', () => {
  const clause = 'VISUALISE grp AS x, val AS y DRAW boxplot';

  it('uses quantile_cont on DuckDB', () => {
    const sql = datasetSql(clause);
    expect(sql).toContain('quantile_cont("val", 0.25) OVER (PARTITION BY "grp") AS "__viz_lower__"');
    expect(sql).toContain('MIN("__viz_middle__") AS "middle"');
    expect(sql).toContain('WHERE "val" IS NOT NULL');
  });

  it('uses PERCENTILE_CONT on BigQuery', () => {
    expect(datasetSql(clause, { dialect: 'bigquery' })).toContain(
      'PERCENTILE_CONT(`val`, 0.75) OVER (PARTITION BY `grp`) AS `__viz_upper__`'
    );
  });

  it('uses nearest rank on SQLite', () => {
    const sql = datasetSql(clause, { dialect: 'sqlite' });
    expect(sql).toContain('ROW_NUMBER() OVER (PARTITION BY "grp" ORDER BY "val") AS "__viz_rn__"');
    expect(sql).toContain('MIN(CASE WHEN "__viz_rn__" >= 0.5 * "__viz_n__" THEN "__viz_value__" END) AS "middle"');
  });

  it('outputs the five-number summary', () => {
    const plan = planStats(parseClause(clause), 'SELECT * FROM t');
    expect(plan.datasets[0].columns).toEqual(['x', 'ymin', 'lower', 'middle', 'upper', 'ymax']);
    expect(plan.layers[0].titles).toEqual({ x: 'grp', y: 'val' });
  });
});

describe('planStats', () => {
  it('runs the base query untouched when no layer needs a stat or a filter', () => {
    const plan = planStats(parseClause('VISUALISE a AS x, c AS y DRAW point DRAW line'), 'SELECT a, c FROM t');
    expect(plan.rewritten).toBe(false);
    expect(plan.sql).toBe('SELECT a, c FROM t');
    expect(plan.datasets).toEqual([{ name: '__viz_base__', kind: 'base', sql: null, columns: [] }]);
    expect(plan.mapping).toEqual([
      { layerIndex: 0, dataset: '__viz_base__' },
      { layerIndex: 1, dataset: '__viz_base__' },
    ]);
  });

  it('leaves density and smooth to transforms over the raw rows', () => {
    const plan = planStats(parseClause('VISUALISE a AS x DRAW density DRAW smooth MAPPING c AS y'), 'SELECT * FROM t');
    expect(plan.rewritten).toBe(false);
    expect(plan.layers.map(l => [l.stat, l.deferred, l.dataset])).toEqual([
      ['density', true, '__viz_base__'],
      ['smooth', true, '__viz_base__'],
    ]);
    expect(plan.layers[0].inputs).toEqual({ x: 'a' });
    expect(plan.layers[1].inputs).toEqual({ x: 'a', y: 'c' });
  });

  it('shares one dataset between layers with the same stat query', () => {
    const plan = planStats(parseClause("VISUALISE region AS x DRAW bar DRAW bar SETTING fill => 'red'"), 'SELECT * FROM t');
    expect(plan.datasets).toHaveLength(1);
    expect(plan.mapping).toEqual([
      { layerIndex: 0, dataset: '__viz_layer_0__' },
      { layerIndex: 1, dataset: '__viz_layer_0__' },
    ]);
  });

  it('gives a filtered identity layer its own dataset', () => {
    const plan = planStats(parseClause('VISUALISE a AS x, c AS y DRAW point DRAW line FILTER c > 2'), 'SELECT * FROM t');
    expect(plan.datasets).toEqual([
      { name: '__viz_base__', kind: 'base', sql: null, columns: [] },
      { name: '__viz_layer_1__', kind: 'filtered', sql: 'c > 2', columns: [] },
    ]);
    expect(plan.rewritten).toBe(true);
    expect(plan.sql).toBe(
      [
        'WITH "__viz_base__" AS (',
        '  SELECT * FROM t',
        ')',
        `SELECT '__viz_base__' AS "__viz_source__", b.*`,
        'FROM "__viz_base__" AS b',
        'UNION ALL',
        `SELECT '__viz_layer_1__' AS "__viz_source__", b.*`,
        'FROM "__viz_base__" AS b',
        'WHERE c > 2',
      ].join('\n')
    );
  });

  it('wraps stat datasets into one tagged statement', () => {
    const plan = planStats(parseClause('VISUALISE region AS x DRAW bar'), 'SELECT * FROM sales');
    expect(plan.sql).toBe(
      [
        'WITH "__viz_base__" AS (',
        '  SELECT * FROM sales',
        '),',
        '"__viz_layer_0__" AS (',
        '  SELECT',
        '    "region" AS "x",',
        '    COUNT(*) AS "y"',
        '  FROM "__viz_base__"',
        '  GROUP BY "region"',
        ')',
        `SELECT '__viz_layer_0__' AS "__viz_source__", b.*, s."x" AS "__viz_layer_0__x", s."y" AS "__viz_layer_0__y"`,
        'FROM "__viz_layer_0__" AS s',
        'LEFT JOIN (SELECT * FROM "__viz_base__" WHERE 1 = 0) AS b ON 1 = 0',
      ].join('\n')
    );
  });

  it('fills the columns of other stat datasets with NULL', () => {
    const plan = planStats(
      parseClause('VISUALISE region AS x DRAW bar DRAW histogram MAPPING amount AS x'),
      'SELECT * FROM sales'
    );
    expect(plan.sql).toContain(
      `SELECT '__viz_layer_0__' AS "__viz_source__", b.*, s."x" AS "__viz_layer_0__x", s."y" AS "__viz_layer_0__y", ` +
        `NULL AS "__viz_layer_1__x", NULL AS "__viz_layer_1__xmin", NULL AS "__viz_layer_1__xmax", NULL AS "__viz_layer_1__y"`
    );
  });

  it('requires columns for stat inputs', () => {
    expect(() => planStats(parseClause("VISUALISE 'all' AS x DRAW bar"), 'SELECT 1')).toThrow(
      "Layer 1 (bar) needs a column for 'x' to compute its count stat"
    );
    expect(() => planStats(parseClause('VISUALISE DRAW bar'), 'SELECT 1')).toThrow(ResolutionError);
  });
});

describe('validateStatDatasets', () => {
  it('rejects histograms whose input has fewer than two distinct values', () => {
    const plan = planStats(parseClause('VISUALISE v AS x DRAW histogram'), 'SELECT * FROM t');
    const datasets: Datasets = new Map([
      ['__viz_base__', { columns: [], rows: [] }],
      ['__viz_layer_0__', { columns: [], rows: [{ x: null, xmin: null, xmax: null, y: 4 }] }],
    ]);

    expect(() => validateStatDatasets(plan, datasets)).toThrow(RewriteError);
    expect(() => validateStatDatasets(plan, datasets)).toThrow(
      "Layer 1 cannot bin 'v': it needs at least two distinct values"
    );
  });

  it('accepts computed buckets', () => {
    const plan = planStats(parseClause('VISUALISE v AS x DRAW histogram'), 'SELECT * FROM t');
    const datasets: Datasets = new Map([
      ['__viz_layer_0__', { columns: [], rows: [{ x: 1.5, xmin: 1, xmax: 2, y: 4 }] }],
    ]);
    expect(() => validateStatDatasets(plan, datasets)).not.toThrow();
  });
});
