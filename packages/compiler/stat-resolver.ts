/**
 * Stat Resolver
 *
 * Decides per layer whether the chart reads raw rows or an aggregate, emits
 * one CTE per distinct aggregate, and wraps everything into a single
 * statement whose rows are tagged with the dataset they belong to.
 *
 * Density and smooth are never computed here: the renderer expresses them
 * as Vega-Lite transforms over the layer's raw rows.
 */

import { ResolutionError, RewriteError } from '../errors.js';
import type { AestheticValue, LayerSpec, Stat, UnresolvedSpec } from '../parser/ast.js';
import { facetVariables } from '../parser/ast.js';
import { GEOM_INFO, GROUPING_AESTHETICS } from '../parser/vocabulary.js';
import type { Datasets } from './datasets.js';
import { declaredMapping, missingAestheticError, missingAesthetics } from './mapping-resolver.js';
import {
  BASE_DATASET,
  SOURCE_COLUMN,
  layerDatasetName,
  type DatasetDefinition,
  type LayerStatPlan,
  type StatPlan,
} from './resolved-spec.js';
import { type SqlDialect, floorExpression, indent, quantileWindowFunction, quoteIdentifier, quoteString } from './sql-utils.js';

const DEBUG = process.env.DEBUG_PLOTSQL === 'true';

/** Column names stat fragments produce themselves */
const STAT_OUTPUT_COLUMNS = ['x', 'y', 'xmin', 'xmax', 'ymin', 'ymax', 'lower', 'middle', 'upper'];

export const DEFAULT_BINS = 30;

export interface StatOptions {
  dialect?: SqlDialect;
  /** Bucket count for histograms without a `bins` setting */
  bins?: number;
}

// ---
// STAT INFERENCE
// ---

/**
 * The stat a layer actually uses: its geom's default, unless the layer
 * already supplies an aesthetic that stat would compute.
 */
export function effectiveStat(layer: LayerSpec, declared: ReadonlyMap<string, AestheticValue>): Stat {
  const info = GEOM_INFO[layer.geom];
  if (info.computed.some(aesthetic => declared.has(aesthetic))) return 'identity';
  return info.defaultStat;
}

export function isDeferredStat(stat: Stat): stat is 'density' | 'smooth' {
  return stat === 'density' || stat === 'smooth';
}

// ---
// FRAGMENTS
// ---

interface GroupColumn {
  source: string;
  alias: string;
  /** Bound through a grouping aesthetic, which the layer keeps drawing */
  aesthetic: boolean;
}

interface StatFragment {
  sql: string;
  columns: string[];
  outputs: Record<string, string>;
  titles: Record<string, string>;
}

interface FragmentContext {
  dialect: SqlDialect;
  filter: string | null;
  groups: GroupColumn[];
  bins: number;
}

/**
 * Columns a stat groups by besides its input: grouping aesthetics bound to
 * a column (under the aesthetic's name), then facet and PARTITION BY
 * columns (under their own names).
 */
function groupColumns(
  declared: ReadonlyMap<string, AestheticValue>,
  extraColumns: string[],
  reserved: string[]
): GroupColumn[] {
  const groups: GroupColumn[] = [];
  const taken = new Set(reserved);

  const add = (source: string, alias: string, aesthetic: boolean) => {
    if (taken.has(alias)) return;
    taken.add(alias);
    groups.push({ source, alias, aesthetic });
  };

  for (const [aesthetic, value] of declared) {
    if (value.type === 'column' && (GROUPING_AESTHETICS as readonly string[]).includes(aesthetic)) {
      add(value.name, aesthetic, true);
    }
  }
  for (const name of extraColumns) add(name, name, false);

  return groups;
}

function whereClause(conditions: (string | null)[]): string {
  const present = conditions.filter((c): c is string => c !== null);
  return present.length > 0 ? `WHERE ${present.join(' AND ')}` : '';
}

function groupTitles(groups: GroupColumn[]): Record<string, string> {
  return Object.fromEntries(groups.filter(g => g.alias !== g.source).map(g => [g.alias, g.source]));
}

function groupOutputs(groups: GroupColumn[]): Record<string, string> {
  return Object.fromEntries(groups.filter(g => g.aesthetic).map(g => [g.alias, g.alias]));
}

export function countFragment(x: string, ctx: FragmentContext): StatFragment {
  const q = (name: string) => quoteIdentifier(name, ctx.dialect);
  const select = [`${q(x)} AS ${q('x')}`, ...ctx.groups.map(g => `${q(g.source)} AS ${q(g.alias)}`), `COUNT(*) AS ${q('y')}`];
  const groupBy = [...new Set([x, ...ctx.groups.map(g => g.source)])].map(q);

  const lines = [
    'SELECT',
    indent(select.join(',\n')),
    `FROM ${q(BASE_DATASET)}`,
    whereClause([ctx.filter]),
    `GROUP BY ${groupBy.join(', ')}`,
  ].filter(line => line.length > 0);

  return {
    sql: lines.join('\n'),
    columns: ['x', ...ctx.groups.map(g => g.alias), 'y'],
    outputs: { x: 'x', y: 'y', ...groupOutputs(ctx.groups) },
    titles: { x: x, y: 'count', ...groupTitles(ctx.groups) },
  };
}

export function binFragment(x: string, ctx: FragmentContext): StatFragment {
  const q = (name: string) => quoteIdentifier(name, ctx.dialect);
  const lo = q('__viz_lo__');
  const width = q('__viz_width__');
  const idx = q('__viz_idx__');
  const bucket = floorExpression(`(${q(x)} - r.${lo}) / r.${width}`, ctx.dialect);
  const groupAliases = ctx.groups.map(g => q(g.alias));

  const inner = [
    'SELECT',
    indent(
      [
        ...ctx.groups.map(g => `${q(g.source)} AS ${q(g.alias)}`),
        `r.${lo}`,
        `r.${width}`,
        `CASE WHEN ${bucket} >= ${ctx.bins} THEN ${ctx.bins - 1} ELSE ${bucket} END AS ${idx}`,
      ].join(',\n')
    ),
    `FROM ${q(BASE_DATASET)}`,
    'CROSS JOIN (',
    indent(
      [
        'SELECT',
        `  MIN(${q(x)}) AS ${lo},`,
        `  NULLIF((MAX(${q(x)}) - MIN(${q(x)})) / ${ctx.bins}.0, 0) AS ${width}`,
        `FROM ${q(BASE_DATASET)}`,
        whereClause([ctx.filter]),
      ]
        .filter(line => line.length > 0)
        .join('\n')
    ),
    ') AS r',
    whereClause([`${q(x)} IS NOT NULL`, ctx.filter]),
  ].join('\n');

  const select = [
    `${lo} + (${idx} + 0.5) * ${width} AS ${q('x')}`,
    `${lo} + ${idx} * ${width} AS ${q('xmin')}`,
    `${lo} + (${idx} + 1) * ${width} AS ${q('xmax')}`,
    ...groupAliases,
    `COUNT(*) AS ${q('y')}`,
  ];

  const sql = [
    'SELECT',
    indent(select.join(',\n')),
    'FROM (',
    indent(inner),
    `) AS ${q('__viz_binned__')}`,
    `GROUP BY ${[idx, lo, width, ...groupAliases].join(', ')}`,
  ].join('\n');

  return {
    sql,
    columns: ['x', 'xmin', 'xmax', ...ctx.groups.map(g => g.alias), 'y'],
    outputs: { x: 'x', xmin: 'xmin', xmax: 'xmax', y: 'y', ...groupOutputs(ctx.groups) },
    titles: { x: x, y: 'count', ...groupTitles(ctx.groups) },
  };
}

const QUARTILES: [string, number][] = [
  ['lower', 0.25],
  ['middle', 0.5],
  ['upper', 0.75],
];

/**
 * Five-number summary per group. Quartiles are computed as window
 * functions over the group, then picked out with MIN() since every row of
 * a group carries the same value.
 */
export function boxplotFragment(x: string, y: string, ctx: FragmentContext): StatFragment {
  const q = (name: string) => quoteIdentifier(name, ctx.dialect);
  const value = q('__viz_value__');
  const aliases = [q('x'), ...ctx.groups.map(g => q(g.alias))];
  const partition = [q(x), ...ctx.groups.map(g => q(g.source))];

  const innerSelect = [`${q(x)} AS ${q('x')}`, ...ctx.groups.map(g => `${q(g.source)} AS ${q(g.alias)}`), `${q(y)} AS ${value}`];
  const outerSelect = [...aliases, `MIN(${value}) AS ${q('ymin')}`];

  if (ctx.dialect === 'sqlite') {
    // Nearest rank: the first row whose rank reaches q * n
    const rn = q('__viz_rn__');
    const n = q('__viz_n__');
    innerSelect.push(
      `ROW_NUMBER() OVER (PARTITION BY ${partition.join(', ')} ORDER BY ${q(y)}) AS ${rn}`,
      `COUNT(*) OVER (PARTITION BY ${partition.join(', ')}) AS ${n}`
    );
    for (const [name, quantile] of QUARTILES) {
      outerSelect.push(`MIN(CASE WHEN ${rn} >= ${quantile} * ${n} THEN ${value} END) AS ${q(name)}`);
    }
  } else {
    for (const [name, quantile] of QUARTILES) {
      const column = q(`__viz_${name}__`);
      innerSelect.push(`${quantileWindowFunction(q(y), quantile, partition, ctx.dialect)} AS ${column}`);
      outerSelect.push(`MIN(${column}) AS ${q(name)}`);
    }
  }
  outerSelect.push(`MAX(${value}) AS ${q('ymax')}`);

  const inner = ['SELECT', indent(innerSelect.join(',\n')), `FROM ${q(BASE_DATASET)}`, whereClause([`${q(y)} IS NOT NULL`, ctx.filter])].join(
    '\n'
  );

  const sql = [
    'SELECT',
    indent(outerSelect.join(',\n')),
    'FROM (',
    indent(inner),
    `) AS ${q('__viz_ranked__')}`,
    `GROUP BY ${aliases.join(', ')}`,
  ].join('\n');

  return {
    sql,
    columns: ['x', ...ctx.groups.map(g => g.alias), 'ymin', 'lower', 'middle', 'upper', 'ymax'],
    outputs: {
      x: 'x',
      ymin: 'ymin',
      lower: 'lower',
      middle: 'middle',
      upper: 'upper',
      ymax: 'ymax',
      ...groupOutputs(ctx.groups),
    },
    titles: { x: x, y: y, ...groupTitles(ctx.groups) },
  };
}

// ---
// PLANNING
// ---

/** Input columns of a SQL stat, by aesthetic. Every input must be a column. */
function statInputs(index: number, layer: LayerSpec, declared: ReadonlyMap<string, AestheticValue>): Record<string, string> {
  const missing = missingAesthetics(layer, declared);
  if (missing.length > 0) throw missingAestheticError(index, layer, missing);

  const inputs: Record<string, string> = {};
  for (const aesthetic of GEOM_INFO[layer.geom].required) {
    const value = declared.get(aesthetic);
    if (value?.type !== 'column') {
      throw new ResolutionError(
        `Layer ${index + 1} (${layer.geom}) needs a column for '${aesthetic}' to compute its ${GEOM_INFO[layer.geom].defaultStat} stat`,
        index,
        layer.geom,
        [aesthetic]
      );
    }
    inputs[aesthetic] = value.name;
  }
  return inputs;
}

/** Column inputs a deferred stat's transform reads, when they are known up front. */
function transformInputs(declared: ReadonlyMap<string, AestheticValue>): Record<string, string> {
  const inputs: Record<string, string> = {};
  for (const [aesthetic, value] of declared) {
    if (value.type === 'column') inputs[aesthetic] = value.name;
  }
  return inputs;
}

/**
 * Plan the stats of every layer and build the statement to execute.
 */
export function planStats(spec: UnresolvedSpec, baseQuery: string, options: StatOptions = {}): StatPlan {
  const dialect = options.dialect ?? 'duckdb';
  const facetColumns = facetVariables(spec.facet);

  const datasets: DatasetDefinition[] = [];
  const byKey = new Map<string, DatasetDefinition>();

  const register = (key: string, create: () => DatasetDefinition): DatasetDefinition => {
    const existing = byKey.get(key);
    if (existing) return existing;
    const definition = create();
    byKey.set(key, definition);
    datasets.push(definition);
    return definition;
  };

  const rawDataset = (index: number, filter: string | null): DatasetDefinition =>
    filter === null
      ? register('base', () => ({ name: BASE_DATASET, kind: 'base', sql: null, columns: [] }))
      : register(`filter:${filter}`, () => ({ name: layerDatasetName(index), kind: 'filtered', sql: filter, columns: [] }));

  const layers = spec.layers.map((layer, index): LayerStatPlan => {
    const declared = declaredMapping(spec, layer);
    const stat = effectiveStat(layer, declared);

    if (stat === 'identity' || isDeferredStat(stat)) {
      return {
        layerIndex: index,
        stat,
        deferred: isDeferredStat(stat),
        dataset: rawDataset(index, layer.filter).name,
        inputs: transformInputs(declared),
        outputs: {},
        titles: {},
      };
    }

    const inputs = statInputs(index, layer, declared);
    const ctx: FragmentContext = {
      dialect,
      filter: layer.filter,
      groups: groupColumns(declared, [...facetColumns, ...layer.partitionBy], STAT_OUTPUT_COLUMNS),
      bins: typeof layer.settings.bins === 'number' ? layer.settings.bins : options.bins ?? DEFAULT_BINS,
    };

    let fragment: StatFragment;
    switch (stat) {
      case 'count':
        fragment = countFragment(inputs.x, ctx);
        break;
      case 'bin':
        fragment = binFragment(inputs.x, ctx);
        break;
      case 'boxplot':
        fragment = boxplotFragment(inputs.x, inputs.y, ctx);
        break;
    }

    const definition = register(`stat:${fragment.sql}`, () => ({
      name: layerDatasetName(index),
      kind: 'stat',
      sql: fragment.sql,
      columns: fragment.columns,
    }));

    return {
      layerIndex: index,
      stat,
      deferred: false,
      dataset: definition.name,
      inputs,
      outputs: fragment.outputs,
      titles: fragment.titles,
    };
  });

  const rewritten = datasets.some(d => d.kind !== 'base');
  const sql = rewritten ? combineDatasets(baseQuery, datasets, dialect) : baseQuery;

  if (DEBUG) {
    console.log(`[stat-resolver] ${datasets.length} dataset(s), rewritten=${rewritten}`);
    console.log(sql);
  }

  return {
    dialect,
    baseQuery,
    sql,
    rewritten,
    datasets,
    layers,
    mapping: layers.map(l => ({ layerIndex: l.layerIndex, dataset: l.dataset })),
  };
}

/**
 * One statement producing every dataset: the base query and each stat
 * fragment become CTEs, and a UNION ALL tags each row with its dataset in
 * the `__viz_source__` column. Base-shaped rows fill the base columns;
 * stat rows fill their own prefixed columns.
 */
export function combineDatasets(baseQuery: string, datasets: DatasetDefinition[], dialect: SqlDialect): string {
  const q = (name: string) => quoteIdentifier(name, dialect);
  const statDatasets = datasets.filter(d => d.kind === 'stat');

  const ctes = [
    `${q(BASE_DATASET)} AS (\n${indent(baseQuery)}\n)`,
    ...statDatasets.map(d => `${q(d.name)} AS (\n${indent(d.sql ?? '')}\n)`),
  ];

  const statColumns = (own: DatasetDefinition | null) =>
    statDatasets.flatMap(d => d.columns.map(c => `${own === d ? `s.${q(c)}` : 'NULL'} AS ${q(d.name + c)}`));

  const selects = datasets.map(d => {
    const columns = [`${quoteString(d.name)} AS ${q(SOURCE_COLUMN)}`, 'b.*', ...statColumns(d.kind === 'stat' ? d : null)];
    const head = `SELECT ${columns.join(', ')}`;

    if (d.kind === 'stat') {
      return `${head}\nFROM ${q(d.name)} AS s\nLEFT JOIN (SELECT * FROM ${q(BASE_DATASET)} WHERE 1 = 0) AS b ON 1 = 0`;
    }
    const from = `${head}\nFROM ${q(BASE_DATASET)} AS b`;
    return d.kind === 'filtered' ? `${from}\nWHERE ${d.sql}` : from;
  });

  return `WITH ${ctes.join(',\n')}\n${selects.join('\nUNION ALL\n')}`;
}

// ---
// RESULT CHECKS
// ---

/**
 * Checks that need the executed data. A histogram whose buckets came back
 * without a centre had fewer than two distinct input values.
 */
export function validateStatDatasets(plan: StatPlan, datasets: Datasets): void {
  for (const layer of plan.layers) {
    if (layer.stat !== 'bin') continue;
    const rows = datasets.get(layer.dataset)?.rows ?? [];
    if (rows.some(row => row.x === null || row.x === undefined)) {
      throw new RewriteError(
        `Layer ${layer.layerIndex + 1} cannot bin '${layer.inputs.x}': it needs at least two distinct values`,
        layer.layerIndex
      );
    }
  }
}
