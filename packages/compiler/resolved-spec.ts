/**
 * Resolved specification and stat plan types.
 *
 * A `ResolvedSpec` only exists once the query has run: every layer carries
 * a concrete aesthetic table and the name of the dataset it reads.
 */

import type {
  AestheticValue,
  FacetSpec,
  Geom,
  GuideSpec,
  LabelsSpec,
  Parameters,
  ProjectSpec,
  ScaleSpec,
  SourceReference,
  Stat,
  ThemeSpec,
} from '../parser/ast.js';
import type { SqlDialect } from './sql-utils.js';

/** Dataset holding the rows of the untouched base query */
export const BASE_DATASET = '__viz_base__';

/** Column of the combined result naming the dataset a row belongs to */
export const SOURCE_COLUMN = '__viz_source__';

export function layerDatasetName(layerIndex: number): string {
  return `__viz_layer_${layerIndex}__`;
}

// ---
// STAT PLAN
// ---

export interface DatasetMapping {
  layerIndex: number;
  dataset: string;
}

export interface DatasetDefinition {
  name: string;
  /**
   * base: the base query's rows
   * filtered: base rows matching a layer FILTER
   * stat: rows computed by a stat fragment
   */
  kind: 'base' | 'filtered' | 'stat';
  /** FILTER predicate for `filtered`, CTE body for `stat` */
  sql: string | null;
  /** Output columns of a `stat` dataset */
  columns: string[];
}

export interface LayerStatPlan {
  layerIndex: number;
  stat: Stat;
  /** Computed by an output-side transform instead of SQL */
  deferred: boolean;
  dataset: string;
  /** Input columns the stat reads, by aesthetic */
  inputs: Record<string, string>;
  /** Aesthetic → column of the stat dataset (SQL stats only) */
  outputs: Record<string, string>;
  /** Default channel titles for stat output */
  titles: Record<string, string>;
}

export interface StatPlan {
  dialect: SqlDialect;
  baseQuery: string;
  /** Statement to execute; the base query itself when `rewritten` is false */
  sql: string;
  rewritten: boolean;
  datasets: DatasetDefinition[];
  layers: LayerStatPlan[];
  mapping: DatasetMapping[];
}

// ---
// RESOLVED SPEC
// ---

export type AestheticTable = ReadonlyMap<string, AestheticValue>;

export interface ResolvedLayer {
  index: number;
  geom: Geom;
  name: string | null;
  stat: Stat;
  deferred: boolean;
  dataset: string;
  aesthetics: AestheticTable;
  /** Columns the stat read, by aesthetic; used for transform fields and titles */
  inputs: Record<string, string>;
  titles: Record<string, string>;
  settings: Parameters;
  partitionBy: string[];
}

export interface ResolvedSpec {
  source: SourceReference | null;
  layers: ResolvedLayer[];
  scales: ScaleSpec[];
  facet: FacetSpec | null;
  labels: LabelsSpec | null;
  theme: ThemeSpec | null;
  guides: GuideSpec[];
  project: ProjectSpec | null;
  datasets: DatasetMapping[];
}

// ---
// DEBUG PRINTING
// ---

function formatAestheticValue(value: AestheticValue): string {
  return value.type === 'column' ? value.name : JSON.stringify(value.value);
}

export function printAestheticTable(table: AestheticTable): string {
  return [...table].map(([aesthetic, value]) => `${aesthetic}=${formatAestheticValue(value)}`).join(', ');
}

export function printVizSpec(spec: ResolvedSpec): string {
  const lines: string[] = ['ResolvedSpec:'];
  for (const layer of spec.layers) {
    lines.push(`  Layer ${layer.index}: ${layer.geom}${layer.name ? ` (${layer.name})` : ''}`);
    lines.push(`    stat: ${layer.stat}${layer.deferred ? ' (transform)' : ''}`);
    lines.push(`    dataset: ${layer.dataset}`);
    lines.push(`    aesthetics: {${printAestheticTable(layer.aesthetics)}}`);
  }
  if (spec.facet) {
    const layout = spec.facet.layout;
    lines.push(
      `  Facet: ${layout.type === 'wrap' ? `wrap(${layout.variables.join(', ')})` : `${layout.rows.join(', ')} by ${layout.cols.join(', ')}`}`
    );
  }
  if (spec.project) {
    lines.push(`  Project: ${spec.project.coord}`);
  }
  if (spec.scales.length > 0) {
    lines.push(`  Scales: ${spec.scales.map(s => `${s.aesthetic}:${s.scaleType ?? 'default'}`).join(', ')}`);
  }
  return lines.join('\n');
}

export function printStatPlan(plan: StatPlan): string {
  const lines: string[] = ['StatPlan:'];
  lines.push(`  dialect: ${plan.dialect}`);
  lines.push(`  rewritten: ${plan.rewritten}`);
  lines.push(`  datasets: ${plan.datasets.length}`);
  lines.push('');

  for (const dataset of plan.datasets) {
    lines.push(`  Dataset ${dataset.name}: ${dataset.kind}`);
    if (dataset.kind === 'stat') lines.push(`    columns: [${dataset.columns.join(', ')}]`);
    if (dataset.kind === 'filtered') lines.push(`    filter: ${dataset.sql}`);
  }
  lines.push('');

  for (const layer of plan.layers) {
    lines.push(`  Layer ${layer.layerIndex}: ${layer.stat}${layer.deferred ? ' (transform)' : ''} → ${layer.dataset}`);
  }
  lines.push('');
  lines.push(plan.sql);
  return lines.join('\n');
}
