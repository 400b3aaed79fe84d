/**
 * VISUALISE clause AST types.
 *
 * A parsed clause is an unresolved specification: global mappings may still
 * hold implicit or wildcard forms whose meaning depends on the schema of the
 * executed query. Nothing here exposes a resolved aesthetic table; that only
 * exists on `ResolvedSpec` in the compiler.
 */

// ---
// GEOMS AND STATS
// ---

export const GEOMS = [
  'point',
  'line',
  'path',
  'bar',
  'col',
  'area',
  'ribbon',
  'tile',
  'histogram',
  'density',
  'violin',
  'boxplot',
  'smooth',
  'text',
  'label',
  'segment',
  'arrow',
  'polygon',
  'errorbar',
] as const;

export type Geom = (typeof GEOMS)[number];

export function isGeom(name: string): name is Geom {
  return (GEOMS as readonly string[]).includes(name);
}

export type Stat = 'identity' | 'count' | 'bin' | 'boxplot' | 'density' | 'smooth';

// ---
// AESTHETICS
// ---

export const AESTHETICS = [
  'x',
  'y',
  'xmin',
  'xmax',
  'ymin',
  'ymax',
  'xend',
  'yend',
  'lower',
  'middle',
  'upper',
  'color',
  'colour',
  'fill',
  'stroke',
  'size',
  'shape',
  'opacity',
  'alpha',
  'linetype',
  'linewidth',
  'label',
  'group',
  'tooltip',
] as const;

export type Aesthetic = (typeof AESTHETICS)[number];

export function isAesthetic(name: string): name is Aesthetic {
  return (AESTHETICS as readonly string[]).includes(name);
}

export type LiteralValue = string | number | boolean;

export interface ColumnValue {
  type: 'column';
  name: string;
}

export interface LiteralAestheticValue {
  type: 'literal';
  value: LiteralValue;
}

/** Right-hand side of a mapping: a column of the data, or a constant. */
export type AestheticValue = ColumnValue | LiteralAestheticValue;

export function column(name: string): ColumnValue {
  return { type: 'column', name };
}

export function literal(value: LiteralValue): LiteralAestheticValue {
  return { type: 'literal', value };
}

/** Values accepted on the right of `name => value`. */
export type ParameterValue = LiteralValue | null | ParameterValue[];

export type Parameters = Record<string, ParameterValue>;

// ---
// GLOBAL MAPPING
// ---

export interface ExplicitMapping {
  type: 'explicit';
  value: AestheticValue;
  aesthetic: string;
}

export interface ImplicitMapping {
  type: 'implicit';
  name: string;
}

export type GlobalMappingItem = ExplicitMapping | ImplicitMapping;

export type GlobalMapping =
  | { type: 'empty' }
  | { type: 'wildcard' }
  | { type: 'mappings'; items: GlobalMappingItem[] };

// ---
// LAYERS
// ---

export interface AestheticBinding {
  aesthetic: string;
  value: AestheticValue;
}

export interface LayerSpec {
  geom: Geom;
  name: string | null;
  /** Declared in the layer's own MAPPING, in source order; later entries win */
  mappings: AestheticBinding[];
  settings: Parameters;
  /** Raw SQL predicate from FILTER */
  filter: string | null;
  partitionBy: string[];
}

// ---
// SCALES, FACETS, LABELS, THEME, GUIDES, PROJECTION
// ---

export const SCALE_TYPES = [
  'linear',
  'log10',
  'log',
  'log2',
  'sqrt',
  'reverse',
  'ordinal',
  'categorical',
  'date',
  'datetime',
  'time',
  'viridis',
  'plasma',
  'magma',
  'inferno',
  'cividis',
  'diverging',
  'sequential',
  'binned',
] as const;

export type ScaleType = (typeof SCALE_TYPES)[number];

export function isScaleType(name: string): name is ScaleType {
  return (SCALE_TYPES as readonly string[]).includes(name);
}

export interface ScaleSpec {
  aesthetic: string;
  scaleType: ScaleType | null;
  /** Everything from SETTING except `type` */
  properties: Parameters;
}

export type FacetLayout =
  | { type: 'wrap'; variables: string[] }
  | { type: 'grid'; rows: string[]; cols: string[] };

export interface FacetSpec {
  layout: FacetLayout;
  properties: Parameters;
}

/** LABEL keys are aesthetics or `title`, `subtitle`, `caption`; null suppresses a title. */
export type LabelsSpec = Record<string, string | null>;

export const THEME_NAMES = ['default', 'minimal', 'classic', 'dark', 'gray', 'grey', 'void'] as const;

export type ThemeName = (typeof THEME_NAMES)[number];

export interface ThemeSpec {
  name: ThemeName | null;
  properties: Parameters;
}

export type GuideType = 'legend' | 'colorbar' | 'axis' | 'none';

export const COORD_SYSTEMS = ['cartesian', 'polar'] as const;

export type CoordSystem = (typeof COORD_SYSTEMS)[number];

export interface ProjectSpec {
  coord: CoordSystem;
  properties: Parameters;
}

export interface GuideSpec {
  aesthetic: string;
  guideType: GuideType | null;
  properties: Parameters;
}

// ---
// SPECIFICATION
// ---

export type SourceReference = { type: 'table'; name: string } | { type: 'file'; path: string };

export interface VisualizationSpec {
  type: 'visualise';
  source: SourceReference | null;
  global: GlobalMapping;
  layers: LayerSpec[];
  scales: ScaleSpec[];
  facet: FacetSpec | null;
  labels: LabelsSpec | null;
  theme: ThemeSpec | null;
  guides: GuideSpec[];
  project: ProjectSpec | null;
}

/** A parsed clause before any schema is known. */
export type UnresolvedSpec = VisualizationSpec;

/** Position of a clause inside the query it came from. */
export interface ClauseLocation {
  offset: number;
  line: number;
  column: number;
}

export interface ParsedClause {
  text: string;
  location: ClauseLocation;
  spec: VisualizationSpec;
}

export interface ParsedQuery {
  /** Everything before the first VISUALISE keyword, untouched */
  relational: string;
  /** Non-empty relational statements; all but the last are setup statements */
  statements: string[];
  clauses: ParsedClause[];
}

/** Columns the facet splits on, rows before columns. */
export function facetVariables(facet: FacetSpec | null): string[] {
  if (!facet) return [];
  return facet.layout.type === 'wrap' ? [...facet.layout.variables] : [...facet.layout.rows, ...facet.layout.cols];
}
