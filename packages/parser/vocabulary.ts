/**
 * Grammar vocabulary: what each geom needs and accepts, and which
 * properties SCALE, FACET, THEME, GUIDE and PROJECT understand.
 *
 * Keyed by `Geom` so adding a geom without describing it fails to compile.
 */

import type { Aesthetic, CoordSystem, Geom, ParameterValue, Stat } from './ast.js';

// ---
// PARAMETER RULES
// ---

export type ParameterRule =
  | { kind: 'number'; min?: number; max?: number; integer?: boolean; exclusiveMin?: boolean }
  | { kind: 'string'; oneOf?: readonly string[] }
  | { kind: 'boolean' }
  | { kind: 'array'; length?: number }
  | { kind: 'stringOrArray' }
  | { kind: 'scalar' };

/**
 * Check a value against a rule. Returns a description of what was
 * expected, or null when the value is acceptable.
 */
export function checkParameter(rule: ParameterRule, value: ParameterValue): string | null {
  switch (rule.kind) {
    case 'number': {
      if (typeof value !== 'number') return 'a number';
      if (rule.integer && !Number.isInteger(value)) return 'an integer';
      if (rule.min !== undefined && rule.exclusiveMin && value <= rule.min) return `a number > ${rule.min}`;
      if (rule.min !== undefined && value < rule.min) return `a number >= ${rule.min}`;
      if (rule.max !== undefined && value > rule.max) return `a number <= ${rule.max}`;
      return null;
    }
    case 'string':
      if (typeof value !== 'string') return 'a string';
      if (rule.oneOf && !rule.oneOf.includes(value)) return `one of ${rule.oneOf.map(v => `'${v}'`).join(', ')}`;
      return null;
    case 'boolean':
      return typeof value === 'boolean' ? null : 'true or false';
    case 'array':
      if (!Array.isArray(value)) return 'an array';
      if (rule.length !== undefined && value.length !== rule.length) return `an array of ${rule.length} values`;
      return null;
    case 'stringOrArray':
      return typeof value === 'string' || Array.isArray(value) ? null : 'a string or an array';
    case 'scalar':
      return value === null || Array.isArray(value) ? 'a string, number or boolean' : null;
  }
}

// ---
// GEOMS
// ---

export interface GeomInfo {
  required: readonly Aesthetic[];
  supported: readonly Aesthetic[];
  defaultStat: Stat;
  /** Aesthetics the default stat produces; a layer that maps one of them opts out of the stat */
  computed: readonly Aesthetic[];
  params: Readonly<Record<string, ParameterRule>>;
}

const COMMON: readonly Aesthetic[] = ['color', 'colour', 'fill', 'stroke', 'opacity', 'alpha', 'group', 'tooltip'];

const BANDWIDTH: ParameterRule = { kind: 'number', min: 0 };

const BAR_WIDTH: ParameterRule = { kind: 'number', min: 0, exclusiveMin: true, max: 1 };

export const GEOM_INFO: Readonly<Record<Geom, GeomInfo>> = {
  point: {
    required: ['x', 'y'],
    supported: ['x', 'y', 'size', 'shape', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  line: {
    required: ['x', 'y'],
    supported: ['x', 'y', 'linetype', 'linewidth', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  path: {
    required: ['x', 'y'],
    supported: ['x', 'y', 'linetype', 'linewidth', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  bar: {
    required: ['x'],
    supported: ['x', 'y', ...COMMON],
    defaultStat: 'count',
    computed: ['y'],
    params: { width: BAR_WIDTH },
  },
  col: {
    required: ['x'],
    supported: ['x', 'y', ...COMMON],
    defaultStat: 'count',
    computed: ['y'],
    params: { width: BAR_WIDTH },
  },
  area: {
    required: ['x', 'y'],
    supported: ['x', 'y', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  ribbon: {
    required: ['x', 'ymin', 'ymax'],
    supported: ['x', 'ymin', 'ymax', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  tile: {
    required: ['x', 'y'],
    supported: ['x', 'y', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  histogram: {
    required: ['x'],
    supported: ['x', 'y', 'xmin', 'xmax', ...COMMON],
    defaultStat: 'bin',
    computed: ['y'],
    params: { bins: { kind: 'number', min: 1, integer: true } },
  },
  density: {
    required: ['x'],
    supported: ['x', 'y', ...COMMON],
    defaultStat: 'density',
    computed: ['y'],
    params: { bandwidth: BANDWIDTH },
  },
  violin: {
    required: ['x', 'y'],
    supported: ['x', 'y', ...COMMON],
    defaultStat: 'density',
    computed: [],
    params: { bandwidth: BANDWIDTH },
  },
  boxplot: {
    required: ['x', 'y'],
    supported: ['x', 'y', 'ymin', 'lower', 'middle', 'upper', 'ymax', ...COMMON],
    defaultStat: 'boxplot',
    computed: ['lower', 'middle', 'upper'],
    params: {},
  },
  smooth: {
    required: ['x', 'y'],
    supported: ['x', 'y', 'linetype', 'linewidth', ...COMMON],
    defaultStat: 'smooth',
    computed: [],
    params: {
      method: { kind: 'string', oneOf: ['loess', 'lm'] },
      bandwidth: BANDWIDTH,
    },
  },
  text: {
    required: ['x', 'y', 'label'],
    supported: ['x', 'y', 'label', 'size', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  label: {
    required: ['x', 'y', 'label'],
    supported: ['x', 'y', 'label', 'size', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  segment: {
    required: ['x', 'y', 'xend', 'yend'],
    supported: ['x', 'y', 'xend', 'yend', 'linetype', 'linewidth', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  arrow: {
    required: ['x', 'y', 'xend', 'yend'],
    supported: ['x', 'y', 'xend', 'yend', 'linetype', 'linewidth', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  polygon: {
    required: ['x', 'y'],
    supported: ['x', 'y', 'linetype', 'linewidth', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
  errorbar: {
    required: ['x', 'ymin', 'ymax'],
    supported: ['x', 'ymin', 'ymax', 'linewidth', ...COMMON],
    defaultStat: 'identity',
    computed: [],
    params: {},
  },
};

/** Aesthetics that split a stat into groups when bound to a column. */
export const GROUPING_AESTHETICS: readonly Aesthetic[] = ['color', 'colour', 'fill', 'stroke', 'shape', 'linetype', 'group'];

/** Rule for `SETTING name => value` on a layer, or null if the geom does not accept `name`. */
export function layerSettingRule(geom: Geom, name: string): ParameterRule | null {
  const info = GEOM_INFO[geom];
  if (Object.hasOwn(info.params, name)) return info.params[name];
  if ((info.supported as readonly string[]).includes(name)) return { kind: 'scalar' };
  return null;
}

// ---
// CLAUSE PROPERTIES
// ---

export const SCALE_PROPERTIES: Readonly<Record<string, ParameterRule>> = {
  limits: { kind: 'array', length: 2 },
  breaks: { kind: 'array' },
  palette: { kind: 'stringOrArray' },
  zero: { kind: 'boolean' },
  nice: { kind: 'boolean' },
  clamp: { kind: 'boolean' },
  padding: { kind: 'number', min: 0 },
};

export const FACET_PROPERTIES: Readonly<Record<string, ParameterRule>> = {
  scales: { kind: 'string', oneOf: ['fixed', 'free', 'free_x', 'free_y'] },
  columns: { kind: 'number', min: 1, integer: true },
  spacing: { kind: 'number', min: 0 },
};

export const THEME_PROPERTIES: Readonly<Record<string, ParameterRule>> = {
  background: { kind: 'string' },
  font: { kind: 'string' },
  font_size: { kind: 'number', min: 0 },
  title_size: { kind: 'number', min: 0 },
  grid: { kind: 'boolean' },
  width: { kind: 'number', min: 0 },
  height: { kind: 'number', min: 0 },
  legend_position: { kind: 'string', oneOf: ['left', 'right', 'top', 'bottom', 'none'] },
};

export const GUIDE_TYPES = ['legend', 'colorbar', 'axis', 'none'] as const;

export const GUIDE_PROPERTIES: Readonly<Record<string, ParameterRule>> = {
  title: { kind: 'string' },
  position: { kind: 'string', oneOf: ['left', 'right', 'top', 'bottom'] },
  direction: { kind: 'string', oneOf: ['horizontal', 'vertical'] },
  columns: { kind: 'number', min: 1, integer: true },
  text_angle: { kind: 'number' },
  text_size: { kind: 'number', min: 0 },
  format: { kind: 'string' },
};

const CLIP: ParameterRule = { kind: 'boolean' };

export const PROJECT_PROPERTIES: Readonly<Record<CoordSystem, Readonly<Record<string, ParameterRule>>>> = {
  cartesian: {
    ratio: { kind: 'number', min: 0, exclusiveMin: true },
    clip: CLIP,
  },
  polar: {
    theta: { kind: 'string', oneOf: ['x', 'y'] },
    start: { kind: 'number' },
    clip: CLIP,
  },
};

export const LABEL_KEYS = ['title', 'subtitle', 'caption'] as const;
