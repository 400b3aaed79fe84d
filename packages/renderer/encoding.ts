/**
 * Encoding helpers: geom → mark, aesthetic → channel, field types, and the
 * scale, guide and label decorations applied to each channel.
 */

import type { ColumnInfo } from '../compiler/datasets.js';
import type { Geom, GuideSpec, LabelsSpec, ParameterValue, ScaleSpec, ScaleType } from '../parser/ast.js';
import { GEOM_INFO } from '../parser/vocabulary.js';
import type { FieldDef, FieldType, JsonObject, JsonValue, MarkType } from './vegalite-types.js';

// ---
// MARKS
// ---

export const GEOM_MARKS: Readonly<Record<Geom, MarkType>> = {
  point: 'point',
  line: 'line',
  path: 'line',
  bar: 'bar',
  col: 'bar',
  area: 'area',
  ribbon: 'area',
  tile: 'rect',
  histogram: 'bar',
  density: 'area',
  violin: 'area',
  boxplot: 'bar',
  smooth: 'line',
  text: 'text',
  label: 'text',
  segment: 'rule',
  arrow: 'rule',
  polygon: 'line',
  errorbar: 'rule',
};

function isKnownGeom(geom: string): geom is Geom {
  return Object.hasOwn(GEOM_MARKS, geom);
}

/** Mark for a geom; anything unrecognized still renders, as points. */
export function markForGeom(geom: string): MarkType {
  return isKnownGeom(geom) ? GEOM_MARKS[geom] : 'point';
}

// ---
// CHANNELS
// ---

const AESTHETIC_CHANNELS: Readonly<Record<string, string>> = {
  x: 'x',
  y: 'y',
  color: 'color',
  colour: 'color',
  fill: 'fill',
  stroke: 'stroke',
  size: 'size',
  shape: 'shape',
  opacity: 'opacity',
  alpha: 'opacity',
  linetype: 'strokeDash',
  linewidth: 'strokeWidth',
  label: 'text',
  group: 'detail',
  tooltip: 'tooltip',
};

/** Range aesthetics only some geoms can draw, and the channels they draw on */
const GEOM_CHANNEL_OVERRIDES: Partial<Record<Geom, Readonly<Record<string, string>>>> = {
  histogram: { xmin: 'x', xmax: 'x2' },
  ribbon: { ymin: 'y', ymax: 'y2' },
  errorbar: { ymin: 'y', ymax: 'y2' },
  segment: { xend: 'x2', yend: 'y2' },
  arrow: { xend: 'x2', yend: 'y2' },
};

const SECONDARY_CHANNELS = new Set(['x2', 'y2']);
const POSITION_CHANNELS = new Set(['x', 'y', 'x2', 'y2']);

export function isSecondaryChannel(channel: string): boolean {
  return SECONDARY_CHANNELS.has(channel);
}

export function isPositionChannel(channel: string): boolean {
  return POSITION_CHANNELS.has(channel);
}

/**
 * Decide the channel of every aesthetic a layer binds. Geom-specific range
 * aesthetics claim their channel first, so a histogram's bucket edges win
 * over its bucket centre. Aesthetics the geom does not support, or whose
 * channel is already taken, are left out.
 */
export function assignChannels(geom: Geom, aesthetics: Iterable<string>): Map<string, string> {
  const overrides = GEOM_CHANNEL_OVERRIDES[geom] ?? {};
  const supported: readonly string[] = GEOM_INFO[geom].supported;
  const names = [...aesthetics];

  const assigned = new Map<string, string>();
  const taken = new Set<string>();

  for (const aesthetic of names) {
    const channel = overrides[aesthetic];
    if (channel && supported.includes(aesthetic) && !taken.has(channel)) {
      assigned.set(aesthetic, channel);
      taken.add(channel);
    }
  }
  for (const aesthetic of names) {
    if (assigned.has(aesthetic) || Object.hasOwn(overrides, aesthetic) || !supported.includes(aesthetic)) continue;
    const channel = AESTHETIC_CHANNELS[aesthetic];
    if (channel && !taken.has(channel)) {
      assigned.set(aesthetic, channel);
      taken.add(channel);
    }
  }
  return assigned;
}

/** The aesthetic whose scale and title a range aesthetic shares. */
export function primaryAesthetic(aesthetic: string): string {
  switch (aesthetic) {
    case 'xmin':
    case 'xmax':
    case 'xend':
      return 'x';
    case 'ymin':
    case 'ymax':
    case 'yend':
    case 'lower':
    case 'middle':
    case 'upper':
      return 'y';
    case 'colour':
      return 'color';
    case 'alpha':
      return 'opacity';
    default:
      return aesthetic;
  }
}

// ---
// FIELD TYPES
// ---

function fieldTypeFromScale(scaleType: ScaleType): FieldType | null {
  switch (scaleType) {
    case 'linear':
    case 'log10':
    case 'log':
    case 'log2':
    case 'sqrt':
    case 'reverse':
    case 'binned':
      return 'quantitative';
    case 'ordinal':
    case 'categorical':
      return 'nominal';
    case 'date':
    case 'datetime':
    case 'time':
      return 'temporal';
    default:
      // Palettes say nothing about the data
      return null;
  }
}

export function fieldTypeFromStorage(column: ColumnInfo | undefined): FieldType {
  switch (column?.type) {
    case 'numeric':
      return 'quantitative';
    case 'date':
    case 'timestamp':
      return 'temporal';
    default:
      return 'nominal';
  }
}

/**
 * Field type of a channel: an explicit scale type wins, otherwise the
 * column's storage type decides.
 */
export function fieldType(column: ColumnInfo | undefined, scale: ScaleSpec | undefined): FieldType {
  const fromScale = scale?.scaleType ? fieldTypeFromScale(scale.scaleType) : null;
  return fromScale ?? fieldTypeFromStorage(column);
}

// ---
// SCALES
// ---

const PALETTE_SCHEMES: Partial<Record<ScaleType, string>> = {
  viridis: 'viridis',
  plasma: 'plasma',
  magma: 'magma',
  inferno: 'inferno',
  cividis: 'cividis',
  diverging: 'redblue',
  sequential: 'blues',
};

function toJson(value: ParameterValue): JsonValue {
  return Array.isArray(value) ? value.map(toJson) : value;
}

/** Vega-Lite `scale` for a SCALE declaration, or null when it sets nothing. */
export function scaleDefinition(scale: ScaleSpec): JsonObject | null {
  const def: JsonObject = {};

  switch (scale.scaleType) {
    case 'linear':
      def.type = 'linear';
      break;
    case 'log10':
      def.type = 'log';
      def.base = 10;
      break;
    case 'log':
      def.type = 'log';
      def.base = Math.E;
      break;
    case 'log2':
      def.type = 'log';
      def.base = 2;
      break;
    case 'sqrt':
      def.type = 'sqrt';
      break;
    case 'reverse':
      def.reverse = true;
      break;
    default: {
      const scheme = scale.scaleType ? PALETTE_SCHEMES[scale.scaleType] : undefined;
      if (scheme) def.scheme = scheme;
    }
  }

  for (const [name, value] of Object.entries(scale.properties)) {
    switch (name) {
      case 'limits':
        def.domain = toJson(value);
        break;
      case 'palette':
        if (Array.isArray(value)) def.range = toJson(value);
        else def.scheme = toJson(value);
        break;
      case 'zero':
      case 'nice':
      case 'clamp':
      case 'padding':
        def[name] = toJson(value);
        break;
      // breaks go on the axis or legend
    }
  }

  return Object.keys(def).length > 0 ? def : null;
}

/**
 * Apply a SCALE declaration to one channel definition. A binned scale marks
 * a position field as pre-binned; elsewhere its breaks become thresholds.
 */
export function applyScale(def: FieldDef, channel: string, scale: ScaleSpec): void {
  const scaleDef = scaleDefinition(scale);
  if (scaleDef && !isSecondaryChannel(channel)) def.scale = scaleDef;

  const breaks = scale.properties.breaks;
  if (scale.scaleType === 'binned' && !isSecondaryChannel(channel)) {
    if (isPositionChannel(channel)) def.bin = 'binned';
    else if (Array.isArray(breaks)) def.scale = { ...(def.scale ?? {}), type: 'threshold', domain: toJson(breaks) };
  }

  if (Array.isArray(breaks) && !isSecondaryChannel(channel)) {
    const guide = isPositionChannel(channel) ? 'axis' : 'legend';
    def[guide] = { ...(def[guide] ?? {}), values: toJson(breaks) };
  }
}

// ---
// GUIDES
// ---

const AXIS_PROPERTIES: Readonly<Record<string, string>> = {
  title: 'title',
  position: 'orient',
  text_angle: 'labelAngle',
  text_size: 'labelFontSize',
  format: 'format',
};

const LEGEND_PROPERTIES: Readonly<Record<string, string>> = {
  title: 'title',
  position: 'orient',
  direction: 'direction',
  columns: 'columns',
  text_size: 'labelFontSize',
  format: 'format',
};

function guideObject(properties: Record<string, ParameterValue>, names: Readonly<Record<string, string>>): JsonObject {
  const object: JsonObject = {};
  for (const [name, value] of Object.entries(properties)) {
    const target = names[name];
    if (target) object[target] = toJson(value);
  }
  return object;
}

/** Apply a GUIDE declaration to one channel definition. */
export function applyGuide(def: FieldDef, channel: string, guide: GuideSpec): void {
  if (isSecondaryChannel(channel)) return;
  const position = isPositionChannel(channel);

  switch (guide.guideType) {
    case 'none':
      if (position) def.axis = null;
      else def.legend = null;
      return;
    case 'colorbar':
      def.legend = { ...(def.legend ?? {}), type: 'gradient', ...guideObject(guide.properties, LEGEND_PROPERTIES) };
      return;
    case 'axis':
      if (position) def.axis = { ...(def.axis ?? {}), ...guideObject(guide.properties, AXIS_PROPERTIES) };
      return;
    case 'legend':
      if (!position) def.legend = { ...(def.legend ?? {}), ...guideObject(guide.properties, LEGEND_PROPERTIES) };
      return;
    case null:
      if (position) def.axis = { ...(def.axis ?? {}), ...guideObject(guide.properties, AXIS_PROPERTIES) };
      else def.legend = { ...(def.legend ?? {}), ...guideObject(guide.properties, LEGEND_PROPERTIES) };
      return;
  }
}

// ---
// LABELS
// ---

/**
 * LABEL title for a channel. `undefined` means no label applies; `null`
 * suppresses the title.
 */
export function labelFor(labels: LabelsSpec | null, aesthetic: string): string | null | undefined {
  if (!labels) return undefined;
  const primary = primaryAesthetic(aesthetic);
  if (Object.hasOwn(labels, primary)) return labels[primary];
  // `colour` and `color` label the same channel
  const alias = Object.keys(labels).find(key => primaryAesthetic(key) === primary);
  return alias === undefined ? undefined : labels[alias];
}
