/**
 * Vega-Lite Writer
 *
 * Turns a resolved specification and its realized datasets into a
 * Vega-Lite v5 document.
 *
 * One layer gives a flat mark + encoding document; several give a
 * `layer` array. Datasets travel as named `datasets`, except under a facet
 * with layers reading different datasets: there every dataset is unified
 * into one inline table tagged with its origin, since a facet splits one
 * data source. A PROJECT clause rewrites each layer's view last: polar
 * turns position channels into angle and radius.
 */

import { ResolutionError, SynthesisError } from '../errors.js';
import type { ColumnInfo, Dataset, Datasets } from '../compiler/datasets.js';
import { BASE_DATASET, SOURCE_COLUMN, type AestheticTable, type ResolvedLayer, type ResolvedSpec } from '../compiler/resolved-spec.js';
import type { AestheticValue, FacetSpec, ParameterValue, ProjectSpec, ThemeSpec } from '../parser/ast.js';
import { facetVariables } from '../parser/ast.js';
import { GEOM_INFO, GROUPING_AESTHETICS } from '../parser/vocabulary.js';
import {
  applyGuide,
  applyScale,
  assignChannels,
  fieldType,
  isPositionChannel,
  isSecondaryChannel,
  labelFor,
  markForGeom,
  primaryAesthetic,
} from './encoding.js';
import { normalizeValue } from './temporal.js';
import {
  VEGA_LITE_SCHEMA,
  isFieldDef,
  isLayeredSpec,
  type ChannelDef,
  type Encoding,
  type FacetDef,
  type FacetFieldDef,
  type FieldDef,
  type JsonObject,
  type LayeredSpec,
  type MarkDef,
  type MarkType,
  type Transform,
  type UnitSpec,
  type VegaLiteDocument,
  type ViewSpec,
} from './vegalite-types.js';

const DEBUG = process.env.DEBUG_PLOTSQL === 'true';

export interface WriteOptions {
  /** `$schema` URL of the document */
  schema?: string;
}

interface WriteContext {
  spec: ResolvedSpec;
  datasets: Datasets;
  /** One layer and no facet: the layer may use facet channels itself */
  singleView: boolean;
}

/** How a layer's encoding is built from its aesthetic table */
interface EncodingInput {
  table: AestheticTable;
  /** Columns a transform adds to the layer's rows */
  derived?: ColumnInfo[];
  /** Default titles, by aesthetic, beneath any LABEL */
  titles?: Record<string, string>;
}

// ---
// DATA
// ---

function datasetFor(ctx: WriteContext, name: string): Dataset {
  const dataset = ctx.datasets.get(name);
  if (!dataset) {
    throw new SynthesisError(`Dataset '${name}' referenced by a layer was not realized`);
  }
  return dataset;
}

/** Rows of a dataset as JSON, temporal values in ISO form. */
export function datasetValues(dataset: Dataset): JsonObject[] {
  return dataset.rows.map(row => {
    const values: JsonObject = {};
    for (const column of dataset.columns) {
      values[column.name] = normalizeValue(row[column.name], column);
    }
    return values;
  });
}

function columnInfo(ctx: WriteContext, dataset: string, name: string, derived: ColumnInfo[] = []): ColumnInfo | undefined {
  return derived.find(c => c.name === name) ?? ctx.datasets.get(dataset)?.columns.find(c => c.name === name);
}

// ---
// ENCODING
// ---

function findScale(ctx: WriteContext, aesthetic: string) {
  const primary = primaryAesthetic(aesthetic);
  return ctx.spec.scales.find(s => primaryAesthetic(s.aesthetic) === primary);
}

function findGuide(ctx: WriteContext, aesthetic: string) {
  const primary = primaryAesthetic(aesthetic);
  return ctx.spec.guides.find(g => primaryAesthetic(g.aesthetic) === primary);
}

function fieldDef(
  ctx: WriteContext,
  layer: ResolvedLayer,
  aesthetic: string,
  channel: string,
  field: string,
  input: EncodingInput
): FieldDef {
  const def: FieldDef = { field };
  const scale = findScale(ctx, aesthetic);

  if (!isSecondaryChannel(channel)) {
    def.type = fieldType(columnInfo(ctx, layer.dataset, field, input.derived), scale);

    const label = labelFor(ctx.spec.labels, aesthetic);
    const title = input.titles?.[primaryAesthetic(aesthetic)] ?? layer.titles[primaryAesthetic(aesthetic)];
    if (label !== undefined) def.title = label;
    else if (title !== undefined) def.title = title;
  }

  if (scale) applyScale(def, channel, scale);
  const guide = findGuide(ctx, aesthetic);
  if (guide) applyGuide(def, channel, guide);
  return def;
}

/** SETTING values that set an aesthetic the geom supports to a constant */
function settingAesthetics(layer: ResolvedLayer): Map<string, AestheticValue> {
  const supported: readonly string[] = GEOM_INFO[layer.geom].supported;
  const constants = new Map<string, AestheticValue>();
  for (const [name, value] of Object.entries(layer.settings)) {
    if (!supported.includes(name) || layer.aesthetics.has(name)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      constants.set(name, { type: 'literal', value });
    }
  }
  return constants;
}

function buildEncoding(ctx: WriteContext, layer: ResolvedLayer, input: EncodingInput): Encoding {
  const bound = new Map([...input.table, ...settingAesthetics(layer)]);
  const channels = assignChannels(layer.geom, bound.keys());
  const encoding: Encoding = {};

  for (const [aesthetic, channel] of channels) {
    const value = bound.get(aesthetic);
    if (!value) continue;
    encoding[channel] =
      value.type === 'literal' ? { value: value.value } : fieldDef(ctx, layer, aesthetic, channel, value.name, input);
  }

  if (DEBUG) {
    const dropped = [...bound.keys()].filter(a => !channels.has(a));
    if (dropped.length > 0) {
      console.log(`[vegalite-writer] layer ${layer.index} (${layer.geom}) drops: ${dropped.join(', ')}`);
    }
  }

  const details: FieldDef[] = [];
  const group = encoding.detail;
  if (isFieldDef(group)) details.push(group);
  for (const name of layer.partitionBy) {
    if (!details.some(d => d.field === name)) details.push({ field: name, type: 'nominal' });
  }
  if (details.length === 1) encoding.detail = details[0];
  else if (details.length > 1) encoding.detail = details;

  return encoding;
}

// ---
// MARKS AND STAT TRANSFORMS
// ---

function markFor(layer: ResolvedLayer): MarkType | MarkDef {
  const mark = markForGeom(layer.geom);
  const width = layer.settings.width;
  if ((layer.geom === 'bar' || layer.geom === 'col') && typeof width === 'number') {
    return { type: mark, width: { band: width } };
  }
  return mark;
}

function columnOf(layer: ResolvedLayer, aesthetic: string): string {
  const value = layer.aesthetics.get(aesthetic);
  if (value?.type !== 'column') {
    throw new ResolutionError(
      `Layer ${layer.index + 1} (${layer.geom}) needs a column for '${aesthetic}' to compute its ${layer.stat} transform`,
      layer.index,
      layer.geom,
      [aesthetic]
    );
  }
  return value.name;
}

/** Columns a transform must keep separate: grouping aesthetics, partitions, facets */
function groupFields(ctx: WriteContext, layer: ResolvedLayer): string[] {
  const fields: string[] = [];
  for (const [aesthetic, value] of layer.aesthetics) {
    if (value.type === 'column' && (GROUPING_AESTHETICS as readonly string[]).includes(aesthetic)) fields.push(value.name);
  }
  fields.push(...layer.partitionBy, ...facetVariables(ctx.spec.facet));
  return [...new Set(fields)];
}

function numberSetting(layer: ResolvedLayer, name: string): number | undefined {
  const value = layer.settings[name];
  return typeof value === 'number' ? value : undefined;
}

function withBandwidth(transform: Transform, layer: ResolvedLayer): Transform {
  const bandwidth = numberSetting(layer, 'bandwidth');
  return bandwidth === undefined ? transform : { ...transform, bandwidth };
}

function densityView(ctx: WriteContext, layer: ResolvedLayer): UnitSpec {
  const x = columnOf(layer, 'x');
  const table = new Map(layer.aesthetics);
  table.set('y', { type: 'column', name: 'density' });

  return {
    transform: [withBandwidth({ density: x, groupby: groupFields(ctx, layer), as: [x, 'density'] }, layer)],
    mark: markFor(layer),
    encoding: buildEncoding(ctx, layer, {
      table,
      derived: [{ name: 'density', type: 'numeric' }],
      titles: { x, y: 'density' },
    }),
  };
}

/**
 * Violins: a density of `y` per `x` category, drawn as a horizontal area
 * mirrored around its centre.
 */
function violinView(ctx: WriteContext, layer: ResolvedLayer): UnitSpec {
  const x = columnOf(layer, 'x');
  const y = columnOf(layer, 'y');
  const table = new Map(layer.aesthetics);
  table.set('x', { type: 'column', name: 'density' });

  const encoding = buildEncoding(ctx, layer, {
    table,
    derived: [{ name: 'density', type: 'numeric' }],
    titles: { y },
  });
  encoding.x = { field: 'density', type: 'quantitative', stack: 'center', axis: null, title: null };

  if (ctx.singleView) {
    const label = labelFor(ctx.spec.labels, 'x');
    encoding.column = { field: x, type: 'nominal', title: label === undefined ? x : label };
  }

  return {
    transform: [
      withBandwidth({ density: y, groupby: [...new Set([x, ...groupFields(ctx, layer)])], as: [y, 'density'] }, layer),
    ],
    mark: { type: 'area', orient: 'horizontal' },
    encoding,
  };
}

function smoothView(ctx: WriteContext, layer: ResolvedLayer): UnitSpec {
  const x = columnOf(layer, 'x');
  const y = columnOf(layer, 'y');
  const groupby = groupFields(ctx, layer);

  const transform: Transform =
    layer.settings.method === 'lm'
      ? { regression: y, on: x, groupby, method: 'linear' }
      : withBandwidth({ loess: y, on: x, groupby }, layer);

  return {
    transform: [transform],
    mark: markFor(layer),
    encoding: buildEncoding(ctx, layer, { table: layer.aesthetics }),
  };
}

const BOX_PARTS = new Set(['ymin', 'lower', 'middle', 'upper', 'ymax']);

/**
 * Boxplots: whiskers as a rule from ymin to ymax, the box as a bar from
 * lower to upper, and the median as a tick. Position and grouping channels
 * are shared by the three parts.
 */
function boxplotView(ctx: WriteContext, layer: ResolvedLayer): ViewSpec {
  const shared = new Map([...layer.aesthetics].filter(([aesthetic]) => !BOX_PARTS.has(aesthetic)));
  const input: EncodingInput = { table: layer.aesthetics };

  const part = (aesthetic: string, channel: string): FieldDef | null => {
    const value = layer.aesthetics.get(aesthetic);
    return value?.type === 'column' ? fieldDef(ctx, layer, aesthetic, channel, value.name, input) : null;
  };

  const parts: UnitSpec[] = [];
  const ymin = part('ymin', 'y');
  const ymax = part('ymax', 'y2');
  if (ymin && ymax) parts.push({ mark: 'rule', encoding: { y: ymin, y2: ymax } });

  const lower = part('lower', 'y');
  const upper = part('upper', 'y2');
  if (lower && upper) parts.push({ mark: { type: 'bar', size: 14 }, encoding: { y: lower, y2: upper } });

  const middle = part('middle', 'y');
  if (middle) parts.push({ mark: { type: 'tick', color: 'white', size: 14 }, encoding: { y: middle } });

  return { encoding: buildEncoding(ctx, layer, { table: shared }), layer: parts };
}

function datumExpression(value: AestheticValue | undefined): string {
  if (!value) return '0';
  return value.type === 'column' ? `datum[${JSON.stringify(value.name)}]` : JSON.stringify(value.value);
}

const ARROW_SHAFT = new Set(['x', 'y', 'x2', 'y2']);
const ARROW_ANGLE = '__viz_angle__';

/**
 * Arrows: a rule from (x, y) to (xend, yend) with a triangle at the end,
 * rotated along the shaft. Everything but position is shared.
 */
function arrowView(ctx: WriteContext, layer: ResolvedLayer): ViewSpec {
  const input: EncodingInput = { table: layer.aesthetics };
  const shaft: Encoding = {};
  const shared: Encoding = {};
  for (const [channel, def] of Object.entries(buildEncoding(ctx, layer, input))) {
    if (ARROW_SHAFT.has(channel)) shaft[channel] = def;
    else shared[channel] = def;
  }

  const tip = (aesthetic: string, channel: string): ChannelDef | null => {
    const value = layer.aesthetics.get(aesthetic);
    if (!value) return null;
    return value.type === 'literal' ? { value: value.value } : fieldDef(ctx, layer, aesthetic, channel, value.name, input);
  };
  const head: Encoding = { angle: { field: ARROW_ANGLE, type: 'quantitative', scale: null } };
  const headX = tip('xend', 'x');
  const headY = tip('yend', 'y');
  if (headX) head.x = headX;
  if (headY) head.y = headY;

  const [x, y, xend, yend] = ['x', 'y', 'xend', 'yend'].map(a => datumExpression(layer.aesthetics.get(a)));
  const angle = `90 - atan2(${yend} - ${y}, ${xend} - ${x}) * 180 / PI`;

  return {
    encoding: shared,
    layer: [
      { mark: markFor(layer), encoding: shaft },
      {
        transform: [{ calculate: angle, as: ARROW_ANGLE }],
        mark: { type: 'point', shape: 'triangle', filled: true },
        encoding: head,
      },
    ],
  };
}

const POLYGON_ORDER = '__viz_order__';

/** Polygons: a closed line through the rows in query order. */
function polygonView(ctx: WriteContext, layer: ResolvedLayer): UnitSpec {
  const encoding = buildEncoding(ctx, layer, { table: layer.aesthetics });
  encoding.order = { field: POLYGON_ORDER, type: 'quantitative' };
  return {
    transform: [{ window: [{ op: 'row_number', as: POLYGON_ORDER }] }],
    mark: { type: 'line', interpolate: 'linear-closed' },
    encoding,
  };
}

function layerView(ctx: WriteContext, layer: ResolvedLayer): ViewSpec {
  if (layer.geom === 'boxplot' && layer.aesthetics.has('middle')) return boxplotView(ctx, layer);
  if (layer.geom === 'arrow') return arrowView(ctx, layer);
  if (layer.geom === 'polygon') return polygonView(ctx, layer);
  if (layer.deferred && layer.stat === 'density') {
    return layer.geom === 'violin' ? violinView(ctx, layer) : densityView(ctx, layer);
  }
  if (layer.deferred && layer.stat === 'smooth') return smoothView(ctx, layer);

  return { mark: markFor(layer), encoding: buildEncoding(ctx, layer, { table: layer.aesthetics }) };
}

// ---
// PROJECTION
// ---

/** Where each position channel goes under polar coordinates, by the channel that drives the angle */
const POLAR_CHANNELS: Readonly<Record<'x' | 'y', Readonly<Record<string, string>>>> = {
  y: { y: 'theta', y2: 'theta2' },
  x: { x: 'theta', x2: 'theta2', y: 'radius', y2: 'radius2' },
};

/** Marks that keep their type in polar coordinates; the rest become arcs */
const POLAR_KEPT_MARKS = new Set<MarkType>(['point', 'line', 'text']);

function markDef(mark: MarkType | MarkDef): MarkDef {
  return typeof mark === 'string' ? { type: mark } : { ...mark };
}

function withoutAxis(def: ChannelDef | FieldDef[]): ChannelDef | FieldDef[] {
  if (!isFieldDef(def)) return def;
  const copy = { ...def };
  delete copy.axis;
  return copy;
}

function hasColor(encoding: Encoding | undefined): boolean {
  return encoding !== undefined && (encoding.color !== undefined || encoding.fill !== undefined);
}

function polarEncoding(encoding: Encoding, project: ProjectSpec, colored: boolean): Encoding {
  const driver = project.properties.theta === 'x' ? 'x' : 'y';
  const moves = POLAR_CHANNELS[driver];
  const polar: Encoding = {};

  for (const [channel, def] of Object.entries(encoding)) {
    const target = moves[channel];
    if (target) polar[target] = withoutAxis(def);
    else if (!isPositionChannel(channel)) polar[channel] = def;
  }

  // With the angle from y, x survives as the colour of each slice
  const x = encoding.x;
  if (driver === 'y' && !colored && isFieldDef(x)) {
    const color: FieldDef = { field: x.field };
    if (x.type) color.type = x.type;
    if (x.title !== undefined) color.title = x.title;
    polar.color = color;
  }

  const theta = polar.theta;
  const start = project.properties.start;
  if (typeof start === 'number' && isFieldDef(theta)) {
    const from = (start * Math.PI) / 180;
    theta.scale = { ...(theta.scale ?? {}), range: [from, from + 2 * Math.PI] };
  }
  return polar;
}

/**
 * Apply PROJECT to a layer's view. Layered views pass their shared colour
 * down so a part does not recolour by x.
 */
function projectView(view: ViewSpec, project: ProjectSpec | null, colored = false): ViewSpec {
  if (!project) return view;

  if (isLayeredSpec(view)) {
    const shared = view.encoding;
    const inherited = colored || hasColor(shared);
    const projected: LayeredSpec = { ...view, layer: view.layer.map(child => projectView(child, project, inherited)) };
    if (shared && project.coord === 'polar') projected.encoding = polarEncoding(shared, project, inherited);
    return projected;
  }

  let mark = view.mark;
  let encoding = view.encoding;
  if (project.coord === 'polar') {
    const type = typeof mark === 'string' ? mark : mark.type;
    if (!POLAR_KEPT_MARKS.has(type)) mark = 'arc';
    encoding = polarEncoding(encoding, project, colored || hasColor(encoding));
  }

  const clip = project.properties.clip;
  if (typeof clip === 'boolean') mark = { ...markDef(mark), clip };

  return { ...view, mark, encoding };
}

const DEFAULT_VIEW_SIZE = 200;

/**
 * Width and height of the view. A cartesian ratio fixes height / width,
 * starting from whichever side the theme sets.
 */
function viewSize(spec: ResolvedSpec): { width?: number; height?: number } {
  let width = spec.theme ? numberProperty(spec.theme.properties.width) : undefined;
  let height = spec.theme ? numberProperty(spec.theme.properties.height) : undefined;

  const ratio = spec.project?.coord === 'cartesian' ? numberProperty(spec.project.properties.ratio) : undefined;
  if (ratio !== undefined) {
    if (width !== undefined) height = width * ratio;
    else if (height !== undefined) width = height / ratio;
    else {
      width = DEFAULT_VIEW_SIZE;
      height = DEFAULT_VIEW_SIZE * ratio;
    }
  }
  return { width, height };
}

// ---
// FACETS
// ---

const FACET_FIELD = '__viz_facet__';

function facetFieldDef(ctx: WriteContext, dataset: string, variables: string[], transforms: Transform[], suffix: string): FacetFieldDef {
  if (variables.length === 1) {
    const field = variables[0];
    const label = labelFor(ctx.spec.labels, field);
    const def: FacetFieldDef = { field, type: fieldType(columnInfo(ctx, dataset, field), undefined) };
    if (label !== undefined) def.title = label;
    return def;
  }

  // Several variables facet on their combined value
  const field = FACET_FIELD + suffix;
  const expression = variables.map(v => `datum[${JSON.stringify(v)}]`).join(" + ' / ' + ");
  transforms.push({ calculate: expression, as: field });
  return { field, type: 'nominal', title: variables.join(' / ') };
}

function buildFacet(ctx: WriteContext, facet: FacetSpec, dataset: string, transforms: Transform[]): FacetDef {
  const layout = facet.layout;
  if (layout.type === 'wrap') {
    return facetFieldDef(ctx, dataset, layout.variables, transforms, 'wrap');
  }
  const grid: { row?: FacetFieldDef; column?: FacetFieldDef } = {};
  if (layout.rows.length > 0) grid.row = facetFieldDef(ctx, dataset, layout.rows, transforms, 'row');
  if (layout.cols.length > 0) grid.column = facetFieldDef(ctx, dataset, layout.cols, transforms, 'column');
  return grid;
}

function facetResolve(scales: ParameterValue | undefined): JsonObject | null {
  switch (scales) {
    case 'free':
      return { scale: { x: 'independent', y: 'independent' } };
    case 'free_x':
      return { scale: { x: 'independent' } };
    case 'free_y':
      return { scale: { y: 'independent' } };
    default:
      return null;
  }
}

// ---
// THEME
// ---

const THEME_CONFIGS: Readonly<Record<string, JsonObject>> = {
  default: {},
  minimal: { view: { stroke: null }, axis: { domain: false, ticks: false } },
  classic: { view: { stroke: null }, axis: { grid: false, domain: true } },
  dark: {
    background: '#222222',
    view: { stroke: '#444444' },
    axis: { labelColor: '#dddddd', titleColor: '#dddddd', gridColor: '#444444', domainColor: '#888888', tickColor: '#888888' },
    legend: { labelColor: '#dddddd', titleColor: '#dddddd' },
    title: { color: '#eeeeee' },
  },
  gray: { view: { fill: '#ebebeb', stroke: null }, axis: { gridColor: '#ffffff', domain: false, tickColor: '#333333' } },
  void: { view: { stroke: null }, axis: { disable: true } },
};

function section(config: JsonObject, name: string): JsonObject {
  const existing = config[name];
  if (existing !== null && typeof existing === 'object' && !Array.isArray(existing)) return existing;
  const created: JsonObject = {};
  config[name] = created;
  return created;
}

function themeConfig(theme: ThemeSpec): JsonObject {
  const name = theme.name === 'grey' ? 'gray' : theme.name ?? 'default';
  const config: JsonObject = structuredClone(THEME_CONFIGS[name] ?? {});

  for (const [property, value] of Object.entries(theme.properties)) {
    switch (property) {
      case 'background':
        if (typeof value === 'string') config.background = value;
        break;
      case 'font':
        if (typeof value === 'string') config.font = value;
        break;
      case 'font_size':
        if (typeof value === 'number') {
          section(config, 'axis').labelFontSize = value;
          section(config, 'legend').labelFontSize = value;
        }
        break;
      case 'title_size':
        if (typeof value === 'number') section(config, 'title').fontSize = value;
        break;
      case 'grid':
        if (typeof value === 'boolean') section(config, 'axis').grid = value;
        break;
      case 'legend_position':
        if (value === 'none') section(config, 'legend').disable = true;
        else if (typeof value === 'string') section(config, 'legend').orient = value;
        break;
      // width and height size the view, not the config
    }
  }
  return config;
}

// ---
// DOCUMENT
// ---

function applyTitles(doc: VegaLiteDocument, spec: ResolvedSpec): void {
  const labels = spec.labels;
  if (!labels) return;

  const title = labels.title;
  const subtitle = labels.subtitle;
  if (typeof subtitle === 'string') {
    doc.title = { text: typeof title === 'string' ? title : '', subtitle };
  } else if (typeof title === 'string') {
    doc.title = title;
  }
  if (typeof labels.caption === 'string') doc.description = labels.caption;
}

function withFilter(view: ViewSpec, dataset: string): ViewSpec {
  const filter: Transform = { filter: { field: SOURCE_COLUMN, equal: dataset } };
  return { ...view, transform: [filter, ...(view.transform ?? [])] };
}

/**
 * Write the Vega-Lite document for a resolved specification.
 */
export function writeVegaLite(spec: ResolvedSpec, datasets: Datasets, options: WriteOptions = {}): VegaLiteDocument {
  const ctx: WriteContext = { spec, datasets, singleView: spec.layers.length === 1 && spec.facet === null };

  const used = [...new Set(spec.layers.map(l => l.dataset))];
  for (const name of used) datasetFor(ctx, name);
  const defaultDataset = used.length === 0 || used.includes(BASE_DATASET) ? BASE_DATASET : used[0];
  const unify = spec.facet !== null && used.length > 1;

  const views = spec.layers.map(layer => {
    const view = projectView(layerView(ctx, layer), spec.project);
    if (unify) return withFilter(view, layer.dataset);
    return layer.dataset === defaultDataset ? view : { ...view, data: { name: layer.dataset } };
  });

  const doc: VegaLiteDocument = { $schema: options.schema ?? VEGA_LITE_SCHEMA };
  applyTitles(doc, spec);

  if (unify) {
    doc.data = {
      values: used.flatMap(name =>
        datasetValues(datasetFor(ctx, name)).map(values => ({ [SOURCE_COLUMN]: name, ...values }))
      ),
    };
  } else {
    const names = used.length > 0 ? used : datasets.has(BASE_DATASET) ? [BASE_DATASET] : [];
    doc.datasets = Object.fromEntries(names.map(name => [name, datasetValues(datasetFor(ctx, name))]));
    doc.data = { name: defaultDataset };
  }

  const view: ViewSpec = views.length === 1 ? views[0] : { layer: views };
  const { width, height } = viewSize(spec);

  if (spec.facet) {
    const transforms: Transform[] = [];
    doc.facet = buildFacet(ctx, spec.facet, defaultDataset, transforms);
    if (transforms.length > 0) doc.transform = transforms;

    const { columns, spacing, scales } = spec.facet.properties;
    if (spec.facet.layout.type === 'wrap' && typeof columns === 'number') doc.columns = columns;
    if (typeof spacing === 'number') doc.spacing = spacing;
    const resolve = facetResolve(scales);
    if (resolve) doc.resolve = resolve;

    doc.spec = { ...view, ...(width === undefined ? {} : { width }), ...(height === undefined ? {} : { height }) };
  } else {
    Object.assign(doc, view);
    if (width !== undefined) doc.width = width;
    if (height !== undefined) doc.height = height;
  }

  if (spec.theme) {
    const config = themeConfig(spec.theme);
    if (Object.keys(config).length > 0) doc.config = config;
  }

  return doc;
}

function numberProperty(value: ParameterValue | undefined): number | undefined {
  return typeof value === 'number' ? value : undefined;
}
