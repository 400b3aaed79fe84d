/**
 * The subset of the Vega-Lite v5 schema the writer produces.
 */

export const VEGA_LITE_SCHEMA = 'https://vega.github.io/schema/vega-lite/v5.json';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type FieldType = 'quantitative' | 'nominal' | 'ordinal' | 'temporal';

export type MarkType = 'point' | 'line' | 'bar' | 'area' | 'rect' | 'text' | 'rule' | 'tick' | 'arc';

export interface MarkDef {
  type: MarkType;
  [property: string]: JsonValue;
}

export interface FieldDef {
  field: string;
  /** Absent on secondary channels (x2, y2), which share their primary's type */
  type?: FieldType;
  /** Values are bucket edges computed upstream */
  bin?: 'binned';
  title?: string | null;
  scale?: JsonObject | null;
  axis?: JsonObject | null;
  legend?: JsonObject | null;
  stack?: 'center' | 'zero' | null;
  sort?: string[] | null;
}

export interface ValueDef {
  value: JsonValue;
}

export type ChannelDef = FieldDef | ValueDef;

/** Keyed by channel; `detail` and `tooltip` may list several fields */
export type Encoding = Record<string, ChannelDef | FieldDef[]>;

export type Transform = JsonObject;

export interface NamedData {
  name: string;
}

export interface InlineData {
  values: JsonObject[];
}

export type Data = NamedData | InlineData;

export interface UnitSpec {
  data?: Data;
  transform?: Transform[];
  mark: MarkType | MarkDef;
  encoding: Encoding;
  width?: number;
  height?: number;
}

export interface LayeredSpec {
  data?: Data;
  transform?: Transform[];
  encoding?: Encoding;
  layer: (UnitSpec | LayeredSpec)[];
  width?: number;
  height?: number;
}

export type ViewSpec = UnitSpec | LayeredSpec;

export interface FacetFieldDef {
  field: string;
  type: FieldType;
  title?: string | null;
}

export type FacetDef = FacetFieldDef | { row?: FacetFieldDef; column?: FacetFieldDef };

export interface TitleDef {
  text: string;
  subtitle?: string;
}

/** The document handed to Vega-Lite */
export interface VegaLiteDocument {
  $schema: string;
  title?: string | TitleDef;
  description?: string;
  datasets?: Record<string, JsonObject[]>;
  data?: Data;
  transform?: Transform[];
  mark?: MarkType | MarkDef;
  encoding?: Encoding;
  layer?: (UnitSpec | LayeredSpec)[];
  facet?: FacetDef;
  columns?: number;
  spacing?: number;
  spec?: ViewSpec;
  resolve?: JsonObject;
  config?: JsonObject;
  width?: number | 'container';
  height?: number | 'container';
}

export function isFieldDef(def: ChannelDef | FieldDef[] | undefined): def is FieldDef {
  return def !== undefined && !Array.isArray(def) && 'field' in def;
}

export function isLayeredSpec(spec: ViewSpec): spec is LayeredSpec {
  return 'layer' in spec;
}
