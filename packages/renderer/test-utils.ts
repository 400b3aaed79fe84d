/**
 * Test Utilities for Vega-Lite documents
 *
 * Look up layers, channels and rows in a written document without caring
 * whether it is flat, layered or faceted.
 */

import {
  isFieldDef,
  isLayeredSpec,
  type ChannelDef,
  type Encoding,
  type FieldDef,
  type JsonObject,
  type JsonValue,
  type UnitSpec,
  type VegaLiteDocument,
  type ViewSpec,
} from './vegalite-types.js';

/**
 * The top-level view of a document: its `spec` when faceted, otherwise the
 * document itself.
 */
export function getView(doc: VegaLiteDocument): ViewSpec | null {
  if (doc.spec) return doc.spec;
  if (doc.layer) return { layer: doc.layer, encoding: doc.encoding, transform: doc.transform };
  if (doc.mark && doc.encoding) return { mark: doc.mark, encoding: doc.encoding, transform: doc.transform };
  return null;
}

/**
 * The views drawn for each declared layer, in order. A flat document has
 * exactly one.
 */
export function getLayers(doc: VegaLiteDocument): ViewSpec[] {
  const view = getView(doc);
  if (!view) return [];
  // A composite layer (boxplot) shares its encoding across its parts
  if (isLayeredSpec(view) && view.encoding === undefined) return view.layer;
  return [view];
}

/** Mark type of a unit view, or null for a layered one. */
export function getMarkType(view: ViewSpec): string | null {
  if (isLayeredSpec(view)) return null;
  return typeof view.mark === 'string' ? view.mark : view.mark.type;
}

/** Encoding of a view; a layered view's shared encoding. */
export function getEncoding(view: ViewSpec): Encoding {
  return view.encoding ?? {};
}

export function getChannel(view: ViewSpec, channel: string): ChannelDef | FieldDef[] | undefined {
  return getEncoding(view)[channel];
}

/** Field definition of a channel, or null when it is absent or constant. */
export function getField(view: ViewSpec, channel: string): FieldDef | null {
  const def = getChannel(view, channel);
  return isFieldDef(def) ? def : null;
}

/** Constant value of a channel, or undefined when it is absent or a field. */
export function getValue(view: ViewSpec, channel: string): JsonValue | undefined {
  const def = getChannel(view, channel);
  if (def === undefined || Array.isArray(def) || isFieldDef(def)) return undefined;
  return def.value;
}

/** Parts of a composite (boxplot) view. */
export function getParts(view: ViewSpec): UnitSpec[] {
  if (!isLayeredSpec(view)) return [];
  return view.layer.filter((part): part is UnitSpec => !isLayeredSpec(part));
}

/** Rows of a named dataset, or of the inline data. */
export function getRows(doc: VegaLiteDocument, name?: string): JsonObject[] {
  if (name !== undefined) return doc.datasets?.[name] ?? [];
  if (doc.data && 'values' in doc.data) return doc.data.values;
  if (doc.data && 'name' in doc.data) return doc.datasets?.[doc.data.name] ?? [];
  return [];
}

/** Name of the dataset a view reads, falling back to the document default. */
export function getDatasetName(doc: VegaLiteDocument, view: ViewSpec): string | null {
  const data = view.data ?? doc.data;
  return data && 'name' in data ? data.name : null;
}
