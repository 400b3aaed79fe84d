/**
 * renderer package - resolved spec to Vega-Lite
 */

export { writeVegaLite, datasetValues, type WriteOptions } from './vegalite-writer.js';

export {
  GEOM_MARKS,
  markForGeom,
  assignChannels,
  primaryAesthetic,
  fieldType,
  fieldTypeFromStorage,
  scaleDefinition,
  labelFor,
} from './encoding.js';

export { normalizeTemporal, normalizeValue, inferEpochUnit, isTemporalType, type TemporalType } from './temporal.js';

export * from './vegalite-types.js';

// Test utilities for inspecting written documents
export {
  getView,
  getLayers,
  getMarkType,
  getEncoding,
  getChannel,
  getField,
  getValue,
  getParts,
  getRows,
  getDatasetName,
} from './test-utils.js';
