/**
 * compiler package
 *
 * pipeline: clause AST → StatPlan (SQL) → (execute) → Datasets → ResolvedSpec
 */

// types
export type {
  DatasetMapping,
  DatasetDefinition,
  LayerStatPlan,
  StatPlan,
  AestheticTable,
  ResolvedLayer,
  ResolvedSpec,
} from './resolved-spec.js';
export { BASE_DATASET, SOURCE_COLUMN, layerDatasetName, printAestheticTable, printVizSpec, printStatPlan } from './resolved-spec.js';

// datasets
export type { StorageType, EpochUnit, ColumnInfo, Row, Dataset, Datasets } from './datasets.js';
export {
  storageTypeFromDeclared,
  inferStorageType,
  withInferredTypes,
  unwrapValue,
  partitionResult,
} from './datasets.js';

// SQL helpers
export type { SqlDialect, RelationalParts } from './sql-utils.js';
export {
  quoteIdentifier,
  quoteString,
  isBareWithClause,
  isQueryStatement,
  splitRelational,
  buildBaseQuery,
} from './sql-utils.js';

// mapping resolution
export {
  resolveGlobalMapping,
  overlayLayer,
  declaredMapping,
  missingAesthetics,
  resolveMappings,
  resolveSpec,
} from './mapping-resolver.js';

// stat resolution
export type { StatOptions } from './stat-resolver.js';
export {
  DEFAULT_BINS,
  effectiveStat,
  isDeferredStat,
  planStats,
  combineDatasets,
  validateStatDatasets,
} from './stat-resolver.js';
