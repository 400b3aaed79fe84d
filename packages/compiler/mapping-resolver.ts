/**
 * Mapping Resolver
 *
 * Merges the global mapping and each layer's MAPPING into one aesthetic
 * table per layer. Wildcard and implicit items only mean something once the
 * schema of the executed query is known, so `resolveMappings` takes it as a
 * parameter; nothing here runs at parse time.
 */

import { ResolutionError, SynthesisError } from '../errors.js';
import type { AestheticValue, GlobalMapping, LayerSpec, UnresolvedSpec } from '../parser/ast.js';
import { column } from '../parser/ast.js';
import { GEOM_INFO } from '../parser/vocabulary.js';
import type { Datasets } from './datasets.js';
import {
  BASE_DATASET,
  type AestheticTable,
  type LayerStatPlan,
  type ResolvedLayer,
  type ResolvedSpec,
  type StatPlan,
} from './resolved-spec.js';

/**
 * Resolve the global mapping against a schema (ordered column names).
 */
export function resolveGlobalMapping(global: GlobalMapping, schema: readonly string[]): Map<string, AestheticValue> {
  const table = new Map<string, AestheticValue>();

  switch (global.type) {
    case 'empty':
      break;
    case 'wildcard':
      for (const name of schema) table.set(name, column(name));
      break;
    case 'mappings':
      for (const item of global.items) {
        if (item.type === 'explicit') {
          table.set(item.aesthetic, item.value);
        } else {
          table.set(item.name, column(item.name));
        }
      }
      break;
  }

  return table;
}

/**
 * Overlay a layer's own mappings on a copy of the global table.
 * The layer wins every collision.
 */
export function overlayLayer(global: AestheticTable, layer: LayerSpec): Map<string, AestheticValue> {
  const table = new Map(global);
  for (const binding of layer.mappings) {
    table.set(binding.aesthetic, binding.value);
  }
  return table;
}

/**
 * What a layer binds before any schema is known: explicit and implicit
 * global items plus the layer's own mapping. A wildcard contributes nothing
 * here.
 */
export function declaredMapping(spec: UnresolvedSpec, layer: LayerSpec): Map<string, AestheticValue> {
  const global = spec.global.type === 'wildcard' ? new Map<string, AestheticValue>() : resolveGlobalMapping(spec.global, []);
  return overlayLayer(global, layer);
}

export function missingAesthetics(layer: LayerSpec, table: AestheticTable): string[] {
  return GEOM_INFO[layer.geom].required.filter(aesthetic => !table.has(aesthetic));
}

export function missingAestheticError(layerIndex: number, layer: LayerSpec, missing: string[]): ResolutionError {
  const plural = missing.length > 1 ? 's' : '';
  return new ResolutionError(
    `Layer ${layerIndex + 1} (${layer.geom}) is missing required aesthetic${plural}: ${missing.join(', ')}`,
    layerIndex,
    layer.geom,
    missing
  );
}

/**
 * Resolve every layer's aesthetic table against a schema.
 * Fails with a ResolutionError when a layer lacks an aesthetic its geom
 * requires.
 */
export function resolveMappings(spec: UnresolvedSpec, schema: readonly string[]): AestheticTable[] {
  const global = resolveGlobalMapping(spec.global, schema);

  return spec.layers.map((layer, index) => {
    const table = overlayLayer(global, layer);
    const missing = missingAesthetics(layer, table);
    if (missing.length > 0) {
      throw missingAestheticError(index, layer, missing);
    }
    return table;
  });
}

/**
 * Point a layer's table at the columns its stat produced. Constants stay;
 * columns the stat does not output are dropped.
 */
function applyStatOutputs(table: AestheticTable, plan: LayerStatPlan): Map<string, AestheticValue> {
  const remapped = new Map<string, AestheticValue>();
  for (const [aesthetic, value] of table) {
    if (value.type === 'literal') {
      remapped.set(aesthetic, value);
    } else if (Object.hasOwn(plan.outputs, aesthetic)) {
      remapped.set(aesthetic, column(plan.outputs[aesthetic]));
    }
  }
  for (const [aesthetic, name] of Object.entries(plan.outputs)) {
    if (!remapped.has(aesthetic)) remapped.set(aesthetic, column(name));
  }
  return remapped;
}

/**
 * Every column a layer maps or partitions by must exist in the dataset it
 * reads.
 */
function checkColumns(index: number, layer: LayerSpec, table: AestheticTable, columns: readonly string[]): void {
  const known = new Set(columns);
  const unknown: string[] = [];

  for (const value of table.values()) {
    if (value.type === 'column' && !known.has(value.name)) unknown.push(value.name);
  }
  for (const name of layer.partitionBy) {
    if (!known.has(name)) unknown.push(name);
  }

  if (unknown.length > 0) {
    const names = [...new Set(unknown)];
    throw new ResolutionError(
      `Layer ${index + 1} (${layer.geom}) references unknown column${names.length > 1 ? 's' : ''}: ${names.join(', ')}`,
      index,
      layer.geom,
      names
    );
  }
}

/**
 * Build the resolved specification from the parsed clause, the stat plan
 * and the realized datasets. The wildcard expands against the base schema.
 * A clause without any DRAW layer has nothing to show and fails here.
 */
export function resolveSpec(spec: UnresolvedSpec, plan: StatPlan, datasets: Datasets): ResolvedSpec {
  if (spec.layers.length === 0) {
    throw new ResolutionError('VISUALISE needs at least one DRAW layer');
  }
  const base = datasets.get(BASE_DATASET);
  if (!base) {
    throw new SynthesisError(`Realized data has no '${BASE_DATASET}' dataset`);
  }
  const tables = resolveMappings(spec, base.columns.map(c => c.name));

  const layers = spec.layers.map((layer, index): ResolvedLayer => {
    const layerPlan = plan.layers[index];
    if (!datasets.has(layerPlan.dataset)) {
      throw new SynthesisError(`Layer ${index + 1} reads dataset '${layerPlan.dataset}', which was not realized`);
    }
    const sqlStat = layerPlan.stat !== 'identity' && !layerPlan.deferred;
    const aesthetics = sqlStat ? applyStatOutputs(tables[index], layerPlan) : tables[index];
    checkColumns(index, layer, aesthetics, datasets.get(layerPlan.dataset)?.columns.map(c => c.name) ?? []);

    return {
      index,
      geom: layer.geom,
      name: layer.name,
      stat: layerPlan.stat,
      deferred: layerPlan.deferred,
      dataset: layerPlan.dataset,
      aesthetics,
      inputs: layerPlan.inputs,
      titles: layerPlan.titles,
      settings: layer.settings,
      partitionBy: layer.partitionBy,
    };
  });

  return {
    source: spec.source,
    layers,
    scales: spec.scales,
    facet: spec.facet,
    labels: spec.labels,
    theme: spec.theme,
    guides: spec.guides,
    project: spec.project,
    datasets: plan.mapping,
  };
}
