/**
 * VISUALISE Prettifier - Formats a specification back to clause text
 *
 * Formatting Rules:
 * 1. Short clauses (< 60 chars) stay on one line
 * 2. Otherwise the VISUALISE header and every DRAW, SCALE, FACET, LABEL,
 *    THEME, GUIDE and PROJECT part get their own line
 */

import type {
  AestheticValue,
  GlobalMapping,
  GlobalMappingItem,
  LayerSpec,
  ParameterValue,
  Parameters,
  VisualizationSpec,
} from './ast.js';

// Configuration
const VERY_SHORT_THRESHOLD = 60; // Keep on one line if total < this

const RESERVED = new Set([
  'visualise',
  'visualize',
  'from',
  'draw',
  'mapping',
  'as',
  'setting',
  'filter',
  'partition',
  'by',
  'scale',
  'facet',
  'wrap',
  'label',
  'theme',
  'guide',
  'project',
  'true',
  'false',
  'null',
  'and',
  'or',
  'not',
  'is',
  'in',
  'like',
  'ilike',
  'between',
]);

/**
 * Format a specification into VISUALISE clause text
 */
export function formatVisualise(spec: VisualizationSpec): string {
  const parts = formatParts(spec);
  const oneLine = parts.join(' ');

  if (oneLine.length < VERY_SHORT_THRESHOLD) {
    return oneLine;
  }

  const [header, ...rest] = parts;
  return [header, ...rest.map(part => '  ' + part)].join('\n');
}

function formatParts(spec: VisualizationSpec): string[] {
  let header = 'VISUALISE';
  const mapping = formatGlobalMapping(spec.global);
  if (mapping) header += ' ' + mapping;
  if (spec.source) {
    header += ' FROM ' + (spec.source.type === 'table' ? spec.source.name : quote(spec.source.path));
  }

  const parts = [header, ...spec.layers.map(formatLayer)];

  for (const scale of spec.scales) {
    const settings: Parameters = scale.scaleType ? { type: scale.scaleType, ...scale.properties } : scale.properties;
    parts.push(`SCALE ${scale.aesthetic}` + formatSetting(settings));
  }

  if (spec.facet) {
    const { layout, properties } = spec.facet;
    const vars =
      layout.type === 'wrap'
        ? `WRAP ${layout.variables.map(formatIdentifier).join(', ')}`
        : `${layout.rows.map(formatIdentifier).join(', ')} BY ${layout.cols.map(formatIdentifier).join(', ')}`;
    parts.push(`FACET ${vars}` + formatSetting(properties));
  }

  if (spec.labels && Object.keys(spec.labels).length > 0) {
    parts.push('LABEL ' + formatParameters(spec.labels));
  }

  if (spec.theme) {
    parts.push('THEME' + (spec.theme.name ? ' ' + spec.theme.name : '') + formatSetting(spec.theme.properties));
  }

  for (const guide of spec.guides) {
    const settings: Parameters = guide.guideType ? { type: guide.guideType, ...guide.properties } : guide.properties;
    parts.push(`GUIDE ${guide.aesthetic}` + formatSetting(settings));
  }

  if (spec.project) {
    parts.push(`PROJECT ${spec.project.coord}` + formatSetting(spec.project.properties));
  }

  return parts;
}

function formatGlobalMapping(mapping: GlobalMapping): string {
  switch (mapping.type) {
    case 'empty':
      return '';
    case 'wildcard':
      return '*';
    case 'mappings':
      return mapping.items.map(formatMappingItem).join(', ');
  }
}

function formatMappingItem(item: GlobalMappingItem): string {
  if (item.type === 'implicit') return formatIdentifier(item.name);
  return `${formatValue(item.value)} AS ${item.aesthetic}`;
}

function formatLayer(layer: LayerSpec): string {
  let text = `DRAW ${layer.geom}`;
  if (layer.name !== null) {
    text += ' AS ' + (isBareIdentifier(layer.name) ? layer.name : quote(layer.name));
  }
  if (layer.mappings.length > 0) {
    text += ' MAPPING ' + layer.mappings.map(m => `${formatValue(m.value)} AS ${m.aesthetic}`).join(', ');
  }
  text += formatSetting(layer.settings);
  if (layer.filter) {
    text += ' FILTER ' + layer.filter;
  }
  if (layer.partitionBy.length > 0) {
    text += ' PARTITION BY ' + layer.partitionBy.map(formatIdentifier).join(', ');
  }
  return text;
}

function formatSetting(params: Parameters): string {
  return Object.keys(params).length > 0 ? ' SETTING ' + formatParameters(params) : '';
}

function formatParameters(params: Record<string, ParameterValue>): string {
  return Object.entries(params)
    .map(([name, value]) => `${name} => ${formatParameterValue(value)}`)
    .join(', ');
}

function formatParameterValue(value: ParameterValue): string {
  if (value === null) return 'NULL';
  if (Array.isArray(value)) return '[' + value.map(formatParameterValue).join(', ') + ']';
  if (typeof value === 'string') return quote(value);
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  return String(value);
}

function formatValue(value: AestheticValue): string {
  if (value.type === 'column') return formatIdentifier(value.name);
  return formatParameterValue(value.value);
}

function isBareIdentifier(name: string): boolean {
  return /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name) && !RESERVED.has(name.toLowerCase());
}

function formatIdentifier(name: string): string {
  return isBareIdentifier(name) ? name : '`' + name + '`';
}

function quote(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}
