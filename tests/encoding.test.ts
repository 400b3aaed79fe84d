/**
 * Encoding helper tests: marks, channels, field types, scales and labels.
 */

import { describe, it, expect } from 'vitest';
import {
  assignChannels,
  fieldType,
  labelFor,
  markForGeom,
  primaryAesthetic,
  scaleDefinition,
} from '../packages/renderer/index.js';

describe('markForGeom', () => {
  it('maps geoms to Vega-Lite marks', () => {
    expect(markForGeom('point')).toBe('point');
    expect(markForGeom('path')).toBe('line');
    expect(markForGeom('col')).toBe('bar');
    expect(markForGeom('histogram')).toBe('bar');
    expect(markForGeom('tile')).toBe('rect');
    expect(markForGeom('ribbon')).toBe('area');
    expect(markForGeom('label')).toBe('text');
    expect(markForGeom('segment')).toBe('rule');
  });

  it('draws anything unrecognized as points', () => {
    expect(markForGeom('hexbin')).toBe('point');
  });
});

describe('assignChannels', () => {
  it('lets range aesthetics claim their channels first', () => {
    expect([...assignChannels('histogram', ['x', 'xmin', 'xmax', 'y'])]).toEqual([
      ['xmin', 'x'],
      ['xmax', 'x2'],
      ['y', 'y'],
    ]);
    expect([...assignChannels('segment', ['x', 'y', 'xend', 'yend'])]).toEqual([
      ['xend', 'x2'],
      ['yend', 'y2'],
      ['x', 'x'],
      ['y', 'y'],
    ]);
  });

  it('drops unsupported aesthetics and channel collisions', () => {
    expect([...assignChannels('point', ['x', 'y', 'colour', 'color', 'label'])]).toEqual([
      ['x', 'x'],
      ['y', 'y'],
      ['colour', 'color'],
    ]);
  });

  it('maps line styling to stroke channels', () => {
    expect([...assignChannels('line', ['x', 'y', 'linetype', 'linewidth', 'group'])]).toEqual([
      ['x', 'x'],
      ['y', 'y'],
      ['linetype', 'strokeDash'],
      ['linewidth', 'strokeWidth'],
      ['group', 'detail'],
    ]);
  });
});

describe('primaryAesthetic', () => {
  it('folds range and alias aesthetics onto their primary', () => {
    expect(primaryAesthetic('xmin')).toBe('x');
    expect(primaryAesthetic('middle')).toBe('y');
    expect(primaryAesthetic('colour')).toBe('color');
    expect(primaryAesthetic('alpha')).toBe('opacity');
    expect(primaryAesthetic('fill')).toBe('fill');
  });
});

describe('fieldType', () => {
  it('follows the storage type', () => {
    expect(fieldType({ name: 'a', type: 'numeric' }, undefined)).toBe('quantitative');
    expect(fieldType({ name: 'a', type: 'date' }, undefined)).toBe('temporal');
    expect(fieldType({ name: 'a', type: 'timestamp' }, undefined)).toBe('temporal');
    expect(fieldType({ name: 'a', type: 'time' }, undefined)).toBe('nominal');
    expect(fieldType({ name: 'a', type: 'boolean' }, undefined)).toBe('nominal');
    expect(fieldType(undefined, undefined)).toBe('nominal');
  });

  it('lets an explicit scale type override it', () => {
    const column = { name: 'a', type: 'numeric' as const };
    expect(fieldType(column, { aesthetic: 'x', scaleType: 'ordinal', properties: {} })).toBe('nominal');
    expect(fieldType({ name: 'a', type: 'text' }, { aesthetic: 'x', scaleType: 'date', properties: {} })).toBe('temporal');
    expect(fieldType(column, { aesthetic: 'color', scaleType: 'viridis', properties: {} })).toBe('quantitative');
  });
});

describe('scaleDefinition', () => {
  it('maps scale types and properties', () => {
    expect(scaleDefinition({ aesthetic: 'y', scaleType: 'log10', properties: { limits: [1, 100], zero: false } })).toEqual({
      type: 'log',
      base: 10,
      domain: [1, 100],
      zero: false,
    });
    expect(scaleDefinition({ aesthetic: 'x', scaleType: 'reverse', properties: {} })).toEqual({ reverse: true });
    expect(scaleDefinition({ aesthetic: 'color', scaleType: 'diverging', properties: {} })).toEqual({ scheme: 'redblue' });
  });

  it('takes a palette as a scheme name or a range', () => {
    expect(scaleDefinition({ aesthetic: 'color', scaleType: null, properties: { palette: 'tableau10' } })).toEqual({
      scheme: 'tableau10',
    });
    expect(scaleDefinition({ aesthetic: 'fill', scaleType: null, properties: { palette: ['#111111', '#eeeeee'] } })).toEqual({
      range: ['#111111', '#eeeeee'],
    });
  });

  it('returns null when the scale sets nothing', () => {
    expect(scaleDefinition({ aesthetic: 'x', scaleType: null, properties: {} })).toBeNull();
    expect(scaleDefinition({ aesthetic: 'x', scaleType: null, properties: { breaks: [1, 2] } })).toBeNull();
  });
});

describe('labelFor', () => {
  it('finds the label of a channel, its aliases and its range aesthetics', () => {
    expect(labelFor({ colour: 'Region' }, 'color')).toBe('Region');
    expect(labelFor({ x: null }, 'xmin')).toBeNull();
    expect(labelFor({ y: 'Y' }, 'x')).toBeUndefined();
    expect(labelFor(null, 'x')).toBeUndefined();
  });
});
