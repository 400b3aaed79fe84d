/**
 * Temporal normalization.
 *
 * Engines hand back dates and times as Date objects, day counts, epoch
 * numbers at various resolutions, bigints, strings or `{ value }` wrappers.
 * Everything leaves the writer in one ISO shape per storage type.
 */

import { type ColumnInfo, type EpochUnit, unwrapValue } from '../compiler/datasets.js';
import type { JsonValue } from './vegalite-types.js';

const MS_PER_DAY = 86_400_000;

const MS_PER_UNIT: Record<EpochUnit, number> = {
  s: 1000,
  ms: 1,
  us: 1 / 1000,
  ns: 1 / 1_000_000,
};

export type TemporalType = 'date' | 'timestamp' | 'time';

export function isTemporalType(type: string): type is TemporalType {
  return type === 'date' || type === 'timestamp' || type === 'time';
}

/**
 * Guess the unit of an epoch number from its magnitude. Anything between
 * 1973 and 5138 in the guessed unit reads as a plausible timestamp.
 */
export function inferEpochUnit(value: number): EpochUnit {
  const magnitude = Math.abs(value);
  if (magnitude < 1e11) return 's';
  if (magnitude < 1e14) return 'ms';
  if (magnitude < 1e17) return 'us';
  return 'ns';
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function formatTime(date: Date): string {
  return date.toISOString().slice(11, 19);
}

function format(date: Date, type: TemporalType): string | null {
  if (Number.isNaN(date.getTime())) return null;
  switch (type) {
    case 'date':
      return formatDate(date);
    case 'timestamp':
      return date.toISOString();
    case 'time':
      return formatTime(date);
  }
}

function fromNumber(value: number, type: TemporalType, unit: EpochUnit | undefined): string | null {
  switch (type) {
    case 'date':
      // Without a unit a date number counts days
      return format(new Date(unit ? value * MS_PER_UNIT[unit] : value * MS_PER_DAY), 'date');
    case 'timestamp':
      return format(new Date(value * MS_PER_UNIT[unit ?? inferEpochUnit(value)]), 'timestamp');
    case 'time': {
      // Time of day since midnight, in seconds unless told otherwise
      const ms = Math.round(value * MS_PER_UNIT[unit ?? 's']);
      const seconds = Math.floor(ms / 1000) % 86_400;
      return `${pad(Math.floor(seconds / 3600))}:${pad(Math.floor((seconds % 3600) / 60))}:${pad(seconds % 60)}`;
    }
  }
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const TIME_ONLY = /^(\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?$/;
const HAS_ZONE = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/;

function fromString(value: string, type: TemporalType): string {
  const text = value.trim();

  if (type === 'time') {
    const match = TIME_ONLY.exec(text);
    if (match) return `${match[1]}:${match[2]}:${match[3] ?? '00'}`;
  }
  if (type === 'date' && DATE_ONLY.test(text)) return text;

  // Zone-less timestamps are read as UTC
  let iso = text.replace(' ', 'T');
  if (DATE_ONLY.test(iso)) iso += 'T00:00:00';
  if (!HAS_ZONE.test(iso)) iso += 'Z';
  return format(new Date(iso), type) ?? value;
}

/**
 * Normalize one temporal value. Null stays null; strings the engine returned
 * that do not parse as dates pass through untouched.
 */
export function normalizeTemporal(value: unknown, type: TemporalType, unit?: EpochUnit): string | null {
  const raw = unwrapValue(value);
  if (raw === null || raw === undefined) return null;

  if (raw instanceof Date) return format(raw, type);
  if (typeof raw === 'bigint') return fromNumber(Number(raw), type, unit);
  if (typeof raw === 'number') return fromNumber(raw, type, unit);
  if (typeof raw === 'string') return fromString(raw, type);
  return String(raw);
}

/**
 * Convert one cell into a JSON value for an inline or named dataset.
 */
export function normalizeValue(value: unknown, column: ColumnInfo): JsonValue {
  if (isTemporalType(column.type)) return normalizeTemporal(value, column.type, column.unit);

  const raw = unwrapValue(value);
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'bigint') return Number(raw);
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (raw instanceof Date) return raw.toISOString();
  return String(raw);
}
