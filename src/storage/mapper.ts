/**
 * Schema Mapper
 *
 * Turns a RawRecord into a MappedRecord for its category. Every column of
 * the category is present in the result; optional values that are missing
 * or cannot be coerced become null. Records with the wrong type tag
 * (redirects, deletions) or without a key are rejected with a reason.
 */

import type { Category, RawRecord } from '../ingest/types.js';
import { recordTypeFor } from '../ingest/sources.js';
import { columnsFor, type ColumnDef, type ColumnValue, type MappedRecord } from './schema.js';

export type MapResult =
  | { ok: true; record: MappedRecord }
  | { ok: false; reason: string };

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Map a dump record onto the column set of a category.
 *
 * @example
 * ```typescript
 * const result = mapRecord('authors', raw);
 * if (result.ok) writer.write(result.record);
 * ```
 */
export function mapRecord(category: Category, raw: RawRecord): MapResult {
  const expectedType = recordTypeFor(category);
  if (raw.type !== expectedType) {
    return { ok: false, reason: `type ${raw.type} is not ${expectedType}` };
  }

  const key = raw.key.trim();
  if (key === '') {
    return { ok: false, reason: 'missing key' };
  }

  const record: MappedRecord = { key };
  for (const column of columnsFor(category)) {
    const value = column.source.from === 'key' ? key : columnValue(column, raw);
    if (value === null && column.required) {
      return { ok: false, reason: `missing required column ${column.name}` };
    }
    record[column.name] = value;
  }

  return { ok: true, record };
}

function columnValue(column: ColumnDef, raw: RawRecord): ColumnValue {
  const source = column.source;
  switch (source.from) {
    case 'key':
      return raw.key;
    case 'revision':
      return toInt32(raw.revision ?? raw.data['revision']);
    case 'lastModified':
      return coerce(column, raw.lastModified ?? raw.data['last_modified']);
    case 'field':
      return coerce(column, raw.data[source.field]);
    case 'refs':
      return toKeyList(raw.data[source.field]);
    case 'first': {
      const list = raw.data[source.field];
      return Array.isArray(list) && list.length > 0 ? coerce(column, list[0]) : null;
    }
  }
}

function coerce(column: ColumnDef, value: unknown): ColumnValue {
  switch (column.kind) {
    case 'string':
      return toText(value);
    case 'int':
      return toInt32(value);
    case 'timestamp': {
      const text = toText(value);
      return text === null ? null : parseTimestamp(text);
    }
    case 'string_list':
      return toStringList(value);
  }
}

/**
 * Coerce a value to a 32-bit integer.
 * Accepts integral numbers and digit strings; anything else is null.
 */
export function toInt32(value: unknown): number | null {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    parsed = parseInt(value.trim(), 10);
  } else {
    return null;
  }

  if (!Number.isInteger(parsed) || parsed < INT32_MIN || parsed > INT32_MAX) {
    return null;
  }
  return parsed;
}

/**
 * Parse an ISO-8601 timestamp.
 *
 * Fractional seconds are kept to millisecond precision. A timestamp
 * without a zone is read as UTC. Returns null for anything that is not a
 * valid calendar date and time.
 *
 * @example
 * ```typescript
 * parseTimestamp('2008-04-01T03:28:50.625462'); // 2008-04-01T03:28:50.625Z
 * parseTimestamp('not a date');                 // null
 * ```
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zone] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText ?? 0);
  const minute = Number(minuteText ?? 0);
  const second = Number(secondText ?? 0);
  const millis = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;

  // setUTCFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }

  const offsetMinutes = zone ? parseZoneOffset(zone) : 0;
  if (offsetMinutes === null) {
    return null;
  }

  return new Date(date.getTime() - offsetMinutes * 60_000);
}

function parseZoneOffset(zone: string): number | null {
  if (zone.toUpperCase() === 'Z') {
    return 0;
  }

  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) {
    return null;
  }

  const sign = zone.startsWith('-') ? -1 : 1;
  return sign * (hours * 60 + minutes);
}

/**
 * Plain text of a value that is a string, a number, or a typed value
 * such as `{ type: '/type/text', value: '...' }`
 */
export function toText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (isObject(value) && typeof value['value'] === 'string') {
    return value['value'];
  }
  return null;
}

/**
 * List of strings; a lone string becomes a one-element list
 */
export function toStringList(value: unknown): string[] | null {
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      const text = toText(item);
      if (text !== null) {
        items.push(text);
      }
    }
    return items;
  }

  const text = toText(value);
  return text === null ? null : [text];
}

/**
 * Keys of a reference list: `[{ key }]`, `[{ author: { key } }]` or plain strings
 */
export function toKeyList(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const keys: string[] = [];
  for (const item of value) {
    const key = referenceKey(item);
    if (key !== null) {
      keys.push(key);
    }
  }
  return keys;
}

function referenceKey(item: unknown): string | null {
  if (typeof item === 'string') {
    return item;
  }
  if (!isObject(item)) {
    return null;
  }
  if (typeof item['key'] === 'string') {
    return item['key'];
  }
  if ('author' in item) {
    return referenceKey(item['author']);
  }
  return null;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
