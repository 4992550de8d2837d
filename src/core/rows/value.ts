/**
 * Row values: a closed tagged variant so every renderer can switch
 * exhaustively on `kind` instead of probing runtime types.
 */

import { RowFormatError } from '../errors.js';

export type RowValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'date'; readonly value: Date }
  | { readonly kind: 'list'; readonly items: readonly RowValue[] }
  | { readonly kind: 'map'; readonly entries: ReadonlyArray<readonly [string, RowValue]> };

export type RowValueKind = RowValue['kind'];

/** JSON-compatible projection of a RowValue (dates become ISO strings). */
export type PlainValue = null | string | number | boolean | PlainValue[] | { [key: string]: PlainValue };

export const NULL_VALUE: RowValue = Object.freeze({ kind: 'null' });

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export const stringValue = (value: string): RowValue => ({ kind: 'string', value });
export const numberValue = (value: number): RowValue => ({ kind: 'number', value });
export const booleanValue = (value: boolean): RowValue => ({ kind: 'boolean', value });
export const dateValue = (value: Date): RowValue => ({ kind: 'date', value });
export const listValue = (items: readonly RowValue[]): RowValue => ({ kind: 'list', items });
export const mapValue = (entries: ReadonlyArray<readonly [string, RowValue]>): RowValue => ({ kind: 'map', entries });

/**
 * Convert a JavaScript value into a RowValue.
 *
 * undefined becomes null; arrays become lists; plain objects and Maps with
 * string keys become maps (key order kept). Functions, symbols, bigints,
 * NaN, infinities and cycles are rejected with RowFormatError naming the
 * field path.
 */
export function toRowValue(input: unknown, field: string, seen: Set<object> = new Set()): RowValue {
  switch (typeof input) {
    case 'undefined': return NULL_VALUE;
    case 'string': return stringValue(input);
    case 'number':
      if (!Number.isFinite(input)) {
        throw new RowFormatError(field, `Field "${field}" has a non-finite number (${input})`);
      }
      return numberValue(input);
    case 'boolean': return booleanValue(input);
    case 'bigint':
    case 'symbol':
    case 'function':
      throw new RowFormatError(field, `Field "${field}" has an unsupported ${typeof input} value`);
    default:
      break;
  }
  if (input === null) return NULL_VALUE;
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new RowFormatError(field, `Field "${field}" has an invalid date`);
    }
    return dateValue(new Date(input.getTime()));
  }
  if (typeof input !== 'object') {
    throw new RowFormatError(field, `Field "${field}" has an unsupported value`);
  }
  if (seen.has(input)) {
    throw new RowFormatError(field, `Field "${field}" contains a circular reference`);
  }
  seen.add(input);
  try {
    if (Array.isArray(input)) {
      return listValue(input.map((item: unknown, i) => toRowValue(item, `${field}.${i}`, seen)));
    }
    if (input instanceof Map) {
      const entries: Array<readonly [string, RowValue]> = [];
      for (const [key, value] of input) {
        if (typeof key !== 'string') {
          throw new RowFormatError(field, `Field "${field}" is a Map with non-string keys`);
        }
        entries.push([key, toRowValue(value, `${field}.${key}`, seen)]);
      }
      return mapValue(entries);
    }
    return mapValue(
      Object.entries(input).map(([key, value]): readonly [string, RowValue] => [key, toRowValue(value, `${field}.${key}`, seen)]),
    );
  } finally {
    seen.delete(input);
  }
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

export function isScalar(value: RowValue): boolean {
  return value.kind !== 'list' && value.kind !== 'map';
}

/** JSON-compatible form; dates become ISO-8601 strings. */
export function toPlain(value: RowValue): PlainValue {
  switch (value.kind) {
    case 'null': return null;
    case 'string':
    case 'number':
    case 'boolean':
      return value.value;
    case 'date': return value.value.toISOString();
    case 'list': return value.items.map(toPlain);
    case 'map': {
      const out: { [key: string]: PlainValue } = {};
      for (const [key, item] of value.entries) out[key] = toPlain(item);
      return out;
    }
  }
}

/**
 * Single-line text form: empty for null, ISO for dates, compact JSON for
 * lists and maps.
 */
export function formatValue(value: RowValue): string {
  switch (value.kind) {
    case 'null': return '';
    case 'string': return value.value;
    case 'number':
    case 'boolean':
      return String(value.value);
    case 'date': return value.value.toISOString();
    case 'list':
    case 'map':
      return JSON.stringify(toPlain(value));
  }
}

/** Truthiness for filter expressions: null, false, 0, '' and empty collections are false. */
export function isTruthy(value: RowValue): boolean {
  switch (value.kind) {
    case 'null': return false;
    case 'string': return value.value !== '';
    case 'number': return value.value !== 0 && !Number.isNaN(value.value);
    case 'boolean': return value.value;
    case 'date': return true;
    case 'list': return value.items.length > 0;
    case 'map': return value.entries.length > 0;
  }
}

/** Look up a child of a list (numeric segment) or map; null when absent. */
export function childValue(value: RowValue, segment: string): RowValue {
  if (value.kind === 'map') {
    const entry = value.entries.find(([key]) => key === segment);
    return entry ? entry[1] : NULL_VALUE;
  }
  if (value.kind === 'list' && /^\d+$/.test(segment)) {
    return value.items[Number(segment)] ?? NULL_VALUE;
  }
  return NULL_VALUE;
}

const KIND_RANK: Record<RowValueKind, number> = {
  null: 0,
  boolean: 1,
  number: 2,
  date: 3,
  string: 4,
  list: 5,
  map: 6,
};

/**
 * Total order over RowValues: by kind rank
 * (null < boolean < number < date < string < list < map), then by value.
 */
export function compareValues(a: RowValue, b: RowValue): number {
  const rankDiff = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rankDiff !== 0) return rankDiff;

  if (a.kind === 'boolean' && b.kind === 'boolean') return Number(a.value) - Number(b.value);
  if (a.kind === 'number' && b.kind === 'number') return a.value - b.value;
  if (a.kind === 'date' && b.kind === 'date') return a.value.getTime() - b.value.getTime();
  if (a.kind === 'string' && b.kind === 'string') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  if (a.kind === 'list' && b.kind === 'list') {
    const n = Math.min(a.items.length, b.items.length);
    for (let i = 0; i < n; i++) {
      const itemA = a.items[i] ?? NULL_VALUE;
      const itemB = b.items[i] ?? NULL_VALUE;
      const diff = compareValues(itemA, itemB);
      if (diff !== 0) return diff;
    }
    return a.items.length - b.items.length;
  }
  if (a.kind === 'map' && b.kind === 'map') {
    const textA = formatValue(a);
    const textB = formatValue(b);
    return textA < textB ? -1 : textA > textB ? 1 : 0;
  }
  return 0;
}

/** Structural equality (dates by timestamp). */
export function valuesEqual(a: RowValue, b: RowValue): boolean {
  return a.kind === b.kind && compareValues(a, b) === 0;
}
