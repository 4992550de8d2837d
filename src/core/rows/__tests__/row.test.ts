/**
 * Tests for row values and rows.
 */

import { describe, it, expect } from 'vitest';
import { RowFormatError } from '../../errors.js';
import { Row } from '../row.js';
import {
  NULL_VALUE,
  compareValues,
  dateValue,
  formatValue,
  isTruthy,
  listValue,
  numberValue,
  stringValue,
  toPlain,
  toRowValue,
  valuesEqual,
} from '../value.js';

describe('toRowValue', () => {
  it('converts scalars, arrays, objects and maps', () => {
    expect(toRowValue(undefined, 'f')).toEqual({ kind: 'null' });
    expect(toRowValue('x', 'f')).toEqual({ kind: 'string', value: 'x' });
    expect(toRowValue([1, null], 'f')).toEqual({ kind: 'list', items: [{ kind: 'number', value: 1 }, { kind: 'null' }] });
    expect(toRowValue({ a: true }, 'f')).toEqual({ kind: 'map', entries: [['a', { kind: 'boolean', value: true }]] });
    expect(toRowValue(new Map([['k', 'v']]), 'f')).toEqual({ kind: 'map', entries: [['k', { kind: 'string', value: 'v' }]] });
  });

  it('rejects unsupported values with the field path', () => {
    expect(() => toRowValue(10n, 'count')).toThrow('Field "count" has an unsupported bigint value');
    expect(() => toRowValue({ nested: [() => 1] }, 'meta')).toThrow('Field "meta.nested.0" has an unsupported function value');
    expect(() => toRowValue(new Date('nope'), 'when')).toThrow('Field "when" has an invalid date');
  });

  it('rejects numbers no output format can represent', () => {
    expect(() => toRowValue(NaN, 'v')).toThrow('Field "v" has a non-finite number (NaN)');
    expect(() => toRowValue({ ratio: -Infinity }, 'stats')).toThrow('Field "stats.ratio" has a non-finite number (-Infinity)');
  });

  it('rejects circular structures', () => {
    const loop: Record<string, unknown> = {};
    loop['self'] = loop;
    expect(() => toRowValue(loop, 'loop')).toThrow(RowFormatError);
  });

  it('allows the same object twice when it is not a cycle', () => {
    const shared = { a: 1 };
    expect(toPlain(toRowValue([shared, shared], 'pair'))).toEqual([{ a: 1 }, { a: 1 }]);
  });
});

describe('value helpers', () => {
  it('formats values as single-line text', () => {
    expect(formatValue(NULL_VALUE)).toBe('');
    expect(formatValue(numberValue(1.5))).toBe('1.5');
    expect(formatValue(dateValue(new Date('2024-01-02T03:04:05Z')))).toBe('2024-01-02T03:04:05.000Z');
    expect(formatValue(toRowValue({ a: [1, 'b'] }, 'f'))).toBe('{"a":[1,"b"]}');
  });

  it('orders values by kind rank, then value', () => {
    const ordered = [
      stringValue('a'),
      NULL_VALUE,
      numberValue(2),
      toRowValue(true, 'f'),
      numberValue(1),
      dateValue(new Date(0)),
    ].sort(compareValues);
    expect(ordered.map(formatValue)).toEqual(['', 'true', '1', '2', '1970-01-01T00:00:00.000Z', 'a']);
  });

  it('compares structurally', () => {
    expect(valuesEqual(listValue([numberValue(1)]), toRowValue([1], 'f'))).toBe(true);
    expect(valuesEqual(numberValue(1), stringValue('1'))).toBe(false);
    expect(valuesEqual(dateValue(new Date(5)), dateValue(new Date(5)))).toBe(true);
  });

  it('treats empty values as falsy', () => {
    expect([NULL_VALUE, stringValue(''), numberValue(0), listValue([])].some(isTruthy)).toBe(false);
    expect([stringValue('x'), numberValue(-1), dateValue(new Date(0))].every(isTruthy)).toBe(true);
  });
});

describe('Row', () => {
  it('builds from objects and pairs, keeping field order', () => {
    expect(Row.from({ b: 1, a: 2 }).names()).toEqual(['b', 'a']);
    expect(Row.from([['x', 1], ['y', 'z']]).toPlainObject()).toEqual({ x: 1, y: 'z' });
  });

  it('rejects duplicate field names', () => {
    expect(() => Row.from([['a', 1], ['a', 2]])).toThrow('Duplicate field name "a"');
  });

  it('is frozen', () => {
    const row = Row.from({ a: 1 });
    expect(Object.isFrozen(row)).toBe(true);
    expect(Object.isFrozen(row.fields)).toBe(true);
  });

  it('looks up exact names first, then dotted paths', () => {
    const row = Row.from({ 'a.b': 'exact', a: { b: 'nested' }, tags: ['x', 'y'] });
    expect(row.lookup('a.b')).toEqual(stringValue('exact'));
    expect(row.lookup('tags.1')).toEqual(stringValue('y'));
    expect(row.lookup('tags.5')).toEqual(NULL_VALUE);
    expect(row.lookup('missing.path')).toEqual(NULL_VALUE);
  });

  it('selects and omits fields', () => {
    const row = Row.from({ a: 1, b: 2, c: 3 });
    expect(row.select(['c', 'a', 'zz', 'c']).toPlainObject()).toEqual({ c: 3, a: 1, zz: null });
    expect(row.select(['c', 'a']).names()).toEqual(['c', 'a']);
    expect(row.omit(['b']).names()).toEqual(['a', 'c']);
  });

  it('selects nested values by dotted path', () => {
    const row = Row.from({ id: 1, meta: { owner: 'ann' }, tags: ['x', 'y'] });
    expect(row.select(['id', 'meta.owner', 'tags.1']).toPlainObject()).toEqual({ id: 1, 'meta.owner': 'ann', 'tags.1': 'y' });
  });

  it('serializes dates as ISO strings', () => {
    expect(Row.from({ at: new Date('2024-05-06T07:08:09Z') }).toPlainObject()).toEqual({ at: '2024-05-06T07:08:09.000Z' });
  });
});
