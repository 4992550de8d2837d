/**
 * Tests for the parameter type registry: raw grammars, constraints, zero values.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createTypeRegistry, splitList } from '../registry.js';
import { defineParameter } from '../definition.js';
import type { ParameterDefinitionInput } from '../../../types/parameters.js';

const registry = createTypeRegistry();
const def = (input: ParameterDefinitionInput) => defineParameter(registry, 'test', input);

describe('splitList', () => {
  it('splits strings on commas, trimming and dropping empties', () => {
    expect(splitList('a, b,,c ')).toEqual({ ok: true, value: ['a', 'b', 'c'] });
  });

  it('splits string elements of arrays too', () => {
    expect(splitList(['a,b', 'c'])).toEqual({ ok: true, value: ['a', 'b', 'c'] });
  });

  it('rejects non-list input', () => {
    expect(splitList(42).ok).toBe(false);
  });
});

describe('parse', () => {
  it('parses base-10 integers from strings and numbers', () => {
    const d = def({ name: 'n', type: 'int' });
    expect(registry.parse(d, '42')).toEqual({ ok: true, value: 42 });
    expect(registry.parse(d, ' -7 ')).toEqual({ ok: true, value: -7 });
    expect(registry.parse(d, 12)).toEqual({ ok: true, value: 12 });
  });

  it('rejects non-integers', () => {
    const d = def({ name: 'n', type: 'int' });
    expect(registry.parse(d, '4.2')).toEqual({ ok: false, reason: 'expected an integer' });
    expect(registry.parse(d, 'abc').ok).toBe(false);
    expect(registry.parse(d, 1.5).ok).toBe(false);
  });

  it('parses floats', () => {
    const d = def({ name: 'ratio', type: 'float' });
    expect(registry.parse(d, '0.25')).toEqual({ ok: true, value: 0.25 });
    expect(registry.parse(d, '1e3')).toEqual({ ok: true, value: 1000 });
    expect(registry.parse(d, 'NaN').ok).toBe(false);
  });

  it('rejects floats that overflow to infinity', () => {
    const d = def({ name: 'ratio', type: 'float' });
    expect(registry.parse(d, '1e999')).toEqual({ ok: false, reason: 'number out of range' });
    expect(registry.parse(d, '-1e999')).toEqual({ ok: false, reason: 'number out of range' });
    expect(registry.parse(d, Infinity)).toEqual({ ok: false, reason: 'expected a finite number' });
  });

  it('parses boolean words case-insensitively', () => {
    const d = def({ name: 'flag', type: 'bool' });
    expect(registry.parse(d, 'YES')).toEqual({ ok: true, value: true });
    expect(registry.parse(d, 'off')).toEqual({ ok: true, value: false });
    expect(registry.parse(d, '1')).toEqual({ ok: true, value: true });
    expect(registry.parse(d, false)).toEqual({ ok: true, value: false });
    expect(registry.parse(d, 'maybe').ok).toBe(false);
  });

  it('parses ISO dates and rejects invalid ones', () => {
    const d = def({ name: 'since', type: 'date' });
    const parsed = registry.parse(d, '2024-03-01T10:00:00Z');
    expect(parsed.ok && parsed.value instanceof Date && parsed.value.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(registry.parse(d, '2024-13-45').ok).toBe(false);
    expect(registry.parse(d, 'yesterday')).toEqual({ ok: false, reason: 'expected an ISO-8601 date' });
  });

  it('rejects days the calendar does not have', () => {
    const d = def({ name: 'since', type: 'date' });
    expect(registry.parse(d, '2024-02-30')).toEqual({ ok: false, reason: '2024-02-30 is not a calendar date' });
    expect(registry.parse(d, '2023-02-29T08:00:00Z')).toEqual({ ok: false, reason: '2023-02-29 is not a calendar date' });
    const leap = registry.parse(d, '2024-02-29');
    expect(leap.ok && leap.value instanceof Date && leap.value.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('parses lists element by element', () => {
    expect(registry.parse(def({ name: 'ports', type: 'int-list' }), '80, 443')).toEqual({ ok: true, value: [80, 443] });
    expect(registry.parse(def({ name: 'ports', type: 'int-list' }), ['80', 'x'])).toEqual({
      ok: false,
      reason: 'item 1: expected an integer',
    });
    expect(registry.parse(def({ name: 'tags', type: 'string-list' }), ['a,b', 'c'])).toEqual({
      ok: true,
      value: ['a', 'b', 'c'],
    });
  });

  it('parses key-value pairs from strings and objects', () => {
    const d = def({ name: 'labels', type: 'key-value' });
    expect(registry.parse(d, 'env=prod, tier:web')).toEqual({ ok: true, value: { env: 'prod', tier: 'web' } });
    expect(registry.parse(d, ['a=1', 'a=2'])).toEqual({ ok: true, value: { a: '2' } });
    expect(registry.parse(d, { team: 'core', size: 3 })).toEqual({ ok: true, value: { team: 'core', size: '3' } });
    expect(registry.parse(d, 'novalue')).toEqual({ ok: false, reason: '"novalue" is not a key=value pair' });
  });

  describe('file kinds', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'stratum-registry-'));
      await writeFile(join(dir, 'notes.txt'), 'hello');
      await writeFile(join(dir, 'lines.txt'), 'a\r\nb\n\nc\n');
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads file data', () => {
      const path = join(dir, 'notes.txt');
      expect(registry.parse(def({ name: 'input', type: 'file' }), path)).toEqual({
        ok: true,
        value: { path, baseName: 'notes.txt', extension: '.txt', content: 'hello', size: 5 },
      });
    });

    it('reads file contents and non-empty lines', () => {
      expect(registry.parse(def({ name: 'body', type: 'string-from-file' }), join(dir, 'notes.txt'))).toEqual({
        ok: true,
        value: 'hello',
      });
      expect(registry.parse(def({ name: 'items', type: 'string-list-from-file' }), join(dir, 'lines.txt'))).toEqual({
        ok: true,
        value: ['a', 'b', 'c'],
      });
    });

    it('fails for a missing file', () => {
      const result = registry.parse(def({ name: 'input', type: 'file' }), join(dir, 'missing.txt'));
      expect(result.ok).toBe(false);
      expect(!result.ok && result.reason).toContain('ENOENT');
    });

    it('checks extensions', () => {
      const d = def({ name: 'input', type: 'file', extensions: ['md'] });
      const parsed = registry.parse(d, join(dir, 'notes.txt'));
      expect(parsed.ok).toBe(true);
      if (parsed.ok) {
        expect(registry.validate(d, parsed.value)).toContain('must have one of the extensions: .md');
      }
    });
  });
});

describe('validate', () => {
  it('checks numeric ranges on values and list elements', () => {
    const d = def({ name: 'n', type: 'int', min: 1, max: 10 });
    expect(registry.validate(d, 5)).toBeUndefined();
    expect(registry.validate(d, 11)).toBe('11 is greater than the maximum 10');
    expect(registry.validate(def({ name: 'ns', type: 'int-list', min: 0 }), [1, -1])).toBe(
      '-1 is less than the minimum 0',
    );
  });

  it('checks choices', () => {
    const d = def({ name: 'mode', type: 'choice', choices: ['a', 'b'] });
    expect(registry.validate(d, 'a')).toBeUndefined();
    expect(registry.validate(d, 'x')).toBe('"x" is not one of: a, b');
  });

  it('checks patterns', () => {
    const d = def({ name: 'code', type: 'string', pattern: '^[A-Z]{3}$' });
    expect(registry.validate(d, 'ABC')).toBeUndefined();
    expect(registry.validate(d, 'abc')).toBe('"abc" does not match /^[A-Z]{3}$/');
  });

  it('keeps secret values out of pattern failures', () => {
    const d = def({ name: 'token', type: 'secret', pattern: '^sk-' });
    expect(registry.validate(d, 'sk-test')).toBeUndefined();
    expect(registry.validate(d, 'test-secret')).toBe('value does not match /^sk-/');
  });

  it('runs the definition hook after type checks', () => {
    const d = def({
      name: 'even',
      type: 'int',
      validate: v => (typeof v === 'number' && v % 2 !== 0 ? 'must be even' : undefined),
    });
    expect(registry.validate(d, 4)).toBeUndefined();
    expect(registry.validate(d, 3)).toBe('must be even');
  });
});

describe('zero values', () => {
  it('exists only for bool, lists and key-value', () => {
    expect(registry.zero(def({ name: 'b', type: 'bool' }))).toBe(false);
    expect(registry.zero(def({ name: 'l', type: 'string-list' }))).toEqual([]);
    expect(registry.zero(def({ name: 'kv', type: 'key-value' }))).toEqual({});
    expect(registry.zero(def({ name: 's', type: 'string' }))).toBeUndefined();
    expect(registry.zero(def({ name: 'i', type: 'int' }))).toBeUndefined();
  });
});

describe('createTypeRegistry', () => {
  it('replaces built-in handlers with overrides', () => {
    const custom = createTypeRegistry({
      date: {
        kind: 'date', label: 'day', multiple: false, fileBacked: false,
        parse: raw => (raw === 'epoch' ? { ok: true, value: new Date(0) } : { ok: false, reason: 'unknown day' }),
        validate: () => undefined,
      },
    });
    const d = defineParameter(custom, 'test', { name: 'day', type: 'date' });
    expect(custom.parse(d, 'epoch')).toEqual({ ok: true, value: new Date(0) });
    expect(custom.parse(d, '2024-01-01')).toEqual({ ok: false, reason: 'unknown day' });
    expect(registry.parse(d, '2024-01-01').ok).toBe(true);
  });
});
