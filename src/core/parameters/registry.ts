/**
 * Parameter type registry.
 *
 * Each parameter kind owns a parser (raw → typed value), a validator for
 * definition constraints, and an optional zero value. Parsers never return
 * partial values: any input outside a kind's grammar is a failed ParseResult.
 *
 * The registry is an explicit object built once at process start and passed
 * to layer construction. There is no ambient global registry.
 */

import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import type {
  FileData,
  ParameterDefinition,
  ParameterKind,
  ParameterValue,
  ParameterValueMap,
} from '../../types/parameters.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/** Parse, validate and zero-value rules for one parameter kind. */
export interface ParameterTypeHandler<K extends ParameterKind> {
  readonly kind: K;
  /** Human-readable type name used in error messages. */
  readonly label: string;
  /** List kinds gather repeated CLI occurrences into one value. */
  readonly multiple: boolean;
  /** File-backed kinds read the filesystem while parsing. */
  readonly fileBacked: boolean;
  parse(raw: unknown, definition: ParameterDefinition): ParseResult<ParameterValueMap[K]>;
  validate(value: ParameterValueMap[K], definition: ParameterDefinition): string | undefined;
  zero?: () => ParameterValueMap[K];
}

export type TypeHandlers = { [K in ParameterKind]: ParameterTypeHandler<K> };

// ---------------------------------------------------------------------------
// Grammar helpers
// ---------------------------------------------------------------------------

const ok = <T>(value: T): ParseResult<T> => ({ ok: true, value });
const fail = <T>(reason: string): ParseResult<T> => ({ ok: false, reason });

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

/**
 * Expand a raw list into items. Strings split on commas (trimmed, empties
 * dropped); arrays have each string element split the same way.
 */
export function splitList(raw: unknown): ParseResult<unknown[]> {
  const split = (s: string): string[] => s.split(',').map(p => p.trim()).filter(p => p !== '');
  if (typeof raw === 'string') return ok(split(raw));
  if (Array.isArray(raw)) {
    return ok(raw.flatMap((item: unknown) => (typeof item === 'string' ? split(item) : [item])));
  }
  return fail('expected a list or a comma-separated string');
}

function parseString(raw: unknown): ParseResult<string> {
  if (typeof raw === 'string') return ok(raw);
  if (typeof raw === 'number' && Number.isFinite(raw)) return ok(String(raw));
  if (typeof raw === 'boolean') return ok(String(raw));
  return fail('expected a string');
}

function parseInteger(raw: unknown): ParseResult<number> {
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) ? ok(raw) : fail('expected an integer');
  }
  if (typeof raw === 'string' && INT_RE.test(raw.trim())) {
    const n = Number(raw.trim());
    return Number.isSafeInteger(n) ? ok(n) : fail('integer out of range');
  }
  return fail('expected an integer');
}

function parseFloatValue(raw: unknown): ParseResult<number> {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? ok(raw) : fail('expected a finite number');
  }
  if (typeof raw === 'string' && FLOAT_RE.test(raw.trim())) {
    const n = Number(raw.trim());
    return Number.isFinite(n) ? ok(n) : fail('number out of range');
  }
  return fail('expected a number');
}

function parseBool(raw: unknown): ParseResult<boolean> {
  if (typeof raw === 'boolean') return ok(raw);
  if (raw === 1 || raw === 0) return ok(raw === 1);
  if (typeof raw === 'string') {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return ok(true);
    if (FALSE_WORDS.has(word)) return ok(false);
  }
  return fail('expected true/false, yes/no, on/off or 1/0');
}

function parseDate(raw: unknown): ParseResult<Date> {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? fail('invalid date') : ok(new Date(raw.getTime()));
  }
  const text = typeof raw === 'string' ? raw.trim() : undefined;
  const match = text === undefined ? null : DATE_RE.exec(text);
  if (text !== undefined && match) {
    const date = new Date(text);
    if (Number.isNaN(date.getTime())) return fail('invalid date');
    // new Date() rolls 02-30 over to 03-01.
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const calendar = new Date(0);
    calendar.setUTCFullYear(year, month - 1, day);
    if (
      calendar.getUTCFullYear() !== year ||
      calendar.getUTCMonth() + 1 !== month ||
      calendar.getUTCDate() !== day
    ) {
      return fail(`${text.slice(0, 10)} is not a calendar date`);
    }
    return ok(date);
  }
  return fail('expected an ISO-8601 date');
}

function readFileData(path: unknown): ParseResult<FileData> {
  if (typeof path !== 'string' || path === '') return fail('expected a file path');
  try {
    const content = readFileSync(path, 'utf8');
    return ok({
      path,
      baseName: basename(path),
      extension: extname(path),
      content,
      size: Buffer.byteLength(content, 'utf8'),
    });
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? String(err.code) : 'unknown error';
    return fail(`cannot read file "${path}" (${code})`);
  }
}

/** Parse every item of a list with an item parser; first failure wins. */
function parseEach<T>(raw: unknown, item: (value: unknown) => ParseResult<T>): ParseResult<T[]> {
  const items = splitList(raw);
  if (!items.ok) return items;
  const out: T[] = [];
  for (const [i, value] of items.value.entries()) {
    const parsed = item(value);
    if (!parsed.ok) return fail(`item ${i}: ${parsed.reason}`);
    out.push(parsed.value);
  }
  return ok(out);
}

function parseKeyValue(raw: unknown): ParseResult<Record<string, string>> {
  const out: Record<string, string> = {};
  if (raw !== null && typeof raw === 'object' && !Array.isArray(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      const str = parseString(value);
      if (!str.ok) return fail(`value of "${key}" must be a scalar`);
      out[key] = str.value;
    }
    return ok(out);
  }
  const items = splitList(raw);
  if (!items.ok) return fail('expected key=value pairs');
  for (const item of items.value) {
    if (typeof item !== 'string') return fail('expected key=value pairs');
    const eq = item.indexOf('=');
    const sep = eq >= 0 ? eq : item.indexOf(':');
    if (sep <= 0) return fail(`"${item}" is not a key=value pair`);
    out[item.slice(0, sep).trim()] = item.slice(sep + 1).trim();
  }
  return ok(out);
}

// ---------------------------------------------------------------------------
// Constraint checks
// ---------------------------------------------------------------------------

function checkRange(value: number, def: ParameterDefinition): string | undefined {
  if (def.min !== undefined && value < def.min) return `${value} is less than the minimum ${def.min}`;
  if (def.max !== undefined && value > def.max) return `${value} is greater than the maximum ${def.max}`;
  return undefined;
}

function checkPattern(value: string, def: ParameterDefinition): string | undefined {
  if (def.pattern === undefined) return undefined;
  return new RegExp(def.pattern).test(value) ? undefined : `"${value}" does not match /${def.pattern}/`;
}

/** Pattern check that keeps the value itself out of the message. */
function checkSecretPattern(value: string, def: ParameterDefinition): string | undefined {
  if (def.pattern === undefined) return undefined;
  return new RegExp(def.pattern).test(value) ? undefined : `value does not match /${def.pattern}/`;
}

function checkChoice(value: string, def: ParameterDefinition): string | undefined {
  const choices = def.choices ?? [];
  return choices.includes(value) ? undefined : `"${value}" is not one of: ${choices.join(', ')}`;
}

function checkExtension(file: FileData, def: ParameterDefinition): string | undefined {
  if (!def.extensions?.length) return undefined;
  const allowed = def.extensions.map(e => (e.startsWith('.') ? e : `.${e}`).toLowerCase());
  return allowed.includes(file.extension.toLowerCase())
    ? undefined
    : `"${file.path}" must have one of the extensions: ${allowed.join(', ')}`;
}

function firstProblem<T>(items: readonly T[], check: (item: T) => string | undefined): string | undefined {
  for (const item of items) {
    const problem = check(item);
    if (problem) return problem;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Built-in handlers
// ---------------------------------------------------------------------------

const noChecks = (): undefined => undefined;

export const BUILTIN_HANDLERS: TypeHandlers = {
  'string': {
    kind: 'string', label: 'string', multiple: false, fileBacked: false,
    parse: parseString,
    validate: checkPattern,
  },
  'secret': {
    kind: 'secret', label: 'secret', multiple: false, fileBacked: false,
    parse: parseString,
    validate: checkSecretPattern,
  },
  'int': {
    kind: 'int', label: 'integer', multiple: false, fileBacked: false,
    parse: parseInteger,
    validate: checkRange,
  },
  'float': {
    kind: 'float', label: 'float', multiple: false, fileBacked: false,
    parse: parseFloatValue,
    validate: checkRange,
  },
  'bool': {
    kind: 'bool', label: 'boolean', multiple: false, fileBacked: false,
    parse: parseBool,
    validate: noChecks,
    zero: () => false,
  },
  'date': {
    kind: 'date', label: 'date', multiple: false, fileBacked: false,
    parse: parseDate,
    validate: noChecks,
  },
  'string-list': {
    kind: 'string-list', label: 'list of strings', multiple: true, fileBacked: false,
    parse: raw => parseEach(raw, parseString),
    validate: (values, def) => firstProblem(values, v => checkPattern(v, def)),
    zero: () => [],
  },
  'int-list': {
    kind: 'int-list', label: 'list of integers', multiple: true, fileBacked: false,
    parse: raw => parseEach(raw, parseInteger),
    validate: (values, def) => firstProblem(values, v => checkRange(v, def)),
    zero: () => [],
  },
  'float-list': {
    kind: 'float-list', label: 'list of floats', multiple: true, fileBacked: false,
    parse: raw => parseEach(raw, parseFloatValue),
    validate: (values, def) => firstProblem(values, v => checkRange(v, def)),
    zero: () => [],
  },
  'choice': {
    kind: 'choice', label: 'choice', multiple: false, fileBacked: false,
    parse: parseString,
    validate: checkChoice,
  },
  'choice-list': {
    kind: 'choice-list', label: 'list of choices', multiple: true, fileBacked: false,
    parse: raw => parseEach(raw, parseString),
    validate: (values, def) => firstProblem(values, v => checkChoice(v, def)),
    zero: () => [],
  },
  'file': {
    kind: 'file', label: 'file', multiple: false, fileBacked: true,
    parse: readFileData,
    validate: checkExtension,
  },
  'file-list': {
    kind: 'file-list', label: 'list of files', multiple: true, fileBacked: true,
    parse: raw => parseEach(raw, readFileData),
    validate: (files, def) => firstProblem(files, f => checkExtension(f, def)),
    zero: () => [],
  },
  'string-from-file': {
    kind: 'string-from-file', label: 'file contents', multiple: false, fileBacked: true,
    parse: raw => {
      const file = readFileData(raw);
      return file.ok ? ok(file.value.content) : file;
    },
    validate: checkPattern,
  },
  'string-list-from-file': {
    kind: 'string-list-from-file', label: 'lines of a file', multiple: false, fileBacked: true,
    parse: raw => {
      const file = readFileData(raw);
      if (!file.ok) return file;
      return ok(
        file.value.content
          .split('\n')
          .map(line => line.replace(/\r$/, ''))
          .filter(line => line !== ''),
      );
    },
    validate: (lines, def) => firstProblem(lines, l => checkPattern(l, def)),
    zero: () => [],
  },
  'key-value': {
    kind: 'key-value', label: 'key=value map', multiple: true, fileBacked: false,
    parse: parseKeyValue,
    validate: noChecks,
    zero: () => ({}),
  },
};

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** Immutable lookup of parameter type handlers by kind. */
export class ParameterTypeRegistry {
  private readonly handlers: TypeHandlers;

  constructor(handlers: TypeHandlers) {
    this.handlers = Object.freeze({ ...handlers });
  }

  /** Get the handler for a kind. */
  get<K extends ParameterKind>(kind: K): ParameterTypeHandler<K> {
    return this.handlers[kind];
  }

  /** Check whether a string names a registered kind. */
  has(kind: string): kind is ParameterKind {
    return Object.prototype.hasOwnProperty.call(this.handlers, kind);
  }

  /** Parse a raw value with the definition's kind. */
  parse(definition: ParameterDefinition, raw: unknown): ParseResult<ParameterValue> {
    const handler: ParameterTypeHandler<ParameterKind> = this.get(definition.type);
    return handler.parse(raw, definition);
  }

  /**
   * Run type-level then definition-level validation.
   * Returns the first problem found, or undefined.
   */
  validate(definition: ParameterDefinition, value: ParameterValue): string | undefined {
    const handler: ParameterTypeHandler<ParameterKind> = this.get(definition.type);
    return handler.validate(value, definition) ?? definition.validate?.(value);
  }

  /** Zero value for the definition's kind, if the kind has one. */
  zero(definition: ParameterDefinition): ParameterValue | undefined {
    const handler: ParameterTypeHandler<ParameterKind> = this.get(definition.type);
    return handler.zero?.();
  }
}

/**
 * Create a type registry with the built-in handlers, optionally replacing
 * some of them (for example a locale-specific date parser).
 */
export function createTypeRegistry(overrides: Partial<TypeHandlers> = {}): ParameterTypeRegistry {
  return new ParameterTypeRegistry({ ...BUILTIN_HANDLERS, ...overrides });
}
