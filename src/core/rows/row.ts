/**
 * Row: one structured record of a data-producing command.
 *
 * An ordered list of uniquely named fields. Rows are frozen at creation and
 * every transformation returns a new Row.
 */

import { RowFormatError } from '../errors.js';
import {
  NULL_VALUE,
  childValue,
  toPlain,
  toRowValue,
  type PlainValue,
  type RowValue,
} from './value.js';

export interface RowField {
  readonly name: string;
  readonly value: RowValue;
}

/** Anything a producer may hand to the pipeline. */
export type RowInput =
  | Row
  | ReadonlyArray<readonly [string, unknown]>
  | Readonly<Record<string, unknown>>;

function isEntryList(input: RowInput): input is ReadonlyArray<readonly [string, unknown]> {
  return Array.isArray(input);
}

export class Row {
  readonly fields: readonly RowField[];
  private readonly index: ReadonlyMap<string, RowValue>;

  private constructor(fields: readonly RowField[]) {
    const index = new Map<string, RowValue>();
    for (const field of fields) {
      if (index.has(field.name)) {
        throw new RowFormatError(field.name, `Duplicate field name "${field.name}"`);
      }
      index.set(field.name, field.value);
    }
    this.fields = Object.freeze(fields.map(f => Object.freeze({ name: f.name, value: f.value })));
    this.index = index;
    Object.freeze(this);
  }

  /** Build a row from typed fields. Duplicate names raise RowFormatError. */
  static fromFields(fields: readonly RowField[]): Row {
    return new Row(fields);
  }

  /**
   * Build a row from a plain object or [name, value] pairs, converting values
   * with toRowValue. A Row is returned as is.
   */
  static from(input: RowInput): Row {
    if (input instanceof Row) return input;
    const entries: ReadonlyArray<readonly [string, unknown]> = isEntryList(input)
      ? input
      : Object.entries(input);
    return new Row(entries.map(([name, value]) => ({ name, value: toRowValue(value, name) })));
  }

  get size(): number {
    return this.fields.length;
  }

  names(): string[] {
    return this.fields.map(f => f.name);
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  get(name: string): RowValue | undefined {
    return this.index.get(name);
  }

  /**
   * Resolve a field path. An exact field name wins; otherwise the path is
   * split on '.' and followed through nested maps and lists. Missing → null.
   */
  lookup(path: string): RowValue {
    const exact = this.index.get(path);
    if (exact) return exact;
    const [head, ...rest] = path.split('.');
    let current = (head !== undefined ? this.index.get(head) : undefined) ?? NULL_VALUE;
    for (const segment of rest) {
      current = childValue(current, segment);
    }
    return current;
  }

  /**
   * Project onto the given names in order, each resolved with lookup() so
   * dotted paths reach nested values. Unknown names become null fields.
   */
  select(names: readonly string[]): Row {
    const unique = [...new Set(names)];
    return new Row(unique.map(name => ({ name, value: this.lookup(name) })));
  }

  /** Drop the given field names. */
  omit(names: readonly string[]): Row {
    const drop = new Set(names);
    return new Row(this.fields.filter(f => !drop.has(f.name)));
  }

  /** JSON-compatible object in field order. */
  toPlainObject(): Record<string, PlainValue> {
    const out: Record<string, PlainValue> = {};
    for (const field of this.fields) out[field.name] = toPlain(field.value);
    return out;
  }
}
