/**
 * Row stages: the transformations between a producer and a sink.
 *
 * A stage receives rows through push() and forwards zero or more rows to the
 * next stage through `emit`. Buffering stages hold rows until flush().
 * Either side may answer 'stop' to signal that no further rows are wanted.
 */

import { ParameterDefinitionError } from '../errors.js';
import { compileFilter, type RowPredicate } from './filter-expression.js';
import type { Row } from './row.js';
import { compareValues } from './value.js';

export type Buffering = 'streaming' | 'buffered';
export type StageSignal = 'continue' | 'stop';
export type Emit = (row: Row) => Promise<StageSignal>;

export interface RowStage {
  readonly name: string;
  readonly buffering: Buffering;
  push(row: Row, emit: Emit): Promise<StageSignal>;
  flush(emit: Emit): Promise<void>;
}

const noFlush = async (): Promise<void> => {};

/** Keep rows matching an expression or predicate. */
export function filterStage(filter: string | RowPredicate): RowStage {
  const predicate = typeof filter === 'string' ? compileFilter(filter) : filter;
  return {
    name: 'filter',
    buffering: 'streaming',
    async push(row, emit) {
      return predicate(row) ? emit(row) : 'continue';
    },
    flush: noFlush,
  };
}

export interface ColumnsOptions {
  /** Fields to keep, in output order. Unknown names yield null. */
  fields?: readonly string[];
  /** Fields to drop (applied after `fields`). */
  exclude?: readonly string[];
}

export function columnsStage(options: ColumnsOptions): RowStage {
  const fields = options.fields && options.fields.length > 0 ? options.fields : undefined;
  const exclude = options.exclude ?? [];
  return {
    name: 'columns',
    buffering: 'streaming',
    async push(row, emit) {
      let out = fields ? row.select(fields) : row;
      if (exclude.length > 0) out = out.omit(exclude);
      return emit(out);
    },
    flush: noFlush,
  };
}

export interface SortKey {
  field: string;
  descending: boolean;
}

/** Problem with a `field` / `-field` sort spec, or undefined. */
export function checkSortKey(spec: string): string | undefined {
  return spec === '' || spec === '-' ? `invalid sort key "${spec}"` : undefined;
}

/** Parse a `field` / `-field` sort spec. */
export function parseSortKey(spec: string): SortKey {
  const problem = checkSortKey(spec);
  if (problem) throw new ParameterDefinitionError(problem);
  const descending = spec.startsWith('-');
  return { field: descending ? spec.slice(1) : spec, descending };
}

/** Stable multi-key sort. Buffers every row until flush. */
export function sortStage(keys: readonly (string | SortKey)[]): RowStage {
  const sortKeys = keys.map(k => (typeof k === 'string' ? parseSortKey(k) : k));
  let rows: Row[] = [];

  return {
    name: 'sort',
    buffering: 'buffered',
    async push(row) {
      rows.push(row);
      return 'continue';
    },
    async flush(emit) {
      const sorted = rows
        .map((row, position) => ({ row, position }))
        .sort((a, b) => {
          for (const key of sortKeys) {
            const diff = compareValues(a.row.lookup(key.field), b.row.lookup(key.field));
            if (diff !== 0) return key.descending ? -diff : diff;
          }
          return a.position - b.position;
        });
      rows = [];
      for (const { row } of sorted) {
        if ((await emit(row)) === 'stop') return;
      }
    },
  };
}

export interface LimitOptions {
  limit?: number;
  offset?: number;
}

/** Skip `offset` rows, then pass at most `limit` rows. */
export function limitStage(options: LimitOptions): RowStage {
  const limit = options.limit;
  let skip = options.offset ?? 0;
  let passed = 0;

  return {
    name: 'limit',
    buffering: 'streaming',
    async push(row, emit) {
      if (limit !== undefined && passed >= limit) return 'stop';
      if (skip > 0) {
        skip--;
        return 'continue';
      }
      passed++;
      const signal = await emit(row);
      if (limit !== undefined && passed >= limit) return 'stop';
      return signal;
    },
    flush: noFlush,
  };
}
