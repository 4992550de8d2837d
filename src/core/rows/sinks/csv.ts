/**
 * CSV / TSV sink.
 *
 * Nested values are flattened into dotted columns (`meta.owner`, `tags.0`)
 * unless flattening is off, in which case they are rejected. Without explicit
 * columns the sink buffers to compute the union of columns. With them it
 * streams: each column expands to the flattened keys it has in the first row,
 * and a later row with a key outside that header is a RowFormatError.
 */

import { RowFormatError } from '../../errors.js';
import type { OutputDestination } from '../destination.js';
import type { Row } from '../row.js';
import type { Buffering } from '../stages.js';
import { formatValue, isScalar, type RowValue } from '../value.js';
import type { RowSink, SinkFormat } from './types.js';

export interface CsvSinkOptions {
  /** Field separator; ',' for csv, '\t' for tsv. */
  separator?: string;
  withHeaders?: boolean;
  flatten?: boolean;
  flattenSeparator?: string;
  columns?: readonly string[];
}

type FlatRecord = Map<string, string>;

function setCell(out: FlatRecord, field: string, key: string, text: string): void {
  if (out.has(key)) {
    throw new RowFormatError(field, `Field "${field}" flattens to column "${key}", which another field already fills`);
  }
  out.set(key, text);
}

function flattenInto(out: FlatRecord, field: string, key: string, value: RowValue, separator: string): void {
  if (value.kind === 'list') {
    if (value.items.length === 0) setCell(out, field, key, '');
    value.items.forEach((item, i) => flattenInto(out, field, `${key}${separator}${i}`, item, separator));
    return;
  }
  if (value.kind === 'map') {
    if (value.entries.length === 0) setCell(out, field, key, '');
    for (const [child, item] of value.entries) flattenInto(out, field, `${key}${separator}${child}`, item, separator);
    return;
  }
  setCell(out, field, key, formatValue(value));
}

/** RFC-4180 quoting: fields holding the separator, quotes or line breaks are quoted. */
export function quoteCell(text: string, separator: string): string {
  if (text.includes(separator) || /["\r\n]/.test(text)) {
    return '"' + text.replace(/"/g, '""') + '"';
  }
  return text;
}

export class CsvSink implements RowSink {
  readonly format: SinkFormat;
  readonly buffering: Buffering;
  private readonly separator: string;
  private readonly withHeaders: boolean;
  private readonly flatten: boolean;
  private readonly flattenSeparator: string;
  private readonly columns?: readonly string[];
  private records: FlatRecord[] = [];
  private header?: readonly string[];

  constructor(private readonly destination: OutputDestination, options: CsvSinkOptions = {}, format: SinkFormat = 'csv') {
    this.format = format;
    this.separator = options.separator ?? (format === 'tsv' ? '\t' : ',');
    this.withHeaders = options.withHeaders ?? true;
    this.flatten = options.flatten ?? true;
    this.flattenSeparator = options.flattenSeparator ?? '.';
    this.columns = options.columns && options.columns.length > 0 ? options.columns : undefined;
    this.buffering = this.columns ? 'streaming' : 'buffered';
  }

  async write(row: Row): Promise<void> {
    const record = this.toRecord(row);
    if (!this.columns) {
      this.records.push(record);
      return;
    }
    let header = this.header;
    if (!header) {
      header = this.expandColumns(this.columns, record);
      await this.writeHeader(header);
    } else {
      this.checkAgainstHeader(this.columns, header, record);
    }
    await this.destination.write(this.line(header, record));
  }

  async close(): Promise<void> {
    if (this.columns) {
      if (!this.header) await this.writeHeader(this.columns);
    } else if (this.records.length > 0) {
      const columns = this.unionColumns();
      let text = this.withHeaders ? this.headerLine(columns) : '';
      for (const record of this.records) text += this.line(columns, record);
      this.records = [];
      await this.destination.write(text);
    }
    await this.destination.end();
  }

  discard(): void {
    this.records = [];
  }

  private toRecord(row: Row): FlatRecord {
    const record: FlatRecord = new Map();
    for (const { name, value } of row.fields) {
      if (isScalar(value)) {
        setCell(record, name, name, formatValue(value));
      } else if (this.flatten) {
        flattenInto(record, name, name, value, this.flattenSeparator);
      } else {
        throw new RowFormatError(name, `Field "${name}" holds a nested value and flattening is disabled`);
      }
    }
    return record;
  }

  private unionColumns(): string[] {
    const seen = new Set<string>();
    for (const record of this.records) {
      for (const key of record.keys()) seen.add(key);
    }
    return [...seen];
  }

  private owns(column: string, key: string): boolean {
    return key === column || key.startsWith(column + this.flattenSeparator);
  }

  /** Replace each declared column with the flattened keys it has in `record`. */
  private expandColumns(columns: readonly string[], record: FlatRecord): string[] {
    const keys = [...record.keys()];
    const expanded = new Set<string>();
    for (const column of columns) {
      const owned = keys.filter(key => this.owns(column, key));
      for (const key of owned.length > 0 ? owned : [column]) expanded.add(key);
    }
    return [...expanded];
  }

  private checkAgainstHeader(columns: readonly string[], header: readonly string[], record: FlatRecord): void {
    const known = new Set(header);
    for (const key of record.keys()) {
      if (known.has(key)) continue;
      const column = columns.find(c => this.owns(c, key));
      if (column !== undefined) {
        throw new RowFormatError(column, `Field "${column}" has column "${key}", which is not in the header`);
      }
    }
  }

  private async writeHeader(columns: readonly string[]): Promise<void> {
    this.header = columns;
    if (this.withHeaders) await this.destination.write(this.headerLine(columns));
  }

  private headerLine(columns: readonly string[]): string {
    return columns.map(c => quoteCell(c, this.separator)).join(this.separator) + '\n';
  }

  private line(columns: readonly string[], record: FlatRecord): string {
    return columns.map(c => quoteCell(record.get(c) ?? '', this.separator)).join(this.separator) + '\n';
  }
}
