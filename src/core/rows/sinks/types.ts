/**
 * Row sinks: the last step of a pipeline, formatting rows onto a destination.
 */

import type { OutputDestination } from '../destination.js';
import type { Row } from '../row.js';
import type { Buffering } from '../stages.js';

export const SINK_FORMATS = ['table', 'json', 'jsonl', 'yaml', 'csv', 'tsv', 'template'] as const;
export type SinkFormat = (typeof SINK_FORMATS)[number];

export interface RowSink {
  readonly format: SinkFormat;
  readonly buffering: Buffering;
  /** `index` counts rows that reached the sink, starting at 0. */
  write(row: Row, index: number): Promise<void>;
  /** Write whatever is buffered and end the destination. */
  close(): Promise<void>;
  /** Drop buffered rows without writing them. */
  discard(): void;
}

/**
 * Base for sinks that render all rows at close time.
 * Nothing reaches the destination before close().
 */
export abstract class BufferedSink implements RowSink {
  abstract readonly format: SinkFormat;
  readonly buffering: Buffering = 'buffered';
  private rows: Row[] = [];

  constructor(protected readonly destination: OutputDestination) {}

  async write(row: Row): Promise<void> {
    this.rows.push(row);
  }

  async close(): Promise<void> {
    const rows = this.rows;
    this.rows = [];
    const text = this.render(rows);
    if (text !== '') await this.destination.write(text);
    await this.destination.end();
  }

  discard(): void {
    this.rows = [];
  }

  protected abstract render(rows: readonly Row[]): string;
}
