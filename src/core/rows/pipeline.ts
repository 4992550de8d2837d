/**
 * Row pipeline: producer → stages → sink → destination.
 *
 * States:
 *   open ──addRow──▶ receiving ──close──▶ closed
 *                        │
 *                        ├── sink/destination error ──▶ failed
 *                        └── signal aborted ──────────▶ cancelled
 *
 * Rows pass through one at a time; `await addRow()` resolves once the row has
 * been handled by every streaming step, so a slow destination slows the
 * producer down.
 */

import {
  CancellationError,
  PipelineStateError,
  RowFormatError,
  SinkWriteError,
} from '../errors.js';
import { getLogger } from '../logger.js';
import { Row, type RowInput } from './row.js';
import type { RowSink } from './sinks/types.js';
import type { Buffering, Emit, RowStage, StageSignal } from './stages.js';

export type PipelineState = 'open' | 'receiving' | 'closed' | 'failed' | 'cancelled';

export interface RowPipelineOptions {
  sink: RowSink;
  stages?: readonly RowStage[];
  signal?: AbortSignal;
}

/** What a row-producing command sees of the pipeline. */
export interface RowEmitter {
  /** Resolves false once no further rows are wanted. */
  addRow(input: RowInput): Promise<boolean>;
}

export class RowPipeline implements RowEmitter {
  readonly stages: readonly RowStage[];
  readonly sink: RowSink;
  private readonly signal?: AbortSignal;
  private readonly emitters: readonly Emit[];
  private current: PipelineState = 'open';
  private received = 0;
  private written = 0;
  private stopped = false;

  constructor(options: RowPipelineOptions) {
    this.sink = options.sink;
    this.stages = Object.freeze([...(options.stages ?? [])]);
    this.signal = options.signal;

    // emitters[i] feeds stage i; the last one feeds the sink.
    const emitters: Emit[] = [];
    // Cancellation is checked before every sink write, flushes included.
    emitters[this.stages.length] = async row => {
      this.checkCancelled();
      await this.sink.write(row, this.written);
      this.written++;
      return 'continue';
    };
    for (let i = this.stages.length - 1; i >= 0; i--) {
      const stage = this.stages[i];
      const next = emitters[i + 1];
      if (!stage || !next) continue;
      emitters[i] = row => stage.push(row, next);
    }
    this.emitters = emitters;
  }

  get state(): PipelineState {
    return this.current;
  }

  /** 'buffered' when any stage or the sink holds rows until close. */
  get buffering(): Buffering {
    const all = [...this.stages.map(s => s.buffering), this.sink.buffering];
    return all.includes('buffered') ? 'buffered' : 'streaming';
  }

  /** Rows accepted by addRow so far. */
  get rowsReceived(): number {
    return this.received;
  }

  /** Rows that reached the sink so far. */
  get rowsWritten(): number {
    return this.written;
  }

  async addRow(input: RowInput): Promise<boolean> {
    this.assertState('addRow', ['open', 'receiving']);
    this.checkCancelled();
    this.current = 'receiving';

    let row: Row;
    try {
      row = Row.from(input);
    } catch (err) {
      // Malformed input rows are rejected without ending the pipeline.
      if (err instanceof RowFormatError) throw err.atRow(this.received);
      throw err;
    }
    const index = this.received;
    this.received++;
    if (this.stopped) return false;

    const head = this.emitters[0];
    if (!head) return true;
    const signal = await this.guard(() => head(row), index);
    if (signal === 'stop') {
      this.stopped = true;
      getLogger('pipeline').debug({ rows: this.received }, 'row limit reached');
    }
    return !this.stopped;
  }

  /** Flush buffering stages, finalize the sink and end the destination. Idempotent. */
  async close(): Promise<void> {
    if (this.current === 'closed') return;
    this.assertState('close', ['open', 'receiving']);
    this.checkCancelled();

    await this.guard(async () => {
      for (let i = 0; i < this.stages.length; i++) {
        const stage = this.stages[i];
        const next = this.emitters[i + 1];
        if (stage && next) await stage.flush(next);
      }
      this.checkCancelled();
      await this.sink.close();
      return 'continue';
    }, this.written);

    this.current = 'closed';
    getLogger('pipeline').debug(
      { format: this.sink.format, received: this.received, written: this.written },
      'pipeline closed',
    );
  }

  /**
   * Abandon the pipeline after a producer error: buffered output is dropped
   * and nothing more is written.
   */
  abort(): void {
    if (this.current === 'open' || this.current === 'receiving') {
      this.current = 'failed';
      this.sink.discard();
    }
  }

  private assertState(operation: string, allowed: readonly PipelineState[]): void {
    if (!allowed.includes(this.current)) {
      throw new PipelineStateError(this.current, `Cannot ${operation} on a ${this.current} pipeline`);
    }
  }

  private checkCancelled(): void {
    if (!this.signal?.aborted) return;
    this.current = 'cancelled';
    this.sink.discard();
    getLogger('pipeline').debug({ rows: this.received }, 'pipeline cancelled');
    throw new CancellationError(this.received, this.signal.reason);
  }

  /** Run a step; any failure other than cancellation moves the pipeline to failed. */
  private async guard(step: () => Promise<StageSignal>, index: number): Promise<StageSignal> {
    try {
      return await step();
    } catch (err) {
      if (err instanceof CancellationError) throw err;
      this.current = 'failed';
      this.sink.discard();
      getLogger('pipeline').debug({ err, rowIndex: index }, 'pipeline failed');
      if (err instanceof RowFormatError) throw err.atRow(index);
      if (err instanceof SinkWriteError && err.rowIndex === undefined) {
        throw new SinkWriteError(err.message, { rowIndex: index, cause: err.cause });
      }
      throw err;
    }
  }
}

export function createRowPipeline(options: RowPipelineOptions): RowPipeline {
  return new RowPipeline(options);
}
