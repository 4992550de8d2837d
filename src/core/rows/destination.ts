/**
 * Output destinations: where sinks write their formatted text.
 */

import type { Writable } from 'node:stream';
import { SinkWriteError } from '../errors.js';

export interface OutputDestination {
  /** Resolves once the chunk has been handed to the underlying resource. */
  write(chunk: string): Promise<void>;
  end(): Promise<void>;
}

export interface StreamDestinationOptions {
  /** End the stream on end(). Leave false for stdout/stderr. */
  end?: boolean;
}

function toWriteError(err: unknown): SinkWriteError {
  const reason = err instanceof Error ? err.message : String(err);
  return new SinkWriteError(`Failed to write output: ${reason}`, { cause: err });
}

/**
 * Wrap a Node writable stream. Each write waits for the stream to accept the
 * chunk, which gives producers backpressure through `await addRow()`.
 */
export function streamDestination(stream: Writable, options: StreamDestinationOptions = {}): OutputDestination {
  let failure: unknown;
  stream.on('error', err => {
    failure = err;
  });

  return {
    write(chunk) {
      if (failure !== undefined) return Promise.reject(toWriteError(failure));
      if (chunk === '') return Promise.resolve();
      return new Promise<void>((resolve, reject) => {
        stream.write(chunk, err => {
          if (err) reject(toWriteError(err));
          else resolve();
        });
      });
    },
    end() {
      if (failure !== undefined) return Promise.reject(toWriteError(failure));
      if (!options.end) return Promise.resolve();
      return new Promise<void>((resolve, reject) => {
        stream.end(() => {
          if (failure !== undefined) reject(toWriteError(failure));
          else resolve();
        });
      });
    },
  };
}

export interface MemoryDestination extends OutputDestination {
  readonly ended: boolean;
  text(): string;
}

/** Collects output in memory. Used by tests and by callers that post-process text. */
export function memoryDestination(): MemoryDestination {
  const chunks: string[] = [];
  let ended = false;
  return {
    get ended() {
      return ended;
    },
    async write(chunk) {
      if (ended) throw new SinkWriteError('Destination already ended');
      chunks.push(chunk);
    },
    async end() {
      ended = true;
    },
    text() {
      return chunks.join('');
    },
  };
}
