/**
 * Command definitions.
 *
 * A command declares its layers and one of three run shapes, fixed when it
 * is defined:
 *   direct  returns a value to the caller
 *   writer  writes free-form text to the destination
 *   rows    emits structured rows through the output pipeline
 */

import type { ParameterLayer } from '../parameters/layer.js';
import type { ParsedLayers } from '../resolution/parsed-layers.js';
import type { OutputDestination } from '../rows/destination.js';
import type { RowEmitter } from '../rows/pipeline.js';

export interface CommandContext {
  signal?: AbortSignal;
}

interface CommandBase {
  readonly name: string;
  readonly description?: string;
  readonly layers: readonly ParameterLayer[];
}

export interface DirectCommand<R = unknown> extends CommandBase {
  readonly kind: 'direct';
  run(parsed: ParsedLayers, context: CommandContext): Promise<R>;
}

export interface WriterCommand extends CommandBase {
  readonly kind: 'writer';
  run(parsed: ParsedLayers, out: OutputDestination, context: CommandContext): Promise<void>;
}

export interface RowsCommand extends CommandBase {
  readonly kind: 'rows';
  run(parsed: ParsedLayers, rows: RowEmitter, context: CommandContext): Promise<void>;
}

export type Command<R = unknown> = DirectCommand<R> | WriterCommand | RowsCommand;

export type CommandKind = Command['kind'];
