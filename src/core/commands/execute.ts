/**
 * Command execution: resolve parameters, then dispatch on the command kind.
 *
 * Nothing is written before resolution succeeds, so a bad parameter never
 * leaves partial output behind.
 */

import { getLogger } from '../logger.js';
import { shouldPrintParameters } from '../layers/command-settings.js';
import { OUTPUT_LAYER, createPipelineFromLayers } from '../layers/output.js';
import { describeParsedLayers } from '../resolution/describe.js';
import { resolveParameters } from '../resolution/engine.js';
import type { ParsedLayers } from '../resolution/parsed-layers.js';
import { SourceChain } from '../sources/chain.js';
import type { SourceProvider } from '../sources/providers.js';
import type { OutputDestination } from '../rows/destination.js';
import { RowPipeline } from '../rows/pipeline.js';
import { TableSink } from '../rows/sinks/table.js';
import type { Command, CommandContext } from './types.js';

export interface ExecuteOptions {
  /** A prepared chain, or providers to build one from. */
  sources: SourceChain | readonly SourceProvider[];
  destination: OutputDestination;
  signal?: AbortSignal;
}

export interface ExecutionResult<R> {
  parsed: ParsedLayers;
  /** Return value of a direct command. */
  value?: R;
  /** Rows written by a rows command (or by --print-parameters). */
  rowsWritten?: number;
  /** True when --print-parameters replaced the command run. */
  printedParameters: boolean;
}

/** Emit one row per resolved parameter through the command's output settings. */
async function printParameters(parsed: ParsedLayers, destination: OutputDestination, signal?: AbortSignal): Promise<number> {
  const pipeline = parsed.has(OUTPUT_LAYER)
    ? createPipelineFromLayers(parsed, destination, signal)
    : new RowPipeline({ sink: new TableSink(destination), signal });
  return drive(pipeline, async rows => {
    for (const description of describeParsedLayers(parsed)) {
      if (!(await rows.addRow(description))) break;
    }
  });
}

/** Run a producer against a pipeline; close on success, abandon on failure. */
async function drive(pipeline: RowPipeline, produce: (rows: RowPipeline) => Promise<void>): Promise<number> {
  try {
    await produce(pipeline);
  } catch (err) {
    pipeline.abort();
    throw err;
  }
  await pipeline.close();
  return pipeline.rowsWritten;
}

export async function executeCommand<R>(command: Command<R>, options: ExecuteOptions): Promise<ExecutionResult<R>> {
  const log = getLogger('cli');
  const chain = options.sources instanceof SourceChain ? options.sources : new SourceChain(options.sources);
  const parsed = await resolveParameters(command.layers, chain);
  const context: CommandContext = { signal: options.signal };

  if (shouldPrintParameters(parsed)) {
    const rowsWritten = await printParameters(parsed, options.destination, options.signal);
    return { parsed, rowsWritten, printedParameters: true };
  }

  log.debug({ command: command.name, kind: command.kind }, 'running command');
  switch (command.kind) {
    case 'direct': {
      const value = await command.run(parsed, context);
      return { parsed, value, printedParameters: false };
    }
    case 'writer': {
      await command.run(parsed, options.destination, context);
      await options.destination.end();
      return { parsed, printedParameters: false };
    }
    case 'rows': {
      const pipeline = createPipelineFromLayers(parsed, options.destination, options.signal);
      const rowsWritten = await drive(pipeline, rows =>
        command.run(parsed, { addRow: input => rows.addRow(input) }, context),
      );
      return { parsed, rowsWritten, printedParameters: false };
    }
  }
}
