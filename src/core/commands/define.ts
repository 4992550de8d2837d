/**
 * Command constructors. Layer sets are checked once, at definition time.
 */

import { OUTPUT_LAYER, createOutputLayer } from '../layers/output.js';
import { assertDistinctLayers, type ParameterLayer } from '../parameters/layer.js';
import { createTypeRegistry, type ParameterTypeRegistry } from '../parameters/registry.js';
import type { DirectCommand, RowsCommand, WriterCommand } from './types.js';

type Definition<C> = Omit<C, 'kind'>;

function freezeCommand<C extends { readonly layers: readonly ParameterLayer[] }>(command: C): C {
  assertDistinctLayers(command.layers);
  const frozen: C = { ...command, layers: Object.freeze([...command.layers]) };
  Object.freeze(frozen);
  return frozen;
}

export function defineDirectCommand<R>(definition: Definition<DirectCommand<R>>): DirectCommand<R> {
  return freezeCommand<DirectCommand<R>>({ ...definition, kind: 'direct' });
}

export function defineWriterCommand(definition: Definition<WriterCommand>): WriterCommand {
  return freezeCommand<WriterCommand>({ ...definition, kind: 'writer' });
}

/**
 * Define a row-producing command. The output layer is appended when the
 * command does not declare one, built against `registry` (or the registry
 * of the command's first layer).
 */
export function defineRowsCommand(
  definition: Definition<RowsCommand>,
  registry?: ParameterTypeRegistry,
): RowsCommand {
  const hasOutput = definition.layers.some(l => l.slug === OUTPUT_LAYER);
  const layers = hasOutput
    ? definition.layers
    : [...definition.layers, createOutputLayer(registry ?? definition.layers[0]?.registry ?? createTypeRegistry())];
  return freezeCommand<RowsCommand>({ ...definition, layers, kind: 'rows' });
}
