/**
 * Commander glue for parameter layers.
 *
 * Each definition becomes one option: `--<flagPrefix><name>`, plus
 * `-<shortFlag>` when declared. List kinds collect repeated occurrences,
 * booleans take an optional value (`--color`, `--color false`). Values are
 * read back only for flags the user actually passed, so defaults stay with
 * the defaults source.
 */

import { Option, type Command } from 'commander';
import { ParameterDefinitionError, describeRaw } from '../core/errors.js';
import type { ParameterLayer } from '../core/parameters/layer.js';
import type { CliValues } from '../core/sources/providers.js';
import type { ParameterDefinition } from '../types/parameters.js';

interface BoundOption {
  layer: string;
  parameter: string;
  attribute: string;
}

const bindings = new WeakMap<Command, BoundOption[]>();

const collect = (value: string, previous: string[] | undefined): string[] => [...(previous ?? []), value];

function optionFor(layer: ParameterLayer, definition: ParameterDefinition): Option {
  const flag = layer.flagName(definition.name);
  const long = definition.type === 'bool' ? `--${flag} [value]` : `--${flag} <value>`;
  const flags = definition.shortFlag ? `-${definition.shortFlag}, ${long}` : long;

  let description = definition.help ?? '';
  if (definition.choices) description += ` (${definition.choices.join('|')})`;
  if (definition.default !== undefined) description += ` (default: ${describeRaw(definition.default)})`;
  if (definition.required) description += ' (required)';

  const option = new Option(flags, description.trim());
  if (layer.registry.get(definition.type).multiple) option.argParser(collect);
  return option;
}

/** Add one option per parameter of every layer to a Commander command. */
export function registerLayerOptions(command: Command, layers: readonly ParameterLayer[]): void {
  const bound: BoundOption[] = bindings.get(command) ?? [];
  const flags = new Map(bound.map(b => [b.attribute, `${b.layer}.${b.parameter}`]));

  for (const layer of layers) {
    for (const definition of layer.definitions) {
      const option = optionFor(layer, definition);
      const attribute = option.attributeName();
      const clash = flags.get(attribute);
      if (clash) {
        throw new ParameterDefinitionError(
          `Flag --${layer.flagName(definition.name)} of ${layer.slug}.${definition.name} clashes with ${clash}`,
          { layer: layer.slug, parameter: definition.name },
        );
      }
      flags.set(attribute, `${layer.slug}.${definition.name}`);
      command.addOption(option);
      bound.push({ layer: layer.slug, parameter: definition.name, attribute });
    }
  }
  bindings.set(command, bound);
}

function toCliValue(raw: unknown): string | string[] | undefined {
  if (typeof raw === 'string') return raw;
  if (raw === true) return 'true';
  if (Array.isArray(raw)) return raw.filter((item: unknown): item is string => typeof item === 'string');
  return undefined;
}

/** Values of the flags the user passed, keyed by layer slug and parameter name. */
export function collectCliValues(command: Command): CliValues {
  const values: Record<string, Record<string, string | string[]>> = {};
  const opts: Record<string, unknown> = command.opts();
  for (const bound of bindings.get(command) ?? []) {
    if (command.getOptionValueSource(bound.attribute) !== 'cli') continue;
    const value = toCliValue(opts[bound.attribute]);
    if (value === undefined) continue;
    (values[bound.layer] ??= {})[bound.parameter] = value;
  }
  return values;
}
