/**
 * Parameter layers: named, ordered, immutable groups of parameter definitions
 * for one logical concern (output formatting, database connection, ...).
 */

import { ParameterDefinitionError } from '../errors.js';
import type { ParameterDefinition, ParameterLayerInput } from '../../types/parameters.js';
import { NAME_RE, defineParameter } from './definition.js';
import type { ParameterTypeRegistry } from './registry.js';

export class ParameterLayer {
  readonly slug: string;
  readonly name: string;
  readonly description?: string;
  readonly flagPrefix: string;
  /** Definitions in declaration order. */
  readonly definitions: readonly ParameterDefinition[];
  /** The registry this layer's definitions were checked against. */
  readonly registry: ParameterTypeRegistry;

  private readonly byName: ReadonlyMap<string, ParameterDefinition>;

  constructor(registry: ParameterTypeRegistry, input: ParameterLayerInput) {
    if (!NAME_RE.test(input.slug)) {
      throw new ParameterDefinitionError(
        `Layer slug "${input.slug}" must be kebab-case and start with a letter`,
        { layer: input.slug },
      );
    }

    const byName = new Map<string, ParameterDefinition>();
    const shortFlags = new Set<string>();
    for (const parameter of input.parameters) {
      if (byName.has(parameter.name)) {
        throw new ParameterDefinitionError(
          `Duplicate parameter "${parameter.name}" in layer "${input.slug}"`,
          { layer: input.slug, parameter: parameter.name },
        );
      }
      if (parameter.shortFlag !== undefined) {
        if (shortFlags.has(parameter.shortFlag)) {
          throw new ParameterDefinitionError(
            `Short flag -${parameter.shortFlag} used twice in layer "${input.slug}"`,
            { layer: input.slug, parameter: parameter.name },
          );
        }
        shortFlags.add(parameter.shortFlag);
      }
      byName.set(parameter.name, defineParameter(registry, input.slug, parameter));
    }

    this.slug = input.slug;
    this.name = input.name;
    this.description = input.description;
    this.flagPrefix = input.flagPrefix ?? '';
    this.definitions = Object.freeze([...byName.values()]);
    this.registry = registry;
    this.byName = byName;
    Object.freeze(this);
  }

  /** Look up a definition by parameter name. */
  get(name: string): ParameterDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** CLI flag name (without dashes) for a parameter of this layer. */
  flagName(name: string): string {
    return `${this.flagPrefix}${name}`;
  }
}

/** Create a layer against an explicit type registry. */
export function createLayer(registry: ParameterTypeRegistry, input: ParameterLayerInput): ParameterLayer {
  return new ParameterLayer(registry, input);
}

/**
 * Check that a set of layers can be used together in one command:
 * slugs are unique.
 */
export function assertDistinctLayers(layers: readonly ParameterLayer[]): void {
  const seen = new Set<string>();
  for (const layer of layers) {
    if (seen.has(layer.slug)) {
      throw new ParameterDefinitionError(`Layer "${layer.slug}" declared twice`, { layer: layer.slug });
    }
    seen.add(layer.slug);
  }
}
