/**
 * Layer resolution engine.
 *
 * Turns the source chain's raw contributions into validated ParsedLayers.
 * Per layer, per definition:
 *   1. winning contribution, else definition default, else (required) error,
 *      else the type's zero value, else unset
 *   2. parse with the type's parser        → ParameterParseError
 *   3. type + definition validation        → ParameterValidationError
 *   4. record value, source and history
 *
 * Layers resolve independently. The first failure aborts the whole
 * resolution; a partial ParsedLayers is never returned.
 */

import {
  MissingRequiredParameterError,
  ParameterParseError,
  ParameterValidationError,
} from '../errors.js';
import { getLogger } from '../logger.js';
import type { ParameterDefinition, ValueOrigin } from '../../types/parameters.js';
import { assertDistinctLayers, type ParameterLayer } from '../parameters/layer.js';
import type { SourceChain } from '../sources/chain.js';
import type { ContributionStore } from '../sources/store.js';
import { SECRET_MASK } from './describe.js';
import { ParsedLayer, ParsedLayers, type Contribution, type ResolvedParameter } from './parsed-layers.js';

function maskSecret(text: string, value: unknown): string {
  return typeof value === 'string' && value !== '' ? text.split(value).join(SECRET_MASK) : text;
}

/** Resolve a single parameter; undefined when it stays unset. */
function resolveParameter(
  layer: ParameterLayer,
  definition: ParameterDefinition,
  store: ContributionStore,
): ResolvedParameter | undefined {
  const registry = layer.registry;
  const history: readonly Contribution[] = store.history(layer.slug, definition.name);
  let raw: unknown;
  let source: ValueOrigin;

  const winner = history[history.length - 1];
  if (winner) {
    raw = winner.value;
    source = winner.source;
  } else if (definition.default !== undefined) {
    raw = definition.default;
    source = 'defaults';
  } else if (definition.required) {
    throw new MissingRequiredParameterError(layer.slug, definition.name);
  } else {
    const zero = registry.zero(definition);
    if (zero === undefined) return undefined;
    return { definition, value: zero, source: 'zero', history };
  }

  const secret = definition.type === 'secret';
  const parsed = registry.parse(definition, raw);
  if (!parsed.ok) {
    throw new ParameterParseError(
      layer.slug,
      definition.name,
      secret ? SECRET_MASK : raw,
      registry.get(definition.type).label,
      parsed.reason,
      source,
    );
  }

  const problem = registry.validate(definition, parsed.value);
  if (problem) {
    // Custom validators may quote the value; secrets stay masked in errors and logs.
    const reason = secret ? maskSecret(problem, parsed.value) : problem;
    throw new ParameterValidationError(layer.slug, definition.name, reason, source);
  }

  return { definition, value: parsed.value, source, history };
}

/** Resolve one layer against gathered contributions. */
export function resolveLayer(layer: ParameterLayer, store: ContributionStore): ParsedLayer {
  const values: Array<[string, ResolvedParameter]> = [];
  for (const definition of layer.definitions) {
    const resolved = resolveParameter(layer, definition, store);
    if (resolved) values.push([definition.name, resolved]);
  }
  return new ParsedLayer(layer, values);
}

/** Resolve every layer; throws on the first missing, unparsable or invalid value. */
export function resolveLayers(layers: readonly ParameterLayer[], store: ContributionStore): ParsedLayers {
  assertDistinctLayers(layers);
  return new ParsedLayers(layers.map(layer => resolveLayer(layer, store)));
}

/**
 * Run a source chain over the layers and resolve the result.
 * This is the entry point a command invocation uses.
 */
export async function resolveParameters(
  layers: readonly ParameterLayer[],
  chain: SourceChain,
): Promise<ParsedLayers> {
  assertDistinctLayers(layers);
  const store = await chain.run(layers);
  const parsed = resolveLayers(layers, store);
  getLogger('resolution').debug(
    { layers: parsed.slugs(), sources: chain.providers.map(p => p.name) },
    'parameters resolved',
  );
  return parsed;
}
