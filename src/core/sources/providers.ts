/**
 * Value providers for the source chain: layer defaults, environment
 * variables, CLI values, programmatic overrides, and wrappers that change
 * when or where a provider contributes.
 */

import type { SourceName } from '../../types/parameters.js';
import type { ParameterLayer } from '../parameters/layer.js';
import type { SourceWriter } from './store.js';

/**
 * A ranked provider of raw parameter values.
 * A provider that cannot reach its source contributes nothing.
 */
export interface SourceProvider {
  readonly source: SourceName;
  /** Descriptive name for logs (e.g. 'config:/etc/app.yaml'). */
  readonly name: string;
  contribute(layers: readonly ParameterLayer[], writer: SourceWriter): Promise<void> | void;
}

/** Layer slug → parameter name → raw value. */
export type LayerValues = Readonly<Record<string, Readonly<Record<string, unknown>>>>;

/** Layer slug → parameter name → raw CLI string(s). */
export type CliValues = Readonly<Record<string, Readonly<Record<string, string | readonly string[]>>>>;

/** Contributes each definition's declared default. */
export function defaultsSource(): SourceProvider {
  return {
    source: 'defaults',
    name: 'defaults',
    contribute(layers, writer) {
      for (const layer of layers) {
        for (const definition of layer.definitions) {
          if (definition.default !== undefined) {
            writer.set(layer.slug, definition.name, definition.default);
          }
        }
      }
    },
  };
}

/** Contributes a fixed layer → name → value mapping at any rank. */
export function mapSource(source: SourceName, values: LayerValues, name: string = source): SourceProvider {
  return {
    source,
    name,
    contribute(layers, writer) {
      for (const layer of layers) {
        const layerValues = values[layer.slug];
        if (!layerValues) continue;
        for (const [param, value] of Object.entries(layerValues)) {
          writer.set(layer.slug, param, value);
        }
      }
    },
  };
}

/**
 * Contributes values from parsed CLI arguments. Absence of a flag means no
 * contribution; repeated flags of list parameters arrive as arrays.
 */
export function cliSource(values: CliValues): SourceProvider {
  return mapSource('cli', values, 'cli');
}

/** Contributes programmatic overrides (already-typed values allowed). */
export function overrideSource(values: LayerValues): SourceProvider {
  return mapSource('override', values, 'override');
}

/**
 * Environment variable name for a parameter: prefix and flag name,
 * upper-cased and joined with underscores.
 *
 * @example envKey('app', 'db-', 'host') === 'APP_DB_HOST'
 */
export function envKey(prefix: string, flagPrefix: string, name: string): string {
  const key = `${flagPrefix}${name}`.toUpperCase().replace(/-/g, '_');
  return prefix ? `${prefix.toUpperCase()}_${key}` : key;
}

/** Contributes values from environment variables namespaced by a prefix. */
export function envSource(
  prefix: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): SourceProvider {
  return {
    source: 'env',
    name: prefix ? `env:${prefix.toUpperCase()}_*` : 'env',
    contribute(layers, writer) {
      for (const layer of layers) {
        for (const definition of layer.definitions) {
          const value = env[envKey(prefix, layer.flagPrefix, definition.name)];
          if (value !== undefined) {
            writer.set(layer.slug, definition.name, value);
          }
        }
      }
    },
  };
}

/** Wrap a provider so it only fills parameters no earlier provider set. */
export function whenUnset(provider: SourceProvider): SourceProvider {
  return {
    source: provider.source,
    name: `${provider.name} (unset only)`,
    contribute(layers, writer) {
      return provider.contribute(layers, {
        ...writer,
        set: (layer, name, value) => !writer.has(layer, name) && writer.set(layer, name, value),
      });
    },
  };
}

/** Wrap a provider so it only sees and writes the given layers. */
export function onlyLayers(slugs: readonly string[], provider: SourceProvider): SourceProvider {
  const allowed = new Set(slugs);
  return {
    source: provider.source,
    name: `${provider.name} [${slugs.join(',')}]`,
    contribute(layers, writer) {
      return provider.contribute(
        layers.filter(l => allowed.has(l.slug)),
        {
          ...writer,
          set: (layer, name, value) => allowed.has(layer) && writer.set(layer, name, value),
        },
      );
    },
  };
}
