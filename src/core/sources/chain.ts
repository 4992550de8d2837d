/**
 * Source middleware chain.
 *
 * Providers run in sequence, lowest precedence first:
 *   defaults < config < env < cli < override
 * whatever order they were passed in (stable within one source). A later
 * provider's value for a parameter replaces an earlier one. Providers never
 * run in parallel: conditional providers (see whenUnset) observe the state
 * accumulated so far.
 */

import { SOURCE_PRIORITY } from '../../types/parameters.js';
import { getLogger } from '../logger.js';
import type { ParameterLayer } from '../parameters/layer.js';
import { compose, type Middleware } from './compose.js';
import type { SourceProvider } from './providers.js';
import { ContributionStore, createWriter, type SourceContext } from './store.js';

export type SourceMiddleware = Middleware<SourceContext>;

/** Rank of a provider's source; lower runs first. */
function rank(provider: SourceProvider): number {
  return SOURCE_PRIORITY.indexOf(provider.source);
}

/** Wrap a provider as middleware: contribute, then continue down the chain. */
export function providerMiddleware(provider: SourceProvider): SourceMiddleware {
  return async (context, next) => {
    await provider.contribute(context.layers, createWriter(context, provider.source));
    await next();
  };
}

/**
 * Instrumentation middleware: logs per-source contribution counts once the
 * rest of the chain has run.
 */
export function traceContributions(): SourceMiddleware {
  const log = getLogger('sources');
  return async (context, next) => {
    await next();
    const counts = Object.fromEntries(SOURCE_PRIORITY.map(s => [s, context.store.count(s)]));
    log.debug({ layers: context.layers.map(l => l.slug), counts }, 'parameter sources gathered');
  };
}

export class SourceChain {
  /** Providers in execution order. */
  readonly providers: readonly SourceProvider[];
  private readonly pipeline: SourceMiddleware;

  constructor(providers: readonly SourceProvider[], options: { middleware?: readonly SourceMiddleware[] } = {}) {
    // Array.prototype.sort is stable, so same-source providers keep their order.
    this.providers = Object.freeze([...providers].sort((a, b) => rank(a) - rank(b)));
    this.pipeline = compose([...(options.middleware ?? []), ...this.providers.map(providerMiddleware)]);
  }

  /** Gather contributions for the given layers. */
  async run(layers: readonly ParameterLayer[]): Promise<ContributionStore> {
    const context: SourceContext = { layers, store: new ContributionStore() };
    await this.pipeline(context, async () => {});
    return context.store;
  }
}

export function createSourceChain(
  providers: readonly SourceProvider[],
  options: { middleware?: readonly SourceMiddleware[] } = {},
): SourceChain {
  return new SourceChain(providers, options);
}
