/**
 * Accumulated raw contributions of a source chain run.
 *
 * Last writer wins per parameter; the full contribution history is kept so
 * resolved values can report where they came from.
 */

import type { SourceName } from '../../types/parameters.js';
import type { Contribution } from '../resolution/parsed-layers.js';
import type { ParameterLayer } from '../parameters/layer.js';

export class ContributionStore {
  private readonly byLayer = new Map<string, Map<string, Contribution[]>>();

  /** Record a contribution, replacing the current value of that parameter. */
  set(layer: string, name: string, source: SourceName, value: unknown): void {
    let params = this.byLayer.get(layer);
    if (!params) {
      params = new Map();
      this.byLayer.set(layer, params);
    }
    const history = params.get(name) ?? [];
    history.push({ source, value });
    params.set(name, history);
  }

  /** The winning (most recent) contribution for a parameter. */
  current(layer: string, name: string): Contribution | undefined {
    const history = this.byLayer.get(layer)?.get(name);
    return history?.[history.length - 1];
  }

  history(layer: string, name: string): readonly Contribution[] {
    return this.byLayer.get(layer)?.get(name) ?? [];
  }

  has(layer: string, name: string): boolean {
    return this.current(layer, name) !== undefined;
  }

  /** Number of contributions recorded, optionally for one source. */
  count(source?: SourceName): number {
    let total = 0;
    for (const params of this.byLayer.values()) {
      for (const history of params.values()) {
        total += source ? history.filter(c => c.source === source).length : history.length;
      }
    }
    return total;
  }
}

/** Write access to the store granted to one provider. */
export interface SourceWriter {
  readonly source: SourceName;
  /**
   * Contribute a raw value. Parameters the layers do not declare are ignored;
   * returns whether the value was recorded.
   */
  set(layer: string, name: string, value: unknown): boolean;
  has(layer: string, name: string): boolean;
  current(layer: string, name: string): Contribution | undefined;
}

/** Shared context of a chain run. */
export interface SourceContext {
  readonly layers: readonly ParameterLayer[];
  readonly store: ContributionStore;
}

/** Writer bound to a source name; drops values for undeclared parameters. */
export function createWriter(context: SourceContext, source: SourceName): SourceWriter {
  const declared = (layer: string, name: string): boolean =>
    context.layers.some(l => l.slug === layer && l.has(name));

  return {
    source,
    set(layer, name, value) {
      if (value === undefined || !declared(layer, name)) return false;
      context.store.set(layer, name, source, value);
      return true;
    },
    has: (layer, name) => context.store.has(layer, name),
    current: (layer, name) => context.store.current(layer, name),
  };
}
