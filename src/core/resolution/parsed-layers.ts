/**
 * Resolved parameter values for one command invocation.
 *
 * Created once by the resolution engine, frozen, and only ever read by
 * business logic.
 */

import { StratumError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type {
  ParameterDefinition,
  ParameterValue,
  SourceName,
  ValueOrigin,
} from '../../types/parameters.js';
import type { ParameterLayer } from '../parameters/layer.js';

/** One raw value contributed by a source, in contribution order. */
export interface Contribution {
  readonly source: SourceName;
  readonly value: unknown;
}

/** A parameter's accepted value with its provenance. */
export interface ResolvedParameter {
  readonly definition: ParameterDefinition;
  readonly value: ParameterValue;
  readonly source: ValueOrigin;
  /** Every contribution seen for this parameter; the last one won. */
  readonly history: readonly Contribution[];
}

/** Freeze list, key-value and file values in place, items included. */
function freezeValue(value: ParameterValue): ParameterValue {
  if (typeof value === 'object' && !(value instanceof Date)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === 'object') Object.freeze(item);
      }
    }
    Object.freeze(value);
  }
  return value;
}

export class ParsedLayer {
  readonly slug: string;
  readonly layer: ParameterLayer;
  private readonly values: ReadonlyMap<string, ResolvedParameter>;

  constructor(layer: ParameterLayer, values: Iterable<[string, ResolvedParameter]>) {
    this.slug = layer.slug;
    this.layer = layer;
    this.values = new Map(
      [...values].map(([name, resolved]): [string, ResolvedParameter] => [
        name,
        Object.freeze({
          ...resolved,
          value: freezeValue(resolved.value),
          history: Object.freeze([...resolved.history]),
        }),
      ]),
    );
    Object.freeze(this);
  }

  /** Resolved entry for a parameter, or undefined when it has no value. */
  get(name: string): ResolvedParameter | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  value(name: string): ParameterValue | undefined {
    return this.values.get(name)?.value;
  }

  source(name: string): ValueOrigin | undefined {
    return this.values.get(name)?.source;
  }

  /** Resolved parameters in layer declaration order. */
  entries(): Array<[string, ResolvedParameter]> {
    const out: Array<[string, ResolvedParameter]> = [];
    for (const definition of this.layer.definitions) {
      const resolved = this.values.get(definition.name);
      if (resolved) out.push([definition.name, resolved]);
    }
    return out;
  }

  getString(name: string): string | undefined {
    const v = this.value(name);
    return typeof v === 'string' ? v : undefined;
  }

  getNumber(name: string): number | undefined {
    const v = this.value(name);
    return typeof v === 'number' ? v : undefined;
  }

  getBoolean(name: string): boolean | undefined {
    const v = this.value(name);
    return typeof v === 'boolean' ? v : undefined;
  }

  getDate(name: string): Date | undefined {
    const v = this.value(name);
    return v instanceof Date ? v : undefined;
  }

  getStringList(name: string): string[] | undefined {
    const v = this.value(name);
    if (!Array.isArray(v)) return undefined;
    const strings: string[] = [];
    for (const item of v) {
      if (typeof item !== 'string') return undefined;
      strings.push(item);
    }
    return strings;
  }

  /** Plain name → value mapping. */
  toObject(): Record<string, ParameterValue> {
    return Object.fromEntries(this.entries().map(([name, r]) => [name, r.value]));
  }
}

/** One ParsedLayer per layer declared by the command. */
export class ParsedLayers {
  private readonly layers: ReadonlyMap<string, ParsedLayer>;

  constructor(layers: readonly ParsedLayer[]) {
    this.layers = new Map(layers.map(l => [l.slug, l]));
    Object.freeze(this);
  }

  get(slug: string): ParsedLayer | undefined {
    return this.layers.get(slug);
  }

  /** Get a layer the command is known to declare. */
  require(slug: string): ParsedLayer {
    const layer = this.layers.get(slug);
    if (!layer) {
      throw new StratumError(ExitCode.NOT_FOUND, `Layer "${slug}" was not resolved for this command`, {
        context: { layer: slug },
      });
    }
    return layer;
  }

  has(slug: string): boolean {
    return this.layers.has(slug);
  }

  slugs(): string[] {
    return [...this.layers.keys()];
  }

  [Symbol.iterator](): IterableIterator<ParsedLayer> {
    return this.layers.values();
  }
}
