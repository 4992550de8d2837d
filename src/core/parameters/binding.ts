/**
 * Projection of a parsed layer onto a typed record.
 *
 * A binding is an explicit field → parameter-name table plus a zod schema for
 * the record, built once next to the layer. Projection is a name lookup
 * followed by schema validation; no reflection is involved.
 */

import type { z } from 'zod';
import { ParameterDefinitionError, StratumError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { ParsedLayer } from '../resolution/parsed-layers.js';
import type { ParameterLayer } from './layer.js';

export interface LayerBinding<T> {
  readonly layer: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Record field → parameter name. */
  readonly fields: Readonly<Record<string, string>>;
}

/**
 * Build a binding for a layer.
 *
 * Every mapped parameter must exist in the layer. Fields of the schema that
 * are not mapped keep the schema's defaults.
 */
export function createLayerBinding<T>(
  layer: ParameterLayer,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fields: Readonly<Record<string, string>>,
): LayerBinding<T> {
  for (const [field, parameter] of Object.entries(fields)) {
    if (!layer.has(parameter)) {
      throw new ParameterDefinitionError(
        `Field "${field}" is bound to unknown parameter "${parameter}" of layer "${layer.slug}"`,
        { layer: layer.slug, parameter },
      );
    }
  }
  return Object.freeze({ layer: layer.slug, schema, fields: Object.freeze({ ...fields }) });
}

/**
 * Project a parsed layer onto the binding's record type.
 * Parameters without a resolved value are left out so schema defaults apply.
 */
export function projectLayer<T>(parsed: ParsedLayer, binding: LayerBinding<T>): T {
  if (parsed.slug !== binding.layer) {
    throw new StratumError(
      ExitCode.GENERAL_ERROR,
      `Binding for layer "${binding.layer}" cannot project layer "${parsed.slug}"`,
      { context: { layer: parsed.slug } },
    );
  }

  const record: Record<string, unknown> = {};
  for (const [field, parameter] of Object.entries(binding.fields)) {
    const value = parsed.value(parameter);
    if (value !== undefined) record[field] = value;
  }

  const result = binding.schema.safeParse(record);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new StratumError(
      ExitCode.VALIDATION_ERROR,
      `Cannot project layer "${parsed.slug}": ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid record'}`,
      { context: { layer: parsed.slug } },
    );
  }
  return result.data;
}
