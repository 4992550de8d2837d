/**
 * Describe resolved parameters as rows: what each value is and where it
 * came from. Secret values never leave this module unmasked.
 */

import type { FileData, ParameterDefinition } from '../../types/parameters.js';
import type { ParsedLayers } from './parsed-layers.js';

export const SECRET_MASK = '***';

/** A plain record so it can be handed straight to a row pipeline. */
export type ParameterDescription = {
  layer: string;
  parameter: string;
  type: string;
  value: unknown;
  source: string;
  history: Array<{ source: string; value: unknown }>;
};

function isFileData(value: unknown): value is FileData {
  return typeof value === 'object' && value !== null && 'path' in value && 'content' in value;
}

/** Display form of a value: files by path, secrets masked. */
export function displayValue(definition: ParameterDefinition, value: unknown): unknown {
  if (definition.type === 'secret') return SECRET_MASK;
  if (isFileData(value)) return value.path;
  if (Array.isArray(value)) return value.map((item: unknown) => (isFileData(item) ? item.path : item));
  return value;
}

/** One description per resolved parameter, layers and parameters in declaration order. */
export function describeParsedLayers(parsed: ParsedLayers): ParameterDescription[] {
  const rows: ParameterDescription[] = [];
  for (const layer of parsed) {
    for (const [name, resolved] of layer.entries()) {
      rows.push({
        layer: layer.slug,
        parameter: name,
        type: resolved.definition.type,
        value: displayValue(resolved.definition, resolved.value),
        source: resolved.source,
        history: resolved.history.map(c => ({
          source: c.source,
          value: displayValue(resolved.definition, c.value),
        })),
      });
    }
  }
  return rows;
}
