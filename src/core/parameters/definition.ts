/**
 * Parameter definition construction and checks.
 *
 * A definition that contradicts itself (required with a default,
 * a choice without choices, a default its type cannot parse) is rejected at
 * construction with ParameterDefinitionError, never at resolution time.
 */

import { ParameterDefinitionError } from '../errors.js';
import type { ParameterDefinition, ParameterDefinitionInput } from '../../types/parameters.js';
import type { ParameterTypeRegistry } from './registry.js';

/** Parameter names and layer slugs: lower-case, kebab-case. */
export const NAME_RE = /^[a-z][a-z0-9-]*$/;

const CHOICE_KINDS = new Set(['choice', 'choice-list']);

/**
 * Validate a parameter declaration against the registry and freeze it.
 *
 * @param registry - Type registry the owning layer is built against
 * @param layer - Slug of the owning layer (for error context)
 */
export function defineParameter(
  registry: ParameterTypeRegistry,
  layer: string,
  input: ParameterDefinitionInput,
): ParameterDefinition {
  const { name } = input;
  const problem = (message: string): ParameterDefinitionError =>
    new ParameterDefinitionError(`Parameter "${name}" in layer "${layer}": ${message}`, { layer, parameter: name });

  if (!NAME_RE.test(name)) {
    throw problem('name must be kebab-case (a-z, 0-9, -) and start with a letter');
  }
  if (!registry.has(input.type)) {
    throw problem(`unknown type "${input.type}"`);
  }
  if (input.required && input.default !== undefined) {
    throw problem('a required parameter cannot declare a default');
  }
  if (CHOICE_KINDS.has(input.type) && !input.choices?.length) {
    throw problem(`type "${input.type}" needs a non-empty choices list`);
  }
  if (input.shortFlag !== undefined && !/^[a-zA-Z]$/.test(input.shortFlag)) {
    throw problem(`short flag "${input.shortFlag}" must be a single letter`);
  }
  if (input.min !== undefined && input.max !== undefined && input.min > input.max) {
    throw problem(`min ${input.min} is greater than max ${input.max}`);
  }
  if (input.pattern !== undefined) {
    try {
      new RegExp(input.pattern);
    } catch (err) {
      throw problem(`invalid pattern: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const definition: ParameterDefinition = Object.freeze({
    ...input,
    required: input.required ?? false,
    ...(input.choices && { choices: Object.freeze([...input.choices]) }),
    ...(input.extensions && { extensions: Object.freeze([...input.extensions]) }),
  });

  // File-backed defaults point at paths that may only exist at run time.
  if (definition.default !== undefined && !registry.get(definition.type).fileBacked) {
    const parsed = registry.parse(definition, definition.default);
    if (!parsed.ok) {
      throw problem(`default does not parse as ${registry.get(definition.type).label}: ${parsed.reason}`);
    }
    const invalid = registry.validate(definition, parsed.value);
    if (invalid) {
      throw problem(`default is invalid: ${invalid}`);
    }
  }

  return definition;
}
