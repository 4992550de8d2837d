/**
 * Parameter schema type definitions.
 * Layers and definitions are read-only schema shared across invocations.
 */

/** The closed set of parameter kinds. */
export const PARAMETER_KINDS = [
  'string',
  'secret',
  'int',
  'float',
  'bool',
  'date',
  'string-list',
  'int-list',
  'float-list',
  'choice',
  'choice-list',
  'file',
  'file-list',
  'string-from-file',
  'string-list-from-file',
  'key-value',
] as const;

export type ParameterKind = (typeof PARAMETER_KINDS)[number];

/** Contents and metadata of a file-backed parameter. */
export interface FileData {
  path: string;
  baseName: string;
  extension: string;
  content: string;
  size: number;
}

/** Typed value produced by each parameter kind. */
export interface ParameterValueMap {
  'string': string;
  'secret': string;
  'int': number;
  'float': number;
  'bool': boolean;
  'date': Date;
  'string-list': string[];
  'int-list': number[];
  'float-list': number[];
  'choice': string;
  'choice-list': string[];
  'file': FileData;
  'file-list': FileData[];
  'string-from-file': string;
  'string-list-from-file': string[];
  'key-value': Record<string, string>;
}

/** Any resolved parameter value. */
export type ParameterValue = ParameterValueMap[ParameterKind];

/** Names of the sources a value may come from, lowest precedence first. */
export const SOURCE_PRIORITY = ['defaults', 'config', 'env', 'cli', 'override'] as const;

export type SourceName = (typeof SOURCE_PRIORITY)[number];

/** Provenance of a resolved value: a source, or the type's zero value. */
export type ValueOrigin = SourceName | 'zero';

/** Declaration of a single parameter, as written by layer authors. */
export interface ParameterDefinitionInput {
  name: string;
  type: ParameterKind;
  /** Raw or typed default; parsed with the same rules as any other source. */
  default?: unknown;
  required?: boolean;
  help?: string;
  /** Single-character short flag for CLI glue. */
  shortFlag?: string;
  /** Allowed values for choice and choice-list. */
  choices?: readonly string[];
  /** Inclusive bounds for numeric values and numeric list elements. */
  min?: number;
  max?: number;
  /** Regular expression for string values and string list elements. */
  pattern?: string;
  /** Allowed file extensions (with or without the dot) for file kinds. */
  extensions?: readonly string[];
  /** Definition-level check; returns an error message or undefined. */
  validate?: (value: ParameterValue) => string | undefined;
}

/** A validated, frozen parameter definition. */
export interface ParameterDefinition extends Readonly<Omit<ParameterDefinitionInput, 'required'>> {
  readonly required: boolean;
}

/** Declaration of a layer, as written by layer authors. */
export interface ParameterLayerInput {
  slug: string;
  name: string;
  description?: string;
  /** Prefix prepended to CLI flag names of this layer (e.g. 'db-'). */
  flagPrefix?: string;
  parameters: readonly ParameterDefinitionInput[];
}
