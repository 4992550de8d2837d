/**
 * stratum error types with exit code integration.
 *
 * Every error carries enough context (layer slug, parameter name, row index,
 * field name) to pinpoint the cause without inspecting internals.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/** Context values attached to an error for structured output. */
export type ErrorContext = Record<string, string | number | boolean | undefined>;

/**
 * Structured error class for stratum operations.
 * Carries an exit code, human-readable message, context and optional fix suggestion.
 */
export class StratumError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  readonly context: ErrorContext;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      context?: ErrorContext;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'StratumError';
    this.code = code;
    this.fix = options?.fix;
    this.context = options?.context ?? {};
  }

  /** Structured JSON representation for CLI output. */
  toJSON(): Record<string, unknown> {
    const context = Object.fromEntries(
      Object.entries(this.context).filter(([, v]) => v !== undefined),
    );
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        type: this.name,
        message: this.message,
        ...(Object.keys(context).length > 0 && { context }),
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/**
 * Render a raw parameter value for an error message.
 * Strings are quoted; everything else goes through JSON.
 */
export function describeRaw(raw: unknown): string {
  if (typeof raw === 'string') return JSON.stringify(raw);
  if (raw instanceof Date) return raw.toISOString();
  try {
    return JSON.stringify(raw) ?? String(raw);
  } catch {
    return String(raw);
  }
}

// ---------------------------------------------------------------------------
// Schema construction
// ---------------------------------------------------------------------------

/** A layer or parameter declaration is inconsistent (programming error). */
export class ParameterDefinitionError extends StratumError {
  constructor(message: string, context: { layer?: string; parameter?: string } = {}) {
    super(ExitCode.DEFINITION_ERROR, message, { context });
    this.name = 'ParameterDefinitionError';
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export class MissingRequiredParameterError extends StratumError {
  readonly layer: string;
  readonly parameter: string;

  constructor(layer: string, parameter: string) {
    super(
      ExitCode.MISSING_PARAMETER,
      `Missing required parameter "${parameter}" in layer "${layer}"`,
      {
        context: { layer, parameter },
        fix: `Pass --${parameter}, set it in a config file under "${layer}", or export it in the environment`,
      },
    );
    this.name = 'MissingRequiredParameterError';
    this.layer = layer;
    this.parameter = parameter;
  }
}

export class ParameterParseError extends StratumError {
  readonly layer: string;
  readonly parameter: string;
  readonly raw: unknown;
  readonly expectedType: string;

  constructor(
    layer: string,
    parameter: string,
    raw: unknown,
    expectedType: string,
    reason: string,
    source?: string,
  ) {
    super(
      ExitCode.PARSE_ERROR,
      `Cannot parse ${describeRaw(raw)} as ${expectedType} for parameter "${parameter}" in layer "${layer}": ${reason}`,
      { context: { layer, parameter, raw: describeRaw(raw), expectedType, source } },
    );
    this.name = 'ParameterParseError';
    this.layer = layer;
    this.parameter = parameter;
    this.raw = raw;
    this.expectedType = expectedType;
  }
}

export class ParameterValidationError extends StratumError {
  readonly layer: string;
  readonly parameter: string;
  readonly reason: string;

  constructor(layer: string, parameter: string, reason: string, source?: string) {
    super(
      ExitCode.VALIDATION_ERROR,
      `Invalid value for parameter "${parameter}" in layer "${layer}": ${reason}`,
      { context: { layer, parameter, reason, source } },
    );
    this.name = 'ParameterValidationError';
    this.layer = layer;
    this.parameter = parameter;
    this.reason = reason;
  }
}

/** A configuration file could not be read, parsed, or has the wrong shape. */
export class ConfigFileError extends StratumError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(ExitCode.CONFIG_ERROR, message, { context: { path }, cause });
    this.name = 'ConfigFileError';
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export class FilterSyntaxError extends StratumError {
  readonly expression: string;
  readonly position: number;

  constructor(expression: string, position: number, message: string) {
    super(ExitCode.INVALID_INPUT, `Invalid filter expression at position ${position}: ${message}`, {
      context: { expression, position },
    });
    this.name = 'FilterSyntaxError';
    this.expression = expression;
    this.position = position;
  }
}

export class RowFormatError extends StratumError {
  readonly field: string;
  readonly rowIndex?: number;

  constructor(field: string, message: string, rowIndex?: number) {
    super(
      ExitCode.ROW_FORMAT_ERROR,
      rowIndex === undefined ? message : `Row ${rowIndex}: ${message}`,
      { context: { rowIndex, field } },
    );
    this.name = 'RowFormatError';
    this.field = field;
    this.rowIndex = rowIndex;
  }

  /** Copy of this error annotated with the row index it occurred at. */
  atRow(rowIndex: number): RowFormatError {
    if (this.rowIndex !== undefined) return this;
    return new RowFormatError(this.field, this.message, rowIndex);
  }
}

export class SinkWriteError extends StratumError {
  readonly rowIndex?: number;

  constructor(message: string, options: { rowIndex?: number; cause?: unknown } = {}) {
    super(ExitCode.SINK_WRITE_ERROR, message, {
      context: { rowIndex: options.rowIndex },
      cause: options.cause,
    });
    this.name = 'SinkWriteError';
    this.rowIndex = options.rowIndex;
  }
}

export class PipelineStateError extends StratumError {
  readonly state: string;

  constructor(state: string, message: string) {
    super(ExitCode.PIPELINE_STATE_ERROR, message, { context: { state } });
    this.name = 'PipelineStateError';
    this.state = state;
  }
}

/** Deliberate stop requested through an AbortSignal. Not a correctness failure. */
export class CancellationError extends StratumError {
  readonly rowIndex?: number;

  constructor(rowIndex?: number, reason?: unknown) {
    super(
      ExitCode.CANCELLED,
      rowIndex === undefined ? 'Operation cancelled' : `Operation cancelled after ${rowIndex} rows`,
      { context: { rowIndex }, cause: reason },
    );
    this.name = 'CancellationError';
    this.rowIndex = rowIndex;
  }
}
