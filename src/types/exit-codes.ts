/**
 * stratum exit codes.
 * Ranges: 0 = success, 1-99 = errors, 130 = cancelled.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 8,

  // === PARAMETER ERRORS (10-19) ===
  DEFINITION_ERROR = 10,
  MISSING_PARAMETER = 11,
  PARSE_ERROR = 12,

  // === PIPELINE ERRORS (20-29) ===
  ROW_FORMAT_ERROR = 20,
  SINK_WRITE_ERROR = 21,
  PIPELINE_STATE_ERROR = 22,

  // Conventional exit status for SIGINT-style cancellation.
  CANCELLED = 130,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
