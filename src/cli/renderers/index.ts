/**
 * Error output for the CLI.
 *
 * JSON format prints the error's toJSON() envelope; human format prints
 * `Error: message (CODE)` with the fix suggestion underneath.
 */

import { StratumError } from '../../core/errors.js';
import { ExitCode, getExitCodeName } from '../../types/exit-codes.js';
import { getFormatContext } from '../format-context.js';
import { DIM, NC, RED } from './colors.js';

/** Normalize anything thrown into a StratumError. */
export function toStratumError(err: unknown): StratumError {
  if (err instanceof StratumError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new StratumError(ExitCode.GENERAL_ERROR, message, { cause: err });
}

/** Render an error for the resolved format. */
export function formatError(err: StratumError, format = getFormatContext().format): string {
  if (format === 'json') return JSON.stringify(err.toJSON());
  const lines = [`${RED}Error:${NC} ${err.message} (${getExitCodeName(err.code)})`];
  if (err.fix) lines.push(`${DIM}Fix: ${err.fix}${NC}`);
  return lines.join('\n');
}

/**
 * Print an error to stderr and return the exit code to use.
 */
export function cliError(err: unknown): ExitCode {
  const error = toStratumError(err);
  process.stderr.write(formatError(error) + '\n');
  return error.code;
}
