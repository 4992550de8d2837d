/**
 * Resolve the error format from --json / --human.
 *
 * Without a flag: human when stderr is a terminal, JSON otherwise.
 */

import { StratumError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { FlagResolution } from '../format-context.js';

export function resolveFormat(
  opts: Record<string, unknown>,
  isTTY: boolean = process.stderr.isTTY === true,
): FlagResolution {
  const json = opts['json'] === true;
  const human = opts['human'] === true;
  if (json && human) {
    throw new StratumError(ExitCode.INVALID_INPUT, '--json and --human cannot be used together');
  }
  if (json) return { format: 'json' };
  if (human) return { format: 'human' };
  return { format: isTTY ? 'human' : 'json' };
}
