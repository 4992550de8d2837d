/**
 * CLI error format context.
 *
 * Holds the resolved format for the current invocation: errors are printed
 * as JSON for scripts or as one readable line for people. Set once in the
 * preAction hook.
 */

export type CliFormat = 'json' | 'human';

export interface FlagResolution {
  format: CliFormat;
}

let currentResolution: FlagResolution = { format: 'human' };

export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

export function getFormatContext(): FlagResolution {
  return currentResolution;
}
