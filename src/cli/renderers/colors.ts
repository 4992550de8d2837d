/**
 * Terminal color support.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 */

/** Whether ANSI escapes should be written to a stream. */
export function supportsColor(
  stream: { isTTY?: boolean },
  env: Readonly<Record<string, string | undefined>> = process.env,
): boolean {
  if (env['NO_COLOR'] !== undefined) return false;
  if (env['FORCE_COLOR'] !== undefined) return true;
  return stream.isTTY === true;
}

const colorsEnabled = supportsColor(process.stderr);

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');

