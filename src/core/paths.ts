/**
 * Path resolution for stratum config files.
 *
 * Environment variables:
 *   STRATUM_HOME - Global directory (default: ~/.stratum)
 *   STRATUM_DIR  - Project directory (default: .stratum)
 */

import { resolve, join } from 'node:path';
import { homedir } from 'node:os';

/** Default config file name inside both global and project directories. */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Get the global stratum home directory.
 * Respects STRATUM_HOME env var, defaults to ~/.stratum.
 */
export function getStratumHome(): string {
  return process.env['STRATUM_HOME'] ?? join(homedir(), '.stratum');
}

/**
 * Get the absolute project stratum directory.
 * Respects STRATUM_DIR env var (relative values resolve against cwd).
 */
export function getProjectDir(cwd?: string): string {
  return resolve(cwd ?? process.cwd(), process.env['STRATUM_DIR'] ?? '.stratum');
}

/** Path of the global config file. */
export function getGlobalConfigPath(): string {
  return join(getStratumHome(), CONFIG_FILE_NAME);
}

/** Path of the project config file. */
export function getProjectConfigPath(cwd?: string): string {
  return join(getProjectDir(cwd), CONFIG_FILE_NAME);
}

