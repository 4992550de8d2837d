/**
 * Configuration file cascade and logging defaults.
 *
 * Resolution priority for config files: explicit --config-file > project > global.
 * Files are applied lowest first by the config source, so later files win.
 */

import type { ConfigFileLocation, LoggingConfig } from '../types/config.js';
import { getGlobalConfigPath, getProjectConfigPath } from './paths.js';

/** Default logging configuration. */
export const DEFAULT_LOGGING: LoggingConfig = {
  level: 'warn',
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
};

/**
 * Config file locations, lowest precedence first.
 * Global and project files are optional; an explicit file is required.
 */
export function getConfigFileLocations(explicitPath?: string, cwd?: string): ConfigFileLocation[] {
  const locations: ConfigFileLocation[] = [
    { scope: 'global', path: getGlobalConfigPath(), required: false },
    { scope: 'project', path: getProjectConfigPath(cwd), required: false },
  ];
  if (explicitPath) {
    locations.push({ scope: 'explicit', path: explicitPath, required: true });
  }
  return locations;
}
