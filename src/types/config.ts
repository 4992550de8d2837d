/**
 * Configuration type definitions for stratum.
 * Covers logging settings and config-file locations.
 */

/** Pino log levels. */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'warn') */
  level: LogLevel;
  /** Absolute log file path; stderr when unset */
  filePath?: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Config file scopes, lowest precedence first. */
export type ConfigScope = 'global' | 'project' | 'explicit';

/** A config file location with its scope. */
export interface ConfigFileLocation {
  scope: ConfigScope;
  path: string;
  /** A required file that is missing is an error. */
  required: boolean;
}
