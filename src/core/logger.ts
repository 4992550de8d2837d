/**
 * Centralized pino logger factory for stratum.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention
 * when a log file is configured, stderr otherwise.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for command output, so nothing here ever writes to it.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;
let currentLogFile: string | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

const baseOptions = (level: string): pino.LoggerOptions => ({
  level,
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Initialize the root logger. Call once at startup.
 *
 * With a filePath, pino-roll handles size + daily rotation with built-in
 * retention. Without one, logs go to stderr.
 */
export function initLogger(config: LoggingConfig): pino.Logger {
  if (!config.filePath) {
    rootLogger = pino(baseOptions(config.level), pino.destination(2));
    currentLogFile = null;
    return rootLogger;
  }

  currentLogFile = config.filePath;
  mkdirSync(dirname(config.filePath), { recursive: true });

  // pino.transport() runs in a worker thread; the CLI calls closeLogger()
  // before exit so buffered lines are flushed.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: config.filePath,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });

  rootLogger = pino(baseOptions(config.level), transport);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so library users and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'sources', 'pipeline')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    fallbackLogger ??= pino(
      {
        level: 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    );
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** Path of the current log file, or null when logging to stderr. */
export function getLogFile(): string | null {
  return currentLogFile;
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
  currentLogFile = null;
}
