import { LOG_LEVELS, type LogLevel } from '@fenceline/types';

export interface LogFlags {
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
}

/**
 * Determine console log level from CLI options.
 * Priority: --log-level > --quiet > --verbose > default ('warnings')
 *
 * The log file, when there is one, always records everything.
 */
export function getLogLevel(options: LogFlags): LogLevel {
  if (options.logLevel) {
    const level = LOG_LEVELS.find((candidate) => candidate === options.logLevel);
    if (level) return level;
  }
  if (options.quiet) return 'silent';
  if (options.verbose) return 'debug';
  return 'warnings';
}
