/**
 * Logger - console and file logging for fenceline
 *
 * Every logger filters by LogLevel (silent < errors < warnings < info < debug);
 * trace shares the debug threshold. The extraction log is a FileLogger opened
 * in append mode, so each run adds to the previous ones.
 *
 * Usage:
 *   const logger = createLogger('warnings', { logFile: '.fenceline/extract.log', append: true });
 *   logger.info('File written', { filePath, bytes });
 *   await closeLogger(logger);
 */

import { createWriteStream, existsSync, writeFileSync, mkdirSync, accessSync, statSync, constants, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import { LOG_LEVELS, type Logger, type LogLevel } from '@fenceline/types';

export type { Logger, LogLevel };

type LogMethod = keyof Logger;

/** Least verbose level that still emits each method */
const METHOD_THRESHOLD: Record<LogMethod, LogLevel> = {
  error: 'errors',
  warn: 'warnings',
  info: 'info',
  debug: 'debug',
  trace: 'debug',
};

const METHOD_LABEL: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

function isEnabled(level: LogLevel, method: LogMethod): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(METHOD_THRESHOLD[method]);
}

/**
 * JSON for log context: Errors become { name, message }, repeated
 * objects become "[Circular]", bigints become strings.
 */
function stringifyContext(context: Record<string, unknown>): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(context, (_key, value: unknown) => {
    if (typeof value === 'bigint') return value.toString();
    if (value instanceof Error) return { name: value.name, message: value.message };
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    return value;
  });
}

/**
 * Append context to a message as JSON. Empty context adds nothing.
 */
export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${stringifyContext(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared level filtering; subclasses decide where a formatted line goes.
 */
abstract class LevelFilteredLogger implements Logger {
  constructor(readonly level: LogLevel) {}

  protected abstract emit(method: LogMethod, line: string): void;

  protected prefix(method: LogMethod): string {
    return `[${METHOD_LABEL[method]}]`;
  }

  private log(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (!isEnabled(this.level, method)) return;
    this.emit(method, formatMessage(`${this.prefix(method)} ${message}`, context));
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }
}

/**
 * Writes to the console method matching the severity; trace goes to console.debug.
 */
export class ConsoleLogger extends LevelFilteredLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected emit(method: LogMethod, line: string): void {
    switch (method) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'debug':
      case 'trace':
        console.debug(line);
        break;
    }
  }
}

export interface FileLoggerOptions {
  /** Keep existing content and append (default: truncate on construction) */
  append?: boolean;
}

/**
 * One ISO-timestamped line per message.
 * Throws on construction if the path is a directory or its parent is not writable.
 */
export class FileLogger extends LevelFilteredLogger {
  private readonly stream: WriteStream;

  constructor(level: LogLevel, filePath: string, options: FileLoggerOptions = {}) {
    super(level);
    const resolvedPath = resolve(filePath);
    const dir = dirname(resolvedPath);
    mkdirSync(dir, { recursive: true });

    try {
      accessSync(dir, constants.W_OK);
    } catch {
      throw new Error(`Cannot write log file: directory '${dir}' is not writable`);
    }
    if (existsSync(resolvedPath) && statSync(resolvedPath).isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    // Create (or truncate) synchronously so a bad path fails here, not on first write
    writeFileSync(resolvedPath, '', { flag: options.append ? 'a' : 'w' });
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      console.error(`[ERROR] Log file write failed: ${err.message}`);
    });
  }

  protected override prefix(method: LogMethod): string {
    return `${new Date().toISOString()} ${super.prefix(method)}`;
  }

  protected emit(_method: LogMethod, line: string): void {
    this.stream.write(`${line}\n`);
  }

  /** Resolves once buffered lines are flushed */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(() => done());
    });
  }
}

/**
 * Fans each call out to several loggers, each applying its own level.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: readonly Logger[]) {}

  private fanOut(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) {
      logger[method](message, context);
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.fanOut('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.fanOut('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.fanOut('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.fanOut('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.fanOut('trace', message, context);
  }

  async close(): Promise<void> {
    await Promise.all(this.loggers.map((logger) => closeLogger(logger)));
  }
}

export interface CreateLoggerOptions {
  logFile?: string;
  append?: boolean;
}

/**
 * Console logger at `level`, plus a debug-level FileLogger when `logFile` is
 * set, so the file records every parser event whatever the console shows.
 */
export function createLogger(level: LogLevel, options: CreateLoggerOptions = {}): Logger {
  const consoleLogger = new ConsoleLogger(level);
  if (!options.logFile) {
    return consoleLogger;
  }
  return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile, { append: options.append })]);
}

/**
 * Flush and close whatever file output a logger holds; console loggers are a no-op.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}
