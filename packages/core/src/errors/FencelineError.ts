/**
 * FencelineError - Error hierarchy for fenceline
 *
 * All errors extend the native JavaScript Error class so they can be thrown,
 * collected in reports and rendered by the CLI the same way.
 *
 * Error types:
 * - ConfigError: Configuration parsing/validation errors (fatal)
 * - InputError: Markdown document missing or unreadable (fatal)
 * - CommitError: Directory creation or file write failed (error)
 * - DumpError: A file or directory could not be read while dumping (warning)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of FencelineError
 */
export interface FencelineErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all fenceline errors.
 */
export abstract class FencelineError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): FencelineErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config.yaml validation, bad CLI overrides
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends FencelineError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Input error - the markdown document cannot be loaded.
 * Raised before scanning starts, so nothing has been written.
 *
 * Severity: fatal (always)
 * Codes: ERR_INPUT_NOT_FOUND, ERR_INPUT_UNREADABLE
 */
export class InputError extends FencelineError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Commit error - one extracted file could not be materialized.
 * The run continues with the next file.
 *
 * Severity: error (always)
 * Codes: ERR_DIRECTORY_CREATE, ERR_FILE_WRITE
 */
export class CommitError extends FencelineError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Dump error - a file or directory in the dumped tree could not be read.
 * The entry is skipped and the dump continues.
 *
 * Severity: warning (always)
 * Codes: ERR_FILE_UNREADABLE, ERR_DIRECTORY_UNREADABLE
 */
export class DumpError extends FencelineError {
  readonly code: string;
  readonly severity = 'warning' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
