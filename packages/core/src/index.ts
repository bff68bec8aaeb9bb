/**
 * @fenceline/core - markdown ⇄ filesystem extraction engine
 */

// Error types
export {
  FencelineError,
  ConfigError,
  InputError,
  CommitError,
  DumpError,
} from './errors/FencelineError.js';
export type { ErrorContext, ErrorSeverity, FencelineErrorJSON } from './errors/FencelineError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  formatMessage,
} from './logging/Logger.js';
export type { Logger, LogLevel, CreateLoggerOptions, FileLoggerOptions } from './logging/Logger.js';

// Config
export {
  loadConfig,
  DEFAULT_CONFIG,
  WORK_DIR,
  validateVersion,
  validatePatterns,
  validateConfig,
} from './config/index.js';
export type { FencelineConfig, DumpConfig } from './config/index.js';

// Version
export { FENCELINE_VERSION, getSchemaVersion } from './version.js';

// Extraction
export { sanitizePathComponent, PLACEHOLDER_COMPONENT } from './extraction/sanitize.js';
export { PathResolver, unwrapPath, splitPathComponents } from './extraction/PathResolver.js';
export { classifyLine, looksLikeFileName } from './extraction/LineClassifier.js';
export {
  loadDocument,
  readDocument,
  normalizeText,
  REASONING_END_MARKER,
} from './extraction/Document.js';
export type { Document, DocumentOptions } from './extraction/Document.js';
export { MarkdownScanner } from './extraction/MarkdownScanner.js';
export type { ScannerOptions } from './extraction/MarkdownScanner.js';
export { NodeFileSystem } from './extraction/FileSystemPort.js';
export type { FileSystemPort } from './extraction/FileSystemPort.js';
export { FileCommitter, toFailedFile } from './extraction/FileCommitter.js';
export type { CommitResult, CommitterOptions } from './extraction/FileCommitter.js';
export { extractFiles, extractDocument, extractFromFile } from './extraction/extractFiles.js';
export type { ExtractOptions } from './extraction/extractFiles.js';

// Directory dumper
export { parseIgnoreRules, ruleMatches, evaluateIgnoreRules } from './dump/IgnoreRules.js';
export type { IgnoreVerdict } from './dump/IgnoreRules.js';
export {
  dumpDirectory,
  writeDump,
  renderMarkdown,
  passesPatternFilter,
} from './dump/DirectoryDumper.js';
export type { DumpOptions } from './dump/DirectoryDumper.js';
