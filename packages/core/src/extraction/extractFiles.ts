/**
 * extractFiles - scan a markdown document and commit every file it declares.
 *
 * The parse runs to completion before the first write, then pending files are
 * committed in document order. A failed commit is recorded in the report and
 * the remaining files are still written.
 */

import type { ExtractionReport, FenceClosePolicy, Logger } from '@fenceline/types';
import { ConsoleLogger } from '../logging/Logger.js';
import { loadDocument, readDocument, type Document } from './Document.js';
import { FileCommitter, toFailedFile } from './FileCommitter.js';
import type { FileSystemPort } from './FileSystemPort.js';
import { MarkdownScanner } from './MarkdownScanner.js';
import { PathResolver } from './PathResolver.js';

export interface ExtractOptions {
  /** Anchor directory for every extracted path */
  baseDir: string;
  logger?: Logger;
  fenceClose?: FenceClosePolicy;
  /** Default: true */
  stripReasoning?: boolean;
  dryRun?: boolean;
  fs?: FileSystemPort;
}

export function extractDocument(document: Document, options: ExtractOptions): ExtractionReport {
  const logger = options.logger ?? new ConsoleLogger('silent');
  const resolver = new PathResolver(options.baseDir);
  const scanner = new MarkdownScanner({ resolver, logger, fenceClose: options.fenceClose });
  const committer = new FileCommitter({ logger, fs: options.fs, dryRun: options.dryRun });

  logger.debug('Extraction started', { baseDir: resolver.baseDir, lines: document.lines.length });

  const pending = scanner.scan(document);
  const report: ExtractionReport = {
    baseDir: resolver.baseDir,
    written: [],
    failed: [],
    dryRun: options.dryRun ?? false,
  };

  for (const file of pending) {
    const result = committer.commit(file);
    if (result.ok) {
      report.written.push(result.file);
    } else {
      report.failed.push(toFailedFile(result.error));
    }
  }

  logger.info('Extraction finished', { written: report.written.length, failed: report.failed.length });
  return report;
}

export function extractFiles(text: string, options: ExtractOptions): ExtractionReport {
  return extractDocument(loadDocument(text, { stripReasoning: options.stripReasoning }), options);
}

/**
 * Extract from a markdown file on disk.
 * THROWS InputError before anything is written if the file cannot be read.
 */
export function extractFromFile(inputPath: string, options: ExtractOptions): ExtractionReport {
  options.logger?.info('Reading input document', { inputPath });
  return extractDocument(readDocument(inputPath, { stripReasoning: options.stripReasoning }), options);
}
