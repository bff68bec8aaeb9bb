/**
 * FileCommitter - the effectful half of extraction.
 *
 * Each PendingFile is written to a temporary sibling and renamed into place,
 * so a target either holds its complete new content or is left untouched.
 * A failure is logged and returned as a CommitError; it never propagates.
 */

import { join } from 'path';
import type { FailedFile, Logger, PendingFile, WrittenFile } from '@fenceline/types';
import { CommitError } from '../errors/FencelineError.js';
import { NodeFileSystem, type FileSystemPort } from './FileSystemPort.js';

/** Suffix for temporary sibling names; unique within this process */
let tempSequence = 0;

export type CommitResult =
  | { ok: true; file: WrittenFile }
  | { ok: false; error: CommitError };

export interface CommitterOptions {
  logger: Logger;
  fs?: FileSystemPort;
  /** Log what would be written without touching the filesystem */
  dryRun?: boolean;
}

export class FileCommitter {
  private readonly logger: Logger;
  private readonly fs: FileSystemPort;
  private readonly dryRun: boolean;

  constructor(options: CommitterOptions) {
    this.logger = options.logger;
    this.fs = options.fs ?? new NodeFileSystem();
    this.dryRun = options.dryRun ?? false;
  }

  commit(pending: PendingFile): CommitResult {
    const { directory, fileName } = pending.path;
    const filePath = join(directory, fileName);
    const bytes = Buffer.byteLength(pending.content, 'utf-8');

    if (this.dryRun) {
      this.logger.info('Would write file', { filePath, bytes });
      return { ok: true, file: { filePath, bytes } };
    }

    try {
      this.fs.mkdir(directory);
    } catch (err) {
      return this.fail(new CommitError(
        `Cannot create directory ${directory}: ${errorMessage(err)}`,
        'ERR_DIRECTORY_CREATE',
        { filePath, lineNumber: pending.line, directory }
      ));
    }

    // Independent of fileName, so a name near the length limit still fits
    const tempPath = join(directory, `.fenceline-${process.pid}-${++tempSequence}.tmp`);
    try {
      this.fs.writeFile(tempPath, pending.content);
      this.fs.rename(tempPath, filePath);
    } catch (err) {
      this.discardTemp(tempPath);
      return this.fail(new CommitError(
        `Cannot write ${filePath}: ${errorMessage(err)}`,
        'ERR_FILE_WRITE',
        { filePath, lineNumber: pending.line }
      ));
    }

    this.logger.info('File written', { filePath, bytes });
    return { ok: true, file: { filePath, bytes } };
  }

  private fail(error: CommitError): CommitResult {
    this.logger.error(error.message, { code: error.code, ...error.context });
    return { ok: false, error };
  }

  private discardTemp(tempPath: string): void {
    try {
      this.fs.remove(tempPath);
    } catch (err) {
      this.logger.warn('Could not remove temporary file', { tempPath, error: errorMessage(err) });
    }
  }
}

export function toFailedFile(error: CommitError): FailedFile {
  return {
    filePath: typeof error.context.filePath === 'string' ? error.context.filePath : '',
    code: error.code,
    message: error.message,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
