/**
 * FileSystemPort - the only filesystem surface the committer uses.
 *
 * NodeFileSystem is the real implementation; tests substitute an in-memory one.
 */

import { mkdirSync, writeFileSync, renameSync, rmSync } from 'fs';

export interface FileSystemPort {
  /** Create a directory and any missing parents */
  mkdir(directory: string): void;
  /** Write UTF-8 text (no BOM), replacing existing content */
  writeFile(filePath: string, content: string): void;
  /** Move a file over an existing one */
  rename(from: string, to: string): void;
  /** Remove a file if it exists */
  remove(filePath: string): void;
}

export class NodeFileSystem implements FileSystemPort {
  mkdir(directory: string): void {
    mkdirSync(directory, { recursive: true });
  }

  writeFile(filePath: string, content: string): void {
    writeFileSync(filePath, content, 'utf-8');
  }

  rename(from: string, to: string): void {
    renameSync(from, to);
  }

  remove(filePath: string): void {
    rmSync(filePath, { force: true });
  }
}
