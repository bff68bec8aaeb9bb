/**
 * MarkdownScanner - the pure half of extraction.
 *
 * A single left-to-right pass over a Document with one line of lookahead,
 * driven by two states (OUTSIDE_BLOCK, INSIDE_BLOCK). Produces the ordered
 * list of PendingFiles; never touches the filesystem.
 *
 * Filename sources, in order of precedence for a block:
 * 1. an info string that looks like a filename (```` ```notes.md ````)
 * 2. a `### path` heading declared before the fence
 * 3. the line right after a bare fence, when no heading named the block
 * 4. the filename retained from the previous block (fenceClose: 'retain')
 */

import {
  LINE_KIND,
  type FenceClosePolicy,
  type Logger,
  type ParseState,
  type PendingFile,
} from '@fenceline/types';
import type { Document } from './Document.js';
import type { PathResolver } from './PathResolver.js';
import { classifyLine, looksLikeFileName } from './LineClassifier.js';

export interface ScannerOptions {
  resolver: PathResolver;
  logger: Logger;
  /** Default: 'retain' */
  fenceClose?: FenceClosePolicy;
}

export class MarkdownScanner {
  private readonly resolver: PathResolver;
  private readonly logger: Logger;
  private readonly fenceClose: FenceClosePolicy;

  constructor(options: ScannerOptions) {
    this.resolver = options.resolver;
    this.logger = options.logger;
    this.fenceClose = options.fenceClose ?? 'retain';
  }

  scan(document: Document): PendingFile[] {
    const { lines } = document;
    const state = this.createState();
    const pending: PendingFile[] = [];

    for (let index = 0; index < lines.length; index++) {
      const lineNumber = index + 1;
      const token = classifyLine(lines[index], state.state);
      this.logger.trace('Line processed', { line: lineNumber, kind: token.kind, state: state.state });

      switch (token.kind) {
        case LINE_KIND.FENCE_OPEN: {
          state.state = 'INSIDE_BLOCK';
          this.logger.debug('Block opened', { line: lineNumber, info: token.info });

          if (looksLikeFileName(token.info)) {
            this.adopt(state, token.info, lineNumber, 'info string');
          } else if (token.info === '' && !state.headingPending) {
            const next = lines[index + 1]?.trim() ?? '';
            if (looksLikeFileName(next)) {
              this.adopt(state, next, lineNumber + 1, 'lookahead');
              index++;
            }
          }
          state.headingPending = false;
          break;
        }

        case LINE_KIND.FENCE_CLOSE:
          this.closeBlock(state, lineNumber, pending);
          break;

        case LINE_KIND.HEADING:
          this.adopt(state, token.path, lineNumber, 'heading');
          state.headingPending = true;
          break;

        case LINE_KIND.PLAIN:
          if (state.state === 'INSIDE_BLOCK' && state.currentFileName !== null) {
            state.bufferedContent += token.text + '\n';
          }
          break;
      }
    }

    if (state.state === 'INSIDE_BLOCK') {
      this.logger.debug('Input ended inside a block, closing it', { line: lines.length });
      this.closeBlock(state, lines.length, pending);
    }

    return pending;
  }

  private createState(): ParseState {
    return {
      state: 'OUTSIDE_BLOCK',
      currentFileName: null,
      currentDirectory: this.resolver.baseDir,
      bufferedContent: '',
      headingPending: false,
    };
  }

  private adopt(state: ParseState, rawPath: string, line: number, source: string): void {
    const resolved = this.resolver.resolve(rawPath);
    state.currentFileName = resolved.fileName;
    state.currentDirectory = resolved.directory;
    this.logger.debug('Filename declared', {
      line,
      source,
      raw: rawPath,
      directory: resolved.directory,
      fileName: resolved.fileName,
    });
  }

  private closeBlock(state: ParseState, line: number, pending: PendingFile[]): void {
    if (state.currentFileName === null) {
      this.logger.debug('Block closed without a filename, content discarded', { line });
    } else if (state.bufferedContent === '') {
      this.logger.debug('Block closed with empty body, nothing to commit', { line, fileName: state.currentFileName });
    } else {
      pending.push({
        path: { directory: state.currentDirectory, fileName: state.currentFileName },
        content: state.bufferedContent,
        line,
      });
      this.logger.debug('Block closed', { line, fileName: state.currentFileName, bytes: Buffer.byteLength(state.bufferedContent) });
    }

    state.state = 'OUTSIDE_BLOCK';
    state.bufferedContent = '';
    if (this.fenceClose === 'clear') {
      state.currentFileName = null;
      state.currentDirectory = this.resolver.baseDir;
    }
  }
}
