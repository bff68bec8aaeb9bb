/**
 * Dump Types - directory-to-markdown collaborator
 */

/**
 * How `patterns` are applied when dumping a directory.
 * - include: only files matching a pattern are emitted
 * - exclude: files matching a pattern are skipped
 */
export type FilterMode = 'include' | 'exclude';

export const FILTER_MODES: readonly FilterMode[] = ['include', 'exclude'];

/**
 * One `.gitignore` rule, anchored to the directory that declared it.
 */
export interface IgnoreRule {
  /** Pattern text without the leading `!` or trailing `/` */
  pattern: string;
  /** `!pattern` re-includes a path */
  negated: boolean;
  /** Trailing `/` restricts the rule to directories */
  directoryOnly: boolean;
  /** Pattern contains a `/` (other than a trailing one) and matches from `baseDir` */
  anchored: boolean;
  /** Directory of the .gitignore, relative to the dump root ('' for the root) */
  baseDir: string;
}

export interface DumpedFile {
  /** Path relative to the dump root, always `/`-separated */
  relativePath: string;
  content: string;
}

export interface DumpResult {
  files: DumpedFile[];
  skipped: string[];
  markdown: string;
}
