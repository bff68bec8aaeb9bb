/**
 * Extraction Types - values that flow between the line classifier,
 * the scanner and the committer.
 */

// === RESOLVED PATH ===
/**
 * A sanitized target location.
 * `directory` is always the base directory or one of its descendants.
 */
export interface ResolvedPath {
  readonly directory: string;
  readonly fileName: string;
}

// === PENDING FILE ===
/**
 * A complete file body waiting to be committed.
 * Created when a fence closes (or input ends inside one), consumed once.
 */
export interface PendingFile {
  readonly path: ResolvedPath;
  readonly content: string;
  /** 1-based line of the closing fence, or the last line for an unterminated block */
  readonly line: number;
}

// === LINE TOKENS ===
export const LINE_KIND = {
  FENCE_OPEN: 'FENCE_OPEN',
  FENCE_CLOSE: 'FENCE_CLOSE',
  HEADING: 'HEADING',
  PLAIN: 'PLAIN',
} as const;

export type LineKind = typeof LINE_KIND[keyof typeof LINE_KIND];

export interface FenceOpenToken {
  kind: typeof LINE_KIND.FENCE_OPEN;
  /** Token after the backticks; empty string when absent */
  info: string;
}

export interface FenceCloseToken {
  kind: typeof LINE_KIND.FENCE_CLOSE;
}

export interface HeadingToken {
  kind: typeof LINE_KIND.HEADING;
  /** Heading text with surrounding backticks removed */
  path: string;
}

export interface PlainLineToken {
  kind: typeof LINE_KIND.PLAIN;
  text: string;
}

export type LineToken = FenceOpenToken | FenceCloseToken | HeadingToken | PlainLineToken;

// === SCANNER STATE ===
export type ScanState = 'OUTSIDE_BLOCK' | 'INSIDE_BLOCK';

/**
 * What happens to the active filename when a fence closes.
 * - retain: a later fence without its own heading reuses it
 * - clear: every block needs a fresh declaration
 */
export type FenceClosePolicy = 'retain' | 'clear';

export const FENCE_CLOSE_POLICIES: readonly FenceClosePolicy[] = ['retain', 'clear'];

/**
 * Mutable per-call parser state, owned by a single scan.
 */
export interface ParseState {
  state: ScanState;
  currentFileName: string | null;
  currentDirectory: string;
  bufferedContent: string;
  /** True while a heading-declared filename has not yet been claimed by a block */
  headingPending: boolean;
}

// === REPORTS ===
export interface WrittenFile {
  /** Absolute path of the written file */
  filePath: string;
  bytes: number;
}

export interface FailedFile {
  filePath: string;
  code: string;
  message: string;
}

/**
 * Outcome of one extraction run.
 */
export interface ExtractionReport {
  baseDir: string;
  written: WrittenFile[];
  failed: FailedFile[];
  dryRun: boolean;
}
