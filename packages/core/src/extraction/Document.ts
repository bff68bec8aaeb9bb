/**
 * Document - the markdown input as an immutable line sequence.
 *
 * Normalization happens once, here:
 * - a leading byte-order marker is removed
 * - C0/C1 control characters other than tab, LF and CR are dropped
 * - optionally, a model reasoning preamble ending in `</think>` is cut off
 *
 * A preamble either opens with `<think>` or declares no file before the
 * marker. A marker that follows a heading or fence is file content.
 */

import { readFileSync, existsSync, statSync } from 'fs';
import { LINE_KIND } from '@fenceline/types';
import { InputError } from '../errors/FencelineError.js';
import { classifyLine } from './LineClassifier.js';

export interface Document {
  readonly lines: readonly string[];
}

export interface DocumentOptions {
  /** Drop a reasoning preamble that ends in `</think>` (default: true) */
  stripReasoning?: boolean;
}

export const REASONING_END_MARKER = '</think>';

const REASONING_OPENER = /^\s*<think>/;
const BOM = /^\uFEFF/;
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g;
const LINE_BREAK = /\r?\n/;

/**
 * Offset just past the reasoning preamble, or 0 when there is none.
 */
function preambleEnd(text: string): number {
  const markerIndex = text.indexOf(REASONING_END_MARKER);
  if (markerIndex === -1) return 0;

  const preamble = text.slice(0, markerIndex);
  if (!REASONING_OPENER.test(preamble)) {
    const declaresFiles = preamble
      .split(LINE_BREAK)
      .some((line) => classifyLine(line, 'OUTSIDE_BLOCK').kind !== LINE_KIND.PLAIN);
    if (declaresFiles) return 0;
  }

  return markerIndex + REASONING_END_MARKER.length;
}

export function normalizeText(text: string, options: DocumentOptions = {}): string {
  const normalized = text.replace(BOM, '').replace(CONTROL_CHARS, '');
  return (options.stripReasoning ?? true) ? normalized.slice(preambleEnd(normalized)) : normalized;
}

export function loadDocument(text: string, options: DocumentOptions = {}): Document {
  const lines = normalizeText(text, options).split(LINE_BREAK);

  // A final line break terminates the last line rather than starting a new one
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  return Object.freeze({ lines: Object.freeze(lines) });
}

/**
 * Read and normalize the document at `filePath`.
 * THROWS InputError when the file is missing or unreadable.
 */
export function readDocument(filePath: string, options: DocumentOptions = {}): Document {
  if (!existsSync(filePath) || statSync(filePath).isDirectory()) {
    throw new InputError(
      `Input document not found: ${filePath}`,
      'ERR_INPUT_NOT_FOUND',
      { filePath },
      'Pass the markdown file as an argument or set "input" in .fenceline/config.yaml'
    );
  }

  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InputError(`Cannot read input document: ${message}`, 'ERR_INPUT_UNREADABLE', { filePath });
  }

  return loadDocument(text, options);
}
