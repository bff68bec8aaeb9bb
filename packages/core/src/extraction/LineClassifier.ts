/**
 * LineClassifier - the two line grammars of the scanner.
 *
 * Both patterns are anchored and applied to the trimmed line:
 * - fence:   three or more backticks, optionally followed by one token
 * - heading: `###` followed by a path, optionally wrapped in backticks
 *
 * Headings only count outside a block; inside one they are body text.
 */

import { LINE_KIND, type LineToken, type ScanState } from '@fenceline/types';

const FENCE_LINE = /^`{3,}\s*([^\s`]*)$/;
const HEADING_LINE = /^###\s*`?(.+?)`?\s*$/;

export function classifyLine(line: string, state: ScanState): LineToken {
  const trimmed = line.trim();

  const fence = FENCE_LINE.exec(trimmed);
  if (fence) {
    return state === 'OUTSIDE_BLOCK'
      ? { kind: LINE_KIND.FENCE_OPEN, info: fence[1] }
      : { kind: LINE_KIND.FENCE_CLOSE };
  }

  if (state === 'OUTSIDE_BLOCK') {
    const heading = HEADING_LINE.exec(trimmed);
    if (heading) {
      return { kind: LINE_KIND.HEADING, path: heading[1].trim() };
    }
  }

  return { kind: LINE_KIND.PLAIN, text: line };
}

/**
 * Filename heuristic for fence info strings and lookahead lines:
 * `notes.md` is a filename, `python` is a language tag.
 */
export function looksLikeFileName(text: string): boolean {
  return text !== '' && text.includes('.');
}
