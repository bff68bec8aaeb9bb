/**
 * Path component sanitization.
 *
 * Every component of an extracted path (each directory segment and the
 * filename) passes through sanitizePathComponent independently. The function
 * is total: any string maps to a non-empty component that cannot contain a
 * separator and cannot name a parent directory.
 */

/** Stand-in for a component that sanitizes to nothing */
export const PLACEHOLDER_COMPONENT = '_';

const ILLEGAL_CHARS = /[<>:"/\\|?*]/g;

// Unicode "Other": controls, format characters, surrogates, private use, unassigned
const NON_PRINTABLE = /\p{C}/gu;

// Heading/backtick remnants and whitespace at either end
const EDGE_MARKERS = /^[\s#`]+|[\s#`]+$/gu;

export function sanitizePathComponent(raw: string): string {
  const cleaned = raw
    .replace(ILLEGAL_CHARS, '_')
    .replace(NON_PRINTABLE, '')
    .replace(EDGE_MARKERS, '');

  if (cleaned === '' || cleaned === '..') {
    return PLACEHOLDER_COMPONENT;
  }
  return cleaned;
}
