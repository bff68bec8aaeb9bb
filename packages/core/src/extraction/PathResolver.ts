/**
 * PathResolver - turns a declared path into a ResolvedPath under a base directory.
 *
 * Accepts a bare filename or a `/`- or `\`-delimited relative path, optionally
 * wrapped in one layer of backticks or quotes:
 *
 *   resolver.resolve('`src/app/main.ts`')
 *   // → { directory: '<base>/src/app', fileName: 'main.ts' }
 *
 * Absolute-looking input is treated as relative, `..` never climbs, and `.`
 * directory segments are no-ops, so `directory` always stays at or below the base.
 */

import { join, resolve } from 'path';
import type { ResolvedPath } from '@fenceline/types';
import { sanitizePathComponent, PLACEHOLDER_COMPONENT } from './sanitize.js';

const SEPARATORS = /[\\/]+/;
const WRAPPERS = ['`', '"', "'"];

/**
 * Remove a single layer of matching wrapping backticks or quotes.
 */
export function unwrapPath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if (WRAPPERS.includes(first) && trimmed.endsWith(first)) {
      return trimmed.slice(1, -1).trim();
    }
  }
  return trimmed;
}

/**
 * Split a declared path into raw components.
 * Separators at either end produce no component.
 */
export function splitPathComponents(path: string): string[] {
  return path
    .split(SEPARATORS)
    .filter((part, index, parts) => part !== '' || (index !== 0 && index !== parts.length - 1));
}

export class PathResolver {
  readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  resolve(raw: string): ResolvedPath {
    const parts = splitPathComponents(unwrapPath(raw));
    const last = parts.pop();

    const fileName = last === undefined ? PLACEHOLDER_COMPONENT : sanitizePathComponent(last);
    const segments = parts
      .map(sanitizePathComponent)
      .filter((segment) => segment !== '.');

    return {
      directory: join(this.baseDir, ...segments),
      fileName: fileName === '.' ? PLACEHOLDER_COMPONENT : fileName,
    };
  }
}
