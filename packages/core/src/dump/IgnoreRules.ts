/**
 * .gitignore-style rules for the directory dumper.
 *
 * Rules from a parent directory come first, followed by the rules of each
 * nested .gitignore; the first rule that matches a path decides it.
 * Patterns are matched with minimatch.
 */

import { minimatch } from 'minimatch';
import type { IgnoreRule } from '@fenceline/types';

export type IgnoreVerdict = 'ignored' | 'included' | 'unmatched';

/**
 * Parse .gitignore content declared in `baseDir` (relative to the dump root).
 * Blank lines and `#` comments are skipped.
 */
export function parseIgnoreRules(content: string, baseDir: string = ''): IgnoreRule[] {
  const rules: IgnoreRule[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const negated = line.startsWith('!');
    if (negated) line = line.slice(1);

    const directoryOnly = line.endsWith('/');
    if (directoryOnly) line = line.replace(/\/+$/, '');

    const anchored = line.includes('/');
    line = line.replace(/^\/+/, '');
    if (!line) continue;

    rules.push({ pattern: line, negated, directoryOnly, anchored, baseDir: normalizeRelative(baseDir) });
  }

  return rules;
}

/**
 * Check if a single rule matches a path relative to the dump root.
 */
export function ruleMatches(rule: IgnoreRule, relativePath: string, isDirectory: boolean): boolean {
  if (rule.directoryOnly && !isDirectory) return false;

  const path = normalizeRelative(relativePath);
  let local = path;
  if (rule.baseDir) {
    if (!path.startsWith(`${rule.baseDir}/`)) return false;
    local = path.slice(rule.baseDir.length + 1);
  }

  return minimatch(local, rule.pattern, { dot: true, matchBase: !rule.anchored });
}

/**
 * Evaluate rules in order; the first match wins.
 */
export function evaluateIgnoreRules(rules: readonly IgnoreRule[], relativePath: string, isDirectory: boolean): IgnoreVerdict {
  for (const rule of rules) {
    if (ruleMatches(rule, relativePath, isDirectory)) {
      return rule.negated ? 'included' : 'ignored';
    }
  }
  return 'unmatched';
}

function normalizeRelative(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
}
