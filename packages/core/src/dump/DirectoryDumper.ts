/**
 * DirectoryDumper - directory tree → markdown, the inverse of extraction.
 *
 * Every surviving file becomes a heading plus a bare fence:
 *
 *   ### src/index.ts
 *   ```
 *   <content>
 *   ```
 *
 * which is exactly the shape the extractor reads back.
 */

import { readdirSync, readFileSync, existsSync, statSync, writeFileSync, mkdirSync, type Dirent } from 'fs';
import { join, relative, resolve, dirname } from 'path';
import { minimatch } from 'minimatch';
import type { DumpedFile, DumpResult, FilterMode, IgnoreRule, Logger } from '@fenceline/types';
import { DumpError, InputError } from '../errors/FencelineError.js';
import { ConsoleLogger } from '../logging/Logger.js';
import { WORK_DIR } from '../config/ConfigLoader.js';
import { parseIgnoreRules, evaluateIgnoreRules } from './IgnoreRules.js';

/** Directory names never descended into */
const ALWAYS_SKIPPED = new Set(['.git', 'node_modules', WORK_DIR]);

/** Bytes inspected for a NUL when deciding whether a file is text */
const BINARY_SNIFF_BYTES = 8000;

export interface DumpOptions {
  mode?: FilterMode;
  patterns?: string[];
  /** Absolute paths that are never dumped (e.g. the dump output itself) */
  excludePaths?: string[];
  logger?: Logger;
}

/**
 * Apply include/exclude patterns to a relative path.
 * Patterns without a `/` match the basename at any depth.
 */
export function passesPatternFilter(relativePath: string, mode: FilterMode, patterns: readonly string[]): boolean {
  const matched = patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true, matchBase: true }));
  return mode === 'include' ? matched : !matched;
}

/**
 * Render dumped files as markdown.
 * Content gets a closing newline only when it lacks one; empty files
 * render as an empty block.
 */
export function renderMarkdown(files: readonly DumpedFile[]): string {
  return files
    .map(({ relativePath, content }) => {
      const body = content === '' || content.endsWith('\n') ? content : `${content}\n`;
      return `### ${relativePath}\n\`\`\`\n${body}\`\`\`\n`;
    })
    .join('\n');
}

export function dumpDirectory(root: string, options: DumpOptions = {}): DumpResult {
  const rootPath = resolve(root);
  const mode = options.mode ?? 'exclude';
  const patterns = options.patterns ?? [];
  const excluded = new Set((options.excludePaths ?? []).map((p) => resolve(p)));
  const logger = options.logger ?? new ConsoleLogger('silent');

  if (!existsSync(rootPath) || !statSync(rootPath).isDirectory()) {
    throw new InputError(
      `Directory not found: ${rootPath}`,
      'ERR_INPUT_NOT_FOUND',
      { filePath: rootPath },
      'Pass an existing directory to "fenceline dump"'
    );
  }

  const files: DumpedFile[] = [];
  const skipped: string[] = [];

  function skip(error: DumpError, relPath: string): void {
    logger.warn(error.message, { code: error.code, ...error.context });
    skipped.push(relPath);
  }

  function readRules(dir: string, relDir: string, inheritedRules: IgnoreRule[]): IgnoreRule[] {
    const gitignorePath = join(dir, '.gitignore');
    if (!existsSync(gitignorePath)) return inheritedRules;

    try {
      return [...inheritedRules, ...parseIgnoreRules(readFileSync(gitignorePath, 'utf-8'), relDir)];
    } catch (err) {
      const relPath = toPosix(relative(rootPath, gitignorePath));
      skip(new DumpError(`Skipped unreadable .gitignore: ${relPath}`, 'ERR_FILE_UNREADABLE', {
        filePath: relPath,
        reason: reasonOf(err),
      }), relPath);
      return inheritedRules;
    }
  }

  function walk(dir: string, inheritedRules: IgnoreRule[]): void {
    const relDir = toPosix(relative(rootPath, dir));
    const rules = readRules(dir, relDir, inheritedRules);

    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      skip(new DumpError(`Skipped unreadable directory: ${relDir || '.'}`, 'ERR_DIRECTORY_UNREADABLE', {
        filePath: relDir || '.',
        reason: reasonOf(err),
      }), relDir || '.');
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      const relPath = toPosix(relative(rootPath, fullPath));

      if (excluded.has(fullPath)) {
        logger.debug('Skipping excluded path', { path: relPath });
        continue;
      }

      if (entry.isDirectory()) {
        if (ALWAYS_SKIPPED.has(entry.name)) continue;
        if (evaluateIgnoreRules(rules, relPath, true) === 'ignored') {
          logger.debug('Directory ignored by .gitignore', { path: relPath });
          continue;
        }
        walk(fullPath, rules);
        continue;
      }

      if (!entry.isFile()) continue;

      if (evaluateIgnoreRules(rules, relPath, false) === 'ignored') {
        logger.debug('File ignored by .gitignore', { path: relPath });
        continue;
      }
      if (!passesPatternFilter(relPath, mode, patterns)) {
        logger.debug('File filtered by pattern', { path: relPath, mode });
        continue;
      }

      try {
        files.push({ relativePath: relPath, content: readTextFile(fullPath) });
      } catch (err) {
        skip(err instanceof DumpError
          ? err
          : new DumpError(`Skipped unreadable file: ${relPath}`, 'ERR_FILE_UNREADABLE', {
            filePath: relPath,
            reason: reasonOf(err),
          }), relPath);
      }
    }
  }

  walk(rootPath, []);

  logger.info('Directory dumped', { root: rootPath, files: files.length, skipped: skipped.length });
  return { files, skipped, markdown: renderMarkdown(files) };
}

/**
 * Dump `root` and write the markdown to `outputPath`.
 * The output file itself is never part of the dump.
 */
export function writeDump(root: string, outputPath: string, options: DumpOptions = {}): DumpResult {
  const target = resolve(outputPath);
  const result = dumpDirectory(root, {
    ...options,
    excludePaths: [...(options.excludePaths ?? []), target],
  });
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, result.markdown, 'utf-8');
  options.logger?.info('Dump written', { outputPath: target });
  return result;
}

function readTextFile(filePath: string): string {
  const buffer = readFileSync(filePath);
  if (buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
    throw new DumpError(`Skipped binary file: ${filePath}`, 'ERR_FILE_UNREADABLE', { filePath });
  }
  return buffer.toString('utf-8');
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toPosix(path: string): string {
  return path.replace(/\\/g, '/');
}
