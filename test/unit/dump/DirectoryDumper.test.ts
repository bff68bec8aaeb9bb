/**
 * DirectoryDumper tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { chmodSync, mkdirSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';

import { dumpDirectory, writeDump, renderMarkdown, passesPatternFilter, InputError } from '@fenceline/core';
import { RecordingLogger } from '../../helpers/RecordingLogger.js';

describe('renderMarkdown', () => {
  it('should render each file as a heading and a bare fence', () => {
    const markdown = renderMarkdown([
      { relativePath: 'a.txt', content: 'alpha\n' },
      { relativePath: 'b.txt', content: 'beta' },
    ]);

    assert.strictEqual(markdown, '### a.txt\n```\nalpha\n```\n\n### b.txt\n```\nbeta\n```\n');
  });

  it('should render an empty file as an empty block', () => {
    assert.strictEqual(renderMarkdown([{ relativePath: 'e.txt', content: '' }]), '### e.txt\n```\n```\n');
  });

  it('should render nothing for no files', () => {
    assert.strictEqual(renderMarkdown([]), '');
  });
});

describe('passesPatternFilter', () => {
  it('should keep only matches in include mode', () => {
    assert.strictEqual(passesPatternFilter('src/index.ts', 'include', ['*.ts']), true);
    assert.strictEqual(passesPatternFilter('README.md', 'include', ['*.ts']), false);
    assert.strictEqual(passesPatternFilter('README.md', 'include', []), false);
  });

  it('should drop matches in exclude mode', () => {
    assert.strictEqual(passesPatternFilter('src/index.ts', 'exclude', ['src/**']), false);
    assert.strictEqual(passesPatternFilter('a.txt', 'exclude', ['src/**']), true);
    assert.strictEqual(passesPatternFilter('a.txt', 'exclude', []), true);
  });
});

describe('dumpDirectory', () => {
  let root: string;

  function write(relativePath: string, content: string | Buffer): void {
    const fullPath = join(root, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }

  beforeEach(() => {
    root = join(tmpdir(), `fenceline-dump-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    write('a.txt', 'alpha\n');
    write('.gitignore', '*.log\nbuild/\n');
    write('debug.log', 'noise\n');
    write('build/out.js', 'compiled\n');
    write('src/index.ts', 'export {};\n');
    write('src/.gitignore', '*.tmp\n');
    write('src/cache.tmp', 'cached\n');
    write('.git/config', '[core]\n');
    write('node_modules/dep/index.js', 'module.exports = 1;\n');
    write('.fenceline/config.yaml', 'input: response.md\n');
    write('bin.dat', Buffer.from([0x89, 0x00, 0x01]));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should dump text files sorted by path, honouring .gitignore', () => {
    const result = dumpDirectory(root);

    assert.deepStrictEqual(result.files.map((file) => file.relativePath), [
      '.gitignore',
      'a.txt',
      'src/.gitignore',
      'src/index.ts',
    ]);
    assert.strictEqual(result.files[1].content, 'alpha\n');
  });

  it('should skip binary files with a warning', () => {
    const logger = new RecordingLogger();

    const result = dumpDirectory(root, { logger });

    assert.deepStrictEqual(result.skipped, ['bin.dat']);
    const warning = logger.entries.find((entry) => entry.level === 'warn');
    assert.strictEqual(warning?.context?.code, 'ERR_FILE_UNREADABLE');
  });

  it('should skip an unreadable .gitignore and keep dumping', () => {
    mkdirSync(join(root, 'sub', '.gitignore'), { recursive: true });
    write('sub/x.txt', 'x\n');
    const logger = new RecordingLogger();

    const result = dumpDirectory(root, { logger });

    assert.deepStrictEqual(result.skipped, ['bin.dat', 'sub/.gitignore']);
    assert.deepStrictEqual(result.files.map((file) => file.relativePath), [
      '.gitignore',
      'a.txt',
      'src/.gitignore',
      'src/index.ts',
      'sub/x.txt',
    ]);
    assert.deepStrictEqual(logger.messages('warn')[1], 'Skipped unreadable .gitignore: sub/.gitignore');
  });

  it('should skip an unreadable directory and keep dumping', { skip: process.getuid?.() === 0 }, () => {
    write('locked/secret.txt', 'hidden\n');
    chmodSync(join(root, 'locked'), 0o000);
    const logger = new RecordingLogger();

    try {
      const result = dumpDirectory(root, { logger });

      assert.deepStrictEqual(result.skipped, ['bin.dat', 'locked']);
      assert.ok(result.files.some((file) => file.relativePath === 'src/index.ts'));
      const warning = logger.entries.find((entry) => entry.context?.code === 'ERR_DIRECTORY_UNREADABLE');
      assert.strictEqual(warning?.message, 'Skipped unreadable directory: locked');
    } finally {
      chmodSync(join(root, 'locked'), 0o755);
    }
  });

  it('should fail when the root does not exist', () => {
    assert.throws(
      () => dumpDirectory(join(root, 'missing')),
      (err: unknown) => err instanceof InputError && err.code === 'ERR_INPUT_NOT_FOUND'
    );
  });

  it('should keep only matching files in include mode', () => {
    const result = dumpDirectory(root, { mode: 'include', patterns: ['*.ts'] });
    assert.deepStrictEqual(result.files.map((file) => file.relativePath), ['src/index.ts']);
  });

  it('should drop matching files in exclude mode', () => {
    const result = dumpDirectory(root, { mode: 'exclude', patterns: ['src/**', '.gitignore'] });
    assert.deepStrictEqual(result.files.map((file) => file.relativePath), ['a.txt']);
  });

  it('should build markdown from the dumped files', () => {
    const result = dumpDirectory(root, { mode: 'include', patterns: ['a.txt', 'index.ts'] });
    assert.strictEqual(result.markdown, '### a.txt\n```\nalpha\n```\n\n### src/index.ts\n```\nexport {};\n```\n');
  });

  it('should never include its own output file', () => {
    const outputPath = join(root, 'dump.md');

    writeDump(root, outputPath, { mode: 'include', patterns: ['*.txt', '*.md'] });
    const second = writeDump(root, outputPath, { mode: 'include', patterns: ['*.txt', '*.md'] });

    assert.deepStrictEqual(second.files.map((file) => file.relativePath), ['a.txt']);
    assert.strictEqual(readFileSync(outputPath, 'utf-8'), '### a.txt\n```\nalpha\n```\n');
  });

  it('should create the output directory', () => {
    const outputPath = join(root, 'reports', 'nested', 'dump.md');
    writeDump(root, outputPath, { mode: 'include', patterns: ['a.txt'] });
    assert.ok(existsSync(outputPath));
  });
});
