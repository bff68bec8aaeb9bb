/**
 * PathResolver tests
 *
 * Every resolved directory must be the base directory or one of its descendants.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { join, relative, resolve, isAbsolute, sep } from 'node:path';

import { PathResolver, unwrapPath, splitPathComponents } from '@fenceline/core';

const base = resolve('/out');

function isWithinBase(directory: string): boolean {
  const rel = relative(base, directory);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

describe('unwrapPath', () => {
  it('should remove one layer of matching wrappers', () => {
    assert.strictEqual(unwrapPath('`a/b.ts`'), 'a/b.ts');
    assert.strictEqual(unwrapPath('"a/b.ts"'), 'a/b.ts');
    assert.strictEqual(unwrapPath("'a/b.ts'"), 'a/b.ts');
    assert.strictEqual(unwrapPath('``a.ts``'), '`a.ts`');
  });

  it('should leave mismatched wrappers alone', () => {
    assert.strictEqual(unwrapPath('`a.ts"'), '`a.ts"');
    assert.strictEqual(unwrapPath('`'), '`');
  });

  it('should trim surrounding whitespace', () => {
    assert.strictEqual(unwrapPath('  `x.md`  '), 'x.md');
  });
});

describe('splitPathComponents', () => {
  it('should split on runs of either separator', () => {
    assert.deepStrictEqual(splitPathComponents('a//b\\\\c/d.txt'), ['a', 'b', 'c', 'd.txt']);
  });

  it('should drop separators at either end', () => {
    assert.deepStrictEqual(splitPathComponents('/etc/passwd'), ['etc', 'passwd']);
    assert.deepStrictEqual(splitPathComponents('src/'), ['src']);
    assert.deepStrictEqual(splitPathComponents(''), []);
  });
});

describe('PathResolver', () => {
  const resolver = new PathResolver('/out');

  it('should resolve the base directory to an absolute path', () => {
    assert.strictEqual(new PathResolver('relative/dir').baseDir, resolve('relative/dir'));
  });

  it('should resolve a bare filename to the base directory', () => {
    assert.deepStrictEqual(resolver.resolve('notes.md'), { directory: base, fileName: 'notes.md' });
  });

  it('should resolve nested forward-slash paths', () => {
    assert.deepStrictEqual(resolver.resolve('a/b.txt'), { directory: join(base, 'a'), fileName: 'b.txt' });
  });

  it('should resolve backslash paths inside backticks', () => {
    assert.deepStrictEqual(resolver.resolve('`src\\app\\main.ts`'), {
      directory: join(base, 'src', 'app'),
      fileName: 'main.ts',
    });
  });

  it('should keep ../ under the base directory', () => {
    const resolved = resolver.resolve('../secret');
    assert.deepStrictEqual(resolved, { directory: join(base, '_'), fileName: 'secret' });
    assert.ok(isWithinBase(resolved.directory));
  });

  it('should keep repeated ../ under the base directory', () => {
    assert.deepStrictEqual(resolver.resolve('../../etc/passwd'), {
      directory: join(base, '_', '_', 'etc'),
      fileName: 'passwd',
    });
  });

  it('should treat absolute-looking paths as relative', () => {
    assert.deepStrictEqual(resolver.resolve('/etc/passwd'), { directory: join(base, 'etc'), fileName: 'passwd' });
    assert.deepStrictEqual(resolver.resolve('C:\\Users\\x.txt'), {
      directory: join(base, 'C_', 'Users'),
      fileName: 'x.txt',
    });
  });

  it('should skip ./ segments', () => {
    assert.deepStrictEqual(resolver.resolve('./src/./a.ts'), { directory: join(base, 'src'), fileName: 'a.ts' });
  });

  it('should sanitize every component independently', () => {
    assert.deepStrictEqual(resolver.resolve('a/<bad>/f?.txt'), {
      directory: join(base, 'a', '_bad_'),
      fileName: 'f_.txt',
    });
  });

  it('should keep the position of components that sanitize to nothing', () => {
    assert.deepStrictEqual(resolver.resolve('a/ /b.txt'), { directory: join(base, 'a', '_'), fileName: 'b.txt' });
  });

  it('should fall back to the placeholder filename', () => {
    assert.deepStrictEqual(resolver.resolve(''), { directory: base, fileName: '_' });
    assert.deepStrictEqual(resolver.resolve('dir/.'), { directory: join(base, 'dir'), fileName: '_' });
  });

  it('should never resolve outside the base directory', () => {
    const inputs = [
      '..',
      '../..',
      '..\\..\\windows\\system32\\x.dll',
      '/../../x',
      'a/../../../b',
      '`../../x`',
      ' .. / .. /x',
      '\u0000../x',
    ];
    for (const input of inputs) {
      const { directory, fileName } = resolver.resolve(input);
      assert.ok(isWithinBase(directory), `${JSON.stringify(input)} → ${directory}`);
      assert.ok(!fileName.includes(sep));
      assert.notStrictEqual(fileName, '..');
    }
  });
});
