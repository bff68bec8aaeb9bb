/**
 * Line classifier tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { classifyLine, looksLikeFileName } from '@fenceline/core';
import { LINE_KIND } from '@fenceline/types';

describe('classifyLine', () => {
  describe('outside a block', () => {
    it('should classify a bare fence as an opening fence', () => {
      assert.deepStrictEqual(classifyLine('```', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.FENCE_OPEN, info: '' });
    });

    it('should capture the info string', () => {
      assert.deepStrictEqual(classifyLine('```notes.md', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.FENCE_OPEN, info: 'notes.md' });
      assert.deepStrictEqual(classifyLine('  ```python  ', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.FENCE_OPEN, info: 'python' });
      assert.deepStrictEqual(classifyLine('``` a.ts', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.FENCE_OPEN, info: 'a.ts' });
    });

    it('should accept longer fences', () => {
      assert.deepStrictEqual(classifyLine('````', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.FENCE_OPEN, info: '' });
    });

    it('should treat a fence with two tokens as a plain line', () => {
      assert.deepStrictEqual(classifyLine('```js title', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.PLAIN, text: '```js title' });
    });

    it('should classify level-3 headings', () => {
      assert.deepStrictEqual(classifyLine('### a/b.txt', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.HEADING, path: 'a/b.txt' });
      assert.deepStrictEqual(classifyLine('### `a/b.txt`', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.HEADING, path: 'a/b.txt' });
      assert.deepStrictEqual(classifyLine('###src/x.ts  ', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.HEADING, path: 'src/x.ts' });
    });

    it('should leave deeper heading markers for the sanitizer', () => {
      assert.deepStrictEqual(classifyLine('#### Foo', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.HEADING, path: '# Foo' });
    });

    it('should not classify other headings', () => {
      assert.deepStrictEqual(classifyLine('## a.txt', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.PLAIN, text: '## a.txt' });
      assert.deepStrictEqual(classifyLine('###', 'OUTSIDE_BLOCK'), { kind: LINE_KIND.PLAIN, text: '###' });
    });
  });

  describe('inside a block', () => {
    it('should classify any fence as a closing fence', () => {
      assert.deepStrictEqual(classifyLine('```', 'INSIDE_BLOCK'), { kind: LINE_KIND.FENCE_CLOSE });
      assert.deepStrictEqual(classifyLine('   ```js', 'INSIDE_BLOCK'), { kind: LINE_KIND.FENCE_CLOSE });
    });

    it('should treat headings as body text', () => {
      assert.deepStrictEqual(classifyLine('### a/b.txt', 'INSIDE_BLOCK'), { kind: LINE_KIND.PLAIN, text: '### a/b.txt' });
    });

    it('should keep body text untrimmed', () => {
      assert.deepStrictEqual(classifyLine('  indented  ', 'INSIDE_BLOCK'), { kind: LINE_KIND.PLAIN, text: '  indented  ' });
      assert.deepStrictEqual(classifyLine('', 'INSIDE_BLOCK'), { kind: LINE_KIND.PLAIN, text: '' });
    });
  });
});

describe('looksLikeFileName', () => {
  it('should require a dot', () => {
    assert.strictEqual(looksLikeFileName('a.py'), true);
    assert.strictEqual(looksLikeFileName('.env'), true);
    assert.strictEqual(looksLikeFileName('python'), false);
    assert.strictEqual(looksLikeFileName(''), false);
  });
});
