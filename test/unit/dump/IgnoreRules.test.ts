/**
 * Tests for .gitignore rule parsing and evaluation
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { parseIgnoreRules, ruleMatches, evaluateIgnoreRules } from '@fenceline/core';

describe('parseIgnoreRules', () => {
  it('should parse negation, directory-only and anchored rules', () => {
    const rules = parseIgnoreRules('# comment\n\nnode_modules/\n!keep.log\n/build\nsrc/*.gen.ts\n', 'pkg');

    assert.deepStrictEqual(rules, [
      { pattern: 'node_modules', negated: false, directoryOnly: true, anchored: false, baseDir: 'pkg' },
      { pattern: 'keep.log', negated: true, directoryOnly: false, anchored: false, baseDir: 'pkg' },
      { pattern: 'build', negated: false, directoryOnly: false, anchored: true, baseDir: 'pkg' },
      { pattern: 'src/*.gen.ts', negated: false, directoryOnly: false, anchored: true, baseDir: 'pkg' },
    ]);
  });

  it('should accept CRLF content and skip bare slashes', () => {
    const rules = parseIgnoreRules('*.log\r\n/\r\n');
    assert.deepStrictEqual(rules.map((rule) => rule.pattern), ['*.log']);
    assert.strictEqual(rules[0].baseDir, '');
  });
});

describe('ruleMatches', () => {
  const [unanchored] = parseIgnoreRules('*.log');
  const [anchored] = parseIgnoreRules('/build');
  const [dirOnly] = parseIgnoreRules('dist/');
  const [nested] = parseIgnoreRules('*.log', 'pkg');

  it('should match unanchored patterns at any depth', () => {
    assert.strictEqual(ruleMatches(unanchored, 'a/b/x.log', false), true);
    assert.strictEqual(ruleMatches(unanchored, 'x.txt', false), false);
  });

  it('should match anchored patterns only from the rule directory', () => {
    assert.strictEqual(ruleMatches(anchored, 'build', true), true);
    assert.strictEqual(ruleMatches(anchored, 'src/build', true), false);
  });

  it('should apply directory-only rules to directories', () => {
    assert.strictEqual(ruleMatches(dirOnly, 'dist', true), true);
    assert.strictEqual(ruleMatches(dirOnly, 'dist', false), false);
  });

  it('should scope rules to the directory of their .gitignore', () => {
    assert.strictEqual(ruleMatches(nested, 'pkg/x.log', false), true);
    assert.strictEqual(ruleMatches(nested, 'other/x.log', false), false);
    assert.strictEqual(ruleMatches(nested, 'x.log', false), false);
  });
});

describe('evaluateIgnoreRules', () => {
  it('should let a leading negation re-include a path', () => {
    const rules = parseIgnoreRules('!keep.log\n*.log');

    assert.strictEqual(evaluateIgnoreRules(rules, 'keep.log', false), 'included');
    assert.strictEqual(evaluateIgnoreRules(rules, 'other.log', false), 'ignored');
    assert.strictEqual(evaluateIgnoreRules(rules, 'a.txt', false), 'unmatched');
  });

  it('should decide by the first matching rule', () => {
    const rules = parseIgnoreRules('*.log\n!keep.log');
    assert.strictEqual(evaluateIgnoreRules(rules, 'keep.log', false), 'ignored');
  });

  it('should check parent rules before child rules', () => {
    const rules = [...parseIgnoreRules('*.tmp'), ...parseIgnoreRules('!cache.tmp', 'src')];
    assert.strictEqual(evaluateIgnoreRules(rules, 'src/cache.tmp', false), 'ignored');
  });
});
