/**
 * StatementParser Tests
 *
 * Tests:
 * - Verb, words and positions of each statement
 * - Nested blocks; braces inside a word stay in the word
 * - Comments
 * - Syntax errors: lowercase verb, missing semicolon, stray brace
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { RuleSyntaxError, StatementParser, type RawItem } from '@layoutforge/core';

function words(items: RawItem[]): string[] {
  return items.map(item => (item.kind === 'word' ? item.word.image : '{...}'));
}

describe('StatementParser', () => {
  const parser = new StatementParser();

  // ===========================================================================
  // TESTS: statements
  // ===========================================================================

  describe('statements', () => {
    it('should split statements and keep raw words', () => {
      const statements = parser.parse('DefineClass @a = [A B];\nShowClass @a;');
      assert.strictEqual(statements.length, 2);
      assert.deepStrictEqual(statements[0].verb, { image: 'DefineClass', line: 1, column: 1 });
      assert.deepStrictEqual(words(statements[0].items), ['@a', '=', '[A', 'B]']);
      assert.deepStrictEqual(statements[1].verb, { image: 'ShowClass', line: 2, column: 1 });
    });

    it('should record word positions', () => {
      const [statement] = parser.parse('Set $kern =\n   -20;');
      assert.deepStrictEqual(
        statement.items.map(item => (item.kind === 'word' ? [item.word.line, item.word.column] : [])),
        [[1, 5], [1, 11], [2, 4]]
      );
    });

    it('should parse nested blocks', () => {
      const [feature] = parser.parse('Feature liga { Substitute f i -> f_i; };');
      assert.deepStrictEqual(words(feature.items), ['liga', '{...}']);
      const block = feature.items[1];
      assert.ok(block.kind === 'block');
      assert.deepStrictEqual(block.open, { image: '{', line: 1, column: 14 });
      assert.strictEqual(block.statements.length, 1);
      assert.deepStrictEqual(block.statements[0].verb, { image: 'Substitute', line: 1, column: 16 });
      assert.deepStrictEqual(words(block.statements[0].items), ['f', 'i', '->', 'f_i']);
    });

    it('should keep braces inside a word', () => {
      const [statement] = parser.parse('DefineClass @uni = /^uni[0-9A-F]{4}$/;');
      assert.deepStrictEqual(words(statement.items), ['@uni', '=', '/^uni[0-9A-F]{4}$/']);
    });

    it('should split braces at the edges of a word', () => {
      const [routine] = parser.parse('Routine kern{ Substitute a -> b; }IgnoreMarks;');
      assert.deepStrictEqual(words(routine.items), ['kern', '{...}', 'IgnoreMarks']);
    });

    it('should accept an empty block', () => {
      const [routine] = parser.parse('Routine empty {};');
      const block = routine.items[1];
      assert.ok(block.kind === 'block');
      assert.deepStrictEqual(block.statements, []);
    });

    it('should skip comments', () => {
      const statements = parser.parse('# header\nDumpClassNames; # trailing\n');
      assert.strictEqual(statements.length, 1);
      assert.strictEqual(statements[0].verb.image, 'DumpClassNames');
      assert.deepStrictEqual(statements[0].items, []);
    });

    it('should return nothing for an empty document', () => {
      assert.deepStrictEqual(parser.parse('  \n# only a comment\n'), []);
    });
  });

  // ===========================================================================
  // TESTS: errors
  // ===========================================================================

  describe('errors', () => {
    it('should reject a verb that does not start with an uppercase letter', () => {
      assert.throws(
        () => parser.parse('\n  defineClass @a = A;', 'rules.fee'),
        (err: unknown) =>
          err instanceof RuleSyntaxError &&
          err.code === 'ERR_SYNTAX' &&
          err.message === "Expected a verb, found 'defineClass'" &&
          err.context.file === 'rules.fee' &&
          err.context.line === 2 &&
          err.context.column === 3
      );
    });

    it('should report a missing semicolon at the end of input', () => {
      assert.throws(
        () => parser.parse('Feature liga', 'rules.fee'),
        (err: unknown) =>
          err instanceof RuleSyntaxError &&
          err.message.startsWith('Syntax error: ') &&
          err.context.file === 'rules.fee' &&
          err.context.line === 1 &&
          err.context.column === 13
      );
    });

    it('should report a stray closing brace at its position', () => {
      assert.throws(
        () => parser.parse('Foo; }'),
        (err: unknown) =>
          err instanceof RuleSyntaxError &&
          err.message.startsWith('Syntax error: ') &&
          err.context.line === 1 &&
          err.context.column === 6
      );
    });

    it('should stay usable after an error', () => {
      assert.throws(() => parser.parse('Foo'));
      assert.strictEqual(parser.parse('Foo;').length, 1);
    });
  });
});
