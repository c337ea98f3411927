/**
 * StatementDispatcher Tests
 *
 * Tests:
 * - Statements reach the verb's action with parsed arguments
 * - Unknown verbs: one warning, raw arguments kept, IR untouched
 * - Blocks: nested statements first, then blockAction with header and trailer
 * - Nested statements grouped by brace pair
 * - Block misuse raises ERR_BLOCK_UNSUPPORTED
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import {
  BareName,
  DiagnosticCollector,
  FontFeatures,
  GrammarComposer,
  MemoryLogger,
  RuleSyntaxError,
  StatementDispatcher,
  StatementParser,
  definePlugin,
  defineVerb,
  type StatementOutcome,
} from '@layoutforge/core';
import { testFont } from '../../helpers/fonts.js';

// =============================================================================
// Test Plugin
// =============================================================================

const Note = defineVerb<string[]>({
  name: 'Note',
  grammar: g =>
    g.rule('note', () => {
      const words: string[] = [];
      g.many(0, () => {
        const word = g.consume(0, BareName);
        g.action(() => words.push(word.image));
      });
      return words;
    }),
  transformer: () => ({ action: words => ({ kind: 'custom', data: words }) }),
});

const Group = defineVerb<unknown, undefined, string | undefined, string[]>({
  name: 'Group',
  beforeBraceGrammar: g =>
    g.rule('groupName', () => {
      const name = g.option(0, () => g.consume(0, BareName));
      return g.action(() => name?.image);
    }),
  afterBraceGrammar: g =>
    g.rule('groupTrailer', () => {
      const words: string[] = [];
      g.many(0, () => {
        const word = g.consume(0, BareName);
        g.action(() => words.push(word.image));
      });
      return words;
    }),
  transformer: () => ({
    blockAction: block => ({
      kind: 'custom',
      data: {
        before: block.before,
        after: block.after,
        body: block.body.map(item => (item.kind === 'word' ? item.word.image : item.outcome.verb)),
      },
    }),
  }),
});

const Bare = defineVerb<unknown>({
  name: 'Bare',
  transformer: () => ({ action: () => ({ kind: 'none' }) }),
});

const Wrap = defineVerb<unknown>({
  name: 'Wrap',
  transformer: () => ({ blockAction: () => ({ kind: 'none' }) }),
});

const Split = defineVerb<unknown>({
  name: 'Split',
  transformer: () => ({
    blockAction: block => ({
      kind: 'custom',
      data: block.groups.map(group => group.map(item => (item.kind === 'statement' ? item.outcome.verb : ''))),
    }),
  }),
});

const RecorderPlugin = definePlugin<undefined>({
  name: 'Recorder',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [Note, Group, Bare, Wrap, Split],
});

describe('StatementDispatcher', () => {
  let diagnostics: DiagnosticCollector;
  let logger: MemoryLogger;
  let fontFeatures: FontFeatures;
  let dispatcher: StatementDispatcher;
  const parser = new StatementParser();

  beforeEach(() => {
    const composer = new GrammarComposer();
    composer.register(RecorderPlugin);
    diagnostics = new DiagnosticCollector();
    logger = new MemoryLogger('debug');
    fontFeatures = new FontFeatures();
    const font = testFont();
    dispatcher = new StatementDispatcher({
      lookup: verb => composer.get(verb),
      createContext: (verb, location) => ({
        verb,
        location,
        font,
        fontFeatures,
        logger,
        diagnostics,
        strict: false,
        includePaths: [],
        compileFile: () => [],
      }),
      diagnostics,
      logger,
    });
  });

  function run(source: string): StatementOutcome[] {
    return dispatcher.dispatchAll(parser.parse(source, 'rules.fee'), 'rules.fee');
  }

  // ===========================================================================
  // TESTS: plain statements
  // ===========================================================================

  describe('statements', () => {
    it('should pass parsed arguments to the action', () => {
      assert.deepStrictEqual(run('Note hello world;'), [
        {
          status: 'handled',
          verb: 'Note',
          value: { kind: 'custom', data: ['hello', 'world'] },
          location: { file: 'rules.fee', line: 1, column: 1 },
        },
      ]);
    });

    it('should dispatch statements in order', () => {
      const outcomes = run('Note a;\nBare;\nNote b;');
      assert.deepStrictEqual(outcomes.map(o => [o.verb, o.location.line]), [['Note', 1], ['Bare', 2], ['Note', 3]]);
    });

    it('should raise argument errors from the verb parser', () => {
      assert.throws(() => run('Bare extra;'), /Verb 'Bare' takes no arguments/);
    });
  });

  // ===========================================================================
  // TESTS: unknown verbs
  // ===========================================================================

  describe('unknown verbs', () => {
    it('should warn once and keep the raw arguments', () => {
      const [outcome] = run('Frobnicate @a -> b;');
      assert.ok(outcome.status === 'unknown');
      assert.deepStrictEqual(outcome.args.map(item => (item.kind === 'word' ? item.word.image : '')), ['@a', '->', 'b']);

      const warnings = diagnostics.getAll();
      assert.strictEqual(warnings.length, 1);
      assert.strictEqual(warnings[0].code, 'WARN_UNKNOWN_VERB');
      assert.strictEqual(warnings[0].message, "Unknown verb 'Frobnicate'");
      assert.strictEqual(warnings[0].verb, 'Frobnicate');
      assert.strictEqual(warnings[0].line, 1);
      assert.deepStrictEqual(logger.messages('warn'), ["Unknown verb 'Frobnicate'"]);
    });

    it('should leave the IR untouched', () => {
      run('Frobnicate @a = [A B];');
      assert.strictEqual(fontFeatures.namedClasses.size, 0);
      assert.strictEqual(fontFeatures.routines.length, 0);
      assert.strictEqual(fontFeatures.features.size, 0);
    });
  });

  // ===========================================================================
  // TESTS: blocks
  // ===========================================================================

  describe('blocks', () => {
    it('should dispatch nested statements before the block action', () => {
      const [outcome] = run('Group outer { Note a; Mystery; } x y;');
      assert.ok(outcome.status === 'handled');
      assert.deepStrictEqual(outcome.value, {
        kind: 'custom',
        data: { before: 'outer', after: ['x', 'y'], body: ['Note', 'Mystery'] },
      });
      assert.deepStrictEqual(logger.messages('debug'), ['Dispatching Note', 'Dispatching Group']);
      assert.strictEqual(diagnostics.getByCode('WARN_UNKNOWN_VERB').length, 1);
    });

    it('should dispatch an empty block', () => {
      const [outcome] = run('Group {};');
      assert.ok(outcome.status === 'handled');
      assert.deepStrictEqual(outcome.value, { kind: 'custom', data: { before: undefined, after: [], body: [] } });
    });

    it('should keep words between blocks in the body', () => {
      const [outcome] = run('Group { Bare; } middle { Bare; };');
      assert.ok(outcome.status === 'handled');
      assert.deepStrictEqual(outcome.value, {
        kind: 'custom',
        data: { before: undefined, after: [], body: ['Bare', 'middle', 'Bare'] },
      });
    });

    it('should group nested statements by brace pair', () => {
      const [outcome] = run('Split { Bare; Note a; } { } { Bare; };');
      assert.ok(outcome.status === 'handled');
      assert.deepStrictEqual(outcome.value, { kind: 'custom', data: [['Bare', 'Note'], [], ['Bare']] });
    });

    it('should reject a block on a verb without a block action', () => {
      assert.throws(
        () => run('Note a { Bare; };'),
        (err: unknown) =>
          err instanceof RuleSyntaxError &&
          err.code === 'ERR_BLOCK_UNSUPPORTED' &&
          err.message === "Verb 'Note' does not take a { ... } block"
      );
    });

    it('should reject a block verb used without braces', () => {
      assert.throws(
        () => run('Wrap;'),
        (err: unknown) =>
          err instanceof RuleSyntaxError &&
          err.code === 'ERR_BLOCK_UNSUPPORTED' &&
          err.message === "Verb 'Wrap' must be used with a { ... } block"
      );
    });
  });
});
