/**
 * GlyphSelector Tests
 *
 * Tests:
 * - Every selector form resolves in font order or written order
 * - Suffix append and strip, and stripping what was appended
 * - Resolving twice gives the same glyphs
 * - Missing glyphs warn and drop, or raise in strict mode
 * - Bare names are taken as written
 * - Undefined classes, missing codepoints and bad regexes raise
 * - asText() rendering
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  GlyphSelector,
  MissingGlyphWarning,
  ResolutionError,
  UndefinedReferenceError,
  codepointText,
  type SelectorScope,
} from '@layoutforge/core';
import { testFont } from '../../helpers/fonts.js';

const location = { file: 'rules.fee', line: 3, column: 9 };

function scope(overrides: Partial<SelectorScope> = {}): SelectorScope & { warnings: MissingGlyphWarning[] } {
  const warnings: MissingGlyphWarning[] = [];
  return {
    font: testFont(),
    namedClasses: new Map([['upper', ['A', 'B', 'C']]]),
    onWarning: warning => warnings.push(warning),
    warnings,
    ...overrides,
  };
}

describe('GlyphSelector', () => {
  // ===========================================================================
  // TESTS: forms
  // ===========================================================================

  describe('resolve', () => {
    it('should expand a class', () => {
      const selector = new GlyphSelector({ kind: 'classname', name: 'upper' });
      assert.deepStrictEqual(selector.resolve(scope()), ['A', 'B', 'C']);
    });

    it('should match a regex against exported glyphs in font order', () => {
      const selector = new GlyphSelector({ kind: 'regex', pattern: '\\.sc$' });
      assert.deepStrictEqual(selector.resolve(scope()), ['A.sc', 'B.sc']);
    });

    it('should not match unexported glyphs with a regex', () => {
      const selector = new GlyphSelector({ kind: 'regex', pattern: 'notdef' });
      assert.deepStrictEqual(selector.resolve(scope()), []);
    });

    it('should map a codepoint to its glyph', () => {
      const selector = new GlyphSelector({ kind: 'unicodeglyph', codepoint: 0x301 });
      assert.deepStrictEqual(selector.resolve(scope()), ['acutecomb']);
    });

    it('should expand a codepoint range', () => {
      const selector = new GlyphSelector({ kind: 'unicoderange', start: 0x41, end: 0x43 });
      assert.deepStrictEqual(selector.resolve(scope()), ['A', 'B', 'C']);
    });

    it('should concatenate inline class members in written order', () => {
      const selector = new GlyphSelector({
        kind: 'inlineclass',
        members: [
          { kind: 'barename', name: 'f' },
          { kind: 'unicodeglyph', codepoint: 0x61 },
          { kind: 'classname', name: 'upper' },
        ],
      });
      assert.deepStrictEqual(selector.resolve(scope()), ['f', 'a', 'A', 'B', 'C']);
    });

    it('should resolve to the same glyphs every time', () => {
      const selector = new GlyphSelector({ kind: 'regex', pattern: '^[AB]' }, [{ operation: 'strip', suffix: 'sc' }]);
      const shared = scope();
      const first = selector.resolve(shared);
      assert.deepStrictEqual(selector.resolve(shared), first);
      assert.deepStrictEqual(shared.warnings, []);
    });
  });

  // ===========================================================================
  // TESTS: suffixes
  // ===========================================================================

  describe('suffixes', () => {
    it('should append a suffix to every glyph', () => {
      const selector = new GlyphSelector({ kind: 'inlineclass', members: [{ kind: 'barename', name: 'A' }, { kind: 'barename', name: 'B' }] }, [
        { operation: 'append', suffix: 'sc' },
      ]);
      assert.deepStrictEqual(selector.resolve(scope()), ['A.sc', 'B.sc']);
    });

    it('should undo an appended suffix by stripping it', () => {
      const members = [{ kind: 'barename' as const, name: 'A' }, { kind: 'barename' as const, name: 'B' }];
      const selector = new GlyphSelector({ kind: 'inlineclass', members }, [
        { operation: 'append', suffix: 'sc' },
        { operation: 'strip', suffix: 'sc' },
      ]);
      assert.deepStrictEqual(selector.resolve(scope()), ['A', 'B']);
    });

    it('should strip a suffix where present', () => {
      const selector = new GlyphSelector({ kind: 'regex', pattern: '^[AB]' }, [{ operation: 'strip', suffix: 'sc' }]);
      assert.deepStrictEqual(selector.resolve(scope()), ['A', 'B', 'A', 'B']);
    });
  });

  // ===========================================================================
  // TESTS: missing glyphs
  // ===========================================================================

  describe('missing glyphs', () => {
    it('should drop missing glyphs and warn', () => {
      const s = scope();
      const selector = new GlyphSelector({ kind: 'classname', name: 'upper' }, [{ operation: 'append', suffix: 'sc' }], location);
      assert.deepStrictEqual(selector.resolve(s), ['A.sc', 'B.sc']);
      assert.strictEqual(s.warnings.length, 1);
      assert.strictEqual(s.warnings[0].code, 'WARN_MISSING_GLYPH');
      assert.strictEqual(s.warnings[0].message, "Couldn't find glyph(s) 'C.sc' in font (@upper.sc at rules.fee:3:9)");
      assert.deepStrictEqual(s.warnings[0].glyphs, ['C.sc']);
    });

    it('should raise in strict mode', () => {
      const selector = new GlyphSelector({ kind: 'classname', name: 'upper' }, [{ operation: 'append', suffix: 'sc' }], location);
      assert.throws(
        () => selector.resolve(scope({ strict: true })),
        (err: unknown) =>
          err instanceof ResolutionError &&
          err.code === 'ERR_MISSING_GLYPH' &&
          err.message === "Couldn't find glyph(s) 'C.sc' in font (@upper.sc at rules.fee:3:9)"
      );
    });

    it('should keep everything when existence is not required', () => {
      const s = scope();
      const selector = new GlyphSelector({ kind: 'classname', name: 'upper' }, [{ operation: 'append', suffix: 'sc' }]);
      assert.deepStrictEqual(selector.resolve(s, { mustExist: false }), ['A.sc', 'B.sc', 'C.sc']);
      assert.strictEqual(s.warnings.length, 0);
    });

    it('should take a bare name as written', () => {
      const s = scope({ strict: true });
      assert.deepStrictEqual(new GlyphSelector({ kind: 'barename', name: 'Zeta' }).resolve(s), ['Zeta']);
    });

    it('should check bare names inside an inline class', () => {
      const s = scope();
      const selector = new GlyphSelector({ kind: 'inlineclass', members: [{ kind: 'barename', name: 'A' }, { kind: 'barename', name: 'Zeta' }] });
      assert.deepStrictEqual(selector.resolve(s), ['A']);
      assert.strictEqual(s.warnings[0].message, "Couldn't find glyph(s) 'Zeta' in font ([A Zeta] at unknown location)");
    });
  });

  // ===========================================================================
  // TESTS: errors
  // ===========================================================================

  describe('errors', () => {
    it('should raise for an undefined class', () => {
      const selector = new GlyphSelector({ kind: 'classname', name: 'lower' }, [], location);
      assert.throws(
        () => selector.resolve(scope()),
        (err: unknown) =>
          err instanceof UndefinedReferenceError &&
          err.code === 'ERR_UNDEFINED_CLASS' &&
          err.message === "Tried to expand glyph class '@lower' but @lower was not defined (at rules.fee:3:9)"
      );
    });

    it('should raise for a codepoint the font lacks', () => {
      const selector = new GlyphSelector({ kind: 'unicoderange', start: 0x41, end: 0x44 }, [], location);
      assert.throws(
        () => selector.resolve(scope()),
        (err: unknown) =>
          err instanceof ResolutionError &&
          err.code === 'ERR_MISSING_CODEPOINT' &&
          err.message === 'Font does not contain glyph for U+0044 (at rules.fee:3:9)'
      );
    });

    it('should raise for an invalid regex', () => {
      const selector = new GlyphSelector({ kind: 'regex', pattern: '(' }, [], location);
      assert.throws(
        () => selector.resolve(scope()),
        (err: unknown) => err instanceof ResolutionError && err.code === 'ERR_INVALID_REGEX' && err.message.startsWith('Invalid regular expression /(/: ')
      );
    });
  });

  // ===========================================================================
  // TESTS: text
  // ===========================================================================

  describe('asText', () => {
    it('should render every form', () => {
      const selector = new GlyphSelector(
        {
          kind: 'inlineclass',
          members: [
            { kind: 'barename', name: 'a' },
            { kind: 'classname', name: 'upper' },
            { kind: 'unicodeglyph', codepoint: 0x301 },
          ],
        },
        [
          { operation: 'append', suffix: 'sc' },
          { operation: 'strip', suffix: 'alt' },
        ]
      );
      assert.strictEqual(selector.asText(), '[a @upper U+0301].sc~alt');
      assert.strictEqual(new GlyphSelector({ kind: 'unicoderange', start: 0x30, end: 0x39 }).asText(), 'U+0030=>U+0039');
      assert.strictEqual(new GlyphSelector({ kind: 'regex', pattern: '^a' }).asText(), '/^a/');
    });

    it('should pad codepoints to four digits', () => {
      assert.strictEqual(codepointText(0x41), 'U+0041');
      assert.strictEqual(codepointText(0x1f600), 'U+1F600');
    });
  });
});
