/**
 * CompilationSession Tests
 *
 * Tests:
 * - Built-in plugins and verb listing
 * - Plugin validation and verb replacement
 * - Fatal errors are recorded once and rethrown
 * - Rule files: unreadable files, include cycles
 * - Sessions share no state
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import {
  DebugPlugin,
  FileAccessError,
  RuleSyntaxError,
  UndefinedReferenceError,
  definePlugin,
  defineVerb,
} from '@layoutforge/core';
import { testSession } from '../../helpers/fonts.js';

describe('CompilationSession', () => {
  // ===========================================================================
  // TESTS: plugins
  // ===========================================================================

  describe('plugins', () => {
    it('should register every built-in verb by default', () => {
      const { session } = testSession();
      assert.deepStrictEqual(session.verbNames, [
        'DefineClass',
        'DefineClassBinned',
        'ShowClass',
        'DumpClassNames',
        'DumpClasses',
        'Set',
        'Feature',
        'Routine',
        'Substitute',
        'Position',
        'Chain',
        'Attach',
        'Include',
        'If',
      ]);
    });

    it('should describe verbs with their plugin and block use', () => {
      const { session } = testSession();
      const verbs = session.verbs();
      assert.deepStrictEqual(verbs.find(v => v.verb === 'Routine'), { verb: 'Routine', plugin: 'Routine', block: true });
      assert.deepStrictEqual(verbs.find(v => v.verb === 'Set'), { verb: 'Set', plugin: 'Variables', block: false });
    });

    it('should register only the given plugins', () => {
      const { session } = testSession({ plugins: [DebugPlugin] });
      assert.deepStrictEqual(session.verbNames, ['ShowClass', 'DumpClassNames', 'DumpClasses']);
    });

    it('should reject an invalid plugin with an error diagnostic', () => {
      const { session, logger } = testSession({ plugins: [] });
      assert.strictEqual(session.registerPlugin({ name: 'Half' }), false);
      const message = 'Invalid plugin Half: options.useHelpers must be a boolean; grammar must be a function; verbs must be a non-empty array';
      const [diagnostic] = session.diagnostics.getByCode('ERR_PLUGIN_INVALID');
      assert.strictEqual(diagnostic.message, message);
      assert.strictEqual(diagnostic.severity, 'error');
      assert.deepStrictEqual(logger.messages('error'), [message]);
      assert.deepStrictEqual(session.verbNames, []);
    });

    it('should let a later plugin replace a verb and warn', () => {
      const { session, logger } = testSession({ plugins: [DebugPlugin] });
      const custom = definePlugin<undefined>({
        name: 'Custom',
        options: { useHelpers: false },
        grammar: () => undefined,
        verbs: [defineVerb<unknown>({ name: 'DumpClasses', transformer: () => ({ action: () => ({ kind: 'custom', data: 'mine' }) }) })],
      });
      assert.strictEqual(session.registerPlugin(custom), true);
      assert.deepStrictEqual(logger.messages('warn'), ["Verb 'DumpClasses' replaced by plugin 'Custom'"]);
      const [outcome] = session.compileString('DumpClasses;');
      assert.ok(outcome.status === 'handled');
      assert.deepStrictEqual(outcome.value, { kind: 'custom', data: 'mine' });
    });
  });

  // ===========================================================================
  // TESTS: errors
  // ===========================================================================

  describe('fatal errors', () => {
    it('should record and rethrow a resolution failure', () => {
      const { session } = testSession();
      assert.throws(() => session.compileString('ShowClass @missing;', 'rules.fee'), UndefinedReferenceError);
      const [diagnostic] = session.diagnostics.getAll();
      assert.strictEqual(diagnostic.code, 'ERR_UNDEFINED_CLASS');
      assert.strictEqual(diagnostic.severity, 'fatal');
      assert.strictEqual(diagnostic.file, 'rules.fee');
      assert.strictEqual(session.diagnostics.hasFatal(), true);
    });

    it('should record syntax errors', () => {
      const { session } = testSession();
      assert.throws(() => session.compileString('DefineClass @a = A'), RuleSyntaxError);
      assert.strictEqual(session.diagnostics.getByCode('ERR_SYNTAX').length, 1);
    });

    it('should keep statements compiled before the failure', () => {
      const { session } = testSession();
      assert.throws(() => session.compileString('DefineClass @a = A;\nShowClass @b;'));
      assert.deepStrictEqual(session.fontFeatures.namedClasses.get('a'), ['A']);
    });
  });

  // ===========================================================================
  // TESTS: files
  // ===========================================================================

  describe('files', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'layoutforge-session-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should compile a rule file and tag outcomes with its path', () => {
      const path = join(dir, 'main.fee');
      writeFileSync(path, 'DefineClass @caps = [A B];\n');
      const { session } = testSession();
      const [outcome] = session.compileFile(path);
      assert.deepStrictEqual(outcome.location, { file: path, line: 1, column: 1 });
      assert.deepStrictEqual(session.fontFeatures.namedClasses.get('caps'), ['A', 'B']);
    });

    it('should raise FileAccessError for an unreadable file', () => {
      const path = join(dir, 'missing.fee');
      const { session } = testSession();
      assert.throws(
        () => session.compileFile(path),
        (err: unknown) =>
          err instanceof FileAccessError &&
          err.code === 'ERR_FILE_UNREADABLE' &&
          err.message.startsWith(`Cannot read rule file ${path}: `)
      );
      assert.strictEqual(session.diagnostics.getByCode('ERR_FILE_UNREADABLE').length, 1);
    });

    it('should detect include cycles and record them once', () => {
      const a = join(dir, 'a.fee');
      const b = join(dir, 'b.fee');
      writeFileSync(a, 'Include b.fee;\n');
      writeFileSync(b, 'Include a.fee;\n');
      const { session } = testSession();
      assert.throws(
        () => session.compileFile(a),
        (err: unknown) =>
          err instanceof FileAccessError &&
          err.code === 'ERR_INCLUDE_CYCLE' &&
          err.message === `Include cycle: ${a} -> ${b} -> ${a}`
      );
      assert.strictEqual(session.diagnostics.count(), 1);
    });

    it('should allow including the same file twice in sequence', () => {
      writeFileSync(join(dir, 'shared.fee'), 'Set $kern = -10;\n');
      const main = join(dir, 'main.fee');
      writeFileSync(main, 'Include shared.fee;\nInclude shared.fee;\n');
      const { session } = testSession();
      assert.strictEqual(session.compileFile(main).length, 2);
      assert.strictEqual(session.fontFeatures.variables.get('kern'), -10);
    });
  });

  // ===========================================================================
  // TESTS: isolation
  // ===========================================================================

  describe('isolation', () => {
    it('should not share classes between sessions', () => {
      const first = testSession().session;
      const second = testSession().session;
      first.compileString('DefineClass @caps = [A B];');
      assert.strictEqual(second.fontFeatures.namedClasses.has('caps'), false);
      assert.throws(() => second.compileString('ShowClass @caps;'), UndefinedReferenceError);
    });
  });
});
