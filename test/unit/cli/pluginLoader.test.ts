/**
 * Custom plugin loader Tests
 *
 * Tests:
 * - Modules are imported in name order from .layoutforge/plugins/
 * - default and `plugin` exports
 * - Modules that fail to import or export nothing are reported
 * - Loaded plugins are registered by openSession
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { DiagnosticCollector, MemoryLogger } from '@layoutforge/core';
import { customPluginDirectory, loadCustomPlugins, openSession, pluginExport } from '@layoutforge/cli';

const SHOUT_PLUGIN = `{
  name: 'Shout',
  options: { useHelpers: false },
  grammar: () => undefined,
  verbs: [{ name: 'Shout', transformer: () => ({ action: () => ({ kind: 'none' }) }) }],
}`;

describe('pluginLoader', () => {
  let dir: string;

  function writePlugin(file: string, source: string): string {
    const pluginsDir = customPluginDirectory(dir);
    mkdirSync(pluginsDir, { recursive: true });
    const path = join(pluginsDir, file);
    writeFileSync(path, source);
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'layoutforge-plugins-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  // ===========================================================================
  // TESTS: pluginExport
  // ===========================================================================

  describe('pluginExport', () => {
    it('should prefer the default export', () => {
      assert.strictEqual(pluginExport({ default: 1, plugin: 2 }), 1);
      assert.strictEqual(pluginExport({ default: undefined, plugin: 2 }), 2);
    });

    it('should return undefined when nothing is exported', () => {
      assert.strictEqual(pluginExport({ other: 1 }), undefined);
      assert.strictEqual(pluginExport(null), undefined);
    });
  });

  // ===========================================================================
  // TESTS: loading
  // ===========================================================================

  describe('loadCustomPlugins', () => {
    it('should return nothing when the directory is missing', async () => {
      const loaded = await loadCustomPlugins(dir, new DiagnosticCollector(), new MemoryLogger());
      assert.deepStrictEqual(loaded, []);
    });

    it('should load modules in name order and skip other files', async () => {
      const second = writePlugin('b-named.mjs', `export const plugin = ${SHOUT_PLUGIN};\n`);
      const first = writePlugin('a-default.mjs', `export default ${SHOUT_PLUGIN};\n`);
      writePlugin('notes.txt', 'not a plugin');

      const loaded = await loadCustomPlugins(dir, new DiagnosticCollector(), new MemoryLogger());
      assert.deepStrictEqual(loaded.map(l => l.file), [first, second]);
    });

    it('should report a module that fails to import', async () => {
      const path = writePlugin('broken.mjs', 'export default {\n');
      const diagnostics = new DiagnosticCollector();
      const logger = new MemoryLogger();

      assert.deepStrictEqual(await loadCustomPlugins(dir, diagnostics, logger), []);
      const [diagnostic] = diagnostics.getByCode('ERR_PLUGIN_LOAD');
      assert.ok(diagnostic.message.startsWith('Failed to load plugin broken.mjs: '));
      assert.strictEqual(diagnostic.file, path);
      assert.deepStrictEqual(logger.messages('warn'), [diagnostic.message]);
    });

    it('should report a module without a plugin export', async () => {
      writePlugin('empty.mjs', 'export const unrelated = 1;\n');
      const diagnostics = new DiagnosticCollector();

      assert.deepStrictEqual(await loadCustomPlugins(dir, diagnostics, new MemoryLogger()), []);
      assert.strictEqual(
        diagnostics.getByCode('ERR_PLUGIN_LOAD')[0].message,
        "Plugin module empty.mjs has no default or 'plugin' export"
      );
    });
  });

  // ===========================================================================
  // TESTS: session
  // ===========================================================================

  describe('openSession', () => {
    it('should register custom plugins after the built-in ones', async () => {
      writePlugin('shout.mjs', `export default ${SHOUT_PLUGIN};\n`);
      const opened = await openSession({ project: dir, logLevel: 'silent' }, false);
      const { session } = opened;

      assert.strictEqual(session.verbNames[session.verbNames.length - 1], 'Shout');
      const [outcome] = session.compileString('Shout;');
      assert.ok(outcome.status === 'handled');
      assert.deepStrictEqual(outcome.value, { kind: 'none' });
      await opened.close();
    });
  });
});
