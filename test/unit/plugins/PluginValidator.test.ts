/**
 * PluginValidator Tests
 *
 * Tests:
 * - Every built-in plugin passes
 * - Plugin-level and verb-level problems are listed in order
 * - pluginLabel and builtinPlugins
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  BUILTIN_PLUGINS,
  SubstitutePlugin,
  VariablesPlugin,
  builtinPlugins,
  isRulePlugin,
  pluginLabel,
  pluginProblems,
} from '@layoutforge/core';

const noop = (): undefined => undefined;

describe('PluginValidator', () => {
  it('should accept every built-in plugin', () => {
    for (const [name, plugin] of Object.entries(BUILTIN_PLUGINS)) {
      assert.deepStrictEqual(pluginProblems(plugin), [], name);
      assert.strictEqual(isRulePlugin(plugin), true);
    }
  });

  it('should reject values that are not objects', () => {
    assert.deepStrictEqual(pluginProblems(null), ['plugin must be an object']);
    assert.deepStrictEqual(pluginProblems([SubstitutePlugin]), ['plugin must be an object']);
    assert.strictEqual(isRulePlugin('Substitute'), false);
  });

  it('should list plugin-level problems in order', () => {
    assert.deepStrictEqual(pluginProblems({ name: ' ', options: {}, tokens: 'x', verbs: [] }), [
      'name must be a non-empty string',
      'options.useHelpers must be a boolean',
      'grammar must be a function',
      'tokens must be an array of token types',
      'verbs must be a non-empty array',
    ]);
  });

  it('should list verb problems with a readable label', () => {
    const candidate = {
      name: 'Custom',
      options: { useHelpers: true },
      grammar: noop,
      verbs: [
        'Frob',
        { name: 'lowercase', transformer: noop },
        { transformer: noop, grammar: 'rule' },
        { name: 'Fine', beforeBraceGrammar: 3 },
      ],
    };
    assert.deepStrictEqual(pluginProblems(candidate), [
      'verbs[0] must be an object',
      "verb 'lowercase' needs a name starting with an uppercase letter",
      'verbs[2] needs a name starting with an uppercase letter',
      'verbs[2].grammar must be a function',
      "verb 'Fine' needs a transformer factory",
      "verb 'Fine'.beforeBraceGrammar must be a function",
    ]);
  });

  it('should label plugins with or without a name', () => {
    assert.strictEqual(pluginLabel({ name: 'Custom' }), 'Custom');
    assert.strictEqual(pluginLabel({ name: 7 }), '<unnamed plugin>');
    assert.strictEqual(pluginLabel(undefined), '<unnamed plugin>');
  });

  it('should pick built-in plugins by name in the given order', () => {
    assert.deepStrictEqual(builtinPlugins(['Variables', 'Nope', 'Substitute']), [VariablesPlugin, SubstitutePlugin]);
    assert.strictEqual(builtinPlugins().length, Object.keys(BUILTIN_PLUGINS).length);
  });
});
