/**
 * Chain plugin Tests
 *
 * Tests:
 * - Routine references at input positions
 * - The most recent routine with a name is used
 * - Undefined routines and references on context glyphs
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { RuleSyntaxError, UndefinedReferenceError, describeRule, type ChainingRule } from '@layoutforge/core';
import { testSession } from '../../helpers/fonts.js';

const KERN = 'Routine kern { Position A -20; };\n';

describe('Chain plugin', () => {
  it('should apply a named routine inside the input', () => {
    const { session } = testSession();
    const outcomes = session.compileString(`${KERN}Chain ( A ^kern ) B;`);
    const chained = outcomes[1];
    assert.ok(chained.status === 'handled' && chained.value.kind === 'rules');
    const [rule] = chained.value.rules;
    assert.ok(rule.kind === 'chaining');
    assert.strictEqual(describeRule(rule), 'chain ( A ^kern ) B');
    assert.strictEqual(rule.lookups[0][0], session.fontFeatures.routineNamed('kern'));
  });

  it('should treat every glyph as input without parentheses', () => {
    const { session } = testSession();
    const outcomes = session.compileString(`${KERN}Chain A ^kern B;`);
    const chained = outcomes[1];
    assert.ok(chained.status === 'handled' && chained.value.kind === 'rules');
    const rule = chained.value.rules[0];
    assert.ok(rule.kind === 'chaining');
    assert.strictEqual(rule.lookups.length, 2);
    assert.strictEqual(rule.lookups[1].length, 0);
    assert.strictEqual(describeRule(rule), 'chain A ^kern B');
  });

  it('should use the latest routine with the name', () => {
    const { session } = testSession();
    const outcomes = session.compileString(`${KERN}Routine kern { Position A -10; };\nChain ( A ^kern );`);
    const chained = outcomes[2];
    assert.ok(chained.status === 'handled' && chained.value.kind === 'rules');
    const rule: ChainingRule | undefined = chained.value.rules.find((r): r is ChainingRule => r.kind === 'chaining');
    assert.ok(rule);
    assert.strictEqual(rule.lookups[0][0], session.fontFeatures.routines[1]);
  });

  it('should raise for an undefined routine at the reference', () => {
    const { session } = testSession();
    assert.throws(
      () => session.compileString('Chain ( A ^nope );'),
      (err: unknown) =>
        err instanceof UndefinedReferenceError &&
        err.code === 'ERR_UNDEFINED_ROUTINE' &&
        err.message === "Routine 'nope' was not defined (at 1:12)"
    );
  });

  it('should reject a reference on a context glyph', () => {
    const { session } = testSession();
    assert.throws(
      () => session.compileString(`${KERN}Chain A ^kern ( B );`),
      (err: unknown) =>
        err instanceof RuleSyntaxError && err.message === "Routine reference on context glyph 'A'" && err.context.line === 2
    );
  });
});
