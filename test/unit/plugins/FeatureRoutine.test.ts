/**
 * Feature and Routine plugin Tests
 *
 * Tests:
 * - Loose rules in a feature become anonymous routines, split by named ones
 * - Routine names, lookup flags and nested routines keeping their own flags
 * - Feature tags and flag names are validated
 * - Unknown verbs inside a body are skipped; stray words are errors
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { RuleSyntaxError, describeRule } from '@layoutforge/core';
import { testSession } from '../../helpers/fonts.js';

describe('Feature and Routine plugins', () => {
  // ===========================================================================
  // TESTS: Feature
  // ===========================================================================

  describe('Feature', () => {
    it('should wrap loose rules into one anonymous routine', () => {
      const { session } = testSession();
      session.compileString('Feature liga {\n  Substitute f i -> f_i;\n  Substitute A -> A.sc;\n};');
      const routines = session.fontFeatures.features.get('liga');
      assert.ok(routines);
      assert.strictEqual(routines.length, 1);
      assert.strictEqual(routines[0].name, undefined);
      assert.strictEqual(routines[0].address, '1:1');
      assert.deepStrictEqual(routines[0].rules.map(describeRule), ['sub f i -> f_i', 'sub A -> A.sc']);
      assert.strictEqual(routines[0].isClosed, true);
    });

    it('should keep named routines in place between anonymous ones', () => {
      const { session } = testSession();
      session.compileString(
        'Feature kern {\n  Substitute a -> b;\n  Routine named { Position A 10; };\n  Substitute b -> a;\n};'
      );
      const json = session.fontFeatures.toJSON();
      assert.deepStrictEqual(json.features, { kern: [1, 'named', 2] });
      assert.deepStrictEqual(json.routines.map(r => r.rules), [['pos A <0 0 10 0>'], ['sub a -> b'], ['sub b -> a']]);
    });

    it('should append to a feature used twice', () => {
      const { session } = testSession();
      session.compileString('Feature liga { Substitute a -> b; };\nFeature liga { Substitute b -> a; };');
      assert.strictEqual(session.fontFeatures.features.get('liga')?.length, 2);
    });

    it('should register an empty feature', () => {
      const { session } = testSession();
      const [outcome] = session.compileString('Feature liga {};');
      assert.ok(outcome.status === 'handled');
      assert.deepStrictEqual(outcome.value, { kind: 'feature', tag: 'liga', routines: [] });
      assert.deepStrictEqual(session.fontFeatures.features.get('liga'), []);
    });

    it('should reject a tag longer than four characters', () => {
      const { session } = testSession();
      assert.throws(
        () => session.compileString('Feature ligature { };'),
        (err: unknown) =>
          err instanceof RuleSyntaxError &&
          err.message === "Feature tag must be 1 to 4 characters, got 'ligature'" &&
          err.context.column === 9
      );
    });

    it('should skip unknown verbs in the body with a warning', () => {
      const { session } = testSession();
      session.compileString('Feature liga { Frobnicate x; Substitute a -> b; };');
      assert.strictEqual(session.fontFeatures.features.get('liga')?.[0].rules.length, 1);
      assert.strictEqual(session.diagnostics.getByCode('WARN_UNKNOWN_VERB').length, 1);
    });

    it('should reject words between blocks', () => {
      const { session } = testSession();
      assert.throws(
        () => session.compileString('Feature liga { Substitute a -> b; } oops { };'),
        (err: unknown) =>
          err instanceof RuleSyntaxError && err.message === "Unexpected 'oops' between blocks of Feature" && err.context.column === 37
      );
    });

    it('should name the file of a stray word', () => {
      const { session } = testSession();
      assert.throws(
        () => session.compileString('Feature liga { } oops { };', 'rules.fee'),
        (err: unknown) =>
          err instanceof RuleSyntaxError &&
          err.context.file === 'rules.fee' &&
          err.context.line === 1 &&
          err.context.verb === 'Feature'
      );
    });
  });

  // ===========================================================================
  // TESTS: Routine
  // ===========================================================================

  describe('Routine', () => {
    it('should register a named routine and copy its flags onto rules', () => {
      const { session } = testSession();
      const [outcome] = session.compileString('Routine kern { Position A -20; } RightToLeft IgnoreMarks;');
      assert.ok(outcome.status === 'handled' && outcome.value.kind === 'routine');
      const routine = outcome.value.routine;
      assert.strictEqual(routine.name, 'kern');
      assert.strictEqual(routine.flags, 9);
      assert.strictEqual(routine.rules[0].flags, 9);
      assert.strictEqual(session.fontFeatures.routineNamed('kern'), routine);
    });

    it('should allow an anonymous routine without flags', () => {
      const { session } = testSession();
      const [outcome] = session.compileString('Routine { Substitute a -> b; };');
      assert.ok(outcome.status === 'handled' && outcome.value.kind === 'routine');
      assert.strictEqual(outcome.value.routine.name, undefined);
      assert.strictEqual(outcome.value.routine.flags, 0);
    });

    it('should copy the rules of nested routines', () => {
      const { session } = testSession();
      session.compileString('Routine outer { Routine inner { Substitute a -> b; }; Substitute b -> a; } IgnoreBases;');
      const outer = session.fontFeatures.routineNamed('outer');
      assert.ok(outer);
      assert.deepStrictEqual(outer.rules.map(describeRule), ['sub a -> b', 'sub b -> a']);
      assert.deepStrictEqual(session.fontFeatures.routines.map(r => r.name), ['inner', 'outer']);
    });

    it('should keep the flags of a nested routine on its own rules', () => {
      const { session } = testSession();
      session.compileString('Routine outer { Routine inner { Substitute a -> b; } IgnoreMarks; } RightToLeft;');
      const inner = session.fontFeatures.routineNamed('inner');
      const outer = session.fontFeatures.routineNamed('outer');
      assert.ok(inner && outer);
      assert.strictEqual(inner.flags, 8);
      assert.deepStrictEqual(inner.rules.map(rule => rule.flags), [8]);
      assert.strictEqual(outer.flags, 1);
      assert.deepStrictEqual(outer.rules.map(rule => rule.flags), [1]);
      assert.notStrictEqual(outer.rules[0], inner.rules[0]);
    });

    it('should reject an unknown flag', () => {
      const { session } = testSession();
      assert.throws(
        () => session.compileString('Routine x { } Sideways;'),
        (err: unknown) =>
          err instanceof RuleSyntaxError &&
          err.message === "Unknown lookup flag 'Sideways'" &&
          err.suggestion === 'Valid flags: RightToLeft, IgnoreBases, IgnoreLigatures, IgnoreMarks'
      );
    });
  });
});
