/**
 * Routine plugin - `Routine [name] { statements } [flags];`
 *
 * Collects the rules of its body into one routine, registers it and closes
 * it, copying the lookup flags onto every rule. Rules of nested routines are
 * copied in.
 */

import {
  LOOKUP_FLAGS,
  isLookupFlagName,
  type LookupFlagName,
} from '@layoutforge/types';
import type { StatementValue } from '../compiler/outcomes.js';
import { RuleSyntaxError } from '../errors/LayoutError.js';
import { BareName } from '../grammar/tokens.js';
import { Routine } from '../ir/Routine.js';
import { BaseTransformer } from './BaseTransformer.js';
import { bodyValues } from './blockBody.js';
import { definePlugin, defineVerb, type BlockArguments } from './types.js';

type RoutineName = string | undefined;

class RoutineTransformer extends BaseTransformer<unknown, RoutineName, LookupFlagName[]> {
  blockAction(block: BlockArguments<RoutineName, LookupFlagName[]>): StatementValue {
    const flags = block.after.reduce((value, flag) => value | LOOKUP_FLAGS[flag], 0);
    const routine = new Routine({ name: block.before, flags, address: this.address });

    for (const value of bodyValues(block, this.context.verb)) {
      if (value.kind === 'rules') {
        for (const rule of value.rules) routine.addRule(rule);
      } else if (value.kind === 'routine') {
        // Copies: the nested routine keeps its own flags on its rules
        for (const rule of value.routine.rules) routine.addRule({ ...rule });
      }
    }

    this.context.fontFeatures.addRoutine(routine);
    routine.close();
    this.logger.debug(`Routine ${routine.name ?? '(anonymous)'}`, { rules: routine.rules.length, flags: block.after });
    return { kind: 'routine', routine };
  }
}

export const RoutineVerb = defineVerb<unknown, undefined, RoutineName, LookupFlagName[]>({
  name: 'Routine',
  beforeBraceGrammar(g) {
    return g.rule('routineName', () => {
      const name = g.option(0, () => g.consume(0, BareName));
      return g.action((): RoutineName => name?.image);
    });
  },
  afterBraceGrammar(g) {
    return g.rule('routineFlags', () => {
      const flags: LookupFlagName[] = [];
      g.many(0, () => {
        const flag = g.consume(0, BareName);
        g.action(() => {
          if (!isLookupFlagName(flag.image)) {
            const { file, line, column } = g.locate(flag);
            throw new RuleSyntaxError(
              `Unknown lookup flag '${flag.image}'`,
              'ERR_SYNTAX',
              { file, line, column, verb: 'Routine' },
              `Valid flags: ${Object.keys(LOOKUP_FLAGS).join(', ')}`
            );
          }
          flags.push(flag.image);
        });
      });
      return flags;
    });
  },
  transformer: context => new RoutineTransformer(context),
});

export const RoutinePlugin = definePlugin<undefined>({
  name: 'Routine',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [RoutineVerb],
});
