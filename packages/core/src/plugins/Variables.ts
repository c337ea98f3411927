/**
 * Variables plugin - `Set $name = value;`
 *
 * The value is an integer (literal, variable or glyph metric such as
 * `width[space]`) or a value record (`<xAdvance=20>`, `<0 0 20 0>`).
 * Setting a name again replaces the earlier value.
 */

import type { StatementValue } from '../compiler/outcomes.js';
import type { IntegerNode, ValueRecordNode } from '../grammar/syntax.js';
import { Equals, NamedInteger } from '../grammar/tokens.js';
import type { VariableValue } from '../ir/FontFeatures.js';
import { BaseTransformer } from './BaseTransformer.js';
import { definePlugin, defineVerb } from './types.js';

export interface SetArgs {
  name: string;
  value: { kind: 'integer'; node: IntegerNode } | { kind: 'record'; node: ValueRecordNode };
}

class SetTransformer extends BaseTransformer<SetArgs> {
  action(args: SetArgs): StatementValue {
    const value = this.evaluate(args.value);
    this.context.fontFeatures.variables.set(args.name, value);
    this.logger.debug(`Set $${args.name}`, { value });
    return { kind: 'variable', name: args.name, value };
  }

  private evaluate(value: SetArgs['value']): VariableValue {
    if (value.kind === 'record') {
      return this.resolveValueRecord(value.node);
    }
    // `Set $b = $a;` copies whatever $a holds
    if (value.node.kind === 'variable') {
      return this.variable(value.node.name, value.node.location);
    }
    return this.resolveInteger(value.node);
  }
}

export const SetVerb = defineVerb<SetArgs>({
  name: 'Set',
  grammar(g, helpers) {
    return g.rule('setVariable', () => {
      const name = g.consume(0, NamedInteger);
      g.consume(0, Equals);
      const value = g.or<SetArgs['value']>(0, [
        {
          ALT: () => {
            const node = g.subrule(0, helpers.valueRecordLiteral);
            return g.action((): SetArgs['value'] => ({ kind: 'record', node }));
          },
        },
        {
          ALT: () => {
            const node = g.subrule(0, helpers.integerContainer);
            return g.action((): SetArgs['value'] => ({ kind: 'integer', node }));
          },
        },
      ]);
      return g.action((): SetArgs => ({ name: name.image.slice(1), value }));
    });
  },
  transformer: context => new SetTransformer(context),
});

export const VariablesPlugin = definePlugin<undefined>({
  name: 'Variables',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [SetVerb],
});
