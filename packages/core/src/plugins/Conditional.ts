/**
 * Conditional plugin - `If <integer> <comparator> <integer> { statements } [Else { statements }];`
 *
 * Both bodies are dispatched like any nested statements; the condition
 * picks which body's values the enclosing block sees. A false condition
 * without an Else body contributes nothing.
 */

import type { StatementOutcome, StatementValue } from '../compiler/outcomes.js';
import { RuleSyntaxError } from '../errors/LayoutError.js';
import { compare } from '../classes/ClassAlgebra.js';
import type { Comparator, IntegerNode } from '../grammar/syntax.js';
import { BaseTransformer } from './BaseTransformer.js';
import { definePlugin, defineVerb, type BlockArguments } from './types.js';

export interface Condition {
  left: IntegerNode;
  comparator: Comparator;
  right: IntegerNode;
}

class ConditionalTransformer extends BaseTransformer<unknown, Condition, undefined> {
  blockAction(block: BlockArguments<Condition, undefined>): StatementValue {
    const between: string[] = [];
    for (const item of block.body) {
      if (item.kind === 'word') between.push(item.word.image);
    }
    const shape = block.groups.length === 1 ? between.length === 0 : block.groups.length === 2 && between.join(' ') === 'Else';
    if (!shape) {
      throw new RuleSyntaxError(
        'If takes one { ... } body, optionally followed by Else { ... }',
        'ERR_SYNTAX',
        this.errorContext
      );
    }

    const { left, comparator, right } = block.before;
    const taken = compare(this.resolveInteger(left), comparator, this.resolveInteger(right));
    const chosen = (taken ? block.groups[0] : block.groups[1]) ?? [];
    const outcomes: StatementOutcome[] = [];
    for (const item of chosen) {
      if (item.kind === 'statement') outcomes.push(item.outcome);
    }

    this.logger.debug(`If at ${this.address}`, { taken, statements: outcomes.length });
    return { kind: 'conditional', taken, outcomes };
  }
}

export const IfVerb = defineVerb<unknown, undefined, Condition, undefined>({
  name: 'If',
  beforeBraceGrammar(g, helpers) {
    return g.rule('condition', () => {
      const left = g.subrule(0, helpers.integerContainer);
      const comparator = g.subrule(0, helpers.comparator);
      const right = g.subrule(1, helpers.integerContainer);
      return { left, comparator, right };
    });
  },
  transformer: context => new ConditionalTransformer(context),
});

export const ConditionalPlugin = definePlugin<undefined>({
  name: 'Conditional',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [IfVerb],
});
