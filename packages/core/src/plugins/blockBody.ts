import { RuleSyntaxError } from '../errors/LayoutError.js';
import { handledValues, type StatementValue } from '../compiler/outcomes.js';
import type { BlockArguments } from './types.js';

/**
 * Values of the statements inside a brace body, in source order.
 * Included files and taken conditional branches contribute their
 * statements in place. Outcomes of unknown verbs are skipped; loose words
 * are a syntax error.
 */
export function bodyValues(block: Pick<BlockArguments, 'body' | 'location'>, verb: string): StatementValue[] {
  const outcomes = [];
  for (const item of block.body) {
    if (item.kind === 'word') {
      throw new RuleSyntaxError(
        `Unexpected '${item.word.image}' between blocks of ${verb}`,
        'ERR_SYNTAX',
        { file: block.location.file, line: item.word.line, column: item.word.column, verb }
      );
    }
    outcomes.push(item.outcome);
  }
  return spliced(handledValues(outcomes));
}

function spliced(values: readonly StatementValue[]): StatementValue[] {
  return values.flatMap(value =>
    value.kind === 'include' || value.kind === 'conditional' ? spliced(handledValues(value.outcomes)) : [value]
  );
}
