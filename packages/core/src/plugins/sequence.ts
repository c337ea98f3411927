import type { SourceLocation } from '@layoutforge/types';
import { RuleSyntaxError } from '../errors/LayoutError.js';

/**
 * One position of a rule sequence as parsed: a lone entry, or the
 * parenthesised input group.
 */
export interface SequenceItem<T> {
  group: boolean;
  entries: T[];
  location?: SourceLocation;
}

export interface SplitSequence<T> {
  precontext: T[];
  input: T[];
  postcontext: T[];
}

/**
 * `pre ( input ) post` → parts. Without parentheses everything is input.
 */
export function splitSequence<T>(items: readonly SequenceItem<T>[], verb: string): SplitSequence<T> {
  const groups = items.filter(item => item.group);
  if (groups.length > 1) {
    const location = groups[1].location;
    throw new RuleSyntaxError(
      `${verb} takes at most one parenthesised input sequence`,
      'ERR_SYNTAX',
      location ? { file: location.file, line: location.line, column: location.column, verb } : { verb }
    );
  }
  if (groups.length === 0) {
    return { precontext: [], input: items.flatMap(item => item.entries), postcontext: [] };
  }
  const at = items.indexOf(groups[0]);
  return {
    precontext: items.slice(0, at).flatMap(item => item.entries),
    input: groups[0].entries,
    postcontext: items.slice(at + 1).flatMap(item => item.entries),
  };
}
