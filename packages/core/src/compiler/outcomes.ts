import type { SourceLocation } from '@layoutforge/types';
import type { SourceWord } from '../grammar/JoinedArguments.js';
import type { VariableValue } from '../ir/FontFeatures.js';
import type { Routine } from '../ir/Routine.js';
import type { Rule } from '../ir/rules.js';

/**
 * What a verb transformer returns for one statement.
 */
export type StatementValue =
  | { kind: 'none' }
  | { kind: 'rules'; rules: Rule[] }
  | { kind: 'routine'; routine: Routine }
  | { kind: 'feature'; tag: string; routines: Routine[] }
  | { kind: 'class'; name: string; glyphs: string[] }
  | { kind: 'classes'; names: string[] }
  | { kind: 'variable'; name: string; value: VariableValue }
  | { kind: 'include'; file: string; outcomes: StatementOutcome[] }
  /** Outcomes of the branch the condition picked; empty when none was */
  | { kind: 'conditional'; taken: boolean; outcomes: StatementOutcome[] }
  | { kind: 'custom'; data: unknown };

/**
 * A raw argument word, or a nested statement already dispatched.
 */
export type ArgumentItem =
  | { kind: 'word'; word: SourceWord }
  | { kind: 'statement'; outcome: StatementOutcome };

export type StatementOutcome =
  | { status: 'handled'; verb: string; value: StatementValue; location: SourceLocation }
  /** No plugin provides the verb; arguments are kept unresolved */
  | { status: 'unknown'; verb: string; args: ArgumentItem[]; location: SourceLocation };

/**
 * Values of the handled statements among the outcomes, in order.
 */
export function handledValues(outcomes: readonly StatementOutcome[]): StatementValue[] {
  const values: StatementValue[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'handled') {
      values.push(outcome.value);
    }
  }
  return values;
}
