/**
 * StatementDispatcher - routes parsed statements to verb transformers
 *
 * For each statement:
 * - unknown verb: one warning, outcome keeps the raw arguments
 * - braces present: nested statements first (also grouped per body), then
 *   one blockAction with the before-brace and after-brace words parsed by
 *   the verb's own parsers
 * - otherwise: main parser, then action
 */

import type { Logger, SourceLocation } from '@layoutforge/types';
import type { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import { RuleSyntaxError, UnknownVerbWarning } from '../errors/LayoutError.js';
import type { ComposedVerb } from '../grammar/GrammarComposer.js';
import { JoinedArguments, type SourceWord } from '../grammar/JoinedArguments.js';
import type { RawStatement } from '../grammar/StatementParser.js';
import type { VerbContext } from '../plugins/types.js';
import type { ArgumentItem, StatementOutcome, StatementValue } from './outcomes.js';

export interface DispatchEnvironment {
  lookup(verb: string): ComposedVerb | undefined;
  createContext(verb: string, location: SourceLocation): VerbContext;
  readonly diagnostics: DiagnosticCollector;
  readonly logger: Logger;
}

function wordsOf(items: readonly ArgumentItem[]): SourceWord[] {
  const words: SourceWord[] = [];
  for (const item of items) {
    if (item.kind === 'word') words.push(item.word);
  }
  return words;
}

export class StatementDispatcher {
  constructor(private readonly env: DispatchEnvironment) {}

  dispatchAll(statements: readonly RawStatement[], file?: string): StatementOutcome[] {
    return statements.map(statement => this.dispatch(statement, file));
  }

  dispatch(statement: RawStatement, file?: string): StatementOutcome {
    const verb = statement.verb.image;
    const location: SourceLocation = { file, line: statement.verb.line, column: statement.verb.column };

    // Flatten, dispatching nested statements in source order
    const args: ArgumentItem[] = [];
    const groups: ArgumentItem[][] = [];
    let firstBlock = -1;
    let afterLastBlock = -1;
    for (const item of statement.items) {
      if (item.kind === 'word') {
        args.push(item);
        continue;
      }
      if (firstBlock < 0) firstBlock = args.length;
      const group: ArgumentItem[] = [];
      for (const nested of item.statements) {
        group.push({ kind: 'statement', outcome: this.dispatch(nested, file) });
      }
      args.push(...group);
      groups.push(group);
      afterLastBlock = args.length;
    }

    const composed = this.env.lookup(verb);
    if (!composed) {
      const warning = new UnknownVerbWarning(verb, { file, line: location.line, column: location.column });
      this.env.diagnostics.addFromError(warning, verb);
      this.env.logger.warn(warning.message, { file, line: location.line });
      return { status: 'unknown', verb, args, location };
    }

    this.env.logger.debug(`Dispatching ${verb}`, { file, line: location.line, plugin: composed.plugin });
    const transformer = composed.definition.transformer(this.env.createContext(verb, location));
    const context = { file, line: location.line, column: location.column, verb };
    let value: StatementValue;

    if (firstBlock >= 0) {
      if (!transformer.blockAction) {
        throw new RuleSyntaxError(`Verb '${verb}' does not take a { ... } block`, 'ERR_BLOCK_UNSUPPORTED', context);
      }
      const before = composed.beforeBrace.parse(new JoinedArguments(wordsOf(args.slice(0, firstBlock)), location));
      const after = composed.afterBrace.parse(new JoinedArguments(wordsOf(args.slice(afterLastBlock)), location));
      value = transformer.blockAction({ before, body: args.slice(firstBlock, afterLastBlock), groups, after, location });
    } else {
      if (!transformer.action) {
        throw new RuleSyntaxError(`Verb '${verb}' must be used with a { ... } block`, 'ERR_BLOCK_UNSUPPORTED', context);
      }
      value = transformer.action(composed.main.parse(new JoinedArguments(wordsOf(args), location)));
    }

    return { status: 'handled', verb, value, location };
  }
}
