/**
 * Plugin contract.
 *
 * A plugin contributes tokens, plugin-wide grammar rules and one or more
 * verbs. Each verb supplies grammar fragments for its arguments and a
 * transformer factory that turns parsed arguments into IR changes.
 */

import type { ParserMethod, TokenType } from 'chevrotain';
import type { FontModel, Logger, SourceLocation } from '@layoutforge/types';
import type { ArgumentItem, StatementOutcome, StatementValue } from '../compiler/outcomes.js';
import type { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import type { GrammarBuilder, HelperRules } from '../grammar/GrammarBuilder.js';
import type { FontFeatures } from '../ir/FontFeatures.js';

export interface PluginOptions {
  /** Include the base tokens and helper rules in every verb parser */
  readonly useHelpers: boolean;
}

/**
 * Everything a transformer may use while handling one statement.
 */
export interface VerbContext {
  readonly verb: string;
  readonly location: SourceLocation;
  readonly font: FontModel;
  readonly fontFeatures: FontFeatures;
  readonly logger: Logger;
  readonly diagnostics: DiagnosticCollector;
  readonly strict: boolean;
  readonly includePaths: readonly string[];
  /** Compile another rule file into the same session */
  compileFile(path: string): StatementOutcome[];
}

/**
 * Arguments of a statement that carries braces.
 *
 * `before` and `after` are the results of the before-brace and after-brace
 * parsers (undefined when the verb declares none). `body` holds the words
 * and nested statement outcomes between the first `{` and the last `}`;
 * `groups` holds the nested statement items of each brace pair apart.
 */
export interface BlockArguments<THeader = unknown, TTrailer = unknown> {
  before: THeader;
  body: ArgumentItem[];
  groups: ArgumentItem[][];
  after: TTrailer;
  location: SourceLocation;
}

export interface VerbTransformer<TArgs = unknown, THeader = unknown, TTrailer = unknown> {
  action?(args: TArgs): StatementValue;
  blockAction?(block: BlockArguments<THeader, TTrailer>): StatementValue;
}

export interface VerbDefinition<TArgs = unknown, TShared = unknown, THeader = unknown, TTrailer = unknown> {
  readonly name: string;
  /** Arguments of a statement without braces; omitted means no arguments */
  grammar?(g: GrammarBuilder, helpers: HelperRules, shared: TShared): ParserMethod<[], TArgs>;
  beforeBraceGrammar?(g: GrammarBuilder, helpers: HelperRules, shared: TShared): ParserMethod<[], THeader>;
  afterBraceGrammar?(g: GrammarBuilder, helpers: HelperRules, shared: TShared): ParserMethod<[], TTrailer>;
  /** Called once per statement */
  transformer(context: VerbContext): VerbTransformer<TArgs, THeader, TTrailer>;
}

export interface RulePlugin<TShared = unknown> {
  readonly name: string;
  readonly options: PluginOptions;
  /** Extra tokens, placed ahead of the base vocabulary */
  readonly tokens?: readonly TokenType[];
  /** Plugin-wide rules, defined once per parser before the verb fragment */
  grammar(g: GrammarBuilder, helpers: HelperRules): TShared;
  readonly verbs: readonly VerbDefinition<unknown, TShared, unknown, unknown>[];
}

/**
 * Type-checks a verb definition without widening it.
 */
export function defineVerb<TArgs, TShared = undefined, THeader = undefined, TTrailer = undefined>(
  verb: VerbDefinition<TArgs, TShared, THeader, TTrailer>
): VerbDefinition<TArgs, TShared, THeader, TTrailer> {
  return verb;
}

export function definePlugin<TShared>(plugin: RulePlugin<TShared>): RulePlugin<TShared> {
  return plugin;
}
