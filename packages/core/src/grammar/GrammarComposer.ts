/**
 * GrammarComposer - builds an independent parser for every verb
 *
 * Each verb gets up to three parsers (main, before-brace, after-brace).
 * A parser's grammar is composed from the helper rules (when the plugin
 * asks for them), the plugin-wide rules and the verb's own fragment, over
 * the plugin's tokens plus the base vocabulary.
 */

import { EmbeddedActionsParser, Lexer, type IToken, type ParserMethod, type TokenType } from 'chevrotain';
import type { SourceLocation } from '@layoutforge/types';
import { GrammarError, RuleSyntaxError, type ErrorContext } from '../errors/LayoutError.js';
import type { RulePlugin, VerbDefinition } from '../plugins/types.js';
import type { GrammarBuilder, HelperRules } from './GrammarBuilder.js';
import { defineHelperRules } from './HelperGrammar.js';
import type { JoinedArguments } from './JoinedArguments.js';
import { BASE_TOKENS, WhiteSpace } from './tokens.js';

/**
 * Parses the joined arguments of one statement.
 */
export interface VerbParser {
  parse(args: JoinedArguments): unknown;
}

export interface ComposedVerb {
  readonly name: string;
  readonly plugin: string;
  readonly definition: VerbDefinition;
  readonly main: VerbParser;
  readonly beforeBrace: VerbParser;
  readonly afterBrace: VerbParser;
}

type Fragment = (g: GrammarBuilder, helpers: HelperRules, shared: unknown) => ParserMethod<[], unknown>;

function locationContext(location: SourceLocation, verb: string): ErrorContext {
  return { file: location.file, line: location.line, column: location.column, verb };
}

/**
 * Chevrotain parser whose rules are supplied from outside through a
 * GrammarBuilder.
 */
class ComposedParser<T> extends EmbeddedActionsParser {
  private readonly lexer: Lexer;
  private readonly start: ParserMethod<[], T>;
  private current?: JoinedArguments;

  constructor(
    private readonly verb: string,
    vocabulary: TokenType[],
    define: (g: GrammarBuilder) => ParserMethod<[], T>
  ) {
    super(vocabulary, { maxLookahead: 4, recoveryEnabled: false });
    this.lexer = new Lexer(vocabulary, { positionTracking: 'onlyOffset', ensureOptimizations: false });
    this.start = define(this.builder());
    this.performSelfAnalysis();
  }

  parse(args: JoinedArguments): T {
    const lexed = this.lexer.tokenize(args.text);
    if (lexed.errors.length > 0) {
      const error = lexed.errors[0];
      const text = args.text.slice(error.offset, error.offset + error.length);
      throw new RuleSyntaxError(
        `Unexpected input '${text}' in arguments to ${this.verb}`,
        'ERR_SYNTAX',
        locationContext(args.locate(error.offset), this.verb)
      );
    }

    this.current = args;
    this.input = lexed.tokens;
    try {
      const value = this.start();
      if (this.errors.length > 0) {
        const error = this.errors[0];
        const offset = Number.isNaN(error.token.startOffset) ? args.text.length : error.token.startOffset;
        throw new RuleSyntaxError(
          `Syntax error in arguments to ${this.verb}: ${error.message}`,
          'ERR_SYNTAX',
          locationContext(args.locate(offset), this.verb)
        );
      }
      return value;
    } finally {
      this.current = undefined;
    }
  }

  private locate(token: IToken): SourceLocation {
    const args = this.current;
    if (!args) {
      return { line: 0, column: 0 };
    }
    return args.locate(token.startOffset);
  }

  private builder(): GrammarBuilder {
    return {
      rule: (name, impl) => this.RULE(name, impl),
      consume: (idx, token) => this.consume(idx, token),
      subrule: (idx, rule) => this.subrule(idx, rule),
      option: (idx, impl) => this.option(idx, impl),
      or: (idx, alternatives) => this.or(idx, alternatives),
      many: (idx, impl) => this.many(idx, impl),
      atLeastOne: (idx, impl) => this.atLeastOne(idx, impl),
      action: (impl) => this.ACTION(impl),
      locate: (token) => this.locate(token),
    };
  }
}

const nullParser: VerbParser = {
  parse: () => undefined,
};

function emptyOnlyParser(verb: string): VerbParser {
  return {
    parse(args) {
      if (!args.isEmpty) {
        throw new RuleSyntaxError(
          `Verb '${verb}' takes no arguments`,
          'ERR_SYNTAX',
          locationContext(args.locate(0), verb)
        );
      }
      return undefined;
    },
  };
}

function disabledHelpers(plugin: string): HelperRules {
  const unavailable = (rule: string): never => {
    throw new GrammarError(
      `Plugin '${plugin}' uses helper rule '${rule}' but was registered without helpers`,
      { plugin },
      'Set options.useHelpers to true'
    );
  };
  return {
    get glyphSelector() { return unavailable('glyphSelector'); },
    get integerContainer() { return unavailable('integerContainer'); },
    get valueRecord() { return unavailable('valueRecord'); },
    get valueRecordLiteral() { return unavailable('valueRecordLiteral'); },
    get metricComparison() { return unavailable('metricComparison'); },
    get comparator() { return unavailable('comparator'); },
    get languages() { return unavailable('languages'); },
  };
}

/**
 * Vocabulary for a plugin: whitespace first, then the plugin's own tokens
 * (keywords must precede BareName), then the base tokens when helpers are
 * in use. Duplicates keep their first position.
 */
export function vocabularyFor(plugin: RulePlugin): TokenType[] {
  const tokens = [WhiteSpace, ...(plugin.tokens ?? []), ...(plugin.options.useHelpers ? BASE_TOKENS : [])];
  return [...new Set(tokens)];
}

function composeParser(plugin: RulePlugin, verb: string, fragment: Fragment): VerbParser {
  try {
    return new ComposedParser(verb, vocabularyFor(plugin), (g) => {
      const helpers = plugin.options.useHelpers ? defineHelperRules(g) : disabledHelpers(plugin.name);
      const shared = plugin.grammar(g, helpers);
      return fragment(g, helpers, shared);
    });
  } catch (err) {
    if (err instanceof GrammarError) {
      throw err;
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new GrammarError(
      `Grammar for verb '${verb}' in plugin '${plugin.name}' failed to compose: ${reason}`,
      { plugin: plugin.name, verb }
    );
  }
}

/**
 * Compose all parsers for a plugin's verbs. Throws GrammarError when a
 * fragment is rejected.
 */
export function composePlugin(plugin: RulePlugin): ComposedVerb[] {
  return plugin.verbs.map((definition) => {
    const { grammar, beforeBraceGrammar, afterBraceGrammar } = definition;
    return {
      name: definition.name,
      plugin: plugin.name,
      definition,
      main: grammar
        ? composeParser(plugin, definition.name, (g, h, s) => grammar.call(definition, g, h, s))
        : emptyOnlyParser(definition.name),
      beforeBrace: beforeBraceGrammar
        ? composeParser(plugin, definition.name, (g, h, s) => beforeBraceGrammar.call(definition, g, h, s))
        : nullParser,
      afterBrace: afterBraceGrammar
        ? composeParser(plugin, definition.name, (g, h, s) => afterBraceGrammar.call(definition, g, h, s))
        : nullParser,
    };
  });
}

/**
 * Verb table of a compilation session. A later registration of the same
 * verb name replaces the earlier one.
 */
export class GrammarComposer {
  private readonly verbs = new Map<string, ComposedVerb>();

  /**
   * Returns the names of verbs this registration replaced.
   */
  register(plugin: RulePlugin): string[] {
    const composed = composePlugin(plugin);
    const replaced: string[] = [];
    for (const verb of composed) {
      if (this.verbs.has(verb.name)) {
        replaced.push(verb.name);
      }
      this.verbs.set(verb.name, verb);
    }
    return replaced;
  }

  get(verb: string): ComposedVerb | undefined {
    return this.verbs.get(verb);
  }

  verbNames(): string[] {
    return [...this.verbs.keys()];
  }

  all(): ComposedVerb[] {
    return [...this.verbs.values()];
  }
}
