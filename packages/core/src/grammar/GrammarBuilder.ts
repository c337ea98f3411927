import type { IOrAlt, IToken, ParserMethod, TokenType } from 'chevrotain';
import type { SourceLocation } from '@layoutforge/types';
import type { GlyphSelector } from '../selectors/GlyphSelector.js';
import type { Comparator, IntegerNode, LanguageSystem, MetricComparisonNode, ValueRecordNode } from './syntax.js';

/**
 * Grammar-building surface handed to plugin grammar fragments.
 *
 * Thin facade over the parser's DSL. Indices distinguish repeated uses of
 * the same method on the same token or rule within one rule body.
 * Everything that builds a semantic value belongs inside `action`, which
 * is skipped while the grammar is being recorded.
 */
export interface GrammarBuilder {
  rule<T>(name: string, impl: () => T): ParserMethod<[], T>;
  consume(idx: number, token: TokenType): IToken;
  subrule<T>(idx: number, rule: ParserMethod<[], T>): T;
  option<T>(idx: number, impl: () => T): T | undefined;
  or<T>(idx: number, alternatives: IOrAlt<T>[]): T;
  many(idx: number, impl: () => void): void;
  atLeastOne(idx: number, impl: () => void): void;
  action<T>(impl: () => T): T;
  /** Source location of a consumed token */
  locate(token: IToken): SourceLocation;
}

/**
 * Shared rules available to plugins registered with `useHelpers: true`.
 */
export interface HelperRules {
  glyphSelector: ParserMethod<[], GlyphSelector>;
  integerContainer: ParserMethod<[], IntegerNode>;
  /** Bare number, `$variable` or `<...>` */
  valueRecord: ParserMethod<[], ValueRecordNode>;
  /** `<xAdvance=10>` or `<0 0 10 0>` only */
  valueRecordLiteral: ParserMethod<[], ValueRecordNode>;
  metricComparison: ParserMethod<[], MetricComparisonNode>;
  /** `<`, `<=`, `>`, `>=`, `==`; a single `=` reads as `==` */
  comparator: ParserMethod<[], Comparator>;
  languages: ParserMethod<[], LanguageSystem[]>;
}
