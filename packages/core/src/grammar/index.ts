export * from './tokens.js';
export { JoinedArguments } from './JoinedArguments.js';
export type { SourceWord } from './JoinedArguments.js';
export { StatementParser } from './StatementParser.js';
export type { RawItem, RawStatement } from './StatementParser.js';
export type { GrammarBuilder, HelperRules } from './GrammarBuilder.js';
export { defineHelperRules } from './HelperGrammar.js';
export { GrammarComposer, composePlugin, vocabularyFor } from './GrammarComposer.js';
export type { ComposedVerb, VerbParser } from './GrammarComposer.js';
export type * from './syntax.js';
