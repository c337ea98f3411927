/**
 * StatementParser - splits rule source into statements
 *
 * A statement is a verb followed by words and `{ ... }` blocks of nested
 * statements, terminated by `;`. Arguments are kept as raw words here;
 * each verb's own grammar parses them later.
 */

import { createToken, EmbeddedActionsParser, Lexer, type IToken } from 'chevrotain';
import type { SourceLocation } from '@layoutforge/types';
import { RuleSyntaxError } from '../errors/LayoutError.js';
import type { SourceWord } from './JoinedArguments.js';

const StatementSpace = createToken({ name: 'StatementSpace', pattern: /\s+/, group: Lexer.SKIPPED });
const Comment = createToken({ name: 'Comment', pattern: /#[^\n\r]*/, group: Lexer.SKIPPED });
const LCurly = createToken({ name: 'LCurly', pattern: /\{/ });
const RCurly = createToken({ name: 'RCurly', pattern: /\}/ });
const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });
// Braces inside a word (`/^uni[0-9A-F]{4}$/`) belong to the word; only a
// brace that stands alone or at either edge of a word delimits a block.
const Word = createToken({ name: 'Word', pattern: /[^\s{};#](?:[^\s;#]*[^\s{};#])?/ });

const STATEMENT_TOKENS = [StatementSpace, Comment, LCurly, RCurly, Semicolon, Word];

const VERB_PATTERN = /^[A-Z][A-Za-z0-9_]+$/;

export type RawItem =
  | { kind: 'word'; word: SourceWord }
  | { kind: 'block'; statements: RawStatement[]; open: SourceWord };

export interface RawStatement {
  verb: SourceWord;
  items: RawItem[];
}

function sourceWord(token: IToken): SourceWord {
  return { image: token.image, line: token.startLine ?? 0, column: token.startColumn ?? 0 };
}

class StatementGrammar extends EmbeddedActionsParser {
  constructor() {
    super(STATEMENT_TOKENS, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  public document = this.RULE('document', () => {
    const statements: RawStatement[] = [];
    this.MANY(() => {
      statements.push(this.SUBRULE(this.statement));
    });
    return statements;
  });

  private statement = this.RULE('statement', () => {
    const verb = this.CONSUME(Word);
    const items: RawItem[] = [];
    this.MANY(() => {
      this.OR([
        {
          ALT: () => {
            const word = this.CONSUME2(Word);
            items.push(this.ACTION((): RawItem => ({ kind: 'word', word: sourceWord(word) })));
          },
        },
        { ALT: () => { items.push(this.SUBRULE(this.block)); } },
      ]);
    });
    this.CONSUME(Semicolon);
    return this.ACTION((): RawStatement => {
      if (!VERB_PATTERN.test(verb.image)) {
        throw new RuleSyntaxError(
          `Expected a verb, found '${verb.image}'`,
          'ERR_SYNTAX',
          { line: verb.startLine, column: verb.startColumn },
          'Verbs start with an uppercase letter, e.g. DefineClass'
        );
      }
      return { verb: sourceWord(verb), items };
    });
  });

  private block = this.RULE('block', () => {
    const open = this.CONSUME(LCurly);
    const statements: RawStatement[] = [];
    this.MANY(() => {
      statements.push(this.SUBRULE(this.statement));
    });
    this.CONSUME(RCurly);
    return this.ACTION((): RawItem => ({ kind: 'block', statements, open: sourceWord(open) }));
  });
}

/**
 * Reusable statement parser. Not re-entrant: parse one document at a time.
 */
export class StatementParser {
  private readonly lexer = new Lexer(STATEMENT_TOKENS);
  private readonly grammar = new StatementGrammar();

  parse(source: string, file?: string): RawStatement[] {
    const lexed = this.lexer.tokenize(source);
    if (lexed.errors.length > 0) {
      const error = lexed.errors[0];
      throw new RuleSyntaxError(error.message, 'ERR_SYNTAX', { file, line: error.line, column: error.column });
    }

    this.grammar.input = lexed.tokens;
    const statements = this.withFile(file, () => this.grammar.document());
    if (this.grammar.errors.length > 0) {
      const error = this.grammar.errors[0];
      const location: SourceLocation = Number.isNaN(error.token.startOffset)
        ? endOf(source, file)
        : { file, line: error.token.startLine ?? 0, column: error.token.startColumn ?? 0 };
      throw new RuleSyntaxError(`Syntax error: ${error.message}`, 'ERR_SYNTAX', { ...location });
    }
    return statements;
  }

  private withFile<T>(file: string | undefined, parse: () => T): T {
    try {
      return parse();
    } catch (err) {
      if (err instanceof RuleSyntaxError && file !== undefined && err.context.file === undefined) {
        err.context.file = file;
      }
      throw err;
    }
  }
}

function endOf(source: string, file?: string): SourceLocation {
  const lines = source.split('\n');
  return { file, line: lines.length, column: lines[lines.length - 1].length + 1 };
}
