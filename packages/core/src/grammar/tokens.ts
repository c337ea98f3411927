/**
 * Base token vocabulary shared by every verb parser that uses the helper
 * rules. Order matters: the lexer takes the first pattern that matches, so
 * longer operators precede their prefixes and BareName comes last.
 */

import { createToken, Lexer, type TokenType } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED });

export const BareName = createToken({ name: 'BareName', pattern: /[A-Za-z0-9_][A-Za-z0-9_.\-]*/ });

export const UnicodeRange = createToken({
  name: 'UnicodeRange',
  pattern: /U\+[0-9A-Fa-f]{1,6}=>U\+[0-9A-Fa-f]{1,6}/,
});
export const UnicodeGlyph = createToken({ name: 'UnicodeGlyph', pattern: /U\+[0-9A-Fa-f]{1,6}/ });
export const Regex = createToken({ name: 'Regex', pattern: /\/(?:[^/\\\s]|\\.)+\// });
export const ClassName = createToken({ name: 'ClassName', pattern: /@[A-Za-z_][A-Za-z0-9_]*/ });
export const NamedInteger = createToken({ name: 'NamedInteger', pattern: /\$[A-Za-z_][A-Za-z0-9_]*/ });
// `4.sups` is a glyph name; `4`, `4.5` and `-20` stay numbers
export const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /-?\d+(?:\.\d+)?/, longer_alt: BareName });

export const Arrow = createToken({ name: 'Arrow', pattern: /->/ });
export const LAngles = createToken({ name: 'LAngles', pattern: /<</ });
export const RAngles = createToken({ name: 'RAngles', pattern: />>/ });
export const LessEqual = createToken({ name: 'LessEqual', pattern: /<=/ });
export const GreaterEqual = createToken({ name: 'GreaterEqual', pattern: />=/ });
export const DoubleEquals = createToken({ name: 'DoubleEquals', pattern: /==/ });
export const Less = createToken({ name: 'Less', pattern: /</ });
export const Greater = createToken({ name: 'Greater', pattern: />/ });
export const Equals = createToken({ name: 'Equals', pattern: /=/ });

export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const LSquare = createToken({ name: 'LSquare', pattern: /\[/ });
export const RSquare = createToken({ name: 'RSquare', pattern: /\]/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const Dot = createToken({ name: 'Dot', pattern: /\./ });
export const Tilde = createToken({ name: 'Tilde', pattern: /~/ });
export const Pipe = createToken({ name: 'Pipe', pattern: /\|/ });
export const Ampersand = createToken({ name: 'Ampersand', pattern: /&/ });
export const Minus = createToken({ name: 'Minus', pattern: /-/ });
export const Caret = createToken({ name: 'Caret', pattern: /\^/ });
export const Slash = createToken({ name: 'Slash', pattern: /\// });
export const Star = createToken({ name: 'Star', pattern: /\*/ });

export const BASE_TOKENS: readonly TokenType[] = [
  UnicodeRange,
  UnicodeGlyph,
  Regex,
  ClassName,
  NamedInteger,
  NumberLiteral,
  Arrow,
  LAngles,
  RAngles,
  LessEqual,
  GreaterEqual,
  DoubleEquals,
  Less,
  Greater,
  Equals,
  LParen,
  RParen,
  LSquare,
  RSquare,
  Comma,
  Dot,
  Tilde,
  Pipe,
  Ampersand,
  Minus,
  Caret,
  Slash,
  Star,
  BareName,
];

/**
 * Keyword token. Identifiers that merely start with the keyword
 * (`category` vs `categoryMark`) still lex as BareName.
 */
export function keyword(word: string): TokenType {
  return createToken({ name: `Keyword_${word}`, pattern: new RegExp(word), longer_alt: BareName });
}
