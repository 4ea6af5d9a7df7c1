/**
 * Token types for the Kaleidoscope lexer
 *
 * Operators are not enumerated: every punctuation character becomes an
 * OPERATOR token and the parser decides what it means.
 */

export const TokenType = {
  EOF: 'EndOfFile',
  IDENTIFIER: 'Identifier', // foo, fib, _tmp1
  NUMBER: 'Number', // 42, 3.14, .5, 1.
  KEYWORD: 'Keyword', // def, extern, if, ...
  OPERATOR: 'Operator', // + - * / < ; , ( ) and any other symbol
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export const KEYWORDS = [
  'def',
  'extern',
  'if',
  'then',
  'else',
  'for',
  'in',
  'var',
  'binary',
  'unary',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

const KEYWORD_SET: ReadonlySet<string> = new Set(KEYWORDS);

export function isKeyword(word: string): word is Keyword {
  return KEYWORD_SET.has(word);
}
