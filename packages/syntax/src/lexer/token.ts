import type { Keyword } from './token-types';
import { TokenType } from './token-types';

/**
 * Position in source code
 */
export interface SourcePosition {
  line: number; // Line number (1-based)
  column: number; // Column number (0-based)
  index: number; // Character index (0-based)
}

/**
 * Source location with start and end positions
 */
export interface SourceLocation {
  start: SourcePosition;
  end: SourcePosition;
}

interface BaseToken {
  loc: SourceLocation;
}

export interface EndOfFileToken extends BaseToken {
  type: typeof TokenType.EOF;
}

export interface IdentifierToken extends BaseToken {
  type: typeof TokenType.IDENTIFIER;
  value: string;
}

export interface NumberToken extends BaseToken {
  type: typeof TokenType.NUMBER;
  value: number;
  raw: string; // text as written, e.g. "1." or ".5"
}

export interface KeywordToken extends BaseToken {
  type: typeof TokenType.KEYWORD;
  value: Keyword;
}

export interface OperatorToken extends BaseToken {
  type: typeof TokenType.OPERATOR;
  value: string;
}

/**
 * Token produced by lexer
 */
export type Token = EndOfFileToken | IdentifierToken | NumberToken | KeywordToken | OperatorToken;

export function isOperatorToken(token: Token, symbol: string): token is OperatorToken {
  return token.type === TokenType.OPERATOR && token.value === symbol;
}

export function isKeywordToken(token: Token, keyword: Keyword): token is KeywordToken {
  return token.type === TokenType.KEYWORD && token.value === keyword;
}

/**
 * Human-readable description used in "expected X, found Y" diagnostics
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return 'end of input';
    case TokenType.IDENTIFIER:
      return `identifier '${token.value}'`;
    case TokenType.NUMBER:
      return `number ${token.raw}`;
    case TokenType.KEYWORD:
      return `keyword '${token.value}'`;
    case TokenType.OPERATOR:
      return `'${token.value}'`;
  }
}
