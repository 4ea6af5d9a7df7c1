export { Lexer, tokenize } from './lexer';
export type { LexResult } from './lexer';
export { LexerError, LexerErrorKind } from './lexer-error';
export { isKeyword, KEYWORDS, TokenType } from './token-types';
export type { Keyword } from './token-types';
export { describeToken, isKeywordToken, isOperatorToken } from './token';
export type {
  EndOfFileToken,
  IdentifierToken,
  KeywordToken,
  NumberToken,
  OperatorToken,
  SourceLocation,
  SourcePosition,
  Token,
} from './token';
