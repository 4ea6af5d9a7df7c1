import type { LexerError } from '../lexer/lexer-error';
import type { SourcePosition } from '../lexer/token';

export const ParserErrorKind = {
  UNEXPECTED_TOKEN: 'UnexpectedToken',
  EXPECTED_EXPRESSION: 'ExpectedExpression',
  UNKNOWN_OPERATOR: 'UnknownOperator',
  MISSING_TERMINATOR: 'MissingTerminator',
  INVALID_OPERATOR_DECLARATION: 'InvalidOperatorDeclaration',
  LEXICAL_ERROR: 'LexicalError',
} as const;

export type ParserErrorKind = (typeof ParserErrorKind)[keyof typeof ParserErrorKind];

export interface ParserErrorDetails {
  /** What the grammar wanted at this point, e.g. "';'" or "'else'" */
  expected?: string | null;
  /** Description of the token actually found */
  found?: string | null;
  /** Set when the failure came from the lexer */
  lexerError?: LexerError | null;
}

/**
 * Error produced by the parser when encountering invalid syntax
 * Includes position information and the expected-vs-found pair
 */
export class ParserError extends Error {
  readonly kind: ParserErrorKind;
  /** Message without the position suffix */
  readonly description: string;
  readonly expected: string | null;
  readonly found: string | null;
  readonly lexerError: LexerError | null;
  readonly position: SourcePosition;
  readonly line: number;
  readonly column: number;
  readonly index: number;

  constructor(
    kind: ParserErrorKind,
    description: string,
    position: SourcePosition,
    details: ParserErrorDetails = {},
  ) {
    // Display 1-indexed column for user-facing error messages (editors show 1-indexed)
    super(`${description} at line ${position.line}, column ${position.column + 1}`);
    this.name = 'ParserError';
    this.kind = kind;
    this.description = description;
    this.expected = details.expected ?? null;
    this.found = details.found ?? null;
    this.lexerError = details.lexerError ?? null;
    this.position = position;
    this.line = position.line;
    this.column = position.column;
    this.index = position.index;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ParserError);
    }
  }

  /**
   * Wrap a lexical error met while advancing the lookahead
   */
  static fromLexerError(error: LexerError): ParserError {
    return new ParserError(ParserErrorKind.LEXICAL_ERROR, error.description, error.position, {
      found: error.text,
      lexerError: error,
    });
  }
}
