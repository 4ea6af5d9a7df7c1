import type { SourcePosition } from './token';

export const LexerErrorKind = {
  INVALID_NUMBER: 'InvalidNumber',
  UNEXPECTED_CHARACTER: 'UnexpectedCharacter',
} as const;

export type LexerErrorKind = (typeof LexerErrorKind)[keyof typeof LexerErrorKind];

/**
 * Error produced by the lexer for text that cannot form a token
 * Includes position information for debugging
 */
export class LexerError extends Error {
  readonly kind: LexerErrorKind;
  /** Message without the position suffix */
  readonly description: string;
  /** The offending source text */
  readonly text: string;
  readonly position: SourcePosition;
  readonly line: number;
  readonly column: number;
  readonly index: number;

  constructor(kind: LexerErrorKind, description: string, text: string, position: SourcePosition) {
    // Display 1-indexed column for user-facing error messages (editors show 1-indexed)
    super(`${description} at line ${position.line}, column ${position.column + 1}`);
    this.name = 'LexerError';
    this.kind = kind;
    this.description = description;
    this.text = text;
    this.position = position;
    this.line = position.line;
    this.column = position.column;
    this.index = position.index;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LexerError);
    }
  }
}
