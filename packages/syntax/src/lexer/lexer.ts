import { err, ok, type Result } from '../result';
import { LexerError, LexerErrorKind } from './lexer-error';
import type { SourcePosition, Token } from './token';
import { isKeyword, TokenType } from './token-types';

export type LexResult = Result<Token, LexerError>;

const IDENTIFIER_START = /^[\p{L}_]$/u;
const IDENTIFIER_PART = /^[\p{L}\p{N}_]$/u;
// Control, format, unassigned and separator characters cannot start a token
const ILLEGAL_CHARACTER = /^[\p{C}\p{Z}]$/u;

/**
 * Lexer for Kaleidoscope source text
 *
 * Produces one token (or lexical error) per call to lex(). Scanning carries on
 * after an error, and once the end of input is reached every further call
 * returns the same EndOfFile token.
 */
export class Lexer implements Iterable<LexResult> {
  private readonly input: string;
  private index: number = 0;
  private line: number = 1;
  private column: number = 0;

  constructor(input: string) {
    this.input = input;
  }

  get source(): string {
    return this.input;
  }

  /**
   * Rewind to the start of the input
   */
  reset(): void {
    this.index = 0;
    this.line = 1;
    this.column = 0;
  }

  /**
   * Extract next token from input
   */
  lex(): LexResult {
    this.skipTrivia();

    const start = this.currentPosition();
    if (this.isAtEnd()) {
      return ok({ type: TokenType.EOF, loc: { start, end: start } });
    }

    const char = this.peek();

    if (IDENTIFIER_START.test(char)) {
      return ok(this.identifier(start));
    }

    if (this.isDigit(char) || (char === '.' && this.isDigit(this.peekNext()))) {
      return this.number(start);
    }

    this.advance();

    if (ILLEGAL_CHARACTER.test(char)) {
      return err(
        new LexerError(
          LexerErrorKind.UNEXPECTED_CHARACTER,
          `Unexpected character ${codePointLabel(char)}`,
          char,
          start,
        ),
      );
    }

    return ok({
      type: TokenType.OPERATOR,
      value: char,
      loc: { start, end: this.currentPosition() },
    });
  }

  /**
   * Yields every remaining result, ending with exactly one EndOfFile token
   */
  *[Symbol.iterator](): Generator<LexResult, void, undefined> {
    while (true) {
      const result = this.lex();
      yield result;
      if (result.ok && result.value.type === TokenType.EOF) {
        return;
      }
    }
  }

  private isAtEnd(): boolean {
    return this.index >= this.input.length;
  }

  private peek(): string {
    return this.charAt(this.index);
  }

  private peekNext(): string {
    return this.charAt(this.index + this.peek().length);
  }

  private charAt(index: number): string {
    const codePoint = this.input.codePointAt(index);
    return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
  }

  private advance(): string {
    const char = this.peek();
    this.index += char.length;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPosition(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      index: this.index,
    };
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9' && char.length === 1;
  }

  private skipTrivia(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.advance();
      } else if (char === '#') {
        // Line comment runs up to, not including, the newline
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private identifier(start: SourcePosition): Token {
    let value = '';

    while (!this.isAtEnd() && IDENTIFIER_PART.test(this.peek())) {
      value += this.advance();
    }

    const loc = { start, end: this.currentPosition() };
    if (isKeyword(value)) {
      return { type: TokenType.KEYWORD, value, loc };
    }
    return { type: TokenType.IDENTIFIER, value, loc };
  }

  private number(start: SourcePosition): LexResult {
    let raw = '';
    let dots = 0;

    // Maximal run of digits and dots; validity is decided afterwards
    while (this.isDigit(this.peek()) || this.peek() === '.') {
      const char = this.advance();
      if (char === '.') {
        dots++;
      }
      raw += char;
    }

    if (dots > 1) {
      return err(
        new LexerError(LexerErrorKind.INVALID_NUMBER, `Invalid number literal '${raw}'`, raw, start),
      );
    }

    return ok({
      type: TokenType.NUMBER,
      value: Number.parseFloat(raw),
      raw,
      loc: { start, end: this.currentPosition() },
    });
  }
}

function codePointLabel(char: string): string {
  const codePoint = char.codePointAt(0) ?? 0;
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Lex a whole source text, returning every result through EndOfFile
 */
export function tokenize(input: string): LexResult[] {
  return [...new Lexer(input)];
}
