import type { LexerError, LexerErrorKind } from './lexer/lexer-error';
import type { ParserError, ParserErrorKind } from './parser/parser-error';

export interface Diagnostic {
  severity: 'error';
  code: LexerErrorKind | ParserErrorKind;
  /** Description without the position suffix */
  message: string;
  line: number;
  /** 1-based, as editors display it */
  column: number;
}

export function toDiagnostic(error: LexerError | ParserError): Diagnostic {
  return {
    severity: 'error',
    code: error.kind,
    message: error.description,
    line: error.line,
    column: error.column + 1,
  };
}
