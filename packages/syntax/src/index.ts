/**
 * @kaleidoscope/syntax
 *
 * Lexer and parser for the Kaleidoscope toy language. Every entry point
 * returns results rather than throwing; a code generator consumes the
 * top-level items one at a time.
 */

import { Parser, type ParseResult, type ParserOptions } from './parser/parser';
import type { ParserError } from './parser/parser-error';
import type { TopLevelItem } from './parser/ast';

export * from './lexer/index';
export * from './parser/index';
export { err, ok } from './result';
export type { Err, Ok, Result } from './result';
export { binaryOperatorSymbol, prototypeSymbol, unaryOperatorSymbol } from './linkage';
export { printExpression, printItem } from './printer';
export { toDiagnostic } from './diagnostics';
export type { Diagnostic } from './diagnostics';

export interface RecoveredProgram {
  items: TopLevelItem[];
  errors: ParserError[];
}

/**
 * Parse a whole program, failing at the first error
 *
 * @example
 * ```ts
 * const result = parse('def add(a b) a + b; add(1, 2);');
 * if (result.ok) result.value.length; // => 2
 * ```
 */
export function parse(source: string, options: ParserOptions = {}): ParseResult<TopLevelItem[]> {
  return new Parser(source, options).parseProgram();
}

/**
 * Parse a whole program, skipping to the next ';' after each error so that
 * later items are still reported
 */
export function parseWithRecovery(source: string, options: ParserOptions = {}): RecoveredProgram {
  const parser = new Parser(source, options);
  const items: TopLevelItem[] = [];
  const errors: ParserError[] = [];

  while (true) {
    const next = parser.parseNext();
    if (next.ok) {
      if (next.value === null) break;
      items.push(next.value);
    } else {
      errors.push(next.error);
      parser.synchronize();
    }
  }

  return { items, errors };
}
