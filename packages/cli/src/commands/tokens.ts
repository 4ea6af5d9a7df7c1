/**
 * kaleidoscope tokens command
 */

import { Lexer, TokenType, type LexResult } from '@kaleidoscope/syntax';
import { Command } from 'commander';
import * as fs from 'node:fs';
import { createContext, createPalette, type CliContext, type Palette } from '../context.js';

/**
 * One tab-separated line per lexer result: position, kind, text
 */
export function formatLexResult(result: LexResult, palette: Palette = createPalette(false)): string {
  if (!result.ok) {
    const { line, column, kind, description } = result.error;
    return `${line}:${column + 1}\t${palette.red('error')}\t${kind}\t${description}`;
  }

  const token = result.value;
  const position = `${token.loc.start.line}:${token.loc.start.column + 1}`;

  switch (token.type) {
    case TokenType.EOF:
      return `${position}\t${token.type}`;
    case TokenType.NUMBER:
      return `${position}\t${token.type}\t${token.raw}`;
    default:
      return `${position}\t${token.type}\t${token.value}`;
  }
}

/**
 * Print every token of a source text; 1 when any lexical error was met
 */
export function runTokens(source: string, context: CliContext): number {
  let errors = 0;

  for (const result of new Lexer(source)) {
    if (!result.ok) errors++;
    context.output.log(formatLexResult(result, context.palette));
  }

  context.logger.debug('tokens_listed', { errors });
  return errors > 0 ? 1 : 0;
}

export const tokensCommand = new Command('tokens')
  .description('Print the token stream of a source file')
  .argument('<file>', 'Source file to tokenize')
  .option('--no-color', 'Disable colored output')
  .action((file: string, options: { color?: boolean }) => {
    try {
      const context = createContext(options);
      const source = fs.readFileSync(file, 'utf-8');
      process.exit(runTokens(source, context));
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
