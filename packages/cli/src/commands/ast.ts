/**
 * kaleidoscope ast command
 */

import { Parser, printItem, toDiagnostic, type TopLevelItem } from '@kaleidoscope/syntax';
import { Command } from 'commander';
import * as fs from 'node:fs';
import { createContext, type CliContext } from '../context.js';

export type AstFormat = 'sexpr' | 'json';

export function isAstFormat(value: string): value is AstFormat {
  return value === 'sexpr' || value === 'json';
}

export function formatItem(item: TopLevelItem, format: AstFormat): string {
  return format === 'json' ? JSON.stringify(item) : printItem(item);
}

/**
 * Print each top-level item as soon as it is parsed, stopping at the first
 * error. Returns the exit code.
 */
export function runAst(
  file: string,
  source: string,
  format: AstFormat,
  context: CliContext,
): number {
  const logger = context.logger.child({ file });
  const parser = new Parser(source, { logger });
  const { palette } = context;

  while (true) {
    const next = parser.parseNext();

    if (!next.ok) {
      const diagnostic = toDiagnostic(next.error);
      context.output.error(
        `${file}:${diagnostic.line}:${diagnostic.column}: ${palette.red('error')} ${diagnostic.message} ${palette.gray(`(${diagnostic.code})`)}`,
      );
      return 1;
    }

    if (next.value === null) {
      return 0;
    }

    context.output.log(formatItem(next.value, format));
  }
}

export const astCommand = new Command('ast')
  .description('Parse a source file and print its top-level items')
  .argument('<file>', 'Source file to parse')
  .option('--format <type>', 'Output format: sexpr, json', 'sexpr')
  .option('--no-color', 'Disable colored output')
  .action((file: string, options: { format: string; color?: boolean }) => {
    try {
      if (!isAstFormat(options.format)) {
        throw new Error(`Unknown format '${options.format}': expected sexpr or json`);
      }
      const context = createContext(options);
      const source = fs.readFileSync(file, 'utf-8');
      process.exit(runAst(file, source, options.format, context));
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
