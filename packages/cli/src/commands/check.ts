/**
 * kaleidoscope check command
 *
 * Parses every given file with error recovery, so a single run reports each
 * malformed top-level item rather than only the first.
 */

import { parseWithRecovery, toDiagnostic } from '@kaleidoscope/syntax';
import { Command } from 'commander';
import { glob } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { createContext, type CliContext } from '../context.js';
import { formatJson, formatPretty, type FileReport } from '../report.js';

export const SOURCE_GLOB = '**/*.ks';

export interface CheckOptions {
  format?: string;
  quiet?: boolean;
  color?: boolean;
}

export function checkSource(displayPath: string, source: string, context: CliContext): FileReport {
  const logger = context.logger.child({ file: displayPath });
  const { items, errors } = parseWithRecovery(source, { logger });

  logger.debug('file_checked', { items: items.length, errors: errors.length });

  return {
    path: displayPath,
    items: items.length,
    errors: errors.map(toDiagnostic),
  };
}

export interface CollectedFiles {
  files: string[];
  missing: string[];
  /** Paths that exist but are neither files nor directories */
  unsupported: string[];
}

/**
 * Expand the given paths into source files; directories are searched for .ks files
 */
export async function collectFiles(paths: string[], context: CliContext): Promise<CollectedFiles> {
  const files: string[] = [];
  const missing: string[] = [];
  const unsupported: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(context.cwd, p);
    const stats = fs.statSync(resolved, { throwIfNoEntry: false });

    if (!stats) {
      missing.push(p);
    } else if (stats.isFile()) {
      files.push(resolved);
    } else if (stats.isDirectory()) {
      const found = await glob(SOURCE_GLOB, {
        cwd: resolved,
        absolute: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      files.push(...found.sort());
    } else {
      unsupported.push(p);
    }
  }

  return { files, missing, unsupported };
}

/**
 * Returns the exit code: 1 when any file has errors
 */
export async function runCheck(
  paths: string[],
  options: CheckOptions,
  context: CliContext,
): Promise<number> {
  const { files, missing, unsupported } = await collectFiles(paths, context);

  for (const p of missing) {
    context.output.error(`Path not found: ${p}`);
  }
  for (const p of unsupported) {
    context.output.error(`Not a file or directory: ${p}`);
  }

  if (files.length === 0) {
    if (!options.quiet) {
      context.output.log('No files found to check');
    }
    return 0;
  }

  const reports = files.map((file) =>
    checkSource(path.relative(context.cwd, file), fs.readFileSync(file, 'utf-8'), context),
  );

  if (options.format === 'json') {
    context.output.log(formatJson(reports));
  } else {
    for (const line of formatPretty(reports, { quiet: options.quiet, palette: context.palette })) {
      context.output.log(line);
    }
  }

  return reports.some((r) => r.errors.length > 0) ? 1 : 0;
}

export const checkCommand = new Command('check')
  .description('Check source files for syntax errors')
  .argument('[paths...]', 'Files or directories to check', ['.'])
  .option('--format <type>', 'Output format: pretty, json', 'pretty')
  .option('--quiet', 'Only output on errors')
  .option('--no-color', 'Disable colored output')
  .action(async (paths: string[], options: CheckOptions) => {
    try {
      const context = createContext(options);
      process.exit(await runCheck(paths, options, context));
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
