/**
 * Reporters for the check command
 */

import type { Diagnostic } from '@kaleidoscope/syntax';
import type { Palette } from './context.js';

export interface FileReport {
  path: string;
  /** Top-level items that parsed cleanly */
  items: number;
  errors: Diagnostic[];
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

/**
 * Human-readable report; nothing at all when quiet and every file is clean
 */
export function formatPretty(
  reports: FileReport[],
  options: { quiet?: boolean; palette: Palette },
): string[] {
  const c = options.palette;
  const totalErrors = reports.reduce((sum, r) => sum + r.errors.length, 0);

  if (options.quiet && totalErrors === 0) {
    return [];
  }

  const lines: string[] = [];

  for (const report of reports) {
    if (options.quiet && report.errors.length === 0) continue;

    lines.push('', `  ${report.path}`);

    if (report.errors.length === 0) {
      lines.push(`    ${c.green('✓')} No issues (${plural(report.items, 'item')})`);
    }

    for (const error of report.errors) {
      lines.push(
        `    ${c.red('✗')} error  ${error.line}:${error.column}  ${error.message} ${c.gray(`(${error.code})`)}`,
      );
    }
  }

  lines.push('');

  if (totalErrors === 0) {
    lines.push(c.green(`  ✓ All ${plural(reports.length, 'file')} passed`));
  } else {
    lines.push(
      c.gray(`  Found ${plural(totalErrors, 'error')} in ${plural(reports.length, 'file')}`),
    );
  }

  lines.push('');
  return lines;
}

export function formatJson(reports: FileReport[]): string {
  const output = {
    files: reports.map((r) => ({
      path: r.path,
      items: r.items,
      errors: r.errors,
    })),
    summary: {
      files: reports.length,
      items: reports.reduce((sum, r) => sum + r.items, 0),
      errors: reports.reduce((sum, r) => sum + r.errors.length, 0),
    },
  };

  return JSON.stringify(output, null, 2);
}
