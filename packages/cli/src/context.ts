import chalk from 'chalk';
import { createLogger, type Logger } from '@kaleidoscope/logger';
import { loadConfig, type KaleidoscopeConfig } from './config.js';

export interface Palette {
  red(text: string): string;
  yellow(text: string): string;
  green(text: string): string;
  gray(text: string): string;
  bold(text: string): string;
}

const plain: Palette = {
  red: (s) => s,
  yellow: (s) => s,
  green: (s) => s,
  gray: (s) => s,
  bold: (s) => s,
};

export function createPalette(color: boolean): Palette {
  return color ? chalk : plain;
}

/**
 * Where command output goes; stdout and stderr outside of tests
 */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  cwd: string;
  config: KaleidoscopeConfig;
  logger: Logger;
  palette: Palette;
  output: Output;
}

export function createContext(options: { color?: boolean } = {}): CliContext {
  const cwd = process.cwd();
  const config = loadConfig(cwd);

  // Log lines go to stderr so they never mix with command output
  const logger = createLogger({
    environment: config.environment,
    minLevel: config.logLevel,
    write: (line) => process.stderr.write(`${line}\n`),
  });

  return {
    cwd,
    config,
    logger,
    palette: createPalette(options.color !== false && !config.noColor),
    output: {
      log: (line) => console.log(line),
      error: (line) => console.error(line),
    },
  };
}
