/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isEnvironment, isLogLevel, type Environment, type LogLevel } from '@kaleidoscope/logger';

export interface KaleidoscopeConfig {
  logLevel?: LogLevel;
  environment?: Environment;
  noColor: boolean;
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load .env file, searching from startDir up to root
 */
export function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.statSync(envPath, { throwIfNoEntry: false })?.isFile()) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): KaleidoscopeConfig {
  const merged: Record<string, string | undefined> = { ...findEnvFile(cwd) };

  for (const key of ['KALEIDOSCOPE_LOG_LEVEL', 'KALEIDOSCOPE_ENV', 'NO_COLOR']) {
    if (env[key]) {
      merged[key] = env[key];
    }
  }

  const config: KaleidoscopeConfig = { noColor: Boolean(merged.NO_COLOR) };

  const logLevel = merged.KALEIDOSCOPE_LOG_LEVEL;
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new Error(
        `Invalid KALEIDOSCOPE_LOG_LEVEL '${logLevel}': expected debug, info, warn or error`,
      );
    }
    config.logLevel = logLevel;
  }

  const environment = merged.KALEIDOSCOPE_ENV;
  if (environment) {
    if (!isEnvironment(environment)) {
      throw new Error(
        `Invalid KALEIDOSCOPE_ENV '${environment}': expected test, development or production`,
      );
    }
    config.environment = environment;
  }

  return config;
}
