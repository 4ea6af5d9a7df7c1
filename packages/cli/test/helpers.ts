import { createMockLogger, type MockLogger } from '@kaleidoscope/logger/mock';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createPalette, type CliContext } from '../src/context.js';

export interface TestContext extends CliContext {
  logger: MockLogger;
  logs: string[];
  errors: string[];
}

export function createTestContext(cwd: string = process.cwd()): TestContext {
  const logs: string[] = [];
  const errors: string[] = [];

  return {
    cwd,
    config: { noColor: true },
    logger: createMockLogger(),
    palette: createPalette(false),
    output: {
      log: (line) => logs.push(line),
      error: (line) => errors.push(line),
    },
    logs,
    errors,
  };
}

/**
 * Create a temporary directory populated with the given files
 */
export function createTempDir(files: Record<string, string> = {}): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kaleidoscope-'));
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  return dir;
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
