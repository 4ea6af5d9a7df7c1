#!/usr/bin/env node

/**
 * kaleidoscope CLI - inspect and check Kaleidoscope sources
 */

import { Command } from 'commander';
import { astCommand } from './commands/ast.js';
import { checkCommand } from './commands/check.js';
import { tokensCommand } from './commands/tokens.js';

const program = new Command();

program
  .name('kaleidoscope')
  .description('Lexer and parser front end for the Kaleidoscope language')
  .version('0.1.0');

// Register commands
program.addCommand(tokensCommand);
program.addCommand(astCommand);
program.addCommand(checkCommand);

// Parse arguments
await program.parseAsync();
