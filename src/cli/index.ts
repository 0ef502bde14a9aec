#!/usr/bin/env node

/**
 * endpoint-usage CLI
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('endpoint-usage')
  .description('Find which API specification endpoints are referenced in a codebase')
  .version('1.0.0');

program.addCommand(checkCommand, { isDefault: true });
program.addCommand(initCommand);

await program.parseAsync(process.argv);
