#!/usr/bin/env node

/**
 * annokit CLI
 */

import { Command } from 'commander';
import { listCommand } from './commands/list.js';
import { runCommand } from './commands/run.js';
import { watchCommand } from './commands/watch.js';

const program = new Command();

program
  .name('annokit')
  .description('Annotation-driven code generation for TypeScript sources')
  .version('0.1.0');

// Register commands
program.addCommand(runCommand);
program.addCommand(listCommand);
program.addCommand(watchCommand);

program.parse(process.argv);
