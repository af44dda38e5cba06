/**
 * list command - show registered plugins
 */

import { Command } from 'commander';
import { describeArg } from '../../plugins/base.js';
import { getDefaultRegistry } from '../../plugins/registry.js';

export const listCommand = new Command('list')
  .description('List registered plugins with their arguments and options')
  .action(() => {
    for (const plugin of getDefaultRegistry().list()) {
      const { args, options } = plugin.args();
      console.log(`${plugin.name}\n  ${plugin.description}`);

      if (args.length > 0) {
        console.log('  args:');
        for (const arg of args) {
          const { name, help } = describeArg(arg);
          console.log(`    ${name.padEnd(16)}${help}`);
        }
      }

      const optionNames = Object.keys(options).sort();
      if (optionNames.length > 0) {
        console.log('  options:');
        for (const name of optionNames) {
          console.log(`    ${name.padEnd(16)}${options[name]}`);
        }
      }
      console.log('');
    }
  });
