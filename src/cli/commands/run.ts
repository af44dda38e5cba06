/**
 * run command - run plugins over annotated declarations
 */

import { Command } from 'commander';
import path from 'node:path';
import { errorMessage } from '../../errors.js';
import { runPlugins } from '../../plugins/run.js';
import { openSession, selectPlugins } from '../session.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const runCommand = new Command('run')
  .description('Run plugins over the annotated declarations of a file or directory')
  .argument('[path]', 'File or directory to process', '.')
  .option('-x, --plugin <selector>', 'Plugin to run, as name[:key=value...] (repeatable)', collect, [])
  .option('-c, --config <path>', 'Path to config file')
  .option('-p, --prefix <prefix>', 'Annotation prefix')
  .option('--no-cache', 'Do not read or write the resolver cache file')
  .option('--verbose', 'Show verbose output', false)
  .action(async (target: string, options: { plugin: string[]; config?: string; prefix?: string; cache: boolean; verbose: boolean }) => {
    const startTime = Date.now();
    const absolutePath = path.resolve(target);

    try {
      const session = await openSession(absolutePath, options);
      try {
        const entries = selectPlugins(options.plugin, session.config);
        const result = await runPlugins(absolutePath, entries, {
          extractor: session.extractor,
          resolver: session.resolver,
        });

        if (options.verbose) {
          console.error(`Declarations: ${result.declarations}`);
          for (const [name, count] of Object.entries(result.entities)) {
            console.error(`  ${name}: ${count} entities`);
          }
          for (const file of result.written) {
            console.error(`Updated: ${path.relative(process.cwd(), file)}`);
          }
          console.error(`Duration: ${Date.now() - startTime}ms`);
        }
      } finally {
        await session.close();
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
