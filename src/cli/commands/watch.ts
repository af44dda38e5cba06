/**
 * watch command - re-run plugins when sources change
 */

import { Command } from 'commander';
import path from 'node:path';
import { errorMessage } from '../../errors.js';
import { runPlugins } from '../../plugins/run.js';
import { Watcher } from '../../watch/watcher.js';
import { openSession, selectPlugins } from '../session.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const watchCommand = new Command('watch')
  .description('Watch a directory and re-run plugins on file changes')
  .argument('[directory]', 'Directory to watch', '.')
  .option('-x, --plugin <selector>', 'Plugin to run, as name[:key=value...] (repeatable)', collect, [])
  .option('-c, --config <path>', 'Path to config file')
  .option('-p, --prefix <prefix>', 'Annotation prefix')
  .option('--verbose', 'Show verbose output', false)
  .action(async (directory: string, options: { plugin: string[]; config?: string; prefix?: string; verbose: boolean }) => {
    const rootDirectory = path.resolve(directory);

    console.error(`Watching ${rootDirectory} for changes...`);

    try {
      const session = await openSession(rootDirectory, options);
      const entries = selectPlugins(options.plugin, session.config);
      const run = () =>
        runPlugins(rootDirectory, entries, { extractor: session.extractor, resolver: session.resolver });

      // Initial run
      const initial = await run();
      console.error(`Processed ${initial.declarations} declarations\n`);

      const watcher = new Watcher(run, rootDirectory, session.config.skipDirs, {
        debounceMs: session.config.watch.debounceMs,
      });

      watcher.on('run', ({ changed, result }) => {
        if (options.verbose) {
          for (const file of changed) {
            console.error(`Changed: ${path.relative(rootDirectory, file)}`);
          }
        }
        for (const file of result.written) {
          console.error(`Updated: ${path.relative(rootDirectory, file)}`);
        }
      });

      watcher.on('error', ({ error }) => {
        console.error(`Error: ${error.message}`);
      });

      watcher.on('ready', () => {
        console.error('Watching for changes... (Press Ctrl+C to stop)\n');
      });

      await watcher.start();

      // Handle shutdown
      const shutdown = async (): Promise<void> => {
        console.error('\nShutting down...');
        await watcher.stop();
        await session.close();
        process.exit(0);
      };

      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
