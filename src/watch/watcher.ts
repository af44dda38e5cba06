/**
 * File watcher re-running plugins when annotated sources change
 */

import chokidar, { type FSWatcher } from 'chokidar';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { isSourceFile } from '../source/naming.js';
import type { RunResult } from '../plugins/run.js';

export interface WatcherEvents {
  run: { changed: string[]; result: RunResult };
  error: { changed: string[]; error: Error };
  ready: void;
}

export interface WatcherOptions {
  debounceMs?: number;
  ignoreInitial?: boolean;
}

/**
 * Collects changed source files under a root and calls `run` once changes
 * settle. Runs never overlap: changes seen during a run trigger one more run.
 */
export class Watcher extends EventEmitter {
  private watcher: FSWatcher | null = null;
  private options: Required<WatcherOptions>;
  private debounceTimer: NodeJS.Timeout | null = null;
  private pending: Set<string> = new Set();
  private running: Promise<void> | null = null;

  constructor(
    private run: () => Promise<RunResult>,
    private rootDirectory: string,
    private skipDirs: string[],
    options: WatcherOptions = {}
  ) {
    super();
    this.options = {
      debounceMs: 300,
      ignoreInitial: true,
      ...options,
    };
  }

  async start(): Promise<void> {
    const skipped = new Set(this.skipDirs);

    this.watcher = chokidar.watch(this.rootDirectory, {
      ignored: (filePath: string) => {
        const relative = path.relative(this.rootDirectory, filePath);
        return relative.split(path.sep).some(segment => skipped.has(segment) || (segment.startsWith('.') && segment !== '.' && segment !== '..'));
      },
      persistent: true,
      ignoreInitial: this.options.ignoreInitial,
      awaitWriteFinish: {
        stabilityThreshold: 200,
        pollInterval: 100,
      },
    });

    this.watcher.on('add', filePath => this.handleChange(filePath));
    this.watcher.on('change', filePath => this.handleChange(filePath));
    this.watcher.on('unlink', filePath => this.handleChange(filePath));
    this.watcher.on('error', (err: unknown) => {
      const error = err instanceof Error ? err : new Error(String(err));
      this.emit('error', { changed: [], error });
    });
    this.watcher.on('ready', () => this.emit('ready'));
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    this.pending.clear();
    await this.running;
  }

  /**
   * Record a changed path and schedule a run
   */
  handleChange(filePath: string): void {
    if (!isSourceFile(filePath)) {
      return;
    }
    this.pending.add(path.resolve(filePath));

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.flush();
    }, this.options.debounceMs);
  }

  /**
   * Start a run for the pending changes unless one is in progress
   */
  flush(): void {
    if (this.running || this.pending.size === 0) {
      return;
    }

    const changed = Array.from(this.pending).sort();
    this.pending.clear();

    this.running = this.run()
      .then(result => {
        this.emit('run', { changed, result });
      })
      .catch((error: unknown) => {
        this.emit('error', { changed, error: error instanceof Error ? error : new Error(String(error)) });
      })
      .finally(() => {
        this.running = null;
        this.flush();
      });
  }

  /**
   * Resolves once the current run, and any run it schedules, has finished
   */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  // Type-safe event emitter methods
  override on<K extends keyof WatcherEvents>(event: K, listener: (arg: WatcherEvents[K]) => void): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  override emit<K extends keyof WatcherEvents>(event: K, arg?: WatcherEvents[K]): boolean {
    // unhandled "error" events would throw
    if (event === 'error' && this.listenerCount('error') === 0) {
      return false;
    }

    return super.emit(event, arg);
  }
}
