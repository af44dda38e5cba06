/**
 * Plugin contract
 */

import type { DeclEntity } from '../annotations/entity.js';
import type { ModifySet } from '../patch/modify-set.js';
import type { ModuleResolver } from '../resolver/module-resolver.js';

export interface PluginArgs {
  /**
   * Positional arguments, one `name:help` entry each. Their count is the
   * number of annotation segments read as args before options start.
   */
  args: string[];
  /** Option name to help text */
  options: Record<string, string>;
}

/**
 * Services handed to a running plugin
 */
export interface PluginContext {
  resolver: ModuleResolver;
  /** Edits staged here are applied once every plugin of the run has finished */
  modifySet: ModifySet;
  print: (line: string) => void;
}

export abstract class Plugin {
  /**
   * Unique name, also the first segment of the annotations the plugin reads
   */
  abstract get name(): string;

  abstract get description(): string;

  abstract args(): PluginArgs;

  abstract run(entities: DeclEntity[], context: PluginContext): Promise<void>;

  /**
   * Number of positional arguments
   */
  get argsCount(): number {
    return this.args().args.length;
  }
}

/**
 * Split an `name:help` argument description
 */
export function describeArg(arg: string): { name: string; help: string } {
  const index = arg.indexOf(':');
  if (index < 0) {
    return { name: arg, help: '' };
  }
  return { name: arg.slice(0, index), help: arg.slice(index + 1) };
}
