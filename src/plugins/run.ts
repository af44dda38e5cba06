/**
 * Runs plugins over the annotated declarations of a path
 */

import { bindDecls } from '../annotations/entity.js';
import type { DeclarationExtractor } from '../extractor/index.js';
import { ModifySet } from '../patch/modify-set.js';
import type { ModuleResolver } from '../resolver/module-resolver.js';
import {
  ANNOTATION_SEPARATOR,
  KEY_VALUE_SEPARATOR,
  escapeAnnotation,
  splitKVList,
  unescapeAnnotation,
} from '../annotations/grammar.js';
import { AnnokitError, PluginError, errorMessage } from '../errors.js';
import type { Plugin, PluginContext } from './base.js';

/**
 * A plugin selected for a run with the options given on the command line
 * or in the configuration
 */
export interface PluginEntry {
  plugin: Plugin;
  options: Record<string, string>;
}

export interface RunOptions {
  extractor: DeclarationExtractor;
  resolver: ModuleResolver;
  print?: (line: string) => void;
}

export interface RunResult {
  declarations: number;
  /** Bound entity count per plugin name */
  entities: Record<string, number>;
  /** Files rewritten by staged edits */
  written: string[];
}

/**
 * Parse `target` once, then bind and run each plugin in order. Edits staged
 * by the plugins are applied after the last one. The first failure stops the run.
 */
export async function runPlugins(target: string, entries: PluginEntry[], options: RunOptions): Promise<RunResult> {
  const decls = await options.extractor.parsePath(target);
  const context: PluginContext = {
    resolver: options.resolver,
    modifySet: new ModifySet(),
    print: options.print ?? (line => console.log(line)),
  };

  const result: RunResult = { declarations: decls.length, entities: {}, written: [] };
  for (const { plugin, options: extOptions } of entries) {
    const entities = bindDecls(decls, { name: plugin.name, argsCount: plugin.argsCount }, extOptions);
    result.entities[plugin.name] = entities.length;

    try {
      await plugin.run(entities, context);
    } catch (error) {
      if (error instanceof AnnokitError) {
        error.context.plugin ??= plugin.name;
        throw error;
      }
      throw new PluginError(`Plugin ${plugin.name} failed: ${errorMessage(error)}`, { plugin: plugin.name }, { cause: error });
    }
  }

  result.written = await context.modifySet.apply();
  return result;
}

/**
 * Parse a `name[:key=value...]` plugin selector. Options follow the
 * annotation grammar: repeated keys are joined with `,` and `\:` escapes
 * a colon inside a value.
 */
export function parsePluginSelector(selector: string): { name: string; options: Record<string, string> } {
  const [name = '', ...items] = escapeAnnotation(selector).split(ANNOTATION_SEPARATOR);
  const options = splitKVList(items, KEY_VALUE_SEPARATOR, new Map());
  return {
    name,
    options: Object.fromEntries(Array.from(options, ([key, value]): [string, string] => [key, unescapeAnnotation(value)])),
  };
}
