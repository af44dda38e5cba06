/**
 * Plugin module exports
 */

export { Plugin, describeArg, type PluginArgs, type PluginContext } from './base.js';
export { PluginRegistry, createDefaultRegistry, getDefaultRegistry, resetRegistry } from './registry.js';
export { runPlugins, parsePluginSelector, type PluginEntry, type RunOptions, type RunResult } from './run.js';
export { InspectPlugin, type InspectRecord } from './builtin/inspect.js';
export { FieldsPlugin, renderNames } from './builtin/fields.js';
