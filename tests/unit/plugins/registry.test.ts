import { describe, it, expect, beforeEach } from 'vitest';
import type { DeclEntity } from '../../../src/annotations/entity.js';
import { ConfigError } from '../../../src/errors.js';
import { Plugin, describeArg, type PluginArgs } from '../../../src/plugins/base.js';
import { PluginRegistry, getDefaultRegistry, resetRegistry } from '../../../src/plugins/registry.js';

class EchoPlugin extends Plugin {
  readonly seen: DeclEntity[] = [];

  get name(): string {
    return 'echo';
  }

  get description(): string {
    return 'Collect entities';
  }

  args(): PluginArgs {
    return { args: ['table:table name', 'schema'], options: { pk: 'primary key column' } };
  }

  async run(entities: DeclEntity[]): Promise<void> {
    this.seen.push(...entities);
  }
}

describe('PluginRegistry', () => {
  beforeEach(() => {
    resetRegistry();
  });

  it('should register and look up plugins', () => {
    const registry = new PluginRegistry();
    const plugin = new EchoPlugin();

    registry.register(plugin);

    expect(registry.get('echo')).toBe(plugin);
    expect(registry.get('missing')).toBeUndefined();
    expect(plugin.argsCount).toBe(2);
  });

  it('should reject duplicate names', () => {
    const registry = new PluginRegistry();
    registry.register(new EchoPlugin());

    expect(() => registry.register(new EchoPlugin())).toThrow(ConfigError);
  });

  it('should fail to require unknown plugins', () => {
    expect(() => new PluginRegistry().require('missing')).toThrow('Unknown plugin: missing');
  });

  it('should provide the built-in plugins sorted by name', () => {
    expect(getDefaultRegistry().names()).toEqual(['fields', 'inspect']);
  });

  it('should keep the default registry until reset', () => {
    const registry = getDefaultRegistry();
    registry.register(new EchoPlugin());

    expect(getDefaultRegistry().get('echo')).toBeDefined();

    resetRegistry();
    expect(getDefaultRegistry().get('echo')).toBeUndefined();
  });
});

describe('describeArg', () => {
  it('should split name and help', () => {
    expect(describeArg('table:table name')).toEqual({ name: 'table', help: 'table name' });
    expect(describeArg('schema')).toEqual({ name: 'schema', help: '' });
  });
});
