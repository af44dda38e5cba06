import { describe, it, expect, afterEach } from 'vitest';
import { ConfigError } from '../../../src/errors.js';
import { findConfig, getDefaultConfig, loadConfig } from '../../../src/config/loader.js';
import { createTempProject, packageJson, type TempProjectResult } from '../../helpers/fixtures.js';

describe('Config Loader', () => {
  let project: TempProjectResult;

  afterEach(() => {
    project?.cleanup();
  });

  describe('loadConfig', () => {
    it('should load and parse a valid JSON config file', async () => {
      project = createTempProject({
        'annokit.config.json': JSON.stringify({
          prefix: '+gen:',
          plugins: { inspect: { resolve: '' } },
        }),
      });

      const config = await loadConfig(project.getFilePath('annokit.config.json'));

      expect(config.prefix).toBe('+gen:');
      expect(config.plugins).toEqual({ inspect: { resolve: '' } });
      expect(config.cacheFile).toBe('.annokitcache');
      expect(config.skipDirs).toContain('node_modules');
    });

    it('should load YAML config files', async () => {
      project = createTempProject({
        'annokit.config.yaml': 'cacheFile: .cache/annokit\nwatch:\n  debounceMs: 50\n',
      });

      const config = await loadConfig(project.getFilePath('annokit.config.yaml'));

      expect(config.cacheFile).toBe('.cache/annokit');
      expect(config.watch.debounceMs).toBe(50);
      expect(config.prefix).toBe('+ak:');
    });

    it('should apply defaults to an empty YAML file', async () => {
      project = createTempProject({ 'annokit.config.yml': '' });

      const config = await loadConfig(project.getFilePath('annokit.config.yml'));

      expect(config).toEqual(getDefaultConfig());
    });

    it('should throw for a missing config file', async () => {
      await expect(loadConfig('/non/existent/annokit.config.json')).rejects.toThrow('Config file not found');
    });

    it('should throw a ConfigError for invalid JSON', async () => {
      project = createTempProject({ 'annokit.config.json': '{ "prefix": ' });

      await expect(loadConfig(project.getFilePath('annokit.config.json'))).rejects.toBeInstanceOf(ConfigError);
    });

    it('should report the field path of schema errors', async () => {
      project = createTempProject({
        'annokit.config.json': JSON.stringify({ plugins: { inspect: { resolve: 1 } } }),
      });

      await expect(loadConfig(project.getFilePath('annokit.config.json'))).rejects.toThrow('plugins.inspect.resolve');
    });

    it('should reject prefixes containing whitespace', async () => {
      project = createTempProject({ 'annokit.config.json': JSON.stringify({ prefix: '+a k:' }) });

      await expect(loadConfig(project.getFilePath('annokit.config.json'))).rejects.toThrow(
        'prefix must not contain whitespace'
      );
    });
  });

  describe('findConfig', () => {
    it('should find a config file in a parent directory', async () => {
      project = createTempProject({
        '.annokitrc.json': JSON.stringify({ prefix: '+up:' }),
        'src/deep/file.ts': 'export {};\n',
      });

      const found = await findConfig(project.getFilePath('src/deep'));

      expect(found?.config.prefix).toBe('+up:');
      expect(found?.filePath).toBe(project.getFilePath('.annokitrc.json'));
    });

    it('should read the annokit key of package.json', async () => {
      project = createTempProject({
        'package.json': packageJson('app', { annokit: { skipDirs: ['generated'] } }),
      });

      const found = await findConfig(project.rootDir);

      expect(found?.config.skipDirs).toEqual(['generated']);
      expect(found?.filePath).toBe(project.getFilePath('package.json'));
    });

    it('should prefer the closest configuration', async () => {
      project = createTempProject({
        'annokit.config.json': JSON.stringify({ prefix: '+outer:' }),
        'pkg/package.json': packageJson('pkg', { annokit: { prefix: '+inner:' } }),
      });

      const found = await findConfig(project.getFilePath('pkg'));

      expect(found?.config.prefix).toBe('+inner:');
    });

    it('should skip a package.json without the annokit key', async () => {
      project = createTempProject({
        'annokit.config.json': JSON.stringify({ prefix: '+outer:' }),
        'pkg/package.json': packageJson('pkg'),
      });

      const found = await findConfig(project.getFilePath('pkg'));

      expect(found?.filePath).toBe(project.getFilePath('annokit.config.json'));
    });
  });

  it('should provide the default configuration', () => {
    expect(getDefaultConfig()).toEqual({
      prefix: '+ak:',
      cacheFile: '.annokitcache',
      skipDirs: ['node_modules', 'vendor', 'testdata', '__fixtures__', '__generated__', 'dist'],
      plugins: {},
      watch: { debounceMs: 300 },
    });
  });
});
