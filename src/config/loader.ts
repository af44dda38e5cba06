/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import * as YAML from 'yaml';
import type { ZodError } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import { configSchema, type Config } from './schema.js';

export const CONFIG_NAMES = [
  'annokit.config.json',
  'annokit.config.yaml',
  'annokit.config.yml',
  '.annokitrc.json',
  '.annokitrc',
];

export const PACKAGE_CONFIG_KEY = 'annokit';

export interface ResolvedConfig {
  config: Config;
  /** File the configuration came from, null for defaults */
  filePath: string | null;
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`, { filePath: absolutePath });
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = /\.ya?ml$/.test(absolutePath) ? YAML.parse(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid config file ${absolutePath}: ${errorMessage(error)}`,
      { filePath: absolutePath },
      { cause: error }
    );
  }

  return validateConfig(rawConfig ?? {}, absolutePath);
}

export function validateConfig(rawConfig: unknown, source: string): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}:\n${formatIssues(result.error)}`, { filePath: source });
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Find the configuration closest to `startDir`, walking up to the file
 * system root. A `package.json` with an `annokit` key counts as a config.
 */
export async function findConfig(startDir: string): Promise<ResolvedConfig | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const configName of CONFIG_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return { config: await loadConfig(configPath), filePath: configPath };
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const packageConfig = await readPackageConfig(packagePath);
      if (packageConfig !== undefined) {
        return { config: validateConfig(packageConfig, packagePath), filePath: packagePath };
      }
    }

    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

export async function loadConfigOrDefault(startDir: string): Promise<ResolvedConfig> {
  const found = await findConfig(startDir);
  return found ?? { config: getDefaultConfig(), filePath: null };
}

async function readPackageConfig(packagePath: string): Promise<unknown> {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // Unreadable package.json files carry no configuration
    return undefined;
  }

  if (typeof packageContent !== 'object' || packageContent === null || !(PACKAGE_CONFIG_KEY in packageContent)) {
    return undefined;
  }
  return packageContent[PACKAGE_CONFIG_KEY];
}

function formatIssues(error: ZodError): string {
  return error.errors.map(e => `  - ${e.path.join('.') || '(root)'}: ${e.message}`).join('\n');
}
