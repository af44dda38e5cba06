/**
 * Module boundary and import path resolution
 */

import fs from 'node:fs';
import path from 'node:path';
import { builtinModules } from 'node:module';
import { CacheStore } from '../cache/cache-store.js';
import { Mutex } from '../cache/mutex.js';
import { ResolutionError } from '../errors.js';
import { ImportList } from '../source/imports.js';
import { SourceLoader } from '../source/loader.js';
import type { SourceUnit } from '../source/source-unit.js';
import { importNameOf, stripSourceExtension, toIdentifier, toPosix } from '../source/naming.js';
import { fixQualifiedName, type QualifyTarget } from './qualify.js';
import { lookupType, type ResolvedType } from './type-lookup.js';

const MODULE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.d.ts'];
const MODULE_FILE = 'package.json';

export interface ModuleResolverOptions {
  caches?: CacheStore;
  loader?: SourceLoader;
}

export class ModuleResolver {
  readonly caches: CacheStore;
  readonly loader: SourceLoader;
  // import path resolution reads and fills the persisted cache; one at a time
  private importPathMutex = new Mutex();

  constructor(options: ModuleResolverOptions = {}) {
    this.caches = options.caches ?? new CacheStore();
    this.loader = options.loader ?? new SourceLoader();
  }

  /**
   * Path of the nearest `package.json` declaring a name, or ''
   */
  async getModuleFile(dir: string): Promise<string> {
    const start = path.resolve(dir);
    return this.caches.store('modFile').load(start, async () => {
      let current = start;
      for (;;) {
        const candidate = path.join(current, MODULE_FILE);
        if ((await readPackageName(candidate)).length > 0) {
          return candidate;
        }
        const parent = path.dirname(current);
        if (parent === current) {
          return '';
        }
        current = parent;
      }
    });
  }

  /**
   * Declared name of the module enclosing `dir`, or ''
   */
  async getModuleName(dir: string): Promise<string> {
    const moduleFile = await this.getModuleFile(dir);
    return moduleFile ? readPackageName(moduleFile) : '';
  }

  /**
   * Import path of a file or directory: the module name joined with the
   * path relative to the module root. Paths that do not exist yet are
   * resolved against the module of their nearest existing ancestor.
   */
  async getImportPath(target: string): Promise<string> {
    const absolutePath = path.resolve(target);
    return this.importPathMutex.runExclusive(() =>
      this.caches.store('importPath').load(absolutePath, async () => {
        let existing = absolutePath;
        while (!(await exists(existing))) {
          const parent = path.dirname(existing);
          if (parent === existing) break;
          existing = parent;
        }

        const moduleFile = await this.getModuleFile((await isDirectory(existing)) ? existing : path.dirname(existing));
        if (!moduleFile) {
          return '';
        }

        const moduleName = await readPackageName(moduleFile);
        const relative = toPosix(path.relative(path.dirname(moduleFile), absolutePath));
        if (relative.startsWith('..')) {
          return '';
        }

        const segments = stripSourceExtension(relative)
          .split('/')
          .filter(segment => segment.length > 0);
        if (segments[segments.length - 1] === 'index') {
          segments.pop();
        }
        return [moduleName, ...segments].join('/');
      })
    );
  }

  /**
   * Local name for a file or directory: the last import path segment, or the
   * base name when the path is outside any module
   */
  async getImportName(target: string): Promise<string> {
    const absolutePath = path.resolve(target);
    return this.caches.store('importName').load(absolutePath, async () => {
      const importPath = await this.getImportPath(absolutePath);
      if (importPath) {
        return importNameOf(importPath);
      }
      return toIdentifier(path.basename(stripSourceExtension(absolutePath)));
    });
  }

  /**
   * Source file defining the module `importPath` as seen from `fromDir`, or ''.
   * Relative specifiers, the enclosing module's own name and `node_modules`
   * packages are resolved; built-in modules have no source.
   */
  async resolveModule(importPath: string, fromDir: string): Promise<string> {
    if (importPath.length === 0 || isBuiltinModule(importPath)) {
      return '';
    }

    const dir = path.resolve(fromDir);
    return this.caches.store('importPackageDir').load(`${importPath}#${dir}`, async () => {
      if (importPath.startsWith('.') || path.isAbsolute(importPath)) {
        return resolveFile(path.resolve(dir, importPath));
      }

      const moduleFile = await this.getModuleFile(dir);
      if (moduleFile) {
        const moduleName = await readPackageName(moduleFile);
        if (importPath === moduleName || importPath.startsWith(moduleName + '/')) {
          const rest = importPath.slice(moduleName.length).replace(/^\//, '');
          return resolveFile(path.join(path.dirname(moduleFile), rest));
        }
      }

      return resolveFromNodeModules(importPath, dir);
    });
  }

  /**
   * Local name of a resolvable module, or '' when it cannot be resolved
   */
  async getPackageName(importPath: string, fromDir: string): Promise<string> {
    const dir = path.resolve(fromDir);
    return this.caches.store('importPackageName').load(`${importPath}#${dir}`, async () => {
      const resolved = await this.resolveModule(importPath, dir);
      return resolved ? importNameOf(importPath) : '';
    });
  }

  /**
   * Find the declaration of type `name` exported by module `importPath`.
   * An empty name or import path is a caller error, not a miss.
   */
  async lookupType(name: string, dir: string, importPath: string): Promise<ResolvedType | null> {
    if (name.length === 0 || importPath.length === 0) {
      throw new ResolutionError('Type lookup needs a name and an import path', { name, importPath, dir });
    }
    return lookupType(this, name, dir, importPath);
  }

  /**
   * Rewrite a type name read in `unit` for use in the file described by `dst`.
   * Relative import specifiers of the unit are compared as module import paths.
   */
  async qualify(name: string, unit: SourceUnit, dst: QualifyTarget): Promise<string> {
    const entries = await Promise.all(
      unit.imports().list().map(async entry => ({ ...entry, path: await this.toImportPath(entry.path, unit.dir) }))
    );
    return fixQualifiedName(
      name,
      {
        importPath: await this.getImportPath(unit.path),
        imports: new ImportList(entries),
        isExported: local => unit.isExported(local),
      },
      dst
    );
  }

  private async toImportPath(specifier: string, fromDir: string): Promise<string> {
    if (!specifier.startsWith('.')) {
      return specifier;
    }
    const file = await this.resolveModule(specifier, fromDir);
    return (file && (await this.getImportPath(file))) || specifier;
  }
}

/**
 * Check if a module specifier names a Node.js built-in module
 */
export function isBuiltinModule(source: string): boolean {
  if (source.startsWith('node:')) {
    return true;
  }
  return builtinModules.includes(source.split('/')[0] ?? source);
}

/**
 * Extract package name from an import source
 */
export function extractPackageName(source: string): string {
  // Handle scoped packages (@org/package)
  if (source.startsWith('@')) {
    const parts = source.split('/');
    return parts.slice(0, 2).join('/');
  }
  return source.split('/')[0] ?? source;
}

async function resolveFromNodeModules(importPath: string, fromDir: string): Promise<string> {
  const packageName = extractPackageName(importPath);
  const subpath = importPath.slice(packageName.length).replace(/^\//, '');

  let current = fromDir;
  for (;;) {
    const packageDir = path.join(current, 'node_modules', packageName);
    if (await isDirectory(packageDir)) {
      if (subpath) {
        return resolveFile(path.join(packageDir, subpath));
      }
      const entry = await readPackageEntry(path.join(packageDir, MODULE_FILE));
      return resolveFile(path.join(packageDir, entry));
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return '';
    }
    current = parent;
  }
}

/**
 * Resolve a module base path to a source file: exact file, file with a
 * source extension (`.js` specifiers map to `.ts`), or an index file
 */
async function resolveFile(base: string): Promise<string> {
  const candidates: string[] = [];
  if (MODULE_EXTENSIONS.some(ext => base.endsWith(ext))) {
    candidates.push(base);
  }

  const stem = base.replace(/\.[cm]?jsx?$/, '');
  for (const ext of MODULE_EXTENSIONS) {
    candidates.push(stem + ext);
  }
  for (const ext of MODULE_EXTENSIONS) {
    candidates.push(path.join(base, 'index' + ext));
  }

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return '';
}

async function readPackageJson(packageFile: string): Promise<Record<string, unknown> | null> {
  try {
    const parsed: unknown = JSON.parse(await fs.promises.readFile(packageFile, 'utf-8'));
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

async function readPackageName(packageFile: string): Promise<string> {
  const pkg = await readPackageJson(packageFile);
  return typeof pkg?.name === 'string' ? pkg.name : '';
}

async function readPackageEntry(packageFile: string): Promise<string> {
  const pkg = await readPackageJson(packageFile);
  for (const field of ['types', 'typings', 'main']) {
    const value = pkg?.[field];
    if (typeof value === 'string' && value.length > 0) {
      return stripSourceExtension(value);
    }
  }
  return 'index';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.promises.stat(target);
    return true;
  } catch {
    return false;
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch {
    return false;
  }
}
