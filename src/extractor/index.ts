/**
 * Declaration extraction pipeline
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import { VersionStore } from '../cache/version-store.js';
import { SourceLoader, readSource } from '../source/loader.js';
import { isSourceFile } from '../source/naming.js';
import type { AnnotatedDecl } from './annotated.js';
import { extractDecls } from './declarations.js';

export { AnnotatedDecl, AnnotatedField, type DeclKind, type DeclTarget, type FieldNode } from './annotated.js';
export { extractDecls, extractStatement, extractFieldNames, classifyType } from './declarations.js';

export const DEFAULT_PREFIX = '+ak:';

/**
 * Directory names pruned from directory walks, along with any name starting with `.`
 */
export const DEFAULT_SKIP_DIRS = ['node_modules', 'vendor', 'testdata', '__fixtures__', '__generated__', 'dist'];

export interface ExtractorOptions {
  prefix?: string;
  skipDirs?: string[];
  loader?: SourceLoader;
}

export class DeclarationExtractor {
  readonly prefix: string;
  readonly skipDirs: Set<string>;
  readonly loader: SourceLoader;
  private parsed: VersionStore<string, AnnotatedDecl[]> = new VersionStore();

  constructor(options: ExtractorOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_PREFIX;
    this.skipDirs = new Set(options.skipDirs ?? DEFAULT_SKIP_DIRS);
    this.loader = options.loader ?? new SourceLoader();
  }

  /**
   * Parse annotated declarations of a file, or of every file under a directory
   */
  async parsePath(target: string): Promise<AnnotatedDecl[]> {
    const absolutePath = path.resolve(target);
    const stat = await fs.promises.stat(absolutePath);

    if (!stat.isDirectory()) {
      return this.parseFile(absolutePath);
    }

    const files = await this.walk(absolutePath);

    // parses run concurrently, results keep walk order
    const slots = await Promise.all(files.map(file => this.parseFile(file)));
    return slots.flat();
  }

  /**
   * Parse annotated declarations of one file. Files that are not TypeScript
   * sources or do not contain the prefix give no declarations.
   */
  async parseFile(filePath: string): Promise<AnnotatedDecl[]> {
    const absolutePath = path.resolve(filePath);
    if (!isSourceFile(absolutePath)) {
      return [];
    }

    const file = await readSource(absolutePath);
    if (!file.content.includes(this.prefix)) {
      return [];
    }

    const unit = await this.loader.fromContent(file);
    return this.parsed.load(unit.path, `${unit.fingerprint}#${this.prefix}`, () => extractDecls(unit, this.prefix));
  }

  /**
   * Source files under `root` in pre-order walk order: entries of a directory
   * are visited by name, pruned directories are not entered.
   */
  async walk(root: string): Promise<string[]> {
    const ignore = Array.from(this.skipDirs, name => `**/${fg.escapePath(name)}/**`);
    ignore.push('**/.*/**');

    const entries = await fg('**/*.{ts,tsx,mts,cts}', {
      cwd: root,
      ignore,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
    });

    return entries
      .filter(entry => isSourceFile(entry))
      .map(entry => entry.split('/'))
      .sort(comparePathSegments)
      .map(segments => path.join(root, ...segments));
  }
}

function comparePathSegments(a: string[], b: string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? '';
    const right = b[i] ?? '';
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return a.length - b.length;
}
