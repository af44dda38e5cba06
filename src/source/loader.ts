/**
 * SourceLoader - parses source files into cached SourceUnits
 */

import fs from 'node:fs';
import path from 'node:path';
import { VersionStore } from '../cache/version-store.js';
import { ParseError } from '../errors.js';
import { SourceUnit } from './source-unit.js';
import { findSyntaxErrors, fingerprint, parseSourceFile } from './syntax.js';

export interface LoadedFile {
  path: string;
  content: string;
  fingerprint: string;
}

/**
 * Read a file and fingerprint its content
 */
export async function readSource(filePath: string): Promise<LoadedFile> {
  const absolutePath = path.resolve(filePath);
  const content = await fs.promises.readFile(absolutePath, 'utf-8');
  return { path: absolutePath, content, fingerprint: fingerprint(content) };
}

/**
 * Each parsed version of a file owns its SourceFile: units handed out
 * earlier stay readable after the file is re-parsed.
 */
export class SourceLoader {
  private units: VersionStore<string, SourceUnit> = new VersionStore();

  /**
   * Parse a file, reusing the cached unit while its content is unchanged
   */
  async load(filePath: string): Promise<SourceUnit> {
    const file = await readSource(filePath);
    return this.fromContent(file);
  }

  /**
   * Parse already read content, reusing the cached unit for the same fingerprint
   */
  async fromContent(file: LoadedFile): Promise<SourceUnit> {
    return this.units.load(file.path, file.fingerprint, () => this.parse(file));
  }

  /**
   * Drop every cached unit
   */
  clear(): void {
    this.units.clear();
  }

  private parse(file: LoadedFile): SourceUnit {
    const sourceFile = parseSourceFile(file.path, file.content);
    const problems = findSyntaxErrors(sourceFile);
    const first = problems[0];
    if (first) {
      const where = first.line !== undefined ? `:${first.line}:${first.column ?? 1}` : '';
      throw new ParseError(`${file.path}${where}: ${first.message}`, {
        filePath: file.path,
        line: first.line,
        problems: problems.length,
      });
    }

    return new SourceUnit(file.path, file.content, file.fingerprint, sourceFile);
  }
}
