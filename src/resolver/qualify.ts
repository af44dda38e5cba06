/**
 * Qualified-name rewriting between files
 */

import type { ImportList } from '../source/imports.js';

export interface QualifySource {
  importPath: string;
  imports: ImportList;
  /** Whether an unqualified name is exported by the source file */
  isExported?: (name: string) => boolean;
}

export interface QualifyTarget {
  importPath: string;
  imports: ImportList;
}

/**
 * Rewrite a type name written in `src` so that it means the same thing in `dst`.
 *
 * Trailing `[]` markers are kept. An unqualified name exported by `src` gets
 * qualified by an import of `src` added to `dst`. A qualified name whose
 * module is `dst` loses its qualifier; any other qualified name is
 * re-qualified against `dst`'s imports, adding one when needed. Names that
 * cannot be traced are returned unchanged.
 */
export function fixQualifiedName(name: string, src: QualifySource, dst: QualifyTarget): string {
  const match = /^(.*?)((?:\[\])*)$/.exec(name);
  const base = match?.[1] ?? name;
  const suffix = match?.[2] ?? '';

  const dot = base.indexOf('.');
  if (dot < 0) {
    if (src.importPath === dst.importPath || !src.isExported?.(base)) {
      return name;
    }
    const alias = dst.imports.add(src.importPath);
    return `${alias}.${base}${suffix}`;
  }

  const qualifier = base.slice(0, dot);
  const member = base.slice(dot + 1);
  const importPath = src.imports.which(qualifier);
  if (!importPath) {
    return name;
  }
  if (importPath === dst.importPath) {
    return `${member}${suffix}`;
  }

  const alias = dst.imports.add(importPath);
  return `${alias}.${member}${suffix}`;
}
