/**
 * Identifier helpers for module paths
 */

import path from 'node:path';

export const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts'];

const RESERVED_WORDS = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default',
  'delete', 'do', 'else', 'enum', 'export', 'extends', 'false', 'finally', 'for',
  'function', 'if', 'import', 'in', 'instanceof', 'new', 'null', 'return', 'super',
  'switch', 'this', 'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with',
  'yield', 'let', 'static', 'implements', 'interface', 'package', 'private',
  'protected', 'public', 'await',
]);

/**
 * Check if a file is a TypeScript source the extractor handles.
 * Declaration files are excluded.
 */
export function isSourceFile(filePath: string): boolean {
  if (/\.d\.[cm]?ts$/.test(filePath)) {
    return false;
  }
  return SOURCE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/**
 * Drop a known source extension from a path
 */
export function stripSourceExtension(filePath: string): string {
  return filePath.replace(/\.(d\.)?([cm]?tsx?|[cm]?jsx?)$/, '');
}

/**
 * Convert a module path segment into an identifier: `date-fns` → `dateFns`
 */
export function toIdentifier(segment: string): string {
  const words = segment.split(/[^A-Za-z0-9_$]+/).filter(w => w.length > 0);
  let name = words
    .map((word, i) => (i === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join('');

  if (name.length === 0) {
    return '_';
  }
  if (/^[0-9]/.test(name)) {
    name = '_' + name;
  }
  if (RESERVED_WORDS.has(name)) {
    name = name + '_';
  }
  return name;
}

/**
 * Local name of a module import path: its last meaningful segment as identifier.
 * `@scope/pkg/models/user-profile` → `userProfile`
 */
export function importNameOf(importPath: string): string {
  const segments = stripSourceExtension(importPath)
    .split('/')
    .filter(s => s.length > 0 && s !== '.' && s !== '..');

  while (segments.length > 1 && segments[segments.length - 1] === 'index') {
    segments.pop();
  }

  const last = segments[segments.length - 1] ?? '';
  return toIdentifier(last.replace(/^node:/, '').replace(/^@/, ''));
}

export function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
