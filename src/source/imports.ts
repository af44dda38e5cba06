/**
 * Mutable import list of a source file
 */

import type { ImportDeclaration } from 'ts-morph';
import { importNameOf } from './naming.js';

export type ImportKind = 'namespace' | 'default' | 'named' | 'side-effect';

export interface ImportBinding {
  /** Name bound in the importing file */
  local: string;
  /** Exported name it refers to; `default` for default imports, `*` for namespace imports */
  imported: string;
}

export interface ImportEntry {
  path: string;
  kind: ImportKind;
  /** Namespace alias, set for `import * as alias from 'path'` */
  alias?: string;
  bindings: ImportBinding[];
  isTypeOnly: boolean;
  /** Original statement text, absent for added imports */
  text?: string;
}

export class ImportList {
  private entries: ImportEntry[];

  constructor(entries: ImportEntry[] = []) {
    this.entries = entries.map(entry => ({ ...entry, bindings: [...entry.bindings] }));
  }

  static fromDeclarations(declarations: ImportDeclaration[]): ImportList {
    return new ImportList(declarations.map(toImportEntry));
  }

  /**
   * Import path bound to a namespace or default alias, or '' when the alias is unknown
   */
  which(alias: string): string {
    for (const entry of this.entries) {
      if (entryAlias(entry) === alias) {
        return entry.path;
      }
    }
    return '';
  }

  /**
   * Find which import binds a local name
   */
  binding(local: string): { path: string; imported: string } | null {
    for (const entry of this.entries) {
      const binding = entry.bindings.find(b => b.local === local);
      if (binding) {
        return { path: entry.path, imported: binding.imported };
      }
    }
    return null;
  }

  /**
   * Add a namespace import of `importPath` and return its alias.
   * When the path already has a value namespace or default import its alias
   * is returned and nothing is added. Type-only imports and named bindings
   * are not reused: the alias must work in value positions, so a path
   * imported as `import { a } from 'p'` gets a namespace import beside it.
   */
  add(importPath: string, alias?: string): string {
    for (const entry of this.entries) {
      const existing = entry.path === importPath && !entry.isTypeOnly ? entryAlias(entry) : undefined;
      if (existing !== undefined) {
        return existing;
      }
    }

    const chosen = this.freshAlias(alias ?? importNameOf(importPath));
    this.entries.push({
      path: importPath,
      kind: 'namespace',
      alias: chosen,
      bindings: [{ local: chosen, imported: '*' }],
      isTypeOnly: false,
    });
    return chosen;
  }

  /**
   * All names bound by the imports
   */
  names(): Set<string> {
    const names = new Set<string>();
    for (const entry of this.entries) {
      for (const binding of entry.bindings) {
        names.add(binding.local);
      }
    }
    return names;
  }

  list(): readonly ImportEntry[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * Imports added after the list was read from source
   */
  added(): ImportEntry[] {
    return this.entries.filter(entry => entry.text === undefined);
  }

  /**
   * Whether any import was added after the list was read from source
   */
  isModified(): boolean {
    return this.added().length > 0;
  }

  /**
   * Serialize the imports one declaration per line: imports read from source
   * in their order, added ones placed as `placeImports` puts them
   */
  toString(): string {
    const existing = this.entries.filter(entry => entry.text !== undefined);
    const { before, after } = placeImports(existing, entry => entry.path, entry => entry.kind === 'side-effect', this.added());

    const lines: string[] = [];
    for (const entry of existing) {
      lines.push(...(before.get(entry) ?? []).map(renderImport), renderImport(entry));
    }
    lines.push(...after.map(renderImport));
    return lines.join('\n');
  }

  private freshAlias(base: string): string {
    const taken = this.names();
    if (!taken.has(base)) {
      return base;
    }
    for (let i = 2; ; i++) {
      const candidate = `${base}${i}`;
      if (!taken.has(candidate)) {
        return candidate;
      }
    }
  }
}

export interface ImportPlacement<T> {
  /** Added imports to write before an existing import, sorted by path */
  before: Map<T, ImportEntry[]>;
  /** Added imports to write after the last existing import, sorted by path */
  after: ImportEntry[];
}

/**
 * Place added imports among existing ones without moving those. An added
 * import goes before the first existing import with a greater module path,
 * or after the last one, and never ahead of a side-effect import.
 */
export function placeImports<T>(
  existing: readonly T[],
  pathOf: (item: T) => string,
  isSideEffect: (item: T) => boolean,
  added: readonly ImportEntry[]
): ImportPlacement<T> {
  let firstMovable = 0;
  existing.forEach((item, index) => {
    if (isSideEffect(item)) {
      firstMovable = index + 1;
    }
  });
  const candidates = existing.slice(firstMovable);

  const placement: ImportPlacement<T> = { before: new Map(), after: [] };
  const sorted = [...added].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const entry of sorted) {
    const anchor = candidates.find(item => pathOf(item) > entry.path);
    if (anchor === undefined) {
      placement.after.push(entry);
      continue;
    }
    const entries = placement.before.get(anchor) ?? [];
    entries.push(entry);
    placement.before.set(anchor, entries);
  }
  return placement;
}

/**
 * Name qualifying members of the imported module: the namespace alias, or the default import
 */
function entryAlias(entry: ImportEntry): string | undefined {
  return entry.alias ?? entry.bindings.find(b => b.imported === 'default')?.local;
}

/**
 * Source text of an import declaration
 */
export function renderImport(entry: ImportEntry): string {
  if (entry.text !== undefined) {
    return entry.text;
  }
  const typeOnly = entry.isTypeOnly ? 'type ' : '';
  if (entry.kind === 'namespace' && entry.alias !== undefined) {
    return `import ${typeOnly}* as ${entry.alias} from '${entry.path}';`;
  }
  if (entry.kind === 'side-effect') {
    return `import '${entry.path}';`;
  }
  const defaults = entry.bindings.filter(b => b.imported === 'default').map(b => b.local);
  const named = entry.bindings
    .filter(b => b.imported !== 'default' && b.imported !== '*')
    .map(b => (b.imported === b.local ? b.local : `${b.imported} as ${b.local}`));
  const clause = [...defaults, ...(named.length > 0 ? [`{ ${named.join(', ')} }`] : [])].join(', ');
  return `import ${typeOnly}${clause} from '${entry.path}';`;
}

function toImportEntry(declaration: ImportDeclaration): ImportEntry {
  const bindings: ImportBinding[] = [];
  let kind: ImportKind = 'side-effect';
  let alias: string | undefined;

  const defaultImport = declaration.getDefaultImport();
  if (defaultImport) {
    kind = 'default';
    bindings.push({ local: defaultImport.getText(), imported: 'default' });
  }

  const namespaceImport = declaration.getNamespaceImport();
  if (namespaceImport) {
    kind = 'namespace';
    alias = namespaceImport.getText();
    bindings.push({ local: alias, imported: '*' });
  }

  const namedImports = declaration.getNamedImports();
  if (namedImports.length > 0 && kind === 'side-effect') {
    kind = 'named';
  }
  for (const specifier of namedImports) {
    const imported = specifier.getName();
    bindings.push({ local: specifier.getAliasNode()?.getText() ?? imported, imported });
  }

  return {
    path: declaration.getModuleSpecifierValue(),
    kind,
    alias,
    bindings,
    isTypeOnly: declaration.isTypeOnly(),
    text: declaration.getText(),
  };
}
