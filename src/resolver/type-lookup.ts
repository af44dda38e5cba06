/**
 * Follows type names across modules to the declaration that defines them
 */

import { Node, type ExportDeclaration } from 'ts-morph';
import { ParseError } from '../errors.js';
import type { SourceLoader } from '../source/loader.js';
import type { SourceUnit, TopLevelBinding } from '../source/source-unit.js';

export type ConcreteBinding = Extract<TopLevelBinding, { kind: 'type' | 'interface' | 'class' | 'enum' }>;

export interface ResolvedType {
  /** Name of the declaration in the unit defining it */
  name: string;
  unit: SourceUnit;
  binding: ConcreteBinding;
}

export interface TypeLookupHost {
  loader: SourceLoader;
  resolveModule(importPath: string, fromDir: string): Promise<string>;
}

/**
 * Resolve `name` exported by the module `importPath` as seen from `dir`.
 *
 * Aliases of a bare name (`type A = B`) are followed within their file,
 * qualified references (`type A = ns.B`) through the namespace import,
 * named imports into the module they come from, and re-exports of the
 * module are searched when the name is not declared locally. The first
 * interface, class, enum or non-trivial alias reached is returned.
 *
 * Returns null when the module cannot be found or parsed, when the name is
 * a value, or when the chain loops.
 */
export async function lookupType(
  host: TypeLookupHost,
  name: string,
  dir: string,
  importPath: string,
  seen: Set<string> = new Set()
): Promise<ResolvedType | null> {
  const file = await host.resolveModule(importPath, dir);
  if (!file) {
    return null;
  }

  const unit = await loadUnit(host.loader, file);
  return unit ? lookupInUnit(host, unit, name, seen) : null;
}

/**
 * Resolve a name declared in, imported into or re-exported by `unit`
 */
export async function lookupInUnit(
  host: TypeLookupHost,
  unit: SourceUnit,
  name: string,
  seen: Set<string> = new Set()
): Promise<ResolvedType | null> {
  const key = `${unit.path}#${name}`;
  if (seen.has(key)) {
    return null;
  }
  seen.add(key);

  const binding = unit.lookup(name);
  if (!binding) {
    return lookupReExports(host, unit, name, seen);
  }

  switch (binding.kind) {
    case 'interface':
    case 'class':
    case 'enum':
      return { name, unit, binding };
    case 'type':
      return followAlias(host, unit, name, binding, seen);
    case 'import':
      if (binding.imported === '*') {
        return null;
      }
      return lookupType(host, binding.imported, unit.dir, binding.path, seen);
    case 'function':
    case 'variable':
      return null;
  }
}

async function followAlias(
  host: TypeLookupHost,
  unit: SourceUnit,
  name: string,
  binding: Extract<TopLevelBinding, { kind: 'type' }>,
  seen: Set<string>
): Promise<ResolvedType | null> {
  const concrete: ResolvedType = { name, unit, binding };
  const typeNode = binding.node.getTypeNode();
  if (!typeNode || !Node.isTypeReference(typeNode) || typeNode.getTypeArguments().length > 0) {
    return concrete;
  }

  const typeName = typeNode.getTypeName();
  if (Node.isIdentifier(typeName)) {
    const target = typeName.getText();
    // unbound names are globals (Date, Error...)
    return unit.lookup(target) ? lookupInUnit(host, unit, target, seen) : concrete;
  }

  const left = typeName.getLeft();
  if (!Node.isIdentifier(left)) {
    return concrete;
  }
  const importPath = unit.imports().which(left.getText());
  if (!importPath) {
    return concrete;
  }
  return lookupType(host, typeName.getRight().getText(), unit.dir, importPath, seen);
}

async function lookupReExports(
  host: TypeLookupHost,
  unit: SourceUnit,
  name: string,
  seen: Set<string>
): Promise<ResolvedType | null> {
  const starExports: string[] = [];

  for (const statement of unit.file.getStatements()) {
    if (!Node.isExportDeclaration(statement)) continue;

    const specifier = statement.getModuleSpecifierValue();
    if (specifier === undefined) {
      // export { local as name }
      const local = exportedAs(statement, name);
      if (local !== null && local !== name) {
        return lookupInUnit(host, unit, local, seen);
      }
      continue;
    }

    if (statement.getNamespaceExport()) continue;

    const named = statement.getNamedExports();
    if (named.length === 0) {
      starExports.push(specifier);
      continue;
    }

    const imported = exportedAs(statement, name);
    if (imported !== null) {
      return lookupType(host, imported, unit.dir, specifier, seen);
    }
  }

  for (const specifier of starExports) {
    const resolved = await lookupType(host, name, unit.dir, specifier, seen);
    if (resolved) {
      return resolved;
    }
  }
  return null;
}

/**
 * Name exported as `name` by an export clause, or null when the clause does not export it
 */
function exportedAs(statement: ExportDeclaration, name: string): string | null {
  for (const specifier of statement.getNamedExports()) {
    const exported = specifier.getAliasNode()?.getText() ?? specifier.getName();
    if (exported === name) {
      return specifier.getName();
    }
  }
  return null;
}

async function loadUnit(loader: SourceLoader, file: string): Promise<SourceUnit | null> {
  try {
    return await loader.load(file);
  } catch (error) {
    if (error instanceof ParseError || isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}
