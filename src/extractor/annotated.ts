/**
 * Annotated declaration model
 */

import path from 'node:path';
import {
  Node,
  type ClassDeclaration,
  type FunctionDeclaration,
  type GetAccessorDeclaration,
  type InterfaceDeclaration,
  type MethodDeclaration,
  type MethodSignature,
  type PropertyDeclaration,
  type PropertySignature,
  type SetAccessorDeclaration,
  type TypeAliasDeclaration,
  type VariableDeclaration,
  type VariableStatement,
} from 'ts-morph';
import type { SourceUnit } from '../source/source-unit.js';

export type DeclKind = 'interface' | 'struct' | 'map' | 'array' | 'func' | 'refer' | 'function' | 'value';

/**
 * Declaration node of an annotated declaration, discriminated by kind
 */
export type DeclTarget =
  | { kind: 'interface'; node: InterfaceDeclaration }
  | { kind: 'struct'; node: ClassDeclaration | TypeAliasDeclaration }
  | { kind: 'map' | 'array' | 'func' | 'refer'; node: TypeAliasDeclaration }
  | { kind: 'function'; node: FunctionDeclaration }
  | { kind: 'value'; node: VariableDeclaration; statement: VariableStatement };

export type FieldNode =
  | PropertyDeclaration
  | MethodDeclaration
  | GetAccessorDeclaration
  | SetAccessorDeclaration
  | PropertySignature
  | MethodSignature;

export class AnnotatedDecl {
  readonly fields: AnnotatedField[] = [];

  constructor(
    readonly unit: SourceUnit,
    readonly target: DeclTarget,
    readonly docs: string[],
    readonly annotations: string[]
  ) {}

  get kind(): DeclKind {
    return this.target.kind;
  }

  /**
   * Declared name, empty for anonymous functions and destructuring values
   */
  name(): string {
    const target = this.target;
    switch (target.kind) {
      case 'value': {
        const nameNode = target.node.getNameNode();
        return Node.isIdentifier(nameNode) ? nameNode.getText() : '';
      }
      case 'function':
      case 'struct':
        return target.node.getName() ?? '';
      case 'interface':
      case 'map':
      case 'array':
      case 'func':
      case 'refer':
        return target.node.getName();
    }
  }

  /**
   * Base file name of the declaring file
   */
  filename(): string {
    return this.unit.filename;
  }

  /**
   * Local package name of the declaring file
   */
  packageName(): string {
    return this.unit.packageName();
  }

  /**
   * Output file path for generated code of this declaration.
   *
   * `{{ name }}`, `{{ package }}` and `{{ filename }}` placeholders are
   * substituted. A name without `.ts` suffix is a directory and `defaultName`
   * is placed under it. A name starting with `/` is relative to the module
   * root `moduleDir`, any other name to the declaring file's directory.
   */
  relFilename(filename: string, defaultName: string, moduleDir?: string): string {
    let name = filename.replace(/\{\{\s*(name|package|filename)\s*\}\}/g, (_match, key: string) => {
      if (key === 'name') return this.name();
      if (key === 'package') return this.packageName();
      return this.filename();
    });

    if (!name.endsWith('.ts')) {
      name = path.join(name, defaultName.replace(/\.ts$/, '') + '.ts');
    }

    if (path.isAbsolute(name)) {
      return path.join(moduleDir ?? this.unit.dir, name);
    }
    return path.join(this.unit.dir, name);
  }
}

export class AnnotatedField {
  constructor(
    readonly decl: AnnotatedDecl,
    readonly node: FieldNode,
    readonly docs: string[],
    readonly annotations: string[]
  ) {}

  name(): string {
    return this.node.getName();
  }
}
