/**
 * SourceUnit - one parsed source file with its imports and top-level names
 */

import path from 'node:path';
import {
  Node,
  type ClassDeclaration,
  type EnumDeclaration,
  type FunctionDeclaration,
  type InterfaceDeclaration,
  type SourceFile,
  type TypeAliasDeclaration,
  type VariableDeclaration,
} from 'ts-morph';
import { ImportList } from './imports.js';
import { importNameOf } from './naming.js';

/**
 * Declaration bound to a top-level name of a source unit
 */
export type TopLevelBinding =
  | { kind: 'type'; node: TypeAliasDeclaration }
  | { kind: 'interface'; node: InterfaceDeclaration }
  | { kind: 'class'; node: ClassDeclaration }
  | { kind: 'enum'; node: EnumDeclaration }
  | { kind: 'function'; node: FunctionDeclaration }
  | { kind: 'variable'; node: VariableDeclaration }
  | { kind: 'import'; path: string; imported: string };

export class SourceUnit {
  private bindings: Map<string, TopLevelBinding> | null = null;
  private exported: Set<string> | null = null;

  constructor(
    readonly path: string,
    readonly content: string,
    readonly fingerprint: string,
    readonly file: SourceFile
  ) {}

  get filename(): string {
    return path.basename(this.path);
  }

  get dir(): string {
    return path.dirname(this.path);
  }

  /**
   * Local package name of the unit, derived from its file name
   */
  packageName(): string {
    return importNameOf(this.path);
  }

  /**
   * Fresh snapshot of the file's import declarations
   */
  imports(): ImportList {
    return ImportList.fromDeclarations(this.file.getImportDeclarations());
  }

  /**
   * Find the top-level declaration binding `name`
   */
  lookup(name: string): TopLevelBinding | undefined {
    return this.getBindings().get(name);
  }

  /**
   * Check if a top-level name is exported from this unit
   */
  isExported(name: string): boolean {
    if (!this.exported) {
      this.exported = this.collectExports();
    }
    return this.exported.has(name);
  }

  private getBindings(): Map<string, TopLevelBinding> {
    if (this.bindings) {
      return this.bindings;
    }

    const bindings = new Map<string, TopLevelBinding>();
    const bind = (name: string | undefined, binding: TopLevelBinding): void => {
      if (name && !bindings.has(name)) {
        bindings.set(name, binding);
      }
    };

    for (const statement of this.file.getStatements()) {
      if (Node.isInterfaceDeclaration(statement) && statement.isDefaultExport()) {
        bind('default', { kind: 'interface', node: statement });
      } else if (Node.isClassDeclaration(statement) && statement.isDefaultExport()) {
        bind('default', { kind: 'class', node: statement });
      } else if (Node.isFunctionDeclaration(statement) && statement.isDefaultExport()) {
        bind('default', { kind: 'function', node: statement });
      }

      if (Node.isTypeAliasDeclaration(statement)) {
        bind(statement.getName(), { kind: 'type', node: statement });
      } else if (Node.isInterfaceDeclaration(statement)) {
        bind(statement.getName(), { kind: 'interface', node: statement });
      } else if (Node.isClassDeclaration(statement)) {
        bind(statement.getName(), { kind: 'class', node: statement });
      } else if (Node.isEnumDeclaration(statement)) {
        bind(statement.getName(), { kind: 'enum', node: statement });
      } else if (Node.isFunctionDeclaration(statement)) {
        bind(statement.getName(), { kind: 'function', node: statement });
      } else if (Node.isVariableStatement(statement)) {
        for (const declaration of statement.getDeclarations()) {
          bind(declaration.getName(), { kind: 'variable', node: declaration });
        }
      } else if (Node.isImportDeclaration(statement)) {
        const source = statement.getModuleSpecifierValue();
        const defaultImport = statement.getDefaultImport();
        if (defaultImport) {
          bind(defaultImport.getText(), { kind: 'import', path: source, imported: 'default' });
        }
        const namespaceImport = statement.getNamespaceImport();
        if (namespaceImport) {
          bind(namespaceImport.getText(), { kind: 'import', path: source, imported: '*' });
        }
        for (const specifier of statement.getNamedImports()) {
          const imported = specifier.getName();
          bind(specifier.getAliasNode()?.getText() ?? imported, { kind: 'import', path: source, imported });
        }
      }
    }

    this.bindings = bindings;
    return bindings;
  }

  private collectExports(): Set<string> {
    const exported = new Set<string>();

    for (const statement of this.file.getStatements()) {
      if (Node.isVariableStatement(statement)) {
        if (statement.isExported()) {
          for (const declaration of statement.getDeclarations()) {
            exported.add(declaration.getName());
          }
        }
      } else if (
        Node.isTypeAliasDeclaration(statement) ||
        Node.isInterfaceDeclaration(statement) ||
        Node.isClassDeclaration(statement) ||
        Node.isEnumDeclaration(statement) ||
        Node.isFunctionDeclaration(statement)
      ) {
        const name = statement.getName();
        if (name && statement.isExported()) {
          exported.add(name);
        }
      } else if (Node.isExportDeclaration(statement) && !statement.hasModuleSpecifier()) {
        // export { local, local as renamed }
        for (const specifier of statement.getNamedExports()) {
          exported.add(specifier.getName());
        }
      }
    }

    return exported;
  }
}
