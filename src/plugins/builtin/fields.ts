/**
 * fields - keeps a constant listing the public member names of a class or interface
 *
 *   // +ak:fields
 *   export interface User { id: string; name: string }
 *
 *   export const UserFields = ['id', 'name'] as const;
 */

import type { DeclEntity } from '../../annotations/entity.js';
import type { AnnotatedDecl } from '../../extractor/annotated.js';
import { extractFieldNames } from '../../extractor/declarations.js';
import type { FileEdit } from '../../patch/modify-set.js';
import { Plugin, type PluginArgs, type PluginContext } from '../base.js';

export class FieldsPlugin extends Plugin {
  get name(): string {
    return 'fields';
  }

  get description(): string {
    return 'Write a constant with the member names of annotated classes and interfaces';
  }

  args(): PluginArgs {
    return {
      args: [],
      options: {
        suffix: 'suffix of the constant name (default Fields)',
        name: 'constant name, overrides suffix',
      },
    };
  }

  async run(entities: DeclEntity[], context: PluginContext): Promise<void> {
    // constant names per declaration; several annotations may name several constants
    const constants = new Map<AnnotatedDecl, Set<string>>();
    for (const { decl, options } of entities) {
      const name = decl.name();
      if ((decl.kind !== 'struct' && decl.kind !== 'interface') || !name) {
        continue;
      }
      const names = constants.get(decl) ?? new Set<string>();
      names.add(options.get('name', name + options.get('suffix', 'Fields')));
      constants.set(decl, names);
    }

    for (const [decl, names] of constants) {
      writeConstants(context.modifySet.add(decl.unit.path), decl, Array.from(names));
    }
  }
}

function writeConstants(edit: FileEdit, decl: AnnotatedDecl, constNames: string[]): void {
  const list = renderNames(extractFieldNames(decl));
  const appended: string[] = [];

  for (const constName of constNames) {
    const existing = decl.unit.lookup(constName);
    if (existing?.kind !== 'variable') {
      appended.push(`export const ${constName} = ${list};`);
      continue;
    }
    const initializer = existing.node.getInitializer();
    if (initializer) {
      edit.replace(initializer, list);
    } else {
      edit.replace(existing.node, `${constName} = ${list}`);
    }
  }

  if (appended.length > 0) {
    const node = decl.target.node;
    edit.replace(node, [node.getText(), ...appended].join('\n\n'));
  }
}

export function renderNames(names: string[]): string {
  return `[${names.map(name => `'${name}'`).join(', ')}] as const`;
}
