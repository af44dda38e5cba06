/**
 * inspect - prints bound entities as JSON lines
 */

import { Node } from 'ts-morph';
import { bindFields, type DeclEntity } from '../../annotations/entity.js';
import type { AnnotatedDecl } from '../../extractor/annotated.js';
import type { ModuleResolver } from '../../resolver/module-resolver.js';
import type { ResolvedType } from '../../resolver/type-lookup.js';
import { Plugin, type PluginArgs, type PluginContext } from '../base.js';

export interface InspectRecord {
  plugin: string;
  kind: string;
  name: string;
  file: string;
  line: number;
  args: string[];
  options: Record<string, string>;
  docs: string[];
  fields: Array<{ name: string; args: string[]; options: Record<string, string> }>;
  /** Declaration a `refer` alias resolves to, as `file#name` */
  target?: string;
}

export class InspectPlugin extends Plugin {
  get name(): string {
    return 'inspect';
  }

  get description(): string {
    return 'Print annotated declarations and their parsed arguments as JSON lines';
  }

  args(): PluginArgs {
    return {
      args: [],
      options: {
        resolve: 'follow `refer` aliases to the declaration they name',
      },
    };
  }

  async run(entities: DeclEntity[], context: PluginContext): Promise<void> {
    for (const entity of entities) {
      const record = await this.inspect(entity, context.resolver);
      context.print(JSON.stringify(record));
    }
  }

  async inspect(entity: DeclEntity, resolver: ModuleResolver): Promise<InspectRecord> {
    const { decl } = entity;
    const record: InspectRecord = {
      plugin: entity.plugin,
      kind: decl.kind,
      name: decl.name(),
      file: decl.unit.path,
      line: decl.target.node.getStartLineNumber(),
      args: entity.args,
      options: entity.options.toJSON(),
      docs: decl.docs,
      fields: bindFields(entity, 0).map(field => ({
        name: field.field.name(),
        args: field.args,
        options: field.options.toJSON(),
      })),
    };

    if (entity.options.exist('resolve')) {
      const target = await resolveReference(decl, resolver);
      if (target) {
        record.target = target;
      }
    }
    return record;
  }
}

async function resolveReference(decl: AnnotatedDecl, resolver: ModuleResolver): Promise<string | null> {
  const target = decl.target;
  if (target.kind !== 'refer') {
    return null;
  }

  const typeNode = target.node.getTypeNode();
  if (!typeNode || !Node.isTypeReference(typeNode)) {
    return null;
  }

  const typeName = typeNode.getTypeName();
  let resolved: ResolvedType | null;
  if (Node.isIdentifier(typeName)) {
    resolved = await resolver.lookupType(typeName.getText(), decl.unit.dir, decl.unit.path);
  } else {
    const importPath = decl.unit.imports().which(typeName.getLeft().getText());
    if (!importPath) {
      return null;
    }
    resolved = await resolver.lookupType(typeName.getRight().getText(), decl.unit.dir, importPath);
  }

  return resolved ? `${resolved.unit.path}#${resolved.name}` : null;
}
