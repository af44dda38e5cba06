/**
 * Entity binder - matches annotations of declarations against one plugin
 */

import path from 'node:path';
import type { AnnotatedDecl, AnnotatedField } from '../extractor/annotated.js';
import { parseAnnotation } from './grammar.js';
import type { Options } from './options.js';

/**
 * Annotated declaration bound to a plugin with parsed args and options
 */
export interface DeclEntity {
  decl: AnnotatedDecl;
  plugin: string;
  args: string[];
  options: Options;
}

/**
 * Annotated field bound to a plugin with parsed args and options
 */
export interface FieldEntity {
  field: AnnotatedField;
  plugin: string;
  args: string[];
  options: Options;
}

/**
 * What the binder needs to know about a plugin
 */
export interface BindTarget {
  name: string;
  argsCount: number;
}

/**
 * Bind every declaration's annotations for `plugin`. A declaration produces
 * one entity per matching annotation line; non-matching lines are skipped.
 */
export function bindDecls(
  decls: readonly AnnotatedDecl[],
  plugin: BindTarget,
  extOptions: Record<string, string> = {}
): DeclEntity[] {
  const entities: DeclEntity[] = [];
  for (const decl of decls) {
    entities.push(...bindDecl(decl, plugin.name, plugin.argsCount, extOptions));
  }
  return entities;
}

export function bindDecl(
  decl: AnnotatedDecl,
  name: string,
  argsCount: number,
  extOptions: Record<string, string> = {}
): DeclEntity[] {
  const entities: DeclEntity[] = [];
  for (const annotation of decl.annotations) {
    const parsed = parseAnnotation(annotation, name, argsCount, extOptions);
    if (!parsed) continue;
    entities.push({ decl, plugin: name, args: parsed.args, options: parsed.options });
  }
  return entities;
}

export function bindField(
  field: AnnotatedField,
  name: string,
  argsCount: number,
  extOptions: Record<string, string> = {}
): FieldEntity[] {
  const entities: FieldEntity[] = [];
  for (const annotation of field.annotations) {
    const parsed = parseAnnotation(annotation, name, argsCount, extOptions);
    if (!parsed) continue;
    entities.push({ field, plugin: name, args: parsed.args, options: parsed.options });
  }
  return entities;
}

/**
 * Bind the field annotations of an entity's declaration for the same plugin
 */
export function bindFields(
  entity: DeclEntity,
  argsCount: number,
  extOptions: Record<string, string> = {}
): FieldEntity[] {
  const fields: FieldEntity[] = [];
  for (const field of entity.decl.fields) {
    fields.push(...bindField(field, entity.plugin, argsCount, extOptions));
  }
  return fields;
}

/**
 * Group entities by a key; entities with an empty key are dropped
 */
export function groupBy<T extends DeclEntity | FieldEntity>(
  entities: readonly T[],
  fn: (entity: T) => string
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const entity of entities) {
    const key = fn(entity);
    if (key.length === 0) continue;

    const group = groups.get(key);
    if (group) {
      group.push(entity);
    } else {
      groups.set(key, [entity]);
    }
  }
  return groups;
}

/**
 * Group declaration entities by the directory of their declaring file
 */
export function groupByDir(entities: readonly DeclEntity[]): Map<string, DeclEntity[]> {
  return groupBy(entities, entity => path.dirname(entity.decl.unit.path));
}
