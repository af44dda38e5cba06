/**
 * Walks the top-level statements of a source unit and collects the
 * declarations carrying annotation lines
 */

import {
  Node,
  SyntaxKind,
  type ClassDeclaration,
  type FunctionDeclaration,
  type InterfaceDeclaration,
  type Statement,
  type TypeAliasDeclaration,
  type TypeNode,
  type VariableStatement,
} from 'ts-morph';
import { leadingComment, nodeComments, splitComments, trailingComment } from '../source/comments.js';
import type { SourceUnit } from '../source/source-unit.js';
import { AnnotatedDecl, AnnotatedField, type DeclKind, type FieldNode } from './annotated.js';

type TypeKind = Exclude<DeclKind, 'function' | 'value' | 'interface'>;

const KEYWORD_TYPES = new Set<SyntaxKind>([
  SyntaxKind.AnyKeyword,
  SyntaxKind.UnknownKeyword,
  SyntaxKind.NumberKeyword,
  SyntaxKind.BigIntKeyword,
  SyntaxKind.ObjectKeyword,
  SyntaxKind.BooleanKeyword,
  SyntaxKind.StringKeyword,
  SyntaxKind.SymbolKeyword,
  SyntaxKind.VoidKeyword,
  SyntaxKind.UndefinedKeyword,
  SyntaxKind.NeverKeyword,
]);

const MAP_REFERENCES = new Set(['Record', 'Map', 'ReadonlyMap', 'WeakMap']);
const ARRAY_REFERENCES = new Set(['Array', 'ReadonlyArray']);

/**
 * Collect annotated declarations of a unit in source order
 */
export function extractDecls(unit: SourceUnit, prefix: string): AnnotatedDecl[] {
  const decls: AnnotatedDecl[] = [];
  for (const statement of unit.file.getStatements()) {
    decls.push(...extractStatement(unit, statement, prefix));
  }
  return decls;
}

/**
 * Annotated declarations of one top-level statement
 */
export function extractStatement(unit: SourceUnit, statement: Statement, prefix: string): AnnotatedDecl[] {
  if (Node.isVariableStatement(statement)) {
    return extractValues(unit, statement, prefix);
  }
  if (Node.isFunctionDeclaration(statement)) {
    const decl = extractFunction(unit, statement, prefix);
    return decl ? [decl] : [];
  }
  if (
    Node.isInterfaceDeclaration(statement) ||
    Node.isClassDeclaration(statement) ||
    Node.isTypeAliasDeclaration(statement)
  ) {
    const decl = extractType(unit, statement, prefix);
    return decl ? [decl] : [];
  }
  return [];
}

/**
 * Variable statement declaring one or more values.
 *
 *   // +ak:annotation:args:key=value
 *   export const
 *     valueA = 1,
 *     // +ak:other
 *     valueB = 2;
 *
 * Statement annotations are given to every declarator. Statement docs are
 * kept only when the statement declares a single value.
 */
function extractValues(unit: SourceUnit, statement: VariableStatement, prefix: string): AnnotatedDecl[] {
  const group = splitComments(prefix, leadingComment(statement));
  const declarations = statement.getDeclarations();
  const single = declarations.length === 1;

  const decls: AnnotatedDecl[] = [];
  for (const declaration of declarations) {
    const own = splitComments(prefix, leadingComment(declaration), trailingComment(declaration));
    const annotations = [...group.annotations, ...own.annotations];
    if (annotations.length === 0) continue;

    const docs = single ? [...group.docs, ...own.docs] : own.docs;
    decls.push(new AnnotatedDecl(unit, { kind: 'value', node: declaration, statement }, docs, annotations));
  }
  return decls;
}

/**
 * Function declaration with annotations in its doc comment
 *
 *   // +ak:annotation:args:key=value
 *   export function foo() {}
 */
function extractFunction(unit: SourceUnit, declaration: FunctionDeclaration, prefix: string): AnnotatedDecl | null {
  const { docs, annotations } = splitComments(prefix, leadingComment(declaration));
  if (annotations.length === 0) {
    return null;
  }
  return new AnnotatedDecl(unit, { kind: 'function', node: declaration }, docs, annotations);
}

function extractType(
  unit: SourceUnit,
  declaration: InterfaceDeclaration | ClassDeclaration | TypeAliasDeclaration,
  prefix: string
): AnnotatedDecl | null {
  const { docs, annotations } = nodeComments(prefix, declaration);
  if (annotations.length === 0) {
    return null;
  }

  if (Node.isInterfaceDeclaration(declaration)) {
    const decl = new AnnotatedDecl(unit, { kind: 'interface', node: declaration }, docs, annotations);
    collectFields(decl, declaration.getMembers(), prefix);
    return decl;
  }

  if (Node.isClassDeclaration(declaration)) {
    const decl = new AnnotatedDecl(unit, { kind: 'struct', node: declaration }, docs, annotations);
    collectFields(decl, declaration.getMembers(), prefix);
    return decl;
  }

  const typeNode = declaration.getTypeNode();
  const kind = typeNode ? classifyType(typeNode) : null;
  if (!typeNode || !kind) {
    return null;
  }

  if (kind === 'struct') {
    const decl = new AnnotatedDecl(unit, { kind, node: declaration }, docs, annotations);
    const literal = unwrapParentheses(typeNode);
    if (Node.isTypeLiteral(literal)) {
      collectFields(decl, literal.getMembers(), prefix);
    }
    return decl;
  }

  return new AnnotatedDecl(unit, { kind, node: declaration }, docs, annotations);
}

/**
 * Kind of a type alias right-hand side, null when it is not one of the
 * annotated kinds (unions, literals, conditional types...)
 */
export function classifyType(typeNode: TypeNode): TypeKind | null {
  const node = unwrapParentheses(typeNode);

  if (Node.isTypeLiteral(node)) {
    const members = node.getMembers();
    const onlyIndex = members.length > 0 && members.every(member => Node.isIndexSignatureDeclaration(member));
    return onlyIndex ? 'map' : 'struct';
  }
  if (Node.isMappedTypeNode(node)) {
    return 'map';
  }
  if (Node.isArrayTypeNode(node) || Node.isTupleTypeNode(node)) {
    return 'array';
  }
  if (Node.isTypeOperatorTypeNode(node)) {
    const operand = unwrapParentheses(node.getTypeNode());
    const readonly = node.compilerNode.operator === SyntaxKind.ReadonlyKeyword;
    return readonly && (Node.isArrayTypeNode(operand) || Node.isTupleTypeNode(operand)) ? 'array' : null;
  }
  if (Node.isFunctionTypeNode(node) || Node.isConstructorTypeNode(node)) {
    return 'func';
  }
  if (Node.isTypeReference(node)) {
    const name = node.getTypeName().getText();
    if (MAP_REFERENCES.has(name)) return 'map';
    if (ARRAY_REFERENCES.has(name)) return 'array';
    return 'refer';
  }
  if (Node.isImportTypeNode(node) || Node.isTypeQuery(node) || KEYWORD_TYPES.has(node.getKind())) {
    return 'refer';
  }
  return null;
}

function unwrapParentheses(typeNode: TypeNode): TypeNode {
  let node = typeNode;
  while (Node.isParenthesizedTypeNode(node)) {
    node = node.getTypeNode();
  }
  return node;
}

/**
 * Collect named members carrying their own annotations
 */
function collectFields(decl: AnnotatedDecl, members: Node[], prefix: string): void {
  for (const member of members) {
    if (!isFieldNode(member)) continue;

    const { docs, annotations } = nodeComments(prefix, member);
    if (annotations.length > 0) {
      decl.fields.push(new AnnotatedField(decl, member, docs, annotations));
    }
  }
}

function isFieldNode(node: Node): node is FieldNode {
  return (
    Node.isPropertyDeclaration(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isGetAccessorDeclaration(node) ||
    Node.isSetAccessorDeclaration(node) ||
    Node.isPropertySignature(node) ||
    Node.isMethodSignature(node)
  );
}

/**
 * Public member names of a struct or interface declaration. Names of
 * extended types come first as embedded members. Duplicates are kept.
 */
export function extractFieldNames(decl: AnnotatedDecl): string[] {
  const target = decl.target;
  const names: string[] = [];

  if (target.kind === 'interface') {
    for (const heritage of target.node.getExtends()) {
      names.push(lastSegment(heritage.getExpression().getText()));
    }
    for (const member of target.node.getMembers()) {
      if (Node.isPropertySignature(member) || Node.isMethodSignature(member)) {
        names.push(member.getName());
      }
    }
    return names;
  }

  if (target.kind !== 'struct') {
    return names;
  }

  const node = target.node;
  if (Node.isClassDeclaration(node)) {
    const base = node.getExtends();
    if (base) {
      names.push(lastSegment(base.getExpression().getText()));
    }
    for (const member of node.getMembers()) {
      if (!isFieldNode(member)) continue;
      if (
        Node.isModifierable(member) &&
        (member.hasModifier(SyntaxKind.PrivateKeyword) || member.hasModifier(SyntaxKind.ProtectedKeyword))
      ) {
        continue;
      }

      const name = member.getName();
      if (!name.startsWith('#')) {
        names.push(name);
      }
    }
    return names;
  }

  const typeNode = node.getTypeNode();
  const literal = typeNode ? unwrapParentheses(typeNode) : undefined;
  if (literal && Node.isTypeLiteral(literal)) {
    for (const member of literal.getMembers()) {
      if (Node.isPropertySignature(member) || Node.isMethodSignature(member)) {
        names.push(member.getName());
      }
    }
  }
  return names;
}

function lastSegment(expression: string): string {
  const parts = expression.split('.');
  return parts[parts.length - 1] ?? expression;
}
