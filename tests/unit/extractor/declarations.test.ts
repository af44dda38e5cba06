import { describe, it, expect } from 'vitest';
import { extractDecls, extractFieldNames } from '../../../src/extractor/declarations.js';
import { unitOf } from '../../helpers/source.js';

const PREFIX = '+ak:';

describe('extractDecls', () => {
  it('should attach docs and annotations to an interface and its fields', async () => {
    const unit = await unitOf(`import * as time from 'time';

// User docs line.
// +ak:model:users:table=user
export interface User {
  // +ak:model:pk
  id: string;
  name: string; // +ak:model:size=64
  createdAt: time.Time;
}
`);

    const decls = extractDecls(unit, PREFIX);

    expect(decls).toHaveLength(1);
    const [user] = decls;
    expect(user?.kind).toBe('interface');
    expect(user?.name()).toBe('User');
    expect(user?.docs).toEqual(['User docs line.']);
    expect(user?.annotations).toEqual(['model:users:table=user']);
    expect(user?.fields.map(field => field.name())).toEqual(['id', 'name']);
    expect(user?.fields.map(field => field.annotations)).toEqual([['model:pk'], ['model:size=64']]);
  });

  it('should give group annotations but not group docs to every declarator of a grouped statement', async () => {
    const unit = await unitOf(`// Shared docs.
// +ak:const:group
export const
  // first doc
  alpha = 1,
  // +ak:const:own
  beta = 2;
`);

    const decls = extractDecls(unit, PREFIX);

    expect(decls.map(decl => decl.name())).toEqual(['alpha', 'beta']);
    expect(decls[0]?.annotations).toEqual(['const:group']);
    expect(decls[0]?.docs).toEqual(['first doc']);
    expect(decls[1]?.annotations).toEqual(['const:group', 'const:own']);
    expect(decls[1]?.docs).toEqual([]);
  });

  it('should keep the docs of a single declaration verbatim', async () => {
    const unit = await unitOf(`// Greeting   shown to users.
// +ak:const
export const greeting = 'hi';
`);

    const [decl] = extractDecls(unit, PREFIX);

    expect(decl?.kind).toBe('value');
    expect(decl?.docs).toEqual(['Greeting   shown to users.']);
    expect(decl?.annotations).toEqual(['const']);
  });

  it('should read annotations from JSDoc blocks of functions', async () => {
    const unit = await unitOf(`/**
 * Builds a user.
 * +ak:factory:User
 */
export function makeUser(): void {}
`);

    const [decl] = extractDecls(unit, PREFIX);

    expect(decl?.kind).toBe('function');
    expect(decl?.name()).toBe('makeUser');
    expect(decl?.docs).toEqual(['Builds a user.']);
    expect(decl?.annotations).toEqual(['factory:User']);
  });

  it('should ignore comments separated from the declaration by a blank line', async () => {
    const unit = await unitOf(`// +ak:detached

export const value = 1;
`);

    expect(extractDecls(unit, PREFIX)).toEqual([]);
  });

  it('should classify type alias kinds', async () => {
    const unit = await unitOf(`import * as time from 'time';

// +ak:k
export type Ids = string[];

// +ak:k
export type Lookup = Record<string, number>;

// +ak:k
export type Handler = (input: string) => void;

// +ak:k
export type Stamp = time.Time;

// +ak:k
export type Shape = { width: number };

// +ak:k
export type Index = { [key: string]: number };

// +ak:k
export type Frozen = readonly string[];

// +ak:k
export type Choice = 'a' | 'b';

// +ak:k
export class Service {}
`);

    const decls = extractDecls(unit, PREFIX);

    expect(decls.map(decl => [decl.name(), decl.kind])).toEqual([
      ['Ids', 'array'],
      ['Lookup', 'map'],
      ['Handler', 'func'],
      ['Stamp', 'refer'],
      ['Shape', 'struct'],
      ['Index', 'map'],
      ['Frozen', 'array'],
      ['Service', 'struct'],
    ]);
  });

  it('should skip declarations without annotations', async () => {
    const unit = await unitOf(`// plain docs
export interface Plain {
  // +ak:model:pk
  id: string;
}
`);

    expect(extractDecls(unit, PREFIX)).toEqual([]);
  });

  it('should use the prefix to tell annotations from docs', async () => {
    const unit = await unitOf(`// +ak:first
// +other:second
export const value = 1;
`);

    const [decl] = extractDecls(unit, '+other:');

    expect(decl?.annotations).toEqual(['second']);
    expect(decl?.docs).toEqual(['+ak:first']);
  });
});

describe('extractFieldNames', () => {
  it('should list extended interfaces first and keep duplicates', async () => {
    const unit = await unitOf(`// +ak:k
export interface Pair extends Item, other.Named {
  Item: string;
  save(): void;
}
`);

    const [decl] = extractDecls(unit, PREFIX);

    expect(decl && extractFieldNames(decl)).toEqual(['Item', 'Named', 'Item', 'save']);
  });

  it('should list public class members after the base class', async () => {
    const unit = await unitOf(`// +ak:k
export class Admin extends Account {
  role = 'admin';
  private secret = '';
  protected level = 1;
  #hidden = 0;
  static count = 0;

  constructor() {
    super();
  }

  get title(): string {
    return this.role;
  }
}
`);

    const [decl] = extractDecls(unit, PREFIX);

    expect(decl && extractFieldNames(decl)).toEqual(['Account', 'role', 'count', 'title']);
  });

  it('should list members of an object type alias', async () => {
    const unit = await unitOf(`// +ak:k
export type Point = { x: number; y: number };
`);

    const [decl] = extractDecls(unit, PREFIX);

    expect(decl && extractFieldNames(decl)).toEqual(['x', 'y']);
  });
});

describe('AnnotatedDecl.relFilename', () => {
  it('should place output files relative to the declaring file or module root', async () => {
    const unit = await unitOf(`// +ak:gen
export interface User {
  id: string;
}
`);

    const [decl] = extractDecls(unit, PREFIX);

    expect(decl?.relFilename('{{ name }}_gen.ts', 'x')).toBe('/virtual/src/models/User_gen.ts');
    expect(decl?.relFilename('generated', 'schema')).toBe('/virtual/src/models/generated/schema.ts');
    expect(decl?.relFilename('/out/{{package}}', 'model.ts', '/virtual')).toBe('/virtual/out/user/model.ts');
    expect(decl?.relFilename('{{ filename }}', 'index')).toBe('/virtual/src/models/user.ts');
  });
});
