import { describe, it, expect } from 'vitest';
import { bindDecls, bindFields, groupBy, groupByDir } from '../../../src/annotations/entity.js';
import { extractDecls } from '../../../src/extractor/declarations.js';
import { unitOf } from '../../helpers/source.js';

const SOURCE = `// +ak:model:users:table=user
// +ak:model:admins
// +ak:view
export interface User {
  // +ak:model:pk
  id: string;
  name: string; // +ak:model:size=64
  // +ak:view:hidden
  secret: string;
}

// +ak:model:orders
export class Order {}

// +ak:model
export const broken = 1;
`;

describe('Entity binder', () => {
  it('should bind one entity per matching annotation', async () => {
    const decls = extractDecls(await unitOf(SOURCE), '+ak:');

    const entities = bindDecls(decls, { name: 'model', argsCount: 1 });

    expect(entities.map(entity => [entity.decl.name(), entity.args, entity.options.toJSON()])).toEqual([
      ['User', ['users'], { table: 'user' }],
      ['User', ['admins'], {}],
      ['Order', ['orders'], {}],
    ]);
    expect(entities.every(entity => entity.plugin === 'model')).toBe(true);
  });

  it('should fill options from extension options', async () => {
    const decls = extractDecls(await unitOf(SOURCE), '+ak:');

    const entities = bindDecls(decls, { name: 'model', argsCount: 1 }, { table: 'default', schema: 'public' });

    expect(entities.map(entity => entity.options.toJSON())).toEqual([
      { table: 'user', schema: 'public' },
      { table: 'default', schema: 'public' },
      { table: 'default', schema: 'public' },
    ]);
  });

  it('should bind field annotations of the same plugin', async () => {
    const decls = extractDecls(await unitOf(SOURCE), '+ak:');
    const [entity] = bindDecls(decls, { name: 'model', argsCount: 1 });

    const fields = entity ? bindFields(entity, 0) : [];

    expect(fields.map(field => [field.field.name(), field.plugin, field.options.toJSON()])).toEqual([
      ['id', 'model', { pk: '' }],
      ['name', 'model', { size: '64' }],
    ]);
  });

  it('should group entities by directory of the declaring file', async () => {
    const first = extractDecls(await unitOf(SOURCE, '/virtual/a/one.ts'), '+ak:');
    const second = extractDecls(await unitOf(SOURCE, '/virtual/b/two.ts'), '+ak:');
    const entities = bindDecls([...first, ...second], { name: 'view', argsCount: 0 });

    const groups = groupByDir(entities);

    expect(Array.from(groups.keys())).toEqual(['/virtual/a', '/virtual/b']);
    expect(groups.get('/virtual/a')).toHaveLength(1);
  });

  it('should drop entities grouped under an empty key', async () => {
    const decls = extractDecls(await unitOf(SOURCE), '+ak:');
    const entities = bindDecls(decls, { name: 'model', argsCount: 1 });

    const groups = groupBy(entities, entity => (entity.decl.kind === 'interface' ? '' : entity.decl.kind));

    expect(Array.from(groups.keys())).toEqual(['struct']);
  });
});
