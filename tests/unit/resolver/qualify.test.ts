import { describe, it, expect } from 'vitest';
import { fixQualifiedName } from '../../../src/resolver/qualify.js';
import { ImportList } from '../../../src/source/imports.js';

function importsOf(...paths: string[]): ImportList {
  const imports = new ImportList();
  for (const importPath of paths) {
    imports.add(importPath);
  }
  return imports;
}

const exported = new Set(['User', 'Order']);

describe('fixQualifiedName', () => {
  it('should qualify an exported name of another module and reuse its alias', () => {
    const src = { importPath: 'app/models', imports: new ImportList(), isExported: (name: string) => exported.has(name) };
    const dst = { importPath: 'app/handlers', imports: new ImportList() };

    expect(fixQualifiedName('User', src, dst)).toBe('models.User');
    expect(fixQualifiedName('Order', src, dst)).toBe('models.Order');
    expect(dst.imports.length).toBe(1);
    expect(dst.imports.toString()).toBe(`import * as models from 'app/models';`);
  });

  it('should keep array markers', () => {
    const src = { importPath: 'app/models', imports: new ImportList(), isExported: (name: string) => exported.has(name) };
    const dst = { importPath: 'app/handlers', imports: new ImportList() };

    expect(fixQualifiedName('User[][]', src, dst)).toBe('models.User[][]');
  });

  it('should leave unexported names alone', () => {
    const src = { importPath: 'app/models', imports: new ImportList(), isExported: (name: string) => exported.has(name) };
    const dst = { importPath: 'app/handlers', imports: new ImportList() };

    expect(fixQualifiedName('string', src, dst)).toBe('string');
    expect(fixQualifiedName('Internal[]', src, dst)).toBe('Internal[]');
    expect(dst.imports.length).toBe(0);
  });

  it('should leave names alone within the same module', () => {
    const src = { importPath: 'app/models', imports: new ImportList(), isExported: () => true };
    const dst = { importPath: 'app/models', imports: new ImportList() };

    expect(fixQualifiedName('User', src, dst)).toBe('User');
  });

  it('should drop the qualifier of a name from the destination module', () => {
    const src = { importPath: 'app/models', imports: importsOf('app/handlers') };
    const dst = { importPath: 'app/handlers', imports: new ImportList() };

    expect(fixQualifiedName('handlers.Route[]', src, dst)).toBe('Route[]');
  });

  it('should re-qualify against the destination imports', () => {
    const src = { importPath: 'app/models', imports: importsOf('host.com/time') };
    const dst = { importPath: 'app/handlers', imports: importsOf('time') };

    expect(fixQualifiedName('time.Time', src, dst)).toBe('time2.Time');
    expect(dst.imports.which('time2')).toBe('host.com/time');
  });

  it('should keep names with an unknown qualifier', () => {
    const src = { importPath: 'app/models', imports: new ImportList() };
    const dst = { importPath: 'app/handlers', imports: new ImportList() };

    expect(fixQualifiedName('missing.Type', src, dst)).toBe('missing.Type');
  });
});
