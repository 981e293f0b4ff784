import { describe, expect, it } from 'vitest';
import { Resolver, Scope } from '../src/builder/scope.js';

const at = { line: 1, column: 0, offset: 0 };

describe('Scope', () => {
  it('qualifies names with the group path', () => {
    const root = new Scope(null, null);
    const outer = new Scope('outer', root);
    const inner = new Scope('inner', outer);
    expect(root.qualify('A')).toBe('A');
    expect(inner.qualify('A')).toBe('outer/inner/A');
    expect(inner.depth).toBe(2);
  });

  it('returns the replaced definition', () => {
    const scope = new Scope(null, null);
    expect(scope.define('A', { kind: 'absolute', x: 0, y: 0 }, at)).toBeNull();
    expect(scope.define('A', { kind: 'absolute', x: 1, y: 0 }, at)?.expr).toEqual({ kind: 'absolute', x: 0, y: 0 });
  });
});

describe('Resolver', () => {
  it('resolves names in the scope they were written in', () => {
    const root = new Scope(null, null);
    const group = new Scope('g', root);
    root.define('A', { kind: 'absolute', x: 1, y: 1 }, at);
    group.define('B', { kind: 'offset', base: { kind: 'named', name: 'A', dx: 0, dy: 0 }, dx: 2, dy: 0 }, at);

    const missing = new Set<string>();
    const point = new Resolver().resolve({ kind: 'named', name: 'B', dx: 0, dy: 1 }, group, missing);
    expect(point).toEqual({ x: 3, y: 2 });
    expect(missing.size).toBe(0);
  });

  it('combines midpoints and perpendicular points', () => {
    const scope = new Scope(null, null);
    const resolver = new Resolver();
    const first = { kind: 'absolute', x: 0, y: 0 } as const;
    const second = { kind: 'absolute', x: 2, y: 4 } as const;
    expect(resolver.resolve({ kind: 'midpoint', first, second }, scope, new Set())).toEqual({ x: 1, y: 2 });
    expect(resolver.resolve({ kind: 'perpendicular', operator: '|-', first, second }, scope, new Set())).toEqual({
      x: 0,
      y: 4,
    });
  });

  it('collects unknown names', () => {
    const missing = new Set<string>();
    const point = new Resolver().resolve({ kind: 'named', name: 'X', dx: 0, dy: 0 }, new Scope(null, null), missing);
    expect(point).toBeNull();
    expect([...missing]).toEqual(['X']);
  });

  it('reports a name defined through itself', () => {
    const scope = new Scope(null, null);
    scope.define('A', { kind: 'offset', base: { kind: 'named', name: 'A', dx: 0, dy: 0 }, dx: 1, dy: 0 }, at);
    const missing = new Set<string>();
    expect(new Resolver().resolve({ kind: 'named', name: 'A', dx: 0, dy: 0 }, scope, missing)).toBeNull();
    expect([...missing]).toEqual(['A']);
  });
});
