import { describe, expect, it } from 'vitest';

import { HTTP_METHODS } from '@/common/consts.js';
import { RouteTable } from '@/core/route-table.js';
import { matchRoute } from '@/core/router.js';

import { routeEntry } from '../helpers/route-fixtures.js';

function createTable(): RouteTable {
  const table = RouteTable.create(
    [
      routeEntry('index.wasm'),
      routeEntry('posts/[id].wasm', ['POST']),
      routeEntry('users/[id].wasm'),
      routeEntry('users/me.wasm', ['GET']),
    ],
    3,
    1_700_000_000_000,
  );

  if (!table.ok) {
    throw new Error(table.error.code);
  }
  return table.value;
}

function matchedFile(table: RouteTable, method: string, path: string): string | undefined {
  const match = matchRoute(table, method, path);
  return match.kind === 'matched' ? match.entry.worker.relativePath : undefined;
}

describe('router', () => {
  it('matches the root and literal routes', () => {
    const table = createTable();

    expect(matchedFile(table, 'GET', '/')).toBe('index.wasm');
    expect(matchedFile(table, 'GET', '/users/me')).toBe('users/me.wasm');
  });

  it('captures and decodes parameters', () => {
    const match = matchRoute(createTable(), 'DELETE', '/users/a%20b');

    expect(match).toMatchObject({ kind: 'matched', params: { id: 'a b' } });
  });

  it('prefers a literal segment over a parameter', () => {
    const match = matchRoute(createTable(), 'GET', '/users/me');

    expect(match).toMatchObject({ kind: 'matched', params: {} });
  });

  it('falls back to a parameter route for methods the literal route does not take', () => {
    const match = matchRoute(createTable(), 'POST', '/users/me');

    expect(match).toMatchObject({ kind: 'matched', params: { id: 'me' } });
    expect(matchedFile(createTable(), 'HEAD', '/users/me')).toBe('users/[id].wasm');
  });

  it('ignores a trailing slash and keeps case', () => {
    const table = createTable();

    expect(matchedFile(table, 'GET', '/users/42/')).toBe('users/[id].wasm');
    expect(matchRoute(table, 'GET', '/Users/42')).toEqual({ kind: 'not-found' });
  });

  it('lists the allowed methods when only the method is wrong', () => {
    expect(matchRoute(createTable(), 'GET', '/posts/1')).toEqual({ kind: 'method-not-allowed', allowed: ['POST'] });
  });

  it('treats unknown methods as not allowed', () => {
    expect(matchRoute(createTable(), 'PROPFIND', '/')).toEqual({
      kind: 'method-not-allowed',
      allowed: [...HTTP_METHODS],
    });
  });

  it('serves the first entry of a table when it is the only match', () => {
    const table = RouteTable.create([routeEntry('about.wasm'), routeEntry('zeta.wasm')], 1);
    if (!table.ok) {
      throw new Error(table.error.code);
    }

    expect(matchedFile(table.value, 'GET', '/about')).toBe('about.wasm');
    expect(matchedFile(table.value, 'GET', '/zeta')).toBe('zeta.wasm');
  });

  it('resolves the first entry when a later one shares its prefix', () => {
    const table = RouteTable.create([routeEntry('[a]/x/[c].wasm'), routeEntry('[a]/[b]/y.wasm')], 1);
    if (!table.ok) {
      throw new Error(table.error.code);
    }

    expect(matchRoute(table.value, 'GET', '/q/x/y')).toMatchObject({
      kind: 'matched',
      entry: { worker: { relativePath: '[a]/x/[c].wasm' } },
      params: { a: 'q', c: 'y' },
    });
  });

  it('captures parameters longer than a hundred characters', () => {
    const id = 'x'.repeat(150);

    expect(matchRoute(createTable(), 'GET', `/users/${id}`)).toMatchObject({ kind: 'matched', params: { id } });
  });

  it('does not match an empty parameter', () => {
    expect(matchRoute(createTable(), 'GET', '/users//')).toEqual({ kind: 'not-found' });
  });

  it('does not serve a directory that only holds a parameter route', () => {
    const table = RouteTable.create([routeEntry('index.wasm'), routeEntry('users/[id].wasm')], 1);
    if (!table.ok) {
      throw new Error(table.error.code);
    }

    expect(matchRoute(table.value, 'GET', '/users')).toEqual({ kind: 'not-found' });
    expect(matchedFile(table.value, 'GET', '/')).toBe('index.wasm');
  });

  it('reports paths no route covers', () => {
    expect(matchRoute(createTable(), 'GET', '/missing/deep/path')).toEqual({ kind: 'not-found' });
    expect(matchRoute(RouteTable.empty(), 'GET', '/')).toEqual({ kind: 'not-found' });
  });
});

describe('route table', () => {
  it('describes its routes', () => {
    const table = createTable();

    expect(table.size).toBe(4);
    expect(table.generation).toBe(3);
    expect(table.builtAt).toBe(1_700_000_000_000);
    expect(table.describe()[1]).toEqual({
      pattern: '/posts/[id]',
      methods: ['POST'],
      file: 'posts/[id].wasm',
      params: ['id'],
      contract: 1,
      capabilities: [],
      hash: 'hash-of-posts/[id].wasm',
    });
  });

  it('rejects entries the index cannot hold', () => {
    const table = RouteTable.create([routeEntry('a/[id].wasm'), routeEntry('a/[id]/index.wasm')], 1);

    expect(table).toMatchObject({ ok: false, error: { code: 'INDEX_REJECTED', pattern: '/a/[id]' } });
  });
});
