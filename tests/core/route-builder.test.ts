import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';

import { buildRouteTable, collectWorkerFiles } from '@/core/route-builder.js';
import type { ConflictPolicy } from '@/core/route-builder.js';
import { matchRoute } from '@/core/router.js';
import { CAPABILITIES } from '@/workers/capabilities.js';
import { ModuleLoader } from '@/workers/module-loader.js';

import { createTempDirectory, loggedEvents, removeDirectory, writeFile } from '../helpers/test-utils.js';
import { echoModule, respondModule } from '../helpers/wasm-fixtures.js';

describe('route builder', () => {
  const tempDirectories: string[] = [];
  let consoleLog: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();

    for (const tempDirectory of tempDirectories.splice(0)) {
      await removeDirectory(tempDirectory);
    }
  });

  async function createRoot(): Promise<string> {
    const root = await createTempDirectory('wasm-workers-routes-');
    tempDirectories.push(root);
    return root;
  }

  function build(root: string, conflictPolicy: ConflictPolicy = 'error', loader?: ModuleLoader) {
    return buildRouteTable({
      root,
      loader: loader ?? new ModuleLoader({ root, allowedCapabilities: CAPABILITIES, vars: {} }),
      conflictPolicy,
      generation: 7,
    });
  }

  it('lists worker files, skipping private entries', async () => {
    const root = await createRoot();
    await writeFile(path.join(root, 'index.wasm'), echoModule());
    await writeFile(path.join(root, 'about.wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[id].wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[id].json'), '{}');
    await writeFile(path.join(root, '_lib', 'shared.wasm'), echoModule());
    await writeFile(path.join(root, 'api', '_internal.wasm'), echoModule());
    await writeFile(path.join(root, '.cache', 'old.wasm'), echoModule());
    await writeFile(path.join(root, 'notes.txt'), 'not a worker');
    await fs.symlink(path.join(root, 'about.wasm'), path.join(root, 'alias.wasm'));
    await fs.symlink(path.join(root, 'users'), path.join(root, 'people'));

    expect(await collectWorkerFiles(root)).toEqual({
      ok: true,
      value: ['about.wasm', 'alias.wasm', 'index.wasm', 'users/[id].wasm'],
    });
  });

  it('reports a root that is missing or not a directory', async () => {
    const root = await createRoot();
    const file = path.join(root, 'plain.txt');
    await writeFile(file, 'x');

    expect(await collectWorkerFiles(file)).toEqual({
      ok: false,
      error: { code: 'ROOT_UNREADABLE', root: file, reason: 'not a directory' },
    });
    expect(await collectWorkerFiles(path.join(root, 'missing'))).toMatchObject({
      ok: false,
      error: { code: 'ROOT_UNREADABLE' },
    });
  });

  it('builds a table and drops workers that fail to load', async () => {
    const root = await createRoot();
    await writeFile(path.join(root, 'index.wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[id].wasm'), echoModule());
    await writeFile(path.join(root, 'broken.wasm'), 'not wasm at all');
    await writeFile(path.join(root, 'bad', '[1x].wasm'), echoModule());

    const result = await build(root);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }

    expect(result.value.generation).toBe(7);
    expect(result.value.describe().map((route) => route.pattern)).toEqual(['/', '/users/[id]']);

    const events = loggedEvents(consoleLog.mock.calls);
    expect(events).toContainEqual(
      expect.objectContaining({
        level: 'WARN',
        event: 'worker_skipped',
        file: 'broken.wasm',
        code: 'INVALID_MODULE',
        reason: 'missing WebAssembly magic header',
      }),
    );
    expect(events).toContainEqual(
      expect.objectContaining({
        event: 'worker_skipped',
        file: 'bad/[1x].wasm',
        code: 'INVALID_ROUTE',
        reason: 'invalid parameter name "1x" in segment "[1x]"',
      }),
    );
    expect(events).toContainEqual(
      expect.objectContaining({ level: 'INFO', event: 'routes_built', generation: 7, routes: 2, skipped: 2 }),
    );
  });

  it('builds equal tables from an unchanged tree', async () => {
    const root = await createRoot();
    await writeFile(path.join(root, 'index.wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[id].wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[id].json'), '{"methods":["GET"],"capabilities":["log"]}');
    const loader = new ModuleLoader({ root, allowedCapabilities: CAPABILITIES, vars: {} });

    const first = await build(root, 'error', loader);
    const second = await build(root, 'error', loader);

    expect(first.ok && second.ok).toBe(true);
    if (first.ok && second.ok) {
      expect(second.value.describe()).toEqual(first.value.describe());
      expect(first.value.describe().map((route) => route.pattern)).toEqual(['/', '/users/[id]']);
    }
  });

  it('rejects overlapping routes under the error policy', async () => {
    const root = await createRoot();
    await writeFile(path.join(root, 'users', '[id].wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[name]', 'index.wasm'), echoModule());

    expect(await build(root)).toEqual({
      ok: false,
      error: {
        code: 'ROUTE_CONFLICT',
        pattern: '/users/[name]',
        files: ['users/[id].wasm', 'users/[name]/index.wasm'],
      },
    });
  });

  it('keeps the first worker under the first-wins policy', async () => {
    const root = await createRoot();
    await writeFile(path.join(root, 'users', '[id].wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[name]', 'index.wasm'), echoModule());

    const result = await build(root, 'first-wins');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.describe().map((route) => route.file)).toEqual(['users/[id].wasm']);
    }
    expect(loggedEvents(consoleLog.mock.calls)).toContainEqual(
      expect.objectContaining({
        level: 'WARN',
        event: 'route_conflict_skipped',
        pattern: '/users/[name]',
        kept: 'users/[id].wasm',
        skipped: 'users/[name]/index.wasm',
      }),
    );
  });

  it('lets workers share a pattern when their methods are disjoint', async () => {
    const root = await createRoot();
    await writeFile(path.join(root, 'users', '[id].wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[id].json'), '{"methods":["GET"]}');
    await writeFile(path.join(root, 'users', '[name]', 'index.wasm'), echoModule());
    await writeFile(path.join(root, 'users', '[name]', 'index.json'), '{"methods":["POST"]}');

    const result = await build(root);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(matchRoute(result.value, 'GET', '/users/1')).toMatchObject({ kind: 'matched', params: { id: '1' } });
      expect(matchRoute(result.value, 'POST', '/users/1')).toMatchObject({ kind: 'matched', params: { name: '1' } });
      expect(matchRoute(result.value, 'PUT', '/users/1')).toEqual({
        kind: 'method-not-allowed',
        allowed: ['GET', 'POST'],
      });
    }
  });

  it('drops cached modules of removed files', async () => {
    const root = await createRoot();
    const loader = new ModuleLoader({ root, allowedCapabilities: CAPABILITIES, vars: {} });
    await writeFile(path.join(root, 'one.wasm'), respondModule('one'));
    await writeFile(path.join(root, 'two.wasm'), respondModule('two'));

    await build(root, 'error', loader);
    expect(loader.cacheSize).toBe(2);

    await fs.rm(path.join(root, 'two.wasm'));
    await build(root, 'error', loader);
    expect(loader.cacheSize).toBe(1);
  });
});
