import fs from 'node:fs';
import path from 'node:path';

import { HTTP_METHODS, WORKER_EXTENSION } from '../common/consts.js';
import type { BuildError, Result } from '../common/errors.js';
import { err, ok, rootUnreadable, routeConflict } from '../common/errors.js';
import { errorFields, getErrorMessage, logJsonl } from '../common/logger.js';
import type { ModuleLoader } from '../workers/module-loader.js';
import type { WorkerModule } from '../workers/types.js';
import { deriveRoute } from './route-pattern.js';
import { RouteTable } from './route-table.js';
import type { RouteEntry } from './route-table.js';

/**
 * What to do with two workers that answer the same URLs for a common method.
 */
export type ConflictPolicy = 'error' | 'first-wins';

export const CONFLICT_POLICIES: readonly ConflictPolicy[] = ['error', 'first-wins'];

export interface BuildOptions {
  root: string;
  loader: ModuleLoader;
  conflictPolicy: ConflictPolicy;
  generation: number;
}

/**
 * Names starting with `_` or `.` are private to the tree and never routed.
 */
function isIgnoredSegment(name: string): boolean {
  return name.startsWith('_') || name.startsWith('.');
}

function methodsOverlap(left: WorkerModule, right: WorkerModule): boolean {
  if (left.methods.length === 0 || right.methods.length === 0) {
    return true;
  }

  return left.methods.some((method) => right.methods.includes(method));
}

function describeMethods(worker: WorkerModule): string {
  return worker.methods.length === 0 ? HTTP_METHODS.join(',') : worker.methods.join(',');
}

/**
 * Lists candidate worker files below `root`, as `/`-separated relative paths sorted by path.
 */
export async function collectWorkerFiles(root: string): Promise<Result<string[], BuildError>> {
  try {
    const stat = await fs.promises.stat(root);
    if (!stat.isDirectory()) {
      return err(rootUnreadable(root, 'not a directory'));
    }
    await fs.promises.access(root, fs.constants.R_OK);
  } catch (error) {
    return err(rootUnreadable(root, getErrorMessage(error)));
  }

  const files: string[] = [];

  const walk = async (directory: string, relativeDirectory: string): Promise<void> => {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (relativeDirectory === '') {
        throw error;
      }

      logJsonl('WARN', 'worker_directory_skipped', { directory, ...errorFields(error) });
      return;
    }

    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      if (isIgnoredSegment(entry.name)) {
        continue;
      }

      const relativePath = relativeDirectory === '' ? entry.name : `${relativeDirectory}/${entry.name}`;

      if (entry.isDirectory()) {
        await walk(path.join(directory, entry.name), relativePath);
        continue;
      }

      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        // follow links to files; linked directories are not walked
        isFile = await fs.promises
          .stat(path.join(directory, entry.name))
          .then((target) => target.isFile())
          .catch(() => false);
      }

      if (isFile && entry.name.endsWith(WORKER_EXTENSION)) {
        files.push(relativePath);
      }
    }
  };

  try {
    await walk(root, '');
  } catch (error) {
    return err(rootUnreadable(root, getErrorMessage(error)));
  }

  return ok(files.sort((left, right) => left.localeCompare(right)));
}

/**
 * Scans the worker root and builds a fresh route table.
 *
 * A file that fails to load, or whose path is not a valid route, is dropped with a warning; the rest of
 * the tree is still served. Only an unreadable root, a route conflict under the `error` policy, or an
 * index failure reject the build.
 */
export async function buildRouteTable(options: BuildOptions): Promise<Result<RouteTable, BuildError>> {
  const startedAt = Date.now();
  const root = path.resolve(options.root);

  const listed = await collectWorkerFiles(root);
  if (!listed.ok) {
    return listed;
  }

  const candidates = listed.value.flatMap((relativePath) => {
    const route = deriveRoute(relativePath);
    if (!route.ok) {
      logJsonl('WARN', 'worker_skipped', {
        file: relativePath,
        code: 'INVALID_ROUTE',
        reason: route.error,
      });
      return [];
    }

    return [{ relativePath, pattern: route.value }];
  });

  const loaded = await Promise.all(
    candidates.map(async (candidate) => ({
      ...candidate,
      result: await options.loader.load(path.join(root, candidate.relativePath)),
    })),
  );

  options.loader.prune(new Set(loaded.map((candidate) => path.join(root, candidate.relativePath))));

  const entries: RouteEntry[] = [];
  const byKey = new Map<string, RouteEntry[]>();

  for (const candidate of loaded) {
    if (!candidate.result.ok) {
      logJsonl('WARN', 'worker_skipped', {
        file: candidate.relativePath,
        code: candidate.result.error.code,
        reason: candidate.result.error.reason,
      });
      continue;
    }

    const entry: RouteEntry = { pattern: candidate.pattern, worker: candidate.result.value };
    const sameShape = byKey.get(entry.pattern.key) ?? [];
    const rival = sameShape.find((kept) => methodsOverlap(kept.worker, entry.worker));

    if (rival !== undefined) {
      if (options.conflictPolicy === 'error') {
        return err(routeConflict(entry.pattern.display, rival.worker.relativePath, entry.worker.relativePath));
      }

      logJsonl('WARN', 'route_conflict_skipped', {
        pattern: entry.pattern.display,
        kept: rival.worker.relativePath,
        skipped: entry.worker.relativePath,
        methods: describeMethods(entry.worker),
      });
      continue;
    }

    sameShape.push(entry);
    byKey.set(entry.pattern.key, sameShape);
    entries.push(entry);
  }

  const table = RouteTable.create(entries, options.generation);
  if (table.ok) {
    logJsonl('INFO', 'routes_built', {
      generation: options.generation,
      routes: table.value.size,
      skipped: listed.value.length - table.value.size,
      elapsedMs: Date.now() - startedAt,
    });
  }

  return table;
}
