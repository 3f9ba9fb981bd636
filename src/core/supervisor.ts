import type { BuildError, Result } from '../common/errors.js';
import { describeBuildError } from '../common/errors.js';
import { errorFields, log, logJsonl } from '../common/logger.js';
import type { ModuleLoader } from '../workers/module-loader.js';
import type { ConflictPolicy } from './route-builder.js';
import { buildRouteTable } from './route-builder.js';
import { RouteTable } from './route-table.js';
import type { DirectoryWatcher } from './watcher.js';
import { watchWorkerTree } from './watcher.js';

export interface SupervisorOptions {
  root: string;
  loader: ModuleLoader;
  conflictPolicy: ConflictPolicy;
  watch: boolean;
  debounceMs?: number;
}

export interface SupervisorStatus {
  generation: number;
  routes: number;
  builtAt: number;
  watching: boolean;
  rebuilding: boolean;
  rebuilds: number;
  failedRebuilds: number;
  lastError?: {
    message: string;
    code: BuildError['code'];
    at: number;
  };
}

function routeKeys(table: RouteTable): Set<string> {
  return new Set(table.describe().map((route) => `${route.pattern} (${route.file})`));
}

/**
 * Owns the current route table. Rebuilds on file changes and swaps the table only when a rebuild
 * succeeds; requests read `table` once and keep that snapshot for their whole lifetime.
 */
export class RouteSupervisor {
  private readonly options: SupervisorOptions;

  private current: RouteTable = RouteTable.empty();

  private builds = 0;

  private rebuilds = 0;

  private failedRebuilds = 0;

  private lastError: SupervisorStatus['lastError'];

  private watcher: DirectoryWatcher | undefined;

  /**
   * Rebuild loop in progress, if any.
   */
  private running: Promise<void> | undefined;

  /**
   * A change arrived while a rebuild was running.
   */
  private pending = false;

  private closed = false;

  constructor(options: SupervisorOptions) {
    this.options = options;
  }

  get table(): RouteTable {
    return this.current;
  }

  /**
   * Initial build. On success the table is installed and, when enabled, the watcher started.
   */
  async start(): Promise<Result<RouteTable, BuildError>> {
    const result = await buildRouteTable({
      root: this.options.root,
      loader: this.options.loader,
      conflictPolicy: this.options.conflictPolicy,
      generation: ++this.builds,
    });

    if (!result.ok) {
      return result;
    }

    this.current = result.value;

    if (this.options.watch && !this.closed) {
      this.watcher = watchWorkerTree(
        this.options.root,
        () => {
          this.requestRebuild();
        },
        this.options.debounceMs,
      );
    }

    return result;
  }

  /**
   * Schedules a rebuild. While one is running, any number of calls collapse into exactly one more.
   */
  requestRebuild(): void {
    if (this.closed) {
      return;
    }

    if (this.running !== undefined) {
      this.pending = true;
      return;
    }

    this.running = this.rebuildLoop().finally(() => {
      this.running = undefined;
    });
  }

  /**
   * Resolves once no rebuild is running or scheduled.
   */
  async whenIdle(): Promise<void> {
    while (this.running !== undefined) {
      await this.running;
    }
  }

  getStatus(): SupervisorStatus {
    return {
      generation: this.current.generation,
      routes: this.current.size,
      builtAt: this.current.builtAt,
      watching: this.watcher !== undefined,
      rebuilding: this.running !== undefined,
      rebuilds: this.rebuilds,
      failedRebuilds: this.failedRebuilds,
      lastError: this.lastError,
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.pending = false;
    this.watcher?.close();
    this.watcher = undefined;
    await this.whenIdle();
  }

  private async rebuildLoop(): Promise<void> {
    do {
      this.pending = false;
      await this.rebuildOnce();
    } while (this.pending && !this.closed);
  }

  private async rebuildOnce(): Promise<void> {
    this.rebuilds += 1;

    let result: Result<RouteTable, BuildError>;
    try {
      result = await buildRouteTable({
        root: this.options.root,
        loader: this.options.loader,
        conflictPolicy: this.options.conflictPolicy,
        generation: ++this.builds,
      });
    } catch (error) {
      this.failedRebuilds += 1;
      logJsonl('ERROR', 'routes_rebuild_crashed', errorFields(error));
      return;
    }

    if (!result.ok) {
      this.failedRebuilds += 1;
      this.lastError = { message: describeBuildError(result.error), code: result.error.code, at: Date.now() };
      logJsonl('ERROR', 'routes_rebuild_failed', {
        ...result.error,
        message: this.lastError.message,
        keptGeneration: this.current.generation,
      });
      return;
    }

    if (this.closed) {
      return;
    }

    const previous = this.current;
    this.current = result.value;
    this.lastError = undefined;

    const before = routeKeys(previous);
    const after = routeKeys(result.value);
    const added = [...after].filter((route) => !before.has(route));
    const removed = [...before].filter((route) => !after.has(route));

    for (const route of added) {
      log('INFO', `Registered route: ${route}`);
    }
    for (const route of removed) {
      log('INFO', `Unregistered route: ${route}`);
    }

    logJsonl('INFO', 'routes_swapped', {
      generation: result.value.generation,
      previousGeneration: previous.generation,
      added,
      removed,
    });
  }
}
