import createRouter from 'find-my-way';

import type { HttpMethod } from '../common/consts.js';
import { HTTP_METHODS } from '../common/consts.js';
import type { BuildError, Result } from '../common/errors.js';
import { err, indexRejected, ok } from '../common/errors.js';
import { getErrorMessage } from '../common/logger.js';
import type { Capability } from '../workers/capabilities.js';
import type { ContractVersion, WorkerModule } from '../workers/types.js';
import type { RoutePattern } from './route-pattern.js';

export interface RouteEntry {
  readonly pattern: RoutePattern;
  readonly worker: WorkerModule;
}

/**
 * Plain, comparable view of one route.
 */
export interface RouteDescription {
  pattern: string;
  /**
   * Empty means every method.
   */
  methods: HttpMethod[];
  file: string;
  params: string[];
  contract: ContractVersion;
  capabilities: Capability[];
  hash: string;
}

export interface RouteLookup {
  entry: RouteEntry;
  params: Record<string, string>;
}

/**
 * What the index stores per route. find-my-way hands back `null` for a falsy store, so a bare array
 * index cannot be used.
 */
interface IndexSlot {
  readonly entryIndex: number;
}

function isIndexSlot(value: unknown): value is IndexSlot {
  return typeof value === 'object' && value !== null && 'entryIndex' in value && typeof value.entryIndex === 'number';
}

function methodsOf(entry: RouteEntry): readonly HttpMethod[] {
  return entry.worker.methods.length === 0 ? HTTP_METHODS : entry.worker.methods;
}

/**
 * Immutable route snapshot. Its index is filled once by `create` and only read afterwards, so any
 * number of requests can share one table while a newer one is being built.
 */
export class RouteTable {
  readonly entries: readonly RouteEntry[];

  readonly generation: number;

  readonly builtAt: number;

  // parameter length is bounded by the request line, not by the router
  private readonly index = createRouter({
    ignoreTrailingSlash: true,
    caseSensitive: true,
    maxParamLength: Number.MAX_SAFE_INTEGER,
  });

  private constructor(entries: readonly RouteEntry[], generation: number, builtAt: number) {
    this.entries = entries;
    this.generation = generation;
    this.builtAt = builtAt;
  }

  /**
   * Builds a table from conflict-free entries ordered by relative path.
   */
  static create(
    entries: readonly RouteEntry[],
    generation: number,
    builtAt: number = Date.now(),
  ): Result<RouteTable, BuildError> {
    const table = new RouteTable(Object.freeze(entries.map((entry) => Object.freeze({ ...entry }))), generation, builtAt);

    for (let i = 0; i < table.entries.length; i++) {
      const entry = table.entries[i];
      try {
        const slot: IndexSlot = { entryIndex: i };
        table.index.on([...methodsOf(entry)], entry.pattern.path, () => undefined, slot);
      } catch (error) {
        return err(indexRejected(entry.pattern.display, getErrorMessage(error)));
      }
    }

    return ok(table);
  }

  static empty(generation = 0): RouteTable {
    return new RouteTable(Object.freeze([]), generation, Date.now());
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Entry serving `method` on `path`, literal segments first. An empty parameter value (`/users//`) matches
   * nothing.
   */
  find(method: HttpMethod, path: string): RouteLookup | undefined {
    const found = this.index.find(method, path);
    if (found === null) {
      return undefined;
    }

    const store: unknown = found.store;
    if (!isIndexSlot(store)) {
      return undefined;
    }

    const entry = this.entries[store.entryIndex];
    if (entry === undefined) {
      return undefined;
    }

    const params: Record<string, string> = {};
    for (const [name, value] of Object.entries(found.params)) {
      if (value === undefined || value === '') {
        return undefined;
      }
      params[name] = value;
    }

    return { entry, params };
  }

  describe(): RouteDescription[] {
    return this.entries.map((entry) => ({
      pattern: entry.pattern.display,
      methods: [...entry.worker.methods],
      file: entry.worker.relativePath,
      params: [...entry.pattern.params],
      contract: entry.worker.contract,
      capabilities: [...entry.worker.capabilities],
      hash: entry.worker.hash,
    }));
  }
}
