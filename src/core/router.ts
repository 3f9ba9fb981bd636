import type { HttpMethod } from '../common/consts.js';
import { HTTP_METHODS, isHttpMethod } from '../common/consts.js';
import type { RouteEntry, RouteTable } from './route-table.js';

export type RouteMatch =
  | {
      readonly kind: 'matched';
      readonly entry: RouteEntry;
      readonly params: Readonly<Record<string, string>>;
    }
  | {
      readonly kind: 'not-found';
    }
  | {
      readonly kind: 'method-not-allowed';
      /**
       * Methods some route accepts on this path, for the `Allow` header.
       */
      readonly allowed: readonly HttpMethod[];
    };

/**
 * Resolves a request against one route snapshot. Read-only: safe to call from any number of requests.
 */
export function matchRoute(table: RouteTable, method: string, path: string): RouteMatch {
  if (isHttpMethod(method)) {
    const found = table.find(method, path);
    if (found !== undefined) {
      return { kind: 'matched', entry: found.entry, params: found.params };
    }
  }

  const allowed = HTTP_METHODS.filter((candidate) => candidate !== method && table.find(candidate, path) !== undefined);
  if (allowed.length > 0) {
    return { kind: 'method-not-allowed', allowed };
  }

  return { kind: 'not-found' };
}
