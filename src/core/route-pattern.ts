import { INDEX_SEGMENT, WORKER_EXTENSION } from '../common/consts.js';
import type { Result } from '../common/errors.js';
import { err, ok } from '../common/errors.js';

export type RouteSegment =
  | {
      readonly kind: 'literal';
      readonly value: string;
    }
  | {
      readonly kind: 'param';
      readonly name: string;
    };

/**
 * URL pattern derived from a worker's location in the tree.
 */
export interface RoutePattern {
  readonly segments: readonly RouteSegment[];
  /**
   * Human form, `/users/[id]`.
   */
  readonly display: string;
  /**
   * Router form, `/users/:id`.
   */
  readonly path: string;
  /**
   * Structural key: every parameter looks alike, `users/:`. Two patterns with the same key match the
   * same URLs.
   */
  readonly key: string;
  readonly params: readonly string[];
}

const PARAM_SEGMENT = /^\[([^\]]*)\]$/;
const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED_CHARS = /[[\]:*]/;

function parseSegment(segment: string): Result<RouteSegment, string> {
  const param = PARAM_SEGMENT.exec(segment);
  if (param !== null) {
    const name = param[1];
    if (!PARAM_NAME.test(name)) {
      return err(`invalid parameter name "${name}" in segment "${segment}"`);
    }
    return ok({ kind: 'param', name });
  }

  if (RESERVED_CHARS.test(segment)) {
    return err(`segment "${segment}" contains a reserved character`);
  }

  return ok({ kind: 'literal', value: segment });
}

/**
 * Derives the route of a worker from its path relative to the root.
 *
 * `index.wasm` maps to `/`, `users/index.wasm` to `/users`, `users/[id].wasm` to `/users/[id]`.
 */
export function deriveRoute(relativePath: string): Result<RoutePattern, string> {
  const normalized = relativePath.replace(/\\/g, '/');
  if (!normalized.endsWith(WORKER_EXTENSION)) {
    return err(`"${relativePath}" is not a ${WORKER_EXTENSION} file`);
  }

  const rawSegments = normalized
    .slice(0, -WORKER_EXTENSION.length)
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.');

  if (rawSegments.length === 0) {
    return err(`"${relativePath}" has no file name`);
  }

  if (rawSegments.includes('..')) {
    return err(`"${relativePath}" points outside the worker root`);
  }

  if (rawSegments[rawSegments.length - 1] === INDEX_SEGMENT) {
    rawSegments.pop();
  }

  const segments: RouteSegment[] = [];
  const params: string[] = [];

  for (const raw of rawSegments) {
    const parsed = parseSegment(raw);
    if (!parsed.ok) {
      return parsed;
    }

    const segment = parsed.value;
    if (segment.kind === 'param') {
      if (params.includes(segment.name)) {
        return err(`parameter "${segment.name}" appears more than once`);
      }
      params.push(segment.name);
    }

    segments.push(segment);
  }

  const display = '/' + segments.map((s) => (s.kind === 'literal' ? s.value : `[${s.name}]`)).join('/');
  const path = '/' + segments.map((s) => (s.kind === 'literal' ? s.value : `:${s.name}`)).join('/');
  const key = segments.map((s) => (s.kind === 'literal' ? s.value : ':')).join('/');

  return ok({
    segments: Object.freeze(segments),
    display,
    path,
    key,
    params: Object.freeze(params),
  });
}
