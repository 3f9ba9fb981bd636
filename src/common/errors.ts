/**
 * Error taxonomy of the worker server.
 *
 * Load and build problems, and failed executions, are plain data (discriminated unions built by the
 * factories below) so they can cross thread boundaries and be logged as-is. Only the process edges throw.
 */

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = ResultOk<T> | ResultErr<E>;

export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

export function err<E>(error: E): ResultErr<E> {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Load errors: one module is unusable, the rest of the tree is not affected
// ---------------------------------------------------------------------------

export type LoadErrorCode =
  | 'READ_FAILED'
  | 'INVALID_MODULE'
  | 'INVALID_MANIFEST'
  | 'UNSUPPORTED_CONTRACT'
  | 'DISALLOWED_CAPABILITY'
  | 'MISSING_ENTRY_POINT'
  | 'MISSING_MEMORY'
  | 'UNSUPPORTED_IMPORT'
  | 'INVALID_ROUTE';

export interface LoadError {
  readonly code: LoadErrorCode;
  /** Absolute path of the offending worker file. */
  readonly file: string;
  readonly reason: string;
}

export function loadError(code: LoadErrorCode, file: string, reason: string): LoadError {
  return { code, file, reason };
}

// ---------------------------------------------------------------------------
// Build errors: the whole route table is rejected
// ---------------------------------------------------------------------------

export type BuildError =
  | {
      readonly code: 'ROUTE_CONFLICT';
      /** Display form of the contested pattern. */
      readonly pattern: string;
      /** Relative paths of the two conflicting workers. */
      readonly files: readonly [string, string];
    }
  | {
      readonly code: 'ROOT_UNREADABLE';
      readonly root: string;
      readonly reason: string;
    }
  | {
      readonly code: 'INDEX_REJECTED';
      readonly pattern: string;
      readonly reason: string;
    };

export function routeConflict(pattern: string, first: string, second: string): BuildError {
  return { code: 'ROUTE_CONFLICT', pattern, files: [first, second] } as const;
}

export function rootUnreadable(root: string, reason: string): BuildError {
  return { code: 'ROOT_UNREADABLE', root, reason } as const;
}

export function indexRejected(pattern: string, reason: string): BuildError {
  return { code: 'INDEX_REJECTED', pattern, reason } as const;
}

export function describeBuildError(error: BuildError): string {
  switch (error.code) {
    case 'ROUTE_CONFLICT':
      return `Route conflict on ${error.pattern}: ${error.files[0]} and ${error.files[1]}`;
    case 'ROOT_UNREADABLE':
      return `Cannot read worker directory ${error.root}: ${error.reason}`;
    case 'INDEX_REJECTED':
      return `Route ${error.pattern} rejected by the router: ${error.reason}`;
  }
}

/**
 * Thrown by `startServer` when the initial scan cannot produce a route table.
 */
export class BuildFailedError extends Error {
  readonly buildError: BuildError;

  constructor(buildError: BuildError) {
    super(describeBuildError(buildError));
    this.name = 'BuildFailedError';
    this.buildError = buildError;
  }
}

/**
 * Thrown while resolving server or sandbox options, naming the first invalid option.
 */
export class InvalidOptionError extends Error {
  readonly code = 'INVALID_OPTION';
  readonly option: string;

  constructor(option: string, message: string) {
    super(`Invalid ${option}: ${message}`);
    this.name = 'InvalidOptionError';
    this.option = option;
  }
}

// ---------------------------------------------------------------------------
// Execution failures: one request failed, surfaced as a 5xx
// ---------------------------------------------------------------------------

export type ExecutionFailureKind = 'Timeout' | 'ResourceExceeded' | 'RuntimeTrap' | 'ProtocolViolation';

export interface ExecutionFailure {
  readonly kind: ExecutionFailureKind;
  readonly message: string;
}

export function timeout(elapsedMs: number, limitMs: number): ExecutionFailure {
  return {
    kind: 'Timeout',
    message: `Execution exceeded its deadline: ${String(Math.round(elapsedMs))}ms elapsed, limit ${String(limitMs)}ms`,
  };
}

export function resourceExceeded(message: string): ExecutionFailure {
  return { kind: 'ResourceExceeded', message };
}

export function runtimeTrap(message: string): ExecutionFailure {
  return { kind: 'RuntimeTrap', message };
}

export function protocolViolation(message: string): ExecutionFailure {
  return { kind: 'ProtocolViolation', message };
}

/**
 * Thrown by the sandbox pool when it cannot accept more work.
 */
export class PoolOverloadedError extends Error {
  readonly code = 'POOL_OVERLOADED';

  constructor(maxInflight: number) {
    super(`Sandbox pool overloaded (${String(maxInflight)} executions in flight)`);
    this.name = 'PoolOverloadedError';
  }
}

/**
 * Thrown while reading a request body that exceeds `maxRequestBytes`.
 */
export class PayloadTooLargeError extends Error {
  readonly code = 'PAYLOAD_TOO_LARGE';
  readonly limit: number;

  constructor(limit: number) {
    super(`request body too large (limit ${String(limit)} bytes)`);
    this.name = 'PayloadTooLargeError';
    this.limit = limit;
  }
}
