import type { ExecutionFailure } from '../common/errors.js';
import type { HttpMethod } from '../common/consts.js';
import type { Capability } from './capabilities.js';

/**
 * Version of the JSON document exchanged with a worker over stdin/stdout.
 */
export type ContractVersion = 1 | 2;

/**
 * Multi-valued header or query map, lowercase header names.
 */
export type MultiValueMap = Record<string, string[]>;

/**
 * A compiled worker, ready to be instantiated any number of times.
 */
export interface WorkerModule {
  /** Absolute path of the `.wasm` file. */
  readonly file: string;
  /** Path relative to the worker root, `/`-separated. */
  readonly relativePath: string;
  readonly module: WebAssembly.Module;
  /** sha256 of the binary. */
  readonly hash: string;
  readonly entryPoint: string;
  readonly contract: ContractVersion;
  /** Empty means every method. */
  readonly methods: readonly HttpMethod[];
  readonly capabilities: readonly Capability[];
  /** Configuration handed to the worker, already merged with the server-wide vars. */
  readonly vars: Readonly<Record<string, string>>;
  readonly kvNamespace: string;
  readonly timeoutMs?: number;
  readonly maxMemoryBytes?: number;
}

export interface ExecutionRequest {
  readonly method: string;
  /** Request target as received: path plus query string. */
  readonly url: string;
  readonly path: string;
  readonly query: MultiValueMap;
  readonly headers: MultiValueMap;
  readonly body: Uint8Array;
  readonly params: Readonly<Record<string, string>>;
  readonly vars: Readonly<Record<string, string>>;
}

export interface ExecutionResponse {
  readonly status: number;
  readonly headers: MultiValueMap;
  readonly body: Uint8Array;
}

export type ExecutionResult =
  | {
      readonly ok: true;
      readonly response: ExecutionResponse;
      readonly elapsedMs: number;
    }
  | {
      readonly ok: false;
      readonly failure: ExecutionFailure;
      readonly elapsedMs: number;
    };
