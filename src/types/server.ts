import type { ConflictPolicy } from '../core/route-builder.js';
import type { Capability } from '../workers/capabilities.js';
import type { SandboxOptions } from '../workers/options.js';
import type { MultiValueMap } from '../workers/types.js';

export interface WorkersServerOptions {
  /**
   * Root of the worker tree. Every `*.wasm` below it, outside `_` and `.` prefixed entries, becomes a route.
   */
  dir: string;

  host?: string;

  /**
   * `0` picks a free port.
   */
  port?: number;

  /**
   * Rebuild the route table when the tree changes. Defaults to `true`.
   */
  watch?: boolean;

  /**
   * Serve the `/_workers` meta api. Defaults to `true`.
   */
  meta?: boolean;

  /**
   * Largest request body accepted, in bytes.
   */
  maxRequestBytes?: number;

  conflictPolicy?: ConflictPolicy;

  /**
   * Capabilities worker manifests may request. Defaults to all of them.
   */
  allowedCapabilities?: readonly Capability[];

  /**
   * Server-wide vars handed to every worker; a manifest's `vars` override them.
   */
  vars?: Readonly<Record<string, string>>;

  sandbox?: Partial<SandboxOptions>;

  /**
   * Quiet period before a burst of file changes triggers a rebuild.
   */
  watchDebounceMs?: number;
}

export interface ResolvedServerOptions {
  dir: string;
  host: string;
  port: number;
  watch: boolean;
  meta: boolean;
  maxRequestBytes: number;
  conflictPolicy: ConflictPolicy;
  allowedCapabilities: readonly Capability[];
  vars: Readonly<Record<string, string>>;
  sandbox: SandboxOptions;
  watchDebounceMs: number;
}

export interface ParsedRequestTarget {
  path: string;
  query: MultiValueMap;
}
