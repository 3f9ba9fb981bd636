import type { ExecutionFailure } from '../common/errors.js';
import type { Capability } from './capabilities.js';
import type { ContractVersion, ExecutionRequest, ExecutionResponse } from './types.js';

/**
 * IPC protocol between the main thread and sandbox worker threads.
 */
export namespace protocol {
  /**
   * Everything a worker thread needs to run one guest. Crosses the thread boundary by structured clone;
   * the compiled module is shared, not recompiled.
   */
  export interface Job {
    module: WebAssembly.Module;
    entryPoint: string;
    contract: ContractVersion;
    capabilities: readonly Capability[];
    request: ExecutionRequest;
    /**
     * Key/value namespace as seen by the guest. Empty unless `kv` is granted.
     */
    kv: Record<string, string>;
    /**
     * Program name passed as argv[0].
     */
    argv0: string;
    /**
     * Epoch milliseconds the deadline is measured from.
     */
    startedAt: number;
    timeoutMs: number;
    maxMemoryBytes: number;
    maxOutputBytes: number;
  }

  export type Outcome =
    | {
        ok: true;
        response: ExecutionResponse;
        /**
         * Replacement namespace content returned by the guest.
         */
        kv?: Record<string, string>;
        stderr: string;
        elapsedMs: number;
      }
    | {
        ok: false;
        failure: ExecutionFailure;
        stderr: string;
        elapsedMs: number;
      };

  /**
   * Main -> worker execute command.
   */
  export interface ExecuteMessage {
    type: 'execute';
    /**
     * Correlation id for this job.
     */
    id: string;
    job: Job;
  }

  /**
   * Worker -> main result event.
   */
  export interface ResultMessage {
    type: 'result';
    /**
     * Correlation id matching ExecuteMessage.id.
     */
    id: string;
    outcome: Outcome;
    /**
     * Heap used when the result is produced.
     */
    heapUsed: number;
  }

  /**
   * Worker -> main, sent once the worker thread has loaded its modules.
   */
  export interface ReadyMessage {
    type: 'ready';
  }

  export type InboundMessage = ExecuteMessage;

  export type OutboundMessage = ResultMessage | ReadyMessage;
}
