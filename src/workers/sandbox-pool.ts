import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import { PoolOverloadedError, resourceExceeded, runtimeTrap, timeout } from '../common/errors.js';
import type { ExecutionFailure } from '../common/errors.js';
import { errorFields, logJsonl } from '../common/logger.js';

import type { protocol } from './protocol.js';
import type { SandboxOptions } from './options.js';
import { megabytes, resolveSandboxOptions } from './options.js';

/**
 * One worker thread and the job it is running, if any.
 */
interface Slot {
  readonly worker: Worker;
  /**
   * Settles once the worker thread posted `ready`.
   */
  readonly ready: Promise<void>;
  current: PendingJob | undefined;
}

/**
 * Queued or running job.
 */
interface PendingJob {
  readonly id: string;
  readonly job: protocol.Job;
  readonly resolve: (outcome: protocol.Outcome) => void;
  /**
   * Deadline timer, armed when the job is accepted.
   */
  timer: NodeJS.Timeout | undefined;
  slot: Slot | undefined;
}

/**
 * Snapshot used by the meta api to expose pool state.
 */
export interface SandboxPoolSnapshot {
  status: 'running' | 'closed';
  /**
   * Live worker threads.
   */
  threads: number;
  /**
   * Threads currently running a guest.
   */
  busy: number;
  queued: number;
  completed: number;
  /**
   * Worker threads terminated or lost, for any reason.
   */
  terminations: number;
  lastTerminationReason?: string;
  lastTerminationAt?: number;
  limits: {
    poolSize: number;
    maxInflight: number;
    timeoutMs: number;
    maxMemoryMb: number;
    maxOutputBytes: number;
    heapSoftLimitMb: number;
    /**
     * ! V8 old-space cap in MB.
     */
    maxOldGenerationSizeMb: number;
    /**
     * ! V8 young-space cap in MB.
     */
    maxYoungGenerationSizeMb: number;
    stackSizeMb: number;
  };
}

/**
 * Main-thread API for running guests on worker threads.
 */
export interface SandboxPool {
  readonly options: SandboxOptions;
  /**
   * Runs a job. Resolves with the outcome, including timeouts and crashes; throws PoolOverloadedError
   * when `maxInflight` jobs are already queued or running.
   */
  execute(job: protocol.Job): Promise<protocol.Outcome>;
  /**
   * Starts every worker thread and waits until they are ready.
   */
  warmup(): Promise<void>;
  /**
   * Terminates all worker threads; pending jobs resolve as failures.
   */
  close(): Promise<void>;
  getSnapshot(): SandboxPoolSnapshot;
}

/**
 * Resolves the worker entry for TypeScript sources (tests, `dev`) and for the compiled js runtime.
 */
export function resolveWorkerEntry(moduleUrl: string = import.meta.url): URL {
  if (path.extname(fileURLToPath(moduleUrl)) === '.ts') {
    // Node 20 rejects a .ts worker entry even with `--import tsx`; a js shim registers tsx first
    return new URL('./sandbox-worker.dev.mjs', moduleUrl);
  }

  return new URL('./sandbox-worker.js', moduleUrl);
}

/**
 * Creates a sandbox pool using merged runtime defaults.
 */
export function createSandboxPool(overrides?: Partial<SandboxOptions>): SandboxPool {
  return new SandboxPoolImpl(resolveSandboxOptions(overrides));
}

class SandboxPoolImpl implements SandboxPool {
  readonly options: SandboxOptions;

  private readonly entry: URL;

  private readonly slots: Slot[] = [];

  private readonly queue: PendingJob[] = [];

  /**
   * Accepted and not yet settled, queued or running.
   */
  private inflight = 0;

  private jobCounter = 0;

  private completed = 0;

  private terminations = 0;

  private lastTerminationReason: string | undefined;

  private lastTerminationAt: number | undefined;

  private closed = false;

  constructor(options: SandboxOptions) {
    this.options = options;
    this.entry = resolveWorkerEntry();
  }

  execute(job: protocol.Job): Promise<protocol.Outcome> {
    if (this.closed) {
      return Promise.reject(new Error('sandbox pool is closed'));
    }

    if (this.inflight >= this.options.maxInflight) {
      return Promise.reject(new PoolOverloadedError(this.options.maxInflight));
    }

    this.inflight += 1;

    return new Promise<protocol.Outcome>((resolve) => {
      const pending: PendingJob = {
        id: `${Date.now().toString(36)}-${(this.jobCounter++).toString(36)}`,
        job,
        resolve: (outcome) => {
          this.inflight -= 1;
          this.completed += 1;
          resolve(outcome);
        },
        timer: undefined,
        slot: undefined,
      };

      const remainingMs = Math.max(0, job.startedAt + job.timeoutMs - Date.now());
      pending.timer = setTimeout(() => {
        this.handleDeadline(pending);
      }, remainingMs);

      this.queue.push(pending);
      this.dispatch();
    });
  }

  async warmup(): Promise<void> {
    while (!this.closed && this.slots.length < this.options.poolSize) {
      this.spawn();
    }

    await Promise.all(this.slots.map((slot) => slot.ready));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    for (const pending of this.queue.splice(0)) {
      this.settle(pending, failed(pending.job, runtimeTrap('sandbox pool closed')));
    }

    const slots = this.slots.splice(0);
    for (const slot of slots) {
      const pending = slot.current;
      slot.current = undefined;
      if (pending !== undefined) {
        this.settle(pending, failed(pending.job, runtimeTrap('sandbox pool closed')));
      }
    }

    const results = await Promise.allSettled(slots.map((slot) => slot.worker.terminate()));
    for (const result of results) {
      if (result.status === 'rejected') {
        logJsonl('WARN', 'sandbox_worker_terminate_failed', errorFields(result.reason));
      }
    }
  }

  getSnapshot(): SandboxPoolSnapshot {
    return {
      status: this.closed ? 'closed' : 'running',
      threads: this.slots.length,
      busy: this.slots.filter((slot) => slot.current !== undefined).length,
      queued: this.queue.length,
      completed: this.completed,
      terminations: this.terminations,
      lastTerminationReason: this.lastTerminationReason,
      lastTerminationAt: this.lastTerminationAt,
      limits: {
        poolSize: this.options.poolSize,
        maxInflight: this.options.maxInflight,
        timeoutMs: this.options.timeoutMs,
        maxMemoryMb: this.options.maxMemoryMb,
        maxOutputBytes: this.options.maxOutputBytes,
        heapSoftLimitMb: this.options.heapSoftLimitMb,
        maxOldGenerationSizeMb: this.options.maxOldGenerationSizeMb,
        maxYoungGenerationSizeMb: this.options.maxYoungGenerationSizeMb,
        stackSizeMb: this.options.stackSizeMb,
      },
    };
  }

  /**
   * Hands queued jobs to idle worker threads, starting threads up to `poolSize`.
   */
  private dispatch(): void {
    while (!this.closed && this.queue.length > 0) {
      let slot = this.slots.find((candidate) => candidate.current === undefined);

      if (slot === undefined) {
        if (this.slots.length >= this.options.poolSize) {
          return;
        }
        slot = this.spawn();
      }

      const pending = this.queue.shift();
      if (pending === undefined) {
        return;
      }

      pending.slot = slot;
      slot.current = pending;

      const message: protocol.InboundMessage = {
        type: 'execute',
        id: pending.id,
        job: pending.job,
      };
      slot.worker.postMessage(message);
    }
  }

  /**
   * Starts a worker thread and wires its lifecycle hooks.
   */
  private spawn(): Slot {
    const worker = new Worker(this.entry, {
      resourceLimits: {
        maxOldGenerationSizeMb: this.options.maxOldGenerationSizeMb,
        maxYoungGenerationSizeMb: this.options.maxYoungGenerationSizeMb,
        stackSizeMb: this.options.stackSizeMb,
      },
    });

    worker.unref();

    let markReady: () => void = () => {};
    const ready = new Promise<void>((resolve) => {
      markReady = resolve;
    });

    const slot: Slot = { worker, ready, current: undefined };

    worker.on('message', (message: protocol.OutboundMessage) => {
      if (message.type === 'ready') {
        markReady();
        return;
      }

      this.handleResult(slot, message);
    });

    worker.once('error', (error) => {
      // ERR_WORKER_OUT_OF_MEMORY: the guest pushed the thread past its V8 resource limits
      const outOfMemory = 'code' in error && error.code === 'ERR_WORKER_OUT_OF_MEMORY';

      logJsonl('ERROR', 'sandbox_worker_error', errorFields(error));
      markReady();
      this.discard(
        slot,
        outOfMemory ? 'worker_out_of_memory' : 'worker_error',
        outOfMemory
          ? resourceExceeded(`Worker thread ran out of memory: ${error.message}`)
          : runtimeTrap(`Worker thread crashed: ${error.message}`),
      );
    });

    worker.once('exit', (code) => {
      markReady();
      this.discard(slot, 'worker_exit', runtimeTrap(`Worker thread exited with code ${String(code)}`));
    });

    this.slots.push(slot);
    logJsonl('INFO', 'sandbox_worker_started', {
      threadId: worker.threadId,
      maxOldGenerationSizeMb: this.options.maxOldGenerationSizeMb,
      maxYoungGenerationSizeMb: this.options.maxYoungGenerationSizeMb,
      stackSizeMb: this.options.stackSizeMb,
    });
    return slot;
  }

  private handleResult(slot: Slot, message: protocol.ResultMessage): void {
    const pending = slot.current;
    if (pending === undefined || pending.id !== message.id) {
      return;
    }

    slot.current = undefined;
    this.settle(pending, message.outcome);

    if (message.heapUsed >= megabytes(this.options.heapSoftLimitMb)) {
      logJsonl('WARN', 'sandbox_worker_memory_soft_limit', {
        threadId: slot.worker.threadId,
        heapUsed: message.heapUsed,
        softLimitBytes: megabytes(this.options.heapSoftLimitMb),
      });
      this.recycle(slot, 'memory_soft_limit');
    }

    this.dispatch();
  }

  /**
   * Deadline fired: a queued job is dropped, a running one takes its worker thread down with it.
   */
  private handleDeadline(pending: PendingJob): void {
    pending.timer = undefined;
    const elapsedMs = Date.now() - pending.job.startedAt;
    const outcome = failed(pending.job, timeout(elapsedMs, pending.job.timeoutMs));

    const queuedAt = this.queue.indexOf(pending);
    if (queuedAt !== -1) {
      this.queue.splice(queuedAt, 1);
      this.settle(pending, outcome);
      return;
    }

    const slot = pending.slot;
    if (slot === undefined || slot.current !== pending) {
      return;
    }

    slot.current = undefined;
    this.settle(pending, outcome);
    this.recycle(slot, 'request_timeout');
    this.dispatch();
  }

  /**
   * Terminates a worker thread on purpose. Its exit event finds the slot already gone.
   */
  private recycle(slot: Slot, reason: string): void {
    if (!this.remove(slot, reason)) {
      return;
    }

    logJsonl('WARN', 'sandbox_worker_recycled', { threadId: slot.worker.threadId, reason });

    void slot.worker.terminate().catch((error: unknown) => {
      logJsonl('WARN', 'sandbox_worker_terminate_failed', { reason, ...errorFields(error) });
    });
  }

  /**
   * Forgets a worker thread that died on its own and fails the job it was running.
   */
  private discard(slot: Slot, reason: string, failure: ExecutionFailure): void {
    if (!this.remove(slot, reason)) {
      return;
    }

    const pending = slot.current;
    slot.current = undefined;
    if (pending !== undefined) {
      this.settle(pending, failed(pending.job, failure));
    }

    this.dispatch();
  }

  private remove(slot: Slot, reason: string): boolean {
    const index = this.slots.indexOf(slot);
    if (index === -1) {
      return false;
    }

    this.slots.splice(index, 1);
    this.terminations += 1;
    this.lastTerminationReason = reason;
    this.lastTerminationAt = Date.now();
    return true;
  }

  private settle(pending: PendingJob, outcome: protocol.Outcome): void {
    if (pending.timer !== undefined) {
      clearTimeout(pending.timer);
      pending.timer = undefined;
    }

    pending.resolve(outcome);
  }
}

function failed(job: protocol.Job, failure: ExecutionFailure): protocol.Outcome {
  return {
    ok: false,
    failure,
    stderr: '',
    elapsedMs: Date.now() - job.startedAt,
  };
}
