import { logJsonl } from '../common/logger.js';
import { hasCapability } from './capabilities.js';
import type { KvStore } from './kv-store.js';
import { megabytes } from './options.js';
import type { protocol } from './protocol.js';
import type { SandboxPool } from './sandbox-pool.js';
import type { ExecutionRequest, ExecutionResult, WorkerModule } from './types.js';

/**
 * Runs a worker for one request and applies the side effects its capabilities allow: key/value writes
 * and stderr forwarding.
 *
 * Throws only what the pool throws (overload, closed pool); every guest failure is an `ExecutionResult`.
 */
export class Executor {
  constructor(
    private readonly pool: SandboxPool,
    private readonly kv: KvStore,
  ) {}

  async execute(
    worker: WorkerModule,
    request: ExecutionRequest,
    startedAt: number = Date.now(),
  ): Promise<ExecutionResult> {
    const kvGranted = hasCapability(worker.capabilities, 'kv');
    const sandbox = this.pool.options;

    const job: protocol.Job = {
      module: worker.module,
      entryPoint: worker.entryPoint,
      contract: worker.contract,
      capabilities: worker.capabilities,
      request,
      kv: kvGranted ? this.kv.read(worker.kvNamespace) : {},
      argv0: worker.relativePath,
      startedAt,
      timeoutMs: worker.timeoutMs ?? sandbox.timeoutMs,
      maxMemoryBytes: worker.maxMemoryBytes ?? megabytes(sandbox.maxMemoryMb),
      maxOutputBytes: sandbox.maxOutputBytes,
    };

    const outcome = await this.pool.execute(job);

    if (outcome.stderr !== '' && hasCapability(worker.capabilities, 'log')) {
      logJsonl('INFO', 'worker_stderr', { worker: worker.relativePath, stderr: outcome.stderr });
    }

    if (!outcome.ok) {
      return { ok: false, failure: outcome.failure, elapsedMs: outcome.elapsedMs };
    }

    if (outcome.kv !== undefined) {
      if (kvGranted) {
        this.kv.replace(worker.kvNamespace, outcome.kv);
      } else {
        logJsonl('WARN', 'worker_kv_discarded', {
          worker: worker.relativePath,
          reason: 'kv capability not granted',
        });
      }
    }

    return { ok: true, response: outcome.response, elapsedMs: outcome.elapsedMs };
  }
}
