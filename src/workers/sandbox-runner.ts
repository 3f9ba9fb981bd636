/**
 * Runs one guest to completion: fresh instance, stdin in, stdout out.
 *
 * Used inside sandbox worker threads. It never throws; every way a guest can end is folded into an outcome.
 */

import type { ExecutionFailure } from '../common/errors.js';
import { protocolViolation, resourceExceeded, runtimeTrap, timeout } from '../common/errors.js';
import { getErrorMessage } from '../common/logger.js';
import { decodeOutput, encodeInput } from './contract.js';
import { ResourceSignal, TimeoutSignal, checkMemoryCeiling, createDeadline } from './limits.js';
import type { protocol } from './protocol.js';
import { WasiExit, WasiHost } from './wasi-host.js';

function withStderr(message: string, stderr: string): string {
  const trimmed = stderr.trim();
  return trimmed === '' ? message : `${message}: ${trimmed}`;
}

/**
 * Maps whatever unwound the guest to a failure; `undefined` means a clean `proc_exit(0)`.
 */
function classify(error: unknown, stderr: string): ExecutionFailure | undefined {
  if (error instanceof WasiExit) {
    return error.code === 0 ? undefined : runtimeTrap(withStderr(`Worker exited with code ${String(error.code)}`, stderr));
  }

  if (error instanceof TimeoutSignal) {
    return timeout(error.elapsedMs, error.limitMs);
  }

  if (error instanceof ResourceSignal) {
    return resourceExceeded(error.message);
  }

  if (error instanceof WebAssembly.RuntimeError) {
    return runtimeTrap(withStderr(`WebAssembly trap: ${error.message}`, stderr));
  }

  return runtimeTrap(withStderr(getErrorMessage(error), stderr));
}

export async function runSandbox(job: protocol.Job): Promise<protocol.Outcome> {
  const deadline = createDeadline(job.startedAt, job.timeoutMs);
  let memory: WebAssembly.Memory | undefined;

  const host = new WasiHost({
    stdin: encodeInput(job.contract, job.request, job.kv),
    args: [job.argv0],
    env: job.request.vars,
    capabilities: job.capabilities,
    maxOutputBytes: job.maxOutputBytes,
    guard: () => {
      deadline.check();
      checkMemoryCeiling(memory, job.maxMemoryBytes);
    },
  });

  const fail = (failure: ExecutionFailure): protocol.Outcome => ({
    ok: false,
    failure,
    stderr: host.getStderr(),
    elapsedMs: deadline.elapsedMs,
  });

  let instance: WebAssembly.Instance;
  try {
    instance = await WebAssembly.instantiate(job.module, host.getImports(job.module));
  } catch (error) {
    return fail(runtimeTrap(`Instantiation failed: ${getErrorMessage(error)}`));
  }

  const exportedMemory = instance.exports.memory;
  if (!(exportedMemory instanceof WebAssembly.Memory)) {
    return fail(runtimeTrap('Worker does not export its memory'));
  }
  memory = exportedMemory;
  host.attach(exportedMemory);

  const entry = instance.exports[job.entryPoint];
  if (typeof entry !== 'function') {
    return fail(runtimeTrap(`Entry point ${job.entryPoint} is not an exported function`));
  }

  try {
    entry();
  } catch (error) {
    const failure = classify(error, host.getStderr());
    if (failure !== undefined) {
      return fail(failure);
    }
  }

  try {
    deadline.check();
    checkMemoryCeiling(memory, job.maxMemoryBytes);
  } catch (error) {
    const failure = classify(error, host.getStderr());
    if (failure !== undefined) {
      return fail(failure);
    }
  }

  const decoded = decodeOutput(job.contract, host.getStdout());
  if (!decoded.ok) {
    return fail(protocolViolation(decoded.error));
  }

  return {
    ok: true,
    response: decoded.value.response,
    kv: decoded.value.kv,
    stderr: host.getStderr(),
    elapsedMs: deadline.elapsedMs,
  };
}
