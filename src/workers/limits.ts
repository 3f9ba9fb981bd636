/**
 * Signals thrown from host calls to unwind a running guest. The sandbox runner catches them and turns
 * them into execution failures; they never leave the worker thread.
 */

export class TimeoutSignal extends Error {
  readonly elapsedMs: number;
  readonly limitMs: number;

  constructor(elapsedMs: number, limitMs: number) {
    super(`Timeout: elapsed ${String(elapsedMs)}ms exceeds limit ${String(limitMs)}ms`);
    this.name = 'TimeoutSignal';
    this.elapsedMs = elapsedMs;
    this.limitMs = limitMs;
  }
}

export class ResourceSignal extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceSignal';
  }
}

/** A function that returns the current time in milliseconds since the epoch. */
export type ClockFn = () => number;

export interface Deadline {
  readonly limitMs: number;
  readonly elapsedMs: number;
  /** Throws TimeoutSignal once the deadline has passed. */
  check(): void;
}

/**
 * Deadline anchored at `startedAt`. Both ends use the epoch clock so the main thread and the worker
 * thread agree on it.
 */
export function createDeadline(startedAt: number, limitMs: number, clock: ClockFn = Date.now): Deadline {
  return {
    limitMs,
    get elapsedMs(): number {
      return clock() - startedAt;
    },
    check(): void {
      const elapsed = clock() - startedAt;
      if (elapsed > limitMs) {
        throw new TimeoutSignal(elapsed, limitMs);
      }
    },
  };
}

/**
 * Throws ResourceSignal when a guest's linear memory grew past `limitBytes`.
 */
export function checkMemoryCeiling(memory: WebAssembly.Memory | undefined, limitBytes: number): void {
  if (memory === undefined) {
    return;
  }

  const usedBytes = memory.buffer.byteLength;
  if (usedBytes > limitBytes) {
    throw new ResourceSignal(
      `Linear memory ${String(usedBytes)} bytes exceeds limit ${String(limitBytes)} bytes`,
    );
  }
}
