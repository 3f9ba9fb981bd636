import os from 'node:os';

import { InvalidOptionError } from '../common/errors.js';

/**
 * Sandbox runtime tuning options.
 */
export interface SandboxOptions {
  /**
   * Default execution deadline in milliseconds. A worker manifest may override it.
   */
  timeoutMs: number;
  /**
   * Default ceiling of a guest's linear memory in MB. A worker manifest may override it.
   */
  maxMemoryMb: number;
  /**
   * Largest stdout a guest may produce, in bytes.
   */
  maxOutputBytes: number;
  /**
   * Number of worker threads running sandboxes.
   */
  poolSize: number;
  /**
   * Maximum queued plus running executions.
   */
  maxInflight: number;
  /**
   * Soft heap threshold in MB. A worker thread crossing it is recycled once idle.
   */
  heapSoftLimitMb: number;
  /**
   * ! V8 old-generation limit per worker thread in MB.
   */
  maxOldGenerationSizeMb: number;
  /**
   * ! V8 young-generation limit per worker thread in MB.
   */
  maxYoungGenerationSizeMb: number;
  /**
   * Worker thread stack size in MB.
   */
  stackSizeMb: number;
}

function defaultPoolSize(): number {
  return Math.max(1, Math.min(4, os.availableParallelism()));
}

/**
 * Resolves sandbox options with defaults.
 */
export function resolveSandboxOptions(overrides: Partial<SandboxOptions> = {}): SandboxOptions {
  const options: SandboxOptions = {
    timeoutMs: overrides.timeoutMs ?? 3000,
    maxMemoryMb: overrides.maxMemoryMb ?? 128,
    maxOutputBytes: overrides.maxOutputBytes ?? 10 * 1024 * 1024,
    poolSize: overrides.poolSize ?? defaultPoolSize(),
    maxInflight: overrides.maxInflight ?? 64,
    heapSoftLimitMb: overrides.heapSoftLimitMb ?? 96,
    maxOldGenerationSizeMb: overrides.maxOldGenerationSizeMb ?? 128,
    maxYoungGenerationSizeMb: overrides.maxYoungGenerationSizeMb ?? 32,
    stackSizeMb: overrides.stackSizeMb ?? 4,
  };

  for (const [key, value] of Object.entries(options)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidOptionError(key, `expected a positive number, got ${String(value)}`);
    }
  }

  return options;
}

export function megabytes(mb: number): number {
  return Math.floor(mb * 1024 * 1024);
}
