import path from 'node:path';

import { InvalidOptionError } from '../common/errors.js';

import type { ResolvedServerOptions, WorkersServerOptions } from '../types/server.js';
import { CAPABILITIES, isCapability } from '../workers/capabilities.js';
import { resolveSandboxOptions } from '../workers/options.js';
import { CONFLICT_POLICIES } from './route-builder.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8080;
export const DEFAULT_MAX_REQUEST_BYTES = 10 * 1024 * 1024;

/**
 * Applies defaults and validates server options. Throws `InvalidOptionError` naming the first invalid option.
 */
export function resolveServerOptions(options: WorkersServerOptions): ResolvedServerOptions {
  if (typeof options.dir !== 'string' || options.dir.trim() === '') {
    throw new InvalidOptionError('dir', 'expected a non-empty path');
  }

  const host = options.host ?? DEFAULT_HOST;
  if (host.trim() === '') {
    throw new InvalidOptionError('host', 'expected a non-empty host name');
  }

  const port = options.port ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidOptionError('port', `expected an integer between 0 and 65535, got ${String(port)}`);
  }

  const maxRequestBytes = options.maxRequestBytes ?? DEFAULT_MAX_REQUEST_BYTES;
  if (!Number.isInteger(maxRequestBytes) || maxRequestBytes <= 0) {
    throw new InvalidOptionError('maxRequestBytes', `expected a positive integer, got ${String(maxRequestBytes)}`);
  }

  const conflictPolicy = options.conflictPolicy ?? 'error';
  if (!CONFLICT_POLICIES.includes(conflictPolicy)) {
    throw new InvalidOptionError('conflictPolicy', `expected one of ${CONFLICT_POLICIES.join(', ')}`);
  }

  const allowedCapabilities = options.allowedCapabilities ?? CAPABILITIES;
  for (const capability of allowedCapabilities) {
    if (!isCapability(capability)) {
      throw new InvalidOptionError('capability', `unknown capability ${String(capability)}`);
    }
  }

  const watchDebounceMs = options.watchDebounceMs ?? 80;
  if (!Number.isFinite(watchDebounceMs) || watchDebounceMs < 0) {
    throw new InvalidOptionError('watchDebounceMs', `expected a non-negative number, got ${String(watchDebounceMs)}`);
  }

  return {
    dir: path.resolve(options.dir),
    host,
    port,
    watch: options.watch ?? true,
    meta: options.meta ?? true,
    maxRequestBytes,
    conflictPolicy,
    allowedCapabilities: Object.freeze([...new Set(allowedCapabilities)]),
    vars: Object.freeze({ ...options.vars }),
    sandbox: resolveSandboxOptions(options.sandbox),
    watchDebounceMs,
  };
}
