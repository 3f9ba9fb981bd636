import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import { MANIFEST_EXTENSION, WORKER_EXTENSION } from '../common/consts.js';
import type { LoadError, Result } from '../common/errors.js';
import { err, loadError, ok } from '../common/errors.js';
import { getErrorMessage } from '../common/logger.js';
import type { Capability } from './capabilities.js';
import { isSupportedContract } from './contract.js';
import type { Manifest } from './manifest.js';
import { ManifestSchema, defaultManifest } from './manifest.js';
import { megabytes } from './options.js';
import type { WorkerModule } from './types.js';
import { WASI_MODULE } from './wasi-host.js';

const WASM_MAGIC = [0x00, 0x61, 0x73, 0x6d];

/**
 * Loader options.
 */
export interface ModuleLoaderOptions {
  /**
   * Worker root; relative paths and default kv namespaces are computed from it.
   */
  root: string;
  /**
   * Capabilities a manifest may request.
   */
  allowedCapabilities: readonly Capability[];
  /**
   * Server-wide vars, overridden per worker by its manifest.
   */
  vars: Readonly<Record<string, string>>;
}

interface CompiledEntry {
  hash: string;
  engine: string;
  module: WebAssembly.Module;
}

/**
 * Checks the header of a candidate binary before handing it to the compiler.
 */
export function validateWasmBytes(bytes: Uint8Array): string | undefined {
  if (bytes.byteLength === 0) {
    return 'file is empty';
  }

  if (bytes.byteLength < 8) {
    return `file is too short to be a WebAssembly module (${String(bytes.byteLength)} bytes)`;
  }

  for (let i = 0; i < WASM_MAGIC.length; i++) {
    if (bytes[i] !== WASM_MAGIC[i]) {
      return 'missing WebAssembly magic header';
    }
  }

  return undefined;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function manifestPathOf(file: string): string {
  return file.slice(0, -WORKER_EXTENSION.length) + MANIFEST_EXTENSION;
}

function formatIssues(error: { issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }> }): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

/**
 * Turns worker files into compiled, validated modules.
 *
 * Compiled modules are cached by path, content hash and engine version, so an unchanged file is not
 * recompiled by later rebuilds. Concurrent loads of one path share a single promise.
 */
export class ModuleLoader {
  private readonly options: ModuleLoaderOptions;

  private readonly compiled = new Map<string, CompiledEntry>();

  private readonly inflight = new Map<string, Promise<Result<WorkerModule, LoadError>>>();

  constructor(options: ModuleLoaderOptions) {
    this.options = options;
  }

  /**
   * Number of compiled modules held in the cache.
   */
  get cacheSize(): number {
    return this.compiled.size;
  }

  load(file: string): Promise<Result<WorkerModule, LoadError>> {
    const absolute = path.resolve(file);
    const existing = this.inflight.get(absolute);
    if (existing !== undefined) {
      return existing;
    }

    const pending = this.loadUncached(absolute).finally(() => {
      this.inflight.delete(absolute);
    });

    this.inflight.set(absolute, pending);
    return pending;
  }

  /**
   * Drops cache entries of files that are no longer part of the tree.
   */
  prune(present: ReadonlySet<string>): void {
    for (const file of this.compiled.keys()) {
      if (!present.has(file)) {
        this.compiled.delete(file);
      }
    }
  }

  private async loadUncached(file: string): Promise<Result<WorkerModule, LoadError>> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(file);
    } catch (error) {
      return err(loadError('READ_FAILED', file, getErrorMessage(error)));
    }

    const invalid = validateWasmBytes(bytes);
    if (invalid !== undefined) {
      return err(loadError('INVALID_MODULE', file, invalid));
    }

    const compiled = await this.compile(file, bytes);
    if (!compiled.ok) {
      return compiled;
    }

    const manifest = await this.readManifest(file);
    if (!manifest.ok) {
      return manifest;
    }

    return this.validate(file, compiled.value, manifest.value);
  }

  private async compile(file: string, bytes: Uint8Array): Promise<Result<CompiledEntry, LoadError>> {
    const hash = createHash('sha256').update(bytes).digest('hex');
    const engine = process.versions.v8;

    const cached = this.compiled.get(file);
    if (cached !== undefined && cached.hash === hash && cached.engine === engine) {
      return ok(cached);
    }

    try {
      const entry: CompiledEntry = { hash, engine, module: await WebAssembly.compile(new Uint8Array(bytes)) };
      this.compiled.set(file, entry);
      return ok(entry);
    } catch (error) {
      this.compiled.delete(file);
      return err(loadError('INVALID_MODULE', file, `compilation failed: ${getErrorMessage(error)}`));
    }
  }

  private async readManifest(file: string): Promise<Result<Manifest, LoadError>> {
    const manifestPath = manifestPathOf(file);

    let text: string;
    try {
      text = await fs.readFile(manifestPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return ok(defaultManifest());
      }
      return err(loadError('READ_FAILED', file, `cannot read manifest: ${getErrorMessage(error)}`));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return err(loadError('INVALID_MANIFEST', file, `manifest is not valid JSON: ${getErrorMessage(error)}`));
    }

    const parsed = ManifestSchema.safeParse(raw);
    if (!parsed.success) {
      return err(loadError('INVALID_MANIFEST', file, formatIssues(parsed.error)));
    }

    return ok(parsed.data);
  }

  private validate(file: string, compiled: CompiledEntry, manifest: Manifest): Result<WorkerModule, LoadError> {
    const contract = manifest.contract;
    if (!isSupportedContract(contract)) {
      return err(loadError('UNSUPPORTED_CONTRACT', file, `contract version ${String(contract)} is not supported`));
    }

    const disallowed = manifest.capabilities.filter(
      (capability) => !this.options.allowedCapabilities.includes(capability),
    );
    if (disallowed.length > 0) {
      return err(loadError('DISALLOWED_CAPABILITY', file, `capabilities not allowed: ${disallowed.join(', ')}`));
    }

    const exports = WebAssembly.Module.exports(compiled.module);

    const entry = exports.find((descriptor) => descriptor.name === manifest.entrypoint);
    if (entry === undefined || entry.kind !== 'function') {
      return err(
        loadError('MISSING_ENTRY_POINT', file, `no exported function named ${manifest.entrypoint}`),
      );
    }

    if (!exports.some((descriptor) => descriptor.name === 'memory' && descriptor.kind === 'memory')) {
      return err(loadError('MISSING_MEMORY', file, 'module does not export its memory as "memory"'));
    }

    for (const descriptor of WebAssembly.Module.imports(compiled.module)) {
      if (descriptor.module !== WASI_MODULE || descriptor.kind !== 'function') {
        return err(
          loadError(
            'UNSUPPORTED_IMPORT',
            file,
            `unsupported import ${descriptor.module}.${descriptor.name} (${descriptor.kind})`,
          ),
        );
      }
    }

    const relativePath = path.relative(this.options.root, file).split(path.sep).join('/');

    const workerModule: WorkerModule = {
      file,
      relativePath,
      module: compiled.module,
      hash: compiled.hash,
      entryPoint: manifest.entrypoint,
      contract,
      methods: Object.freeze([...new Set(manifest.methods)]),
      capabilities: Object.freeze([...new Set(manifest.capabilities)]),
      vars: Object.freeze({ ...this.options.vars, ...manifest.vars }),
      kvNamespace: manifest.kv.namespace ?? relativePath,
      timeoutMs: manifest.timeoutMs,
      maxMemoryBytes: manifest.maxMemoryMb === undefined ? undefined : megabytes(manifest.maxMemoryMb),
    };

    return ok(Object.freeze(workerModule));
  }
}
