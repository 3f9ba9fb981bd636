/**
 * WASI preview 1 host for a single sandbox instance.
 *
 * Only stdio, args, environment, clocks and randomness are backed. Every other WASI function the guest
 * imports answers ENOSYS, and the filesystem answers ENOTCAPABLE: workers get no preopened directories.
 */

import { randomFillSync } from 'node:crypto';

import type { Capability } from './capabilities.js';
import { ResourceSignal } from './limits.js';

export const WASI_MODULE = 'wasi_snapshot_preview1';

const ERRNO_SUCCESS = 0;
const ERRNO_BADF = 8;
const ERRNO_INVAL = 28;
const ERRNO_NOSYS = 52;
const ERRNO_SPIPE = 70;
const ERRNO_NOTCAPABLE = 76;

const CLOCK_REALTIME = 0;
const CLOCK_MONOTONIC = 1;
const CLOCK_PROCESS_CPUTIME = 2;
const CLOCK_THREAD_CPUTIME = 3;

const FILETYPE_CHARACTER_DEVICE = 2;
const FDFLAGS_APPEND = 1;

const STDIN = 0;
const STDOUT = 1;
const STDERR = 2;

const MAX_STDERR_BYTES = 64 * 1024;

/**
 * Thrown by `proc_exit`; unwinds the guest with its exit code.
 */
export class WasiExit extends Error {
  readonly code: number;

  constructor(code: number) {
    super(`WASI exit: ${String(code)}`);
    this.name = 'WasiExit';
    this.code = code;
  }
}

export interface WasiHostOptions {
  stdin: Uint8Array;
  args: readonly string[];
  /** Environment visible to the guest. Callers pass an empty map unless `env` is granted. */
  env: Readonly<Record<string, string>>;
  capabilities: readonly Capability[];
  maxOutputBytes: number;
  /** Runs before every host call; throws to abort the guest. */
  guard: () => void;
}

type HostFunction = (...args: never[]) => number | undefined;

const encoder = new TextEncoder();

function toCStrings(values: readonly string[]): Uint8Array[] {
  return values.map((value) => encoder.encode(`${value}\0`));
}

export class WasiHost {
  private readonly stdin: Uint8Array;
  private stdinCursor = 0;
  private readonly stdoutChunks: Uint8Array[] = [];
  private stdoutBytes = 0;
  private readonly stderrChunks: Uint8Array[] = [];
  private stderrBytes = 0;
  private readonly args: Uint8Array[];
  private readonly environ: Uint8Array[];
  private readonly granted: ReadonlySet<Capability>;
  private memory: WebAssembly.Memory | undefined;

  constructor(private readonly options: WasiHostOptions) {
    this.stdin = options.stdin;
    this.args = toCStrings(options.args);
    this.environ = toCStrings(Object.entries(options.env).map(([key, value]) => `${key}=${value}`));
    this.granted = new Set(options.capabilities);
  }

  /**
   * Binds the instance's exported memory. Must happen before the entry point runs.
   */
  attach(memory: WebAssembly.Memory): void {
    this.memory = memory;
  }

  getStdout(): Uint8Array {
    return Buffer.concat(this.stdoutChunks);
  }

  getStderr(): string {
    return Buffer.concat(this.stderrChunks).toString('utf8');
  }

  /**
   * Import object for `module`: backed functions where available, ENOSYS stubs for the rest of the WASI
   * functions the module imports.
   */
  getImports(module: WebAssembly.Module): WebAssembly.Imports {
    const implemented = this.createFunctions();
    const wasi: Record<string, WebAssembly.ImportValue> = {};

    for (const descriptor of WebAssembly.Module.imports(module)) {
      if (descriptor.module !== WASI_MODULE || descriptor.kind !== 'function') {
        continue;
      }

      wasi[descriptor.name] =
        implemented[descriptor.name] ??
        ((): number => {
          this.options.guard();
          return ERRNO_NOSYS;
        });
    }

    return { [WASI_MODULE]: wasi };
  }

  private view(): DataView {
    if (this.memory === undefined) {
      throw new Error('WASI host used before memory was attached');
    }

    return new DataView(this.memory.buffer);
  }

  private bytes(pointer: number, length: number): Uint8Array {
    if (this.memory === undefined) {
      throw new Error('WASI host used before memory was attached');
    }

    return new Uint8Array(this.memory.buffer, pointer, length);
  }

  private writeStrings(values: readonly Uint8Array[], pointersPtr: number, bufferPtr: number): number {
    const view = this.view();
    let cursor = bufferPtr;

    for (let i = 0; i < values.length; i++) {
      view.setUint32(pointersPtr + i * 4, cursor, true);
      this.bytes(cursor, values[i].byteLength).set(values[i]);
      cursor += values[i].byteLength;
    }

    return ERRNO_SUCCESS;
  }

  private writeSizes(values: readonly Uint8Array[], countPtr: number, sizePtr: number): number {
    const view = this.view();
    view.setUint32(countPtr, values.length, true);
    view.setUint32(
      sizePtr,
      values.reduce((total, value) => total + value.byteLength, 0),
      true,
    );
    return ERRNO_SUCCESS;
  }

  private readStdin(iovsPtr: number, iovsLen: number, nreadPtr: number): number {
    const view = this.view();
    let totalRead = 0;

    for (let i = 0; i < iovsLen; i++) {
      // iovec: [pointer u32, length u32]
      const bufPtr = view.getUint32(iovsPtr + i * 8, true);
      const bufLen = view.getUint32(iovsPtr + i * 8 + 4, true);
      const count = Math.min(bufLen, this.stdin.byteLength - this.stdinCursor);

      if (count <= 0) {
        break;
      }

      this.bytes(bufPtr, count).set(this.stdin.subarray(this.stdinCursor, this.stdinCursor + count));
      this.stdinCursor += count;
      totalRead += count;
    }

    view.setUint32(nreadPtr, totalRead, true);
    return ERRNO_SUCCESS;
  }

  private writeOutput(fd: number, iovsPtr: number, iovsLen: number, nwrittenPtr: number): number {
    const view = this.view();
    let totalWritten = 0;

    for (let i = 0; i < iovsLen; i++) {
      const bufPtr = view.getUint32(iovsPtr + i * 8, true);
      const bufLen = view.getUint32(iovsPtr + i * 8 + 4, true);
      // copy: the guest may reuse or grow the buffer afterwards
      const chunk = this.bytes(bufPtr, bufLen).slice();

      if (fd === STDOUT) {
        this.stdoutBytes += chunk.byteLength;
        if (this.stdoutBytes > this.options.maxOutputBytes) {
          throw new ResourceSignal(`Worker output exceeds ${String(this.options.maxOutputBytes)} bytes`);
        }
        this.stdoutChunks.push(chunk);
      } else if (this.stderrBytes < MAX_STDERR_BYTES) {
        const kept = chunk.subarray(0, MAX_STDERR_BYTES - this.stderrBytes);
        this.stderrBytes += kept.byteLength;
        this.stderrChunks.push(kept);
      }

      totalWritten += bufLen;
    }

    view.setUint32(nwrittenPtr, totalWritten, true);
    return ERRNO_SUCCESS;
  }

  private isStdio(fd: number): boolean {
    return fd === STDIN || fd === STDOUT || fd === STDERR;
  }

  private createFunctions(): Record<string, HostFunction> {
    const guard = this.options.guard;

    return {
      proc_exit: (code: number): undefined => {
        throw new WasiExit(code);
      },

      args_sizes_get: (countPtr: number, sizePtr: number): number => {
        guard();
        return this.writeSizes(this.args, countPtr, sizePtr);
      },
      args_get: (argvPtr: number, bufferPtr: number): number => {
        guard();
        return this.writeStrings(this.args, argvPtr, bufferPtr);
      },

      environ_sizes_get: (countPtr: number, sizePtr: number): number => {
        guard();
        return this.writeSizes(this.granted.has('env') ? this.environ : [], countPtr, sizePtr);
      },
      environ_get: (environPtr: number, bufferPtr: number): number => {
        guard();
        return this.writeStrings(this.granted.has('env') ? this.environ : [], environPtr, bufferPtr);
      },

      clock_res_get: (clockId: number, resolutionPtr: number): number => {
        guard();
        if (!this.granted.has('clock')) {
          return ERRNO_NOTCAPABLE;
        }
        if (clockId < CLOCK_REALTIME || clockId > CLOCK_THREAD_CPUTIME) {
          return ERRNO_INVAL;
        }

        this.view().setBigUint64(resolutionPtr, clockId === CLOCK_REALTIME ? 1_000_000n : 1_000n, true);
        return ERRNO_SUCCESS;
      },
      clock_time_get: (clockId: number, _precision: bigint, timePtr: number): number => {
        guard();
        if (!this.granted.has('clock')) {
          return ERRNO_NOTCAPABLE;
        }

        let nanoseconds: bigint;
        if (clockId === CLOCK_REALTIME) {
          nanoseconds = BigInt(Date.now()) * 1_000_000n;
        } else if (
          clockId === CLOCK_MONOTONIC ||
          clockId === CLOCK_PROCESS_CPUTIME ||
          clockId === CLOCK_THREAD_CPUTIME
        ) {
          nanoseconds = process.hrtime.bigint();
        } else {
          return ERRNO_INVAL;
        }

        this.view().setBigUint64(timePtr, nanoseconds, true);
        return ERRNO_SUCCESS;
      },

      random_get: (bufferPtr: number, length: number): number => {
        guard();
        if (!this.granted.has('random')) {
          return ERRNO_NOTCAPABLE;
        }

        randomFillSync(this.bytes(bufferPtr, length));
        return ERRNO_SUCCESS;
      },

      fd_read: (fd: number, iovsPtr: number, iovsLen: number, nreadPtr: number): number => {
        guard();
        if (fd !== STDIN) {
          return ERRNO_BADF;
        }
        return this.readStdin(iovsPtr, iovsLen, nreadPtr);
      },
      fd_write: (fd: number, iovsPtr: number, iovsLen: number, nwrittenPtr: number): number => {
        guard();
        if (fd !== STDOUT && fd !== STDERR) {
          return ERRNO_BADF;
        }
        return this.writeOutput(fd, iovsPtr, iovsLen, nwrittenPtr);
      },
      fd_fdstat_get: (fd: number, statPtr: number): number => {
        guard();
        if (!this.isStdio(fd)) {
          return ERRNO_BADF;
        }

        // fdstat: filetype u8, flags u16 at +2, rights_base u64 at +8, rights_inheriting u64 at +16
        const view = this.view();
        view.setUint8(statPtr, FILETYPE_CHARACTER_DEVICE);
        view.setUint16(statPtr + 2, fd === STDIN ? 0 : FDFLAGS_APPEND, true);
        view.setBigUint64(statPtr + 8, 0xffff_ffffn, true);
        view.setBigUint64(statPtr + 16, 0n, true);
        return ERRNO_SUCCESS;
      },
      fd_close: (fd: number): number => {
        guard();
        return this.isStdio(fd) ? ERRNO_SUCCESS : ERRNO_BADF;
      },
      fd_seek: (fd: number): number => {
        guard();
        return this.isStdio(fd) ? ERRNO_SPIPE : ERRNO_BADF;
      },
      fd_prestat_get: (): number => {
        guard();
        return ERRNO_BADF;
      },
      fd_prestat_dir_name: (): number => {
        guard();
        return ERRNO_BADF;
      },
      path_open: (): number => {
        guard();
        return ERRNO_NOTCAPABLE;
      },
      sched_yield: (): number => {
        guard();
        return ERRNO_SUCCESS;
      },
    };
  }
}
