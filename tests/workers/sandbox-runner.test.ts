import { describe, expect, it } from 'vitest';

import type { Capability } from '@/workers/capabilities.js';
import type { protocol } from '@/workers/protocol.js';
import { runSandbox } from '@/workers/sandbox-runner.js';
import type { ContractVersion } from '@/workers/types.js';

import {
  compileFixture,
  echoModule,
  foreignImportModule,
  inspectModule,
  mainEntryModule,
  memoryHogModule,
  noMemoryModule,
  probeModule,
  silentModule,
  trapModule,
  writeModule,
  yieldLoopModule,
} from '../helpers/wasm-fixtures.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

interface JobOverrides {
  contract?: ContractVersion;
  capabilities?: Capability[];
  body?: string;
  timeoutMs?: number;
  maxMemoryBytes?: number;
  maxOutputBytes?: number;
  entryPoint?: string;
  kv?: Record<string, string>;
}

async function job(bytes: Uint8Array, overrides: JobOverrides = {}): Promise<protocol.Job> {
  return {
    module: await compileFixture(bytes),
    entryPoint: overrides.entryPoint ?? '_start',
    contract: overrides.contract ?? 1,
    capabilities: overrides.capabilities ?? [],
    request: {
      method: 'POST',
      url: '/users/7',
      path: '/users/7',
      query: {},
      headers: { 'content-type': ['text/plain'] },
      body: encoder.encode(overrides.body ?? 'hello'),
      params: { id: '7' },
      vars: { MODE: 'test' },
    },
    kv: overrides.kv ?? {},
    argv0: 'users/[id].wasm',
    startedAt: Date.now(),
    timeoutMs: overrides.timeoutMs ?? 2000,
    maxMemoryBytes: overrides.maxMemoryBytes ?? 16 * 1024 * 1024,
    maxOutputBytes: overrides.maxOutputBytes ?? 1024 * 1024,
  };
}

describe('sandbox runner', () => {
  it('echoes the request body through stdin and stdout', async () => {
    const outcome = await runSandbox(await job(echoModule(), { body: 'ping' }));

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.response.status).toBe(200);
      expect(decoder.decode(outcome.response.body)).toBe('ping');
      expect(outcome.response.headers).toEqual({ 'content-type': ['text/plain'] });
    }
  });

  it('echoes under contract v2 as well', async () => {
    const outcome = await runSandbox(await job(echoModule(), { contract: 2, body: 'binary?' }));

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(decoder.decode(outcome.response.body)).toBe('binary?');
    }
  });

  it('hands params, vars and kv to the guest', async () => {
    const outcome = await runSandbox(await job(inspectModule(), { kv: { visits: '2' } }));

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(decoder.decode(outcome.response.body)).toBe('inspected');
      expect(JSON.parse(outcome.stderr)).toMatchObject({
        url: '/users/7',
        method: 'POST',
        params: { id: '7' },
        vars: { MODE: 'test' },
        kv: { visits: '2' },
      });
    }
  });

  it('returns the kv namespace written by the guest', async () => {
    const outcome = await runSandbox(await job(writeModule({ stdout: '{"body":"ok","kv":{"visits":"3"}}' })));

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.kv).toEqual({ visits: '3' });
    }
  });

  it('treats proc_exit(0) as a normal return and keeps stderr', async () => {
    const outcome = await runSandbox(
      await job(writeModule({ stdout: '{"status":202,"body":"done"}', stderr: 'note', exitCode: 0 })),
    );

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.response.status).toBe(202);
      expect(outcome.stderr).toBe('note');
    }
  });

  it('reports a non-zero exit with stderr as a runtime trap', async () => {
    const outcome = await runSandbox(await job(writeModule({ stderr: 'boom\n', exitCode: 3 })));

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'RuntimeTrap', message: 'Worker exited with code 3: boom' },
      stderr: 'boom\n',
    });
  });

  it('reports a WebAssembly trap', async () => {
    const outcome = await runSandbox(await job(trapModule()));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe('RuntimeTrap');
      expect(outcome.failure.message).toMatch(/^WebAssembly trap: /);
    }
  });

  it('stops a guest that keeps calling the host past its deadline', async () => {
    const outcome = await runSandbox(await job(yieldLoopModule(), { timeoutMs: 50 }));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe('Timeout');
      expect(outcome.elapsedMs).toBeGreaterThan(50);
    }
  });

  it('fails a guest whose linear memory outgrew the ceiling', async () => {
    const outcome = await runSandbox(await job(memoryHogModule(64), { maxMemoryBytes: 1024 * 1024 }));

    expect(outcome).toMatchObject({
      ok: false,
      failure: {
        kind: 'ResourceExceeded',
        message: 'Linear memory 4259840 bytes exceeds limit 1048576 bytes',
      },
    });
  });

  it('fails a guest that writes more than maxOutputBytes', async () => {
    const outcome = await runSandbox(await job(writeModule({ stdout: 'x'.repeat(64) }), { maxOutputBytes: 10 }));

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'ResourceExceeded', message: 'Worker output exceeds 10 bytes' },
    });
  });

  it('reports empty output as a protocol violation', async () => {
    const outcome = await runSandbox(await job(silentModule()));

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'ProtocolViolation', message: 'worker produced no output' },
    });
  });

  const probes: Array<['random' | 'clock', Capability[], string]> = [
    ['random', [], 'denied'],
    ['random', ['random'], 'granted'],
    ['clock', [], 'denied'],
    ['clock', ['clock'], 'granted'],
  ];

  it.each(probes)('gates %s behind its capability (granted: %j)', async (probe, capabilities, expected) => {
    const outcome = await runSandbox(await job(probeModule(probe), { capabilities }));

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(decoder.decode(outcome.response.body)).toBe(expected);
    }
  });

  it('requires an exported memory', async () => {
    const outcome = await runSandbox(await job(noMemoryModule()));

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'RuntimeTrap', message: 'Worker does not export its memory' },
    });
  });

  it('requires the entry point to be an exported function', async () => {
    const outcome = await runSandbox(await job(mainEntryModule()));

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'RuntimeTrap', message: 'Entry point _start is not an exported function' },
    });
  });

  it('runs a custom entry point', async () => {
    const outcome = await runSandbox(await job(mainEntryModule(), { entryPoint: 'main' }));

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'ProtocolViolation', message: 'worker produced no output' },
    });
  });

  it('fails instantiation when an import cannot be satisfied', async () => {
    const outcome = await runSandbox(await job(foreignImportModule()));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe('RuntimeTrap');
      expect(outcome.failure.message).toMatch(/^Instantiation failed: /);
    }
  });
});
