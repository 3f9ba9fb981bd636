import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';
import { z } from 'zod';

import { InvalidOptionError } from './common/errors.js';
import { DEFAULT_HOST, DEFAULT_PORT } from './core/server-options.js';
import type { WorkersServerOptions } from './types/server.js';
import { CAPABILITIES } from './workers/capabilities.js';

/**
 * Invalid command line input. The message is meant for the terminal.
 */
export class CliOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliOptionsError';
  }
}

const PackageJsonSchema = z.object({ version: z.string() });

const CliOptionsSchema = z.object({
  host: z.string().min(1, 'host must not be empty'),
  port: z.coerce.number().int().min(0).max(65535),
  watch: z.boolean(),
  meta: z.boolean(),
  timeout: z.coerce.number().int().positive().optional(),
  maxMemory: z.coerce.number().int().positive().optional(),
  poolSize: z.coerce.number().int().positive().optional(),
  maxRequestBytes: z.coerce.number().int().positive().optional(),
  allow: z.array(z.enum(CAPABILITIES)).optional(),
  var: z.array(z.string().regex(/^[^=]+=/, 'vars take the form KEY=VALUE')).default([]),
  conflictPolicy: z.enum(['error', 'first-wins']),
});

function getVersion(): string {
  // same relative location from src/ under tsx and from dist/ once built
  const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'package.json');

  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parseVars(entries: readonly string[]): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const entry of entries) {
    const separator = entry.indexOf('=');
    vars[entry.slice(0, separator)] = entry.slice(separator + 1);
  }

  return vars;
}

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name('wasm-workers')
    .description('Serve HTTP requests with sandboxed WebAssembly workers discovered from a directory tree')
    .version(getVersion())
    .argument('[root]', 'worker root directory', '.')
    .option('--host <host>', 'interface to listen on (env HOST)', env.HOST ?? DEFAULT_HOST)
    .option('--port <port>', 'port to listen on, 0 for any free port (env PORT)', env.PORT ?? String(DEFAULT_PORT))
    .option('--no-watch', 'do not rebuild routes when the tree changes')
    .option('--no-meta', 'disable the /_workers meta api')
    .option('--timeout <ms>', 'default execution deadline per request')
    .option('--max-memory <mb>', 'default linear memory ceiling per worker')
    .option('--pool-size <n>', 'number of sandbox worker threads')
    .option('--max-request-bytes <n>', 'largest request body accepted')
    .option('--allow <capability...>', `capabilities manifests may request (${CAPABILITIES.join(', ')})`)
    .option('--var <KEY=VALUE...>', 'server-wide var handed to every worker')
    .option('--conflict-policy <policy>', 'how to handle two workers on one route (error, first-wins)', 'error');
}

/**
 * Parses user arguments (without the node binary and script) into server options.
 */
export function parseCliOptions(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): WorkersServerOptions {
  const program = createProgram(env).exitOverride();
  program.parse([...argv], { from: 'user' });

  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw new CliOptionsError(`Invalid options: ${issues.join('; ')}`);
  }

  const cli = parsed.data;
  const root = program.processedArgs[0];

  return {
    dir: typeof root === 'string' ? root : '.',
    host: cli.host,
    port: cli.port,
    watch: cli.watch,
    meta: cli.meta,
    maxRequestBytes: cli.maxRequestBytes,
    conflictPolicy: cli.conflictPolicy,
    allowedCapabilities: cli.allow,
    vars: parseVars(cli.var),
    sandbox: {
      timeoutMs: cli.timeout,
      maxMemoryMb: cli.maxMemory,
      poolSize: cli.poolSize,
    },
  };
}

/**
 * Errors caused by what the user passed, reported without a stack and with exit code 2.
 */
export function isUsageError(error: unknown): error is CliOptionsError | InvalidOptionError {
  return error instanceof CliOptionsError || error instanceof InvalidOptionError;
}
