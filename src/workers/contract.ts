/**
 * Host/guest contract: the JSON document a worker reads from stdin and the one it writes to stdout.
 *
 * Version 1 is the flat shape: single-valued headers and a UTF-8 body. Version 2 carries multi-valued
 * headers, query parameters and base64 bodies.
 */

import { z } from 'zod';

import type { Result } from '../common/errors.js';
import { err, ok } from '../common/errors.js';
import type { ContractVersion, ExecutionRequest, ExecutionResponse, MultiValueMap } from './types.js';

export const CONTRACT_VERSIONS = [1, 2] as const satisfies readonly ContractVersion[];

export function isSupportedContract(version: number): version is ContractVersion {
  return (CONTRACT_VERSIONS as readonly number[]).includes(version);
}

/**
 * Headers a worker is not allowed to set: the host owns connection management and framing.
 */
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'transfer-encoding',
  'upgrade',
  'te',
  'trailer',
  'content-length',
]);

function isForbiddenResponseHeader(name: string): boolean {
  return HOP_BY_HOP_HEADERS.has(name) || name.startsWith('proxy-');
}

const KvSchema = z.record(z.string(), z.string());

const Base64Schema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'body must be base64');

const OutputV1Schema = z.object({
  status: z.number().int().min(100).max(599).default(200),
  headers: z.record(z.string(), z.string()).default({}),
  body: z.string().default(''),
  base64: z.boolean().default(false),
  kv: KvSchema.optional(),
});

const OutputV2Schema = z.object({
  status: z.number().int().min(100).max(599).default(200),
  headers: z.record(z.string(), z.union([z.string(), z.array(z.string())])).default({}),
  body: Base64Schema.default(''),
  kv: KvSchema.optional(),
});

/**
 * Decoded guest output.
 */
export interface ContractOutput {
  response: ExecutionResponse;
  /**
   * New state of the worker's key/value namespace, when the guest returned one.
   */
  kv?: Record<string, string>;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function flattenHeaders(headers: MultiValueMap): Record<string, string> {
  const flat: Record<string, string> = {};

  for (const [name, values] of Object.entries(headers)) {
    flat[name] = values.join(', ');
  }

  return flat;
}

function normalizeResponseHeaders(headers: Record<string, string | string[]>): MultiValueMap {
  const normalized: MultiValueMap = {};

  for (const [rawName, value] of Object.entries(headers)) {
    const name = rawName.toLowerCase();
    if (isForbiddenResponseHeader(name)) {
      continue;
    }

    const values = Array.isArray(value) ? value : [value];
    normalized[name] = [...(normalized[name] ?? []), ...values];
  }

  return normalized;
}

/**
 * Serializes a request into the stdin document of the given contract version.
 */
export function encodeInput(
  version: ContractVersion,
  request: ExecutionRequest,
  kv: Readonly<Record<string, string>>,
): Uint8Array {
  if (version === 1) {
    return encoder.encode(
      JSON.stringify({
        url: request.url,
        method: request.method,
        headers: flattenHeaders(request.headers),
        body: decoder.decode(request.body),
        kv,
        params: request.params,
        vars: request.vars,
      }),
    );
  }

  return encoder.encode(
    JSON.stringify({
      version: 2,
      url: request.url,
      method: request.method,
      path: request.path,
      query: request.query,
      headers: request.headers,
      body: Buffer.from(request.body).toString('base64'),
      params: request.params,
      vars: request.vars,
      kv,
    }),
  );
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

/**
 * Parses the stdout of a guest. Empty, non-JSON or malformed output is reported as an error message.
 */
export function decodeOutput(version: ContractVersion, stdout: Uint8Array): Result<ContractOutput, string> {
  if (stdout.byteLength === 0) {
    return err('worker produced no output');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(stdout));
  } catch (error) {
    return err(`worker output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (version === 1) {
    const parsed = OutputV1Schema.safeParse(raw);
    if (!parsed.success) {
      return err(`worker output does not match contract v1: ${formatIssues(parsed.error)}`);
    }

    const output = parsed.data;
    return ok({
      response: {
        status: output.status,
        headers: normalizeResponseHeaders(output.headers),
        body: output.base64 ? Buffer.from(output.body, 'base64') : encoder.encode(output.body),
      },
      kv: output.kv,
    });
  }

  const parsed = OutputV2Schema.safeParse(raw);
  if (!parsed.success) {
    return err(`worker output does not match contract v2: ${formatIssues(parsed.error)}`);
  }

  const output = parsed.data;
  return ok({
    response: {
      status: output.status,
      headers: normalizeResponseHeaders(output.headers),
      body: Buffer.from(output.body, 'base64'),
    },
    kv: output.kv,
  });
}
