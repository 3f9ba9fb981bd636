import type http from 'node:http';

import { DUMMY_BASE_URL } from '../../common/consts.js';
import { PayloadTooLargeError } from '../../common/errors.js';
import type { ParsedRequestTarget } from '../../types/server.js';
import type { MultiValueMap } from '../../workers/types.js';

export function parseQuery(searchParams: URLSearchParams): MultiValueMap {
  const query: MultiValueMap = {};

  for (const [key, value] of searchParams.entries()) {
    const existing = query[key];

    if (existing === undefined) {
      query[key] = [value];
      continue;
    }

    existing.push(value);
  }

  return query;
}

export function parseRequestTarget(rawUrl: string | undefined): ParsedRequestTarget {
  if (rawUrl === undefined) {
    return {
      path: '(unknown)',
      query: {},
    };
  }

  try {
    const parsedUrl = new URL(rawUrl, DUMMY_BASE_URL);

    return {
      path: parsedUrl.pathname,
      query: parseQuery(parsedUrl.searchParams),
    };
  } catch {
    return {
      path: rawUrl,
      query: {},
    };
  }
}

/**
 * Reads the whole request body, failing fast once it grows past `maxBytes`.
 */
export async function readRequestBody(req: http.IncomingMessage, maxBytes: number): Promise<Buffer> {
  const declared = Number.parseInt(req.headers['content-length'] ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    throw new PayloadTooLargeError(maxBytes);
  }

  const chunks: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const bufferChunk = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += bufferChunk.length;

    if (totalBytes > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }

    chunks.push(bufferChunk);
  }

  return Buffer.concat(chunks);
}
