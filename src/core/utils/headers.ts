import type { IncomingMessage, ServerResponse } from 'node:http';

import { logJsonl } from '../../common/logger.js';
import type { MultiValueMap } from '../../workers/types.js';

export function getRealIp(req: IncomingMessage): string {
  const forwardedFor = req.headersDistinct['x-forwarded-for'];
  if (forwardedFor) {
    const firstForwarded = forwardedFor[0]?.split(',')[0]?.trim();
    if (firstForwarded && firstForwarded.length > 0) {
      return firstForwarded;
    }
  }

  const realIp = req.headersDistinct['x-real-ip']?.[0].trim();
  if (realIp !== undefined) {
    return realIp;
  }

  return req.socket.remoteAddress ?? 'unknown';
}

/**
 * Request headers as lowercase names mapped to every value received.
 */
export function collectRequestHeaders(req: IncomingMessage): MultiValueMap {
  const headers: MultiValueMap = {};

  for (const [name, values] of Object.entries(req.headersDistinct)) {
    if (values !== undefined) {
      headers[name] = [...values];
    }
  }

  return headers;
}

/**
 * Copies worker headers onto the response. A header Node refuses (bad name or value) is dropped and
 * logged; the rest of the response still goes out.
 */
export function applyResponseHeaders(res: ServerResponse, headers: MultiValueMap, worker: string): void {
  for (const [name, values] of Object.entries(headers)) {
    if (values.length === 0) {
      continue;
    }

    try {
      res.setHeader(name, values.length === 1 ? values[0] : values);
    } catch (error) {
      logJsonl('WARN', 'worker_header_dropped', {
        worker,
        header: name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
