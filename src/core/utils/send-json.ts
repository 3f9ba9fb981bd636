import type { ServerResponse } from 'node:http';

import { HttpCode } from '../../common/consts.js';

export type ExtraHeaders = Readonly<Record<string, string>>;

/**
 * Writes a JSON response. A HEAD request gets the headers only.
 */
export function sendJson(
  res: ServerResponse,
  payload: unknown,
  statusCode: HttpCode = HttpCode.Ok,
  headers: ExtraHeaders = {},
): void {
  const body = JSON.stringify(payload);

  res.statusCode = statusCode;
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.setHeader('Content-Length', Buffer.byteLength(body));
  res.end(res.req.method === 'HEAD' ? undefined : body);
}

/**
 * `sendJson` for error paths: a response already under way is ended as it stands.
 */
export function safeSendJson(
  res: ServerResponse,
  payload: unknown,
  statusCode: HttpCode = HttpCode.Ok,
  headers: ExtraHeaders = {},
): void {
  if (res.writableEnded) {
    return;
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  sendJson(res, payload, statusCode, headers);
}
