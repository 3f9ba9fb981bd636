export const DUMMY_BASE_URL = 'http://workers.local';
export const META_PREFIX = '/_workers';

export const WORKER_EXTENSION = '.wasm';
export const MANIFEST_EXTENSION = '.json';
export const INDEX_SEGMENT = 'index';

/**
 * Methods a worker may be restricted to. An empty method list in a manifest means all of them.
 */
export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(method: string): method is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(method);
}

export const enum HttpCode {
  Ok = 200,
  BadRequest = 400,
  NotFound = 404,
  MethodNotAllowed = 405,
  PayloadTooLarge = 413,
  InternalServerError = 500,
  ServiceUnavailable = 503,
  GatewayTimeout = 504,
  InsufficientStorage = 507,
}
