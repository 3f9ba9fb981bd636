import http from 'node:http';

import { HttpCode, META_PREFIX } from '../common/consts.js';
import type { KvStore } from '../workers/kv-store.js';
import type { SandboxPool } from '../workers/sandbox-pool.js';
import type { RouteSupervisor } from './supervisor.js';
import { sendJson } from './utils/send-json.js';

const ROUTES_PATH = META_PREFIX + '/routes';
const HEALTHZ_PATH = META_PREFIX + '/healthz';
const RUNTIME_PATH = META_PREFIX + '/runtime';

interface CreateMetaApiOptions {
  supervisor: RouteSupervisor;
  pool: SandboxPool;
  kv: KvStore;
  getCompiledModules: () => number;
}

interface MetaApi {
  /**
   * Answers requests under the meta prefix. Returns `false` for anything else.
   */
  handleRequest: (req: http.IncomingMessage, res: http.ServerResponse, pathname: string) => boolean;
}

export function createMetaApi(options: CreateMetaApiOptions): MetaApi {
  const handlers = new Map<string, () => unknown>([
    [
      ROUTES_PATH,
      () => {
        const table = options.supervisor.table;
        return {
          generation: table.generation,
          builtAt: table.builtAt,
          routes: table.describe(),
        };
      },
    ],
    [
      HEALTHZ_PATH,
      () => ({
        ok: true,
        now: Date.now(),
        generation: options.supervisor.table.generation,
      }),
    ],
    [
      RUNTIME_PATH,
      () => ({
        supervisor: options.supervisor.getStatus(),
        pool: options.pool.getSnapshot(),
        kv: options.kv.describe(),
        compiledModules: options.getCompiledModules(),
      }),
    ],
  ]);

  const handleRequest = (req: http.IncomingMessage, res: http.ServerResponse, pathname: string): boolean => {
    const handler = handlers.get(pathname.endsWith('/') ? pathname.slice(0, -1) : pathname);
    if (handler === undefined) {
      return false;
    }

    const method = req.method ?? 'GET';
    if (method !== 'GET' && method !== 'HEAD') {
      sendJson(res, { message: 'Method not allowed', method, path: pathname }, HttpCode.MethodNotAllowed, {
        Allow: 'GET, HEAD',
      });
      return true;
    }

    sendJson(res, handler());
    return true;
  };

  return {
    handleRequest,
  };
}
