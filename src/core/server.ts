import { once } from 'node:events';
import http from 'node:http';

import type { ExecutionFailureKind } from '../common/errors.js';
import { BuildFailedError, PayloadTooLargeError, PoolOverloadedError } from '../common/errors.js';
import { HttpCode } from '../common/consts.js';
import { errorFields, getErrorMessage, log, logJsonl } from '../common/logger.js';
import type { ParsedRequestTarget, ResolvedServerOptions, WorkersServerOptions } from '../types/server.js';
import { Executor } from '../workers/executor.js';
import { KvStore } from '../workers/kv-store.js';
import { ModuleLoader } from '../workers/module-loader.js';
import type { SandboxPool } from '../workers/sandbox-pool.js';
import { createSandboxPool } from '../workers/sandbox-pool.js';
import type { ExecutionRequest, ExecutionResult } from '../workers/types.js';

import { createMetaApi } from './meta-api.js';
import type { RouteTable } from './route-table.js';
import { matchRoute } from './router.js';
import { resolveServerOptions } from './server-options.js';
import { RouteSupervisor } from './supervisor.js';
import { applyResponseHeaders, collectRequestHeaders, getRealIp } from './utils/headers.js';
import { parseRequestTarget, readRequestBody } from './utils/request.js';
import { safeSendJson } from './utils/send-json.js';

export interface WorkersServer {
  readonly server: http.Server;
  /**
   * Base url of the listening socket, with the port actually bound.
   */
  readonly url: string;
  readonly options: ResolvedServerOptions;
  readonly supervisor: RouteSupervisor;
  readonly pool: SandboxPool;
  /**
   * Stops the watcher, the HTTP server and the sandbox pool.
   */
  close(): Promise<void>;
}

export function statusForFailure(kind: ExecutionFailureKind): HttpCode {
  switch (kind) {
    case 'Timeout':
      return HttpCode.GatewayTimeout;
    case 'ResourceExceeded':
      return HttpCode.InsufficientStorage;
    case 'RuntimeTrap':
    case 'ProtocolViolation':
      return HttpCode.InternalServerError;
  }
}

/**
 * Prints the routes of a table, one line each.
 */
export function printRoutes(table: RouteTable): void {
  if (table.size === 0) {
    log('INFO', 'Loaded route(s): none');
    return;
  }

  for (const route of table.describe()) {
    const methods = route.methods.length === 0 ? '*' : route.methods.join(',');
    log('INFO', `Loaded route: ${route.pattern} [${methods}] (${route.file})`);
  }
}

async function closeHttpServer(server: http.Server): Promise<void> {
  if (!server.listening) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error !== undefined) {
        reject(error);
        return;
      }

      resolve();
    });
    server.closeIdleConnections();
  });
}

/**
 * Builds the initial route table, then listens. Rejects with `BuildFailedError` when the first build fails
 * and with `InvalidOptionError` on invalid options.
 */
export async function startServer(input: WorkersServerOptions): Promise<WorkersServer> {
  const options = resolveServerOptions(input);

  const loader = new ModuleLoader({
    root: options.dir,
    allowedCapabilities: options.allowedCapabilities,
    vars: options.vars,
  });

  const supervisor = new RouteSupervisor({
    root: options.dir,
    loader,
    conflictPolicy: options.conflictPolicy,
    watch: options.watch,
    debounceMs: options.watchDebounceMs,
  });

  const initial = await supervisor.start();
  if (!initial.ok) {
    await supervisor.close();
    throw new BuildFailedError(initial.error);
  }

  printRoutes(initial.value);

  const pool = createSandboxPool(options.sandbox);
  const kv = new KvStore();
  const executor = new Executor(pool, kv);
  const metaApi = createMetaApi({
    supervisor,
    pool,
    kv,
    getCompiledModules: () => loader.cacheSize,
  });

  const handleRequest = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    table: RouteTable,
    target: ParsedRequestTarget,
    onWorker: (worker: string) => void,
  ): Promise<void> => {
    const method = req.method ?? 'GET';
    const pathname = target.path;

    if (options.meta && metaApi.handleRequest(req, res, pathname)) {
      return;
    }

    const match = matchRoute(table, method, pathname);

    if (match.kind === 'not-found') {
      safeSendJson(res, { message: 'Route not found', method, path: pathname }, HttpCode.NotFound);
      return;
    }

    if (match.kind === 'method-not-allowed') {
      safeSendJson(
        res,
        { message: 'Method not allowed', method, path: pathname, allowed: match.allowed },
        HttpCode.MethodNotAllowed,
        { Allow: match.allowed.join(', ') },
      );
      return;
    }

    const worker = match.entry.worker;
    onWorker(worker.relativePath);

    let body: Buffer;
    try {
      body = await readRequestBody(req, options.maxRequestBytes);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        safeSendJson(res, { message: error.message, limit: error.limit }, HttpCode.PayloadTooLarge, {
          Connection: 'close',
        });
        return;
      }

      throw error;
    }

    const request: ExecutionRequest = {
      method,
      url: req.url ?? pathname,
      path: pathname,
      query: target.query,
      headers: collectRequestHeaders(req),
      body,
      params: match.params,
      vars: worker.vars,
    };

    let result: ExecutionResult;
    try {
      result = await executor.execute(worker, request);
    } catch (error) {
      if (error instanceof PoolOverloadedError) {
        safeSendJson(res, { message: error.message }, HttpCode.ServiceUnavailable, { 'Retry-After': '1' });
        return;
      }

      throw error;
    }

    if (!result.ok) {
      logJsonl('WARN', 'worker_failed', {
        worker: worker.relativePath,
        kind: result.failure.kind,
        reason: result.failure.message,
        elapsedMs: result.elapsedMs,
      });

      safeSendJson(
        res,
        { message: result.failure.message, kind: result.failure.kind, worker: worker.relativePath },
        statusForFailure(result.failure.kind),
      );
      return;
    }

    if (res.writableEnded) {
      return;
    }

    res.statusCode = result.response.status;
    applyResponseHeaders(res, result.response.headers, worker.relativePath);
    res.end(result.response.body);
  };

  const server = http.createServer((req, res) => {
    const startedAt = Date.now();
    // the route snapshot is fixed for the whole request, even if a rebuild lands meanwhile
    const table = supervisor.table;
    const method = req.method ?? 'GET';
    const realIp = getRealIp(req);
    const requestTarget = parseRequestTarget(req.url);
    let workerFile: string | undefined;

    log('INFO', `Request ${method} ${requestTarget.path} from ${realIp}`);
    logJsonl('INFO', 'request_received', {
      method,
      ip: realIp,
      url: req.url ?? null,
      path: requestTarget.path,
      generation: table.generation,
    });

    res.once('finish', () => {
      const fields: Record<string, unknown> = {
        method,
        ip: realIp,
        url: req.url ?? null,
        path: requestTarget.path,
        statusCode: res.statusCode,
        elapsedMs: Date.now() - startedAt,
      };

      if (workerFile !== undefined) {
        fields.worker = workerFile;
      }

      if (Object.keys(requestTarget.query).length > 0) {
        fields.query = requestTarget.query;
      }

      logJsonl('INFO', 'request_completed', fields);
    });

    if (req.url === undefined) {
      safeSendJson(res, { message: 'Bad Request: req.url is undefined' }, HttpCode.BadRequest);
      return;
    }

    void handleRequest(req, res, table, requestTarget, (worker) => {
      workerFile = worker;
    }).catch((error: unknown) => {
      logJsonl('ERROR', 'request_failed', {
        method,
        url: req.url ?? null,
        ...errorFields(error),
      });

      safeSendJson(res, { message: 'Internal Server Error' }, HttpCode.InternalServerError);
    });
  });

  server.listen(options.port, options.host);
  try {
    await once(server, 'listening');
  } catch (error) {
    await supervisor.close();
    await pool.close();
    throw error;
  }

  const address = server.address();
  const port = address !== null && typeof address !== 'string' ? address.port : options.port;
  const url = `http://${options.host}:${String(port)}`;

  server.on('close', () => {
    log('INFO', `Server closed at ${url}`);
  });

  log('INFO', `Server started at ${url}`);
  log('INFO', `Worker directory: ${options.dir}`);

  let closing: Promise<void> | undefined;

  const close = (): Promise<void> => {
    closing ??= (async () => {
      await supervisor.close();
      try {
        await closeHttpServer(server);
      } catch (error) {
        logJsonl('WARN', 'server_close_failed', { error: getErrorMessage(error) });
      }
      await pool.close();
    })();

    return closing;
  };

  return {
    server,
    url,
    options,
    supervisor,
    pool,
    close,
  };
}
