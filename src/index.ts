#!/usr/bin/env node
import { CommanderError } from 'commander';

import { isUsageError, parseCliOptions } from './cli.js';
import { BuildFailedError } from './common/errors.js';
import { errorFields, getErrorMessage, log, logJsonl } from './common/logger.js';
import { startServer } from './core/server.js';

async function main(): Promise<void> {
  const options = parseCliOptions(process.argv.slice(2));
  const workers = await startServer(options);

  const shutdown = (signal: NodeJS.Signals): void => {
    log('INFO', `Received ${signal}, shutting down`);
    void workers.close().then(
      () => {
        process.exit(0);
      },
      (error: unknown) => {
        logJsonl('ERROR', 'shutdown_failed', errorFields(error));
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

void main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander already printed help, version or the usage error
    process.exitCode = error.exitCode;
    return;
  }

  if (isUsageError(error)) {
    console.error(error.message);
    process.exitCode = 2;
    return;
  }

  if (error instanceof BuildFailedError) {
    logJsonl('ERROR', 'startup_build_failed', { ...error.buildError });
  }

  log('ERROR', `Failed to start: ${getErrorMessage(error)}`);
  process.exitCode = 1;
});
