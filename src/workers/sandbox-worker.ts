import { parentPort } from 'node:worker_threads';

import { runtimeTrap } from '../common/errors.js';
import { getErrorMessage } from '../common/logger.js';
import type { protocol } from './protocol.js';
import { runSandbox } from './sandbox-runner.js';

/**
 * ! Worker must run under parentPort; standalone run is invalid.
 */
if (parentPort === null) {
  throw new Error('sandbox worker missing parent port');
}
const port = parentPort;

function reply(id: string, outcome: protocol.Outcome): void {
  const message: protocol.OutboundMessage = {
    type: 'result',
    id,
    outcome,
    heapUsed: process.memoryUsage().heapUsed,
  };

  port.postMessage(message);
}

/**
 * Main worker message loop. One job at a time: the pool never posts a second job before the result.
 */
port.on('message', (message: protocol.InboundMessage) => {
  if (message.type !== 'execute') {
    return;
  }

  void runSandbox(message.job)
    .catch(
      (error: unknown): protocol.Outcome => ({
        ok: false,
        failure: runtimeTrap(getErrorMessage(error)),
        stderr: '',
        elapsedMs: Date.now() - message.job.startedAt,
      }),
    )
    .then((outcome) => {
      reply(message.id, outcome);
    });
});

const ready: protocol.OutboundMessage = { type: 'ready' };
port.postMessage(ready);
