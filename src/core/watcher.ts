import fs from 'node:fs';

import { logJsonl } from '../common/logger.js';

export interface DirectoryWatcher {
  close: () => void;
}

function createTreeWatcher(root: string, onEvent: () => void): fs.FSWatcher {
  try {
    return fs.watch(root, { recursive: true }, onEvent);
  } catch {
    logJsonl('WARN', 'recursive_watch_unavailable', { root });
    return fs.watch(root, onEvent);
  }
}

/**
 * Calls `onChange` once a burst of file system events under `root` has settled for `debounceMs`.
 */
export function watchWorkerTree(root: string, onChange: () => void, debounceMs = 80): DirectoryWatcher {
  let settleTimer: NodeJS.Timeout | undefined;

  const watcher = createTreeWatcher(root, () => {
    if (settleTimer !== undefined) {
      clearTimeout(settleTimer);
    }

    settleTimer = setTimeout(() => {
      settleTimer = undefined;
      onChange();
    }, debounceMs);
  });

  watcher.on('error', (error) => {
    logJsonl('ERROR', 'worker_tree_watch_failed', { root, error: error.message });
  });

  return {
    close() {
      watcher.close();

      if (settleTimer !== undefined) {
        clearTimeout(settleTimer);
        settleTimer = undefined;
      }
    },
  };
}
