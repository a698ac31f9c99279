import type { Server } from 'node:http';

import { logError, logInfo } from '../services/logger.js';

export function createShutdownHandler(
  server: Server,
  dispose: () => void,
  graceMs: number
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo(`${signal} received, shutting down gracefully...`);

    dispose();

    setTimeout(() => {
      logError('Forced shutdown after timeout');
      process.exit(1);
    }, graceMs).unref();

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) logError('HTTP server close failed', error);
        resolve();
      });
      server.closeIdleConnections();
    });

    logInfo('HTTP server closed');
    process.exit(0);
  };
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): void {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
