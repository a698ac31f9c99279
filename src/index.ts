#!/usr/bin/env node
import { startHttpServer } from './http/server.js';

import { logError } from './services/logger.js';

import { toError } from './utils/error-utils.js';

let shutdown: ((signal: string) => Promise<void>) | undefined;
let crashing = false;

function reportFatal(label: string, reason: unknown): Error {
  const error = toError(reason);
  logError(label, error);
  process.stderr.write(`${label}: ${error.message}\n`);
  return error;
}

process.on('uncaughtException', (error) => {
  reportFatal('Uncaught exception', error);

  // Drain in-flight downloads once; a second crash exits immediately.
  if (crashing || !shutdown) process.exit(1);
  crashing = true;
  void shutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason) => {
  reportFatal('Unhandled rejection', reason);
});

try {
  ({ shutdown } = await startHttpServer());
} catch (error) {
  reportFatal('Failed to start media gateway', error);
  process.exit(1);
}
