import { createServer, type Server } from 'node:http';

import type { Express } from 'express';

import { createApp } from '../app.js';
import { config } from '../config/index.js';

import { logInfo } from '../services/logger.js';

import {
  createShutdownHandler,
  registerSignalHandlers,
} from './server-shutdown.js';

export interface RunningServer {
  server: Server;
  shutdown: (signal: string) => Promise<void>;
}

export function listen(
  app: Express,
  port: number,
  host: string
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

export async function startHttpServer(): Promise<RunningServer> {
  const gateway = createApp();
  const { host, port, name, version, shutdownGraceMs } = config.server;

  const server = await listen(gateway.app, port, host);
  logInfo(`${name} v${version} listening`, { host, port });

  const shutdown = createShutdownHandler(
    server,
    gateway.dispose,
    shutdownGraceMs
  );
  registerSignalHandlers(shutdown);

  return { server, shutdown };
}
