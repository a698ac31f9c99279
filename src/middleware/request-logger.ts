import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';

import type { NextFunction, Request, Response } from 'express';

import { getClientKey } from '../http/client-key.js';
import {
  getRequestIdFor,
  peekIncomingRequest,
  setRequestId,
} from '../http/request-state.js';

import { runWithRequestContext } from '../services/context.js';
import { logInfo } from '../services/logger.js';

/**
 * Assigns the request id and writes one access-log line when the response
 * finishes or the connection closes. The target is redacted by the logger.
 */
export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = randomUUID();
  const start = performance.now();
  setRequestId(req, requestId);
  res.set('X-Request-Id', requestId);

  let logged = false;
  const writeLog = (): void => {
    if (logged) return;
    logged = true;

    const incoming = peekIncomingRequest(req);
    logInfo('HTTP request', {
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      completed: res.writableFinished,
      duration: `${Math.round(performance.now() - start)}ms`,
      clientKey: getClientKey(req),
      ...(incoming && { target: incoming.rawUrl }),
      userAgent: req.headers['user-agent'],
    });
  };

  res.once('finish', writeLog);
  res.once('close', writeLog);
  next();
}

/**
 * Runs the rest of the chain inside the request's async context so every
 * log line carries its id. Mounted after body parsing.
 */
export function bindRequestContext(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  runWithRequestContext(
    {
      requestId: getRequestIdFor(req) ?? randomUUID(),
      clientKey: getClientKey(req),
    },
    next
  );
}
