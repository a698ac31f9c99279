import type { NextFunction, Request, Response } from 'express';

import type { ErrorResponse } from '../config/types.js';

import {
  AppError,
  NotFoundError,
  PayloadTooLargeError,
  RateLimitError,
  ValidationError,
} from '../errors/app-error.js';

import { logDebug, logError, logWarn } from '../services/logger.js';

const CLIENT_CLOSED_STATUS = 499;

interface ParserFailure {
  type: string;
  status: number;
  limit?: number;
}

// Errors raised by express.json() carry `type` and `status`.
function asParserFailure(err: unknown): ParserFailure | null {
  if (!(err instanceof Error)) return null;
  const type: unknown = Reflect.get(err, 'type');
  const status: unknown = Reflect.get(err, 'status');
  if (typeof type !== 'string' || typeof status !== 'number') return null;
  const limit: unknown = Reflect.get(err, 'limit');
  return {
    type,
    status,
    ...(typeof limit === 'number' && { limit }),
  };
}

function fromParserFailure(failure: ParserFailure): AppError {
  switch (failure.type) {
    case 'entity.too.large':
      return new PayloadTooLargeError(failure.limit ?? 0);
    case 'entity.parse.failed':
      return new ValidationError('Malformed JSON body', 'InvalidBody');
    default:
      return failure.status >= 400 && failure.status < 500
        ? new AppError('Bad request', failure.status, 'BAD_REQUEST')
        : new AppError('Internal Server Error', 500, 'INTERNAL_ERROR', false);
  }
}

export function normalizeError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  const parserFailure = asParserFailure(err);
  if (parserFailure) return fromParserFailure(parserFailure);
  return new AppError('Internal Server Error', 500, 'INTERNAL_ERROR', false);
}

export function buildErrorResponse(error: AppError): ErrorResponse {
  const { details } = error;
  return {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      ...(details && { details }),
    },
    timestamp: new Date().toISOString(),
  };
}

function logFailure(err: unknown, error: AppError, req: Request): void {
  const summary = `HTTP ${error.statusCode}: ${req.method} ${req.path}`;
  if (error.statusCode >= 500) {
    logError(`${summary} (${error.code})`, err instanceof Error ? err : error);
    return;
  }
  logWarn(summary, { code: error.code, message: error.message });
}

export function notFoundHandler(
  _req: Request,
  _res: Response,
  next: NextFunction
): void {
  next(new NotFoundError('Route'));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const error = normalizeError(err);

  if (error.statusCode === CLIENT_CLOSED_STATUS) {
    logDebug('Client closed request', { method: req.method, path: req.path });
    if (!res.headersSent && !res.destroyed) {
      res.status(CLIENT_CLOSED_STATUS).end();
    }
    return;
  }

  logFailure(err, error, req);

  if (res.headersSent) {
    res.destroy();
    return;
  }

  if (error instanceof RateLimitError) {
    res.set('Retry-After', String(error.retryAfter));
  }

  res.status(error.statusCode).json(buildErrorResponse(error));
}
