import type { NextFunction, Request, RequestHandler, Response } from 'express';

import {
  PayloadTooLargeError,
  ValidationError,
} from '../errors/app-error.js';

/**
 * Rejects a declared body larger than `maxBytes` before the JSON parser
 * reads anything. Chunked bodies are bounded by the parser's own limit.
 */
export function createBodyLimitGuard(maxBytes: number): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const declared = req.headers['content-length'];
    if (declared !== undefined) {
      const length = Number.parseInt(declared, 10);
      if (Number.isFinite(length) && length > maxBytes) {
        next(new PayloadTooLargeError(maxBytes));
        return;
      }
    }
    next();
  };
}

export function createUserAgentGuard(maxLength: number): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const userAgent = req.headers['user-agent'];
    if (userAgent !== undefined && userAgent.length > maxLength) {
      next(
        new ValidationError('User-Agent header is too long', 'InvalidHeader')
      );
      return;
    }
    next();
  };
}
