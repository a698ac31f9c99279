import type { NextFunction, Request, Response } from 'express';

interface CorsOptions {
  readonly allowedOrigins: readonly string[];
  readonly allowAllOrigins: boolean;
}

const EXPOSED_HEADERS = [
  'Content-Disposition',
  'Retry-After',
  'X-RateLimit-Limit',
  'X-RateLimit-Remaining',
  'X-RateLimit-Reset',
  'X-Request-Id',
  'X-Source-Duration',
  'X-Source-Id',
  'X-Source-Title',
].join(', ');

function isOriginAllowed(origin: string, options: CorsOptions): boolean {
  if (options.allowAllOrigins) return true;
  return options.allowedOrigins.includes(origin);
}

function isValidOrigin(origin: string): boolean {
  return URL.canParse(origin);
}

export function createCorsMiddleware(
  options: CorsOptions
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { origin } = req.headers;

    if (!origin || !isValidOrigin(origin) || !isOriginAllowed(origin, options)) {
      next();
      return;
    }

    res.header(
      'Access-Control-Allow-Origin',
      options.allowAllOrigins ? '*' : origin
    );
    res.vary('Origin');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    res.header('Access-Control-Expose-Headers', EXPOSED_HEADERS);
    res.header('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  };
}
