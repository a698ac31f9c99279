import type { Request } from 'express';

const MAX_KEY_LENGTH = 45;

/**
 * Client identity for rate limiting. Express resolves `req.ip` through the
 * configured trust-proxy setting; anything that is not IP-shaped is stripped
 * so the value cannot be used to inject keys.
 */
export function getClientKey(req: Request): string {
  const ip = req.ip ?? req.socket.remoteAddress ?? '';
  return (
    ip.replace(/[^a-fA-F0-9.:]/g, '').substring(0, MAX_KEY_LENGTH) || 'unknown'
  );
}
