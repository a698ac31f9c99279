import type { Request } from 'express';

import { AppError } from '../errors/app-error.js';

import type {
  IncomingRequest,
  IncomingRequestOf,
  RequestKind,
} from '../types/media.js';

const incomingRequests = new WeakMap<Request, IncomingRequest>();
const requestIds = new WeakMap<Request, string>();

function isKind<K extends RequestKind>(
  value: IncomingRequest,
  kind: K
): value is IncomingRequestOf<K> {
  return value.kind === kind;
}

export function setIncomingRequest(
  req: Request,
  incoming: IncomingRequest
): void {
  incomingRequests.set(req, incoming);
}

export function peekIncomingRequest(req: Request): IncomingRequest | undefined {
  return incomingRequests.get(req);
}

/** The validated body for `kind`; routes never read `req.body` directly. */
export function getIncomingRequest<K extends RequestKind>(
  req: Request,
  kind: K
): IncomingRequestOf<K> {
  const incoming = incomingRequests.get(req);
  if (!incoming || !isKind(incoming, kind)) {
    throw new AppError('Request body was not validated', 500);
  }
  return incoming;
}

export function setRequestId(req: Request, requestId: string): void {
  requestIds.set(req, requestId);
}

export function getRequestIdFor(req: Request): string | undefined {
  return requestIds.get(req);
}
