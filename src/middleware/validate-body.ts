import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';

import { type FieldIssue, ValidationError } from '../errors/app-error.js';

import { getClientKey } from '../http/client-key.js';
import { setIncomingRequest } from '../http/request-state.js';

import {
  audioRequestSchema,
  infoRequestSchema,
  videoRequestSchema,
} from '../schemas/inputs.js';

import type { IncomingRequest, RequestKind } from '../types/media.js';

function toFieldIssues(issues: z.ZodError['issues']): FieldIssue[] {
  return issues.map((issue) => ({
    field: issue.path.map(String).join('.') || 'body',
    message: issue.message,
  }));
}

function parseBody<S extends z.ZodType>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError(
      'Invalid request body',
      'InvalidBody',
      toFieldIssues(result.error.issues)
    );
  }
  return result.data;
}

export function parseIncomingRequest(
  kind: RequestKind,
  body: unknown,
  clientIp: string
): IncomingRequest {
  switch (kind) {
    case 'info': {
      const parsed = parseBody(infoRequestSchema, body);
      return { kind, rawUrl: parsed.url, clientIp };
    }
    case 'audio': {
      const parsed = parseBody(audioRequestSchema, body);
      return {
        kind,
        rawUrl: parsed.url,
        quality: parsed.quality,
        format: parsed.format,
        clientIp,
      };
    }
    case 'video': {
      const parsed = parseBody(videoRequestSchema, body);
      return {
        kind,
        rawUrl: parsed.url,
        quality: parsed.quality,
        format: parsed.format,
        clientIp,
      };
    }
  }
}

export function validateBody(kind: RequestKind): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const body: unknown = req.body;
    setIncomingRequest(req, parseIncomingRequest(kind, body, getClientKey(req)));
    next();
  };
}
