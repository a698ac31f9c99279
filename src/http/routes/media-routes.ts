import { type Request, type Response, Router } from 'express';

import type { RateLimiter } from '../../middleware/rate-limiter.js';
import { validateBody } from '../../middleware/validate-body.js';

import {
  RequestAbortedError,
  StreamAbortedError,
  StreamTimeoutError,
} from '../../errors/app-error.js';

import { buildDownloadHeaders } from '../../services/stream/download-headers.js';
import {
  proxyStream,
  type StreamOutcome,
} from '../../services/stream/stream-proxy.js';
import type {
  StreamSelection,
  UpstreamOrchestrator,
} from '../../services/upstream/orchestrator.js';
import type { UrlGuard } from '../../services/url-guard.js';

import type { MediaKind } from '../../types/media.js';

import { getIncomingRequest, getRequestIdFor } from '../request-state.js';
import { createRequestSignal } from '../request-signal.js';

export interface MediaRouteDependencies {
  guard: UrlGuard;
  orchestrator: UpstreamOrchestrator;
  limiter: RateLimiter;
  streamDeadlines: Readonly<Record<MediaKind, number>>;
}

function selectionFor(req: Request, kind: MediaKind): {
  rawUrl: string;
  selection: StreamSelection;
} {
  if (kind === 'audio') {
    const incoming = getIncomingRequest(req, 'audio');
    return {
      rawUrl: incoming.rawUrl,
      selection: {
        kind: 'audio',
        quality: incoming.quality,
        format: incoming.format,
      },
    };
  }
  const incoming = getIncomingRequest(req, 'video');
  return {
    rawUrl: incoming.rawUrl,
    selection: {
      kind: 'video',
      quality: incoming.quality,
      format: incoming.format,
    },
  };
}

function toStreamFailure(outcome: StreamOutcome, deadlineMs: number): Error {
  if (outcome.state === 'timedOut') return new StreamTimeoutError(deadlineMs);
  if (outcome.error instanceof RequestAbortedError) return outcome.error;
  return new StreamAbortedError();
}

export function createMediaRouter(deps: MediaRouteDependencies): Router {
  const { guard, orchestrator, limiter, streamDeadlines } = deps;
  const router = Router();

  router.post(
    '/media/info',
    validateBody('info'),
    limiter.middleware('metadata'),
    async (req: Request, res: Response): Promise<void> => {
      const incoming = getIncomingRequest(req, 'info');
      const { signal, dispose } = createRequestSignal(res);
      try {
        const target = await guard.validate(incoming.rawUrl, signal);
        const metadata = await orchestrator.fetchMetadata(target, signal);
        res.json({
          success: true,
          data: metadata,
          timestamp: new Date().toISOString(),
        });
      } finally {
        dispose();
      }
    }
  );

  const download =
    (kind: MediaKind) =>
    async (req: Request, res: Response): Promise<void> => {
      const { rawUrl, selection } = selectionFor(req, kind);
      const deadlineMs = streamDeadlines[kind];
      const { signal, dispose } = createRequestSignal(res);
      try {
        const target = await guard.validate(rawUrl, signal);
        const { metadata, media } = await orchestrator.openDownload(
          selection,
          target,
          signal
        );

        const outcome = await proxyStream(media, res, {
          deadlineMs,
          headers: buildDownloadHeaders(metadata, selection),
          sessionId: getRequestIdFor(req),
        });
        if (outcome.state === 'completed' || outcome.headersSent) return;
        throw toStreamFailure(outcome, deadlineMs);
      } finally {
        dispose();
      }
    };

  router.post(
    '/media/audio',
    validateBody('audio'),
    limiter.middleware('download'),
    download('audio')
  );
  router.post(
    '/media/video',
    validateBody('video'),
    limiter.middleware('download'),
    download('video')
  );

  return router;
}
