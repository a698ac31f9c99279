import { type Request, type Response, Router } from 'express';

import type { TierQuotas } from '../../config/types.js';

import { UpstreamUnavailableError } from '../../errors/app-error.js';

import type { RateLimiter } from '../../middleware/rate-limiter.js';

import type { UpstreamOrchestrator } from '../../services/upstream/orchestrator.js';

import { createRequestSignal } from '../request-signal.js';

export interface HealthRouteDependencies {
  orchestrator: UpstreamOrchestrator;
  limiter: RateLimiter;
  tiers: TierQuotas;
  service: { name: string; version: string };
  clock: () => number;
}

const ENDPOINTS = [
  { method: 'POST', path: '/media/info', tier: 'metadata' },
  { method: 'POST', path: '/media/audio', tier: 'download' },
  { method: 'POST', path: '/media/video', tier: 'download' },
  { method: 'GET', path: '/media/health', tier: 'health' },
  { method: 'GET', path: '/healthz', tier: 'health' },
] as const;

export function createHealthRouter(deps: HealthRouteDependencies): Router {
  const { orchestrator, limiter, tiers, service, clock } = deps;
  const startedAt = clock();
  const router = Router();
  const healthTier = limiter.middleware('health');

  router.get('/healthz', healthTier, (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      uptimeSeconds: Math.floor((clock() - startedAt) / 1000),
      timestamp: new Date(clock()).toISOString(),
    });
  });

  router.get(
    '/media/health',
    healthTier,
    async (_req: Request, res: Response): Promise<void> => {
      const { signal, dispose } = createRequestSignal(res);
      try {
        const { report, health } = await orchestrator.checkHealth(signal);
        res.json({
          status: 'healthy',
          upstream: {
            status: report.status,
            ...(report.version !== undefined && { version: report.version }),
            degraded: health.degraded,
            consecutiveFailures: health.consecutiveFailures,
          },
          timestamp: new Date(clock()).toISOString(),
        });
      } catch (error) {
        if (!(error instanceof UpstreamUnavailableError)) throw error;
        res.status(503).json({
          status: 'unavailable',
          timestamp: new Date(clock()).toISOString(),
        });
      } finally {
        dispose();
      }
    }
  );

  router.get('/', healthTier, (_req: Request, res: Response) => {
    res.json({
      service: service.name,
      version: service.version,
      description:
        'Validates media page URLs and proxies metadata and media streams ' +
        'from the extraction service.',
      endpoints: ENDPOINTS,
      rateLimits: tiers,
    });
  });

  return router;
}
