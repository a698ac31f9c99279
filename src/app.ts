import express, { type Express } from 'express';

import { RESPONSE_LIMITS } from './config/constants.js';
import { config } from './config/index.js';
import type {
  RetryOptions,
  TierQuotas,
  UpstreamHealthOptions,
} from './config/types.js';

import { createCorsMiddleware } from './http/cors.js';
import { createHealthRouter } from './http/routes/health-routes.js';
import { createMediaRouter } from './http/routes/media-routes.js';

import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { type Clock, RateLimiter } from './middleware/rate-limiter.js';
import {
  createBodyLimitGuard,
  createUserAgentGuard,
} from './middleware/request-guards.js';
import {
  bindRequestContext,
  requestLogger,
} from './middleware/request-logger.js';
import { securityHeaders } from './middleware/security-headers.js';

import { type HostLookup, SafeDnsResolver } from './services/dns-resolver.js';
import { HttpExtractionProvider } from './services/extraction/http-provider.js';
import type { ExtractionProvider } from './services/extraction/provider.js';
import { logDebug } from './services/logger.js';
import { UpstreamOrchestrator } from './services/upstream/orchestrator.js';
import type { Sleep } from './services/upstream/retry-policy.js';
import { UrlGuard } from './services/url-guard.js';

import type { MediaKind } from './types/media.js';

import type { UrlPolicy } from './utils/url-sanitizer.js';

export interface GatewayOptions {
  service: { name: string; version: string };
  trustProxy: boolean | number | string[];
  allowedOrigins: readonly string[];
  maxBodyBytes: number;
  urlPolicy: UrlPolicy;
  dnsLookupTimeoutMs: number;
  rateLimit: { tiers: TierQuotas; cleanupIntervalMs: number };
  upstream: {
    baseUrl: string;
    timeoutMs: number;
    retry: RetryOptions;
    health: UpstreamHealthOptions;
  };
  streamDeadlines: Readonly<Record<MediaKind, number>>;
}

/** Collaborators tests swap out. */
export interface GatewayDependencies {
  provider?: ExtractionProvider;
  lookup?: HostLookup;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number;
}

export interface Gateway {
  app: Express;
  limiter: RateLimiter;
  orchestrator: UpstreamOrchestrator;
  dispose: () => void;
}

export function defaultGatewayOptions(): GatewayOptions {
  return {
    service: { name: config.server.name, version: config.server.version },
    trustProxy: config.server.trustProxy,
    allowedOrigins: config.server.allowedOrigins,
    maxBodyBytes: config.security.maxBodyBytes,
    urlPolicy: {
      allowedHosts: config.security.allowedHosts,
      allowedQueryParams: config.security.allowedQueryParams,
      allowedPorts: config.security.allowedPorts,
      maxUrlLength: config.security.maxUrlLength,
    },
    dnsLookupTimeoutMs: config.security.dnsLookupTimeoutMs,
    rateLimit: config.rateLimit,
    upstream: {
      baseUrl: config.upstream.baseUrl.href,
      timeoutMs: config.upstream.timeoutMs,
      retry: config.upstream.retry,
      health: config.upstream.health,
    },
    streamDeadlines: {
      audio: config.stream.audioDeadlineMs,
      video: config.stream.videoDeadlineMs,
    },
  };
}

export function createApp(
  overrides: Partial<GatewayOptions> = {},
  dependencies: GatewayDependencies = {}
): Gateway {
  const options: GatewayOptions = { ...defaultGatewayOptions(), ...overrides };
  const clock = dependencies.clock ?? Date.now;

  const provider =
    dependencies.provider ??
    new HttpExtractionProvider({
      baseUrl: options.upstream.baseUrl,
      userAgent: `${options.service.name}/${options.service.version}`,
    });
  const resolver = new SafeDnsResolver({
    lookup: dependencies.lookup,
    timeoutMs: options.dnsLookupTimeoutMs,
  });
  const guard = new UrlGuard(resolver, options.urlPolicy);
  const limiter = new RateLimiter({ ...options.rateLimit, clock });
  const orchestrator = new UpstreamOrchestrator({
    provider,
    ...options.upstream,
    clock,
    sleep: dependencies.sleep,
    random: dependencies.random,
  });

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', options.trustProxy);

  app.use(securityHeaders);
  app.use(requestLogger);
  app.use(
    createCorsMiddleware({
      allowedOrigins: options.allowedOrigins,
      allowAllOrigins: options.allowedOrigins.includes('*'),
    })
  );
  app.use(createUserAgentGuard(RESPONSE_LIMITS.maxUserAgentHeader));
  app.use(createBodyLimitGuard(options.maxBodyBytes));
  app.use(express.json({ limit: options.maxBodyBytes }));
  app.use(bindRequestContext);

  app.use(
    createMediaRouter({
      guard,
      orchestrator,
      limiter,
      streamDeadlines: options.streamDeadlines,
    })
  );
  app.use(
    createHealthRouter({
      orchestrator,
      limiter,
      tiers: options.rateLimit.tiers,
      service: options.service,
      clock,
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  logDebug('Gateway application created', {
    upstream: options.upstream.baseUrl,
  });

  return {
    app,
    limiter,
    orchestrator,
    dispose: () => {
      limiter.destroy();
      provider.destroy?.();
    },
  };
}
