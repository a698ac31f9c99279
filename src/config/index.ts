import {
  ALLOWED_QUERY_PARAMS,
  DEFAULT_MEDIA_HOSTS,
  SERVICE_NAME,
  SIZE_LIMITS,
  TIMEOUT,
} from './constants.js';
import {
  parseBoolean,
  parseInteger,
  parseList,
  parseLogLevel,
  parseTrustProxy,
  parseUrlEnv,
} from './env-parsers.js';
import type { TierQuotas } from './types.js';

const host = process.env.HOST ?? '0.0.0.0';
const port = parseInteger(process.env.PORT, 3001, 1, 65535);

const mediaHosts = parseList(process.env.MEDIA_ALLOWED_HOSTS).map((entry) =>
  entry.toLowerCase()
);

const rateLimitTiers: TierQuotas = {
  metadata: {
    maxRequests: parseInteger(
      process.env.RATE_LIMIT_METADATA_MAX,
      30,
      1,
      10000
    ),
    windowMs: parseInteger(
      process.env.RATE_LIMIT_METADATA_WINDOW_MS,
      60_000,
      1000,
      3_600_000
    ),
  },
  download: {
    maxRequests: parseInteger(process.env.RATE_LIMIT_DOWNLOAD_MAX, 5, 1, 10000),
    windowMs: parseInteger(
      process.env.RATE_LIMIT_DOWNLOAD_WINDOW_MS,
      300_000,
      1000,
      3_600_000
    ),
  },
  health: {
    maxRequests: parseInteger(process.env.RATE_LIMIT_HEALTH_MAX, 600, 1, 100000),
    windowMs: parseInteger(
      process.env.RATE_LIMIT_HEALTH_WINDOW_MS,
      60_000,
      1000,
      3_600_000
    ),
  },
};

export const config = {
  server: {
    name: SERVICE_NAME,
    version: process.env.npm_package_version ?? '1.0.0',
    host,
    port,
    trustProxy: parseTrustProxy(process.env.TRUST_PROXY),
    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS),
    shutdownGraceMs: TIMEOUT.SHUTDOWN_GRACE_MS,
  },
  security: {
    maxBodyBytes: parseInteger(
      process.env.MAX_BODY_BYTES,
      SIZE_LIMITS.SIXTEEN_KB,
      256,
      SIZE_LIMITS.ONE_MB
    ),
    maxUrlLength: 2048,
    allowedHosts: new Set<string>(
      mediaHosts.length > 0 ? mediaHosts : DEFAULT_MEDIA_HOSTS
    ),
    allowedQueryParams: ALLOWED_QUERY_PARAMS,
    allowedPorts: new Set(['', '80', '443']),
    dnsLookupTimeoutMs: parseInteger(
      process.env.DNS_LOOKUP_TIMEOUT_MS,
      TIMEOUT.DEFAULT_DNS_LOOKUP_TIMEOUT_MS,
      100,
      30_000
    ),
  },
  rateLimit: {
    tiers: rateLimitTiers,
    cleanupIntervalMs: parseInteger(
      process.env.RATE_LIMIT_CLEANUP_INTERVAL_MS,
      300_000,
      1000,
      3_600_000
    ),
  },
  upstream: {
    baseUrl: parseUrlEnv(
      process.env.EXTRACTOR_SERVICE_URL ?? 'http://127.0.0.1:3002',
      'EXTRACTOR_SERVICE_URL'
    ),
    timeoutMs: parseInteger(
      process.env.UPSTREAM_TIMEOUT_MS,
      TIMEOUT.DEFAULT_UPSTREAM_TIMEOUT_MS,
      100,
      300_000
    ),
    retry: {
      maxAttempts: parseInteger(process.env.UPSTREAM_MAX_ATTEMPTS, 3, 1, 10),
      baseDelayMs: parseInteger(
        process.env.UPSTREAM_BASE_DELAY_MS,
        1000,
        0,
        30_000
      ),
      maxDelayMs: parseInteger(
        process.env.UPSTREAM_MAX_DELAY_MS,
        10_000,
        0,
        60_000
      ),
    },
    health: {
      failureThreshold: parseInteger(
        process.env.UPSTREAM_FAILURE_THRESHOLD,
        3,
        1,
        100
      ),
      cooldownMs: parseInteger(
        process.env.UPSTREAM_COOLDOWN_MS,
        30_000,
        0,
        600_000
      ),
    },
  },
  stream: {
    audioDeadlineMs: parseInteger(
      process.env.AUDIO_STREAM_DEADLINE_MS,
      TIMEOUT.AUDIO_STREAM_DEADLINE_MS,
      1000,
      3_600_000
    ),
    videoDeadlineMs: parseInteger(
      process.env.VIDEO_STREAM_DEADLINE_MS,
      TIMEOUT.VIDEO_STREAM_DEADLINE_MS,
      1000,
      3_600_000
    ),
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enabled: parseBoolean(process.env.LOG_ENABLED, true),
    directory: process.env.LOG_DIR,
  },
};
