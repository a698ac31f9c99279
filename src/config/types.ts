export type RateLimitTier = 'metadata' | 'download' | 'health';

export interface TierQuota {
  maxRequests: number;
  windowMs: number;
}

export type TierQuotas = Record<RateLimitTier, TierQuota>;

export interface RateLimitBucket {
  clientKey: string;
  tier: RateLimitTier;
  windowStart: number;
  count: number;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface UpstreamHealthOptions {
  failureThreshold: number;
  cooldownMs: number;
}

export interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: Record<string, unknown>;
  };
  timestamp: string;
}
