import { setTimeout as sleepFor } from 'node:timers/promises';

import type { RetryOptions } from '../../config/types.js';

import {
  RequestAbortedError,
  UpstreamCallError,
  UpstreamRejectedError,
  UpstreamUnavailableError,
} from '../../errors/app-error.js';

import { isAbortError, toError } from '../../utils/error-utils.js';

import { logDebug, logWarn } from '../logger.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface UpstreamAttempt {
  operation: string;
  attempt: number;
  outcome: 'success' | 'retryable' | 'rejected';
  error?: Error;
}

export interface RetryPolicyOptions extends RetryOptions {
  sleep?: Sleep;
  random?: () => number;
  onAttempt?: (attempt: UpstreamAttempt) => void;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

export class RetryPolicy {
  private static readonly JITTER_FACTOR = 0.25;

  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly onAttempt?: (attempt: UpstreamAttempt) => void;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.maxDelayMs = Math.max(0, options.maxDelayMs);
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.onAttempt = options.onAttempt;
  }

  /**
   * Runs `call` until it succeeds, fails with a non-retryable error, or the
   * attempt budget is spent. Only `UpstreamRejectedError`,
   * `UpstreamUnavailableError` and `RequestAbortedError` escape.
   */
  async execute<T>(
    operation: string,
    call: (attempt: number) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.throwIfAborted(signal);

      try {
        const value = await call(attempt);
        this.onAttempt?.({ operation, attempt, outcome: 'success' });
        return value;
      } catch (error) {
        this.throwIfAborted(signal);
        const normalizedError = toError(error);

        if (this.isRejection(normalizedError)) {
          this.onAttempt?.({
            operation,
            attempt,
            outcome: 'rejected',
            error: normalizedError,
          });
          throw this.toRejection(normalizedError);
        }

        this.onAttempt?.({
          operation,
          attempt,
          outcome: 'retryable',
          error: normalizedError,
        });

        if (attempt < this.maxAttempts) {
          await this.wait(operation, attempt, normalizedError, signal);
        }
      }
    }

    logWarn('Extraction service retry budget exhausted', {
      operation,
      attempts: this.maxAttempts,
    });
    throw new UpstreamUnavailableError(this.maxAttempts);
  }

  /** `min(base * attempt, max)` with up to 25% jitter either way. */
  calculateDelay(attempt: number): number {
    const linear = Math.min(this.baseDelayMs * attempt, this.maxDelayMs);
    const jitter = linear * RetryPolicy.JITTER_FACTOR * (this.random() * 2 - 1);
    return Math.max(0, Math.round(linear + jitter));
  }

  private isRejection(error: Error): boolean {
    if (error instanceof UpstreamRejectedError) return true;
    return error instanceof UpstreamCallError && error.isClientError;
  }

  private toRejection(error: Error): UpstreamRejectedError {
    if (error instanceof UpstreamRejectedError) return error;
    const status =
      error instanceof UpstreamCallError && error.httpStatus !== undefined
        ? error.httpStatus
        : 400;
    return new UpstreamRejectedError(status);
  }

  private async wait(
    operation: string,
    attempt: number,
    error: Error,
    signal?: AbortSignal
  ): Promise<void> {
    const delay = this.calculateDelay(attempt);

    logDebug('Retrying extraction call', {
      operation,
      attempt,
      reason: error.message,
      delay: `${delay}ms`,
    });

    try {
      await this.sleep(delay, signal);
    } catch (sleepError) {
      if (isAbortError(sleepError) || signal?.aborted) {
        throw new RequestAbortedError();
      }
      throw sleepError;
    }
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) throw new RequestAbortedError();
  }
}
