import type { UpstreamHealthOptions } from '../../config/types.js';

import { logInfo, logWarn } from '../logger.js';

export interface UpstreamHealthSnapshot {
  degraded: boolean;
  consecutiveFailures: number;
  lastFailureAt: number | null;
  lastSuccessAt: number | null;
}

/**
 * Advisory health of the extraction service. Degrades once
 * `failureThreshold` consecutive failures land within `cooldownMs` of each
 * other, and recovers on the next success or once the cooldown passes.
 */
export class UpstreamHealth {
  private consecutiveFailures = 0;
  private lastFailureAt: number | null = null;
  private lastSuccessAt: number | null = null;

  constructor(
    private readonly options: UpstreamHealthOptions,
    private readonly clock: () => number = Date.now
  ) {}

  recordSuccess(): void {
    if (this.consecutiveFailures >= this.options.failureThreshold) {
      logInfo('Extraction service recovered');
    }
    this.consecutiveFailures = 0;
    this.lastSuccessAt = this.clock();
  }

  recordFailure(): void {
    const now = this.clock();
    if (
      this.lastFailureAt !== null &&
      now - this.lastFailureAt > this.options.cooldownMs
    ) {
      this.consecutiveFailures = 0;
    }
    this.consecutiveFailures++;
    this.lastFailureAt = now;

    if (this.consecutiveFailures === this.options.failureThreshold) {
      logWarn('Extraction service marked degraded', {
        consecutiveFailures: this.consecutiveFailures,
      });
    }
  }

  isDegraded(): boolean {
    if (this.consecutiveFailures < this.options.failureThreshold) return false;
    if (this.lastFailureAt === null) return false;
    return this.clock() - this.lastFailureAt < this.options.cooldownMs;
  }

  snapshot(): UpstreamHealthSnapshot {
    return {
      degraded: this.isDegraded(),
      consecutiveFailures: this.consecutiveFailures,
      lastFailureAt: this.lastFailureAt,
      lastSuccessAt: this.lastSuccessAt,
    };
  }
}
