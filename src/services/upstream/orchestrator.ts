import type {
  RetryOptions,
  UpstreamHealthOptions,
} from '../../config/types.js';

import {
  RequestAbortedError,
  UpstreamCallError,
  UpstreamUnavailableError,
} from '../../errors/app-error.js';

import type { UpstreamHealthReport } from '../../schemas/upstream.js';

import type {
  AudioFormat,
  AudioQuality,
  MediaKind,
  MediaMetadata,
  UpstreamMedia,
  ValidatedTarget,
  VideoFormat,
  VideoQuality,
} from '../../types/media.js';

import { getErrorMessage } from '../../utils/error-utils.js';

import type { ExtractionProvider } from '../extraction/provider.js';
import { logWarn } from '../logger.js';

import {
  UpstreamHealth,
  type UpstreamHealthSnapshot,
} from './health-signal.js';
import { shapeMetadata } from './metadata.js';
import {
  RetryPolicy,
  type Sleep,
  type UpstreamAttempt,
} from './retry-policy.js';

export type StreamSelection =
  | { kind: 'audio'; quality: AudioQuality; format: AudioFormat }
  | { kind: 'video'; quality: VideoQuality; format: VideoFormat };

export interface UpstreamOrchestratorOptions {
  provider: ExtractionProvider;
  retry: RetryOptions;
  health: UpstreamHealthOptions;
  timeoutMs: number;
  clock?: () => number;
  sleep?: Sleep;
  random?: () => number;
}

export interface UpstreamStatus {
  report: UpstreamHealthReport;
  health: UpstreamHealthSnapshot;
}

/**
 * Single entry point for extraction calls: per-attempt timeouts, bounded
 * retries and the shared health signal. Rate limiting is not done here.
 */
export class UpstreamOrchestrator {
  readonly health: UpstreamHealth;
  private readonly provider: ExtractionProvider;
  private readonly policy: RetryPolicy;
  private readonly timeoutMs: number;

  constructor(options: UpstreamOrchestratorOptions) {
    this.provider = options.provider;
    this.timeoutMs = options.timeoutMs;
    this.health = new UpstreamHealth(options.health, options.clock);
    this.policy = new RetryPolicy({
      ...options.retry,
      sleep: options.sleep,
      random: options.random,
      onAttempt: (attempt) => this.recordAttempt(attempt),
    });
  }

  callUpstream<T>(
    operation: string,
    call: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    return this.policy.execute(
      operation,
      () => this.runAttempt(call, signal),
      signal
    );
  }

  async fetchMetadata(
    target: ValidatedTarget,
    signal?: AbortSignal
  ): Promise<MediaMetadata> {
    const upstream = await this.callUpstream(
      'metadata',
      (attemptSignal) =>
        this.provider.fetchMetadata(target.sanitizedUrl, {
          signal: attemptSignal,
        }),
      signal
    );
    return shapeMetadata(target, upstream);
  }

  /**
   * Metadata plus an open byte stream for one download. A degraded service
   * is refused before any attempt is made.
   */
  async openDownload(
    selection: StreamSelection,
    target: ValidatedTarget,
    signal?: AbortSignal
  ): Promise<{ metadata: MediaMetadata; media: UpstreamMedia }> {
    this.assertAvailable(selection.kind);
    const metadata = await this.fetchMetadata(target, signal);
    const media = await this.openStream(selection, target, signal);
    return { metadata, media };
  }

  /**
   * Opens the upstream byte stream. The attempt timeout covers getting the
   * response only; the body is bounded by the stream deadline instead.
   */
  async openStream(
    selection: StreamSelection,
    target: ValidatedTarget,
    signal?: AbortSignal
  ): Promise<UpstreamMedia> {
    this.assertAvailable(selection.kind);

    return this.callUpstream(
      selection.kind,
      (attemptSignal) =>
        selection.kind === 'audio'
          ? this.provider.openAudioStream(
              target.sanitizedUrl,
              selection.quality,
              { signal: attemptSignal, format: selection.format }
            )
          : this.provider.openVideoStream(
              target.sanitizedUrl,
              selection.quality,
              { signal: attemptSignal, format: selection.format }
            ),
      signal
    );
  }

  /** Single health check, no retries. */
  async checkHealth(signal?: AbortSignal): Promise<UpstreamStatus> {
    try {
      const report = await this.runAttempt(
        (attemptSignal) => this.provider.checkHealth({ signal: attemptSignal }),
        signal
      );
      this.health.recordSuccess();
      return { report, health: this.health.snapshot() };
    } catch (error) {
      if (signal?.aborted) throw new RequestAbortedError();
      this.health.recordFailure();
      logWarn('Extraction health check failed', {
        reason: getErrorMessage(error),
      });
      throw new UpstreamUnavailableError(1);
    }
  }

  private assertAvailable(kind: MediaKind): void {
    if (!this.health.isDegraded()) return;
    logWarn('Extraction service degraded, refusing stream', { kind });
    throw new UpstreamUnavailableError(0);
  }

  private async runAttempt<T>(
    call: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    timer.unref();

    const attemptSignal = signal
      ? AbortSignal.any([signal, controller.signal])
      : controller.signal;

    try {
      return await call(attemptSignal);
    } catch (error) {
      if (timedOut && !signal?.aborted) {
        throw new UpstreamCallError(
          `Extraction call timed out after ${this.timeoutMs}ms`,
          'timeout'
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private recordAttempt(attempt: UpstreamAttempt): void {
    // A 4xx still proves the service is answering.
    if (attempt.outcome === 'retryable') this.health.recordFailure();
    else this.health.recordSuccess();
  }
}
