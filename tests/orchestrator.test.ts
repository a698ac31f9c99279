import { describe, expect, test, vi } from 'vitest';

import {
  RequestAbortedError,
  UpstreamCallError,
  UpstreamRejectedError,
  UpstreamUnavailableError,
} from '../src/errors/app-error.js';
import {
  UpstreamOrchestrator,
  type UpstreamOrchestratorOptions,
} from '../src/services/upstream/orchestrator.js';
import type { ValidatedTarget } from '../src/types/media.js';
import {
  FakeExtractionProvider,
  sampleMetadata,
} from './helpers/fake-provider.js';

const target: ValidatedTarget = {
  sanitizedUrl: 'https://www.youtube.com/watch?v=abcDEF12345',
  hostname: 'www.youtube.com',
  videoId: 'abcDEF12345',
};

function createOrchestrator(
  provider: FakeExtractionProvider,
  overrides: Partial<UpstreamOrchestratorOptions> = {}
): UpstreamOrchestrator {
  return new UpstreamOrchestrator({
    provider,
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
    health: { failureThreshold: 3, cooldownMs: 30_000 },
    timeoutMs: 1000,
    sleep: () => Promise.resolve(),
    ...overrides,
  });
}

const serverError = (): UpstreamCallError =>
  new UpstreamCallError('Extraction service returned 500', 'http', 500);

describe('UpstreamOrchestrator', () => {
  describe('fetchMetadata', () => {
    test('shapes the upstream metadata for clients', async () => {
      const provider = new FakeExtractionProvider();
      provider.metadata = sampleMetadata({
        title: `  Live\u0000Set ${'x'.repeat(300)}`,
        thumbnails: Array.from({ length: 8 }, (_, i) => ({
          url: `https://img.example.test/${i}.jpg`,
          width: 120,
          height: 90,
        })),
      });

      const metadata = await createOrchestrator(provider).fetchMetadata(target);

      expect(metadata.id).toBe('abcDEF12345');
      expect(metadata.title).toHaveLength(200);
      expect(metadata.title.startsWith('Live Set xxx')).toBe(true);
      expect(metadata.title.endsWith('...')).toBe(true);
      expect(metadata.thumbnails).toHaveLength(5);
      expect(metadata.durationSeconds).toBe(212);
    });

    test('does not retry a 4xx', async () => {
      const provider = new FakeExtractionProvider();
      provider.metadataFailures.push(
        new UpstreamCallError('Extraction service returned 404', 'http', 404)
      );

      await expect(
        createOrchestrator(provider).fetchMetadata(target)
      ).rejects.toBeInstanceOf(UpstreamRejectedError);
      expect(provider.calls.metadata).toBe(1);
    });

    test('retries 5xx and recovers', async () => {
      const provider = new FakeExtractionProvider();
      provider.metadataFailures.push(serverError(), serverError());

      const metadata = await createOrchestrator(provider).fetchMetadata(target);

      expect(metadata.title).toBe('Sample Track');
      expect(provider.calls.metadata).toBe(3);
    });

    test('gives up after the retry budget', async () => {
      const provider = new FakeExtractionProvider();
      provider.metadataFailures.push(serverError(), serverError(), serverError());

      await expect(
        createOrchestrator(provider).fetchMetadata(target)
      ).rejects.toBeInstanceOf(UpstreamUnavailableError);
      expect(provider.calls.metadata).toBe(3);
    });

    test('raises RequestAbortedError when the client is gone', async () => {
      const provider = new FakeExtractionProvider();
      const controller = new AbortController();
      controller.abort();

      await expect(
        createOrchestrator(provider).fetchMetadata(target, controller.signal)
      ).rejects.toBeInstanceOf(RequestAbortedError);
      expect(provider.calls.metadata).toBe(0);
    });
  });

  describe('callUpstream', () => {
    test('times out each attempt separately', async () => {
      const orchestrator = createOrchestrator(new FakeExtractionProvider(), {
        timeoutMs: 10,
        retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
      });
      const call = vi.fn(
        (signal: AbortSignal) =>
          new Promise<never>((_, reject) => {
            signal.addEventListener('abort', () => {
              reject(new UpstreamCallError('canceled', 'aborted'));
            });
          })
      );

      await expect(
        orchestrator.callUpstream('health', call)
      ).rejects.toBeInstanceOf(UpstreamUnavailableError);
      expect(call).toHaveBeenCalledTimes(2);
      expect(orchestrator.health.snapshot().consecutiveFailures).toBe(2);
    });
  });

  describe('openStream', () => {
    test('passes quality and format to the provider', async () => {
      const provider = new FakeExtractionProvider();

      const media = await createOrchestrator(provider).openStream(
        { kind: 'video', quality: '720p', format: 'webm' },
        target
      );
      media.close();

      expect(provider.streamRequests).toEqual([
        {
          kind: 'video',
          url: target.sanitizedUrl,
          quality: '720p',
          format: 'webm',
        },
      ]);
    });

    test('fails fast while the upstream is degraded', async () => {
      const provider = new FakeExtractionProvider();
      provider.metadataFailures.push(serverError(), serverError(), serverError());
      const orchestrator = createOrchestrator(provider);
      await orchestrator.fetchMetadata(target).catch(() => undefined);

      await expect(
        orchestrator.openStream(
          { kind: 'audio', quality: 'highestaudio', format: 'mp3' },
          target
        )
      ).rejects.toBeInstanceOf(UpstreamUnavailableError);
      expect(provider.calls.audio).toBe(0);
    });
  });

  describe('openDownload', () => {
    test('returns metadata and the open stream', async () => {
      const provider = new FakeExtractionProvider();

      const { metadata, media } = await createOrchestrator(
        provider
      ).openDownload(
        { kind: 'audio', quality: 'highestaudio', format: 'm4a' },
        target
      );
      media.close();

      expect(metadata.title).toBe('Sample Track');
      expect(provider.calls).toMatchObject({ metadata: 1, audio: 1 });
    });

    test('refuses before fetching metadata while degraded', async () => {
      const provider = new FakeExtractionProvider();
      provider.metadataFailures.push(serverError(), serverError(), serverError());
      const orchestrator = createOrchestrator(provider);
      await orchestrator.fetchMetadata(target).catch(() => undefined);
      expect(provider.calls.metadata).toBe(3);

      await expect(
        orchestrator.openDownload(
          { kind: 'video', quality: 'highest', format: 'mp4' },
          target
        )
      ).rejects.toBeInstanceOf(UpstreamUnavailableError);
      expect(provider.calls.metadata).toBe(3);
      expect(provider.calls.video).toBe(0);
    });
  });

  describe('checkHealth', () => {
    test('returns the report with the health snapshot', async () => {
      const provider = new FakeExtractionProvider();

      await expect(createOrchestrator(provider).checkHealth()).resolves.toEqual({
        report: { status: 'ok', version: '2.0.0' },
        health: {
          degraded: false,
          consecutiveFailures: 0,
          lastFailureAt: null,
          lastSuccessAt: expect.any(Number),
        },
      });
    });

    test('reports unavailable when the health check fails', async () => {
      const provider = new FakeExtractionProvider();
      provider.healthFailure = new UpstreamCallError('refused', 'transport');

      await expect(
        createOrchestrator(provider).checkHealth()
      ).rejects.toBeInstanceOf(UpstreamUnavailableError);
    });
  });
});
