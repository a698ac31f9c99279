import { PassThrough, Readable } from 'node:stream';

import { describe, expect, type Mock, test, vi } from 'vitest';

import {
  RequestAbortedError,
  StreamTimeoutError,
} from '../src/errors/app-error.js';
import { proxyStream } from '../src/services/stream/stream-proxy.js';
import type { UpstreamMedia } from '../src/types/media.js';
import { FakeSink } from './helpers/fake-sink.js';

const headers = {
  'Content-Type': 'audio/mpeg',
  'Content-Disposition': 'attachment; filename="track.mp3"',
};

function mediaFrom(body: Readable): {
  media: UpstreamMedia;
  close: Mock<() => void>;
} {
  const close = vi.fn(() => {
    body.destroy();
  });
  return { media: { body, close }, close };
}

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

describe('proxyStream', () => {
  test('copies every chunk and completes', async () => {
    const { media, close } = mediaFrom(
      Readable.from([Buffer.from('hello '), Buffer.from('world')])
    );
    const sink = new FakeSink();

    const outcome = await proxyStream(media, sink, {
      deadlineMs: 1000,
      headers,
    });

    expect(outcome).toEqual({
      state: 'completed',
      bytesTransferred: 11,
      headersSent: true,
    });
    expect(sink.body).toBe('hello world');
    expect(sink.writableEnded).toBe(true);
    expect(sink.headers.get('content-type')).toBe('audio/mpeg');
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('honours backpressure from a slow client', async () => {
    const chunks = Array.from({ length: 20 }, (_, i) =>
      Buffer.from(`chunk-${String(i).padStart(2, '0')};`)
    );
    const { media } = mediaFrom(Readable.from(chunks));
    const sink = new FakeSink(1, 4);

    const outcome = await proxyStream(media, sink, {
      deadlineMs: 5000,
      headers,
    });

    expect(outcome.state).toBe('completed');
    expect(outcome.bytesTransferred).toBe(20 * 9);
    expect(sink.received).toHaveLength(20);
  });

  test('times out and closes the upstream exactly once', async () => {
    const { media, close } = mediaFrom(new PassThrough());
    const sink = new FakeSink();

    const outcome = await proxyStream(media, sink, {
      deadlineMs: 20,
      headers,
    });
    await wait(30);

    expect(outcome.state).toBe('timedOut');
    expect(outcome.headersSent).toBe(false);
    expect(outcome.error).toBeInstanceOf(StreamTimeoutError);
    expect(sink.headers.size).toBe(0);
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('destroys the connection when the deadline hits mid-transfer', async () => {
    const body = new PassThrough();
    body.write('partial');
    const { media, close } = mediaFrom(body);
    const sink = new FakeSink();

    const outcome = await proxyStream(media, sink, {
      deadlineMs: 30,
      headers,
    });

    expect(outcome).toMatchObject({
      state: 'timedOut',
      bytesTransferred: 7,
      headersSent: true,
    });
    expect(sink.destroyed).toBe(true);
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('aborts when the upstream fails', async () => {
    const body = new PassThrough();
    const { media, close } = mediaFrom(body);
    setImmediate(() => body.destroy(new Error('upstream reset')));

    const outcome = await proxyStream(media, new FakeSink(), {
      deadlineMs: 1000,
      headers,
    });

    expect(outcome.state).toBe('aborted');
    expect(outcome.error?.message).toBe('upstream reset');
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('aborts when the client disconnects', async () => {
    const { media, close } = mediaFrom(new PassThrough());
    const sink = new FakeSink();
    setImmediate(() => sink.destroy());

    const outcome = await proxyStream(media, sink, {
      deadlineMs: 1000,
      headers,
    });

    expect(outcome.state).toBe('aborted');
    expect(outcome.error).toBeInstanceOf(RequestAbortedError);
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('aborts at once when the client is already gone', async () => {
    const { media, close } = mediaFrom(new PassThrough());
    const sink = new FakeSink();
    sink.destroy();

    const outcome = await proxyStream(media, sink, {
      deadlineMs: 1000,
      headers,
    });

    expect(outcome.state).toBe('aborted');
    expect(close).toHaveBeenCalledTimes(1);
  });
});
