import { randomUUID } from 'node:crypto';
import { once } from 'node:events';
import { addAbortSignal, type Writable } from 'node:stream';

import {
  RequestAbortedError,
  StreamAbortedError,
  StreamTimeoutError,
} from '../../errors/app-error.js';

import type { UpstreamMedia } from '../../types/media.js';

import { toError } from '../../utils/error-utils.js';

import { logDebug, logWarn } from '../logger.js';

import { StreamSession, type TerminalStreamState } from './stream-session.js';

/** The subset of `http.ServerResponse` the proxy writes to. */
export type ClientSink = Writable & {
  readonly headersSent: boolean;
  setHeader(name: string, value: string): unknown;
  removeHeader(name: string): void;
};

export interface ProxyStreamOptions {
  deadlineMs: number;
  headers: Readonly<Record<string, string>>;
  sessionId?: string;
}

export interface StreamOutcome {
  state: TerminalStreamState;
  bytesTransferred: number;
  headersSent: boolean;
  error?: Error;
}

function toChunk(chunk: unknown): Uint8Array | string {
  if (chunk instanceof Uint8Array || typeof chunk === 'string') return chunk;
  throw new StreamAbortedError('Upstream produced a non-binary chunk');
}

function byteLength(chunk: Uint8Array | string): number {
  return typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.byteLength;
}

async function pump(
  media: UpstreamMedia,
  response: ClientSink,
  session: StreamSession
): Promise<void> {
  const body: AsyncIterable<unknown> = addAbortSignal(
    session.signal,
    media.body
  );

  for await (const raw of body) {
    if (session.isTerminal) return;
    if (response.destroyed || response.writableEnded) {
      throw new RequestAbortedError();
    }

    const chunk = toChunk(raw);
    session.bytesTransferred += byteLength(chunk);
    if (!response.write(chunk)) {
      await once(response, 'drain', { signal: session.signal });
    }
  }
}

/**
 * Copies the upstream body to the client with backpressure under a hard
 * deadline. Never rejects; the outcome says how the session ended.
 */
export async function proxyStream(
  media: UpstreamMedia,
  response: ClientSink,
  options: ProxyStreamOptions
): Promise<StreamOutcome> {
  const session = new StreamSession(
    options.sessionId ?? randomUUID(),
    options.deadlineMs,
    () => media.close(),
    () => new StreamTimeoutError(options.deadlineMs)
  );

  const headerNames = Object.keys(options.headers);
  for (const name of headerNames) {
    response.setHeader(name, options.headers[name] ?? '');
  }

  const onClose = (): void => {
    if (!response.writableFinished) {
      session.finish('aborted', new RequestAbortedError());
    }
  };
  const onError = (error: Error): void => {
    session.finish('aborted', error);
  };
  response.once('close', onClose);
  response.once('error', onError);

  if (response.destroyed) {
    session.finish('aborted', new RequestAbortedError());
  }
  session.begin();
  logDebug('Stream session started', {
    sessionId: session.id,
    deadlineMs: session.deadlineMs,
  });

  try {
    await pump(media, response, session);
    if (!session.isTerminal) {
      response.end();
      session.finish('completed');
    }
  } catch (error) {
    session.finish('aborted', toError(error));
  } finally {
    response.off('close', onClose);
    response.off('error', onError);
  }

  return settle(session, response, headerNames);
}

function settle(
  session: StreamSession,
  response: ClientSink,
  headerNames: readonly string[]
): StreamOutcome {
  const { state, bytesTransferred, error } = session;
  const outcome: StreamOutcome = {
    state: state === 'completed' || state === 'timedOut' ? state : 'aborted',
    bytesTransferred,
    headersSent: response.headersSent,
    ...(error && { error }),
  };

  if (outcome.state === 'completed') {
    logDebug('Stream session completed', {
      sessionId: session.id,
      bytesTransferred,
    });
    return outcome;
  }

  if (!response.headersSent) {
    for (const name of headerNames) response.removeHeader(name);
    return outcome;
  }

  logWarn('Stream session failed after headers were sent', {
    sessionId: session.id,
    state: outcome.state,
    bytesTransferred,
    reason: error?.message,
  });
  response.destroy();
  return outcome;
}
