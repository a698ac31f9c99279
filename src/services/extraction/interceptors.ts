import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { Readable } from 'node:stream';

import {
  type AxiosError,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
  isAxiosError,
  isCancel,
} from 'axios';

import { UpstreamCallError } from '../../errors/app-error.js';

import { logDebug, logWarn } from '../logger.js';

const SLOW_REQUEST_MS = 5000;

interface RequestTiming {
  start: number;
  requestId: string;
}

const timings = new WeakMap<InternalAxiosRequestConfig, RequestTiming>();

function takeTiming(
  config: InternalAxiosRequestConfig | undefined
): { duration: number; requestId?: string } {
  if (!config) return { duration: 0 };
  const timing = timings.get(config);
  timings.delete(config);
  if (!timing) return { duration: 0 };
  return {
    duration: Math.round(performance.now() - timing.start),
    requestId: timing.requestId,
  };
}

function releaseErrorBody(error: AxiosError): void {
  const data: unknown = error.response?.data;
  if (data instanceof Readable) data.destroy();
}

export function handleRequest(
  config: InternalAxiosRequestConfig
): InternalAxiosRequestConfig {
  const requestId = randomUUID().substring(0, 8);
  timings.set(config, { start: performance.now(), requestId });

  logDebug('Extraction request', {
    upstreamRequestId: requestId,
    method: config.method?.toUpperCase(),
    path: config.url,
  });

  return config;
}

export function handleResponse(response: AxiosResponse): AxiosResponse {
  const { duration, requestId } = takeTiming(response.config);

  logDebug('Extraction response', {
    upstreamRequestId: requestId,
    status: response.status,
    path: response.config.url,
    duration: `${duration}ms`,
  });

  if (duration > SLOW_REQUEST_MS) {
    logWarn('Slow extraction request detected', {
      upstreamRequestId: requestId,
      path: response.config.url,
      duration: `${duration}ms`,
    });
  }

  return response;
}

/**
 * Maps every axios failure onto `UpstreamCallError`. Upstream response text
 * is never copied into the message.
 */
export function handleResponseError(error: unknown): Promise<never> {
  if (!isAxiosError(error)) {
    return Promise.reject(
      new UpstreamCallError(
        error instanceof Error ? error.message : 'Unknown extraction error',
        'transport'
      )
    );
  }

  const { duration, requestId } = takeTiming(error.config);
  const path = error.config?.url ?? 'unknown';
  releaseErrorBody(error);

  if (isCancel(error) || error.name === 'CanceledError') {
    logDebug('Extraction request canceled', {
      path,
      upstreamRequestId: requestId,
    });
    return Promise.reject(
      new UpstreamCallError('Extraction request was canceled', 'aborted')
    );
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    logWarn('Extraction request timed out', {
      path,
      upstreamRequestId: requestId,
      duration: `${duration}ms`,
    });
    return Promise.reject(
      new UpstreamCallError('Extraction request timed out', 'timeout')
    );
  }

  if (error.response) {
    const { status } = error.response;
    logWarn('Extraction service error response', {
      path,
      status,
      upstreamRequestId: requestId,
    });
    return Promise.reject(
      new UpstreamCallError(
        `Extraction service returned ${status}`,
        'http',
        status
      )
    );
  }

  logWarn('Extraction service unreachable', {
    path,
    code: error.code,
    upstreamRequestId: requestId,
  });
  return Promise.reject(
    new UpstreamCallError(
      `Network error: ${error.code ?? 'unknown'}`,
      'transport'
    )
  );
}
