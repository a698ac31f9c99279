import http from 'node:http';
import https from 'node:https';
import { Readable } from 'node:stream';

import axios, { type AxiosInstance } from 'axios';

import { SERVICE_NAME } from '../../config/constants.js';

import { UpstreamCallError } from '../../errors/app-error.js';

import {
  type UpstreamHealthReport,
  type UpstreamMetadata,
  upstreamHealthSchema,
  upstreamMetadataSchema,
} from '../../schemas/upstream.js';

import type {
  AudioFormat,
  AudioQuality,
  MediaKind,
  UpstreamMedia,
  VideoFormat,
  VideoQuality,
} from '../../types/media.js';

import { logDebug } from '../logger.js';

import {
  handleRequest,
  handleResponse,
  handleResponseError,
} from './interceptors.js';
import type {
  ExtractionProvider,
  ProviderCallOptions,
  StreamCallOptions,
} from './provider.js';

export interface HttpExtractionProviderOptions {
  baseUrl: string;
  userAgent?: string;
}

const MALFORMED_STATUS = 502;

function toUpstreamMedia(body: Readable): UpstreamMedia {
  return {
    body,
    close: () => {
      if (!body.destroyed) body.destroy();
    },
  };
}

/**
 * Extraction provider backed by the extraction microservice's HTTP API.
 * Per-attempt timeouts come from the caller's signal.
 */
export class HttpExtractionProvider implements ExtractionProvider {
  private readonly client: AxiosInstance;
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });

  constructor(options: HttpExtractionProviderOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      maxRedirects: 0,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: {
        'User-Agent': options.userAgent ?? SERVICE_NAME,
        Accept: 'application/json',
      },
      validateStatus: (status) => status >= 200 && status < 300,
    });

    this.client.interceptors.request.use(handleRequest);
    this.client.interceptors.response.use(handleResponse, handleResponseError);
  }

  async fetchMetadata(
    url: string,
    options: ProviderCallOptions
  ): Promise<UpstreamMetadata> {
    const response = await this.client.post<unknown>(
      '/v1/media/info',
      { url },
      { signal: options.signal, responseType: 'json' }
    );

    const parsed = upstreamMetadataSchema.safeParse(response.data);
    if (!parsed.success) {
      logDebug('Extraction metadata failed validation', {
        issues: parsed.error.issues.length,
      });
      throw new UpstreamCallError(
        'Extraction service returned malformed metadata',
        'http',
        MALFORMED_STATUS
      );
    }
    return parsed.data;
  }

  openAudioStream(
    url: string,
    quality: AudioQuality,
    options: StreamCallOptions<AudioFormat>
  ): Promise<UpstreamMedia> {
    return this.openStream('audio', url, quality, options);
  }

  openVideoStream(
    url: string,
    quality: VideoQuality,
    options: StreamCallOptions<VideoFormat>
  ): Promise<UpstreamMedia> {
    return this.openStream('video', url, quality, options);
  }

  async checkHealth(
    options: ProviderCallOptions
  ): Promise<UpstreamHealthReport> {
    const response = await this.client.get<unknown>('/healthz', {
      signal: options.signal,
      responseType: 'json',
    });

    const parsed = upstreamHealthSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamCallError(
        'Extraction service returned a malformed health report',
        'http',
        MALFORMED_STATUS
      );
    }
    return parsed.data;
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private async openStream(
    kind: MediaKind,
    url: string,
    quality: string,
    options: StreamCallOptions<string>
  ): Promise<UpstreamMedia> {
    const response = await this.client.post<unknown>(
      `/v1/media/${kind}`,
      { url, quality, format: options.format },
      {
        signal: options.signal,
        responseType: 'stream',
        headers: { Accept: '*/*' },
      }
    );

    const body: unknown = response.data;
    if (!(body instanceof Readable)) {
      throw new UpstreamCallError(
        'Extraction service did not return a byte stream',
        'http',
        MALFORMED_STATUS
      );
    }
    return toUpstreamMedia(body);
  }
}
