import type {
  UpstreamHealthReport,
  UpstreamMetadata,
} from '../../schemas/upstream.js';
import type {
  AudioFormat,
  AudioQuality,
  UpstreamMedia,
  VideoFormat,
  VideoQuality,
} from '../../types/media.js';

export interface ProviderCallOptions {
  signal: AbortSignal;
}

export interface StreamCallOptions<F extends string> extends ProviderCallOptions {
  format: F;
}

/**
 * Collaborator that talks to the media extraction backend. Implementations
 * reject with `UpstreamCallError` so the orchestrator can classify failures.
 */
export interface ExtractionProvider {
  fetchMetadata(
    url: string,
    options: ProviderCallOptions
  ): Promise<UpstreamMetadata>;
  openAudioStream(
    url: string,
    quality: AudioQuality,
    options: StreamCallOptions<AudioFormat>
  ): Promise<UpstreamMedia>;
  openVideoStream(
    url: string,
    quality: VideoQuality,
    options: StreamCallOptions<VideoFormat>
  ): Promise<UpstreamMedia>;
  checkHealth(options: ProviderCallOptions): Promise<UpstreamHealthReport>;
  /** Releases pooled connections. */
  destroy?(): void;
}
