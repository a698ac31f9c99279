import { RESPONSE_LIMITS } from '../../config/constants.js';

import type { UpstreamMetadata } from '../../schemas/upstream.js';

import type { MediaMetadata, ValidatedTarget } from '../../types/media.js';

import { sanitizeText, truncateText } from '../../utils/sanitizer.js';

/**
 * Builds the client-facing metadata. The id always comes from the validated
 * URL, never from the extraction service.
 */
export function shapeMetadata(
  target: ValidatedTarget,
  upstream: UpstreamMetadata
): MediaMetadata {
  return {
    id: target.videoId,
    title: truncateText(
      sanitizeText(upstream.title),
      RESPONSE_LIMITS.maxTitleLength
    ),
    durationSeconds: upstream.durationSeconds,
    author: truncateText(
      sanitizeText(upstream.author),
      RESPONSE_LIMITS.maxAuthorLength
    ),
    thumbnails: upstream.thumbnails.slice(0, RESPONSE_LIMITS.maxThumbnails),
    audioFormats: upstream.audioFormats.slice(0, RESPONSE_LIMITS.maxFormats),
    videoFormats: upstream.videoFormats.slice(0, RESPONSE_LIMITS.maxFormats),
  };
}
