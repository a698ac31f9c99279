import { RESPONSE_LIMITS } from '../../config/constants.js';

import type {
  AudioFormat,
  MediaMetadata,
  VideoFormat,
} from '../../types/media.js';

import {
  buildContentDisposition,
  sanitizeFilename,
  toAsciiHeaderValue,
} from '../../utils/sanitizer.js';

import type { StreamSelection } from '../upstream/orchestrator.js';

const AUDIO_CONTENT_TYPES: Readonly<Record<AudioFormat, string>> = {
  mp3: 'audio/mpeg',
  m4a: 'audio/mp4',
  aac: 'audio/aac',
  ogg: 'audio/ogg',
  webm: 'audio/webm',
};

const VIDEO_CONTENT_TYPES: Readonly<Record<VideoFormat, string>> = {
  mp4: 'video/mp4',
  webm: 'video/webm',
};

export function contentTypeFor(selection: StreamSelection): string {
  return selection.kind === 'audio'
    ? AUDIO_CONTENT_TYPES[selection.format]
    : VIDEO_CONTENT_TYPES[selection.format];
}

export function buildDownloadHeaders(
  metadata: MediaMetadata,
  selection: StreamSelection
): Record<string, string> {
  const base = sanitizeFilename(
    metadata.title,
    RESPONSE_LIMITS.maxFilenameLength
  );

  return {
    'Content-Type': contentTypeFor(selection),
    'Content-Disposition': buildContentDisposition(
      `${base}.${selection.format}`
    ),
    'X-Source-Title': toAsciiHeaderValue(metadata.title),
    'X-Source-Duration': String(metadata.durationSeconds),
    'X-Source-Id': metadata.id,
    'Cache-Control': 'no-store',
  };
}
