export const SERVICE_NAME = 'media-stream-gateway';

export const SIZE_LIMITS = {
  SIXTEEN_KB: 16 * 1024,
  ONE_MB: 1024 * 1024,
} as const;

export const TIMEOUT = {
  DEFAULT_UPSTREAM_TIMEOUT_MS: 30_000,
  DEFAULT_DNS_LOOKUP_TIMEOUT_MS: 5_000,
  AUDIO_STREAM_DEADLINE_MS: 300_000,
  VIDEO_STREAM_DEADLINE_MS: 600_000,
  SHUTDOWN_GRACE_MS: 10_000,
} as const;

export const DEFAULT_MEDIA_HOSTS = [
  'youtube.com',
  'www.youtube.com',
  'm.youtube.com',
  'music.youtube.com',
  'youtu.be',
] as const;

export const ALLOWED_QUERY_PARAMS = ['v', 't', 'list', 'index', 'start'];

export const RESPONSE_LIMITS = {
  maxThumbnails: 5,
  maxFormats: 10,
  maxTitleLength: 200,
  maxAuthorLength: 100,
  maxFilenameLength: 120,
  maxLoggedUserAgent: 120,
  maxUserAgentHeader: 1000,
} as const;
