import type { Readable } from 'node:stream';

export const AUDIO_QUALITIES = [
  'highestaudio',
  'lowestaudio',
  'highest',
  'lowest',
] as const;

export const AUDIO_FORMATS = ['mp3', 'm4a', 'aac', 'ogg', 'webm'] as const;

export const VIDEO_QUALITIES = [
  'highest',
  'lowest',
  'highestvideo',
  'lowestvideo',
  '144p',
  '240p',
  '360p',
  '480p',
  '720p',
  '1080p',
  '1440p',
  '2160p',
] as const;

export const VIDEO_FORMATS = ['mp4', 'webm'] as const;

export type AudioQuality = (typeof AUDIO_QUALITIES)[number];
export type AudioFormat = (typeof AUDIO_FORMATS)[number];
export type VideoQuality = (typeof VIDEO_QUALITIES)[number];
export type VideoFormat = (typeof VIDEO_FORMATS)[number];

export type MediaKind = 'audio' | 'video';

interface IncomingRequestBase {
  readonly rawUrl: string;
  readonly clientIp: string;
}

export interface InfoRequest extends IncomingRequestBase {
  readonly kind: 'info';
}

export interface AudioRequest extends IncomingRequestBase {
  readonly kind: 'audio';
  readonly quality: AudioQuality;
  readonly format: AudioFormat;
}

export interface VideoRequest extends IncomingRequestBase {
  readonly kind: 'video';
  readonly quality: VideoQuality;
  readonly format: VideoFormat;
}

export type IncomingRequest = InfoRequest | AudioRequest | VideoRequest;

export type RequestKind = IncomingRequest['kind'];

export type IncomingRequestOf<K extends RequestKind> = Extract<
  IncomingRequest,
  { kind: K }
>;

/** Only produced by the URL guard once every check has passed. */
export interface ValidatedTarget {
  readonly sanitizedUrl: string;
  readonly hostname: string;
  readonly videoId: string;
}

export interface Thumbnail {
  url: string;
  width: number;
  height: number;
}

export interface AudioFormatInfo {
  itag: number;
  mimeType: string;
  bitrate: number;
  audioQuality: string;
  audioSampleRate: number;
}

export interface VideoFormatInfo {
  itag: number;
  mimeType: string;
  qualityLabel: string;
  width: number;
  height: number;
  fps: number;
  hasAudio: boolean;
}

export interface MediaMetadata {
  id: string;
  title: string;
  durationSeconds: number;
  author: string;
  thumbnails: Thumbnail[];
  audioFormats: AudioFormatInfo[];
  videoFormats: VideoFormatInfo[];
}

/**
 * Byte stream handed back by the extraction provider. `close` releases the
 * upstream connection and must be safe to call more than once.
 */
export interface UpstreamMedia {
  readonly body: Readable;
  close(): void;
}
