import { z } from 'zod';

import {
  AUDIO_FORMATS,
  AUDIO_QUALITIES,
  VIDEO_FORMATS,
  VIDEO_QUALITIES,
} from '../types/media.js';

const mediaUrl = z
  .string({ error: 'url must be a string' })
  .describe('Media page URL on an allow-listed host.');

export const infoRequestSchema = z.strictObject({
  url: mediaUrl,
});

export const audioRequestSchema = z.strictObject({
  url: mediaUrl,
  quality: z
    .enum(AUDIO_QUALITIES)
    .default('highestaudio')
    .describe('Audio quality preset.'),
  format: z.enum(AUDIO_FORMATS).default('mp3').describe('Container format.'),
});

export const videoRequestSchema = z.strictObject({
  url: mediaUrl,
  quality: z
    .enum(VIDEO_QUALITIES)
    .default('highest')
    .describe('Video quality preset or resolution.'),
  format: z.enum(VIDEO_FORMATS).default('mp4').describe('Container format.'),
});
