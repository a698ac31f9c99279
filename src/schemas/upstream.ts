import { z } from 'zod';

// Responses from the extraction service are untrusted. Unknown keys are
// ignored and malformed optional sections fall back to empty values.

/** Keeps the entries that parse and drops the rest. */
function lenientArray<T extends z.ZodType>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((entries): z.output<T>[] =>
      entries.flatMap((entry) => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

const thumbnailSchema = z.object({
  url: z.url({ protocol: /^https?$/i }).max(2048),
  width: z.number().int().nonnegative().catch(0),
  height: z.number().int().nonnegative().catch(0),
});

const audioFormatSchema = z.object({
  itag: z.number().int(),
  mimeType: z.string().max(256).catch(''),
  bitrate: z.number().nonnegative().catch(0),
  audioQuality: z.string().max(64).catch(''),
  audioSampleRate: z.coerce.number().nonnegative().catch(0),
});

const videoFormatSchema = z.object({
  itag: z.number().int(),
  mimeType: z.string().max(256).catch(''),
  qualityLabel: z.string().max(32).catch(''),
  width: z.number().int().nonnegative().catch(0),
  height: z.number().int().nonnegative().catch(0),
  fps: z.number().nonnegative().catch(0),
  hasAudio: z.boolean().catch(false),
});

export const upstreamMetadataSchema = z.object({
  title: z.string(),
  durationSeconds: z.coerce.number().int().nonnegative().catch(0),
  author: z.string().catch(''),
  thumbnails: lenientArray(thumbnailSchema),
  audioFormats: lenientArray(audioFormatSchema),
  videoFormats: lenientArray(videoFormatSchema),
});

export const upstreamHealthSchema = z.object({
  status: z.string().max(64),
  version: z.string().max(64).optional(),
});

export type UpstreamMetadata = z.infer<typeof upstreamMetadataSchema>;
export type UpstreamHealthReport = z.infer<typeof upstreamHealthSchema>;
