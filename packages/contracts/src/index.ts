import { z } from "zod";

export const IdSchema = z.string().min(1);
export type Id = z.infer<typeof IdSchema>;

export const IsoDateTimeSchema = z.string().min(1);
export type IsoDateTime = z.infer<typeof IsoDateTimeSchema>;

// ─── Videos ──────────────────────────────────────────────────────────────────

export const VideoRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  url: z.string(),
  description: z.string(),
  // Opaque, source-provided. Only ever compared as a string.
  publishedAt: z.string(),
  transcript: z.string(),
  viewCount: z.number().int().nonnegative(),
  duration: z.string(),
});
export type VideoRecord = z.infer<typeof VideoRecordSchema>;

export const SubtitleTrackSchema = z.object({
  language: z.string().nullish(),
  type: z.string().nullish(),
  plaintext: z.string().nullish(),
  srt: z.string().nullish(),
  vtt: z.string().nullish(),
  xml: z.string().nullish(),
});
export type SubtitleTrack = z.infer<typeof SubtitleTrackSchema>;

// One dataset item from the scraper actor. Every field falls back to a default so a
// partially populated item still maps to a record.
export const ScrapedVideoItemSchema = z.object({
  id: z.string().catch(""),
  title: z.string().catch("Untitled"),
  url: z.string().catch(""),
  description: z.string().catch(""),
  date: z.string().catch(""),
  subtitles: z.union([z.string(), z.array(SubtitleTrackSchema)]).nullable().catch(null),
  viewCount: z
    .number()
    .nonnegative()
    .transform((n) => Math.floor(n))
    .catch(0),
  duration: z.string().catch(""),
});
export type ScrapedVideoItem = z.infer<typeof ScrapedVideoItemSchema>;

export const TranscriptManifestSchema = z.object({
  totalVideos: z.number().int().nonnegative(),
  processedAt: IsoDateTimeSchema,
  videos: z.array(VideoRecordSchema),
});
export type TranscriptManifest = z.infer<typeof TranscriptManifestSchema>;

// ─── Apify ───────────────────────────────────────────────────────────────────

export const ApifyErrorSchema = z.object({
  error: z.object({
    type: z.string().optional(),
    message: z.string().min(1),
  }),
});
export type ApifyError = z.infer<typeof ApifyErrorSchema>;

export const ApifyRunSchema = z.object({
  id: IdSchema,
  actId: z.string().optional(),
  actorTaskId: z.string().nullish(),
  status: z.string().min(1),
  statusMessage: z.string().nullish(),
  defaultDatasetId: IdSchema,
});
export type ApifyRun = z.infer<typeof ApifyRunSchema>;

export const ApifyRunResponseSchema = z.object({ data: ApifyRunSchema });

export const ApifyTaskSchema = z.object({
  id: IdSchema,
  name: z.string(),
  actId: z.string().optional(),
});
export type ApifyTask = z.infer<typeof ApifyTaskSchema>;

export const ApifyTaskResponseSchema = z.object({ data: ApifyTaskSchema });

export const ApifyDatasetItemsSchema = z.array(z.unknown());

export const ScrapeInputSchema = z.object({
  startUrls: z.array(z.object({ url: z.string().url() })).min(1),
  maxResults: z.number().int().positive(),
  getSubtitles: z.boolean(),
  subtitlesLanguage: z.string().min(2),
  subtitlesFormat: z.enum(["plaintext", "srt", "vtt", "xml"]),
});
export type ScrapeInput = z.infer<typeof ScrapeInputSchema>;

// ─── Gemini ──────────────────────────────────────────────────────────────────

export const GeminiErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().min(1),
    status: z.string().optional(),
  }),
});
export type GeminiError = z.infer<typeof GeminiErrorSchema>;

export const GeminiFileStateSchema = z.enum(["STATE_UNSPECIFIED", "PROCESSING", "ACTIVE", "FAILED"]);
export type GeminiFileState = z.infer<typeof GeminiFileStateSchema>;

export const GeminiFileSchema = z.object({
  name: IdSchema,
  displayName: z.string().default(""),
  mimeType: z.string().default("text/plain"),
  uri: z.string().default(""),
  state: GeminiFileStateSchema.catch("STATE_UNSPECIFIED"),
  error: z.object({ message: z.string().optional() }).optional(),
});
export type GeminiFile = z.infer<typeof GeminiFileSchema>;

export const GeminiUploadResponseSchema = z.object({ file: GeminiFileSchema });

export const GeminiListFilesResponseSchema = z.object({
  files: z.array(GeminiFileSchema).default([]),
  nextPageToken: z.string().optional(),
});

export const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
    })
    .optional(),
});
export type GenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;

export const ContextStateSchema = z.enum(["pending", "ready", "failed"]);
export type ContextState = z.infer<typeof ContextStateSchema>;

export const UploadedContextSchema = z.object({
  name: IdSchema,
  displayName: z.string(),
  uri: z.string(),
  mimeType: z.string(),
  state: ContextStateSchema,
});
export type UploadedContext = z.infer<typeof UploadedContextSchema>;
