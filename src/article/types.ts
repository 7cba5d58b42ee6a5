import { DateTime } from "luxon";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export const ARTICLE_STYLES = ["detailed", "concise", "summary", "bullets"] as const;
export type ArticleStyle = (typeof ARTICLE_STYLES)[number];

export const SOURCE_KINDS = ["youtube", "podcast"] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export const TRANSCRIPT_METHODS = ["captions", "whisper-local", "whisper-api"] as const;
export type TranscriptMethod = (typeof TRANSCRIPT_METHODS)[number];

export const ArticleStyleSchema = z.enum(ARTICLE_STYLES);

const IsoDateTimeSchema = z
  .string()
  .refine((value) => DateTime.fromISO(value, { setZone: true }).isValid, {
    message: "Expected an ISO-8601 date-time",
  });

export const ContentSourceSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  kind: z.enum(SOURCE_KINDS),
  durationSeconds: z.number().int().nonnegative().optional(),
  publishedAt: IsoDateTimeSchema.optional(),
  feedUrl: z.string().optional(),
});

export type ContentSource = Readonly<z.infer<typeof ContentSourceSchema>>;

export const TranscriptSegmentSchema = z
  .object({
    start: z.number(),
    end: z.number(),
    text: z.string(),
    speaker: z.string().optional(),
  })
  .refine((segment) => segment.end >= segment.start, {
    message: "Segment end must not precede its start",
    path: ["end"],
  });

export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

export const TranscriptSchema = z.object({
  contentId: z.string().min(1),
  text: z.string(),
  segments: z.array(TranscriptSegmentSchema),
  language: z.string(),
  method: z.enum(TRANSCRIPT_METHODS),
});

export type Transcript = z.infer<typeof TranscriptSchema>;

export const ArticleSectionSchema = z.object({
  heading: z.string(),
  body: z.string(),
});

export type ArticleSection = z.infer<typeof ArticleSectionSchema>;

export const ArticleSchema = z.object({
  contentId: z.string().min(1),
  title: z.string(),
  subtitle: z.string().nullable(),
  sections: z.array(ArticleSectionSchema),
  summary: z.string(),
  style: ArticleStyleSchema,
  source: ContentSourceSchema,
});

export type Article = z.infer<typeof ArticleSchema>;

export function isArticleStyle(value: string): value is ArticleStyle {
  return ARTICLE_STYLES.some((style) => style === value);
}

/** `name` is what the value came from (an env key, a CLI flag) and appears in the error. */
export function parseArticleStyle(value: string, name = "style"): ArticleStyle {
  if (isArticleStyle(value)) return value;
  throw new ConfigurationError(`Invalid value for ${name}: ${value}. Allowed: ${ARTICLE_STYLES.join(", ")}`);
}

export type LlmCallKind = "generate" | "chunk-summary" | "synthesis";

export type LlmCallInput = {
  kind: LlmCallKind;
  systemPrompt: string;
  userPrompt: string;
  model: string;
  maxTokens: number;
};

export type LlmCall = (input: LlmCallInput) => Promise<string>;

export type PromptBundle = {
  systemPrompt: string;
  userPrompt: string;
};

export type GenerationStrategy = "single-pass" | "chunked";

export type PipelineLimits = {
  singlePassCharLimit: number;
  chunkSize: number;
  chunkOverlap: number;
};

export type GenerateArticleInput = {
  transcriptText: string;
  contentId: string;
  source: ContentSource;
  style: ArticleStyle;
  language: string;
  model: string;
  maxTokens: number;
  limits?: Partial<PipelineLimits>;
};

export type LlmCallLog = {
  kind: LlmCallKind;
  chunkNumber: number | null;
  reqChars: number;
  respChars: number;
  durationMs: number;
};

export type ArticleRunMeta = {
  content_id: string;
  style: ArticleStyle;
  language: string;
  model: string;
  strategy: GenerationStrategy;
  input_chars: number;
  estimated_tokens: number;
  chunk_count: number;
  generated_at: string;
  calls: LlmCallLog[];
};

export type GenerateArticleOutput = {
  article: Article;
  meta: ArticleRunMeta;
};
