import { formatPublishDate } from "../../utils/timestamps.js";
import { isArticleStyle, type ArticleStyle, type ContentSource } from "../types.js";

export const LANGUAGE_CODES = [
  "en",
  "sv",
  "de",
  "fr",
  "es",
  "no",
  "da",
  "fi",
  "nl",
  "it",
  "pt",
  "ja",
  "ko",
  "zh",
] as const;

export type LanguageCode = (typeof LANGUAGE_CODES)[number];

export function isLanguageCode(value: string): value is LanguageCode {
  return LANGUAGE_CODES.some((code) => code === value);
}

/**
 * Human-readable name for a language code.
 * Unknown codes are returned verbatim so the model still gets a usable directive.
 */
export function languageName(code: string): string {
  if (!isLanguageCode(code)) return code;

  switch (code) {
    case "en":
      return "English";
    case "sv":
      return "Swedish";
    case "de":
      return "German";
    case "fr":
      return "French";
    case "es":
      return "Spanish";
    case "no":
      return "Norwegian";
    case "da":
      return "Danish";
    case "fi":
      return "Finnish";
    case "nl":
      return "Dutch";
    case "it":
      return "Italian";
    case "pt":
      return "Portuguese";
    case "ja":
      return "Japanese";
    case "ko":
      return "Korean";
    case "zh":
      return "Chinese";
  }
}

function instructionFor(style: ArticleStyle): string {
  switch (style) {
    case "detailed":
      return [
        "Write a comprehensive, detailed article that preserves most of the original content.",
        "Include all key points, examples, and supporting arguments.",
        "The article should be thorough enough that a reader would not need to watch or listen to the original.",
      ].join(" ");
    case "concise":
      return [
        "Write a concise article highlighting the key points and most important insights.",
        "Aim for roughly 30% of the original content length.",
        "Focus on the main arguments and conclusions, omitting tangents and repetition.",
      ].join(" ");
    case "summary":
      return [
        "Write an executive summary of 3-5 paragraphs capturing the core message and key takeaways.",
        "Readers should quickly understand what was discussed and the main conclusions.",
      ].join(" ");
    case "bullets":
      return [
        "Create structured bullet-point notes organized by topic, with nested bullets for sub-points.",
        "Include key quotes, statistics, and actionable insights.",
        "The notes should be easy to scan and reference later.",
      ].join(" ");
  }
}

/**
 * Style guidance for the prompt. Anything outside the closed style set gets the
 * "detailed" guidance; callers that must reject typos go through `parseArticleStyle` first.
 */
export function styleInstruction(style: string): string {
  return instructionFor(isArticleStyle(style) ? style : "detailed");
}

export function buildSystemPrompt(language: string): string {
  return `You are an expert writer who transforms video and podcast transcripts into well-structured, readable articles. You preserve the key insights, arguments, and information from the original content while making it engaging to read.

Guidelines:
- Preserve direct quotes when they are particularly insightful
- Attribute speakers when speaker information is available
- Generate a descriptive title that captures the essence of the content
- Include a TLDR/summary at the top
- Use clear section headings to organize the content
- Maintain the original tone and voice where appropriate
- Write the article in ${languageName(language)}`;
}

export const OUTPUT_FORMAT = `Respond with a JSON object matching this exact structure:
{
  "title": "A descriptive article title",
  "subtitle": "An optional subtitle or null",
  "summary": "A 2-3 sentence TLDR summary",
  "sections": [
    {
      "heading": "Section Heading",
      "body": "Section content in markdown format"
    }
  ]
}`;

export function formatSourceInfo(source: ContentSource): string {
  const lines = [`Title: ${source.title}`, `Type: ${source.kind}`];
  const published = source.publishedAt ? formatPublishDate(source.publishedAt) : null;
  if (published) {
    lines.push(`Published: ${published}`);
  }
  return lines.join("\n");
}
