import type { ArticleStyle, ContentSource, PromptBundle } from "../types.js";
import { buildSystemPrompt, formatSourceInfo, OUTPUT_FORMAT, styleInstruction } from "./shared.js";

export type GenerationPromptInput = {
  transcriptText: string;
  source: ContentSource;
  // unknown styles get the detailed guidance
  style: ArticleStyle | (string & {});
  language: string;
};

export function buildGenerationPrompt(input: GenerationPromptInput): PromptBundle {
  const userPrompt = [
    "Transform the following transcript into an article.",
    "",
    "Source Information:",
    formatSourceInfo(input.source),
    "",
    `Style: ${styleInstruction(input.style)}`,
    "",
    OUTPUT_FORMAT,
    "",
    "Transcript:",
    input.transcriptText,
  ].join("\n");

  return {
    systemPrompt: buildSystemPrompt(input.language),
    userPrompt,
  };
}
