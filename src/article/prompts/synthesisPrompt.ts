import type { ArticleStyle, ContentSource, PromptBundle } from "../types.js";
import { buildSystemPrompt, OUTPUT_FORMAT, styleInstruction } from "./shared.js";

export type SynthesisPromptInput = {
  summaries: string[];
  source: ContentSource;
  // unknown styles get the detailed guidance
  style: ArticleStyle | (string & {});
  language: string;
};

export function formatNumberedSummaries(summaries: string[]): string {
  return summaries.map((summary, index) => `--- Section ${index + 1} ---\n${summary}`).join("\n\n");
}

export function buildSynthesisPrompt(input: SynthesisPromptInput): PromptBundle {
  const userPrompt = [
    "You have summaries of different sections of a transcript. Synthesize these into a single coherent article.",
    "",
    `Source: ${input.source.title}`,
    "",
    "Section summaries:",
    formatNumberedSummaries(input.summaries),
    "",
    styleInstruction(input.style),
    "",
    OUTPUT_FORMAT,
  ].join("\n");

  return {
    systemPrompt: buildSystemPrompt(input.language),
    userPrompt,
  };
}
