import { log } from "../utils/logger.js";
import { chunkText } from "./chunker.js";
import { parseArticleResponse } from "./parseArticle.js";
import { buildChunkSummaryPrompt } from "./prompts/chunkSummaryPrompt.js";
import { buildGenerationPrompt } from "./prompts/generationPrompt.js";
import { buildSynthesisPrompt } from "./prompts/synthesisPrompt.js";
import type {
  GenerateArticleInput,
  GenerateArticleOutput,
  GenerationStrategy,
  LlmCall,
  LlmCallInput,
  LlmCallLog,
  PipelineLimits,
} from "./types.js";

const articleLog = log.withScope("article");

// ~50k tokens at 4 chars/token
export const SINGLE_PASS_CHAR_LIMIT = 200_000;
export const CHUNK_SIZE_CHARS = 200_000;
export const CHUNK_OVERLAP_CHARS = 2_000;

export const DEFAULT_LIMITS: PipelineLimits = {
  singlePassCharLimit: SINGLE_PASS_CHAR_LIMIT,
  chunkSize: CHUNK_SIZE_CHARS,
  chunkOverlap: CHUNK_OVERLAP_CHARS,
};

export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export function chooseStrategy(textLength: number, singlePassCharLimit: number = SINGLE_PASS_CHAR_LIMIT): GenerationStrategy {
  return textLength <= singlePassCharLimit ? "single-pass" : "chunked";
}

async function timedCall(
  callLlm: LlmCall,
  input: LlmCallInput,
  chunkNumber: number | null,
  logs: LlmCallLog[],
): Promise<string> {
  const start = Date.now();
  const response = await callLlm(input);
  const durationMs = Date.now() - start;

  logs.push({
    kind: input.kind,
    chunkNumber,
    reqChars: input.systemPrompt.length + input.userPrompt.length,
    respChars: response.length,
    durationMs,
  });

  return response;
}

/**
 * Turns a transcript into an Article.
 *
 * Short transcripts go out in one generation call. Longer ones are cut into overlapping
 * chunks, summarized one at a time, and the ordered summaries are synthesized into the article.
 * Calls are strictly sequential and any failure propagates unchanged: chunk summaries are not
 * kept when a later call fails.
 */
export async function generateArticle(
  input: GenerateArticleInput,
  deps: { callLlm: LlmCall },
): Promise<GenerateArticleOutput> {
  const limits: PipelineLimits = { ...DEFAULT_LIMITS, ...input.limits };
  const text = input.transcriptText;
  const strategy = chooseStrategy(text.length, limits.singlePassCharLimit);
  const calls: LlmCallLog[] = [];

  let raw: string;
  let chunkCount = 0;

  if (strategy === "single-pass") {
    articleLog.info(`Generating article (single-pass, ~${estimateTokens(text)} tokens)`, {
      contentId: input.contentId,
      style: input.style,
    });

    const prompt = buildGenerationPrompt({
      transcriptText: text,
      source: input.source,
      style: input.style,
      language: input.language,
    });

    raw = await timedCall(
      deps.callLlm,
      {
        kind: "generate",
        systemPrompt: prompt.systemPrompt,
        userPrompt: prompt.userPrompt,
        model: input.model,
        maxTokens: input.maxTokens,
      },
      null,
      calls,
    );
  } else {
    const chunks = Array.from(chunkText(text, { chunkSize: limits.chunkSize, overlap: limits.chunkOverlap }));
    chunkCount = chunks.length;
    articleLog.info(`Generating article (chunked, ${chunkCount} chunks, ~${estimateTokens(text)} tokens total)`, {
      contentId: input.contentId,
      style: input.style,
    });

    const summaries: string[] = [];
    for (const [index, chunk] of chunks.entries()) {
      const chunkNumber = index + 1;
      const summary = await timedCall(
        deps.callLlm,
        {
          kind: "chunk-summary",
          systemPrompt: "",
          userPrompt: buildChunkSummaryPrompt({ text: chunk, chunkNumber, totalChunks: chunkCount }),
          model: input.model,
          maxTokens: input.maxTokens,
        },
        chunkNumber,
        calls,
      );
      summaries.push(summary);
      articleLog.info(`Summarized chunk ${chunkNumber}/${chunkCount}`, { respChars: summary.length });
    }

    const prompt = buildSynthesisPrompt({
      summaries,
      source: input.source,
      style: input.style,
      language: input.language,
    });

    raw = await timedCall(
      deps.callLlm,
      {
        kind: "synthesis",
        systemPrompt: prompt.systemPrompt,
        userPrompt: prompt.userPrompt,
        model: input.model,
        maxTokens: input.maxTokens,
      },
      null,
      calls,
    );
  }

  const article = parseArticleResponse(raw, {
    contentId: input.contentId,
    style: input.style,
    source: input.source,
  });

  articleLog.info(`Article ready: "${article.title}" (${article.sections.length} sections)`);

  return {
    article,
    meta: {
      content_id: input.contentId,
      style: input.style,
      language: input.language,
      model: input.model,
      strategy,
      input_chars: text.length,
      estimated_tokens: estimateTokens(text),
      chunk_count: chunkCount,
      generated_at: new Date().toISOString(),
      calls,
    },
  };
}
