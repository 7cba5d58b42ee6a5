export type ChunkSummaryPromptInput = {
  text: string;
  chunkNumber: number; // 1-based
  totalChunks: number;
};

/** Single user message; chunk summary calls go out without a system prompt. */
export function buildChunkSummaryPrompt(input: ChunkSummaryPromptInput): string {
  return [
    `Summarize this section of a transcript, preserving key points, quotes, and insights. This is part ${input.chunkNumber} of ${input.totalChunks} of a longer transcript.`,
    "",
    "Transcript section:",
    input.text,
    "",
    "Provide a detailed summary that can later be combined with summaries of other sections.",
  ].join("\n");
}
