import { ArticleParseError } from "../errors.js";

const FENCE = "```";
const PREVIEW_CHARS = 200;

/**
 * Removes a Markdown code fence around a model reply: the opening line (```json, ``` ...) always,
 * the last line only when it is a bare closing fence.
 */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith(FENCE)) return trimmed;

  let lines = trimmed.split("\n").slice(1);
  if (lines.length > 0 && lines[lines.length - 1]?.trim() === FENCE) {
    lines = lines.slice(0, -1);
  }
  return lines.join("\n");
}

/**
 * JSON.parse over the fence-stripped reply. Malformed output is an ArticleParseError;
 * retrying the same request would most likely reproduce it.
 */
export function parseJsonFromLlm(raw: string): unknown {
  const text = stripCodeFence(raw);
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ArticleParseError(
      `Model response is not valid JSON: ${reason}`,
      text.slice(0, PREVIEW_CHARS),
      { cause: err },
    );
  }
}
