import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { z } from "zod";
import { ContentSourceSchema, TranscriptSchema, type ContentSource, type Transcript } from "../article/types.js";
import { ConfigurationError } from "../errors.js";

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseContentSource(value: unknown, origin: string): ContentSource {
  const result = ContentSourceSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid content source in ${origin}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Reads source metadata from YAML:
 *
 *   url: https://www.youtube.com/watch?v=abcdefghijk
 *   title: Some talk
 *   kind: youtube
 *   publishedAt: "2024-03-15T10:00:00Z"
 */
export function loadContentSource(filePath: string): ContentSource {
  const resolved = path.resolve(filePath);
  const parsed: unknown = YAML.parse(fs.readFileSync(resolved, "utf-8"));
  return parseContentSource(parsed, resolved);
}

export type TranscriptInput = {
  text: string;
  transcript: Transcript | null;
};

/**
 * A .json file must be a full Transcript document; anything else is read as plain transcript text.
 */
export function loadTranscriptInput(filePath: string): TranscriptInput {
  const resolved = path.resolve(filePath);
  const raw = fs.readFileSync(resolved, "utf-8");

  if (path.extname(resolved).toLowerCase() !== ".json") {
    return { text: raw, transcript: null };
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Transcript file ${resolved} is not valid JSON`, { cause: err });
  }

  const result = TranscriptSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid transcript in ${resolved}: ${formatIssues(result.error)}`);
  }

  const transcript = result.data;
  const text = transcript.text.trim()
    ? transcript.text
    : transcript.segments.map((segment) => segment.text.trim()).filter(Boolean).join(" ");
  return { text, transcript };
}
