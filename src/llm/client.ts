import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { cfg } from "../config/env.js";
import { ConfigurationError, LlmRequestError, LlmTransientError } from "../errors.js";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

const TRANSIENT_STATUSES = new Set([408, 409, 429]);
const TRANSIENT_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN"]);

let openaiClient: OpenAI | null = null;

export function getOpenAIClient(): OpenAI {
  if (!openaiClient) {
    const apiKey = cfg.openai.apiKey;
    if (!apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY not configured in .env");
    }
    // withRetry in llmCall.ts is the only retry layer
    openaiClient = new OpenAI({ apiKey, baseURL: cfg.openai.baseUrl, maxRetries: 0 });
  }
  return openaiClient;
}

function readField(err: unknown, field: string): unknown {
  if (err && typeof err === "object" && field in err) {
    return Reflect.get(err, field);
  }
  return undefined;
}

function statusOf(err: unknown): number | undefined {
  const status = readField(err, "status");
  return typeof status === "number" ? status : undefined;
}

/**
 * Transient = rate limit, server-side failure, timeout or a dropped connection.
 * Checked structurally so wrapped SDK errors and raw network errors classify the same way.
 */
export function isTransientApiError(err: unknown): boolean {
  const status = statusOf(err);
  if (status !== undefined) {
    return TRANSIENT_STATUSES.has(status) || (status >= 500 && status < 600);
  }

  const code = readField(err, "code");
  if (typeof code === "string" && TRANSIENT_CODES.has(code)) return true;

  // APIConnectionTimeoutError extends APIConnectionError
  return err instanceof OpenAI.APIConnectionError;
}

export function classifyCompletionError(err: unknown): LlmTransientError | LlmRequestError | ConfigurationError {
  if (err instanceof LlmTransientError || err instanceof LlmRequestError || err instanceof ConfigurationError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  const status = statusOf(err);
  if (isTransientApiError(err)) {
    return new LlmTransientError(`LLM request failed (transient): ${message}`, status, { cause: err });
  }
  return new LlmRequestError(`LLM request failed: ${message}`, status, { cause: err });
}

export type CompleteOptions = {
  systemPrompt: string;
  userPrompt: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
};

/**
 * One chat-completion round trip. No retries here; see createLlmCall.
 * An empty system prompt sends the user message alone.
 */
export async function complete(opts: CompleteOptions): Promise<string> {
  const client = getOpenAIClient();

  const model = opts.model ?? cfg.llm.model;
  const temperature = opts.temperature ?? cfg.llm.temperature;
  const maxTokens = opts.maxTokens ?? cfg.llm.maxTokens;

  const messages: ChatCompletionMessageParam[] = [];
  if (opts.systemPrompt.trim()) {
    messages.push({ role: "system", content: opts.systemPrompt });
  }
  messages.push({ role: "user", content: opts.userPrompt });

  let content: string | undefined;
  try {
    const response = await client.chat.completions.create({
      model,
      temperature,
      max_tokens: maxTokens,
      messages,
    });
    content = response.choices[0]?.message?.content?.trim();
  } catch (err) {
    const classified = classifyCompletionError(err);
    llmLog.debug(`Completion failed (${classified.kind})`, {
      model,
      status: statusOf(err),
      message: classified.message,
    });
    throw classified;
  }

  if (!content) {
    throw new LlmRequestError(`Empty response from model ${model}`);
  }

  return content;
}
