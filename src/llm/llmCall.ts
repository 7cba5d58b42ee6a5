import type { LlmCall, LlmCallInput } from "../article/types.js";
import { LlmTransientError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { CompleteOptions } from "./client.js";
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_RETRY_BASE_DELAY_MS, withRetry, type RetryOptions } from "./retry.js";

const llmLog = log.withScope("llm");

export type CompleteFn = (opts: CompleteOptions) => Promise<string>;

export type LlmCallDeps = {
  complete: CompleteFn;
  retry?: Partial<Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "sleep">>;
  temperature?: number;
};

/**
 * Binds a completion function to the shared retry policy: only LlmTransientError is retried,
 * everything else reaches the caller on the first failure.
 */
export function createLlmCall(deps: LlmCallDeps): LlmCall {
  const maxAttempts = deps.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = deps.retry?.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;

  return (input: LlmCallInput) =>
    withRetry(
      () =>
        deps.complete({
          systemPrompt: input.systemPrompt,
          userPrompt: input.userPrompt,
          model: input.model,
          maxTokens: input.maxTokens,
          temperature: deps.temperature,
        }),
      {
        maxAttempts,
        baseDelayMs,
        sleep: deps.retry?.sleep,
        isRetryable: (err) => err instanceof LlmTransientError,
        onRetry: ({ attempt, delayMs, error }) => {
          const message = error instanceof Error ? error.message : String(error);
          llmLog.warn(
            `${input.kind} call failed (attempt ${attempt}/${maxAttempts}): ${message}. Retrying in ${(delayMs / 1000).toFixed(1)}s`,
          );
        },
      },
    );
}
