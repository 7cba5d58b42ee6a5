import { beforeEach, expect, test, vi } from "vitest";
import { LlmRequestError, LlmTransientError } from "../../errors.js";

const { create, clientOptions, APIConnectionError, APIConnectionTimeoutError } = vi.hoisted(() => {
  class APIConnectionError extends Error {}
  class APIConnectionTimeoutError extends APIConnectionError {}
  const clientOptions: unknown[] = [];
  return { create: vi.fn(), clientOptions, APIConnectionError, APIConnectionTimeoutError };
});

vi.mock("openai", () => ({
  default: class {
    static APIConnectionError = APIConnectionError;
    chat = { completions: { create } };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

vi.mock("../../config/env.js", () => ({
  cfg: {
    openai: { apiKey: "test-openai-key", baseUrl: undefined },
    llm: { model: "default-model", temperature: 0.3, maxTokens: 100 },
  },
}));

const { complete, isTransientApiError } = await import("../../llm/client.js");

function reply(content: string | null) {
  return { choices: [{ message: { content } }] };
}

beforeEach(() => {
  create.mockReset();
});

test("sends system and user messages with configured defaults", async () => {
  create.mockResolvedValueOnce(reply("  hello  "));

  await expect(complete({ systemPrompt: "sys", userPrompt: "hi" })).resolves.toBe("hello");
  expect(create).toHaveBeenCalledWith({
    model: "default-model",
    temperature: 0.3,
    max_tokens: 100,
    messages: [
      { role: "system", content: "sys" },
      { role: "user", content: "hi" },
    ],
  });
});

test("client is built once with SDK retries turned off", async () => {
  create.mockResolvedValue(reply("ok"));

  await complete({ systemPrompt: "", userPrompt: "a" });
  await complete({ systemPrompt: "", userPrompt: "b" });

  expect(clientOptions).toEqual([{ apiKey: "test-openai-key", baseURL: undefined, maxRetries: 0 }]);
});

test("empty system prompt sends the user message alone", async () => {
  create.mockResolvedValueOnce(reply("summary"));

  await complete({ systemPrompt: "", userPrompt: "summarize", model: "m", maxTokens: 50 });
  expect(create).toHaveBeenCalledWith({
    model: "m",
    temperature: 0.3,
    max_tokens: 50,
    messages: [{ role: "user", content: "summarize" }],
  });
});

test("rate limits become transient errors and bad requests do not", async () => {
  create.mockRejectedValueOnce(Object.assign(new Error("Rate limit reached"), { status: 429 }));
  await expect(complete({ systemPrompt: "", userPrompt: "x" })).rejects.toMatchObject({
    name: "LlmTransientError",
    status: 429,
  });

  create.mockRejectedValueOnce(Object.assign(new Error("Invalid model"), { status: 400 }));
  await expect(complete({ systemPrompt: "", userPrompt: "x" })).rejects.toBeInstanceOf(LlmRequestError);
});

test("empty completion content is a request error", async () => {
  create.mockResolvedValueOnce(reply(null));

  await expect(complete({ systemPrompt: "", userPrompt: "x" })).rejects.toBeInstanceOf(LlmRequestError);
});

test("transient classification covers statuses, socket codes and connection errors", () => {
  expect(isTransientApiError({ status: 503 })).toBe(true);
  expect(isTransientApiError({ status: 408 })).toBe(true);
  expect(isTransientApiError({ status: 401 })).toBe(false);
  expect(isTransientApiError(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))).toBe(true);
  expect(isTransientApiError(new APIConnectionError("Connection error."))).toBe(true);
  expect(isTransientApiError(new APIConnectionTimeoutError("Request timed out."))).toBe(true);
  expect(isTransientApiError(new Error("boom"))).toBe(false);
  expect(new LlmTransientError("x").kind).toBe("transient");
});
