import { expect, test, vi } from "vitest";
import { ConfigurationError } from "../../errors.js";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create } };
  },
}));

vi.mock("../../config/env.js", () => ({
  cfg: {
    openai: { apiKey: undefined, baseUrl: undefined },
    llm: { model: "default-model", temperature: 0.3, maxTokens: 100 },
  },
}));

const { complete, getOpenAIClient } = await import("../../llm/client.js");

test("missing API key fails before any request", async () => {
  expect(() => getOpenAIClient()).toThrow(ConfigurationError);
  await expect(complete({ systemPrompt: "", userPrompt: "x" })).rejects.toBeInstanceOf(ConfigurationError);
  expect(create).not.toHaveBeenCalled();
});
