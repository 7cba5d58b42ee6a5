import { expect, test } from "vitest";
import { ARTICLE_STYLES, parseArticleStyle } from "../../article/types.js";
import { ConfigurationError } from "../../errors.js";

test("every known style parses to itself", () => {
  expect(ARTICLE_STYLES.map((style) => parseArticleStyle(style))).toEqual([
    "detailed",
    "concise",
    "summary",
    "bullets",
  ]);
});

test("styles outside the closed set are configuration errors", () => {
  expect(() => parseArticleStyle("fancy")).toThrow(ConfigurationError);
  expect(() => parseArticleStyle("Detailed", "--style")).toThrow(
    "Invalid value for --style: Detailed. Allowed: detailed, concise, summary, bullets",
  );
  expect(() => parseArticleStyle("")).toThrow("Invalid value for style: . Allowed: detailed, concise, summary, bullets");
});
