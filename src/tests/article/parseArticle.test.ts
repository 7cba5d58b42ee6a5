import { afterEach, expect, test, vi } from "vitest";
import { parseArticleResponse } from "../../article/parseArticle.js";
import type { ContentSource } from "../../article/types.js";
import { ArticleParseError, ArticleStructureError } from "../../errors.js";
import { Logger } from "../../utils/logger.js";

const source: ContentSource = {
  url: "https://www.youtube.com/watch?v=abcDEF12345",
  title: "Test Video",
  kind: "youtube",
};

const context = { contentId: "cid", style: "detailed" as const, source };

const fullReply = JSON.stringify({
  title: "Generated Title",
  subtitle: "A subtitle",
  summary: "This is a summary",
  sections: [
    { heading: "Introduction", body: "Intro text here." },
    { heading: "Main Points", body: "Key takeaways." },
  ],
});

test("minimal reply parses with caller-supplied style", () => {
  const article = parseArticleResponse(
    '{"title":"T","style":"bullets","sections":[{"heading":"H","body":"B"}]}',
    context,
  );

  expect(article).toEqual({
    contentId: "cid",
    title: "T",
    subtitle: null,
    sections: [{ heading: "H", body: "B" }],
    summary: "",
    style: "detailed",
    source,
  });
});

test("fenced reply yields the same article as the bare reply", () => {
  const bare = parseArticleResponse(fullReply, context);

  expect(parseArticleResponse("```json\n" + fullReply + "\n```", context)).toEqual(bare);
  expect(parseArticleResponse("  ```\n" + fullReply + "\n```  \n", context)).toEqual(bare);
  expect(parseArticleResponse("```json\n" + fullReply, context)).toEqual(bare);
  expect(bare.sections).toHaveLength(2);
  expect(bare.subtitle).toBe("A subtitle");
});

test("missing title falls back to the source title", () => {
  const article = parseArticleResponse('{"summary":"S","sections":[]}', context);

  expect(article.title).toBe("Test Video");
  expect(article.summary).toBe("S");
  expect(article.sections).toEqual([]);
});

afterEach(() => {
  vi.restoreAllMocks();
});

test("an article without sections is returned with a warning", () => {
  const warn = vi.spyOn(Logger.prototype, "warn").mockImplementation(() => {});

  expect(parseArticleResponse('{"title":"T","sections":[]}', context).sections).toEqual([]);
  expect(parseArticleResponse('{"title":"T","summary":"S"}', context).sections).toEqual([]);

  expect(warn).toHaveBeenCalledTimes(2);
  expect(warn).toHaveBeenNthCalledWith(1, "Parsed article for cid has no sections", "article", undefined);
  expect(warn).toHaveBeenNthCalledWith(2, "Parsed article for cid has no sections", "article", undefined);
});

test("a sectioned article logs no warning", () => {
  const warn = vi.spyOn(Logger.prototype, "warn").mockImplementation(() => {});

  parseArticleResponse(fullReply, context);

  expect(warn).not.toHaveBeenCalled();
});

test("malformed JSON is a parse error", () => {
  expect(() => parseArticleResponse('{"title": "T", "sections": [', context)).toThrow(ArticleParseError);
  expect(() => parseArticleResponse("Sure! Here is your article.", context)).toThrow(ArticleParseError);
});

test("sections without heading or body are a structural error", () => {
  let caught: unknown;
  try {
    parseArticleResponse('{"title":"T","sections":[{"heading":"H"}]}', context);
  } catch (err) {
    caught = err;
  }

  expect(caught).toBeInstanceOf(ArticleStructureError);
  expect(caught instanceof ArticleStructureError ? caught.issues : []).toEqual(["sections.0.body: Required"]);
});

test("non-object JSON is a structural error", () => {
  expect(() => parseArticleResponse("[]", context)).toThrow(ArticleStructureError);
  expect(() => parseArticleResponse('"just a string"', context)).toThrow(ArticleStructureError);
});
