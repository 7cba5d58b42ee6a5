import { z } from "zod";
import { ArticleStructureError } from "../errors.js";
import { parseJsonFromLlm } from "../llm/parseJsonFromLlm.js";
import { log } from "../utils/logger.js";
import { ArticleSectionSchema, type Article, type ArticleStyle, type ContentSource } from "./types.js";

const articleLog = log.withScope("article");

/**
 * Shape of the model reply. Only sections are structural: a missing title, subtitle
 * or summary falls back to a default. Unknown keys (a stray "style", say) are dropped.
 */
const ArticleReplySchema = z.object({
  title: z.string().nullish(),
  subtitle: z.string().nullish(),
  summary: z.string().nullish(),
  sections: z.array(ArticleSectionSchema).nullish(),
});

export type ParseArticleContext = {
  contentId: string;
  style: ArticleStyle;
  source: ContentSource;
};

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export function parseArticleResponse(raw: string, context: ParseArticleContext): Article {
  const data = parseJsonFromLlm(raw);

  const result = ArticleReplySchema.safeParse(data);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new ArticleStructureError(`Model response has an unexpected structure: ${issues.join("; ")}`, issues, {
      cause: result.error,
    });
  }

  const reply = result.data;
  const sections = (reply.sections ?? []).map((section) => ({ heading: section.heading, body: section.body }));
  if (sections.length === 0) {
    articleLog.warn(`Parsed article for ${context.contentId} has no sections`);
  }

  return {
    contentId: context.contentId,
    title: reply.title ?? context.source.title,
    subtitle: reply.subtitle ?? null,
    sections,
    summary: reply.summary ?? "",
    style: context.style,
    source: { ...context.source },
  };
}
