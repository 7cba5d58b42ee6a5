import fs from "node:fs";
import path from "node:path";
import { slugify } from "../utils/slugify.js";
import type { Article, ArticleRunMeta, ArticleStyle } from "./types.js";

/** Title slug, or the first 16 chars of the content id when the title has nothing usable. */
export function articleBasename(article: Pick<Article, "title" | "contentId">): string {
  return slugify(article.title) || article.contentId.slice(0, 16);
}

export function articleFilename(basename: string, style: ArticleStyle): string {
  return `${basename}__${style}.json`;
}

export function metaFilename(basename: string, style: ArticleStyle): string {
  return `${basename}__${style}.meta.json`;
}

export function writeArticleOutputs(args: { outputDir: string; article: Article; meta: ArticleRunMeta }): {
  outputDir: string;
  articlePath: string;
  metaPath: string;
} {
  const outputDir = path.resolve(args.outputDir);
  fs.mkdirSync(outputDir, { recursive: true });

  const basename = articleBasename(args.article);
  const articlePath = path.join(outputDir, articleFilename(basename, args.article.style));
  const metaPath = path.join(outputDir, metaFilename(basename, args.article.style));

  fs.writeFileSync(articlePath, JSON.stringify(args.article, null, 2), "utf-8");
  fs.writeFileSync(metaPath, JSON.stringify(args.meta, null, 2), "utf-8");

  return {
    outputDir,
    articlePath,
    metaPath,
  };
}
