#!/usr/bin/env node
import { parseArticleStyle, type ArticleStyle } from "../article/types.js";
import { generateArticle } from "../article/generate.js";
import { writeArticleOutputs } from "../article/io.js";
import { isLanguageCode } from "../article/prompts/shared.js";
import { cfg, printConfigSnapshot } from "../config/env.js";
import { ConfigurationError, isPipelineError } from "../errors.js";
import { complete } from "../llm/client.js";
import { createLlmCall } from "../llm/llmCall.js";
import { canonicalSourceUrl, contentIdForSource } from "../sources/fingerprint.js";
import { loadContentSource, loadTranscriptInput } from "../sources/loadSource.js";
import { log } from "../utils/logger.js";

const cliLog = log.withScope("cli");

type Args = {
  transcriptPath: string;
  sourcePath: string;
  style: ArticleStyle;
  language: string;
  model: string;
  maxTokens: number;
  outputDir: string;
  printConfig: boolean;
};

const USAGE =
  "Usage: generate-article --transcript <path> --source <yaml> [--style detailed|concise|summary|bullets] [--language <code>] [--model <id>] [--max_tokens <n>] [--out <dir>] [--print_config]";

function parseArgs(argv: string[]): Args {
  let transcriptPath = "";
  let sourcePath = "";
  let style: ArticleStyle = cfg.article.defaultStyle;
  let language = cfg.article.language;
  let model = cfg.llm.model;
  let maxTokens = cfg.llm.maxTokens;
  let outputDir = cfg.output.dir;
  let printConfig = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    if (arg === "--transcript" && next) {
      transcriptPath = next;
      i++;
    } else if (arg === "--source" && next) {
      sourcePath = next;
      i++;
    } else if (arg === "--style" && next) {
      style = parseArticleStyle(next, "--style");
      i++;
    } else if (arg === "--language" && next) {
      language = next;
      i++;
    } else if (arg === "--model" && next) {
      model = next;
      i++;
    } else if (arg === "--max_tokens" && next) {
      maxTokens = Number(next);
      if (!Number.isInteger(maxTokens) || maxTokens < 1) {
        throw new ConfigurationError(`Invalid --max_tokens '${next}'. Expected a positive integer.`);
      }
      i++;
    } else if (arg === "--out" && next) {
      outputDir = next;
      i++;
    } else if (arg === "--print_config") {
      printConfig = true;
    }
  }

  if (!transcriptPath || !sourcePath) {
    throw new ConfigurationError(`Missing required arguments.\n${USAGE}`);
  }

  return { transcriptPath, sourcePath, style, language, model, maxTokens, outputDir, printConfig };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.printConfig) {
    printConfigSnapshot(cfg);
  }

  // fail before any request goes out
  if (!cfg.openai.apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY not configured in .env");
  }
  if (!isLanguageCode(args.language)) {
    cliLog.warn(`Unknown language code '${args.language}', passing it to the model as-is`);
  }

  const source = loadContentSource(args.sourcePath);
  const contentId = contentIdForSource(source.url);
  const input = loadTranscriptInput(args.transcriptPath);

  if (input.transcript && input.transcript.contentId !== contentId) {
    throw new ConfigurationError(
      `Transcript belongs to ${input.transcript.contentId}, but ${canonicalSourceUrl(source.url)} fingerprints to ${contentId}`,
    );
  }
  if (!input.text.trim()) {
    throw new ConfigurationError(`Transcript ${args.transcriptPath} is empty`);
  }

  const callLlm = createLlmCall({
    complete,
    temperature: cfg.llm.temperature,
    retry: {
      maxAttempts: cfg.llm.maxAttempts,
      baseDelayMs: cfg.llm.retryBaseDelayMs,
    },
  });

  const result = await generateArticle(
    {
      transcriptText: input.text,
      contentId,
      source,
      style: args.style,
      language: args.language,
      model: args.model,
      maxTokens: args.maxTokens,
    },
    { callLlm },
  );

  const output = writeArticleOutputs({
    outputDir: args.outputDir,
    article: result.article,
    meta: result.meta,
  });

  console.log(`\n✅ Article written: ${output.articlePath}`);
  console.log(`✅ Meta written: ${output.metaPath}`);
}

main().catch((err: unknown) => {
  if (isPipelineError(err)) {
    cliLog.error(`${err.kind} error: ${err.message}`);
  } else {
    cliLog.error(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
