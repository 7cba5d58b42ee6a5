import "dotenv/config";
import { parseArticleStyle } from "../article/types.js";
import { ConfigurationError } from "../errors.js";
import type { Config, LogFormat, LogLevel } from "./types.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number, min = 0): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigurationError(`Invalid integer for ${name}: ${v} (minimum ${min})`);
  }
  return n;
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new ConfigurationError(`Invalid number for ${name}: ${v}`);
  return n;
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((candidate) => candidate === v);
  if (match) return match;
  throw new ConfigurationError(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function loadConfig(): Config {
  const style = opt("ARTICLE_DEFAULT_STYLE");

  return {
    openai: {
      apiKey: opt("OPENAI_API_KEY"),
      baseUrl: opt("OPENAI_BASE_URL"),
    },

    llm: {
      model: opt("LLM_MODEL") ?? "gpt-4o-mini",
      temperature: optFloat("LLM_TEMPERATURE", 0.3),
      maxTokens: optInt("LLM_MAX_TOKENS", 8192, 1),
      maxAttempts: optInt("LLM_MAX_ATTEMPTS", 3, 1),
      retryBaseDelayMs: optInt("LLM_RETRY_BASE_DELAY_MS", 2000),
    },

    article: {
      defaultStyle: style ? parseArticleStyle(style, "ARTICLE_DEFAULT_STYLE") : "detailed",
      language: opt("ARTICLE_LANGUAGE") ?? "en",
    },

    output: {
      dir: opt("OUTPUT_DIR") ?? "./data/articles",
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };
}

/** Resolved config keyed by env name. The API key only shows whether it is set. */
export function configSnapshot(cfg: Config): Record<string, string | number | undefined> {
  return {
    OPENAI_API_KEY: cfg.openai.apiKey ? "<redacted>" : undefined,
    OPENAI_BASE_URL: cfg.openai.baseUrl,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    LLM_MAX_ATTEMPTS: cfg.llm.maxAttempts,
    LLM_RETRY_BASE_DELAY_MS: cfg.llm.retryBaseDelayMs,
    ARTICLE_DEFAULT_STYLE: cfg.article.defaultStyle,
    ARTICLE_LANGUAGE: cfg.article.language,
    OUTPUT_DIR: cfg.output.dir,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  };
}

export function printConfigSnapshot(cfg: Config): void {
  console.log("=== CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(configSnapshot(cfg), null, 2));
  console.log("=======================");
}

export const cfg = loadConfig();
