import type { ArticleStyle } from "../article/types.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export interface Config {
  openai: {
    apiKey?: string;
    baseUrl?: string;
  };

  llm: {
    model: string;
    temperature: number;
    maxTokens: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
  };

  article: {
    defaultStyle: ArticleStyle;
    language: string;
  };

  output: {
    dir: string;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
