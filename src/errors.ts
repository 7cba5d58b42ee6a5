export type PipelineErrorKind = "transient" | "request" | "parse" | "structure" | "configuration";

/**
 * Base class for every failure the article pipeline reports to its caller.
 * `kind` lets a higher layer decide between retrying later, showing a message, or aborting.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rate limit, 5xx, timeout or dropped connection. Safe to retry. */
export class LlmTransientError extends PipelineError {
  readonly kind = "transient" as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Any other completion failure (bad request, auth, empty content). */
export class LlmRequestError extends PipelineError {
  readonly kind = "request" as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ArticleParseError extends PipelineError {
  readonly kind = "parse" as const;

  constructor(
    message: string,
    readonly rawPreview: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ArticleStructureError extends PipelineError {
  readonly kind = "structure" as const;

  constructor(
    message: string,
    readonly issues: string[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends PipelineError {
  readonly kind = "configuration" as const;
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
