export type ErrorContext = Record<string, string | number | null | undefined>;

export class PipelineError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;

  constructor(message: string, code: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }
}

/**
 * Missing or malformed configuration, unresolved group references and
 * anything else that stops a run before it touches the API or the disk.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "CONFIG_ERROR", context);
  }
}

export class FetchError extends PipelineError {
  public readonly status?: number;

  constructor(
    message: string,
    context: { domain: string; startDate: string; endDate: string; status?: number }
  ) {
    super(message, "FETCH_ERROR", context);
    this.status = context.status;
  }
}

export class CombineError extends PipelineError {
  constructor(message: string, context: { domain: string; path: string }) {
    super(message, "COMBINE_ERROR", context);
  }
}

/** A dataset file that could not be written; fatal only to the domain or aggregate it belongs to. */
export class WriteError extends PipelineError {
  constructor(message: string, context: { path: string; domain?: string; group?: string }) {
    super(message, "WRITE_ERROR", context);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeContext(context: ErrorContext): string {
  return Object.entries(context)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => `${key}=${value}`)
    .join(" ");
}
