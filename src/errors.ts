/** Raised while constructing the agent when the documents or the database cannot be reached. */
export class DataSourceUnavailableError extends Error {
  readonly source: "documents" | "database";

  constructor(source: "documents" | "database", message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataSourceUnavailableError";
    this.source = source;
  }
}

export class GenerationServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationServiceError";
  }
}

export class GenerationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "GenerationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
