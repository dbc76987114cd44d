/** Caller supplied an unusable request (missing/empty question). Maps to HTTP 400. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** The embedding model could not be loaded. Fatal: the process must not serve. */
export class ModelUnavailableError extends Error {
  constructor(modelName: string, cause?: unknown) {
    super(`Embedding model unavailable: ${modelName}`, { cause });
    this.name = "ModelUnavailableError";
  }
}

/** The corpus artifact or embedding store violates a load-time invariant. Fatal. */
export class CorpusError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CorpusError";
  }
}

export const GENERATION_ERROR_CODES = {
  TIMEOUT: "TIMEOUT",
  SERVICE: "SERVICE",
  EMPTY: "EMPTY",
  UNGROUNDED: "UNGROUNDED",
} as const;

export type GenerationErrorCode = keyof typeof GENERATION_ERROR_CODES;

/**
 * Remote generation failed for a single request. Never surfaced to callers:
 * the remote strategy catches it and answers from the template instead.
 */
export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly code: GenerationErrorCode,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "GenerationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
