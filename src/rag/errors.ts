export type RagErrorCode =
  | "VALIDATION_ERROR"
  | "EXTRACTION_ERROR"
  | "EMBEDDING_ERROR"
  | "INDEX_ERROR"
  | "CONFIGURATION_ERROR";

interface RagErrorOptions {
  cause?: unknown;
}

export abstract class RagError extends Error {
  abstract readonly code: RagErrorCode;

  constructor(message: string, options: RagErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
  }
}

/**
 * Caller input failed a precondition. Raised before any external call.
 */
export class ValidationError extends RagError {
  readonly code = "VALIDATION_ERROR";

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

export class ExtractionError extends RagError {
  readonly code = "EXTRACTION_ERROR";

  constructor(readonly path: string, message: string, options: RagErrorOptions = {}) {
    super(`Failed to extract text from ${path}: ${message}`, options);
  }
}

export class EmbeddingError extends RagError {
  readonly code = "EMBEDDING_ERROR";
  /** Position of the offending text in the embed call, when known. */
  readonly inputIndex?: number;

  constructor(message: string, options: RagErrorOptions & { inputIndex?: number } = {}) {
    super(message, options);
    this.inputIndex = options.inputIndex;
  }
}

export class IndexError extends RagError {
  readonly code = "INDEX_ERROR";
  readonly batchIndex?: number;

  constructor(message: string, options: RagErrorOptions & { batchIndex?: number } = {}) {
    super(message, options);
    this.batchIndex = options.batchIndex;
  }
}

/**
 * Fatal setup problem: missing credentials, invalid chunking parameters or a
 * vector dimensionality that does not match the index.
 */
export class ConfigurationError extends RagError {
  readonly code = "CONFIGURATION_ERROR";
}

export const isRagError = (error: unknown): error is RagError =>
  error instanceof RagError;

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
};
