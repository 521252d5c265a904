/**
 * Error taxonomy for the document-to-answer pipeline. Every failure the
 * pipeline raises on purpose is a RagError, so the orchestrator can turn
 * it into a structured result by code.
 */
export type RagErrorCode =
  | "INGESTION_ERROR"
  | "EMBEDDING_PROVIDER_ERROR"
  | "GENERATION_ERROR"
  | "NO_ACTIVE_CONVERSATION"
  | "STORE_ERROR"
  | "SESSION_STATE_ERROR"
  | "CONFIG_ERROR";

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(message: string, code: RagErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RagError";
    this.code = code;
  }
}

/** Bad, corrupt, empty or protected input for one file. */
export class IngestionError extends RagError {
  readonly filename: string;

  constructor(filename: string, message: string, options?: { cause?: unknown }) {
    super(`${filename}: ${message}`, "INGESTION_ERROR", options);
    this.name = "IngestionError";
    this.filename = filename;
  }
}

export class EmbeddingProviderError extends RagError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`Embedding provider "${provider}" failed: ${message}`, "EMBEDDING_PROVIDER_ERROR", options);
    this.name = "EmbeddingProviderError";
    this.provider = provider;
  }
}

export class GenerationError extends RagError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`LLM provider "${provider}" failed: ${message}`, "GENERATION_ERROR", options);
    this.name = "GenerationError";
    this.provider = provider;
  }
}

export class NoActiveConversationError extends RagError {
  constructor() {
    super("No active conversation; start a new conversation first", "NO_ACTIVE_CONVERSATION");
    this.name = "NoActiveConversationError";
  }
}

/** Durable storage failed, or a vector does not fit the store. */
export class StoreError extends RagError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`Store ${operation} failed: ${message}`, "STORE_ERROR", options);
    this.name = "StoreError";
    this.operation = operation;
  }
}

export class SessionStateError extends RagError {
  constructor(message: string) {
    super(message, "SESSION_STATE_ERROR");
    this.name = "SessionStateError";
  }
}

export class ConfigError extends RagError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === "string" ? error : "Unknown error";
}
