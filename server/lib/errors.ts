export type IndexerErrorKind =
  | "provider_unavailable"
  | "document_not_found"
  | "unsupported_format"
  | "extraction_failed"
  | "embedding_provider_error"
  | "store_error"
  | "store_unavailable"
  | "invalid_configuration";

/**
 * Base class for every failure the indexer classifies. The `kind` field is
 * what ends up in run reports, so callers can branch on it without
 * `instanceof` chains.
 */
export class IndexerError extends Error {
  readonly kind: IndexerErrorKind;

  constructor(kind: IndexerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "IndexerError";
  }
}

/** Listing or downloading failed at the transport or auth level. */
export class ProviderUnavailableError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("provider_unavailable", message, options);
    this.name = "ProviderUnavailableError";
  }
}

/** The document vanished between listing and download. */
export class DocumentNotFoundError extends IndexerError {
  readonly documentId: string;

  constructor(documentId: string, message?: string, options?: { cause?: unknown }) {
    super("document_not_found", message ?? `Document not found: ${documentId}`, options);
    this.documentId = documentId;
    this.name = "DocumentNotFoundError";
  }
}

export class UnsupportedFormatError extends IndexerError {
  constructor(message: string) {
    super("unsupported_format", message);
    this.name = "UnsupportedFormatError";
  }
}

export class ExtractionFailedError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction_failed", message, options);
    this.name = "ExtractionFailedError";
  }
}

export class EmbeddingProviderError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_provider_error", message, options);
    this.name = "EmbeddingProviderError";
  }
}

/** A single persistence operation failed; the store itself is still reachable. */
export class StoreError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("store_error", message, options);
    this.name = "StoreError";
  }
}

/** The store cannot be reached at all. Fatal for the whole run. */
export class StoreUnavailableError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("store_unavailable", message, options);
    this.name = "StoreUnavailableError";
  }
}

/** Operator or programmer error, e.g. chunk overlap >= chunk size. Never retried. */
export class InvalidConfigurationError extends IndexerError {
  constructor(message: string) {
    super("invalid_configuration", message);
    this.name = "InvalidConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The `code` of a system or driver error. Checked by shape: errors raised by
 * Node's fs can come from another realm and fail `instanceof Error`.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError");
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    const error = new Error("The operation was aborted");
    error.name = "AbortError";
    throw error;
  }
}
