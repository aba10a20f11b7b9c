export type ErrorCodes =
  | "EMBEDDING_UNAVAILABLE"
  | "EMBEDDING_REJECTED"
  | "INDEX_UNAVAILABLE"
  | "INDEX_REJECTED"
  | "GENERATION_UNAVAILABLE"
  | "UNSUPPORTED_DOCUMENT_TYPE"
  | "DOCUMENT_FETCH_FAILED"
  | "EMPTY_DOCUMENT"
  | "UNKNOWN_ERROR"
  | "BAD_REQUEST_INVALID_JSON"
  | "BAD_REQUEST"
  | "UNAUTHORIZED";

const TRANSIENT_CODES: ReadonlySet<ErrorCodes> = new Set<ErrorCodes>([
  "EMBEDDING_UNAVAILABLE",
  "INDEX_UNAVAILABLE",
  "GENERATION_UNAVAILABLE",
  "DOCUMENT_FETCH_FAILED",
]);

export class TransportableError extends Error {
  public readonly code: ErrorCodes;

  constructor(code: ErrorCodes, message?: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }

  /** Transient failures are retried by the component that owns the call. */
  get retryable(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }

  serialize() {
    return {
      code: this.code,
      message: this.message,
      stack: this.stack,
    };
  }

  static deserialize(
    data: ReturnType<TransportableError["serialize"]>,
  ): TransportableError {
    const x = new TransportableError(data.code, data.message);
    x.stack = data.stack;
    return x;
  }
}

export class EmbeddingUnavailableError extends TransportableError {
  constructor(message: string, options?: ErrorOptions) {
    super("EMBEDDING_UNAVAILABLE", message, options);
  }
}

export class EmbeddingRejectedError extends TransportableError {
  constructor(message: string, options?: ErrorOptions) {
    super("EMBEDDING_REJECTED", message, options);
  }
}

export class IndexUnavailableError extends TransportableError {
  constructor(message: string, options?: ErrorOptions) {
    super("INDEX_UNAVAILABLE", message, options);
  }
}

/** Another worker holds the document. */
export class DocumentLockedError extends IndexUnavailableError {}

export class IndexRejectedError extends TransportableError {
  constructor(message: string, options?: ErrorOptions) {
    super("INDEX_REJECTED", message, options);
  }
}

export class GenerationUnavailableError extends TransportableError {
  constructor(message: string, options?: ErrorOptions) {
    super("GENERATION_UNAVAILABLE", message, options);
  }
}

export class UnsupportedDocumentTypeError extends TransportableError {
  public readonly documentType: string;

  constructor(documentType: string, hint?: string) {
    super(
      "UNSUPPORTED_DOCUMENT_TYPE",
      `Unsupported document type: ${documentType || "unknown"}${hint ? ` (${hint})` : ""}`,
    );
    this.documentType = documentType;
  }
}

export class DocumentFetchError extends TransportableError {
  constructor(message: string, options?: ErrorOptions) {
    super("DOCUMENT_FETCH_FAILED", message, options);
  }
}

export class EmptyDocumentError extends TransportableError {
  constructor(message = "No text could be extracted from the document") {
    super("EMPTY_DOCUMENT", message);
  }
}

export class UnknownError extends TransportableError {
  constructor(inner: unknown) {
    super(
      "UNKNOWN_ERROR",
      `(Internal server error) - ${inner && inner instanceof Error ? inner.message : String(inner)}`,
      { cause: inner },
    );

    if (inner instanceof Error) {
      this.stack = inner.stack;
    }
  }
}

/**
 * Coerces anything thrown inside the pipeline into a TransportableError so
 * callers can branch on `code`.
 */
export function toTransportableError(error: unknown): TransportableError {
  return error instanceof TransportableError ? error : new UnknownError(error);
}
