import crypto from "crypto";
import type { Logger } from "winston";
import { logger as _logger } from "../logger";
import { withSpan, setSpanAttributes } from "../otel-tracer";
import {
  DocumentLockedError,
  EmptyDocumentError,
  IndexUnavailableError,
  toTransportableError,
} from "../error";
import { executeWithRetry } from "../retry-utils";
import { chunkDocument, type ChunkingOptions } from "./chunker";
import type { EmbeddingClient } from "./embeddings";
import {
  extractDocument,
  resolveSourceType,
  type SourceTypeHints,
} from "./extract";
import {
  canTransition,
  type DocumentRegistry,
} from "./document-registry";
import type {
  Document,
  DocumentSource,
  IndexRecord,
  IngestionStatus,
} from "./types";
import type { VectorIndexGateway } from "./vector-index";
import { InMemoryDocumentLock, type DocumentLock } from "./document-lock";

export interface LoadedContent {
  bytes: Buffer;
  mimeType?: string;
}

export interface IngestionInput {
  source: DocumentSource;
  /** Fetches the raw document. Failures surface as the document's error. */
  load: (signal?: AbortSignal) => Promise<LoadedContent>;
  /** Platform-declared type, e.g. "pdf". */
  fileType?: string;
  title?: string;
  eventId?: string;
}

export interface IngestionResult {
  document: Document;
  chunkCount: number;
  totalTokens: number;
}

export interface IngestionOptions {
  chunking: ChunkingOptions;
  rollbackAttempts?: number;
  rollbackBaseDelayMs?: number;
  /** Serializes work on one document; in-process unless given. */
  lock?: DocumentLock;
  clock?: () => number;
}

/**
 * Canonical form of a URL for identity purposes: no fragment, no "www.",
 * no trailing slash. Query strings are kept, they often select the document.
 */
export function normalizeDocumentUrl(url: string): string {
  try {
    const urlObj = new URL(url);
    urlObj.hash = "";

    if (urlObj.hostname.startsWith("www.")) {
      urlObj.hostname = urlObj.hostname.slice(4);
    }

    if (urlObj.pathname.endsWith("/")) {
      urlObj.pathname = urlObj.pathname.slice(0, -1);
    }

    return urlObj.toString();
  } catch {
    return url;
  }
}

/** Same source, same id: re-ingesting replaces the previous records. */
export function deriveDocumentId(source: DocumentSource): string {
  const identity =
    source.kind === "file"
      ? `file:${source.fileId}`
      : `url:${normalizeDocumentUrl(source.url)}`;

  return crypto.createHash("sha256").update(identity).digest("hex").slice(0, 32);
}

function sourceLabel(source: DocumentSource): string {
  return source.kind === "file" ? source.name : source.url;
}

function sourceHints(
  source: DocumentSource,
  fileType: string | undefined,
  mimeType: string | undefined,
): SourceTypeHints {
  if (source.kind === "file") {
    return { fileType, mimeType, fileName: source.name };
  }

  let fileName: string | undefined;
  try {
    fileName = new URL(source.url).pathname;
  } catch {
    fileName = undefined;
  }
  return { fileType, mimeType, fileName };
}

export class IngestionOrchestrator {
  private readonly log: Logger;
  private readonly clock: () => number;
  private readonly lock: DocumentLock;

  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly index: VectorIndexGateway,
    private readonly registry: DocumentRegistry,
    private readonly options: IngestionOptions,
    logger?: Logger,
  ) {
    this.log = (logger ?? _logger).child({ module: "ingestion" });
    this.clock = options.clock ?? Date.now;
    this.lock = options.lock ?? new InMemoryDocumentLock();
  }

  private async transition(
    document: Document,
    status: IngestionStatus,
    patch: Partial<Omit<Document, "documentId" | "ingestionStatus">> = {},
  ): Promise<Document> {
    if (!canTransition(document.ingestionStatus, status)) {
      throw new Error(
        `Illegal status transition ${document.ingestionStatus} -> ${status} for ${document.documentId}`,
      );
    }

    const next: Document = {
      ...document,
      ...patch,
      ingestionStatus: status,
      updatedAt: this.clock(),
    };
    await this.registry.save(next);
    return next;
  }

  /**
   * resolve type -> extract -> chunk -> embed -> replace records.
   * Always resolves with a document in a terminal status; failures are
   * recorded on the document rather than thrown. Runs for the same
   * document never overlap.
   */
  async ingest(input: IngestionInput): Promise<IngestionResult> {
    const documentId = deriveDocumentId(input.source);

    try {
      return await this.lock.run(documentId, () =>
        this.ingestLocked(documentId, input),
      );
    } catch (error) {
      if (!(error instanceof DocumentLockedError)) throw error;

      // The other run owns the stored record; report without touching it.
      const now = this.clock();
      return {
        document: {
          documentId,
          source: input.source,
          title: input.title ?? sourceLabel(input.source),
          ingestionStatus: "failed",
          chunkCount: 0,
          error: { code: error.code, message: error.message },
          eventId: input.eventId,
          createdAt: now,
          updatedAt: now,
        },
        chunkCount: 0,
        totalTokens: 0,
      };
    }
  }

  private async ingestLocked(
    documentId: string,
    input: IngestionInput,
  ): Promise<IngestionResult> {
    const log = this.log.child({ method: "ingest", documentId });

    return await withSpan("rag-ingest-document", async span => {
      setSpanAttributes(span, {
        "ingest.document_id": documentId,
        "ingest.source_kind": input.source.kind,
      });

      const now = this.clock();
      const previous = await this.registry.get(documentId);

      let document: Document = {
        documentId,
        source: input.source,
        title: input.title ?? sourceLabel(input.source),
        ingestionStatus: "pending",
        chunkCount: 0,
        eventId: input.eventId,
        createdAt: previous?.createdAt ?? now,
        updatedAt: now,
      };
      await this.registry.save(document);

      let indexStarted = false;
      let totalTokens = 0;

      try {
        const content = await input.load();
        const sourceType = resolveSourceType(
          sourceHints(input.source, input.fileType, content.mimeType),
        );

        document = await this.transition(document, "chunking", {
          mimeType: content.mimeType,
          sourceType,
        });

        const normalized = await extractDocument(sourceType, content.bytes);
        if (!input.title && normalized.title) {
          document = { ...document, title: normalized.title };
        }

        const chunks = chunkDocument(documentId, normalized, this.options.chunking);
        if (chunks.length === 0) {
          throw new EmptyDocumentError();
        }

        totalTokens = chunks.reduce((sum, c) => sum + c.tokenLength, 0);
        log.info("Document chunked", {
          sourceType,
          chunks: chunks.length,
          totalTokens,
        });

        document = await this.transition(document, "embedding");
        const vectors = await this.embeddings.embed(chunks.map(c => c.text));

        const records: IndexRecord[] = chunks.map((chunk, i) => ({
          id: chunk.chunkId,
          documentId,
          title: document.title,
          source: sourceLabel(input.source),
          sourceType,
          text: chunk.text,
          vector: vectors[i],
          sequenceIndex: chunk.sequenceIndex,
          tokenLength: chunk.tokenLength,
          modelVersion: this.embeddings.modelVersion,
          metadata: chunk.metadata,
        }));

        indexStarted = true;
        const replaced = await this.index.deleteByDocument(documentId);
        const result = await this.index.upsert(records);

        if (result.status === "partial_failure") {
          throw new IndexUnavailableError(
            `${result.failedIds.length} of ${records.length} records could not be written`,
          );
        }

        document = await this.transition(document, "indexed", {
          chunkCount: records.length,
        });

        setSpanAttributes(span, {
          "ingest.chunk_count": records.length,
          "ingest.total_tokens": totalTokens,
        });

        log.info("Document indexed", {
          chunks: records.length,
          replacedRecords: replaced,
        });

        return { document, chunkCount: records.length, totalTokens };
      } catch (error) {
        const failure = toTransportableError(error);
        let cleanupRequired = false;

        if (indexStarted) {
          cleanupRequired = !(await this.rollback(documentId, log));
        }

        log.warn("Document ingestion failed", {
          code: failure.code,
          error: failure.message,
          stage: document.ingestionStatus,
          cleanupRequired,
        });

        setSpanAttributes(span, { "ingest.error_code": failure.code });

        document = await this.transition(document, "failed", {
          chunkCount: 0,
          error: { code: failure.code, message: failure.message },
          ...(cleanupRequired ? { cleanupRequired } : {}),
        });

        return { document, chunkCount: 0, totalTokens };
      }
    });
  }

  /** Removes whatever was written. Resolves false when records may remain. */
  private async rollback(documentId: string, log: Logger): Promise<boolean> {
    try {
      const deleted = await executeWithRetry(
        () => this.index.deleteByDocument(documentId),
        {
          maxAttempts: this.options.rollbackAttempts ?? 3,
          baseDelayMs: this.options.rollbackBaseDelayMs ?? 500,
          isRetryable: () => true,
          logger: log,
          operation: "rollback",
        },
      );
      log.info("Rolled back partially indexed document", { deleted });
      return true;
    } catch (error) {
      log.error("Rollback failed, document needs cleanup", { error });
      return false;
    }
  }

  /** Operator purge of a document's records. */
  async purge(documentId: string): Promise<number> {
    return await this.lock.run(documentId, async () => {
      const deleted = await this.index.deleteByDocument(documentId);
      const document = await this.registry.get(documentId);

      if (document?.cleanupRequired) {
        await this.registry.save({
          ...document,
          cleanupRequired: false,
          updatedAt: this.clock(),
        });
      }

      this.log.info("Purged document records", {
        method: "purge",
        documentId,
        deleted,
      });

      return deleted;
    });
  }

  async status(documentId: string): Promise<Document | null> {
    return await this.registry.get(documentId);
  }
}
