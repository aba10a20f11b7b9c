import type { Redis } from "ioredis";
import { z } from "zod";
import type { Document, IngestionStatus } from "./types";

/** Where ingestion status is persisted so it can be polled. */
export interface DocumentRegistry {
  get(documentId: string): Promise<Document | null>;
  save(document: Document): Promise<void>;
}

const ORDER: Record<IngestionStatus, number> = {
  pending: 0,
  chunking: 1,
  embedding: 2,
  indexed: 3,
  failed: 3,
};

export function isTerminal(status: IngestionStatus): boolean {
  return status === "indexed" || status === "failed";
}

/**
 * Statuses only move forward; any non-terminal status may fail, and terminal
 * statuses never change.
 */
export function canTransition(
  from: IngestionStatus,
  to: IngestionStatus,
): boolean {
  if (isTerminal(from)) return false;
  if (to === "failed") return true;
  return ORDER[to] > ORDER[from];
}

const documentSchema = z.object({
  documentId: z.string(),
  source: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("file"), fileId: z.string(), name: z.string() }),
    z.object({ kind: z.literal("url"), url: z.string() }),
  ]),
  mimeType: z.string().optional(),
  sourceType: z
    .enum(["text", "markdown", "csv", "xlsx", "pdf", "docx", "html"])
    .optional(),
  title: z.string(),
  ingestionStatus: z.enum(["pending", "chunking", "embedding", "indexed", "failed"]),
  chunkCount: z.number(),
  error: z
    .object({
      code: z.enum([
        "EMBEDDING_UNAVAILABLE",
        "EMBEDDING_REJECTED",
        "INDEX_UNAVAILABLE",
        "INDEX_REJECTED",
        "GENERATION_UNAVAILABLE",
        "UNSUPPORTED_DOCUMENT_TYPE",
        "DOCUMENT_FETCH_FAILED",
        "EMPTY_DOCUMENT",
        "UNKNOWN_ERROR",
        "BAD_REQUEST_INVALID_JSON",
        "BAD_REQUEST",
        "UNAUTHORIZED",
      ]),
      message: z.string(),
    })
    .optional(),
  cleanupRequired: z.boolean().optional(),
  eventId: z.string().optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

export class RedisDocumentRegistry implements DocumentRegistry {
  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix = "rag:document:",
  ) {}

  async get(documentId: string): Promise<Document | null> {
    const raw = await this.redis.hget(this.keyPrefix + documentId, "document");
    if (raw === null) return null;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = documentSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
  }

  async save(document: Document): Promise<void> {
    await this.redis.hset(this.keyPrefix + document.documentId, {
      document: JSON.stringify(document),
      status: document.ingestionStatus,
      updatedAt: document.updatedAt,
    });
  }
}

export class InMemoryDocumentRegistry implements DocumentRegistry {
  private readonly documents = new Map<string, Document>();

  async get(documentId: string): Promise<Document | null> {
    const document = this.documents.get(documentId);
    return document ? structuredClone(document) : null;
  }

  async save(document: Document): Promise<void> {
    this.documents.set(document.documentId, structuredClone(document));
  }

  list(): Document[] {
    return [...this.documents.values()].map(d => structuredClone(d));
  }
}
