import { Pinecone, type PineconeRecord } from "@pinecone-database/pinecone";
import { z } from "zod";
import type { Logger } from "winston";
import { logger as _logger } from "../logger";
import { withSpan, setSpanAttributes } from "../otel-tracer";
import { IndexRejectedError, IndexUnavailableError } from "../error";
import { AttemptTimeoutError, executeWithRetry } from "../retry-utils";
import type {
  ChunkMetadata,
  IndexRecord,
  QueryFilters,
  ScoredRecord,
  StoredRecord,
  UpsertResult,
} from "./types";
import {
  compareScored,
  type IndexStats,
  type VectorIndexGateway,
} from "./vector-index";

// Pinecone metadata values must be flat and present, so chunk metadata with
// its optional fields travels as a JSON string.
export type PineconeChunkMetadata = {
  documentId: string;
  title: string;
  source: string;
  sourceType: string;
  text: string;
  sequenceIndex: number;
  tokenLength: number;
  modelVersion: string;
  chunkMetadata: string;
};

interface PineconeMatch {
  id: string;
  score?: number;
  metadata?: PineconeChunkMetadata;
}

interface PineconeListPage {
  vectors?: { id?: string }[];
  pagination?: { next?: string };
}

/** The slice of a Pinecone namespace handle this gateway relies on. */
export interface PineconeNamespace {
  upsert(records: PineconeRecord<PineconeChunkMetadata>[]): Promise<void>;
  query(options: {
    vector: number[];
    topK: number;
    filter?: Record<string, unknown>;
    includeMetadata: boolean;
    includeValues: boolean;
  }): Promise<{ matches?: PineconeMatch[] }>;
  deleteMany(ids: string[]): Promise<void>;
  listPaginated(options: {
    prefix: string;
    limit: number;
    paginationToken?: string;
  }): Promise<PineconeListPage>;
  describeIndexStats(): Promise<{
    namespaces?: Record<string, { recordCount?: number }>;
  }>;
}

export interface PineconeIndexOptions {
  namespace: string;
  upsertBatchSize: number;
  maxAttempts: number;
  baseDelayMs: number;
  timeoutMs: number;
}

const UPSERT_BATCH_LIMIT = 100; // Pinecone limit
const LIST_PAGE_SIZE = 100;
const DELETE_BATCH_LIMIT = 1000;

// Client-side faults; repeating the request cannot change the answer.
const REJECTED_ERRORS = new Set([
  "PineconeArgumentError",
  "PineconeBadRequestError",
  "PineconeAuthorizationError",
  "PineconeNotFoundError",
  "PineconeConflictError",
  "PineconeConfigurationError",
]);

export function isRetryableIndexError(error: unknown): boolean {
  if (error instanceof IndexRejectedError) return false;
  if (error instanceof IndexUnavailableError) return true;
  if (error instanceof AttemptTimeoutError) return true;
  if (error instanceof Error && REJECTED_ERRORS.has(error.name)) return false;
  return true;
}

const chunkMetadataSchema = z.object({
  page: z.number().optional(),
  sheet: z.string().optional(),
  section: z.string().optional(),
  truncated: z.boolean().optional(),
});

const pineconeMetadataSchema = z.object({
  documentId: z.string(),
  title: z.string(),
  source: z.string(),
  sourceType: z.string(),
  text: z.string(),
  sequenceIndex: z.number(),
  tokenLength: z.number(),
  modelVersion: z.string(),
  chunkMetadata: z.string(),
});

export function toPineconeRecord(
  record: IndexRecord,
): PineconeRecord<PineconeChunkMetadata> {
  return {
    id: record.id,
    values: record.vector,
    metadata: {
      documentId: record.documentId,
      title: record.title,
      source: record.source,
      sourceType: record.sourceType,
      text: record.text,
      sequenceIndex: record.sequenceIndex,
      tokenLength: record.tokenLength,
      modelVersion: record.modelVersion,
      chunkMetadata: JSON.stringify(record.metadata),
    },
  };
}

function parseChunkMetadata(raw: string): ChunkMetadata {
  try {
    const parsed = chunkMetadataSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export function fromPineconeMatch(match: PineconeMatch): StoredRecord | null {
  const parsed = pineconeMetadataSchema.safeParse(match.metadata);
  if (!parsed.success) return null;

  const { chunkMetadata, ...rest } = parsed.data;
  return {
    id: match.id,
    ...rest,
    metadata: parseChunkMetadata(chunkMetadata),
  };
}

/**
 * Build Pinecone filter from query filters
 */
export function buildPineconeFilter(
  filters?: QueryFilters,
): Record<string, unknown> | undefined {
  const filter: Record<string, unknown> = {};

  if (filters?.documentId) {
    filter.documentId = { $eq: filters.documentId };
  }

  if (filters?.sourceType) {
    filter.sourceType = { $eq: filters.sourceType };
  }

  return Object.keys(filter).length > 0 ? filter : undefined;
}

export class PineconeVectorIndex implements VectorIndexGateway {
  private readonly log: Logger;
  private readonly batchSize: number;

  constructor(
    private readonly ns: PineconeNamespace,
    private readonly options: PineconeIndexOptions,
    logger?: Logger,
  ) {
    this.log = (logger ?? _logger).child({ module: "pinecone-service" });
    this.batchSize = Math.max(
      1,
      Math.min(options.upsertBatchSize, UPSERT_BATCH_LIMIT),
    );
  }

  private async call<T>(
    operation: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await executeWithRetry(() => fn(), {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        timeoutMs: this.options.timeoutMs,
        isRetryable: isRetryableIndexError,
        logger: this.log,
        operation: `pinecone-${operation}`,
      });
    } catch (error) {
      if (
        error instanceof IndexRejectedError ||
        error instanceof IndexUnavailableError
      ) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      throw isRetryableIndexError(error)
        ? new IndexUnavailableError(
            `Vector index ${operation} failed: ${message}`,
            { cause: error },
          )
        : new IndexRejectedError(
            `Vector index rejected ${operation}: ${message}`,
            { cause: error },
          );
    }
  }

  /**
   * Upsert records in batches. A rejected batch aborts the call; batches that
   * stay unavailable after retries are reported as failed ids.
   */
  async upsert(records: IndexRecord[]): Promise<UpsertResult> {
    if (records.length === 0) {
      return { status: "success", upserted: 0 };
    }

    return await withSpan("rag-pinecone-upsert", async span => {
      setSpanAttributes(span, {
        "pinecone.operation": "upsert",
        "pinecone.namespace": this.options.namespace,
        "pinecone.record_count": records.length,
      });

      const failedIds: string[] = [];
      let upserted = 0;
      let lastError: IndexUnavailableError | null = null;

      for (let i = 0; i < records.length; i += this.batchSize) {
        const batch = records.slice(i, i + this.batchSize);

        try {
          await this.call("upsert", () =>
            this.ns.upsert(batch.map(toPineconeRecord)),
          );
          upserted += batch.length;

          this.log.debug("Upserted batch to Pinecone", {
            method: "upsert",
            batch: Math.floor(i / this.batchSize) + 1,
            size: batch.length,
          });
        } catch (error) {
          if (!(error instanceof IndexUnavailableError)) {
            this.log.error("Pinecone rejected upsert batch", {
              method: "upsert",
              error,
            });
            throw error;
          }

          lastError = error;
          failedIds.push(...batch.map(r => r.id));
          this.log.warn("Pinecone upsert batch unavailable", {
            method: "upsert",
            batch: Math.floor(i / this.batchSize) + 1,
            error: error.message,
          });
        }
      }

      setSpanAttributes(span, {
        "pinecone.upserted": upserted,
        "pinecone.failed": failedIds.length,
      });

      if (upserted === 0 && lastError) {
        throw lastError;
      }

      if (failedIds.length > 0) {
        return { status: "partial_failure", upserted, failedIds };
      }

      this.log.info("Upserted to Pinecone", {
        method: "upsert",
        namespace: this.options.namespace,
        records: records.length,
      });

      return { status: "success", upserted };
    });
  }

  async query(
    vector: number[],
    k: number,
    filters?: QueryFilters,
  ): Promise<ScoredRecord[]> {
    if (k <= 0) return [];

    return await withSpan("rag-pinecone-query", async span => {
      const filter = buildPineconeFilter(filters);

      setSpanAttributes(span, {
        "pinecone.operation": "query",
        "pinecone.namespace": this.options.namespace,
        "pinecone.limit": k,
        "pinecone.has_filter": !!filter,
      });

      const response = await this.call("query", () =>
        this.ns.query({
          vector,
          topK: k,
          filter,
          includeMetadata: true,
          includeValues: false,
        }),
      );

      const results: ScoredRecord[] = [];
      for (const match of response.matches ?? []) {
        const record = fromPineconeMatch(match);
        if (!record) {
          this.log.warn("Skipping match with unreadable metadata", {
            method: "query",
            id: match.id,
          });
          continue;
        }
        results.push({ record, score: match.score ?? 0 });
      }

      results.sort(compareScored);

      setSpanAttributes(span, {
        "pinecone.results_count": results.length,
      });

      return results.slice(0, k);
    });
  }

  /** Chunk ids share the `<documentId>#` prefix; list them, then delete. */
  async deleteByDocument(documentId: string): Promise<number> {
    return await withSpan("rag-pinecone-delete", async span => {
      const prefix = `${documentId}#`;
      const ids: string[] = [];
      let paginationToken: string | undefined;

      do {
        const page = await this.call("list", () =>
          this.ns.listPaginated({
            prefix,
            limit: LIST_PAGE_SIZE,
            paginationToken,
          }),
        );
        for (const vector of page.vectors ?? []) {
          if (vector.id) ids.push(vector.id);
        }
        paginationToken = page.pagination?.next;
      } while (paginationToken);

      for (let i = 0; i < ids.length; i += DELETE_BATCH_LIMIT) {
        const batch = ids.slice(i, i + DELETE_BATCH_LIMIT);
        await this.call("delete", () => this.ns.deleteMany(batch));
      }

      setSpanAttributes(span, {
        "pinecone.operation": "delete",
        "pinecone.deleted": ids.length,
      });

      this.log.info("Deleted document from Pinecone", {
        method: "deleteByDocument",
        documentId,
        count: ids.length,
      });

      return ids.length;
    });
  }

  async stats(): Promise<IndexStats> {
    const stats = await this.call("stats", () =>
      this.ns.describeIndexStats(),
    );
    return {
      recordCount: stats.namespaces?.[this.options.namespace]?.recordCount ?? 0,
    };
  }
}

export function createPineconeVectorIndex(
  options: PineconeIndexOptions & { apiKey?: string; indexName: string },
  logger?: Logger,
): PineconeVectorIndex {
  if (!options.apiKey) {
    throw new Error("PINECONE_API_KEY not set");
  }

  const client = new Pinecone({ apiKey: options.apiKey });
  const ns = client
    .index<PineconeChunkMetadata>(options.indexName)
    .namespace(options.namespace);

  (logger ?? _logger).info("Pinecone index initialized", {
    module: "pinecone-service",
    indexName: options.indexName,
    namespace: options.namespace,
  });

  return new PineconeVectorIndex(ns, options, logger);
}
