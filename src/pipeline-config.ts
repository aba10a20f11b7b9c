import os from "os";
import type { Config } from "./config";

/**
 * Immutable settings for every pipeline component. Built once at startup
 * from the parsed environment and handed to each constructor.
 */
export interface PipelineConfig {
  readonly instanceName: string;
  readonly chunking: {
    readonly maxTokens: number;
    readonly overlapTokens: number;
  };
  readonly embedding: {
    readonly provider: Config["AI_PROVIDER"];
    readonly model: string;
    readonly dimensions: number;
    readonly batchSize: number;
    readonly maxConcurrency: number;
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly timeoutMs: number;
  };
  readonly completion: {
    readonly provider: Config["AI_PROVIDER"];
    readonly model: string;
    readonly maxTokens: number;
    readonly timeoutMs: number;
    readonly maxAttempts: number;
  };
  readonly index: {
    readonly provider: Config["VECTOR_INDEX_PROVIDER"];
    readonly indexName: string;
    readonly namespace: string;
    readonly upsertBatchSize: number;
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly timeoutMs: number;
  };
  readonly retrieval: {
    readonly topK: number;
    readonly minScore: number;
  };
  readonly dedup: {
    readonly retentionMs: number;
    readonly keyPrefix: string;
  };
  readonly fetch: {
    readonly timeoutMs: number;
    readonly maxBytes: number;
    readonly maxRedirects: number;
    /** Permit links that resolve to loopback or private addresses. */
    readonly allowLocal: boolean;
  };
  /** Serializes ingestion of one document across workers. */
  readonly documentLock: {
    readonly ttlMs: number;
    readonly waitMs: number;
  };
  readonly chat: {
    readonly botUserId?: string;
    readonly ingestKeywords: readonly string[];
  };
  readonly queue: {
    readonly mode: Config["TASK_QUEUE_MODE"];
    readonly concurrency: number;
  };
  /** Where claims and document status live. */
  readonly stateStore: "redis" | "memory";
}

type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

export function deepFreeze<T extends object>(value: T): DeepReadonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function createPipelineConfig(config: Config): PipelineConfig {
  if (config.CHUNK_OVERLAP_TOKENS >= config.CHUNK_MAX_TOKENS) {
    throw new Error(
      `CHUNK_OVERLAP_TOKENS (${config.CHUNK_OVERLAP_TOKENS}) must be smaller than CHUNK_MAX_TOKENS (${config.CHUNK_MAX_TOKENS})`,
    );
  }

  const stateStore: PipelineConfig["stateStore"] = config.REDIS_URL
    ? "redis"
    : "memory";

  return deepFreeze({
    instanceName: config.INSTANCE_NAME ?? `${os.hostname()}-${process.pid}`,
    chunking: {
      maxTokens: config.CHUNK_MAX_TOKENS,
      overlapTokens: config.CHUNK_OVERLAP_TOKENS,
    },
    embedding: {
      provider: config.AI_PROVIDER,
      model: config.EMBEDDING_MODEL,
      dimensions: config.EMBEDDING_DIMENSIONS,
      batchSize: config.EMBEDDING_BATCH_SIZE,
      maxConcurrency: config.EMBEDDING_MAX_CONCURRENCY,
      maxAttempts: config.EMBEDDING_MAX_ATTEMPTS,
      baseDelayMs: config.EMBEDDING_RETRY_BASE_DELAY_MS,
      timeoutMs: config.EMBEDDING_TIMEOUT_MS,
    },
    completion: {
      provider: config.AI_PROVIDER,
      model: config.COMPLETION_MODEL,
      maxTokens: config.COMPLETION_MAX_TOKENS,
      timeoutMs: config.COMPLETION_TIMEOUT_MS,
      maxAttempts: config.COMPLETION_MAX_ATTEMPTS,
    },
    index: {
      provider: config.VECTOR_INDEX_PROVIDER,
      indexName: config.PINECONE_INDEX_NAME,
      namespace: config.PINECONE_NAMESPACE,
      upsertBatchSize: config.INDEX_UPSERT_BATCH_SIZE,
      maxAttempts: config.INDEX_MAX_ATTEMPTS,
      baseDelayMs: config.INDEX_RETRY_BASE_DELAY_MS,
      timeoutMs: config.INDEX_TIMEOUT_MS,
    },
    retrieval: {
      topK: config.RETRIEVAL_TOP_K,
      minScore: config.RETRIEVAL_MIN_SCORE,
    },
    dedup: {
      retentionMs: config.DEDUP_RETENTION_MS,
      keyPrefix: config.DEDUP_KEY_PREFIX,
    },
    fetch: {
      timeoutMs: config.DOCUMENT_FETCH_TIMEOUT_MS,
      maxBytes: config.DOCUMENT_MAX_BYTES,
      maxRedirects: config.DOCUMENT_MAX_REDIRECTS,
      allowLocal: config.ALLOW_LOCAL_DOCUMENT_URLS,
    },
    documentLock: {
      ttlMs: config.DOCUMENT_LOCK_TTL_MS,
      waitMs: config.DOCUMENT_LOCK_WAIT_MS,
    },
    chat: {
      botUserId: config.SLACK_BOT_USER_ID,
      ingestKeywords: config.INGEST_KEYWORDS.map(k => k.toLowerCase()),
    },
    queue: {
      mode: config.TASK_QUEUE_MODE,
      concurrency: config.EVENT_WORKER_CONCURRENCY,
    },
    stateStore,
  });
}
