import "dotenv/config";
import { z } from "zod";

/* Codecs */
const delimitedList = (separator = ",") => {
  return z.codec(z.string(), z.array(z.string()), {
    decode: str =>
      str
        ? str
            .split(separator)
            .map(s => s.trim())
            .filter(s => s.length > 0)
        : [],
    encode: arr => arr.join(separator),
  });
};

/* Schema */
export const configSchema = z.object({
  // Application
  ENV: z.string().optional(),
  HOST: z.string().default("localhost"),
  PORT: z.coerce.number().default(3002),
  IS_PRODUCTION: z.stringbool().optional(),
  IS_KUBERNETES: z.stringbool().optional(),
  LOGGING_LEVEL: z.string().optional(),
  INSTANCE_NAME: z.string().optional(),

  // Express
  EXPRESS_TRUST_PROXY: z.coerce.number().optional(),
  ADMIN_AUTH_KEY: z.string().optional(),

  // Slack
  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_SIGNING_SECRET: z.string().optional(),
  SLACK_BOT_USER_ID: z.string().optional(),
  SLACK_SIGNATURE_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(300),
  // Local development only: accept requests without a signing secret.
  SLACK_ALLOW_UNSIGNED: z.stringbool().default(false),
  INGEST_KEYWORDS: delimitedList(",").default(["import rag"]),

  // Redis
  REDIS_URL: z.string().optional(),
  TASK_QUEUE_MODE: z.enum(["bullmq", "inline"]).default("bullmq"),
  EVENT_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),

  // Dedup
  DEDUP_RETENTION_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(24 * 60 * 60 * 1000),
  DEDUP_KEY_PREFIX: z.string().default("dedup:event:"),

  // AI/ML
  AI_PROVIDER: z.enum(["openai", "azure"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().optional(),
  AZURE_OPENAI_RESOURCE_NAME: z.string().optional(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().optional(),
  COMPLETION_MODEL: z.string().default("gpt-4o-mini"),
  COMPLETION_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  COMPLETION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(2),

  // Embeddings
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  EMBEDDING_MAX_CONCURRENCY: z.coerce.number().int().positive().default(2),
  EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
  EMBEDDING_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Chunking
  CHUNK_MAX_TOKENS: z.coerce.number().int().positive().default(400),
  CHUNK_OVERLAP_TOKENS: z.coerce.number().int().nonnegative().default(50),

  // Vector index
  VECTOR_INDEX_PROVIDER: z.enum(["pinecone", "memory"]).default("pinecone"),
  PINECONE_API_KEY: z.string().optional(),
  PINECONE_INDEX_NAME: z.string().default("thread-rag"),
  PINECONE_NAMESPACE: z.string().default("documents"),
  INDEX_UPSERT_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  INDEX_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  INDEX_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  INDEX_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),

  // Retrieval
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  RETRIEVAL_MIN_SCORE: z.coerce.number().min(-1).max(1).default(0.25),

  // Document fetching
  DOCUMENT_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  DOCUMENT_MAX_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(20 * 1024 * 1024),
  DOCUMENT_MAX_REDIRECTS: z.coerce.number().int().nonnegative().default(5),
  ALLOW_LOCAL_DOCUMENT_URLS: z.stringbool().default(false),

  // Document locks
  DOCUMENT_LOCK_TTL_MS: z.coerce.number().int().positive().default(30000),
  DOCUMENT_LOCK_WAIT_MS: z.coerce.number().int().nonnegative().default(120000),

  // Sentry
  SENTRY_DSN: z.string().optional(),
  SENTRY_TRACE_SAMPLE_RATE: z.coerce.number().default(0.01),
  SENTRY_ERROR_SAMPLE_RATE: z.coerce.number().default(0.05),
  SENTRY_ENVIRONMENT: z.string().default("production"),
});

export type Config = z.infer<typeof configSchema>;

export const config: Config = configSchema.parse(process.env);
