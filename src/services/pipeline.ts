import type { Logger } from "winston";
import { logger as _logger } from "../lib/logger";
import { config } from "../config";
import type { PipelineConfig } from "../pipeline-config";
import { getEmbeddingModel, getModel } from "../lib/generic-ai";
import {
  AiSdkEmbeddingProvider,
  EmbeddingClient,
  type EmbeddingProvider,
} from "../lib/rag/embeddings";
import type { VectorIndexGateway } from "../lib/rag/vector-index";
import { InMemoryVectorIndex } from "../lib/rag/memory-index";
import { createPineconeVectorIndex } from "../lib/rag/pinecone-service";
import {
  InMemoryDocumentRegistry,
  RedisDocumentRegistry,
  type DocumentRegistry,
} from "../lib/rag/document-registry";
import { IngestionOrchestrator } from "../lib/rag/ingestion";
import {
  InMemoryDocumentLock,
  RedisDocumentLock,
  type DocumentLock,
} from "../lib/rag/document-lock";
import {
  AiSdkCompletionProvider,
  Responder,
  type CompletionProvider,
} from "../lib/rag/responder";
import {
  InMemoryClaimStore,
  RedisClaimStore,
  type ClaimStore,
} from "./dedup/claim-store";
import { DedupGuard } from "./dedup/guard";
import {
  BullMQTaskScheduler,
  InlineTaskScheduler,
  getChatEventQueue,
  getRedisConnection,
  type TaskScheduler,
} from "./queue-service";
import { createSlackChatClient } from "./chat/slack";
import type { ChatClient } from "./chat/types";
import { EventRouter, type UrlLoader } from "./events/router";

export interface Pipeline {
  config: PipelineConfig;
  embeddings: EmbeddingClient;
  index: VectorIndexGateway;
  registry: DocumentRegistry;
  ingestion: IngestionOrchestrator;
  responder: Responder;
  guard: DedupGuard;
  scheduler: TaskScheduler;
  chat: ChatClient;
  router: EventRouter;
}

/** Replacements for the external collaborators, used by tests and local runs. */
export interface PipelineOverrides {
  embeddingProvider?: EmbeddingProvider;
  completionProvider?: CompletionProvider;
  index?: VectorIndexGateway;
  registry?: DocumentRegistry;
  documentLock?: DocumentLock;
  claimStore?: ClaimStore;
  scheduler?: TaskScheduler;
  chat?: ChatClient;
  loadUrl?: UrlLoader;
  clock?: () => number;
  logger?: Logger;
}

function createIndex(
  pipelineConfig: PipelineConfig,
  logger: Logger,
): VectorIndexGateway {
  if (pipelineConfig.index.provider === "memory") {
    return new InMemoryVectorIndex(logger);
  }

  return createPineconeVectorIndex(
    {
      apiKey: config.PINECONE_API_KEY,
      indexName: pipelineConfig.index.indexName,
      namespace: pipelineConfig.index.namespace,
      upsertBatchSize: pipelineConfig.index.upsertBatchSize,
      maxAttempts: pipelineConfig.index.maxAttempts,
      baseDelayMs: pipelineConfig.index.baseDelayMs,
      timeoutMs: pipelineConfig.index.timeoutMs,
    },
    logger,
  );
}

/** Wires every component from one immutable configuration. */
export function createPipeline(
  pipelineConfig: PipelineConfig,
  overrides: PipelineOverrides = {},
): Pipeline {
  const logger = overrides.logger ?? _logger;
  const useRedis = pipelineConfig.stateStore === "redis";

  const embeddings = new EmbeddingClient(
    overrides.embeddingProvider ??
      new AiSdkEmbeddingProvider(
        getEmbeddingModel(
          pipelineConfig.embedding.model,
          pipelineConfig.embedding.provider,
        ),
        pipelineConfig.embedding.model,
      ),
    {
      batchSize: pipelineConfig.embedding.batchSize,
      maxConcurrency: pipelineConfig.embedding.maxConcurrency,
      maxAttempts: pipelineConfig.embedding.maxAttempts,
      baseDelayMs: pipelineConfig.embedding.baseDelayMs,
      timeoutMs: pipelineConfig.embedding.timeoutMs,
      dimensions: pipelineConfig.embedding.dimensions,
    },
    logger,
  );

  const index = overrides.index ?? createIndex(pipelineConfig, logger);

  const registry =
    overrides.registry ??
    (useRedis
      ? new RedisDocumentRegistry(getRedisConnection())
      : new InMemoryDocumentRegistry());

  const documentLock =
    overrides.documentLock ??
    (useRedis
      ? new RedisDocumentLock(
          getRedisConnection(),
          pipelineConfig.documentLock,
          logger,
        )
      : new InMemoryDocumentLock());

  const ingestion = new IngestionOrchestrator(
    embeddings,
    index,
    registry,
    {
      chunking: pipelineConfig.chunking,
      rollbackBaseDelayMs: pipelineConfig.index.baseDelayMs,
      lock: documentLock,
      clock: overrides.clock,
    },
    logger,
  );

  const responder = new Responder(
    embeddings,
    index,
    overrides.completionProvider ??
      new AiSdkCompletionProvider(
        getModel(
          pipelineConfig.completion.model,
          pipelineConfig.completion.provider,
        ),
        pipelineConfig.completion.model,
      ),
    {
      topK: pipelineConfig.retrieval.topK,
      minScore: pipelineConfig.retrieval.minScore,
      maxTokens: pipelineConfig.completion.maxTokens,
      timeoutMs: pipelineConfig.completion.timeoutMs,
      maxAttempts: pipelineConfig.completion.maxAttempts,
    },
    logger,
  );

  const guard = new DedupGuard(
    overrides.claimStore ??
      (useRedis
        ? new RedisClaimStore(
            getRedisConnection(),
            pipelineConfig.dedup.keyPrefix,
          )
        : new InMemoryClaimStore(overrides.clock)),
    {
      retentionMs: pipelineConfig.dedup.retentionMs,
      holder: pipelineConfig.instanceName,
      clock: overrides.clock,
    },
    logger,
  );

  const scheduler =
    overrides.scheduler ??
    (pipelineConfig.queue.mode === "inline"
      ? new InlineTaskScheduler(logger)
      : new BullMQTaskScheduler(getChatEventQueue()));

  const chat = overrides.chat ?? createSlackChatClient(config.SLACK_BOT_TOKEN, logger);

  const router = new EventRouter(
    guard,
    scheduler,
    ingestion,
    responder,
    chat,
    {
      botUserId: pipelineConfig.chat.botUserId,
      ingestKeywords: pipelineConfig.chat.ingestKeywords,
      download: pipelineConfig.fetch,
      instanceName: pipelineConfig.instanceName,
    },
    logger,
    overrides.loadUrl,
  );

  if (scheduler instanceof InlineTaskScheduler) {
    scheduler.attach(task => router.process(task));
  }

  return {
    config: pipelineConfig,
    embeddings,
    index,
    registry,
    ingestion,
    responder,
    guard,
    scheduler,
    chat,
    router,
  };
}
