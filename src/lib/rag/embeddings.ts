import { embedMany, type EmbeddingModel } from "ai";
import type { Logger } from "winston";
import { logger as _logger } from "../logger";
import { withSpan, setSpanAttributes } from "../otel-tracer";
import {
  EmbeddingRejectedError,
  EmbeddingUnavailableError,
} from "../error";
import { executeWithRetry } from "../retry-utils";
import { isRetryableModelError } from "../generic-ai";

export interface EmbeddingBatchResult {
  embeddings: number[][];
  tokens: number;
}

/** A hosted embedding model, one request per call. */
export interface EmbeddingProvider {
  readonly modelVersion: string;
  /** Largest number of texts a single request may carry. */
  readonly maxBatchSize: number;
  embedBatch(texts: string[], signal: AbortSignal): Promise<EmbeddingBatchResult>;
}

export interface EmbeddingClientOptions {
  batchSize: number;
  maxConcurrency: number;
  maxAttempts: number;
  baseDelayMs: number;
  timeoutMs: number;
  /** Expected vector length. Responses of any other length are rejected. */
  dimensions?: number;
}

// OpenAI accepts up to 2048 inputs per embeddings request
const DEFAULT_MAX_BATCH_SIZE = 2048;

export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly model: EmbeddingModel<string>,
    readonly modelVersion: string,
    readonly maxBatchSize: number = DEFAULT_MAX_BATCH_SIZE,
  ) {}

  async embedBatch(
    texts: string[],
    signal: AbortSignal,
  ): Promise<EmbeddingBatchResult> {
    // retries are owned by EmbeddingClient
    const result = await embedMany({
      model: this.model,
      values: texts,
      maxRetries: 0,
      abortSignal: signal,
    });

    return {
      embeddings: result.embeddings,
      tokens: result.usage.tokens,
    };
  }
}

export function isRetryableEmbeddingError(error: unknown): boolean {
  if (error instanceof EmbeddingRejectedError) return false;
  if (error instanceof EmbeddingUnavailableError) return true;
  return isRetryableModelError(error);
}

export class EmbeddingClient {
  private readonly log: Logger;
  private readonly batchSize: number;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingClientOptions,
    logger?: Logger,
  ) {
    this.log = (logger ?? _logger).child({ module: "embedding-client" });
    this.batchSize = Math.max(
      1,
      Math.min(options.batchSize, provider.maxBatchSize),
    );
  }

  get modelVersion(): string {
    return this.provider.modelVersion;
  }

  /**
   * Embed texts 1:1 and in order. Either every vector comes back or the call
   * throws EmbeddingUnavailableError / EmbeddingRejectedError.
   */
  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    return await withSpan("rag-embed", async span => {
      const batches: { offset: number; texts: string[] }[] = [];
      for (let i = 0; i < texts.length; i += this.batchSize) {
        batches.push({ offset: i, texts: texts.slice(i, i + this.batchSize) });
      }

      setSpanAttributes(span, {
        "embedding.model": this.provider.modelVersion,
        "embedding.text_count": texts.length,
        "embedding.batches": batches.length,
      });

      this.log.debug("Processing embedding batches", {
        method: "embed",
        totalTexts: texts.length,
        batches: batches.length,
        batchSize: this.batchSize,
      });

      const vectors: number[][] = new Array(texts.length);
      const controller = new AbortController();
      const onAbort = () => controller.abort(signal?.reason);
      signal?.addEventListener("abort", onAbort, { once: true });

      let next = 0;
      let totalTokens = 0;
      const failures: unknown[] = [];

      const worker = async () => {
        while (next < batches.length && !controller.signal.aborted) {
          const batch = batches[next++];
          try {
            const result = await this.embedWithRetry(
              batch.texts,
              controller.signal,
            );
            result.embeddings.forEach((vector, i) => {
              vectors[batch.offset + i] = vector;
            });
            totalTokens += result.tokens;
          } catch (error) {
            // stop the remaining batches, the call fails as a whole
            failures.push(error);
            controller.abort(error);
            return;
          }
        }
      };

      const concurrency = Math.max(
        1,
        Math.min(this.options.maxConcurrency, batches.length),
      );

      try {
        await Promise.all(Array.from({ length: concurrency }, worker));
        if (failures.length > 0) {
          throw this.classify(failures[0]);
        }
        signal?.throwIfAborted();
      } finally {
        signal?.removeEventListener("abort", onAbort);
      }

      setSpanAttributes(span, { "embedding.total_tokens": totalTokens });

      this.log.debug("Embedding complete", {
        method: "embed",
        total: texts.length,
        totalTokens,
        estimatedCost: estimateEmbeddingCost(totalTokens),
      });

      return vectors;
    });
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embed([text], signal);
    return vector;
  }

  private async embedWithRetry(
    texts: string[],
    signal: AbortSignal,
  ): Promise<EmbeddingBatchResult> {
    return await executeWithRetry(
      async attemptSignal => {
        const result = await this.provider.embedBatch(texts, attemptSignal);
        this.validate(texts, result);
        return result;
      },
      {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        timeoutMs: this.options.timeoutMs,
        isRetryable: isRetryableEmbeddingError,
        signal,
        logger: this.log,
        operation: "embed-batch",
      },
    );
  }

  private validate(texts: string[], result: EmbeddingBatchResult): void {
    if (result.embeddings.length !== texts.length) {
      throw new EmbeddingRejectedError(
        `Embedding service returned ${result.embeddings.length} vectors for ${texts.length} inputs`,
      );
    }

    const expected = this.options.dimensions;
    if (expected === undefined) return;

    const mismatch = result.embeddings.find(v => v.length !== expected);
    if (mismatch) {
      throw new EmbeddingRejectedError(
        `Embedding service returned a vector of ${mismatch.length} dimensions, expected ${expected}`,
      );
    }
  }

  private classify(error: unknown): EmbeddingUnavailableError | EmbeddingRejectedError {
    if (
      error instanceof EmbeddingRejectedError ||
      error instanceof EmbeddingUnavailableError
    ) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);

    this.log.warn("Embedding request failed", {
      method: "embed",
      error: message,
    });

    return isRetryableEmbeddingError(error)
      ? new EmbeddingUnavailableError(
          `Embedding service unavailable: ${message}`,
          { cause: error },
        )
      : new EmbeddingRejectedError(`Embedding request rejected: ${message}`, {
          cause: error,
        });
  }
}

/**
 * Estimate embedding cost for text
 * Based on OpenAI pricing: $0.02 / 1M tokens
 */
export function estimateEmbeddingCost(tokenCount: number): number {
  return (tokenCount / 1_000_000) * 0.02;
}

/**
 * Calculate cosine similarity between two embeddings
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error("Embeddings must have the same dimensions");
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    magnitudeA += a[i] * a[i];
    magnitudeB += b[i] * b[i];
  }

  magnitudeA = Math.sqrt(magnitudeA);
  magnitudeB = Math.sqrt(magnitudeB);

  if (magnitudeA === 0 || magnitudeB === 0) return 0;

  return dotProduct / (magnitudeA * magnitudeB);
}
