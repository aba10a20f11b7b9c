import { APICallError } from "ai";
import {
  EmbeddingRejectedError,
  EmbeddingUnavailableError,
} from "../../error";
import {
  EmbeddingClient,
  cosineSimilarity,
  type EmbeddingBatchResult,
  type EmbeddingClientOptions,
  type EmbeddingProvider,
} from "../embeddings";
import { FailingEmbeddingProvider, silentLogger } from "../../../__tests__/fakes";

const options: EmbeddingClientOptions = {
  batchSize: 2,
  maxConcurrency: 3,
  maxAttempts: 3,
  baseDelayMs: 1,
  timeoutMs: 1000,
};

/** Echoes the numeric suffix of each text; early batches answer last. */
class EchoProvider implements EmbeddingProvider {
  readonly modelVersion = "echo-v1";
  readonly batches: string[][] = [];

  constructor(readonly maxBatchSize = 2048) {}

  async embedBatch(texts: string[]): Promise<EmbeddingBatchResult> {
    this.batches.push(texts);
    const delay = Math.max(0, 20 - this.batches.length * 5);
    await new Promise(resolve => setTimeout(resolve, delay));
    return {
      embeddings: texts.map(t => [Number(t.slice(1))]),
      tokens: texts.length,
    };
  }
}

function apiError(statusCode: number, responseBody = "{}") {
  return new APICallError({
    message: `HTTP ${statusCode}`,
    url: "https://api.example.test/v1/embeddings",
    requestBodyValues: {},
    statusCode,
    responseBody,
  });
}

describe("EmbeddingClient", () => {
  it("should keep input order across concurrent batches", async () => {
    const provider = new EchoProvider();
    const client = new EmbeddingClient(provider, options, silentLogger);
    const texts = ["t0", "t1", "t2", "t3", "t4", "t5", "t6"];

    const vectors = await client.embed(texts);

    expect(vectors).toEqual([[0], [1], [2], [3], [4], [5], [6]]);
    expect(provider.batches).toHaveLength(4);
  });

  it("should not call the provider for empty input", async () => {
    const provider = new EchoProvider();
    const client = new EmbeddingClient(provider, options, silentLogger);

    expect(await client.embed([])).toEqual([]);
    expect(provider.batches).toHaveLength(0);
  });

  it("should cap the batch size at the provider limit", async () => {
    const provider = new EchoProvider(2);
    const client = new EmbeddingClient(
      provider,
      { ...options, batchSize: 100 },
      silentLogger,
    );

    await client.embed(["t1", "t2", "t3", "t4", "t5"]);

    expect(provider.batches.map(b => b.length)).toEqual([2, 2, 1]);
  });

  it("should retry transient failures", async () => {
    let calls = 0;
    const provider: EmbeddingProvider = {
      modelVersion: "flaky-v1",
      maxBatchSize: 10,
      async embedBatch(texts) {
        calls++;
        if (calls === 1) throw apiError(503);
        return { embeddings: texts.map(() => [1, 0]), tokens: 1 };
      },
    };
    const client = new EmbeddingClient(provider, options, silentLogger);

    expect(await client.embedOne("hello")).toEqual([1, 0]);
    expect(calls).toBe(2);
  });

  it("should report unavailable after exhausting attempts", async () => {
    const provider = new FailingEmbeddingProvider(() => apiError(429));
    const client = new EmbeddingClient(provider, options, silentLogger);

    await expect(client.embed(["a"])).rejects.toBeInstanceOf(
      EmbeddingUnavailableError,
    );
    expect(provider.calls).toBe(3);
  });

  it("should not retry a rejected request", async () => {
    const provider = new FailingEmbeddingProvider(() => apiError(400));
    const client = new EmbeddingClient(provider, options, silentLogger);

    await expect(client.embed(["a"])).rejects.toBeInstanceOf(
      EmbeddingRejectedError,
    );
    expect(provider.calls).toBe(1);
  });

  it("should treat exhausted quota as rejected", async () => {
    const provider = new FailingEmbeddingProvider(() =>
      apiError(429, '{"error":{"code":"insufficient_quota"}}'),
    );
    const client = new EmbeddingClient(provider, options, silentLogger);

    await expect(client.embed(["a"])).rejects.toBeInstanceOf(
      EmbeddingRejectedError,
    );
    expect(provider.calls).toBe(1);
  });

  it("should reject a response with the wrong number of vectors", async () => {
    const provider: EmbeddingProvider = {
      modelVersion: "short-v1",
      maxBatchSize: 10,
      async embedBatch() {
        return { embeddings: [[1, 0]], tokens: 1 };
      },
    };
    const client = new EmbeddingClient(provider, options, silentLogger);

    await expect(client.embed(["a", "b"])).rejects.toThrow(
      "Embedding service returned 1 vectors for 2 inputs",
    );
  });

  it("should reject vectors of an unexpected dimension", async () => {
    const provider: EmbeddingProvider = {
      modelVersion: "narrow-v1",
      maxBatchSize: 10,
      async embedBatch(texts) {
        return { embeddings: texts.map(() => [1, 0]), tokens: 1 };
      },
    };
    const client = new EmbeddingClient(
      provider,
      { ...options, dimensions: 3 },
      silentLogger,
    );

    await expect(client.embed(["a"])).rejects.toBeInstanceOf(
      EmbeddingRejectedError,
    );
  });

  it("should expose the provider's model version", () => {
    const client = new EmbeddingClient(new EchoProvider(), options, silentLogger);
    expect(client.modelVersion).toBe("echo-v1");
  });
});

describe("cosineSimilarity", () => {
  it("should score identical directions as 1", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
  });

  it("should score orthogonal vectors as 0", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("should score a zero vector as 0", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});
