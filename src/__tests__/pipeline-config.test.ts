import { configSchema } from "../config";
import { createPipelineConfig } from "../pipeline-config";
import { testPipelineConfig } from "./fakes";

describe("createPipelineConfig", () => {
  it("should read defaults from an empty environment", () => {
    const pipelineConfig = createPipelineConfig(
      configSchema.parse({ INSTANCE_NAME: "worker-1" }),
    );

    expect(pipelineConfig.instanceName).toBe("worker-1");
    expect(pipelineConfig.chunking).toEqual({ maxTokens: 400, overlapTokens: 50 });
    expect(pipelineConfig.retrieval).toEqual({ topK: 5, minScore: 0.25 });
    expect(pipelineConfig.chat.ingestKeywords).toEqual(["import rag"]);
    expect(pipelineConfig.stateStore).toBe("memory");
  });

  it("should keep state in redis when a URL is configured", () => {
    expect(
      testPipelineConfig({ REDIS_URL: "redis://localhost:6379" }).stateStore,
    ).toBe("redis");
  });

  it("should lowercase ingest keywords", () => {
    expect(
      testPipelineConfig({ INGEST_KEYWORDS: "Import RAG, Add Doc" }).chat
        .ingestKeywords,
    ).toEqual(["import rag", "add doc"]);
  });

  it("should be frozen all the way down", () => {
    const pipelineConfig = testPipelineConfig();

    expect(Object.isFrozen(pipelineConfig)).toBe(true);
    expect(Object.isFrozen(pipelineConfig.embedding)).toBe(true);
    expect(Object.isFrozen(pipelineConfig.chat.ingestKeywords)).toBe(true);
  });

  it("should refuse an overlap as large as the chunk", () => {
    expect(() =>
      testPipelineConfig({ CHUNK_MAX_TOKENS: "50", CHUNK_OVERLAP_TOKENS: "50" }),
    ).toThrow(
      "CHUNK_OVERLAP_TOKENS (50) must be smaller than CHUNK_MAX_TOKENS (50)",
    );
  });

  it("should reject an unknown index provider", () => {
    expect(() =>
      configSchema.parse({ VECTOR_INDEX_PROVIDER: "faiss" }),
    ).toThrow();
  });
});
