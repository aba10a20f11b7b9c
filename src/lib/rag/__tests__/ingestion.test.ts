import {
  DocumentFetchError,
  DocumentLockedError,
  IndexRejectedError,
} from "../../error";
import type { DocumentLock } from "../document-lock";
import { EmbeddingClient, type EmbeddingProvider } from "../embeddings";
import { InMemoryVectorIndex } from "../memory-index";
import {
  InMemoryDocumentRegistry,
  canTransition,
} from "../document-registry";
import {
  IngestionOrchestrator,
  deriveDocumentId,
  normalizeDocumentUrl,
} from "../ingestion";
import type { IndexRecord, UpsertResult } from "../types";
import {
  BagOfWordsEmbeddingProvider,
  FailingEmbeddingProvider,
  ManualClock,
  silentLogger,
  textFile,
} from "../../../__tests__/fakes";

const HANDBOOK =
  "Employees may work remotely two days per week. Requests go to the team lead. Expenses are reimbursed monthly.";

/** Memory index whose writes and deletes can be made to fail. */
class FlakyIndex extends InMemoryVectorIndex {
  upsertOutcome: "ok" | "partial" | "reject" = "ok";
  failDeletesAfter = Infinity;
  deleteCalls = 0;

  async upsert(records: IndexRecord[]): Promise<UpsertResult> {
    const result = await super.upsert(records);
    if (this.upsertOutcome === "partial") {
      return {
        status: "partial_failure",
        upserted: records.length - 1,
        failedIds: [records[records.length - 1].id],
      };
    }
    if (this.upsertOutcome === "reject") {
      throw new IndexRejectedError("metadata too large");
    }
    return result;
  }

  async deleteByDocument(documentId: string): Promise<number> {
    this.deleteCalls++;
    if (this.deleteCalls > this.failDeletesAfter) {
      throw new Error("connection reset");
    }
    return await super.deleteByDocument(documentId);
  }
}

function setup(
  provider: EmbeddingProvider = new BagOfWordsEmbeddingProvider(),
  lock?: DocumentLock,
) {
  const clock = new ManualClock();
  const index = new FlakyIndex(silentLogger);
  const registry = new InMemoryDocumentRegistry();
  const embeddings = new EmbeddingClient(
    provider,
    {
      batchSize: 16,
      maxConcurrency: 2,
      maxAttempts: 2,
      baseDelayMs: 1,
      timeoutMs: 1000,
    },
    silentLogger,
  );
  const orchestrator = new IngestionOrchestrator(
    embeddings,
    index,
    registry,
    {
      chunking: { maxTokens: 20, overlapTokens: 0 },
      rollbackAttempts: 2,
      rollbackBaseDelayMs: 1,
      lock,
      clock: clock.read,
    },
    silentLogger,
  );
  return { clock, index, registry, orchestrator };
}

const handbookSource = {
  kind: "file" as const,
  fileId: "F001",
  name: "handbook.txt",
};

describe("IngestionOrchestrator", () => {
  it("should chunk, embed and index a document", async () => {
    const { index, registry, orchestrator } = setup();

    const result = await orchestrator.ingest({
      source: handbookSource,
      eventId: "Ev001",
      load: async () => textFile(HANDBOOK),
    });

    const documentId = deriveDocumentId(handbookSource);
    expect(result.chunkCount).toBe(2);
    expect(result.totalTokens).toBe(27);
    expect(result.document).toMatchObject({
      documentId,
      title: "handbook.txt",
      ingestionStatus: "indexed",
      chunkCount: 2,
      sourceType: "text",
      mimeType: "text/plain",
      eventId: "Ev001",
    });
    expect(await registry.get(documentId)).toEqual(result.document);

    const records = index.list(documentId);
    expect(records.map(r => [r.id, r.text])).toEqual([
      [
        `${documentId}#0`,
        "Employees may work remotely two days per week. Requests go to the team lead.",
      ],
      [`${documentId}#1`, "Expenses are reimbursed monthly."],
    ]);
    expect(records.every(r => r.modelVersion === "bag-of-words-v1")).toBe(true);
    expect(records.every(r => r.source === "handbook.txt")).toBe(true);
  });

  it("should replace the records of a re-ingested document", async () => {
    const { clock, index, orchestrator } = setup();

    const first = await orchestrator.ingest({
      source: handbookSource,
      load: async () => textFile(HANDBOOK),
    });
    clock.advance(60_000);
    const second = await orchestrator.ingest({
      source: handbookSource,
      load: async () => textFile("Only one sentence now."),
    });

    expect(second.chunkCount).toBe(1);
    expect(await index.stats()).toEqual({ recordCount: 1 });
    expect(second.document.createdAt).toBe(first.document.createdAt);
    expect(second.document.updatedAt).toBe(first.document.updatedAt + 60_000);
  });

  it("should run overlapping ingests of one document one after the other", async () => {
    const { index, registry, orchestrator } = setup();
    let releaseFirst: () => void = () => {};
    const firstLoaded = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const first = orchestrator.ingest({
      source: handbookSource,
      load: async () => {
        await firstLoaded;
        return textFile(HANDBOOK);
      },
    });
    const second = orchestrator.ingest({
      source: handbookSource,
      load: async () => textFile("Only one sentence now."),
    });
    releaseFirst();
    const [a, b] = await Promise.all([first, second]);

    const documentId = deriveDocumentId(handbookSource);
    expect(a.chunkCount).toBe(2);
    expect(b.chunkCount).toBe(1);
    expect(await registry.get(documentId)).toMatchObject({
      ingestionStatus: "indexed",
      chunkCount: 1,
    });
    expect(index.list(documentId).map(r => r.text)).toEqual([
      "Only one sentence now.",
    ]);
  });

  it("should report a locked document without touching its record", async () => {
    const busy: DocumentLock = {
      run: async () => {
        throw new DocumentLockedError("Document is being processed elsewhere");
      },
    };
    const { registry, orchestrator } = setup(undefined, busy);

    const result = await orchestrator.ingest({
      source: handbookSource,
      load: async () => textFile(HANDBOOK),
    });

    expect(result.document.ingestionStatus).toBe("failed");
    expect(result.document.error).toEqual({
      code: "INDEX_UNAVAILABLE",
      message: "Document is being processed elsewhere",
    });
    expect(await registry.get(deriveDocumentId(handbookSource))).toBeNull();
  });

  it("should take the title from the document when none is given", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.ingest({
      source: { kind: "file", fileId: "F002", name: "leave.md" },
      load: async () => textFile("# Leave Policy\n\nTake time off.", "text/markdown"),
    });

    expect(result.document.title).toBe("Leave Policy");
    expect(result.document.sourceType).toBe("markdown");
  });

  it("should roll back records after a partial write", async () => {
    const { index, orchestrator } = setup();
    index.upsertOutcome = "partial";

    const result = await orchestrator.ingest({
      source: handbookSource,
      load: async () => textFile(HANDBOOK),
    });

    expect(result.document.ingestionStatus).toBe("failed");
    expect(result.document.error?.code).toBe("INDEX_UNAVAILABLE");
    expect(result.document.cleanupRequired).toBeUndefined();
    expect(result.chunkCount).toBe(0);
    expect(await index.stats()).toEqual({ recordCount: 0 });
  });

  it("should flag the document when the rollback fails", async () => {
    const { index, registry, orchestrator } = setup();
    index.upsertOutcome = "reject";
    // the delete that clears previous records succeeds, rollback deletes do not
    index.failDeletesAfter = 1;

    const result = await orchestrator.ingest({
      source: handbookSource,
      load: async () => textFile(HANDBOOK),
    });
    const documentId = result.document.documentId;

    expect(result.document).toMatchObject({
      ingestionStatus: "failed",
      error: { code: "INDEX_REJECTED", message: "metadata too large" },
      cleanupRequired: true,
    });
    expect(index.deleteCalls).toBe(3);
    expect(await index.stats()).toEqual({ recordCount: 2 });

    index.failDeletesAfter = Infinity;
    expect(await orchestrator.purge(documentId)).toBe(2);
    expect((await registry.get(documentId))?.cleanupRequired).toBe(false);
    expect(await index.stats()).toEqual({ recordCount: 0 });
  });

  it("should fail documents with no extractable text", async () => {
    const { index, orchestrator } = setup();

    const result = await orchestrator.ingest({
      source: handbookSource,
      load: async () => textFile("   \n\n   "),
    });

    expect(result.document.ingestionStatus).toBe("failed");
    expect(result.document.error?.code).toBe("EMPTY_DOCUMENT");
    expect(index.deleteCalls).toBe(0);
  });

  it("should fail unsupported file types before extraction", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.ingest({
      source: { kind: "file", fileId: "F003", name: "photo.png" },
      load: async () => ({ bytes: Buffer.from([0x89, 0x50]), mimeType: "image/png" }),
    });

    expect(result.document.ingestionStatus).toBe("failed");
    expect(result.document.error).toEqual({
      code: "UNSUPPORTED_DOCUMENT_TYPE",
      message: "Unsupported document type: image/png",
    });
    expect(result.document.sourceType).toBeUndefined();
  });

  it("should record download failures", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.ingest({
      source: { kind: "url", url: "https://example.com/missing" },
      load: async () => {
        throw new DocumentFetchError(
          "Fetching https://example.com/missing failed with HTTP 404",
        );
      },
    });

    expect(result.document.error).toEqual({
      code: "DOCUMENT_FETCH_FAILED",
      message: "Fetching https://example.com/missing failed with HTTP 404",
    });
    expect(result.document.title).toBe("https://example.com/missing");
  });

  it("should record embedding failures without touching the index", async () => {
    const provider = new FailingEmbeddingProvider(() => new Error("boom"));
    const { index, orchestrator } = setup(provider);

    const result = await orchestrator.ingest({
      source: handbookSource,
      load: async () => textFile(HANDBOOK),
    });

    expect(result.document.error?.code).toBe("EMBEDDING_UNAVAILABLE");
    expect(provider.calls).toBe(2);
    expect(index.deleteCalls).toBe(0);
  });

  it("should resolve URL documents from their content type", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.ingest({
      source: { kind: "url", url: "https://example.com/policies" },
      load: async () =>
        textFile(
          "<html><head><title>Policies</title></head><body><p>Remote work is allowed.</p></body></html>",
          "text/html; charset=utf-8",
        ),
    });

    expect(result.document).toMatchObject({
      ingestionStatus: "indexed",
      sourceType: "html",
      title: "Policies",
      chunkCount: 1,
    });
  });

  it("should report status of known documents only", async () => {
    const { orchestrator } = setup();
    expect(await orchestrator.status("unknown")).toBeNull();
  });
});

describe("document identity", () => {
  it("should ignore fragments, www and trailing slashes", () => {
    expect(normalizeDocumentUrl("https://www.example.com/page/#top")).toBe(
      "https://example.com/page",
    );
    expect(
      deriveDocumentId({ kind: "url", url: "https://www.example.com/page/" }),
    ).toBe(deriveDocumentId({ kind: "url", url: "https://example.com/page" }));
  });

  it("should keep the query string", () => {
    expect(
      deriveDocumentId({ kind: "url", url: "https://example.com/doc?id=1" }),
    ).not.toBe(
      deriveDocumentId({ kind: "url", url: "https://example.com/doc?id=2" }),
    );
  });

  it("should produce 32 hex characters", () => {
    expect(deriveDocumentId(handbookSource)).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe("canTransition", () => {
  it("should only move forward", () => {
    expect(canTransition("pending", "chunking")).toBe(true);
    expect(canTransition("chunking", "embedding")).toBe(true);
    expect(canTransition("embedding", "indexed")).toBe(true);
    expect(canTransition("embedding", "chunking")).toBe(false);
  });

  it("should allow failing from any non-terminal status", () => {
    expect(canTransition("pending", "failed")).toBe(true);
    expect(canTransition("embedding", "failed")).toBe(true);
  });

  it("should never leave a terminal status", () => {
    expect(canTransition("indexed", "failed")).toBe(false);
    expect(canTransition("failed", "pending")).toBe(false);
    expect(canTransition("indexed", "pending")).toBe(false);
  });
});
