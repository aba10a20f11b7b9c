import { APICallError } from "ai";
import {
  GenerationUnavailableError,
  TransportableError,
} from "../../error";
import { EmbeddingClient, type EmbeddingProvider } from "../embeddings";
import { InMemoryVectorIndex } from "../memory-index";
import { NO_RELEVANT_INFORMATION } from "../prompts";
import {
  Responder,
  buildCitations,
  parseCitedLabels,
  type ResponderOptions,
} from "../responder";
import type { IndexRecord, RetrievedPassage } from "../types";
import {
  ScriptedCompletionProvider,
  silentLogger,
} from "../../../__tests__/fakes";

const QUESTION_VECTORS: Record<string, number[]> = {
  "How many remote days are allowed?": [1, 0, 0],
  "What is the parking policy?": [0, 1, 0],
};

const lookupProvider: EmbeddingProvider = {
  modelVersion: "lookup-v1",
  maxBatchSize: 16,
  async embedBatch(texts) {
    return {
      embeddings: texts.map(t => QUESTION_VECTORS[t] ?? [0, 0, 0]),
      tokens: texts.length,
    };
  },
};

function record(
  documentId: string,
  title: string,
  text: string,
  vector: number[],
  sequenceIndex = 0,
): IndexRecord {
  return {
    id: `${documentId}#${sequenceIndex}`,
    documentId,
    title,
    source: `${title}.pdf`,
    sourceType: "pdf",
    text,
    vector,
    sequenceIndex,
    tokenLength: 10,
    modelVersion: "lookup-v1",
    metadata: {},
  };
}

const options: ResponderOptions = {
  topK: 3,
  minScore: 0.5,
  maxTokens: 300,
  timeoutMs: 1000,
  maxAttempts: 2,
  baseDelayMs: 1,
};

async function setup(
  respond: ConstructorParameters<typeof ScriptedCompletionProvider>[0],
) {
  const index = new InMemoryVectorIndex(silentLogger);
  await index.upsert([
    record("remote", "Remote Work", "Staff may work remotely two days a week.", [1, 0, 0]),
    record("travel", "Travel", "Remote travel days need approval.", [0.6, 0, 0.8]),
    record("benefits", "Benefits", "Gym membership is covered.", [0, 0, 1]),
  ]);

  const embeddings = new EmbeddingClient(
    lookupProvider,
    {
      batchSize: 16,
      maxConcurrency: 1,
      maxAttempts: 1,
      baseDelayMs: 1,
      timeoutMs: 1000,
    },
    silentLogger,
  );
  const completion = new ScriptedCompletionProvider(respond);
  const responder = new Responder(
    embeddings,
    index,
    completion,
    options,
    silentLogger,
  );
  return { responder, completion };
}

describe("Responder", () => {
  it("should answer from passages above the relevance floor", async () => {
    const { responder, completion } = await setup(
      () => "Two days a week [S1].",
    );

    const answer = await responder.answer("How many remote days are allowed?");

    expect(answer).toEqual({
      text: "Two days a week [S1].",
      grounded: true,
      citations: [
        {
          label: "S1",
          documentId: "remote",
          title: "Remote Work",
          source: "Remote Work.pdf",
        },
      ],
    });
    expect(completion.requests).toHaveLength(1);
    expect(completion.requests[0].maxTokens).toBe(300);
    expect(completion.requests[0].prompt).toBe(
      "Sources:\n\n" +
        "[S1] Remote Work\nStaff may work remotely two days a week.\n\n" +
        "[S2] Travel\nRemote travel days need approval.\n\n" +
        "Question: How many remote days are allowed?",
    );
  });

  it("should not call the model when nothing is relevant", async () => {
    const { responder, completion } = await setup(() => "unused");

    const answer = await responder.answer("What is the parking policy?");

    expect(answer).toEqual({
      text: NO_RELEVANT_INFORMATION,
      citations: [],
      grounded: false,
    });
    expect(completion.requests).toHaveLength(0);
  });

  it("should reject an empty question", async () => {
    const { responder } = await setup(() => "unused");

    await expect(responder.answer("   ")).rejects.toBeInstanceOf(
      TransportableError,
    );
    await expect(responder.answer("   ")).rejects.toMatchObject({
      code: "BAD_REQUEST",
      message: "Question must not be empty",
    });
  });

  it("should retry a transient model failure", async () => {
    let calls = 0;
    const { responder } = await setup(() => {
      calls++;
      return calls === 1
        ? new APICallError({
            message: "Service Unavailable",
            url: "https://api.example.test/v1/chat/completions",
            requestBodyValues: {},
            statusCode: 503,
          })
        : "Two days [S1].";
    });

    const answer = await responder.answer("How many remote days are allowed?");

    expect(answer.text).toBe("Two days [S1].");
    expect(calls).toBe(2);
  });

  it("should surface a model outage as GenerationUnavailableError", async () => {
    const { responder, completion } = await setup(
      () => new Error("socket hang up"),
    );

    await expect(
      responder.answer("How many remote days are allowed?"),
    ).rejects.toBeInstanceOf(GenerationUnavailableError);
    expect(completion.requests).toHaveLength(2);
  });

  it("should label retrieved passages in score order", async () => {
    const { responder } = await setup(() => "unused");

    const passages = await responder.retrieve("How many remote days are allowed?");

    expect(passages.map(p => [p.label, p.record.documentId])).toEqual([
      ["S1", "remote"],
      ["S2", "travel"],
    ]);
    expect(passages[1].score).toBeCloseTo(0.6);
  });
});

describe("parseCitedLabels", () => {
  it("should list labels in order of first mention", () => {
    expect(parseCitedLabels("See [S2] and [S1, S2]. Also [S3]")).toEqual([
      "S2",
      "S1",
      "S3",
    ]);
  });

  it("should ignore other brackets", () => {
    expect(parseCitedLabels("An array [1, 2] and a [note]")).toEqual([]);
  });
});

describe("buildCitations", () => {
  const passages: RetrievedPassage[] = [
    { label: "S1", score: 0.9, record: record("a", "Alpha", "x", [], 0) },
    { label: "S2", score: 0.8, record: record("a", "Alpha", "y", [], 1) },
    { label: "S3", score: 0.7, record: record("b", "Beta", "z", []) },
  ];

  it("should cite each document once", () => {
    expect(
      buildCitations("[S2] then [S1] then [S3]", passages).map(c => [
        c.label,
        c.documentId,
      ]),
    ).toEqual([
      ["S2", "a"],
      ["S3", "b"],
    ]);
  });

  it("should cite every document when the answer cites nothing known", () => {
    expect(
      buildCitations("No labels here [S9]", passages).map(c => c.documentId),
    ).toEqual(["a", "b"]);
  });
});
