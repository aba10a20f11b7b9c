import { InMemoryVectorIndex } from "../memory-index";
import { compareScored } from "../vector-index";
import type { IndexRecord } from "../types";
import { silentLogger } from "../../../__tests__/fakes";

function record(
  documentId: string,
  sequenceIndex: number,
  vector: number[],
  sourceType = "text",
): IndexRecord {
  return {
    id: `${documentId}#${sequenceIndex}`,
    documentId,
    title: documentId,
    source: `${documentId}.txt`,
    sourceType,
    text: `chunk ${sequenceIndex} of ${documentId}`,
    vector,
    sequenceIndex,
    tokenLength: 5,
    modelVersion: "test-model",
    metadata: {},
  };
}

describe("InMemoryVectorIndex", () => {
  let index: InMemoryVectorIndex;

  beforeEach(() => {
    index = new InMemoryVectorIndex(silentLogger);
  });

  it("should keep one copy per record id", async () => {
    await index.upsert([record("a", 0, [1, 0])]);
    await index.upsert([record("a", 0, [0, 1])]);

    expect(await index.stats()).toEqual({ recordCount: 1 });
    expect(index.list("a")[0].vector).toEqual([0, 1]);
  });

  it("should return the k best matches by score", async () => {
    await index.upsert([
      record("a", 0, [1, 0]),
      record("a", 1, [0, 1]),
      record("b", 0, [1, 1]),
    ]);

    const results = await index.query([1, 0], 2);

    expect(results.map(r => r.record.id)).toEqual(["a#0", "b#0"]);
    expect(results[0].score).toBeCloseTo(1);
    expect(results[1].score).toBeCloseTo(Math.SQRT1_2);
    expect(results[0].record).not.toHaveProperty("vector");
  });

  it("should skip records written with another vector dimension", async () => {
    await index.upsert([
      record("a", 0, [1, 0]),
      record("old", 0, [1, 0, 0]),
    ]);

    const results = await index.query([1, 0], 5);

    expect(results.map(r => r.record.id)).toEqual(["a#0"]);
  });

  it("should break score ties by sequence index, then id", async () => {
    await index.upsert([
      record("b", 1, [1, 0]),
      record("a", 1, [1, 0]),
      record("c", 0, [1, 0]),
    ]);

    const results = await index.query([1, 0], 3);

    expect(results.map(r => r.record.id)).toEqual(["c#0", "a#1", "b#1"]);
  });

  it("should apply filters", async () => {
    await index.upsert([
      record("a", 0, [1, 0], "pdf"),
      record("b", 0, [1, 0], "text"),
    ]);

    expect(
      (await index.query([1, 0], 5, { sourceType: "pdf" })).map(r => r.record.id),
    ).toEqual(["a#0"]);
    expect(
      (await index.query([1, 0], 5, { documentId: "b" })).map(r => r.record.id),
    ).toEqual(["b#0"]);
  });

  it("should return nothing for k <= 0", async () => {
    await index.upsert([record("a", 0, [1, 0])]);
    expect(await index.query([1, 0], 0)).toEqual([]);
  });

  it("should delete every record of a document", async () => {
    await index.upsert([
      record("a", 0, [1, 0]),
      record("a", 1, [0, 1]),
      record("b", 0, [1, 1]),
    ]);

    expect(await index.deleteByDocument("a")).toBe(2);
    expect(await index.deleteByDocument("a")).toBe(0);
    expect(await index.stats()).toEqual({ recordCount: 1 });
  });

  it("should not share state with the caller's records", async () => {
    const r = record("a", 0, [1, 0]);
    await index.upsert([r]);
    r.vector[0] = 0;

    expect(index.list("a")[0].vector).toEqual([1, 0]);
  });
});

describe("compareScored", () => {
  it("should order by score descending", () => {
    const low = { record: record("a", 0, []), score: 0.2 };
    const high = { record: record("b", 5, []), score: 0.9 };
    expect([low, high].sort(compareScored)).toEqual([high, low]);
  });
});
