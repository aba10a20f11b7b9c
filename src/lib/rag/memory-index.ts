import type { Logger } from "winston";
import { logger as _logger } from "../logger";
import { cosineSimilarity } from "./embeddings";
import type {
  IndexRecord,
  QueryFilters,
  ScoredRecord,
  UpsertResult,
} from "./types";
import {
  compareScored,
  matchesFilters,
  type IndexStats,
  type VectorIndexGateway,
} from "./vector-index";

/** In-process index for local development and tests. Brute-force cosine. */
export class InMemoryVectorIndex implements VectorIndexGateway {
  private readonly records = new Map<string, IndexRecord>();
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = (logger ?? _logger).child({ module: "memory-index" });
  }

  async upsert(records: IndexRecord[]): Promise<UpsertResult> {
    for (const record of records) {
      this.records.set(record.id, {
        ...record,
        vector: [...record.vector],
        metadata: { ...record.metadata },
      });
    }

    this.log.debug("Upserted records", {
      method: "upsert",
      count: records.length,
    });

    return { status: "success", upserted: records.length };
  }

  async query(
    vector: number[],
    k: number,
    filters?: QueryFilters,
  ): Promise<ScoredRecord[]> {
    if (k <= 0) return [];

    const scored: ScoredRecord[] = [];
    let mismatched = 0;
    for (const { vector: values, ...record } of this.records.values()) {
      if (!matchesFilters(record, filters)) continue;
      // written by another embedding model
      if (values.length !== vector.length) {
        mismatched++;
        continue;
      }
      scored.push({ record, score: cosineSimilarity(vector, values) });
    }

    if (mismatched > 0) {
      this.log.warn("Skipped records with a different vector dimension", {
        method: "query",
        dimension: vector.length,
        skipped: mismatched,
      });
    }

    return scored.sort(compareScored).slice(0, k);
  }

  async deleteByDocument(documentId: string): Promise<number> {
    let deleted = 0;
    for (const [id, record] of this.records) {
      if (record.documentId === documentId) {
        this.records.delete(id);
        deleted++;
      }
    }
    return deleted;
  }

  async stats(): Promise<IndexStats> {
    return { recordCount: this.records.size };
  }

  /** Records of one document in sequence order. */
  list(documentId: string): IndexRecord[] {
    return [...this.records.values()]
      .filter(r => r.documentId === documentId)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  }
}
