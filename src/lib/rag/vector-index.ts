import type {
  IndexRecord,
  QueryFilters,
  ScoredRecord,
  UpsertResult,
} from "./types";

export interface IndexStats {
  recordCount: number;
}

/**
 * Uniform contract over the vector store. Records are keyed by chunk id, so
 * upserting the same record twice leaves one copy.
 */
export interface VectorIndexGateway {
  upsert(records: IndexRecord[]): Promise<UpsertResult>;
  /** Sorted by score descending, then sequenceIndex, then id. */
  query(
    vector: number[],
    k: number,
    filters?: QueryFilters,
  ): Promise<ScoredRecord[]>;
  /** Returns the number of records removed. */
  deleteByDocument(documentId: string): Promise<number>;
  stats(): Promise<IndexStats>;
}

export function compareScored(a: ScoredRecord, b: ScoredRecord): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.record.sequenceIndex !== b.record.sequenceIndex) {
    return a.record.sequenceIndex - b.record.sequenceIndex;
  }
  return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0;
}

export function matchesFilters(
  record: { documentId: string; sourceType: string },
  filters?: QueryFilters,
): boolean {
  if (!filters) return true;
  if (filters.documentId && record.documentId !== filters.documentId) {
    return false;
  }
  if (filters.sourceType && record.sourceType !== filters.sourceType) {
    return false;
  }
  return true;
}
