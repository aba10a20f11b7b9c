import type { ErrorCodes } from "../error";

export type IngestionStatus =
  | "pending"
  | "chunking"
  | "embedding"
  | "indexed"
  | "failed";

export type DocumentSource =
  | { kind: "file"; fileId: string; name: string }
  | { kind: "url"; url: string };

/** Extractors understood by the ingestion pipeline. */
export type SourceType =
  | "text"
  | "markdown"
  | "csv"
  | "xlsx"
  | "pdf"
  | "docx"
  | "html";

/** Prose is split into sentences, tabular content into rows. */
export type DocumentType = "prose" | "tabular";

export interface Document {
  documentId: string;
  source: DocumentSource;
  mimeType?: string;
  sourceType?: SourceType;
  title: string;
  ingestionStatus: IngestionStatus;
  chunkCount: number;
  error?: { code: ErrorCodes; message: string };
  /** Set when a rollback could not purge partially written records. */
  cleanupRequired?: boolean;
  eventId?: string;
  createdAt: number;
  updatedAt: number;
}

export interface ChunkMetadata {
  page?: number;
  sheet?: string;
  section?: string;
  truncated?: boolean;
}

export interface Chunk {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  tokenLength: number;
  metadata: ChunkMetadata;
}

export interface Embedding {
  chunkId: string;
  vector: number[];
  modelVersion: string;
}

/** The unit persisted in the vector store, keyed by chunk id. */
export interface IndexRecord {
  id: string;
  documentId: string;
  title: string;
  source: string;
  sourceType: string;
  text: string;
  vector: number[];
  sequenceIndex: number;
  tokenLength: number;
  modelVersion: string;
  metadata: ChunkMetadata;
}

export type StoredRecord = Omit<IndexRecord, "vector">;

export interface ScoredRecord {
  record: StoredRecord;
  score: number;
}

export interface QueryFilters {
  documentId?: string;
  sourceType?: string;
}

export type UpsertResult =
  | { status: "success"; upserted: number }
  | { status: "partial_failure"; upserted: number; failedIds: string[] };

/** A document after type-specific extraction, ready for chunking. */
export interface NormalizedSection {
  text: string;
  metadata: ChunkMetadata;
}

export interface NormalizedDocument {
  type: DocumentType;
  title?: string;
  sections: NormalizedSection[];
}

export interface Citation {
  label: string;
  documentId: string;
  title: string;
  source: string;
}

export interface Answer {
  text: string;
  citations: Citation[];
  /** False when no passage cleared the relevance threshold. */
  grounded: boolean;
}

export interface RetrievedPassage {
  label: string;
  record: StoredRecord;
  score: number;
}

/** Lives only for the duration of one retrieval request. */
export interface QueryContext {
  question: string;
  passages: RetrievedPassage[];
  answer?: Answer;
}
