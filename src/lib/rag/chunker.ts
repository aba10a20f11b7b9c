import { z } from "zod";
import type {
  Chunk,
  ChunkMetadata,
  DocumentType,
  NormalizedDocument,
  NormalizedSection,
} from "./types";

export interface TextChunk {
  text: string;
  ordinal: number;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkingOptions {
  maxTokens: number; // Hard upper bound per chunk
  overlapTokens: number; // Context carried over from the previous chunk
}

const chunkingOptionsSchema = z
  .object({
    maxTokens: z.number().int().positive(),
    overlapTokens: z.number().int().nonnegative(),
  })
  .refine(o => o.overlapTokens < o.maxTokens, {
    message: "overlapTokens must be smaller than maxTokens",
  });

/** Characters per token used by the estimator below. */
export const CHARS_PER_TOKEN = 4;

/**
 * Estimate token count using simple heuristic (1 token ≈ 4 chars for English)
 * This is approximate but fast and, unlike a real tokenizer, needs no model
 * files at runtime.
 */
export function estimateTokenCount(text: string): number {
  const normalized = text.replace(/\s+/g, " ").trim();
  return Math.ceil(normalized.length / CHARS_PER_TOKEN);
}

function normalizeUnit(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Split prose into sentences. Paragraph breaks always end a sentence; inside
 * a paragraph, line wraps are folded into spaces. Full-width CJK stops end a
 * sentence with or without a following space.
 */
export function splitIntoSentences(text: string): string[] {
  const sentences: string[] = [];

  for (const paragraph of text.split(/\n\s*\n/)) {
    const normalized = normalizeUnit(paragraph);
    if (normalized.length === 0) continue;

    for (const sentence of normalized.split(/(?<=[.!?])\s+(?=\S)|(?<=[。！？])\s*(?=\S)/)) {
      if (sentence.length > 0) {
        sentences.push(sentence);
      }
    }
  }

  return sentences;
}

/** Tabular content arrives flattened one row per line. */
export function splitIntoRows(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(normalizeUnit)
    .filter(row => row.length > 0);
}

function joinUnits(units: string[], type: DocumentType): string {
  return units.join(type === "tabular" ? "\n" : " ");
}

/**
 * Cut an oversized unit at token boundaries of the estimator, never inside
 * a surrogate pair.
 */
function hardSplit(unit: string, maxTokens: number): string[] {
  const size = maxTokens * CHARS_PER_TOKEN;
  const pieces: string[] = [];
  let current = "";

  const flush = () => {
    const piece = current.trim();
    if (piece.length > 0) {
      pieces.push(piece);
    }
    current = "";
  };

  // for..of walks code points
  for (const char of unit) {
    if (current.length + char.length > size) flush();
    current += char;
  }
  flush();

  return pieces;
}

/**
 * Trailing units of the previous chunk that fit in the overlap budget.
 * Never returns the whole chunk, so every chunk makes progress.
 */
function overlapTail(units: string[], overlapTokens: number): string[] {
  if (overlapTokens === 0) return [];

  const tail: string[] = [];
  let tokens = 0;

  for (let i = units.length - 1; i >= 1; i--) {
    const unitTokens = estimateTokenCount(units[i]);
    if (tokens + unitTokens > overlapTokens) break;
    tokens += unitTokens;
    tail.unshift(units[i]);
  }

  return tail;
}

function chunkSection(
  section: NormalizedSection,
  type: DocumentType,
  opts: ChunkingOptions,
  firstOrdinal: number,
): TextChunk[] {
  const units =
    type === "tabular"
      ? splitIntoRows(section.text)
      : splitIntoSentences(section.text);
  const chunks: TextChunk[] = [];

  const emit = (text: string, truncated: boolean) => {
    chunks.push({
      text,
      ordinal: firstOrdinal + chunks.length,
      tokenCount: estimateTokenCount(text),
      metadata: truncated
        ? { ...section.metadata, truncated: true }
        : { ...section.metadata },
    });
  };

  let buffer: string[] = [];

  for (const unit of units) {
    if (estimateTokenCount(unit) > opts.maxTokens) {
      if (buffer.length > 0) {
        emit(joinUnits(buffer, type), false);
        buffer = [];
      }
      for (const piece of hardSplit(unit, opts.maxTokens)) {
        emit(piece, true);
      }
      continue;
    }

    const candidate = [...buffer, unit];
    if (
      buffer.length > 0 &&
      estimateTokenCount(joinUnits(candidate, type)) > opts.maxTokens
    ) {
      emit(joinUnits(buffer, type), false);

      let tail = overlapTail(buffer, opts.overlapTokens);
      while (
        tail.length > 0 &&
        estimateTokenCount(joinUnits([...tail, unit], type)) > opts.maxTokens
      ) {
        tail = tail.slice(1);
      }
      buffer = [...tail, unit];
    } else {
      buffer = candidate;
    }
  }

  if (buffer.length > 0) {
    emit(joinUnits(buffer, type), false);
  }

  return chunks;
}

/**
 * Chunk a normalized document section by section. Chunks never span two
 * sections (pages, sheets), and ordinals run across the whole document.
 */
export function chunkSections(
  sections: NormalizedSection[],
  type: DocumentType,
  options: ChunkingOptions,
): TextChunk[] {
  const opts = chunkingOptionsSchema.parse(options);
  const chunks: TextChunk[] = [];

  for (const section of sections) {
    chunks.push(...chunkSection(section, type, opts, chunks.length));
  }

  return chunks;
}

/**
 * Main chunking function: splits already-normalized text into bounded,
 * overlap-aware chunks. Same input, same output.
 */
export function chunkText(
  documentText: string,
  documentType: DocumentType,
  maxTokens: number,
  overlapTokens: number,
): TextChunk[] {
  return chunkSections(
    [{ text: documentText, metadata: {} }],
    documentType,
    { maxTokens, overlapTokens },
  );
}

export function chunkId(documentId: string, sequenceIndex: number): string {
  return `${documentId}#${sequenceIndex}`;
}

export function chunkDocument(
  documentId: string,
  document: NormalizedDocument,
  options: ChunkingOptions,
): Chunk[] {
  return chunkSections(document.sections, document.type, options).map(c => ({
    chunkId: chunkId(documentId, c.ordinal),
    documentId,
    sequenceIndex: c.ordinal,
    text: c.text,
    tokenLength: c.tokenCount,
    metadata: c.metadata,
  }));
}

/**
 * Extract clean text from markdown for indexing
 * Removes markdown syntax but preserves structure and content
 */
export function cleanMarkdownForIndexing(markdown: string): string {
  if (!markdown) return "";

  let text = markdown;

  // Code blocks: drop the fences, keep the code
  text = text.replace(/```[\w-]*\n([\s\S]*?)```/g, (_, code: string) => code);

  // Remove inline code (keep content)
  text = text.replace(/`([^`]+)`/g, "$1");

  // Remove images (keep alt text)
  text = text.replace(/!\[([^\]]*)\]\([^)]+\)/g, "$1");

  // Remove links (keep text)
  text = text.replace(/\[([^\]]+)\]\([^)]+\)/g, "$1");

  // Headings become their own paragraph
  text = text.replace(/^#{1,6}\s+(.+)$/gm, "\n$1\n");

  // Remove bold/italic
  text = text.replace(/(\*\*|__)(.*?)\1/g, "$2");
  text = text.replace(/(\*|_)(.*?)\1/g, "$2");

  // Remove list markers but keep structure
  text = text.replace(/^[\s]*[-*+]\s+/gm, "");
  text = text.replace(/^[\s]*\d+\.\s+/gm, "");

  // Remove blockquotes
  text = text.replace(/^>\s+/gm, "");

  // Remove horizontal rules
  text = text.replace(/^[-*_]{3,}$/gm, "");

  // Normalize whitespace
  text = text.replace(/\n{3,}/g, "\n\n");
  text = text.replace(/ {2,}/g, " ");

  return text.trim();
}
