import type { ErrorCodes } from "../../lib/error";
import type { Answer, Document } from "../../lib/rag/types";

export const messages = {
  emptyQuestion: "Your message was empty. What would you like to know?",
  uploadWithoutUrl:
    "That looks like an import request, but I couldn't find a valid URL. Please include the link in your message.",
  generationFailed:
    "Sorry, I couldn't generate an answer right now. Please try again in a moment.",
  unexpectedError: "Sorry, something went wrong while handling your message.",
};

const failureReasons: Partial<Record<ErrorCodes, string>> = {
  UNSUPPORTED_DOCUMENT_TYPE: "this file type is not supported",
  DOCUMENT_FETCH_FAILED: "the content could not be downloaded",
  EMPTY_DOCUMENT: "no text could be extracted",
  EMBEDDING_UNAVAILABLE: "the embedding service is unavailable",
  EMBEDDING_REJECTED: "the embedding service rejected the content",
  INDEX_UNAVAILABLE: "the search index is unavailable",
  INDEX_REJECTED: "the search index rejected the content",
};

export function formatIngestionReply(document: Document): string {
  if (document.ingestionStatus === "indexed") {
    const unit = document.chunkCount === 1 ? "chunk" : "chunks";
    return `Added to the index: ${document.title} (${document.chunkCount} ${unit})`;
  }

  const reason =
    (document.error && failureReasons[document.error.code]) ??
    "an unexpected error occurred";
  return `Could not add ${document.title} to the index: ${reason}.`;
}

export function formatAnswerReply(answer: Answer): string {
  if (answer.citations.length === 0) {
    return answer.text;
  }

  const sources = answer.citations
    .map(c => `• ${c.title}${c.source !== c.title ? ` (${c.source})` : ""}`)
    .join("\n");

  return `${answer.text}\n\nSources:\n${sources}`;
}
