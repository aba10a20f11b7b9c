import { UnsupportedDocumentTypeError } from "../../error";
import type { NormalizedDocument, SourceType } from "../types";
import { extractCsv, extractXlsx } from "./tabular";
import { extractDocx } from "./docx";
import { extractHtml } from "./html";
import { extractPdf } from "./pdf";
import { extractMarkdown, extractPlainText } from "./text";

type Extractor = (bytes: Buffer) => Promise<NormalizedDocument>;

const extractors: Record<SourceType, Extractor> = {
  text: extractPlainText,
  markdown: extractMarkdown,
  csv: extractCsv,
  xlsx: extractXlsx,
  pdf: extractPdf,
  docx: extractDocx,
  html: extractHtml,
};

const MIME_TYPES: Record<string, SourceType> = {
  "text/plain": "text",
  "text/markdown": "markdown",
  "text/x-markdown": "markdown",
  "text/csv": "csv",
  "application/csv": "csv",
  "application/pdf": "pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document":
    "docx",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "xlsx",
  "text/html": "html",
  "application/xhtml+xml": "html",
};

// Extensions double as the chat platform's own file type names.
const EXTENSIONS: Record<string, SourceType> = {
  txt: "text",
  text: "text",
  md: "markdown",
  markdown: "markdown",
  csv: "csv",
  pdf: "pdf",
  docx: "docx",
  xlsx: "xlsx",
  html: "html",
  htm: "html",
};

// Binary Office formats from before OOXML. Neither mammoth nor exceljs reads
// them, so they are refused with a hint instead of failing in the extractor.
const LEGACY_FORMATS: Record<string, string> = {
  doc: "docx",
  xls: "xlsx",
  "application/msword": "docx",
  "application/vnd.ms-excel": "xlsx",
};

export interface SourceTypeHints {
  /** Platform-declared type, e.g. "pdf" or "xlsx". */
  fileType?: string;
  mimeType?: string;
  fileName?: string;
}

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

function rejectLegacy(key: string): void {
  const replacement = lookup(LEGACY_FORMATS, key);
  if (replacement) {
    throw new UnsupportedDocumentTypeError(
      key,
      `save it as .${replacement} and upload it again`,
    );
  }
}

/**
 * Pick the extractor for a document from its declared type, its MIME type
 * or its file extension, in that order.
 */
export function resolveSourceType(hints: SourceTypeHints): SourceType {
  const fileType = hints.fileType?.trim().toLowerCase();
  if (fileType) {
    rejectLegacy(fileType);
    const fromFileType = lookup(EXTENSIONS, fileType);
    if (fromFileType) return fromFileType;
  }

  const mimeType = hints.mimeType?.split(";")[0].trim().toLowerCase();
  if (mimeType) {
    rejectLegacy(mimeType);
    const fromMime = lookup(MIME_TYPES, mimeType);
    if (fromMime) return fromMime;
  }

  const extension = hints.fileName?.toLowerCase().match(/\.([a-z0-9]+)$/)?.[1];
  if (extension) {
    rejectLegacy(extension);
    const fromExtension = lookup(EXTENSIONS, extension);
    if (fromExtension) return fromExtension;
  }

  throw new UnsupportedDocumentTypeError(
    fileType || mimeType || extension || "",
  );
}

export async function extractDocument(
  sourceType: SourceType,
  bytes: Buffer,
): Promise<NormalizedDocument> {
  return await extractors[sourceType](bytes);
}

