import { cleanMarkdownForIndexing } from "../chunker";
import type { NormalizedDocument, NormalizedSection } from "../types";

export function decodeText(bytes: Buffer): string {
  // strip a UTF-8 BOM if present
  return bytes.toString("utf8").replace(/^\uFEFF/, "");
}

export async function extractPlainText(bytes: Buffer): Promise<NormalizedDocument> {
  return {
    type: "prose",
    sections: [{ text: decodeText(bytes), metadata: {} }],
  };
}

const HEADING = /^#{1,6}\s+(.+?)\s*#*\s*$/;

/**
 * Markdown is cut into one section per heading so chunks can carry the
 * heading they came from.
 */
export async function extractMarkdown(bytes: Buffer): Promise<NormalizedDocument> {
  const lines = decodeText(bytes).split(/\r?\n/);
  const sections: NormalizedSection[] = [];
  let title: string | undefined;
  let heading: string | undefined;
  let buffer: string[] = [];

  const flush = () => {
    const text = cleanMarkdownForIndexing(buffer.join("\n"));
    if (text.length > 0) {
      sections.push({ text, metadata: heading ? { section: heading } : {} });
    }
    buffer = [];
  };

  let inFence = false;
  for (const line of lines) {
    if (/^```/.test(line)) {
      inFence = !inFence;
    }

    const match = inFence ? null : HEADING.exec(line);
    if (match) {
      flush();
      heading = cleanMarkdownForIndexing(match[1]);
      title ??= heading;
      // keep the heading text itself searchable
      buffer.push(heading + ".", "");
    } else {
      buffer.push(line);
    }
  }
  flush();

  return { type: "prose", title, sections };
}
