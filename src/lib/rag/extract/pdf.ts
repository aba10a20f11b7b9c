import type { NormalizedDocument, NormalizedSection } from "../types";

const PAGE_BREAK = "\n\n";

/**
 * pdf-parse writes a blank line before every rendered page, so its text is
 * `"\n\n" + page1 + "\n\n" + page2 ...`. When the pieces do not line up with
 * the rendered page count (a page carrying its own blank line) the text is
 * kept as one section without page numbers rather than guessing.
 */
export function splitPdfPages(
  text: string,
  pageCount: number,
): NormalizedSection[] {
  const body = text.startsWith(PAGE_BREAK)
    ? text.slice(PAGE_BREAK.length)
    : text;
  const pages = body.split(PAGE_BREAK);

  if (pages.length !== pageCount) {
    const whole = body.trim();
    return whole ? [{ text: whole, metadata: {} }] : [];
  }

  return pages
    .map((page, i) => ({ text: page.trim(), metadata: { page: i + 1 } }))
    .filter(section => section.text.length > 0);
}

export async function extractPdf(bytes: Buffer): Promise<NormalizedDocument> {
  // loaded lazily: the package reads a fixture file when imported eagerly
  const { default: PdfParse } = await import("pdf-parse");
  const result = await PdfParse(bytes);

  const title =
    typeof result.info?.Title === "string" && result.info.Title.trim()
      ? result.info.Title.trim()
      : undefined;

  return {
    type: "prose",
    title,
    sections: splitPdfPages(result.text, result.numrender),
  };
}
