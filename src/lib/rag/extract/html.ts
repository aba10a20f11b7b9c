import { load } from "cheerio";
import { decodeText } from "./text";
import type { NormalizedDocument } from "../types";

const STRIPPED = "script, style, noscript, nav, footer, header, svg, iframe";
const MAIN = "article, main, .content, #content, .main, #main";
const BLOCKS = "h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, td, th, dt, dd";

export function extractHtmlText(html: string): { title?: string; text: string } {
  const $ = load(html);
  const title = $("title").first().text().trim() || undefined;

  $(STRIPPED).remove();

  const main = $(MAIN);
  const root = main.length > 0 ? main : $("body");

  const blocks: string[] = [];
  root.find(BLOCKS).each((_, el) => {
    // nested blocks (p inside li) are reported by their innermost element
    if ($(el).find(BLOCKS).length > 0) return;
    const text = $(el).text().replace(/\s+/g, " ").trim();
    if (text.length > 0) blocks.push(text);
  });

  const text =
    blocks.length > 0
      ? blocks.join("\n\n")
      : root.text().replace(/\s+/g, " ").trim();

  return { title, text };
}

export async function extractHtml(bytes: Buffer): Promise<NormalizedDocument> {
  const { title, text } = extractHtmlText(decodeText(bytes));
  return { type: "prose", title, sections: [{ text, metadata: {} }] };
}
