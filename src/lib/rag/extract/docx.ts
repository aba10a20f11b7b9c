import mammoth from "mammoth";
import type { NormalizedDocument } from "../types";

export async function extractDocx(bytes: Buffer): Promise<NormalizedDocument> {
  const { value } = await mammoth.extractRawText({ buffer: bytes });
  return { type: "prose", sections: [{ text: value, metadata: {} }] };
}
