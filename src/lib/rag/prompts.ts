import type { RetrievedPassage } from "./types";

export const ANSWER_SYSTEM_PROMPT = `You are an assistant that answers questions about an internal document collection.
Answer using only the numbered sources provided with the question.
After every statement, cite the source it came from by its label, for example [S1] or [S2].
If the sources do not contain the answer, say so plainly instead of guessing.
Answer in the language of the question.`;

export const NO_RELEVANT_INFORMATION =
  "I couldn't find anything relevant to that question in the indexed documents.";

export function buildAnswerPrompt(
  question: string,
  passages: RetrievedPassage[],
): string {
  const sources = passages
    .map(p => `[${p.label}] ${p.record.title}\n${p.record.text}`)
    .join("\n\n");

  return `Sources:\n\n${sources}\n\nQuestion: ${question}`;
}
