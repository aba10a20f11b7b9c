import { generateText, type LanguageModel } from "ai";
import type { Logger } from "winston";
import { logger as _logger } from "../logger";
import { withSpan, setSpanAttributes } from "../otel-tracer";
import {
  GenerationUnavailableError,
  TransportableError,
} from "../error";
import { isRetryableModelError } from "../generic-ai";
import { executeWithRetry } from "../retry-utils";
import type { EmbeddingClient } from "./embeddings";
import {
  ANSWER_SYSTEM_PROMPT,
  NO_RELEVANT_INFORMATION,
  buildAnswerPrompt,
} from "./prompts";
import type {
  Answer,
  Citation,
  QueryContext,
  RetrievedPassage,
} from "./types";
import type { VectorIndexGateway } from "./vector-index";

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
}

export interface CompletionProvider {
  readonly modelVersion: string;
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string>;
}

export class AiSdkCompletionProvider implements CompletionProvider {
  constructor(
    private readonly model: LanguageModel,
    readonly modelVersion: string,
  ) {}

  async complete(
    request: CompletionRequest,
    signal: AbortSignal,
  ): Promise<string> {
    const result = await generateText({
      model: this.model,
      system: request.system,
      prompt: request.prompt,
      maxOutputTokens: request.maxTokens,
      temperature: 0.2,
      maxRetries: 0,
      abortSignal: signal,
    });
    return result.text;
  }
}

export interface ResponderOptions {
  topK: number;
  minScore: number;
  maxTokens: number;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs?: number;
}

const LABEL_PATTERN = /\[(S\d+(?:\s*,\s*S\d+)*)\]/g;

/** Labels in order of first mention, e.g. "see [S2] and [S1, S2]" -> S2, S1. */
export function parseCitedLabels(text: string): string[] {
  const labels: string[] = [];
  for (const match of text.matchAll(LABEL_PATTERN)) {
    for (const label of match[1].split(",")) {
      const trimmed = label.trim();
      if (!labels.includes(trimmed)) labels.push(trimmed);
    }
  }
  return labels;
}

/**
 * One citation per document, in order of first mention. When the answer
 * cites nothing recognisable, every retrieved document is cited.
 */
export function buildCitations(
  answerText: string,
  passages: RetrievedPassage[],
): Citation[] {
  const byLabel = new Map(passages.map(p => [p.label, p]));
  const cited = parseCitedLabels(answerText)
    .map(label => byLabel.get(label))
    .filter((p): p is RetrievedPassage => p !== undefined);

  const ordered = cited.length > 0 ? cited : passages;
  const seen = new Set<string>();
  const citations: Citation[] = [];

  for (const passage of ordered) {
    if (seen.has(passage.record.documentId)) continue;
    seen.add(passage.record.documentId);
    citations.push({
      label: passage.label,
      documentId: passage.record.documentId,
      title: passage.record.title,
      source: passage.record.source,
    });
  }

  return citations;
}

export class Responder {
  private readonly log: Logger;

  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly index: VectorIndexGateway,
    private readonly completion: CompletionProvider,
    private readonly options: ResponderOptions,
    logger?: Logger,
  ) {
    this.log = (logger ?? _logger).child({ module: "responder" });
  }

  /** Embed the question and keep the passages that clear the relevance floor. */
  async retrieve(question: string): Promise<RetrievedPassage[]> {
    const vector = await this.embeddings.embedOne(question);
    const matches = await this.index.query(vector, this.options.topK);

    return matches
      .filter(m => m.score >= this.options.minScore)
      .map((m, i) => ({ label: `S${i + 1}`, record: m.record, score: m.score }));
  }

  async answer(question: string): Promise<Answer> {
    const trimmed = question.trim();
    if (trimmed.length === 0) {
      throw new TransportableError("BAD_REQUEST", "Question must not be empty");
    }

    return await withSpan("rag-answer", async span => {
      const context: QueryContext = {
        question: trimmed,
        passages: await this.retrieve(trimmed),
      };

      setSpanAttributes(span, {
        "answer.passages": context.passages.length,
        "answer.top_score": context.passages[0]?.score,
      });

      if (context.passages.length === 0) {
        this.log.info("No passage cleared the relevance threshold", {
          method: "answer",
          minScore: this.options.minScore,
        });
        return { text: NO_RELEVANT_INFORMATION, citations: [], grounded: false };
      }

      const text = await this.generate(context);
      context.answer = {
        text,
        citations: buildCitations(text, context.passages),
        grounded: true,
      };

      this.log.info("Answered question", {
        method: "answer",
        passages: context.passages.length,
        citations: context.answer.citations.length,
      });

      return context.answer;
    });
  }

  private async generate(context: QueryContext): Promise<string> {
    try {
      return await executeWithRetry(
        signal =>
          this.completion.complete(
            {
              system: ANSWER_SYSTEM_PROMPT,
              prompt: buildAnswerPrompt(context.question, context.passages),
              maxTokens: this.options.maxTokens,
            },
            signal,
          ),
        {
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.baseDelayMs ?? 500,
          timeoutMs: this.options.timeoutMs,
          isRetryable: isRetryableModelError,
          logger: this.log,
          operation: "generate-answer",
        },
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error("Answer generation failed", {
        method: "generate",
        model: this.completion.modelVersion,
        error: message,
      });
      throw new GenerationUnavailableError(
        `Answer generation failed: ${message}`,
        { cause: error },
      );
    }
  }
}
