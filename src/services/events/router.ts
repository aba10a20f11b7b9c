import type { Logger } from "winston";
import * as Sentry from "@sentry/node";
import { logger as _logger } from "../../lib/logger";
import { GenerationUnavailableError } from "../../lib/error";
import { withSpan, setSpanAttributes } from "../../lib/otel-tracer";
import { fetchDocument } from "../../lib/rag/fetch-document";
import type {
  IngestionOrchestrator,
  LoadedContent,
} from "../../lib/rag/ingestion";
import type { Responder } from "../../lib/rag/responder";
import type { DedupGuard } from "../dedup/guard";
import type { ChatEventTask, TaskScheduler } from "../queue-service";
import { stripMentions } from "../chat/slack-events";
import type {
  ChatAttachment,
  ChatClient,
  ChatEvent,
  DownloadOptions,
} from "../chat/types";
import {
  formatAnswerReply,
  formatIngestionReply,
  messages,
} from "./messages";

export type Classification =
  | {
      type: "upload";
      attachments: readonly ChatAttachment[];
      urls: readonly string[];
    }
  | { type: "upload_without_url" }
  | { type: "question"; question: string }
  | { type: "empty_question" };

export type HandleResult = "accepted" | "duplicate" | "ignored";

export interface EventRouterOptions {
  /** Messages from this user are the bot's own and never handled. */
  botUserId?: string;
  /** Lower-case phrases that mark a message as an import request. */
  ingestKeywords: readonly string[];
  download: DownloadOptions;
  instanceName: string;
}

export type UrlLoader = (
  url: string,
  options: DownloadOptions,
) => Promise<LoadedContent>;

const defaultUrlLoader: UrlLoader = async (url, options) => {
  const fetched = await fetchDocument(url, options);
  return { bytes: fetched.bytes, mimeType: fetched.mimeType };
};

export class EventRouter {
  private readonly log: Logger;

  constructor(
    private readonly guard: DedupGuard,
    private readonly scheduler: TaskScheduler,
    private readonly ingestion: IngestionOrchestrator,
    private readonly responder: Responder,
    private readonly chat: ChatClient,
    private readonly options: EventRouterOptions,
    logger?: Logger,
    private readonly loadUrl: UrlLoader = defaultUrlLoader,
  ) {
    this.log = (logger ?? _logger).child({ module: "event-router" });
  }

  classify(event: ChatEvent): Classification {
    if (event.attachments.length > 0 || event.urls.length > 0) {
      return {
        type: "upload",
        attachments: event.attachments,
        urls: event.urls,
      };
    }

    const lowered = event.text.toLowerCase();
    if (this.options.ingestKeywords.some(k => lowered.includes(k))) {
      return { type: "upload_without_url" };
    }

    const question = stripMentions(event.text);
    if (question.length === 0) {
      return { type: "empty_question" };
    }

    return { type: "question", question };
  }

  /**
   * Request path: claim the event and hand it to a worker. Nothing here
   * touches the document pipeline, so the webhook can be acknowledged fast.
   */
  async handle(event: ChatEvent): Promise<HandleResult> {
    const log = this.log.child({ method: "handle", eventId: event.eventId });

    if (this.options.botUserId && event.authorId === this.options.botUserId) {
      log.debug("Ignoring the bot's own message");
      return "ignored";
    }

    const claim = await this.guard.claim(event.eventId);
    if (claim.status === "already_claimed") {
      return "duplicate";
    }

    try {
      await this.scheduler.schedule({
        event,
        claimedBy: this.options.instanceName,
      });
    } catch (error) {
      // No side effect happened yet: let the platform's redelivery through.
      log.error("Failed to schedule event, releasing claim", { error });
      await this.guard.reset(event.eventId);
      throw error;
    }

    log.info("Event accepted", { kind: event.kind });
    return "accepted";
  }

  /** Worker path: run the pipeline, reply in the thread, release the claim. */
  async process(task: ChatEventTask): Promise<void> {
    const { event } = task;
    const log = this.log.child({ method: "process", eventId: event.eventId });

    await withSpan(
      "rag-process-event",
      async span => {
        const classification = this.classify(event);
        setSpanAttributes(span, {
          "event.id": event.eventId,
          "event.classification": classification.type,
        });

        let succeeded = false;
        try {
          succeeded = await this.dispatch(event, classification, log);
        } catch (error) {
          log.error("Event processing failed", { error });
          Sentry.captureException(error, {
            tags: { eventId: event.eventId },
          });
          await this.reply(event, messages.unexpectedError, log);
        } finally {
          await this.guard.release(
            event.eventId,
            succeeded ? "completed" : "failed",
          );
        }
      },
      "queue.process",
    );
  }

  private async dispatch(
    event: ChatEvent,
    classification: Classification,
    log: Logger,
  ): Promise<boolean> {
    switch (classification.type) {
      case "empty_question":
        return await this.reply(event, messages.emptyQuestion, log);
      case "upload_without_url":
        return await this.reply(event, messages.uploadWithoutUrl, log);
      case "question":
        return await this.answer(event, classification.question, log);
      case "upload":
        return await this.ingestAll(
          event,
          classification.attachments,
          classification.urls,
          log,
        );
    }
  }

  private async answer(
    event: ChatEvent,
    question: string,
    log: Logger,
  ): Promise<boolean> {
    try {
      const answer = await this.responder.answer(question);
      return await this.reply(event, formatAnswerReply(answer), log);
    } catch (error) {
      if (error instanceof GenerationUnavailableError) {
        await this.reply(event, messages.generationFailed, log);
        return false;
      }
      throw error;
    }
  }

  private async ingestAll(
    event: ChatEvent,
    attachments: readonly ChatAttachment[],
    urls: readonly string[],
    log: Logger,
  ): Promise<boolean> {
    let allIndexed = true;

    for (const attachment of attachments) {
      const result = await this.ingestion.ingest({
        source: { kind: "file", fileId: attachment.fileId, name: attachment.name },
        fileType: attachment.fileType,
        eventId: event.eventId,
        load: () => this.loadAttachment(attachment),
      });
      const replied = await this.reply(
        event,
        formatIngestionReply(result.document),
        log,
      );
      allIndexed =
        allIndexed && replied && result.document.ingestionStatus === "indexed";
    }

    for (const url of urls) {
      const result = await this.ingestion.ingest({
        source: { kind: "url", url },
        eventId: event.eventId,
        load: () => this.loadUrl(url, this.options.download),
      });
      const replied = await this.reply(
        event,
        formatIngestionReply(result.document),
        log,
      );
      allIndexed =
        allIndexed && replied && result.document.ingestionStatus === "indexed";
    }

    return allIndexed;
  }

  /** Content that came with the event is used as is; the rest is downloaded. */
  private async loadAttachment(
    attachment: ChatAttachment,
  ): Promise<LoadedContent> {
    if (attachment.inlineBytes !== undefined) {
      return {
        bytes: Buffer.from(attachment.inlineBytes, "base64"),
        mimeType: attachment.mimeType,
      };
    }
    return await this.chat.downloadFile(attachment, this.options.download);
  }

  /** Resolves false when the reply could not be delivered. */
  private async reply(
    event: ChatEvent,
    text: string,
    log: Logger,
  ): Promise<boolean> {
    try {
      await this.chat.postReply(event.channelId, event.threadId, text);
      return true;
    } catch (error) {
      log.error("Failed to post reply", { error });
      return false;
    }
  }
}
