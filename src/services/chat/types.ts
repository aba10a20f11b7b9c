import type { LoadedContent } from "../../lib/rag/ingestion";

export interface ChatAttachment {
  fileId: string;
  name: string;
  mimeType?: string;
  /** Platform-declared type, e.g. "pdf". */
  fileType?: string;
  /** Authenticated download location. */
  url?: string;
  /**
   * Base64 content delivered with the event itself (Slack snippets), read
   * instead of downloading. Base64 so queued events stay plain JSON.
   */
  inlineBytes?: string;
}

export type ChatEventKind = "question" | "upload";

/** One inbound message addressed to the bot. Frozen once parsed. */
export interface ChatEvent {
  readonly eventId: string;
  readonly kind: ChatEventKind;
  readonly channelId: string;
  /** Thread the reply goes to; the message itself when it starts one. */
  readonly threadId: string;
  readonly authorId: string;
  readonly text: string;
  readonly attachments: readonly ChatAttachment[];
  readonly urls: readonly string[];
  /** The platform's event payload as received. */
  readonly raw: Readonly<Record<string, unknown>>;
  readonly receivedAt: number;
}

export interface DownloadOptions {
  timeoutMs: number;
  maxBytes: number;
  maxRedirects?: number;
  allowLocal?: boolean;
}

export interface ChatClient {
  postReply(channelId: string, threadId: string, text: string): Promise<void>;
  downloadFile(
    attachment: ChatAttachment,
    options: DownloadOptions,
  ): Promise<LoadedContent>;
}
