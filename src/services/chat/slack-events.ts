import { z } from "zod";
import { extractUrls } from "../../lib/rag/fetch-document";
import type { ChatAttachment, ChatEvent } from "./types";

const slackFileSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  title: z.string().optional(),
  mimetype: z.string().optional(),
  filetype: z.string().optional(),
  url_private_download: z.string().optional(),
  url_private: z.string().optional(),
  mode: z.string().optional(),
  preview: z.string().optional(),
  preview_is_truncated: z.boolean().optional(),
});

export const appMentionSchema = z.object({
  type: z.literal("app_mention"),
  user: z.string().optional(),
  bot_id: z.string().optional(),
  text: z.string().default(""),
  ts: z.string(),
  thread_ts: z.string().optional(),
  channel: z.string(),
  files: z.array(slackFileSchema).optional(),
});

export const slackEnvelopeSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("url_verification"),
    challenge: z.string(),
  }),
  z.object({
    type: z.literal("event_callback"),
    event_id: z.string(),
    event_time: z.number().optional(),
    event: z.looseObject({ type: z.string() }),
  }),
]);

export type SlackEnvelope = z.infer<typeof slackEnvelopeSchema>;

const MENTION_PATTERN = /<@[A-Z0-9]+(?:\|[^>]*)?>/g;

export function stripMentions(text: string): string {
  return text.replace(MENTION_PATTERN, " ").replace(/\s+/g, " ").trim();
}

/** Snippets carry their whole text in the event when it is short enough. */
function inlineContent(file: z.infer<typeof slackFileSchema>): string | undefined {
  if (file.mode !== "snippet" || file.preview === undefined) return undefined;
  if (file.preview_is_truncated !== false) return undefined;
  return Buffer.from(file.preview, "utf8").toString("base64");
}

function toAttachment(file: z.infer<typeof slackFileSchema>): ChatAttachment {
  return {
    fileId: file.id,
    name: file.name ?? file.title ?? file.id,
    mimeType: file.mimetype,
    fileType: file.filetype,
    url: file.url_private_download ?? file.url_private,
    inlineBytes: inlineContent(file),
  };
}

export type ParsedSlackEvent =
  | { type: "event"; event: ChatEvent }
  | { type: "ignored"; reason: string };

/**
 * Turn an event_callback into a ChatEvent. Anything other than a human
 * mentioning the bot is ignored.
 */
export function parseSlackEvent(
  envelope: Extract<SlackEnvelope, { type: "event_callback" }>,
  receivedAt: number,
): ParsedSlackEvent {
  const mention = appMentionSchema.safeParse(envelope.event);
  if (!mention.success) {
    return { type: "ignored", reason: `unsupported event ${envelope.event.type}` };
  }

  const m = mention.data;
  if (m.bot_id || !m.user) {
    return { type: "ignored", reason: "message from a bot" };
  }

  const attachments = (m.files ?? []).map(toAttachment);
  const urls = extractUrls(m.text);

  const event: ChatEvent = {
    eventId: envelope.event_id,
    kind: attachments.length > 0 || urls.length > 0 ? "upload" : "question",
    channelId: m.channel,
    threadId: m.thread_ts ?? m.ts,
    authorId: m.user,
    text: m.text,
    attachments: Object.freeze(attachments.map(a => Object.freeze(a))),
    urls: Object.freeze(urls),
    raw: Object.freeze({ ...envelope.event }),
    receivedAt,
  };

  return { type: "event", event: Object.freeze(event) };
}
