import { WebClient } from "@slack/web-api";
import type { Logger } from "winston";
import { logger as _logger } from "../../lib/logger";
import { fetchDocument } from "../../lib/rag/fetch-document";
import type { LoadedContent } from "../../lib/rag/ingestion";
import { DocumentFetchError } from "../../lib/error";
import type { ChatAttachment, ChatClient, DownloadOptions } from "./types";

/** The chat.postMessage slice of the Slack Web API. */
export interface SlackMessenger {
  chat: {
    postMessage(args: {
      channel: string;
      thread_ts: string;
      text: string;
      unfurl_links: boolean;
    }): Promise<unknown>;
  };
}

export class SlackChatClient implements ChatClient {
  private readonly log: Logger;

  constructor(
    private readonly web: SlackMessenger,
    private readonly botToken: string,
    logger?: Logger,
  ) {
    this.log = (logger ?? _logger).child({ module: "slack-client" });
  }

  async postReply(
    channelId: string,
    threadId: string,
    text: string,
  ): Promise<void> {
    await this.web.chat.postMessage({
      channel: channelId,
      thread_ts: threadId,
      text,
      unfurl_links: false,
    });

    this.log.debug("Posted reply", {
      method: "postReply",
      channelId,
      threadId,
      length: text.length,
    });
  }

  /** Private files need the bot token as a bearer credential. */
  async downloadFile(
    attachment: ChatAttachment,
    options: DownloadOptions,
  ): Promise<LoadedContent> {
    if (!attachment.url) {
      throw new DocumentFetchError(
        `File ${attachment.name} has no download location`,
      );
    }

    const fetched = await fetchDocument(
      attachment.url,
      {
        ...options,
        headers: { Authorization: `Bearer ${this.botToken}` },
      },
      this.log,
    );

    // An HTML body means Slack sent its login page instead of the file.
    if (
      fetched.mimeType?.startsWith("text/html") &&
      attachment.fileType !== "html"
    ) {
      throw new DocumentFetchError(
        `Downloading ${attachment.name} returned a login page; check the bot's files:read scope`,
      );
    }

    return {
      bytes: fetched.bytes,
      mimeType: attachment.mimeType ?? fetched.mimeType,
    };
  }
}

export function createSlackChatClient(
  botToken: string | undefined,
  logger?: Logger,
): SlackChatClient {
  if (!botToken) {
    throw new Error("SLACK_BOT_TOKEN not set");
  }
  return new SlackChatClient(new WebClient(botToken), botToken, logger);
}
