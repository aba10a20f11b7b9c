import {
  parseSlackEvent,
  slackEnvelopeSchema,
  stripMentions,
} from "../slack-events";
import {
  computeSlackSignature,
  isValidSlackSignature,
} from "../signature";

function callback(event: Record<string, unknown>) {
  const envelope = slackEnvelopeSchema.parse({
    type: "event_callback",
    event_id: "Ev001",
    event,
  });
  if (envelope.type !== "event_callback") {
    throw new Error("expected an event callback");
  }
  return envelope;
}

describe("parseSlackEvent", () => {
  it("should turn a mention into a question event", () => {
    const parsed = parseSlackEvent(
      callback({
        type: "app_mention",
        user: "U123",
        text: "<@UBOT> What is the leave policy?",
        ts: "1700000000.000100",
        channel: "C123",
      }),
      1_700_000_000_500,
    );

    expect(parsed).toEqual({
      type: "event",
      event: {
        eventId: "Ev001",
        kind: "question",
        channelId: "C123",
        threadId: "1700000000.000100",
        authorId: "U123",
        text: "<@UBOT> What is the leave policy?",
        attachments: [],
        urls: [],
        raw: {
          type: "app_mention",
          user: "U123",
          text: "<@UBOT> What is the leave policy?",
          ts: "1700000000.000100",
          channel: "C123",
        },
        receivedAt: 1_700_000_000_500,
      },
    });
    if (parsed.type === "event") {
      expect(Object.isFrozen(parsed.event)).toBe(true);
      expect(Object.isFrozen(parsed.event.raw)).toBe(true);
    }
  });

  it("should collect files and links as an upload in the original thread", () => {
    const parsed = parseSlackEvent(
      callback({
        type: "app_mention",
        user: "U123",
        text: "<@UBOT> import rag <https://example.com/doc|example.com/doc>",
        ts: "1700000000.000200",
        thread_ts: "1700000000.000100",
        channel: "C123",
        files: [
          {
            id: "F001",
            name: "handbook.pdf",
            mimetype: "application/pdf",
            filetype: "pdf",
            url_private_download: "https://files.example.com/F001",
          },
        ],
      }),
      0,
    );

    expect(parsed.type).toBe("event");
    if (parsed.type !== "event") return;

    expect(parsed.event.kind).toBe("upload");
    expect(parsed.event.threadId).toBe("1700000000.000100");
    expect(parsed.event.urls).toEqual(["https://example.com/doc"]);
    expect(parsed.event.attachments).toEqual([
      {
        fileId: "F001",
        name: "handbook.pdf",
        mimeType: "application/pdf",
        fileType: "pdf",
        url: "https://files.example.com/F001",
      },
    ]);
  });

  it("should carry complete snippets inline and decode Slack's escaping in links", () => {
    const parsed = parseSlackEvent(
      callback({
        type: "app_mention",
        user: "U123",
        text: "<@UBOT> import rag <https://example.com/doc?a=1&amp;b=2>",
        ts: "1700000000.000300",
        channel: "C123",
        files: [
          {
            id: "F002",
            name: "notes.txt",
            filetype: "text",
            mode: "snippet",
            preview: "Parking is free after six.",
            preview_is_truncated: false,
          },
          {
            id: "F003",
            name: "long.txt",
            filetype: "text",
            mode: "snippet",
            preview: "Only the start",
            preview_is_truncated: true,
            url_private_download: "https://files.example.com/F003",
          },
        ],
      }),
      0,
    );

    expect(parsed.type).toBe("event");
    if (parsed.type !== "event") return;

    expect(parsed.event.urls).toEqual(["https://example.com/doc?a=1&b=2"]);
    expect(parsed.event.attachments.map(a => a.inlineBytes)).toEqual([
      Buffer.from("Parking is free after six.").toString("base64"),
      undefined,
    ]);
  });

  it("should ignore messages from bots", () => {
    expect(
      parseSlackEvent(
        callback({
          type: "app_mention",
          bot_id: "B001",
          text: "<@UBOT> hi",
          ts: "1",
          channel: "C123",
        }),
        0,
      ),
    ).toEqual({ type: "ignored", reason: "message from a bot" });
  });

  it("should ignore other event types", () => {
    expect(
      parseSlackEvent(callback({ type: "reaction_added", user: "U123" }), 0),
    ).toEqual({ type: "ignored", reason: "unsupported event reaction_added" });
  });
});

describe("stripMentions", () => {
  it("should remove user mentions and collapse whitespace", () => {
    expect(stripMentions("<@UBOT>   hello <@U42|someone> there ")).toBe(
      "hello there",
    );
  });
});

describe("Slack request signatures", () => {
  const secret = "test-secret";
  const body = '{"type":"url_verification","challenge":"abc"}';
  const timestamp = "1700000000";
  const signature = computeSlackSignature(secret, timestamp, body);

  it("should produce a v0 hex signature", () => {
    expect(signature).toMatch(/^v0=[0-9a-f]{64}$/);
  });

  it("should accept a fresh, untampered request", () => {
    expect(
      isValidSlackSignature(secret, timestamp, signature, body, 300, 1_700_000_100),
    ).toBe(true);
  });

  it("should reject a tampered body", () => {
    expect(
      isValidSlackSignature(
        secret,
        timestamp,
        signature,
        body.replace("abc", "xyz"),
        300,
        1_700_000_100,
      ),
    ).toBe(false);
  });

  it("should reject a stale timestamp", () => {
    expect(
      isValidSlackSignature(secret, timestamp, signature, body, 300, 1_700_000_301),
    ).toBe(false);
  });

  it("should reject missing headers", () => {
    expect(
      isValidSlackSignature(secret, undefined, signature, body, 300, 1_700_000_000),
    ).toBe(false);
  });
});
