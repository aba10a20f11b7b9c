import { Request, Response } from "express";
import { z } from "zod";
import { logger as _logger } from "../../lib/logger";
import type { Pipeline } from "../../services/pipeline";
import {
  parseSlackEvent,
  slackEnvelopeSchema,
} from "../../services/chat/slack-events";
import { SlackEventsResponse } from "./types";

const anyEnvelopeSchema = z.looseObject({ type: z.string() });

export function slackEventsController(pipeline: Pipeline) {
  return async (
    req: Request<{}, SlackEventsResponse, unknown>,
    res: Response<SlackEventsResponse>,
  ) => {
    const logger = _logger.child({
      module: "v1/slack-events",
      method: "slackEventsController",
    });

    const parsed = slackEnvelopeSchema.safeParse(req.body);
    if (!parsed.success) {
      // Other callback types (rate limit notices and the like) need no action.
      const other = anyEnvelopeSchema.parse(req.body);
      logger.debug("Ignoring Slack callback", { type: other.type });
      return res.status(200).json({ ok: true, result: "ignored" });
    }

    const envelope = parsed.data;
    if (envelope.type === "url_verification") {
      return res.status(200).json({ challenge: envelope.challenge });
    }

    const event = parseSlackEvent(envelope, Date.now());
    if (event.type === "ignored") {
      logger.debug("Ignoring Slack event", {
        eventId: envelope.event_id,
        reason: event.reason,
      });
      return res.status(200).json({ ok: true, result: "ignored" });
    }

    const result = await pipeline.router.handle(event.event);

    logger.info("Slack event handled", {
      eventId: envelope.event_id,
      retryNum: req.header("x-slack-retry-num"),
      result,
    });

    return res.status(200).json({ ok: true, result });
  };
}
