import { Request, Response } from "express";
import { logger as _logger } from "../../lib/logger";
import type { Pipeline } from "../../services/pipeline";
import { EventClaimResponse } from "../v1/types";

export function eventClaimStatusController(pipeline: Pipeline) {
  return async (
    req: Request<{ eventId: string }, EventClaimResponse>,
    res: Response<EventClaimResponse>,
  ) => {
    const entry = await pipeline.guard.inspect(req.params.eventId);

    if (!entry) {
      return res.status(404).json({
        success: false,
        error: "No claim recorded for this event",
      });
    }

    return res.status(200).json({ success: true, data: entry });
  };
}

/** Operator retry: forget the claim so the next delivery is processed. */
export function eventClaimResetController(pipeline: Pipeline) {
  return async (
    req: Request<{ eventId: string }, EventClaimResponse>,
    res: Response<EventClaimResponse>,
  ) => {
    const logger = _logger.child({
      module: "admin/event-claim",
      method: "eventClaimResetController",
      eventId: req.params.eventId,
    });

    const removed = await pipeline.guard.reset(req.params.eventId);
    logger.info("Operator reset event claim", { removed });

    return res.status(200).json({ success: true, removed });
  };
}
