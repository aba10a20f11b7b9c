import express from "express";
import type { Pipeline } from "../services/pipeline";
import { wrap } from "./shared";
import { slackEventsController } from "../controllers/v1/slack-events";
import { slackSignatureMiddleware } from "../services/chat/signature";

export function createSlackRouter(
  pipeline: Pipeline,
  options: {
    signingSecret?: string;
    allowUnsigned?: boolean;
    maxAgeSeconds: number;
    clock?: () => number;
  },
) {
  const slackRouter = express.Router();

  slackRouter.use("/slack/events", slackSignatureMiddleware(options));

  slackRouter.post("/slack/events", wrap(slackEventsController(pipeline)));

  return slackRouter;
}
