import * as Sentry from "@sentry/node";
import express, { NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import { ZodError } from "zod";
import { v7 as uuidv7 } from "uuid";
import { logger } from "./lib/logger";
import { TransportableError } from "./lib/error";
import type { Pipeline } from "./services/pipeline";
import { captureRawBody } from "./services/chat/signature";
import { createSlackRouter } from "./routes/slack";
import { createV1Router } from "./routes/v1";
import { createAdminRouter } from "./routes/admin";
import { ErrorResponse, ResponseWithSentry } from "./controllers/v1/types";

export interface AppOptions {
  slackSigningSecret?: string;
  /** Accept Slack requests without a signing secret. Local development only. */
  slackAllowUnsigned?: boolean;
  slackSignatureMaxAgeSeconds: number;
  adminAuthKey?: string;
  trustProxy?: number;
  clock?: () => number;
}

export function createApp(pipeline: Pipeline, options: AppOptions) {
  const app = express();

  app.use(bodyParser.urlencoded({ extended: true, verify: captureRawBody }));
  app.use(bodyParser.json({ limit: "10mb", verify: captureRawBody }));

  app.disable("x-powered-by");

  if (options.trustProxy !== undefined) {
    app.set("trust proxy", options.trustProxy);
  }

  app.get("/health", (_, res) => {
    res.status(200).json({ ok: true, instance: pipeline.config.instanceName });
  });

  // register router
  app.use(
    createSlackRouter(pipeline, {
      signingSecret: options.slackSigningSecret,
      allowUnsigned: options.slackAllowUnsigned,
      maxAgeSeconds: options.slackSignatureMaxAgeSeconds,
      clock: options.clock,
    }),
  );
  app.use("/v1", createV1Router(pipeline));
  app.use(createAdminRouter(pipeline, options.adminAuthKey));

  app.use(
    (
      err: unknown,
      req: Request<{}, ErrorResponse, undefined>,
      res: Response<ErrorResponse>,
      next: NextFunction,
    ) => {
      if (err instanceof ZodError) {
        const issues = err.issues;

        const hasUnrecognizedKeys = issues.some(
          e => e.code === "unrecognized_keys",
        );

        const customErrorMessage = hasUnrecognizedKeys
          ? "Unrecognized key in body"
          : issues.length > 0 && issues[0].code === "custom"
            ? issues[0].message
            : "Bad Request";

        res.status(400).json({
          success: false,
          code: "BAD_REQUEST",
          error: customErrorMessage,
          details: issues,
        });
      } else if (err instanceof TransportableError && err.code === "BAD_REQUEST") {
        res.status(400).json({
          success: false,
          code: err.code,
          error: err.message,
        });
      } else if (err instanceof TransportableError && err.retryable) {
        logger.warn("Upstream service unavailable", {
          path: req.path,
          code: err.code,
          error: err.message,
        });
        res.status(503).json({
          success: false,
          code: err.code,
          error: "A required upstream service is unavailable, please retry later",
        });
      } else {
        next(err);
      }
    },
  );

  Sentry.setupExpressErrorHandler(app);

  app.use(
    (
      err: unknown,
      req: Request<{}, ErrorResponse, undefined>,
      res: ResponseWithSentry<ErrorResponse>,
      _next: NextFunction,
    ) => {
      if (
        err instanceof SyntaxError &&
        "status" in err &&
        err.status === 400 &&
        "body" in err
      ) {
        return res.status(400).json({
          success: false,
          code: "BAD_REQUEST_INVALID_JSON",
          error: "Bad request, malformed JSON",
        });
      }

      const id = res.sentry ?? uuidv7();

      logger.error(
        "Error occurred in request! (" + req.path + ") -- ID " + id + " -- ",
        {
          error: err,
          errorId: id,
          path: req.path,
        },
      );
      res.status(500).json({
        success: false,
        code: "UNKNOWN_ERROR",
        error: `An unexpected error occurred. Please contact support with this error ID: ${id}`,
      });
    },
  );

  return app;
}
