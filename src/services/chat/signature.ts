import crypto from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import type { NextFunction, Request, Response } from "express";
import { logger as _logger } from "../../lib/logger";
import type { ErrorResponse } from "../../controllers/v1/types";

export interface RequestWithRawBody extends Request {
  rawBody?: Buffer;
}

/** body-parser `verify` hook keeping the exact bytes that were signed. */
export function captureRawBody(
  req: IncomingMessage & { rawBody?: Buffer },
  _res: ServerResponse,
  buf: Buffer,
): void {
  req.rawBody = Buffer.from(buf);
}

export function computeSlackSignature(
  signingSecret: string,
  timestamp: string,
  body: string,
): string {
  const digest = crypto
    .createHmac("sha256", signingSecret)
    .update(`v0:${timestamp}:${body}`)
    .digest("hex");
  return `v0=${digest}`;
}

export function isValidSlackSignature(
  signingSecret: string,
  timestamp: string | undefined,
  signature: string | undefined,
  body: string,
  maxAgeSeconds: number,
  nowSeconds: number,
): boolean {
  if (!timestamp || !signature) return false;

  const ts = Number(timestamp);
  if (!Number.isInteger(ts) || Math.abs(nowSeconds - ts) > maxAgeSeconds) {
    return false;
  }

  const expected = Buffer.from(
    computeSlackSignature(signingSecret, timestamp, body),
  );
  const actual = Buffer.from(signature);

  return (
    expected.length === actual.length &&
    crypto.timingSafeEqual(expected, actual)
  );
}

/**
 * Without a signing secret every request is refused, unless `allowUnsigned`
 * is set for local development.
 */
export function slackSignatureMiddleware(options: {
  signingSecret?: string;
  allowUnsigned?: boolean;
  maxAgeSeconds: number;
  clock?: () => number;
}) {
  const logger = _logger.child({ module: "slack-signature" });
  const clock = options.clock ?? Date.now;

  if (!options.signingSecret) {
    if (options.allowUnsigned) {
      logger.warn("SLACK_SIGNING_SECRET is not set, Slack requests are not verified");
    } else {
      logger.error("SLACK_SIGNING_SECRET is not set, Slack requests will be rejected");
    }
  }

  return (
    req: RequestWithRawBody,
    res: Response<ErrorResponse>,
    next: NextFunction,
  ) => {
    if (!options.signingSecret) {
      if (options.allowUnsigned) {
        return next();
      }
      return res.status(401).json({
        success: false,
        code: "UNAUTHORIZED",
        error: "Request signing is not configured",
      });
    }

    const valid = isValidSlackSignature(
      options.signingSecret,
      req.header("x-slack-request-timestamp"),
      req.header("x-slack-signature"),
      req.rawBody?.toString("utf8") ?? "",
      options.maxAgeSeconds,
      Math.floor(clock() / 1000),
    );

    if (!valid) {
      logger.warn("Rejected request with invalid Slack signature", {
        path: req.path,
      });
      return res.status(401).json({
        success: false,
        code: "UNAUTHORIZED",
        error: "Invalid request signature",
      });
    }

    next();
  };
}
