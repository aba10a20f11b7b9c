import { Request, Response } from "express";
import { logger as _logger } from "../../lib/logger";
import type { Pipeline } from "../../services/pipeline";
import {
  QueryRequest,
  QueryResponse,
  queryRequestSchema,
} from "./types";

export function queryController(pipeline: Pipeline) {
  return async (
    req: Request<{}, QueryResponse, QueryRequest>,
    res: Response<QueryResponse>,
  ) => {
    const { question } = queryRequestSchema.parse(req.body);

    const logger = _logger.child({
      module: "v1/query",
      method: "queryController",
    });

    const answer = await pipeline.responder.answer(question);

    logger.info("Answered query", {
      grounded: answer.grounded,
      citations: answer.citations.length,
    });

    return res.status(200).json({ success: true, data: answer });
  };
}
