import { Request, Response } from "express";
import type { Pipeline } from "../../services/pipeline";
import { IndexStatsResponse } from "../v1/types";

export function indexStatsController(pipeline: Pipeline) {
  return async (_req: Request, res: Response<IndexStatsResponse>) => {
    const stats = await pipeline.index.stats();
    return res.status(200).json({ success: true, data: stats });
  };
}
