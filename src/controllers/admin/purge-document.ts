import { Request, Response } from "express";
import type { Pipeline } from "../../services/pipeline";
import { PurgeDocumentResponse } from "../v1/types";

export function purgeDocumentController(pipeline: Pipeline) {
  return async (
    req: Request<{ documentId: string }, PurgeDocumentResponse>,
    res: Response<PurgeDocumentResponse>,
  ) => {
    const deleted = await pipeline.ingestion.purge(req.params.documentId);
    return res.status(200).json({ success: true, deleted });
  };
}
