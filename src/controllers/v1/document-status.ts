import { Request, Response } from "express";
import type { Pipeline } from "../../services/pipeline";
import { DocumentStatusResponse } from "./types";

export function documentStatusController(pipeline: Pipeline) {
  return async (
    req: Request<{ documentId: string }, DocumentStatusResponse>,
    res: Response<DocumentStatusResponse>,
  ) => {
    const document = await pipeline.ingestion.status(req.params.documentId);

    if (!document) {
      return res.status(404).json({
        success: false,
        error: "Document not found",
      });
    }

    return res.status(200).json({ success: true, data: document });
  };
}
