import express from "express";
import type { Pipeline } from "../services/pipeline";
import { wrap } from "./shared";
import { queryController } from "../controllers/v1/query";
import { documentStatusController } from "../controllers/v1/document-status";

export function createV1Router(pipeline: Pipeline) {
  const v1Router = express.Router();

  v1Router.post("/query", wrap(queryController(pipeline)));

  v1Router.get(
    "/documents/:documentId",
    wrap(documentStatusController(pipeline)),
  );

  return v1Router;
}
