import express from "express";
import type { Pipeline } from "../services/pipeline";
import { adminKeyMiddleware, wrap } from "./shared";
import {
  eventClaimResetController,
  eventClaimStatusController,
} from "../controllers/admin/event-claim";
import { purgeDocumentController } from "../controllers/admin/purge-document";
import { indexStatsController } from "../controllers/admin/index-stats";

export function createAdminRouter(
  pipeline: Pipeline,
  adminKey: string | undefined,
) {
  const adminRouter = express.Router();

  adminRouter.use("/admin/:key", adminKeyMiddleware(adminKey));

  adminRouter.get(
    "/admin/:key/events/:eventId",
    wrap(eventClaimStatusController(pipeline)),
  );

  adminRouter.delete(
    "/admin/:key/events/:eventId",
    wrap(eventClaimResetController(pipeline)),
  );

  adminRouter.delete(
    "/admin/:key/documents/:documentId",
    wrap(purgeDocumentController(pipeline)),
  );

  adminRouter.get(
    "/admin/:key/index/stats",
    wrap(indexStatsController(pipeline)),
  );

  return adminRouter;
}
