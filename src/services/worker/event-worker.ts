import "dotenv/config";
import "../sentry";
import { setSentryServiceTag } from "../sentry";
import * as Sentry from "@sentry/node";
import { Job, Worker } from "bullmq";
import { logger as _logger } from "../../lib/logger";
import { config } from "../../config";
import { createPipelineConfig } from "../../pipeline-config";
import { createPipeline } from "../pipeline";
import type { EventRouter } from "../events/router";
import {
  chatEventQueueName,
  closeQueueConnections,
  getRedisConnection,
  type ChatEventTask,
} from "../queue-service";

export function processChatEventJob(router: EventRouter) {
  return async (job: Job<ChatEventTask>): Promise<void> => {
    const logger = _logger.child({
      module: "event-worker",
      method: "processChatEventJob",
      jobId: job.id,
      eventId: job.data.event.eventId,
    });

    logger.debug("Processing chat event");
    const start = Date.now();

    // process() replies and releases the claim itself; anything escaping it
    // is a bug worth reporting.
    try {
      await router.process(job.data);
    } catch (error) {
      logger.error("Chat event job crashed", { error });
      Sentry.captureException(error);
      throw error;
    }

    logger.info("Chat event processed", { durationMs: Date.now() - start });
  };
}

export function startEventWorker(router: EventRouter, concurrency: number) {
  const logger = _logger.child({ module: "event-worker" });

  const worker = new Worker<ChatEventTask>(
    chatEventQueueName,
    processChatEventJob(router),
    {
      connection: getRedisConnection(),
      concurrency,
      lockDuration: 60 * 1000, // 60 seconds
      stalledInterval: 60 * 1000, // 60 seconds
      // A stalled job may already have replied; do not run it twice.
      maxStalledCount: 0,
    },
  );

  worker.on("failed", (job, error) => {
    logger.warn("Chat event job failed", { jobId: job?.id, error });
  });

  worker.on("error", error => {
    logger.error("Worker error", { error });
  });

  return worker;
}

if (require.main === module) {
  setSentryServiceTag("worker");

  const pipeline = createPipeline(createPipelineConfig(config));
  const worker = startEventWorker(
    pipeline.router,
    pipeline.config.queue.concurrency,
  );

  _logger.info("Event worker started", {
    module: "event-worker",
    concurrency: pipeline.config.queue.concurrency,
  });

  const shutdown = () => {
    _logger.info("Received shutdown signal, closing worker...");
    worker
      .close()
      .then(() => closeQueueConnections())
      .catch(error => _logger.error("Error during shutdown", { error }))
      .finally(() => process.exit(0));
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}
