import "dotenv/config";
import "./services/sentry";
import { setSentryServiceTag } from "./services/sentry";
import { config } from "./config";
import { createPipelineConfig } from "./pipeline-config";
import { logger } from "./lib/logger";
import { createPipeline } from "./services/pipeline";
import {
  closeQueueConnections,
  InlineTaskScheduler,
} from "./services/queue-service";
import { createApp } from "./app";

setSentryServiceTag("api");

const pipeline = createPipeline(createPipelineConfig(config));

export const app = createApp(pipeline, {
  slackSigningSecret: config.SLACK_SIGNING_SECRET,
  slackAllowUnsigned: config.SLACK_ALLOW_UNSIGNED,
  slackSignatureMaxAgeSeconds: config.SLACK_SIGNATURE_MAX_AGE_SECONDS,
  adminAuthKey: config.ADMIN_AUTH_KEY,
  trustProxy: config.EXPRESS_TRUST_PROXY,
});

const DEFAULT_PORT = config.PORT;
const HOST = config.HOST;

async function startServer(port = DEFAULT_PORT) {
  if (
    !config.SLACK_SIGNING_SECRET &&
    (config.IS_PRODUCTION || !config.SLACK_ALLOW_UNSIGNED)
  ) {
    throw new Error(
      "SLACK_SIGNING_SECRET must be set (SLACK_ALLOW_UNSIGNED=true skips verification outside production)",
    );
  }

  const server = app.listen(Number(port), HOST, () => {
    logger.info(`Worker ${process.pid} listening on port ${port}`, {
      queueMode: pipeline.config.queue.mode,
      stateStore: pipeline.config.stateStore,
      vectorIndex: pipeline.config.index.provider,
    });
  });

  const exitHandler = async () => {
    logger.info("SIGTERM signal received: closing HTTP server");
    if (config.IS_KUBERNETES) {
      // Account for load balancer drain timeout
      logger.info("Waiting 60s for load balancer drain timeout");
      await new Promise(resolve => setTimeout(resolve, 60000));
    }
    server.close(() => {
      logger.info("Server closed.");
      const drained =
        pipeline.scheduler instanceof InlineTaskScheduler
          ? pipeline.scheduler.drain()
          : Promise.resolve();
      drained
        .then(() => closeQueueConnections())
        .catch(error => logger.error("Error during shutdown", { error }))
        .finally(() => {
          logger.info("Shutdown complete");
          process.exit(0);
        });
    });
  };

  process.on("SIGTERM", exitHandler);
  process.on("SIGINT", exitHandler);
  return server;
}

if (require.main === module) {
  startServer().catch(error => {
    logger.error("Failed to start server", { error });
    process.exit(1);
  });
}
