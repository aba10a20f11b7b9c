import * as Sentry from "@sentry/node";
import { logger } from "../lib/logger";
import { config } from "../config";
import { TransportableError } from "../lib/error";

// Expected outcomes of user content; reported to the user, not to Sentry.
const ignoredErrorCodes = new Set([
  "UNSUPPORTED_DOCUMENT_TYPE",
  "EMPTY_DOCUMENT",
  "DOCUMENT_FETCH_FAILED",
]);

if (config.SENTRY_DSN) {
  logger.info("Setting up Sentry...");

  Sentry.init({
    dsn: config.SENTRY_DSN,
    tracesSampler: samplingContext => {
      // trace all AI spans, sample the rest
      return samplingContext.name?.startsWith("ai.")
        ? 1.0
        : config.SENTRY_TRACE_SAMPLE_RATE;
    },
    sampleRate: config.SENTRY_ERROR_SAMPLE_RATE,
    serverName: config.INSTANCE_NAME,
    environment: config.SENTRY_ENVIRONMENT,
    beforeSend(event, hint) {
      const error = hint?.originalException;

      if (
        error instanceof TransportableError &&
        ignoredErrorCodes.has(error.code)
      ) {
        return null;
      }

      return event;
    },
  });
}

/**
 * Set the service type tag for this Sentry instance
 * This helps distinguish between API server and worker errors in Sentry
 */
export function setSentryServiceTag(serviceType: string) {
  if (config.SENTRY_DSN) {
    Sentry.setTag("service_type", serviceType);
  }
}
