import * as Sentry from "@sentry/node";
import type { Span } from "@sentry/node";

const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

type Attributes = Record<string, string | number | boolean | undefined | null>;

/**
 * Runs `fn` inside a Sentry span named `name`, marking it failed when `fn`
 * throws. `op` is Sentry's operation, e.g. "queue.process" for workers.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  op?: string,
): Promise<T> {
  return Sentry.startSpan({ name, op }, async span => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SPAN_STATUS_OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SPAN_STATUS_ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  });
}

export function setSpanAttributes(span: Span, attributes: Attributes): void {
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined && value !== null) {
      span.setAttribute(key, value);
    }
  }
}
