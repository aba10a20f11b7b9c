import type { Logger } from "winston";
import { logger as _logger } from "./logger";

export interface RetryOptions {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on every further attempt. */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay. */
  maxDelayMs?: number;
  /** Per-attempt timeout. The attempt's signal is aborted when it elapses. */
  timeoutMs?: number;
  /** Decides whether a thrown error is worth another attempt. */
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  logger?: Logger;
  /** Label used in log lines. */
  operation?: string;
}

export class AttemptTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

/**
 * Abortable sleep function that resolves immediately if the signal is aborted
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const abortHandler = () => {
      clearTimeout(timeoutId);
      resolve();
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", abortHandler);
      resolve();
    }, ms);

    signal?.addEventListener("abort", abortHandler, { once: true });
  });
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs = 30000,
): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

async function runAttempt<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  parent: AbortSignal | undefined,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeout =
    timeoutMs === undefined
      ? null
      : new Promise<never>((_, reject) => {
          timeoutHandle = setTimeout(() => {
            const error = new AttemptTimeoutError(timeoutMs);
            controller.abort(error);
            reject(error);
          }, timeoutMs);
        });

  try {
    const pending = operation(controller.signal);
    return await (timeout ? Promise.race([pending, timeout]) : pending);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Executes an operation with a per-attempt timeout and exponential backoff.
 * Non-retryable errors and the last failure are rethrown unchanged.
 */
export async function executeWithRetry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const log = options.logger ?? _logger.child({ module: "retry-utils" });
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    options.signal?.throwIfAborted();

    try {
      return await runAttempt(operation, options.timeoutMs, options.signal);
    } catch (error) {
      const retryable = options.isRetryable(error);
      const isLast = attempt >= maxAttempts - 1;

      if (!retryable || isLast || options.signal?.aborted) {
        throw error;
      }

      const delay = backoffDelay(
        attempt,
        options.baseDelayMs,
        options.maxDelayMs,
      );

      log.warn(`Attempt ${attempt + 1} failed, retrying`, {
        operation: options.operation,
        attempt: attempt + 1,
        maxAttempts,
        delay,
        error: error instanceof Error ? error.message : String(error),
      });

      await abortableSleep(delay, options.signal);
    }
  }
}
