import type { Redis } from "ioredis";
import Redlock, { ExecutionError } from "redlock";
import type { Logger } from "winston";
import { logger as _logger } from "../logger";
import { DocumentLockedError } from "../error";

/**
 * Mutual exclusion per document id. Ingestion and purge of one document
 * run one at a time so a run never deletes or overwrites another run's
 * records halfway through.
 */
export interface DocumentLock {
  run<T>(documentId: string, routine: () => Promise<T>): Promise<T>;
}

/** Waiters queue in arrival order. Only safe within one process. */
export class InMemoryDocumentLock implements DocumentLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(documentId: string, routine: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(documentId) ?? Promise.resolve();

    let release: () => void = () => {};
    const done = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => done);
    this.tails.set(documentId, tail);

    await previous;
    try {
      return await routine();
    } finally {
      release();
      if (this.tails.get(documentId) === tail) {
        this.tails.delete(documentId);
      }
    }
  }
}

export interface RedisDocumentLockOptions {
  /** Lock lifetime; extended automatically while the routine runs. */
  ttlMs: number;
  /** How long to keep trying before giving up. */
  waitMs: number;
  keyPrefix?: string;
}

const RETRY_DELAY_MS = 250;

export class RedisDocumentLock implements DocumentLock {
  private readonly redlock: Redlock;
  private readonly log: Logger;
  private readonly keyPrefix: string;

  constructor(
    redis: Redis,
    private readonly options: RedisDocumentLockOptions,
    logger?: Logger,
  ) {
    this.redlock = new Redlock([redis], {
      retryCount: Math.ceil(options.waitMs / RETRY_DELAY_MS),
      retryDelay: RETRY_DELAY_MS,
      retryJitter: 100,
      automaticExtensionThreshold: Math.min(1000, options.ttlMs / 2),
    });
    this.keyPrefix = options.keyPrefix ?? "rag:lock:document:";
    this.log = (logger ?? _logger).child({ module: "document-lock" });
  }

  async run<T>(documentId: string, routine: () => Promise<T>): Promise<T> {
    const resource = this.keyPrefix + documentId;

    try {
      return await this.redlock.using([resource], this.options.ttlMs, async () => {
        this.log.debug("Lock acquired", { method: "run", documentId });
        return await routine();
      });
    } catch (error) {
      if (error instanceof ExecutionError) {
        this.log.warn("Could not lock document", {
          method: "run",
          documentId,
          error: error.message,
        });
        throw new DocumentLockedError(
          `Document ${documentId} is being processed elsewhere, try again later`,
          { cause: error },
        );
      }
      throw error;
    }
  }
}
