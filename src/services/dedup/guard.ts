import type { Logger } from "winston";
import { logger as _logger } from "../../lib/logger";
import type { ClaimStore, DedupEntry, DedupOutcome } from "./claim-store";

export type ClaimResult =
  | { status: "claimed"; entry: DedupEntry }
  | { status: "already_claimed"; entry: DedupEntry };

export interface DedupGuardOptions {
  retentionMs: number;
  /** Identifies this instance in claimed entries. */
  holder: string;
  clock?: () => number;
}

/**
 * At-most-once gate per event id:
 * unseen -> in_progress -> completed | failed.
 * Only the caller that moves an event out of `unseen` may act on it.
 */
export class DedupGuard {
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(
    private readonly store: ClaimStore,
    private readonly options: DedupGuardOptions,
    logger?: Logger,
  ) {
    this.log = (logger ?? _logger).child({ module: "dedup-guard" });
    this.clock = options.clock ?? Date.now;
  }

  async claim(eventId: string): Promise<ClaimResult> {
    const entry: DedupEntry = {
      eventId,
      firstSeenAt: this.clock(),
      outcome: "in_progress",
      holder: this.options.holder,
    };

    const existing = await this.store.setIfAbsent(
      entry,
      this.options.retentionMs,
    );

    if (existing) {
      this.log.info("Duplicate event dropped", {
        method: "claim",
        eventId,
        outcome: existing.outcome,
        holder: existing.holder,
      });
      return { status: "already_claimed", entry: existing };
    }

    this.log.debug("Event claimed", { method: "claim", eventId });
    return { status: "claimed", entry };
  }

  /** Record the terminal outcome. Unknown or already terminal entries are left alone. */
  async release(
    eventId: string,
    outcome: Exclude<DedupOutcome, "in_progress">,
  ): Promise<void> {
    const result = await this.store.finish(eventId, outcome, this.clock());

    if (result !== "updated") {
      this.log.warn("Release ignored", {
        method: "release",
        eventId,
        outcome,
        reason: result === "missing" ? "unknown event" : "already released",
      });
      return;
    }

    this.log.debug("Event released", { method: "release", eventId, outcome });
  }

  /** Forget an event so its next delivery is processed again. */
  async reset(eventId: string): Promise<boolean> {
    const removed = await this.store.delete(eventId);
    this.log.info("Event claim reset", { method: "reset", eventId, removed });
    return removed;
  }

  async inspect(eventId: string): Promise<DedupEntry | null> {
    return await this.store.get(eventId);
  }
}
