import type { Redis } from "ioredis";
import { z } from "zod";
import { UnknownError } from "../../lib/error";

export type DedupOutcome = "in_progress" | "completed" | "failed";

export interface DedupEntry {
  eventId: string;
  firstSeenAt: number;
  outcome: DedupOutcome;
  releasedAt?: number;
  /** Instance that won the claim. */
  holder: string;
}

export type FinishResult = "updated" | "missing" | "terminal";

/**
 * Shared state behind the dedup guard. `setIfAbsent` is the only way an entry
 * comes into existence and must be atomic across every instance.
 */
export interface ClaimStore {
  /** Stores the entry if no live entry exists. Returns the existing one otherwise. */
  setIfAbsent(entry: DedupEntry, ttlMs: number): Promise<DedupEntry | null>;
  /** Moves an in_progress entry to a terminal outcome, keeping its expiry. */
  finish(
    eventId: string,
    outcome: Exclude<DedupOutcome, "in_progress">,
    releasedAt: number,
  ): Promise<FinishResult>;
  get(eventId: string): Promise<DedupEntry | null>;
  delete(eventId: string): Promise<boolean>;
}

export const dedupEntrySchema = z.object({
  eventId: z.string(),
  firstSeenAt: z.number(),
  outcome: z.enum(["in_progress", "completed", "failed"]),
  releasedAt: z.number().optional(),
  holder: z.string(),
});

/** Parses a stored entry; anything unreadable comes back as null. */
export function parseDedupEntry(raw: string): DedupEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = dedupEntrySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

const MAX_CLAIM_ATTEMPTS = 3;
const MAX_FINISH_ATTEMPTS = 3;

const luaScripts = {
  // Replaces the value only if it is still the one the caller read, keeping
  // the remaining expiry.
  compareAndSet: `
-- KEYS[1]=entry ; ARGV[1]=expected, ARGV[2]=replacement
local current = redis.call('GET', KEYS[1])
if not current then
  return 0
end
if current ~= ARGV[1] then
  return -1
end

local ttl = redis.call('PTTL', KEYS[1])
if ttl > 0 then
  redis.call('SET', KEYS[1], ARGV[2], 'PX', ttl)
else
  redis.call('SET', KEYS[1], ARGV[2])
end

return 1`,
} as const;

export class RedisClaimStore implements ClaimStore {
  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix: string,
  ) {}

  private key(eventId: string): string {
    return `${this.keyPrefix}${eventId}`;
  }

  async setIfAbsent(
    entry: DedupEntry,
    ttlMs: number,
  ): Promise<DedupEntry | null> {
    const key = this.key(entry.eventId);

    // An entry can expire between a failed SET NX and the GET that follows;
    // in that case try to claim again.
    for (let attempt = 0; attempt < MAX_CLAIM_ATTEMPTS; attempt++) {
      const set = await this.redis.set(
        key,
        JSON.stringify(entry),
        "PX",
        ttlMs,
        "NX",
      );
      if (set === "OK") return null;

      const raw = await this.redis.get(key);
      if (raw === null) continue;

      // Someone holds the key with a value this version cannot read. It is
      // still a claim.
      return (
        parseDedupEntry(raw) ?? {
          eventId: entry.eventId,
          firstSeenAt: entry.firstSeenAt,
          outcome: "in_progress",
          holder: "unknown",
        }
      );
    }

    throw new UnknownError(
      new Error(
        `Claim for event ${entry.eventId} expired ${MAX_CLAIM_ATTEMPTS} times while being read`,
      ),
    );
  }

  async finish(
    eventId: string,
    outcome: Exclude<DedupOutcome, "in_progress">,
    releasedAt: number,
  ): Promise<FinishResult> {
    const key = this.key(eventId);

    for (let attempt = 0; attempt < MAX_FINISH_ATTEMPTS; attempt++) {
      const raw = await this.redis.get(key);
      if (raw === null) return "missing";

      const entry = parseDedupEntry(raw);
      if (!entry || entry.outcome !== "in_progress") return "terminal";

      const result = Number(
        await this.redis.eval(
          luaScripts.compareAndSet,
          1,
          key,
          raw,
          JSON.stringify({ ...entry, outcome, releasedAt }),
        ),
      );

      if (result === 1) return "updated";
      if (result === 0) return "missing";
      // changed under us, read again
    }

    return "terminal";
  }

  async get(eventId: string): Promise<DedupEntry | null> {
    const raw = await this.redis.get(this.key(eventId));
    return raw === null ? null : parseDedupEntry(raw);
  }

  async delete(eventId: string): Promise<boolean> {
    return (await this.redis.del(this.key(eventId))) > 0;
  }
}

/** Single-process store for tests and local development. */
export class InMemoryClaimStore implements ClaimStore {
  private readonly entries = new Map<
    string,
    { entry: DedupEntry; expiresAt: number }
  >();

  constructor(private readonly clock: () => number = Date.now) {}

  private live(eventId: string) {
    const slot = this.entries.get(eventId);
    if (!slot) return null;
    if (slot.expiresAt <= this.clock()) {
      this.entries.delete(eventId);
      return null;
    }
    return slot;
  }

  async setIfAbsent(
    entry: DedupEntry,
    ttlMs: number,
  ): Promise<DedupEntry | null> {
    const existing = this.live(entry.eventId);
    if (existing) return { ...existing.entry };

    this.entries.set(entry.eventId, {
      entry: { ...entry },
      expiresAt: this.clock() + ttlMs,
    });
    return null;
  }

  async finish(
    eventId: string,
    outcome: Exclude<DedupOutcome, "in_progress">,
    releasedAt: number,
  ): Promise<FinishResult> {
    const slot = this.live(eventId);
    if (!slot) return "missing";
    if (slot.entry.outcome !== "in_progress") return "terminal";

    slot.entry = { ...slot.entry, outcome, releasedAt };
    return "updated";
  }

  async get(eventId: string): Promise<DedupEntry | null> {
    const slot = this.live(eventId);
    return slot ? { ...slot.entry } : null;
  }

  async delete(eventId: string): Promise<boolean> {
    return this.live(eventId) !== null && this.entries.delete(eventId);
  }
}
