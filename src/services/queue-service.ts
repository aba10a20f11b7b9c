import { Queue } from "bullmq";
import IORedis from "ioredis";
import type { Logger } from "winston";
import { logger } from "../lib/logger";
import { config } from "../config";
import type { ChatEvent } from "./chat/types";

let redisConnection: IORedis | undefined;
let chatEventQueue: Queue<ChatEventTask> | undefined;

export function getRedisConnection(): IORedis {
  if (!redisConnection) {
    if (!config.REDIS_URL) {
      throw new Error("REDIS_URL not set");
    }
    redisConnection = new IORedis(config.REDIS_URL, {
      maxRetriesPerRequest: null,
    });
    redisConnection.on("connect", () => logger.info("Redis connected"));
    redisConnection.on("reconnecting", () => logger.warn("Redis reconnecting"));
    redisConnection.on("error", err => logger.warn("Redis error", { err }));
  }
  return redisConnection;
}

export const chatEventQueueName = "{chatEventQueue}";

/** Work handed from the webhook to a worker. */
export interface ChatEventTask {
  event: ChatEvent;
  /** Instance that claimed the event. */
  claimedBy: string;
}

export function getChatEventQueue(): Queue<ChatEventTask> {
  if (!chatEventQueue) {
    chatEventQueue = new Queue<ChatEventTask>(chatEventQueueName, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        // The dedup guard owns redelivery; a failed task is not retried.
        attempts: 1,
        removeOnComplete: {
          age: 90000, // 25 hours
        },
        removeOnFail: {
          age: 90000, // 25 hours
        },
      },
    });
  }
  return chatEventQueue;
}

export async function closeQueueConnections(): Promise<void> {
  if (chatEventQueue) {
    await chatEventQueue.close();
    chatEventQueue = undefined;
  }
  if (redisConnection) {
    await redisConnection.quit();
    redisConnection = undefined;
  }
}

export interface TaskScheduler {
  schedule(task: ChatEventTask): Promise<void>;
}

export class BullMQTaskScheduler implements TaskScheduler {
  constructor(private readonly queue: Queue<ChatEventTask>) {}

  async schedule(task: ChatEventTask): Promise<void> {
    await this.queue.add("chat-event", task, {
      jobId: task.event.eventId,
    });
  }
}

/**
 * Runs tasks in this process after the current request completes. For tests
 * and local development without Redis.
 */
export class InlineTaskScheduler implements TaskScheduler {
  private handler?: (task: ChatEventTask) => Promise<void>;
  private readonly pending = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = (log ?? logger).child({ module: "inline-scheduler" });
  }

  attach(handler: (task: ChatEventTask) => Promise<void>): void {
    this.handler = handler;
  }

  async schedule(task: ChatEventTask): Promise<void> {
    const handler = this.handler;
    if (!handler) {
      throw new Error("No task handler attached");
    }

    const run = new Promise<void>(resolve => setImmediate(resolve))
      .then(() => handler(task))
      .catch(error => {
        this.log.error("Inline task failed", {
          eventId: task.event.eventId,
          error,
        });
      })
      .finally(() => {
        this.pending.delete(run);
      });

    this.pending.add(run);
  }

  /** Resolves once every scheduled task has finished. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
