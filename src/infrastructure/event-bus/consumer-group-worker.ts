import { ValidationError, errorMessage } from "../../shared/errors.js";
import { createNoopLogger, type Logger } from "../../shared/logger.js";
import type { AppRedisClient } from "../redis/client.js";
import {
  DeadLetterReasons,
  type DeadLetterReason,
  type DeliveredEntry,
  type GroupConsumer
} from "./types.js";

export type EntryHandler = (entry: DeliveredEntry) => Promise<void>;

export interface ConsumerGroupWorkerOptions {
  consumer: GroupConsumer;
  /** Holds the per-entry failure counters. */
  redis: AppRedisClient;
  stream: string;
  group: string;
  consumerName: string;
  batchSize: number;
  blockMs: number;
  maxDeliveries: number;
  failureCounterTtlSeconds: number;
  handler: EntryHandler;
  retryBackoffMs?: number;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Drives one consumer of a group. A handler failure leaves the entry pending
 * for redelivery and bumps `retry:<stream>:<id>` in Redis, so the count
 * survives restarts; at `maxDeliveries` the entry is dead-lettered. An entry
 * whose handler throws `ValidationError` is dead-lettered on first delivery.
 */
export class ConsumerGroupWorker {
  private running = false;
  private readonly retryBackoffMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: ConsumerGroupWorkerOptions) {
    this.retryBackoffMs = options.retryBackoffMs ?? 250;
    this.logger = options.logger ?? createNoopLogger();
  }

  async init(): Promise<void> {
    await this.options.consumer.ensureGroup(this.options.stream, this.options.group);
  }

  /** Handles one batch; returns how many entries it read. */
  async runOnce(): Promise<number> {
    const entries = await this.options.consumer.readGroup({
      stream: this.options.stream,
      group: this.options.group,
      consumer: this.options.consumerName,
      count: this.options.batchSize,
      blockMs: this.options.blockMs
    });

    for (const entry of entries) {
      try {
        await this.options.handler(entry);
      } catch (error) {
        await this.onHandlerFailure(entry, error);
        continue;
      }
      await this.settle(entry);
    }
    return entries.length;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.running = true;
    while (this.running) {
      await this.runOnce();
    }
  }

  stop(): void {
    this.running = false;
  }

  private failureKey(entry: DeliveredEntry): string {
    return `retry:${this.options.stream}:${entry.id}`;
  }

  private async onHandlerFailure(entry: DeliveredEntry, error: unknown): Promise<void> {
    const context = { stream: this.options.stream, message_id: entry.id };

    if (error instanceof ValidationError) {
      this.logger.warn("invalid message, moving to dlq", {
        ...context,
        field: error.field,
        error: error.message
      });
      await this.deadLetter(entry, DeadLetterReasons.INVALID_SUBMISSION, {
        field: error.field ?? null,
        error: error.message
      });
      return;
    }

    const key = this.failureKey(entry);
    const failures = await this.options.redis.incr(key);
    if (failures === 1) {
      await this.options.redis.expire(key, this.options.failureCounterTtlSeconds);
    }

    if (failures >= this.options.maxDeliveries) {
      this.logger.error("message exceeded max deliveries, moving to dlq", {
        ...context,
        retries: failures,
        error: errorMessage(error)
      });
      await this.deadLetter(entry, DeadLetterReasons.MAX_DELIVERIES_EXCEEDED, {
        retries: failures,
        error: errorMessage(error)
      });
      return;
    }

    this.logger.warn("message handler failed, will retry", {
      ...context,
      retries: failures,
      error: errorMessage(error)
    });
    await sleep(this.retryBackoffMs);
  }

  private async deadLetter(
    entry: DeliveredEntry,
    reason: DeadLetterReason,
    metadata: Record<string, unknown>
  ): Promise<void> {
    await this.options.consumer.deadLetter({
      source_stream: this.options.stream,
      source_message_id: entry.id,
      reason,
      payload: entry.message,
      metadata: { ...metadata, consumer: this.options.consumerName }
    });
    await this.settle(entry);
  }

  private async settle(entry: DeliveredEntry): Promise<void> {
    await this.options.consumer.ack(this.options.stream, this.options.group, entry.id);
    await this.options.redis.del(this.failureKey(entry));
  }
}
