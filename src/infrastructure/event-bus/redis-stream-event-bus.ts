import { commandOptions } from "redis";

import { errorMessage } from "../../shared/errors.js";
import type { AppRedisClient } from "../redis/client.js";
import { decodeEntryFields, encodeEntryFields } from "./codec.js";
import { dlqStream } from "./streams.js";
import {
  DeadLetterReasons,
  type DeadLetter,
  type DeliveredEntry,
  type EventBus,
  type GroupReadRequest,
  type StreamEntry
} from "./types.js";

/** Redelivers this consumer's pending entries when passed as the read id. */
const PENDING_ID = "0";
const NEW_ENTRIES_ID = ">";

export interface RedisStreamEventBusOptions {
  /** Approximate cap applied to every stream on publish. */
  maxLen: number;
}

export class RedisStreamEventBus implements EventBus {
  private readonly maxLen: number;

  constructor(
    private readonly redis: AppRedisClient,
    { maxLen }: RedisStreamEventBusOptions
  ) {
    this.maxLen = maxLen;
  }

  async publish<TMessage>(stream: string, message: TMessage): Promise<StreamEntry<TMessage>> {
    const fields = encodeEntryFields(message);
    const id = await this.redis.xAdd(stream, "*", fields, {
      TRIM: { strategy: "MAXLEN", strategyModifier: "~", threshold: this.maxLen }
    });
    return { id, stream, message, published_at_utc: fields.published_at_utc };
  }

  async ensureGroup(stream: string, group: string): Promise<void> {
    try {
      await this.redis.xGroupCreate(stream, group, "$", { MKSTREAM: true });
    } catch (error) {
      if (!errorMessage(error).includes("BUSYGROUP")) {
        throw error;
      }
    }
  }

  async readGroup(request: GroupReadRequest): Promise<DeliveredEntry[]> {
    const pending = await this.read(request, PENDING_ID);
    if (pending.length > 0) {
      return pending;
    }
    return this.read(request, NEW_ENTRIES_ID);
  }

  async ack(stream: string, group: string, id: string): Promise<boolean> {
    return (await this.redis.xAck(stream, group, id)) === 1;
  }

  async deadLetter(letter: DeadLetter): Promise<string> {
    const entry = await this.publish(dlqStream(letter.source_stream), letter);
    return entry.id;
  }

  private async read(request: GroupReadRequest, id: string): Promise<DeliveredEntry[]> {
    const streams = { key: request.stream, id };
    // Only reads for new entries block; a blocking read holds its connection,
    // so it runs on an isolated one.
    const reply =
      id === NEW_ENTRIES_ID && request.blockMs > 0
        ? await this.redis.xReadGroup(
            commandOptions({ isolated: true }),
            request.group,
            request.consumer,
            streams,
            { COUNT: request.count, BLOCK: request.blockMs }
          )
        : await this.redis.xReadGroup(request.group, request.consumer, streams, {
            COUNT: request.count
          });

    const delivered: DeliveredEntry[] = [];
    for (const { messages } of reply ?? []) {
      for (const raw of messages) {
        const decoded = decodeEntryFields(request.stream, raw.id, raw.message);
        if (decoded.ok) {
          delivered.push({ ...decoded.entry, redelivered: id === PENDING_ID });
          continue;
        }

        await this.deadLetter({
          source_stream: request.stream,
          source_message_id: raw.id,
          reason: DeadLetterReasons.MALFORMED_PAYLOAD,
          payload: { raw_fields: decoded.fields },
          metadata: {
            decode_error: decoded.error,
            group: request.group,
            consumer: request.consumer
          }
        });
        await this.ack(request.stream, request.group, raw.id);
      }
    }
    return delivered;
  }
}
