import type { AppRedisClient } from "../../infrastructure/redis/client.js";

/**
 * Records which events of an assessment are already on their stream, so a
 * redelivered submission only publishes what is still missing. Keys are
 * `<assessment_id>:<event>`.
 */
export interface PublishLedger {
  isPublished(key: string): Promise<boolean>;
  markPublished(key: string): Promise<void>;
}

export class InMemoryPublishLedger implements PublishLedger {
  private readonly published = new Set<string>();

  async isPublished(key: string): Promise<boolean> {
    return this.published.has(key);
  }

  async markPublished(key: string): Promise<void> {
    this.published.add(key);
  }
}

export class RedisPublishLedger implements PublishLedger {
  constructor(
    private readonly redis: AppRedisClient,
    private readonly ttlSeconds: number
  ) {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error("RedisPublishLedger ttlSeconds must be a positive integer");
    }
  }

  async isPublished(key: string): Promise<boolean> {
    return (await this.redis.exists(`published:${key}`)) === 1;
  }

  async markPublished(key: string): Promise<void> {
    await this.redis.set(`published:${key}`, "1", { EX: this.ttlSeconds });
  }
}
