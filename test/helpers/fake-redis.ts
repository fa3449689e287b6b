/** Covers the failure-counter commands `ConsumerGroupWorker` issues. */
export class FakeRetryRedis {
  readonly counters = new Map<string, number>();
  readonly expirations = new Map<string, number>();

  async incr(key: string): Promise<number> {
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next);
    return next;
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    this.expirations.set(key, seconds);
    return true;
  }

  async del(key: string): Promise<number> {
    return this.counters.delete(key) ? 1 : 0;
  }
}
