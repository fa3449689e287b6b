import { dlqStream } from "./streams.js";
import type {
  DeadLetter,
  DeliveredEntry,
  EventBus,
  GroupReadRequest,
  StreamEntry
} from "./types.js";

interface GroupState {
  cursor: number;
  /** Ids handed out but not acknowledged. */
  pending: Set<string>;
}

/**
 * Process-local bus for tests and local runs. Groups follow the Redis model:
 * a group created late skips earlier entries, and unacknowledged entries are
 * handed out again before new ones.
 */
export class InMemoryEventBus implements EventBus {
  private readonly streams = new Map<string, StreamEntry[]>();
  private readonly groups = new Map<string, GroupState>();
  private readonly failuresLeft = new Map<string, number>();
  private sequence = 0;

  /** The next `count` publishes to `stream` throw. */
  setPublishFailureBudget(stream: string, count: number): void {
    this.failuresLeft.set(stream, Number.isInteger(count) && count > 0 ? count : 0);
  }

  async publish<TMessage>(stream: string, message: TMessage): Promise<StreamEntry<TMessage>> {
    const failures = this.failuresLeft.get(stream) ?? 0;
    if (failures > 0) {
      this.failuresLeft.set(stream, failures - 1);
      throw new Error(`Simulated publish failure for stream "${stream}"`);
    }

    this.sequence += 1;
    const entry: StreamEntry<TMessage> = {
      id: `${Date.now()}-${this.sequence}`,
      stream,
      message,
      published_at_utc: new Date().toISOString()
    };
    this.entries(stream).push(entry);
    return entry;
  }

  async ensureGroup(stream: string, group: string): Promise<void> {
    this.group(stream, group);
  }

  async readGroup(request: GroupReadRequest): Promise<DeliveredEntry[]> {
    const state = this.group(request.stream, request.group);
    const entries = this.entries(request.stream);
    const limit = Math.max(0, Math.trunc(request.count));

    if (state.pending.size > 0) {
      return entries
        .filter((entry) => state.pending.has(entry.id))
        .slice(0, limit)
        .map((entry) => ({ ...entry, redelivered: true }));
    }

    const fresh = entries.slice(state.cursor, state.cursor + limit);
    state.cursor += fresh.length;
    return fresh.map((entry) => {
      state.pending.add(entry.id);
      return { ...entry, redelivered: false };
    });
  }

  async ack(stream: string, group: string, id: string): Promise<boolean> {
    return this.groups.get(`${stream}::${group}`)?.pending.delete(id) ?? false;
  }

  async deadLetter(letter: DeadLetter): Promise<string> {
    const entry = await this.publish(dlqStream(letter.source_stream), letter);
    return entry.id;
  }

  readStream(stream: string): StreamEntry[] {
    return [...(this.streams.get(stream) ?? [])];
  }

  pendingCount(stream: string, group: string): number {
    return this.groups.get(`${stream}::${group}`)?.pending.size ?? 0;
  }

  private entries(stream: string): StreamEntry[] {
    let entries = this.streams.get(stream);
    if (!entries) {
      entries = [];
      this.streams.set(stream, entries);
    }
    return entries;
  }

  private group(stream: string, group: string): GroupState {
    const key = `${stream}::${group}`;
    let state = this.groups.get(key);
    if (!state) {
      state = { cursor: this.entries(stream).length, pending: new Set() };
      this.groups.set(key, state);
    }
    return state;
  }
}
