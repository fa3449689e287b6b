import assert from "node:assert/strict";
import test from "node:test";

import { RedisStreamEventBus } from "../../src/infrastructure/event-bus/redis-stream-event-bus.js";
import type { AppRedisClient } from "../../src/infrastructure/redis/client.js";
import { isPlainObject } from "../../src/shared/records.js";

interface StreamReplyEntry {
  id: string;
  message: Record<string, string>;
}

type ReadGroupReply = Array<{ name: string; messages: StreamReplyEntry[] }> | null;

/** Records the stream commands the bus issues and answers from queued replies. */
class FakeStreamRedis {
  readonly added: Array<{ key: string; fields: Record<string, string>; options: unknown }> = [];
  readonly reads: unknown[][] = [];
  readonly acks: Array<[string, string, string]> = [];
  readonly groupErrors: Error[] = [];
  private readonly readReplies: ReadGroupReply[] = [];
  private nextId = 0;

  queueRead(...replies: ReadGroupReply[]): void {
    this.readReplies.push(...replies);
  }

  async xAdd(
    key: string,
    _id: string,
    fields: Record<string, string>,
    options: unknown
  ): Promise<string> {
    this.nextId += 1;
    this.added.push({ key, fields, options });
    return `1700000000000-${this.nextId}`;
  }

  async xGroupCreate(): Promise<string> {
    const error = this.groupErrors.shift();
    if (error) {
      throw error;
    }
    return "OK";
  }

  async xReadGroup(...args: unknown[]): Promise<ReadGroupReply> {
    this.reads.push(args);
    return this.readReplies.shift() ?? null;
  }

  async xAck(key: string, group: string, id: string): Promise<number> {
    this.acks.push([key, group, id]);
    return 1;
  }
}

function createBus(fake: FakeStreamRedis): RedisStreamEventBus {
  return new RedisStreamEventBus(fake as unknown as AppRedisClient, { maxLen: 1000 });
}

const READ_REQUEST = {
  stream: "conversation-submissions",
  group: "assessment-group",
  consumer: "worker-1",
  count: 10,
  blockMs: 500
};

function submissionReply(id: string, payload: string): ReadGroupReply {
  return [
    {
      name: "conversation-submissions",
      messages: [{ id, message: { payload, published_at_utc: "2024-03-05T10:00:00.000Z" } }]
    }
  ];
}

test("publishes encoded fields with an approximate MAXLEN trim", async () => {
  const fake = new FakeStreamRedis();
  const bus = createBus(fake);

  const entry = await bus.publish("risk-assessments", { conversation_id: "conv-1" });

  assert.equal(entry.id, "1700000000000-1");
  assert.equal(entry.stream, "risk-assessments");
  assert.deepEqual(fake.added, [
    {
      key: "risk-assessments",
      fields: {
        payload: '{"conversation_id":"conv-1"}',
        published_at_utc: entry.published_at_utc
      },
      options: { TRIM: { strategy: "MAXLEN", strategyModifier: "~", threshold: 1000 } }
    }
  ]);
});

test("ensureGroup tolerates an existing group and rethrows other errors", async () => {
  const fake = new FakeStreamRedis();
  fake.groupErrors.push(
    new Error("BUSYGROUP Consumer Group name already exists"),
    new Error("NOPERM this user has no permissions")
  );
  const bus = createBus(fake);

  await bus.ensureGroup("conversation-submissions", "assessment-group");
  await assert.rejects(bus.ensureGroup("conversation-submissions", "assessment-group"), /NOPERM/);
  await bus.ensureGroup("conversation-submissions", "assessment-group");
});

test("returns pending entries without reading new ones", async () => {
  const fake = new FakeStreamRedis();
  fake.queueRead(submissionReply("1-0", '{"conversation_id":"conv-1"}'));
  const bus = createBus(fake);

  const delivered = await bus.readGroup(READ_REQUEST);

  assert.deepEqual(delivered, [
    {
      id: "1-0",
      stream: "conversation-submissions",
      message: { conversation_id: "conv-1" },
      published_at_utc: "2024-03-05T10:00:00.000Z",
      redelivered: true
    }
  ]);
  assert.deepEqual(fake.reads, [
    [
      "assessment-group",
      "worker-1",
      { key: "conversation-submissions", id: "0" },
      { COUNT: 10 }
    ]
  ]);
});

test("blocks for new entries once nothing is pending", async () => {
  const fake = new FakeStreamRedis();
  fake.queueRead(
    [{ name: "conversation-submissions", messages: [] }],
    submissionReply("2-0", '{"conversation_id":"conv-2"}')
  );
  const bus = createBus(fake);

  const delivered = await bus.readGroup(READ_REQUEST);

  assert.deepEqual(
    delivered.map((entry) => [entry.id, entry.redelivered]),
    [["2-0", false]]
  );
  assert.equal(fake.reads.length, 2);
  // The blocking read leads with its isolation options.
  assert.equal(fake.reads[1]?.length, 5);
  assert.deepEqual(fake.reads[1]?.slice(1), [
    "assessment-group",
    "worker-1",
    { key: "conversation-submissions", id: ">" },
    { COUNT: 10, BLOCK: 500 }
  ]);
});

test("a zero block time reads new entries without blocking", async () => {
  const fake = new FakeStreamRedis();
  const bus = createBus(fake);

  assert.deepEqual(await bus.readGroup({ ...READ_REQUEST, blockMs: 0 }), []);
  assert.deepEqual(fake.reads[1], [
    "assessment-group",
    "worker-1",
    { key: "conversation-submissions", id: ">" },
    { COUNT: 10 }
  ]);
});

test("dead-letters and acknowledges entries whose payload cannot be decoded", async () => {
  const fake = new FakeStreamRedis();
  fake.queueRead(null, submissionReply("2-0", "{bad"));
  const bus = createBus(fake);

  assert.deepEqual(await bus.readGroup(READ_REQUEST), []);

  assert.equal(fake.added.length, 1);
  assert.equal(fake.added[0]?.key, "conversation-submissions.dlq");
  assert.deepEqual(fake.acks, [["conversation-submissions", "assessment-group", "2-0"]]);

  const letter: unknown = JSON.parse(fake.added[0]?.fields.payload ?? "null");
  assert.ok(isPlainObject(letter));
  assert.deepEqual(
    {
      source_stream: letter.source_stream,
      source_message_id: letter.source_message_id,
      reason: letter.reason,
      payload: letter.payload
    },
    {
      source_stream: "conversation-submissions",
      source_message_id: "2-0",
      reason: "MALFORMED_PAYLOAD",
      payload: {
        raw_fields: { payload: "{bad", published_at_utc: "2024-03-05T10:00:00.000Z" }
      }
    }
  );
});

test("ack acknowledges one entry in the group", async () => {
  const fake = new FakeStreamRedis();
  const bus = createBus(fake);

  assert.equal(await bus.ack("conversation-submissions", "assessment-group", "1-0"), true);
  assert.deepEqual(fake.acks, [["conversation-submissions", "assessment-group", "1-0"]]);
});
