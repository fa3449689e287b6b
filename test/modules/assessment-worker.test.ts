import assert from "node:assert/strict";
import test from "node:test";

import { InMemoryEventBus } from "../../src/infrastructure/event-bus/in-memory-event-bus.js";
import { EventStreams, dlqStream } from "../../src/infrastructure/event-bus/streams.js";
import type { AppRedisClient } from "../../src/infrastructure/redis/client.js";
import { AssessmentService } from "../../src/modules/assessment/service.js";
import type { AssessmentServiceOptions } from "../../src/modules/assessment/types.js";
import {
  AssessmentWorker,
  submissionAssessmentId
} from "../../src/modules/assessment/worker.js";
import { RiskSynthesizer } from "../../src/modules/risk-engine/synthesizer.js";
import { isPlainObject } from "../../src/shared/records.js";
import { HIGH_RISK_MESSAGES, fixedClock, rawConversation } from "../helpers/conversations.js";
import { FakeRetryRedis } from "../helpers/fake-redis.js";
import { createRecordingLogger, type RecordingLogger } from "../helpers/recording-logger.js";

const GROUP = "assessment-group";
const SUBMISSIONS = EventStreams.CONVERSATION_SUBMISSIONS;

function createWorker(
  bus: InMemoryEventBus,
  logger: RecordingLogger,
  serviceOverrides: Partial<AssessmentServiceOptions> = {}
): AssessmentWorker {
  const assessmentService = new AssessmentService({
    eventPublisher: bus,
    synthesizer: new RiskSynthesizer({ now: fixedClock() }),
    retryDelayMs: 0,
    now: fixedClock(),
    idFactory: () => "audit-1",
    ...serviceOverrides
  });

  return new AssessmentWorker({
    eventBus: bus,
    redis: new FakeRetryRedis() as unknown as AppRedisClient,
    assessmentService,
    consumerGroup: GROUP,
    consumerName: "worker-1",
    batchSize: 10,
    blockMs: 0,
    maxDeliveries: 2,
    failureCounterTtlSeconds: 60,
    retryBackoffMs: 0,
    logger
  });
}

function assessmentIds(bus: InMemoryEventBus, stream: string): unknown[] {
  return bus.readStream(stream).map((entry) => {
    if (!isPlainObject(entry.message)) {
      return undefined;
    }
    const { assessment } = entry.message;
    return isPlainObject(assessment) ? assessment.assessment_id : entry.message.assessment_id;
  });
}

test("assessment ids derive from the submission's stream position", () => {
  assert.equal(
    submissionAssessmentId(SUBMISSIONS, "1700000000000-1"),
    "ce512685-2f0e-2725-e42c-0ce146d90230"
  );
  assert.equal(
    submissionAssessmentId(SUBMISSIONS, "1700000000000-2"),
    "df7de94f-50e0-b3ae-920a-8f380ab2eb3f"
  );
});

test("assesses a submitted conversation and acknowledges it", async () => {
  const bus = new InMemoryEventBus();
  const logger = createRecordingLogger();
  const worker = createWorker(bus, logger);

  await worker.init();
  const submitted = await bus.publish(SUBMISSIONS, rawConversation("conv-risk", HIGH_RISK_MESSAGES));
  const expectedId = submissionAssessmentId(SUBMISSIONS, submitted.id);

  assert.equal(await worker.runOnce(), 1);
  assert.deepEqual(assessmentIds(bus, EventStreams.RISK_ASSESSMENTS), [expectedId]);
  assert.deepEqual(assessmentIds(bus, EventStreams.AUDIT_EVENTS), [expectedId, expectedId]);
  assert.equal(bus.pendingCount(SUBMISSIONS, GROUP), 0);
  assert.deepEqual(logger.entries, [
    {
      level: "info",
      message: "assessed submitted conversation",
      context: {
        message_id: submitted.id,
        conversation_id: "conv-risk",
        assessment_id: expectedId,
        risk_level: "critical",
        redelivered: false
      }
    }
  ]);
});

test("a redelivery after a failed audit publish keeps one assessment id", async () => {
  const bus = new InMemoryEventBus();
  const logger = createRecordingLogger();
  const worker = createWorker(bus, logger, { maxPublishAttempts: 1 });

  await worker.init();
  const submitted = await bus.publish(SUBMISSIONS, rawConversation("conv-risk", HIGH_RISK_MESSAGES));
  const expectedId = submissionAssessmentId(SUBMISSIONS, submitted.id);
  bus.setPublishFailureBudget(EventStreams.AUDIT_EVENTS, 1);

  await worker.runOnce();
  assert.equal(bus.pendingCount(SUBMISSIONS, GROUP), 1);
  assert.deepEqual(assessmentIds(bus, EventStreams.RISK_ASSESSMENTS), [expectedId]);
  assert.deepEqual(assessmentIds(bus, EventStreams.AUDIT_EVENTS), []);

  await worker.runOnce();

  assert.deepEqual(assessmentIds(bus, EventStreams.RISK_ASSESSMENTS), [expectedId]);
  assert.deepEqual(assessmentIds(bus, EventStreams.AUDIT_EVENTS), [expectedId, expectedId]);
  assert.equal(bus.pendingCount(SUBMISSIONS, GROUP), 0);
  assert.deepEqual(
    logger.entries.map((entry) => [entry.level, entry.message]),
    [
      ["warn", "message handler failed, will retry"],
      ["info", "event already published, skipping"],
      ["info", "assessed submitted conversation"]
    ]
  );
  assert.equal(logger.entries[2]?.context?.redelivered, true);
});

test("an invalid submission is dead-lettered without a retry", async () => {
  const bus = new InMemoryEventBus();
  const logger = createRecordingLogger();
  const worker = createWorker(bus, logger);
  const submission = { conversation_id: "conv-empty", messages: [] };

  await worker.init();
  const submitted = await bus.publish(SUBMISSIONS, submission);

  assert.equal(await worker.runOnce(), 1);

  assert.deepEqual(
    bus.readStream(dlqStream(SUBMISSIONS)).map((entry) => entry.message),
    [
      {
        source_stream: "conversation-submissions",
        source_message_id: submitted.id,
        reason: "INVALID_SUBMISSION",
        payload: submission,
        metadata: {
          field: "messages",
          consumer: "worker-1",
          error: "Conversation must contain at least one message"
        }
      }
    ]
  );
  assert.equal(bus.pendingCount(SUBMISSIONS, GROUP), 0);
  assert.equal(bus.readStream(EventStreams.RISK_ASSESSMENTS).length, 0);
  assert.deepEqual(logger.messages("warn"), ["invalid message, moving to dlq"]);
  assert.deepEqual(logger.messages("error"), []);
  assert.equal(await worker.runOnce(), 0);
});
