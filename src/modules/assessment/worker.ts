import { createHash } from "node:crypto";
import { hostname } from "node:os";

import { ConsumerGroupWorker } from "../../infrastructure/event-bus/consumer-group-worker.js";
import { EventStreams } from "../../infrastructure/event-bus/streams.js";
import type { DeliveredEntry, EventBus } from "../../infrastructure/event-bus/types.js";
import type { AppRedisClient } from "../../infrastructure/redis/client.js";
import { createNoopLogger, type Logger } from "../../shared/logger.js";
import type { AssessmentService } from "./service.js";

export interface AssessmentWorkerOptions {
  eventBus: EventBus;
  redis: AppRedisClient;
  assessmentService: AssessmentService;
  inputStream?: string;
  consumerGroup: string;
  consumerName?: string;
  batchSize: number;
  blockMs: number;
  maxDeliveries: number;
  failureCounterTtlSeconds: number;
  retryBackoffMs?: number;
  logger?: Logger;
}

/**
 * Derives a UUID-shaped id from the submission's stream position. Every
 * delivery of one entry yields the same id, so audit records written on a
 * redelivery still point at the assessment already published.
 */
export function submissionAssessmentId(stream: string, entryId: string): string {
  const hex = createHash("sha256").update(`${stream}/${entryId}`).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32)
  ].join("-");
}

/** Assesses conversations submitted on `conversation-submissions`. */
export class AssessmentWorker {
  private readonly consumer: ConsumerGroupWorker;
  private readonly assessmentService: AssessmentService;
  private readonly logger: Logger;

  constructor({
    eventBus,
    redis,
    assessmentService,
    inputStream = EventStreams.CONVERSATION_SUBMISSIONS,
    consumerGroup,
    consumerName = `assessment-${hostname()}-${process.pid}`,
    batchSize,
    blockMs,
    maxDeliveries,
    failureCounterTtlSeconds,
    retryBackoffMs,
    logger = createNoopLogger()
  }: AssessmentWorkerOptions) {
    this.assessmentService = assessmentService;
    this.logger = logger;
    this.consumer = new ConsumerGroupWorker({
      consumer: eventBus,
      redis,
      stream: inputStream,
      group: consumerGroup,
      consumerName,
      batchSize,
      blockMs,
      maxDeliveries,
      failureCounterTtlSeconds,
      retryBackoffMs,
      logger,
      handler: (entry) => this.assess(entry)
    });
  }

  async init(): Promise<void> {
    await this.consumer.init();
  }

  async runOnce(): Promise<number> {
    return this.consumer.runOnce();
  }

  async start(): Promise<void> {
    await this.consumer.start();
  }

  stop(): void {
    this.consumer.stop();
  }

  private async assess(entry: DeliveredEntry): Promise<void> {
    const { assessment } = await this.assessmentService.assessAndPublish(entry.message, {
      assessmentId: submissionAssessmentId(entry.stream, entry.id)
    });
    this.logger.info("assessed submitted conversation", {
      message_id: entry.id,
      conversation_id: assessment.conversation_id,
      assessment_id: assessment.assessment_id,
      risk_level: assessment.risk_level,
      redelivered: entry.redelivered
    });
  }
}
