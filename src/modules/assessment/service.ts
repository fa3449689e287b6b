import { randomUUID } from "node:crypto";

import { EventStreams } from "../../infrastructure/event-bus/streams.js";
import type { EventPublisher } from "../../infrastructure/event-bus/types.js";
import { ValidationError, errorMessage } from "../../shared/errors.js";
import { createNoopLogger, type Logger } from "../../shared/logger.js";
import { isPlainObject } from "../../shared/records.js";
import { normalizeConversation } from "../conversation/schema.js";
import { ExplanationBuilder } from "../explanation/builder.js";
import { RiskSynthesizer } from "../risk-engine/synthesizer.js";
import type { AssessOptions, RiskAssessment } from "../risk-engine/types.js";
import { InMemoryPublishLedger, type PublishLedger } from "./publish-ledger.js";
import {
  AuditActions,
  type AssessmentBatchSummary,
  type AssessmentEvent,
  type AssessmentOutcome,
  type AssessmentServiceOptions,
  type AuditAction,
  type AuditEvent
} from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function rawConversationId(raw: unknown): unknown {
  if (!isPlainObject(raw)) {
    return undefined;
  }
  return raw.conversation_id ?? raw.conversationId ?? raw.id;
}

export class AssessmentService {
  private readonly eventPublisher: EventPublisher;
  private readonly publishLedger: PublishLedger;
  private readonly synthesizer: RiskSynthesizer;
  private readonly explanationBuilder: ExplanationBuilder;
  private readonly outputStream: string;
  private readonly auditStream: string;
  private readonly actor: string;
  private readonly maxPublishAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor({
    eventPublisher,
    publishLedger = new InMemoryPublishLedger(),
    synthesizer = new RiskSynthesizer(),
    explanationBuilder = new ExplanationBuilder(),
    outputStream = EventStreams.RISK_ASSESSMENTS,
    auditStream = EventStreams.AUDIT_EVENTS,
    actor = "assessment-service",
    maxPublishAttempts = 4,
    retryDelayMs = 50,
    logger = createNoopLogger(),
    now = () => new Date(),
    idFactory = randomUUID
  }: AssessmentServiceOptions) {
    if (typeof eventPublisher?.publish !== "function") {
      throw new Error("AssessmentService requires an eventPublisher.publish method");
    }

    this.eventPublisher = eventPublisher;
    this.publishLedger = publishLedger;
    this.synthesizer = synthesizer;
    this.explanationBuilder = explanationBuilder;
    this.outputStream = outputStream;
    this.auditStream = auditStream;
    this.actor = actor;
    this.maxPublishAttempts = maxPublishAttempts;
    this.retryDelayMs = retryDelayMs;
    this.logger = logger;
    this.now = now;
    this.idFactory = idFactory;
  }

  assessConversation(rawConversation: unknown, options: AssessOptions = {}): AssessmentOutcome {
    const conversation = normalizeConversation(rawConversation);
    const { assessment, features } = this.synthesizer.assess(conversation, options);
    const explanation = this.explanationBuilder.explain(assessment, features, conversation);

    return {
      conversation,
      assessment,
      features,
      explanation
    };
  }

  /**
   * Assesses and publishes the assessment event, then its audit events. With a
   * stable `assessmentId`, calling this again after a partial failure
   * publishes only the events the ledger has not seen.
   */
  async assessAndPublish(
    rawConversation: unknown,
    options: AssessOptions = {}
  ): Promise<AssessmentOutcome> {
    const outcome = this.assessConversation(rawConversation, options);
    const { assessment } = outcome;

    const event: AssessmentEvent = {
      assessment,
      features: outcome.features,
      explanation: outcome.explanation
    };
    await this.publishOnce("assessment", this.outputStream, event, assessment);

    const actions: AuditAction[] = [AuditActions.ASSESSMENT_CREATED];
    if (assessment.requires_human_review) {
      actions.push(AuditActions.HUMAN_REVIEW_TRIGGERED);
    }
    for (const action of actions) {
      await this.publishOnce(action, this.auditStream, this.auditEvent(action, outcome), assessment);
    }

    return outcome;
  }

  async assessAndPublishBatch(rawConversations: readonly unknown[]): Promise<AssessmentBatchSummary> {
    const summary: AssessmentBatchSummary = {
      received: 0,
      published: 0,
      rejected: 0,
      failed: 0
    };

    for (const rawConversation of rawConversations) {
      summary.received += 1;
      try {
        await this.assessAndPublish(rawConversation);
        summary.published += 1;
      } catch (error) {
        if (error instanceof ValidationError) {
          summary.rejected += 1;
          this.logger.warn("conversation rejected", {
            conversation_id: rawConversationId(rawConversation),
            field: error.field,
            error: error.message
          });
          continue;
        }

        summary.failed += 1;
        this.logger.error("conversation assessment failed", {
          conversation_id: rawConversationId(rawConversation),
          error: errorMessage(error)
        });
      }
    }

    return summary;
  }

  private auditEvent(action: AuditAction, outcome: AssessmentOutcome): AuditEvent {
    const { assessment, explanation } = outcome;
    const metadata: Record<string, unknown> =
      action === AuditActions.HUMAN_REVIEW_TRIGGERED
        ? { reasons: explanation.flagging_rationale.primary_reasons }
        : {
            confidence_level: assessment.confidence_level,
            requires_human_review: assessment.requires_human_review,
            message_count: outcome.conversation.messages.length
          };

    return {
      audit_id: this.idFactory(),
      conversation_id: assessment.conversation_id,
      assessment_id: assessment.assessment_id,
      action_type: action,
      actor: this.actor,
      risk_score: assessment.grooming_risk_score,
      risk_level: assessment.risk_level,
      stage: assessment.current_stage,
      decision_rationale: assessment.reasoning_summary,
      model_version: assessment.model_version,
      recorded_at_utc: this.now().toISOString(),
      metadata
    };
  }

  private async publishOnce(
    eventName: string,
    stream: string,
    message: AssessmentEvent | AuditEvent,
    assessment: RiskAssessment
  ): Promise<void> {
    const key = `${assessment.assessment_id}:${eventName}`;
    if (await this.publishLedger.isPublished(key)) {
      this.logger.info("event already published, skipping", {
        stream,
        conversation_id: assessment.conversation_id,
        key
      });
      return;
    }

    await this.publishWithRetry(stream, message, assessment.conversation_id);
    await this.publishLedger.markPublished(key);
  }

  /** Exponential backoff from `retryDelayMs`; the last failure is rethrown. */
  private async publishWithRetry(
    stream: string,
    message: AssessmentEvent | AuditEvent,
    conversationId: string
  ): Promise<void> {
    const attempts = Math.max(1, Math.trunc(this.maxPublishAttempts));
    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.eventPublisher.publish(stream, message);
        return;
      } catch (error) {
        if (attempt >= attempts) {
          throw error;
        }
        const delayMs = this.retryDelayMs * 2 ** (attempt - 1);
        this.logger.warn("publish failed, retrying", {
          stream,
          conversation_id: conversationId,
          attempt,
          attempts,
          delayMs,
          error: errorMessage(error)
        });
        await sleep(delayMs);
      }
    }
  }
}
