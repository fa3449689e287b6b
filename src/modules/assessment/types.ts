import type { EventPublisher } from "../../infrastructure/event-bus/types.js";
import type { Logger } from "../../shared/logger.js";
import type { Conversation } from "../conversation/types.js";
import type { ExplanationBuilder } from "../explanation/builder.js";
import type { AssessmentExplanation } from "../explanation/types.js";
import type { BehavioralFeatures } from "../feature-extraction/types.js";
import type { GroomingStage } from "../progression/constants.js";
import type { RiskLevel } from "../risk-engine/constants.js";
import type { RiskSynthesizer } from "../risk-engine/synthesizer.js";
import type { RiskAssessment } from "../risk-engine/types.js";
import type { PublishLedger } from "./publish-ledger.js";

export interface AssessmentEvent {
  assessment: RiskAssessment;
  features: BehavioralFeatures;
  explanation: AssessmentExplanation;
}

export const AuditActions = Object.freeze({
  ASSESSMENT_CREATED: "assessment_created",
  HUMAN_REVIEW_TRIGGERED: "human_review_triggered"
});

export type AuditAction = (typeof AuditActions)[keyof typeof AuditActions];

export interface AuditEvent {
  audit_id: string;
  conversation_id: string;
  assessment_id: string;
  action_type: AuditAction;
  actor: string;
  risk_score: number;
  risk_level: RiskLevel;
  stage: GroomingStage;
  decision_rationale: string;
  model_version: string;
  recorded_at_utc: string;
  metadata: Record<string, unknown>;
}

export interface AssessmentOutcome extends AssessmentEvent {
  conversation: Conversation;
}

export interface AssessmentBatchSummary {
  received: number;
  published: number;
  rejected: number;
  failed: number;
}

export interface AssessmentServiceOptions {
  eventPublisher: EventPublisher;
  /** Defaults to an in-process ledger. */
  publishLedger?: PublishLedger;
  synthesizer?: RiskSynthesizer;
  explanationBuilder?: ExplanationBuilder;
  outputStream?: string;
  auditStream?: string;
  actor?: string;
  maxPublishAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
}
