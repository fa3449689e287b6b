import { roundTo } from "../../shared/math.js";
import { conversationDurationHours, sortMessagesByTime } from "../conversation/schema.js";
import type { Conversation } from "../conversation/types.js";
import { FEATURE_ORDER, FeatureNames, type FeatureName } from "../feature-extraction/constants.js";
import type { BehavioralFeatures } from "../feature-extraction/types.js";
import type { GroomingStage } from "../progression/constants.js";
import { RiskLevels, resolveRiskLevel } from "../risk-engine/constants.js";
import type { RiskAssessment } from "../risk-engine/types.js";
import {
  ExposureLevels,
  type ExposureLevel,
  type HumanShieldSummary,
  type TimelineEvent
} from "./types.js";

const CLUSTER_LABELS: Readonly<Record<FeatureName, string>> = Object.freeze({
  contact_frequency_score: "High Contact Frequency",
  persistence_after_nonresponse: "Persistence Pattern",
  time_of_day_irregularity: "Temporal Anomaly",
  emotional_dependency_indicators: "Emotional Manipulation",
  isolation_pressure: "Isolation Tactics",
  secrecy_pressure: "Secrecy Pressure",
  platform_migration_attempts: "Platform Migration",
  tone_shift_score: "Linguistic Shifts"
});

// Tone shift alone is not reported as an indicator.
const INDICATOR_TEXT: Partial<Record<FeatureName, string>> = {
  contact_frequency_score: "Escalating contact pattern detected",
  persistence_after_nonresponse: "Persistent messaging despite non-response",
  time_of_day_irregularity: "Off-hours messaging pattern",
  emotional_dependency_indicators: "Emotional manipulation indicators",
  isolation_pressure: "Isolation attempt signals",
  secrecy_pressure: "Secrecy or privacy pressure",
  platform_migration_attempts: "Platform migration attempts"
};

const STAGE_INDICATORS: Partial<Record<GroomingStage, string>> = {
  trust_building: "Trust building phase detected",
  emotional_dependency: "Emotional dependency phase detected",
  isolation_attempts: "Isolation attempt phase detected",
  escalation_risk: "ESCALATION RISK PHASE DETECTED"
};

const INDICATOR_THRESHOLD = 0.5;
const MIDPOINT_SCORE_FACTOR = 0.6;
const MIGRATION_EVENT_THRESHOLD = 0.6;

const VALID_EXPOSURE_LEVELS: ReadonlySet<string> = new Set<string>(Object.values(ExposureLevels));

export function isExposureLevel(value: unknown): value is ExposureLevel {
  return typeof value === "string" && VALID_EXPOSURE_LEVELS.has(value);
}

export function resolveExposureLevel(value: unknown): ExposureLevel {
  return isExposureLevel(value) ? value : ExposureLevels.MINIMAL;
}

function messagingIntensity(messagesPerHour: number): string {
  if (messagesPerHour > 10) {
    return "Very high";
  }
  if (messagesPerHour > 5) {
    return "High";
  }
  if (messagesPerHour > 2) {
    return "Moderate";
  }
  return "Low";
}

function timingDescription(irregularity: number): string {
  if (irregularity > 0.6) {
    return "with significant off-hours activity";
  }
  if (irregularity > 0.3) {
    return "with some off-hours activity";
  }
  return "during normal hours";
}

export function temporalPatternSummary(
  messageCount: number,
  durationHours: number,
  timeOfDayIrregularity: number
): string {
  const rate = durationHours > 0 ? messageCount / durationHours : 0;
  return (
    `${messagingIntensity(rate)} messaging intensity (${rate.toFixed(1)} msg/hr) ` +
    `over ${durationHours.toFixed(1)} hours, ${timingDescription(timeOfDayIrregularity)}`
  );
}

export function behavioralCluster(features: BehavioralFeatures): string {
  let dominant: FeatureName = FeatureNames.CONTACT_FREQUENCY;
  for (const name of FEATURE_ORDER) {
    if (features[name] > features[dominant]) {
      dominant = name;
    }
  }

  const score = features[dominant];
  if (score < 0.3) {
    return "Low Risk Behavioral Pattern";
  }
  if (score < 0.6) {
    return `Moderate Risk: ${CLUSTER_LABELS[dominant]}`;
  }
  return `High Risk: ${CLUSTER_LABELS[dominant]}`;
}

export function keyRiskIndicators(
  features: BehavioralFeatures,
  stage: GroomingStage
): string[] {
  const indicators: string[] = [];
  for (const name of FEATURE_ORDER) {
    const text = INDICATOR_TEXT[name];
    if (text && features[name] > INDICATOR_THRESHOLD) {
      indicators.push(text);
    }
  }

  const stageText = STAGE_INDICATORS[stage];
  if (stageText) {
    indicators.push(stageText);
  }
  return indicators.length > 0 ? indicators : ["No significant risk indicators"];
}

function timelineEvents(
  conversation: Conversation,
  features: BehavioralFeatures,
  assessment: RiskAssessment,
  exposureLevel: ExposureLevel
): TimelineEvent[] {
  const sorted = sortMessagesByTime(conversation.messages);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (!first || !last) {
    return [];
  }

  const events: TimelineEvent[] = [
    {
      timestamp_utc: first.timestamp_utc,
      event_type: "conversation_start",
      description: "Initial contact",
      risk_level: RiskLevels.MINIMAL
    }
  ];

  const middle = sorted[Math.floor(sorted.length / 2)];
  if (sorted.length >= 3 && middle) {
    events.push({
      timestamp_utc: middle.timestamp_utc,
      event_type: "behavioral_shift",
      description: "Mid-conversation behavioral analysis point",
      risk_level: resolveRiskLevel(assessment.grooming_risk_score * MIDPOINT_SCORE_FACTOR)
    });
  }

  events.push({
    timestamp_utc: last.timestamp_utc,
    event_type: "risk_assessment",
    description: `Final risk score: ${assessment.grooming_risk_score.toFixed(1)}`,
    risk_level: assessment.risk_level,
    stage: assessment.current_stage
  });

  if (
    exposureLevel === ExposureLevels.DETAILED &&
    features.platform_migration_attempts > MIGRATION_EVENT_THRESHOLD
  ) {
    events.push({
      timestamp_utc: last.timestamp_utc,
      event_type: "platform_migration",
      description: "Platform migration attempt detected",
      risk_level: RiskLevels.HIGH
    });
  }

  return events;
}

/**
 * Builds the analyst-facing summary. Reads timestamps, roles and scores only;
 * message text never reaches the result.
 */
export function createSafeSummary(
  conversation: Conversation,
  assessment: RiskAssessment,
  features: BehavioralFeatures,
  exposureLevel: unknown = ExposureLevels.MINIMAL
): HumanShieldSummary {
  const level = resolveExposureLevel(exposureLevel);
  const messageCount = conversation.messages.length;
  const durationHours = roundTo(conversationDurationHours(conversation.messages), 2);

  return {
    conversation_id: conversation.conversation_id,
    message_count: messageCount,
    conversation_duration_hours: durationHours,
    temporal_pattern_summary: temporalPatternSummary(
      messageCount,
      durationHours,
      features.time_of_day_irregularity
    ),
    behavioral_cluster: behavioralCluster(features),
    key_risk_indicators: keyRiskIndicators(features, assessment.current_stage),
    timeline_events: timelineEvents(conversation, features, assessment, level),
    exposure_level: level,
    analyst_safety_certified: true
  };
}
