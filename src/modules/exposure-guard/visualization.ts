import { SenderRoles } from "../conversation/constants.js";
import { timestampMs } from "../conversation/schema.js";
import type { Conversation } from "../conversation/types.js";
import type { BehavioralFeatures } from "../feature-extraction/types.js";
import type { RiskAssessment } from "../risk-engine/types.js";
import type { VisualizationData } from "./types.js";

const HOURS_PER_DAY = 24;
const EMPTY_PEAK_HOUR = 12;

/** Adult message counts per UTC hour. Peak ties go to the earliest hour. */
export function temporalHeatmap(conversation: Conversation): VisualizationData["temporal_heatmap"] {
  const counts = new Array<number>(HOURS_PER_DAY).fill(0);
  let adultCount = 0;
  for (const message of conversation.messages) {
    if (message.sender_role === SenderRoles.ADULT) {
      const hour = new Date(timestampMs(message)).getUTCHours();
      counts[hour] = (counts[hour] ?? 0) + 1;
      adultCount += 1;
    }
  }

  let peakHour = EMPTY_PEAK_HOUR;
  if (adultCount > 0) {
    peakHour = counts.indexOf(Math.max(...counts));
  }

  return {
    hours: Array.from({ length: HOURS_PER_DAY }, (_, hour) => hour),
    message_counts: counts,
    peak_hour: peakHour
  };
}

export function buildVisualizationData(
  conversation: Conversation,
  features: BehavioralFeatures,
  assessment: RiskAssessment
): VisualizationData {
  return {
    risk_score_gauge: {
      score: assessment.grooming_risk_score,
      level: assessment.risk_level,
      confidence: assessment.confidence_level
    },
    feature_radar: {
      contact_frequency: features.contact_frequency_score,
      persistence: features.persistence_after_nonresponse,
      time_irregularity: features.time_of_day_irregularity,
      emotional_dependency: features.emotional_dependency_indicators,
      isolation: features.isolation_pressure,
      secrecy: features.secrecy_pressure,
      platform_migration: features.platform_migration_attempts,
      tone_shift: features.tone_shift_score
    },
    temporal_heatmap: temporalHeatmap(conversation),
    stage_progression: {
      current_stage: assessment.current_stage,
      confidence: assessment.stage_confidence
    }
  };
}
