import type { GroomingStage } from "../progression/constants.js";
import type { RiskLevel } from "../risk-engine/constants.js";

export interface AnalystExposureState {
  analyst_id: string;
  session_start_utc: string;
  cases_reviewed: number;
  high_risk_exposures: number;
  total_exposure_minutes: number;
}

export interface ExposureLimits {
  maxSessionMinutes: number;
  maxCasesPerSession: number;
  maxHighRiskPerSession: number;
  breakMinutes: number;
}

export const ExposureDenyReasons = Object.freeze({
  SESSION_DURATION_EXCEEDED: "SESSION_DURATION_EXCEEDED",
  CASE_LIMIT_REACHED: "CASE_LIMIT_REACHED",
  HIGH_RISK_LIMIT_REACHED: "HIGH_RISK_LIMIT_REACHED"
});

export type ExposureDenyReason = (typeof ExposureDenyReasons)[keyof typeof ExposureDenyReasons];

interface SafetyCheckBase {
  analyst_id: string;
  cases_reviewed: number;
  high_risk_exposures: number;
  session_duration_minutes: number;
}

export interface SafetyAllowed extends SafetyCheckBase {
  decision: "allow";
  remaining_cases: number;
}

export interface SafetyDenied extends SafetyCheckBase {
  decision: "deny";
  reason: ExposureDenyReason;
  message: string;
  recommendation: string;
}

export type SafetyCheckResult = SafetyAllowed | SafetyDenied;

export const ExposureLevels = Object.freeze({
  MINIMAL: "minimal",
  MODERATE: "moderate",
  DETAILED: "detailed"
});

export type ExposureLevel = (typeof ExposureLevels)[keyof typeof ExposureLevels];

export type TimelineEventType =
  | "conversation_start"
  | "behavioral_shift"
  | "risk_assessment"
  | "platform_migration";

export interface TimelineEvent {
  timestamp_utc: string;
  event_type: TimelineEventType;
  description: string;
  risk_level: RiskLevel;
  stage?: GroomingStage;
}

/** Analyst-facing view of a conversation. Never carries message text. */
export interface HumanShieldSummary {
  conversation_id: string;
  message_count: number;
  conversation_duration_hours: number;
  temporal_pattern_summary: string;
  behavioral_cluster: string;
  key_risk_indicators: string[];
  timeline_events: TimelineEvent[];
  exposure_level: ExposureLevel;
  analyst_safety_certified: true;
}

export interface VisualizationData {
  risk_score_gauge: {
    score: number;
    level: RiskLevel;
    confidence: number;
  };
  feature_radar: {
    contact_frequency: number;
    persistence: number;
    time_irregularity: number;
    emotional_dependency: number;
    isolation: number;
    secrecy: number;
    platform_migration: number;
    tone_shift: number;
  };
  temporal_heatmap: {
    hours: number[];
    message_counts: number[];
    peak_hour: number;
  };
  stage_progression: {
    current_stage: GroomingStage;
    confidence: number;
  };
}
