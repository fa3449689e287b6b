import type { FeatureName } from "../feature-extraction/constants.js";
import type { GroomingStage } from "../progression/constants.js";

export const RiskLevels = Object.freeze({
  MINIMAL: "minimal",
  LOW: "low",
  MODERATE: "moderate",
  HIGH: "high",
  CRITICAL: "critical"
});

export type RiskLevel = (typeof RiskLevels)[keyof typeof RiskLevels];

export function isHighRiskLevel(level: RiskLevel): boolean {
  return level === RiskLevels.HIGH || level === RiskLevels.CRITICAL;
}

/** Inclusive upper bounds on the 0-100 score. */
export const RISK_LEVEL_UPPER_BOUNDS = Object.freeze({
  minimal: 20,
  low: 40,
  moderate: 60,
  high: 80
});

export function resolveRiskLevel(score: number): RiskLevel {
  if (score <= RISK_LEVEL_UPPER_BOUNDS.minimal) {
    return RiskLevels.MINIMAL;
  }
  if (score <= RISK_LEVEL_UPPER_BOUNDS.low) {
    return RiskLevels.LOW;
  }
  if (score <= RISK_LEVEL_UPPER_BOUNDS.moderate) {
    return RiskLevels.MODERATE;
  }
  if (score <= RISK_LEVEL_UPPER_BOUNDS.high) {
    return RiskLevels.HIGH;
  }
  return RiskLevels.CRITICAL;
}

export const DEFAULT_FEATURE_WEIGHTS: Readonly<Record<FeatureName, number>> = Object.freeze({
  contact_frequency_score: 0.1,
  persistence_after_nonresponse: 0.13,
  time_of_day_irregularity: 0.08,
  emotional_dependency_indicators: 0.22,
  isolation_pressure: 0.2,
  secrecy_pressure: 0.18,
  platform_migration_attempts: 0.06,
  tone_shift_score: 0.03
});

// escalation_risk exceeds 1 so strong multi-signal cases saturate at 100.
export const DEFAULT_STAGE_MULTIPLIERS: Readonly<Record<GroomingStage, number>> = Object.freeze({
  initial_contact: 0.4,
  trust_building: 0.6,
  emotional_dependency: 0.8,
  isolation_attempts: 0.95,
  escalation_risk: 1.2,
  unknown: 0.5
});

export const ReviewThresholds = Object.freeze({
  critical: 80,
  humanReview: 60,
  isolationStageConfidence: 0.5
});

export const SynergyRule = Object.freeze({
  featureThreshold: 0.5,
  minimumCount: 2,
  boostPerExtraFeature: 0.15
});

export const WEIGHT_SUM_TOLERANCE = 1e-6;
export const OUTPUT_DECIMALS = 4;
export const DEFAULT_MODEL_VERSION = "1.0.0";
