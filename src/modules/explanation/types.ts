import type { FeatureName } from "../feature-extraction/constants.js";
import type { StageSeverity } from "../progression/types.js";
import type { RiskLevel } from "../risk-engine/constants.js";

export interface FlaggingRationale {
  flagged: boolean;
  primary_reasons: string[];
  risk_level: RiskLevel;
  requires_action: boolean;
}

export interface ContributorDetail {
  feature: FeatureName;
  value: number;
  contribution: number;
  description: string;
}

export interface FeatureAnalysis {
  top_contributors: ContributorDetail[];
  moderate_contributors: Omit<ContributorDetail, "description">[];
  feature_count: {
    high: number;
    moderate: number;
    low: number;
  };
  interpretation: string;
}

export interface StageAnalysis {
  current_stage: string;
  stage_confidence: number;
  severity: StageSeverity;
  typical_duration: string;
  potential_next_stage: string;
  warning_signs: string[];
  recommended_actions: string[];
}

export type ProgressionRate =
  | "unknown"
  | "rapid (less than 24 hours)"
  | "moderate (days)"
  | "gradual (weeks or more)";

export interface RiskEvolution {
  conversation_duration_hours: number;
  message_count: number;
  progression_rate: ProgressionRate;
  risk_trajectory: string;
  timeline_summary: string;
}

export type ConfidenceLabel = "high" | "moderate" | "low";

export interface ConfidenceAnalysis {
  confidence_score: number;
  confidence_label: ConfidenceLabel;
  factors: string[];
  reliability: string;
}

export interface AssessmentExplanation {
  assessment_id: string;
  conversation_id: string;
  assessed_at_utc: string;
  model_version: string;
  summary: string;
  flagging_rationale: FlaggingRationale;
  feature_analysis: FeatureAnalysis;
  stage_analysis: StageAnalysis;
  risk_evolution: RiskEvolution;
  confidence_analysis: ConfidenceAnalysis;
  recommendations: string[];
  limitations: string[];
}
