import type { FeatureName } from "../feature-extraction/constants.js";
import type { BehavioralFeatureExtractor } from "../feature-extraction/extractor.js";
import type { BehavioralFeatures } from "../feature-extraction/types.js";
import type { ProgressionClassifier } from "../progression/classifier.js";
import type { GroomingStage } from "../progression/constants.js";
import type { RiskLevel } from "./constants.js";

export interface FeatureContribution {
  feature_name: FeatureName;
  value: number;
  /** value x base weight x stage multiplier */
  contribution_weight: number;
  description: string;
}

export interface RiskAssessment {
  assessment_id: string;
  conversation_id: string;
  grooming_risk_score: number;
  confidence_level: number;
  risk_level: RiskLevel;
  current_stage: GroomingStage;
  stage_confidence: number;
  feature_contributions: readonly FeatureContribution[];
  reasoning_summary: string;
  requires_human_review: boolean;
  model_version: string;
  assessed_at_utc: string;
}

export interface RiskAssessmentResult {
  assessment: RiskAssessment;
  features: BehavioralFeatures;
}

export interface AssessOptions {
  /** Reused instead of a fresh id, so reprocessing the same input keeps its id. */
  assessmentId?: string;
}

export type FeatureWeights = Readonly<Record<FeatureName, number>>;
export type StageMultipliers = Readonly<Record<GroomingStage, number>>;

export interface RiskSynthesizerOptions {
  extractor?: BehavioralFeatureExtractor;
  classifier?: ProgressionClassifier;
  featureWeights?: Readonly<Partial<Record<FeatureName, number>>>;
  stageMultipliers?: Readonly<Partial<Record<GroomingStage, number>>>;
  modelVersion?: string;
  now?: () => Date;
  idFactory?: () => string;
}
