import type { GroomingStage, ScoredStage } from "./constants.js";

export type StageScores = Readonly<Record<ScoredStage, number>>;

export interface StageClassification {
  stage: GroomingStage;
  confidence: number;
  scores: StageScores;
}

export type StageSeverity = "low" | "moderate" | "high" | "critical" | "unknown";

export interface StageProfile {
  severity: StageSeverity;
  typical_duration: string;
  next_stage: string;
  warning_signs: readonly string[];
}
