export const GroomingStages = Object.freeze({
  INITIAL_CONTACT: "initial_contact",
  TRUST_BUILDING: "trust_building",
  EMOTIONAL_DEPENDENCY: "emotional_dependency",
  ISOLATION_ATTEMPTS: "isolation_attempts",
  ESCALATION_RISK: "escalation_risk",
  UNKNOWN: "unknown"
});

export type GroomingStage = (typeof GroomingStages)[keyof typeof GroomingStages];

export type ScoredStage = Exclude<GroomingStage, "unknown">;

/** Stages the classifier scores, in severity order. Argmax ties go to the earlier entry. */
export const SCORED_STAGE_ORDER: readonly ScoredStage[] = Object.freeze([
  GroomingStages.INITIAL_CONTACT,
  GroomingStages.TRUST_BUILDING,
  GroomingStages.EMOTIONAL_DEPENDENCY,
  GroomingStages.ISOLATION_ATTEMPTS,
  GroomingStages.ESCALATION_RISK
]);

export const ProgressionThresholds = Object.freeze({
  initialContactMean: 0.2,
  trustBandLow: 0.2,
  trustBandHigh: 0.5,
  highRiskFeature: 0.6,
  elevatedFeature: 0.5,
  minimumWinningScore: 0.15,
  fallbackConfidence: 0.5,
  confidenceFloor: 0.1
});
