import { randomUUID } from "node:crypto";
import { ConfigurationError, ValidationError } from "../../shared/errors.js";
import { clamp, roundTo, variance } from "../../shared/math.js";
import type { Conversation } from "../conversation/types.js";
import {
  FEATURE_DESCRIPTIONS,
  FEATURE_LABELS,
  FEATURE_ORDER,
  FeatureNames,
  type FeatureName
} from "../feature-extraction/constants.js";
import {
  BehavioralFeatureExtractor,
  featureValues,
  mapFeatures,
  toFeatureVector
} from "../feature-extraction/extractor.js";
import type { FeatureVector } from "../feature-extraction/types.js";
import { ProgressionClassifier } from "../progression/classifier.js";
import { GroomingStages, type GroomingStage } from "../progression/constants.js";
import { describeStage, stageTitle } from "../progression/stage-profiles.js";
import {
  DEFAULT_FEATURE_WEIGHTS,
  DEFAULT_MODEL_VERSION,
  DEFAULT_STAGE_MULTIPLIERS,
  OUTPUT_DECIMALS,
  ReviewThresholds,
  SynergyRule,
  WEIGHT_SUM_TOLERANCE,
  resolveRiskLevel
} from "./constants.js";
import type {
  AssessOptions,
  FeatureContribution,
  FeatureWeights,
  RiskAssessment,
  RiskAssessmentResult,
  RiskSynthesizerOptions,
  StageMultipliers
} from "./types.js";

const SYNERGY_FEATURES: readonly FeatureName[] = [
  FeatureNames.EMOTIONAL_DEPENDENCY,
  FeatureNames.ISOLATION,
  FeatureNames.SECRECY
];

const PRIMARY_FACTOR_COUNT = 3;
const PRIMARY_FACTOR_MIN_VALUE = 0.3;

function requireNonNegative(value: number | undefined, label: string): number {
  if (value === undefined) {
    throw new ConfigurationError(`${label} is missing`);
  }
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${label} must be a finite non-negative number`);
  }
  return value;
}

export function resolveFeatureWeights(
  input: RiskSynthesizerOptions["featureWeights"] = DEFAULT_FEATURE_WEIGHTS
): FeatureWeights {
  const weights = mapFeatures((name) => requireNonNegative(input[name], `feature weight ${name}`));
  const total = featureValues(weights).reduce((sum, weight) => sum + weight, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(`feature weights must sum to 1.0, got ${total}`);
  }
  return Object.freeze(weights);
}

export function resolveStageMultipliers(
  input: RiskSynthesizerOptions["stageMultipliers"] = DEFAULT_STAGE_MULTIPLIERS
): StageMultipliers {
  const multiplier = (stage: GroomingStage): number =>
    requireNonNegative(input[stage], `stage multiplier ${stage}`);

  return Object.freeze({
    initial_contact: multiplier(GroomingStages.INITIAL_CONTACT),
    trust_building: multiplier(GroomingStages.TRUST_BUILDING),
    emotional_dependency: multiplier(GroomingStages.EMOTIONAL_DEPENDENCY),
    isolation_attempts: multiplier(GroomingStages.ISOLATION_ATTEMPTS),
    escalation_risk: multiplier(GroomingStages.ESCALATION_RISK),
    unknown: multiplier(GroomingStages.UNKNOWN)
  });
}

export function dataConfidence(messageCount: number): number {
  if (messageCount < 5) {
    return 0.3;
  }
  if (messageCount < 10) {
    return 0.5;
  }
  if (messageCount < 20) {
    return 0.7;
  }
  return 0.9;
}

export function consistencyConfidence(features: FeatureVector): number {
  return 1 - Math.min(variance(featureValues(features)), 0.5) * 2;
}

export function requiresHumanReview(
  score: number,
  stage: GroomingStage,
  confidence: number
): boolean {
  if (score >= ReviewThresholds.critical || score >= ReviewThresholds.humanReview) {
    return true;
  }
  if (stage === GroomingStages.ESCALATION_RISK) {
    return true;
  }
  return (
    stage === GroomingStages.ISOLATION_ATTEMPTS &&
    confidence > ReviewThresholds.isolationStageConfidence
  );
}

/**
 * Combines the behavioral feature vector and the classified stage into a
 * 0-100 score with confidence, per-feature contributions and review flag.
 * Weights and multipliers are validated once, here; `assess` never throws
 * for configuration reasons.
 */
export class RiskSynthesizer {
  readonly modelVersion: string;

  private readonly extractor: BehavioralFeatureExtractor;
  private readonly classifier: ProgressionClassifier;
  private readonly featureWeights: FeatureWeights;
  private readonly stageMultipliers: StageMultipliers;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor({
    extractor,
    classifier,
    featureWeights,
    stageMultipliers,
    modelVersion = DEFAULT_MODEL_VERSION,
    now = () => new Date(),
    idFactory = randomUUID
  }: RiskSynthesizerOptions = {}) {
    this.featureWeights = resolveFeatureWeights(featureWeights);
    this.stageMultipliers = resolveStageMultipliers(stageMultipliers);
    this.extractor = extractor ?? new BehavioralFeatureExtractor({ now });
    this.classifier = classifier ?? new ProgressionClassifier();
    this.modelVersion = modelVersion;
    this.now = now;
    this.idFactory = idFactory;
  }

  assess(conversation: Conversation, options: AssessOptions = {}): RiskAssessmentResult {
    if (conversation.messages.length === 0) {
      throw new ValidationError("conversation must contain at least one message", "messages");
    }

    const features = this.extractor.extract(conversation);
    const vector = toFeatureVector(features);
    const classification = this.classifier.classify(vector);
    const multiplier = this.stageMultipliers[classification.stage];

    const score = roundTo(
      clamp(this.baseRisk(vector) * multiplier * 100, 0, 100),
      OUTPUT_DECIMALS
    );
    const confidence = roundTo(
      clamp(
        dataConfidence(conversation.messages.length) * 0.4 +
          classification.confidence * 0.3 +
          consistencyConfidence(vector) * 0.3,
        0,
        1
      ),
      OUTPUT_DECIMALS
    );

    const assessment: RiskAssessment = {
      assessment_id: options.assessmentId ?? this.idFactory(),
      conversation_id: conversation.conversation_id,
      grooming_risk_score: score,
      confidence_level: confidence,
      risk_level: resolveRiskLevel(score),
      current_stage: classification.stage,
      stage_confidence: roundTo(classification.confidence, OUTPUT_DECIMALS),
      feature_contributions: Object.freeze(this.contributions(vector, multiplier)),
      reasoning_summary: this.reasoning(score, classification.stage, vector, conversation.messages.length),
      requires_human_review: requiresHumanReview(score, classification.stage, confidence),
      model_version: this.modelVersion,
      assessed_at_utc: this.now().toISOString()
    };

    return { assessment: Object.freeze(assessment), features };
  }

  baseRisk(features: FeatureVector): number {
    let weighted = FEATURE_ORDER.reduce(
      (sum, name) => sum + features[name] * this.featureWeights[name],
      0
    );

    const elevated = SYNERGY_FEATURES.filter(
      (name) => features[name] > SynergyRule.featureThreshold
    ).length;
    if (elevated >= SynergyRule.minimumCount) {
      weighted = Math.min(weighted + SynergyRule.boostPerExtraFeature * (elevated - 1), 1);
    }

    return clamp(weighted, 0, 1);
  }

  private contributions(features: FeatureVector, multiplier: number): FeatureContribution[] {
    // Array#sort is stable, so equal contributions keep declared feature order.
    return FEATURE_ORDER.map((name) => ({
      feature_name: name,
      value: roundTo(features[name], OUTPUT_DECIMALS),
      contribution_weight: roundTo(
        features[name] * this.featureWeights[name] * multiplier,
        OUTPUT_DECIMALS
      ),
      description: FEATURE_DESCRIPTIONS[name]
    })).sort((a, b) => b.contribution_weight - a.contribution_weight);
  }

  private reasoning(
    score: number,
    stage: GroomingStage,
    features: FeatureVector,
    messageCount: number
  ): string {
    const primaryFactors = [...FEATURE_ORDER]
      .sort((a, b) => features[b] - features[a])
      .slice(0, PRIMARY_FACTOR_COUNT)
      .filter((name) => features[name] > PRIMARY_FACTOR_MIN_VALUE)
      .map((name) => `${FEATURE_LABELS[name]} (${features[name].toFixed(2)})`);

    const parts = [
      `Risk Score: ${score.toFixed(1)}/100`,
      `Classification: ${stageTitle(stage)}`,
      describeStage(stage),
      `Message Count: ${messageCount}`
    ];
    if (primaryFactors.length > 0) {
      parts.push(`Primary Risk Factors: ${primaryFactors.join(", ")}`);
    }
    return parts.join(" | ");
  }
}
