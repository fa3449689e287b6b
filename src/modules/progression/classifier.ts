import { clamp, mean } from "../../shared/math.js";
import { featureValues } from "../feature-extraction/extractor.js";
import type { FeatureVector } from "../feature-extraction/types.js";
import {
  GroomingStages,
  ProgressionThresholds,
  SCORED_STAGE_ORDER,
  type ScoredStage
} from "./constants.js";
import type { StageClassification, StageScores } from "./types.js";

export function scoreInitialContact(features: FeatureVector): number {
  const average = mean(featureValues(features));
  if (average < ProgressionThresholds.initialContactMean) {
    return 1 - average / ProgressionThresholds.initialContactMean;
  }
  return 0;
}

export function scoreTrustBuilding(features: FeatureVector): number {
  const rapport =
    features.contact_frequency_score * 0.4 +
    features.emotional_dependency_indicators * 0.3 +
    features.tone_shift_score * 0.3;
  const pressure = (features.isolation_pressure + features.secrecy_pressure) / 2;
  const score = rapport * (1 - pressure * 0.5);

  // Peaks in the middle band; weak and saturated rapport both fall off.
  if (score > ProgressionThresholds.trustBandLow && score < ProgressionThresholds.trustBandHigh) {
    return score * 2;
  }
  return score * 0.5;
}

export function scoreEmotionalDependency(features: FeatureVector): number {
  return clamp(
    features.emotional_dependency_indicators * 0.5 +
      features.contact_frequency_score * 0.25 +
      features.persistence_after_nonresponse * 0.25,
    0,
    1
  );
}

export function scoreIsolationAttempts(features: FeatureVector): number {
  return clamp(
    features.isolation_pressure * 0.35 +
      features.secrecy_pressure * 0.35 +
      features.platform_migration_attempts * 0.3,
    0,
    1
  );
}

export function scoreEscalationRisk(features: FeatureVector): number {
  const values = featureValues(features);
  const highRiskCount = values.filter((value) => value > ProgressionThresholds.highRiskFeature).length;
  const elevated = values.filter((value) => value > ProgressionThresholds.elevatedFeature);

  return clamp((highRiskCount / values.length) * 0.5 + mean(elevated) * 0.5, 0, 1);
}

export function scoreStages(features: FeatureVector): StageScores {
  return {
    initial_contact: scoreInitialContact(features),
    trust_building: scoreTrustBuilding(features),
    emotional_dependency: scoreEmotionalDependency(features),
    isolation_attempts: scoreIsolationAttempts(features),
    escalation_risk: scoreEscalationRisk(features)
  };
}

export class ProgressionClassifier {
  classify(features: FeatureVector): StageClassification {
    const scores = scoreStages(features);

    let winner: ScoredStage = GroomingStages.INITIAL_CONTACT;
    for (const stage of SCORED_STAGE_ORDER) {
      if (scores[stage] > scores[winner]) {
        winner = stage;
      }
    }

    const winningScore = scores[winner];
    if (winningScore < ProgressionThresholds.minimumWinningScore) {
      return {
        stage: GroomingStages.INITIAL_CONTACT,
        confidence: ProgressionThresholds.fallbackConfidence,
        scores
      };
    }

    const ranked = SCORED_STAGE_ORDER.map((stage) => scores[stage]).sort((a, b) => b - a);
    const runnerUp = ranked[1] ?? 0;
    const margin = winningScore - runnerUp;
    const confidence = Math.max(
      Math.min(winningScore + margin * 0.5, 1),
      ProgressionThresholds.confidenceFloor
    );

    return {
      stage: winner,
      confidence: clamp(confidence, 0, 1),
      scores
    };
  }
}
