import { roundTo } from "../../shared/math.js";
import { conversationDurationHours } from "../conversation/schema.js";
import type { Conversation } from "../conversation/types.js";
import {
  FEATURE_LABELS,
  FEATURE_ORDER,
  FeatureNames,
  type FeatureName
} from "../feature-extraction/constants.js";
import type { BehavioralFeatures } from "../feature-extraction/types.js";
import { GroomingStages } from "../progression/constants.js";
import { stageProfile, stageRecommendations, stageTitle } from "../progression/stage-profiles.js";
import type { FeatureContribution, RiskAssessment } from "../risk-engine/types.js";
import type {
  AssessmentExplanation,
  ConfidenceAnalysis,
  FeatureAnalysis,
  FlaggingRationale,
  ProgressionRate,
  RiskEvolution,
  StageAnalysis
} from "./types.js";

const HIGH_CONTRIBUTION = 0.1;
const MODERATE_CONTRIBUTION = 0.05;
const MAX_TOP_CONTRIBUTORS = 5;
const FLAGGED_SCORE = 40;
const HIGH_SCORE_REASON = 60;
const HIGH_FEATURE_VALUE = 0.6;

export const LIMITATIONS: readonly string[] = Object.freeze([
  "This is a risk signaling system, not a criminal accusation tool",
  "False positives are possible; human review is essential",
  "System analyzes behavioral patterns, not content semantics",
  "Effectiveness depends on data quality and completeness",
  "Cultural and contextual factors may not be fully captured",
  "System is designed as one component of comprehensive safety measures",
  "Regular model updates and validation are required for accuracy"
]);

interface PatternRule {
  all: readonly FeatureName[];
  interpretation: string;
}

// First matching row wins.
const PATTERN_RULES: readonly PatternRule[] = [
  {
    all: [FeatureNames.EMOTIONAL_DEPENDENCY, FeatureNames.ISOLATION],
    interpretation: "Pattern suggests emotional manipulation with isolation tactics"
  },
  {
    all: [FeatureNames.EMOTIONAL_DEPENDENCY],
    interpretation: "Pattern suggests emotional manipulation strategy"
  },
  {
    all: [FeatureNames.PLATFORM_MIGRATION, FeatureNames.SECRECY],
    interpretation: "Pattern suggests attempt to move conversation to private channels"
  },
  {
    all: [FeatureNames.CONTACT_FREQUENCY, FeatureNames.PERSISTENCE],
    interpretation: "Pattern suggests escalating and persistent contact behavior"
  }
];

export function interpretFeaturePattern(highContributors: readonly FeatureContribution[]): string {
  if (highContributors.length === 0) {
    return "No significant behavioral patterns detected";
  }
  const present = new Set(highContributors.map((contribution) => contribution.feature_name));
  const rule = PATTERN_RULES.find((candidate) => candidate.all.every((name) => present.has(name)));
  return rule?.interpretation ?? "Multiple behavioral risk indicators detected";
}

export function progressionRate(durationHours: number): ProgressionRate {
  if (durationHours <= 0) {
    return "unknown";
  }
  if (durationHours < 24) {
    return "rapid (less than 24 hours)";
  }
  if (durationHours < 168) {
    return "moderate (days)";
  }
  return "gradual (weeks or more)";
}

export function riskTrajectory(score: number): string {
  if (score < 30) {
    return "stable at low risk";
  }
  if (score < 60) {
    return "increasing to moderate risk";
  }
  if (score < 80) {
    return "escalating to high risk";
  }
  return "critical escalation";
}

export function scoreRecommendations(assessment: RiskAssessment): string[] {
  const score = assessment.grooming_risk_score;
  const recommendations: string[] = [];

  if (score >= 80) {
    recommendations.push(
      "URGENT: Immediate human review required",
      "Escalate to platform safety team",
      "Consider emergency intervention protocols",
      "Preserve all evidence for potential investigation",
      "Activate victim support resources"
    );
  } else if (score >= 60) {
    recommendations.push(
      "High-priority human review required within 24 hours",
      "Consider platform-level safety interventions",
      "Monitor for escalation patterns",
      "Prepare support resources"
    );
  } else if (score >= 40) {
    recommendations.push(
      "Increased monitoring recommended",
      "Track feature progression over time",
      "Consider educational interventions"
    );
  } else {
    recommendations.push("Continue baseline monitoring", "Track for pattern changes");
  }

  if (assessment.current_stage === GroomingStages.ESCALATION_RISK) {
    recommendations.push("CRITICAL: Immediate action required");
  } else if (assessment.current_stage === GroomingStages.ISOLATION_ATTEMPTS) {
    recommendations.push("Alert platform safety team", "Document evidence for investigation");
  }

  return recommendations;
}

/**
 * Turns a finished assessment into reviewer-facing rationale. Pure: the same
 * inputs always give the same explanation.
 */
export class ExplanationBuilder {
  explain(
    assessment: RiskAssessment,
    features: BehavioralFeatures,
    conversation: Conversation
  ): AssessmentExplanation {
    return {
      assessment_id: assessment.assessment_id,
      conversation_id: assessment.conversation_id,
      assessed_at_utc: assessment.assessed_at_utc,
      model_version: assessment.model_version,
      summary: this.summary(assessment),
      flagging_rationale: this.flaggingRationale(assessment, features),
      feature_analysis: this.featureAnalysis(assessment.feature_contributions),
      stage_analysis: this.stageAnalysis(assessment),
      risk_evolution: this.riskEvolution(assessment, conversation),
      confidence_analysis: this.confidenceAnalysis(assessment, conversation),
      recommendations: scoreRecommendations(assessment),
      limitations: [...LIMITATIONS]
    };
  }

  private summary(assessment: RiskAssessment): string {
    const review = assessment.requires_human_review ? "IS REQUIRED" : "not required";
    return (
      `Risk assessment classified as ${assessment.risk_level.toUpperCase()} ` +
      `with score ${assessment.grooming_risk_score.toFixed(1)}/100 ` +
      `(confidence: ${assessment.confidence_level.toFixed(2)}); ` +
      `conversation stage ${stageTitle(assessment.current_stage)}, ` +
      `human review ${review}.`
    );
  }

  private flaggingRationale(
    assessment: RiskAssessment,
    features: BehavioralFeatures
  ): FlaggingRationale {
    const reasons: string[] = [];

    if (assessment.grooming_risk_score > HIGH_SCORE_REASON) {
      reasons.push(
        `High risk score (${assessment.grooming_risk_score.toFixed(1)}/100) exceeds safety threshold`
      );
    }

    if (
      assessment.current_stage === GroomingStages.ISOLATION_ATTEMPTS ||
      assessment.current_stage === GroomingStages.ESCALATION_RISK
    ) {
      reasons.push(`Advanced grooming stage detected: ${stageTitle(assessment.current_stage)}`);
    }

    const highRisk = FEATURE_ORDER.filter((name) => features[name] > HIGH_FEATURE_VALUE).map(
      (name) => `${FEATURE_LABELS[name]} (${features[name].toFixed(2)})`
    );
    if (highRisk.length > 0) {
      reasons.push(`High-risk behavioral patterns: ${highRisk.join(", ")}`);
    }

    return {
      flagged: assessment.grooming_risk_score > FLAGGED_SCORE,
      primary_reasons:
        reasons.length > 0 ? reasons : ["Moderate behavioral signals warrant monitoring"],
      risk_level: assessment.risk_level,
      requires_action: assessment.requires_human_review
    };
  }

  private featureAnalysis(contributions: readonly FeatureContribution[]): FeatureAnalysis {
    const sorted = [...contributions].sort(
      (a, b) => b.contribution_weight - a.contribution_weight
    );
    const high = sorted.filter((item) => item.contribution_weight > HIGH_CONTRIBUTION);
    const moderate = sorted.filter(
      (item) =>
        item.contribution_weight > MODERATE_CONTRIBUTION &&
        item.contribution_weight <= HIGH_CONTRIBUTION
    );
    const low = sorted.filter((item) => item.contribution_weight <= MODERATE_CONTRIBUTION);

    return {
      top_contributors: high.slice(0, MAX_TOP_CONTRIBUTORS).map((item) => ({
        feature: item.feature_name,
        value: item.value,
        contribution: item.contribution_weight,
        description: item.description
      })),
      moderate_contributors: moderate.map((item) => ({
        feature: item.feature_name,
        value: item.value,
        contribution: item.contribution_weight
      })),
      feature_count: {
        high: high.length,
        moderate: moderate.length,
        low: low.length
      },
      interpretation: interpretFeaturePattern(high)
    };
  }

  private stageAnalysis(assessment: RiskAssessment): StageAnalysis {
    const profile = stageProfile(assessment.current_stage);
    return {
      current_stage: stageTitle(assessment.current_stage),
      stage_confidence: assessment.stage_confidence,
      severity: profile.severity,
      typical_duration: profile.typical_duration,
      potential_next_stage: profile.next_stage,
      warning_signs: [...profile.warning_signs],
      recommended_actions: stageRecommendations(assessment.current_stage)
    };
  }

  private riskEvolution(assessment: RiskAssessment, conversation: Conversation): RiskEvolution {
    const durationHours = conversationDurationHours(conversation.messages);
    const messageCount = conversation.messages.length;

    return {
      conversation_duration_hours: roundTo(durationHours, 2),
      message_count: messageCount,
      progression_rate: progressionRate(durationHours),
      risk_trajectory: riskTrajectory(assessment.grooming_risk_score),
      timeline_summary:
        `Conversation spanned ${durationHours.toFixed(1)} hours with ${messageCount} messages, ` +
        `reaching ${assessment.current_stage.replaceAll("_", " ")} stage`
    };
  }

  private confidenceAnalysis(
    assessment: RiskAssessment,
    conversation: Conversation
  ): ConfidenceAnalysis {
    const confidence = assessment.confidence_level;
    const messageCount = conversation.messages.length;
    const factors: string[] = [];

    if (messageCount < 5) {
      factors.push("Limited data (few messages)");
    } else if (messageCount > 20) {
      factors.push("Sufficient data (many messages)");
    }

    return {
      confidence_score: confidence,
      confidence_label: confidence > 0.7 ? "high" : confidence > 0.5 ? "moderate" : "low",
      factors,
      reliability:
        "High confidence assessments are more reliable for decision-making. " +
        "Low confidence assessments may require additional data or human review."
    };
  }
}
