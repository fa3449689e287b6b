import { GroomingStages, type GroomingStage } from "./constants.js";
import type { StageProfile } from "./types.js";

function assertNever(value: never): never {
  throw new Error(`Unhandled grooming stage: ${String(value)}`);
}

/** "isolation_attempts" -> "Isolation Attempts" */
export function stageTitle(stage: GroomingStage): string {
  return stage
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function describeStage(stage: GroomingStage): string {
  switch (stage) {
    case GroomingStages.INITIAL_CONTACT:
      return "Initial contact phase with minimal behavioral signals. Conversation appears exploratory with low risk indicators.";
    case GroomingStages.TRUST_BUILDING:
      return "Trust building phase characterized by increasing contact frequency and developing rapport. Moderate behavioral signals present.";
    case GroomingStages.EMOTIONAL_DEPENDENCY:
      return "Emotional dependency phase with patterns suggesting emotional manipulation or dependency building. Elevated risk indicators.";
    case GroomingStages.ISOLATION_ATTEMPTS:
      return "Isolation attempt phase showing secrecy pressure, isolation tactics, or platform migration attempts. High risk indicators present.";
    case GroomingStages.ESCALATION_RISK:
      return "Escalation risk phase with multiple high-risk behavioral signals. Urgent patterns detected requiring immediate review.";
    case GroomingStages.UNKNOWN:
      return "Unable to classify stage due to insufficient data or ambiguous patterns.";
    default:
      return assertNever(stage);
  }
}

export function stageProfile(stage: GroomingStage): StageProfile {
  switch (stage) {
    case GroomingStages.INITIAL_CONTACT:
      return {
        severity: "low",
        typical_duration: "days to weeks",
        next_stage: "Trust Building",
        warning_signs: ["Increasing contact frequency", "Personal questions"]
      };
    case GroomingStages.TRUST_BUILDING:
      return {
        severity: "moderate",
        typical_duration: "weeks to months",
        next_stage: "Emotional Dependency",
        warning_signs: ["Emotional manipulation", "Isolation attempts"]
      };
    case GroomingStages.EMOTIONAL_DEPENDENCY:
      return {
        severity: "high",
        typical_duration: "variable",
        next_stage: "Isolation Attempts",
        warning_signs: ["Secrecy requests", "Platform migration"]
      };
    case GroomingStages.ISOLATION_ATTEMPTS:
      return {
        severity: "critical",
        typical_duration: "variable",
        next_stage: "Escalation Risk",
        warning_signs: ["Off-platform contact", "Meeting requests"]
      };
    case GroomingStages.ESCALATION_RISK:
      return {
        severity: "critical",
        typical_duration: "immediate",
        next_stage: "None (intervention required)",
        warning_signs: ["All escalation indicators"]
      };
    case GroomingStages.UNKNOWN:
      return {
        severity: "unknown",
        typical_duration: "unknown",
        next_stage: "unknown",
        warning_signs: []
      };
    default:
      return assertNever(stage);
  }
}

/** Actions for a reviewer once a conversation is classified at `stage`. */
export function stageRecommendations(stage: GroomingStage): string[] {
  switch (stage) {
    case GroomingStages.INITIAL_CONTACT:
      return [
        "Continue monitoring conversation patterns",
        "Establish baseline behavioral metrics",
        "No immediate intervention required"
      ];
    case GroomingStages.TRUST_BUILDING:
      return [
        "Increased monitoring recommended",
        "Track feature progression over time",
        "Consider educational interventions for potential victim"
      ];
    case GroomingStages.EMOTIONAL_DEPENDENCY:
      return [
        "High-priority monitoring required",
        "Human review recommended within 24 hours",
        "Consider platform-level safety interventions",
        "Prepare support resources for potential victim"
      ];
    case GroomingStages.ISOLATION_ATTEMPTS:
      return [
        "Urgent human review required",
        "Consider immediate safety interventions",
        "Alert platform safety team",
        "Document evidence for potential investigation"
      ];
    case GroomingStages.ESCALATION_RISK:
      return [
        "CRITICAL: Immediate human review required",
        "Escalate to platform safety team immediately",
        "Consider emergency intervention protocols",
        "Preserve all evidence for law enforcement",
        "Activate victim support resources"
      ];
    case GroomingStages.UNKNOWN:
      return [
        "Gather additional data for classification",
        "Manual review may be required",
        "Continue baseline monitoring"
      ];
    default:
      return assertNever(stage);
  }
}
