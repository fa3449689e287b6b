import { stageTitle } from "../progression/stage-profiles.js";
import type { RiskAssessment } from "../risk-engine/types.js";
import type { AssessmentExplanation } from "./types.js";

const RULE_WIDTH = 80;

function section(title: string, lines: readonly string[]): string[] {
  return ["", "-".repeat(RULE_WIDTH), title, "-".repeat(RULE_WIDTH), ...lines];
}

function bullets(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`);
}

/** Plain-text report for compliance archives. Contains no message text. */
export function formatAuditReport(
  assessment: RiskAssessment,
  explanation: AssessmentExplanation
): string {
  const heavyRule = "=".repeat(RULE_WIDTH);

  const contributorLines = explanation.feature_analysis.top_contributors.flatMap((item) => [
    `- ${item.feature}: ${item.value.toFixed(3)} (contribution: ${item.contribution.toFixed(3)})`,
    `  ${item.description}`
  ]);

  return [
    heavyRule,
    "RISK ASSESSMENT AUDIT REPORT",
    heavyRule,
    "",
    `Assessment ID: ${assessment.assessment_id}`,
    `Conversation ID: ${assessment.conversation_id}`,
    `Timestamp: ${assessment.assessed_at_utc}`,
    `Model Version: ${assessment.model_version}`,
    ...section("SUMMARY", [explanation.summary]),
    ...section("RISK METRICS", [
      `Risk Score: ${assessment.grooming_risk_score.toFixed(2)}/100`,
      `Risk Level: ${assessment.risk_level.toUpperCase()}`,
      `Confidence: ${assessment.confidence_level.toFixed(2)}`,
      `Stage: ${stageTitle(assessment.current_stage)}`,
      `Stage Confidence: ${assessment.stage_confidence.toFixed(2)}`
    ]),
    ...section("PRIMARY RISK FACTORS", bullets(explanation.flagging_rationale.primary_reasons)),
    ...section("TOP CONTRIBUTING FEATURES", contributorLines),
    ...section("RECOMMENDATIONS", bullets(explanation.recommendations)),
    ...section("LIMITATIONS", bullets(explanation.limitations)),
    "",
    heavyRule,
    "END OF REPORT",
    heavyRule
  ].join("\n");
}
