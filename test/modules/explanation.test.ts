import assert from "node:assert/strict";
import test from "node:test";

import { formatAuditReport } from "../../src/modules/explanation/audit-report.js";
import {
  ExplanationBuilder,
  LIMITATIONS,
  interpretFeaturePattern,
  progressionRate,
  riskTrajectory
} from "../../src/modules/explanation/builder.js";
import type { FeatureContribution } from "../../src/modules/risk-engine/types.js";
import { RiskSynthesizer } from "../../src/modules/risk-engine/synthesizer.js";
import {
  BENIGN_MESSAGES,
  HIGH_RISK_MESSAGES,
  buildConversation,
  fixedClock,
  type MessageInput
} from "../helpers/conversations.js";

function explainConversation(id: string, messages: readonly MessageInput[]) {
  const conversation = buildConversation(id, messages);
  const synthesizer = new RiskSynthesizer({ now: fixedClock(), idFactory: () => `assessment-${id}` });
  const { assessment, features } = synthesizer.assess(conversation);
  const explanation = new ExplanationBuilder().explain(assessment, features, conversation);
  return { assessment, explanation };
}

function contribution(
  featureName: FeatureContribution["feature_name"],
  weight: number
): FeatureContribution {
  return {
    feature_name: featureName,
    value: 1,
    contribution_weight: weight,
    description: "test"
  };
}

test("explains a critical isolation-stage assessment", () => {
  const { explanation } = explainConversation("conv-risk", HIGH_RISK_MESSAGES);

  assert.equal(
    explanation.summary,
    "Risk assessment classified as CRITICAL with score 95.0/100 (confidence: 0.71); " +
      "conversation stage Isolation Attempts, human review IS REQUIRED."
  );
  assert.deepEqual(explanation.flagging_rationale, {
    flagged: true,
    primary_reasons: [
      "High risk score (95.0/100) exceeds safety threshold",
      "Advanced grooming stage detected: Isolation Attempts",
      "High-risk behavioral patterns: Persistence after non-response (0.73), " +
        "Unusual messaging hours (1.00), Emotional dependency patterns (1.00), " +
        "Isolation pressure (1.00), Secrecy requests (1.00), Platform migration attempts (0.95)"
    ],
    risk_level: "critical",
    requires_action: true
  });
  assert.deepEqual(explanation.feature_analysis.feature_count, { high: 3, moderate: 3, low: 2 });
  assert.deepEqual(
    explanation.feature_analysis.top_contributors.map((item) => item.feature),
    ["emotional_dependency_indicators", "isolation_pressure", "secrecy_pressure"]
  );
  assert.deepEqual(
    explanation.feature_analysis.moderate_contributors.map((item) => item.feature),
    ["persistence_after_nonresponse", "time_of_day_irregularity", "platform_migration_attempts"]
  );
  assert.equal(
    explanation.feature_analysis.interpretation,
    "Pattern suggests emotional manipulation with isolation tactics"
  );
  assert.deepEqual(explanation.stage_analysis, {
    current_stage: "Isolation Attempts",
    stage_confidence: 1,
    severity: "critical",
    typical_duration: "variable",
    potential_next_stage: "Escalation Risk",
    warning_signs: ["Off-platform contact", "Meeting requests"],
    recommended_actions: [
      "Urgent human review required",
      "Consider immediate safety interventions",
      "Alert platform safety team",
      "Document evidence for potential investigation"
    ]
  });
  assert.deepEqual(explanation.risk_evolution, {
    conversation_duration_hours: 4,
    message_count: 9,
    progression_rate: "rapid (less than 24 hours)",
    risk_trajectory: "critical escalation",
    timeline_summary:
      "Conversation spanned 4.0 hours with 9 messages, reaching isolation attempts stage"
  });
  assert.equal(explanation.confidence_analysis.confidence_label, "high");
  assert.deepEqual(explanation.confidence_analysis.factors, []);
  assert.deepEqual(explanation.recommendations, [
    "URGENT: Immediate human review required",
    "Escalate to platform safety team",
    "Consider emergency intervention protocols",
    "Preserve all evidence for potential investigation",
    "Activate victim support resources",
    "Alert platform safety team",
    "Document evidence for investigation"
  ]);
  assert.deepEqual(explanation.limitations, [...LIMITATIONS]);
});

test("explains a minimal assessment with the monitoring default", () => {
  const { explanation } = explainConversation("conv-benign", BENIGN_MESSAGES);

  assert.equal(
    explanation.summary,
    "Risk assessment classified as MINIMAL with score 1.0/100 (confidence: 0.80); " +
      "conversation stage Initial Contact, human review not required."
  );
  assert.equal(explanation.flagging_rationale.flagged, false);
  assert.deepEqual(explanation.flagging_rationale.primary_reasons, [
    "Moderate behavioral signals warrant monitoring"
  ]);
  assert.deepEqual(explanation.feature_analysis.feature_count, { high: 0, moderate: 0, low: 8 });
  assert.equal(
    explanation.feature_analysis.interpretation,
    "No significant behavioral patterns detected"
  );
  assert.deepEqual(explanation.recommendations, [
    "Continue baseline monitoring",
    "Track for pattern changes"
  ]);
  assert.equal(explanation.risk_evolution.conversation_duration_hours, 5.5);
});

test("explanations are deterministic for the same inputs", () => {
  const first = explainConversation("conv-risk", HIGH_RISK_MESSAGES);
  const second = explainConversation("conv-risk", HIGH_RISK_MESSAGES);

  assert.deepEqual(first.explanation, second.explanation);
});

test("pattern interpretation takes the first matching rule", () => {
  assert.equal(
    interpretFeaturePattern([
      contribution("platform_migration_attempts", 0.2),
      contribution("secrecy_pressure", 0.15),
      contribution("emotional_dependency_indicators", 0.12)
    ]),
    "Pattern suggests emotional manipulation strategy"
  );
  assert.equal(
    interpretFeaturePattern([
      contribution("platform_migration_attempts", 0.2),
      contribution("secrecy_pressure", 0.15)
    ]),
    "Pattern suggests attempt to move conversation to private channels"
  );
  assert.equal(
    interpretFeaturePattern([contribution("time_of_day_irregularity", 0.2)]),
    "Multiple behavioral risk indicators detected"
  );
});

test("progression rate and trajectory bands", () => {
  assert.deepEqual(
    [0, 12, 24, 167.9, 168].map(progressionRate),
    [
      "unknown",
      "rapid (less than 24 hours)",
      "moderate (days)",
      "moderate (days)",
      "gradual (weeks or more)"
    ]
  );
  assert.deepEqual(
    [29.9, 30, 60, 80].map(riskTrajectory),
    [
      "stable at low risk",
      "increasing to moderate risk",
      "escalating to high risk",
      "critical escalation"
    ]
  );
});

test("formats a plain-text audit report", () => {
  const { assessment, explanation } = explainConversation("conv-risk", HIGH_RISK_MESSAGES);
  const lines = formatAuditReport(assessment, explanation).split("\n");
  const rule = "=".repeat(80);

  assert.deepEqual(lines.slice(0, 8), [
    rule,
    "RISK ASSESSMENT AUDIT REPORT",
    rule,
    "",
    "Assessment ID: assessment-conv-risk",
    "Conversation ID: conv-risk",
    "Timestamp: 2024-03-07T08:00:00.000Z",
    "Model Version: 1.0.0"
  ]);

  const metrics = lines.indexOf("RISK METRICS");
  assert.deepEqual(lines.slice(metrics + 2, metrics + 7), [
    "Risk Score: 95.00/100",
    "Risk Level: CRITICAL",
    "Confidence: 0.71",
    "Stage: Isolation Attempts",
    "Stage Confidence: 1.00"
  ]);

  const contributors = lines.indexOf("TOP CONTRIBUTING FEATURES");
  assert.deepEqual(lines.slice(contributors + 2, contributors + 4), [
    "- emotional_dependency_indicators: 1.000 (contribution: 0.209)",
    "  Patterns suggesting emotional manipulation"
  ]);

  assert.deepEqual(lines.slice(-3), [rule, "END OF REPORT", rule]);
  assert.equal(
    lines.some((line) => line.includes("our secret")),
    false
  );
});
