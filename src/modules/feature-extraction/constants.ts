export const FeatureNames = Object.freeze({
  CONTACT_FREQUENCY: "contact_frequency_score",
  PERSISTENCE: "persistence_after_nonresponse",
  TIME_OF_DAY: "time_of_day_irregularity",
  EMOTIONAL_DEPENDENCY: "emotional_dependency_indicators",
  ISOLATION: "isolation_pressure",
  SECRECY: "secrecy_pressure",
  PLATFORM_MIGRATION: "platform_migration_attempts",
  TONE_SHIFT: "tone_shift_score"
});

export type FeatureName = (typeof FeatureNames)[keyof typeof FeatureNames];

/** Declared order; used for vectors, tie-breaks and stable output ordering. */
export const FEATURE_ORDER: readonly FeatureName[] = Object.freeze([
  FeatureNames.CONTACT_FREQUENCY,
  FeatureNames.PERSISTENCE,
  FeatureNames.TIME_OF_DAY,
  FeatureNames.EMOTIONAL_DEPENDENCY,
  FeatureNames.ISOLATION,
  FeatureNames.SECRECY,
  FeatureNames.PLATFORM_MIGRATION,
  FeatureNames.TONE_SHIFT
]);

export const KEYWORD_FEATURES = Object.freeze([
  FeatureNames.EMOTIONAL_DEPENDENCY,
  FeatureNames.ISOLATION,
  FeatureNames.SECRECY,
  FeatureNames.PLATFORM_MIGRATION
] as const);

export type KeywordFeature = (typeof KEYWORD_FEATURES)[number];

export const VALID_KEYWORD_FEATURES: ReadonlySet<string> = new Set<string>(KEYWORD_FEATURES);

export const KEYWORD_FEATURE_DIVISORS: Readonly<Record<KeywordFeature, number>> = Object.freeze({
  emotional_dependency_indicators: 0.3,
  isolation_pressure: 0.2,
  secrecy_pressure: 0.15,
  platform_migration_attempts: 0.15
});

export const FEATURE_DESCRIPTIONS: Readonly<Record<FeatureName, string>> = Object.freeze({
  contact_frequency_score: "Escalation in contact frequency over time",
  persistence_after_nonresponse: "Continued messaging despite non-response",
  time_of_day_irregularity: "Messaging at unusual hours",
  emotional_dependency_indicators: "Patterns suggesting emotional manipulation",
  isolation_pressure: "Attempts to isolate target from others",
  secrecy_pressure: "Requests for secrecy or privacy",
  platform_migration_attempts: "Attempts to move conversation to other platforms",
  tone_shift_score: "Changes in linguistic tone over time"
});

export const DEFAULT_FEATURE_VERSION = "1.0.0";

export const TimeOfDayWindows = Object.freeze({
  normalStartHour: 9,
  normalEndHour: 21,
  lateNightStartHour: 23,
  earlyMorningEndHour: 6
});

/** Reader-facing names used in reasoning text and flagging reasons. */
export const FEATURE_LABELS: Readonly<Record<FeatureName, string>> = Object.freeze({
  contact_frequency_score: "Contact frequency escalation",
  persistence_after_nonresponse: "Persistence after non-response",
  time_of_day_irregularity: "Unusual messaging hours",
  emotional_dependency_indicators: "Emotional dependency patterns",
  isolation_pressure: "Isolation pressure",
  secrecy_pressure: "Secrecy requests",
  platform_migration_attempts: "Platform migration attempts",
  tone_shift_score: "Tone shifts"
});
