import type { FeatureName } from "./constants.js";

export interface BehavioralFeatures {
  conversation_id: string;
  contact_frequency_score: number;
  persistence_after_nonresponse: number;
  time_of_day_irregularity: number;
  emotional_dependency_indicators: number;
  isolation_pressure: number;
  secrecy_pressure: number;
  platform_migration_attempts: number;
  tone_shift_score: number;
  feature_version: string;
  extracted_at_utc: string;
}

export type FeatureVector = Readonly<Record<FeatureName, number>>;
