import { SenderRoles } from "../conversation/constants.js";
import { sortMessagesByTime, timestampMs } from "../conversation/schema.js";
import type { Conversation, Message } from "../conversation/types.js";
import { clamp, mean } from "../../shared/math.js";
import {
  DEFAULT_FEATURE_VERSION,
  FEATURE_ORDER,
  FeatureNames,
  KEYWORD_FEATURE_DIVISORS,
  TimeOfDayWindows,
  type FeatureName,
  type KeywordFeature
} from "./constants.js";
import { loadDefaultKeywordTable, type KeywordTable } from "./keyword-table.js";
import type { BehavioralFeatures, FeatureVector } from "./types.js";

export interface FeatureExtractorOptions {
  keywordTable?: KeywordTable;
  featureVersion?: string;
  now?: () => Date;
}

const HOUR_MS = 3_600_000;
const MIN_HALF_DURATION_HOURS = 0.1;
const MIN_FIRST_HALF_DENSITY = 0.01;
const MIN_SECOND_HALF_DENSITY = 0.1;
const MAX_DENSITY_RATIO = 3;
const PERSISTENCE_SATURATION_RUN = 5;
const TONE_SHIFT_SATURATION = 0.5;

function adultMessages(messages: readonly Message[]): Message[] {
  return messages.filter((message) => message.sender_role === SenderRoles.ADULT);
}

function spanHours(messages: readonly Message[]): number {
  const first = messages[0];
  const last = messages[messages.length - 1];
  if (!first || !last) {
    return 0;
  }
  return (timestampMs(last) - timestampMs(first)) / HOUR_MS;
}

function textLength(text: string): number {
  return Array.from(text).length;
}

export function zeroFeatureVector(): FeatureVector {
  return {
    contact_frequency_score: 0,
    persistence_after_nonresponse: 0,
    time_of_day_irregularity: 0,
    emotional_dependency_indicators: 0,
    isolation_pressure: 0,
    secrecy_pressure: 0,
    platform_migration_attempts: 0,
    tone_shift_score: 0
  };
}

export function mapFeatures(valueOf: (name: FeatureName) => number): FeatureVector {
  return {
    contact_frequency_score: valueOf(FeatureNames.CONTACT_FREQUENCY),
    persistence_after_nonresponse: valueOf(FeatureNames.PERSISTENCE),
    time_of_day_irregularity: valueOf(FeatureNames.TIME_OF_DAY),
    emotional_dependency_indicators: valueOf(FeatureNames.EMOTIONAL_DEPENDENCY),
    isolation_pressure: valueOf(FeatureNames.ISOLATION),
    secrecy_pressure: valueOf(FeatureNames.SECRECY),
    platform_migration_attempts: valueOf(FeatureNames.PLATFORM_MIGRATION),
    tone_shift_score: valueOf(FeatureNames.TONE_SHIFT)
  };
}

export function toFeatureVector(features: BehavioralFeatures): FeatureVector {
  return mapFeatures((name) => features[name]);
}

export function featureValues(vector: FeatureVector): number[] {
  return FEATURE_ORDER.map((name) => vector[name]);
}

/**
 * Compares adult message density in the chronological second half against the first.
 * Expects messages sorted by time.
 */
export function contactFrequencyScore(sorted: readonly Message[]): number {
  if (sorted.length < 3) {
    return 0;
  }
  const adults = adultMessages(sorted);
  if (adults.length < 3) {
    return 0;
  }

  const midpoint = Math.floor(adults.length / 2);
  const firstHalf = adults.slice(0, midpoint);
  const secondHalf = adults.slice(midpoint);

  const firstDuration = spanHours(firstHalf);
  const secondDuration = spanHours(secondHalf);
  if (firstDuration < MIN_HALF_DURATION_HOURS || secondDuration < MIN_HALF_DURATION_HOURS) {
    return 0;
  }

  const firstDensity = firstHalf.length / firstDuration;
  const secondDensity = secondHalf.length / secondDuration;

  if (firstDensity < MIN_FIRST_HALF_DENSITY) {
    return secondDensity > MIN_SECOND_HALF_DENSITY ? 1 : 0;
  }
  const escalation = Math.min(secondDensity / firstDensity, MAX_DENSITY_RATIO) / MAX_DENSITY_RATIO;
  return clamp(escalation, 0, 1);
}

/**
 * Runs of adult messages that no minor message interrupts. Messages from an
 * unknown sender neither extend nor end a run.
 */
export function persistenceScore(sorted: readonly Message[]): number {
  if (sorted.length < 3) {
    return 0;
  }

  const runs: number[] = [];
  let current = 0;
  for (const message of sorted) {
    if (message.sender_role === SenderRoles.ADULT) {
      current += 1;
    } else if (message.sender_role === SenderRoles.MINOR) {
      if (current > 0) {
        runs.push(current);
      }
      current = 0;
    }
  }
  if (current > 0) {
    runs.push(current);
  }

  if (runs.length === 0) {
    return 0;
  }

  const longest = Math.max(...runs);
  return clamp((longest * 0.5 + mean(runs) * 0.5) / PERSISTENCE_SATURATION_RUN, 0, 1);
}

export function timeOfDayIrregularityScore(messages: readonly Message[]): number {
  const adults = adultMessages(messages);
  if (adults.length === 0) {
    return 0;
  }

  let irregular = 0;
  let highlyIrregular = 0;
  for (const message of adults) {
    const hour = new Date(timestampMs(message)).getUTCHours();
    if (hour >= TimeOfDayWindows.lateNightStartHour || hour < TimeOfDayWindows.earlyMorningEndHour) {
      highlyIrregular += 1;
      irregular += 1;
    } else if (hour < TimeOfDayWindows.normalStartHour || hour >= TimeOfDayWindows.normalEndHour) {
      irregular += 1;
    }
  }

  const irregularRatio = irregular / adults.length;
  const highlyIrregularRatio = highlyIrregular / adults.length;
  return clamp(irregularRatio * 0.5 + highlyIrregularRatio * 0.5, 0, 1);
}

export function keywordFeatureScore(
  messages: readonly Message[],
  feature: KeywordFeature,
  table: KeywordTable
): number {
  const adults = adultMessages(messages);
  if (adults.length === 0) {
    return 0;
  }

  const hits = adults.filter((message) => table.matches(feature, message.abstracted_text)).length;
  const normalizer = Math.max(adults.length * KEYWORD_FEATURE_DIVISORS[feature], 1);
  return clamp(hits / normalizer, 0, 1);
}

/**
 * Relative change in mean adult message length between the two chronological halves.
 * Expects messages sorted by time.
 */
export function toneShiftScore(sorted: readonly Message[]): number {
  const adults = adultMessages(sorted);
  if (adults.length < 4) {
    return 0;
  }

  const midpoint = Math.floor(adults.length / 2);
  const earlyAverage = mean(adults.slice(0, midpoint).map((message) => textLength(message.abstracted_text)));
  const lateAverage = mean(adults.slice(midpoint).map((message) => textLength(message.abstracted_text)));
  if (earlyAverage <= 0) {
    return 0;
  }

  const shift = Math.abs(lateAverage - earlyAverage) / earlyAverage;
  return clamp(shift / TONE_SHIFT_SATURATION, 0, 1);
}

export class BehavioralFeatureExtractor {
  readonly featureVersion: string;

  private readonly keywordTable: KeywordTable;
  private readonly now: () => Date;

  constructor(options: FeatureExtractorOptions = {}) {
    this.keywordTable = options.keywordTable ?? loadDefaultKeywordTable();
    this.featureVersion = options.featureVersion?.trim() || DEFAULT_FEATURE_VERSION;
    this.now = options.now ?? (() => new Date());
  }

  extractVector(conversation: Conversation): FeatureVector {
    if (conversation.messages.length < 2) {
      return zeroFeatureVector();
    }

    const sorted = sortMessagesByTime(conversation.messages);
    const keyword = (feature: KeywordFeature): number =>
      keywordFeatureScore(sorted, feature, this.keywordTable);

    return {
      contact_frequency_score: contactFrequencyScore(sorted),
      persistence_after_nonresponse: persistenceScore(sorted),
      time_of_day_irregularity: timeOfDayIrregularityScore(sorted),
      emotional_dependency_indicators: keyword(FeatureNames.EMOTIONAL_DEPENDENCY),
      isolation_pressure: keyword(FeatureNames.ISOLATION),
      secrecy_pressure: keyword(FeatureNames.SECRECY),
      platform_migration_attempts: keyword(FeatureNames.PLATFORM_MIGRATION),
      tone_shift_score: toneShiftScore(sorted)
    };
  }

  extract(conversation: Conversation): BehavioralFeatures {
    const vector = this.extractVector(conversation);

    return {
      conversation_id: conversation.conversation_id,
      ...mapFeatures((name) => clamp(vector[name], 0, 1)),
      feature_version: this.featureVersion,
      extracted_at_utc: this.now().toISOString()
    };
  }
}
