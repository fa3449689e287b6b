import { ConfigurationError } from "../shared/errors.js";

export interface AppConfig {
  redisUrl: string;
  redisStreamMaxLen: number;
  redisDedupTtlSeconds: number;
  redisConsumerBlockMs: number;
  redisConsumerBatchSize: number;
  redisMaxDeliveries: number;
  assessmentConsumerGroup: string;
  assessmentConsumerName: string | undefined;
  assessmentModelVersion: string;
  featureVersion: string;
  keywordTablePath: string | undefined;
  exposureMaxSessionMinutes: number;
  exposureMaxCasesPerSession: number;
  exposureMaxHighRiskPerSession: number;
  exposureBreakMinutes: number;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

type NumberKind = "positive integer" | "non-negative integer" | "positive number";

const ACCEPTS: Record<NumberKind, (value: number) => boolean> = {
  "positive integer": (value) => Number.isInteger(value) && value > 0,
  "non-negative integer": (value) => Number.isInteger(value) && value >= 0,
  "positive number": (value) => Number.isFinite(value) && value > 0
};

function readString(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(env: EnvSource, name: string, kind: NumberKind, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!ACCEPTS[kind](value)) {
    throw new ConfigurationError(`${name} must be a ${kind}`);
  }
  return value;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const redisUrl = readString(env, "REDIS_URL");
  if (!redisUrl) {
    throw new ConfigurationError("REDIS_URL is required");
  }

  return {
    redisUrl,
    redisStreamMaxLen: readNumber(env, "REDIS_STREAM_MAXLEN", "positive integer", 100_000),
    redisDedupTtlSeconds: readNumber(env, "REDIS_DEDUP_TTL_SECONDS", "positive integer", 604_800),
    redisConsumerBlockMs: readNumber(env, "REDIS_CONSUMER_BLOCK_MS", "non-negative integer", 5_000),
    redisConsumerBatchSize: readNumber(env, "REDIS_CONSUMER_BATCH_SIZE", "positive integer", 50),
    redisMaxDeliveries: readNumber(env, "REDIS_MAX_DELIVERIES", "positive integer", 5),
    assessmentConsumerGroup: readString(env, "ASSESSMENT_CONSUMER_GROUP") ?? "assessment-group",
    assessmentConsumerName: readString(env, "ASSESSMENT_CONSUMER_NAME"),
    assessmentModelVersion: readString(env, "ASSESSMENT_MODEL_VERSION") ?? "1.0.0",
    featureVersion: readString(env, "FEATURE_VERSION") ?? "1.0.0",
    keywordTablePath: readString(env, "KEYWORD_TABLE_PATH"),
    exposureMaxSessionMinutes: readNumber(env, "EXPOSURE_MAX_SESSION_MINUTES", "positive number", 120),
    exposureMaxCasesPerSession: readNumber(
      env,
      "EXPOSURE_MAX_CASES_PER_SESSION",
      "positive integer",
      20
    ),
    exposureMaxHighRiskPerSession: readNumber(
      env,
      "EXPOSURE_MAX_HIGH_RISK_PER_SESSION",
      "positive integer",
      5
    ),
    exposureBreakMinutes: readNumber(env, "EXPOSURE_BREAK_MINUTES", "positive number", 15)
  };
}
