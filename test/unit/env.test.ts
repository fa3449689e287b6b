import assert from "node:assert/strict";
import test from "node:test";

import { loadConfig } from "../../src/config/env.js";
import { ConfigurationError } from "../../src/shared/errors.js";

test("loads config with defaults", () => {
  const config = loadConfig({
    REDIS_URL: "redis://localhost:6379"
  });

  assert.equal(config.redisUrl, "redis://localhost:6379");
  assert.equal(config.redisStreamMaxLen, 100_000);
  assert.equal(config.redisDedupTtlSeconds, 604_800);
  assert.equal(config.redisConsumerBlockMs, 5_000);
  assert.equal(config.redisConsumerBatchSize, 50);
  assert.equal(config.redisMaxDeliveries, 5);
  assert.equal(config.assessmentConsumerGroup, "assessment-group");
  assert.equal(config.assessmentConsumerName, undefined);
  assert.equal(config.assessmentModelVersion, "1.0.0");
  assert.equal(config.featureVersion, "1.0.0");
  assert.equal(config.keywordTablePath, undefined);
  assert.equal(config.exposureMaxSessionMinutes, 120);
  assert.equal(config.exposureMaxCasesPerSession, 20);
  assert.equal(config.exposureMaxHighRiskPerSession, 5);
  assert.equal(config.exposureBreakMinutes, 15);
});

test("loads config with custom values", () => {
  const config = loadConfig({
    REDIS_URL: "  redis://localhost:6380  ",
    REDIS_STREAM_MAXLEN: "200000",
    REDIS_DEDUP_TTL_SECONDS: "86400",
    REDIS_CONSUMER_BLOCK_MS: "0",
    REDIS_CONSUMER_BATCH_SIZE: "20",
    REDIS_MAX_DELIVERIES: "8",
    ASSESSMENT_CONSUMER_GROUP: "assessment-group-a",
    ASSESSMENT_CONSUMER_NAME: "assessment-worker-1",
    ASSESSMENT_MODEL_VERSION: "2.0.0",
    FEATURE_VERSION: "2.1.0",
    KEYWORD_TABLE_PATH: "/etc/assessment/phrases.json",
    EXPOSURE_MAX_SESSION_MINUTES: "90.5",
    EXPOSURE_MAX_CASES_PER_SESSION: "12",
    EXPOSURE_MAX_HIGH_RISK_PER_SESSION: "3",
    EXPOSURE_BREAK_MINUTES: "30"
  });

  assert.equal(config.redisUrl, "redis://localhost:6380");
  assert.equal(config.redisStreamMaxLen, 200_000);
  assert.equal(config.redisDedupTtlSeconds, 86_400);
  assert.equal(config.redisConsumerBlockMs, 0);
  assert.equal(config.redisConsumerBatchSize, 20);
  assert.equal(config.redisMaxDeliveries, 8);
  assert.equal(config.assessmentConsumerGroup, "assessment-group-a");
  assert.equal(config.assessmentConsumerName, "assessment-worker-1");
  assert.equal(config.assessmentModelVersion, "2.0.0");
  assert.equal(config.featureVersion, "2.1.0");
  assert.equal(config.keywordTablePath, "/etc/assessment/phrases.json");
  assert.equal(config.exposureMaxSessionMinutes, 90.5);
  assert.equal(config.exposureMaxCasesPerSession, 12);
  assert.equal(config.exposureMaxHighRiskPerSession, 3);
  assert.equal(config.exposureBreakMinutes, 30);
});

test("blank optional strings fall back to defaults", () => {
  const config = loadConfig({
    REDIS_URL: "redis://localhost:6379",
    ASSESSMENT_CONSUMER_GROUP: "   ",
    KEYWORD_TABLE_PATH: ""
  });

  assert.equal(config.assessmentConsumerGroup, "assessment-group");
  assert.equal(config.keywordTablePath, undefined);
});

test("throws when REDIS_URL is missing or blank", () => {
  assert.throws(() => {
    loadConfig({});
  }, /REDIS_URL is required/);
  assert.throws(() => {
    loadConfig({ REDIS_URL: "   " });
  }, ConfigurationError);
});

test("throws on invalid numeric env values", () => {
  assert.throws(() => {
    loadConfig({
      REDIS_URL: "redis://localhost:6379",
      REDIS_STREAM_MAXLEN: "0"
    });
  }, /REDIS_STREAM_MAXLEN must be a positive integer/);

  assert.throws(() => {
    loadConfig({
      REDIS_URL: "redis://localhost:6379",
      REDIS_MAX_DELIVERIES: "1.5"
    });
  }, /REDIS_MAX_DELIVERIES must be a positive integer/);

  assert.throws(() => {
    loadConfig({
      REDIS_URL: "redis://localhost:6379",
      EXPOSURE_MAX_CASES_PER_SESSION: "abc"
    });
  }, /EXPOSURE_MAX_CASES_PER_SESSION must be a positive integer/);
});

test("throws on negative consumer block time", () => {
  assert.throws(() => {
    loadConfig({
      REDIS_URL: "redis://localhost:6379",
      REDIS_CONSUMER_BLOCK_MS: "-1"
    });
  }, /REDIS_CONSUMER_BLOCK_MS must be a non-negative integer/);
});

test("throws on non-positive exposure durations", () => {
  assert.throws(() => {
    loadConfig({
      REDIS_URL: "redis://localhost:6379",
      EXPOSURE_MAX_SESSION_MINUTES: "0"
    });
  }, /EXPOSURE_MAX_SESSION_MINUTES must be a positive number/);

  assert.throws(() => {
    loadConfig({
      REDIS_URL: "redis://localhost:6379",
      EXPOSURE_BREAK_MINUTES: "soon"
    });
  }, /EXPOSURE_BREAK_MINUTES must be a positive number/);
});
