import { loadConfig } from "../config/env.js";
import { RedisStreamEventBus } from "../infrastructure/event-bus/redis-stream-event-bus.js";
import { EventStreams } from "../infrastructure/event-bus/streams.js";
import { closeRedis, connectRedis, onShutdownSignal } from "../infrastructure/redis/client.js";
import { RedisPublishLedger } from "../modules/assessment/publish-ledger.js";
import { AssessmentService } from "../modules/assessment/service.js";
import { AssessmentWorker } from "../modules/assessment/worker.js";
import { BehavioralFeatureExtractor } from "../modules/feature-extraction/extractor.js";
import { KeywordTable, loadDefaultKeywordTable } from "../modules/feature-extraction/keyword-table.js";
import { RiskSynthesizer } from "../modules/risk-engine/synthesizer.js";
import { createConsoleLogger } from "../shared/logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger("assessment-worker");

  const keywordTable = config.keywordTablePath
    ? KeywordTable.load(config.keywordTablePath)
    : loadDefaultKeywordTable();
  const synthesizer = new RiskSynthesizer({
    extractor: new BehavioralFeatureExtractor({
      keywordTable,
      featureVersion: config.featureVersion
    }),
    modelVersion: config.assessmentModelVersion
  });

  const redis = await connectRedis(config.redisUrl, "assessment-worker", logger);
  const eventBus = new RedisStreamEventBus(redis, { maxLen: config.redisStreamMaxLen });

  const assessmentService = new AssessmentService({
    eventPublisher: eventBus,
    publishLedger: new RedisPublishLedger(redis, config.redisDedupTtlSeconds),
    synthesizer,
    logger
  });

  const worker = new AssessmentWorker({
    eventBus,
    redis,
    assessmentService,
    inputStream: EventStreams.CONVERSATION_SUBMISSIONS,
    consumerGroup: config.assessmentConsumerGroup,
    batchSize: config.redisConsumerBatchSize,
    blockMs: config.redisConsumerBlockMs,
    maxDeliveries: config.redisMaxDeliveries,
    failureCounterTtlSeconds: config.redisDedupTtlSeconds,
    consumerName: config.assessmentConsumerName,
    logger
  });

  const removeSignalListeners = onShutdownSignal(logger, () => {
    worker.stop();
  });

  try {
    await worker.init();
    logger.info("assessment worker started", {
      stream: EventStreams.CONVERSATION_SUBMISSIONS,
      group: config.assessmentConsumerGroup,
      keyword_rows: keywordTable.rows.length
    });
    await worker.start();
  } finally {
    removeSignalListeners();
    await closeRedis(redis, logger);
    logger.info("assessment worker stopped");
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
