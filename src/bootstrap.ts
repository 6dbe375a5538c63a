import { IntentClient } from './api/intent/client.js';
import { NotificationClient } from './api/notification/client.js';
import { OrderClient } from './api/order/client.js';
import { VisionClient } from './api/vision/client.js';
import type { Env } from './config/env.js';
import { buildPipelineConfig, type PipelineConfig } from './config/pipeline.js';
import { logger } from './config/logger.js';
import { disconnect, initPool } from './db/client.js';
import { connectRedis, disconnectRedis } from './db/redis.js';
import { Orchestrator } from './pipeline/orchestrator.js';
import { RedisAuditLog, type AuditLog } from './services/audit-log.service.js';
import { RedisDeadLetterSink, type DeadLetterSink } from './services/dead-letter.service.js';
import { PgFrameLookup } from './services/frame-lookup.service.js';
import { IngestionService } from './services/ingestion.service.js';
import { PipelineMetrics } from './services/metrics.service.js';
import { PgTraceStore, type TraceStore } from './services/trace-store.service.js';
import { RedisWorkQueue, type WorkQueue } from './services/work-queue.service.js';

export interface Runtime {
  config: PipelineConfig;
  metrics: PipelineMetrics;
  auditLog: AuditLog;
  queue: WorkQueue;
  traceStore: TraceStore;
  deadLetters: DeadLetterSink;
  ingestion: IngestionService;
  orchestrator: Orchestrator;
  close(): Promise<void>;
}

/**
 * Connect the backing stores and wire every pipeline component from one validated environment.
 */
export async function createRuntime(env: Env): Promise<Runtime> {
  // The logger is created before .env is loaded
  logger.level = env.LOG_LEVEL;

  const config = buildPipelineConfig(env);
  const metrics = new PipelineMetrics();

  initPool(env.DATABASE_URL);
  const redis = await connectRedis(env.REDIS_URL);

  const auditLog = new RedisAuditLog(redis);
  const queue = new RedisWorkQueue(redis, config.queue.ttlSeconds, (key, entry) => metrics.recordExpired(key, entry));
  const traceStore = new PgTraceStore();
  const deadLetters = new RedisDeadLetterSink(redis);

  const orchestrator = new Orchestrator({
    config,
    gateways: {
      intent: new IntentClient(config.gateways.intent),
      vision: new VisionClient(config.gateways.vision),
      order: new OrderClient(config.gateways.order),
      notification: new NotificationClient(config.gateways.notification),
    },
    traceStore,
    deadLetters,
    frames: new PgFrameLookup(),
  });

  return {
    config,
    metrics,
    auditLog,
    queue,
    traceStore,
    deadLetters,
    ingestion: new IngestionService(auditLog, queue),
    orchestrator,
    async close() {
      await disconnectRedis();
      await disconnect();
    },
  };
}
