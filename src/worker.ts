import { validateEnv } from './config/env.js';
import { logger } from './config/logger.js';
import { createRuntime } from './bootstrap.js';
import { WorkerPoolJob } from './jobs/worker-pool.job.js';

/**
 * Worker process: consumes the per-key comment queues
 * Run with RUN_MODE=worker
 */

const STATUS_LOG_INTERVAL_MS = 60_000;

async function startWorker() {
  const env = validateEnv();

  logger.info('Starting comment pipeline worker');
  logger.info(`Environment: ${env.NODE_ENV}`);

  const runtime = await createRuntime(env);
  const workerPool = new WorkerPoolJob(runtime.queue, runtime.orchestrator, runtime.metrics, runtime.config);

  const statusTimer = setInterval(() => {
    logger.info('Worker pool status', workerPool.getStatus());
  }, STATUS_LOG_INTERVAL_MS);
  statusTimer.unref();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`${signal} received, finishing in-flight entries`);

    clearInterval(statusTimer);
    try {
      await workerPool.stop();
      await runtime.close();
      logger.info('Worker shut down', { stats: runtime.metrics.snapshot() });
      process.exit(0);
    } catch (error) {
      logger.error('Error during worker shutdown', { error });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  workerPool.start();
}

startWorker().catch((error) => {
  logger.error('Worker failed to start', { error });
  process.exit(1);
});
