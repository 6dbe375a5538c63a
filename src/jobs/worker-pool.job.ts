import { createHash } from 'crypto';
import { sleep, type Sleep } from '../api/retry.js';
import type { PipelineConfig } from '../config/pipeline.js';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import type { Orchestrator } from '../pipeline/orchestrator.js';
import type { PipelineMetrics } from '../services/metrics.service.js';
import { queueName, type WorkQueue } from '../services/work-queue.service.js';
import type { QueueEntry, QueueKey } from '../types/models.js';

/**
 * Comment worker pool
 *
 * A fixed number of worker loops share the per-key queues. Each key hashes to
 * exactly one worker, which is what keeps entries for a (streamer, client)
 * pair in FIFO order and makes the orchestrator's order check-then-act safe
 * without locks.
 *
 * Loop per worker:
 * 1. List keys that hold entries, keep the ones this worker owns
 * 2. Pop each owned key with a short blocking timeout
 * 3. Process a popped entry to completion before touching the next key
 * 4. Sleep briefly when nothing was found
 */

export function partitionFor(key: QueueKey, workerCount: number): number {
  const digest = createHash('sha1').update(queueName(key)).digest();
  return digest.readUInt32BE(0) % workerCount;
}

export class WorkerPoolJob {
  private isRunning = false;
  private loops: Promise<void>[] = [];
  private busy = new Set<number>();

  constructor(
    private queue: WorkQueue,
    private orchestrator: Orchestrator,
    private metrics: PipelineMetrics,
    private config: PipelineConfig,
    private wait: Sleep = sleep
  ) {}

  /**
   * Get job status
   */
  getStatus() {
    return {
      isRunning: this.isRunning,
      workers: this.config.workers.count,
      busyWorkers: this.busy.size,
      config: {
        popTimeoutSeconds: this.config.queue.popTimeoutSeconds,
        idleMs: this.config.workers.idleMs,
        ttlSeconds: this.config.queue.ttlSeconds,
      },
      stats: this.metrics.snapshot(),
    };
  }

  /**
   * Start the worker loops
   */
  start() {
    if (this.isRunning) {
      logger.warn('Worker pool is already running');
      return;
    }

    this.isRunning = true;
    logger.info('Starting worker pool', { workers: this.config.workers.count });

    this.loops = Array.from({ length: this.config.workers.count }, (_, index) => this.runWorker(index));
  }

  /**
   * Stop claiming keys. Entries already being processed run to completion;
   * resolves once every loop has exited.
   */
  async stop() {
    if (!this.isRunning) {
      return;
    }

    logger.info('Stopping worker pool', { busyWorkers: this.busy.size });
    this.isRunning = false;
    await Promise.all(this.loops);
    this.loops = [];
    logger.info('Worker pool stopped');
  }

  private async runWorker(index: number) {
    logger.debug('Worker started', { worker: index });

    while (this.isRunning) {
      let owned: QueueKey[];
      try {
        const keys = await this.queue.activeKeys();
        owned = keys.filter((key) => partitionFor(key, this.config.workers.count) === index);
      } catch (error) {
        logger.error('Failed to list active queues', { worker: index, error: errorMessage(error) });
        await this.wait(this.config.workers.idleMs);
        continue;
      }

      let handled = 0;
      for (const key of owned) {
        if (!this.isRunning) {
          break;
        }

        let entry: QueueEntry | null;
        try {
          entry = await this.queue.popBlocking(key, this.config.queue.popTimeoutSeconds);
        } catch (error) {
          logger.error('Queue pop failed', { worker: index, queue: queueName(key), error: errorMessage(error) });
          continue;
        }

        if (entry) {
          handled++;
          await this.handle(index, entry);
        }
      }

      if (handled === 0 && this.isRunning) {
        await this.wait(this.config.workers.idleMs);
      }
    }

    logger.debug('Worker exited', { worker: index });
  }

  private async handle(index: number, entry: QueueEntry) {
    this.busy.add(index);
    try {
      const outcome = await this.orchestrator.process(entry);
      this.metrics.increment('processed');

      if (outcome.deadLetter) {
        this.metrics.increment('dead_lettered');
      } else if (outcome.state.stage === 'intent_gated_out'
        || outcome.state.stage === 'vision_gated_out'
        || outcome.state.stage === 'order_failed'
        || outcome.state.stage === 'notification_failed'
        || outcome.state.stage === 'complete') {
        this.metrics.increment(outcome.state.stage);
      }

      if (outcome.duplicateOrder) {
        this.metrics.increment('duplicate_orders');
      }
    } catch (error) {
      // Only reachable when the dead-letter sink itself failed; the audit log still has the comment
      this.metrics.increment('errors');
      logger.error('Failed to process queue entry', {
        worker: index,
        commentId: entry.comment.id,
        error: errorMessage(error),
      });
    } finally {
      this.busy.delete(index);
    }
  }
}
