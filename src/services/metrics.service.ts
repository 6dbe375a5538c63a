/**
 * Pipeline counters, exposed through the worker status endpoint and logs.
 */

import { logger } from '../config/logger.js';
import type { TerminalStage } from '../pipeline/state-machine.js';
import type { QueueEntry, QueueKey } from '../types/models.js';

export type CounterName =
  | 'processed'
  | 'dead_lettered'
  | 'expired'
  | 'duplicate_orders'
  | 'errors'
  | TerminalStage;

export class PipelineMetrics {
  private counters = new Map<CounterName, number>();
  private lastProcessedAt: Date | null = null;

  increment(name: CounterName, by = 1) {
    this.counters.set(name, this.get(name) + by);
    if (name === 'processed') {
      this.lastProcessedAt = new Date();
    }
  }

  get(name: CounterName): number {
    return this.counters.get(name) ?? 0;
  }

  /**
   * Queue expiry is a metric, not an error: the comment is still in the audit log.
   */
  recordExpired(key: QueueKey, entry: QueueEntry) {
    this.increment('expired');
    logger.info('Queue entry expired before processing', {
      streamer: key.streamer,
      client: key.client,
      commentId: entry.comment.id,
      enqueuedAt: new Date(entry.enqueuedAt).toISOString(),
    });
  }

  snapshot() {
    return {
      counters: Object.fromEntries(this.counters),
      lastProcessedAt: this.lastProcessedAt,
    };
  }
}
