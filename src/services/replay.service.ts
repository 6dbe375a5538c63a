/**
 * Operator-triggered recovery. Nothing here runs automatically: expired queue
 * entries and dead letters wait until someone replays them.
 */

import { logger } from '../config/logger.js';
import type { Orchestrator } from '../pipeline/orchestrator.js';
import type { PipelineStage } from '../pipeline/state-machine.js';
import type { AuditLog } from './audit-log.service.js';
import type { DeadLetterSink } from './dead-letter.service.js';
import type { WorkQueue } from './work-queue.service.js';

export interface ReplayOptions {
  limit: number;
  dryRun?: boolean;
}

export interface DeadLetterReplaySummary {
  replayed: number;
  outcomes: Partial<Record<PipelineStage | 'dead_lettered', number>>;
}

export interface AuditReplaySummary {
  requeued: number;
  /** Cursor to pass as `from` to continue after this batch */
  lastLogId: string | null;
}

export class ReplayService {
  constructor(
    private deadLetters: DeadLetterSink,
    private auditLog: AuditLog,
    private queue: WorkQueue,
    private orchestrator: Orchestrator,
    private now: () => number = Date.now
  ) {}

  /**
   * Resume dead letters oldest-first from their stored state. A letter leaves
   * the sink only once its resume has returned; one that fails again is
   * dead-lettered anew by the orchestrator under a fresh id.
   */
  async replayDeadLetters(options: ReplayOptions): Promise<DeadLetterReplaySummary> {
    const letters = await this.deadLetters.list(options.limit);
    const summary: DeadLetterReplaySummary = { replayed: 0, outcomes: {} };

    for (const letter of letters) {
      if (options.dryRun) {
        logger.info('[dry run] Would replay dead letter', {
          id: letter.id,
          commentId: letter.commentId,
          failedStage: letter.failedStage,
        });
        continue;
      }

      const outcome = await this.orchestrator.resume(letter.state);
      await this.deadLetters.take(letter.id);
      summary.replayed++;

      const key = outcome.deadLetter ? 'dead_lettered' : outcome.state.stage;
      summary.outcomes[key] = (summary.outcomes[key] ?? 0) + 1;
    }

    return summary;
  }

  /**
   * Push audit log entries after `from` back onto their queues. Safe to repeat:
   * the order stage skips comments that already have an order.
   */
  async replayAuditLog(from: string | null, options: ReplayOptions): Promise<AuditReplaySummary> {
    const entries = await this.auditLog.readRange(from, options.limit);
    const summary: AuditReplaySummary = { requeued: 0, lastLogId: null };

    for (const entry of entries) {
      summary.lastLogId = entry.logId;
      if (options.dryRun) {
        logger.info('[dry run] Would requeue comment', { logId: entry.logId, commentId: entry.comment.id });
        continue;
      }

      await this.queue.push(
        { streamer: entry.comment.streamer, client: entry.comment.client },
        { comment: entry.comment, enqueuedAt: this.now() }
      );
      summary.requeued++;
    }

    return summary;
  }
}
