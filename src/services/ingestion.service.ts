/**
 * Ingestion
 *
 * Thin front door: validate, append to the audit log, enqueue. The caller only
 * learns where the comment went, never how the pipeline judged it.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { logger } from '../config/logger.js';
import { ValidationError } from '../errors.js';
import type { Comment } from '../types/models.js';
import type { AuditLog } from './audit-log.service.js';
import { queueName, type WorkQueue } from './work-queue.service.js';

const handle = z.string().trim().min(1).max(255);

export const ingestPayloadSchema = z.object({
  streamer: handle.refine((value) => !value.includes(':'), 'streamer must not contain ":"'),
  client: handle,
  message: z
    .string()
    .max(2000)
    .transform((value) => value.trim())
    .refine((value) => value.length > 0, 'message cannot be empty or whitespace only'),
  timestamp: z.string().datetime({ offset: true, message: 'timestamp must be ISO8601' }).optional(),
});

export type IngestPayload = z.input<typeof ingestPayloadSchema>;

export interface IngestResult {
  commentId: string;
  queueKey: string;
  logId: string;
  timestamp: string;
}

export class IngestionService {
  constructor(
    private auditLog: AuditLog,
    private queue: WorkQueue,
    private now: () => Date = () => new Date(),
    private newId: () => string = randomUUID
  ) {}

  /**
   * Validate an incoming payload. Throws ValidationError listing every bad field.
   */
  static parse(payload: unknown): z.output<typeof ingestPayloadSchema> {
    const result = ingestPayloadSchema.safeParse(payload);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ValidationError('Invalid comment payload', issues);
    }
    return result.data;
  }

  async ingest(payload: unknown): Promise<IngestResult> {
    const data = IngestionService.parse(payload);
    const receivedAt = this.now();

    const comment: Comment = {
      id: this.newId(),
      streamer: data.streamer,
      client: data.client,
      text: data.message,
      receivedAt: data.timestamp ? new Date(data.timestamp).toISOString() : receivedAt.toISOString(),
    };

    // The audit log goes first so a failed enqueue can still be replayed
    const logId = await this.auditLog.append(comment);
    const key = { streamer: comment.streamer, client: comment.client };
    await this.queue.push(key, { comment, enqueuedAt: receivedAt.getTime() });

    logger.info('Comment queued', {
      commentId: comment.id,
      streamer: comment.streamer,
      client: comment.client,
      queue: queueName(key),
      logId,
    });

    return {
      commentId: comment.id,
      queueKey: queueName(key),
      logId,
      timestamp: comment.receivedAt,
    };
  }
}
