/**
 * Audit Log
 *
 * Append-only record of every ingested comment. Readers keep their own cursor,
 * so any number of consumers can replay the log without removing entries.
 */

import type { RedisClient } from '../db/redis.js';
import type { AuditLogEntry, Comment } from '../types/models.js';

export const AUDIT_STREAM = 'comments_stream';

export interface AuditLog {
  /** Returns the monotonic log id of the appended comment */
  append(comment: Comment): Promise<string>;
  /** Entries strictly after `cursor` (or from the start when null), oldest first */
  readRange(cursor: string | null, limit: number): Promise<AuditLogEntry[]>;
}

/**
 * Redis stream backend. Stream ids (`<ms>-<seq>`) are the log ids.
 */
export class RedisAuditLog implements AuditLog {
  constructor(
    private redis: RedisClient,
    private stream: string = AUDIT_STREAM
  ) {}

  async append(comment: Comment): Promise<string> {
    return this.redis.xAdd(this.stream, '*', {
      id: comment.id,
      streamer: comment.streamer,
      client: comment.client,
      message: comment.text,
      timestamp: comment.receivedAt,
    });
  }

  async readRange(cursor: string | null, limit: number): Promise<AuditLogEntry[]> {
    const start = cursor ? `(${cursor}` : '-';
    const rows = await this.redis.xRange(this.stream, start, '+', { COUNT: limit });

    return rows.map((row) => ({
      logId: row.id,
      comment: {
        id: row.message.id ?? row.id,
        streamer: row.message.streamer ?? '',
        client: row.message.client ?? '',
        text: row.message.message ?? '',
        receivedAt: row.message.timestamp ?? '',
      },
    }));
  }
}

/**
 * In-process backend with the same contract. Ids mimic Redis stream ids so
 * cursors are interchangeable between the two.
 */
export class InMemoryAuditLog implements AuditLog {
  private entries: AuditLogEntry[] = [];
  private lastMs = 0;
  private seq = 0;

  constructor(private now: () => number = Date.now) {}

  async append(comment: Comment): Promise<string> {
    const ms = Math.max(this.now(), this.lastMs);
    this.seq = ms === this.lastMs ? this.seq + 1 : 0;
    this.lastMs = ms;

    const logId = `${ms}-${this.seq}`;
    this.entries.push({ logId, comment: { ...comment } });
    return logId;
  }

  async readRange(cursor: string | null, limit: number): Promise<AuditLogEntry[]> {
    const after = cursor ? this.entries.filter((entry) => compareLogIds(entry.logId, cursor) > 0) : this.entries;
    return after.slice(0, limit).map((entry) => ({ logId: entry.logId, comment: { ...entry.comment } }));
  }

  size(): number {
    return this.entries.length;
  }
}

/**
 * Order two `<ms>-<seq>` log ids.
 */
export function compareLogIds(a: string, b: string): number {
  const [aMs, aSeq] = a.split('-').map(Number);
  const [bMs, bSeq] = b.split('-').map(Number);
  if (aMs !== bMs) {
    return (aMs ?? 0) - (bMs ?? 0);
  }
  return (aSeq ?? 0) - (bSeq ?? 0);
}
