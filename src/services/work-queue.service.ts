/**
 * Per-Key Work Queue
 *
 * One FIFO list per (streamer, client). Entries older than the TTL are dropped
 * on pop and counted as expired; the comment stays in the audit log. Entries
 * that cannot be decoded are moved to a quarantine list with their raw text.
 */

import { commandOptions } from 'redis';
import { z } from 'zod';
import type { RedisClient } from '../db/redis.js';
import { logger } from '../config/logger.js';
import { QueueUnavailableError, errorMessage } from '../errors.js';
import type { QueueEntry, QueueKey } from '../types/models.js';

export const QUEUE_PREFIX = 'chat:queue:';
export const DEFAULT_QUEUE_TTL_SECONDS = 7 * 24 * 3600;
/** Outside the queue prefix, so workers never scan it */
export const QUARANTINE_LIST = 'chat:quarantine';

export interface WorkQueue {
  push(key: QueueKey, entry: QueueEntry): Promise<void>;
  /** Resolves null when nothing arrived within the timeout */
  popBlocking(key: QueueKey, timeoutSeconds: number): Promise<QueueEntry | null>;
  /** Keys that currently hold at least one entry */
  activeKeys(): Promise<QueueKey[]>;
}

export type ExpiryListener = (key: QueueKey, entry: QueueEntry) => void;

export interface QuarantinedEntry {
  queue: string;
  raw: string;
  quarantinedAt: string;
}

export function queueName(key: QueueKey): string {
  return `${QUEUE_PREFIX}${key.streamer}:${key.client}`;
}

/**
 * Inverse of queueName. Streamer handles never contain ':', so the first
 * separator after the prefix splits the pair.
 */
export function parseQueueName(name: string): QueueKey | null {
  if (!name.startsWith(QUEUE_PREFIX)) {
    return null;
  }
  const rest = name.slice(QUEUE_PREFIX.length);
  const separator = rest.indexOf(':');
  if (separator <= 0 || separator === rest.length - 1) {
    return null;
  }
  return { streamer: rest.slice(0, separator), client: rest.slice(separator + 1) };
}

export function isExpired(entry: QueueEntry, ttlSeconds: number, now: number): boolean {
  return now - entry.enqueuedAt > ttlSeconds * 1000;
}

const wireEntrySchema = z.object({
  id: z.string().min(1),
  streamer: z.string().min(1),
  client: z.string().min(1),
  message: z.string(),
  timestamp: z.string(),
  enqueuedAt: z.number(),
});

export type WireEntry = z.infer<typeof wireEntrySchema>;

/**
 * Queue wire format: the ingestion payload plus the comment id and enqueue time.
 */
export function encodeEntry(entry: QueueEntry): string {
  const wire: WireEntry = {
    id: entry.comment.id,
    streamer: entry.comment.streamer,
    client: entry.comment.client,
    message: entry.comment.text,
    timestamp: entry.comment.receivedAt,
    enqueuedAt: entry.enqueuedAt,
  };
  return JSON.stringify(wire);
}

export function decodeEntry(raw: string): QueueEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.error('Invalid JSON in queue entry', { error: errorMessage(error) });
    return null;
  }

  const result = wireEntrySchema.safeParse(parsed);
  if (!result.success) {
    logger.error('Malformed queue entry', { issues: result.error.issues.map((i) => i.message) });
    return null;
  }

  const wire = result.data;
  return {
    comment: {
      id: wire.id,
      streamer: wire.streamer,
      client: wire.client,
      text: wire.message,
      receivedAt: wire.timestamp,
    },
    enqueuedAt: wire.enqueuedAt,
  };
}

export class RedisWorkQueue implements WorkQueue {
  constructor(
    private redis: RedisClient,
    private ttlSeconds: number = DEFAULT_QUEUE_TTL_SECONDS,
    private onExpired: ExpiryListener = () => {},
    private now: () => number = Date.now
  ) {}

  async push(key: QueueKey, entry: QueueEntry): Promise<void> {
    if (!this.redis.isReady) {
      throw new QueueUnavailableError('Redis is not connected');
    }

    const name = queueName(key);
    try {
      await this.redis.rPush(name, encodeEntry(entry));
      // Abandoned sessions age out as a whole list
      await this.redis.expire(name, this.ttlSeconds);
    } catch (error) {
      throw new QueueUnavailableError(`Failed to enqueue to ${name}: ${errorMessage(error)}`, error);
    }
  }

  async popBlocking(key: QueueKey, timeoutSeconds: number): Promise<QueueEntry | null> {
    const name = queueName(key);

    // A blocking pop holds its connection, so it runs on an isolated one
    for (;;) {
      const reply = await this.redis.blPop(commandOptions({ isolated: true }), name, timeoutSeconds);
      if (!reply) {
        return null;
      }

      const entry = decodeEntry(reply.element);
      if (!entry) {
        await this.quarantine(name, reply.element);
        continue;
      }

      if (isExpired(entry, this.ttlSeconds, this.now())) {
        this.onExpired(key, entry);
        continue;
      }

      return entry;
    }
  }

  private async quarantine(name: string, raw: string): Promise<void> {
    const quarantined: QuarantinedEntry = { queue: name, raw, quarantinedAt: new Date(this.now()).toISOString() };
    await this.redis.rPush(QUARANTINE_LIST, JSON.stringify(quarantined));
    logger.warn('Undecodable queue entry quarantined', { queue: name, list: QUARANTINE_LIST });
  }

  async activeKeys(): Promise<QueueKey[]> {
    const keys: QueueKey[] = [];
    for await (const name of this.redis.scanIterator({ MATCH: `${QUEUE_PREFIX}*`, COUNT: 100 })) {
      const key = parseQueueName(name);
      if (key) {
        keys.push(key);
      }
    }
    return keys;
  }
}

interface Waiter {
  resolve: (entry: QueueEntry | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * In-process queue. Entries are stored in wire form so the codec is exercised
 * the same way as with Redis.
 */
export class InMemoryWorkQueue implements WorkQueue {
  private lists = new Map<string, string[]>();
  private waiters = new Map<string, Waiter[]>();
  private quarantine: QuarantinedEntry[] = [];
  private available = true;

  constructor(
    private ttlSeconds: number = DEFAULT_QUEUE_TTL_SECONDS,
    private onExpired: ExpiryListener = () => {},
    private now: () => number = Date.now
  ) {}

  /** Simulate the backend going away (or coming back) */
  setAvailable(available: boolean) {
    this.available = available;
  }

  async push(key: QueueKey, entry: QueueEntry): Promise<void> {
    if (!this.available) {
      throw new QueueUnavailableError('Queue backend unavailable');
    }

    const name = queueName(key);
    const waiting = this.waiters.get(name);
    const waiter = waiting?.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(entry);
      return;
    }

    const list = this.lists.get(name) ?? [];
    list.push(encodeEntry(entry));
    this.lists.set(name, list);
  }

  async popBlocking(key: QueueKey, timeoutSeconds: number): Promise<QueueEntry | null> {
    const name = queueName(key);
    const list = this.lists.get(name) ?? [];

    while (list.length > 0) {
      const raw = list.shift();
      if (list.length === 0) {
        this.lists.delete(name);
      }
      if (raw === undefined) {
        break;
      }

      const entry = decodeEntry(raw);
      if (!entry) {
        this.quarantine.push({ queue: name, raw, quarantinedAt: new Date(this.now()).toISOString() });
        continue;
      }
      if (isExpired(entry, this.ttlSeconds, this.now())) {
        this.onExpired(key, entry);
        continue;
      }
      return entry;
    }

    if (timeoutSeconds <= 0) {
      return null;
    }

    return new Promise<QueueEntry | null>((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const remaining = (this.waiters.get(name) ?? []).filter((w) => w !== waiter);
          this.waiters.set(name, remaining);
          resolve(null);
        }, timeoutSeconds * 1000),
      };
      const waiting = this.waiters.get(name) ?? [];
      waiting.push(waiter);
      this.waiters.set(name, waiting);
    });
  }

  async activeKeys(): Promise<QueueKey[]> {
    const keys: QueueKey[] = [];
    for (const [name, list] of this.lists) {
      const key = parseQueueName(name);
      if (key && list.length > 0) {
        keys.push(key);
      }
    }
    return keys;
  }

  /** Append an already encoded entry, bypassing the codec */
  pushRaw(key: QueueKey, raw: string) {
    const name = queueName(key);
    const list = this.lists.get(name) ?? [];
    list.push(raw);
    this.lists.set(name, list);
  }

  quarantined(): QuarantinedEntry[] {
    return this.quarantine.map((entry) => ({ ...entry }));
  }

  /** Entries currently held for a key, including ones past their TTL */
  depth(key: QueueKey): number {
    return this.lists.get(queueName(key))?.length ?? 0;
  }
}
