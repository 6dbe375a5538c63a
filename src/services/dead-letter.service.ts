/**
 * Dead-Letter Sink
 *
 * Entries that exhausted their retries, or failed permanently, land here with
 * the full pipeline state accumulated so far. Nothing is replayed
 * automatically; an operator takes letters back out through the replay command.
 */

import type { RedisClient } from '../db/redis.js';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import type { PipelineStage, PipelineState } from '../pipeline/state-machine.js';
import { deadLetterSchema } from '../types/schemas.js';

export const DEAD_LETTER_HASH = 'chat:dead-letter';
export const DEAD_LETTER_INDEX = 'chat:dead-letter:ids';

export type FailureKind = 'transient' | 'permanent' | 'internal';

export interface DeadLetter {
  id: string;
  commentId: string;
  failedStage: Extract<PipelineStage, 'queued' | 'intent_pending' | 'vision_pending' | 'order_pending' | 'notification_pending'>;
  reason: string;
  errorKind: FailureKind;
  attempts: number;
  state: PipelineState;
  deadLetteredAt: string;
}

export interface DeadLetterSink {
  send(letter: DeadLetter): Promise<void>;
  /** Oldest first */
  list(limit: number): Promise<DeadLetter[]>;
  /**
   * Remove and return a letter. A letter that cannot be read stays where it is
   * and null is returned.
   */
  take(id: string): Promise<DeadLetter | null>;
  size(): Promise<number>;
}

export function parseDeadLetter(raw: string): DeadLetter | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.error('Unreadable dead letter', { error: errorMessage(error) });
    return null;
  }

  const result = deadLetterSchema.safeParse(parsed);
  if (!result.success) {
    logger.error('Malformed dead letter', { issues: result.error.issues.map((i) => i.message) });
    return null;
  }

  const letter: DeadLetter = result.data;
  return letter;
}

export class RedisDeadLetterSink implements DeadLetterSink {
  constructor(private redis: RedisClient) {}

  async send(letter: DeadLetter): Promise<void> {
    await this.redis.hSet(DEAD_LETTER_HASH, letter.id, JSON.stringify(letter));
    await this.redis.rPush(DEAD_LETTER_INDEX, letter.id);
  }

  async list(limit: number): Promise<DeadLetter[]> {
    const ids = await this.redis.lRange(DEAD_LETTER_INDEX, 0, limit - 1);
    if (ids.length === 0) {
      return [];
    }

    const raws = await this.redis.hmGet(DEAD_LETTER_HASH, ids);
    const letters: DeadLetter[] = [];
    for (const raw of raws) {
      const letter = raw ? parseDeadLetter(raw) : null;
      if (letter) {
        letters.push(letter);
      }
    }
    return letters;
  }

  async take(id: string): Promise<DeadLetter | null> {
    const raw = await this.redis.hGet(DEAD_LETTER_HASH, id);
    if (!raw) {
      return null;
    }

    const letter = parseDeadLetter(raw);
    if (!letter) {
      logger.warn('Unreadable dead letter left in place', { id });
      return null;
    }

    await this.redis.hDel(DEAD_LETTER_HASH, id);
    await this.redis.lRem(DEAD_LETTER_INDEX, 1, id);
    return letter;
  }

  async size(): Promise<number> {
    return this.redis.hLen(DEAD_LETTER_HASH);
  }
}

export class InMemoryDeadLetterSink implements DeadLetterSink {
  /** Letters by id, in their stored JSON form */
  constructor(private letters = new Map<string, string>()) {}

  async send(letter: DeadLetter): Promise<void> {
    this.letters.set(letter.id, JSON.stringify(letter));
  }

  async list(limit: number): Promise<DeadLetter[]> {
    const letters: DeadLetter[] = [];
    for (const raw of this.letters.values()) {
      if (letters.length >= limit) {
        break;
      }
      const letter = parseDeadLetter(raw);
      if (letter) {
        letters.push(letter);
      }
    }
    return letters;
  }

  async take(id: string): Promise<DeadLetter | null> {
    const raw = this.letters.get(id);
    if (raw === undefined) {
      return null;
    }
    const letter = parseDeadLetter(raw);
    if (letter) {
      this.letters.delete(id);
    }
    return letter;
  }

  async size(): Promise<number> {
    return this.letters.size;
  }
}
