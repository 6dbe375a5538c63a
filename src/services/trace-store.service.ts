/**
 * Traceability Store
 *
 * Durable path from a raw comment to its commercial outcome:
 * comment → intent → product match → order → notifications.
 *
 * Links are append-only. One order per comment is a pipeline invariant (the
 * orchestrator checks findByComment before ordering, serialized per queue key);
 * the store itself does not enforce it.
 */

import { query as defaultQuery, type QueryFn } from '../db/client.js';
import type {
  Comment,
  IntentLabel,
  IntentResult,
  NotificationChannel,
  NotificationRecord,
  NotificationStatus,
  Order,
  OrderStatus,
  ProductMatch,
  Trace,
  TraceLink,
} from '../types/models.js';

export interface TraceStore {
  /** Create the message record with a pending intent placeholder (no-op if it exists) */
  recordComment(comment: Comment): Promise<void>;
  /** Overwrite the pending placeholder */
  recordIntent(intent: IntentResult): Promise<void>;
  recordMatch(commentId: string, match: ProductMatch): Promise<void>;
  recordOrder(commentId: string, order: Order): Promise<void>;
  recordLink(commentId: string, orderId: string): Promise<void>;
  recordNotification(record: NotificationRecord): Promise<void>;
  findByComment(commentId: string): Promise<string | null>;
  findOrder(orderId: string): Promise<Order | null>;
  findByOrder(orderId: string): Promise<Trace | null>;
}

interface CommentRow {
  id: string;
  streamer: string;
  client: string;
  message: string;
  intent: string;
  intent_score: number | null;
  timestamp: Date | string;
}

interface MatchRow {
  streamer: string;
  stream_timestamp: Date | string;
  product_id: string | null;
  vision_score: number;
}

interface OrderRow {
  id: string;
  product_id: string;
  buyer: string;
  streamer: string;
  quantity: number;
  total_price: string | number;
  status: OrderStatus;
}

interface NotificationRow {
  order_id: string;
  notification_type: NotificationChannel;
  status: NotificationStatus;
  retry_count: number;
}

const INTENT_LABELS: ReadonlySet<string> = new Set(['buy', 'question', 'feedback', 'complaint', 'none']);

function isIntentLabel(value: string): value is IntentLabel {
  return INTENT_LABELS.has(value);
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : value;
}

function mapOrder(row: OrderRow): Order {
  return {
    orderId: row.id,
    productId: row.product_id,
    buyer: row.buyer,
    streamer: row.streamer,
    quantity: row.quantity,
    totalPrice: Number(row.total_price),
    status: row.status,
  };
}

export class PgTraceStore implements TraceStore {
  constructor(private query: QueryFn = defaultQuery) {}

  async recordComment(comment: Comment): Promise<void> {
    await this.query(
      `INSERT INTO chat_messages (id, streamer, client, message, intent, timestamp)
       VALUES ($1, $2, $3, $4, 'pending', $5)
       ON CONFLICT (id) DO NOTHING`,
      [comment.id, comment.streamer, comment.client, comment.text, comment.receivedAt]
    );
  }

  async recordIntent(intent: IntentResult): Promise<void> {
    await this.query(
      `UPDATE chat_messages SET intent = $2, intent_score = $3 WHERE id = $1`,
      [intent.commentId, intent.label, intent.confidence]
    );
  }

  async recordMatch(commentId: string, match: ProductMatch): Promise<void> {
    await this.query(
      `INSERT INTO product_matches (chat_message_id, streamer, stream_timestamp, product_id, vision_score)
       VALUES ($1, $2, $3, $4, $5)`,
      [commentId, match.streamer, match.streamTimestamp, match.productId, match.confidence]
    );
  }

  async recordOrder(commentId: string, order: Order): Promise<void> {
    await this.query(
      `INSERT INTO orders (id, chat_message_id, product_id, buyer, streamer, quantity, total_price, status)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (id) DO UPDATE SET status = EXCLUDED.status`,
      [
        order.orderId,
        commentId,
        order.productId,
        order.buyer,
        order.streamer,
        order.quantity,
        order.totalPrice,
        order.status,
      ]
    );
  }

  async recordLink(commentId: string, orderId: string): Promise<void> {
    await this.query(
      `INSERT INTO chat_message_order_mapping (chat_message_id, order_id) VALUES ($1, $2)`,
      [commentId, orderId]
    );
  }

  async recordNotification(record: NotificationRecord): Promise<void> {
    await this.query(
      `INSERT INTO payment_notifications (order_id, notification_type, status, retry_count)
       VALUES ($1, $2, $3, $4)`,
      [record.orderId, record.channel, record.status, record.attempt]
    );
  }

  async findByComment(commentId: string): Promise<string | null> {
    const result = await this.query<{ order_id: string }>(
      `SELECT order_id FROM chat_message_order_mapping
       WHERE chat_message_id = $1
       ORDER BY created_at ASC
       LIMIT 1`,
      [commentId]
    );
    return result.rows[0]?.order_id ?? null;
  }

  async findOrder(orderId: string): Promise<Order | null> {
    const result = await this.query<OrderRow>(
      `SELECT id, product_id, buyer, streamer, quantity, total_price, status FROM orders WHERE id = $1`,
      [orderId]
    );
    const row = result.rows[0];
    return row ? mapOrder(row) : null;
  }

  async findByOrder(orderId: string): Promise<Trace | null> {
    const link = await this.query<{ chat_message_id: string }>(
      `SELECT chat_message_id FROM chat_message_order_mapping WHERE order_id = $1 LIMIT 1`,
      [orderId]
    );
    const commentId = link.rows[0]?.chat_message_id;
    if (!commentId) {
      return null;
    }

    const commentResult = await this.query<CommentRow>(
      `SELECT id, streamer, client, message, intent, intent_score, timestamp
       FROM chat_messages WHERE id = $1`,
      [commentId]
    );
    const commentRow = commentResult.rows[0];
    if (!commentRow) {
      return null;
    }

    // The match the order was placed on, not a later re-match of the same comment
    const matchResult = await this.query<MatchRow>(
      `SELECT streamer, stream_timestamp, product_id, vision_score
       FROM product_matches
       WHERE chat_message_id = $1
       ORDER BY (product_id IS NOT DISTINCT FROM (SELECT product_id FROM orders WHERE id = $2)) DESC,
                created_at ASC
       LIMIT 1`,
      [commentId, orderId]
    );
    const notificationResult = await this.query<NotificationRow>(
      `SELECT order_id, notification_type, status, retry_count
       FROM payment_notifications
       WHERE order_id = $1
       ORDER BY created_at ASC`,
      [orderId]
    );
    const matchRow = matchResult.rows[0];

    return {
      comment: {
        id: commentRow.id,
        streamer: commentRow.streamer,
        client: commentRow.client,
        text: commentRow.message,
        receivedAt: toIso(commentRow.timestamp),
      },
      intent:
        isIntentLabel(commentRow.intent) && commentRow.intent_score !== null
          ? { commentId, label: commentRow.intent, confidence: commentRow.intent_score }
          : null,
      match: matchRow
        ? {
            streamer: matchRow.streamer,
            streamTimestamp: toIso(matchRow.stream_timestamp),
            productId: matchRow.product_id,
            confidence: matchRow.vision_score,
          }
        : null,
      order: await this.findOrder(orderId),
      notifications: notificationResult.rows.map((row) => ({
        orderId: row.order_id,
        channel: row.notification_type,
        status: row.status,
        attempt: row.retry_count,
      })),
    };
  }
}

/**
 * In-process store, used by tests and local runs without Postgres.
 */
export class InMemoryTraceStore implements TraceStore {
  private comments = new Map<string, Comment>();
  private intents = new Map<string, IntentResult>();
  private matches = new Map<string, ProductMatch>();
  private orders = new Map<string, Order>();
  private links: TraceLink[] = [];
  private notifications: NotificationRecord[] = [];

  async recordComment(comment: Comment): Promise<void> {
    if (!this.comments.has(comment.id)) {
      this.comments.set(comment.id, { ...comment });
    }
  }

  async recordIntent(intent: IntentResult): Promise<void> {
    this.intents.set(intent.commentId, { ...intent });
  }

  async recordMatch(commentId: string, match: ProductMatch): Promise<void> {
    this.matches.set(commentId, { ...match });
  }

  async recordOrder(_commentId: string, order: Order): Promise<void> {
    this.orders.set(order.orderId, { ...order });
  }

  async recordLink(commentId: string, orderId: string): Promise<void> {
    this.links.push({ commentId, orderId });
  }

  async recordNotification(record: NotificationRecord): Promise<void> {
    this.notifications.push({ ...record });
  }

  async findByComment(commentId: string): Promise<string | null> {
    return this.links.find((link) => link.commentId === commentId)?.orderId ?? null;
  }

  async findOrder(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? { ...order } : null;
  }

  async findByOrder(orderId: string): Promise<Trace | null> {
    const link = this.links.find((l) => l.orderId === orderId);
    const comment = link ? this.comments.get(link.commentId) : undefined;
    if (!link || !comment) {
      return null;
    }

    return {
      comment: { ...comment },
      intent: this.intents.get(link.commentId) ?? null,
      match: this.matches.get(link.commentId) ?? null,
      order: await this.findOrder(orderId),
      notifications: this.notifications.filter((n) => n.orderId === orderId),
    };
  }

  /** All links, in the order they were written */
  allLinks(): TraceLink[] {
    return this.links.map((link) => ({ ...link }));
  }

  intentFor(commentId: string): IntentResult | null {
    return this.intents.get(commentId) ?? null;
  }

  hasComment(commentId: string): boolean {
    return this.comments.has(commentId);
  }
}
