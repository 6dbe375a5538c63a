// Domain model types

export type IntentLabel = 'buy' | 'question' | 'feedback' | 'complaint' | 'none';

export type OrderStatus = 'pending' | 'paid' | 'failed';
export type NotificationChannel = 'whatsapp' | 'sms';
export type NotificationStatus = 'pending' | 'sent' | 'failed';

export interface Comment {
  id: string;
  streamer: string;
  client: string;
  text: string;
  /** ISO8601; the ingestion timestamp, or the receive time when none was given */
  receivedAt: string;
}

export interface QueueKey {
  streamer: string;
  client: string;
}

export interface QueueEntry {
  comment: Comment;
  /** Epoch milliseconds */
  enqueuedAt: number;
}

export interface IntentResult {
  commentId: string;
  label: IntentLabel;
  confidence: number;
}

export interface ProductMatch {
  streamer: string;
  streamTimestamp: string;
  /** null when the vision service found nothing */
  productId: string | null;
  confidence: number;
}

export interface Order {
  orderId: string;
  productId: string;
  buyer: string;
  streamer: string;
  quantity: number;
  totalPrice: number;
  status: OrderStatus;
}

export interface TraceLink {
  commentId: string;
  orderId: string;
}

export interface NotificationRecord {
  orderId: string;
  channel: NotificationChannel;
  status: NotificationStatus;
  attempt: number;
}

export interface Frame {
  streamer: string;
  frameTimestamp: string;
  url: string;
}

export interface AuditLogEntry {
  logId: string;
  comment: Comment;
}

/**
 * Everything known about one comment's journey through the pipeline.
 */
export interface Trace {
  comment: Comment;
  intent: IntentResult | null;
  match: ProductMatch | null;
  order: Order | null;
  notifications: NotificationRecord[];
}
