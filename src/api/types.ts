import { z } from 'zod';
import { intentLabelSchema } from '../types/schemas.js';
import type {
  IntentResult,
  NotificationChannel,
  NotificationStatus,
  Order,
  ProductMatch,
} from '../types/models.js';

// Wire formats, as the stage services speak them

export const intentRequestSchema = z.object({
  text: z.string().trim().min(1).max(2000),
});

export const intentResponseSchema = z.object({
  intent: intentLabelSchema,
  score: z.number().min(0).max(1),
});

export const visionRequestSchema = z.object({
  streamer: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  frame_urls: z.array(z.string().min(1).max(2000)).max(100).optional(),
});

export const visionResponseSchema = z.object({
  productId: z.string().min(1).nullable(),
  score: z.number().min(0).max(1),
});

export const orderRequestSchema = z.object({
  product_id: z.string().min(1),
  buyer: z.string().min(1),
  streamer: z.string().min(1),
  source: z.string().min(1),
  quantity: z.number().int().min(1).max(1000),
  idempotency_key: z.string().min(1),
});

export const orderResponseSchema = z.object({
  order_id: z.union([z.string().min(1), z.number()]).transform(String),
  status: z.enum(['pending', 'paid', 'failed']),
  total_price: z.union([z.number(), z.string().regex(/^\d+(\.\d+)?$/)]).transform(Number),
});

export const notificationRequestSchema = z.object({
  order_id: z.string().min(1),
  channel: z.enum(['whatsapp', 'sms']),
  recipient: z.string().min(1),
  message: z.string().trim().min(1).max(1000),
});

export const notificationResponseSchema = z.object({
  status: z.string(),
});

export type IntentRequest = z.infer<typeof intentRequestSchema>;
export type IntentResponse = z.infer<typeof intentResponseSchema>;
export type VisionRequest = z.infer<typeof visionRequestSchema>;
export type VisionResponse = z.infer<typeof visionResponseSchema>;
export type OrderRequest = z.infer<typeof orderRequestSchema>;
export type OrderResponse = z.infer<typeof orderResponseSchema>;
export type NotificationRequest = z.infer<typeof notificationRequestSchema>;
export type NotificationResponse = z.infer<typeof notificationResponseSchema>;

// What the orchestrator sees

export interface IntentGateway {
  classify(commentId: string, text: string): Promise<IntentResult>;
}

export interface VisionMatchRequest {
  streamer: string;
  timestamp: string;
  frameUrls?: string[];
}

export interface VisionGateway {
  match(request: VisionMatchRequest): Promise<ProductMatch>;
}

export interface CreateOrderRequest {
  productId: string;
  buyer: string;
  streamer: string;
  source: string;
  quantity: number;
  idempotencyKey: string;
}

export interface OrderGateway {
  create(request: CreateOrderRequest): Promise<Order>;
}

export interface SendNotificationRequest {
  orderId: string;
  channel: NotificationChannel;
  recipient: string;
  message: string;
}

export interface NotificationGateway {
  send(request: SendNotificationRequest): Promise<NotificationStatus>;
}
