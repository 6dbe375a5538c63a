/**
 * Runtime schemas for records that cross a storage boundary (Redis JSON, replay input).
 */

import { z } from 'zod';

export const intentLabelSchema = z.enum(['buy', 'question', 'feedback', 'complaint', 'none']);

export const commentSchema = z.object({
  id: z.string().min(1),
  streamer: z.string().min(1),
  client: z.string().min(1),
  text: z.string(),
  receivedAt: z.string(),
});

export const intentResultSchema = z.object({
  commentId: z.string(),
  label: intentLabelSchema,
  confidence: z.number().min(0).max(1),
});

export const productMatchSchema = z.object({
  streamer: z.string(),
  streamTimestamp: z.string(),
  productId: z.string().nullable(),
  confidence: z.number().min(0).max(1),
});

export const orderSchema = z.object({
  orderId: z.string(),
  productId: z.string(),
  buyer: z.string(),
  streamer: z.string(),
  quantity: z.number().int().positive(),
  totalPrice: z.number(),
  status: z.enum(['pending', 'paid', 'failed']),
});

export const notificationRecordSchema = z.object({
  orderId: z.string(),
  channel: z.enum(['whatsapp', 'sms']),
  status: z.enum(['pending', 'sent', 'failed']),
  attempt: z.number().int().nonnegative(),
});

export const pipelineStateSchema = z.discriminatedUnion('stage', [
  z.object({ stage: z.literal('queued'), comment: commentSchema }),
  z.object({ stage: z.literal('intent_pending'), comment: commentSchema }),
  z.object({ stage: z.literal('intent_gated_out'), comment: commentSchema, intent: intentResultSchema }),
  z.object({ stage: z.literal('vision_pending'), comment: commentSchema, intent: intentResultSchema }),
  z.object({
    stage: z.literal('vision_gated_out'),
    comment: commentSchema,
    intent: intentResultSchema,
    match: productMatchSchema,
  }),
  z.object({
    stage: z.literal('order_pending'),
    comment: commentSchema,
    intent: intentResultSchema,
    match: productMatchSchema,
  }),
  z.object({
    stage: z.literal('order_failed'),
    comment: commentSchema,
    intent: intentResultSchema,
    match: productMatchSchema,
    reason: z.string(),
  }),
  z.object({
    stage: z.literal('notification_pending'),
    comment: commentSchema,
    intent: intentResultSchema,
    match: productMatchSchema,
    order: orderSchema,
    duplicate: z.boolean(),
  }),
  z.object({
    stage: z.literal('notification_failed'),
    comment: commentSchema,
    intent: intentResultSchema,
    match: productMatchSchema,
    order: orderSchema,
    notification: notificationRecordSchema,
  }),
  z.object({
    stage: z.literal('complete'),
    comment: commentSchema,
    intent: intentResultSchema,
    match: productMatchSchema,
    order: orderSchema,
    notification: notificationRecordSchema,
  }),
]);

export const deadLetterSchema = z.object({
  id: z.string(),
  commentId: z.string(),
  failedStage: z.enum(['intent_pending', 'vision_pending', 'order_pending', 'notification_pending', 'queued']),
  reason: z.string(),
  errorKind: z.enum(['transient', 'permanent', 'internal']),
  attempts: z.number().int().nonnegative(),
  state: pipelineStateSchema,
  deadLetteredAt: z.string(),
});
