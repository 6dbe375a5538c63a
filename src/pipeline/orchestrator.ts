/**
 * Orchestrator
 *
 * Drives one comment through intent → vision → order → notification. Each
 * stage performs its gateway call (with retry), records the result in the
 * trace store, and hands the result to the pure state machine.
 *
 * Failures at the intent, vision or order stage never drop the entry: it goes
 * to the dead-letter sink with everything accumulated so far and can be
 * resumed from that state. Notification failures are terminal and only logged.
 *
 * Callers must not run two entries for the same comment concurrently; the
 * worker pool guarantees this by giving each queue key to exactly one worker.
 */

import { randomUUID } from 'crypto';
import type {
  IntentGateway,
  NotificationGateway,
  OrderGateway,
  VisionGateway,
} from '../api/types.js';
import { withRetry, sleep, type Sleep } from '../api/retry.js';
import type { PipelineConfig } from '../config/pipeline.js';
import { logger } from '../config/logger.js';
import {
  DuplicateOrderAttempt,
  PermanentGatewayError,
  RetryExhaustedError,
  TransientGatewayError,
  errorMessage,
} from '../errors.js';
import type { DeadLetter, DeadLetterSink, FailureKind } from '../services/dead-letter.service.js';
import type { FrameLookup } from '../services/frame-lookup.service.js';
import type { TraceStore } from '../services/trace-store.service.js';
import type { Comment, NotificationRecord, NotificationStatus, Order, QueueEntry } from '../types/models.js';
import {
  initialState,
  isTerminal,
  transition,
  type PipelineEvent,
  type PipelineState,
} from './state-machine.js';

export interface Gateways {
  intent: IntentGateway;
  vision: VisionGateway;
  order: OrderGateway;
  notification: NotificationGateway;
}

export interface OrchestratorDeps {
  config: PipelineConfig;
  gateways: Gateways;
  traceStore: TraceStore;
  deadLetters: DeadLetterSink;
  frames?: FrameLookup;
  sleep?: Sleep;
  now?: () => Date;
}

export interface PipelineOutcome {
  state: PipelineState;
  deadLetter: DeadLetter | null;
  /** The order stage found an existing link and reused its order */
  duplicateOrder: boolean;
}

type FailedStage = DeadLetter['failedStage'];

export class Orchestrator {
  private config: PipelineConfig;
  private gateways: Gateways;
  private traceStore: TraceStore;
  private deadLetters: DeadLetterSink;
  private frames: FrameLookup | null;
  private sleep: Sleep;
  private now: () => Date;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.gateways = deps.gateways;
    this.traceStore = deps.traceStore;
    this.deadLetters = deps.deadLetters;
    this.frames = deps.frames ?? null;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Process a freshly dequeued entry from the start. A comment that is already
   * linked to an order is not classified or matched again: its stored trace is
   * authoritative, so it resumes at the order or notification stage.
   */
  async process(entry: QueueEntry): Promise<PipelineOutcome> {
    const { comment } = entry;
    logger.info('Processing comment', {
      commentId: comment.id,
      streamer: comment.streamer,
      client: comment.client,
    });

    let linked: PipelineState | null;
    try {
      await this.traceStore.recordComment(comment);
      linked = await this.restoreLinked(comment);
    } catch (error) {
      return this.deadLetter(initialState(comment), 'queued', error);
    }

    if (linked) {
      return this.run(linked, linked.stage === 'notification_pending');
    }
    return this.run(this.advance(initialState(comment), { type: 'dequeued' }));
  }

  /**
   * Continue from a previously recorded state, e.g. one read from the
   * dead-letter sink. Terminal states other than order_failed are returned as-is.
   */
  async resume(state: PipelineState): Promise<PipelineOutcome> {
    if (state.stage === 'queued') {
      return this.process({ comment: state.comment, enqueuedAt: this.now().getTime() });
    }

    if (state.stage === 'intent_pending' || state.stage === 'vision_pending') {
      let linked: PipelineState | null;
      try {
        linked = await this.restoreLinked(state.comment);
      } catch (error) {
        return this.fail(state, error);
      }
      if (linked) {
        return this.run(linked, linked.stage === 'notification_pending');
      }
    }

    if (state.stage === 'order_failed') {
      return this.run(this.advance(state, { type: 'order_retry' }));
    }
    return this.run(state);
  }

  /**
   * Rebuild the state of a comment that already produced an order, from the
   * trace store. Null when there is no link, or when the stored trace lacks the
   * intent or match needed to continue.
   */
  private async restoreLinked(comment: Comment): Promise<PipelineState | null> {
    const orderId = await this.traceStore.findByComment(comment.id);
    if (!orderId) {
      return null;
    }

    const trace = await this.traceStore.findByOrder(orderId);
    const intent = trace?.intent;
    const match = trace?.match;
    if (!trace || !intent || !match) {
      logger.warn('Linked comment has an incomplete trace, processing from the start', {
        commentId: comment.id,
        orderId,
      });
      return null;
    }

    logger.info('Comment already linked to an order, skipping classification', {
      commentId: comment.id,
      orderId,
    });

    const { order } = trace;
    if (!order) {
      return { stage: 'order_pending', comment: trace.comment, intent, match };
    }
    return { stage: 'notification_pending', comment: trace.comment, intent, match, order, duplicate: true };
  }

  private async run(start: PipelineState, duplicateOrder = false): Promise<PipelineOutcome> {
    let state = start;

    while (!isTerminal(state)) {
      let event: PipelineEvent;
      try {
        event = await this.perform(state);
      } catch (error) {
        return this.fail(state, error);
      }

      if (event.type === 'order_created' && event.duplicate) {
        duplicateOrder = true;
      }
      state = this.advance(state, event);
    }

    logger.info('Comment reached terminal state', { commentId: state.comment.id, stage: state.stage });
    return { state, deadLetter: null, duplicateOrder };
  }

  private advance(state: PipelineState, event: PipelineEvent): PipelineState {
    const next = transition(state, event, this.config.gating);
    logger.debug('Pipeline transition', {
      commentId: state.comment.id,
      from: state.stage,
      event: event.type,
      to: next.stage,
    });
    return next;
  }

  /**
   * Run the side effect that belongs to the current stage and report its result.
   */
  private async perform(state: PipelineState): Promise<PipelineEvent> {
    switch (state.stage) {
      case 'queued':
        return { type: 'dequeued' };

      case 'intent_pending': {
        const { comment } = state;
        const intent = await withRetry(
          () => this.gateways.intent.classify(comment.id, comment.text),
          this.config.retry,
          this.sleep
        );
        await this.traceStore.recordIntent(intent);
        logger.info('Intent classified', { commentId: comment.id, label: intent.label, confidence: intent.confidence });
        return { type: 'intent_classified', intent };
      }

      case 'vision_pending': {
        const { comment } = state;
        const frameUrls = await this.lookupFrames(comment.streamer, comment.receivedAt);
        const match = await withRetry(
          () =>
            this.gateways.vision.match({
              streamer: comment.streamer,
              timestamp: comment.receivedAt,
              frameUrls,
            }),
          this.config.retry,
          this.sleep
        );
        await this.traceStore.recordMatch(comment.id, match);
        logger.info('Product match', { commentId: comment.id, productId: match.productId, confidence: match.confidence });
        return { type: 'product_matched', match };
      }

      case 'order_pending':
        try {
          return await this.placeOrder(state);
        } catch (error) {
          if (error instanceof DuplicateOrderAttempt) {
            logger.info('Duplicate order attempt ignored', { commentId: error.commentId, orderId: error.order.orderId });
            return { type: 'order_created', order: error.order, duplicate: true };
          }
          throw error;
        }

      case 'notification_pending':
        return this.notify(state);

      default:
        // Terminal states never reach here; run() stops first
        throw new Error(`No action for stage ${state.stage}`);
    }
  }

  /**
   * Check-then-act on the trace store: an existing link means this comment
   * already produced an order, so the stage succeeds without a new call.
   */
  private async placeOrder(
    state: Extract<PipelineState, { stage: 'order_pending' }>
  ): Promise<PipelineEvent> {
    const { comment, match } = state;

    const existing = await this.findExistingOrder(comment.id);
    if (existing) {
      throw new DuplicateOrderAttempt(comment.id, existing);
    }

    if (!match.productId) {
      throw new PermanentGatewayError('order', 'No product to order');
    }
    const productId = match.productId;

    const order = await withRetry(
      () =>
        this.gateways.order.create({
          productId,
          buyer: comment.client,
          streamer: comment.streamer,
          source: this.config.order.source,
          quantity: this.config.order.quantity,
          idempotencyKey: comment.id,
        }),
      this.config.retry,
      this.sleep
    );

    if (order.status === 'failed') {
      throw new PermanentGatewayError('order', `Order ${order.orderId} was created with status failed`);
    }

    await this.traceStore.recordOrder(comment.id, order);
    await this.traceStore.recordLink(comment.id, order.orderId);
    logger.info('Order created', { commentId: comment.id, orderId: order.orderId, totalPrice: order.totalPrice });
    return { type: 'order_created', order, duplicate: false };
  }

  private async findExistingOrder(commentId: string): Promise<Order | null> {
    const orderId = await this.traceStore.findByComment(commentId);
    if (!orderId) {
      return null;
    }

    const order = await this.traceStore.findOrder(orderId);
    if (order) {
      return order;
    }

    // Link without an order row: the stored state is incomplete, so fall back
    // to a real call and let the order service dedupe on the idempotency key
    logger.warn('Trace link without order record', { commentId, orderId });
    return null;
  }

  /**
   * Best effort: a failure here is recorded and logged, never rolled back into the order.
   */
  private async notify(
    state: Extract<PipelineState, { stage: 'notification_pending' }>
  ): Promise<PipelineEvent> {
    const { comment, order, duplicate } = state;
    const channel = this.config.notification.channel;

    if (duplicate) {
      const trace = await this.traceStore.findByOrder(order.orderId);
      const sent = trace?.notifications.find((n) => n.status === 'sent');
      if (sent) {
        return { type: 'notification_sent', notification: sent };
      }
    }

    let attempt = 0;
    let status: NotificationStatus;
    try {
      status = await withRetry(
        (n) => {
          attempt = n;
          return this.gateways.notification.send({
            orderId: order.orderId,
            channel,
            recipient: comment.client,
            message: formatOrderMessage(order),
          });
        },
        this.config.retry,
        this.sleep
      );
    } catch (error) {
      logger.error('Notification failed', { commentId: comment.id, orderId: order.orderId, error: errorMessage(error) });
      status = 'failed';
    }

    const notification: NotificationRecord = { orderId: order.orderId, channel, status, attempt };
    try {
      await this.traceStore.recordNotification(notification);
    } catch (error) {
      logger.error('Failed to record notification', { orderId: order.orderId, error: errorMessage(error) });
    }

    return status === 'sent'
      ? { type: 'notification_sent', notification }
      : { type: 'notification_failed', notification };
  }

  private async lookupFrames(streamer: string, timestamp: string): Promise<string[] | undefined> {
    if (!this.frames) {
      return undefined;
    }
    try {
      const urls = await this.frames.framesNear(
        streamer,
        timestamp,
        this.config.frames.windowSeconds,
        this.config.frames.limit
      );
      return urls.length > 0 ? urls : undefined;
    } catch (error) {
      logger.warn('Frame lookup failed, matching without frames', { streamer, error: errorMessage(error) });
      return undefined;
    }
  }

  private async fail(state: PipelineState, error: unknown): Promise<PipelineOutcome> {
    if (state.stage === 'order_pending') {
      const failed = this.advance(state, { type: 'order_rejected', reason: errorMessage(error) });
      return this.deadLetter(failed, 'order_pending', error);
    }

    const stage: FailedStage =
      state.stage === 'intent_pending' || state.stage === 'vision_pending' || state.stage === 'notification_pending'
        ? state.stage
        : 'queued';
    return this.deadLetter(state, stage, error);
  }

  private async deadLetter(state: PipelineState, failedStage: FailedStage, error: unknown): Promise<PipelineOutcome> {
    const { kind, attempts } = describeFailure(error);
    const letter: DeadLetter = {
      id: randomUUID(),
      commentId: state.comment.id,
      failedStage,
      reason: errorMessage(error),
      errorKind: kind,
      attempts,
      state,
      deadLetteredAt: this.now().toISOString(),
    };

    await this.deadLetters.send(letter);
    logger.error('Comment dead-lettered', {
      commentId: letter.commentId,
      failedStage,
      errorKind: kind,
      attempts,
      reason: letter.reason,
    });

    return { state, deadLetter: letter, duplicateOrder: false };
  }
}

function describeFailure(error: unknown): { kind: FailureKind; attempts: number } {
  if (error instanceof RetryExhaustedError) {
    return { kind: 'transient', attempts: error.attempts };
  }
  if (error instanceof PermanentGatewayError) {
    return { kind: 'permanent', attempts: 1 };
  }
  if (error instanceof TransientGatewayError) {
    return { kind: 'transient', attempts: 1 };
  }
  return { kind: 'internal', attempts: 1 };
}

export function formatOrderMessage(order: Order): string {
  return `Your order ${order.orderId} for ${order.productId} (x${order.quantity}) is ${order.status}. Total: ${order.totalPrice.toFixed(2)}`;
}
