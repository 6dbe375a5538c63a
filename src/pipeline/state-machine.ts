/**
 * Comment pipeline state machine.
 *
 * Queued → IntentPending → IntentGatedOut | VisionPending
 * VisionPending → VisionGatedOut | OrderPending
 * OrderPending → OrderFailed | NotificationPending
 * NotificationPending → NotificationFailed | Complete
 *
 * `transition` is pure: the orchestrator performs the gateway call for the
 * current stage and feeds the result back in as an event. Every state carries
 * what has been learned so far, so a dead-lettered state can be resumed as-is.
 */

import type { GatingPolicy } from '../config/pipeline.js';
import { InvalidTransitionError } from '../errors.js';
import type {
  Comment,
  IntentResult,
  NotificationRecord,
  Order,
  ProductMatch,
} from '../types/models.js';

export type PipelineState =
  | { stage: 'queued'; comment: Comment }
  | { stage: 'intent_pending'; comment: Comment }
  | { stage: 'intent_gated_out'; comment: Comment; intent: IntentResult }
  | { stage: 'vision_pending'; comment: Comment; intent: IntentResult }
  | { stage: 'vision_gated_out'; comment: Comment; intent: IntentResult; match: ProductMatch }
  | { stage: 'order_pending'; comment: Comment; intent: IntentResult; match: ProductMatch }
  | { stage: 'order_failed'; comment: Comment; intent: IntentResult; match: ProductMatch; reason: string }
  | {
      stage: 'notification_pending';
      comment: Comment;
      intent: IntentResult;
      match: ProductMatch;
      order: Order;
      duplicate: boolean;
    }
  | {
      stage: 'notification_failed';
      comment: Comment;
      intent: IntentResult;
      match: ProductMatch;
      order: Order;
      notification: NotificationRecord;
    }
  | {
      stage: 'complete';
      comment: Comment;
      intent: IntentResult;
      match: ProductMatch;
      order: Order;
      notification: NotificationRecord;
    };

export type PipelineStage = PipelineState['stage'];

export type TerminalStage = Extract<
  PipelineStage,
  'intent_gated_out' | 'vision_gated_out' | 'order_failed' | 'notification_failed' | 'complete'
>;

export type PipelineEvent =
  | { type: 'dequeued' }
  | { type: 'intent_classified'; intent: IntentResult }
  | { type: 'product_matched'; match: ProductMatch }
  | { type: 'order_created'; order: Order; duplicate: boolean }
  | { type: 'order_rejected'; reason: string }
  | { type: 'order_retry' }
  | { type: 'notification_sent'; notification: NotificationRecord }
  | { type: 'notification_failed'; notification: NotificationRecord };

const TERMINAL_STAGES: ReadonlySet<PipelineStage> = new Set<PipelineStage>([
  'intent_gated_out',
  'vision_gated_out',
  'order_failed',
  'notification_failed',
  'complete',
]);

export function isTerminal(state: PipelineState): boolean {
  return TERMINAL_STAGES.has(state.stage);
}

export function passesIntentGate(intent: IntentResult, policy: GatingPolicy): boolean {
  return intent.label === 'buy' && intent.confidence > policy.intentThreshold;
}

export function passesVisionGate(match: ProductMatch, policy: GatingPolicy): boolean {
  return match.productId !== null && match.confidence > policy.visionThreshold;
}

export function initialState(comment: Comment): PipelineState {
  return { stage: 'queued', comment };
}

export function transition(
  state: PipelineState,
  event: PipelineEvent,
  policy: GatingPolicy
): PipelineState {
  switch (state.stage) {
    case 'queued':
      if (event.type === 'dequeued') {
        return { stage: 'intent_pending', comment: state.comment };
      }
      break;

    case 'intent_pending':
      if (event.type === 'intent_classified') {
        if (!passesIntentGate(event.intent, policy)) {
          return { stage: 'intent_gated_out', comment: state.comment, intent: event.intent };
        }
        return { stage: 'vision_pending', comment: state.comment, intent: event.intent };
      }
      break;

    case 'vision_pending':
      if (event.type === 'product_matched') {
        const next = { comment: state.comment, intent: state.intent, match: event.match };
        if (!passesVisionGate(event.match, policy)) {
          return { stage: 'vision_gated_out', ...next };
        }
        return { stage: 'order_pending', ...next };
      }
      break;

    case 'order_pending':
      if (event.type === 'order_created') {
        return {
          stage: 'notification_pending',
          comment: state.comment,
          intent: state.intent,
          match: state.match,
          order: event.order,
          duplicate: event.duplicate,
        };
      }
      if (event.type === 'order_rejected') {
        return {
          stage: 'order_failed',
          comment: state.comment,
          intent: state.intent,
          match: state.match,
          reason: event.reason,
        };
      }
      break;

    case 'order_failed':
      if (event.type === 'order_retry') {
        return { stage: 'order_pending', comment: state.comment, intent: state.intent, match: state.match };
      }
      break;

    case 'notification_pending':
      if (event.type === 'notification_sent') {
        const { comment, intent, match, order } = state;
        return { stage: 'complete', comment, intent, match, order, notification: event.notification };
      }
      if (event.type === 'notification_failed') {
        const { comment, intent, match, order } = state;
        return { stage: 'notification_failed', comment, intent, match, order, notification: event.notification };
      }
      break;

    case 'intent_gated_out':
    case 'vision_gated_out':
    case 'notification_failed':
    case 'complete':
      break;
  }

  throw new InvalidTransitionError(state.stage, event.type);
}
