import { DEFAULT_PIPELINE_CONFIG } from '../../src/config/pipeline';
import { InvalidTransitionError } from '../../src/errors';
import {
  initialState,
  isTerminal,
  passesIntentGate,
  passesVisionGate,
  transition,
  type PipelineState,
} from '../../src/pipeline/state-machine';
import type { IntentResult, NotificationRecord, ProductMatch } from '../../src/types/models';
import { makeComment, makeOrder } from '../helpers/pipeline';

const policy = DEFAULT_PIPELINE_CONFIG.gating;
const comment = makeComment();

const buy = (confidence: number): IntentResult => ({ commentId: comment.id, label: 'buy', confidence });
const matchOf = (productId: string | null, confidence: number): ProductMatch => ({
  streamer: 'jane',
  streamTimestamp: comment.receivedAt,
  productId,
  confidence,
});

describe('pipeline state machine', () => {
  describe('gates', () => {
    it('should pass the intent gate only for buy above the threshold', () => {
      expect(passesIntentGate(buy(0.94), policy)).toBe(true);
      expect(passesIntentGate(buy(0.51), policy)).toBe(true);
      expect(passesIntentGate(buy(0.5), policy)).toBe(false);
      expect(passesIntentGate({ commentId: 'c-1', label: 'feedback', confidence: 0.99 }, policy)).toBe(false);
    });

    it('should pass the vision gate only for a product above the threshold', () => {
      expect(passesVisionGate(matchOf('SKU-1', 0.89), policy)).toBe(true);
      expect(passesVisionGate(matchOf('SKU-1', 0.7), policy)).toBe(false);
      expect(passesVisionGate(matchOf(null, 0.95), policy)).toBe(false);
    });

    it('should honour a custom threshold', () => {
      expect(passesIntentGate(buy(0.6), { intentThreshold: 0.8, visionThreshold: 0.7 })).toBe(false);
    });
  });

  describe('transition', () => {
    it('should move a dequeued comment to intent_pending', () => {
      const next = transition(initialState(comment), { type: 'dequeued' }, policy);
      expect(next).toEqual({ stage: 'intent_pending', comment });
    });

    it('should gate out a comment without buying intent', () => {
      const intent: IntentResult = { commentId: comment.id, label: 'feedback', confidence: 0.72 };
      const next = transition({ stage: 'intent_pending', comment }, { type: 'intent_classified', intent }, policy);
      expect(next).toEqual({ stage: 'intent_gated_out', comment, intent });
      expect(isTerminal(next)).toBe(true);
    });

    it('should carry the intent into vision_pending', () => {
      const intent = buy(0.94);
      const next = transition({ stage: 'intent_pending', comment }, { type: 'intent_classified', intent }, policy);
      expect(next).toEqual({ stage: 'vision_pending', comment, intent });
      expect(isTerminal(next)).toBe(false);
    });

    it('should gate out a weak product match', () => {
      const intent = buy(0.94);
      const match = matchOf('SKU-1', 0.4);
      const next = transition({ stage: 'vision_pending', comment, intent }, { type: 'product_matched', match }, policy);
      expect(next).toEqual({ stage: 'vision_gated_out', comment, intent, match });
    });

    it('should move a confident match to order_pending', () => {
      const intent = buy(0.94);
      const match = matchOf('SKU-1', 0.89);
      const next = transition({ stage: 'vision_pending', comment, intent }, { type: 'product_matched', match }, policy);
      expect(next).toEqual({ stage: 'order_pending', comment, intent, match });
    });

    it('should record a rejected order as order_failed and allow a retry', () => {
      const intent = buy(0.94);
      const match = matchOf('SKU-1', 0.89);
      const failed = transition(
        { stage: 'order_pending', comment, intent, match },
        { type: 'order_rejected', reason: 'timeout' },
        policy
      );
      expect(failed).toEqual({ stage: 'order_failed', comment, intent, match, reason: 'timeout' });
      expect(isTerminal(failed)).toBe(true);

      const retried = transition(failed, { type: 'order_retry' }, policy);
      expect(retried).toEqual({ stage: 'order_pending', comment, intent, match });
    });

    it('should finish at complete or notification_failed', () => {
      const order = makeOrder();
      const pending: PipelineState = {
        stage: 'notification_pending',
        comment,
        intent: buy(0.94),
        match: matchOf('SKU-1', 0.89),
        order,
        duplicate: false,
      };
      const sent: NotificationRecord = { orderId: 'ORD-1', channel: 'whatsapp', status: 'sent', attempt: 1 };
      const failed: NotificationRecord = { ...sent, status: 'failed' };

      expect(transition(pending, { type: 'notification_sent', notification: sent }, policy).stage).toBe('complete');
      expect(transition(pending, { type: 'notification_failed', notification: failed }, policy).stage).toBe(
        'notification_failed'
      );
    });

    it('should reject an event that does not belong to the stage', () => {
      expect(() => transition(initialState(comment), { type: 'order_retry' }, policy)).toThrow(InvalidTransitionError);
    });

    it('should reject any event on a terminal state', () => {
      const gatedOut: PipelineState = { stage: 'intent_gated_out', comment, intent: buy(0.2) };
      expect(() => transition(gatedOut, { type: 'dequeued' }, policy)).toThrow(
        'Event "dequeued" is not valid in stage "intent_gated_out"'
      );
    });
  });
});
