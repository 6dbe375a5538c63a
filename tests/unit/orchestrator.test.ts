import { PermanentGatewayError, TransientGatewayError } from '../../src/errors';
import { formatOrderMessage } from '../../src/pipeline/orchestrator';
import { NOW, createHarness, makeComment, makeEntry, makeOrder, type Harness } from '../helpers/pipeline';

describe('Orchestrator', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('process', () => {
    it('should turn a buying comment into an order and a notification', async () => {
      const outcome = await h.orchestrator.process(makeEntry());

      expect(outcome.deadLetter).toBeNull();
      expect(outcome.duplicateOrder).toBe(false);
      expect(outcome.state.stage).toBe('complete');

      expect(h.intent.classify).toHaveBeenCalledWith('c-1', 'I want this jacket!');
      expect(h.vision.match).toHaveBeenCalledWith({
        streamer: 'jane',
        timestamp: '2026-03-14T17:59:58.000Z',
        frameUrls: undefined,
      });
      expect(h.order.create).toHaveBeenCalledWith({
        productId: 'SKU-1',
        buyer: 'mike',
        streamer: 'jane',
        source: 'tiktok_live',
        quantity: 1,
        idempotencyKey: 'c-1',
      });
      expect(h.notification.send).toHaveBeenCalledWith({
        orderId: 'ORD-1',
        channel: 'whatsapp',
        recipient: 'mike',
        message: 'Your order ORD-1 for SKU-1 (x1) is pending. Total: 79.99',
      });

      expect(h.traceStore.allLinks()).toEqual([{ commentId: 'c-1', orderId: 'ORD-1' }]);
      expect(await h.traceStore.findOrder('ORD-1')).toEqual(makeOrder());
    });

    it('should record the full trace for the order', async () => {
      await h.orchestrator.process(makeEntry());

      const trace = await h.traceStore.findByOrder('ORD-1');
      expect(trace).toEqual({
        comment: makeComment(),
        intent: { commentId: 'c-1', label: 'buy', confidence: 0.94 },
        match: {
          streamer: 'jane',
          streamTimestamp: '2026-03-14T17:59:58.000Z',
          productId: 'SKU-1',
          confidence: 0.89,
        },
        order: makeOrder(),
        notifications: [{ orderId: 'ORD-1', channel: 'whatsapp', status: 'sent', attempt: 1 }],
      });
    });

    it('should gate out a comment without buying intent', async () => {
      h.intent.classify.mockResolvedValueOnce({ commentId: 'c-2', label: 'feedback', confidence: 0.72 });

      const outcome = await h.orchestrator.process(makeEntry(makeComment({ id: 'c-2', text: 'This is so cute!' })));

      expect(outcome.state.stage).toBe('intent_gated_out');
      expect(outcome.deadLetter).toBeNull();
      expect(h.vision.match).not.toHaveBeenCalled();
      expect(h.order.create).not.toHaveBeenCalled();
      expect(h.traceStore.allLinks()).toEqual([]);
      expect(h.traceStore.intentFor('c-2')).toEqual({ commentId: 'c-2', label: 'feedback', confidence: 0.72 });
    });

    it('should gate out a comment when no product is on screen', async () => {
      h.vision.match.mockResolvedValueOnce({
        streamer: 'jane',
        streamTimestamp: '2026-03-14T17:59:58.000Z',
        productId: null,
        confidence: 0,
      });

      const outcome = await h.orchestrator.process(makeEntry());

      expect(outcome.state.stage).toBe('vision_gated_out');
      expect(h.order.create).not.toHaveBeenCalled();
      expect(h.notification.send).not.toHaveBeenCalled();
    });

    it('should pass nearby frames to the vision service, nearest first', async () => {
      h.frames.add({ streamer: 'jane', frameTimestamp: '2026-03-14T17:59:55.000Z', url: 'frames/a.jpg' });
      h.frames.add({ streamer: 'jane', frameTimestamp: '2026-03-14T17:59:59.000Z', url: 'frames/b.jpg' });
      h.frames.add({ streamer: 'jane', frameTimestamp: '2026-03-14T17:59:30.000Z', url: 'frames/c.jpg' });
      h.frames.add({ streamer: 'bob', frameTimestamp: '2026-03-14T17:59:58.000Z', url: 'frames/d.jpg' });

      await h.orchestrator.process(makeEntry());

      expect(h.vision.match).toHaveBeenCalledWith({
        streamer: 'jane',
        timestamp: '2026-03-14T17:59:58.000Z',
        frameUrls: ['frames/b.jpg', 'frames/a.jpg'],
      });
    });

    it('should dead-letter an order that keeps timing out, keeping intent and match', async () => {
      h.order.create.mockRejectedValue(new TransientGatewayError('order', 'order gateway unreachable: ECONNABORTED'));

      const outcome = await h.orchestrator.process(makeEntry());

      expect(h.order.create).toHaveBeenCalledTimes(3);
      expect(h.sleep.mock.calls).toEqual([[500], [1000]]);
      expect(h.traceStore.allLinks()).toEqual([]);

      expect(outcome.state).toEqual({
        stage: 'order_failed',
        comment: makeComment(),
        intent: { commentId: 'c-1', label: 'buy', confidence: 0.94 },
        match: {
          streamer: 'jane',
          streamTimestamp: '2026-03-14T17:59:58.000Z',
          productId: 'SKU-1',
          confidence: 0.89,
        },
        reason: 'Gave up after 3 attempts: order gateway unreachable: ECONNABORTED',
      });
      expect(outcome.deadLetter).toMatchObject({
        commentId: 'c-1',
        failedStage: 'order_pending',
        errorKind: 'transient',
        attempts: 3,
        deadLetteredAt: NOW.toISOString(),
      });

      const [stored] = await h.deadLetters.list(10);
      expect(stored?.state.stage).toBe('order_failed');
      expect(await h.deadLetters.size()).toBe(1);
    });

    it('should dead-letter a permanent failure without retrying', async () => {
      h.vision.match.mockRejectedValueOnce(
        new PermanentGatewayError('vision', 'vision gateway rejected request with 422', 422)
      );

      const outcome = await h.orchestrator.process(makeEntry());

      expect(h.vision.match).toHaveBeenCalledTimes(1);
      expect(h.sleep).not.toHaveBeenCalled();
      expect(outcome.state.stage).toBe('vision_pending');
      expect(outcome.deadLetter).toMatchObject({
        failedStage: 'vision_pending',
        errorKind: 'permanent',
        attempts: 1,
        reason: 'vision gateway rejected request with 422',
      });
    });

    it('should retry a flaky intent service and carry on', async () => {
      h.intent.classify.mockRejectedValueOnce(new TransientGatewayError('intent', 'intent gateway returned 503', 503));

      const outcome = await h.orchestrator.process(makeEntry());

      expect(h.intent.classify).toHaveBeenCalledTimes(2);
      expect(h.sleep).toHaveBeenCalledWith(500);
      expect(outcome.state.stage).toBe('complete');
    });

    it('should dead-letter an order the service created as failed', async () => {
      h.order.create.mockResolvedValueOnce(makeOrder({ status: 'failed' }));

      const outcome = await h.orchestrator.process(makeEntry());

      expect(outcome.state.stage).toBe('order_failed');
      expect(outcome.deadLetter).toMatchObject({
        failedStage: 'order_pending',
        errorKind: 'permanent',
        reason: 'Order ORD-1 was created with status failed',
      });
      expect(h.traceStore.allLinks()).toEqual([]);
    });

    it('should dead-letter at queued when the comment cannot be recorded', async () => {
      jest.spyOn(h.traceStore, 'recordComment').mockRejectedValueOnce(new Error('connection refused'));

      const outcome = await h.orchestrator.process(makeEntry());

      expect(h.intent.classify).not.toHaveBeenCalled();
      expect(outcome.state).toEqual({ stage: 'queued', comment: makeComment() });
      expect(outcome.deadLetter).toMatchObject({
        failedStage: 'queued',
        errorKind: 'internal',
        reason: 'connection refused',
      });
    });

    it('should keep the order when the notification fails', async () => {
      h.notification.send.mockResolvedValueOnce('failed');

      const outcome = await h.orchestrator.process(makeEntry());

      expect(outcome.state.stage).toBe('notification_failed');
      expect(outcome.deadLetter).toBeNull();
      expect(h.traceStore.allLinks()).toEqual([{ commentId: 'c-1', orderId: 'ORD-1' }]);
      expect((await h.traceStore.findByOrder('ORD-1'))?.notifications).toEqual([
        { orderId: 'ORD-1', channel: 'whatsapp', status: 'failed', attempt: 1 },
      ]);
    });

    it('should record the last attempt when notification retries run out', async () => {
      h.notification.send.mockRejectedValue(new TransientGatewayError('notification', 'notification gateway returned 502'));

      const outcome = await h.orchestrator.process(makeEntry());

      expect(outcome.state.stage).toBe('notification_failed');
      expect(h.notification.send).toHaveBeenCalledTimes(3);
      expect((await h.traceStore.findByOrder('ORD-1'))?.notifications).toEqual([
        { orderId: 'ORD-1', channel: 'whatsapp', status: 'failed', attempt: 3 },
      ]);
    });
  });

  describe('idempotency', () => {
    it('should create one order when the same comment is processed twice', async () => {
      const first = await h.orchestrator.process(makeEntry());
      const second = await h.orchestrator.process(makeEntry());

      expect(first.duplicateOrder).toBe(false);
      expect(second.duplicateOrder).toBe(true);
      expect(second.state.stage).toBe('complete');
      expect(h.order.create).toHaveBeenCalledTimes(1);
      expect(h.notification.send).toHaveBeenCalledTimes(1);
      expect(h.traceStore.allLinks()).toEqual([{ commentId: 'c-1', orderId: 'ORD-1' }]);
    });

    it('should not classify a linked comment again', async () => {
      await h.orchestrator.process(makeEntry());
      const before = await h.traceStore.findByOrder('ORD-1');
      h.intent.classify.mockResolvedValueOnce({ commentId: 'c-1', label: 'feedback', confidence: 0.9 });

      const second = await h.orchestrator.process(makeEntry());

      expect(second.state.stage).toBe('complete');
      expect(h.intent.classify).toHaveBeenCalledTimes(1);
      expect(h.traceStore.intentFor('c-1')).toEqual({ commentId: 'c-1', label: 'buy', confidence: 0.94 });
      expect(await h.traceStore.findByOrder('ORD-1')).toEqual(before);
    });

    it('should not match a linked comment again', async () => {
      await h.orchestrator.process(makeEntry());
      const before = await h.traceStore.findByOrder('ORD-1');
      h.vision.match.mockResolvedValueOnce({
        streamer: 'jane',
        streamTimestamp: '2026-03-14T17:59:58.000Z',
        productId: 'SKU-9',
        confidence: 0.99,
      });

      await h.orchestrator.process(makeEntry());

      expect(h.vision.match).toHaveBeenCalledTimes(1);
      const after = await h.traceStore.findByOrder('ORD-1');
      expect(after?.match?.productId).toBe('SKU-1');
      expect(after?.order?.productId).toBe('SKU-1');
      expect(after).toEqual(before);
    });

    it('should notify a duplicate whose first notification failed', async () => {
      h.notification.send.mockResolvedValueOnce('failed');
      await h.orchestrator.process(makeEntry());

      const second = await h.orchestrator.process(makeEntry());

      expect(second.state.stage).toBe('complete');
      expect(h.order.create).toHaveBeenCalledTimes(1);
      expect(h.notification.send).toHaveBeenCalledTimes(2);
      expect(h.intent.classify).toHaveBeenCalledTimes(1);
    });

    it('should place the order for a link whose order record is missing', async () => {
      const comment = makeComment();
      await h.traceStore.recordComment(comment);
      await h.traceStore.recordIntent({ commentId: 'c-1', label: 'buy', confidence: 0.94 });
      await h.traceStore.recordMatch('c-1', {
        streamer: 'jane',
        streamTimestamp: comment.receivedAt,
        productId: 'SKU-1',
        confidence: 0.89,
      });
      await h.traceStore.recordLink('c-1', 'ORD-1');

      const outcome = await h.orchestrator.process(makeEntry());

      expect(outcome.state.stage).toBe('complete');
      expect(outcome.duplicateOrder).toBe(false);
      expect(h.intent.classify).not.toHaveBeenCalled();
      expect(h.vision.match).not.toHaveBeenCalled();
      expect(h.order.create).toHaveBeenCalledWith(expect.objectContaining({ idempotencyKey: 'c-1' }));
    });
  });

  describe('resume', () => {
    it('should complete a dead-lettered order once the service recovers', async () => {
      const timeout = new TransientGatewayError('order', 'order gateway unreachable: ECONNABORTED');
      h.order.create.mockRejectedValueOnce(timeout).mockRejectedValueOnce(timeout).mockRejectedValueOnce(timeout);

      const failed = await h.orchestrator.process(makeEntry());
      const letter = await h.deadLetters.take(failed.deadLetter?.id ?? '');
      expect(letter).not.toBeNull();
      if (!letter) {
        return;
      }

      const resumed = await h.orchestrator.resume(letter.state);

      expect(resumed.state.stage).toBe('complete');
      expect(resumed.deadLetter).toBeNull();
      expect(h.order.create).toHaveBeenCalledTimes(4);
      expect(h.intent.classify).toHaveBeenCalledTimes(1);
      expect(h.traceStore.allLinks()).toEqual([{ commentId: 'c-1', orderId: 'ORD-1' }]);
      expect(await h.deadLetters.size()).toBe(0);
    });

    it('should start over from a queued state', async () => {
      const resumed = await h.orchestrator.resume({ stage: 'queued', comment: makeComment() });

      expect(resumed.state.stage).toBe('complete');
      expect(h.traceStore.hasComment('c-1')).toBe(true);
    });

    it('should return a terminal state untouched', async () => {
      const state = {
        stage: 'intent_gated_out' as const,
        comment: makeComment(),
        intent: { commentId: 'c-1', label: 'none' as const, confidence: 0.1 },
      };

      const resumed = await h.orchestrator.resume(state);

      expect(resumed.state).toBe(state);
      expect(h.intent.classify).not.toHaveBeenCalled();
    });
  });

  describe('formatOrderMessage', () => {
    it('should include the order id, product, quantity and total', () => {
      expect(formatOrderMessage(makeOrder({ quantity: 2, totalPrice: 159.98 }))).toBe(
        'Your order ORD-1 for SKU-1 (x2) is pending. Total: 159.98'
      );
    });
  });
});
