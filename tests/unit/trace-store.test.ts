import { InMemoryTraceStore, PgTraceStore } from '../../src/services/trace-store.service';
import { makeComment, makeOrder } from '../helpers/pipeline';

/**
 * QueryFn stand-in answering by table name.
 */
function fakeQuery(rowsFor: (sql: string) => object[]) {
  const query = jest.fn();
  query.mockImplementation(async (sql: string) => {
    const rows = rowsFor(sql);
    return { rows, rowCount: rows.length, command: '', oid: 0, fields: [] };
  });
  return query;
}

describe('TraceStore', () => {
  describe('InMemoryTraceStore', () => {
    it('should link a comment to its order', async () => {
      const store = new InMemoryTraceStore();
      await store.recordComment(makeComment());
      await store.recordOrder('c-1', makeOrder());
      await store.recordLink('c-1', 'ORD-1');

      expect(await store.findByComment('c-1')).toBe('ORD-1');
      expect(await store.findByComment('c-9')).toBeNull();
    });

    it('should keep the first copy of a comment', async () => {
      const store = new InMemoryTraceStore();
      await store.recordComment(makeComment());
      await store.recordComment(makeComment({ text: 'edited' }));
      await store.recordLink('c-1', 'ORD-1');

      expect((await store.findByOrder('ORD-1'))?.comment.text).toBe('I want this jacket!');
    });

    it('should return null for an unknown order', async () => {
      const store = new InMemoryTraceStore();
      expect(await store.findByOrder('ORD-404')).toBeNull();
      expect(await store.findOrder('ORD-404')).toBeNull();
    });

    it('should only include notifications for the requested order', async () => {
      const store = new InMemoryTraceStore();
      await store.recordComment(makeComment());
      await store.recordLink('c-1', 'ORD-1');
      await store.recordNotification({ orderId: 'ORD-1', channel: 'whatsapp', status: 'failed', attempt: 3 });
      await store.recordNotification({ orderId: 'ORD-2', channel: 'sms', status: 'sent', attempt: 1 });

      const trace = await store.findByOrder('ORD-1');

      expect(trace?.notifications).toEqual([{ orderId: 'ORD-1', channel: 'whatsapp', status: 'failed', attempt: 3 }]);
      expect(trace?.intent).toBeNull();
      expect(trace?.order).toBeNull();
    });
  });

  describe('PgTraceStore', () => {
    it('should insert the comment with a pending intent', async () => {
      const query = fakeQuery(() => []);

      await new PgTraceStore(query).recordComment(makeComment());

      expect(query).toHaveBeenCalledWith(
        expect.stringContaining(`VALUES ($1, $2, $3, $4, 'pending', $5)`),
        ['c-1', 'jane', 'mike', 'I want this jacket!', '2026-03-14T17:59:58.000Z']
      );
    });

    it('should return the first linked order for a comment', async () => {
      const query = fakeQuery(() => [{ order_id: 'ORD-1' }]);

      expect(await new PgTraceStore(query).findByComment('c-1')).toBe('ORD-1');
      expect(query).toHaveBeenCalledWith(expect.stringContaining('FROM chat_message_order_mapping'), ['c-1']);
    });

    it('should assemble the full trace from its tables', async () => {
      const query = fakeQuery((sql) => {
        if (sql.includes('FROM chat_message_order_mapping')) {
          return [{ chat_message_id: 'c-1' }];
        }
        if (sql.includes('FROM chat_messages')) {
          return [
            {
              id: 'c-1',
              streamer: 'jane',
              client: 'mike',
              message: 'I want this jacket!',
              intent: 'buy',
              intent_score: 0.94,
              timestamp: new Date('2026-03-14T17:59:58.000Z'),
            },
          ];
        }
        if (sql.includes('FROM product_matches')) {
          return [
            {
              streamer: 'jane',
              stream_timestamp: new Date('2026-03-14T17:59:58.000Z'),
              product_id: 'SKU-1',
              vision_score: 0.89,
            },
          ];
        }
        if (sql.includes('FROM payment_notifications')) {
          return [{ order_id: 'ORD-1', notification_type: 'whatsapp', status: 'sent', retry_count: 1 }];
        }
        if (sql.includes('FROM orders')) {
          return [
            {
              id: 'ORD-1',
              product_id: 'SKU-1',
              buyer: 'mike',
              streamer: 'jane',
              quantity: 1,
              total_price: '79.99',
              status: 'pending',
            },
          ];
        }
        return [];
      });

      const trace = await new PgTraceStore(query).findByOrder('ORD-1');

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
      expect(query).toHaveBeenCalledWith(expect.stringContaining('FROM product_matches'), ['c-1', 'ORD-1']);
    });

    it('should leave the intent empty while it is still pending', async () => {
      const query = fakeQuery((sql) => {
        if (sql.includes('FROM chat_message_order_mapping')) {
          return [{ chat_message_id: 'c-1' }];
        }
        if (sql.includes('FROM chat_messages')) {
          return [
            {
              id: 'c-1',
              streamer: 'jane',
              client: 'mike',
              message: 'hi',
              intent: 'pending',
              intent_score: null,
              timestamp: '2026-03-14T17:59:58.000Z',
            },
          ];
        }
        return [];
      });

      const trace = await new PgTraceStore(query).findByOrder('ORD-1');

      expect(trace?.intent).toBeNull();
      expect(trace?.match).toBeNull();
      expect(trace?.order).toBeNull();
    });
  });
});
