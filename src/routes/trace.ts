import { Router, Request, Response } from 'express';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import type { TraceStore } from '../services/trace-store.service.js';

export function createTraceRouter(traceStore: TraceStore) {
  const router = Router();

  /**
   * GET /api/trace/comment/:commentId
   * Order produced by a comment, if any
   */
  router.get('/comment/:commentId', async (req: Request, res: Response) => {
    try {
      const orderId = await traceStore.findByComment(req.params.commentId ?? '');
      if (!orderId) {
        res.status(404).json({ error: 'No order for this comment' });
        return;
      }
      res.json({ commentId: req.params.commentId, orderId });
    } catch (error) {
      logger.error('Find trace by comment error', { error: errorMessage(error) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * GET /api/trace/order/:orderId
   * Full trace: comment, intent, match, order, notifications
   */
  router.get('/order/:orderId', async (req: Request, res: Response) => {
    try {
      const trace = await traceStore.findByOrder(req.params.orderId ?? '');
      if (!trace) {
        res.status(404).json({ error: 'Order not found' });
        return;
      }
      res.json(trace);
    } catch (error) {
      logger.error('Find trace by order error', { error: errorMessage(error) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
