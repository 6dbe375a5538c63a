import { Router, Request, Response } from 'express';
import { logger } from '../config/logger.js';
import { QueueUnavailableError, ValidationError, errorMessage } from '../errors.js';
import type { IngestionService } from '../services/ingestion.service.js';

export function createCommentsRouter(ingestion: IngestionService) {
  const router = Router();

  /**
   * POST /api/comments
   * Queue a live-stream comment for processing
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const result = await ingestion.ingest(req.body);
      res.status(202).json(result);
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      if (error instanceof QueueUnavailableError) {
        logger.error('Queue unavailable, comment not enqueued', { error: error.message });
        res.status(503).json({ error: 'Queue service unavailable' });
        return;
      }
      logger.error('Ingest comment error', { error: errorMessage(error) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
