import { Router, Request, Response } from 'express';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import type { DeadLetterSink } from '../services/dead-letter.service.js';

export function createPipelineRouter(deadLetters: DeadLetterSink) {
  const router = Router();

  /**
   * GET /api/pipeline/status
   * Dead-letter backlog. Worker stats live in the worker process and are logged there
   */
  router.get('/status', async (_req: Request, res: Response) => {
    try {
      res.json({ deadLetters: await deadLetters.size() });
    } catch (error) {
      logger.error('Get pipeline status error', { error: errorMessage(error) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * GET /api/pipeline/dead-letters?limit=50
   * Oldest dead letters first
   */
  router.get('/dead-letters', async (req: Request, res: Response) => {
    try {
      const limit = Math.min(parseInt(String(req.query.limit ?? ''), 10) || 50, 500);
      const letters = await deadLetters.list(limit);
      res.json({ deadLetters: letters });
    } catch (error) {
      logger.error('List dead letters error', { error: errorMessage(error) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
