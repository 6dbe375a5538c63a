import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { logger } from './config/logger.js';
import type { DeadLetterSink } from './services/dead-letter.service.js';
import type { IngestionService } from './services/ingestion.service.js';
import type { TraceStore } from './services/trace-store.service.js';
import { createCommentsRouter } from './routes/comments.js';
import { createTraceRouter } from './routes/trace.js';
import { createPipelineRouter } from './routes/pipeline.js';

export interface AppDeps {
  ingestion: IngestionService;
  traceStore: TraceStore;
  deadLetters: DeadLetterSink;
}

export function createApp(deps: AppDeps) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.use('/api/comments', createCommentsRouter(deps.ingestion));
  app.use('/api/trace', createTraceRouter(deps.traceStore));
  app.use('/api/pipeline', createPipelineRouter(deps.deadLetters));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
    });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
