// POST /api/search, GET /api/stats
import express, { type Request, type Response } from 'express';
import type { SearchPipeline } from '@/services/pipeline';
import { CallerAbortedError } from '@/services/singleFlight';
import { validateSearchRequest } from '@/validation/search.validation';
import { correlationIdOf } from '@/middleware/correlation';
import { createErrorResponse, errorToResponse } from '@/utils/errorResponse';
import { errorMessage } from '@/core/errors';
import { logger } from '@/services/logger';

export type SearchService = Pick<SearchPipeline, 'run' | 'stats'>;

export function createSearchRouter(pipeline: SearchService): express.Router {
  const router = express.Router();

  router.post('/search', async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const validation = validateSearchRequest(req.body);
    if (!validation.success) {
      logger.warn('POST /api/search validation failed', { correlationId, errors: validation.error });
      res.status(400).json(createErrorResponse('Invalid request', validation.error, 'validation_error'));
      return;
    }

    // client gone: detach this caller; identical requests keep their shared run
    const disconnect = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) disconnect.abort(new Error('client disconnected'));
    });

    try {
      const response = await pipeline.run(validation.data, { signal: disconnect.signal });
      res.json(response);
    } catch (err: unknown) {
      if (err instanceof CallerAbortedError) {
        logger.info('POST /api/search client disconnected', { correlationId });
        return;
      }
      const { status, body } = errorToResponse(err);
      const context = { correlationId, status, error: errorMessage(err) };
      if (status === 500) logger.error('POST /api/search failed', context);
      else logger.warn('POST /api/search failed', context);
      res.status(status).json(body);
    }
  });

  router.get('/stats', (_req: Request, res: Response) => {
    res.json(pipeline.stats());
  });

  return router;
}
