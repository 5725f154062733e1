import express, { type Request, type Response } from 'express';
import type { SearchPipeline } from '@/services/pipeline';

export function createHealthRouter(pipeline: Pick<SearchPipeline, 'health'>): express.Router {
  const router = express.Router();

  router.get('/health', (_req: Request, res: Response) => {
    const report = pipeline.health();
    res.status(report.status === 'unhealthy' ? 503 : 200).json(report);
  });

  return router;
}
