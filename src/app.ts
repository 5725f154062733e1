// Express application around a pipeline instance
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import type { Settings } from '@/config/settings';
import type { SearchPipeline } from '@/services/pipeline';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createSearchRouter } from '@/routes/search';
import { createHealthRouter } from '@/routes/health';

export function createApp(pipeline: SearchPipeline, settings: Settings): express.Express {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: settings.ALLOWED_ORIGINS.includes('*') ? '*' : settings.ALLOWED_ORIGINS,
    }),
  );
  app.use(attachCorrelationId);
  app.use(morgan(settings.NODE_ENV === 'development' ? 'dev' : 'combined'));
  app.use(express.json({ limit: '16kb' }));

  app.use(createHealthRouter(pipeline));
  app.use(
    '/api',
    rateLimit({
      windowMs: 60 * 1000,
      max: settings.RATE_LIMIT_PER_MINUTE,
      standardHeaders: true,
      legacyHeaders: false,
    }),
    createSearchRouter(pipeline),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
