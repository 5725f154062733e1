// Load environment variables FIRST: imports are evaluated in order, and the logger reads LOG_LEVEL on load
import 'dotenv/config';

import { loadSettings } from '@/config/settings';
import { createPipeline } from '@/services/pipeline-deps';
import { logger } from '@/services/logger';
import { errorMessage } from '@/core/errors';
import { createApp } from './app';
import {
  setupUnhandledRejectionHandler,
  setupUncaughtExceptionHandler,
  setupGracefulShutdown,
  setShutdownTarget,
} from './stability/errorHandlers';

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const startServer = async () => {
  const settings = loadSettings();
  const pipeline = await createPipeline(settings);
  pipeline.start();

  const app = createApp(pipeline, settings);
  const server = app.listen(settings.PORT, () => {
    logger.info('server:listening', { port: settings.PORT, env: settings.NODE_ENV });
  });
  setShutdownTarget({ server, cleanup: () => pipeline.stop() });
};

startServer().catch((error: unknown) => {
  logger.fatal('server:start_failed', { error: errorMessage(error) });
  process.exit(1);
});
