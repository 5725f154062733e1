// Process-level handlers: unhandled rejections, uncaught exceptions, graceful shutdown

import type { Server } from 'http';
import { errorMessage } from '@/core/errors';
import { logger } from '@/services/logger';

export interface ShutdownTarget {
  server: Server;
  /** Releases timers, caches and connections. */
  cleanup: () => Promise<void>;
  /** Forced exit after this long (ms). */
  timeoutMs?: number;
}

let target: ShutdownTarget | null = null;
let shuttingDown = false;

export function setShutdownTarget(next: ShutdownTarget): void {
  target = next;
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => {
      void gracefulShutdown(signal, 0);
    });
  }
}

/** Stops accepting connections, lets in-flight requests drain, runs cleanup, exits. */
export async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:shutdown_forced');
    process.exit(1);
  }, target?.timeoutMs ?? 15_000);
  forced.unref();

  try {
    if (target) {
      const { server, cleanup } = target;
      await new Promise<void>((resolve) => {
        server.close((err) => {
          if (err) logger.warn('process:server_close_failed', { error: err.message });
          resolve();
        });
      });
      await cleanup();
    }
    logger.info('process:shutdown_complete');
    process.exit(exitCode);
  } catch (error) {
    logger.error('process:shutdown_failed', { error: errorMessage(error) });
    process.exit(1);
  }
}
