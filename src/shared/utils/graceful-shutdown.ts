import { INestApplicationContext, Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/common/errors/scrape.errors';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Closes the Nest application once on the first termination signal, which
 * runs every OnModuleDestroy hook: the job manager drains, then the browser
 * goes down.
 */
export function setupGracefulShutdown(
  app: INestApplicationContext,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  const logger = new Logger('GracefulShutdown');
  let closing = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.log(`${signal} received: closing application...`);
    try {
      await app.close();
      logger.log('Application closed gracefully.');
      exit(0);
    } catch (error) {
      logger.error(`Error during graceful shutdown: ${errorMessage(error)}`);
      exit(1);
    }
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, (received: NodeJS.Signals) => {
      void shutdown(received);
    });
  }
}
