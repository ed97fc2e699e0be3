/**
 * Process hooks that give a handler its final flush before the process exits.
 * The flush timer is unref'd, so without these (or an explicit `close()`)
 * lines buffered at exit are lost.
 */

import { logger } from '../logger.js';
import type { TelegramLogHandler } from './TelegramLogHandler.js';

/**
 * Register SIGINT/SIGTERM and beforeExit hooks. Returns a function that
 * removes them again.
 */
export function registerShutdownHooks(
  handler: TelegramLogHandler,
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, flushing Telegram logs before exit`);
    void handler.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown flush', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    );
  };

  const onBeforeExit = (): void => {
    void handler.close();
  };

  for (const signal of signals) {
    process.on(signal, onSignal);
  }
  process.once('beforeExit', onBeforeExit);

  return () => {
    for (const signal of signals) {
      process.off(signal, onSignal);
    }
    process.off('beforeExit', onBeforeExit);
  };
}
