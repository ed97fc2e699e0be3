/**
 * Winston transport that ships each formatted record to a TelegramLogHandler.
 *
 * @example
 * ```typescript
 * const logger = winston.createLogger({
 *   format: winston.format.simple(),
 *   transports: [
 *     new WinstonTelegramTransport({ telegram: { token, chatId: -1001234567890 } }),
 *   ],
 * });
 * ```
 */

import TransportStream from 'winston-transport';
import { MESSAGE } from 'triple-beam';
import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';
import { TelegramLogHandler } from './TelegramLogHandler.js';
import type { WinstonTelegramTransportOptions } from './types.js';

type LogRecord = Record<string | symbol, unknown>;

export class WinstonTelegramTransport extends TransportStream {
  readonly handler: TelegramLogHandler;

  constructor(options: WinstonTelegramTransportOptions) {
    super(options);

    const { handler, telegram } = options;
    if (handler) {
      this.handler = handler;
    } else if (telegram) {
      this.handler = new TelegramLogHandler(telegram);
      this.handler.start();
    } else {
      throw new ConfigurationError('WinstonTelegramTransport needs a handler or telegram options');
    }
  }

  log(info: LogRecord, callback: () => void): void {
    setImmediate(() => this.emit('logged', info));
    this.handler.write(formatRecord(info));
    callback();
  }

  close(): void {
    void this.handler.close().then(
      () => this.emit('closed'),
      (error: unknown) =>
        logger.error('Failed to close Telegram transport', {
          error: error instanceof Error ? error.message : String(error),
        })
    );
  }
}

/**
 * The finalized line winston's formats produced, falling back to the raw message
 */
function formatRecord(info: LogRecord): string {
  const formatted = info[MESSAGE];
  if (typeof formatted === 'string') {
    return formatted;
  }
  const level = typeof info.level === 'string' ? info.level : 'info';
  return `${level}: ${String(info.message)}`;
}
