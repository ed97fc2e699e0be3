/**
 * Telegram Log Shipper
 *
 * Streams application log lines to a Telegram chat. Lines are buffered,
 * flushed on a fixed cadence, appended to one message by editing it in
 * place, and uploaded as a file when a burst is too large for messages.
 *
 * @example
 * ```typescript
 * import winston from 'winston';
 * import { WinstonTelegramTransport, registerShutdownHooks } from 'telegram-log-shipper';
 *
 * const transport = new WinstonTelegramTransport({
 *   telegram: {
 *     token: process.env.TGLOG_BOT_TOKEN ?? '',
 *     chatId: -1001234567890,
 *     title: 'api-server',
 *     ignore: ['healthcheck'],
 *   },
 * });
 * registerShutdownHooks(transport.handler);
 *
 * const logger = winston.createLogger({
 *   format: winston.format.simple(),
 *   transports: [new winston.transports.Console(), transport],
 * });
 * ```
 */

export * from './handler/index.js';
export { LogBuffer } from './buffer/index.js';
export { shouldInclude, normalizeIgnorePatterns } from './filter/index.js';
export {
  DeliveryCycle,
  RetryStateMachine,
  planRetry,
  formatLogMessage,
  splitIntoChunks,
} from './delivery/index.js';
export type { RetryPolicy, RetryState, RetryDecision, RetryOutcome } from './delivery/index.js';
export { FlushScheduler } from './scheduler/index.js';
export { TelegramClient } from './telegram/index.js';
export type { LogTransportClient, TelegramClientConfig } from './telegram/index.js';
export { resolveHandlerConfig, loadHandlerOptionsFromEnv, DEFAULTS } from './config.js';
export {
  TelegramLogError,
  ConfigurationError,
  FloodWaitError,
  TransportError,
  DeliveryCancelledError,
} from './errors.js';
export type * from './types.js';
