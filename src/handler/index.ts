export { TelegramLogHandler, createTelegramLogHandler } from './TelegramLogHandler.js';
export { WinstonTelegramTransport } from './WinstonTelegramTransport.js';
export type {
  HandlerDependencies,
  HandlerStatus,
  WinstonTelegramTransportOptions,
} from './types.js';
export { registerShutdownHooks } from './shutdown.js';
