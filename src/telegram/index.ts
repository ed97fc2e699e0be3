export { TelegramClient } from './TelegramClient.js';
export { classifyTelegramError, isNotModified } from './errors.js';
export type { TelegramClientConfig, LogTransportClient } from './types.js';
