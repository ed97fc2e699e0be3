/**
 * Types for the Telegram transport
 */

import type { ChatId } from '../types.js';

export interface TelegramClientConfig {
  botToken: string;
  chatId: ChatId;
  /** Forum topic, or null for the general chat */
  topicId: number | null;
}

/**
 * The three Bot API operations the delivery cycle needs, plus a
 * connection check. Implementations raise FloodWaitError or
 * TransportError and never retry.
 */
export interface LogTransportClient {
  /** Post a new message, resolving with its id */
  sendMessage(text: string): Promise<number>;

  /** Replace the text of a message posted earlier */
  editMessage(messageId: number, text: string): Promise<void>;

  /** Upload a document, resolving with the message id */
  sendFile(fileName: string, content: Buffer, caption: string): Promise<number>;

  /** Bot username, or null when the token is rejected */
  verifyConnection(): Promise<string | null>;
}
