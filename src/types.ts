/**
 * Common types for the Telegram log shipper
 */

// ===========================================
// Configuration Types
// ===========================================

/**
 * Numeric chat id, or `@channelusername` for public channels
 */
export type ChatId = number | string;

/**
 * Options accepted by the handler. Only token and chatId are required.
 */
export interface TelegramLogHandlerOptions {
  /** Bot API token */
  token: string;

  /** Chat the logs are posted to */
  chatId: ChatId;

  /** Forum topic inside the chat (0 or unset = general chat) */
  topicId?: number;

  /** Header shown on every message (default: 'TGLogger') */
  title?: string;

  /** Drop lines containing any of these substrings */
  ignore?: string | Iterable<string>;

  /** Seconds between flush ticks (default: 5) */
  updateIntervalSeconds?: number;

  /** Lines required before a tick flushes (default: 1) */
  minimumLines?: number;

  /** Characters above which a flush is uploaded as a file (default: 200000) */
  pendingLogs?: number;

  /** Largest message body before a new message is started (default: 4050) */
  maxMessageLength?: number;

  /** Attempts per transport call for generic failures (default: 3) */
  retryAttempts?: number;

  /** Linear back-off step between attempts (default: 1000) */
  retryDelayMs?: number;

  /** Flood waits honoured per transport call before dropping (default: 5) */
  maxFloodWaits?: number;

  /** Name of the uploaded log file (default: 'tglogger.log') */
  fileName?: string;

  /** Call getMe when the handler starts (default: true) */
  verifyOnStart?: boolean;
}

/**
 * Resolved, immutable handler configuration
 */
export interface HandlerConfig {
  readonly token: string;
  readonly chatId: ChatId;
  readonly topicId: number | null;
  readonly title: string;
  readonly ignorePatterns: ReadonlySet<string>;
  readonly updateIntervalMs: number;
  readonly minimumLines: number;
  readonly pendingLogs: number;
  readonly maxMessageLength: number;
  readonly retryAttempts: number;
  readonly retryDelayMs: number;
  readonly maxFloodWaits: number;
  readonly fileName: string;
  readonly verifyOnStart: boolean;
}

// ===========================================
// Buffer Types
// ===========================================

/**
 * Result of draining the buffer
 */
export interface DrainedBatch {
  text: string;
  lineCount: number;
}

// ===========================================
// Delivery Types
// ===========================================

/**
 * Message currently being edited in place
 */
export interface ActiveMessage {
  messageId: number;
  content: string;
}

export type DeliveryState = ActiveMessage | null;

export type DeliveryKind = 'sent' | 'edited' | 'file';

/**
 * One successful transport call
 */
export interface DeliveryReport {
  kind: DeliveryKind;
  messageId: number;
  /** Characters of log text carried by this call */
  length: number;
}

/**
 * Log text given up on after retries were exhausted
 */
export interface DroppedBatch {
  text: string;
  error: Error;
}

/**
 * Outcome of one delivery cycle
 */
export interface DeliveryResult {
  reports: DeliveryReport[];
  dropped: DroppedBatch | null;
  /** Text left for the next cycle; goes back to the front of the buffer */
  remainder: string;
}

// ===========================================
// Event Types
// ===========================================

export type TelegramLogHandlerEvents = {
  delivered: [report: DeliveryReport];
  dropped: [drop: DroppedBatch];
  floodWait: [retryAfterMs: number];
  closed: [];
};
