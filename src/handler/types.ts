/**
 * Handler Types
 */

import type TransportStream from 'winston-transport';
import type { SleepFn } from '../utils/sleep.js';
import type { LogTransportClient } from '../telegram/types.js';
import type { TelegramLogHandlerOptions } from '../types.js';
import type { TelegramLogHandler } from './TelegramLogHandler.js';

/**
 * Collaborators that can be swapped, mostly for tests
 */
export interface HandlerDependencies {
  /** Defaults to a TelegramClient built from the options */
  client?: LogTransportClient;

  /** Defaults to a timer-based sleep */
  sleep?: SleepFn;
}

export interface HandlerStatus {
  running: boolean;
  closed: boolean;
  bufferedLines: number;
  bufferedCharacters: number;
  activeMessageId: number | null;
}

/**
 * Either reuse a handler or let the transport build and own one
 */
export type WinstonTelegramTransportOptions = TransportStream.TransportStreamOptions &
  (
    | { handler: TelegramLogHandler; telegram?: never }
    | { telegram: TelegramLogHandlerOptions; handler?: never }
  );
