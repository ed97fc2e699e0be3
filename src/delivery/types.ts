/**
 * Types for the delivery cycle
 */

/**
 * Retry budget for a single transport call
 */
export interface RetryPolicy {
  /** Total attempts for generic failures */
  retryAttempts: number;

  /** Linear back-off step (ms) */
  retryDelayMs: number;

  /** Flood waits honoured before giving up */
  maxFloodWaits: number;
}

export type RetryState = 'idle' | 'sending' | 'backoff' | 'dropped';

export interface RetryCounters {
  failures: number;
  floodWaits: number;
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number; reason: 'flood' | 'error' }
  | { action: 'drop' };

export type RetryOutcome<T> =
  | { status: 'delivered'; value: T; attempts: number }
  | { status: 'dropped'; error: Error; attempts: number };

export type RetryStateMachineEvents = {
  transition: [from: RetryState, to: RetryState];
  floodWait: [retryAfterMs: number];
};

/**
 * How a flush is being run
 */
export interface DeliveryContext {
  /** Aborted when the handler shuts down; interrupts back-off */
  signal?: AbortSignal;

  /** Shutdown flush: one attempt per call, no sleeping */
  final?: boolean;
}

export type DeliveryCycleEvents = {
  floodWait: [retryAfterMs: number];
};
