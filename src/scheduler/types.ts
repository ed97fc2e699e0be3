/**
 * Flush Scheduler Types
 */

import type { DrainedBatch } from '../types.js';
import type { DeliveryContext } from '../delivery/types.js';

export interface FlushSchedulerConfig {
  /** Delay between ticks in milliseconds */
  intervalMs: number;

  /** Lines required before a tick drains the buffer */
  minimumLines: number;
}

/**
 * Receives each drained batch; the next tick waits for it to settle
 */
export type FlushHandler = (batch: DrainedBatch, context: DeliveryContext) => Promise<void>;
