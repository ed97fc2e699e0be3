/**
 * Retry State Machine
 *
 * Runs one transport call with bounded retries:
 *
 *   idle → sending → idle            (delivered)
 *            ↓  ↑
 *          backoff → dropped         (budget spent or cancelled)
 *
 * Flood waits sleep for the interval Telegram asks for; 400 Bad Request
 * drops at once; other failures back off linearly (retryDelayMs × attempt).
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { DeliveryCancelledError, FloodWaitError, TransportError, toError } from '../errors.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';
import type {
  RetryCounters,
  RetryDecision,
  RetryOutcome,
  RetryPolicy,
  RetryState,
  RetryStateMachineEvents,
} from './types.js';

/**
 * Decide what to do after a failed attempt. Pure, so the termination
 * guarantee can be checked without timers.
 *
 * `counters.failures` includes the failure being planned for;
 * `counters.floodWaits` counts the waits already honoured.
 */
export function planRetry(
  error: Error,
  counters: RetryCounters,
  policy: RetryPolicy
): RetryDecision {
  if (error instanceof DeliveryCancelledError) {
    return { action: 'drop' };
  }

  // A rejected request fails the same way every time
  if (error instanceof TransportError && error.isBadRequest) {
    return { action: 'drop' };
  }

  if (error instanceof FloodWaitError) {
    if (counters.floodWaits >= policy.maxFloodWaits) {
      return { action: 'drop' };
    }
    const delayMs =
      error.retryAfterMs > 0
        ? error.retryAfterMs
        : policy.retryDelayMs * (counters.floodWaits + 1);
    return { action: 'retry', delayMs, reason: 'flood' };
  }

  if (counters.failures >= policy.retryAttempts) {
    return { action: 'drop' };
  }
  return {
    action: 'retry',
    delayMs: policy.retryDelayMs * counters.failures,
    reason: 'error',
  };
}

export class RetryStateMachine extends EventEmitter<RetryStateMachineEvents> {
  private current: RetryState = 'idle';

  constructor(
    private readonly policy: RetryPolicy,
    private readonly sleepFn: SleepFn = defaultSleep,
    private readonly signal?: AbortSignal
  ) {
    super();
  }

  get state(): RetryState {
    return this.current;
  }

  /**
   * Run the operation until it succeeds or the retry budget is spent
   */
  async run<T>(operation: () => Promise<T>, label: string): Promise<RetryOutcome<T>> {
    const counters: RetryCounters = { failures: 0, floodWaits: 0 };
    let attempts = 0;

    for (;;) {
      this.transition('sending');
      attempts++;

      try {
        const value = await operation();
        this.transition('idle');
        return { status: 'delivered', value, attempts };
      } catch (error) {
        const failure = toError(error);
        if (!(failure instanceof FloodWaitError)) {
          counters.failures++;
        }

        const decision = planRetry(failure, counters, this.policy);
        if (decision.action === 'drop') {
          this.transition('dropped');
          return { status: 'dropped', error: failure, attempts };
        }

        if (decision.reason === 'flood') {
          counters.floodWaits++;
          logger.warn(`Telegram flood wait during ${label}, sleeping`, {
            waitMs: decision.delayMs,
            floodWaits: counters.floodWaits,
          });
          this.emit('floodWait', decision.delayMs);
        } else {
          logger.warn(`${label} failed, attempt ${counters.failures}/${this.policy.retryAttempts}`, {
            error: failure.message,
            retryInMs: decision.delayMs,
          });
        }

        this.transition('backoff');
        try {
          await this.sleepFn(decision.delayMs, this.signal);
        } catch (sleepError) {
          this.transition('dropped');
          return { status: 'dropped', error: toError(sleepError), attempts };
        }
      }
    }
  }

  private transition(next: RetryState): void {
    if (next === this.current) return;
    const previous = this.current;
    this.current = next;
    this.emit('transition', previous, next);
  }
}
