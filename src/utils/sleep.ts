import { DeliveryCancelledError } from '../errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Sleep for specified milliseconds; rejects early when the signal aborts
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DeliveryCancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new DeliveryCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
