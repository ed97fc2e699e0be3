/**
 * Flush Scheduler
 *
 * Single timer loop that drains the buffer every `intervalMs` once it holds
 * at least `minimumLines` lines. The next tick is armed only after the
 * current flush settles, so at most one delivery runs at a time.
 */

import { logger } from '../logger.js';
import type { LogBuffer } from '../buffer/LogBuffer.js';
import type { FlushHandler, FlushSchedulerConfig } from './types.js';

export class FlushScheduler {
  private readonly config: FlushSchedulerConfig;
  private readonly buffer: LogBuffer;
  private readonly onFlush: FlushHandler;
  private controller = new AbortController();
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;
  private isRunning = false;
  private finalDrained = false;

  constructor(config: FlushSchedulerConfig, buffer: LogBuffer, onFlush: FlushHandler) {
    this.config = config;
    this.buffer = buffer;
    this.onFlush = onFlush;
  }

  /**
   * Start the tick loop
   */
  start(): void {
    if (this.stopping) {
      logger.warn('Flush scheduler already stopped');
      return;
    }

    if (this.isRunning) {
      logger.warn('Flush scheduler already running');
      return;
    }

    this.isRunning = true;
    this.scheduleNext();
    logger.debug('Flush scheduler started', {
      intervalMs: this.config.intervalMs,
      minimumLines: this.config.minimumLines,
    });
  }

  /**
   * Stop ticking, interrupt back-off and make one last best-effort flush
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Flush whatever is buffered now, ignoring `minimumLines`.
   * Queued behind any flush already in progress.
   */
  flushNow(): Promise<void> {
    return this.enqueue(() => this.runCycle(true, false));
  }

  get running(): boolean {
    return this.isRunning;
  }

  /** True once the final flush has taken the buffer */
  get drained(): boolean {
    return this.finalDrained;
  }

  private async shutdown(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller.abort();

    await this.inFlight;
    await this.enqueue(() => this.runCycle(true, true));
    logger.debug('Flush scheduler stopped');
  }

  private scheduleNext(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.enqueue(() => this.tick());
    }, this.config.intervalMs);

    // Do not keep the host process alive just for log shipping
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    try {
      await this.runCycle(false, false);
    } finally {
      if (this.isRunning) {
        this.scheduleNext();
      }
    }
  }

  private async runCycle(force: boolean, final: boolean): Promise<void> {
    if (final) {
      this.finalDrained = true;
    }

    const lines = this.buffer.lineCount;
    if (lines === 0 || (!force && lines < this.config.minimumLines)) {
      return;
    }

    const batch = this.buffer.drainAll();
    await this.onFlush(batch, {
      signal: final ? undefined : this.controller.signal,
      final,
    });
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    this.inFlight = this.inFlight.then(task).catch((error: unknown) => {
      logger.error('Flush failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return this.inFlight;
  }
}
