/**
 * Telegram Log Handler
 *
 * Wires the pipeline for one destination chat:
 * Filter → LogBuffer → FlushScheduler → DeliveryCycle → TelegramClient
 *
 * `write` is the producer side. It is synchronous, never throws and never
 * waits on the network. All I/O happens on the scheduler.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { resolveHandlerConfig } from '../config.js';
import { toError } from '../errors.js';
import { shouldInclude } from '../filter/index.js';
import { LogBuffer } from '../buffer/index.js';
import { DeliveryCycle } from '../delivery/index.js';
import type { DeliveryContext } from '../delivery/types.js';
import { FlushScheduler } from '../scheduler/index.js';
import { TelegramClient } from '../telegram/index.js';
import type { LogTransportClient } from '../telegram/types.js';
import type {
  DeliveryState,
  DrainedBatch,
  HandlerConfig,
  TelegramLogHandlerEvents,
  TelegramLogHandlerOptions,
} from '../types.js';
import type { HandlerDependencies, HandlerStatus } from './types.js';

export class TelegramLogHandler extends EventEmitter<TelegramLogHandlerEvents> {
  readonly config: HandlerConfig;
  private readonly client: LogTransportClient;
  private readonly buffer = new LogBuffer();
  private readonly delivery: DeliveryCycle;
  private readonly scheduler: FlushScheduler;
  private closing: Promise<void> | null = null;
  private lateWriteWarned = false;

  constructor(options: TelegramLogHandlerOptions, dependencies: HandlerDependencies = {}) {
    super();
    this.config = resolveHandlerConfig(options);

    this.client =
      dependencies.client ??
      new TelegramClient({
        botToken: this.config.token,
        chatId: this.config.chatId,
        topicId: this.config.topicId,
      });

    this.delivery = new DeliveryCycle(this.config, this.client, dependencies.sleep);
    this.delivery.on('floodWait', (retryAfterMs) => this.emit('floodWait', retryAfterMs));

    this.scheduler = new FlushScheduler(
      { intervalMs: this.config.updateIntervalMs, minimumLines: this.config.minimumLines },
      this.buffer,
      (batch, context) => this.handleFlush(batch, context)
    );

    logger.info('Telegram log handler initialized', {
      title: this.config.title,
      updateIntervalMs: this.config.updateIntervalMs,
      minimumLines: this.config.minimumLines,
      pendingLogs: this.config.pendingLogs,
      ignorePatterns: this.config.ignorePatterns.size,
    });
  }

  /**
   * Queue one formatted log line
   */
  write(line: string): void {
    // Lines written while closing still make the final flush
    if (this.scheduler.drained) {
      if (!this.lateWriteWarned) {
        this.lateWriteWarned = true;
        logger.warn('Log lines written after the final flush are not shipped');
      }
      return;
    }

    try {
      if (!shouldInclude(line, this.config.ignorePatterns)) return;
      this.buffer.append(line);
    } catch (error) {
      logger.error('Failed to buffer log line', { error: toError(error).message });
    }
  }

  /**
   * Start the flush loop (and verify the bot token unless disabled)
   */
  start(): void {
    this.scheduler.start();

    if (this.config.verifyOnStart) {
      void this.verify();
    }
  }

  /**
   * Run a delivery cycle now, regardless of `minimumLines`
   */
  flush(): Promise<void> {
    return this.scheduler.flushNow();
  }

  /**
   * Stop the loop and make a final best-effort flush
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.scheduler.stop().then(() => {
        logger.info('Telegram log handler closed');
        this.emit('closed');
      });
    }
    return this.closing;
  }

  getDeliveryState(): DeliveryState {
    return this.delivery.getState();
  }

  getStatus(): HandlerStatus {
    return {
      running: this.scheduler.running,
      closed: this.closing !== null,
      bufferedLines: this.buffer.lineCount,
      bufferedCharacters: this.buffer.length,
      activeMessageId: this.delivery.getState()?.messageId ?? null,
    };
  }

  private async handleFlush(batch: DrainedBatch, context: DeliveryContext): Promise<void> {
    const result = await this.delivery.deliver(batch, context);
    if (result.remainder.length > 0) {
      this.buffer.prepend(result.remainder);
    }

    for (const report of result.reports) {
      this.emit('delivered', report);
    }
    if (result.dropped) {
      this.emit('dropped', result.dropped);
    }
  }

  private async verify(): Promise<void> {
    let username: string | null;
    try {
      username = await this.client.verifyConnection();
    } catch (error) {
      logger.error('Bot verification failed', { error: toError(error).message });
      return;
    }
    if (username === null) {
      logger.error('Invalid bot token provided, log delivery will keep failing');
    }
  }
}

/**
 * Build and start a handler
 */
export function createTelegramLogHandler(
  options: TelegramLogHandlerOptions,
  dependencies: HandlerDependencies = {}
): TelegramLogHandler {
  const handler = new TelegramLogHandler(options, dependencies);
  handler.start();
  return handler;
}
