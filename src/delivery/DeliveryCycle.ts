/**
 * Delivery Cycle
 *
 * Turns one drained batch into Bot API calls:
 * - batches above `pendingLogs` are uploaded as a file
 * - otherwise one message-sized chunk is taken per cycle; it fills the
 *   active message by editing it and any overflow starts a new message
 *
 * A cycle makes at most one edit and one send. Text beyond the first chunk
 * is returned as `remainder` for the next cycle, except on the final flush,
 * which keeps going until the batch is spent.
 *
 * Owns the DeliveryState (active message id + content). Runs only on the
 * flush scheduler, so calls for one message are never issued concurrently.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { TransportError } from '../errors.js';
import type { SleepFn } from '../utils/sleep.js';
import type {
  ActiveMessage,
  DeliveryReport,
  DeliveryResult,
  DeliveryState,
  DrainedBatch,
  DroppedBatch,
  HandlerConfig,
} from '../types.js';
import type { LogTransportClient } from '../telegram/types.js';
import { formatFileCaption, formatLogMessage, messageCeiling, takeChunk } from './formatter.js';
import { RetryStateMachine } from './RetryStateMachine.js';
import type {
  DeliveryContext,
  DeliveryCycleEvents,
  RetryOutcome,
  RetryPolicy,
} from './types.js';

type ChunkOutcome = {
  reports: DeliveryReport[];
  /** Part of the chunk that could not be delivered */
  failed: { text: string; error: Error } | null;
};

type EditOutcome =
  | { status: 'edited'; report: DeliveryReport }
  | { status: 'stale'; error: Error }
  | { status: 'dropped'; error: Error };

/** Shutdown flush: a single attempt per call, no sleeping */
const FINAL_POLICY: RetryPolicy = { retryAttempts: 1, retryDelayMs: 0, maxFloodWaits: 0 };

export class DeliveryCycle extends EventEmitter<DeliveryCycleEvents> {
  private readonly config: HandlerConfig;
  private readonly client: LogTransportClient;
  private readonly sleepFn: SleepFn | undefined;
  private readonly policy: RetryPolicy;
  private readonly ceiling: number;
  private state: DeliveryState = null;

  constructor(config: HandlerConfig, client: LogTransportClient, sleepFn?: SleepFn) {
    super();
    this.config = config;
    this.client = client;
    this.sleepFn = sleepFn;
    this.policy = {
      retryAttempts: config.retryAttempts,
      retryDelayMs: config.retryDelayMs,
      maxFloodWaits: config.maxFloodWaits,
    };
    this.ceiling = messageCeiling(config.title, config.maxMessageLength);
  }

  /**
   * Deliver a drained batch. Never throws; undelivered text is returned
   * in `dropped`, text left for later in `remainder`.
   */
  async deliver(batch: DrainedBatch, context: DeliveryContext = {}): Promise<DeliveryResult> {
    if (batch.text.length === 0) {
      return { reports: [], dropped: null, remainder: '' };
    }

    if (batch.text.length > this.config.pendingLogs) {
      return this.deliverAsFile(batch.text, context);
    }

    const reports: DeliveryReport[] = [];
    let text = batch.text;

    do {
      const [chunk, rest] = takeChunk(text, this.ceiling);
      const outcome = await this.deliverChunk(chunk, context);
      reports.push(...outcome.reports);

      if (outcome.failed) {
        const lost = context.final ? outcome.failed.text + rest : outcome.failed.text;
        return {
          reports,
          dropped: this.drop(lost, outcome.failed.error),
          remainder: context.final ? '' : rest,
        };
      }
      text = rest;
    } while (context.final && text.length > 0);

    return { reports, dropped: null, remainder: text };
  }

  /**
   * Active message, if any
   */
  getState(): DeliveryState {
    return this.state;
  }

  /**
   * Largest message body this cycle will send
   */
  getMessageCeiling(): number {
    return this.ceiling;
  }

  private async deliverChunk(chunk: string, context: DeliveryContext): Promise<ChunkOutcome> {
    const active = this.state;
    if (!active) {
      return this.sendNew(chunk, context);
    }

    const combined = active.content + chunk;
    const [toEdit, overflow] =
      combined.length <= this.ceiling ? [combined, ''] : takeChunk(combined, this.ceiling);

    // Nothing of the chunk fits the active message
    if (toEdit.length <= active.content.length) {
      return this.sendNew(chunk, context);
    }

    const edited = await this.editActive(active, toEdit, context);
    if (edited.status === 'dropped') {
      return { reports: [], failed: { text: chunk, error: edited.error } };
    }

    if (edited.status === 'stale') {
      // Deleted or otherwise uneditable: continue in a fresh message
      logger.warn('Active log message can no longer be edited, starting a new one', {
        messageId: active.messageId,
        error: edited.error.message,
      });
      this.state = null;
      return this.sendNew(chunk, context);
    }

    if (overflow.length === 0) {
      return { reports: [edited.report], failed: null };
    }

    const sent = await this.sendNew(overflow, context);
    return { reports: [edited.report, ...sent.reports], failed: sent.failed };
  }

  private async editActive(
    active: ActiveMessage,
    content: string,
    context: DeliveryContext
  ): Promise<EditOutcome> {
    const outcome = await this.attempt(
      () => this.client.editMessage(active.messageId, formatLogMessage(this.config.title, content)),
      'editMessage',
      context
    );

    if (outcome.status === 'dropped') {
      const stale = outcome.error instanceof TransportError && outcome.error.isBadRequest;
      return { status: stale ? 'stale' : 'dropped', error: outcome.error };
    }

    this.state = { messageId: active.messageId, content };
    return {
      status: 'edited',
      report: {
        kind: 'edited',
        messageId: active.messageId,
        length: content.length - active.content.length,
      },
    };
  }

  private async sendNew(chunk: string, context: DeliveryContext): Promise<ChunkOutcome> {
    const outcome = await this.attempt(
      () => this.client.sendMessage(formatLogMessage(this.config.title, chunk)),
      'sendMessage',
      context
    );

    if (outcome.status === 'dropped') {
      return { reports: [], failed: { text: chunk, error: outcome.error } };
    }

    this.state = { messageId: outcome.value, content: chunk };
    return {
      reports: [{ kind: 'sent', messageId: outcome.value, length: chunk.length }],
      failed: null,
    };
  }

  private async deliverAsFile(text: string, context: DeliveryContext): Promise<DeliveryResult> {
    // The next flush starts a fresh message whether or not the upload lands
    this.state = null;

    const outcome = await this.attempt(
      () =>
        this.client.sendFile(
          this.config.fileName,
          Buffer.from(text, 'utf8'),
          formatFileCaption(this.config.title)
        ),
      'sendFile',
      context
    );

    if (outcome.status === 'dropped') {
      return { reports: [], dropped: this.drop(text, outcome.error), remainder: '' };
    }

    logger.info('Sent logs as a file, too much output for text messages', {
      characters: text.length,
      messageId: outcome.value,
    });
    return {
      reports: [{ kind: 'file', messageId: outcome.value, length: text.length }],
      dropped: null,
      remainder: '',
    };
  }

  private async attempt<T>(
    operation: () => Promise<T>,
    label: string,
    context: DeliveryContext
  ): Promise<RetryOutcome<T>> {
    const machine = new RetryStateMachine(
      context.final ? FINAL_POLICY : this.policy,
      this.sleepFn,
      context.signal
    );
    machine.on('floodWait', (retryAfterMs) => this.emit('floodWait', retryAfterMs));
    return machine.run(operation, label);
  }

  private drop(text: string, error: Error): DroppedBatch {
    logger.error('Dropping log batch after failed delivery', {
      characters: text.length,
      error: error.message,
    });
    return { text, error };
  }
}
