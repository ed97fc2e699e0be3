/**
 * In-process stand-in for the Telegram client
 */

import { vi } from 'vitest';
import type { LogTransportClient } from '../../src/telegram/types.js';

export class FakeTransportClient implements LogTransportClient {
  private nextMessageId: number;

  constructor(firstMessageId = 42) {
    this.nextMessageId = firstMessageId;
  }

  sendMessage = vi.fn(async (_text: string): Promise<number> => this.nextMessageId++);

  editMessage = vi.fn(async (_messageId: number, _text: string): Promise<void> => undefined);

  sendFile = vi.fn(
    async (_fileName: string, _content: Buffer, _caption: string): Promise<number> => 900
  );

  verifyConnection = vi.fn(async (): Promise<string | null> => 'test_bot');
}
