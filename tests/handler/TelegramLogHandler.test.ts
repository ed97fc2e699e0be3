/**
 * Tests for the Telegram log handler
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  TelegramLogHandler,
  createTelegramLogHandler,
} from '../../src/handler/TelegramLogHandler.js';
import { formatFileCaption, formatLogMessage } from '../../src/delivery/formatter.js';
import { ConfigurationError, TransportError } from '../../src/errors.js';
import type { DeliveryReport, DroppedBatch, TelegramLogHandlerOptions } from '../../src/types.js';
import { FakeTransportClient } from '../helpers/FakeTransportClient.js';

describe('TelegramLogHandler', () => {
  let client: FakeTransportClient;
  let sleep: ReturnType<typeof vi.fn>;

  function createHandler(overrides: Partial<TelegramLogHandlerOptions> = {}): TelegramLogHandler {
    return new TelegramLogHandler(
      {
        token: 'test-token',
        chatId: -100123,
        updateIntervalSeconds: 2,
        verifyOnStart: false,
        ...overrides,
      },
      { client, sleep }
    );
  }

  beforeEach(() => {
    vi.useFakeTimers();
    client = new FakeTransportClient();
    sleep = vi.fn().mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject invalid options at construction', () => {
    expect(() => createHandler({ token: '' })).toThrow(ConfigurationError);
  });

  it('should send buffered lines as one message on the next tick', async () => {
    const handler = createHandler();
    const delivered: DeliveryReport[] = [];
    handler.on('delivered', (report) => delivered.push(report));
    handler.start();

    handler.write('line 1');
    handler.write('line 2');
    handler.write('line 3');
    await vi.advanceTimersByTimeAsync(1999);
    expect(client.sendMessage).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);

    expect(client.sendMessage).toHaveBeenCalledTimes(1);
    expect(client.sendMessage).toHaveBeenCalledWith(
      formatLogMessage('TGLogger', 'line 1\nline 2\nline 3\n')
    );
    expect(delivered).toEqual([{ kind: 'sent', messageId: 42, length: 21 }]);
    await handler.close();
  });

  it('should edit the same message on the following tick', async () => {
    const handler = createHandler({ title: 'api' });
    handler.start();

    handler.write('first');
    await vi.advanceTimersByTimeAsync(2000);
    handler.write('second');
    await vi.advanceTimersByTimeAsync(2000);

    expect(client.sendMessage).toHaveBeenCalledTimes(1);
    expect(client.editMessage).toHaveBeenCalledWith(42, formatLogMessage('api', 'first\nsecond\n'));
    expect(handler.getDeliveryState()).toEqual({ messageId: 42, content: 'first\nsecond\n' });
    await handler.close();
  });

  it('should upload a flood of output as a file, then start a new message', async () => {
    const handler = createHandler();
    handler.start();
    const huge = 'x'.repeat(250_000);

    handler.write(huge);
    await vi.advanceTimersByTimeAsync(2000);

    expect(client.sendFile).toHaveBeenCalledWith(
      'tglogger.log',
      Buffer.from(`${huge}\n`, 'utf8'),
      formatFileCaption('TGLogger')
    );
    expect(client.sendMessage).not.toHaveBeenCalled();

    handler.write('after');
    await vi.advanceTimersByTimeAsync(2000);

    expect(client.sendMessage).toHaveBeenCalledWith(formatLogMessage('TGLogger', 'after\n'));
    expect(client.editMessage).not.toHaveBeenCalled();
    await handler.close();
  });

  it('should ship at most one message per tick and keep the rest buffered', async () => {
    const handler = createHandler();
    const line = `${'x'.repeat(99)}\n`;
    handler.start();

    handler.write('boot');
    await vi.advanceTimersByTimeAsync(2000);
    handler.write(line.repeat(100));
    await vi.advanceTimersByTimeAsync(2000);

    expect(client.sendMessage).toHaveBeenCalledTimes(1);
    expect(client.editMessage).toHaveBeenCalledTimes(1);
    expect(client.editMessage).toHaveBeenCalledWith(
      42,
      formatLogMessage('TGLogger', `boot\n${line.repeat(40)}`)
    );
    expect(handler.getStatus()).toMatchObject({ bufferedLines: 60, bufferedCharacters: 6000 });
    await handler.close();
  });

  it('should drop lines matching an ignore pattern', async () => {
    const handler = createHandler({ ignore: ['healthcheck', 'DEBUG'] });
    handler.start();

    handler.write('GET /healthcheck 200');
    handler.write('INFO user signed in');
    handler.write('DEBUG cache warm');
    await vi.advanceTimersByTimeAsync(2000);

    expect(client.sendMessage).toHaveBeenCalledWith(
      formatLogMessage('TGLogger', 'INFO user signed in\n')
    );
    await handler.close();
  });

  it('should hold lines until minimumLines is reached', async () => {
    const handler = createHandler({ minimumLines: 2 });
    handler.start();

    handler.write('one');
    await vi.advanceTimersByTimeAsync(2000);
    expect(client.sendMessage).not.toHaveBeenCalled();

    handler.write('two');
    await vi.advanceTimersByTimeAsync(2000);
    expect(client.sendMessage).toHaveBeenCalledWith(formatLogMessage('TGLogger', 'one\ntwo\n'));
    await handler.close();
  });

  it('should flush on demand', async () => {
    const handler = createHandler({ minimumLines: 100 });
    handler.start();
    handler.write('urgent');

    await handler.flush();

    expect(client.sendMessage).toHaveBeenCalledWith(formatLogMessage('TGLogger', 'urgent\n'));
    await handler.close();
  });

  it('should emit dropped once retries are exhausted', async () => {
    const handler = createHandler({ retryAttempts: 2 });
    const failure = new TransportError('Bad Gateway', 502);
    client.sendMessage.mockRejectedValue(failure);
    const dropped: DroppedBatch[] = [];
    handler.on('dropped', (drop) => dropped.push(drop));
    handler.start();

    handler.write('lost line');
    await vi.advanceTimersByTimeAsync(2000);

    expect(client.sendMessage).toHaveBeenCalledTimes(2);
    expect(dropped).toEqual([{ text: 'lost line\n', error: failure }]);
    await handler.close();
  });

  it('should flush pending lines on close and then emit closed', async () => {
    const handler = createHandler();
    const onClosed = vi.fn();
    handler.on('closed', onClosed);
    handler.start();
    handler.write('shutting down');

    await handler.close();

    expect(client.sendMessage).toHaveBeenCalledWith(
      formatLogMessage('TGLogger', 'shutting down\n')
    );
    expect(onClosed).toHaveBeenCalledTimes(1);
    expect(handler.getStatus()).toEqual({
      running: false,
      closed: true,
      bufferedLines: 0,
      bufferedCharacters: 0,
      activeMessageId: 42,
    });
  });

  it('should ship lines written while the in-flight flush finishes', async () => {
    const handler = createHandler();
    let release: () => void = () => undefined;
    client.sendMessage.mockImplementationOnce(
      () =>
        new Promise<number>((resolve) => {
          release = () => resolve(42);
        })
    );
    handler.start();
    handler.write('first');
    await vi.advanceTimersByTimeAsync(2000);
    expect(client.sendMessage).toHaveBeenCalledTimes(1);

    const closing = handler.close();
    handler.write('written during shutdown');
    release();
    await closing;

    expect(client.editMessage).toHaveBeenCalledWith(
      42,
      formatLogMessage('TGLogger', 'first\nwritten during shutdown\n')
    );
  });

  it('should ignore writes after close', async () => {
    const handler = createHandler();
    handler.start();
    await handler.close();

    handler.write('too late');
    await vi.advanceTimersByTimeAsync(10_000);

    expect(handler.getStatus().bufferedLines).toBe(0);
    expect(client.sendMessage).not.toHaveBeenCalled();
  });

  it('should report buffered lines and characters', () => {
    const handler = createHandler();

    handler.write('ab');
    handler.write('cd\n');

    expect(handler.getStatus()).toEqual({
      running: false,
      closed: false,
      bufferedLines: 2,
      bufferedCharacters: 6,
      activeMessageId: null,
    });
  });

  it('should keep separate handlers independent', async () => {
    const other = new FakeTransportClient(7);
    const first = createHandler({ title: 'first' });
    const second = new TelegramLogHandler(
      { token: 'test-token', chatId: -100456, updateIntervalSeconds: 2, verifyOnStart: false },
      { client: other, sleep }
    );
    first.start();
    second.start();

    first.write('from first');
    second.write('from second');
    await vi.advanceTimersByTimeAsync(2000);

    expect(client.sendMessage).toHaveBeenCalledWith(formatLogMessage('first', 'from first\n'));
    expect(other.sendMessage).toHaveBeenCalledWith(
      formatLogMessage('TGLogger', 'from second\n')
    );
    expect(first.getStatus().activeMessageId).toBe(42);
    expect(second.getStatus().activeMessageId).toBe(7);
    await Promise.all([first.close(), second.close()]);
  });

  it('should verify the bot on start when enabled', async () => {
    const handler = createHandler({ verifyOnStart: true });

    handler.start();

    expect(client.verifyConnection).toHaveBeenCalledTimes(1);
    await handler.close();
  });

  it('should start the handler it creates', async () => {
    const handler = createTelegramLogHandler(
      { token: 'test-token', chatId: -100123, verifyOnStart: false },
      { client, sleep }
    );

    expect(handler.getStatus().running).toBe(true);
    await handler.close();
  });
});
