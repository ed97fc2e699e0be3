/**
 * Tests for LogBuffer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LogBuffer } from '../../src/buffer/index.js';

describe('LogBuffer', () => {
  let buffer: LogBuffer;

  beforeEach(() => {
    buffer = new LogBuffer();
  });

  it('should start empty', () => {
    expect(buffer.isEmpty()).toBe(true);
    expect(buffer.lineCount).toBe(0);
    expect(buffer.length).toBe(0);
    expect(buffer.drainAll()).toEqual({ text: '', lineCount: 0 });
  });

  it('should count one line per newline-terminated append', () => {
    buffer.append('first\n');
    buffer.append('second\n');

    expect(buffer.lineCount).toBe(2);
    expect(buffer.length).toBe(13);
  });

  it('should terminate text that lacks a newline', () => {
    buffer.append('no newline');

    expect(buffer.lineCount).toBe(1);
    expect(buffer.drainAll().text).toBe('no newline\n');
  });

  it('should count every line of a multi-line append', () => {
    buffer.append('Error: boom\n    at main (app.ts:1)\n    at run (app.ts:9)');

    expect(buffer.lineCount).toBe(3);
  });

  it('should drain text in append order and reset', () => {
    buffer.append('a\n');
    buffer.append('b\n');

    expect(buffer.drainAll()).toEqual({ text: 'a\nb\n', lineCount: 2 });
    expect(buffer.drainAll()).toEqual({ text: '', lineCount: 0 });
    expect(buffer.isEmpty()).toBe(true);
  });

  it('should keep appends made after a drain for the next drain only', () => {
    buffer.append('before\n');
    const first = buffer.drainAll();
    buffer.append('after\n');

    expect(first.text).toBe('before\n');
    expect(buffer.drainAll().text).toBe('after\n');
  });

  it('should lose no line across interleaved producers', async () => {
    const producer = async (name: string, count: number): Promise<void> => {
      for (let i = 0; i < count; i++) {
        buffer.append(`${name}-${i}\n`);
        await Promise.resolve();
      }
    };

    await Promise.all([producer('a', 50), producer('b', 30), producer('c', 20)]);

    const drained = buffer.drainAll();
    expect(drained.lineCount).toBe(100);
    expect(drained.text.split('\n').filter(Boolean)).toHaveLength(100);
    expect(drained.text).toContain('a-49\n');
    expect(drained.text).toContain('c-19\n');
    expect(buffer.drainAll()).toEqual({ text: '', lineCount: 0 });
  });

  it('should put returned text ahead of later appends', () => {
    buffer.append('new line');
    buffer.prepend('held back\nsecond\n');

    expect(buffer.lineCount).toBe(3);
    expect(buffer.length).toBe(26);
    expect(buffer.drainAll()).toEqual({ text: 'held back\nsecond\nnew line\n', lineCount: 3 });
  });

  it('should ignore an empty prepend', () => {
    buffer.prepend('');

    expect(buffer.isEmpty()).toBe(true);
  });
});
