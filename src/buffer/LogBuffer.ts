/**
 * Log Buffer
 *
 * Accumulates pending log text for one handler. Producers append
 * synchronously; the flush scheduler is the only consumer.
 */

import type { DrainedBatch } from '../types.js';

export class LogBuffer {
  private chunks: string[] = [];
  private lines = 0;
  private size = 0;

  /**
   * Append text, terminating it with a newline when missing
   */
  append(text: string): void {
    const segment = text.endsWith('\n') ? text : `${text}\n`;
    this.chunks.push(segment);
    this.lines += countLines(segment);
    this.size += segment.length;
  }

  /**
   * Put undelivered text back ahead of anything appended since the drain
   */
  prepend(text: string): void {
    if (text.length === 0) return;
    this.chunks.unshift(text);
    this.lines += countLines(text);
    this.size += text.length;
  }

  /**
   * Take everything buffered so far and reset to empty
   */
  drainAll(): DrainedBatch {
    const batch: DrainedBatch = {
      text: this.chunks.join(''),
      lineCount: this.lines,
    };
    this.chunks = [];
    this.lines = 0;
    this.size = 0;
    return batch;
  }

  /** Newline-terminated segments currently held */
  get lineCount(): number {
    return this.lines;
  }

  /** Characters currently held */
  get length(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }
}

function countLines(segment: string): number {
  let count = 0;
  for (let i = segment.indexOf('\n'); i !== -1; i = segment.indexOf('\n', i + 1)) {
    count++;
  }
  return count;
}
