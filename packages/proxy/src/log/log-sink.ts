/**
 * Append-only tap log
 *
 * All appends go through one promise chain, so lines from the two relay
 * directions are written one at a time and each direction keeps its order.
 */

import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';

import { formatLogLine, type Direction, type LogLine } from '@ucitap/protocol';

import { IoError } from '../errors.js';

export type Clock = () => Date;

export class LogSink {
  private tail: Promise<void> = Promise.resolve();
  private lastTime = 0;
  private failure: IoError | null = null;
  private closed = false;

  constructor(
    private readonly stream: Writable,
    private readonly clock: Clock = () => new Date(),
  ) {
    this.stream.on('error', (error: Error) => {
      this.failure ??= new IoError('Log write failed', error);
    });
  }

  /**
   * Open a log file for appending, creating it if needed
   * @throws IoError if the file cannot be opened
   */
  static async open(path: string, clock?: Clock): Promise<LogSink> {
    const stream = createWriteStream(path, { flags: 'a', encoding: 'utf8' });
    try {
      await once(stream, 'open');
    } catch (error) {
      throw new IoError(`Cannot open log file ${path}`, error);
    }
    return new LogSink(stream, clock);
  }

  /**
   * Append one protocol line
   *
   * The timestamp is taken when the line is queued and never goes
   * backwards, even if the system clock does.
   * @throws IoError if this or an earlier write failed
   */
  append(direction: Exclude<Direction, 'unknown'>, text: string): Promise<void> {
    const line: LogLine = { direction, timestamp: this.nextTimestamp(), text };
    const write = this.tail.then(() => this.write(`${formatLogLine(line)}\n`));
    // Keep the chain alive so later appends report the same failure
    this.tail = write.catch((error: unknown) => {
      this.failure ??= error instanceof IoError ? error : new IoError('Log write failed', error);
    });
    return write;
  }

  /**
   * Wait for queued appends and close the underlying stream
   */
  async close(): Promise<void> {
    await this.tail;
    if (this.closed) return;
    this.closed = true;
    this.stream.end();
    try {
      await finished(this.stream);
    } catch (error) {
      throw new IoError('Failed to close log', error);
    }
    if (this.failure !== null) throw this.failure;
  }

  private nextTimestamp(): Date {
    this.lastTime = Math.max(this.lastTime, this.clock().getTime());
    return new Date(this.lastTime);
  }

  private write(data: string): Promise<void> {
    if (this.failure !== null) return Promise.reject(this.failure);
    if (this.closed) return Promise.reject(new IoError('Log is closed'));
    return new Promise((resolve, reject) => {
      this.stream.write(data, (error) => {
        if (error) reject(new IoError('Log write failed', error));
        else resolve();
      });
    });
  }
}
