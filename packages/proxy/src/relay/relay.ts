/**
 * One direction of the tap
 *
 * Each chunk is written to the destination unchanged and the write is
 * awaited before the chunk's lines are logged and the next chunk is read.
 */

import { addAbortSignal, type Readable, type Writable } from 'node:stream';

import type { Direction } from '@ucitap/protocol';

import { IoError } from '../errors.js';
import type { LogSink } from '../log/log-sink.js';

import { LineSplitter } from './line-splitter.js';

export interface RelayOptions {
  source: Readable;
  destination: Writable;
  direction: Exclude<Direction, 'unknown'>;
  sink: LogSink;
  /** Aborting stops the relay quietly; the source is destroyed */
  signal: AbortSignal;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new IoError(`Unexpected chunk of type ${typeof chunk}`);
}

function writeChunk(destination: Writable, chunk: Buffer, direction: Direction): Promise<void> {
  return new Promise((resolve, reject) => {
    destination.write(chunk, (error) => {
      if (error) reject(new IoError(`Write failed (${direction})`, error));
      else resolve();
    });
  });
}

function isAbort(error: unknown, signal: AbortSignal): boolean {
  return signal.aborted && error instanceof Error && error.name === 'AbortError';
}

/**
 * Relay until the source ends or the signal aborts
 *
 * Resolves on end of stream or abort, after logging any partial last line.
 * @throws IoError on a read or write failure
 */
export async function relay(options: RelayOptions): Promise<void> {
  const { source, destination, direction, sink, signal } = options;
  const splitter = new LineSplitter();

  if (!signal.aborted) {
    addAbortSignal(signal, source);
    try {
      for await (const chunk of source) {
        const bytes = toBuffer(chunk);
        await writeChunk(destination, bytes, direction);
        for (const line of splitter.push(bytes)) {
          await sink.append(direction, line);
        }
      }
    } catch (error) {
      if (!isAbort(error, signal)) {
        throw error instanceof IoError ? error : new IoError(`Read failed (${direction})`, error);
      }
    }
  }

  const rest = splitter.flush();
  if (rest !== null) {
    await sink.append(direction, rest);
  }
}
