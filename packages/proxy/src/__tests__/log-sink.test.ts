import { FailingWritable, MemoryWritable } from '@ucitap/test-utils';
import { describe, it, expect } from 'vitest';

import { IoError, LogSink } from '../index.js';

function clockFrom(times: string[]): () => Date {
  let index = 0;
  return () => new Date(times[Math.min(index++, times.length - 1)] ?? 0);
}

describe('LogSink', () => {
  it('writes one tagged line per append', async () => {
    const stream = new MemoryWritable();
    const sink = new LogSink(stream, clockFrom(['2026-01-01T12:00:00.000Z', '2026-01-01T12:00:00.250Z']));

    await sink.append('gui-to-engine', 'position startpos');
    await sink.append('engine-to-gui', 'readyok');
    await sink.close();

    expect(stream.lines()).toEqual([
      '>> 2026-01-01T12:00:00.000Z position startpos',
      '<< 2026-01-01T12:00:00.250Z readyok',
    ]);
  });

  it('keeps queued appends in order', async () => {
    const stream = new MemoryWritable();
    const sink = new LogSink(stream, clockFrom(['2026-01-01T12:00:00.000Z']));

    await Promise.all([
      sink.append('gui-to-engine', 'go infinite'),
      sink.append('engine-to-gui', 'info depth 1'),
      sink.append('gui-to-engine', 'stop'),
    ]);
    await sink.close();

    expect(stream.lines()).toEqual([
      '>> 2026-01-01T12:00:00.000Z go infinite',
      '<< 2026-01-01T12:00:00.000Z info depth 1',
      '>> 2026-01-01T12:00:00.000Z stop',
    ]);
  });

  it('never lets timestamps go backwards', async () => {
    const stream = new MemoryWritable();
    const sink = new LogSink(
      stream,
      clockFrom(['2026-01-01T12:00:05.000Z', '2026-01-01T12:00:01.000Z', '2026-01-01T12:00:06.000Z']),
    );

    await sink.append('gui-to-engine', 'a');
    await sink.append('gui-to-engine', 'b');
    await sink.append('gui-to-engine', 'c');
    await sink.close();

    expect(stream.lines()).toEqual([
      '>> 2026-01-01T12:00:05.000Z a',
      '>> 2026-01-01T12:00:05.000Z b',
      '>> 2026-01-01T12:00:06.000Z c',
    ]);
  });

  it('fails every append after a write error', async () => {
    const sink = new LogSink(new FailingWritable(new Error('disk full')));

    await expect(sink.append('gui-to-engine', 'uci')).rejects.toThrow(IoError);
    await expect(sink.append('gui-to-engine', 'isready')).rejects.toThrow('Log write failed: disk full');
  });
});
