import { describe, it, expect } from 'vitest';

import { LineSplitter } from '../index.js';

describe('LineSplitter', () => {
  it('returns complete lines and keeps the remainder', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(Buffer.from('uci\nisre'))).toEqual(['uci']);
    expect(splitter.push(Buffer.from('ady\n'))).toEqual(['isready']);
    expect(splitter.flush()).toBeNull();
  });

  it('drops the carriage return of CRLF endings', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(Buffer.from('uciok\r\nreadyok\r\n'))).toEqual(['uciok', 'readyok']);
  });

  it('keeps empty lines', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(Buffer.from('\n\nuci\n'))).toEqual(['', '', 'uci']);
  });

  it('decodes characters split across chunks', () => {
    const splitter = new LineSplitter();
    const bytes = Buffer.from('id author Zoë\n', 'utf8');
    const cut = bytes.indexOf(0xc3) + 1;

    expect(splitter.push(bytes.subarray(0, cut))).toEqual([]);
    expect(splitter.push(bytes.subarray(cut))).toEqual(['id author Zoë']);
  });

  it('flushes an unterminated last line once', () => {
    const splitter = new LineSplitter();
    splitter.push(Buffer.from('bestmove e2e4\nquit'));

    expect(splitter.flush()).toBe('quit');
    expect(splitter.flush()).toBeNull();
  });
});
