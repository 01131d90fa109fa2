/**
 * Builder for tap log text
 *
 * @example
 * const lines = tapLog()
 *   .gui('position startpos moves e2e4 e7e5')
 *   .gui('go depth 10')
 *   .engine('info depth 10 score cp 20 pv g1f3 b8c6')
 *   .engine('bestmove g1f3')
 *   .lines();
 */

import { formatLogLine, type Direction } from '@ucitap/protocol';

export const DEFAULT_LOG_START = new Date('2026-01-01T12:00:00.000Z');

export class TapLogBuilder {
  private readonly entries: string[] = [];
  private time: number;

  constructor(
    start: Date = DEFAULT_LOG_START,
    private readonly stepMs: number = 5,
  ) {
    this.time = start.getTime();
  }

  /**
   * Add a GUI to engine line
   */
  gui(...texts: string[]): this {
    return this.add('gui-to-engine', texts);
  }

  /**
   * Add an engine to GUI line
   */
  engine(...texts: string[]): this {
    return this.add('engine-to-gui', texts);
  }

  lines(): string[] {
    return [...this.entries];
  }

  private add(direction: Exclude<Direction, 'unknown'>, texts: string[]): this {
    for (const text of texts) {
      this.entries.push(formatLogLine({ direction, timestamp: new Date(this.time), text }));
      this.time += this.stepMs;
    }
    return this;
  }
}

export function tapLog(start?: Date, stepMs?: number): TapLogBuilder {
  return new TapLogBuilder(start, stepMs);
}
