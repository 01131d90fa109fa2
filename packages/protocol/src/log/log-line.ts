/**
 * Log line codec
 *
 * One physical line per protocol line:
 *   >> 2026-01-01T12:00:00.000Z position startpos moves e2e4
 *   << 2026-01-01T12:00:00.412Z info depth 1 score cp 30 pv e7e5
 */

import type { Direction, LogLine } from '../types.js';

export const DIRECTION_MARKERS = {
  'gui-to-engine': '>>',
  'engine-to-gui': '<<',
} as const satisfies Record<Exclude<Direction, 'unknown'>, string>;

const TAGGED_LINE = /^(>>|<<) (\d{4}-\d{2}-\d{2}T\S+)(?: (.*))?$/;

/**
 * Format a log line; untagged lines are written as their raw text
 */
export function formatLogLine(line: LogLine): string {
  if (line.direction === 'unknown' || line.timestamp === null) {
    return line.text;
  }
  return `${DIRECTION_MARKERS[line.direction]} ${line.timestamp.toISOString()} ${line.text}`;
}

/**
 * Parse one physical log line
 *
 * Lines without a direction marker and valid timestamp are returned
 * with direction `unknown`, so raw protocol transcripts replay too.
 */
export function parseLogLine(physical: string): LogLine {
  const text = physical.endsWith('\r') ? physical.slice(0, -1) : physical;
  const match = TAGGED_LINE.exec(text);

  if (match) {
    const [, marker, stamp = '', rest = ''] = match;
    const timestamp = new Date(stamp);
    if (!Number.isNaN(timestamp.getTime())) {
      return {
        direction: marker === '>>' ? 'gui-to-engine' : 'engine-to-gui',
        timestamp,
        text: rest,
      };
    }
  }

  return { direction: 'unknown', timestamp: null, text };
}
