import type { OutputRecord } from '../types/replay.js';

/**
 * Serialize records as a pretty-printed JSON array with a trailing newline
 */
export function serializeRecords(records: readonly OutputRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}
