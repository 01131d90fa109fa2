/**
 * Output record construction
 */

import { trimFen, type Position } from '@ucitap/chess';
import type { InfoFields } from '@ucitap/protocol';

import type { FenFormat, OutputRecord } from '../types/replay.js';

import type { SearchStats } from './state.js';

/**
 * Overlay one info line's fields on the running search statistics
 *
 * A new score replaces both score kinds, so at most one of score and
 * mate is ever set.
 */
export function mergeSearchStats(search: SearchStats, fields: InfoFields): SearchStats {
  let { score, mate } = search;
  if (fields.score !== undefined) {
    score = fields.score.kind === 'cp' ? fields.score.value : null;
    mate = fields.score.kind === 'mate' ? fields.score.value : null;
  }

  return {
    score,
    mate,
    nodes: fields.nodes ?? search.nodes,
    nps: fields.nps ?? search.nps,
    time: fields.time ?? search.time,
  };
}

export function formatRecordFen(position: Position, format: FenFormat): string {
  const fen = position.toFen();
  return format === 'epd' ? trimFen(fen) : fen;
}

export function buildRecord(
  engine: string,
  position: Position,
  search: SearchStats,
  pv: string | null,
  fenFormat: FenFormat,
): OutputRecord {
  return {
    engine,
    fen: formatRecordFen(position, fenFormat),
    ply: position.ply(),
    score: search.score,
    mate: search.mate,
    nodes: search.nodes ?? 0,
    nps: search.nps ?? 0,
    time: search.time ?? 0,
    pv,
  };
}
