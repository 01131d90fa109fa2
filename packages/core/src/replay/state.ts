/**
 * Replay state
 *
 * The replayer threads one immutable state value from line to line; every
 * step returns a new value and never touches the previous one.
 */

import { Position } from '@ucitap/chess';

import type { OutputRecord, ReplayStats } from '../types/replay.js';

/**
 * Search statistics accumulated from the info lines of the current search
 */
export interface SearchStats {
  readonly score: number | null;
  readonly mate: number | null;
  readonly nodes: number | null;
  readonly nps: number | null;
  readonly time: number | null;
}

export const EMPTY_SEARCH: SearchStats = {
  score: null,
  mate: null,
  nodes: null,
  nps: null,
  time: null,
};

export interface ReplayState {
  readonly engine: string;
  /** Null while the tracked position is unknown after a desync */
  readonly position: Position | null;
  readonly search: SearchStats;
  /** Candidate record held back under the `bestmove` emit policy */
  readonly pending: OutputRecord | null;
  readonly stats: ReplayStats;
}

export function createReplayStats(): ReplayStats {
  return {
    linesRead: 0,
    events: {
      position: 0,
      go: 0,
      info: 0,
      bestmove: 0,
      ucinewgame: 0,
      id: 0,
      uci: 0,
      uciok: 0,
      isready: 0,
      readyok: 0,
      unrecognized: 0,
    },
    recordsEmitted: 0,
    unrecognizedLines: 0,
    desyncedPvs: 0,
    invalidPositions: 0,
    skippedInfoLines: 0,
  };
}

/**
 * State before the first line: start position, no engine name
 */
export function createReplayState(): ReplayState {
  return {
    engine: '',
    position: Position.startingPosition(),
    search: EMPTY_SEARCH,
    pending: null,
    stats: createReplayStats(),
  };
}
