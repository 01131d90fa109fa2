/**
 * Replay output and option types
 */

import type { ProtocolEventType } from '@ucitap/protocol';

/**
 * One analysed position, as written to the converter's JSON output
 *
 * Key order here is the key order of the serialized object.
 */
export interface OutputRecord {
  /** Engine display name from `id name`, empty until one is seen */
  engine: string;
  fen: string;
  ply: number;
  /** Centipawns, null for mate scores or when no score was reported */
  score: number | null;
  /** Moves to mate, null unless the engine reported a mate score */
  mate: number | null;
  nodes: number;
  nps: number;
  /** Search time in milliseconds */
  time: number;
  /** Space-separated SAN moves, null when the PV could not be converted */
  pv: string | null;
}

/**
 * Which info lines become records
 *
 * - every-pv: one record per PV-bearing info line
 * - bestmove: the last PV-bearing line of the main line, emitted at `bestmove`
 */
export type EmitPolicy = 'every-pv' | 'bestmove';

/**
 * full: six FEN fields; epd: placement, side, castling and en-passant only
 */
export type FenFormat = 'full' | 'epd';

export interface ReplayOptions {
  emit: EmitPolicy;
  fen: FenFormat;
}

export const DEFAULT_REPLAY_OPTIONS: ReplayOptions = {
  emit: 'every-pv',
  fen: 'full',
};

/**
 * Counters collected over one replay pass
 */
export interface ReplayStats {
  linesRead: number;
  events: Readonly<Record<ProtocolEventType, number>>;
  recordsEmitted: number;
  unrecognizedLines: number;
  /** PVs that could not be converted against the tracked position */
  desyncedPvs: number;
  /** `position` commands with a bad FEN or an unmatched move */
  invalidPositions: number;
  /** Info lines seen while the position was unknown */
  skippedInfoLines: number;
}
