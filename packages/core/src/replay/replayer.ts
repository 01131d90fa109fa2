/**
 * Log Replayer
 *
 * Drives the protocol parser over an ordered tap log, tracks the position
 * the engine is searching and turns PV-bearing info lines into records:
 * 1. `position` (GUI side) resets the tracked position and plays its moves
 * 2. `info` (engine side) updates search statistics and emits on a PV
 * 3. `bestmove` flushes the held-back record under the `bestmove` policy
 *
 * A `position` line that fails to parse leaves the position unknown, like
 * an invalid FEN or an illegal move does.
 *
 * Lines from an untagged log have direction `unknown` and are accepted on
 * both sides.
 */

import {
  IllegalMoveError,
  InvalidFenError,
  Position,
  convertPv,
  matchUciMove,
} from '@ucitap/chess';
import {
  parseLine,
  parseLogLine,
  tokenize,
  type Direction,
  type EventOf,
  type InfoFields,
  type LogLine,
} from '@ucitap/protocol';

import {
  DEFAULT_REPLAY_OPTIONS,
  type OutputRecord,
  type ReplayOptions,
  type ReplayStats,
} from '../types/replay.js';

import { buildRecord, mergeSearchStats } from './record.js';
import { EMPTY_SEARCH, createReplayState, type ReplayState } from './state.js';

export interface ReplayStepResult {
  state: ReplayState;
  emitted: readonly OutputRecord[];
}

export interface ReplayResult {
  records: OutputRecord[];
  stats: ReplayStats;
}

/**
 * Called every `progressInterval` lines with the counters so far
 */
export type ReplayProgressCallback = (stats: ReplayStats) => void;

export interface ReplayStreamOptions extends Partial<ReplayOptions> {
  onProgress?: ReplayProgressCallback;
  /** Lines between progress callbacks (default: 100000) */
  progressInterval?: number;
}

export const DEFAULT_PROGRESS_INTERVAL = 100_000;

function fromGui(direction: Direction): boolean {
  return direction !== 'engine-to-gui';
}

function fromEngine(direction: Direction): boolean {
  return direction !== 'gui-to-engine';
}

function withStats(state: ReplayState, patch: Partial<ReplayStats>): ReplayState {
  return { ...state, stats: { ...state.stats, ...patch } };
}

/**
 * Rebuild the position a `position` command describes
 * @returns null if the FEN is invalid or a move does not match a legal move
 */
function resolvePosition(event: EventOf<'position'>): Position | null {
  let position: Position;
  try {
    position = event.fen === null ? Position.startingPosition() : Position.fromFen(event.fen);
  } catch (error) {
    if (error instanceof InvalidFenError) return null;
    throw error;
  }

  for (const text of event.moves) {
    const move = matchUciMove(position, text);
    if (move === null) return null;
    position = position.applyMove(move);
  }
  return position;
}

function convertPvText(position: Position, pv: readonly string[]): string | null {
  try {
    return convertPv(position, pv).join(' ');
  } catch (error) {
    if (error instanceof IllegalMoveError) return null;
    throw error;
  }
}

function handlePosition(state: ReplayState, event: EventOf<'position'>): ReplayStepResult {
  const position = resolvePosition(event);
  if (position === null) return invalidatePosition(state);
  return { state: { ...state, position }, emitted: [] };
}

function handleInfo(
  state: ReplayState,
  fields: InfoFields,
  options: ReplayOptions,
): ReplayStepResult {
  const search = mergeSearchStats(state.search, fields);
  const next: ReplayState = { ...state, search };

  // An empty `pv` carries no moves to report
  if (fields.pv === undefined || fields.pv.length === 0) {
    return { state: next, emitted: [] };
  }

  if (state.position === null) {
    return {
      state: withStats(next, { skippedInfoLines: state.stats.skippedInfoLines + 1 }),
      emitted: [],
    };
  }

  const pv = convertPvText(state.position, fields.pv);
  const record = buildRecord(state.engine, state.position, search, pv, options.fen);
  const desynced = pv === null ? 1 : 0;

  if (options.emit === 'bestmove') {
    const mainLine = fields.multipv === undefined || fields.multipv === 1;
    return {
      state: withStats(
        { ...next, pending: mainLine ? record : state.pending },
        { desyncedPvs: state.stats.desyncedPvs + desynced },
      ),
      emitted: [],
    };
  }

  return {
    state: withStats(next, {
      desyncedPvs: state.stats.desyncedPvs + desynced,
      recordsEmitted: state.stats.recordsEmitted + 1,
    }),
    emitted: [record],
  };
}

function invalidatePosition(state: ReplayState): ReplayStepResult {
  return {
    state: withStats(
      { ...state, position: null },
      { invalidPositions: state.stats.invalidPositions + 1 },
    ),
    emitted: [],
  };
}

/**
 * Under the `bestmove` policy a search that reported no PV still yields a
 * record (`pv: null`) with the statistics gathered so far
 */
function handleBestMove(state: ReplayState, options: ReplayOptions): ReplayStepResult {
  const cleared: ReplayState = { ...state, search: EMPTY_SEARCH, pending: null };
  let record = state.pending;
  if (record === null && options.emit === 'bestmove' && state.position !== null) {
    record = buildRecord(state.engine, state.position, state.search, null, options.fen);
  }
  if (record === null) return { state: cleared, emitted: [] };
  return {
    state: withStats(cleared, { recordsEmitted: state.stats.recordsEmitted + 1 }),
    emitted: [record],
  };
}

/**
 * Advance the replay by one log line
 */
export function replayStep(
  state: ReplayState,
  line: LogLine,
  options: ReplayOptions = DEFAULT_REPLAY_OPTIONS,
): ReplayStepResult {
  const event = parseLine(line.text);
  const counted = withStats(state, {
    linesRead: state.stats.linesRead + 1,
    events: { ...state.stats.events, [event.type]: state.stats.events[event.type] + 1 },
    unrecognizedLines: state.stats.unrecognizedLines + (event.type === 'unrecognized' ? 1 : 0),
  });
  const unchanged: ReplayStepResult = { state: counted, emitted: [] };

  switch (event.type) {
    case 'position':
      return fromGui(line.direction) ? handlePosition(counted, event) : unchanged;

    case 'info':
      return fromEngine(line.direction) ? handleInfo(counted, event.fields, options) : unchanged;

    case 'bestmove':
      return fromEngine(line.direction) ? handleBestMove(counted, options) : unchanged;

    case 'id':
      if (event.key === 'name' && fromEngine(line.direction)) {
        return { state: { ...counted, engine: event.value }, emitted: [] };
      }
      return unchanged;

    case 'uci':
    case 'ucinewgame':
    case 'go':
      return { state: { ...counted, search: EMPTY_SEARCH, pending: null }, emitted: [] };

    case 'unrecognized':
      // A malformed `position` still means the GUI moved on from the tracked one
      if (fromGui(line.direction) && tokenize(event.raw)[0] === 'position') {
        return invalidatePosition(counted);
      }
      return unchanged;

    default:
      return unchanged;
  }
}

function resolveOptions(options: Partial<ReplayOptions>): ReplayOptions {
  return {
    emit: options.emit ?? DEFAULT_REPLAY_OPTIONS.emit,
    fen: options.fen ?? DEFAULT_REPLAY_OPTIONS.fen,
  };
}

/**
 * Replay a complete in-memory log
 */
export function replayLines(
  lines: Iterable<string>,
  options: Partial<ReplayOptions> = {},
): ReplayResult {
  const resolved = resolveOptions(options);
  const records: OutputRecord[] = [];
  let state = createReplayState();

  for (const physical of lines) {
    const result = replayStep(state, parseLogLine(physical), resolved);
    state = result.state;
    records.push(...result.emitted);
  }

  return { records, stats: state.stats };
}

/**
 * Replay a log read line by line, e.g. from `readline`
 */
export async function replayStream(
  lines: AsyncIterable<string>,
  options: ReplayStreamOptions = {},
): Promise<ReplayResult> {
  const resolved = resolveOptions(options);
  const interval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const records: OutputRecord[] = [];
  let state = createReplayState();

  for await (const physical of lines) {
    const result = replayStep(state, parseLogLine(physical), resolved);
    state = result.state;
    records.push(...result.emitted);

    if (options.onProgress !== undefined && state.stats.linesRead % interval === 0) {
      options.onProgress(state.stats);
    }
  }

  return { records, stats: state.stats };
}
