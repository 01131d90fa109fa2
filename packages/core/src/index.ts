/**
 * @ucitap/core - Log replay and output records
 *
 * Replays a tap log offline, tracks the analysed positions and converts
 * each reported principal variation to SAN.
 */

export type {
  EmitPolicy,
  FenFormat,
  OutputRecord,
  ReplayOptions,
  ReplayStats,
} from './types/replay.js';
export { DEFAULT_REPLAY_OPTIONS } from './types/replay.js';

export {
  replayStep,
  replayLines,
  replayStream,
  DEFAULT_PROGRESS_INTERVAL,
} from './replay/replayer.js';
export type {
  ReplayProgressCallback,
  ReplayResult,
  ReplayStepResult,
  ReplayStreamOptions,
} from './replay/replayer.js';

export {
  createReplayState,
  createReplayStats,
  EMPTY_SEARCH,
} from './replay/state.js';
export type { ReplayState, SearchStats } from './replay/state.js';

export { buildRecord, formatRecordFen, mergeSearchStats } from './replay/record.js';

export { serializeRecords } from './output/json.js';
