/**
 * @ucitap/proxy - Transparent UCI tap
 *
 * Sits between a GUI and an engine process, relays both directions
 * byte for byte and appends every line to a timestamped log.
 */

export { SpawnError, IoError } from './errors.js';

export { LogSink } from './log/log-sink.js';
export type { Clock } from './log/log-sink.js';

export { LineSplitter } from './relay/line-splitter.js';
export { relay } from './relay/relay.js';
export type { RelayOptions } from './relay/relay.js';

export {
  runProxy,
  spawnEngine,
  exitStatus,
  DEFAULT_SHUTDOWN_GRACE_MS,
} from './session/proxy-session.js';
export type {
  EngineProcess,
  EngineStderr,
  ProxyOptions,
  SpawnEngine,
} from './session/proxy-session.js';
