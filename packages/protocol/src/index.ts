/**
 * @ucitap/protocol - UCI line parsing and the tap log format
 */

export type {
  Direction,
  EventOf,
  GoParams,
  InfoFields,
  InfoScore,
  LogLine,
  ProtocolEvent,
  ProtocolEventType,
  ScoreBound,
} from './types.js';

export { parseLine } from './parser/line-parser.js';
export { parseInfoFields } from './parser/info-parser.js';
export { parseGoParams } from './parser/go-parser.js';
export { tokenize, parseInteger } from './parser/tokens.js';

export { DIRECTION_MARKERS, formatLogLine, parseLogLine } from './log/log-line.js';
