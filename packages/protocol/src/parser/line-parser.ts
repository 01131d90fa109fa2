/**
 * UCI line parser
 *
 * Engines and GUIs diverge from the protocol often enough that parsing is
 * best-effort: anything that does not fit the grammar becomes an
 * `unrecognized` event instead of an error.
 */

import type { ProtocolEvent } from '../types.js';

import { parseGoParams } from './go-parser.js';
import { parseInfoFields } from './info-parser.js';
import { tokenize } from './tokens.js';

const FEN_FIELD_COUNT = 6;
const EPD_FIELD_COUNT = 4;
/** Counters assumed for a FEN given without its last two fields */
const DEFAULT_COUNTERS = ['0', '1'];

function parsePosition(args: readonly string[]): ProtocolEvent | null {
  const [origin, ...rest] = args;
  let fen: string | null = null;
  let tail: readonly string[];

  if (origin === 'startpos') {
    tail = rest;
  } else if (origin === 'fen') {
    const movesAt = rest.indexOf('moves');
    const fenFields = movesAt === -1 ? rest : rest.slice(0, movesAt);
    if (fenFields.length === EPD_FIELD_COUNT) {
      fen = [...fenFields, ...DEFAULT_COUNTERS].join(' ');
    } else if (fenFields.length === FEN_FIELD_COUNT) {
      fen = fenFields.join(' ');
    } else {
      return null;
    }
    tail = rest.slice(fenFields.length);
  } else {
    return null;
  }

  if (tail.length === 0) return { type: 'position', fen, moves: [] };
  if (tail[0] !== 'moves') return null;
  return { type: 'position', fen, moves: tail.slice(1) };
}

function parseBestMove(args: readonly string[]): ProtocolEvent | null {
  const [move, keyword, ponder] = args;
  if (move === undefined) return null;
  if (args.length === 1) return { type: 'bestmove', move };
  if (args.length === 3 && keyword === 'ponder' && ponder !== undefined) {
    return { type: 'bestmove', move, ponder };
  }
  return null;
}

function parseId(line: string, args: readonly string[]): ProtocolEvent | null {
  const key = args[0];
  if (key !== 'name' && key !== 'author') return null;
  // Keep the value's inner spacing as the engine wrote it
  const value = line.trim().replace(/^id\s+\S+\s*/, '');
  return { type: 'id', key, value };
}

function parseKnown(line: string): ProtocolEvent | null {
  const [command, ...args] = tokenize(line);

  switch (command) {
    case 'position':
      return parsePosition(args);
    case 'go': {
      const params = parseGoParams(args);
      return params === null ? null : { type: 'go', params };
    }
    case 'info': {
      const fields = parseInfoFields(args);
      return fields === null ? null : { type: 'info', fields };
    }
    case 'bestmove':
      return parseBestMove(args);
    case 'id':
      return parseId(line, args);
    case 'uci':
    case 'uciok':
    case 'isready':
    case 'readyok':
    case 'ucinewgame':
      return args.length === 0 ? { type: command } : null;
    default:
      return null;
  }
}

/**
 * Parse one protocol line into an event
 */
export function parseLine(raw: string): ProtocolEvent {
  return parseKnown(raw) ?? { type: 'unrecognized', raw };
}
