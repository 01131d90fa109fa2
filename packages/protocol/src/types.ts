/**
 * UCI protocol event and log line types
 */

/**
 * Which side of the tap a line travelled through
 *
 * `unknown` is used for untagged lines, such as a raw log written
 * without direction markers.
 */
export type Direction = 'gui-to-engine' | 'engine-to-gui' | 'unknown';

/**
 * One logged protocol line
 */
export interface LogLine {
  readonly direction: Direction;
  /** Null when the line carried no timestamp */
  readonly timestamp: Date | null;
  /** Raw protocol text, without the line terminator */
  readonly text: string;
}

export type ScoreBound = 'lowerbound' | 'upperbound';

export interface InfoScore {
  /** Centipawns, or moves to mate (negative when being mated) */
  kind: 'cp' | 'mate';
  value: number;
  bound?: ScoreBound;
}

/**
 * Fields of an `info` line
 */
export interface InfoFields {
  depth?: number;
  seldepth?: number;
  multipv?: number;
  score?: InfoScore;
  nodes?: number;
  nps?: number;
  /** Search time in milliseconds */
  time?: number;
  hashfull?: number;
  tbhits?: number;
  /** Principal variation in coordinate notation */
  pv?: string[];
  /** Other keys, with their raw argument text */
  extra: Record<string, string>;
}

/**
 * Parameters of a `go` command
 */
export interface GoParams {
  searchmoves?: string[];
  ponder?: boolean;
  wtime?: number;
  btime?: number;
  winc?: number;
  binc?: number;
  movestogo?: number;
  depth?: number;
  nodes?: number;
  mate?: number;
  movetime?: number;
  infinite?: boolean;
}

export type ProtocolEvent =
  /** `fen` is null for `startpos` */
  | { type: 'position'; fen: string | null; moves: string[] }
  | { type: 'go'; params: GoParams }
  | { type: 'info'; fields: InfoFields }
  | { type: 'bestmove'; move: string; ponder?: string }
  | { type: 'ucinewgame' }
  | { type: 'id'; key: 'name' | 'author'; value: string }
  | { type: 'uci' }
  | { type: 'uciok' }
  | { type: 'isready' }
  | { type: 'readyok' }
  | { type: 'unrecognized'; raw: string };

export type ProtocolEventType = ProtocolEvent['type'];

export type EventOf<T extends ProtocolEventType> = Extract<ProtocolEvent, { type: T }>;
