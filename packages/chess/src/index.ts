/**
 * @ucitap/chess - Board model and move notation
 *
 * This package handles:
 * - FEN parsing and serialization
 * - Legal move generation and immutable move application
 * - Attack and check detection
 * - Coordinate (UCI) to SAN conversion for single moves and whole PVs
 */

export type {
  Board,
  CastlingRights,
  Color,
  File,
  Move,
  MoveSpecial,
  Piece,
  PieceKind,
  PositionData,
  PromotionKind,
  Rank,
  Square,
} from './chess/types.js';
export { opposite, PROMOTION_KINDS } from './chess/types.js';

export {
  FILES,
  RANKS,
  SQUARES,
  isSquare,
  fileIndex,
  rankIndex,
  squareIndex,
  squareAt,
  squareFromCoords,
} from './chess/squares.js';

export { STARTING_FEN, parseFen, formatFen, trimFen } from './chess/fen.js';

export {
  Position,
  fromFen,
  applyMove,
  legalMoves,
  isSquareAttacked,
} from './chess/position.js';

export { parseUciMove, formatUciMove, matchUciMove } from './notation/uci.js';
export type { UciMove } from './notation/uci.js';

export { toAlgebraic, convertPv, sanToMove } from './notation/san.js';

export { InvalidFenError, IllegalMoveError } from './errors.js';
