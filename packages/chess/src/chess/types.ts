/**
 * Board model types
 *
 * Piece kinds and colors use the single-letter convention of FEN
 * (and of chess.js), so values can be read straight from a FEN string.
 */

export type Color = 'w' | 'b';

export type PieceKind = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/**
 * Piece kinds a pawn may promote to
 */
export type PromotionKind = 'q' | 'r' | 'b' | 'n';

export type File = 'a' | 'b' | 'c' | 'd' | 'e' | 'f' | 'g' | 'h';
export type Rank = '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8';
export type Square = `${File}${Rank}`;

export interface Piece {
  readonly color: Color;
  readonly kind: PieceKind;
}

/**
 * Board cells indexed 0..63, a1 = 0, b1 = 1, ..., h8 = 63
 */
export type Board = ReadonlyArray<Piece | null>;

export interface CastlingRights {
  readonly whiteKingside: boolean;
  readonly whiteQueenside: boolean;
  readonly blackKingside: boolean;
  readonly blackQueenside: boolean;
}

/**
 * Special-move flag, set by the move generator
 */
export type MoveSpecial = 'double-push' | 'en-passant' | 'castle-kingside' | 'castle-queenside';

/**
 * A move as authorized by a position's legal move set
 */
export interface Move {
  readonly from: Square;
  readonly to: Square;
  readonly promotion?: PromotionKind;
  readonly special?: MoveSpecial;
}

/**
 * Raw position fields, as read from or written to FEN
 */
export interface PositionData {
  readonly board: Board;
  readonly turn: Color;
  readonly castling: CastlingRights;
  /** Target square behind a pawn that just double-pushed */
  readonly epSquare: Square | null;
  readonly halfmoveClock: number;
  readonly fullmoveNumber: number;
}

export const NO_CASTLING: CastlingRights = {
  whiteKingside: false,
  whiteQueenside: false,
  blackKingside: false,
  blackQueenside: false,
};

export const PROMOTION_KINDS: readonly PromotionKind[] = ['q', 'r', 'b', 'n'];

export function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}
