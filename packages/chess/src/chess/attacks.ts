/**
 * Attack detection
 *
 * Ray casting along files, ranks and diagonals, plus the fixed
 * offsets of knights, kings and pawns.
 */

import { fileIndex, rankIndex } from './squares.js';
import type { Board, Color, Piece, PieceKind, Square } from './types.js';

export type Offset = readonly [df: number, dr: number];

export const KNIGHT_OFFSETS: readonly Offset[] = [
  [1, 2],
  [2, 1],
  [2, -1],
  [1, -2],
  [-1, -2],
  [-2, -1],
  [-2, 1],
  [-1, 2],
];

export const KING_OFFSETS: readonly Offset[] = [
  [0, 1],
  [1, 1],
  [1, 0],
  [1, -1],
  [0, -1],
  [-1, -1],
  [-1, 0],
  [-1, 1],
];

export const ROOK_DIRECTIONS: readonly Offset[] = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
];

export const BISHOP_DIRECTIONS: readonly Offset[] = [
  [1, 1],
  [1, -1],
  [-1, -1],
  [-1, 1],
];

/**
 * Piece on a coordinate, or null when empty or off the board
 */
export function pieceOn(board: Board, f: number, r: number): Piece | null {
  if (f < 0 || f > 7 || r < 0 || r > 7) return null;
  return board[r * 8 + f] ?? null;
}

function isPiece(piece: Piece | null, color: Color, kinds: readonly PieceKind[]): boolean {
  return piece !== null && piece.color === color && kinds.includes(piece.kind);
}

/**
 * First piece met walking from (f, r) in a direction, excluding the start
 */
function firstPieceOnRay(board: Board, f: number, r: number, [df, dr]: Offset): Piece | null {
  let cf = f + df;
  let cr = r + dr;
  while (cf >= 0 && cf <= 7 && cr >= 0 && cr <= 7) {
    const piece = board[cr * 8 + cf] ?? null;
    if (piece !== null) return piece;
    cf += df;
    cr += dr;
  }
  return null;
}

/**
 * Check if a square is attacked by any piece of the given color
 */
export function isSquareAttacked(board: Board, square: Square, by: Color): boolean {
  const f = fileIndex(square);
  const r = rankIndex(square);

  // A pawn of `by` attacks diagonally forward, so look one rank behind the target
  const pawnRank = by === 'w' ? r - 1 : r + 1;
  if (isPiece(pieceOn(board, f - 1, pawnRank), by, ['p'])) return true;
  if (isPiece(pieceOn(board, f + 1, pawnRank), by, ['p'])) return true;

  for (const [df, dr] of KNIGHT_OFFSETS) {
    if (isPiece(pieceOn(board, f + df, r + dr), by, ['n'])) return true;
  }

  for (const [df, dr] of KING_OFFSETS) {
    if (isPiece(pieceOn(board, f + df, r + dr), by, ['k'])) return true;
  }

  for (const dir of ROOK_DIRECTIONS) {
    if (isPiece(firstPieceOnRay(board, f, r, dir), by, ['r', 'q'])) return true;
  }

  for (const dir of BISHOP_DIRECTIONS) {
    if (isPiece(firstPieceOnRay(board, f, r, dir), by, ['b', 'q'])) return true;
  }

  return false;
}

/**
 * Find the king of a color
 */
export function findKing(board: Board, color: Color): number {
  return board.findIndex((p) => p !== null && p.color === color && p.kind === 'k');
}
