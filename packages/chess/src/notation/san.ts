/**
 * Standard Algebraic Notation
 *
 * Converts moves of a position to SAN (Nf3, exd5, O-O, e8=Q+) and
 * threads a position through a principal variation of coordinate moves.
 */

import type { Position } from '../chess/position.js';
import { fileOf, rankOf } from '../chess/squares.js';
import type { Move, PieceKind } from '../chess/types.js';
import { IllegalMoveError } from '../errors.js';

import { formatUciMove, matchUciMove } from './uci.js';

const PIECE_LETTERS: Record<PieceKind, string> = {
  p: '',
  n: 'N',
  b: 'B',
  r: 'R',
  q: 'Q',
  k: 'K',
};

/**
 * Smallest prefix (file, rank, or both) telling a move apart from the
 * other legal moves of the same piece kind to the same square
 */
function disambiguator(position: Position, move: Move, kind: PieceKind): string {
  const rivals = position
    .legalMoves()
    .filter(
      (m) => m.to === move.to && m.from !== move.from && position.pieceAt(m.from)?.kind === kind,
    );
  if (rivals.length === 0) return '';

  const sameFile = rivals.some((m) => fileOf(m.from) === fileOf(move.from));
  if (!sameFile) return fileOf(move.from);

  const sameRank = rivals.some((m) => rankOf(m.from) === rankOf(move.from));
  if (!sameRank) return rankOf(move.from);

  return move.from;
}

/**
 * SAN without the check suffix
 */
function baseSan(position: Position, move: Move): string {
  if (move.special === 'castle-kingside') return 'O-O';
  if (move.special === 'castle-queenside') return 'O-O-O';

  const piece = position.pieceAt(move.from);
  if (piece === null) {
    throw new IllegalMoveError(formatUciMove(move), position.toFen());
  }

  const isCapture = position.pieceAt(move.to) !== null || move.special === 'en-passant';
  let san =
    piece.kind === 'p'
      ? isCapture
        ? fileOf(move.from)
        : ''
      : PIECE_LETTERS[piece.kind] + disambiguator(position, move, piece.kind);

  if (isCapture) san += 'x';
  san += move.to;
  if (move.promotion !== undefined) san += `=${PIECE_LETTERS[move.promotion]}`;
  return san;
}

/**
 * Convert a legal move of a position to SAN, with + or # when the move
 * gives check or mate
 */
export function toAlgebraic(position: Position, move: Move): string {
  const san = baseSan(position, move);
  const next = position.applyMove(move);
  if (next.isCheckmate()) return `${san}#`;
  if (next.isCheck()) return `${san}+`;
  return san;
}

/**
 * Convert a principal variation of coordinate moves to SAN
 *
 * Each move is matched against the legal moves of the position reached
 * so far, converted, and played.
 * @throws IllegalMoveError at the first move that matches no legal move
 */
export function convertPv(position: Position, uciMoves: readonly string[]): string[] {
  const sanMoves: string[] = [];
  let current = position;

  for (const uci of uciMoves) {
    const move = matchUciMove(current, uci);
    if (move === null) {
      throw new IllegalMoveError(uci, current.toFen());
    }
    sanMoves.push(toAlgebraic(current, move));
    current = current.applyMove(move);
  }

  return sanMoves;
}

function normalizeSan(san: string): string {
  return san
    .trim()
    .replace(/[+#!?]+$/, '')
    .replace(/^0-0-0$/, 'O-O-O')
    .replace(/^0-0$/, 'O-O');
}

/**
 * Resolve SAN back to the legal move it names
 * @returns null when the text names no legal move, or more than one
 */
export function sanToMove(position: Position, san: string): Move | null {
  const wanted = normalizeSan(san);
  const matches = position.legalMoves().filter((m) => baseSan(position, m) === wanted);
  return matches.length === 1 ? (matches[0] ?? null) : null;
}
