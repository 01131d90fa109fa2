/**
 * Move generation and move application
 *
 * Works on raw PositionData; the Position class wraps these functions
 * behind an immutable interface.
 */

import {
  BISHOP_DIRECTIONS,
  KING_OFFSETS,
  KNIGHT_OFFSETS,
  ROOK_DIRECTIONS,
  findKing,
  isSquareAttacked,
  pieceOn,
  type Offset,
} from './attacks.js';
import { fileIndex, rankIndex, squareAt, squareFromCoords, squareIndex } from './squares.js';
import {
  PROMOTION_KINDS,
  opposite,
  type CastlingRights,
  type Color,
  type Move,
  type Piece,
  type PositionData,
  type Square,
} from './types.js';

const CASTLING_HOME: Record<Color, { king: Square; kingside: Square; queenside: Square }> = {
  w: { king: 'e1', kingside: 'h1', queenside: 'a1' },
  b: { king: 'e8', kingside: 'h8', queenside: 'a8' },
};

function pushPawnMoves(moves: Move[], from: Square, to: Square, promotes: boolean): void {
  if (promotes) {
    for (const promotion of PROMOTION_KINDS) {
      moves.push({ from, to, promotion });
    }
  } else {
    moves.push({ from, to });
  }
}

function generatePawnMoves(data: PositionData, from: Square, moves: Move[]): void {
  const { board, turn } = data;
  const f = fileIndex(from);
  const r = rankIndex(from);
  const dir = turn === 'w' ? 1 : -1;
  const startRank = turn === 'w' ? 1 : 6;
  const lastRank = turn === 'w' ? 7 : 0;

  const one = squareFromCoords(f, r + dir);
  if (one !== null && pieceOn(board, f, r + dir) === null) {
    pushPawnMoves(moves, from, one, r + dir === lastRank);
    const two = squareFromCoords(f, r + 2 * dir);
    if (r === startRank && two !== null && pieceOn(board, f, r + 2 * dir) === null) {
      moves.push({ from, to: two, special: 'double-push' });
    }
  }

  for (const df of [-1, 1]) {
    const target = squareFromCoords(f + df, r + dir);
    if (target === null) continue;
    const occupant = pieceOn(board, f + df, r + dir);
    if (occupant !== null) {
      if (occupant.color !== turn) {
        pushPawnMoves(moves, from, target, r + dir === lastRank);
      }
    } else if (target === data.epSquare) {
      const victim = pieceOn(board, f + df, r);
      if (victim !== null && victim.color !== turn && victim.kind === 'p') {
        moves.push({ from, to: target, special: 'en-passant' });
      }
    }
  }
}

function generateStepMoves(
  data: PositionData,
  from: Square,
  offsets: readonly Offset[],
  moves: Move[],
): void {
  const f = fileIndex(from);
  const r = rankIndex(from);
  for (const [df, dr] of offsets) {
    const to = squareFromCoords(f + df, r + dr);
    if (to === null) continue;
    const occupant = pieceOn(data.board, f + df, r + dr);
    if (occupant === null || occupant.color !== data.turn) {
      moves.push({ from, to });
    }
  }
}

function generateSlidingMoves(
  data: PositionData,
  from: Square,
  directions: readonly Offset[],
  moves: Move[],
): void {
  const f = fileIndex(from);
  const r = rankIndex(from);
  for (const [df, dr] of directions) {
    let cf = f + df;
    let cr = r + dr;
    for (let to = squareFromCoords(cf, cr); to !== null; to = squareFromCoords(cf, cr)) {
      const occupant = pieceOn(data.board, cf, cr);
      if (occupant === null) {
        moves.push({ from, to });
      } else {
        if (occupant.color !== data.turn) moves.push({ from, to });
        break;
      }
      cf += df;
      cr += dr;
    }
  }
}

function isOwnRook(data: PositionData, square: Square): boolean {
  const piece = data.board[squareIndex(square)] ?? null;
  return piece !== null && piece.color === data.turn && piece.kind === 'r';
}

function allEmpty(data: PositionData, squares: readonly Square[]): boolean {
  return squares.every((sq) => (data.board[squareIndex(sq)] ?? null) === null);
}

function noneAttacked(data: PositionData, squares: readonly Square[]): boolean {
  const enemy = opposite(data.turn);
  return squares.every((sq) => !isSquareAttacked(data.board, sq, enemy));
}

function generateCastlingMoves(data: PositionData, from: Square, moves: Move[]): void {
  const home = CASTLING_HOME[data.turn];
  if (from !== home.king) return;

  const rank = data.turn === 'w' ? '1' : '8';
  const { castling } = data;
  const kingside = data.turn === 'w' ? castling.whiteKingside : castling.blackKingside;
  const queenside = data.turn === 'w' ? castling.whiteQueenside : castling.blackQueenside;

  if (
    kingside &&
    isOwnRook(data, home.kingside) &&
    allEmpty(data, [`f${rank}`, `g${rank}`]) &&
    noneAttacked(data, [home.king, `f${rank}`, `g${rank}`])
  ) {
    moves.push({ from, to: `g${rank}`, special: 'castle-kingside' });
  }

  if (
    queenside &&
    isOwnRook(data, home.queenside) &&
    allEmpty(data, [`b${rank}`, `c${rank}`, `d${rank}`]) &&
    noneAttacked(data, [home.king, `d${rank}`, `c${rank}`])
  ) {
    moves.push({ from, to: `c${rank}`, special: 'castle-queenside' });
  }
}

/**
 * Generate moves that obey piece movement but may leave the king in check
 */
export function generatePseudoLegalMoves(data: PositionData): Move[] {
  const moves: Move[] = [];
  data.board.forEach((piece, index) => {
    if (piece === null || piece.color !== data.turn) return;
    const from = squareAt(index);
    switch (piece.kind) {
      case 'p':
        generatePawnMoves(data, from, moves);
        break;
      case 'n':
        generateStepMoves(data, from, KNIGHT_OFFSETS, moves);
        break;
      case 'b':
        generateSlidingMoves(data, from, BISHOP_DIRECTIONS, moves);
        break;
      case 'r':
        generateSlidingMoves(data, from, ROOK_DIRECTIONS, moves);
        break;
      case 'q':
        generateSlidingMoves(data, from, ROOK_DIRECTIONS, moves);
        generateSlidingMoves(data, from, BISHOP_DIRECTIONS, moves);
        break;
      case 'k':
        generateStepMoves(data, from, KING_OFFSETS, moves);
        generateCastlingMoves(data, from, moves);
        break;
    }
  });
  return moves;
}

/**
 * Check whether the side to move has its king attacked
 */
export function isKingAttacked(data: PositionData, color: Color = data.turn): boolean {
  const king = findKing(data.board, color);
  return king >= 0 && isSquareAttacked(data.board, squareAt(king), opposite(color));
}

/**
 * Generate legal moves by simulating each pseudo-legal move
 */
export function generateLegalMoves(data: PositionData): Move[] {
  return generatePseudoLegalMoves(data).filter(
    (move) => !isKingAttacked(playMove(data, move), data.turn),
  );
}

function revokeRights(rights: CastlingRights, square: Square): CastlingRights {
  switch (square) {
    case 'e1':
      return { ...rights, whiteKingside: false, whiteQueenside: false };
    case 'e8':
      return { ...rights, blackKingside: false, blackQueenside: false };
    case 'h1':
      return { ...rights, whiteKingside: false };
    case 'a1':
      return { ...rights, whiteQueenside: false };
    case 'h8':
      return { ...rights, blackKingside: false };
    case 'a8':
      return { ...rights, blackQueenside: false };
    default:
      return rights;
  }
}

/**
 * Apply a move without checking legality
 *
 * The move must come from this position's generated moves.
 */
export function playMove(data: PositionData, move: Move): PositionData {
  const board = data.board.slice();
  const fromIdx = squareIndex(move.from);
  const toIdx = squareIndex(move.to);
  const piece: Piece | null = board[fromIdx] ?? null;
  const captured = board[toIdx] ?? null;

  board[fromIdx] = null;
  board[toIdx] =
    move.promotion !== undefined && piece !== null
      ? { color: piece.color, kind: move.promotion }
      : piece;

  const rank = rankIndex(move.from);
  switch (move.special) {
    case 'en-passant':
      board[rank * 8 + fileIndex(move.to)] = null;
      break;
    case 'castle-kingside':
      board[rank * 8 + 5] = board[rank * 8 + 7] ?? null;
      board[rank * 8 + 7] = null;
      break;
    case 'castle-queenside':
      board[rank * 8 + 3] = board[rank * 8] ?? null;
      board[rank * 8] = null;
      break;
    default:
      break;
  }

  let castling = data.castling;
  if (piece !== null && piece.kind === 'k') {
    castling = revokeRights(castling, data.turn === 'w' ? 'e1' : 'e8');
  }
  castling = revokeRights(revokeRights(castling, move.from), move.to);

  const epSquare =
    move.special === 'double-push'
      ? squareFromCoords(fileIndex(move.from), (rankIndex(move.from) + rankIndex(move.to)) / 2)
      : null;

  const resetsClock = (piece !== null && piece.kind === 'p') || captured !== null;

  return {
    board,
    turn: opposite(data.turn),
    castling,
    epSquare,
    halfmoveClock: resetsClock ? 0 : data.halfmoveClock + 1,
    fullmoveNumber: data.turn === 'b' ? data.fullmoveNumber + 1 : data.fullmoveNumber,
  };
}
