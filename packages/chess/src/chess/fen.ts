/**
 * FEN parsing and serialization
 */

import { validateFen } from 'chess.js';

import { InvalidFenError } from '../errors.js';

import { isSquare } from './squares.js';
import { NO_CASTLING } from './types.js';
import type { CastlingRights, Color, Piece, PieceKind, PositionData, Square } from './types.js';

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const PIECE_KINDS: Record<string, PieceKind> = {
  p: 'p',
  n: 'n',
  b: 'b',
  r: 'r',
  q: 'q',
  k: 'k',
};

function parsePlacement(placement: string, fen: string): Array<Piece | null> {
  const board: Array<Piece | null> = new Array<Piece | null>(64).fill(null);
  const rows = placement.split('/');
  if (rows.length !== 8) {
    throw new InvalidFenError(`Invalid FEN: expected 8 ranks, got ${rows.length}`, fen);
  }

  rows.forEach((row, i) => {
    const rankIdx = 7 - i;
    let fileIdx = 0;
    for (const ch of row) {
      if (ch >= '1' && ch <= '8') {
        fileIdx += Number(ch);
        continue;
      }
      const kind = PIECE_KINDS[ch.toLowerCase()];
      if (kind === undefined || fileIdx > 7) {
        throw new InvalidFenError(`Invalid FEN: bad piece placement in rank ${rankIdx + 1}`, fen);
      }
      const color: Color = ch === ch.toUpperCase() ? 'w' : 'b';
      board[rankIdx * 8 + fileIdx] = { color, kind };
      fileIdx++;
    }
    if (fileIdx !== 8) {
      throw new InvalidFenError(`Invalid FEN: rank ${rankIdx + 1} does not have 8 squares`, fen);
    }
  });

  for (const color of ['w', 'b'] as const) {
    const kings = board.filter((p) => p !== null && p.color === color && p.kind === 'k').length;
    if (kings !== 1) {
      const side = color === 'w' ? 'white' : 'black';
      throw new InvalidFenError(`Invalid FEN: expected one ${side} king, found ${kings}`, fen);
    }
  }

  return board;
}

function parseCastling(field: string, fen: string): CastlingRights {
  if (field === '-') {
    return NO_CASTLING;
  }
  if (!/^[KQkq]+$/.test(field)) {
    throw new InvalidFenError(`Invalid FEN: bad castling field "${field}"`, fen);
  }
  return {
    whiteKingside: field.includes('K'),
    whiteQueenside: field.includes('Q'),
    blackKingside: field.includes('k'),
    blackQueenside: field.includes('q'),
  };
}

function parseCounter(field: string, min: number, name: string, fen: string): number {
  if (!/^\d+$/.test(field) || Number(field) < min) {
    throw new InvalidFenError(`Invalid FEN: bad ${name} "${field}"`, fen);
  }
  return Number(field);
}

/**
 * Parse a six-field FEN string
 * @throws InvalidFenError if the FEN is malformed or has other than one king per side
 */
export function parseFen(fen: string): PositionData {
  const text = fen.trim();
  const checked = validateFen(text);
  if (!checked.ok) {
    throw new InvalidFenError(checked.error ?? `Invalid FEN: ${text}`, text);
  }

  const fields = text.split(/\s+/);
  const [placement, turn, castling, ep, halfmove, fullmove] = fields;
  if (
    fields.length !== 6 ||
    placement === undefined ||
    castling === undefined ||
    ep === undefined ||
    halfmove === undefined ||
    fullmove === undefined
  ) {
    throw new InvalidFenError('Invalid FEN: must contain six space-delimited fields', text);
  }
  if (turn !== 'w' && turn !== 'b') {
    throw new InvalidFenError(`Invalid FEN: bad side to move "${turn ?? ''}"`, text);
  }

  let epSquare: Square | null = null;
  if (ep !== '-') {
    if (!isSquare(ep)) {
      throw new InvalidFenError(`Invalid FEN: bad en-passant square "${ep}"`, text);
    }
    epSquare = ep;
  }

  return {
    board: parsePlacement(placement, text),
    turn,
    castling: parseCastling(castling, text),
    epSquare,
    halfmoveClock: parseCounter(halfmove, 0, 'halfmove clock', text),
    fullmoveNumber: parseCounter(fullmove, 1, 'fullmove number', text),
  };
}

function formatPlacement(data: PositionData): string {
  const rows: string[] = [];
  for (let rankIdx = 7; rankIdx >= 0; rankIdx--) {
    let row = '';
    let empty = 0;
    for (let fileIdx = 0; fileIdx < 8; fileIdx++) {
      const piece = data.board[rankIdx * 8 + fileIdx] ?? null;
      if (piece === null) {
        empty++;
        continue;
      }
      if (empty > 0) {
        row += String(empty);
        empty = 0;
      }
      row += piece.color === 'w' ? piece.kind.toUpperCase() : piece.kind;
    }
    if (empty > 0) row += String(empty);
    rows.push(row);
  }
  return rows.join('/');
}

function formatCastling(rights: CastlingRights): string {
  const field =
    (rights.whiteKingside ? 'K' : '') +
    (rights.whiteQueenside ? 'Q' : '') +
    (rights.blackKingside ? 'k' : '') +
    (rights.blackQueenside ? 'q' : '');
  return field || '-';
}

/**
 * Serialize position fields to FEN
 * @param epSquare - en-passant field to write, which the caller may have suppressed
 */
export function formatFen(data: PositionData, epSquare: Square | null = data.epSquare): string {
  return [
    formatPlacement(data),
    data.turn,
    formatCastling(data.castling),
    epSquare ?? '-',
    String(data.halfmoveClock),
    String(data.fullmoveNumber),
  ].join(' ');
}

/**
 * Reduce a FEN to its first four fields (placement, side, castling, en passant)
 */
export function trimFen(fen: string): string {
  const fields = fen.trim().split(/\s+/);
  return fields.length >= 4 ? fields.slice(0, 4).join(' ') : fen;
}
