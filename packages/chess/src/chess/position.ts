import { findKing, isSquareAttacked as isAttackedOnBoard } from './attacks.js';
import { STARTING_FEN, formatFen, parseFen } from './fen.js';
import { generateLegalMoves, isKingAttacked, playMove } from './movegen.js';
import { squareAt, squareIndex } from './squares.js';
import type { CastlingRights, Color, Move, Piece, PositionData, Square } from './types.js';

/**
 * An immutable chess position
 *
 * Created from FEN or by applying a legal move to another position;
 * applying a move returns a new Position and leaves this one untouched.
 */
export class Position {
  private legalMovesCache: readonly Move[] | null = null;

  private constructor(private readonly data: PositionData) {}

  /**
   * Create a position from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): Position {
    return new Position(parseFen(fen));
  }

  /**
   * Create the standard starting position
   */
  static startingPosition(): Position {
    return Position.fromFen(STARTING_FEN);
  }

  get turn(): Color {
    return this.data.turn;
  }

  get castling(): CastlingRights {
    return this.data.castling;
  }

  /**
   * En-passant target square as stored, whether or not a capture is possible
   */
  get epSquare(): Square | null {
    return this.data.epSquare;
  }

  get halfmoveClock(): number {
    return this.data.halfmoveClock;
  }

  get fullmoveNumber(): number {
    return this.data.fullmoveNumber;
  }

  /**
   * Half-moves played since the start of the game, derived from the move counters
   */
  ply(): number {
    return (this.data.fullmoveNumber - 1) * 2 + (this.data.turn === 'b' ? 1 : 0);
  }

  pieceAt(square: Square): Piece | null {
    return this.data.board[squareIndex(square)] ?? null;
  }

  kingSquare(color: Color): Square {
    return squareAt(findKing(this.data.board, color));
  }

  isSquareAttacked(square: Square, by: Color): boolean {
    return isAttackedOnBoard(this.data.board, square, by);
  }

  /**
   * Legal moves for the side to move
   */
  legalMoves(): readonly Move[] {
    if (this.legalMovesCache === null) {
      this.legalMovesCache = generateLegalMoves(this.data);
    }
    return this.legalMovesCache;
  }

  /**
   * Apply a move taken from legalMoves()
   */
  applyMove(move: Move): Position {
    return new Position(playMove(this.data, move));
  }

  isCheck(): boolean {
    return isKingAttacked(this.data);
  }

  isCheckmate(): boolean {
    return this.isCheck() && this.legalMoves().length === 0;
  }

  isStalemate(): boolean {
    return !this.isCheck() && this.legalMoves().length === 0;
  }

  /**
   * Six-field FEN; the en-passant square is written only when a legal
   * en-passant capture exists
   */
  toFen(): string {
    const epCapturable = this.legalMoves().some((m) => m.special === 'en-passant');
    return formatFen(this.data, epCapturable ? this.data.epSquare : null);
  }
}

/**
 * Parse a FEN string into a position
 * @throws InvalidFenError if the FEN is invalid
 */
export function fromFen(fen: string): Position {
  return Position.fromFen(fen);
}

export function applyMove(position: Position, move: Move): Position {
  return position.applyMove(move);
}

export function legalMoves(position: Position): readonly Move[] {
  return position.legalMoves();
}

export function isSquareAttacked(position: Position, square: Square, by: Color): boolean {
  return position.isSquareAttacked(square, by);
}
