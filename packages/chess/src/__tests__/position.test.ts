import { describe, it, expect } from 'vitest';

import {
  Position,
  STARTING_FEN,
  InvalidFenError,
  applyMove,
  fromFen,
  isSquareAttacked,
  legalMoves,
  matchUciMove,
  type Move,
} from '../index.js';

function play(position: Position, ...uciMoves: string[]): Position {
  return uciMoves.reduce((pos, uci) => {
    const move = matchUciMove(pos, uci);
    if (move === null) throw new Error(`test move ${uci} is not legal`);
    return pos.applyMove(move);
  }, position);
}

function movesFrom(position: Position, from: string): Move[] {
  return position.legalMoves().filter((m) => m.from === from);
}

describe('Position', () => {
  describe('FEN handling', () => {
    it('creates the starting position', () => {
      expect(Position.startingPosition().toFen()).toBe(STARTING_FEN);
    });

    it('round-trips FEN', () => {
      const testFens = [
        STARTING_FEN,
        'r1bqkb1r/pppp1ppp/2n2n2/4p3/2B1P3/5N2/PPPP1PPP/RNBQK2R w KQkq - 4 4',
        'r3k2r/pppq1ppp/2n2n2/2bpp3/2BPP3/2N2N2/PPPQ1PPP/R3K2R w KQkq - 0 1',
        '8/8/8/8/8/8/8/4K2k w - - 0 1',
      ];

      for (const fen of testFens) {
        expect(fromFen(fen).toFen()).toBe(fen);
      }
    });

    it('throws InvalidFenError for malformed FEN', () => {
      expect(() => fromFen('invalid')).toThrow(InvalidFenError);
      expect(() => fromFen('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP w KQkq - 0 1')).toThrow(
        InvalidFenError,
      );
    });

    it('rejects positions without exactly one king per side', () => {
      expect(() => fromFen('8/8/8/8/8/8/8/4K3 w - - 0 1')).toThrow(InvalidFenError);
      expect(() => fromFen('k7/8/8/8/8/8/8/K6K w - - 0 1')).toThrow(InvalidFenError);
    });

    it('drops the en-passant square when no capture is possible', () => {
      const pos = play(Position.startingPosition(), 'e2e4');
      expect(pos.epSquare).toBe('e3');
      expect(pos.toFen()).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1');
    });

    it('keeps the en-passant square when a capture is possible', () => {
      const fen = 'rnbqkbnr/ppp1pppp/8/3pP3/8/8/PPPP1PPP/RNBQKBNR w KQkq d6 0 3';
      expect(fromFen(fen).toFen()).toBe(fen);
    });

    it('drops the en-passant square when the capture would expose the king', () => {
      const pos = fromFen('8/8/8/KPp4r/8/8/8/7k w - c6 0 1');
      expect(pos.legalMoves().some((m) => m.special === 'en-passant')).toBe(false);
      expect(pos.toFen()).toBe('8/8/8/KPp4r/8/8/8/7k w - - 0 1');
    });
  });

  describe('legal moves', () => {
    it('generates twenty moves from the starting position', () => {
      expect(legalMoves(Position.startingPosition())).toHaveLength(20);
    });

    it('marks double pawn pushes', () => {
      const push = movesFrom(Position.startingPosition(), 'e2').find((m) => m.to === 'e4');
      expect(push?.special).toBe('double-push');
    });

    it('generates all four promotions', () => {
      const pos = fromFen('8/P7/8/8/8/8/8/K6k w - - 0 1');
      const promotions = movesFrom(pos, 'a7').map((m) => m.promotion);
      expect(promotions.sort()).toEqual(['b', 'n', 'q', 'r']);
      expect(pos.legalMoves()).toHaveLength(7);
    });

    it('allows castling on both sides when the path is clear', () => {
      const pos = fromFen('r3k2r/pppppppp/8/8/8/8/PPPPPPPP/R3K2R w KQkq - 0 1');
      const specials = movesFrom(pos, 'e1').map((m) => m.special);
      expect(specials).toContain('castle-kingside');
      expect(specials).toContain('castle-queenside');
    });

    it('forbids castling through an attacked square', () => {
      const pos = fromFen('r3k2r/8/8/8/8/8/5r2/R3K2R w KQkq - 0 1');
      const specials = movesFrom(pos, 'e1').map((m) => m.special);
      expect(specials).not.toContain('castle-kingside');
      expect(specials).toContain('castle-queenside');
    });

    it('forbids castling out of check', () => {
      const pos = fromFen('r3k2r/8/8/8/4r3/8/8/R3K2R w KQkq - 0 1');
      expect(pos.isCheck()).toBe(true);
      expect(pos.legalMoves().some((m) => m.special?.startsWith('castle'))).toBe(false);
    });

    it('excludes moves that leave the king in check', () => {
      // The e2 knight is pinned against the king by the e8 rook
      const pos = fromFen('4r1k1/8/8/8/8/8/4N3/4K3 w - - 0 1');
      expect(movesFrom(pos, 'e2')).toHaveLength(0);
    });
  });

  describe('applyMove', () => {
    it('returns a new position and leaves the original untouched', () => {
      const start = Position.startingPosition();
      const move = matchUciMove(start, 'e2e4');
      expect(move).not.toBeNull();
      if (move === null) return;

      const next = applyMove(start, move);
      expect(start.toFen()).toBe(STARTING_FEN);
      expect(next.pieceAt('e4')).toEqual({ color: 'w', kind: 'p' });
      expect(next.pieceAt('e2')).toBeNull();
      expect(next.turn).toBe('b');
    });

    it('moves the rook when castling', () => {
      const pos = play(fromFen('r3k2r/pppppppp/8/8/8/8/PPPPPPPP/R3K2R w KQkq - 0 1'), 'e1g1');
      expect(pos.toFen()).toBe('r3k2r/pppppppp/8/8/8/8/PPPPPPPP/R4RK1 b kq - 1 1');
    });

    it('clears castling rights when a rook leaves its square', () => {
      const pos = play(fromFen('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1'), 'h1h2');
      expect(pos.toFen()).toBe('r3k2r/8/8/8/8/8/7R/R3K3 b Qkq - 1 1');
    });

    it('clears castling rights when a rook is captured at home', () => {
      const pos = play(fromFen('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1'), 'a1a8');
      expect(pos.toFen()).toBe('R3k2r/8/8/8/8/8/8/4K2R b Kk - 0 1');
    });

    it('removes the captured pawn on en passant', () => {
      const pos = play(
        fromFen('rnbqkbnr/ppp1p1pp/8/3pPp2/8/8/PPPP1PPP/RNBQKBNR w KQkq f6 0 3'),
        'e5f6',
      );
      expect(pos.pieceAt('f5')).toBeNull();
      expect(pos.pieceAt('f6')).toEqual({ color: 'w', kind: 'p' });
    });

    it('replaces the pawn on promotion', () => {
      const pos = play(fromFen('8/P7/8/8/8/8/8/K6k w - - 0 1'), 'a7a8n');
      expect(pos.pieceAt('a8')).toEqual({ color: 'w', kind: 'n' });
    });

    it('advances the move counters', () => {
      const start = Position.startingPosition();
      const afterE4 = play(start, 'e2e4');
      const afterE5 = play(afterE4, 'e7e5');
      const afterNf3 = play(afterE5, 'g1f3');

      expect([start.ply(), afterE4.ply(), afterE5.ply(), afterNf3.ply()]).toEqual([0, 1, 2, 3]);
      expect(afterE5.fullmoveNumber).toBe(2);
      expect(afterNf3.halfmoveClock).toBe(1);
    });
  });

  describe('attacks and game state', () => {
    it('detects attacked squares', () => {
      const start = Position.startingPosition();
      expect(isSquareAttacked(start, 'f3', 'w')).toBe(true);
      expect(isSquareAttacked(start, 'e4', 'w')).toBe(false);
      expect(isSquareAttacked(start, 'e6', 'b')).toBe(true);
    });

    it('stops sliding attacks at the first piece', () => {
      const pos = fromFen('4k3/8/8/8/8/8/4P3/4R1K1 w - - 0 1');
      expect(pos.isSquareAttacked('e2', 'w')).toBe(true);
      expect(pos.isSquareAttacked('e3', 'w')).toBe(false);
    });

    it('detects checkmate', () => {
      const pos = play(Position.startingPosition(), 'f2f3', 'e7e5', 'g2g4', 'd8h4');
      expect(pos.isCheck()).toBe(true);
      expect(pos.isCheckmate()).toBe(true);
      expect(pos.kingSquare('w')).toBe('e1');
    });

    it('detects stalemate', () => {
      const pos = fromFen('k7/8/1Q6/8/8/8/8/7K b - - 0 1');
      expect(pos.isStalemate()).toBe(true);
      expect(pos.isCheckmate()).toBe(false);
    });
  });
});
