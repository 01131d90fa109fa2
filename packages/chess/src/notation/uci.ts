/**
 * Coordinate (UCI) move notation: e2e4, e7e8q, e1g1
 */

import type { Position } from '../chess/position.js';
import { isSquare } from '../chess/squares.js';
import type { Move, PromotionKind, Square } from '../chess/types.js';

export interface UciMove {
  from: Square;
  to: Square;
  promotion?: PromotionKind;
}

const UCI_MOVE_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbnQRBN])?$/;

const PROMOTIONS: Record<string, PromotionKind> = { q: 'q', r: 'r', b: 'b', n: 'n' };

/**
 * Split a coordinate move into its parts
 * @returns null for the null move "0000" and for malformed text
 */
export function parseUciMove(text: string): UciMove | null {
  const match = UCI_MOVE_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, from = '', to = '', promo] = match;
  if (!isSquare(from) || !isSquare(to)) return null;

  const result: UciMove = { from, to };
  const promotion = promo === undefined ? undefined : PROMOTIONS[promo.toLowerCase()];
  if (promotion !== undefined) {
    result.promotion = promotion;
  }
  return result;
}

export function formatUciMove(move: UciMove | Move): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

/**
 * Find the legal move of a position that a coordinate move denotes
 */
export function matchUciMove(position: Position, text: string): Move | null {
  const parsed = parseUciMove(text);
  if (parsed === null) return null;

  return (
    position
      .legalMoves()
      .find(
        (m) => m.from === parsed.from && m.to === parsed.to && m.promotion === parsed.promotion,
      ) ?? null
  );
}
