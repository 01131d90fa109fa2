/**
 * Square Utilities
 *
 * Conversions between square names and 0..63 board indices.
 */

import type { File, Rank, Square } from './types.js';

export const FILES: readonly File[] = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'];
export const RANKS: readonly Rank[] = ['1', '2', '3', '4', '5', '6', '7', '8'];

/**
 * All squares in board index order (a1, b1, ..., h8)
 */
export const SQUARES: readonly Square[] = RANKS.flatMap((r) => FILES.map((f): Square => `${f}${r}`));

const SQUARE_PATTERN = /^[a-h][1-8]$/;

/**
 * Check whether a string names a square
 */
export function isSquare(text: string): text is Square {
  return SQUARE_PATTERN.test(text);
}

/**
 * Get file index (0-7) from square
 */
export function fileIndex(square: Square): number {
  return square.charCodeAt(0) - 97;
}

/**
 * Get rank index (0-7) from square
 */
export function rankIndex(square: Square): number {
  return square.charCodeAt(1) - 49;
}

export function squareIndex(square: Square): number {
  return rankIndex(square) * 8 + fileIndex(square);
}

export function squareAt(index: number): Square {
  const square = SQUARES[index];
  if (square === undefined) {
    throw new RangeError(`Board index out of range: ${index}`);
  }
  return square;
}

/**
 * Create square from file and rank indices (0-7), or null when off the board
 */
export function squareFromCoords(fileIdx: number, rankIdx: number): Square | null {
  if (fileIdx < 0 || fileIdx > 7 || rankIdx < 0 || rankIdx > 7) {
    return null;
  }
  return squareAt(rankIdx * 8 + fileIdx);
}

export function fileOf(square: Square): File {
  return FILES[fileIndex(square)] ?? 'a';
}

export function rankOf(square: Square): Rank {
  return RANKS[rankIndex(square)] ?? '1';
}
