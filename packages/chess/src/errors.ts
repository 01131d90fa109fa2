/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(
    message: string,
    public readonly fen: string,
  ) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when a move does not match any legal move of a position
 */
export class IllegalMoveError extends Error {
  constructor(
    public readonly move: string,
    public readonly fen: string,
  ) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}
