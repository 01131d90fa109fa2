/**
 * Proxy errors
 *
 * Both are fatal to a tap session: relaying cannot continue once the
 * engine is missing or a stream is broken.
 */

/**
 * Error thrown when the engine process cannot be started
 */
export class SpawnError extends Error {
  constructor(
    public readonly command: string,
    public readonly reason?: unknown,
  ) {
    super(`Failed to start engine "${command}"${reason instanceof Error ? `: ${reason.message}` : ''}`);
    this.name = 'SpawnError';
  }
}

/**
 * Error thrown when reading a relayed stream or writing a stream or the log fails
 */
export class IoError extends Error {
  constructor(
    message: string,
    public readonly reason?: unknown,
  ) {
    super(reason instanceof Error ? `${message}: ${reason.message}` : message);
    this.name = 'IoError';
  }
}
