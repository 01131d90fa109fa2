/**
 * In-process stand-in for an engine child process
 *
 * Exposes piped stdin/stdout like a spawned engine. Bytes the tap writes
 * to stdin are recorded, and an optional responder answers complete
 * lines, so sessions can be driven without a real engine binary.
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

export type EngineResponder = (line: string) => readonly string[];

export interface FakeEngineConfig {
  /** Replies written to stdout for each complete line on stdin */
  responder?: EngineResponder;
  /** Emit this error instead of `spawn`, as a missing executable would */
  spawnError?: Error;
  /** Exit code used when stdin is closed; null keeps running until killed */
  exitOnStdinEnd?: number | null;
  /** Signals recorded by `kill` without exiting */
  ignoreSignals?: readonly NodeJS.Signals[];
}

export class FakeEngineProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly killSignals: NodeJS.Signals[] = [];

  private readonly chunks: Buffer[] = [];
  private partial = '';
  private running = true;

  constructor(private readonly config: FakeEngineConfig = {}) {
    super();

    this.stdin.on('data', (chunk: Buffer) => this.receive(chunk));
    this.stdin.on('end', () => {
      const code = this.config.exitOnStdinEnd === undefined ? 0 : this.config.exitOnStdinEnd;
      if (code !== null) this.exit(code);
    });

    process.nextTick(() => {
      if (this.config.spawnError !== undefined) {
        this.running = false;
        this.emit('error', this.config.spawnError);
      } else {
        this.emit('spawn');
      }
    });
  }

  /**
   * Everything written to the engine's stdin so far
   */
  get received(): Buffer {
    return Buffer.concat(this.chunks);
  }

  /**
   * Write raw engine output
   */
  send(text: string | Buffer): void {
    this.stdout.write(text);
  }

  /**
   * Close stdout and exit with a code or signal
   */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (!this.running) return;
    this.running = false;
    this.exitCode = code;
    this.signalCode = signal;
    this.stdout.end();
    process.nextTick(() => this.emit('exit', code, signal));
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.killSignals.push(signal);
    if (!this.running) return false;
    if (this.config.ignoreSignals?.includes(signal)) return true;
    this.exit(null, signal);
    return true;
  }

  private receive(chunk: Buffer): void {
    this.chunks.push(chunk);
    const responder = this.config.responder;
    if (responder === undefined) return;

    const lines = (this.partial + chunk.toString('utf8')).split('\n');
    this.partial = lines.pop() ?? '';
    for (const line of lines) {
      for (const reply of responder(line.replace(/\r$/, ''))) {
        this.send(`${reply}\n`);
      }
    }
  }
}

export function createFakeEngine(config: FakeEngineConfig = {}): FakeEngineProcess {
  return new FakeEngineProcess(config);
}

/**
 * Responder for a minimal UCI engine that answers the handshake,
 * `isready`, and `go` with one info line and a best move
 */
export function scriptedUciResponder(name = 'Fake Engine'): EngineResponder {
  return (line) => {
    const command = line.trim().split(/\s+/)[0];
    switch (command) {
      case 'uci':
        return [`id name ${name}`, 'id author test', 'uciok'];
      case 'isready':
        return ['readyok'];
      case 'go':
        return ['info depth 1 score cp 20 nodes 20 nps 2000 time 10 pv e2e4', 'bestmove e2e4'];
      default:
        return [];
    }
  };
}
