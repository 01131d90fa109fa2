/**
 * Proxy session
 *
 * Runs the engine behind the tap:
 * 1. Open the log and spawn the engine
 * 2. Relay GUI stdin to the engine and engine stdout to the GUI
 * 3. On GUI EOF, close the engine's stdin and give it a grace period to exit,
 *    then SIGTERM and, one more grace period later, SIGKILL
 * 4. On engine EOF, stop reading GUI input
 * 5. Resolve with the engine's exit status
 */

import { spawn } from 'node:child_process';
import { EventEmitter, once } from 'node:events';
import { constants } from 'node:os';
import type { Readable, Writable } from 'node:stream';

import { IoError, SpawnError } from '../errors.js';
import { LogSink } from '../log/log-sink.js';
import { relay } from '../relay/relay.js';

export type EngineStderr = 'ignore' | 'inherit';

/**
 * The parts of a child process the tap relies on
 */
export interface EngineProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnEngine = (
  command: string,
  args: readonly string[],
  stderr: EngineStderr,
) => EngineProcess;

export interface ProxyOptions {
  /** Engine executable */
  engine: string;
  engineArgs?: readonly string[];
  /** Path of the tap log, opened for appending */
  logfile: string;
  engineStderr?: EngineStderr;
  /** Time the engine gets to exit after its stdin is closed, and again after SIGTERM (default: 1000) */
  shutdownGraceMs?: number;
  /** GUI side input (default: process.stdin) */
  input?: Readable;
  /** GUI side output (default: process.stdout) */
  output?: Writable;
  spawnEngine?: SpawnEngine;
  /** Use this sink instead of opening `logfile` */
  sink?: LogSink;
}

export const DEFAULT_SHUTDOWN_GRACE_MS = 1000;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

export const spawnEngine: SpawnEngine = (command, args, stderr) =>
  spawn(command, [...args], {
    stdio: ['pipe', 'pipe', stderr],
    windowsHide: true,
  });

/**
 * Shell-style exit status: the exit code, or 128 plus the signal number
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  return 1;
}

function waitForExit(child: EngineProcess): Promise<number> {
  return new Promise((resolve) => {
    child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve(exitStatus(code, signal));
    });
  });
}

/**
 * Run a tap session until both relay directions have stopped and the
 * engine has exited
 *
 * @returns the engine's exit status
 * @throws SpawnError if the engine cannot be started
 * @throws IoError if a relayed stream or the log fails
 */
export async function runProxy(options: ProxyOptions): Promise<number> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const graceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
  const sink = options.sink ?? (await LogSink.open(options.logfile));

  const child = (options.spawnEngine ?? spawnEngine)(
    options.engine,
    options.engineArgs ?? [],
    options.engineStderr ?? 'ignore',
  );
  let exited = false;
  const exitStatusPromise = waitForExit(child).then((status) => {
    exited = true;
    return status;
  });

  try {
    await once(child, 'spawn');
  } catch (error) {
    await sink.close();
    throw new SpawnError(options.engine, error);
  }

  const controller = new AbortController();
  const failures: unknown[] = [];
  let killTimer: NodeJS.Timeout | null = null;

  // SIGTERM after the grace period, then SIGKILL if the engine ignores it
  const terminateAfterGrace = (): void => {
    if (killTimer !== null || exited) return;
    killTimer = setTimeout(() => {
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), graceMs);
    }, graceMs);
  };

  const fail = (error: unknown): void => {
    failures.push(error);
    controller.abort();
    child.kill('SIGKILL');
  };

  child.on('error', (error: Error) => fail(new IoError('Engine process error', error)));

  // Write failures reach the relays through their write callbacks
  const abortOnStreamError = (): void => controller.abort();
  child.stdin.on('error', abortOnStreamError);
  output.on('error', abortOnStreamError);

  const guiToEngine = relay({
    source: input,
    destination: child.stdin,
    direction: 'gui-to-engine',
    sink,
    signal: controller.signal,
  }).then(() => {
    if (!child.stdin.writableEnded) child.stdin.end();
    terminateAfterGrace();
  }, fail);

  const engineToGui = relay({
    source: child.stdout,
    destination: output,
    direction: 'engine-to-gui',
    sink,
    signal: controller.signal,
  }).then(() => controller.abort(), fail);

  await Promise.all([guiToEngine, engineToGui]);

  if (!child.stdin.writableEnded) child.stdin.end();
  terminateAfterGrace();
  const status = await exitStatusPromise;
  if (killTimer !== null) clearTimeout(killTimer);

  child.stdin.off('error', abortOnStreamError);
  output.off('error', abortOnStreamError);

  try {
    await sink.close();
  } catch (error) {
    failures.push(error);
  }

  const [failure] = failures;
  if (failure !== undefined) throw failure;
  return status;
}
