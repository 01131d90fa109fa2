/**
 * Tap command tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { PassThrough } from 'node:stream';

import { createFakeEngine, scriptedUciResponder, MemoryWritable } from '@ucitap/test-utils';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { runTap } from '../commands/tap.js';
import { ConfigValidationError } from '../config/validation.js';

describe('runTap', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ucitap-tap-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should run the configured engine and append to the configured log', async () => {
    const logfile = path.join(dir, 'tap.log');
    fs.writeFileSync(
      path.join(dir, 'config.json'),
      JSON.stringify({
        engine: '/opt/engines/fake',
        logfile,
        engineArgs: ['--threads', '2'],
        shutdownGraceMs: 20,
      }),
    );
    fs.writeFileSync(logfile, 'previous session\n');

    // Created on spawn: the fake emits `spawn` on the next tick, like a real child
    const spawnEngine = vi.fn(() =>
      createFakeEngine({ responder: scriptedUciResponder('Fake Engine') }),
    );
    const input = new PassThrough();
    const output = new MemoryWritable();
    input.end('isready\n');

    const status = await runTap({}, { cwd: dir, env: {}, input, output, spawnEngine });

    expect(status).toBe(0);
    expect(spawnEngine).toHaveBeenCalledWith('/opt/engines/fake', ['--threads', '2'], 'ignore');
    expect(output.text()).toBe('readyok\n');

    const lines = fs.readFileSync(logfile, 'utf-8').split('\n');
    expect(lines[0]).toBe('previous session');
    expect(lines).toHaveLength(4);
    expect(lines[3]).toBe('');
    // The two directions are logged concurrently
    const [sent] = lines.filter((line) => line.startsWith('>> '));
    const [received] = lines.filter((line) => line.startsWith('<< '));
    expect(sent).toMatch(/^>> \d{4}-\d{2}-\d{2}T\S+Z isready$/);
    expect(received).toMatch(/^<< \d{4}-\d{2}-\d{2}T\S+Z readyok$/);
  });

  it('should not start the engine when the configuration is invalid', async () => {
    const spawnEngine = vi.fn(() => createFakeEngine());

    await expect(runTap({}, { cwd: dir, env: {}, spawnEngine })).rejects.toBeInstanceOf(
      ConfigValidationError,
    );
    expect(spawnEngine).not.toHaveBeenCalled();
  });
});
