/**
 * Convert command tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { gunzipSync } from 'node:zlib';

import { serializeRecords } from '@ucitap/core';
import { getFixturePath, MemoryWritable } from '@ucitap/test-utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { convertLog, defaultOutputPath } from '../commands/convert.js';
import type { ConvertCliOptions } from '../config/schema.js';
import { InputError, OutputError } from '../errors/cli-errors.js';

const SESSION_LOG = getFixturePath('logs/session.log');

function options(overrides: Partial<ConvertCliOptions> = {}): ConvertCliOptions {
  return {
    log: SESSION_LOG,
    compress: false,
    emit: 'every-pv',
    fen: 'full',
    ...overrides,
  };
}

describe('defaultOutputPath', () => {
  it('should use the log file stem in the working directory', () => {
    expect(defaultOutputPath('logs/engine.log', false, '/work')).toBe('/work/engine.json');
  });

  it('should add .gz when compressing', () => {
    expect(defaultOutputPath('/var/tap/engine.log', true, '/work')).toBe('/work/engine.json.gz');
  });
});

describe('convertLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ucitap-convert-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write records to <stem>.json by default', async () => {
    const result = await convertLog(options(), { cwd: dir });

    const outputPath = path.join(dir, 'session.json');
    const written = fs.readFileSync(outputPath, 'utf-8');
    expect(result.outputPath).toBe(outputPath);
    expect(written).toBe(serializeRecords(result.records));
    expect(result.bytesWritten).toBe(Buffer.byteLength(written));
    expect(result.records.map((r) => r.pv)).toEqual(['Nf3', 'Nf3 Nc6', 'Bc4 Ke7']);
    expect(result.stats.linesRead).toBe(16);
  });

  it('should gzip the output with --compress', async () => {
    const result = await convertLog(options({ compress: true }), { cwd: dir });

    expect(result.outputPath).toBe(path.join(dir, 'session.json.gz'));
    const json = gunzipSync(fs.readFileSync(result.outputPath)).toString('utf-8');
    expect(json).toBe(serializeRecords(result.records));
  });

  it('should write to stdout for -o -', async () => {
    const stdout = new MemoryWritable();

    const result = await convertLog(options({ output: '-', emit: 'bestmove' }), { cwd: dir, stdout });

    expect(result.outputPath).toBe('-');
    expect(fs.readdirSync(dir)).toEqual([]);
    const records: unknown = JSON.parse(stdout.text());
    expect(records).toEqual(result.records);
    expect(result.records.map((r) => r.pv)).toEqual(['Nf3 Nc6', 'Bc4 Ke7']);
  });

  it('should write EPD-style FENs with --fen epd', async () => {
    const result = await convertLog(options({ output: path.join(dir, 'epd.json'), fen: 'epd' }));

    expect(result.records[0]?.fen).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq -');
    expect(fs.existsSync(path.join(dir, 'epd.json'))).toBe(true);
  });

  it('should fail with InputError for a missing log', async () => {
    await expect(
      convertLog(options({ log: path.join(dir, 'missing.log') }), { cwd: dir }),
    ).rejects.toBeInstanceOf(InputError);
  });

  it('should fail with OutputError when the output cannot be written', async () => {
    await expect(
      convertLog(options({ output: path.join(dir, 'no-such-dir', 'out.json') })),
    ).rejects.toBeInstanceOf(OutputError);
  });
});
