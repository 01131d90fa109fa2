/**
 * Configuration system tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { DEFAULT_TAP_CONFIG } from '../config/defaults.js';
import { loadConfig, loadEnvConfig } from '../config/loader.js';
import {
  validateConfig,
  validatePartialConfig,
  ConfigValidationError,
} from '../config/validation.js';
import { ConfigError } from '../errors/cli-errors.js';

describe('Config Defaults', () => {
  it('should default the optional tap settings', () => {
    expect(DEFAULT_TAP_CONFIG).toEqual({
      engineArgs: [],
      engineStderr: 'ignore',
      shutdownGraceMs: 1000,
    });
  });
});

describe('Config Validation', () => {
  describe('validateConfig', () => {
    it('should accept a complete configuration', () => {
      const config = {
        engine: '/opt/engines/fake',
        logfile: 'tap.log',
        engineArgs: ['--threads', '2'],
        engineStderr: 'inherit',
        shutdownGraceMs: 250,
      };
      expect(validateConfig(config)).toEqual(config);
    });

    it('should report every missing required key', () => {
      try {
        validateConfig({ ...DEFAULT_TAP_CONFIG });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors.map((e) => e.path)).toEqual(['engine', 'logfile']);
        }
      }
    });

    it('should reject an empty engine path', () => {
      expect(() => validateConfig({ ...DEFAULT_TAP_CONFIG, engine: '', logfile: 'tap.log' })).toThrow(
        ConfigValidationError,
      );
    });
  });

  describe('validatePartialConfig', () => {
    it('should accept partial config', () => {
      expect(validatePartialConfig({ engine: '/opt/engines/fake' })).toEqual({
        engine: '/opt/engines/fake',
      });
    });

    it('should reject an unknown stderr mode', () => {
      try {
        validatePartialConfig({ engineStderr: 'pipe' });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors.map((e) => e.path)).toEqual(['engineStderr']);
        }
      }
    });

    it('should reject a negative grace period', () => {
      expect(() => validatePartialConfig({ shutdownGraceMs: -5 })).toThrow(ConfigValidationError);
    });
  });

  describe('ConfigValidationError', () => {
    it('should format issues with a hint', () => {
      const error = new ConfigValidationError([{ path: 'engine', message: 'Required' }]);
      expect(error.format()).toBe(
        [
          'Configuration validation failed:',
          '',
          '  engine: Required',
          '',
          'Set "engine" and "logfile" in config.json or pass another file with --config',
        ].join('\n'),
      );
    });
  });
});

describe('loadEnvConfig', () => {
  it('should map environment variables to config keys', () => {
    expect(
      loadEnvConfig({
        UCITAP_ENGINE: '/opt/engines/env',
        UCITAP_LOGFILE: 'env.log',
        UCITAP_SHUTDOWN_GRACE_MS: '500',
      }),
    ).toEqual({ engine: '/opt/engines/env', logfile: 'env.log', shutdownGraceMs: 500 });
  });

  it('should ignore empty values', () => {
    expect(loadEnvConfig({ UCITAP_ENGINE: '' })).toEqual({});
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ucitap-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('should read config.json from the working directory', async () => {
    writeConfig('config.json', JSON.stringify({ engine: '/opt/engines/fake', logfile: 'tap.log' }));

    const config = await loadConfig({}, { cwd: dir, env: {} });

    expect(config).toEqual({
      engine: '/opt/engines/fake',
      logfile: 'tap.log',
      engineArgs: [],
      engineStderr: 'ignore',
      shutdownGraceMs: 1000,
    });
  });

  it('should read a YAML rc file', async () => {
    writeConfig(
      '.ucitaprc.yaml',
      ['engine: /opt/engines/fake', 'logfile: tap.log', 'engineArgs:', '  - --threads', '  - "2"', ''].join(
        '\n',
      ),
    );

    const config = await loadConfig({}, { cwd: dir, env: {} });

    expect(config.engineArgs).toEqual(['--threads', '2']);
  });

  it('should let environment variables override the file', async () => {
    writeConfig('config.json', JSON.stringify({ engine: '/opt/engines/fake', logfile: 'tap.log' }));

    const config = await loadConfig(
      {},
      { cwd: dir, env: { UCITAP_LOGFILE: 'override.log', UCITAP_SHUTDOWN_GRACE_MS: '0' } },
    );

    expect(config.logfile).toBe('override.log');
    expect(config.shutdownGraceMs).toBe(0);
  });

  it('should load an explicit config path', async () => {
    const file = writeConfig(
      'tap-settings.json',
      JSON.stringify({ engine: '/opt/engines/other', logfile: 'other.log' }),
    );

    const config = await loadConfig({ config: file }, { cwd: os.tmpdir(), env: {} });

    expect(config.engine).toBe('/opt/engines/other');
  });

  it('should fail with ConfigError for a missing explicit path', async () => {
    await expect(
      loadConfig({ config: path.join(dir, 'missing.json') }, { cwd: dir, env: {} }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('should fail validation when nothing configures the engine', async () => {
    await expect(loadConfig({}, { cwd: dir, env: {} })).rejects.toBeInstanceOf(
      ConfigValidationError,
    );
  });

  it('should reject a non-numeric grace period from the environment', async () => {
    writeConfig('config.json', JSON.stringify({ engine: '/opt/engines/fake', logfile: 'tap.log' }));

    await expect(
      loadConfig({}, { cwd: dir, env: { UCITAP_SHUTDOWN_GRACE_MS: 'soon' } }),
    ).rejects.toBeInstanceOf(ConfigValidationError);
  });
});
