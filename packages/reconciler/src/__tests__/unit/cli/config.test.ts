/**
 * CLI Configuration Tests
 *
 * File discovery, environment overrides and flag precedence.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, loadConfig } from '../../../cli/lib/config.js';
import { ConfigError } from '../../../core/errors.js';

const ENV_NAMES = [
  'CONFIG',
  'STRATEGY',
  'HEIGHT_STRATEGY',
  'ON_POLE_ERROR',
  'PROFILE',
  'FORMAT',
  'VERBOSE',
  'JSON',
];

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `make-ready-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(tempDir, { recursive: true });
    for (const name of ENV_NAMES) {
      vi.stubEnv(`MAKE_READY_${name}`, '');
    }
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should read the nearest config file', async () => {
    await writeFile(
      join(tempDir, '.make-readyrc'),
      ['profile: custom', 'report:', '  strategy: PREFER_SURVEY', '  on_pole_error: abort', 'output:', '  format: csv'].join(
        '\n'
      )
    );
    const nested = join(tempDir, 'jobs', 'north');
    await mkdir(nested, { recursive: true });

    const config = loadConfig({ cwd: nested });

    expect(config.configPath).toBe(join(tempDir, '.make-readyrc'));
    expect(config.profile).toBe('custom');
    expect(config.report).toEqual({
      strategy: 'PREFER_SURVEY',
      heightStrategy: DEFAULT_CONFIG.report.heightStrategy,
      onPoleError: 'abort',
    });
    expect(config.format).toBe('csv');
    expect(config.verbose).toBe(false);
  });

  it('should let environment variables override the file', async () => {
    await writeFile(join(tempDir, '.make-readyrc'), 'report:\n  strategy: PREFER_SURVEY\n');
    vi.stubEnv('MAKE_READY_STRATEGY', 'HIGHLIGHT_DIFFERENCES');
    vi.stubEnv('MAKE_READY_VERBOSE', '1');

    const config = loadConfig({ cwd: tempDir });

    expect(config.report.strategy).toBe('HIGHLIGHT_DIFFERENCES');
    expect(config.verbose).toBe(true);
  });

  it('should let flags override environment variables', () => {
    vi.stubEnv('MAKE_READY_FORMAT', 'json');
    vi.stubEnv('MAKE_READY_PROFILE', 'from-env');

    const config = loadConfig({ cwd: tempDir, overrides: { format: 'ndjson', profile: 'from-flag' } });

    expect(config.format).toBe('ndjson');
    expect(config.profile).toBe('from-flag');
  });

  it('should reject an unknown environment choice', () => {
    vi.stubEnv('MAKE_READY_ON_POLE_ERROR', 'retry');

    expect(() => loadConfig({ cwd: tempDir })).toThrow(
      'Invalid MAKE_READY_ON_POLE_ERROR: retry. Must be one of: skip, abort'
    );
  });

  it('should reject unknown keys in the config file', async () => {
    const configPath = join(tempDir, 'settings.yaml');
    await writeFile(configPath, 'profile: custom\nextra: true\n');

    let caught: unknown;
    try {
      loadConfig({ configPath });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.configPath).toBe(configPath);
    }
  });

  it('should fail when an explicit config file is missing', () => {
    expect(() => loadConfig({ configPath: join(tempDir, 'missing.yaml') })).toThrow(ConfigError);
  });
});
