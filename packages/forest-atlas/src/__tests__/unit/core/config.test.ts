/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DEFAULT_CONFIG, loadConfig, validateConfig } from '../../../core/config.js';
import { ConfigurationError } from '../../../core/errors.js';
import { testConfig } from '../../utils/fixtures.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'forest-atlas-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when no file or environment is present', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.hansen).toEqual(DEFAULT_CONFIG.hansen);
    expect(config.dynamicWorld).toEqual(DEFAULT_CONFIG.dynamicWorld);
    expect(config.retry).toEqual({ maxAttempts: 3, backoffBase: 2 });
    expect(config.earthEngine.projectId).toBeNull();
    expect(config.configPath).toBeNull();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads a YAML file found in a parent directory', async () => {
    writeFileSync(
      join(dir, '.forest-atlasrc'),
      [
        'version: 1',
        'earthEngine:',
        '  projectId: file-project',
        'hansen:',
        '  treeCoverThreshold: 25',
        'dynamicWorld:',
        '  windowDays: 14',
        '  gapFilling: false',
        'retry:',
        '  maxAttempts: 5',
      ].join('\n')
    );
    const nested = join(dir, 'a', 'b');
    mkdirSync(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested, env: {} });

    expect(config.configPath).toBe(join(dir, '.forest-atlasrc'));
    expect(config.earthEngine.projectId).toBe('file-project');
    expect(config.hansen.treeCoverThreshold).toBe(25);
    expect(config.dynamicWorld.windowDays).toBe(14);
    expect(config.dynamicWorld.gapFilling).toBe(false);
    expect(config.dynamicWorld.lookbackDays).toBe(180);
    expect(config.retry).toEqual({ maxAttempts: 5, backoffBase: 2 });
  });

  it('reads JSON through the same parser', async () => {
    const path = join(dir, 'settings.json');
    writeFileSync(path, JSON.stringify({ retry: { backoffBase: 1.5 } }));

    const config = await loadConfig({ configPath: path, env: {} });

    expect(config.retry.backoffBase).toBe(1.5);
  });

  it('lets the environment override the file', async () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'earthEngine:\n  projectId: file-project\nretry:\n  maxAttempts: 5\n');

    const config = await loadConfig({
      configPath: path,
      env: {
        FOREST_ATLAS_EE_PROJECT_ID: 'env-project',
        FOREST_ATLAS_EE_ACCESS_TOKEN: 'test-secret',
        FOREST_ATLAS_MAX_RETRIES: '2',
        FOREST_ATLAS_BACKOFF_BASE: '3',
        DATABASE_URL: 'sqlite::memory:',
        LOG_LEVEL: 'WARN',
      },
    });

    expect(config.earthEngine.projectId).toBe('env-project');
    expect(config.earthEngine.accessToken).toBe('test-secret');
    expect(config.retry).toEqual({ maxAttempts: 2, backoffBase: 3 });
    expect(config.database.url).toBe('sqlite::memory:');
    expect(config.logging.level).toBe('warn');
  });

  it('lets command-line overrides win', async () => {
    const config = await loadConfig({
      cwd: dir,
      env: { LOG_LEVEL: 'error', FOREST_ATLAS_JSON: 'false' },
      overrides: { verbose: true, json: true },
    });

    expect(config.logging).toEqual({ level: 'debug', json: true });
  });

  it('rejects a missing explicit config file', async () => {
    await expect(loadConfig({ configPath: join(dir, 'nope.yaml'), env: {} })).rejects.toThrow(
      ConfigurationError
    );
  });

  it('rejects out-of-range values with the offending path', async () => {
    const path = join(dir, 'bad.yaml');
    writeFileSync(path, 'hansen:\n  treeCoverThreshold: 150\n');

    await expect(loadConfig({ configPath: path, env: {} })).rejects.toThrow(
      /Invalid config file .*hansen\.treeCoverThreshold/
    );
  });

  it('rejects non-numeric numeric environment variables', async () => {
    await expect(
      loadConfig({ cwd: dir, env: { FOREST_ATLAS_MAX_RETRIES: 'many' } })
    ).rejects.toThrow('FOREST_ATLAS_MAX_RETRIES must be a number, got "many"');
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateConfig(testConfig())).not.toThrow();
  });

  it('rejects a zero attempt budget', () => {
    expect(() => validateConfig(testConfig({ retry: { maxAttempts: 0 } }))).toThrow(
      'Retry maxAttempts must be a positive integer, got 0'
    );
  });

  it('rejects an empty loss-year range', () => {
    expect(() =>
      validateConfig(testConfig({ hansen: { firstLossYear: 2024, lastLossYear: 2001 } }))
    ).toThrow(ConfigurationError);
  });
});
