import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  configLocations,
  DEFAULT_CONFIG,
  getCacheDirectory,
  loadConfig,
  parseConfig,
  validateConfig,
} from '../config';

function writeConfig(content: string): string {
  const path = join(mkdtempSync(join(tmpdir(), 'cloudsweep-config-')), 'config.yaml');
  writeFileSync(path, content);
  return path;
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('parseConfig', () => {
  it('fills defaults for an empty file', () => {
    expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.query).toEqual({
      parallel: 32,
      services: [],
      regions: [],
      operations: [],
      directory: '.',
      maxPages: 100,
      retry: { attempts: 4, minDelayMs: 250, maxDelayMs: 5000 },
    });
  });

  it('reads query settings from YAML', () => {
    const config = parseConfig(
      ['query:', '  parallel: 8', '  services: [s3, kms]', '  retry:', '    attempts: 2'].join('\n')
    );

    expect(config.query.parallel).toBe(8);
    expect(config.query.services).toEqual(['s3', 'kms']);
    expect(config.query.retry).toEqual({ attempts: 2, minDelayMs: 250, maxDelayMs: 5000 });
  });

  it('resolves environment references', () => {
    vi.stubEnv('SWEEP_PROFILE', 'audit');
    vi.stubEnv('SWEEP_CACHE', '/tmp/sweep-cache');

    const config = parseConfig(
      ['query:', '  profile: ${SWEEP_PROFILE}', 'cache:', '  directory: ${SWEEP_CACHE}'].join('\n')
    );

    expect(config.query.profile).toBe('audit');
    expect(config.cache.directory).toBe('/tmp/sweep-cache');
  });

  it('drops a profile whose variable is unset', () => {
    vi.stubEnv('SWEEP_UNSET_PROFILE', '');

    expect(parseConfig('query:\n  profile: ${SWEEP_UNSET_PROFILE}').query.profile).toBeUndefined();
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseConfig('query:\n  parallel: many')).toThrow();
  });
});

describe('loadConfig', () => {
  it('loads an explicit path', async () => {
    const path = writeConfig('query:\n  directory: out\n');

    const config = await loadConfig(path);

    expect(config.query.directory).toBe('out');
  });

  it('falls back to defaults when the file is missing', async () => {
    const missing = join(tmpdir(), 'cloudsweep-no-such-dir', 'config.yaml');

    await expect(loadConfig(missing)).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('reports an unreadable file and falls back to defaults', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const path = writeConfig('query:\n  parallel: many\n');

    await expect(loadConfig(path)).resolves.toEqual(DEFAULT_CONFIG);
    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors.mock.calls[0][0]).toBe(`Error loading config from ${path}:`);
  });

  it('only searches the given path', () => {
    expect(configLocations('/etc/sweep.yaml')).toEqual(['/etc/sweep.yaml']);
    expect(configLocations()[0]).toBe('.cloudsweep/config.yaml');
  });
});

describe('getCacheDirectory', () => {
  it('prefers the configured directory', () => {
    const config = parseConfig('cache:\n  directory: /tmp/custom-cache');

    expect(getCacheDirectory(config)).toBe('/tmp/custom-cache');
  });

  it('falls back to the XDG cache home', () => {
    vi.stubEnv('XDG_CACHE_HOME', '/tmp/xdg');

    expect(getCacheDirectory(DEFAULT_CONFIG)).toBe('/tmp/xdg/cloudsweep');
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
  });

  it('reports every unusable value', () => {
    const config = parseConfig(
      [
        'query:',
        '  parallel: 0',
        '  maxPages: 0',
        '  retry:',
        '    attempts: 0',
        '    minDelayMs: 1000',
        '    maxDelayMs: 10',
      ].join('\n')
    );

    expect(validateConfig(config)).toEqual([
      'query.parallel must be at least 1 (got 0).',
      'query.maxPages must be at least 1 (got 0).',
      'query.retry.attempts must be at least 1 (got 0).',
      'query.retry.maxDelayMs must not be lower than query.retry.minDelayMs.',
    ]);
  });
});
