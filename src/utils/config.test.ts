import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError, configFromEnv, deepMerge, loadConfig, parseMaxChars } from './config';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'pricedrift-config-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeJson(name: string, value: unknown): string {
  const path = join(dir, name);
  writeFileSync(path, JSON.stringify(value));
  return path;
}

describe('loadConfig', () => {
  it('fills defaults around the required catalog source', () => {
    const config = loadConfig({ env: { PRICEDRIFT_REPOSITORY: 'acme/prices' } });

    expect(config.region).toBe('madrid');
    expect(config.topN).toBe(3);
    expect(config.lookbackDays).toBe(7);
    expect(config.baseline).toEqual({ date: '2026-01-04', label: 'January 2026' });
    expect(config.maxChars).toBe(280);
    expect(config.failOnError).toBe(false);
    expect(config.catalog.repository).toBe('acme/prices');
    expect(config.catalog.token).toBeUndefined();
    expect(config.report.hashtags).toEqual(['#Prices', '#Inflation']);
    expect(config.output).toEqual({ dir: 'output', write: true });
  });

  it('layers file, environment and overrides in that order', () => {
    const configPath = writeJson('custom.json', {
      region: 'aragon',
      topN: 5,
      lookbackDays: 14,
      catalog: { repository: 'file/repo', token: '${TEST_TOKEN}' },
    });

    const config = loadConfig({
      configPath,
      env: { TEST_TOKEN: 'test-secret', PRICEDRIFT_TOP_N: '4', PRICEDRIFT_LOOKBACK_DAYS: '10' },
      overrides: { topN: 2, region: undefined },
    });

    expect(config.region).toBe('aragon');
    expect(config.lookbackDays).toBe(10);
    expect(config.topN).toBe(2);
    expect(config.catalog.repository).toBe('file/repo');
    expect(config.catalog.token).toBe('test-secret');
  });

  it('finds the file named by PRICEDRIFT_CONFIG', () => {
    const path = writeJson('from-env.json', { catalog: { directory: '/srv/snapshots' } });

    const config = loadConfig({ env: { PRICEDRIFT_CONFIG: path } });

    expect(config.catalog.directory).toBe('/srv/snapshots');
    expect(config.catalog.repository).toBe('');
  });

  it('accepts "none" as an unlimited character budget', () => {
    const config = loadConfig({
      env: { PRICEDRIFT_REPOSITORY: 'acme/prices', PRICEDRIFT_MAX_CHARS: 'none' },
    });
    expect(config.maxChars).toBeNull();
  });

  it('rejects a configuration without a catalog source', () => {
    expect(() => loadConfig({ env: {} })).toThrow(
      'Invalid configuration: catalog.repository: Set catalog.repository (owner/name) or catalog.directory',
    );
  });

  it('rejects invalid values', () => {
    expect(() =>
      loadConfig({ env: { PRICEDRIFT_REPOSITORY: 'acme/prices' }, overrides: { topN: 0 } }),
    ).toThrow(ConfigError);
    expect(() =>
      loadConfig({ env: { PRICEDRIFT_REPOSITORY: 'acme/prices', PRICEDRIFT_BASELINE_DATE: '2026-02-30' } }),
    ).toThrow('baseline.date: Expected a YYYY-MM-DD date');
  });

  it('requires an explicitly named file to exist', () => {
    const missing = join(dir, 'missing.json');
    expect(() => loadConfig({ configPath: missing, env: {} })).toThrow(`Config file not found: ${missing}`);
  });

  it('rejects a file that is not a JSON object', () => {
    const path = join(dir, 'list.json');
    writeFileSync(path, '[1, 2]');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(
      `Config file ${path} must contain a JSON object`,
    );
  });
});

describe('configFromEnv', () => {
  it('falls back to the CI repository and token variables', () => {
    const fragment = configFromEnv({ GITHUB_REPOSITORY: 'ci/repo', GITHUB_TOKEN: 'test-token' });
    expect(fragment.catalog).toEqual({
      repository: 'ci/repo',
      token: 'test-token',
      apiUrl: undefined,
      timeoutMs: undefined,
      directory: undefined,
    });
  });

  it('splits hashtags on commas and whitespace', () => {
    const fragment = configFromEnv({ PRICEDRIFT_HASHTAGS: '#Food, #Prices  #Spain' });
    expect(fragment.report).toEqual({ locale: undefined, hashtags: ['#Food', '#Prices', '#Spain'] });
  });

  it('rejects non-boolean flags', () => {
    expect(() => configFromEnv({ PRICEDRIFT_FAIL_ON_ERROR: 'maybe' })).toThrow(
      'PRICEDRIFT_FAIL_ON_ERROR must be a boolean, got "maybe"',
    );
  });
});

describe('parseMaxChars', () => {
  it('distinguishes unset, unlimited and numeric budgets', () => {
    expect(parseMaxChars(undefined)).toBeUndefined();
    expect(parseMaxChars(' ')).toBeUndefined();
    expect(parseMaxChars('OFF')).toBeNull();
    expect(parseMaxChars('500')).toBe(500);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and skips undefined values', () => {
    const merged = deepMerge({ a: 1, nested: { x: 1, y: 2 } }, { a: undefined, nested: { y: 3 } });
    expect(merged).toEqual({ a: 1, nested: { x: 1, y: 3 } });
  });

  it('ignores prototype keys', () => {
    const source: unknown = JSON.parse('{"__proto__": {"polluted": true}, "ok": 1}');
    const merged = deepMerge({}, typeof source === 'object' && source !== null ? { ...source } : {});
    expect(Object.keys(merged)).toEqual(['ok']);
    expect(Object.prototype.hasOwnProperty.call({}, 'polluted')).toBe(false);
  });
});
