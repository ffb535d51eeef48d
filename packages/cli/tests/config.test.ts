import { describe, expect, it, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, expandEnvVars, loadConfig, parseConfig, resolveOptions } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('expandEnvVars', () => {
  it('expands variables and defaults in nested values', () => {
    expect(
      expandEnvVars({ a: '${X}', b: ['${Y:-fallback}'], c: 1 }, { env: { X: 'one' } })
    ).toEqual({ a: 'one', b: ['fallback'], c: 1 });
  });

  it('fails on a missing variable without default', () => {
    expect(() => expandEnvVars('${Z}', { env: {} })).toThrow(ConfigError);
    expect(() => expandEnvVars('${Z}', { env: {} })).toThrow(
      'Missing required environment variable: Z'
    );
  });

  it('keeps placeholders when missing variables are allowed', () => {
    expect(expandEnvVars('${Z}', { env: {}, allowMissing: true })).toBe('${Z}');
  });
});

describe('parseConfig', () => {
  it('resolves converter options with defaults', () => {
    const config = parseConfig(
      { conversion: { truncateTimestamps: '${MODE}' }, logging: { level: 'debug' } },
      { env: { MODE: 'truncate' } }
    );
    expect(resolveOptions(config)).toEqual({
      conversion: { truncateTimestamps: 'truncate' },
      schema: { inferMaps: false },
    });
    expect(resolveOptions()).toEqual({
      conversion: { truncateTimestamps: 'reject' },
      schema: { inferMaps: false },
    });
  });

  it('rejects unknown keys and values', () => {
    expect(() => parseConfig({ unknown: 1 })).toThrow(/^Invalid config file:\n- \(root\): Unrecognized key/);
    expect(() => parseConfig({ conversion: { truncateTimestamps: 'round' } })).toThrow(
      /- conversion\.truncateTimestamps: /
    );
  });
});

describe('loadConfig', () => {
  it('reads a config file with a byte order mark', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'rowbridge-config-'));
    const filePath = join(tmpDir, 'config.json');
    writeFileSync(filePath, '\uFEFF' + JSON.stringify({ schema: { inferMaps: true } }));

    const config = await loadConfig(filePath);
    expect(config).toEqual({ schema: { inferMaps: true } });
  });

  it('reports invalid JSON', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'rowbridge-config-'));
    const filePath = join(tmpDir, 'config.json');
    writeFileSync(filePath, '{ not json');

    await expect(loadConfig(filePath)).rejects.toThrow(/is not valid JSON/);
  });
});
