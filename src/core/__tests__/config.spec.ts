import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '../../utils/errors';
import { ConfigLoader, DEFAULT_CULL_POLICY, cullPolicyFromOptions, defaultConfig } from '../config';
import { createTempDir } from './helpers';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('falls back to defaults', async () => {
    const config = await ConfigLoader.load({ env: {} });

    expect(config).toEqual(defaultConfig());
    expect(config.cullPolicy).toEqual({ maxInstallations: 5, maxAgeMs: 30 * 24 * 60 * 60 * 1000 });
    expect(config.manifestTtlMs).toBe(300_000);
  });

  it('layers file, environment and overrides in that order', async () => {
    const file = path.join(dir, 'engine-cache.json');
    await fs.writeJson(file, {
      rootDir: 'engines',
      manifestUrl: 'https://file.test/manifest.json',
      manifestTtl: '10m',
      platform: 'osx-arm64',
      cull: { maxInstallations: 3, maxAge: '7d' }
    });

    const config = await ConfigLoader.load({
      configFile: file,
      env: { ENGINE_CACHE_MANIFEST_URL: 'https://env.test/manifest.json', ENGINE_CACHE_MAX_AGE: 'off' },
      overrides: { platform: 'win-x64' }
    });

    expect(config.rootDir).toBe(path.join(dir, 'engines'));
    expect(config.manifestUrl).toBe('https://env.test/manifest.json');
    expect(config.manifestTtlMs).toBe(600_000);
    expect(config.platform).toBe('win-x64');
    expect(config.cullPolicy).toEqual({ maxInstallations: 3, maxAgeMs: undefined });
  });

  it('reads the config file named by the environment', async () => {
    const file = path.join(dir, 'engine-cache.json');
    await fs.writeJson(file, { cull: { maxInstallations: 0 } });

    const config = await ConfigLoader.load({ env: { ENGINE_CACHE_CONFIG: file } });

    expect(config.cullPolicy.maxInstallations).toBeUndefined();
    expect(config.cullPolicy.maxAgeMs).toBe(DEFAULT_CULL_POLICY.maxAgeMs);
  });

  it('rejects invalid settings', async () => {
    await expect(ConfigLoader.load({ env: { ENGINE_CACHE_MAX_AGE: 'soon' } })).rejects.toBeInstanceOf(ConfigError);
    await expect(ConfigLoader.load({ env: { ENGINE_CACHE_MAX_INSTALLATIONS: '2.5' } })).rejects.toBeInstanceOf(ConfigError);
    await expect(ConfigLoader.load({ env: { ENGINE_CACHE_MANIFEST_URL: 'ftp://builds.test/manifest.json' } })).rejects.toThrow(
      'Invalid manifest URL: ftp://builds.test/manifest.json'
    );
  });

  it('rejects missing and malformed config files', async () => {
    const missing = path.join(dir, 'missing.json');
    await expect(ConfigLoader.load({ configFile: missing, env: {} })).rejects.toThrow(`Config file not found: ${missing}`);

    const wrongType = path.join(dir, 'wrong.json');
    await fs.writeJson(wrongType, { rootDir: 42 });
    await expect(ConfigLoader.load({ configFile: wrongType, env: {} })).rejects.toThrow(`${wrongType}: "rootDir" must be a string`);
  });
});

describe('cullPolicyFromOptions', () => {
  it('applies command line limits on top of a base policy', () => {
    expect(cullPolicyFromOptions({ maxInstallations: 5, maxAgeMs: 1 }, { maxInstallations: 'off', maxAge: '12h' })).toEqual({
      maxInstallations: undefined,
      maxAgeMs: 43_200_000
    });
    expect(cullPolicyFromOptions({ maxInstallations: 5 }, { maxInstallations: '2' })).toEqual({ maxInstallations: 2 });
  });

  it('rejects negative counts', () => {
    expect(() => cullPolicyFromOptions({}, { maxInstallations: '-1' })).toThrow(ConfigError);
  });
});
