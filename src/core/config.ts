import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ConfigLoadOptions, EngineCacheConfig, EngineCacheConfigFile } from '../types/config';
import { CullPolicy } from '../types/engine';
import { ConfigError, errorMessage } from '../utils/errors';
import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';
import { Validator } from '../utils/validator';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_CULL_POLICY: Readonly<CullPolicy> = {
  maxInstallations: 5,
  maxAgeMs: 30 * DAY_MS
};

export function defaultConfig(): EngineCacheConfig {
  return {
    rootDir: path.join(os.homedir(), '.engine-cache', 'engines'),
    manifestTtlMs: 5 * 60 * 1000,
    platform: Platform.runtimeId(),
    cullPolicy: { ...DEFAULT_CULL_POLICY },
    progressIntervalMs: 100
  };
}

function isDisabled(value: string): boolean {
  return value === '0' || value.toLowerCase() === 'off';
}

function parseCount(value: string | number, source: string): number | undefined {
  if (typeof value === 'string' && isDisabled(value)) {
    return undefined;
  }
  const count = typeof value === 'number' ? value : Number(value);
  if (!Validator.isValidCount(count)) {
    throw new ConfigError(`${source}: expected a non-negative integer, got ${JSON.stringify(value)}`);
  }
  return count === 0 ? undefined : count;
}

function parseDurationSetting(value: string, source: string, allowDisable: boolean): number | undefined {
  if (allowDisable && isDisabled(value)) {
    return undefined;
  }
  const ms = Validator.parseDuration(value);
  if (ms === undefined) {
    throw new ConfigError(`${source}: invalid duration ${JSON.stringify(value)} (use e.g. 500ms, 30s, 15m, 12h, 30d)`);
  }
  return ms;
}

function requireDuration(value: string, source: string): number {
  const ms = parseDurationSetting(value, source, false);
  if (ms === undefined) {
    throw new ConfigError(`${source}: a duration is required`);
  }
  return ms;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${file}: "${key}" must be a string`);
  }
  return value;
}

function parseConfigFile(raw: unknown, file: string): EngineCacheConfigFile {
  if (!isObject(raw)) {
    throw new ConfigError(`${file}: expected a JSON object`);
  }
  const parsed: EngineCacheConfigFile = {
    rootDir: optionalString(raw, 'rootDir', file),
    manifestUrl: optionalString(raw, 'manifestUrl', file),
    manifestTtl: optionalString(raw, 'manifestTtl', file),
    platform: optionalString(raw, 'platform', file),
    bundledDir: optionalString(raw, 'bundledDir', file)
  };

  const progressIntervalMs = raw.progressIntervalMs;
  if (progressIntervalMs !== undefined) {
    if (typeof progressIntervalMs !== 'number' || progressIntervalMs < 0) {
      throw new ConfigError(`${file}: "progressIntervalMs" must be a non-negative number`);
    }
    parsed.progressIntervalMs = progressIntervalMs;
  }

  const cull = raw.cull;
  if (cull !== undefined) {
    if (!isObject(cull)) {
      throw new ConfigError(`${file}: "cull" must be an object`);
    }
    const maxInstallations = cull.maxInstallations;
    if (maxInstallations !== undefined && typeof maxInstallations !== 'number') {
      throw new ConfigError(`${file}: "cull.maxInstallations" must be a number`);
    }
    parsed.cull = {
      maxInstallations,
      maxAge: optionalString(cull, 'maxAge', file)
    };
  }
  return parsed;
}

export class ConfigLoader {
  /**
   * Merge configuration sources, lowest priority first:
   * defaults, JSON config file, environment, explicit overrides.
   */
  static async load(options: ConfigLoadOptions = {}): Promise<EngineCacheConfig> {
    const env = options.env ?? process.env;
    const config = defaultConfig();

    const configFile = options.configFile ?? env.ENGINE_CACHE_CONFIG;
    if (configFile) {
      this.applyFile(config, await this.readConfigFile(configFile), configFile);
    }
    this.applyEnv(config, env);

    const overrides = options.overrides ?? {};
    Object.assign(config, Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined)));
    if (overrides.cullPolicy) {
      config.cullPolicy = { ...overrides.cullPolicy };
    }

    this.validate(config);
    return config;
  }

  static async readConfigFile(file: string): Promise<EngineCacheConfigFile> {
    if (!(await fs.pathExists(file))) {
      throw new ConfigError(`Config file not found: ${file}`);
    }
    let raw: unknown;
    try {
      raw = await FileSystem.readJson(file);
    } catch (error) {
      throw new ConfigError(errorMessage(error));
    }
    Logger.debug(`Loaded config file ${file}`);
    return parseConfigFile(raw, file);
  }

  private static applyFile(config: EngineCacheConfig, file: EngineCacheConfigFile, source: string): void {
    const baseDir = path.dirname(path.resolve(source));

    if (file.rootDir) config.rootDir = path.resolve(baseDir, file.rootDir);
    if (file.bundledDir) config.bundledDir = path.resolve(baseDir, file.bundledDir);
    if (file.manifestUrl) config.manifestUrl = file.manifestUrl;
    if (file.platform) config.platform = file.platform;
    if (file.progressIntervalMs !== undefined) config.progressIntervalMs = file.progressIntervalMs;
    if (file.manifestTtl) config.manifestTtlMs = requireDuration(file.manifestTtl, `${source}: manifestTtl`);

    if (file.cull) {
      if (file.cull.maxInstallations !== undefined) {
        config.cullPolicy.maxInstallations = parseCount(file.cull.maxInstallations, `${source}: cull.maxInstallations`);
      }
      if (file.cull.maxAge !== undefined) {
        config.cullPolicy.maxAgeMs = parseDurationSetting(file.cull.maxAge, `${source}: cull.maxAge`, true);
      }
    }
  }

  private static applyEnv(config: EngineCacheConfig, env: NodeJS.ProcessEnv): void {
    if (env.ENGINE_CACHE_ROOT) config.rootDir = path.resolve(env.ENGINE_CACHE_ROOT);
    if (env.ENGINE_CACHE_BUNDLED_DIR) config.bundledDir = path.resolve(env.ENGINE_CACHE_BUNDLED_DIR);
    if (env.ENGINE_CACHE_MANIFEST_URL) config.manifestUrl = env.ENGINE_CACHE_MANIFEST_URL;
    if (env.ENGINE_CACHE_PLATFORM) config.platform = env.ENGINE_CACHE_PLATFORM;
    if (env.ENGINE_CACHE_MANIFEST_TTL) {
      config.manifestTtlMs = requireDuration(env.ENGINE_CACHE_MANIFEST_TTL, 'ENGINE_CACHE_MANIFEST_TTL');
    }
    if (env.ENGINE_CACHE_MAX_INSTALLATIONS) {
      config.cullPolicy.maxInstallations = parseCount(env.ENGINE_CACHE_MAX_INSTALLATIONS, 'ENGINE_CACHE_MAX_INSTALLATIONS');
    }
    if (env.ENGINE_CACHE_MAX_AGE) {
      config.cullPolicy.maxAgeMs = parseDurationSetting(env.ENGINE_CACHE_MAX_AGE, 'ENGINE_CACHE_MAX_AGE', true);
    }
  }

  private static validate(config: EngineCacheConfig): void {
    if (config.manifestUrl !== undefined && !Validator.isValidUrl(config.manifestUrl)) {
      throw new ConfigError(`Invalid manifest URL: ${config.manifestUrl}`);
    }
    if (!config.rootDir) {
      throw new ConfigError('Engine root directory must not be empty');
    }
    if (!Number.isFinite(config.progressIntervalMs) || config.progressIntervalMs < 0) {
      throw new ConfigError(`Invalid progress interval: ${config.progressIntervalMs}`);
    }
  }
}

/**
 * Parse CLI-style cull options ("5", "off", "30d") into a policy on top of a base policy
 */
export function cullPolicyFromOptions(
  base: CullPolicy,
  options: { maxInstallations?: string; maxAge?: string }
): CullPolicy {
  const policy: CullPolicy = { ...base };
  if (options.maxInstallations !== undefined) {
    policy.maxInstallations = parseCount(options.maxInstallations, '--max-installations');
  }
  if (options.maxAge !== undefined) {
    policy.maxAgeMs = parseDurationSetting(options.maxAge, '--max-age', true);
  }
  return policy;
}
