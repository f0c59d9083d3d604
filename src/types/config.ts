import { CullPolicy } from './engine';

export interface EngineCacheConfig {
  rootDir: string;
  manifestUrl?: string;
  manifestTtlMs: number;
  platform: string;
  cullPolicy: CullPolicy;
  progressIntervalMs: number;
  bundledDir?: string;
}

/**
 * Shape of the optional JSON config file; durations are strings like "30d"
 */
export interface EngineCacheConfigFile {
  rootDir?: string;
  manifestUrl?: string;
  manifestTtl?: string;
  platform?: string;
  progressIntervalMs?: number;
  bundledDir?: string;
  cull?: {
    maxInstallations?: number;
    maxAge?: string;
  };
}

export interface ConfigLoadOptions {
  configFile?: string;
  overrides?: Partial<EngineCacheConfig>;
  env?: NodeJS.ProcessEnv;
}
