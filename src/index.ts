// API exports for programmatic usage

import { BundledEngineManager } from './core/bundled-engine-manager';
import { ConfigLoader, DEFAULT_CULL_POLICY, cullPolicyFromOptions, defaultConfig } from './core/config';
import { Culler, selectCullCandidates } from './core/culler';
import { Downloader } from './core/downloader';
import { EngineEvents } from './core/engine-events';
import { DownloadingEngineManager, EngineManager, packageFileName } from './core/engine-manager';
import { FetchHttpClient, HttpClient } from './core/http-client';
import { ContentHasher, IntegrityVerifier, Sha256Hasher } from './core/integrity-verifier';
import { KeyedLock } from './core/keyed-lock';
import { LocalStore } from './core/local-store';
import { parseBuildManifest } from './core/manifest';
import { ManifestResolver } from './core/manifest-resolver';
import { EngineCacheConfig } from './types/config';
import { Logger } from './utils/logger';
import { Validator } from './utils/validator';
import { FileSystem } from './utils/file-system';
import { Platform } from './utils/platform';

// Re-exports
export { DownloadingEngineManager, BundledEngineManager, LocalStore, ManifestResolver, Downloader, IntegrityVerifier };
export { Culler, KeyedLock, EngineEvents, FetchHttpClient, Sha256Hasher, ConfigLoader };
export { selectCullCandidates, parseBuildManifest, packageFileName, cullPolicyFromOptions, defaultConfig, DEFAULT_CULL_POLICY };
export { Logger, Validator, FileSystem, Platform };
export type { EngineManager, HttpClient, ContentHasher };
export type { CullRequest } from './core/engine-manager';
export type { HttpResponse, HttpRequestOptions } from './core/http-client';
export type { EngineEventMap, EngineEventName } from './core/engine-events';

// Types
export * from './types/engine';
export * from './types/config';
export * from './utils/errors';

export interface EngineManagerDependencies {
  http?: HttpClient;
  hasher?: ContentHasher;
  clock?: () => number;
}

/**
 * Compose an engine manager from configuration. A configured bundled directory
 * selects the read-only bundled implementation.
 */
export async function createEngineManager(
  config: EngineCacheConfig,
  deps: EngineManagerDependencies = {}
): Promise<EngineManager> {
  if (config.bundledDir) {
    return BundledEngineManager.open(config.bundledDir);
  }

  const http = deps.http ?? new FetchHttpClient();
  const store = await LocalStore.open({ rootDir: config.rootDir, clock: deps.clock });

  return new DownloadingEngineManager({
    store,
    resolver: new ManifestResolver(http, {
      manifestUrl: config.manifestUrl,
      platform: config.platform,
      ttlMs: config.manifestTtlMs,
      clock: deps.clock
    }),
    downloader: new Downloader(http, { progressIntervalMs: config.progressIntervalMs, clock: deps.clock }),
    verifier: new IntegrityVerifier(deps.hasher),
    cullPolicy: config.cullPolicy,
    clock: deps.clock
  });
}
