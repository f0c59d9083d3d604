import { ManifestEntry } from '../types/engine';
import { ConfigError, EngineNetworkError, EngineNotFoundError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { HttpClient } from './http-client';
import { ManifestFormatError, parseBuildManifest } from './manifest';

export interface ManifestResolverOptions {
  /** Without a URL nothing can be resolved */
  manifestUrl?: string;
  platform: string;
  ttlMs: number;
  clock?: () => number;
}

interface CachedManifest {
  entries: Map<string, ManifestEntry>;
  etag?: string;
  fetchedAt: number;
}

/**
 * Resolves engine versions to download descriptors using the remote build manifest.
 * The manifest is kept for `ttlMs` and revalidated with its ETag afterwards.
 */
export class ManifestResolver {
  private cached?: CachedManifest;

  private pending?: Promise<CachedManifest>;

  private readonly clock: () => number;

  constructor(private readonly http: HttpClient, private readonly options: ManifestResolverOptions) {
    this.clock = options.clock ?? Date.now;
  }

  async resolve(version: string): Promise<ManifestEntry> {
    const wasFresh = this.isFresh();
    let manifest = await this.load(false);
    let entry = manifest.entries.get(version);

    // A cached copy may predate the release being asked for
    if (!entry && wasFresh) {
      Logger.debug(`Version ${version} not in cached manifest, refreshing`);
      manifest = await this.load(true);
      entry = manifest.entries.get(version);
    }

    if (!entry) {
      throw new EngineNotFoundError(`Engine version ${version} is not available in the build manifest`);
    }
    return entry;
  }

  async listEntries(): Promise<ManifestEntry[]> {
    const manifest = await this.load(false);
    return [...manifest.entries.values()];
  }

  private isFresh(): boolean {
    return this.cached !== undefined && this.clock() - this.cached.fetchedAt < this.options.ttlMs;
  }

  /**
   * Concurrent callers share one request; it carries no caller's abort signal
   */
  private async load(force: boolean): Promise<CachedManifest> {
    if (!force && this.cached && this.isFresh()) {
      return this.cached;
    }
    if (!this.pending) {
      this.pending = this.fetchManifest().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private async fetchManifest(): Promise<CachedManifest> {
    const url = this.options.manifestUrl;
    if (!url) {
      throw new ConfigError('No build manifest URL is configured (set manifestUrl or ENGINE_CACHE_MANIFEST_URL)');
    }
    const previous = this.cached;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (previous?.etag) {
      headers['If-None-Match'] = previous.etag;
    }

    Logger.debug(`Fetching build manifest from ${url}`);

    let body: string;
    let etag: string | undefined;
    try {
      const response = await this.http.get(url, { headers });
      if (response.status === 304 && previous) {
        await response.cancel();
        const revalidated: CachedManifest = { ...previous, etag: response.etag ?? previous.etag, fetchedAt: this.clock() };
        this.cached = revalidated;
        return revalidated;
      }
      if (response.status < 200 || response.status >= 300) {
        await response.cancel();
        throw new EngineNetworkError(`Manifest request failed (${response.status}): ${url}`);
      }
      body = await response.text();
      etag = response.etag;
    } catch (error) {
      if (error instanceof EngineNetworkError) {
        throw error;
      }
      throw new EngineNetworkError(`Failed to fetch build manifest: ${errorMessage(error)}`, { cause: error });
    }

    let entries: Map<string, ManifestEntry>;
    try {
      const document: unknown = JSON.parse(body);
      entries = parseBuildManifest(document, this.options.platform);
    } catch (error) {
      const reason = error instanceof ManifestFormatError ? error.message : `Manifest parse failed: ${errorMessage(error)}`;
      throw new EngineNetworkError(reason, { cause: error });
    }

    Logger.debug(`Build manifest lists ${entries.size} version(s) for ${this.options.platform}`);
    const manifest: CachedManifest = { entries, etag, fetchedAt: this.clock() };
    this.cached = manifest;
    return manifest;
  }
}
