import { describe, expect, it } from 'vitest';

import { ConfigError, EngineNetworkError, EngineNotFoundError } from '../../utils/errors';
import { ManifestResolver } from '../manifest-resolver';
import { FakeHttpClient, TestClock } from './helpers';

const MANIFEST_URL = 'https://builds.test/engine/manifest.json';

function manifestBody(versions: string[]): string {
  const document: Record<string, { url: string; sha256: string }> = {};
  for (const version of versions) {
    document[version] = { url: `https://builds.test/engine/${version}.zip`, sha256: `sig-${version}` };
  }
  return JSON.stringify(document);
}

function createResolver(http: FakeHttpClient, clock = new TestClock()): ManifestResolver {
  return new ManifestResolver(http, { manifestUrl: MANIFEST_URL, platform: 'linux-x64', ttlMs: 60_000, clock: clock.read });
}

describe('ManifestResolver', () => {
  it('resolves a listed version', async () => {
    const http = new FakeHttpClient().route(MANIFEST_URL, { body: manifestBody(['7.0.0']) });

    await expect(createResolver(http).resolve('7.0.0')).resolves.toEqual({
      version: '7.0.0',
      downloadUrl: 'https://builds.test/engine/7.0.0.zip',
      expectedSignature: 'sig-7.0.0'
    });
  });

  it('reports unknown versions as not found', async () => {
    const http = new FakeHttpClient().route(MANIFEST_URL, { body: manifestBody(['7.0.0']) });

    await expect(createResolver(http).resolve('9.9.9')).rejects.toBeInstanceOf(EngineNotFoundError);
  });

  it('reports a missing manifest URL as a configuration error', async () => {
    const resolver = new ManifestResolver(new FakeHttpClient(), { platform: 'linux-x64', ttlMs: 0 });

    await expect(resolver.resolve('7.0.0')).rejects.toBeInstanceOf(ConfigError);
  });

  it('maps server errors, transport failures and bad documents to network errors', async () => {
    const failing = new FakeHttpClient().route(MANIFEST_URL, { status: 500, body: 'oops' });
    await expect(createResolver(failing).resolve('7.0.0')).rejects.toThrow(`Manifest request failed (500): ${MANIFEST_URL}`);
    expect(failing.cancelled).toEqual([MANIFEST_URL]);

    const offline = new FakeHttpClient().route(MANIFEST_URL, { error: new Error('ECONNREFUSED') });
    await expect(createResolver(offline).resolve('7.0.0')).rejects.toBeInstanceOf(EngineNetworkError);

    const garbled = new FakeHttpClient().route(MANIFEST_URL, { body: '{ not json' });
    await expect(createResolver(garbled).resolve('7.0.0')).rejects.toBeInstanceOf(EngineNetworkError);
  });

  it('serves repeated lookups from the cache within the TTL', async () => {
    const http = new FakeHttpClient().route(MANIFEST_URL, { body: manifestBody(['7.0.0', '7.1.0']) });
    const resolver = createResolver(http);

    await resolver.resolve('7.0.0');
    await resolver.resolve('7.1.0');

    expect(http.count(MANIFEST_URL)).toBe(1);
  });

  it('shares one request between concurrent lookups', async () => {
    const http = new FakeHttpClient().route(MANIFEST_URL, { body: manifestBody(['7.0.0']) });
    const resolver = createResolver(http);

    await Promise.all([resolver.resolve('7.0.0'), resolver.resolve('7.0.0'), resolver.listEntries()]);

    expect(http.count(MANIFEST_URL)).toBe(1);
  });

  it('revalidates with the ETag once the TTL has passed', async () => {
    const clock = new TestClock();
    const http = new FakeHttpClient().route(MANIFEST_URL, (request) =>
      request.headers['If-None-Match'] === '"v1"' ? { status: 304 } : { body: manifestBody(['7.0.0']), etag: '"v1"' }
    );
    const resolver = createResolver(http, clock);

    await resolver.resolve('7.0.0');
    clock.advance(60_000);
    await expect(resolver.resolve('7.0.0')).resolves.toMatchObject({ version: '7.0.0' });

    expect(http.count(MANIFEST_URL)).toBe(2);
    expect(http.requests[1].headers['If-None-Match']).toBe('"v1"');
  });

  it('refreshes a fresh cache when the version is missing from it', async () => {
    let versions = ['7.0.0'];
    const http = new FakeHttpClient().route(MANIFEST_URL, () => ({ body: manifestBody(versions) }));
    const resolver = createResolver(http);

    await resolver.resolve('7.0.0');
    versions = ['7.0.0', '7.1.0'];

    await expect(resolver.resolve('7.1.0')).resolves.toMatchObject({ version: '7.1.0' });
    expect(http.count(MANIFEST_URL)).toBe(2);
  });
});
