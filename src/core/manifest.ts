import { ManifestEntry } from '../types/engine';
import { Logger } from '../utils/logger';

export const SUPPORTED_MANIFEST_SCHEMA = 1;

export class ManifestFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ManifestFormatError';
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(source: JsonObject, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Reads one build description: either flat (url + signature) or keyed by platform
 */
function toEntry(version: string, raw: unknown, platform: string): ManifestEntry | null {
  if (!isObject(raw)) {
    Logger.debug(`Skipping manifest entry ${version}: not an object`);
    return null;
  }

  let build: JsonObject = raw;
  const platforms = raw.platforms;
  if (isObject(platforms)) {
    const platformBuild = platforms[platform];
    if (!isObject(platformBuild)) {
      Logger.debug(`Skipping manifest entry ${version}: no build for ${platform}`);
      return null;
    }
    build = platformBuild;
  }

  const downloadUrl = firstString(build, ['downloadUrl', 'url']);
  const expectedSignature = firstString(build, ['signature', 'sha256']);
  if (!downloadUrl || !expectedSignature) {
    Logger.debug(`Skipping manifest entry ${version}: missing download URL or signature`);
    return null;
  }

  return { version, downloadUrl, expectedSignature };
}

function parseVersions(raw: unknown, platform: string): Map<string, ManifestEntry> {
  const entries = new Map<string, ManifestEntry>();

  if (Array.isArray(raw)) {
    for (const item of raw) {
      const version = isObject(item) ? firstString(item, ['version']) : undefined;
      if (!version) {
        Logger.debug('Skipping manifest entry without a version');
        continue;
      }
      const entry = toEntry(version, item, platform);
      if (entry) {
        entries.set(version, entry);
      }
    }
    return entries;
  }

  if (!isObject(raw)) {
    throw new ManifestFormatError('Manifest versions must be an object or an array');
  }

  for (const [version, value] of Object.entries(raw)) {
    const entry = toEntry(version, value, platform);
    if (entry) {
      entries.set(version, entry);
    }
  }
  return entries;
}

/**
 * Parse a build manifest document into entries usable on the given platform.
 *
 * Accepted shapes:
 * - `{ "<version>": { "downloadUrl" | "url", "signature" | "sha256" } }`
 * - `{ "<version>": { "platforms": { "<platform>": { "url", "sha256" } } } }`
 * - `[ { "version", "downloadUrl" | "url", "signature" | "sha256" } ]`
 * - `{ "schemaVersion": 1, "versions": <any of the above> }`
 *
 * Unknown fields are ignored so newer manifests keep working.
 */
export function parseBuildManifest(raw: unknown, platform: string): Map<string, ManifestEntry> {
  const schemaVersion = isObject(raw) ? raw.schemaVersion : undefined;
  if (isObject(raw) && typeof schemaVersion === 'number') {
    if (schemaVersion > SUPPORTED_MANIFEST_SCHEMA) {
      throw new ManifestFormatError(`Unsupported manifest schema version ${schemaVersion}`);
    }
    return parseVersions(raw.versions, platform);
  }
  return parseVersions(raw, platform);
}
