import { CullPolicy, EngineInstallation } from '../types/engine';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { KeyedLock } from './keyed-lock';
import { LocalStore } from './local-store';

export interface CullerOptions {
  store: LocalStore;
  locks: KeyedLock;
  /** Versions with an install in flight are never candidates */
  isBusy?: (version: string) => boolean;
  /** Pins held outside a single cull request; read again before every removal */
  isPinned?: (version: string) => boolean;
  clock?: () => number;
}

/**
 * Picks the installations a policy would evict: oldest unpinned first.
 * Exported on its own so the CLI can show a dry run.
 */
export function selectCullCandidates(
  installations: EngineInstallation[],
  pinned: ReadonlySet<string>,
  policy: CullPolicy,
  now: number
): EngineInstallation[] {
  const candidates = installations
    .filter((installation) => !pinned.has(installation.version))
    .sort((a, b) => a.lastUsedAt - b.lastUsedAt || a.version.localeCompare(b.version));

  const excess = policy.maxInstallations === undefined ? 0 : Math.max(0, candidates.length - policy.maxInstallations);
  const maxAgeMs = policy.maxAgeMs;

  return candidates.filter(
    (installation, index) => index < excess || (maxAgeMs !== undefined && now - installation.lastUsedAt > maxAgeMs)
  );
}

export class Culler {
  private readonly clock: () => number;

  constructor(private readonly options: CullerOptions) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Best effort: a version that cannot be removed is logged and skipped
   */
  async cullMaybe(pinnedVersions: Iterable<string>, policy: CullPolicy): Promise<string[]> {
    const requested = new Set(pinnedVersions);
    const isPinned = (version: string): boolean => requested.has(version) || (this.options.isPinned?.(version) ?? false);
    const doomed = this.candidates(isPinned, policy);

    if (doomed.length === 0) {
      Logger.debug('Engine cull: nothing to remove');
      return [];
    }

    const removed: string[] = [];
    for (const installation of doomed) {
      const { version } = installation;
      try {
        const didRemove = await this.options.locks.run(version, async () => {
          // Pins, usage and in-flight installs may have changed while waiting for the lock
          if (!this.candidates(isPinned, policy).some((candidate) => candidate.version === version)) {
            Logger.debug(`Engine cull: keeping ${version}`);
            return false;
          }
          return this.options.store.remove(version);
        });
        if (didRemove) {
          removed.push(version);
          Logger.debug(`Engine cull: removed ${version}`);
        }
      } catch (error) {
        Logger.warning(`Failed to cull engine ${version}: ${errorMessage(error)}`);
      }
    }
    return removed;
  }

  private candidates(isPinned: (version: string) => boolean, policy: CullPolicy): EngineInstallation[] {
    const isBusy = this.options.isBusy ?? (() => false);
    const installations = this.options.store.list().filter((installation) => !isBusy(installation.version));
    const pinned = new Set(installations.map((installation) => installation.version).filter(isPinned));
    return selectCullCandidates(installations, pinned, policy, this.clock());
  }
}
