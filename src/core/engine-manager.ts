import path from 'path';
import { CullPolicy, DownloadProgressCallback, EngineInstallation, InstallState } from '../types/engine';
import { EngineCorruptError, EngineNotFoundError, InstallError, errorMessage, toInstallError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';
import { Culler } from './culler';
import { Downloader } from './downloader';
import { EngineEvents } from './engine-events';
import { IntegrityVerifier } from './integrity-verifier';
import { KeyedLock } from './keyed-lock';
import { LocalStore } from './local-store';
import { ManifestResolver } from './manifest-resolver';

export interface CullRequest {
  /** Versions in use by the caller, merged with the manager's own pins */
  pinned?: Iterable<string>;
  policy?: CullPolicy;
}

/**
 * Manages engine installations. Implementations are picked when the application is composed.
 */
export interface EngineManager {
  readonly events: EngineEvents;

  getEnginePath(version: string): string;
  getEngineSignature(version: string): string;

  /**
   * Makes sure a version is installed. Resolves false when cancelled.
   */
  downloadEngineIfNecessary(
    version: string,
    progress?: DownloadProgressCallback,
    cancel?: AbortSignal
  ): Promise<boolean>;

  doEngineCullMaybeAsync(request?: CullRequest): Promise<string[]>;
  clearAllEngines(): Promise<void>;

  /**
   * Protects a version from culling until the returned function is called
   */
  pin(version: string): () => void;
  listInstallations(): EngineInstallation[];
  close(): Promise<void>;
}

export interface DownloadingEngineManagerDeps {
  store: LocalStore;
  resolver: ManifestResolver;
  downloader: Downloader;
  verifier: IntegrityVerifier;
  cullPolicy: CullPolicy;
  locks?: KeyedLock;
  clock?: () => number;
}

type InstallOutcome =
  | { status: 'installed' }
  | { status: 'cancelled' }
  | { status: 'failed'; error: InstallError };

interface InstallJob {
  controller: AbortController;
  listeners: Set<DownloadProgressCallback>;
  waiters: number;
  outcome: Promise<InstallOutcome>;
}

const MAX_DOWNLOAD_ATTEMPTS = 2;
const DEFAULT_PACKAGE_FILE = 'engine.pkg';

/**
 * File name for the downloaded package, taken from the last URL segment
 */
export function packageFileName(downloadUrl: string): string {
  let name = '';
  try {
    name = path.posix.basename(decodeURIComponent(new URL(downloadUrl).pathname));
  } catch {
    name = '';
  }
  const safe = name.replace(/[^A-Za-z0-9._-]/g, '_');
  if (!safe || safe.startsWith('.') || safe === 'install.json') {
    return DEFAULT_PACKAGE_FILE;
  }
  return safe;
}

export class DownloadingEngineManager implements EngineManager {
  readonly events = new EngineEvents();

  private readonly inFlight = new Map<string, InstallJob>();

  private readonly pins = new Map<string, number>();

  private readonly locks: KeyedLock;

  private readonly culler: Culler;

  constructor(private readonly deps: DownloadingEngineManagerDeps) {
    this.locks = deps.locks ?? new KeyedLock();
    this.culler = new Culler({
      store: deps.store,
      locks: this.locks,
      isBusy: (version) => this.inFlight.has(version),
      isPinned: (version) => this.pins.has(version),
      clock: deps.clock
    });
  }

  getEnginePath(version: string): string {
    return this.deps.store.getPath(version);
  }

  getEngineSignature(version: string): string {
    return this.deps.store.getSignature(version);
  }

  listInstallations(): EngineInstallation[] {
    return this.deps.store.list();
  }

  async downloadEngineIfNecessary(
    version: string,
    progress?: DownloadProgressCallback,
    cancel?: AbortSignal
  ): Promise<boolean> {
    if (this.deps.store.has(version)) {
      this.deps.store.touch(version);
      return true;
    }
    if (!Validator.isValidEngineVersion(version)) {
      throw new EngineNotFoundError(`Invalid engine version identifier: ${JSON.stringify(version)}`);
    }
    if (cancel?.aborted) {
      return false;
    }

    const existing = this.inFlight.get(version);
    if (existing?.controller.signal.aborted) {
      // Everyone else gave up on that transfer; let it wind down and start over
      await existing.outcome;
      return this.downloadEngineIfNecessary(version, progress, cancel);
    }

    const job = existing ?? this.startInstall(version);
    return this.awaitInstall(job, progress, cancel);
  }

  async doEngineCullMaybeAsync(request: CullRequest = {}): Promise<string[]> {
    const removed = await this.culler.cullMaybe(request.pinned ?? [], request.policy ?? this.deps.cullPolicy);
    for (const version of removed) {
      this.setState(version, 'absent');
      this.events.emit('evicted', { version, reason: 'cull' });
    }
    if (removed.length > 0) {
      Logger.info(`Culled ${removed.length} engine installation(s): ${removed.join(', ')}`);
    }
    return removed;
  }

  async clearAllEngines(): Promise<void> {
    if (this.pins.size > 0) {
      Logger.warning(`Clearing engines while pinned: ${[...this.pins.keys()].join(', ')}`);
    }

    const jobs = [...this.inFlight.values()];
    for (const job of jobs) {
      job.controller.abort();
    }
    await Promise.all(jobs.map((job) => job.outcome));

    const before = this.deps.store.list().map((installation) => installation.version);
    try {
      await this.deps.store.removeAll();
    } finally {
      for (const version of before) {
        if (!this.deps.store.has(version)) {
          this.setState(version, 'absent');
          this.events.emit('evicted', { version, reason: 'clear' });
        }
      }
    }
  }

  pin(version: string): () => void {
    this.pins.set(version, (this.pins.get(version) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const count = (this.pins.get(version) ?? 1) - 1;
      if (count <= 0) {
        this.pins.delete(version);
      } else {
        this.pins.set(version, count);
      }
    };
  }

  async close(): Promise<void> {
    const jobs = [...this.inFlight.values()];
    for (const job of jobs) {
      job.controller.abort();
    }
    await Promise.all(jobs.map((job) => job.outcome));
    await this.deps.store.flush();
    this.events.removeAllListeners();
  }

  private startInstall(version: string): InstallJob {
    const controller = new AbortController();
    const listeners = new Set<DownloadProgressCallback>();

    const broadcast: DownloadProgressCallback = (bytesSoFar, totalBytes) => {
      this.events.emit('progress', { version, bytesSoFar, totalBytes });
      for (const listener of listeners) {
        try {
          listener(bytesSoFar, totalBytes);
        } catch (error) {
          Logger.debug(`Progress callback for ${version} failed: ${errorMessage(error)}`);
        }
      }
    };

    const outcome = this.locks
      .run(version, () => this.install(version, controller.signal, broadcast))
      .catch((error: unknown): InstallOutcome => {
        if (controller.signal.aborted) {
          return { status: 'cancelled' };
        }
        return { status: 'failed', error: toInstallError(error) };
      })
      .then((result) => {
        this.inFlight.delete(version);
        if (result.status === 'failed') {
          this.setState(version, 'failed');
          this.events.emit('failed', { version, error: result.error });
        } else if (result.status === 'cancelled') {
          this.setState(version, 'absent');
        }
        return result;
      });

    const job: InstallJob = { controller, listeners, waiters: 0, outcome };
    this.inFlight.set(version, job);
    return job;
  }

  /**
   * Each caller gets its own view of the shared job; the transfer is aborted
   * only once every caller has cancelled.
   */
  private awaitInstall(job: InstallJob, progress?: DownloadProgressCallback, cancel?: AbortSignal): Promise<boolean> {
    job.waiters++;
    if (progress) {
      job.listeners.add(progress);
    }

    return new Promise<boolean>((resolve, reject) => {
      let settled = false;

      const detach = (): void => {
        settled = true;
        job.waiters--;
        if (progress) {
          job.listeners.delete(progress);
        }
        cancel?.removeEventListener('abort', onAbort);
      };

      const onAbort = (): void => {
        if (settled) return;
        detach();
        if (job.waiters === 0) {
          job.controller.abort();
        }
        resolve(false);
      };

      cancel?.addEventListener('abort', onAbort, { once: true });

      void job.outcome.then((result) => {
        if (settled) return;
        detach();
        if (result.status === 'installed') {
          resolve(true);
        } else if (result.status === 'cancelled') {
          resolve(false);
        } else {
          reject(result.error);
        }
      });
    });
  }

  private async install(
    version: string,
    signal: AbortSignal,
    progress: DownloadProgressCallback
  ): Promise<InstallOutcome> {
    const { store, resolver, downloader, verifier } = this.deps;

    // Someone else may have finished this version while we waited for the lock
    if (store.has(version)) {
      return { status: 'installed' };
    }

    this.setState(version, 'resolving');
    const entry = await resolver.resolve(version);
    if (signal.aborted) {
      return { status: 'cancelled' };
    }

    const packageFile = packageFileName(entry.downloadUrl);
    let lastCorrupt: EngineCorruptError | undefined;

    for (let attempt = 1; attempt <= MAX_DOWNLOAD_ATTEMPTS; attempt++) {
      const stagingDir = await store.createStaging(version);
      let committed = false;

      try {
        this.setState(version, 'downloading');
        const download = await downloader.fetch(entry.downloadUrl, path.join(stagingDir, packageFile), progress, signal);
        if (download.status === 'cancelled') {
          Logger.debug(`Installation of engine ${version} cancelled`);
          return { status: 'cancelled' };
        }

        this.setState(version, 'verifying');
        const verdict = await verifier.verify(path.join(stagingDir, packageFile), entry.expectedSignature);
        if (verdict.status === 'corrupt') {
          lastCorrupt = new EngineCorruptError(
            `Engine ${version} failed integrity check (expected ${verdict.expected}, got ${verdict.actual})`,
            verdict.expected,
            verdict.actual
          );
          Logger.warning(`${lastCorrupt.message}, attempt ${attempt} of ${MAX_DOWNLOAD_ATTEMPTS}`);
          continue;
        }
        if (signal.aborted) {
          return { status: 'cancelled' };
        }

        const installation = await store.commit(version, stagingDir, verdict.signature, packageFile);
        committed = true;
        this.setState(version, 'installed');
        this.events.emit('installed', installation);
        Logger.debug(`Installed engine ${version} (${Validator.formatBytes(installation.sizeBytes)})`);
        return { status: 'installed' };
      } finally {
        if (!committed) {
          await store.discardStaging(stagingDir);
        }
      }
    }

    throw lastCorrupt ?? new EngineCorruptError(`Engine ${version} failed integrity check`, entry.expectedSignature, '');
  }

  private setState(version: string, state: InstallState): void {
    this.events.emit('state', { version, state });
  }
}
