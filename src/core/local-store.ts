import fs from 'fs-extra';
import path from 'path';
import { EngineInstallation, InstallRecord } from '../types/engine';
import { EngineIOError, EngineNotFoundError, errorMessage, isErrnoException } from '../utils/errors';
import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';

export const INSTALL_RECORD_FILE = 'install.json';
export const STAGING_PREFIX = '.staging-';
export const TRASH_PREFIX = '.trash-';

export interface LocalStoreOptions {
  rootDir: string;
  clock?: () => number;
  /** Persist lastUsedAt to disk on touch; off for read-only stores */
  persistUsage?: boolean;
  /** Delete leftovers and unreadable installations while scanning */
  repair?: boolean;
}

function parseTimestamp(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function toRecord(installation: EngineInstallation): InstallRecord {
  return {
    formatVersion: 1,
    version: installation.version,
    signature: installation.signature,
    packageFile: path.basename(installation.packagePath),
    installedAt: new Date(installation.installedAt).toISOString(),
    lastUsedAt: new Date(installation.lastUsedAt).toISOString(),
    sizeBytes: installation.sizeBytes
  };
}

/**
 * On-disk directory of installed engine versions plus its in-memory index.
 *
 * Layout: `<root>/<version>/install.json` next to the package file. Staging and trash
 * directories are dot-prefixed siblings on the same filesystem, so commit and remove are
 * a single rename each.
 */
export class LocalStore {
  private readonly index = new Map<string, EngineInstallation>();

  private readonly writes = new Map<string, Promise<void>>();

  private readonly clock: () => number;

  private constructor(private readonly options: LocalStoreOptions) {
    this.clock = options.clock ?? Date.now;
  }

  static async open(options: LocalStoreOptions): Promise<LocalStore> {
    const store = new LocalStore(options);
    try {
      await FileSystem.ensureDirectory(options.rootDir);
      await store.scan();
    } catch (error) {
      throw new EngineIOError(`Failed to open engine store at ${options.rootDir}: ${errorMessage(error)}`, { cause: error });
    }
    return store;
  }

  has(version: string): boolean {
    return this.index.has(version);
  }

  get(version: string): EngineInstallation | undefined {
    const installation = this.index.get(version);
    return installation ? { ...installation } : undefined;
  }

  list(): EngineInstallation[] {
    return [...this.index.values()]
      .map((installation) => ({ ...installation }))
      .sort((a, b) => a.version.localeCompare(b.version));
  }

  getPath(version: string): string {
    const installation = this.require(version);
    this.touch(version);
    return installation.installPath;
  }

  getSignature(version: string): string {
    return this.require(version).signature;
  }

  /**
   * Marks a version as used now; the sidecar is rewritten in the background
   */
  touch(version: string): void {
    const installation = this.index.get(version);
    if (!installation) return;
    installation.lastUsedAt = this.clock();
    if (this.options.persistUsage !== false) {
      this.enqueueWrite(version);
    }
  }

  async createStaging(version: string): Promise<string> {
    const prefix = path.join(this.options.rootDir, `${STAGING_PREFIX}${version}-`);
    try {
      return await fs.mkdtemp(prefix);
    } catch (error) {
      throw new EngineIOError(`Failed to create staging directory for ${version}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async discardStaging(stagingDir: string): Promise<void> {
    try {
      await fs.remove(stagingDir);
    } catch (error) {
      Logger.warning(`Failed to delete staging directory ${stagingDir}: ${errorMessage(error)}`);
    }
  }

  /**
   * Moves a fully written and verified staging directory into the version's slot.
   * Either the installation becomes visible as a whole or nothing changes.
   */
  async commit(version: string, stagingDir: string, signature: string, packageFile: string): Promise<EngineInstallation> {
    if (this.index.has(version)) {
      throw new EngineIOError(`Engine version ${version} is already installed`);
    }

    const installPath = this.versionDir(version);
    const now = this.clock();

    try {
      const installation: EngineInstallation = {
        version,
        installPath,
        packagePath: path.join(installPath, packageFile),
        signature,
        installedAt: now,
        lastUsedAt: now,
        sizeBytes: await FileSystem.directorySize(stagingDir)
      };
      await FileSystem.writeJson(path.join(stagingDir, INSTALL_RECORD_FILE), toRecord(installation));

      // Not in the index, so anything in the slot is a leftover
      if (await fs.pathExists(installPath)) {
        Logger.debug(`Replacing stale directory ${installPath}`);
        await this.moveToTrashAndDelete(version, installPath);
      }

      await fs.rename(stagingDir, installPath);
      this.index.set(version, installation);
      Logger.debug(`Committed engine ${version} to ${installPath}`);
      return { ...installation };
    } catch (error) {
      throw new EngineIOError(`Failed to install engine ${version}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Deletes an installation; a no-op when the version is not installed
   */
  async remove(version: string): Promise<boolean> {
    await this.writes.get(version);

    const installPath = this.versionDir(version);
    const known = this.index.has(version);
    try {
      const removed = await this.moveToTrashAndDelete(version, installPath);
      this.index.delete(version);
      if (removed) {
        Logger.debug(`Removed engine ${version}`);
      }
      return known || removed;
    } catch (error) {
      throw new EngineIOError(`Failed to remove engine ${version}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async removeAll(): Promise<string[]> {
    const removed: string[] = [];
    const failures: string[] = [];

    for (const version of [...this.index.keys()]) {
      try {
        if (await this.remove(version)) {
          removed.push(version);
        }
      } catch (error) {
        failures.push(errorMessage(error));
      }
    }

    await this.sweepLeftovers();

    if (failures.length > 0) {
      throw new EngineIOError(`Failed to remove ${failures.length} engine(s): ${failures.join('; ')}`);
    }
    return removed;
  }

  /**
   * Waits for pending sidecar writes
   */
  async flush(): Promise<void> {
    await Promise.all([...this.writes.values()]);
  }

  private require(version: string): EngineInstallation {
    const installation = this.index.get(version);
    if (!installation) {
      throw new EngineNotFoundError(`Engine version ${version} is not installed`);
    }
    return installation;
  }

  private versionDir(version: string): string {
    return path.join(this.options.rootDir, version);
  }

  private enqueueWrite(version: string): void {
    const previous = this.writes.get(version) ?? Promise.resolve();
    const next = previous.then(() => this.persist(version));
    this.writes.set(version, next);
    void next.finally(() => {
      if (this.writes.get(version) === next) {
        this.writes.delete(version);
      }
    });
  }

  /**
   * Never rejects; a lost lastUsedAt update only makes the version look older to the culler
   */
  private async persist(version: string): Promise<void> {
    const installation = this.index.get(version);
    if (!installation) return;
    try {
      await FileSystem.writeJson(path.join(installation.installPath, INSTALL_RECORD_FILE), toRecord(installation));
    } catch (error) {
      Logger.debug(`Failed to record usage of engine ${version}: ${errorMessage(error)}`);
    }
  }

  /**
   * Renames the directory out of the way, then deletes it. Returns false if it did not exist.
   */
  private async moveToTrashAndDelete(version: string, dir: string): Promise<boolean> {
    const trashDir = FileSystem.siblingName(this.options.rootDir, TRASH_PREFIX, version);
    try {
      await fs.rename(dir, trashDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }

    try {
      await fs.remove(trashDir);
    } catch (error) {
      Logger.warning(`Failed to delete ${trashDir}, it will be removed on next start: ${errorMessage(error)}`);
    }
    return true;
  }

  private async scan(): Promise<void> {
    const entries = await fs.readdir(this.options.rootDir, { withFileTypes: true });

    for (const entry of entries) {
      const entryPath = path.join(this.options.rootDir, entry.name);

      if (entry.name.startsWith(STAGING_PREFIX) || entry.name.startsWith(TRASH_PREFIX)) {
        await this.discardLeftover(entryPath, 'interrupted operation');
        continue;
      }
      if (!entry.isDirectory() || entry.name.startsWith('.')) {
        continue;
      }

      const installation = await this.readInstallation(entry.name, entryPath);
      if (installation) {
        this.index.set(installation.version, installation);
      } else {
        await this.discardLeftover(entryPath, 'missing or unreadable install record');
      }
    }

    Logger.debug(`Engine store ${this.options.rootDir}: ${this.index.size} installation(s)`);
  }

  private async readInstallation(dirName: string, dir: string): Promise<EngineInstallation | null> {
    if (!Validator.isValidEngineVersion(dirName)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = await FileSystem.readJson(path.join(dir, INSTALL_RECORD_FILE));
    } catch (error) {
      Logger.debug(errorMessage(error));
      return null;
    }
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      return null;
    }

    const record: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
    const installedAt = parseTimestamp(record.installedAt);
    const lastUsedAt = parseTimestamp(record.lastUsedAt);
    const { version, signature, packageFile, sizeBytes } = record;
    if (
      record.formatVersion !== 1 ||
      version !== dirName ||
      typeof signature !== 'string' ||
      typeof packageFile !== 'string' ||
      typeof sizeBytes !== 'number' ||
      installedAt === undefined ||
      lastUsedAt === undefined
    ) {
      return null;
    }

    const packagePath = path.join(dir, packageFile);
    if (!(await fs.pathExists(packagePath))) {
      return null;
    }

    return { version: dirName, installPath: dir, packagePath, signature, installedAt, lastUsedAt, sizeBytes };
  }

  private async sweepLeftovers(): Promise<void> {
    const entries = await fs.readdir(this.options.rootDir);
    for (const name of entries) {
      if (name.startsWith(STAGING_PREFIX) || name.startsWith(TRASH_PREFIX)) {
        continue;
      }
      if (!this.index.has(name) && !name.startsWith('.')) {
        await this.discardLeftover(path.join(this.options.rootDir, name), 'not a known installation');
      }
    }
  }

  private async discardLeftover(dir: string, reason: string): Promise<void> {
    if (this.options.repair === false) {
      Logger.debug(`Ignoring ${dir}: ${reason}`);
      return;
    }
    Logger.debug(`Deleting ${dir}: ${reason}`);
    try {
      await fs.remove(dir);
    } catch (error) {
      Logger.warning(`Failed to delete ${dir}: ${errorMessage(error)}`);
    }
  }
}
