import { DownloadProgressCallback, EngineInstallation } from '../types/engine';
import { EngineNotFoundError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { EngineEvents } from './engine-events';
import { EngineManager } from './engine-manager';
import { LocalStore } from './local-store';

/**
 * Serves engines shipped alongside the application. Nothing is ever downloaded or deleted.
 */
export class BundledEngineManager implements EngineManager {
  readonly events = new EngineEvents();

  private constructor(private readonly store: LocalStore) {}

  static async open(bundledDir: string): Promise<BundledEngineManager> {
    const store = await LocalStore.open({ rootDir: bundledDir, persistUsage: false, repair: false });
    Logger.debug(`Bundled engines: ${store.list().map((installation) => installation.version).join(', ') || 'none'}`);
    return new BundledEngineManager(store);
  }

  getEnginePath(version: string): string {
    return this.store.getPath(version);
  }

  getEngineSignature(version: string): string {
    return this.store.getSignature(version);
  }

  listInstallations(): EngineInstallation[] {
    return this.store.list();
  }

  async downloadEngineIfNecessary(
    version: string,
    progress?: DownloadProgressCallback,
    cancel?: AbortSignal
  ): Promise<boolean> {
    if (cancel?.aborted) {
      return false;
    }
    const installation = this.store.get(version);
    if (!installation) {
      throw new EngineNotFoundError(`Engine version ${version} is not bundled with this build`);
    }
    progress?.(installation.sizeBytes, installation.sizeBytes);
    return true;
  }

  async doEngineCullMaybeAsync(): Promise<string[]> {
    return [];
  }

  async clearAllEngines(): Promise<void> {
    Logger.warning('Bundled engines are read-only and were not removed');
  }

  pin(): () => void {
    return () => undefined;
  }

  async close(): Promise<void> {
    this.events.removeAllListeners();
  }
}
