import { EventEmitter } from 'events';
import { EngineInstallation, InstallState } from '../types/engine';
import { InstallError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export interface EngineEventMap {
  installed: EngineInstallation;
  evicted: { version: string; reason: 'cull' | 'clear' };
  progress: { version: string; bytesSoFar: number; totalBytes?: number };
  state: { version: string; state: InstallState };
  failed: { version: string; error: InstallError };
}

export type EngineEventName = keyof EngineEventMap;

/**
 * Discrete notifications for presentation layers. Listener failures are logged
 * and never reach the operation that emitted the event.
 */
export class EngineEvents {
  private readonly emitter = new EventEmitter();

  on<K extends EngineEventName>(event: K, listener: (payload: EngineEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends EngineEventName>(event: K, payload: EngineEventMap[K]): void {
    for (const listener of this.emitter.listeners(event)) {
      try {
        listener(payload);
      } catch (error) {
        Logger.warning(`Engine event listener for "${event}" failed: ${errorMessage(error)}`);
      }
    }
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
