import { Command } from 'commander';
import { ConfigLoader } from '../core/config';
import { EngineManager } from '../core/engine-manager';
import { createEngineManager } from '../index';
import { EngineCacheConfig } from '../types/config';
import { ConfigError, EngineError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export interface GlobalOptions {
  config?: string;
  root?: string;
  manifestUrl?: string;
  platform?: string;
  logLevel?: string;
}

export async function loadConfig(command: Command): Promise<EngineCacheConfig> {
  const globals: GlobalOptions = command.optsWithGlobals();

  if (globals.logLevel) {
    const level = Logger.parseLevel(globals.logLevel);
    if (!level) {
      throw new Error(`Invalid log level: ${globals.logLevel}`);
    }
    Logger.setLevel(level);
  }

  return ConfigLoader.load({
    configFile: globals.config,
    overrides: {
      rootDir: globals.root,
      manifestUrl: globals.manifestUrl,
      platform: globals.platform
    }
  });
}

/**
 * Build the manager for one command run and close it afterwards
 */
export async function withEngineManager<T>(
  command: Command,
  task: (manager: EngineManager, config: EngineCacheConfig) => Promise<T>
): Promise<T> {
  const config = await loadConfig(command);
  const manager = await createEngineManager(config);
  try {
    return await task(manager, config);
  } finally {
    await manager.close();
  }
}

export function reportFailure(error: unknown): never {
  if (error instanceof EngineError) {
    Logger.error(`${error.code}: ${error.message}`);
  } else if (error instanceof ConfigError) {
    Logger.error(`Configuration error: ${error.message}`);
  } else {
    Logger.error(`Unexpected error: ${errorMessage(error)}`);
  }
  process.exit(1);
}
