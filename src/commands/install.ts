import { Command } from 'commander';
import chalk from 'chalk';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';
import { reportFailure, withEngineManager } from './context';

function describeProgress(bytesSoFar: number, totalBytes?: number): string {
  if (!totalBytes) {
    return `Downloaded ${Validator.formatBytes(bytesSoFar)}`;
  }
  const percent = Math.min(100, Math.floor((bytesSoFar / totalBytes) * 100));
  return `Downloaded ${Validator.formatBytes(bytesSoFar)} of ${Validator.formatBytes(totalBytes)} (${percent}%)`;
}

export function installCommand(program: Command): void {
  program
    .command('install')
    .description('Download and verify an engine version unless it is already installed')
    .argument('<version>', 'Engine version to install')
    .action(async (version: string, _options, command: Command) => {
      const controller = new AbortController();
      const onInterrupt = (): void => {
        Logger.clearProgress();
        Logger.warning('Cancelling download...');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        Logger.title('Engine Install');

        const installed = await withEngineManager(command, async (manager) => {
          const startTime = Date.now();
          const ok = await manager.downloadEngineIfNecessary(
            version,
            (bytesSoFar, totalBytes) => Logger.progress(describeProgress(bytesSoFar, totalBytes)),
            controller.signal
          );
          Logger.clearProgress();

          if (ok) {
            Logger.success(`Engine ${chalk.bold(version)} is installed (${((Date.now() - startTime) / 1000).toFixed(1)}s)`);
            console.log(`  Path: ${manager.getEnginePath(version)}`);
            console.log(`  Signature: ${manager.getEngineSignature(version)}`);
          }
          return ok;
        });

        if (!installed) {
          Logger.warning('Install cancelled');
          process.exitCode = 130;
        }
      } catch (error) {
        Logger.clearProgress();
        reportFailure(error);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}
