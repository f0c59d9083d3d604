import { Command } from 'commander';
import { Logger } from '../utils/logger';
import { reportFailure, withEngineManager } from './context';

export function clearCommand(program: Command): void {
  program
    .command('clear')
    .description('Remove every installed engine')
    .option('-y, --yes', 'Confirm removal')
    .action(async (options, command: Command) => {
      try {
        Logger.title('Clear Engines');

        await withEngineManager(command, async (manager, config) => {
          const count = manager.listInstallations().length;
          if (!options.yes) {
            Logger.warning(`This removes ${count} engine(s) from ${config.rootDir}. Re-run with --yes to confirm.`);
            process.exitCode = 1;
            return;
          }

          await manager.clearAllEngines();
          Logger.success(`Removed ${count} engine(s)`);
        });
      } catch (error) {
        reportFailure(error);
      }
    });
}
