import { Command } from 'commander';
import chalk from 'chalk';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';
import { reportFailure, withEngineManager } from './context';

export function listCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed engine versions')
    .option('-j, --json', 'Output result as JSON')
    .action(async (options, command: Command) => {
      try {
        await withEngineManager(command, async (manager, config) => {
          const installations = manager.listInstallations();

          if (options.json) {
            Logger.json(installations);
            return;
          }

          Logger.title('Installed Engines');
          console.log(`  Root: ${config.rootDir}`);

          if (installations.length === 0) {
            console.log();
            Logger.warning('No engines installed');
            return;
          }

          const totalBytes = installations.reduce((total, installation) => total + installation.sizeBytes, 0);
          Logger.subTitle(`${installations.length} installation(s), ${Validator.formatBytes(totalBytes)}`);
          installations.forEach(installation => {
            console.log(`  • ${chalk.bold(installation.version)}`);
            console.log(`      Size: ${Validator.formatBytes(installation.sizeBytes)}`);
            console.log(`      Installed: ${new Date(installation.installedAt).toISOString()}`);
            console.log(`      Last used: ${new Date(installation.lastUsedAt).toISOString()}`);
          });
        });
      } catch (error) {
        reportFailure(error);
      }
    });
}
