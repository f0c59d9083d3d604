import { Command } from 'commander';
import chalk from 'chalk';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';
import { reportFailure, withEngineManager } from './context';

export function infoCommand(program: Command): void {
  program
    .command('info')
    .description('Show the path and signature of an installed engine version')
    .argument('<version>', 'Engine version')
    .option('-j, --json', 'Output result as JSON')
    .action(async (version: string, options, command: Command) => {
      try {
        await withEngineManager(command, async (manager) => {
          const path = manager.getEnginePath(version);
          const signature = manager.getEngineSignature(version);
          const installation = manager.listInstallations().find(candidate => candidate.version === version);

          if (options.json) {
            Logger.json({ version, path, signature, installation });
            return;
          }

          Logger.title('Engine Information');
          Logger.success(`Found engine ${chalk.bold(version)}`);
          console.log(`  Path: ${path}`);
          console.log(`  Signature: ${signature}`);
          if (installation) {
            console.log(`  Package: ${installation.packagePath}`);
            console.log(`  Size: ${Validator.formatBytes(installation.sizeBytes)}`);
            console.log(`  Installed: ${new Date(installation.installedAt).toISOString()}`);
          }
        });
      } catch (error) {
        reportFailure(error);
      }
    });
}
