import { Command } from 'commander';
import chalk from 'chalk';
import { cullPolicyFromOptions } from '../core/config';
import { selectCullCandidates } from '../core/culler';
import { CullPolicy } from '../types/engine';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';
import { reportFailure, withEngineManager } from './context';

function describePolicy(policy: CullPolicy): string {
  const count = policy.maxInstallations === undefined ? 'unlimited' : String(policy.maxInstallations);
  const age = policy.maxAgeMs === undefined ? 'unlimited' : Validator.formatDuration(policy.maxAgeMs);
  return `keep ${count} unpinned, max age ${age}`;
}

export function cullCommand(program: Command): void {
  program
    .command('cull')
    .description('Remove installed engines according to the retention policy')
    .option('--pin <versions...>', 'Versions in use that must be kept')
    .option('--max-installations <count>', 'Unpinned installations to keep ("off" for no limit)')
    .option('--max-age <duration>', 'Remove installations unused for longer than this, e.g. 30d ("off" for no limit)')
    .option('--dry-run', 'Show what would be removed without removing anything')
    .action(async (options, command: Command) => {
      try {
        Logger.title('Engine Cull');

        await withEngineManager(command, async (manager, config) => {
          const policy = cullPolicyFromOptions(config.cullPolicy, {
            maxInstallations: options.maxInstallations,
            maxAge: options.maxAge
          });
          const pinned: string[] = options.pin ?? [];
          Logger.info(`Policy: ${describePolicy(policy)}`);
          if (pinned.length > 0) {
            Logger.info(`Pinned: ${pinned.join(', ')}`);
          }

          if (options.dryRun) {
            const candidates = selectCullCandidates(manager.listInstallations(), new Set(pinned), policy, Date.now());
            if (candidates.length === 0) {
              Logger.success('Nothing would be removed');
              return;
            }
            Logger.subTitle('Would remove');
            candidates.forEach(installation => {
              console.log(`  • ${installation.version} (${Validator.formatBytes(installation.sizeBytes)})`);
            });
            return;
          }

          const removed = await manager.doEngineCullMaybeAsync({ pinned, policy });
          if (removed.length === 0) {
            Logger.success('Nothing to remove');
            return;
          }
          Logger.success(`Removed ${removed.length} engine(s): ${removed.map(version => chalk.bold(version)).join(', ')}`);
        });
      } catch (error) {
        reportFailure(error);
      }
    });
}
