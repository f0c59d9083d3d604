import { Command } from 'commander';
import chalk from 'chalk';
import { FetchHttpClient } from '../core/http-client';
import { ManifestResolver } from '../core/manifest-resolver';
import { Logger } from '../utils/logger';
import { loadConfig, reportFailure } from './context';

export function manifestCommand(program: Command): void {
  program
    .command('manifest')
    .description('List engine versions published in the build manifest for this platform')
    .option('-j, --json', 'Output result as JSON')
    .action(async (options, command: Command) => {
      try {
        const config = await loadConfig(command);
        if (!config.manifestUrl) {
          Logger.error('No manifest URL configured (use --manifest-url or ENGINE_CACHE_MANIFEST_URL)');
          process.exit(1);
        }

        const resolver = new ManifestResolver(new FetchHttpClient(), {
          manifestUrl: config.manifestUrl,
          platform: config.platform,
          ttlMs: config.manifestTtlMs
        });
        const entries = await resolver.listEntries();

        if (options.json) {
          Logger.json(entries);
          return;
        }

        Logger.title('Build Manifest');
        console.log(`  Source: ${config.manifestUrl}`);
        console.log(`  Platform: ${config.platform}`);

        if (entries.length === 0) {
          console.log();
          Logger.warning('No versions available for this platform');
          return;
        }

        Logger.subTitle(`${entries.length} version(s)`);
        entries.forEach(entry => {
          console.log(`  • ${chalk.bold(entry.version)}`);
          console.log(`      URL: ${entry.downloadUrl}`);
          console.log(`      Signature: ${entry.expectedSignature}`);
        });
      } catch (error) {
        reportFailure(error);
      }
    });
}
