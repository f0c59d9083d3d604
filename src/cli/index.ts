#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { listCommand } from '../commands/list';
import { installCommand } from '../commands/install';
import { infoCommand } from '../commands/info';
import { manifestCommand } from '../commands/manifest';
import { cullCommand } from '../commands/cull';
import { clearCommand } from '../commands/clear';
import { version, description } from '../../package.json';

const program = new Command();

program
  .name('engine-cache')
  .description(description)
  .version(version)
  .option('--config <file>', 'Path to a JSON config file')
  .option('--root <dir>', 'Directory holding installed engines')
  .option('--manifest-url <url>', 'URL of the build manifest')
  .option('--platform <id>', 'Platform identifier used to pick builds, e.g. linux-x64')
  .option('--log-level <level>', 'debug, info, warn, error or silent')
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str))
  });

// Register commands
listCommand(program);
installCommand(program);
infoCommand(program);
manifestCommand(program);
cullCommand(program);
clearCommand(program);

program.configureHelp({
  sortSubcommands: true,
  subcommandTerm: (cmd) => cmd.name()
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
