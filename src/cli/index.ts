#!/usr/bin/env node

import { Command } from 'commander';
import { startCommand } from './commands/start';
import { statusCommand } from './commands/status';
import { CliOptions, withConnectionOptions } from './options';

const program = new Command();

program
  .name('meshdash')
  .description('Web dashboard for the peers and links of a mesh network node')
  .version('1.0.0');

withConnectionOptions(program.command('start', { isDefault: true }))
  .description('Serve the dashboard')
  .option('-l, --listenaddr <address>', 'address and port to listen on, e.g. [::]:80')
  .option('-t, --template <path>', 'HTML page template')
  .option('--public-dir <dir>', 'directory holding template.html and style.css')
  .action((options: CliOptions) => {
    startCommand(options).catch((error) => {
      console.error('Error:', error);
      process.exit(1);
    });
  });

withConnectionOptions(program.command('status'))
  .description('Print the current peers of the node')
  .action((options: CliOptions) => {
    statusCommand(options).catch((error) => {
      console.error('Error:', error);
      process.exit(1);
    });
  });

program.parse(process.argv);
