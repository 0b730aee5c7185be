import { Command } from 'commander';
import { ConfigOverrides } from '../config/config';

export interface CliOptions {
  nodename?: string;
  adminaddr?: string;
  listenaddr?: string;
  template?: string;
  publicDir?: string;
  adminTimeout?: string;
}

export function withConnectionOptions(command: Command): Command {
  return command
    .option('-n, --nodename <name>', 'friendly name of the node shown on the page')
    .option('-a, --adminaddr <address>', 'admin socket address (unix:///path or host:port)')
    .option('--admin-timeout <ms>', 'time limit for one admin socket query');
}

export function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    nodeName: options.nodename,
    adminAddress: options.adminaddr,
    listenAddress: options.listenaddr,
    templatePath: options.template,
    publicDir: options.publicDir,
    adminTimeout: options.adminTimeout,
  };
}
