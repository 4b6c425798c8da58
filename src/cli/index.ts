/**
 * CLI for the terminal bridge
 *
 * Commands:
 *   serve       Serve a terminal module to bridge clients
 *   health      Show the health status of a running bridge
 *   info        Show configuration and the operation catalogue
 *
 * Global options:
 *   --verbose, -v   Enable verbose logging
 *   --config        Path to config file
 */

import { Command } from 'commander';
import { setLogLevel } from '../utils/logger.js';
import { createServeCommand } from './commands/serve.js';
import { createHealthCommand } from './commands/health.js';
import { createInfoCommand } from './commands/info.js';

export const VERSION = '0.1.0';

/**
 * Global options
 */
export type GlobalOptions = {
  verbose?: boolean;
  config?: string;
};

/**
 * Create the CLI program with every command registered
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('terminal-bridge')
    .description('RPC bridge between trading-terminal clients and the host that runs the terminal')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--config <path>', 'Path to config file');

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().verbose) {
      setLogLevel('debug');
    }
  });

  program.addCommand(createServeCommand());
  program.addCommand(createHealthCommand());
  program.addCommand(createInfoCommand());

  return program;
}

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
