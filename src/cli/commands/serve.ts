/**
 * CLI serve command - Run the bridge server in front of a terminal module
 *
 * The terminal module exports a `createTerminal` factory, or a default export
 * that is either such a factory or the terminal object itself.
 *
 * Usage:
 *   terminal-bridge serve --terminal ./terminal.js --port 18812 --workers 10
 */

import { Command } from 'commander';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { BridgeServer } from '../../server/server.js';
import {
  TERMINAL_METHODS,
  isTerminalCapability,
  missingTerminalMethods,
  type TerminalCapability,
} from '../../server/handlers.js';
import { loadConfigSync, type ServerConfig } from '../../utils/config.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createLogger, setLogLevel } from '../../utils/logger.js';
import { parseInteger, setupGracefulShutdown, success } from '../utils.js';
import type { GlobalOptions } from '../index.js';

const logger = createLogger('cli:serve');

export interface ServeCommandOptions {
  terminal: string;
  host?: string;
  port?: number;
  workers?: number;
}

/**
 * Pick the terminal out of a loaded module namespace
 */
export async function resolveTerminal(loaded: unknown, source: string): Promise<TerminalCapability> {
  if (typeof loaded !== 'object' || loaded === null) {
    throw ConfigurationError.invalid('terminal', `module '${source}' has no exports`);
  }

  const exported: unknown = Reflect.get(loaded, 'createTerminal') ?? Reflect.get(loaded, 'default');
  if (exported === undefined) {
    throw ConfigurationError.invalid('terminal', `module '${source}' exports neither createTerminal nor a default`);
  }

  const candidate: unknown = typeof exported === 'function' ? await exported() : exported;
  if (isTerminalCapability(candidate)) {
    return candidate;
  }

  const missing = typeof candidate === 'object' && candidate !== null ? missingTerminalMethods(candidate) : TERMINAL_METHODS;
  throw ConfigurationError.invalid('terminal', `module '${source}' is missing ${missing.join(', ')}`);
}

/**
 * Import a terminal module from a path relative to the working directory
 */
export async function loadTerminal(modulePath: string): Promise<TerminalCapability> {
  const url = pathToFileURL(path.resolve(modulePath)).href;
  let loaded: unknown;
  try {
    loaded = await import(url);
  } catch (error) {
    throw ConfigurationError.invalid(
      'terminal',
      `cannot load '${modulePath}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return resolveTerminal(loaded, modulePath);
}

/**
 * Command-line options over the loaded server config
 */
export function resolveServerConfig(base: ServerConfig, options: ServeCommandOptions): ServerConfig {
  return {
    ...base,
    host: options.host ?? base.host,
    port: options.port ?? base.port,
    workers: options.workers ?? base.workers,
  };
}

async function serve(options: ServeCommandOptions, globalOptions: GlobalOptions): Promise<void> {
  const config = loadConfigSync(globalOptions.config);
  if (config.debug) {
    setLogLevel('debug');
  }

  const terminal = await loadTerminal(options.terminal);
  const serverConfig = resolveServerConfig(config.server, options);
  const server = new BridgeServer({ ...serverConfig, terminal });

  await server.start();
  success(`Bridge listening on ${serverConfig.host}:${server.getPort()} (${serverConfig.workers} workers)`);

  setupGracefulShutdown({
    cleanup: () => server.stop(),
  });
}

/**
 * Create the serve command
 */
export function createServeCommand(): Command {
  const command = new Command('serve');

  command
    .description('Serve a terminal module to bridge clients')
    .requiredOption('-t, --terminal <module>', 'Module exporting the terminal (createTerminal or default export)')
    .option('-H, --host <host>', 'Host to bind to')
    .option('-p, --port <port>', 'Port to listen on (0 picks a free port)', parseInteger(0, 65535))
    .option('-w, --workers <count>', 'Maximum concurrent handler invocations', parseInteger(1, 1024))
    .action(async (options: ServeCommandOptions) => {
      const globalOptions = command.parent?.opts<GlobalOptions>() ?? {};
      try {
        await serve(options, globalOptions);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ error: message }, 'Serve command failed');
        console.error(`Error: ${message}`);
        process.exit(1);
      }
    });

  return command;
}
