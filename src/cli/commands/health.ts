/**
 * CLI health command - Query a running bridge's health status
 *
 * Exits with 1 when the bridge is unreachable or reports itself unhealthy.
 *
 * Usage:
 *   terminal-bridge health --url ws://localhost:18812
 */

import { Command } from 'commander';
import type { HealthStatus } from '../../bridge/models.js';
import { BridgeClient } from '../../client/client.js';
import { loadConfigSync } from '../../utils/config.js';
import { createLogger } from '../../utils/logger.js';
import { colorize, formatDuration, parseInteger, printKeyValue, printSection, validateWebSocketUrl } from '../utils.js';
import type { GlobalOptions } from '../index.js';

const logger = createLogger('cli:health');

export interface HealthCommandOptions {
  url?: string;
  timeout?: number;
  json?: boolean;
}

/**
 * Print a health status in the human-readable layout
 */
export function printHealth(status: HealthStatus, target: string): void {
  printSection(`Bridge at ${target}`);
  printKeyValue('Status', status.healthy ? colorize('healthy', 'green') : colorize('unhealthy', 'red'));
  printKeyValue('Uptime', formatDuration(Math.round(status.uptime_seconds * 1000)));
  printKeyValue('Connections', `${status.connections_active} active, ${status.connections_total} total`);
  printKeyValue('Requests', `${status.requests_total} total, ${status.requests_failed} failed`);
  printKeyValue('Circuit', status.circuit_state === 'closed' ? status.circuit_state : colorize(status.circuit_state, 'yellow'));
  printKeyValue('Last Error', status.last_error);
  console.log('');
}

async function checkHealth(options: HealthCommandOptions, globalOptions: GlobalOptions): Promise<boolean> {
  const config = loadConfigSync(globalOptions.config);
  if (options.url) {
    validateWebSocketUrl(options.url);
  }

  const clientConfig = { ...config.client, url: options.url ?? config.client.url, reconnect: false };
  const target = clientConfig.url ?? `ws://${clientConfig.host}:${clientConfig.port}`;

  const status = await BridgeClient.withConnection(clientConfig, (client) =>
    client.healthCheck({ timeout: options.timeout ?? 10000 })
  );

  if (options.json) {
    console.log(JSON.stringify(status, null, 2));
  } else {
    printHealth(status, target);
  }
  return status.healthy;
}

/**
 * Create the health command
 */
export function createHealthCommand(): Command {
  const command = new Command('health');

  command
    .description('Show the health status of a running bridge')
    .option('-u, --url <url>', 'WebSocket URL of the bridge (defaults to the configured client host and port)')
    .option('--timeout <ms>', 'Milliseconds to wait for the answer', parseInteger(1, 3600000))
    .option('--json', 'Print the raw status as JSON')
    .action(async (options: HealthCommandOptions) => {
      const globalOptions = command.parent?.opts<GlobalOptions>() ?? {};
      try {
        const healthy = await checkHealth(options, globalOptions);
        process.exitCode = healthy ? 0 : 1;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.debug({ error: message }, 'Health command failed');
        console.error(`Error: ${message}`);
        process.exit(1);
      }
    });

  return command;
}
