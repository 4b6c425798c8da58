/**
 * CLI info command - Show configuration and the operation catalogue
 */

import { Command } from 'commander';
import * as os from 'os';
import { CONTRACT_VERSION, OPERATION_NAMES, contract, listParameters, type ParameterInfo } from '../../bridge/contract.js';
import { findConfigFile, loadConfigSync } from '../../utils/config.js';
import { createLogger } from '../../utils/logger.js';
import { formatValue, printKeyValue, printSection, printTable, type TableRow } from '../utils.js';
import type { GlobalOptions } from '../index.js';

const logger = createLogger('cli:info');

/**
 * One-line summary of an operation's parameters, e.g. `symbol: string, enable?: boolean = true`
 */
export function formatParameters(parameters: ParameterInfo[]): string {
  return parameters
    .map((param) => {
      const name = param.required ? param.name : `${param.name}?`;
      const suffix = param.default === undefined ? '' : ` = ${formatValue(param.default)}`;
      return `${name}: ${param.type}${suffix}`;
    })
    .join(', ');
}

/**
 * One table row per operation, in contract order
 */
export function operationRows(): TableRow[] {
  return OPERATION_NAMES.map((name) => {
    const descriptor = contract[name];
    return {
      operation: name,
      returns: descriptor.shape,
      parameters: formatParameters(listParameters(descriptor)) || '-',
    };
  });
}

function showInfo(globalOptions: GlobalOptions): void {
  console.log('Terminal Bridge - System Information');
  console.log('='.repeat(36));

  printSection('System');
  printKeyValue('Node Version', process.version);
  printKeyValue('OS', `${os.type()} ${os.release()}`);
  printKeyValue('Working Directory', process.cwd());
  printKeyValue('Contract Version', CONTRACT_VERSION);

  printSection('Configuration');
  printKeyValue('Config File', findConfigFile(globalOptions.config) ?? '(using defaults)');

  const config = loadConfigSync(globalOptions.config);

  console.log('');
  console.log('  Server:');
  printKeyValue('Host', config.server.host, 2);
  printKeyValue('Port', config.server.port, 2);
  printKeyValue('Workers', config.server.workers, 2);
  printKeyValue('Max Payload', `${config.server.maxPayload} bytes`, 2);
  printKeyValue('Circuit', `opens after ${config.server.circuitFailureThreshold} faults for ${config.server.circuitResetTimeout}ms`, 2);
  printKeyValue('Rate Limit', config.server.rateLimit > 0 ? `${config.server.rateLimit}/s (burst ${config.server.rateBurst})` : 'off', 2);

  console.log('');
  console.log('  Client:');
  printKeyValue('URL', config.client.url, 2);
  printKeyValue('Host', config.client.host, 2);
  printKeyValue('Port', config.client.port, 2);
  printKeyValue('Timeout', `${config.client.timeout}ms`, 2);
  printKeyValue('Reconnect', config.client.reconnect, 2);

  printSection(`Operations (${OPERATION_NAMES.length})`);
  printTable(
    [
      { title: 'Operation', width: 20 },
      { title: 'Returns', width: 8 },
      { title: 'Parameters', width: 90 },
    ],
    operationRows(),
    2
  );
  console.log('');
}

/**
 * Create the info command
 */
export function createInfoCommand(): Command {
  const command = new Command('info');

  command
    .description('Show configuration and the operations a bridge serves')
    .action(() => {
      try {
        const globalOptions = command.parent?.opts<GlobalOptions>() ?? {};
        showInfo(globalOptions);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ error: message }, 'Info command failed');
        console.error(`Error: ${message}`);
        process.exit(1);
      }
    });

  return command;
}
