import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Configuration for the bridge server's listening socket
 */
export interface ServerConfig {
  host: string;
  port: number;
  /** Maximum handler invocations in flight across all sessions */
  workers: number;
  /** Largest frame accepted, in bytes */
  maxPayload: number;
  /** Consecutive terminal faults that open the circuit breaker */
  circuitFailureThreshold: number;
  /** Half-open successes that close it again */
  circuitSuccessThreshold: number;
  /** Milliseconds the circuit stays open */
  circuitResetTimeout: number;
  /** Requests per second before handlers are paused; 0 disables the limiter */
  rateLimit: number;
  /** Requests allowed in a burst above the rate */
  rateBurst: number;
}

/**
 * Configuration for clients connecting to a bridge server
 */
export interface ClientConfig {
  url?: string;
  host: string;
  port: number;
  /** Default call timeout in milliseconds */
  timeout: number;
  reconnect: boolean;
  reconnectInterval: number;
  maxReconnectAttempts: number;
}

/**
 * Full bridge configuration
 */
export interface BridgeConfig {
  server: ServerConfig;
  client: ClientConfig;
  debug: boolean;
}

/**
 * Partial configuration as read from a file or passed by a caller
 */
export interface PartialBridgeConfig {
  server?: Partial<ServerConfig>;
  client?: Partial<ClientConfig>;
  debug?: boolean;
}

const ServerConfigSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    workers: z.number().int().positive(),
    maxPayload: z.number().int().positive(),
    circuitFailureThreshold: z.number().int().positive(),
    circuitSuccessThreshold: z.number().int().positive(),
    circuitResetTimeout: z.number().int().nonnegative(),
    rateLimit: z.number().nonnegative(),
    rateBurst: z.number().int().positive(),
  })
  .partial();

const ClientConfigSchema = z
  .object({
    url: z.string().url(),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    timeout: z.number().int().positive(),
    reconnect: z.boolean(),
    reconnectInterval: z.number().int().positive(),
    maxReconnectAttempts: z.number().int().nonnegative(),
  })
  .partial();

export const PartialBridgeConfigSchema = z
  .object({
    server: ServerConfigSchema,
    client: ClientConfigSchema,
    debug: z.boolean(),
  })
  .partial();

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: BridgeConfig = {
  server: {
    host: '0.0.0.0',
    port: 18812,
    workers: 10,
    maxPayload: 256 * 1024 * 1024,
    circuitFailureThreshold: 5,
    circuitSuccessThreshold: 2,
    circuitResetTimeout: 30000,
    rateLimit: 100,
    rateBurst: 200,
  },
  client: {
    host: 'localhost',
    port: 18812,
    timeout: 300000, // 5 minutes
    reconnect: false,
    reconnectInterval: 1000,
    maxReconnectAttempts: 10,
  },
  debug: false,
};

/**
 * Deep merges a partial config with the default config
 *
 * @param partial - Partial configuration to merge
 * @returns Complete configuration with defaults for missing values
 */
export function mergeConfig(partial: PartialBridgeConfig): BridgeConfig {
  return {
    server: {
      ...DEFAULT_CONFIG.server,
      ...(partial.server ?? {}),
    },
    client: {
      ...DEFAULT_CONFIG.client,
      ...(partial.client ?? {}),
    },
    debug: partial.debug ?? DEFAULT_CONFIG.debug,
  };
}

/**
 * Validate an already-parsed config document
 *
 * @throws ConfigurationError naming the first offending setting
 */
export function validateConfig(data: unknown): PartialBridgeConfig {
  const result = PartialBridgeConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const setting = issue.path.join('.');
    throw ConfigurationError.invalid(setting || '(root)', issue.message);
  }
  return result.data;
}

/**
 * Reads and validates a YAML config file
 *
 * @param filePath - Path to the config file
 * @returns Parsed config, or null if the file doesn't exist
 * @throws ConfigurationError if the file exists but cannot be parsed or validated
 */
function readConfigFile(filePath: string): PartialBridgeConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    parsed = parseYaml(content);
  } catch (error) {
    throw ConfigurationError.parseError(filePath, error instanceof Error ? error : new Error(String(error)));
  }

  return validateConfig(parsed);
}

/**
 * Gets the default config file paths to search
 *
 * @returns Array of config file paths in priority order
 */
export function getDefaultConfigPaths(): string[] {
  const homeDir = os.homedir();
  const cwd = process.cwd();

  return [
    path.join(cwd, '.terminal-bridge.yml'),
    path.join(cwd, '.terminal-bridge.yaml'),
    path.join(homeDir, '.terminal-bridge', 'config.yml'),
    path.join(homeDir, '.terminal-bridge', 'config.yaml'),
  ];
}

function parseIntegerEnv(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw ConfigurationError.invalid(name, 'must be an integer', value);
  }
  return parsed;
}

/**
 * Apply BRIDGE_* environment overrides on top of a complete config
 */
export function applyEnvOverrides(config: BridgeConfig, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const result: BridgeConfig = {
    server: { ...config.server },
    client: { ...config.client },
    debug: config.debug,
  };

  if (env.BRIDGE_HOST) {
    result.server.host = env.BRIDGE_HOST;
    result.client.host = env.BRIDGE_HOST;
  }
  if (env.BRIDGE_PORT) {
    const port = parseIntegerEnv('BRIDGE_PORT', env.BRIDGE_PORT);
    result.server.port = port;
    result.client.port = port;
  }
  if (env.BRIDGE_TIMEOUT) {
    result.client.timeout = parseIntegerEnv('BRIDGE_TIMEOUT', env.BRIDGE_TIMEOUT);
  }
  if (env.BRIDGE_WORKERS) {
    result.server.workers = parseIntegerEnv('BRIDGE_WORKERS', env.BRIDGE_WORKERS);
  }
  if (env.BRIDGE_DEBUG) {
    result.debug = env.BRIDGE_DEBUG === '1' || env.BRIDGE_DEBUG.toLowerCase() === 'true';
  }

  return result;
}

/**
 * Loads configuration from file(s) and merges with defaults
 *
 * Searches for config files in the following order:
 * 1. Explicit path (if provided)
 * 2. .terminal-bridge.yml in current working directory
 * 3. ~/.terminal-bridge/config.yml
 *
 * BRIDGE_* environment variables override whatever the file says.
 *
 * @param configPath - Optional explicit path to config file
 * @returns Complete configuration with defaults for missing values
 *
 * @example
 * ```typescript
 * const config = loadConfigSync();
 * const client = new AsyncBridgeClient({ ...config.client });
 * ```
 */
export function loadConfigSync(configPath?: string): BridgeConfig {
  const searchPaths = configPath ? [configPath] : getDefaultConfigPaths();

  for (const searchPath of searchPaths) {
    const parsed = readConfigFile(searchPath);
    if (parsed) {
      return applyEnvOverrides(mergeConfig(parsed));
    }
  }

  return applyEnvOverrides(mergeConfig({}));
}

/**
 * Async variant of loadConfigSync, for callers already in an async context
 */
export async function loadConfig(configPath?: string): Promise<BridgeConfig> {
  return loadConfigSync(configPath);
}

/**
 * Find the config file loadConfigSync would read, if any
 */
export function findConfigFile(configPath?: string): string | null {
  const searchPaths = configPath ? [configPath] : getDefaultConfigPaths();
  return searchPaths.find((candidate) => fs.existsSync(candidate)) ?? null;
}
