/**
 * CLI output formatting and option parsing helpers
 */

import { InvalidArgumentError } from 'commander';

/**
 * ANSI color codes for terminal output
 */
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/**
 * Check if terminal supports colors
 */
export function supportsColor(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.FORCE_COLOR !== undefined) {
    return true;
  }
  return process.stdout.isTTY === true;
}

/**
 * Apply color to text (only if terminal supports it)
 */
export function colorize(text: string, color: keyof typeof colors): string {
  if (!supportsColor()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function success(message: string): void {
  console.log(colorize('✓ ' + message, 'green'));
}

export function error(message: string): void {
  console.error(colorize('✗ ' + message, 'red'));
}

export function warning(message: string): void {
  console.log(colorize('⚠ ' + message, 'yellow'));
}

/**
 * Print a section header
 */
export function printSection(title: string): void {
  console.log('');
  console.log(colorize(title, 'bold'));
  console.log('-'.repeat(title.length));
}

/**
 * Print a key/value line, keys padded to a common width
 */
export function printKeyValue(key: string, value: unknown, indent: number = 0): void {
  console.log(`${' '.repeat(indent)}${padToWidth(key + ':', 22)} ${formatValue(value)}`);
}

/**
 * Format a value for display (handle undefined, objects, etc.)
 */
export function formatValue(value: unknown): string {
  if (value === undefined) {
    return '(not set)';
  }
  if (value === null) {
    return '(null)';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export interface TableColumn {
  title: string;
  width: number;
  align?: 'left' | 'right';
}

export type TableRow = Record<string, string | number | undefined>;

/**
 * Pad a string to a specific width, truncating longer text
 */
export function padToWidth(text: string, width: number, align: 'left' | 'right' = 'left'): string {
  const str = text.slice(0, width);
  const padding = ' '.repeat(width - str.length);
  return align === 'right' ? padding + str : str + padding;
}

/**
 * Render a table as lines: header, separator, then one line per row.
 * Row keys match column titles case-insensitively.
 */
export function formatTable(columns: TableColumn[], rows: TableRow[]): string[] {
  const header = columns.map((col) => padToWidth(col.title, col.width, col.align)).join(' ');
  const separator = columns.map((col) => '-'.repeat(col.width)).join(' ');

  const body = rows.map((row) =>
    columns
      .map((col) => {
        const key = Object.keys(row).find((k) => k.toLowerCase() === col.title.toLowerCase());
        const value = key ? String(row[key] ?? '') : '';
        return padToWidth(value, col.width, col.align);
      })
      .join(' ')
  );

  return [header.trimEnd(), separator, ...body.map((line) => line.trimEnd())];
}

export function printTable(columns: TableColumn[], rows: TableRow[], indent: number = 0): void {
  const pad = ' '.repeat(indent);
  const [header, ...rest] = formatTable(columns, rows);
  console.log(pad + colorize(header, 'bold'));
  for (const line of rest) {
    console.log(pad + line);
  }
}

/**
 * Commander argument parser for integer options
 */
export function parseInteger(min: number, max: number): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`);
    }
    return parsed;
  };
}

/**
 * Validate a WebSocket URL
 */
export function validateWebSocketUrl(url: string): void {
  if (!url.startsWith('ws://') && !url.startsWith('wss://')) {
    throw new Error(`Invalid URL protocol. Expected ws:// or wss://, got: ${url}`);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid URL format: ${url}`);
  }
  if (!parsed.hostname) {
    throw new Error('URL must include a hostname');
  }
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.round((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
  }
  const hours = Math.floor(ms / 3600000);
  const minutes = Math.round((ms % 3600000) / 60000);
  return `${hours}h ${minutes}m`;
}

export interface GracefulShutdownOptions {
  /** Release resources; the process exits once it settles */
  cleanup: () => Promise<void>;
  /** Milliseconds before giving up on cleanup and exiting with 1 */
  timeout?: number;
}

/**
 * Install SIGINT and SIGTERM handlers that run `cleanup` once, then exit
 *
 * @returns Function removing the handlers
 */
export function setupGracefulShutdown(options: GracefulShutdownOptions): () => void {
  const { cleanup, timeout = 10000 } = options;
  let isShuttingDown = false;

  const handler = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      console.log('Shutdown already in progress...');
      return;
    }
    isShuttingDown = true;
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    const forceExitTimeout = setTimeout(() => {
      console.error('Shutdown timeout - forcing exit');
      process.exit(1);
    }, timeout);

    try {
      await cleanup();
      clearTimeout(forceExitTimeout);
      console.log('Shutdown complete.');
      process.exit(0);
    } catch (err) {
      clearTimeout(forceExitTimeout);
      console.error(`Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  };

  const sigintHandler = () => void handler('SIGINT');
  const sigtermHandler = () => void handler('SIGTERM');
  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  return () => {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  };
}
