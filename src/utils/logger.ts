import pino from 'pino';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Logger interface (subset of pino.Logger for public API)
 */
export type Logger = pino.Logger;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/** Loggers created through createLogger, so setLogLevel can reach module-level instances */
const registry = new Set<Logger>();

/** Set by setLogLevel; takes precedence over LOG_LEVEL */
let levelOverride: LogLevel | null = null;

/**
 * Check whether a string names a supported log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Only enabled when NODE_ENV is explicitly 'development', since pino-pretty
 * is a dev dependency.
 */
function usePrettyPrint(): boolean {
  return process.env.NODE_ENV === 'development';
}

/**
 * Gets the default log level: the setLogLevel override, then LOG_LEVEL, then 'info'
 */
function getDefaultLevel(): LogLevel {
  if (levelOverride) {
    return levelOverride;
  }
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Creates a logger instance with the given component name
 *
 * @param name - Component name to include in log output
 * @param level - Optional log level override (defaults to LOG_LEVEL env var or 'info')
 *
 * @example
 * ```typescript
 * const logger = createLogger('session');
 * logger.info({ url }, 'Session connected');
 * logger.error({ err }, 'Connection failed');
 * ```
 */
export function createLogger(name: string, level?: LogLevel): Logger {
  const logLevel = level ?? getDefaultLevel();

  const options: pino.LoggerOptions = {
    name,
    level: logLevel,
  };

  if (usePrettyPrint()) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  const logger = pino(options);
  registry.add(logger);
  return logger;
}

/**
 * Creates a child logger from an existing logger with additional context
 *
 * @param parent - Parent logger instance
 * @param bindings - Additional context to include in all log messages
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * Change the level of every logger created so far, and of those created later.
 * Backs the `debug` config toggle and the CLI --verbose flag.
 */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of registry) {
    logger.level = level;
  }
}

/**
 * Drop the setLogLevel override so new loggers follow LOG_LEVEL again.
 * Existing loggers keep their current level.
 */
export function resetLogLevel(): void {
  levelOverride = null;
}
