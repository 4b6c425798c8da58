/**
 * Error classes for the terminal bridge
 *
 * Every error raised by the bridge core extends BridgeError and carries a
 * string code from ErrorCodes, so callers can branch on `code` without
 * instanceof chains across package boundaries.
 */

/**
 * Base error class for bridge errors
 */
export class BridgeError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get formatted error message with context
   */
  toDetailedString(): string {
    const parts = [`${this.name}[${this.code}]: ${this.message}`];
    if (this.context) {
      parts.push(`Context: ${JSON.stringify(this.context)}`);
    }
    return parts.join('\n');
  }
}

/**
 * Error codes for bridge errors
 */
export const ErrorCodes = {
  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',

  // Connection errors
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  CONNECTION_REFUSED: 'CONNECTION_REFUSED',
  CONNECTION_CLOSED: 'CONNECTION_CLOSED',
  NOT_CONNECTED: 'NOT_CONNECTED',
  ALREADY_CONNECTED: 'ALREADY_CONNECTED',

  // Call errors
  CALL_TIMEOUT: 'CALL_TIMEOUT',
  CALL_CANCELLED: 'CALL_CANCELLED',

  // Protocol errors
  MALFORMED_PAYLOAD: 'MALFORMED_PAYLOAD',
  UNSUPPORTED_VALUE: 'UNSUPPORTED_VALUE',
  CONTRACT_MISMATCH: 'CONTRACT_MISMATCH',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  INVALID_PARAMS: 'INVALID_PARAMS',

  // Remote errors
  REMOTE_OPERATION_FAILED: 'REMOTE_OPERATION_FAILED',

  // Server errors
  CIRCUIT_OPEN: 'CIRCUIT_OPEN',
  SERVER_ALREADY_STARTED: 'SERVER_ALREADY_STARTED',
  SERVER_NOT_STARTED: 'SERVER_NOT_STARTED',

  // General errors
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Configuration error
 */
export class ConfigurationError extends BridgeError {
  readonly setting?: string;

  constructor(message: string, code: ErrorCode, setting?: string, context?: Record<string, unknown>) {
    super(message, code, {
      ...context,
      setting,
    });
    this.name = 'ConfigurationError';
    this.setting = setting;
  }

  static invalid(setting: string, reason: string, value?: unknown): ConfigurationError {
    return new ConfigurationError(
      `Invalid configuration for '${setting}': ${reason}`,
      ErrorCodes.CONFIG_INVALID,
      setting,
      { value }
    );
  }

  static parseError(filePath: string, error: Error): ConfigurationError {
    return new ConfigurationError(
      `Failed to parse configuration file '${filePath}': ${error.message}`,
      ErrorCodes.CONFIG_PARSE_ERROR,
      undefined,
      { filePath, originalError: error.message }
    );
  }
}

/**
 * Transport establishment failure. Never retried by the bridge itself.
 */
export class ConnectionError extends BridgeError {
  readonly url?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.CONNECTION_FAILED,
    options?: {
      url?: string;
      cause?: Error;
    }
  ) {
    super(message, code, {
      url: options?.url,
      cause: options?.cause?.message,
    });
    this.name = 'ConnectionError';
    this.url = options?.url;

    if (options?.cause) {
      this.cause = options.cause;
    }
  }

  static failed(url: string, cause: Error): ConnectionError {
    const refused = 'code' in cause && cause.code === 'ECONNREFUSED';
    return new ConnectionError(
      refused
        ? `Connection refused to ${url}. Ensure the bridge server is running.`
        : `Failed to connect to ${url}: ${cause.message}`,
      refused ? ErrorCodes.CONNECTION_REFUSED : ErrorCodes.CONNECTION_FAILED,
      { url, cause }
    );
  }

  static notConnected(): ConnectionError {
    return new ConnectionError(
      'Not connected to a bridge server. Call connect() first.',
      ErrorCodes.NOT_CONNECTED
    );
  }

  static alreadyConnected(): ConnectionError {
    return new ConnectionError(
      'Already connected. Close the session before connecting again.',
      ErrorCodes.ALREADY_CONNECTED
    );
  }
}

/**
 * No response arrived within the caller's deadline. Local only: the peer may
 * still complete the operation.
 */
export class TimeoutError extends BridgeError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, correlationId?: number) {
    super(
      `Call to '${operation}' timed out after ${timeoutMs}ms`,
      ErrorCodes.CALL_TIMEOUT,
      { operation, timeoutMs, correlationId }
    );
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The session was torn down while a call was pending.
 */
export class ConnectionClosedError extends BridgeError {
  readonly operation?: string;

  constructor(reason: string, operation?: string) {
    super(
      operation ? `Connection closed while '${operation}' was pending: ${reason}` : `Connection closed: ${reason}`,
      ErrorCodes.CONNECTION_CLOSED,
      { operation, reason }
    );
    this.name = 'ConnectionClosedError';
    this.operation = operation;
  }
}

/**
 * The caller abandoned an in-flight call.
 */
export class CancelledError extends BridgeError {
  readonly operation: string;

  constructor(operation: string, correlationId?: number) {
    super(`Call to '${operation}' was cancelled`, ErrorCodes.CALL_CANCELLED, { operation, correlationId });
    this.name = 'CancelledError';
    this.operation = operation;
  }
}

/**
 * Codec-level decode or encode failure (protocol violation)
 */
export class MalformedPayloadError extends BridgeError {
  constructor(message: string, code: ErrorCode = ErrorCodes.MALFORMED_PAYLOAD, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'MalformedPayloadError';
  }

  static invalid(reason: string, context?: Record<string, unknown>): MalformedPayloadError {
    return new MalformedPayloadError(`Malformed payload: ${reason}`, ErrorCodes.MALFORMED_PAYLOAD, context);
  }

  static unsupported(path: string, kind: string): MalformedPayloadError {
    return new MalformedPayloadError(
      `Cannot encode value of type '${kind}' at ${path}`,
      ErrorCodes.UNSUPPORTED_VALUE,
      { path, kind }
    );
  }

  static contractMismatch(local: number, remote: unknown): MalformedPayloadError {
    return new MalformedPayloadError(
      `Contract version mismatch: local ${local}, remote ${String(remote)}`,
      ErrorCodes.CONTRACT_MISMATCH,
      { local, remote }
    );
  }
}

/**
 * Kinds of failure a response envelope's error descriptor can carry
 */
export type RemoteErrorKind = 'remote' | 'invalid_params' | 'unknown_operation' | 'internal' | 'unavailable';

/**
 * The terminal capability (or the dispatcher on its behalf) reported a failure
 */
export class RemoteOperationError extends BridgeError {
  readonly operation: string;
  readonly remoteCode: number;
  readonly remoteKind: RemoteErrorKind;

  constructor(operation: string, remoteCode: number, message: string, remoteKind: RemoteErrorKind = 'remote') {
    super(message, ErrorCodes.REMOTE_OPERATION_FAILED, { operation, remoteCode, remoteKind });
    this.name = 'RemoteOperationError';
    this.operation = operation;
    this.remoteCode = remoteCode;
    this.remoteKind = remoteKind;
  }
}

/**
 * Contract mismatch between peers. Not transient: retrying cannot help.
 */
export class UnknownOperationError extends BridgeError {
  readonly operation: string;

  constructor(operation: string) {
    super(`Unknown operation '${operation}'`, ErrorCodes.UNKNOWN_OPERATION, { operation });
    this.name = 'UnknownOperationError';
    this.operation = operation;
  }
}

/**
 * Params rejected by the contract before anything was sent
 */
export class InvalidParamsError extends BridgeError {
  readonly operation: string;

  constructor(operation: string, reason: string) {
    super(`Invalid params for '${operation}': ${reason}`, ErrorCodes.INVALID_PARAMS, { operation });
    this.name = 'InvalidParamsError';
    this.operation = operation;
  }
}

/**
 * The server's circuit breaker is open and turned the call away without
 * reaching the terminal
 */
export class CircuitOpenError extends BridgeError {
  readonly operation: string;
  readonly remainingMs: number;

  constructor(operation: string, remainingMs: number) {
    super(
      `Circuit breaker is open; '${operation}' blocked for another ${remainingMs}ms`,
      ErrorCodes.CIRCUIT_OPEN,
      { operation, remainingMs }
    );
    this.name = 'CircuitOpenError';
    this.operation = operation;
    this.remainingMs = remainingMs;
  }
}

/**
 * Server lifecycle error
 */
export class BridgeLifecycleError extends BridgeError {
  constructor(message: string, code: ErrorCode) {
    super(message, code);
    this.name = 'BridgeLifecycleError';
  }

  static alreadyStarted(): BridgeLifecycleError {
    return new BridgeLifecycleError(
      'Server is already started. Call stop() before starting again.',
      ErrorCodes.SERVER_ALREADY_STARTED
    );
  }

  static notStarted(): BridgeLifecycleError {
    return new BridgeLifecycleError(
      'Server is not started. Call start() first.',
      ErrorCodes.SERVER_NOT_STARTED
    );
  }
}

/**
 * Format an error for logging with context
 */
export function formatErrorForLogging(error: unknown): {
  message: string;
  code?: string;
  context?: Record<string, unknown>;
  stack?: string;
} {
  if (error instanceof BridgeError) {
    return {
      message: error.message,
      code: error.code,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

/**
 * Check if an error is of a specific type
 */
export function isErrorCode(error: unknown, code: ErrorCode): boolean {
  return error instanceof BridgeError && error.code === code;
}
