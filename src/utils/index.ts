export { createLogger, createChildLogger, isLogLevel, setLogLevel, resetLogLevel, type Logger, type LogLevel } from './logger.js';
export {
  loadConfig,
  loadConfigSync,
  mergeConfig,
  validateConfig,
  applyEnvOverrides,
  findConfigFile,
  getDefaultConfigPaths,
  DEFAULT_CONFIG,
  type BridgeConfig,
  type PartialBridgeConfig,
  type ServerConfig,
  type ClientConfig,
} from './config.js';
export {
  BridgeError,
  ConfigurationError,
  ConnectionError,
  TimeoutError,
  ConnectionClosedError,
  CancelledError,
  MalformedPayloadError,
  RemoteOperationError,
  UnknownOperationError,
  InvalidParamsError,
  CircuitOpenError,
  BridgeLifecycleError,
  ErrorCodes,
  formatErrorForLogging,
  isErrorCode,
  type ErrorCode,
  type RemoteErrorKind,
} from './errors.js';
