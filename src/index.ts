/**
 * Terminal RPC Bridge
 *
 * Exposes a trading terminal's API to remote clients. A server hosting the
 * terminal dispatches requests from any number of sessions; clients call the
 * same operations through a synchronous or an asynchronous facade.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// ============================================================================
// Clients
// ============================================================================

export { BridgeClient, type SyncCallOptions } from './client/client.js';
export { AsyncBridgeClient } from './client/async-client.js';
export { OperationFacade, type ClientOptions, type TradeRequestInput } from './client/facade.js';
export { Session, MAX_CALL_TIMEOUT, toRemoteError, type CallOptions, type SessionOptions } from './bridge/session.js';

// ============================================================================
// Server
// ============================================================================

export { BridgeServer, type BridgeServerOptions, type SessionInfo } from './server/server.js';
export { Dispatcher, type DispatchContext, type DispatcherOptions } from './server/dispatcher.js';
export {
  TerminalError,
  BRIDGE_OPERATIONS,
  createHandlers,
  createTerminalBreaker,
  chunkSymbols,
  isTerminalCapability,
  type TerminalCapability,
  type Handler,
  type HandlerMap,
  type HandlerContext,
} from './server/handlers.js';
export { HealthMonitor } from './server/health.js';
export { CircuitBreaker, type CircuitBreakerConfig, type CircuitState } from './server/circuit-breaker.js';
export { TokenBucket } from './server/rate-limiter.js';
export { WorkerPool } from './server/worker-pool.js';

// ============================================================================
// Contract & Models
// ============================================================================

export {
  CONTRACT_VERSION,
  SYMBOL_CHUNK_SIZE,
  OPERATION_NAMES,
  Timestamp,
  contract,
  getOperation,
  isOperationName,
  listParameters,
  type OperationName,
  type OperationDescriptor,
  type OperationMap,
  type Params,
  type ParamsInput,
  type Result,
  type ParameterInfo,
  type ResponseShape,
  type SymbolChunks,
} from './bridge/contract.js';

export * from './bridge/models.js';

// ============================================================================
// Wire Format
// ============================================================================

export {
  NumericArray,
  DTYPES,
  encode,
  decode,
  toWireValue,
  toWireRecord,
  type DType,
  type TypedArray,
  type WireValue,
  type WireRecord,
} from './bridge/codec.js';

export {
  encodeEnvelope,
  decodeEnvelope,
  safeDecodeEnvelope,
  validateEnvelope,
  type Envelope,
  type RequestEnvelope,
  type ResponseEnvelope,
  type ErrorDescriptor,
} from './bridge/protocol.js';

export { createRequest, createSuccessResponse, createErrorResponse, INTERNAL_ERROR_CODE, INVALID_PARAMS_CODE, CIRCUIT_OPEN_CODE } from './bridge/messages.js';

// ============================================================================
// Transport Layer
// ============================================================================

export {
  ConnectionState,
  WebSocketTransport,
  createTransport,
  type Transport,
  type ConnectionConfig,
  type TransportType,
} from './transport/index.js';

// ============================================================================
// Utilities
// ============================================================================

export * from './utils/index.js';
