/**
 * Operation handlers and the terminal capability they delegate to
 */

import { OPERATION_NAMES, SYMBOL_CHUNK_SIZE, type OperationName, type Params, type Result, type SymbolChunks } from '../bridge/contract.js';
import type { SymbolInfo } from '../bridge/models.js';
import type { Logger } from '../utils/logger.js';
import { CircuitBreaker, type CircuitBreakerConfig } from './circuit-breaker.js';
import type { HealthMonitor } from './health.js';

type MaybePromise<T> = T | Promise<T>;

/**
 * A domain failure reported by the terminal. Travels to the caller as a
 * RemoteOperationError carrying the same code and message.
 */
export class TerminalError extends Error {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = 'TerminalError';
    this.code = code;
  }
}

/**
 * True for any thrown value carrying an integer terminal error code
 */
export function isTerminalFailure(error: unknown): error is Error & { code: number } {
  return error instanceof Error && 'code' in error && typeof error.code === 'number' && Number.isInteger(error.code);
}

/** Operations the bridge answers itself, without the terminal */
export const BRIDGE_OPERATIONS = ['healthCheck', 'resetCircuitBreaker'] as const;

type BridgeOperation = typeof BRIDGE_OPERATIONS[number];

function isBridgeOperation(name: OperationName): name is BridgeOperation {
  return BRIDGE_OPERATIONS.some((bridgeOp) => bridgeOp === name);
}

type DirectOperation = Exclude<OperationName, BridgeOperation | 'symbolsGet'>;

/**
 * The external terminal, one method per operation. Methods receive params with
 * defaults applied and dates as Unix seconds.
 */
export type TerminalCapability = {
  [K in DirectOperation]: (params: Params<K>) => MaybePromise<Result<K>>;
} & {
  /** The full symbol list; the bridge splits it into chunks for the wire */
  symbolsGet(params: Params<'symbolsGet'>): MaybePromise<SymbolInfo[] | null>;
};

/** Methods a terminal capability must provide */
export const TERMINAL_METHODS: readonly OperationName[] = OPERATION_NAMES.filter((name) => !isBridgeOperation(name));

/**
 * Check that a loaded value implements every terminal method
 */
export function isTerminalCapability(value: unknown): value is TerminalCapability {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return missingTerminalMethods(value).length === 0;
}

/**
 * Terminal methods a loaded value lacks
 */
export function missingTerminalMethods(value: object): OperationName[] {
  return TERMINAL_METHODS.filter((name) => typeof Reflect.get(value, name) !== 'function');
}

export interface HandlerContext {
  sessionId: string;
  logger: Logger;
}

export type Handler<K extends OperationName> = (params: Params<K>, context: HandlerContext) => MaybePromise<Result<K>>;

export type HandlerMap = {
  [K in OperationName]: Handler<K>;
};

/**
 * Split a symbol list into chunks of at most `size`
 */
export function chunkSymbols(symbols: SymbolInfo[], size: number = SYMBOL_CHUNK_SIZE): SymbolChunks {
  const chunks: SymbolInfo[][] = [];
  for (let start = 0; start < symbols.length; start += size) {
    chunks.push(symbols.slice(start, start + size));
  }
  return { total: symbols.length, chunks };
}

/**
 * A circuit breaker that counts only faults against the terminal. Domain
 * failures (a TerminalError, or any error with an integer code) are answers,
 * not faults.
 */
export function createTerminalBreaker(config: Partial<Omit<CircuitBreakerConfig, 'isFailure'>> = {}): CircuitBreaker {
  return new CircuitBreaker({ ...config, isFailure: (error) => !isTerminalFailure(error) });
}

/**
 * Build one handler per operation over a terminal capability. Every terminal
 * call goes through `breaker`.
 */
export function createHandlers(
  terminal: TerminalCapability,
  health: HealthMonitor,
  breaker: CircuitBreaker = createTerminalBreaker()
): HandlerMap {
  const guard = <T>(op: OperationName, call: () => MaybePromise<T>): Promise<T> => breaker.run(op, call);

  return {
    healthCheck: () => health.getStatus(breaker.state),
    resetCircuitBreaker: (_params, context) => {
      breaker.reset();
      health.clearError();
      context.logger.info('Circuit breaker reset');
      return true;
    },

    initialize: (params) => guard('initialize', () => terminal.initialize(params)),
    login: (params) => guard('login', () => terminal.login(params)),
    shutdown: (params) => guard('shutdown', () => terminal.shutdown(params)),
    version: (params) => guard('version', () => terminal.version(params)),
    lastError: (params) => guard('lastError', () => terminal.lastError(params)),
    getConstants: (params) => guard('getConstants', () => terminal.getConstants(params)),

    terminalInfo: (params) => guard('terminalInfo', () => terminal.terminalInfo(params)),
    accountInfo: (params) => guard('accountInfo', () => terminal.accountInfo(params)),

    symbolsTotal: (params) => guard('symbolsTotal', () => terminal.symbolsTotal(params)),
    symbolsGet: async (params, context) => {
      const symbols = await guard('symbolsGet', () => terminal.symbolsGet(params));
      if (symbols === null) {
        return null;
      }
      const chunked = chunkSymbols(symbols);
      context.logger.debug({ total: chunked.total, chunks: chunked.chunks.length }, 'Symbols chunked');
      return chunked;
    },
    symbolInfo: (params) => guard('symbolInfo', () => terminal.symbolInfo(params)),
    symbolInfoTick: (params) => guard('symbolInfoTick', () => terminal.symbolInfoTick(params)),
    symbolSelect: (params) => guard('symbolSelect', () => terminal.symbolSelect(params)),

    copyRatesFrom: (params) => guard('copyRatesFrom', () => terminal.copyRatesFrom(params)),
    copyRatesFromPos: (params) => guard('copyRatesFromPos', () => terminal.copyRatesFromPos(params)),
    copyRatesRange: (params) => guard('copyRatesRange', () => terminal.copyRatesRange(params)),
    copyTicksFrom: (params) => guard('copyTicksFrom', () => terminal.copyTicksFrom(params)),
    copyTicksRange: (params) => guard('copyTicksRange', () => terminal.copyTicksRange(params)),

    orderCalcMargin: (params) => guard('orderCalcMargin', () => terminal.orderCalcMargin(params)),
    orderCalcProfit: (params) => guard('orderCalcProfit', () => terminal.orderCalcProfit(params)),
    orderCheck: (params) => guard('orderCheck', () => terminal.orderCheck(params)),
    orderSend: (params) => guard('orderSend', () => terminal.orderSend(params)),

    positionsTotal: (params) => guard('positionsTotal', () => terminal.positionsTotal(params)),
    positionsGet: (params) => guard('positionsGet', () => terminal.positionsGet(params)),
    ordersTotal: (params) => guard('ordersTotal', () => terminal.ordersTotal(params)),
    ordersGet: (params) => guard('ordersGet', () => terminal.ordersGet(params)),

    historyOrdersTotal: (params) => guard('historyOrdersTotal', () => terminal.historyOrdersTotal(params)),
    historyOrdersGet: (params) => guard('historyOrdersGet', () => terminal.historyOrdersGet(params)),
    historyDealsTotal: (params) => guard('historyDealsTotal', () => terminal.historyDealsTotal(params)),
    historyDealsGet: (params) => guard('historyDealsGet', () => terminal.historyDealsGet(params)),

    marketBookAdd: (params) => guard('marketBookAdd', () => terminal.marketBookAdd(params)),
    marketBookGet: (params) => guard('marketBookGet', () => terminal.marketBookGet(params)),
    marketBookRelease: (params) => guard('marketBookRelease', () => terminal.marketBookRelease(params)),
  };
}
