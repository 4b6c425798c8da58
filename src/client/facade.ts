/**
 * Operation surface shared by the synchronous and asynchronous clients
 */

import type { z } from 'zod';
import { toWireRecord } from '../bridge/codec.js';
import { contract, type OperationName, type ParamsInput, type Result } from '../bridge/contract.js';
import type { SymbolInfo, TradeRequestSchema } from '../bridge/models.js';
import { Session, type CallOptions } from '../bridge/session.js';
import type { ConnectionState, Transport } from '../transport/interface.js';
import { DEFAULT_CONFIG } from '../utils/config.js';
import { InvalidParamsError, MalformedPayloadError } from '../utils/errors.js';

/**
 * Options for creating a client
 */
export interface ClientOptions {
  /** Full WebSocket URL; overrides host and port */
  url?: string;
  host?: string;
  port?: number;
  /** Default call timeout in milliseconds */
  timeout?: number;
  reconnect?: boolean;
  reconnectInterval?: number;
  maxReconnectAttempts?: number;
  /** Largest incoming frame accepted, in bytes */
  maxPayload?: number;
  /** Transport to use instead of a fresh WebSocketTransport */
  transport?: Transport;
}

export type TradeRequestInput = z.input<typeof TradeRequestSchema>;


function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  const where = issue.path.join('.');
  return where ? `${where}: ${issue.message}` : issue.message;
}

/**
 * One method per contract operation. Subclasses decide how calls reach the
 * session by implementing invoke().
 */
export abstract class OperationFacade<O extends { timeout?: number }> {
  protected readonly session: Session;
  protected readonly options: ClientOptions;

  constructor(options: ClientOptions = {}) {
    this.options = options;
    this.session = new Session({
      transport: options.transport,
      timeout: options.timeout ?? DEFAULT_CONFIG.client.timeout,
    });
  }

  /**
   * Connect to the bridge server
   * @throws ConnectionError on network failure
   */
  async connect(): Promise<void> {
    const defaults = DEFAULT_CONFIG.client;
    await this.session.connect({
      url: this.options.url,
      host: this.options.host ?? defaults.host,
      port: this.options.port ?? defaults.port,
      reconnect: this.options.reconnect ?? defaults.reconnect,
      reconnectInterval: this.options.reconnectInterval ?? defaults.reconnectInterval,
      maxReconnectAttempts: this.options.maxReconnectAttempts ?? defaults.maxReconnectAttempts,
      maxPayload: this.options.maxPayload,
    });
  }

  /**
   * Close the connection. Calls still pending fail with ConnectionClosedError.
   */
  close(): Promise<void> {
    return this.session.close();
  }

  isConnected(): boolean {
    return this.session.isConnected();
  }

  getState(): ConnectionState {
    return this.session.getState();
  }

  /**
   * Call any operation by name
   */
  call<K extends OperationName>(op: K, params: ParamsInput<K>, options?: O): Promise<Result<K>> {
    return this.invoke(op, params, options);
  }

  protected abstract invoke<K extends OperationName>(op: K, params: ParamsInput<K>, options?: O): Promise<Result<K>>;

  /**
   * Validate params, send, and validate the result against the contract
   */
  protected async execute<K extends OperationName>(
    op: K,
    params: ParamsInput<K>,
    options: CallOptions = {}
  ): Promise<Result<K>> {
    const descriptor = contract[op];

    const parsedParams = descriptor.params.safeParse(params);
    if (!parsedParams.success) {
      throw new InvalidParamsError(op, describeIssues(parsedParams.error));
    }

    const raw = await this.session.call(op, toWireRecord(parsedParams.data), options);

    const parsedResult = descriptor.result.safeParse(raw);
    if (!parsedResult.success) {
      throw MalformedPayloadError.invalid(`unexpected result for '${op}': ${describeIssues(parsedResult.error)}`, {
        operation: op,
      });
    }
    return parsedResult.data;
  }

  // ==========================================================================
  // Bridge
  // ==========================================================================

  healthCheck(options?: O): Promise<Result<'healthCheck'>> {
    return this.invoke('healthCheck', {}, options);
  }

  /**
   * Close the server's circuit breaker and clear its last error
   */
  resetCircuitBreaker(options?: O): Promise<boolean> {
    return this.invoke('resetCircuitBreaker', {}, options);
  }

  // ==========================================================================
  // Terminal lifecycle
  // ==========================================================================

  initialize(params: ParamsInput<'initialize'> = {}, options?: O): Promise<boolean> {
    return this.invoke('initialize', params, options);
  }

  login(params: ParamsInput<'login'>, options?: O): Promise<boolean> {
    return this.invoke('login', params, options);
  }

  shutdown(options?: O): Promise<null> {
    return this.invoke('shutdown', {}, options);
  }

  version(options?: O): Promise<Result<'version'>> {
    return this.invoke('version', {}, options);
  }

  lastError(options?: O): Promise<Result<'lastError'>> {
    return this.invoke('lastError', {}, options);
  }

  getConstants(options?: O): Promise<Record<string, number>> {
    return this.invoke('getConstants', {}, options);
  }

  // ==========================================================================
  // Account and terminal
  // ==========================================================================

  terminalInfo(options?: O): Promise<Result<'terminalInfo'>> {
    return this.invoke('terminalInfo', {}, options);
  }

  accountInfo(options?: O): Promise<Result<'accountInfo'>> {
    return this.invoke('accountInfo', {}, options);
  }

  // ==========================================================================
  // Symbols
  // ==========================================================================

  symbolsTotal(options?: O): Promise<number> {
    return this.invoke('symbolsTotal', {}, options);
  }

  /**
   * All symbols, reassembled from the chunks the server sends
   */
  async symbolsGet(group?: string, options?: O): Promise<SymbolInfo[] | null> {
    const chunked = await this.invoke('symbolsGet', { group }, options);
    return chunked ? chunked.chunks.flat() : null;
  }

  symbolInfo(symbol: string, options?: O): Promise<Result<'symbolInfo'>> {
    return this.invoke('symbolInfo', { symbol }, options);
  }

  symbolInfoTick(symbol: string, options?: O): Promise<Result<'symbolInfoTick'>> {
    return this.invoke('symbolInfoTick', { symbol }, options);
  }

  symbolSelect(symbol: string, enable?: boolean, options?: O): Promise<boolean> {
    return this.invoke('symbolSelect', { symbol, enable }, options);
  }

  // ==========================================================================
  // Market data
  // ==========================================================================

  /**
   * Bars as a float64 array of shape [n, 8], columns as in RATE_FIELDS
   */
  copyRatesFrom(params: ParamsInput<'copyRatesFrom'>, options?: O): Promise<Result<'copyRatesFrom'>> {
    return this.invoke('copyRatesFrom', params, options);
  }

  copyRatesFromPos(params: ParamsInput<'copyRatesFromPos'>, options?: O): Promise<Result<'copyRatesFromPos'>> {
    return this.invoke('copyRatesFromPos', params, options);
  }

  copyRatesRange(params: ParamsInput<'copyRatesRange'>, options?: O): Promise<Result<'copyRatesRange'>> {
    return this.invoke('copyRatesRange', params, options);
  }

  /**
   * Ticks as a float64 array of shape [n, 8], columns as in TICK_FIELDS
   */
  copyTicksFrom(params: ParamsInput<'copyTicksFrom'>, options?: O): Promise<Result<'copyTicksFrom'>> {
    return this.invoke('copyTicksFrom', params, options);
  }

  copyTicksRange(params: ParamsInput<'copyTicksRange'>, options?: O): Promise<Result<'copyTicksRange'>> {
    return this.invoke('copyTicksRange', params, options);
  }

  // ==========================================================================
  // Trading
  // ==========================================================================

  orderCalcMargin(params: ParamsInput<'orderCalcMargin'>, options?: O): Promise<number | null> {
    return this.invoke('orderCalcMargin', params, options);
  }

  orderCalcProfit(params: ParamsInput<'orderCalcProfit'>, options?: O): Promise<number | null> {
    return this.invoke('orderCalcProfit', params, options);
  }

  orderCheck(request: TradeRequestInput, options?: O): Promise<Result<'orderCheck'>> {
    return this.invoke('orderCheck', { request }, options);
  }

  orderSend(request: TradeRequestInput, options?: O): Promise<Result<'orderSend'>> {
    return this.invoke('orderSend', { request }, options);
  }

  // ==========================================================================
  // Positions and orders
  // ==========================================================================

  positionsTotal(options?: O): Promise<number> {
    return this.invoke('positionsTotal', {}, options);
  }

  positionsGet(filter: ParamsInput<'positionsGet'> = {}, options?: O): Promise<Result<'positionsGet'>> {
    return this.invoke('positionsGet', filter, options);
  }

  ordersTotal(options?: O): Promise<number> {
    return this.invoke('ordersTotal', {}, options);
  }

  ordersGet(filter: ParamsInput<'ordersGet'> = {}, options?: O): Promise<Result<'ordersGet'>> {
    return this.invoke('ordersGet', filter, options);
  }

  // ==========================================================================
  // History
  // ==========================================================================

  historyOrdersTotal(params: ParamsInput<'historyOrdersTotal'>, options?: O): Promise<number | null> {
    return this.invoke('historyOrdersTotal', params, options);
  }

  historyOrdersGet(filter: ParamsInput<'historyOrdersGet'> = {}, options?: O): Promise<Result<'historyOrdersGet'>> {
    return this.invoke('historyOrdersGet', filter, options);
  }

  historyDealsTotal(params: ParamsInput<'historyDealsTotal'>, options?: O): Promise<number | null> {
    return this.invoke('historyDealsTotal', params, options);
  }

  historyDealsGet(filter: ParamsInput<'historyDealsGet'> = {}, options?: O): Promise<Result<'historyDealsGet'>> {
    return this.invoke('historyDealsGet', filter, options);
  }

  // ==========================================================================
  // Market depth
  // ==========================================================================

  marketBookAdd(symbol: string, options?: O): Promise<boolean> {
    return this.invoke('marketBookAdd', { symbol }, options);
  }

  marketBookGet(symbol: string, options?: O): Promise<Result<'marketBookGet'>> {
    return this.invoke('marketBookGet', { symbol }, options);
  }

  marketBookRelease(symbol: string, options?: O): Promise<boolean> {
    return this.invoke('marketBookRelease', { symbol }, options);
  }
}
