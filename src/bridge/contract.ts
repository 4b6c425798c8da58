/**
 * Service contract for the terminal bridge
 *
 * The single catalog of operations shared by both client facades and the
 * server dispatcher. Each descriptor carries a zod schema for its params (with
 * defaults, applied before sending) and one for its result (checked on both
 * sides of the wire).
 */

import { z } from 'zod';
import { NumericArray } from './codec.js';
import {
  AccountInfoSchema,
  BookEntrySchema,
  DealSchema,
  HealthStatusSchema,
  LastErrorSchema,
  OrderCheckResultSchema,
  OrderSchema,
  PositionSchema,
  RATE_FIELDS,
  SymbolInfoSchema,
  TerminalInfoSchema,
  TICK_FIELDS,
  TickSchema,
  TradeRequestSchema,
  TradeResultSchema,
  VersionInfoSchema,
} from './models.js';

/**
 * Sent with every envelope. Peers on different versions reject each other's frames.
 */
export const CONTRACT_VERSION = 1;

/**
 * Number of symbols per chunk in a symbolsGet response
 */
export const SYMBOL_CHUNK_SIZE = 500;

export type ResponseShape = 'scalar' | 'record' | 'records' | 'array' | 'chunked';

/**
 * One operation of the contract
 *
 * `I` is what callers may pass, `P` what handlers receive after defaults and
 * conversions, `R` the result.
 */
export interface OperationDescriptor<I = unknown, P = unknown, R = unknown> {
  readonly name: string;
  readonly description: string;
  readonly shape: ResponseShape;
  readonly params: z.ZodType<P, z.ZodTypeDef, I>;
  readonly result: z.ZodType<R, z.ZodTypeDef, unknown>;
}

// ============================================================================
// Parameter Types
// ============================================================================

/**
 * A point in time, given as a Date or as Unix seconds; always sent as Unix seconds
 */
export const Timestamp = z
  .union([z.date(), z.number().int()])
  .transform((value) => (value instanceof Date ? Math.floor(value.getTime() / 1000) : value))
  .describe('timestamp');

const NoParams = z.object({});

function rowArray(fields: readonly string[]) {
  return z
    .instanceof(NumericArray)
    .refine((array) => array.dtype === 'float64' && array.rank === 2 && array.shape[1] === fields.length, {
      message: `Expected a float64 array of shape [n, ${fields.length}]`,
    });
}

const RateArray = rowArray(RATE_FIELDS);
const TickArray = rowArray(TICK_FIELDS);

const OrderFilter = z.object({
  symbol: z.string().optional(),
  group: z.string().optional(),
  ticket: z.number().int().optional(),
});

const HistoryFilter = z.object({
  dateFrom: Timestamp.optional(),
  dateTo: Timestamp.optional(),
  group: z.string().optional(),
  ticket: z.number().int().optional(),
  position: z.number().int().optional(),
});

const DateRange = z.object({
  dateFrom: Timestamp,
  dateTo: Timestamp,
});

const SymbolParam = z.object({ symbol: z.string() });

export const SymbolChunksSchema = z.object({
  total: z.number().int().nonnegative(),
  chunks: z.array(z.array(SymbolInfoSchema)),
});

export type SymbolChunks = z.infer<typeof SymbolChunksSchema>;

function operation<P extends z.AnyZodObject, R extends z.ZodTypeAny>(
  name: string,
  shape: ResponseShape,
  description: string,
  params: P,
  result: R
) {
  return { name, shape, description, params, result };
}

// ============================================================================
// Operations
// ============================================================================

const operations = {
  healthCheck: operation('healthCheck', 'record', 'Report bridge server health', NoParams, HealthStatusSchema),
  resetCircuitBreaker: operation(
    'resetCircuitBreaker',
    'scalar',
    'Close the circuit breaker and clear the last error',
    NoParams,
    z.boolean()
  ),

  // Terminal lifecycle
  initialize: operation(
    'initialize',
    'scalar',
    'Start the terminal and optionally log in',
    z.object({
      path: z.string().optional(),
      login: z.number().int().optional(),
      password: z.string().optional(),
      server: z.string().optional(),
      timeout: z.number().int().optional(),
      portable: z.boolean().default(false),
    }),
    z.boolean()
  ),
  login: operation(
    'login',
    'scalar',
    'Log in to a trading account',
    z.object({
      login: z.number().int(),
      password: z.string(),
      server: z.string(),
      timeout: z.number().int().default(60000),
    }),
    z.boolean()
  ),
  shutdown: operation('shutdown', 'scalar', 'Close the terminal connection', NoParams, z.null()),
  version: operation('version', 'record', 'Terminal version', NoParams, VersionInfoSchema.nullable()),
  lastError: operation('lastError', 'record', 'Last terminal error', NoParams, LastErrorSchema),
  getConstants: operation('getConstants', 'record', 'Terminal constants by name', NoParams, z.record(z.number().int())),

  // Account and terminal
  terminalInfo: operation('terminalInfo', 'record', 'Terminal status and settings', NoParams, TerminalInfoSchema.nullable()),
  accountInfo: operation('accountInfo', 'record', 'Current trading account', NoParams, AccountInfoSchema.nullable()),

  // Symbols
  symbolsTotal: operation('symbolsTotal', 'scalar', 'Number of available symbols', NoParams, z.number().int()),
  symbolsGet: operation(
    'symbolsGet',
    'chunked',
    'All symbols, optionally filtered by group',
    z.object({ group: z.string().optional() }),
    SymbolChunksSchema.nullable()
  ),
  symbolInfo: operation('symbolInfo', 'record', 'Symbol properties', SymbolParam, SymbolInfoSchema.nullable()),
  symbolInfoTick: operation('symbolInfoTick', 'record', 'Last tick of a symbol', SymbolParam, TickSchema.nullable()),
  symbolSelect: operation(
    'symbolSelect',
    'scalar',
    'Show or hide a symbol in Market Watch',
    z.object({ symbol: z.string(), enable: z.boolean().default(true) }),
    z.boolean()
  ),

  // Market data
  copyRatesFrom: operation(
    'copyRatesFrom',
    'array',
    'Bars from a date',
    z.object({ symbol: z.string(), timeframe: z.number().int(), dateFrom: Timestamp, count: z.number().int() }),
    RateArray.nullable()
  ),
  copyRatesFromPos: operation(
    'copyRatesFromPos',
    'array',
    'Bars from a bar index',
    z.object({ symbol: z.string(), timeframe: z.number().int(), startPos: z.number().int(), count: z.number().int() }),
    RateArray.nullable()
  ),
  copyRatesRange: operation(
    'copyRatesRange',
    'array',
    'Bars within a date range',
    z.object({ symbol: z.string(), timeframe: z.number().int(), dateFrom: Timestamp, dateTo: Timestamp }),
    RateArray.nullable()
  ),
  copyTicksFrom: operation(
    'copyTicksFrom',
    'array',
    'Ticks from a date',
    z.object({ symbol: z.string(), dateFrom: Timestamp, count: z.number().int(), flags: z.number().int() }),
    TickArray.nullable()
  ),
  copyTicksRange: operation(
    'copyTicksRange',
    'array',
    'Ticks within a date range',
    z.object({ symbol: z.string(), dateFrom: Timestamp, dateTo: Timestamp, flags: z.number().int() }),
    TickArray.nullable()
  ),

  // Trading
  orderCalcMargin: operation(
    'orderCalcMargin',
    'scalar',
    'Margin required for an order',
    z.object({ action: z.number().int(), symbol: z.string(), volume: z.number(), price: z.number() }),
    z.number().nullable()
  ),
  orderCalcProfit: operation(
    'orderCalcProfit',
    'scalar',
    'Profit of a position between two prices',
    z.object({
      action: z.number().int(),
      symbol: z.string(),
      volume: z.number(),
      priceOpen: z.number(),
      priceClose: z.number(),
    }),
    z.number().nullable()
  ),
  orderCheck: operation(
    'orderCheck',
    'record',
    'Check funds for a trade request',
    z.object({ request: TradeRequestSchema }),
    OrderCheckResultSchema.nullable()
  ),
  orderSend: operation(
    'orderSend',
    'record',
    'Send a trade request',
    z.object({ request: TradeRequestSchema }),
    TradeResultSchema.nullable()
  ),

  // Positions and orders
  positionsTotal: operation('positionsTotal', 'scalar', 'Number of open positions', NoParams, z.number().int()),
  positionsGet: operation('positionsGet', 'records', 'Open positions', OrderFilter, z.array(PositionSchema).nullable()),
  ordersTotal: operation('ordersTotal', 'scalar', 'Number of pending orders', NoParams, z.number().int()),
  ordersGet: operation('ordersGet', 'records', 'Pending orders', OrderFilter, z.array(OrderSchema).nullable()),

  // History
  historyOrdersTotal: operation(
    'historyOrdersTotal',
    'scalar',
    'Number of orders in history within a date range',
    DateRange,
    z.number().int().nullable()
  ),
  historyOrdersGet: operation(
    'historyOrdersGet',
    'records',
    'Orders in history',
    HistoryFilter,
    z.array(OrderSchema).nullable()
  ),
  historyDealsTotal: operation(
    'historyDealsTotal',
    'scalar',
    'Number of deals in history within a date range',
    DateRange,
    z.number().int().nullable()
  ),
  historyDealsGet: operation(
    'historyDealsGet',
    'records',
    'Deals in history',
    HistoryFilter,
    z.array(DealSchema).nullable()
  ),

  // Market depth
  marketBookAdd: operation('marketBookAdd', 'scalar', 'Subscribe to market depth', SymbolParam, z.boolean()),
  marketBookGet: operation(
    'marketBookGet',
    'records',
    'Market depth entries',
    SymbolParam,
    z.array(BookEntrySchema).nullable()
  ),
  marketBookRelease: operation('marketBookRelease', 'scalar', 'Unsubscribe from market depth', SymbolParam, z.boolean()),
};

export type OperationName = keyof typeof operations;

/** Params as callers pass them */
export type ParamsInput<K extends OperationName> = z.input<(typeof operations)[K]['params']>;

/** Params as handlers receive them, defaults applied */
export type Params<K extends OperationName> = z.output<(typeof operations)[K]['params']>;

export type Result<K extends OperationName> = z.output<(typeof operations)[K]['result']>;

export type OperationMap = {
  [K in OperationName]: OperationDescriptor<ParamsInput<K>, Params<K>, Result<K>>;
};

export type AnyOperationDescriptor = OperationMap[OperationName];

export const contract: OperationMap = operations;

export const OPERATION_NAMES = Object.keys(operations).filter(isOperationName);

export function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(operations, name);
}

/**
 * Look an operation up by its wire name
 */
export function getOperation(name: string): AnyOperationDescriptor | undefined {
  return isOperationName(name) ? contract[name] : undefined;
}

// ============================================================================
// Parameter Introspection
// ============================================================================

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'timestamp' | 'record' | 'unknown';

export interface ParameterInfo {
  name: string;
  type: ParameterType;
  required: boolean;
  default?: unknown;
}

function describeParameter(name: string, schema: z.ZodTypeAny): ParameterInfo {
  let inner: z.ZodTypeAny = schema;
  let required = true;
  let defaultValue: unknown;

  if (inner instanceof z.ZodDefault) {
    required = false;
    defaultValue = inner._def.defaultValue();
    inner = inner.removeDefault();
  }
  if (inner instanceof z.ZodOptional) {
    required = false;
    inner = inner.unwrap();
  }

  let type: ParameterType = 'unknown';
  if (inner.description === 'timestamp') type = 'timestamp';
  else if (inner instanceof z.ZodString) type = 'string';
  else if (inner instanceof z.ZodNumber) type = inner.isInt ? 'integer' : 'number';
  else if (inner instanceof z.ZodBoolean) type = 'boolean';
  else if (inner instanceof z.ZodObject) type = 'record';

  return required ? { name, type, required } : { name, type, required, default: defaultValue };
}

/**
 * Ordered parameter list of an operation, as declared
 */
export function listParameters(descriptor: AnyOperationDescriptor): ParameterInfo[] {
  const schema: z.ZodTypeAny = descriptor.params;
  if (!(schema instanceof z.ZodObject)) {
    return [];
  }
  const shape: z.ZodRawShape = schema.shape;
  return Object.entries(shape).map(([name, field]) => describeParameter(name, field));
}
