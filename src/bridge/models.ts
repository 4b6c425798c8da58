/**
 * Record schemas for data the terminal returns
 *
 * Field names are the terminal's own. A record requires only the field that
 * identifies it; the rest depend on the terminal build and the account, so
 * they are optional. Every record passes unknown fields through untouched.
 */

import { z } from 'zod';

// ============================================================================
// Terminal and Account
// ============================================================================

export const VersionInfoSchema = z
  .object({
    major: z.number().int(),
    minor: z.number().int(),
    build: z.number().int(),
    release_date: z.string().optional(),
  })
  .passthrough();

export type VersionInfo = z.infer<typeof VersionInfoSchema>;

export const LastErrorSchema = z
  .object({
    code: z.number().int(),
    message: z.string(),
  })
  .passthrough();

export type LastError = z.infer<typeof LastErrorSchema>;

export const TerminalInfoSchema = z
  .object({
    connected: z.boolean().optional(),
    trade_allowed: z.boolean().optional(),
    build: z.number().int().optional(),
    name: z.string().optional(),
    company: z.string().optional(),
    path: z.string().optional(),
    data_path: z.string().optional(),
    language: z.string().optional(),
    ping_last: z.number().optional(),
  })
  .passthrough();

export type TerminalInfo = z.infer<typeof TerminalInfoSchema>;

export const AccountInfoSchema = z
  .object({
    login: z.number().int(),
    trade_mode: z.number().int().optional(),
    leverage: z.number().int().optional(),
    balance: z.number().optional(),
    credit: z.number().optional(),
    profit: z.number().optional(),
    equity: z.number().optional(),
    margin: z.number().optional(),
    margin_free: z.number().optional(),
    margin_level: z.number().optional(),
    name: z.string().optional(),
    server: z.string().optional(),
    currency: z.string().optional(),
    company: z.string().optional(),
  })
  .passthrough();

export type AccountInfo = z.infer<typeof AccountInfoSchema>;

// ============================================================================
// Symbols and Market Data
// ============================================================================

export const SymbolInfoSchema = z
  .object({
    name: z.string(),
    visible: z.boolean().optional(),
    select: z.boolean().optional(),
    bid: z.number().optional(),
    ask: z.number().optional(),
    spread: z.number().int().optional(),
    digits: z.number().int().optional(),
    point: z.number().optional(),
    trade_contract_size: z.number().optional(),
    volume_min: z.number().optional(),
    volume_max: z.number().optional(),
    volume_step: z.number().optional(),
    currency_base: z.string().optional(),
    currency_profit: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export type SymbolInfo = z.infer<typeof SymbolInfoSchema>;

export const TickSchema = z
  .object({
    time: z.number().int(),
    bid: z.number().optional(),
    ask: z.number().optional(),
    last: z.number().optional(),
    volume: z.number().optional(),
    time_msc: z.number().int().optional(),
    flags: z.number().int().optional(),
    volume_real: z.number().optional(),
  })
  .passthrough();

export type Tick = z.infer<typeof TickSchema>;

export const BookEntrySchema = z
  .object({
    type: z.number().int(),
    price: z.number(),
    volume: z.number(),
    volume_dbl: z.number().optional(),
  })
  .passthrough();

export type BookEntry = z.infer<typeof BookEntrySchema>;

/**
 * Columns of a rate bar row, in order
 */
export const RATE_FIELDS = [
  'time',
  'open',
  'high',
  'low',
  'close',
  'tick_volume',
  'spread',
  'real_volume',
] as const;

/**
 * Columns of a tick row, in order
 */
export const TICK_FIELDS = ['time', 'bid', 'ask', 'last', 'volume', 'time_msc', 'flags', 'volume_real'] as const;

export type RateField = typeof RATE_FIELDS[number];
export type TickField = typeof TICK_FIELDS[number];

// ============================================================================
// Trading
// ============================================================================

/**
 * A trade request as the terminal takes it. Only the fields every action needs
 * are required; limits such as a positive volume are the terminal's to enforce.
 */
export const TradeRequestSchema = z
  .object({
    action: z.number().int(),
    symbol: z.string().optional(),
    volume: z.number().optional(),
    price: z.number().optional(),
    stoplimit: z.number().optional(),
    sl: z.number().optional(),
    tp: z.number().optional(),
    deviation: z.number().int().optional(),
    type: z.number().int().optional(),
    type_filling: z.number().int().optional(),
    type_time: z.number().int().optional(),
    expiration: z.number().int().optional(),
    magic: z.number().int().optional(),
    order: z.number().int().optional(),
    position: z.number().int().optional(),
    position_by: z.number().int().optional(),
    comment: z.string().optional(),
  })
  .passthrough();

export type TradeRequest = z.infer<typeof TradeRequestSchema>;

export const TradeResultSchema = z
  .object({
    retcode: z.number().int(),
    deal: z.number().int().optional(),
    order: z.number().int().optional(),
    volume: z.number().optional(),
    price: z.number().optional(),
    bid: z.number().optional(),
    ask: z.number().optional(),
    comment: z.string().optional(),
    request_id: z.number().int().optional(),
    retcode_external: z.number().int().optional(),
    request: TradeRequestSchema.optional(),
  })
  .passthrough();

export type TradeResult = z.infer<typeof TradeResultSchema>;

export const OrderCheckResultSchema = z
  .object({
    retcode: z.number().int(),
    balance: z.number().optional(),
    equity: z.number().optional(),
    profit: z.number().optional(),
    margin: z.number().optional(),
    margin_free: z.number().optional(),
    margin_level: z.number().optional(),
    comment: z.string().optional(),
    request: TradeRequestSchema.optional(),
  })
  .passthrough();

export type OrderCheckResult = z.infer<typeof OrderCheckResultSchema>;

export const PositionSchema = z
  .object({
    ticket: z.number().int(),
    time: z.number().int().optional(),
    type: z.number().int().optional(),
    magic: z.number().int().optional(),
    identifier: z.number().int().optional(),
    volume: z.number().optional(),
    price_open: z.number().optional(),
    sl: z.number().optional(),
    tp: z.number().optional(),
    price_current: z.number().optional(),
    swap: z.number().optional(),
    profit: z.number().optional(),
    symbol: z.string().optional(),
    comment: z.string().optional(),
  })
  .passthrough();

export type Position = z.infer<typeof PositionSchema>;

export const OrderSchema = z
  .object({
    ticket: z.number().int(),
    time_setup: z.number().int().optional(),
    time_done: z.number().int().optional(),
    type: z.number().int().optional(),
    state: z.number().int().optional(),
    magic: z.number().int().optional(),
    position_id: z.number().int().optional(),
    volume_initial: z.number().optional(),
    volume_current: z.number().optional(),
    price_open: z.number().optional(),
    sl: z.number().optional(),
    tp: z.number().optional(),
    price_current: z.number().optional(),
    symbol: z.string().optional(),
    comment: z.string().optional(),
  })
  .passthrough();

export type Order = z.infer<typeof OrderSchema>;

export const DealSchema = z
  .object({
    ticket: z.number().int(),
    order: z.number().int().optional(),
    time: z.number().int().optional(),
    type: z.number().int().optional(),
    entry: z.number().int().optional(),
    magic: z.number().int().optional(),
    position_id: z.number().int().optional(),
    volume: z.number().optional(),
    price: z.number().optional(),
    commission: z.number().optional(),
    swap: z.number().optional(),
    profit: z.number().optional(),
    fee: z.number().optional(),
    symbol: z.string().optional(),
    comment: z.string().optional(),
  })
  .passthrough();

export type Deal = z.infer<typeof DealSchema>;

// ============================================================================
// Bridge
// ============================================================================

/**
 * Health snapshot reported by the bridge server itself
 */
export const HealthStatusSchema = z.object({
  healthy: z.boolean(),
  uptime_seconds: z.number(),
  connections_total: z.number().int(),
  connections_active: z.number().int(),
  requests_total: z.number().int(),
  requests_failed: z.number().int(),
  last_error: z.string().nullable(),
  /** State of the circuit breaker guarding terminal calls */
  circuit_state: z.enum(['closed', 'open', 'half_open']),
});

export type HealthStatus = z.infer<typeof HealthStatusSchema>;
