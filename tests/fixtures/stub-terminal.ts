/**
 * A terminal capability backed by canned data, for tests
 */

import { NumericArray } from '../../src/bridge/codec.js';
import type { Deal, Order, Position, SymbolInfo } from '../../src/bridge/models.js';
import { TerminalError, type TerminalCapability } from '../../src/server/handlers.js';

export const ACCOUNT_LOGIN = 12345678;
export const BAR_SECONDS = 60;

/** Retcode the stub reports for a non-positive volume */
export const INVALID_VOLUME = 10014;

export function makeSymbols(count: number): SymbolInfo[] {
  return Array.from({ length: count }, (_, i) => ({
    name: `SYM${String(i).padStart(4, '0')}`,
    visible: i % 2 === 0,
    digits: 5,
    bid: 1.1,
    ask: 1.1002,
  }));
}

/**
 * `count` one-minute bars from `start`: row i is
 * [start + 60i, 1.1, 1.2, 1.0, 1.15, 100 + i, 2, 0]
 */
export function makeRates(count: number, start: number): NumericArray {
  const rows = Math.max(0, count);
  const data = new Float64Array(rows * 8);
  for (let i = 0; i < rows; i++) {
    data.set([start + i * BAR_SECONDS, 1.1, 1.2, 1.0, 1.15, 100 + i, 2, 0], i * 8);
  }
  return new NumericArray(data, [rows, 8]);
}

/**
 * `count` ticks one second apart from `start`: row i is
 * [start + i, 1.1, 1.1002, 0, 0, (start + i) * 1000, 6, 0]
 */
export function makeTicks(count: number, start: number): NumericArray {
  const rows = Math.max(0, count);
  const data = new Float64Array(rows * 8);
  for (let i = 0; i < rows; i++) {
    data.set([start + i, 1.1, 1.1002, 0, 0, (start + i) * 1000, 6, 0], i * 8);
  }
  return new NumericArray(data, [rows, 8]);
}

const POSITIONS: Position[] = [
  { ticket: 501, type: 0, volume: 0.1, price_open: 1.1, symbol: 'SYM0000', profit: 12.5 },
  { ticket: 502, type: 1, volume: 0.2, price_open: 1.3, symbol: 'SYM0001', profit: -3 },
];

const HISTORY_ORDERS: Order[] = [
  { ticket: 401, type: 0, symbol: 'SYM0000', state: 4 },
  { ticket: 402, type: 1, symbol: 'SYM0001', state: 4 },
];

const DEALS: Deal[] = [
  { ticket: 301, order: 401, type: 0, symbol: 'SYM0000', volume: 0.1, price: 1.1 },
  { ticket: 302, order: 402, type: 1, symbol: 'SYM0001', volume: 0.2, price: 1.3 },
];

function checkVolume(volume: number | undefined): void {
  if (volume !== undefined && volume <= 0) {
    throw new TerminalError(INVALID_VOLUME, 'Invalid volume in the request');
  }
}

export interface StubTerminalOptions {
  symbols?: number;
}

export function createStubTerminal(
  overrides: Partial<TerminalCapability> = {},
  options: StubTerminalOptions = {}
): TerminalCapability {
  const symbols = makeSymbols(options.symbols ?? 3);
  const known = (name: string) => symbols.some((symbol) => symbol.name === name);

  const terminal: TerminalCapability = {
    initialize: () => true,
    login: ({ login }) => {
      if (login !== ACCOUNT_LOGIN) {
        throw new TerminalError(-6, 'Authorization failed');
      }
      return true;
    },
    shutdown: () => null,
    version: () => ({ major: 500, minor: 4000, build: 4000, release_date: '1 Jan 2026' }),
    lastError: () => ({ code: 1, message: 'Success' }),
    getConstants: () => ({ TIMEFRAME_M1: 1, TIMEFRAME_H1: 16385, ORDER_TYPE_BUY: 0, ORDER_TYPE_SELL: 1 }),

    terminalInfo: () => ({ connected: true, trade_allowed: true, build: 4000, name: 'Test Terminal' }),
    accountInfo: () => ({ login: ACCOUNT_LOGIN, balance: 1000, equity: 1000, currency: 'USD', leverage: 100 }),

    symbolsTotal: () => symbols.length,
    symbolsGet: ({ group }) => {
      if (group === undefined) {
        return symbols;
      }
      const prefix = group.replace(/\*$/, '');
      return symbols.filter((symbol) => symbol.name.startsWith(prefix));
    },
    symbolInfo: ({ symbol }) => symbols.find((candidate) => candidate.name === symbol) ?? null,
    symbolInfoTick: ({ symbol }) => (known(symbol) ? { time: 1704067200, bid: 1.1, ask: 1.1002 } : null),
    symbolSelect: ({ symbol }) => known(symbol),

    copyRatesFrom: ({ dateFrom, count }) => makeRates(count, dateFrom),
    copyRatesFromPos: ({ startPos, count }) => makeRates(count, 1704067200 + startPos * BAR_SECONDS),
    copyRatesRange: ({ dateFrom, dateTo }) => makeRates(Math.floor((dateTo - dateFrom) / BAR_SECONDS), dateFrom),
    copyTicksFrom: ({ dateFrom, count }) => makeTicks(count, dateFrom),
    copyTicksRange: ({ dateFrom, dateTo }) => makeTicks(dateTo - dateFrom, dateFrom),

    orderCalcMargin: ({ volume }) => volume * 1000,
    orderCalcProfit: ({ volume, priceOpen, priceClose }) => (priceClose - priceOpen) * volume * 100000,
    orderCheck: ({ request }) => {
      checkVolume(request.volume);
      return { retcode: 0, balance: 1000, equity: 1000, margin: 100, comment: 'Done', request };
    },
    orderSend: ({ request }) => {
      checkVolume(request.volume);
      return {
        retcode: 10009,
        deal: 1001,
        order: 2001,
        volume: request.volume,
        price: request.price,
        comment: 'Request executed',
        request,
      };
    },

    positionsTotal: () => POSITIONS.length,
    positionsGet: ({ symbol, ticket }) =>
      POSITIONS.filter(
        (position) =>
          (symbol === undefined || position.symbol === symbol) && (ticket === undefined || position.ticket === ticket)
      ),
    ordersTotal: () => 0,
    ordersGet: () => [],

    historyOrdersTotal: () => HISTORY_ORDERS.length,
    historyOrdersGet: () => HISTORY_ORDERS,
    historyDealsTotal: () => DEALS.length,
    historyDealsGet: () => DEALS,

    marketBookAdd: ({ symbol }) => known(symbol),
    marketBookGet: ({ symbol }) =>
      known(symbol)
        ? [
            { type: 1, price: 1.1002, volume: 10 },
            { type: 2, price: 1.1, volume: 5 },
          ]
        : null,
    marketBookRelease: ({ symbol }) => known(symbol),
  };

  return { ...terminal, ...overrides };
}
