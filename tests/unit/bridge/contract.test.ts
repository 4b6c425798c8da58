import { describe, it, expect } from 'vitest';
import { NumericArray } from '../../../src/bridge/codec.js';
import {
  CONTRACT_VERSION,
  OPERATION_NAMES,
  SYMBOL_CHUNK_SIZE,
  Timestamp,
  contract,
  getOperation,
  isOperationName,
  listParameters,
} from '../../../src/bridge/contract.js';

describe('contract', () => {
  it('should declare version 1 and 500-symbol chunks', () => {
    expect(CONTRACT_VERSION).toBe(1);
    expect(SYMBOL_CHUNK_SIZE).toBe(500);
  });

  it('should list all 35 operations in declaration order', () => {
    expect(OPERATION_NAMES).toHaveLength(35);
    expect(OPERATION_NAMES[0]).toBe('healthCheck');
    expect(OPERATION_NAMES[OPERATION_NAMES.length - 1]).toBe('marketBookRelease');
    expect(new Set(OPERATION_NAMES).size).toBe(35);
  });

  it('should name each descriptor after its key', () => {
    for (const name of OPERATION_NAMES) {
      expect(contract[name].name).toBe(name);
    }
  });

  describe('isOperationName / getOperation', () => {
    it('should accept contract operations only', () => {
      expect(isOperationName('accountInfo')).toBe(true);
      expect(isOperationName('account_info')).toBe(false);
      expect(isOperationName('constructor')).toBe(false);
      expect(isOperationName('toString')).toBe(false);
    });

    it('should look descriptors up by name', () => {
      expect(getOperation('symbolsGet')?.shape).toBe('chunked');
      expect(getOperation('bogus')).toBeUndefined();
    });
  });

  describe('Timestamp', () => {
    it('should turn dates into Unix seconds', () => {
      expect(Timestamp.parse(new Date('2024-01-01T00:00:00Z'))).toBe(1704067200);
      expect(Timestamp.parse(new Date('2024-01-01T00:00:00.999Z'))).toBe(1704067200);
    });

    it('should pass integer seconds through', () => {
      expect(Timestamp.parse(1704067200)).toBe(1704067200);
    });

    it('should reject fractional seconds and strings', () => {
      expect(Timestamp.safeParse(1.5).success).toBe(false);
      expect(Timestamp.safeParse('2024-01-01').success).toBe(false);
    });
  });

  describe('params', () => {
    it('should apply defaults', () => {
      expect(contract.login.params.parse({ login: 1, password: 'test-secret', server: 'Demo' })).toEqual({
        login: 1,
        password: 'test-secret',
        server: 'Demo',
        timeout: 60000,
      });
      expect(contract.initialize.params.parse({})).toEqual({ portable: false });
      expect(contract.symbolSelect.params.parse({ symbol: 'EURUSD' })).toEqual({ symbol: 'EURUSD', enable: true });
    });

    it('should convert date params', () => {
      const parsed = contract.copyRatesFrom.params.parse({
        symbol: 'EURUSD',
        timeframe: 1,
        dateFrom: new Date('2024-01-02T00:00:00Z'),
        count: 10,
      });
      expect(parsed.dateFrom).toBe(1704153600);
    });

    it('should accept a trade request with only an action', () => {
      expect(contract.orderSend.params.safeParse({ request: { action: 1 } }).success).toBe(true);
    });

    it('should leave volume limits to the terminal', () => {
      expect(contract.orderSend.params.safeParse({ request: { action: 1, volume: -1 } }).success).toBe(true);
    });

    it('should reject a missing required param', () => {
      expect(contract.symbolInfo.params.safeParse({}).success).toBe(false);
    });
  });

  describe('results', () => {
    it('should accept float64 rate arrays of width 8', () => {
      const rates = new NumericArray(new Float64Array(16), [2, 8]);
      expect(contract.copyRatesFrom.result.safeParse(rates).success).toBe(true);
      expect(contract.copyRatesFrom.result.safeParse(null).success).toBe(true);
    });

    it('should reject arrays of the wrong width or dtype', () => {
      expect(contract.copyRatesFrom.result.safeParse(new NumericArray(new Float64Array(14), [2, 7])).success).toBe(false);
      expect(contract.copyTicksFrom.result.safeParse(new NumericArray(new Float32Array(8), [1, 8])).success).toBe(false);
      expect(contract.copyTicksFrom.result.safeParse(new NumericArray(new Float64Array(8))).success).toBe(false);
    });

    it('should keep fields the schema does not list', () => {
      const account = { login: 1, balance: 1000, equity: 1000, currency: 'USD', margin_so_call: 50 };
      expect(contract.accountInfo.result.parse(account)).toEqual(account);
    });

    it('should not allow a missing account to be anything but null', () => {
      expect(contract.accountInfo.result.safeParse(undefined).success).toBe(false);
    });
  });

  describe('listParameters', () => {
    it('should describe required and defaulted params', () => {
      expect(listParameters(contract.symbolSelect)).toEqual([
        { name: 'symbol', type: 'string', required: true },
        { name: 'enable', type: 'boolean', required: false, default: true },
      ]);
    });

    it('should report timestamps and integers', () => {
      expect(listParameters(contract.copyRatesFrom).map((param) => `${param.name}:${param.type}`)).toEqual([
        'symbol:string',
        'timeframe:integer',
        'dateFrom:timestamp',
        'count:integer',
      ]);
    });

    it('should report optional params without a default', () => {
      expect(listParameters(contract.historyDealsGet)[0]).toEqual({
        name: 'dateFrom',
        type: 'timestamp',
        required: false,
        default: undefined,
      });
    });

    it('should report records and plain numbers', () => {
      expect(listParameters(contract.orderCheck)).toEqual([{ name: 'request', type: 'record', required: true }]);
      expect(listParameters(contract.orderCalcMargin).map((param) => param.type)).toEqual([
        'integer',
        'string',
        'number',
        'number',
      ]);
    });

    it('should return an empty list for operations without params', () => {
      expect(listParameters(contract.accountInfo)).toEqual([]);
    });
  });
});
