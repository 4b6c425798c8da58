/**
 * Unit tests for custom error classes
 */

import { describe, it, expect } from 'vitest';
import {
  BridgeError,
  BridgeLifecycleError,
  CancelledError,
  ConfigurationError,
  ConnectionClosedError,
  ConnectionError,
  ErrorCodes,
  InvalidParamsError,
  MalformedPayloadError,
  RemoteOperationError,
  TimeoutError,
  UnknownOperationError,
  formatErrorForLogging,
  isErrorCode,
} from '../../../src/utils/errors.js';

describe('Error Classes', () => {
  describe('BridgeError', () => {
    it('should create error with message and code', () => {
      const error = new BridgeError('Test error', ErrorCodes.UNKNOWN);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe('UNKNOWN');
      expect(error.name).toBe('BridgeError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should format detailed string', () => {
      const error = new BridgeError('Test error', ErrorCodes.UNKNOWN, { key: 'value' });

      expect(error.toDetailedString()).toBe('BridgeError[UNKNOWN]: Test error\nContext: {"key":"value"}');
    });

    it('should omit the context line without context', () => {
      expect(new BridgeError('Bare', ErrorCodes.UNKNOWN).toDetailedString()).toBe('BridgeError[UNKNOWN]: Bare');
    });
  });

  describe('ConfigurationError', () => {
    it('should create error for invalid setting', () => {
      const error = ConfigurationError.invalid('server.port', 'must be an integer', 'abc');

      expect(error.message).toBe("Invalid configuration for 'server.port': must be an integer");
      expect(error.code).toBe(ErrorCodes.CONFIG_INVALID);
      expect(error.setting).toBe('server.port');
      expect(error.context).toEqual({ value: 'abc', setting: 'server.port' });
    });

    it('should create error for parse failure', () => {
      const error = ConfigurationError.parseError('/etc/bridge.yml', new Error('bad indentation'));

      expect(error.message).toBe("Failed to parse configuration file '/etc/bridge.yml': bad indentation");
      expect(error.code).toBe(ErrorCodes.CONFIG_PARSE_ERROR);
      expect(error.name).toBe('ConfigurationError');
    });
  });

  describe('ConnectionError', () => {
    it('should explain a refused connection', () => {
      const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:18812'), { code: 'ECONNREFUSED' });
      const error = ConnectionError.failed('ws://localhost:18812', cause);

      expect(error.message).toBe('Connection refused to ws://localhost:18812. Ensure the bridge server is running.');
      expect(error.code).toBe(ErrorCodes.CONNECTION_REFUSED);
      expect(error.url).toBe('ws://localhost:18812');
      expect(error.cause).toBe(cause);
    });

    it('should carry other failures through', () => {
      const error = ConnectionError.failed('ws://localhost:18812', new Error('getaddrinfo ENOTFOUND'));

      expect(error.message).toBe('Failed to connect to ws://localhost:18812: getaddrinfo ENOTFOUND');
      expect(error.code).toBe(ErrorCodes.CONNECTION_FAILED);
    });

    it('should report the session state', () => {
      expect(ConnectionError.notConnected().code).toBe(ErrorCodes.NOT_CONNECTED);
      expect(ConnectionError.alreadyConnected().code).toBe(ErrorCodes.ALREADY_CONNECTED);
    });
  });

  describe('call errors', () => {
    it('should describe a timeout', () => {
      const error = new TimeoutError('copyRatesFrom', 300000, 4);

      expect(error.message).toBe("Call to 'copyRatesFrom' timed out after 300000ms");
      expect(error.code).toBe(ErrorCodes.CALL_TIMEOUT);
      expect(error.timeoutMs).toBe(300000);
      expect(error.context).toEqual({ operation: 'copyRatesFrom', timeoutMs: 300000, correlationId: 4 });
    });

    it('should describe a cancellation', () => {
      const error = new CancelledError('orderSend', 2);

      expect(error.message).toBe("Call to 'orderSend' was cancelled");
      expect(error.code).toBe(ErrorCodes.CALL_CANCELLED);
    });

    it('should describe a closed connection with and without an operation', () => {
      expect(new ConnectionClosedError('Session closed by client', 'accountInfo').message).toBe(
        "Connection closed while 'accountInfo' was pending: Session closed by client"
      );
      expect(new ConnectionClosedError('server shutting down').message).toBe('Connection closed: server shutting down');
    });
  });

  describe('MalformedPayloadError', () => {
    it('should prefix invalid payload reasons', () => {
      const error = MalformedPayloadError.invalid('bad header');

      expect(error.message).toBe('Malformed payload: bad header');
      expect(error.code).toBe(ErrorCodes.MALFORMED_PAYLOAD);
    });

    it('should name the path of an unsupported value', () => {
      const error = MalformedPayloadError.unsupported('$.request.when', 'Date');

      expect(error.message).toBe("Cannot encode value of type 'Date' at $.request.when");
      expect(error.code).toBe(ErrorCodes.UNSUPPORTED_VALUE);
    });

    it('should report both contract versions', () => {
      const error = MalformedPayloadError.contractMismatch(1, 3);

      expect(error.message).toBe('Contract version mismatch: local 1, remote 3');
      expect(error.code).toBe(ErrorCodes.CONTRACT_MISMATCH);
    });
  });

  describe('remote errors', () => {
    it('should keep the remote code, message and kind', () => {
      const error = new RemoteOperationError('orderSend', 10014, 'Invalid volume in the request');

      expect(error.message).toBe('Invalid volume in the request');
      expect(error.remoteCode).toBe(10014);
      expect(error.remoteKind).toBe('remote');
      expect(error.code).toBe(ErrorCodes.REMOTE_OPERATION_FAILED);
    });

    it('should describe an unknown operation', () => {
      const error = new UnknownOperationError('copyRatesFromNow');

      expect(error.message).toBe("Unknown operation 'copyRatesFromNow'");
      expect(error.code).toBe(ErrorCodes.UNKNOWN_OPERATION);
    });

    it('should describe invalid params', () => {
      const error = new InvalidParamsError('login', 'login: Expected integer, received float');

      expect(error.message).toBe("Invalid params for 'login': login: Expected integer, received float");
      expect(error.code).toBe(ErrorCodes.INVALID_PARAMS);
    });
  });

  describe('BridgeLifecycleError', () => {
    it('should create already started error', () => {
      const error = BridgeLifecycleError.alreadyStarted();

      expect(error.message).toBe('Server is already started. Call stop() before starting again.');
      expect(error.code).toBe(ErrorCodes.SERVER_ALREADY_STARTED);
    });

    it('should create not started error', () => {
      expect(BridgeLifecycleError.notStarted().code).toBe(ErrorCodes.SERVER_NOT_STARTED);
    });
  });

  describe('formatErrorForLogging', () => {
    it('should format BridgeError with code and context', () => {
      const formatted = formatErrorForLogging(new UnknownOperationError('bogus'));

      expect(formatted.message).toBe("Unknown operation 'bogus'");
      expect(formatted.code).toBe(ErrorCodes.UNKNOWN_OPERATION);
      expect(formatted.context).toEqual({ operation: 'bogus' });
      expect(formatted.stack).toBeDefined();
    });

    it('should format plain errors', () => {
      const formatted = formatErrorForLogging(new Error('plain'));

      expect(formatted.message).toBe('plain');
      expect(formatted.code).toBeUndefined();
    });

    it('should format non-errors', () => {
      expect(formatErrorForLogging('string error')).toEqual({ message: 'string error' });
      expect(formatErrorForLogging(42)).toEqual({ message: '42' });
    });
  });

  describe('isErrorCode', () => {
    it('should match bridge errors by code', () => {
      expect(isErrorCode(ConnectionError.notConnected(), ErrorCodes.NOT_CONNECTED)).toBe(true);
      expect(isErrorCode(ConnectionError.notConnected(), ErrorCodes.CONNECTION_FAILED)).toBe(false);
    });

    it('should not match other values', () => {
      expect(isErrorCode(new Error('x'), ErrorCodes.UNKNOWN)).toBe(false);
      expect(isErrorCode({ code: 'UNKNOWN' }, ErrorCodes.UNKNOWN)).toBe(false);
    });
  });
});
