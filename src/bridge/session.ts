/**
 * Client session for the terminal bridge
 *
 * Owns one transport, allocates correlation ids and resolves each pending call
 * from the single reader path (the transport's message handler). Calls complete
 * in whatever order the server answers them.
 */

import type { WireRecord, WireValue } from './codec.js';
import { createRequest } from './messages.js';
import { encodeEnvelope, safeDecodeEnvelope, type ErrorDescriptor } from './protocol.js';
import { ConnectionState, type ConnectionConfig, type Transport } from '../transport/interface.js';
import { createTransport } from '../transport/index.js';
import { DEFAULT_CONFIG } from '../utils/config.js';
import {
  BridgeError,
  CancelledError,
  ConnectionClosedError,
  ConnectionError,
  InvalidParamsError,
  RemoteOperationError,
  TimeoutError,
  UnknownOperationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('session');

/** Longest delay setTimeout honours; anything above fires at once */
export const MAX_CALL_TIMEOUT = 2 ** 31 - 1;

/**
 * Per-call options
 */
export interface CallOptions {
  /**
   * Milliseconds to wait for the response, at most MAX_CALL_TIMEOUT.
   * 0 or Infinity waits forever.
   */
  timeout?: number;
  /** Abandons the call when aborted */
  signal?: AbortSignal;
}

export interface SessionOptions {
  /** Transport to drive; a WebSocketTransport when omitted */
  transport?: Transport;
  /** Default call timeout in milliseconds */
  timeout?: number;
}

interface PendingCall {
  op: string;
  resolve: (value: WireValue) => void;
  reject: (error: Error) => void;
  timeoutId: ReturnType<typeof setTimeout> | null;
  detach: () => void;
}

/**
 * Map an error descriptor from a response envelope to the error the caller sees
 */
export function toRemoteError(op: string, error: ErrorDescriptor): BridgeError {
  if (error.kind === 'unknown_operation') {
    return new UnknownOperationError(op);
  }
  return new RemoteOperationError(op, error.code, error.message, error.kind);
}

export class Session {
  private readonly transport: Transport;
  private readonly defaultTimeout: number;
  private readonly pending = new Map<number, PendingCall>();
  private state: ConnectionState = ConnectionState.DISCONNECTED;
  private nextId = 1;
  private closing: Promise<void> | null = null;

  constructor(options: SessionOptions = {}) {
    this.transport = options.transport ?? createTransport('websocket');
    this.defaultTimeout = options.timeout ?? DEFAULT_CONFIG.client.timeout;

    this.transport.onMessage((frame) => this.handleFrame(frame));
    this.transport.onDisconnect((reason) => this.handleDrop(reason));
    this.transport.onReconnect(() => {
      if (this.state === ConnectionState.RECONNECTING) {
        this.state = ConnectionState.CONNECTED;
        logger.info('Session link restored');
      }
    });
    this.transport.onError((error) => {
      logger.warn({ error: error.message }, 'Transport error');
    });
  }

  /**
   * Open the session
   * @throws ConnectionError if the transport cannot be established
   */
  async connect(config: ConnectionConfig): Promise<void> {
    if (this.getState() !== ConnectionState.DISCONNECTED) {
      throw ConnectionError.alreadyConnected();
    }

    this.state = ConnectionState.CONNECTING;
    try {
      await this.transport.connect(config);
    } catch (error) {
      if (this.state === ConnectionState.CONNECTING) {
        this.state = ConnectionState.DISCONNECTED;
      }
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(`Failed to connect: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (this.state !== ConnectionState.CONNECTING) {
      // close() ran while the transport was still opening
      await this.transport.disconnect();
      throw new ConnectionClosedError('Session closed while connecting');
    }

    this.state = ConnectionState.CONNECTED;
    logger.debug('Session connected');
  }

  /**
   * Issue one call and wait for its response
   *
   * The request is never re-sent. On timeout or abort the call is removed from
   * the pending map and a late response for it is dropped.
   */
  call(op: string, params: WireRecord, options: CallOptions = {}): Promise<WireValue> {
    if (this.getState() !== ConnectionState.CONNECTED) {
      return Promise.reject(ConnectionError.notConnected());
    }

    const signal = options.signal;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(op));
    }

    const timeout = options.timeout ?? this.defaultTimeout;
    if (Number.isNaN(timeout) || (Number.isFinite(timeout) && timeout > MAX_CALL_TIMEOUT)) {
      return Promise.reject(
        new InvalidParamsError(op, `timeout: must be at most ${MAX_CALL_TIMEOUT}ms, got ${timeout}`)
      );
    }

    const id = this.nextId++;
    let frame: Uint8Array;
    try {
      frame = encodeEnvelope(createRequest(id, op, params));
    } catch (error) {
      return Promise.reject(error);
    }

    return new Promise<WireValue>((resolve, reject) => {
      const entry: PendingCall = { op, resolve, reject, timeoutId: null, detach: () => undefined };

      if (timeout > 0 && Number.isFinite(timeout)) {
        entry.timeoutId = setTimeout(() => {
          if (this.take(id)) {
            logger.debug({ id, op, timeout }, 'Call timed out');
            reject(new TimeoutError(op, timeout, id));
          }
        }, timeout);
      }

      if (signal) {
        const onAbort = () => {
          if (this.take(id)) {
            logger.debug({ id, op }, 'Call cancelled');
            reject(new CancelledError(op, id));
          }
        };
        signal.addEventListener('abort', onAbort, { once: true });
        entry.detach = () => signal.removeEventListener('abort', onAbort);
      }

      this.pending.set(id, entry);
      logger.trace({ id, op }, 'Call sent');

      this.transport.send(frame).catch((error: unknown) => {
        const failed = this.take(id);
        if (!failed) return;
        failed.reject(
          error instanceof BridgeError
            ? error
            : new ConnectionClosedError(error instanceof Error ? error.message : String(error), op)
        );
      });
    });
  }

  /**
   * Tear the session down. Every pending call fails with ConnectionClosedError
   * before this returns its promise. Safe to call more than once.
   */
  async close(reason = 'Session closed by client'): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    if (this.getState() === ConnectionState.DISCONNECTED) {
      this.state = ConnectionState.DISCONNECTED;
      return;
    }

    this.state = ConnectionState.CLOSING;
    this.failAll(reason);

    this.closing = this.transport.disconnect().finally(() => {
      this.state = ConnectionState.DISCONNECTED;
      this.closing = null;
      logger.debug('Session closed');
    });
    return this.closing;
  }

  getState(): ConnectionState {
    // The transport may have given up reconnecting
    if (this.state === ConnectionState.RECONNECTING && this.transport.getState() === ConnectionState.DISCONNECTED) {
      return ConnectionState.DISCONNECTED;
    }
    return this.state;
  }

  isConnected(): boolean {
    return this.getState() === ConnectionState.CONNECTED;
  }

  /**
   * Number of calls awaiting a response
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  private take(id: number): PendingCall | undefined {
    const entry = this.pending.get(id);
    if (!entry) {
      return undefined;
    }
    this.pending.delete(id);
    if (entry.timeoutId) {
      clearTimeout(entry.timeoutId);
    }
    entry.detach();
    return entry;
  }

  private failAll(reason: string): void {
    const count = this.pending.size;
    for (const id of [...this.pending.keys()]) {
      const entry = this.take(id);
      entry?.reject(new ConnectionClosedError(reason, entry.op));
    }
    if (count > 0) {
      logger.debug({ count, reason }, 'Pending calls failed');
    }
  }

  private handleDrop(reason: string): void {
    if (this.state === ConnectionState.CLOSING || this.state === ConnectionState.DISCONNECTED) {
      return;
    }

    logger.warn({ reason, pending: this.pending.size }, 'Connection lost');
    this.state =
      this.transport.getState() === ConnectionState.RECONNECTING
        ? ConnectionState.RECONNECTING
        : ConnectionState.DISCONNECTED;
    this.failAll(`Connection lost: ${reason}`);
  }

  private handleFrame(frame: Uint8Array): void {
    const decoded = safeDecodeEnvelope(frame);
    if (!decoded.success) {
      logger.warn({ error: decoded.error.message, id: decoded.id }, 'Received malformed frame');
      if (decoded.id !== null) {
        this.take(decoded.id)?.reject(decoded.error);
      }
      return;
    }

    const envelope = decoded.envelope;
    if (envelope.kind !== 'response') {
      logger.warn({ id: envelope.id, op: envelope.op }, 'Ignoring request envelope on a client session');
      return;
    }

    const entry = this.take(envelope.id);
    if (!entry) {
      logger.debug({ id: envelope.id }, 'Discarding response for an abandoned or unknown call');
      return;
    }

    if (envelope.ok) {
      entry.resolve(envelope.result);
    } else {
      entry.reject(toRemoteError(entry.op, envelope.error));
    }
  }
}
