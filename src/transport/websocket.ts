/**
 * WebSocket Transport implementation for the terminal bridge
 * Carries one binary frame per WebSocket message
 */

import WebSocket from 'ws';
import {
  ConnectionState,
  type ConnectionConfig,
  type Transport,
  type MessageHandler,
  type DisconnectHandler,
  type ErrorHandler,
  type ReconnectHandler,
} from './interface.js';
import { ConnectionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('websocket-transport');

/** Default reconnection interval in milliseconds */
const DEFAULT_RECONNECT_INTERVAL = 1000;

/** Default maximum reconnection attempts */
const DEFAULT_MAX_RECONNECT_ATTEMPTS = 10;

/** Default heartbeat interval in milliseconds */
const DEFAULT_HEARTBEAT_INTERVAL = 30000;

/** Default time to wait for a pong response */
const DEFAULT_HEARTBEAT_TIMEOUT = 10000;

/** Default ceiling on incoming frames: 256 MiB */
const DEFAULT_MAX_PAYLOAD = 256 * 1024 * 1024;

/**
 * Flatten whatever ws hands a 'message' listener into one byte view
 */
export function toFrame(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * WebSocket-based transport implementation
 * Handles connection lifecycle, frame sending/receiving, and event handling.
 * Supports auto-reconnection and heartbeat monitoring. Frames are never queued
 * while the link is down.
 */
export class WebSocketTransport implements Transport {
  private ws: WebSocket | null = null;
  private state: ConnectionState = ConnectionState.DISCONNECTED;
  private config: ConnectionConfig | null = null;

  // Reconnection state
  private reconnectAttempts: number = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private intentionalDisconnect: boolean = false;

  // Heartbeat state
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;
  private heartbeatTimeout: ReturnType<typeof setTimeout> | null = null;
  private awaitingPong: boolean = false;

  // Event handlers
  private messageHandlers: MessageHandler[] = [];
  private disconnectHandlers: DisconnectHandler[] = [];
  private errorHandlers: ErrorHandler[] = [];
  private reconnectHandlers: ReconnectHandler[] = [];
  private reconnectingHandlers: Array<(attempt: number, maxAttempts: number) => void> = [];

  /**
   * Build the WebSocket URL from the connection configuration
   */
  static buildUrl(config: ConnectionConfig): string {
    if (config.url) {
      return config.url;
    }

    const host = config.host ?? 'localhost';
    const port = config.port ?? 18812;
    return `ws://${host}:${port}`;
  }

  /**
   * Establish connection to a remote peer
   */
  async connect(config: ConnectionConfig): Promise<void> {
    if (this.state === ConnectionState.CONNECTED) {
      throw ConnectionError.alreadyConnected();
    }

    this.config = config;
    this.intentionalDisconnect = false;
    this.reconnectAttempts = 0;

    return this.establishConnection();
  }

  /**
   * Open a socket and wire its events
   * Used for both initial connection and reconnection attempts
   */
  private async establishConnection(): Promise<void> {
    const config = this.config;
    if (!config) {
      throw ConnectionError.notConnected();
    }

    this.state = ConnectionState.CONNECTING;

    const url = WebSocketTransport.buildUrl(config);
    logger.debug({ url, attempt: this.reconnectAttempts }, 'Connecting to WebSocket server');

    return new Promise<void>((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url, { maxPayload: config.maxPayload ?? DEFAULT_MAX_PAYLOAD });
      } catch (error) {
        this.state = ConnectionState.DISCONNECTED;
        reject(ConnectionError.failed(url, error instanceof Error ? error : new Error(String(error))));
        return;
      }
      this.ws = ws;
      let opened = false;

      ws.on('open', () => {
        opened = true;
        this.state = ConnectionState.CONNECTED;
        this.startHeartbeat();
        logger.info({ url }, 'WebSocket connection established');
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        this.handleIncomingFrame(data, isBinary);
      });

      ws.on('pong', () => {
        this.handlePong();
      });

      ws.on('close', (code: number, reason: Buffer) => {
        // A socket replaced by a newer attempt no longer speaks for the transport
        if (this.ws !== ws) {
          return;
        }

        const wasConnected = opened;
        this.stopHeartbeat();
        this.ws = null;

        const reasonText = reason.toString() || `code ${code}`;
        logger.info({ code, reason: reasonText }, 'WebSocket connection closed');

        if (this.intentionalDisconnect) {
          this.state = ConnectionState.DISCONNECTED;
          return;
        }

        // Settle the state first so disconnect handlers see where the link is heading
        if (wasConnected && this.shouldReconnect()) {
          this.scheduleReconnect();
        } else if (this.state !== ConnectionState.RECONNECTING) {
          this.state = ConnectionState.DISCONNECTED;
        }

        if (wasConnected) {
          this.notifyDisconnect(reasonText);
        }
      });

      ws.on('error', (error: Error) => {
        logger.error({ error: error.message }, 'WebSocket error');

        if (!opened) {
          // Initial attempt or a reconnection attempt failed before opening
          if (this.state === ConnectionState.CONNECTING) {
            this.state = ConnectionState.DISCONNECTED;
          }
          reject(ConnectionError.failed(url, error));
          return;
        }

        this.notifyError(error);
      });
    });
  }

  /**
   * Cleanly close the current connection
   */
  async disconnect(): Promise<void> {
    // Mark as intentional to prevent reconnection
    this.intentionalDisconnect = true;
    this.clearReconnectTimer();
    this.stopHeartbeat();

    const ws = this.ws;
    if (!ws || this.state === ConnectionState.DISCONNECTED) {
      this.state = ConnectionState.DISCONNECTED;
      this.ws = null;
      return;
    }

    this.state = ConnectionState.CLOSING;
    logger.debug('Disconnecting WebSocket');

    return new Promise<void>((resolve) => {
      const finish = () => {
        this.state = ConnectionState.DISCONNECTED;
        this.ws = null;
        resolve();
      };

      if (ws.readyState === WebSocket.CLOSED) {
        finish();
        return;
      }

      // Fall back to a hard close if the peer never answers the close frame
      const timeout = setTimeout(() => {
        ws.terminate();
        finish();
      }, 5000);

      ws.once('close', () => {
        clearTimeout(timeout);
        finish();
      });

      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else {
        ws.close(1000, 'Disconnect requested');
      }
    });
  }

  /**
   * Send one frame to the connected peer
   */
  async send(frame: Uint8Array): Promise<void> {
    const ws = this.ws;
    if (!ws || this.state !== ConnectionState.CONNECTED) {
      throw ConnectionError.notConnected();
    }

    logger.trace({ bytes: frame.byteLength }, 'Sending frame');

    return new Promise<void>((resolve, reject) => {
      ws.send(frame, { binary: true }, (error) => {
        if (error) {
          logger.error({ error: error.message }, 'Failed to send frame');
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  onMessage(handler: MessageHandler): void {
    this.messageHandlers.push(handler);
  }

  onDisconnect(handler: DisconnectHandler): void {
    this.disconnectHandlers.push(handler);
  }

  onError(handler: ErrorHandler): void {
    this.errorHandlers.push(handler);
  }

  onReconnect(handler: ReconnectHandler): void {
    this.reconnectHandlers.push(handler);
  }

  /**
   * Register a handler for reconnection attempts
   */
  onReconnecting(handler: (attempt: number, maxAttempts: number) => void): void {
    this.reconnectingHandlers.push(handler);
  }

  isConnected(): boolean {
    return this.state === ConnectionState.CONNECTED;
  }

  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Get the number of reconnection attempts (for testing)
   */
  getReconnectAttempts(): number {
    return this.reconnectAttempts;
  }

  /**
   * Hand an incoming frame to every message handler
   */
  private handleIncomingFrame(data: WebSocket.RawData, isBinary: boolean): void {
    if (!isBinary) {
      logger.warn('Ignoring text message; frames are binary');
      return;
    }

    const frame = toFrame(data);
    logger.trace({ bytes: frame.byteLength }, 'Received frame');

    for (const handler of this.messageHandlers) {
      try {
        handler(frame);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Message handler threw error');
      }
    }
  }

  private notifyDisconnect(reason: string): void {
    for (const handler of this.disconnectHandlers) {
      try {
        handler(reason);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Disconnect handler threw error');
      }
    }
  }

  private notifyError(error: Error): void {
    for (const handler of this.errorHandlers) {
      try {
        handler(error);
      } catch (handlerError) {
        logger.error({ error: errorMessage(handlerError) }, 'Error handler threw error');
      }
    }
  }

  private notifyReconnect(): void {
    for (const handler of this.reconnectHandlers) {
      try {
        handler();
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Reconnect handler threw error');
      }
    }
  }

  private notifyReconnecting(attempt: number, maxAttempts: number): void {
    for (const handler of this.reconnectingHandlers) {
      try {
        handler(attempt, maxAttempts);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Reconnecting handler threw error');
      }
    }
  }

  // ============================================================================
  // Reconnection Methods
  // ============================================================================

  private shouldReconnect(): boolean {
    if (!this.config?.reconnect) {
      return false;
    }

    const maxAttempts = this.config.maxReconnectAttempts ?? DEFAULT_MAX_RECONNECT_ATTEMPTS;
    return this.reconnectAttempts < maxAttempts;
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return; // Already scheduled
    }

    this.state = ConnectionState.RECONNECTING;
    this.reconnectAttempts++;

    const maxAttempts = this.config?.maxReconnectAttempts ?? DEFAULT_MAX_RECONNECT_ATTEMPTS;
    const interval = this.config?.reconnectInterval ?? DEFAULT_RECONNECT_INTERVAL;

    logger.info({ attempt: this.reconnectAttempts, maxAttempts, interval }, 'Scheduling reconnection attempt');
    this.notifyReconnecting(this.reconnectAttempts, maxAttempts);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.attemptReconnect(maxAttempts);
    }, interval);
  }

  private async attemptReconnect(maxAttempts: number): Promise<void> {
    if (this.intentionalDisconnect) {
      return;
    }

    try {
      await this.establishConnection();
      logger.info({ attempts: this.reconnectAttempts }, 'Reconnection successful');
      this.reconnectAttempts = 0;
      this.notifyReconnect();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Reconnection attempt failed');

      if (this.intentionalDisconnect) {
        return;
      }
      if (this.shouldReconnect()) {
        this.scheduleReconnect();
      } else {
        logger.error({ maxAttempts }, 'Max reconnection attempts reached, giving up');
        this.state = ConnectionState.DISCONNECTED;
        this.notifyError(new ConnectionError(`Failed to reconnect after ${maxAttempts} attempts`));
      }
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // ============================================================================
  // Heartbeat Methods
  // ============================================================================

  private startHeartbeat(): void {
    this.stopHeartbeat();

    const interval = this.config?.heartbeatInterval ?? DEFAULT_HEARTBEAT_INTERVAL;
    this.heartbeatInterval = setInterval(() => {
      this.sendPing();
    }, interval);

    logger.debug({ interval }, 'Heartbeat monitoring started');
  }

  private stopHeartbeat(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    if (this.heartbeatTimeout) {
      clearTimeout(this.heartbeatTimeout);
      this.heartbeatTimeout = null;
    }

    this.awaitingPong = false;
  }

  private sendPing(): void {
    if (!this.ws || this.state !== ConnectionState.CONNECTED) {
      return;
    }

    if (this.awaitingPong) {
      // No pong for the previous ping
      this.handleHeartbeatTimeout();
      return;
    }

    this.awaitingPong = true;
    this.ws.ping();

    this.heartbeatTimeout = setTimeout(() => {
      if (this.awaitingPong) {
        this.handleHeartbeatTimeout();
      }
    }, this.config?.heartbeatTimeout ?? DEFAULT_HEARTBEAT_TIMEOUT);
  }

  private handlePong(): void {
    this.awaitingPong = false;

    if (this.heartbeatTimeout) {
      clearTimeout(this.heartbeatTimeout);
      this.heartbeatTimeout = null;
    }
  }

  private handleHeartbeatTimeout(): void {
    logger.warn('Heartbeat timeout - closing connection');
    this.awaitingPong = false;

    if (this.heartbeatTimeout) {
      clearTimeout(this.heartbeatTimeout);
      this.heartbeatTimeout = null;
    }

    // Terminating emits 'close', which takes the reconnect path when enabled
    this.ws?.terminate();
  }
}
