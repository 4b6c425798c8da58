/**
 * Transport layer interface and types for the terminal bridge
 * Defines the abstract transport a session writes frames to and reads frames from
 */

// ============================================================================
// Connection State Enum
// ============================================================================

/**
 * Represents the current state of a connection
 */
export enum ConnectionState {
  /** Not connected to any peer */
  DISCONNECTED = 'DISCONNECTED',
  /** Currently attempting to establish connection */
  CONNECTING = 'CONNECTING',
  /** Successfully connected and ready for communication */
  CONNECTED = 'CONNECTED',
  /** Connection lost, attempting to reconnect */
  RECONNECTING = 'RECONNECTING',
  /** Close requested, pending work being torn down */
  CLOSING = 'CLOSING',
}

// ============================================================================
// Connection Configuration
// ============================================================================

/**
 * Configuration for establishing a transport connection
 */
export interface ConnectionConfig {
  /** Full WebSocket URL (e.g., ws://localhost:18812) */
  url?: string;
  /** Host to connect to (used if url is not provided) */
  host?: string;
  /** Port to connect to (used if url is not provided) */
  port?: number;
  /** Enable automatic reconnection on disconnect */
  reconnect?: boolean;
  /** Interval between reconnection attempts in milliseconds */
  reconnectInterval?: number;
  /** Maximum number of reconnection attempts before giving up */
  maxReconnectAttempts?: number;
  /** Largest incoming frame accepted, in bytes */
  maxPayload?: number;
  /** Interval between heartbeat pings in milliseconds */
  heartbeatInterval?: number;
  /** How long to wait for a pong before dropping the link */
  heartbeatTimeout?: number;
}

// ============================================================================
// Event Handler Types
// ============================================================================

/**
 * Handler for incoming frames. Each frame holds exactly one envelope.
 */
export type MessageHandler = (frame: Uint8Array) => void;

/**
 * Handler for an unexpected loss of the link
 */
export type DisconnectHandler = (reason: string) => void;

/**
 * Handler for error events
 */
export type ErrorHandler = (error: Error) => void;

/**
 * Handler for a link restored by automatic reconnection
 */
export type ReconnectHandler = () => void;

// ============================================================================
// Transport Interface
// ============================================================================

/**
 * Abstract transport interface for bridge communication
 * Implementations handle the actual network protocol
 */
export interface Transport {
  /**
   * Establish connection to a remote peer
   * @throws ConnectionError if connection fails
   */
  connect(config: ConnectionConfig): Promise<void>;

  /**
   * Cleanly close the current connection. Never triggers reconnection.
   */
  disconnect(): Promise<void>;

  /**
   * Send one frame to the connected peer
   * @throws ConnectionError if not connected
   */
  send(frame: Uint8Array): Promise<void>;

  onMessage(handler: MessageHandler): void;

  onDisconnect(handler: DisconnectHandler): void;

  onError(handler: ErrorHandler): void;

  onReconnect(handler: ReconnectHandler): void;

  isConnected(): boolean;

  getState(): ConnectionState;
}
