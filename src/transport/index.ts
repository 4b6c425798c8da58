/**
 * Transport module exports
 */

export {
  // Enums
  ConnectionState,
  // Types
  type ConnectionConfig,
  type MessageHandler,
  type DisconnectHandler,
  type ErrorHandler,
  type ReconnectHandler,
  type Transport,
} from './interface.js';

export { WebSocketTransport, toFrame } from './websocket.js';

import { WebSocketTransport } from './websocket.js';
import type { Transport } from './interface.js';

// Transport type for factory function
export type TransportType = 'websocket';

/**
 * Factory function to create transport instances
 * @param type The type of transport to create
 * @returns A Transport instance
 */
export function createTransport(type: TransportType = 'websocket'): Transport {
  switch (type) {
    case 'websocket':
      // Config is passed to connect(), not the constructor
      return new WebSocketTransport();
  }
}
