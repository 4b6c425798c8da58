/**
 * Bridge server - accepts client sessions over WebSocket and dispatches their requests
 */

import type { IncomingMessage } from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { toFrame } from '../transport/websocket.js';
import { DEFAULT_CONFIG, type ServerConfig } from '../utils/config.js';
import { BridgeLifecycleError, ConfigurationError } from '../utils/errors.js';
import { createChildLogger, createLogger, type Logger } from '../utils/logger.js';
import { Dispatcher } from './dispatcher.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import { createHandlers, createTerminalBreaker, type HandlerMap, type TerminalCapability } from './handlers.js';
import { HealthMonitor } from './health.js';
import { TokenBucket } from './rate-limiter.js';
import { WorkerPool } from './worker-pool.js';

const logger = createLogger('server');

/**
 * Options for creating a BridgeServer. Exactly one of `terminal` or
 * `handlers` supplies the operations.
 */
export interface BridgeServerOptions extends Partial<ServerConfig> {
  /** Terminal capability the default handlers delegate to */
  terminal?: TerminalCapability;
  /** Complete handler map, replacing the default handlers */
  handlers?: HandlerMap;
  health?: HealthMonitor;
}

/**
 * Information about a connected client session
 */
export interface SessionInfo {
  id: string;
  remoteAddress?: string;
  connectedAt: number;
  lastActivity: number;
}

interface ServerSession {
  info: SessionInfo;
  ws: WebSocket;
  logger: Logger;
}

export class BridgeServer {
  readonly health: HealthMonitor;
  /** Guards the terminal calls of the default handlers */
  readonly breaker: CircuitBreaker;
  private readonly config: ServerConfig;
  private readonly dispatcher: Dispatcher;
  private readonly pool: WorkerPool;
  private readonly sessions: Map<string, ServerSession> = new Map();
  private server: WebSocketServer | null = null;

  constructor(options: BridgeServerOptions) {
    const { terminal, handlers, health } = options;
    const defaults = DEFAULT_CONFIG.server;
    this.config = {
      host: options.host ?? defaults.host,
      port: options.port ?? defaults.port,
      workers: options.workers ?? defaults.workers,
      maxPayload: options.maxPayload ?? defaults.maxPayload,
      circuitFailureThreshold: options.circuitFailureThreshold ?? defaults.circuitFailureThreshold,
      circuitSuccessThreshold: options.circuitSuccessThreshold ?? defaults.circuitSuccessThreshold,
      circuitResetTimeout: options.circuitResetTimeout ?? defaults.circuitResetTimeout,
      rateLimit: options.rateLimit ?? defaults.rateLimit,
      rateBurst: options.rateBurst ?? defaults.rateBurst,
    };
    this.health = health ?? new HealthMonitor();
    this.pool = new WorkerPool(this.config.workers);
    this.breaker = createTerminalBreaker({
      failureThreshold: this.config.circuitFailureThreshold,
      successThreshold: this.config.circuitSuccessThreshold,
      resetTimeout: this.config.circuitResetTimeout,
    });
    const limiter = this.config.rateLimit > 0 ? new TokenBucket(this.config.rateLimit, this.config.rateBurst) : undefined;

    let handlerMap: HandlerMap;
    if (handlers) {
      handlerMap = handlers;
    } else if (terminal) {
      handlerMap = createHandlers(terminal, this.health, this.breaker);
    } else {
      throw ConfigurationError.invalid('terminal', 'a terminal capability or a handler map is required');
    }

    this.dispatcher = new Dispatcher(handlerMap, { pool: this.pool, health: this.health, limiter });
  }

  /**
   * Start listening for client sessions
   */
  async start(): Promise<void> {
    if (this.server) {
      throw BridgeLifecycleError.alreadyStarted();
    }

    const { host, port, maxPayload } = this.config;

    await new Promise<void>((resolve, reject) => {
      const server = new WebSocketServer({ host, port, maxPayload });
      this.server = server;

      const onStartupError = (error: Error) => {
        logger.error({ error: error.message }, 'Failed to start server');
        this.server = null;
        reject(error);
      };
      server.once('error', onStartupError);

      server.on('listening', () => {
        server.off('error', onStartupError);
        server.on('error', (error: Error) => {
          logger.error({ error: error.message }, 'WebSocket server error');
        });
        logger.info({ host, port: this.getPort(), workers: this.config.workers }, 'Bridge server listening');
        resolve();
      });

      server.on('connection', (ws: WebSocket, request: IncomingMessage) => {
        this.handleNewConnection(ws, request);
      });
    });
  }

  /**
   * Close every session and stop listening
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    logger.info({ sessions: this.sessions.size }, 'Stopping bridge server');

    for (const session of this.sessions.values()) {
      session.ws.close(1001, 'Server stopping');
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

    this.server = null;
    logger.info('Bridge server stopped');
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * The port actually bound, which differs from the configured one when that is 0
   * @throws BridgeLifecycleError if the server is not started
   */
  getPort(): number {
    const address = this.server?.address();
    if (!address) {
      throw BridgeLifecycleError.notStarted();
    }
    return typeof address === 'string' ? this.config.port : address.port;
  }

  getSessions(): SessionInfo[] {
    return Array.from(this.sessions.values()).map((session) => session.info);
  }

  /**
   * Handlers currently running or waiting for a worker
   */
  getLoad(): { active: number; queued: number } {
    return { active: this.pool.activeCount, queued: this.pool.queuedCount };
  }

  private handleNewConnection(ws: WebSocket, request: IncomingMessage): void {
    const id = uuidv4();
    const now = Date.now();
    const session: ServerSession = {
      info: {
        id,
        remoteAddress: request.socket.remoteAddress,
        connectedAt: now,
        lastActivity: now,
      },
      ws,
      logger: createChildLogger(logger, { sessionId: id }),
    };

    this.sessions.set(id, session);
    this.health.recordConnection();
    session.logger.info({ remoteAddress: session.info.remoteAddress }, 'Client connected');

    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (!isBinary) {
        session.logger.warn('Ignoring text message; frames are binary');
        return;
      }
      session.info.lastActivity = Date.now();
      void this.handleFrame(session, toFrame(data));
    });

    ws.on('close', (code: number, reason: Buffer) => {
      this.sessions.delete(id);
      this.health.recordDisconnection();
      session.logger.info({ code, reason: reason.toString() }, 'Client disconnected');
    });

    ws.on('error', (error: Error) => {
      session.logger.error({ error: error.message }, 'Session connection error');
    });
  }

  /**
   * Dispatch one frame and write its response as soon as it is ready.
   * Responses on a session are not ordered.
   */
  private async handleFrame(session: ServerSession, frame: Uint8Array): Promise<void> {
    let response: Uint8Array | null;
    try {
      response = await this.dispatcher.dispatch(frame, { sessionId: session.info.id, logger: session.logger });
    } catch (error) {
      session.logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Dispatch failed');
      return;
    }

    if (!response) {
      return;
    }
    if (session.ws.readyState !== WebSocket.OPEN) {
      session.logger.debug('Session closed before its response was ready');
      return;
    }

    session.ws.send(response, { binary: true }, (error) => {
      if (error) {
        session.logger.warn({ error: error.message }, 'Failed to send response');
      }
    });
  }
}
