/**
 * Server-side request dispatch
 *
 * Decodes a request frame, validates it against the contract, runs the
 * operation's handler through the worker pool and encodes the response. Every
 * decodable request gets exactly one response, tagged with its id.
 */

import { toWireValue, type WireRecord, type WireValue } from '../bridge/codec.js';
import { contract, isOperationName, type OperationName } from '../bridge/contract.js';
import {
  createErrorDescriptor,
  createErrorResponse,
  createSuccessResponse,
  CIRCUIT_OPEN_CODE,
  INTERNAL_ERROR_CODE,
  INVALID_PARAMS_CODE,
} from '../bridge/messages.js';
import {
  encodeEnvelope,
  safeDecodeEnvelope,
  type ErrorDescriptor,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '../bridge/protocol.js';
import { CircuitOpenError, InvalidParamsError, MalformedPayloadError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { HealthMonitor } from './health.js';
import { isTerminalFailure, type HandlerContext, type HandlerMap } from './handlers.js';
import type { TokenBucket } from './rate-limiter.js';
import { WorkerPool } from './worker-pool.js';

const logger = createLogger('dispatcher');

export interface DispatchContext {
  sessionId: string;
  logger?: Logger;
}

export interface DispatcherOptions {
  /** Bounds handler invocations; unbounded when omitted */
  pool?: WorkerPool;
  health?: HealthMonitor;
  /** Requests beyond its rate wait `throttleDelay` ms, then run anyway */
  limiter?: TokenBucket;
  throttleDelay?: number;
}

const DEFAULT_THROTTLE_DELAY = 10;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Dispatcher {
  private readonly handlers: HandlerMap;
  private readonly pool: WorkerPool | null;
  private readonly health: HealthMonitor | null;
  private readonly limiter: TokenBucket | null;
  private readonly throttleDelay: number;

  constructor(handlers: HandlerMap, options: DispatcherOptions = {}) {
    this.handlers = handlers;
    this.pool = options.pool ?? null;
    this.health = options.health ?? null;
    this.limiter = options.limiter ?? null;
    this.throttleDelay = options.throttleDelay ?? DEFAULT_THROTTLE_DELAY;
  }

  /**
   * Handle one incoming frame
   * @returns The response frame, or null when the frame is dropped
   */
  async dispatch(frame: Uint8Array, context: DispatchContext): Promise<Uint8Array | null> {
    const log = context.logger ?? logger;
    const decoded = safeDecodeEnvelope(frame);

    if (!decoded.success) {
      this.health?.recordError(decoded.error.message);
      if (decoded.id === null) {
        log.warn({ error: decoded.error.message }, 'Dropping undecodable frame');
        return null;
      }
      log.warn({ id: decoded.id, error: decoded.error.message }, 'Rejecting malformed request');
      return encodeEnvelope(
        createErrorResponse(decoded.id, createErrorDescriptor('internal', INTERNAL_ERROR_CODE, decoded.error.message))
      );
    }

    const envelope = decoded.envelope;
    if (envelope.kind !== 'request') {
      log.warn({ id: envelope.id }, 'Ignoring response envelope sent to the server');
      return null;
    }

    const response = await this.handle(envelope, { sessionId: context.sessionId, logger: log });
    try {
      return encodeEnvelope(response);
    } catch (error) {
      const message = errorMessage(error);
      log.error({ id: envelope.id, op: envelope.op, error: message }, 'Failed to encode response');
      this.health?.recordError(message);
      return encodeEnvelope(
        createErrorResponse(envelope.id, createErrorDescriptor('internal', INTERNAL_ERROR_CODE, message))
      );
    }
  }

  /**
   * Run one decoded request and build its response envelope
   */
  async handle(request: RequestEnvelope, context: HandlerContext): Promise<ResponseEnvelope> {
    const { id, op } = request;
    const log = context.logger;

    if (!isOperationName(op)) {
      log.warn({ id, op }, 'Unknown operation');
      this.health?.recordRequest(false);
      return createErrorResponse(id, createErrorDescriptor('unknown_operation', INTERNAL_ERROR_CODE, `Unknown operation '${op}'`));
    }

    log.debug({ id, op }, 'Dispatching request');
    try {
      const result = await this.run(op, request.params, context);
      this.health?.recordRequest(true);
      return createSuccessResponse(id, result);
    } catch (error) {
      const descriptor = this.describeFailure(error);
      this.health?.recordRequest(false);
      if (descriptor.kind === 'internal') {
        this.health?.recordError(descriptor.message);
        log.error({ id, op, error: descriptor.message }, 'Handler failed');
      } else if (descriptor.kind === 'unavailable') {
        log.warn({ id, op }, descriptor.message);
      } else {
        log.debug({ id, op, kind: descriptor.kind, code: descriptor.code }, 'Request failed');
      }
      return createErrorResponse(id, descriptor);
    }
  }

  private async run<K extends OperationName>(op: K, params: WireRecord, context: HandlerContext): Promise<WireValue> {
    const descriptor = contract[op];

    const parsedParams = descriptor.params.safeParse(params);
    if (!parsedParams.success) {
      const issue = parsedParams.error.issues[0];
      const where = issue.path.join('.');
      throw new InvalidParamsError(op, where ? `${where}: ${issue.message}` : issue.message);
    }

    if (this.limiter && !this.limiter.tryAcquire()) {
      context.logger.debug({ op, delay: this.throttleDelay }, 'Rate limit reached, throttling');
      await sleep(this.throttleDelay);
    }

    const handler = this.handlers[op];
    const invoke = () => handler(parsedParams.data, context);
    const output = this.pool ? await this.pool.run(invoke) : await invoke();

    const parsedResult = descriptor.result.safeParse(output);
    if (!parsedResult.success) {
      throw MalformedPayloadError.invalid(`handler for '${op}' returned an invalid result: ${parsedResult.error.issues[0].message}`);
    }
    return toWireValue(parsedResult.data);
  }

  private describeFailure(error: unknown): ErrorDescriptor {
    if (error instanceof InvalidParamsError) {
      return createErrorDescriptor('invalid_params', INVALID_PARAMS_CODE, error.message);
    }
    if (error instanceof CircuitOpenError) {
      return createErrorDescriptor('unavailable', CIRCUIT_OPEN_CODE, error.message);
    }
    if (isTerminalFailure(error)) {
      return createErrorDescriptor('remote', error.code, error.message);
    }
    return createErrorDescriptor('internal', INTERNAL_ERROR_CODE, errorMessage(error));
  }
}
