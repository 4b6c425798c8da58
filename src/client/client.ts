/**
 * Synchronous client for the terminal bridge
 */

import type { OperationName, ParamsInput, Result } from '../bridge/contract.js';
import { ConnectionClosedError } from '../utils/errors.js';
import { OperationFacade, type ClientOptions } from './facade.js';

/**
 * Per-call options for the synchronous client. There is no cancellation:
 * a call ends with its response, its error, its timeout or close().
 */
export interface SyncCallOptions {
  timeout?: number;
}

/**
 * Synchronous facade over one session.
 *
 * Each call holds its caller until the response or error arrives, and the
 * client keeps at most one call on the wire: a call made while another is
 * outstanding starts only once that one has settled. Use AsyncBridgeClient to
 * run calls concurrently.
 *
 * @example
 * ```typescript
 * const info = await BridgeClient.withConnection({ host: 'localhost' }, (client) =>
 *   client.accountInfo()
 * );
 * ```
 */
export class BridgeClient extends OperationFacade<SyncCallOptions> {
  private queue: Promise<void> = Promise.resolve();
  /** Bumped by close() so calls still waiting their turn fail instead of running */
  private generation = 0;

  constructor(options: ClientOptions = {}) {
    super(options);
  }

  /**
   * Connect, run `fn`, and close whether it returns or throws
   */
  static async withConnection<T>(options: ClientOptions, fn: (client: BridgeClient) => Promise<T> | T): Promise<T> {
    const client = new BridgeClient(options);
    await client.connect();
    try {
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  override close(): Promise<void> {
    this.generation++;
    return super.close();
  }

  protected invoke<K extends OperationName>(
    op: K,
    params: ParamsInput<K>,
    options: SyncCallOptions = {}
  ): Promise<Result<K>> {
    const generation = this.generation;

    const run = this.queue.then(() => {
      if (generation !== this.generation) {
        throw new ConnectionClosedError('Session closed by client', op);
      }
      return this.execute(op, params, { timeout: options.timeout });
    });

    // The next call waits for this one to settle, however it settles
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
