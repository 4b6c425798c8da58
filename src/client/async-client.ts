/**
 * Asynchronous client for the terminal bridge
 */

import type { OperationName, ParamsInput, Result } from '../bridge/contract.js';
import type { CallOptions } from '../bridge/session.js';
import { OperationFacade, type ClientOptions } from './facade.js';

/**
 * Asynchronous facade over one session.
 *
 * Calls are multiplexed on the connection without head-of-line blocking, so
 * independent calls can be fanned out with Promise.all. Every method takes
 * `{ timeout, signal }`; aborting the signal fails the call with
 * CancelledError and drops any late response.
 *
 * @example
 * ```typescript
 * const client = new AsyncBridgeClient({ url: 'ws://localhost:18812' });
 * await client.connect();
 * const [account, positions] = await Promise.all([client.accountInfo(), client.positionsGet()]);
 * await client.close();
 * ```
 */
export class AsyncBridgeClient extends OperationFacade<CallOptions> {
  constructor(options: ClientOptions = {}) {
    super(options);
  }

  /**
   * Connect, run `fn`, and close whether it returns or throws
   */
  static async withConnection<T>(
    options: ClientOptions,
    fn: (client: AsyncBridgeClient) => Promise<T> | T
  ): Promise<T> {
    const client = new AsyncBridgeClient(options);
    await client.connect();
    try {
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  /**
   * Number of calls awaiting a response
   */
  get pendingCount(): number {
    return this.session.pendingCount;
  }

  protected invoke<K extends OperationName>(
    op: K,
    params: ParamsInput<K>,
    options: CallOptions = {}
  ): Promise<Result<K>> {
    return this.execute(op, params, options);
  }
}
