/**
 * Transport contract.
 *
 * The registry never executes tools itself. Whatever actually runs them
 * (an RPC client, a subprocess, an HTTP API) is injected behind this
 * interface.
 */

import type { CancellationToken } from '../utilities/cancellation.js';

export interface TransportCallOptions {
  /** How long the invoker will wait; 0 means no limit */
  timeoutMs: number;
  /** Cancelled on timeout, caller cancellation or registry teardown */
  token: CancellationToken;
}

export interface Transport {
  /**
   * Execute a tool. Rejects on any backend failure, preferably with a
   * TransportFault.
   */
  call(toolName: string, args: Record<string, unknown>, options: TransportCallOptions): Promise<unknown>;
}
