/**
 * In-process transport backed by a map of handler functions.
 * Used by tests and demos in place of a real backend.
 */

import { TransportFault } from '../errors/index.js';
import type { CancellationToken } from '../utilities/cancellation.js';
import type { Transport, TransportCallOptions } from './types.js';

export interface ToolHandlerContext {
  toolName: string;
  token: CancellationToken;
}

export type ToolHandler = (
  args: Record<string, unknown>,
  context: ToolHandlerContext
) => unknown | Promise<unknown>;

export class InMemoryTransport implements Transport {
  private handlers: Map<string, ToolHandler> = new Map();
  private calls: Map<string, number> = new Map();

  constructor(handlers: Record<string, ToolHandler> = {}) {
    for (const [name, handler] of Object.entries(handlers)) {
      this.handlers.set(name, handler);
    }
  }

  /**
   * Register (or replace) the handler for a tool.
   */
  handle(toolName: string, handler: ToolHandler): this {
    this.handlers.set(toolName, handler);
    return this;
  }

  async call(
    toolName: string,
    args: Record<string, unknown>,
    options: TransportCallOptions
  ): Promise<unknown> {
    this.calls.set(toolName, this.callCount(toolName) + 1);

    const handler = this.handlers.get(toolName);
    if (!handler) {
      throw TransportFault.noHandler(toolName);
    }

    return handler(args, { toolName, token: options.token });
  }

  callCount(toolName?: string): number {
    if (toolName === undefined) {
      let total = 0;
      for (const count of this.calls.values()) total += count;
      return total;
    }
    return this.calls.get(toolName) ?? 0;
  }
}

export function createInMemoryTransport(handlers?: Record<string, ToolHandler>): InMemoryTransport {
  return new InMemoryTransport(handlers);
}
