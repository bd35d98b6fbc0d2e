/**
 * Invoker
 *
 * Resolves a tool, validates the arguments, dispatches through the
 * transport and normalizes the outcome. `invoke` never rejects: every
 * failure comes back as an InvocationResult so a calling agent can branch
 * on `status` directly.
 *
 * No retries happen here. Retry policy belongs to the transport.
 */

import {
  CancellationError,
  ErrorCategory,
  NotFoundError,
  TransportFault,
  formatError,
} from '../errors/index.js';
import {
  createLinkedTokenSource,
  isTimerDelay,
  race,
  type CancellationToken,
} from '../utilities/cancellation.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { Transport } from '../transport/types.js';
import type {
  InvocationEvent,
  InvocationEventListener,
  InvocationRequest,
  InvocationResult,
  InvokeOptions,
  ToolDescriptor,
} from '../types.js';
import { validateArguments } from './argument-validator.js';
import type { Resolver } from './resolver.js';

export const DEFAULT_TIMEOUT_MS = 30000;

export interface InvokerOptions {
  /**
   * Applied when a call passes no timeoutMs (default: 30000). 0, or a value
   * beyond what a timer can hold, disables it.
   */
  defaultTimeoutMs?: number;
  /** Cancelled when the owning registry is torn down */
  lifetimeToken?: CancellationToken;
  logger?: StructuredLogger;
}

export class Invoker {
  private listeners: Set<InvocationEventListener> = new Set();
  private readonly defaultTimeoutMs: number;
  private readonly lifetimeToken?: CancellationToken;
  private log: StructuredLogger;

  constructor(
    private readonly resolver: Resolver,
    private readonly transport: Transport,
    options: InvokerOptions = {}
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.lifetimeToken = options.lifetimeToken;
    this.log = options.logger ?? createComponentLogger('Invoker');
  }

  async invoke(request: InvocationRequest, options: InvokeOptions = {}): Promise<InvocationResult> {
    const { toolName } = request;
    const log = this.log.forTool(toolName);
    this.emit({ type: 'invoke_start', tool: toolName });

    // 1. Resolve
    let descriptor: ToolDescriptor;
    try {
      descriptor = await this.resolver.resolve(toolName);
    } catch (error) {
      if (error instanceof NotFoundError) {
        log.info('Tool not found');
        this.emit({ type: 'not_found', tool: toolName });
        return { status: 'NotFound', toolName, error: { message: error.message } };
      }
      return this.transportError(log, toolName, `Failed to resolve tool: ${formatError(error)}`);
    }

    // 2. Validate
    const validation = validateArguments(descriptor, request.arguments);
    if (!validation.ok) {
      const { message, parameter } = validation.error;
      log.info('Argument validation failed', { parameter });
      this.emit({ type: 'validation_failed', tool: toolName, parameter, message });
      return {
        status: 'ValidationError',
        toolName,
        error: { message, ...(parameter !== undefined && { parameter }) },
      };
    }

    // 3. Dispatch
    const requested = options.timeoutMs ?? this.defaultTimeoutMs;
    const timeoutMs = isTimerDelay(requested) ? requested : 0;
    const callSource = createLinkedTokenSource(options.token, this.lifetimeToken);
    if (callSource.isCancellationRequested) {
      const reason = callSource.token.cancellationReason ?? 'Operation cancelled';
      callSource.dispose();
      return this.transportError(log, toolName, `Call cancelled: ${reason}`);
    }

    let timedOut = false;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            callSource.cancel(`Transport call timed out after ${timeoutMs}ms`);
          }, timeoutMs)
        : undefined;

    this.emit({ type: 'transport_call', tool: toolName, arguments: validation.arguments });
    const startedAt = Date.now();

    try {
      const value = await race(
        this.callTransport(toolName, validation.arguments, timeoutMs, callSource.token),
        callSource.token
      );
      const durationMs = Date.now() - startedAt;
      log.debug('Tool call succeeded', { durationMs });
      this.emit({ type: 'complete', tool: toolName, durationMs });
      return { status: 'Ok', toolName, value, durationMs };
    } catch (error) {
      const fault = this.toFault(error, toolName, timedOut, timeoutMs);
      return this.transportError(log, toolName, fault.message, fault);
    } finally {
      if (timer) clearTimeout(timer);
      callSource.dispose();
    }
  }

  /**
   * Add an event listener. Returns an unsubscribe function.
   */
  on(listener: InvocationEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }

  // Keeps a synchronous throw inside the transport from escaping as one
  private async callTransport(
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs: number,
    token: CancellationToken
  ): Promise<unknown> {
    return this.transport.call(toolName, args, { timeoutMs, token });
  }

  private toFault(error: unknown, toolName: string, timedOut: boolean, timeoutMs: number): TransportFault {
    if (timedOut) {
      return TransportFault.timeout(toolName, timeoutMs);
    }
    if (error instanceof CancellationError) {
      return new TransportFault(
        `Call cancelled: ${error.reason}`,
        ErrorCategory.CANCELLED,
        false,
        toolName
      );
    }
    return TransportFault.fromError(error, toolName);
  }

  private transportError(
    log: StructuredLogger,
    toolName: string,
    message: string,
    fault?: TransportFault
  ): InvocationResult {
    log.warn('Tool call failed', {
      error: message,
      ...(fault && { category: fault.category, recoverable: fault.recoverable }),
    });
    this.emit({ type: 'transport_error', tool: toolName, message });
    return { status: 'TransportError', toolName, error: { message } };
  }

  private emit(event: InvocationEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log
          .forTool(event.tool)
          .warn('Invocation listener threw', { event: event.type, error: formatError(error) });
      }
    }
  }
}
