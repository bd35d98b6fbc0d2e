/**
 * Cancellation Tokens
 *
 * Cooperative cancellation for transport calls, following the .NET
 * CancellationToken pattern. The invoker hands a token to every transport
 * call and cancels it on timeout, caller cancellation or registry teardown.
 *
 * Usage:
 *   const cts = createCancellationTokenSource();
 *   const result = await registry.invoke(request, { token: cts.token });
 *   // Later: cts.cancel('User navigated away');
 */

import { CancellationError } from '../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface Disposable {
  dispose(): void;
}

/**
 * Token that can be checked for cancellation.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly cancellationReason?: string;
  /** Resolves when cancelled; never settles otherwise */
  readonly onCancellationRequested: Promise<string | void>;
  /** Register a callback for cancellation. Invoked immediately if already cancelled. */
  register(callback: (reason?: string) => void): Disposable;
  throwIfCancellationRequested(): void;
}

/**
 * Source that controls a cancellation token.
 */
export interface CancellationTokenSource extends Disposable {
  readonly token: CancellationToken;
  readonly isCancellationRequested: boolean;
  cancel(reason?: string): void;
  /** Cancel after timeout */
  cancelAfter(ms: number, reason?: string): this;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

const NOOP_DISPOSABLE: Disposable = { dispose: () => {} };

/**
 * Largest delay a Node timer honours. Longer delays fire after 1ms, so
 * anything above this is treated as "never".
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function isTimerDelay(ms: number): boolean {
  return ms > 0 && ms <= MAX_TIMER_DELAY_MS;
}

class CancellationTokenImpl implements CancellationToken {
  private cancelled = false;
  private reason?: string;
  private callbacks = new Set<(reason?: string) => void>();
  private readonly promise: Promise<string | void>;
  private readonly resolvePromise: (reason?: string) => void;

  constructor() {
    let resolve: (reason?: string) => void = () => {};
    this.promise = new Promise<string | void>((r) => {
      resolve = r;
    });
    this.resolvePromise = resolve;
  }

  get isCancellationRequested(): boolean {
    return this.cancelled;
  }

  get cancellationReason(): string | undefined {
    return this.reason;
  }

  get onCancellationRequested(): Promise<string | void> {
    return this.promise;
  }

  register(callback: (reason?: string) => void): Disposable {
    if (this.cancelled) {
      callback(this.reason);
      return NOOP_DISPOSABLE;
    }
    this.callbacks.add(callback);
    return { dispose: () => this.callbacks.delete(callback) };
  }

  throwIfCancellationRequested(): void {
    if (this.cancelled) {
      throw new CancellationError(this.reason);
    }
  }

  /** @internal */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.reason = reason;
    this.resolvePromise(reason);
    const callbacks = [...this.callbacks];
    this.callbacks.clear();
    for (const cb of callbacks) {
      cb(reason);
    }
  }
}

class CancellationTokenSourceImpl implements CancellationTokenSource {
  private readonly tokenImpl = new CancellationTokenImpl();
  private timeoutId?: ReturnType<typeof setTimeout>;
  private registrations: Disposable[] = [];
  private disposed = false;

  get token(): CancellationToken {
    return this.tokenImpl;
  }

  get isCancellationRequested(): boolean {
    return this.tokenImpl.isCancellationRequested;
  }

  cancel(reason?: string): void {
    if (this.disposed) return;
    this.tokenImpl.cancel(reason);
  }

  cancelAfter(ms: number, reason = 'Operation timed out'): this {
    if (this.disposed || this.tokenImpl.isCancellationRequested) return this;
    this.clearTimer();
    if (ms > MAX_TIMER_DELAY_MS) return this;
    this.timeoutId = setTimeout(() => this.cancel(reason), ms);
    return this;
  }

  /** @internal Track a registration on a parent token so dispose() can release it */
  track(registration: Disposable): void {
    this.registrations.push(registration);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.clearTimer();
    for (const registration of this.registrations) {
      registration.dispose();
    }
    this.registrations = [];
    // Don't cancel on dispose - the operation completed
  }

  private clearTimer(): void {
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = undefined;
    }
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export function createCancellationTokenSource(): CancellationTokenSource {
  return new CancellationTokenSourceImpl();
}

/**
 * Create a token source that auto-cancels after timeout.
 */
export function createTimeoutToken(ms: number, reason?: string): CancellationTokenSource {
  return createCancellationTokenSource().cancelAfter(ms, reason);
}

/**
 * Create a source whose token cancels when any of the given tokens cancels.
 * Disposing the returned source detaches it from the parents.
 */
export function createLinkedTokenSource(
  ...tokens: Array<CancellationToken | undefined>
): CancellationTokenSource {
  const linked = new CancellationTokenSourceImpl();

  for (const token of tokens) {
    if (!token) continue;
    if (token.isCancellationRequested) {
      linked.cancel(token.cancellationReason);
      break;
    }
    linked.track(token.register((reason) => linked.cancel(reason)));
  }

  return linked;
}

/**
 * A token that is never cancelled.
 */
const NONE_TOKEN: CancellationToken = {
  isCancellationRequested: false,
  cancellationReason: undefined,
  onCancellationRequested: new Promise<void>(() => {}),
  register: () => NOOP_DISPOSABLE,
  throwIfCancellationRequested: () => {},
};

export const CancellationToken = {
  None: NONE_TOKEN,
};

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Race a promise against cancellation. The cancellation registration is
 * released as soon as either side settles.
 */
export function race<T>(promise: Promise<T>, token: CancellationToken): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const registration = token.register((reason) => {
      reject(new CancellationError(reason));
    });

    promise.then(
      (value) => {
        registration.dispose();
        resolve(value);
      },
      (error: unknown) => {
        registration.dispose();
        reject(error);
      }
    );
  });
}

/**
 * Sleep with cancellation support.
 */
export function sleep(ms: number, token: CancellationToken = CancellationToken.None): Promise<void> {
  return new Promise((resolve, reject) => {
    let registration: Disposable = NOOP_DISPOSABLE;
    const id = setTimeout(() => {
      registration.dispose();
      resolve();
    }, ms);
    registration = token.register((reason) => {
      clearTimeout(id);
      reject(new CancellationError(reason));
    });
  });
}

/**
 * Create an AbortSignal from a CancellationToken, for transports built on
 * fetch or other AbortSignal-based APIs.
 */
export function toAbortSignal(token: CancellationToken): AbortSignal {
  const controller = new AbortController();
  token.register((reason) => controller.abort(reason));
  return controller.signal;
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}
