/**
 * Registry Error Types
 *
 * Typed, categorized errors for the tool registry. Registration and
 * resolution failures are thrown; the invoker converts everything it
 * catches into an `InvocationResult` instead.
 *
 * Error Categories:
 * - TRANSIENT: Timeouts, dropped connections - retryable by the transport
 * - PERMANENT: Unknown tool, duplicate registration
 * - VALIDATION: Malformed descriptor or arguments
 * - DEPENDENCY: Backend reported a failure
 * - CANCELLED: Caller abandoned the call
 *
 * @example
 * ```typescript
 * throw new NotFoundError('send_email');
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** May resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Will not resolve on retry */
  PERMANENT = 'PERMANENT',

  /** Invalid input or descriptor */
  VALIDATION = 'VALIDATION',

  /** Backend or external service failure */
  DEPENDENCY = 'DEPENDENCY',

  /** Unexpected internal failure */
  INTERNAL = 'INTERNAL',

  /** Operation was cancelled */
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all registry errors.
 */
export class RegistryError extends Error {
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'RegistryError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * A descriptor with this name is already registered.
 * Only raised during registration; fatal to startup.
 */
export class DuplicateNameError extends RegistryError {
  readonly toolName: string;

  /**
   * @param locations Where each definition lives, when the clash is between
   *   descriptor files rather than registrations
   */
  constructor(toolName: string, locations?: string[]) {
    super(
      locations
        ? `Tool "${toolName}" is defined more than once: ${locations.join(', ')}`
        : `Tool "${toolName}" is already registered`,
      ErrorCategory.PERMANENT,
      false,
      { tool: toolName, ...(locations && { locations }) }
    );
    this.name = 'DuplicateNameError';
    this.toolName = toolName;
  }
}

/**
 * No descriptor is registered under the requested name.
 */
export class NotFoundError extends RegistryError {
  readonly toolName: string;

  constructor(toolName: string, context?: Record<string, unknown>) {
    super(`Tool not found: ${toolName}`, ErrorCategory.PERMANENT, false, {
      ...context,
      tool: toolName,
    });
    this.name = 'NotFoundError';
    this.toolName = toolName;
  }
}

/**
 * Descriptor or argument validation failure.
 */
export class ValidationError extends RegistryError {
  /** Parameter that failed validation, when there is one */
  readonly parameter?: string;

  constructor(message: string, parameter?: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, {
      ...context,
      ...(parameter !== undefined && { parameter }),
    });
    this.name = 'ValidationError';
    this.parameter = parameter;
  }

  static missingRequired(parameter: string): ValidationError {
    return new ValidationError(`Missing required parameter: ${parameter}`, parameter);
  }

  static typeMismatch(parameter: string, expected: string, actual: unknown): ValidationError {
    return new ValidationError(
      `Parameter "${parameter}" expected ${expected}, got ${describeValue(actual)}`,
      parameter,
      { expected }
    );
  }

  static unknownArgument(parameter: string): ValidationError {
    return new ValidationError(`Unknown argument: ${parameter}`, parameter);
  }

  /**
   * Create error from a Zod validation result.
   */
  static fromZodError(
    error: { issues: Array<{ path: (string | number)[]; message: string }> },
    context?: Record<string, unknown>
  ): ValidationError {
    const messages = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    const first = error.issues[0];
    const parameter = first && first.path.length > 0 ? String(first.path[0]) : undefined;
    return new ValidationError(`Validation failed: ${messages.join(', ')}`, parameter, context);
  }
}

/**
 * Failure reported by (or while talking to) the backend transport.
 */
export class TransportFault extends RegistryError {
  readonly toolName: string;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    toolName: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, category, recoverable, { ...context, tool: toolName }, cause);
    this.name = 'TransportFault';
    this.toolName = toolName;
  }

  static timeout(toolName: string, timeoutMs: number): TransportFault {
    return new TransportFault(
      `Transport call timed out after ${timeoutMs}ms`,
      ErrorCategory.TRANSIENT,
      true,
      toolName,
      { timeoutMs }
    );
  }

  static noHandler(toolName: string): TransportFault {
    return new TransportFault(
      `No handler for tool: ${toolName}`,
      ErrorCategory.DEPENDENCY,
      false,
      toolName
    );
  }

  /**
   * Wrap an arbitrary rejection value from a transport.
   */
  static fromError(error: unknown, toolName: string): TransportFault {
    if (error instanceof TransportFault) {
      return error;
    }
    const err = toError(error);
    const { category, recoverable } = categorizeError(err);
    return new TransportFault(err.message, category, recoverable, toolName, undefined, err);
  }
}

/**
 * Raised when an operation is cancelled through a cancellation token.
 */
export class CancellationError extends RegistryError {
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled') {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Determine error category from a generic error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  const message = error.message.toLowerCase();
  const code = errorCode(error);

  if (
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'EPIPE' ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('socket hang up') ||
    message.includes('network error') ||
    message.includes('temporarily unavailable')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (message.includes('cancelled') || message.includes('aborted')) {
    return { category: ErrorCategory.CANCELLED, recoverable: false };
  }

  if (message.includes('invalid') || message.includes('validation')) {
    return { category: ErrorCategory.VALIDATION, recoverable: false };
  }

  return { category: ErrorCategory.DEPENDENCY, recoverable: false };
}

/**
 * Wrap an unknown error as a RegistryError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): RegistryError {
  if (error instanceof RegistryError) {
    return error;
  }

  const err = toError(error);
  const { category, recoverable } = categorizeError(err);

  return new RegistryError(err.message, category, recoverable, context, err);
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

export function isRecoverable(error: unknown): boolean {
  if (error instanceof RegistryError) {
    return error.recoverable;
  }
  return categorizeError(toError(error)).recoverable;
}

/**
 * Format error for display to a caller.
 */
export function formatError(error: unknown): string {
  if (error instanceof RegistryError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof RegistryError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
