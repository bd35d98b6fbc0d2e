/**
 * Core types for the tool registry.
 *
 * A tool is described once (ToolDescriptor), listed cheaply (DiscoveryEntry),
 * and invoked through an InvocationRequest that always settles as an
 * InvocationResult value.
 */

import type { CancellationToken } from './utilities/cancellation.js';

// =============================================================================
// DESCRIPTORS
// =============================================================================

/**
 * Value types a parameter can declare.
 * `integer` is a number with no fractional part; `any` accepts everything.
 */
export const TYPE_TAGS = ['string', 'number', 'integer', 'boolean', 'array', 'object', 'any'] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

/**
 * Anything JSON can carry. Declared defaults are restricted to this so they
 * can be copied for each call.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface ParameterSpec {
  name: string;
  type: TypeTag;
  required: boolean;
  /** Filled in when the argument is absent; each call receives its own copy */
  default?: JsonValue;
  description?: string;
}

/**
 * Full metadata for one tool. Immutable once registered.
 */
export interface ToolDescriptor {
  /** Unique identifier */
  name: string;
  /** Short human-readable description */
  summary: string;
  /** Declaration order is the validation order */
  parameters: readonly ParameterSpec[];
  /** Grouping label used for discovery */
  category: string;
}

/**
 * Cheap listing projection. Never carries `summary` or `parameters`.
 */
export interface DiscoveryEntry {
  name: string;
  category: string;
}

/**
 * Anything the resolver can fetch descriptors from.
 * The in-memory store answers synchronously; file-backed sources are async.
 */
export interface DescriptorSource {
  /** Sorted by name; restartable */
  listAll(): Iterable<DiscoveryEntry> | AsyncIterable<DiscoveryEntry>;
  /** Throws NotFoundError when the name is unknown */
  get(name: string): ToolDescriptor | Promise<ToolDescriptor>;
}

// =============================================================================
// INVOCATION
// =============================================================================

export interface InvocationRequest {
  toolName: string;
  arguments: Record<string, unknown>;
}

export type InvocationStatus = 'Ok' | 'ValidationError' | 'NotFound' | 'TransportError';

export interface InvocationErrorDetail {
  message: string;
  /** The failing parameter, for validation errors */
  parameter?: string;
}

export type InvocationResult =
  | { status: 'Ok'; toolName: string; value: unknown; durationMs: number }
  | {
      status: Exclude<InvocationStatus, 'Ok'>;
      toolName: string;
      error: InvocationErrorDetail;
    };

export interface InvokeOptions {
  /** Overrides the registry default. 0 disables the timeout. */
  timeoutMs?: number;
  /** Caller-side cancellation */
  token?: CancellationToken;
}

/**
 * Events emitted during invocation.
 */
export type InvocationEvent =
  | { type: 'invoke_start'; tool: string }
  | { type: 'not_found'; tool: string }
  | { type: 'validation_failed'; tool: string; parameter?: string; message: string }
  | { type: 'transport_call'; tool: string; arguments: Record<string, unknown> }
  | { type: 'complete'; tool: string; durationMs: number }
  | { type: 'transport_error'; tool: string; message: string };

export type InvocationEventListener = (event: InvocationEvent) => void;
