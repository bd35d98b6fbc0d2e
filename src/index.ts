/**
 * toolshelf - on-demand tool discovery and invocation for LLM tool calling.
 *
 * Callers list tools cheaply (`discover`), fetch one full descriptor when
 * they need it (`resolve`), and invoke through an injected transport
 * (`invoke`) that always answers with a result value.
 */

export * from './types.js';
export * from './errors/index.js';

export { ToolRegistry, createToolRegistry, type ToolRegistryOptions } from './registry/tool-registry.js';
export { ToolDescriptorStore, type DescriptorStoreOptions } from './registry/descriptor-store.js';
export {
  DiscoveryIndex,
  type CategorySummary,
  type SearchOptions,
} from './registry/discovery-index.js';
export { Resolver, type ResolverOptions } from './registry/resolver.js';
export { Invoker, DEFAULT_TIMEOUT_MS, type InvokerOptions } from './registry/invoker.js';
export {
  validateArguments,
  matchesType,
  type ArgumentValidationResult,
} from './registry/argument-validator.js';
export {
  DirectoryDescriptorSource,
  createDirectorySource,
  loadCatalogFile,
  type DirectorySourceOptions,
} from './registry/catalog.js';
export {
  ToolDescriptorSchema,
  ParameterSpecSchema,
  JsonValueSchema,
  ToolCatalogSchema,
  parseDescriptor,
} from './registry/descriptor-schema.js';
export {
  toToolDescription,
  formatSignature,
  type ToolDescription,
  type JSONSchema,
  type JSONSchemaProperty,
} from './registry/schema-export.js';

export type { Transport, TransportCallOptions } from './transport/types.js';
export {
  InMemoryTransport,
  createInMemoryTransport,
  type ToolHandler,
  type ToolHandlerContext,
} from './transport/in-memory-transport.js';

export * from './config/index.js';
export {
  CancellationToken,
  createCancellationTokenSource,
  createLinkedTokenSource,
  createTimeoutToken,
  race,
  sleep,
  toAbortSignal,
  isCancellationError,
  isTimerDelay,
  MAX_TIMER_DELAY_MS,
  type CancellationTokenSource,
  type Disposable,
} from './utilities/cancellation.js';
export {
  StructuredLogger,
  ConsoleSink,
  MemorySink,
  configureLogger,
  createComponentLogger,
  isLogLevel,
  logger,
  type LogLevel,
  type LogEntry,
  type LogScope,
  type LogSink,
  type EntryFilter,
  type LoggerConfig,
} from './utilities/logger.js';
