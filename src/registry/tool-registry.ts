/**
 * Tool Registry
 *
 * One explicit registry object per process: it owns the descriptor store,
 * the discovery index, the resolver cache and the invoker. Construct it at
 * startup, bulk-register descriptors, then hand it to callers.
 * `dispose()` is the teardown: it drops the resolver cache and cancels any
 * call still waiting on the transport.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry({ transport });
 * registry.registerAll(descriptors);
 *
 * const entries = await registry.discover('email');
 * const result = await registry.invoke({ toolName: 'send_email', arguments: { ... } });
 * if (result.status === 'Ok') use(result.value);
 * ```
 */

import { RegistryError, ErrorCategory } from '../errors/index.js';
import {
  createCancellationTokenSource,
  type CancellationTokenSource,
} from '../utilities/cancellation.js';
import { logger as globalLogger, type StructuredLogger } from '../utilities/logger.js';
import { resolveRegistryConfig, type ResolvedRegistryConfig, type ValidatedRegistryConfig } from '../config/schema.js';
import type { Transport } from '../transport/types.js';
import type {
  DescriptorSource,
  DiscoveryEntry,
  InvocationEventListener,
  InvocationRequest,
  InvocationResult,
  InvokeOptions,
  ToolDescriptor,
} from '../types.js';
import { DirectoryDescriptorSource, loadCatalogFile } from './catalog.js';
import { ToolDescriptorStore } from './descriptor-store.js';
import { DiscoveryIndex, type CategorySummary, type SearchOptions } from './discovery-index.js';
import { Invoker } from './invoker.js';
import { Resolver } from './resolver.js';
import { formatSignature, toToolDescription, type ToolDescription } from './schema-export.js';

export interface ToolRegistryOptions {
  transport: Transport;
  config?: ValidatedRegistryConfig;
  /**
   * Read-only descriptor source to discover and resolve from instead of the
   * registry's own store (e.g. a DirectoryDescriptorSource).
   */
  source?: DescriptorSource;
  /** Parent logger; defaults to the global logger */
  logger?: StructuredLogger;
}

export class ToolRegistry {
  readonly config: ResolvedRegistryConfig;
  private readonly store: ToolDescriptorStore;
  private readonly source: DescriptorSource;
  private readonly index: DiscoveryIndex;
  private readonly resolver: Resolver;
  private readonly invoker: Invoker;
  private readonly lifetime: CancellationTokenSource;
  private readonly log: StructuredLogger;
  private disposed = false;

  constructor(options: ToolRegistryOptions) {
    this.config = resolveRegistryConfig(options.config);

    const parent = options.logger ?? globalLogger;
    const root = parent.child({}, options.config?.logLevel ?? parent.level);
    this.log = root.forComponent('ToolRegistry');

    this.lifetime = createCancellationTokenSource();
    this.store = new ToolDescriptorStore({ logger: root.forComponent('DescriptorStore') });
    this.source = options.source ?? this.store;
    this.index = new DiscoveryIndex(this.source, this.config.searchLimit);
    this.resolver = new Resolver(this.source, { logger: root.forComponent('Resolver') });
    this.invoker = new Invoker(this.resolver, options.transport, {
      defaultTimeoutMs: this.config.defaultTimeoutMs,
      lifetimeToken: this.lifetime.token,
      logger: root.forComponent('Invoker'),
    });
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  register(descriptor: ToolDescriptor): void {
    this.assertWritable();
    this.store.register(descriptor);
  }

  /**
   * Startup bulk load. Fails fast on the first DuplicateNameError or
   * ValidationError without registering any of the batch.
   */
  registerAll(descriptors: Iterable<ToolDescriptor>): number {
    this.assertWritable();
    const count = this.store.registerAll(descriptors);
    this.log.info('Registered tools', { count, total: this.store.size });
    return count;
  }

  /**
   * Register every descriptor from the given catalog files, in order.
   */
  async registerCatalogs(paths: string[]): Promise<number> {
    let total = 0;
    for (const path of paths) {
      total += this.registerAll(await loadCatalogFile(path));
    }
    return total;
  }

  // ---------------------------------------------------------------------------
  // Discovery & resolution
  // ---------------------------------------------------------------------------

  discover(category?: string): Promise<DiscoveryEntry[]> {
    return this.index.discover(category);
  }

  categories(): Promise<CategorySummary[]> {
    return this.index.categories();
  }

  search(query: string, options?: SearchOptions): Promise<DiscoveryEntry[]> {
    return this.index.search(query, options);
  }

  /**
   * Full descriptor, memoized. Throws NotFoundError for unknown names.
   */
  resolve(name: string): Promise<ToolDescriptor> {
    return this.resolver.resolve(name);
  }

  async describe(name: string): Promise<ToolDescription> {
    return toToolDescription(await this.resolver.resolve(name));
  }

  async signature(name: string): Promise<string> {
    return formatSignature(await this.resolver.resolve(name));
  }

  // ---------------------------------------------------------------------------
  // Invocation
  // ---------------------------------------------------------------------------

  /**
   * Invoke a tool. Never rejects; inspect `status` on the result.
   */
  async invoke(request: InvocationRequest, options?: InvokeOptions): Promise<InvocationResult> {
    if (this.disposed) {
      return {
        status: 'TransportError',
        toolName: request.toolName,
        error: { message: 'Registry disposed' },
      };
    }
    return this.invoker.invoke(request, options);
  }

  on(listener: InvocationEventListener): () => void {
    return this.invoker.on(listener);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  get isDisposed(): boolean {
    return this.disposed;
  }

  get resolvedCount(): number {
    return this.resolver.cachedCount;
  }

  /**
   * Teardown. Pending calls settle as TransportError; later invokes return
   * TransportError("Registry disposed").
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.lifetime.cancel('Registry disposed');
    this.lifetime.dispose();
    this.invoker.removeAllListeners();
    this.resolver.clear();
    this.log.debug('Registry disposed');
  }

  private assertWritable(): void {
    if (this.disposed) {
      throw new RegistryError('Registry disposed', ErrorCategory.PERMANENT, false);
    }
    if (this.source !== this.store) {
      throw new RegistryError(
        'Registry is backed by a read-only descriptor source',
        ErrorCategory.PERMANENT,
        false
      );
    }
  }
}

/**
 * Build a registry from configuration: a `toolsDirectory` becomes the
 * descriptor source, otherwise every `catalogPaths` file is registered.
 * Registration failures propagate and should abort startup.
 */
export async function createToolRegistry(options: ToolRegistryOptions): Promise<ToolRegistry> {
  const config = resolveRegistryConfig(options.config);
  const parent = options.logger ?? globalLogger;
  const log = parent.child({}, options.config?.logLevel ?? parent.level);
  const source =
    options.source ??
    (config.toolsDirectory
      ? new DirectoryDescriptorSource(config.toolsDirectory, {
          logger: log.forComponent('DirectorySource'),
        })
      : undefined);

  const registry = new ToolRegistry({ ...options, source });

  if (config.catalogPaths.length > 0) {
    if (source) {
      log.forComponent('ToolRegistry').warn('Ignoring catalogPaths: registry uses a read-only source', {
        catalogPaths: config.catalogPaths,
      });
    } else {
      await registry.registerCatalogs(config.catalogPaths);
    }
  }

  return registry;
}
