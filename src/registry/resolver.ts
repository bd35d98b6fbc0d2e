/**
 * Resolver
 *
 * On-demand, memoized access to full descriptors. The first resolve of a
 * name fetches from the source; every later resolve returns the cached
 * reference. Concurrent first resolves share one in-flight fetch, so the
 * source sees exactly one lookup per name.
 */

import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { DescriptorSource, ToolDescriptor } from '../types.js';

export interface ResolverOptions {
  logger?: StructuredLogger;
}

export class Resolver {
  private cache: Map<string, ToolDescriptor> = new Map();
  private inflight: Map<string, Promise<ToolDescriptor>> = new Map();
  /** Bumped by clear(); fetches started under an older generation are not cached */
  private generation = 0;
  private log: StructuredLogger;

  constructor(
    private readonly source: DescriptorSource,
    options: ResolverOptions = {}
  ) {
    this.log = options.logger ?? createComponentLogger('Resolver');
  }

  /**
   * Resolve a tool's full descriptor.
   * NotFoundError from the source propagates unchanged and is not cached.
   */
  async resolve(name: string): Promise<ToolDescriptor> {
    const cached = this.cache.get(name);
    if (cached) {
      this.log.forTool(name).trace('Cache hit');
      return cached;
    }

    const pending = this.inflight.get(name);
    if (pending) {
      this.log.forTool(name).trace('Joining in-flight resolve');
      return pending;
    }

    // Published before the first await so concurrent callers find it
    const fetch = this.fetchDescriptor(name);
    this.inflight.set(name, fetch);
    try {
      return await fetch;
    } finally {
      if (this.inflight.get(name) === fetch) {
        this.inflight.delete(name);
      }
    }
  }

  isResolved(name: string): boolean {
    return this.cache.has(name);
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  /**
   * Forget every cached descriptor. Used at registry teardown; fetches
   * still pending settle for their callers but are not cached.
   */
  clear(): void {
    this.generation++;
    this.cache.clear();
    this.inflight.clear();
  }

  private async fetchDescriptor(name: string): Promise<ToolDescriptor> {
    const generation = this.generation;
    this.log.forTool(name).debug('Cache miss');
    const descriptor = await this.source.get(name);
    if (generation === this.generation) {
      this.cache.set(name, descriptor);
    }
    return descriptor;
  }
}
