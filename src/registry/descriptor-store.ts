/**
 * Tool Descriptor Store
 *
 * Source of truth for registered tool metadata, keyed by name.
 * Descriptors are validated and frozen on the way in and never replaced.
 */

import { DuplicateNameError, NotFoundError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { DescriptorSource, DiscoveryEntry, ToolDescriptor } from '../types.js';
import { parseDescriptor } from './descriptor-schema.js';

export interface DescriptorStoreOptions {
  logger?: StructuredLogger;
}

export class ToolDescriptorStore implements DescriptorSource {
  private descriptors: Map<string, ToolDescriptor> = new Map();
  private fetches = 0;
  private log: StructuredLogger;

  constructor(options: DescriptorStoreOptions = {}) {
    this.log = options.logger ?? createComponentLogger('DescriptorStore');
  }

  /**
   * Register a descriptor.
   * Throws ValidationError for a malformed descriptor and DuplicateNameError
   * when the name is taken; the store is unchanged in both cases.
   */
  register(descriptor: ToolDescriptor): void {
    const frozen = parseDescriptor(descriptor, { tool: descriptor.name });
    if (this.descriptors.has(frozen.name)) {
      throw new DuplicateNameError(frozen.name);
    }
    this.descriptors.set(frozen.name, frozen);
    this.log.forTool(frozen.name).debug('Registered tool', { category: frozen.category });
  }

  /**
   * Register a batch. Every descriptor is validated and checked for name
   * collisions (within the batch and against the store) before any is
   * written, so a failing batch leaves the store untouched.
   */
  registerAll(descriptors: Iterable<ToolDescriptor>): number {
    const batch: ToolDescriptor[] = [];
    const names = new Set<string>();

    for (const descriptor of descriptors) {
      const frozen = parseDescriptor(descriptor, { tool: descriptor.name });
      if (names.has(frozen.name) || this.descriptors.has(frozen.name)) {
        throw new DuplicateNameError(frozen.name);
      }
      names.add(frozen.name);
      batch.push(frozen);
    }

    for (const descriptor of batch) {
      this.descriptors.set(descriptor.name, descriptor);
    }
    this.log.debug('Registered tool batch', { count: batch.length, total: this.descriptors.size });
    return batch.length;
  }

  /**
   * Fetch a full descriptor. Throws NotFoundError when absent.
   */
  get(name: string): ToolDescriptor {
    this.fetches++;
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new NotFoundError(name);
    }
    return descriptor;
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  get size(): number {
    return this.descriptors.size;
  }

  /** Number of `get` calls served, hits and misses alike */
  get fetchCount(): number {
    return this.fetches;
  }

  /**
   * Lazy, restartable listing sorted by name. Each iteration takes a fresh
   * snapshot of the registered names.
   */
  listAll(): Iterable<DiscoveryEntry> {
    const descriptors = this.descriptors;
    return {
      *[Symbol.iterator](): Iterator<DiscoveryEntry> {
        const names = [...descriptors.keys()].sort();
        for (const name of names) {
          const descriptor = descriptors.get(name);
          if (descriptor) {
            yield { name: descriptor.name, category: descriptor.category };
          }
        }
      },
    };
  }
}
