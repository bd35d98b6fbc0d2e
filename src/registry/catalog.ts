/**
 * File-backed descriptor sources.
 *
 * DirectoryDescriptorSource lays tools out as
 *
 *   <root>/
 *   ├── email/
 *   │   ├── list_emails.json
 *   │   └── send_email.json
 *   └── calendar/
 *       └── create_event.json
 *
 * Listing only reads directory entries; a descriptor file is opened the
 * first time its tool is resolved. loadCatalogFile reads a single JSON
 * array of full descriptors for bulk registration at startup.
 */

import { access, readFile, readdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { DuplicateNameError, NotFoundError, ValidationError, formatError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { DescriptorSource, DiscoveryEntry, ToolDescriptor } from '../types.js';
import { ToolCatalogSchema, freezeDescriptor, parseDescriptorBody } from './descriptor-schema.js';

const DESCRIPTOR_EXT = '.json';
const SAFE_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export interface DirectorySourceOptions {
  logger?: StructuredLogger;
}

export class DirectoryDescriptorSource implements DescriptorSource {
  private reads = 0;
  private log: StructuredLogger;

  constructor(
    private readonly root: string,
    options: DirectorySourceOptions = {}
  ) {
    this.log = options.logger ?? createComponentLogger('DirectorySource');
  }

  /**
   * Enumerate `<category>/<name>.json` entries, sorted by name.
   * No descriptor file is opened. A name filed under two categories
   * throws DuplicateNameError.
   */
  async *listAll(): AsyncIterable<DiscoveryEntry> {
    const entries: DiscoveryEntry[] = [];
    const paths = new Map<string, string>();
    for (const category of await this.categoryDirs()) {
      const files = await readdir(join(this.root, category), { withFileTypes: true });
      for (const file of files) {
        if (!file.isFile() || extname(file.name) !== DESCRIPTOR_EXT) continue;

        const name = basename(file.name, DESCRIPTOR_EXT);
        const path = join(this.root, category, file.name);
        const previous = paths.get(name);
        if (previous !== undefined) {
          throw new DuplicateNameError(name, [previous, path]);
        }
        paths.set(name, path);
        entries.push({ name, category });
      }
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    yield* entries;
  }

  /**
   * Read and validate one descriptor file.
   */
  async get(name: string): Promise<ToolDescriptor> {
    if (!SAFE_NAME.test(name)) {
      throw new NotFoundError(name, { source: this.root });
    }

    const found: Array<{ category: string; path: string }> = [];
    for (const category of await this.categoryDirs()) {
      const path = join(this.root, category, `${name}${DESCRIPTOR_EXT}`);
      if (await exists(path)) found.push({ category, path });
    }

    const [match, ...others] = found;
    if (match === undefined) {
      throw new NotFoundError(name, { source: this.root });
    }
    if (others.length > 0) {
      throw new DuplicateNameError(name, found.map((f) => f.path));
    }

    this.reads++;
    this.log.forTool(name).debug('Reading descriptor file', { path: match.path });
    const descriptor = parseDescriptorBody(await readJson(match.path), match.category, { path: match.path });
    if (descriptor.name !== name) {
      throw new ValidationError(
        `Descriptor in ${match.path} is named "${descriptor.name}", expected "${name}"`,
        undefined,
        { path: match.path }
      );
    }
    return descriptor;
  }

  /** Number of descriptor files opened so far */
  get filesRead(): number {
    return this.reads;
  }

  private async categoryDirs(): Promise<string[]> {
    const entries = await readdir(this.root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function readJson(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ValidationError(`${path}: failed to parse JSON — ${formatError(err)}`, undefined, {
      path,
    });
  }
}

/**
 * Read a catalog file holding a JSON array of full descriptors.
 * Throws ValidationError naming the file when it is malformed.
 */
export async function loadCatalogFile(path: string): Promise<ToolDescriptor[]> {
  const result = ToolCatalogSchema.safeParse(await readJson(path));
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, { path });
  }
  return result.data.map((descriptor) =>
    freezeDescriptor({
      name: descriptor.name,
      summary: descriptor.summary,
      category: descriptor.category,
      parameters: descriptor.parameters,
    })
  );
}

export function createDirectorySource(root: string, options?: DirectorySourceOptions): DirectoryDescriptorSource {
  return new DirectoryDescriptorSource(root, options);
}
