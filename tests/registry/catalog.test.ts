/**
 * File-backed Descriptor Source Tests
 *
 * Uses a temp directory laid out as <root>/<category>/<name>.json.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { DirectoryDescriptorSource, loadCatalogFile } from '../../src/registry/catalog.js';
import { DiscoveryIndex } from '../../src/registry/discovery-index.js';
import { Resolver } from '../../src/registry/resolver.js';
import { DuplicateNameError, NotFoundError, ValidationError } from '../../src/errors/index.js';
import type { DiscoveryEntry, ToolDescriptor } from '../../src/types.js';
import { createEventTool, listEmailsTool, sendEmailTool, silentLogger } from '../helpers.js';

function body(descriptor: ToolDescriptor): string {
  const { category: _category, ...rest } = descriptor;
  return JSON.stringify(rest, null, 2);
}

describe('DirectoryDescriptorSource', () => {
  let root: string;
  let source: DirectoryDescriptorSource;

  beforeEach(async () => {
    root = join(tmpdir(), `toolshelf-catalog-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(root, 'email'), { recursive: true });
    await mkdir(join(root, 'calendar'), { recursive: true });
    await writeFile(join(root, 'email', 'list_emails.json'), body(listEmailsTool));
    await writeFile(join(root, 'email', 'send_email.json'), body(sendEmailTool));
    await writeFile(join(root, 'email', 'notes.txt'), 'not a descriptor');
    await writeFile(join(root, 'calendar', 'create_event.json'), body(createEventTool));
    await writeFile(join(root, 'README.md'), '# tools');

    source = new DirectoryDescriptorSource(root, { logger: silentLogger() });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('listAll', () => {
    it('should list json files under category directories, sorted by name', async () => {
      const entries: DiscoveryEntry[] = [];
      for await (const entry of source.listAll()) {
        entries.push(entry);
      }

      expect(entries).toEqual([
        { name: 'create_event', category: 'calendar' },
        { name: 'list_emails', category: 'email' },
        { name: 'send_email', category: 'email' },
      ]);
    });

    it('should not open any descriptor file', async () => {
      await new DiscoveryIndex(source).discover();

      expect(source.filesRead).toBe(0);
    });

    it('should reject a name filed under two categories', async () => {
      const sync = JSON.stringify({ name: 'sync', summary: 'Sync now.', parameters: [] });
      await writeFile(join(root, 'calendar', 'sync.json'), sync);
      await writeFile(join(root, 'email', 'sync.json'), sync);

      const discovery = new DiscoveryIndex(source).discover();

      await expect(discovery).rejects.toThrow(DuplicateNameError);
      await expect(discovery).rejects.toThrow(
        `Tool "sync" is defined more than once: ${join(root, 'calendar', 'sync.json')}, ${join(root, 'email', 'sync.json')}`
      );
    });
  });

  describe('get', () => {
    it('should read one descriptor and take the category from its directory', async () => {
      const descriptor = await source.get('send_email');

      expect(descriptor).toEqual(sendEmailTool);
      expect(source.filesRead).toBe(1);
    });

    it('should return a frozen descriptor', async () => {
      expect(Object.isFrozen(await source.get('create_event'))).toBe(true);
    });

    it('should refuse to pick between two categories defining the same name', async () => {
      const sync = JSON.stringify({ name: 'sync', summary: 'Sync now.', parameters: [] });
      await writeFile(join(root, 'calendar', 'sync.json'), sync);
      await writeFile(join(root, 'email', 'sync.json'), sync);

      const error = await source.get('sync').then(
        () => undefined,
        (err: unknown) => err
      );

      expect(error).toBeInstanceOf(DuplicateNameError);
      expect(error).toMatchObject({
        context: {
          tool: 'sync',
          locations: [join(root, 'calendar', 'sync.json'), join(root, 'email', 'sync.json')],
        },
      });
      expect(source.filesRead).toBe(0);
    });

    it('should throw NotFoundError for a missing file', async () => {
      await expect(source.get('missing')).rejects.toThrow(NotFoundError);
      expect(source.filesRead).toBe(0);
    });

    it('should refuse names that could escape the root', async () => {
      await expect(source.get('../README')).rejects.toThrow(NotFoundError);
      await expect(source.get('email/list_emails')).rejects.toThrow(NotFoundError);
    });

    it('should reject a descriptor that fails the schema', async () => {
      await writeFile(join(root, 'email', 'broken.json'), JSON.stringify({ name: 'broken', summary: 3, parameters: [] }));

      await expect(source.get('broken')).rejects.toThrow(ValidationError);
      await expect(source.get('broken')).rejects.toThrow('summary: Expected string, received number');
    });

    it('should reject a file that is not JSON', async () => {
      const path = join(root, 'email', 'garbled.json');
      await writeFile(path, '{ not json');

      await expect(source.get('garbled')).rejects.toThrow(`${path}: failed to parse JSON`);
    });

    it('should reject a file whose name field disagrees with the file name', async () => {
      const path = join(root, 'email', 'alias.json');
      await writeFile(path, JSON.stringify({ name: 'other', summary: 'x', parameters: [] }));

      await expect(source.get('alias')).rejects.toThrow(`Descriptor in ${path} is named "other", expected "alias"`);
    });
  });

  it('should be read once per tool through a resolver', async () => {
    const resolver = new Resolver(source, { logger: silentLogger() });

    await Promise.all([resolver.resolve('list_emails'), resolver.resolve('list_emails')]);
    await resolver.resolve('list_emails');

    expect(source.filesRead).toBe(1);
  });
});

describe('loadCatalogFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `toolshelf-catalog-file-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load every descriptor in the array', async () => {
    const path = join(dir, 'catalog.json');
    await writeFile(path, JSON.stringify([listEmailsTool, sendEmailTool]));

    const descriptors = await loadCatalogFile(path);

    expect(descriptors).toEqual([listEmailsTool, sendEmailTool]);
    expect(Object.isFrozen(descriptors[0])).toBe(true);
  });

  it('should point at the failing element', async () => {
    const path = join(dir, 'catalog.json');
    await writeFile(path, JSON.stringify([{ name: 'x', summary: 'x', parameters: [] }]));

    await expect(loadCatalogFile(path)).rejects.toThrow('Validation failed: 0.category: Required');
  });

  it('should reject a catalog that is not an array', async () => {
    const path = join(dir, 'catalog.json');
    await writeFile(path, JSON.stringify({ tools: [] }));

    await expect(loadCatalogFile(path)).rejects.toThrow('(root): Expected array, received object');
  });
});
