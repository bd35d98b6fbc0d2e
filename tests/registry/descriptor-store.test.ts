/**
 * Tool Descriptor Store Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ToolDescriptorStore } from '../../src/registry/descriptor-store.js';
import { parseDescriptor } from '../../src/registry/descriptor-schema.js';
import { DuplicateNameError, NotFoundError, ValidationError } from '../../src/errors/index.js';
import type { ToolDescriptor } from '../../src/types.js';
import { echoTool, sampleTools, sendEmailTool, silentLogger } from '../helpers.js';

describe('ToolDescriptorStore', () => {
  let store: ToolDescriptorStore;

  beforeEach(() => {
    store = new ToolDescriptorStore({ logger: silentLogger() });
  });

  describe('register', () => {
    it('should register and return a value-equal descriptor', () => {
      store.register(echoTool);

      expect(store.has('echo')).toBe(true);
      expect(store.size).toBe(1);
      expect(store.get('echo')).toEqual(echoTool);
    });

    it('should freeze the stored descriptor', () => {
      store.register(sendEmailTool);
      const stored = store.get('send_email');

      expect(Object.isFrozen(stored)).toBe(true);
      expect(Object.isFrozen(stored.parameters)).toBe(true);
      expect(Object.isFrozen(stored.parameters[0])).toBe(true);
    });

    it('should freeze a copy of each default', () => {
      const labels = ['inbox'];
      store.register({
        name: 'tag_email',
        summary: 'Tag an email',
        category: 'email',
        parameters: [{ name: 'labels', type: 'array', required: false, default: labels }],
      });
      const stored = store.get('tag_email').parameters[0].default;

      expect(stored).toEqual(['inbox']);
      expect(stored).not.toBe(labels);
      expect(Object.isFrozen(stored)).toBe(true);
      expect(Object.isFrozen(labels)).toBe(false);
    });

    it('should reject a default that is not a JSON value', () => {
      const input: unknown = {
        name: 'schedule',
        summary: 'Schedule a job',
        category: 'util',
        parameters: [{ name: 'at', type: 'any', required: false, default: new Date(0) }],
      };

      expect(() => parseDescriptor(input)).toThrow(ValidationError);
    });

    it('should not be affected by later mutation of the input', () => {
      const input = { ...echoTool, parameters: [{ ...echoTool.parameters[0] }] };
      store.register(input);
      input.summary = 'changed';

      expect(store.get('echo').summary).toBe('Return the given text unchanged.');
    });

    it('should reject a duplicate name and keep the first registration', () => {
      store.register(echoTool);
      const impostor: ToolDescriptor = { ...echoTool, summary: 'Something else', category: 'other' };

      expect(() => store.register(impostor)).toThrow(DuplicateNameError);
      expect(store.size).toBe(1);
      expect(store.get('echo').summary).toBe('Return the given text unchanged.');
      expect(store.get('echo').category).toBe('util');
    });

    it('should reject duplicate parameter names', () => {
      const bad: ToolDescriptor = {
        name: 'bad',
        summary: 'Bad tool',
        category: 'util',
        parameters: [
          { name: 'x', type: 'string', required: true },
          { name: 'x', type: 'number', required: false },
        ],
      };

      expect(() => store.register(bad)).toThrow(ValidationError);
      expect(store.has('bad')).toBe(false);
    });

    it('should reject an empty name', () => {
      expect(() => store.register({ ...echoTool, name: '' })).toThrow(ValidationError);
      expect(store.size).toBe(0);
    });
  });

  describe('registerAll', () => {
    it('should register every descriptor', () => {
      expect(store.registerAll(sampleTools)).toBe(4);
      expect(store.size).toBe(4);
    });

    it('should leave the store untouched when the batch collides with itself', () => {
      expect(() => store.registerAll([echoTool, sendEmailTool, echoTool])).toThrow(DuplicateNameError);
      expect(store.size).toBe(0);
    });

    it('should leave the store untouched when the batch collides with the store', () => {
      store.register(echoTool);

      expect(() => store.registerAll([sendEmailTool, echoTool])).toThrow(DuplicateNameError);
      expect(store.size).toBe(1);
      expect(store.has('send_email')).toBe(false);
    });
  });

  describe('get', () => {
    it('should throw NotFoundError for an unknown name', () => {
      expect(() => store.get('missing')).toThrow(NotFoundError);
    });

    it('should count every lookup', () => {
      store.register(echoTool);
      store.get('echo');
      expect(() => store.get('missing')).toThrow();

      expect(store.fetchCount).toBe(2);
    });
  });

  describe('listAll', () => {
    it('should list entries sorted by name with only name and category', () => {
      store.registerAll(sampleTools);

      expect([...store.listAll()]).toEqual([
        { name: 'create_event', category: 'calendar' },
        { name: 'echo', category: 'util' },
        { name: 'list_emails', category: 'email' },
        { name: 'send_email', category: 'email' },
      ]);
    });

    it('should be restartable', () => {
      store.registerAll(sampleTools);
      const listing = store.listAll();

      expect([...listing]).toEqual([...listing]);
      expect([...listing]).toHaveLength(4);
    });

    it('should reflect registrations made after the listing was created', () => {
      const listing = store.listAll();
      store.register(echoTool);

      expect([...listing]).toEqual([{ name: 'echo', category: 'util' }]);
    });

    it('should not count as a fetch', () => {
      store.registerAll(sampleTools);
      [...store.listAll()];

      expect(store.fetchCount).toBe(0);
    });
  });
});
