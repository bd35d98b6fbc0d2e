/**
 * Shared test fixtures.
 */

import { MemorySink, StructuredLogger } from '../src/utilities/logger.js';
import type { ToolDescriptor } from '../src/types.js';

export function silentLogger(): StructuredLogger {
  return new StructuredLogger({ level: 'silent', sinks: [] });
}

export function memoryLogger(level: 'trace' | 'debug' | 'info' = 'debug'): {
  logger: StructuredLogger;
  sink: MemorySink;
} {
  const sink = new MemorySink();
  return { logger: new StructuredLogger({ level, sinks: [sink] }), sink };
}

export const echoTool: ToolDescriptor = {
  name: 'echo',
  summary: 'Return the given text unchanged.',
  category: 'util',
  parameters: [{ name: 'text', type: 'string', required: true }],
};

export const listEmailsTool: ToolDescriptor = {
  name: 'list_emails',
  summary: 'List emails in a folder, newest first.',
  category: 'email',
  parameters: [
    { name: 'folder', type: 'string', required: false, default: 'inbox' },
    { name: 'limit', type: 'integer', required: false, default: 50 },
    { name: 'unread_only', type: 'boolean', required: false },
  ],
};

export const sendEmailTool: ToolDescriptor = {
  name: 'send_email',
  summary: 'Send an email to one or more recipients.',
  category: 'email',
  parameters: [
    { name: 'to', type: 'array', required: true, description: 'Recipient addresses' },
    { name: 'subject', type: 'string', required: true },
    { name: 'body', type: 'string', required: true },
    { name: 'cc', type: 'array', required: false, default: [] },
  ],
};

export const createEventTool: ToolDescriptor = {
  name: 'create_event',
  summary: 'Create a calendar event.',
  category: 'calendar',
  parameters: [
    { name: 'subject', type: 'string', required: true },
    { name: 'start', type: 'string', required: true },
    { name: 'end', type: 'string', required: true },
    { name: 'attendees', type: 'array', required: false },
    { name: 'metadata', type: 'object', required: false },
  ],
};

export const sampleTools: ToolDescriptor[] = [echoTool, listEmailsTool, sendEmailTool, createEventTool];
