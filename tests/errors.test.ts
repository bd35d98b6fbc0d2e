/**
 * Error Types Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  CancellationError,
  DuplicateNameError,
  ErrorCategory,
  NotFoundError,
  RegistryError,
  TransportFault,
  ValidationError,
  categorizeError,
  formatError,
  formatErrorForLog,
  isRecoverable,
  isRegistryError,
  wrapError,
} from '../src/errors/index.js';

describe('RegistryError', () => {
  it('should carry category, recoverability and context', () => {
    const error = new RegistryError('boom', ErrorCategory.INTERNAL, false, { step: 'resolve' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RegistryError');
    expect(error.category).toBe(ErrorCategory.INTERNAL);
    expect(error.recoverable).toBe(false);
    expect(error.context).toEqual({ step: 'resolve' });
  });

  it('should serialize with the cause message', () => {
    const cause = new Error('disk full');
    const json = new RegistryError('write failed', ErrorCategory.DEPENDENCY, false, undefined, cause).toJSON();

    expect(json.message).toBe('write failed');
    expect(json.category).toBe('DEPENDENCY');
    expect(json.cause).toBe('disk full');
    expect(typeof json.timestamp).toBe('string');
  });

  it('should format for logs', () => {
    const error = new NotFoundError('ghost');

    expect(error.toLogString()).toBe('[NotFoundError] (PERMANENT) Tool not found: ghost context={"tool":"ghost"}');
  });
});

describe('specialized errors', () => {
  it('DuplicateNameError names the tool', () => {
    const error = new DuplicateNameError('echo');

    expect(error.message).toBe('Tool "echo" is already registered');
    expect(error.toolName).toBe('echo');
    expect(error).toBeInstanceOf(RegistryError);
  });

  it('DuplicateNameError lists clashing locations', () => {
    const error = new DuplicateNameError('sync', ['/tools/calendar/sync.json', '/tools/email/sync.json']);

    expect(error.message).toBe(
      'Tool "sync" is defined more than once: /tools/calendar/sync.json, /tools/email/sync.json'
    );
    expect(error.context).toEqual({
      tool: 'sync',
      locations: ['/tools/calendar/sync.json', '/tools/email/sync.json'],
    });
  });

  it('ValidationError factories set the parameter', () => {
    expect(ValidationError.missingRequired('to').parameter).toBe('to');
    expect(ValidationError.typeMismatch('limit', 'integer', '5').message).toBe(
      'Parameter "limit" expected integer, got string'
    );
    expect(ValidationError.typeMismatch('limit', 'integer', 2.5).message).toBe(
      'Parameter "limit" expected integer, got number'
    );
    expect(ValidationError.unknownArgument('bcc').message).toBe('Unknown argument: bcc');
  });

  it('ValidationError.fromZodError lists every issue', () => {
    const result = z.object({ name: z.string(), count: z.number() }).safeParse({ count: 'x' });
    if (result.success) throw new Error('expected failure');

    const error = ValidationError.fromZodError(result.error);

    expect(error.message).toBe(
      'Validation failed: name: Required, count: Expected number, received string'
    );
    expect(error.parameter).toBe('name');
  });

  it('TransportFault.timeout is transient', () => {
    const fault = TransportFault.timeout('send_email', 250);

    expect(fault.message).toBe('Transport call timed out after 250ms');
    expect(fault.category).toBe(ErrorCategory.TRANSIENT);
    expect(fault.recoverable).toBe(true);
    expect(fault.context).toEqual({ timeoutMs: 250, tool: 'send_email' });
  });

  it('TransportFault.fromError keeps existing faults', () => {
    const original = TransportFault.noHandler('x');

    expect(TransportFault.fromError(original, 'x')).toBe(original);
  });

  it('TransportFault.fromError categorizes plain errors', () => {
    const fault = TransportFault.fromError(new Error('socket hang up'), 'list_emails');

    expect(fault.category).toBe(ErrorCategory.TRANSIENT);
    expect(fault.toolName).toBe('list_emails');
    expect(fault.cause).toBeInstanceOf(Error);
  });

  it('CancellationError defaults its reason', () => {
    expect(new CancellationError().reason).toBe('Operation cancelled');
  });
});

describe('categorizeError', () => {
  it('should treat network codes as transient', () => {
    const error = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });

    expect(categorizeError(error)).toEqual({ category: ErrorCategory.TRANSIENT, recoverable: true });
  });

  it('should recognize cancellation and validation messages', () => {
    expect(categorizeError(new Error('request aborted')).category).toBe(ErrorCategory.CANCELLED);
    expect(categorizeError(new Error('invalid recipient')).category).toBe(ErrorCategory.VALIDATION);
  });

  it('should default to dependency failures', () => {
    expect(categorizeError(new Error('mailbox locked'))).toEqual({
      category: ErrorCategory.DEPENDENCY,
      recoverable: false,
    });
  });
});

describe('utilities', () => {
  it('wrapError should pass registry errors through', () => {
    const error = new NotFoundError('x');
    expect(wrapError(error)).toBe(error);
    expect(wrapError('plain').message).toBe('plain');
  });

  it('isRegistryError and isRecoverable', () => {
    expect(isRegistryError(new NotFoundError('x'))).toBe(true);
    expect(isRegistryError(new Error('x'))).toBe(false);
    expect(isRecoverable(new Error('mailbox locked'))).toBe(false);
    expect(isRecoverable(new Error('request timed out'))).toBe(true);
  });

  it('formatError and formatErrorForLog', () => {
    expect(formatError(new NotFoundError('x'))).toBe('NotFoundError: Tool not found: x');
    expect(formatError(new Error('plain'))).toBe('plain');
    expect(formatError(42)).toBe('42');
    expect(formatErrorForLog(new Error('plain'))).toBe('[Error] plain');
    expect(formatErrorForLog('text')).toBe('[Unknown] text');
  });
});
