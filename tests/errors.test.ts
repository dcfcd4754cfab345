/**
 * Tests for the centralized error types.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ErrorCategory,
  AgentError,
  SessionNotFoundError,
  SessionCorruptedError,
  SessionStorageError,
  SessionContractError,
  ValidationError,
  CancellationError,
  CompactionError,
  categorizeError,
  wrapError,
  isRecoverable,
  formatErrorForLog,
} from '../src/errors/index.js';

function errno(code: string, message = `${code}: simulated`): Error {
  return Object.assign(new Error(message), { code });
}

describe('Error Types', () => {
  describe('AgentError', () => {
    it('should create error with all properties', () => {
      const cause = new Error('root cause');
      const error = new AgentError('Something went wrong', ErrorCategory.TRANSIENT, true, { key: 'value' }, cause);

      expect(error.message).toBe('Something went wrong');
      expect(error.category).toBe(ErrorCategory.TRANSIENT);
      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ key: 'value' });
      expect(error.cause).toBe(cause);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should serialize to JSON', () => {
      const json = new AgentError('Test error', ErrorCategory.PERMANENT, false, { foo: 'bar' }).toJSON();

      expect(json).toMatchObject({
        name: 'AgentError',
        message: 'Test error',
        category: 'PERMANENT',
        recoverable: false,
        context: { foo: 'bar' },
      });
    });

    it('should format for logs', () => {
      const error = new AgentError('Disk busy', ErrorCategory.TRANSIENT, true, { path: '/tmp/x' });
      expect(error.toLogString()).toBe('[AgentError] (TRANSIENT) Disk busy context={"path":"/tmp/x"}');
    });
  });

  describe('session errors', () => {
    it('SessionNotFoundError carries the id', () => {
      const error = new SessionNotFoundError('abc');

      expect(error.message).toBe('Session not found: abc');
      expect(error.sessionId).toBe('abc');
      expect(error.category).toBe(ErrorCategory.PERMANENT);
      expect(error).toBeInstanceOf(AgentError);
    });

    it('SessionCorruptedError is recoverable', () => {
      const error = new SessionCorruptedError('abc', '/s/abc.json', 'invalid JSON');

      expect(error.message).toBe('Session file is corrupted: abc (invalid JSON)');
      expect(error.path).toBe('/s/abc.json');
      expect(error.recoverable).toBe(true);
    });

    it('SessionContractError names the operation', () => {
      const error = new SessionContractError('addMessage');

      expect(error.message).toBe('addMessage requires a current session; call create() or resume() first');
      expect(error.category).toBe(ErrorCategory.INTERNAL);
      expect(error.recoverable).toBe(false);
    });
  });

  describe('SessionStorageError.wrap', () => {
    it('reports a full disk', () => {
      const error = SessionStorageError.wrap(errno('ENOSPC'), 'save', '/s/abc.json');

      expect(error.message).toBe('Failed to save /s/abc.json: disk full');
      expect(error.code).toBe('ENOSPC');
      expect(error.category).toBe(ErrorCategory.RESOURCE);
      expect(error.recoverable).toBe(false);
    });

    it('reports missing permissions', () => {
      const error = SessionStorageError.wrap(errno('EACCES'), 'load', '/s/abc.json');
      expect(error.message).toBe('Failed to load /s/abc.json: permission denied');
    });

    it('treats a busy file as transient', () => {
      const error = SessionStorageError.wrap(errno('EBUSY', 'resource busy'), 'delete', '/s/abc.json');

      expect(error.message).toBe('Failed to delete /s/abc.json: resource busy');
      expect(error.category).toBe(ErrorCategory.TRANSIENT);
      expect(error.recoverable).toBe(true);
    });

    it('does not wrap twice', () => {
      const first = SessionStorageError.wrap(new Error('boom'), 'save', '/p');
      expect(SessionStorageError.wrap(first, 'index', '/q')).toBe(first);
    });

    it('wraps non-errors', () => {
      const error = SessionStorageError.wrap('plain', 'list', '/s');

      expect(error.message).toBe('Failed to list /s: plain');
      expect(error.code).toBeUndefined();
    });
  });

  describe('ValidationError.fromZodError', () => {
    it('lists every failing field', () => {
      const schema = z.object({ name: z.string(), size: z.number() });
      const result = schema.safeParse({ name: 1, size: 'big' });
      if (result.success) throw new Error('expected failure');

      const error = ValidationError.fromZodError(result.error);

      expect(error.fields).toEqual(['name', 'size']);
      expect(error.message).toBe(
        'Validation failed: name: Expected string, received number, size: Expected number, received string',
      );
    });
  });

  describe('CancellationError and CompactionError', () => {
    it('defaults the cancellation reason', () => {
      const error = new CancellationError();

      expect(error.reason).toBe('Operation cancelled');
      expect(error.category).toBe(ErrorCategory.CANCELLED);
    });

    it('compaction failures are transient', () => {
      const error = new CompactionError('empty summary');

      expect(error.name).toBe('CompactionError');
      expect(error.category).toBe(ErrorCategory.TRANSIENT);
    });
  });

  describe('categorizeError', () => {
    it.each([
      [errno('ETIMEDOUT'), ErrorCategory.TRANSIENT, true],
      [new Error('Request timed out'), ErrorCategory.TRANSIENT, true],
      [errno('ENOSPC'), ErrorCategory.RESOURCE, false],
      [errno('ENOENT'), ErrorCategory.PERMANENT, false],
      [new Error('Unexpected token in JSON'), ErrorCategory.VALIDATION, false],
      [new Error('The operation was aborted'), ErrorCategory.CANCELLED, false],
      [new Error('something else'), ErrorCategory.INTERNAL, false],
    ])('categorizes %s', (error, category, recoverable) => {
      expect(categorizeError(error)).toEqual({ category, recoverable });
    });
  });

  describe('helpers', () => {
    it('wrapError keeps agent errors and wraps others', () => {
      const agentError = new SessionNotFoundError('x');
      expect(wrapError(agentError)).toBe(agentError);

      const wrapped = wrapError(new Error('timeout waiting for lock'), { op: 'save' });
      expect(wrapped.category).toBe(ErrorCategory.TRANSIENT);
      expect(wrapped.context).toEqual({ op: 'save' });
    });

    it('isRecoverable', () => {
      expect(isRecoverable(new SessionCorruptedError('a', '/a', 'bad'))).toBe(true);
      expect(isRecoverable(errno('EAGAIN'))).toBe(true);
      expect(isRecoverable('nope')).toBe(false);
    });

    it('formats errors for logs', () => {
      expect(formatErrorForLog(new SessionNotFoundError('x'))).toBe(
        '[SessionNotFoundError] (PERMANENT) Session not found: x context={"sessionId":"x"}',
      );
      expect(formatErrorForLog(new Error('plain'))).toBe('[Error] plain');
      expect(formatErrorForLog(undefined)).toBe('[Unknown] undefined');
    });
  });
});
