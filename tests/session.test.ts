/**
 * Session Entity Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  Session,
  SessionFileSchema,
  createSessionSummary,
  generateSessionId,
  isValidSessionId,
} from '../src/integrations/persistence/session.js';
import { ValidationError } from '../src/errors/index.js';

describe('session ids', () => {
  it('generates valid ids', () => {
    const id = generateSessionId();
    expect(id).toMatch(/^session-[0-9a-z]+-[0-9a-z]{6}$/);
    expect(isValidSessionId(id)).toBe(true);
  });

  it('rejects ids that could escape the sessions directory', () => {
    expect(isValidSessionId('../etc/passwd')).toBe(false);
    expect(isValidSessionId('_index')).toBe(false);
    expect(isValidSessionId('')).toBe(false);
    expect(() => new Session({ id: 'a/b' })).toThrow(ValidationError);
  });
});

describe('Session', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('appends messages with a timestamp and freezes them', () => {
    const session = new Session({ title: 'Test' });
    const stored = session.addMessage({ role: 'user', content: 'Hello' });

    expect(session.messageCount).toBe(1);
    expect(stored.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('never moves updatedAt backwards', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    const session = new Session();

    vi.setSystemTime(new Date('2026-03-01T11:00:00.000Z'));
    session.setTitle('Earlier clock');

    expect(session.updatedAt).toBe('2026-03-01T12:00:00.000Z');
  });

  it('accumulates usage and rejects negative counts', () => {
    const session = new Session();
    session.updateUsage(100, 20);
    session.updateUsage(50, 5);

    expect(session.totalPromptTokens).toBe(150);
    expect(session.totalCompletionTokens).toBe(25);
    expect(session.totalTokens).toBe(175);
    expect(() => session.updateUsage(-1, 0)).toThrow(ValidationError);

    session.resetUsage();
    expect(session.totalTokens).toBe(0);
  });

  it('records tool calls with defaults', () => {
    const session = new Session();
    const ok = session.recordToolCall({ toolName: 'read_file', arguments: { path: 'a.ts' }, result: 'text', duration: 12 });
    const failed = session.recordToolCall({ toolName: 'bash', error: 'exit 1' });

    expect(ok).toMatchObject({ toolName: 'read_file', duration: 12, success: true, error: null });
    expect(failed).toMatchObject({ toolName: 'bash', result: null, duration: 0, success: false, error: 'exit 1' });
    expect(session.toolHistory).toHaveLength(2);
    expect(() => session.recordToolCall({ toolName: 'x', duration: -5 })).toThrow(ValidationError);
  });

  it.each([1.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects a token count of %s', (count) => {
    const session = new Session();

    expect(() => session.updateUsage(count, 0)).toThrow(ValidationError);
    expect(() => session.updateUsage(0, count)).toThrow(ValidationError);
    expect(session.totalTokens).toBe(0);
  });

  it.each([Number.NaN, Number.POSITIVE_INFINITY])('rejects a tool call duration of %s', (duration) => {
    const session = new Session();

    expect(() => session.recordToolCall({ toolName: 'read_file', duration })).toThrow(ValidationError);
    expect(session.toolHistory).toHaveLength(0);
  });

  it('keeps every accepted mutation loadable', () => {
    const session = new Session();
    session.updateUsage(7, 3);
    session.recordToolCall({ toolName: 'read_file', duration: 0.25 });

    const result = SessionFileSchema.safeParse(JSON.parse(JSON.stringify(session.toJSON())));
    expect(result.success).toBe(true);
  });

  it('keeps tags as an insertion-ordered set', () => {
    const session = new Session({ tags: ['a', 'a'] });

    expect(session.addTags('b', 'a', 'c')).toEqual(['b', 'c']);
    expect(session.removeTags('a', 'z')).toEqual(['a']);
    expect(session.tags).toEqual(['b', 'c']);
  });

  it('deletes metadata keys set to undefined', () => {
    const session = new Session({ metadata: { branch: 'main' } });
    session.setMetadata('ticket', 42);
    session.setMetadata('branch', undefined);

    expect(session.metadata).toEqual({ ticket: 42 });
  });

  it('round-trips through JSON', () => {
    const session = new Session({ title: 'Test', workingDir: '/work', model: 'gpt-4o', tags: ['x'] });
    session.addMessage({ role: 'user', content: 'Hello' });
    session.recordToolCall({ toolName: 'read_file', duration: 3 });
    session.updateUsage(10, 2);

    const restored = Session.fromJSON(SessionFileSchema.parse(JSON.parse(JSON.stringify(session.toJSON()))));

    expect(restored.toJSON()).toEqual(session.toJSON());
    expect(restored.createdAt).toBe(session.createdAt);
  });

  it('summarizes without message bodies', () => {
    const session = new Session({ id: 'session-1', title: 'Test', workingDir: '/work', model: 'gpt-4o' });
    session.addMessage({ role: 'user', content: 'Hello' });
    session.updateUsage(10, 2);

    expect(createSessionSummary(session)).toEqual({
      id: 'session-1',
      title: 'Test',
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
      messageCount: 1,
      totalTokens: 12,
      tags: [],
      workingDir: '/work',
      model: 'gpt-4o',
    });
  });
});
