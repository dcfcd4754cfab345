/**
 * Structured Logger Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  FileSink,
  MemorySink,
  StructuredLogger,
  configureLogger,
  createComponentLogger,
  formatLogLine,
  type LogEntry,
  type LogSink,
} from '../../src/integrations/utilities/logger.js';
import { makeTempDir, removeTempDir } from '../helpers/fixtures.js';

describe('StructuredLogger', () => {
  it('drops entries below the minimum level', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'warn', sinks: [sink] });

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too');

    expect(sink.getEntries().map((e) => [e.level, e.message])).toEqual([
      ['warn', 'shown'],
      ['error', 'shown too'],
    ]);
  });

  it('binds component and session to every entry of a child logger', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'debug', sinks: [sink] }).child({ component: 'SessionStore' });

    log.forSession('abc').info('Saved', { bytes: 12 });
    log.info('Swept temp files');

    expect(sink.getEntries()).toMatchObject([
      { message: 'Saved', component: 'SessionStore', sessionId: 'abc', data: { bytes: 12 } },
      { message: 'Swept temp files', component: 'SessionStore' },
    ]);
    expect(sink.getEntries()[1].sessionId).toBeUndefined();
  });

  it('omits empty data', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'info', sinks: [sink] });

    log.info('bare', {});

    expect('data' in sink.getEntries()[0]).toBe(false);
  });

  it('shares level and sinks between a logger and its children', () => {
    const sink = new MemorySink();
    const parent = new StructuredLogger({ level: 'info', sinks: [sink] });
    const child = parent.forSession('abc');

    parent.setLevel('error');
    child.warn('hidden');
    const extra = new MemorySink();
    child.addSink(extra);
    parent.error('shown');

    expect(child.getLevel()).toBe('error');
    expect(sink.getEntries().map((e) => e.message)).toEqual(['shown']);
    expect(extra.size).toBe(1);
  });

  it('keeps writing to other sinks when one fails', () => {
    const failing: LogSink = {
      write(_entry: LogEntry) {
        throw new Error('sink down');
      },
    };
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'info', sinks: [failing, sink] });

    expect(() => log.info('still logged')).not.toThrow();
    expect(sink.size).toBe(1);
  });

  it('silent suppresses everything', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'silent', sinks: [sink] });

    log.error('nope');
    expect(sink.size).toBe(0);
  });
});

describe('MemorySink', () => {
  it('is a bounded ring buffer', () => {
    const sink = new MemorySink(2);
    const log = new StructuredLogger({ level: 'info', sinks: [sink] });

    log.info('one');
    log.info('two');
    log.info('three');

    expect(sink.getEntries().map((e) => e.message)).toEqual(['two', 'three']);
    expect(sink.getEntries({ limit: 1 }).map((e) => e.message)).toEqual(['three']);
    sink.clear();
    expect(sink.size).toBe(0);
  });

  it('filters by session and component', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'info', sinks: [sink] });

    log.child({ component: 'SessionStore' }).forSession('a').info('stored a');
    log.child({ component: 'SessionManager' }).forSession('a').info('resumed a');
    log.child({ component: 'SessionManager' }).forSession('b').info('resumed b');

    expect(sink.getEntries({ sessionId: 'a' }).map((e) => e.message)).toEqual(['stored a', 'resumed a']);
    expect(sink.getEntries({ component: 'SessionManager' }).map((e) => e.message)).toEqual([
      'resumed a',
      'resumed b',
    ]);
    sink.clear();
    expect(sink.size).toBe(0);
  });
});

describe('formatLogLine', () => {
  it('renders bindings before the message and data after it', () => {
    const line = formatLogLine({
      timestamp: '2026-01-02T03:04:05.000Z',
      level: 'warn',
      message: 'Backup failed',
      component: 'SessionStore',
      sessionId: 'abc',
      data: { path: 'abc.json.bak' },
    });

    expect(line).toBe('2026-01-02T03:04:05.000Z WARN  SessionStore [abc] Backup failed {"path":"abc.json.bak"}');
  });

  it('leaves out absent bindings', () => {
    expect(formatLogLine({ timestamp: 't', level: 'error', message: 'boom' })).toBe('t ERROR boom');
  });
});

describe('FileSink', () => {
  let dir: string;

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('appends JSON lines, creating the directory', async () => {
    dir = await makeTempDir('logs');
    const path = join(dir, 'nested', 'convoy.log');
    const log = new StructuredLogger({ level: 'info', sinks: [new FileSink(path)] });

    log.info('first', { n: 1 });
    log.warn('second');

    const lines = (await readFile(path, 'utf-8')).trim().split('\n');
    const parsed: unknown[] = lines.map((line) => JSON.parse(line));
    expect(parsed).toMatchObject([
      { level: 'info', message: 'first', data: { n: 1 } },
      { level: 'warn', message: 'second' },
    ]);
  });
});

describe('component loggers', () => {
  afterEach(() => {
    configureLogger({ level: 'warn' });
  });

  it('inherit the global configuration', () => {
    const sink = new MemorySink();
    configureLogger({ level: 'debug', sinks: [sink] });

    createComponentLogger('SessionIndex').debug('Rebuilt index');

    expect(sink.getEntries()[0]).toMatchObject({
      level: 'debug',
      message: 'Rebuilt index',
      component: 'SessionIndex',
    });
  });
});
