/**
 * Structured logging for convoy.
 *
 * Every line can carry two bindings besides its free-form data: the
 * component that wrote it and the session it concerns. Components take an
 * optional logger in their config and otherwise derive one from the global
 * instance with `createComponentLogger`; per-session lines go through
 * `forSession(id)`.
 *
 *   const log = createComponentLogger('SessionStore');
 *   log.forSession(id).warn('Backup failed, continuing save', { path });
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Levels an entry can be written at */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogBindings {
  component?: string;
  sessionId?: string;
}

export interface LogEntry extends LogBindings {
  timestamp: string;
  level: EntryLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  bindings?: LogBindings;
}

export interface LogFilter extends LogBindings {
  /** Minimum level */
  level?: LogLevel;
  /** Keep only the most recent entries */
  limit?: number;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return level !== 'silent' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

/**
 * `2026-01-02T03:04:05.000Z WARN  SessionStore [session-abc] Backup failed {"path":"..."}`
 */
export function formatLogLine(entry: LogEntry): string {
  const parts = [entry.timestamp, entry.level.toUpperCase().padEnd(5)];
  if (entry.component) parts.push(entry.component);
  if (entry.sessionId) parts.push(`[${entry.sessionId}]`);
  parts.push(entry.message);
  if (entry.data) parts.push(JSON.stringify(entry.data));
  return parts.join(' ');
}

// =============================================================================
// SINKS
// =============================================================================

/** Human-readable lines; warnings and errors go to stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const line = formatLogLine(entry);
    if (entry.level === 'error' || entry.level === 'warn') {
      // eslint-disable-next-line no-console
      console.error(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  }
}

/** Ring buffer, queried by tests and status views */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter: LogFilter = {}): LogEntry[] {
    const { level, component, sessionId, limit } = filter;
    const entries = this.buffer.filter(
      (e) =>
        (level === undefined || LEVEL_PRIORITY[e.level] >= LEVEL_PRIORITY[level]) &&
        (component === undefined || e.component === component) &&
        (sessionId === undefined || e.sessionId === sessionId),
    );
    return limit ? entries.slice(-limit) : entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** One JSON object per line; the directory is created on first write */
export class FileSink implements LogSink {
  readonly filePath: string;
  private ready = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (!this.ready) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.ready = true;
    }
    appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
  }
}

// =============================================================================
// LOGGER
// =============================================================================

/** Level and sinks shared by a logger and every child derived from it */
interface LoggerCore {
  level: LogLevel;
  sinks: LogSink[];
}

export class StructuredLogger {
  private core: LoggerCore;
  private bindings: LogBindings;

  constructor(config: LoggerConfig = {}) {
    this.core = { level: config.level ?? 'info', sinks: config.sinks ?? [new ConsoleSink()] };
    this.bindings = { ...config.bindings };
  }

  /**
   * Logger with extra bindings. Level and sinks stay shared with this one.
   */
  child(bindings: LogBindings): StructuredLogger {
    const child = new StructuredLogger();
    child.core = this.core;
    child.bindings = { ...this.bindings, ...bindings };
    return child;
  }

  forSession(sessionId: string): StructuredLogger {
    return this.child({ sessionId });
  }

  setLevel(level: LogLevel): void {
    this.core.level = level;
  }

  getLevel(): LogLevel {
    return this.core.level;
  }

  isEnabled(level: LogLevel): boolean {
    return isLevelEnabled(level, this.core.level);
  }

  addSink(sink: LogSink): void {
    this.core.sinks.push(sink);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  private write(level: EntryLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.bindings,
      ...(data && Object.keys(data).length > 0 ? { data } : {}),
    };

    for (const sink of this.core.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        // Not through the logger: the failing sink may be the only one
        process.stderr.write(`log sink failed: ${err instanceof Error ? err.message : String(err)}\n`);
      }
    }
  }
}

// =============================================================================
// GLOBAL INSTANCE
// =============================================================================

/**
 * Console at 'warn' so that library consumers are not flooded; replace it
 * with `configureLogger()`.
 */
export let logger = new StructuredLogger({ level: 'warn' });

export function configureLogger(config: LoggerConfig): void {
  logger = new StructuredLogger(config);
}

/**
 * Bind a component name to the global logger as it is configured now.
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.child({ component });
}
