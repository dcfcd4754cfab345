/**
 * Session entity.
 *
 * The aggregate root for one conversation. All mutation goes through
 * methods so that `updatedAt` is refreshed (and never moves backwards),
 * messages stay append-only and usage counters only grow.
 */

import { z } from 'zod';
import type { Message, ToolInvocation } from '../../types.js';
import { ValidationError } from '../../errors/index.js';

// =============================================================================
// IDENTIFIERS
// =============================================================================

export const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export function isValidSessionId(id: string): boolean {
  return SESSION_ID_PATTERN.test(id);
}

/**
 * Reject ids that could escape the sessions directory or collide with
 * store-internal files.
 */
export function assertValidSessionId(id: string): void {
  if (!isValidSessionId(id)) {
    throw new ValidationError(`Invalid session id: ${JSON.stringify(id)}`, ['id']);
  }
}

function randomSuffix(): string {
  return Math.random().toString(36).slice(2, 8).padEnd(6, '0');
}

export function generateSessionId(): string {
  return `session-${Date.now().toString(36)}-${randomSuffix()}`;
}

function generateToolInvocationId(): string {
  return `tool-${Date.now().toString(36)}-${randomSuffix()}`;
}

// =============================================================================
// SCHEMA
// =============================================================================

const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
});

const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
  toolCalls: z.array(ToolCallSchema).optional(),
  toolCallId: z.string().optional(),
  name: z.string().optional(),
  timestamp: z.string().optional(),
  pinned: z.boolean().optional(),
  metadata: z.record(z.unknown()).optional(),
});

const ToolInvocationSchema = z.object({
  id: z.string(),
  toolName: z.string(),
  arguments: z.record(z.unknown()),
  result: z.unknown(),
  timestamp: z.string(),
  duration: z.number().nonnegative(),
  success: z.boolean(),
  error: z.string().nullable(),
});

/**
 * On-disk session document.
 */
export const SessionFileSchema = z.object({
  id: z.string().regex(SESSION_ID_PATTERN),
  title: z.string(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  workingDir: z.string(),
  model: z.string(),
  messages: z.array(MessageSchema),
  toolHistory: z.array(ToolInvocationSchema).default([]),
  totalPromptTokens: z.number().int().nonnegative(),
  totalCompletionTokens: z.number().int().nonnegative(),
  tags: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

export type SessionFileData = z.infer<typeof SessionFileSchema>;

/**
 * Serialized form produced by `Session.toJSON()`.
 */
export interface SessionData {
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
  workingDir: string;
  model: string;
  messages: Message[];
  toolHistory: ToolInvocation[];
  totalPromptTokens: number;
  totalCompletionTokens: number;
  tags: string[];
  metadata: Record<string, unknown>;
}

// =============================================================================
// SESSION
// =============================================================================

export interface SessionInit {
  id?: string;
  title?: string;
  workingDir?: string;
  model?: string;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

export interface ToolCallRecord {
  id?: string;
  toolName: string;
  arguments?: Record<string, unknown>;
  result?: unknown;
  /** Milliseconds */
  duration?: number;
  success?: boolean;
  error?: string | null;
}

function isTokenCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export class Session {
  readonly id: string;
  readonly workingDir: string;
  readonly model: string;

  private _title: string;
  private _createdAt: string;
  private _updatedAt: string;
  private _messages: Message[] = [];
  private _toolHistory: ToolInvocation[] = [];
  private _promptTokens = 0;
  private _completionTokens = 0;
  private _tags: string[] = [];
  private _metadata: Record<string, unknown> = {};

  constructor(init: SessionInit = {}) {
    this.id = init.id ?? generateSessionId();
    assertValidSessionId(this.id);

    const now = new Date().toISOString();
    this._createdAt = now;
    this._updatedAt = now;
    this._title = init.title ?? '';
    this.workingDir = init.workingDir ?? process.cwd();
    this.model = init.model ?? '';
    this._tags = dedupe(init.tags ?? []);
    this._metadata = { ...init.metadata };
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get title(): string {
    return this._title;
  }

  get createdAt(): string {
    return this._createdAt;
  }

  get updatedAt(): string {
    return this._updatedAt;
  }

  get messages(): readonly Message[] {
    return this._messages;
  }

  get messageCount(): number {
    return this._messages.length;
  }

  get toolHistory(): readonly ToolInvocation[] {
    return this._toolHistory;
  }

  get totalPromptTokens(): number {
    return this._promptTokens;
  }

  get totalCompletionTokens(): number {
    return this._completionTokens;
  }

  get totalTokens(): number {
    return this._promptTokens + this._completionTokens;
  }

  get tags(): readonly string[] {
    return this._tags;
  }

  get metadata(): Readonly<Record<string, unknown>> {
    return this._metadata;
  }

  // ---------------------------------------------------------------------------
  // Mutators
  // ---------------------------------------------------------------------------

  /**
   * Refresh `updatedAt`. Clock steps backwards are absorbed so the value
   * never decreases.
   */
  touch(): void {
    const previous = Date.parse(this._updatedAt);
    this._updatedAt = new Date(Math.max(Date.now(), previous)).toISOString();
  }

  addMessage(message: Message): Message {
    const stored: Message = Object.freeze({
      ...message,
      timestamp: message.timestamp ?? new Date().toISOString(),
    });
    this._messages.push(stored);
    this.touch();
    return stored;
  }

  recordToolCall(record: ToolCallRecord): ToolInvocation {
    if (record.duration !== undefined && !(Number.isFinite(record.duration) && record.duration >= 0)) {
      throw new ValidationError(`Tool call duration must be a finite non-negative number, got ${record.duration}`, [
        'duration',
      ]);
    }
    const error = record.error ?? null;
    const invocation: ToolInvocation = {
      id: record.id ?? generateToolInvocationId(),
      toolName: record.toolName,
      arguments: record.arguments ?? {},
      result: record.result ?? null,
      timestamp: new Date().toISOString(),
      duration: record.duration ?? 0,
      success: record.success ?? error === null,
      error,
    };
    this._toolHistory.push(invocation);
    this.touch();
    return invocation;
  }

  updateUsage(promptTokens: number, completionTokens: number): void {
    if (!isTokenCount(promptTokens) || !isTokenCount(completionTokens)) {
      throw new ValidationError(
        `Token usage must be non-negative integers, got ${promptTokens}/${completionTokens}`,
        ['promptTokens', 'completionTokens'],
      );
    }
    this._promptTokens += promptTokens;
    this._completionTokens += completionTokens;
    this.touch();
  }

  resetUsage(): void {
    this._promptTokens = 0;
    this._completionTokens = 0;
    this.touch();
  }

  setTitle(title: string): void {
    this._title = title;
    this.touch();
  }

  /** Returns the tags that were not already present */
  addTags(...tags: string[]): string[] {
    const added = dedupe(tags).filter((t) => !this._tags.includes(t));
    this._tags.push(...added);
    this.touch();
    return added;
  }

  /** Returns the tags that were removed */
  removeTags(...tags: string[]): string[] {
    const removed = this._tags.filter((t) => tags.includes(t));
    this._tags = this._tags.filter((t) => !tags.includes(t));
    this.touch();
    return removed;
  }

  /** `undefined` deletes the key */
  setMetadata(key: string, value: unknown): void {
    if (value === undefined) {
      delete this._metadata[key];
    } else {
      this._metadata[key] = value;
    }
    this.touch();
  }

  /**
   * Replace the message list wholesale (compaction, truncation applied to
   * history). The replacement messages are themselves immutable.
   */
  replaceMessages(messages: readonly Message[]): void {
    this._messages = messages.map((m) => (Object.isFrozen(m) ? m : Object.freeze({ ...m })));
    this.touch();
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  toJSON(): SessionData {
    return {
      id: this.id,
      title: this._title,
      createdAt: this._createdAt,
      updatedAt: this._updatedAt,
      workingDir: this.workingDir,
      model: this.model,
      messages: [...this._messages],
      toolHistory: this._toolHistory.map((t) => ({ ...t })),
      totalPromptTokens: this._promptTokens,
      totalCompletionTokens: this._completionTokens,
      tags: [...this._tags],
      metadata: { ...this._metadata },
    };
  }

  /**
   * Rebuild a session from validated data. Timestamps are restored as-is.
   */
  static fromJSON(data: SessionFileData): Session {
    const session = new Session({
      id: data.id,
      title: data.title,
      workingDir: data.workingDir,
      model: data.model,
      tags: data.tags,
      metadata: data.metadata,
    });

    session._createdAt = data.createdAt;
    session._updatedAt = data.updatedAt;
    session._messages = data.messages.map((m) => Object.freeze({ ...m }));
    session._toolHistory = data.toolHistory.map((t) => ({
      id: t.id,
      toolName: t.toolName,
      arguments: t.arguments,
      result: t.result ?? null,
      timestamp: t.timestamp,
      duration: t.duration,
      success: t.success,
      error: t.error,
    }));
    session._promptTokens = data.totalPromptTokens;
    session._completionTokens = data.totalCompletionTokens;
    return session;
  }
}

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}

// =============================================================================
// SUMMARY
// =============================================================================

/**
 * Listing projection of a session, without message bodies.
 */
export interface SessionSummary {
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
  messageCount: number;
  totalTokens: number;
  tags: string[];
  workingDir: string;
  model: string;
}

export const SessionSummarySchema = z.object({
  id: z.string().regex(SESSION_ID_PATTERN),
  title: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  messageCount: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
  tags: z.array(z.string()),
  workingDir: z.string(),
  model: z.string(),
});

export function createSessionSummary(session: Session): SessionSummary {
  return {
    id: session.id,
    title: session.title,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    messageCount: session.messageCount,
    totalTokens: session.totalTokens,
    tags: [...session.tags],
    workingDir: session.workingDir,
    model: session.model,
  };
}
