/**
 * Session Manager
 *
 * Orchestrates the lifecycle of the current session: create, resume,
 * checkpoint, close and delete, keeping the store, the index and the
 * lifecycle hooks in step. Holds zero or one current session; mutators
 * called with none current throw `SessionContractError`.
 */

import type { Message, MessageRole, LLMProvider, ToolInvocation } from '../../types.js';
import {
  SessionContractError,
  SessionCorruptedError,
  SessionNotFoundError,
  formatErrorForLog,
} from '../../errors/index.js';
import { loadConfig, type ConfigLoadOptions } from '../../config/config-manager.js';
import { configureLoggingFromConfig, resolveConfig, type ResolvedConfig } from '../../defaults.js';
import { toAbortSignal, withTimeout } from '../cancellation.js';
import { ToolResultCompactor, type Compactor } from '../compaction.js';
import { AutoCheckpointManager } from '../quality/auto-checkpoint.js';
import { SessionHooks } from '../utilities/hooks.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { Session, type SessionSummary, type ToolCallRecord } from './session.js';
import { SessionIndex, type SessionListOptions } from './session-index.js';
import { SessionStore } from './session-store.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SessionManagerConfig {
  store: SessionStore;
  index: SessionIndex;
  hooks?: SessionHooks;
  /** Used only by `suggestTitle` */
  provider?: LLMProvider;
  checkpoint?: AutoCheckpointManager;
  /** Applied to every `tool` message before it is appended */
  toolResultCompactor?: ToolResultCompactor;
  /** Model for sessions created without one */
  defaultModel?: string;
  /** Deadline for a title suggestion (default: 10000) */
  titleTimeoutMs?: number;
  /** `cleanup()` removes sessions idle for longer (default: 30) */
  retentionDays?: number;
  /** `cleanup()` always keeps this many recent sessions (default: 10) */
  keepMinimum?: number;
  logger?: StructuredLogger;
}

export interface CreateSessionOptions {
  /** Generated when omitted */
  id?: string;
  title?: string;
  workingDir?: string;
  model?: string;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

export type AddMessageOptions = Pick<Message, 'toolCalls' | 'toolCallId' | 'name' | 'pinned' | 'metadata'>;

export interface ResumeLatestOptions {
  /** Only consider sessions started in this directory */
  workingDir?: string;
}

export const TITLE_MAX_LENGTH = 50;

const TITLE_SYSTEM_PROMPT = 'You name conversations. Reply with a title of at most six words and nothing else.';

// =============================================================================
// TITLES
// =============================================================================

function truncateTitle(text: string): string {
  return text.length > TITLE_MAX_LENGTH ? `${text.slice(0, TITLE_MAX_LENGTH - 3)}...` : text;
}

/**
 * Title from the first non-empty line of the first user message, or a
 * timestamp title (UTC) when there is none.
 */
export function generateTitle(messages: readonly Message[], now: Date = new Date()): string {
  const firstUser = messages.find((m) => m.role === 'user');
  const line = firstUser?.content
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l.length > 0);

  if (line) return truncateTitle(line);
  return `Session ${now.toISOString().slice(0, 16).replace('T', ' ')}`;
}

function cleanSuggestedTitle(raw: string): string {
  const line = raw
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  if (!line) return '';
  return truncateTitle(line.replace(/^["'`]+|["'`.]+$/g, '').trim());
}

// =============================================================================
// SESSION MANAGER
// =============================================================================

export class SessionManager {
  readonly store: SessionStore;
  readonly index: SessionIndex;
  readonly hooks: SessionHooks;
  private provider?: LLMProvider;
  private checkpoint?: AutoCheckpointManager;
  private toolResultCompactor?: ToolResultCompactor;
  private defaultModel: string;
  private titleTimeoutMs: number;
  private retentionDays: number;
  private keepMinimum: number;
  private log: StructuredLogger;
  private _current: Session | null = null;

  constructor(config: SessionManagerConfig) {
    this.store = config.store;
    this.index = config.index;
    this.hooks = config.hooks ?? new SessionHooks({ logger: config.logger });
    this.provider = config.provider;
    this.checkpoint = config.checkpoint;
    this.toolResultCompactor = config.toolResultCompactor;
    this.defaultModel = config.defaultModel ?? '';
    this.titleTimeoutMs = config.titleTimeoutMs ?? 10000;
    this.retentionDays = config.retentionDays ?? 30;
    this.keepMinimum = config.keepMinimum ?? 10;
    this.log = config.logger ?? createComponentLogger('SessionManager');
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
    await this.index.initialize();
  }

  get current(): Session | null {
    return this._current;
  }

  get hasCurrent(): boolean {
    return this._current !== null;
  }

  private requireCurrent(operation: string): Session {
    if (!this._current) {
      throw new SessionContractError(operation);
    }
    return this._current;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Create, persist and switch to a new session.
   */
  async create(options: CreateSessionOptions = {}): Promise<Session> {
    const session = new Session({
      id: options.id,
      title: options.title,
      workingDir: options.workingDir,
      model: options.model ?? this.defaultModel,
      tags: options.tags,
      metadata: options.metadata,
    });

    await this.store.save(session);
    this.index.add(session);
    await this.persistIndex();
    this.log.forSession(session.id).info('Created session');

    await this.activate(session, false);
    return session;
  }

  /**
   * Load a stored session and make it current. A corrupted file is
   * restored from its backup once before the error is rethrown.
   */
  async resume(id: string): Promise<Session> {
    if (this._current?.id === id) return this._current;

    let session: Session;
    try {
      session = await this.store.load(id);
    } catch (err) {
      if (!(err instanceof SessionCorruptedError)) throw err;
      this.log.forSession(id).warn('Session file corrupted, trying backup', { error: formatErrorForLog(err) });
      if (!(await this.store.recoverFromBackup(id))) throw err;
      session = await this.store.load(id);
    }

    this.index.update(session);
    await this.persistIndex();
    this.log.forSession(id).info('Resumed session', { messageCount: session.messageCount });

    await this.activate(session, true);
    return session;
  }

  /**
   * Resume the most recently updated session. Index entries whose file
   * has disappeared are dropped and the next candidate is tried.
   */
  async resumeLatest(options: ResumeLatestOptions = {}): Promise<Session | null> {
    const candidates = this.index.list({ sortBy: 'updatedAt', descending: true, workingDir: options.workingDir });

    for (const summary of candidates) {
      try {
        return await this.resume(summary.id);
      } catch (err) {
        if (!(err instanceof SessionNotFoundError)) throw err;
        this.log.forSession(summary.id).warn('Indexed session has no file, removing entry');
        this.index.remove(summary.id);
      }
    }

    await this.persistIndex();
    return null;
  }

  /**
   * With an id: resume it, or create a session under that id when none
   * exists. Without one: resume the latest session, or create.
   */
  async resumeOrCreate(options: CreateSessionOptions = {}): Promise<Session> {
    if (options.id !== undefined) {
      try {
        return await this.resume(options.id);
      } catch (err) {
        if (!(err instanceof SessionNotFoundError)) throw err;
      }
      return this.create(options);
    }

    return (await this.resumeLatest({ workingDir: options.workingDir })) ?? this.create(options);
  }

  private async activate(session: Session, resumed: boolean): Promise<void> {
    if (this._current && this._current !== session) {
      await this.close(this._current);
    }

    this._current = session;
    this.startCheckpoint(session);
    this.hooks.emit('session:start', { session, resumed });
  }

  private startCheckpoint(session: Session): void {
    this.checkpoint?.start(session.id, async () => {
      if (this._current === session) await this.save(session);
    });
  }

  /**
   * Write the session and its index entry. Defaults to the current session.
   */
  async save(session?: Session): Promise<void> {
    const target = session ?? this.requireCurrent('save');

    await this.store.save(target);
    this.index.update(target);
    await this.persistIndex();
    this.hooks.emit('session:save', { session: target });
  }

  /**
   * Stop checkpointing, save a final time and fire `session:end`. No-op
   * when there is nothing to close. When the final save fails the session
   * stays current and checkpointing resumes, so the next tick retries.
   */
  async close(session?: Session): Promise<void> {
    const target = session ?? this._current;
    if (!target) return;

    const closingCurrent = target === this._current;
    if (closingCurrent) {
      await this.checkpoint?.stop();
    }
    try {
      await this.save(target);
    } catch (err) {
      if (closingCurrent && this._current === target) {
        this.startCheckpoint(target);
      }
      this.log.forSession(target.id).warn('Final save failed, session kept open', {
        error: formatErrorForLog(err),
      });
      throw err;
    }
    this.hooks.emit('session:end', { session: target });

    if (target === this._current) {
      this._current = null;
    }
    this.log.forSession(target.id).debug('Closed session');
  }

  /**
   * Delete a session's files and index entry. Returns whether a file was
   * deleted.
   */
  async delete(id: string): Promise<boolean> {
    if (this._current?.id === id) {
      await this.checkpoint?.stop();
      this._current = null;
    }

    const deleted = await this.store.delete(id);
    if (this.index.remove(id)) {
      await this.persistIndex();
    }
    return deleted;
  }

  /**
   * Delete sessions idle for longer than the retention period, keeping the
   * most recent `keepMinimum` and never the current one. Returns the
   * deleted ids.
   */
  async cleanup(): Promise<string[]> {
    const maxAgeMs = this.retentionDays * 24 * 60 * 60 * 1000;
    const current = this._current;
    if (current) {
      // An active session counts as recently used
      current.touch();
      await this.save(current);
    }

    const deleted = await this.store.cleanupOlderThan(maxAgeMs, this.keepMinimum);
    for (const id of deleted) {
      this.index.remove(id);
    }
    await this.persistIndex();
    return deleted;
  }

  /**
   * Close the current session and wait for queued writes and async hook
   * listeners.
   */
  async shutdown(): Promise<void> {
    await this.close();
    await this.checkpoint?.stop();
    await this.store.flush();
    await this.persistIndex();
    await this.hooks.flush();
  }

  // ---------------------------------------------------------------------------
  // Mutators (current session)
  // ---------------------------------------------------------------------------

  addMessage(role: MessageRole, content: string, options: AddMessageOptions = {}): Message {
    const session = this.requireCurrent('addMessage');

    let message: Message = { role, content, ...options };
    if (role === 'tool' && this.toolResultCompactor) {
      message = this.toolResultCompactor.compactMessage(message);
    }

    const stored = session.addMessage(message);
    this.hooks.emit('session:message', { session, message: stored });
    return stored;
  }

  recordToolCall(record: ToolCallRecord): ToolInvocation {
    return this.requireCurrent('recordToolCall').recordToolCall(record);
  }

  updateUsage(promptTokens: number, completionTokens: number): void {
    this.requireCurrent('updateUsage').updateUsage(promptTokens, completionTokens);
  }

  setTitle(title: string): void {
    this.requireCurrent('setTitle').setTitle(title);
  }

  addTags(...tags: string[]): string[] {
    return this.requireCurrent('addTags').addTags(...tags);
  }

  removeTags(...tags: string[]): string[] {
    return this.requireCurrent('removeTags').removeTags(...tags);
  }

  setMetadata(key: string, value: unknown): void {
    this.requireCurrent('setMetadata').setMetadata(key, value);
  }

  // ---------------------------------------------------------------------------
  // Titles
  // ---------------------------------------------------------------------------

  /** Does not change the session's title */
  generateTitle(session?: Session): string {
    return generateTitle((session ?? this.requireCurrent('generateTitle')).messages);
  }

  /**
   * Ask the provider for a short title. Falls back to `generateTitle` on
   * any failure, timeout or empty answer.
   */
  async suggestTitle(session?: Session): Promise<string> {
    const target = session ?? this.requireCurrent('suggestTitle');
    const fallback = generateTitle(target.messages);
    const provider = this.provider;
    const firstUser = target.messages.find((m) => m.role === 'user');
    if (!provider || !firstUser) return fallback;

    try {
      const response = await withTimeout(this.titleTimeoutMs, (token) =>
        provider.chat(
          [
            { role: 'system', content: TITLE_SYSTEM_PROMPT },
            { role: 'user', content: `Conversation start:\n\n${firstUser.content.slice(0, 1000)}` },
          ],
          { maxTokens: 30, signal: toAbortSignal(token) },
        ),
      );
      const title = cleanSuggestedTitle(response.content);
      if (title) return title;
      this.log.forSession(target.id).debug('Provider returned an empty title, using fallback');
    } catch (err) {
      this.log.forSession(target.id).warn('Title suggestion failed, using fallback', {
        error: formatErrorForLog(err),
      });
    }
    return fallback;
  }

  // ---------------------------------------------------------------------------
  // Listing / compaction
  // ---------------------------------------------------------------------------

  listSessions(options?: SessionListOptions): SessionSummary[] {
    return this.index.list(options);
  }

  /**
   * Compact the current session's history. Messages appended while the
   * summary is generated are kept after the compacted prefix; if the
   * snapshotted prefix itself changed, the result is discarded. Returns
   * whether the history was replaced.
   */
  async applyCompaction(compactor: Compactor): Promise<boolean> {
    const session = this.requireCurrent('applyCompaction');
    const snapshot = [...session.messages];

    const compacted = await compactor.compact(snapshot);
    if (compacted === snapshot) return false;

    const latest = session.messages;
    const prefixIntact = latest.length >= snapshot.length && snapshot.every((m, i) => latest[i] === m);
    if (!prefixIntact) {
      this.log.forSession(session.id).warn('History changed during compaction, discarding result');
      return false;
    }

    session.replaceMessages([...compacted, ...latest.slice(snapshot.length)]);
    this.log.forSession(session.id).debug('Applied compaction', {
      before: latest.length,
      after: session.messageCount,
    });
    return true;
  }

  /** Index persistence is opportunistic; the index can always be rebuilt */
  private async persistIndex(): Promise<void> {
    try {
      await this.index.saveIfDirty();
    } catch (err) {
      this.log.warn('Index save failed', { error: err instanceof Error ? err.message : String(err) });
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export interface CreateSessionManagerOptions extends Omit<SessionManagerConfig, 'store' | 'index' | 'checkpoint'> {
  /** Resolved configuration; loaded from disk when omitted */
  config?: ResolvedConfig;
  /** Passed to `loadConfig` when `config` is omitted */
  load?: ConfigLoadOptions;
}

/**
 * Build store, index and manager from configuration and initialize them.
 */
export async function createSessionManager(options: CreateSessionManagerOptions = {}): Promise<SessionManager> {
  const { config: given, load, ...rest } = options;

  const loaded = given ? null : loadConfig(load);
  const config = given ?? resolveConfig(loaded?.config);
  configureLoggingFromConfig(config.logging);

  const log = rest.logger ?? createComponentLogger('SessionManager');
  for (const warning of loaded?.warnings ?? []) {
    log.warn('Config warning', { warning });
  }

  const store = new SessionStore({
    sessionsDir: config.sessions.dir,
    backup: config.sessions.backup,
    logger: rest.logger,
  });
  const index = new SessionIndex({ store, logger: rest.logger });
  const checkpoint = new AutoCheckpointManager({
    intervalMs: config.sessions.checkpointIntervalMs,
    enabled: config.sessions.autoCheckpoint,
    logger: rest.logger,
  });

  const manager = new SessionManager({
    ...rest,
    store,
    index,
    checkpoint,
    defaultModel: rest.defaultModel ?? config.model,
    retentionDays: rest.retentionDays ?? config.sessions.retentionDays,
    keepMinimum: rest.keepMinimum ?? config.sessions.keepMinimum,
    toolResultCompactor:
      rest.toolResultCompactor ?? new ToolResultCompactor({ maxResultTokens: config.context.toolResultMaxTokens }),
  });
  await manager.initialize();
  return manager;
}
