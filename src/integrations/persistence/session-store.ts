/**
 * Session Persistence
 *
 * One JSON document per session, replaced atomically on every save:
 *
 *   <dir>/<id>.json            primary
 *   <dir>/<id>.json.backup     previous primary, copied verbatim
 *   <dir>/<id>.json.tmp-<rnd>  in-flight write
 *
 * The primary file is never truncated in place. A save writes and fsyncs a
 * temp file, then renames it over the primary, so a reader (or a crash)
 * sees either the old or the new complete document.
 *
 * Saves of the same id are serialized through a per-id write queue; the
 * foreground caller and the checkpoint task can both call `save()`.
 */

import * as fs from 'node:fs/promises';
import { join } from 'node:path';
import {
  SessionCorruptedError,
  SessionNotFoundError,
  SessionStorageError,
  ValidationError,
  formatErrorForLog,
  isRecoverable,
} from '../../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import {
  Session,
  SessionFileSchema,
  assertValidSessionId,
  isValidSessionId,
} from './session.js';

// =============================================================================
// FILE PRIMITIVES
// =============================================================================

/**
 * File operations the store depends on. Replaceable so tests can inject
 * failures at any step of a save.
 */
export interface SessionFileIO {
  readFile(path: string): Promise<string>;
  /** Create `path` exclusively with `mode`, write `data` and fsync */
  writeFileSynced(path: string, data: string, mode: number): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  unlink(path: string): Promise<void>;
  access(path: string): Promise<void>;
  readdir(path: string): Promise<string[]>;
  mkdir(path: string): Promise<void>;
}

export const nodeFileIO: SessionFileIO = {
  readFile: (path) => fs.readFile(path, 'utf-8'),
  async writeFileSynced(path, data, mode) {
    const handle = await fs.open(path, 'wx', mode);
    try {
      await handle.writeFile(data, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  },
  chmod: (path, mode) => fs.chmod(path, mode),
  rename: (from, to) => fs.rename(from, to),
  copyFile: (from, to) => fs.copyFile(from, to),
  unlink: (path) => fs.unlink(path),
  access: (path) => fs.access(path),
  readdir: (path) => fs.readdir(path),
  async mkdir(path) {
    await fs.mkdir(path, { recursive: true, mode: 0o700 });
  },
};

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Write `content` to a sibling temp file and rename it over `path`.
 * The temp file is removed on any failure; the caller wraps the error.
 */
export async function writeFileAtomic(
  io: SessionFileIO,
  path: string,
  content: string,
  mode: number,
  onStep?: (step: 'writing-temp' | 'renaming') => void,
): Promise<void> {
  const tempPath = `${path}.tmp-${Date.now().toString(36)}${Math.random().toString(36).slice(2, 8)}`;

  try {
    onStep?.('writing-temp');
    await io.writeFileSynced(tempPath, content, mode);
    // open() honours the umask; pin the mode explicitly
    await io.chmod(tempPath, mode);
    onStep?.('renaming');
    await io.rename(tempPath, path);
  } catch (err) {
    try {
      await io.unlink(tempPath);
    } catch (cleanupErr) {
      if (!isNotFoundError(cleanupErr)) {
        throw new AggregateError([err, cleanupErr], `Failed to write ${path} and to remove ${tempPath}`);
      }
    }
    throw err;
  }
}

// =============================================================================
// TYPES
// =============================================================================

export type SaveState = 'ready' | 'backing-up' | 'writing-temp' | 'renaming';

export interface SessionStoreConfig {
  sessionsDir: string;
  /** Copy the previous primary to `.backup` before each save (default: true) */
  backup?: boolean;
  /** Permissions of session files (default: 0o600) */
  fileMode?: number;
  io?: SessionFileIO;
  logger?: StructuredLogger;
}

export type SessionStoreEvent =
  | { type: 'session.saved'; sessionId: string }
  | { type: 'session.loaded'; sessionId: string; messageCount: number }
  | { type: 'session.deleted'; sessionId: string }
  | { type: 'session.recovered'; sessionId: string }
  | { type: 'save.state'; sessionId: string; state: SaveState };

export type SessionStoreEventListener = (event: SessionStoreEvent) => void;

export const SESSION_FILE_SUFFIX = '.json';
export const BACKUP_SUFFIX = '.backup';
export const TEMP_MARKER = '.tmp-';

// =============================================================================
// SESSION STORE
// =============================================================================

export class SessionStore {
  readonly sessionsDir: string;
  readonly io: SessionFileIO;
  readonly fileMode: number;
  private backup: boolean;
  private log: StructuredLogger;
  private listeners: SessionStoreEventListener[] = [];
  private writeQueues = new Map<string, Promise<void>>();
  private saveStates = new Map<string, SaveState>();

  constructor(config: SessionStoreConfig) {
    this.sessionsDir = config.sessionsDir;
    this.io = config.io ?? nodeFileIO;
    this.fileMode = config.fileMode ?? 0o600;
    this.backup = config.backup ?? true;
    this.log = config.logger ?? createComponentLogger('SessionStore');
  }

  /**
   * Create the sessions directory and remove temp files left by an
   * interrupted save.
   */
  async initialize(): Promise<void> {
    try {
      await this.io.mkdir(this.sessionsDir);
    } catch (err) {
      throw SessionStorageError.wrap(err, 'save', this.sessionsDir);
    }

    for (const name of await this.readDir()) {
      if (!name.includes(TEMP_MARKER)) continue;
      const path = join(this.sessionsDir, name);
      try {
        await this.io.unlink(path);
        this.log.debug('Removed stale temp file', { path });
      } catch (err) {
        if (!isNotFoundError(err)) {
          this.log.warn('Could not remove stale temp file', { path, error: formatErrorForLog(err) });
        }
      }
    }
  }

  pathFor(id: string): string {
    return join(this.sessionsDir, `${id}${SESSION_FILE_SUFFIX}`);
  }

  backupPathFor(id: string): string {
    return `${this.pathFor(id)}${BACKUP_SUFFIX}`;
  }

  getSaveState(id: string): SaveState {
    return this.saveStates.get(id) ?? 'ready';
  }

  // ---------------------------------------------------------------------------
  // Write path
  // ---------------------------------------------------------------------------

  /**
   * Persist a session. The document is captured when `save` is called;
   * mutations made while the write is queued go into the next save.
   */
  async save(session: Session): Promise<void> {
    const id = session.id;
    assertValidSessionId(id);
    const content = JSON.stringify(session.toJSON(), null, 2);

    await this.enqueue(id, () => this.writeSession(id, content, this.backup));
    this.emit({ type: 'session.saved', sessionId: id });
  }

  private async writeSession(id: string, content: string, withBackup: boolean): Promise<void> {
    const path = this.pathFor(id);

    try {
      if (withBackup) {
        this.setState(id, 'backing-up');
        await this.backupExisting(id);
      }
      await writeFileAtomic(this.io, path, content, this.fileMode, (step) => this.setState(id, step));
    } catch (err) {
      throw SessionStorageError.wrap(err, 'save', path);
    } finally {
      this.setState(id, 'ready');
    }
  }

  /** Failure to back up is logged and never blocks the save */
  private async backupExisting(id: string): Promise<void> {
    const path = this.pathFor(id);
    const backupPath = this.backupPathFor(id);
    try {
      await this.io.copyFile(path, backupPath);
      await this.io.chmod(backupPath, this.fileMode);
    } catch (err) {
      if (isNotFoundError(err)) return;
      this.log.forSession(id).warn('Backup failed, continuing save', {
        path: backupPath,
        error: formatErrorForLog(err),
      });
    }
  }

  private enqueue(id: string, task: () => Promise<void>): Promise<void> {
    const previous = this.writeQueues.get(id) ?? Promise.resolve();
    const run = previous.then(task);
    // The queue tail only orders writes; `run` carries the outcome to the caller
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.writeQueues.set(id, tail);
    void tail.then(() => {
      if (this.writeQueues.get(id) === tail) this.writeQueues.delete(id);
    });
    return run;
  }

  /** Resolves once every queued write has settled */
  async flush(): Promise<void> {
    await Promise.all([...this.writeQueues.values()]);
  }

  private setState(id: string, state: SaveState): void {
    if (state === 'ready') {
      this.saveStates.delete(id);
    } else {
      this.saveStates.set(id, state);
    }
    this.emit({ type: 'save.state', sessionId: id, state });
  }

  // ---------------------------------------------------------------------------
  // Read path
  // ---------------------------------------------------------------------------

  async load(id: string): Promise<Session> {
    assertValidSessionId(id);
    const path = this.pathFor(id);

    let raw: string;
    try {
      raw = await this.io.readFile(path);
    } catch (err) {
      if (isNotFoundError(err)) throw new SessionNotFoundError(id);
      throw SessionStorageError.wrap(err, 'load', path);
    }

    const session = this.parse(id, path, raw);
    this.emit({ type: 'session.loaded', sessionId: id, messageCount: session.messageCount });
    return session;
  }

  /**
   * Like `load`, but logs and returns null instead of throwing.
   */
  async loadOrNull(id: string): Promise<Session | null> {
    try {
      return await this.load(id);
    } catch (err) {
      if (err instanceof SessionNotFoundError) {
        this.log.forSession(id).debug('Session not found');
      } else {
        this.log.forSession(id).warn('Failed to load session', {
          error: formatErrorForLog(err),
          recoverable: isRecoverable(err),
        });
      }
      return null;
    }
  }

  private parse(id: string, path: string, raw: string): Session {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new SessionCorruptedError(id, path, 'invalid JSON', toError(err));
    }

    const result = SessionFileSchema.safeParse(json);
    if (!result.success) {
      const detail = ValidationError.fromZodError(result.error).message;
      throw new SessionCorruptedError(id, path, detail, result.error);
    }
    if (result.data.id !== id) {
      throw new SessionCorruptedError(id, path, `file belongs to session ${result.data.id}`);
    }

    return Session.fromJSON(result.data);
  }

  async exists(id: string): Promise<boolean> {
    assertValidSessionId(id);
    const path = this.pathFor(id);
    try {
      await this.io.access(path);
      return true;
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw SessionStorageError.wrap(err, 'load', path);
    }
  }

  /**
   * Ids of all primary session files, sorted.
   */
  async listIds(): Promise<string[]> {
    const ids: string[] = [];
    for (const name of await this.readDir()) {
      if (!name.endsWith(SESSION_FILE_SUFFIX)) continue;
      const id = name.slice(0, -SESSION_FILE_SUFFIX.length);
      if (isValidSessionId(id)) ids.push(id);
    }
    return ids.sort();
  }

  private async readDir(): Promise<string[]> {
    try {
      return await this.io.readdir(this.sessionsDir);
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw SessionStorageError.wrap(err, 'list', this.sessionsDir);
    }
  }

  // ---------------------------------------------------------------------------
  // Delete / recover / cleanup
  // ---------------------------------------------------------------------------

  /**
   * Delete a session and its backup. Returns false when no file existed.
   */
  async delete(id: string): Promise<boolean> {
    assertValidSessionId(id);
    let deleted = false;

    await this.enqueue(id, async () => {
      const path = this.pathFor(id);
      try {
        await this.io.unlink(path);
        deleted = true;
      } catch (err) {
        if (!isNotFoundError(err)) throw SessionStorageError.wrap(err, 'delete', path);
      }

      const backupPath = this.backupPathFor(id);
      try {
        await this.io.unlink(backupPath);
      } catch (err) {
        if (!isNotFoundError(err)) {
          this.log.forSession(id).warn('Failed to delete backup', { path: backupPath, error: formatErrorForLog(err) });
        }
      }
    });

    if (deleted) {
      this.emit({ type: 'session.deleted', sessionId: id });
    }
    return deleted;
  }

  /**
   * Restore the primary file from a valid backup. Returns false when there
   * is no backup or the backup is itself unreadable.
   */
  async recoverFromBackup(id: string): Promise<boolean> {
    assertValidSessionId(id);
    const backupPath = this.backupPathFor(id);

    let raw: string;
    try {
      raw = await this.io.readFile(backupPath);
    } catch (err) {
      if (isNotFoundError(err)) {
        this.log.forSession(id).warn('No backup to recover from');
        return false;
      }
      throw SessionStorageError.wrap(err, 'recover', backupPath);
    }

    try {
      this.parse(id, backupPath, raw);
    } catch (err) {
      if (err instanceof SessionCorruptedError) {
        this.log.forSession(id).warn('Backup is corrupted too', { error: formatErrorForLog(err) });
        return false;
      }
      throw err;
    }

    // Never back up the corrupted primary over the good backup
    await this.enqueue(id, () => this.writeSession(id, raw, false));
    this.log.forSession(id).info('Recovered session from backup');
    this.emit({ type: 'session.recovered', sessionId: id });
    return true;
  }

  /**
   * Delete sessions not updated within `maxAgeMs`, always keeping the
   * `keepMinimum` most recently updated. Unreadable files are left alone.
   */
  async cleanupOlderThan(maxAgeMs: number, keepMinimum = 0): Promise<string[]> {
    const cutoff = Date.now() - maxAgeMs;
    const sessions: Array<{ id: string; updatedAt: number }> = [];

    for (const id of await this.listIds()) {
      const session = await this.loadOrNull(id);
      if (session) {
        sessions.push({ id, updatedAt: Date.parse(session.updatedAt) });
      }
    }

    sessions.sort((a, b) => b.updatedAt - a.updatedAt || a.id.localeCompare(b.id));

    const deleted: string[] = [];
    for (const { id, updatedAt } of sessions.slice(Math.max(0, keepMinimum))) {
      if (updatedAt < cutoff && (await this.delete(id))) {
        deleted.push(id);
      }
    }

    if (deleted.length > 0) {
      this.log.info('Cleaned up old sessions', { count: deleted.length });
    }
    return deleted;
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  on(listener: SessionStoreEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private emit(event: SessionStoreEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch {
        // Ignore listener errors
      }
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export async function createSessionStore(config: SessionStoreConfig): Promise<SessionStore> {
  const store = new SessionStore(config);
  await store.initialize();
  return store;
}
