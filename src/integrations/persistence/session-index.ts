/**
 * Session Index
 *
 * A rebuildable summary table over every stored session, kept in
 * `<dir>/_index.json` for fast listing. The session files are the source
 * of truth: a missing, version-mismatched or unreadable index file is
 * rebuilt from them rather than reported as an error.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { SessionCorruptedError, SessionNotFoundError, SessionStorageError } from '../../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { type Session, type SessionSummary, SessionSummarySchema, createSessionSummary } from './session.js';
import { type SessionStore, isNotFoundError, writeFileAtomic } from './session-store.js';

// =============================================================================
// TYPES
// =============================================================================

export const INDEX_VERSION = 1;
export const INDEX_FILE_NAME = '_index.json';

const IndexFileSchema = z.object({
  version: z.literal(INDEX_VERSION),
  sessions: z.record(SessionSummarySchema),
});

export type SessionSortField = 'updatedAt' | 'createdAt' | 'title' | 'messageCount' | 'totalTokens';

export interface SessionListOptions {
  limit?: number;
  offset?: number;
  sortBy?: SessionSortField;
  descending?: boolean;
  /** Every tag must be present */
  tags?: string[];
  /** Case-insensitive substring of the title */
  search?: string;
  /** Exact match */
  workingDir?: string;
}

export interface SessionIndexConfig {
  store: SessionStore;
  indexPath?: string;
  logger?: StructuredLogger;
}

export type RebuildReason = 'missing' | 'version-mismatch' | 'unreadable' | 'requested';

// =============================================================================
// SESSION INDEX
// =============================================================================

export class SessionIndex {
  readonly indexPath: string;
  private store: SessionStore;
  private log: StructuredLogger;
  private entries = new Map<string, SessionSummary>();
  private generation = 0;
  private savedGeneration = 0;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(config: SessionIndexConfig) {
    this.store = config.store;
    this.indexPath = config.indexPath ?? join(config.store.sessionsDir, INDEX_FILE_NAME);
    this.log = config.logger ?? createComponentLogger('SessionIndex');
  }

  get isDirty(): boolean {
    return this.generation !== this.savedGeneration;
  }

  /**
   * Load the index file, rebuilding from the store when it cannot be used.
   */
  async initialize(): Promise<void> {
    let raw: string;
    try {
      raw = await this.store.io.readFile(this.indexPath);
    } catch (err) {
      if (isNotFoundError(err)) {
        await this.rebuild('missing');
        return;
      }
      throw SessionStorageError.wrap(err, 'index', this.indexPath);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      await this.rebuild('unreadable');
      return;
    }

    const version = z.object({ version: z.unknown() }).safeParse(json);
    if (!version.success || version.data.version !== INDEX_VERSION) {
      this.log.warn('Index version mismatch, rebuilding', {
        found: version.success ? version.data.version : undefined,
        expected: INDEX_VERSION,
      });
      await this.rebuild('version-mismatch');
      return;
    }

    const parsed = IndexFileSchema.safeParse(json);
    if (!parsed.success) {
      await this.rebuild('unreadable');
      return;
    }

    this.entries = new Map(Object.entries(parsed.data.sessions));
    this.savedGeneration = this.generation;
    this.log.debug('Loaded session index', { count: this.entries.size });
  }

  /**
   * Re-derive every summary from the session files and persist the result.
   * Corrupted session files are skipped. Returns the number indexed.
   */
  async rebuild(reason: RebuildReason = 'requested'): Promise<number> {
    if (reason === 'unreadable') {
      this.log.warn('Index file unreadable, rebuilding', { path: this.indexPath });
    } else if (reason === 'missing') {
      this.log.info('No index file, rebuilding', { path: this.indexPath });
    }

    const entries = new Map<string, SessionSummary>();
    for (const id of await this.store.listIds()) {
      try {
        entries.set(id, createSessionSummary(await this.store.load(id)));
      } catch (err) {
        if (err instanceof SessionCorruptedError) {
          this.log.forSession(id).warn('Skipping corrupted session during rebuild', { error: err.message });
        } else if (!(err instanceof SessionNotFoundError)) {
          throw err;
        }
      }
    }

    this.entries = entries;
    this.generation++;
    await this.save();
    return entries.size;
  }

  add(session: Session): void {
    this.entries.set(session.id, createSessionSummary(session));
    this.generation++;
  }

  update(session: Session): void {
    this.add(session);
  }

  remove(id: string): boolean {
    const removed = this.entries.delete(id);
    if (removed) this.generation++;
    return removed;
  }

  /** Summaries are returned as copies; edit sessions through `update` */
  get(id: string): SessionSummary | undefined {
    const summary = this.entries.get(id);
    return summary && copySummary(summary);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  count(): number {
    return this.entries.size;
  }

  list(options: SessionListOptions = {}): SessionSummary[] {
    const sortBy = options.sortBy ?? 'updatedAt';
    const descending = options.descending ?? true;
    const search = options.search?.toLowerCase();
    const tags = options.tags ?? [];

    const filtered = [...this.entries.values()].filter((s) => {
      if (tags.some((t) => !s.tags.includes(t))) return false;
      if (search && !s.title.toLowerCase().includes(search)) return false;
      if (options.workingDir !== undefined && s.workingDir !== options.workingDir) return false;
      return true;
    });

    filtered.sort((a, b) => {
      const order = compareField(a, b, sortBy);
      if (order !== 0) return descending ? -order : order;
      return a.id.localeCompare(b.id);
    });

    const offset = Math.max(0, options.offset ?? 0);
    const end = options.limit === undefined ? undefined : offset + Math.max(0, options.limit);
    return filtered.slice(offset, end).map(copySummary);
  }

  /**
   * Write the index file atomically. Concurrent calls are serialized.
   */
  async save(): Promise<void> {
    const run = this.writeQueue.then(async () => {
      const generation = this.generation;
      const document = { version: INDEX_VERSION, sessions: Object.fromEntries(this.entries) };
      try {
        await writeFileAtomic(this.store.io, this.indexPath, JSON.stringify(document, null, 2), this.store.fileMode);
      } catch (err) {
        throw SessionStorageError.wrap(err, 'index', this.indexPath);
      }
      this.savedGeneration = generation;
    });
    // Keep the queue alive after a failed write; the caller sees the error through `run`
    this.writeQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Persist only when something changed since the last save */
  async saveIfDirty(): Promise<boolean> {
    if (!this.isDirty) return false;
    await this.save();
    return true;
  }
}

function copySummary(summary: SessionSummary): SessionSummary {
  return { ...summary, tags: [...summary.tags] };
}

function compareField(a: SessionSummary, b: SessionSummary, field: SessionSortField): number {
  switch (field) {
    case 'messageCount':
    case 'totalTokens':
      return a[field] - b[field];
    case 'title':
      return a.title.localeCompare(b.title);
    case 'createdAt':
    case 'updatedAt':
      return Date.parse(a[field]) - Date.parse(b[field]);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export async function createSessionIndex(config: SessionIndexConfig): Promise<SessionIndex> {
  const index = new SessionIndex(config);
  await index.initialize();
  return index;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Format session summaries for display.
 */
export function formatSessionList(sessions: SessionSummary[], max = 10): string {
  if (sessions.length === 0) {
    return 'No saved sessions.';
  }

  const lines: string[] = ['Sessions:'];

  for (const session of sessions.slice(0, max)) {
    const updated = session.updatedAt.slice(0, 16).replace('T', ' ');
    const name = session.title || session.id;
    const tags = session.tags.length > 0 ? ` [${session.tags.join(', ')}]` : '';
    lines.push(`  ${name} - ${session.messageCount} msgs - ${updated}${tags}`);
  }

  if (sessions.length > max) {
    lines.push(`  ... and ${sessions.length - max} more`);
  }

  return lines.join('\n');
}
