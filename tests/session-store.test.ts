/**
 * Session Store Tests
 *
 * Crash-safe JSON persistence: round trips, corruption detection, backup
 * recovery, injected write failures and retention cleanup.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import {
  SessionStore,
  createSessionStore,
  nodeFileIO,
  type SaveState,
  type SessionStoreEvent,
} from '../src/integrations/persistence/session-store.js';
import { Session, SessionFileSchema } from '../src/integrations/persistence/session.js';
import {
  SessionCorruptedError,
  SessionNotFoundError,
  SessionStorageError,
  ValidationError,
} from '../src/errors/index.js';
import { makeTempDir, memoryLogger, removeTempDir } from './helpers/fixtures.js';

function withUpdatedAt(session: Session, updatedAt: string): Session {
  return Session.fromJSON(SessionFileSchema.parse({ ...session.toJSON(), createdAt: updatedAt, updatedAt }));
}

function failingWith(code: string): Error {
  return Object.assign(new Error(`${code}: simulated failure`), { code });
}

describe('SessionStore', () => {
  let tempDir: string;
  let store: SessionStore;

  beforeEach(async () => {
    tempDir = await makeTempDir('store');
    store = await createSessionStore({ sessionsDir: tempDir, logger: memoryLogger().logger });
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe('save and load', () => {
    it('round-trips a session', async () => {
      const session = new Session({ title: 'Test' });
      session.addMessage({ role: 'user', content: 'Hello' });

      await store.save(session);
      const loaded = await store.load(session.id);

      expect(loaded.messageCount).toBe(1);
      expect(loaded.messages[0].role).toBe('user');
      expect(loaded.messages[0].content).toBe('Hello');
      expect(loaded.toJSON()).toEqual(session.toJSON());
    });

    it('writes session files readable only by the owner', async () => {
      if (process.platform === 'win32') return;
      const session = new Session();
      await store.save(session);

      const { mode } = await stat(store.pathFor(session.id));
      expect(mode & 0o777).toBe(0o600);
    });

    it('serializes concurrent saves in call order', async () => {
      const session = new Session();
      const saves: Array<Promise<void>> = [];
      for (let i = 0; i < 5; i++) {
        session.addMessage({ role: 'user', content: `message ${i}` });
        saves.push(store.save(session));
      }
      await Promise.all(saves);

      expect((await store.load(session.id)).messageCount).toBe(5);
    });

    it('reports save states and completion', async () => {
      const states: SaveState[] = [];
      const types: Array<SessionStoreEvent['type']> = [];
      store.on((event) => {
        types.push(event.type);
        if (event.type === 'save.state') states.push(event.state);
      });

      await store.save(new Session());

      expect(states).toEqual(['backing-up', 'writing-temp', 'renaming', 'ready']);
      expect(types.at(-1)).toBe('session.saved');
    });
  });

  describe('failures', () => {
    it('throws SessionNotFoundError for unknown ids', async () => {
      await expect(store.load('missing-session')).rejects.toBeInstanceOf(SessionNotFoundError);
      expect(await store.loadOrNull('missing-session')).toBeNull();
      expect(await store.exists('missing-session')).toBe(false);
    });

    it('rejects invalid ids before touching the disk', async () => {
      await expect(store.load('../outside')).rejects.toBeInstanceOf(ValidationError);
    });

    it('detects unparsable files', async () => {
      await writeFile(store.pathFor('broken'), '{not json');
      await expect(store.load('broken')).rejects.toBeInstanceOf(SessionCorruptedError);
    });

    it('logs an unreadable file against its session when loading leniently', async () => {
      const { logger, sink } = memoryLogger();
      const lenient = new SessionStore({ sessionsDir: tempDir, logger });
      await writeFile(lenient.pathFor('broken'), '{not json');

      expect(await lenient.loadOrNull('broken')).toBeNull();

      const [entry] = sink.getEntries({ level: 'warn' });
      expect(entry.message).toBe('Failed to load session');
      expect(entry.sessionId).toBe('broken');
      expect(entry.data?.recoverable).toBe(true);
      expect(entry.data?.error).toMatch(
        /^\[SessionCorruptedError\] \(VALIDATION\) Session file is corrupted: broken \(invalid JSON\)/,
      );
    });

    it('detects schema violations', async () => {
      await writeFile(store.pathFor('invalid'), JSON.stringify({ id: 'invalid', title: 7 }));
      await expect(store.load('invalid')).rejects.toBeInstanceOf(SessionCorruptedError);
    });

    it('detects a file stored under another id', async () => {
      const session = new Session({ id: 'original' });
      await writeFile(store.pathFor('renamed'), JSON.stringify(session.toJSON()));
      await expect(store.load('renamed')).rejects.toThrow('file belongs to session original');
    });

    it('keeps the previous file intact when the rename fails', async () => {
      const session = new Session({ title: 'Test' });
      session.addMessage({ role: 'user', content: 'Hello' });
      await store.save(session);

      const crashing = new SessionStore({
        sessionsDir: tempDir,
        logger: memoryLogger().logger,
        io: {
          ...nodeFileIO,
          rename: async () => {
            throw failingWith('EIO');
          },
        },
      });
      session.addMessage({ role: 'assistant', content: 'Hi' });

      await expect(crashing.save(session)).rejects.toBeInstanceOf(SessionStorageError);
      expect(crashing.getSaveState(session.id)).toBe('ready');
      expect((await store.load(session.id)).messageCount).toBe(1);
      expect((await readdir(tempDir)).filter((name) => name.includes('.tmp-'))).toEqual([]);
    });

    it('names the cause of disk-full failures', async () => {
      const full = new SessionStore({
        sessionsDir: tempDir,
        logger: memoryLogger().logger,
        io: {
          ...nodeFileIO,
          writeFileSynced: async () => {
            throw failingWith('ENOSPC');
          },
        },
      });

      const error = await full.save(new Session({ id: 'no-space' })).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(SessionStorageError);
      expect(error).toMatchObject({ operation: 'save', code: 'ENOSPC' });
      expect(existsSync(store.pathFor('no-space'))).toBe(false);
    });

    it('removes stale temp files on initialize', async () => {
      const stale = join(tempDir, 'session-x.json.tmp-abc123');
      await writeFile(stale, '{');

      await createSessionStore({ sessionsDir: tempDir, logger: memoryLogger().logger });

      expect(existsSync(stale)).toBe(false);
    });
  });

  describe('backups', () => {
    it('keeps the previous version beside the primary', async () => {
      const session = new Session({ title: 'First' });
      await store.save(session);
      const firstVersion = await readFile(store.pathFor(session.id), 'utf-8');

      session.setTitle('Second');
      await store.save(session);

      expect(await readFile(store.backupPathFor(session.id), 'utf-8')).toBe(firstVersion);
    });

    it('recovers a corrupted primary from the backup', async () => {
      const session = new Session({ title: 'First' });
      await store.save(session);
      session.setTitle('Second');
      await store.save(session);
      await writeFile(store.pathFor(session.id), '{truncated');

      expect(await store.recoverFromBackup(session.id)).toBe(true);
      expect((await store.load(session.id)).title).toBe('First');
    });

    it('reports when there is no backup', async () => {
      expect(await store.recoverFromBackup('never-saved')).toBe(false);
    });

    it('skips backups when disabled', async () => {
      const plain = new SessionStore({ sessionsDir: tempDir, backup: false, logger: memoryLogger().logger });
      const session = new Session();
      await plain.save(session);
      await plain.save(session);

      expect(existsSync(plain.backupPathFor(session.id))).toBe(false);
    });
  });

  describe('listing and deletion', () => {
    it('lists only valid primary session files', async () => {
      await store.save(new Session({ id: 'b-session' }));
      await store.save(new Session({ id: 'a-session' }));
      await store.save(new Session({ id: 'a-session' }));
      await writeFile(join(tempDir, '_index.json'), '{}');
      await writeFile(join(tempDir, 'notes.txt'), 'x');

      expect(await store.listIds()).toEqual(['a-session', 'b-session']);
    });

    it('deletes the session and its backup', async () => {
      const session = new Session();
      await store.save(session);
      await store.save(session);

      expect(await store.delete(session.id)).toBe(true);
      expect(await store.delete(session.id)).toBe(false);
      expect(existsSync(store.backupPathFor(session.id))).toBe(false);
    });

    it('cleans up old sessions, keeping the most recent', async () => {
      const old = '2020-01-01T00:00:00.000Z';
      for (const id of ['old-c', 'old-a', 'old-b']) {
        await store.save(withUpdatedAt(new Session({ id }), old));
      }
      await store.save(new Session({ id: 'fresh' }));

      const deleted = await store.cleanupOlderThan(24 * 60 * 60 * 1000, 2);

      expect(deleted).toEqual(['old-b', 'old-c']);
      expect(await store.listIds()).toEqual(['fresh', 'old-a']);
    });
  });
});
