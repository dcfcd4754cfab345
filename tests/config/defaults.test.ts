/**
 * Default Configuration Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import {
  DEFAULT_COMPACTION_CONFIG,
  DEFAULT_CONTEXT_CONFIG,
  DEFAULT_MODEL,
  configureLoggingFromConfig,
  resolveConfig,
} from '../../src/defaults.js';
import { configureLogger, logger } from '../../src/integrations/utilities/logger.js';

describe('resolveConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fills every section from defaults', () => {
    vi.stubEnv('XDG_DATA_HOME', '/xdg/data');

    const config = resolveConfig();

    expect(config.model).toBe(DEFAULT_MODEL);
    expect(config.sessions).toEqual({
      dir: join('/xdg/data', 'convoy', 'sessions'),
      autoCheckpoint: true,
      checkpointIntervalMs: 30000,
      backup: true,
      retentionDays: 30,
      keepMinimum: 10,
    });
    expect(config.context).toEqual(DEFAULT_CONTEXT_CONFIG);
    expect(config.compaction).toEqual(DEFAULT_COMPACTION_CONFIG);
    expect(config.logging).toEqual({ level: 'warn', file: null });
  });

  it('lays loaded values over the defaults', () => {
    const config = resolveConfig({
      model: 'claude-haiku-4',
      sessions: { dir: '/custom/sessions', backup: false },
      context: { mode: 'sliding_window' },
      compaction: { minMessages: 40 },
    });

    expect(config.model).toBe('claude-haiku-4');
    expect(config.sessions.dir).toBe('/custom/sessions');
    expect(config.sessions.backup).toBe(false);
    expect(config.sessions.retentionDays).toBe(30);
    expect(config.context.mode).toBe('sliding_window');
    expect(config.context.windowSize).toBe(20);
    expect(config.compaction).toEqual({ ...DEFAULT_COMPACTION_CONFIG, minMessages: 40 });
  });

  it('disables compaction with false', () => {
    expect(resolveConfig({ compaction: false }).compaction).toEqual({ ...DEFAULT_COMPACTION_CONFIG, enabled: false });
  });
});

describe('configureLoggingFromConfig', () => {
  afterEach(() => {
    configureLogger({ level: 'warn' });
  });

  it('sets the global log level', () => {
    configureLoggingFromConfig({ level: 'error', file: null });
    expect(logger.getLevel()).toBe('error');
  });
});
