/**
 * Auto-Checkpoint Manager Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AutoCheckpointManager,
  createAutoCheckpointManager,
} from '../src/integrations/quality/auto-checkpoint.js';
import { memoryLogger, messagesOf } from './helpers/fixtures.js';

describe('AutoCheckpointManager', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('checkpoints on every interval', async () => {
    const mgr = createAutoCheckpointManager({ intervalMs: 1000, logger: memoryLogger().logger });
    const task = vi.fn(async () => {});

    mgr.start('session-1', task);
    await vi.advanceTimersByTimeAsync(3500);

    expect(task).toHaveBeenCalledTimes(3);
    expect(task).toHaveBeenCalledWith('session-1');
    expect(mgr.getStats()).toMatchObject({ running: true, sessionId: 'session-1', checkpoints: 3, failures: 0 });
    await mgr.stop();
  });

  it('keeps going after a failing tick', async () => {
    const { logger, sink } = memoryLogger();
    const mgr = new AutoCheckpointManager({ intervalMs: 1000, logger });
    const task = vi
      .fn<(sessionId: string) => Promise<void>>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockResolvedValue(undefined);

    mgr.start('session-1', task);
    await vi.advanceTimersByTimeAsync(2000);

    expect(task).toHaveBeenCalledTimes(2);
    expect(mgr.getStats()).toMatchObject({ checkpoints: 1, failures: 1, lastError: 'disk full' });
    expect(messagesOf(sink)).toEqual(['Checkpoint failed, retrying next interval']);
    await mgr.stop();
  });

  it('logs a failed tick against its session with the error category', async () => {
    const { logger, sink } = memoryLogger();
    const mgr = new AutoCheckpointManager({ intervalMs: 1000, logger });
    mgr.start('session-1', async () => {
      throw Object.assign(new Error('file busy'), { code: 'EBUSY' });
    });
    await vi.advanceTimersByTimeAsync(1000);

    const [entry] = sink.getEntries({ level: 'warn' });
    expect(entry.sessionId).toBe('session-1');
    expect(entry.data).toEqual({
      error: '[AgentError] (TRANSIENT) file busy context={"sessionId":"session-1"}',
      category: 'TRANSIENT',
      recoverable: true,
    });
    expect(mgr.getStats().lastError).toBe('file busy');
    await mgr.stop();
  });

  it('never overlaps ticks', async () => {
    const mgr = new AutoCheckpointManager({ intervalMs: 100, logger: memoryLogger().logger });
    let active = 0;
    let maxActive = 0;
    mgr.start('session-1', async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 250));
      active--;
    });

    await vi.advanceTimersByTimeAsync(1000);
    const stopped = mgr.stop();
    await vi.advanceTimersByTimeAsync(300);
    await stopped;

    expect(maxActive).toBe(1);
  });

  it('waits for an in-flight tick on stop and runs no more', async () => {
    const mgr = new AutoCheckpointManager({ intervalMs: 100, logger: memoryLogger().logger });
    let finished = 0;
    const task = vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 50));
      finished++;
    });

    mgr.start('session-1', task);
    await vi.advanceTimersByTimeAsync(120);
    expect(task).toHaveBeenCalledTimes(1);

    const stopped = mgr.stop();
    await vi.advanceTimersByTimeAsync(50);
    await stopped;

    expect(finished).toBe(1);
    expect(mgr.isRunning).toBe(false);

    await vi.advanceTimersByTimeAsync(1000);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('does nothing when disabled', async () => {
    const mgr = new AutoCheckpointManager({ enabled: false, intervalMs: 100 });
    const task = vi.fn(async () => {});

    mgr.start('session-1', task);
    await vi.advanceTimersByTimeAsync(500);

    expect(task).not.toHaveBeenCalled();
    expect(mgr.isRunning).toBe(false);
  });

  it('replaces the schedule on restart', async () => {
    const mgr = new AutoCheckpointManager({ intervalMs: 100, logger: memoryLogger().logger });
    const first = vi.fn(async () => {});
    const second = vi.fn(async () => {});

    mgr.start('session-1', first);
    mgr.start('session-2', second);
    await vi.advanceTimersByTimeAsync(150);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith('session-2');
    await mgr.stop();
  });
});
