/**
 * Auto-Checkpoint
 *
 * Periodically persists the current session so that work survives a crash.
 * The task runs on a re-armed, unref'd timer: one tick at a time, never
 * overlapping, and a failing tick is logged and retried on the next one.
 *
 * `stop()` clears the timer synchronously and resolves only after an
 * in-flight tick has finished; once it resolves no further tick runs.
 */

import { formatErrorForLog, wrapError } from '../../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';

// =============================================================================
// TYPES
// =============================================================================

export type CheckpointTask = (sessionId: string) => Promise<void>;

export interface AutoCheckpointConfig {
  /** Time between checkpoints in ms (default: 30000) */
  intervalMs?: number;
  /** Whether checkpointing is enabled (default: true) */
  enabled?: boolean;
  logger?: StructuredLogger;
}

export interface CheckpointStats {
  running: boolean;
  sessionId: string | null;
  intervalMs: number;
  checkpoints: number;
  failures: number;
  lastCheckpointAt: number | null;
  lastError: string | null;
}

// =============================================================================
// AUTO-CHECKPOINT MANAGER
// =============================================================================

export class AutoCheckpointManager {
  readonly intervalMs: number;
  readonly enabled: boolean;
  private log: StructuredLogger;

  private timer?: ReturnType<typeof setTimeout>;
  private inFlight: Promise<void> | null = null;
  /** Bumped on every start/stop; stale ticks compare against it and bail */
  private generation = 0;
  private sessionId: string | null = null;
  private task: CheckpointTask | null = null;

  private checkpoints = 0;
  private failures = 0;
  private lastCheckpointAt: number | null = null;
  private lastError: string | null = null;

  constructor(config: AutoCheckpointConfig = {}) {
    this.intervalMs = config.intervalMs ?? 30000;
    this.enabled = config.enabled ?? true;
    this.log = config.logger ?? createComponentLogger('AutoCheckpoint');
  }

  get isRunning(): boolean {
    return this.sessionId !== null;
  }

  /**
   * Begin checkpointing `sessionId`. Replaces any previous schedule; the
   * caller should have awaited `stop()` to let a previous tick finish.
   */
  start(sessionId: string, task: CheckpointTask): void {
    if (!this.enabled) return;

    this.clearTimer();
    this.generation++;
    this.sessionId = sessionId;
    this.task = task;
    this.schedule(this.generation);
    this.log.forSession(sessionId).debug('Auto-checkpoint started', { intervalMs: this.intervalMs });
  }

  async stop(): Promise<void> {
    this.clearTimer();
    this.generation++;
    const sessionId = this.sessionId;
    this.sessionId = null;
    this.task = null;

    if (this.inFlight) {
      await this.inFlight;
    }
    if (sessionId) {
      this.log.forSession(sessionId).debug('Auto-checkpoint stopped');
    }
  }

  getStats(): CheckpointStats {
    return {
      running: this.isRunning,
      sessionId: this.sessionId,
      intervalMs: this.intervalMs,
      checkpoints: this.checkpoints,
      failures: this.failures,
      lastCheckpointAt: this.lastCheckpointAt,
      lastError: this.lastError,
    };
  }

  private schedule(generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      const tick: Promise<void> = this.tick(generation).finally(() => {
        if (this.inFlight === tick) this.inFlight = null;
      });
      this.inFlight = tick;
    }, this.intervalMs);
    this.timer.unref?.();
  }

  private async tick(generation: number): Promise<void> {
    const sessionId = this.sessionId;
    const task = this.task;
    if (generation !== this.generation || !sessionId || !task) return;

    try {
      await task(sessionId);
      this.checkpoints++;
      this.lastCheckpointAt = Date.now();
    } catch (err) {
      const failure = wrapError(err, { sessionId });
      this.failures++;
      this.lastError = failure.message;
      this.log.forSession(sessionId).warn('Checkpoint failed, retrying next interval', {
        error: formatErrorForLog(failure),
        category: failure.category,
        recoverable: failure.recoverable,
      });
    }

    if (generation === this.generation) {
      this.schedule(generation);
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}

export function createAutoCheckpointManager(config?: AutoCheckpointConfig): AutoCheckpointManager {
  return new AutoCheckpointManager(config);
}
