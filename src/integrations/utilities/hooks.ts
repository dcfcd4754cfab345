/**
 * Session lifecycle hooks.
 *
 * A typed event bus: many listeners per event, called synchronously in
 * registration order. A throwing listener (or one whose returned promise
 * rejects) is logged and recorded in a bounded error history; it never
 * aborts the operation that fired the event or the remaining listeners.
 */

import type { Message } from '../../types.js';
import type { Session } from '../persistence/session.js';
import { createComponentLogger, type StructuredLogger } from './logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SessionHookPayloads {
  'session:start': { session: Session; resumed: boolean };
  'session:end': { session: Session };
  'session:message': { session: Session; message: Message };
  'session:save': { session: Session };
}

export type SessionHookEvent = keyof SessionHookPayloads;

export type SessionHookListener<E extends SessionHookEvent> = (
  payload: SessionHookPayloads[E],
) => void | Promise<void>;

/**
 * Hook error record for observability.
 */
export interface HookError {
  event: SessionHookEvent;
  error: Error;
  timestamp: Date;
}

export type HookErrorListener = (error: HookError) => void;

export interface SessionHooksConfig {
  /** Bounded error history size (default: 100) */
  maxErrors?: number;
  logger?: StructuredLogger;
}

type ListenerTable = {
  [E in SessionHookEvent]: Array<SessionHookListener<E>>;
};

// =============================================================================
// SESSION HOOKS
// =============================================================================

export class SessionHooks {
  private listeners: ListenerTable = {
    'session:start': [],
    'session:end': [],
    'session:message': [],
    'session:save': [],
  };
  private hookErrors: HookError[] = [];
  private errorListeners = new Set<HookErrorListener>();
  private pending = new Set<Promise<void>>();
  private maxErrors: number;
  private log: StructuredLogger;

  constructor(config: SessionHooksConfig = {}) {
    this.maxErrors = config.maxErrors ?? 100;
    this.log = config.logger ?? createComponentLogger('SessionHooks');
  }

  /**
   * Register a listener. Returns an unsubscribe function.
   */
  on<E extends SessionHookEvent>(event: E, listener: SessionHookListener<E>): () => void {
    const list: Array<SessionHookListener<E>> = this.listeners[event];
    list.push(listener);
    return () => {
      const idx = list.indexOf(listener);
      if (idx >= 0) list.splice(idx, 1);
    };
  }

  listenerCount(event: SessionHookEvent): number {
    return this.listeners[event].length;
  }

  /**
   * Invoke every listener for `event` synchronously.
   */
  emit<E extends SessionHookEvent>(event: E, payload: SessionHookPayloads[E]): void {
    const list: Array<SessionHookListener<E>> = [...this.listeners[event]];
    for (const listener of list) {
      let result: void | Promise<void>;
      try {
        result = listener(payload);
      } catch (err) {
        this.recordError(event, err);
        continue;
      }

      if (result instanceof Promise) {
        const tracked: Promise<void> = result
          .catch((err: unknown) => this.recordError(event, err))
          .finally(() => this.pending.delete(tracked));
        this.pending.add(tracked);
      }
    }
  }

  /**
   * Wait for promises returned by async listeners to settle.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  subscribeToErrors(listener: HookErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  getHookErrors(limit = 10): HookError[] {
    return this.hookErrors.slice(-limit);
  }

  private recordError(event: SessionHookEvent, error: unknown): void {
    const hookError: HookError = {
      event,
      error: error instanceof Error ? error : new Error(String(error)),
      timestamp: new Date(),
    };

    this.hookErrors.push(hookError);
    if (this.hookErrors.length > this.maxErrors) {
      this.hookErrors.shift();
    }

    for (const listener of this.errorListeners) {
      try {
        listener(hookError);
      } catch (listenerErr) {
        // Not recorded again: an error listener failing must not recurse
        this.log.warn('Hook error listener failed', {
          error: listenerErr instanceof Error ? listenerErr.message : String(listenerErr),
        });
      }
    }

    this.log.error('Hook error', { event, error: hookError.error.message });
  }
}
