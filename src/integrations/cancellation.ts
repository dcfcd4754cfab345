/**
 * Cancellation Tokens
 *
 * Cooperative cancellation for the few operations that wait on something
 * outside the process (the compactor's and title generator's model calls).
 * Based on the .NET CancellationToken pattern.
 *
 * Usage:
 *   const cts = createTimeoutToken(30_000);
 *   try {
 *     const res = await race(provider.chat(msgs, { signal: toAbortSignal(cts.token) }), cts.token);
 *   } finally {
 *     cts.dispose();
 *   }
 */

import { CancellationError } from '../errors/index.js';
import { createComponentLogger } from './utilities/logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly cancellationReason?: string;
  /** Resolves with the reason once cancelled; never settles otherwise */
  readonly onCancellationRequested: Promise<string | undefined>;
  register(callback: (reason?: string) => void): { dispose: () => void };
  throwIfCancellationRequested(): void;
}

export interface CancellationTokenSource {
  readonly token: CancellationToken;
  readonly isCancellationRequested: boolean;
  cancel(reason?: string): void;
  /** Cancel after a timeout; the timer never keeps the process alive */
  cancelAfter(ms: number): this;
  /** Release the timer without cancelling */
  dispose(): void;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

class CancellationTokenImpl implements CancellationToken {
  private cancelled = false;
  private reason?: string;
  private callbacks = new Set<(reason?: string) => void>();
  private resolvePromise: (reason: string | undefined) => void = () => {};
  readonly onCancellationRequested: Promise<string | undefined>;

  constructor() {
    this.onCancellationRequested = new Promise((resolve) => {
      this.resolvePromise = resolve;
    });
  }

  get isCancellationRequested(): boolean {
    return this.cancelled;
  }

  get cancellationReason(): string | undefined {
    return this.reason;
  }

  register(callback: (reason?: string) => void): { dispose: () => void } {
    if (this.cancelled) {
      callback(this.reason);
      return { dispose: () => {} };
    }
    this.callbacks.add(callback);
    return { dispose: () => this.callbacks.delete(callback) };
  }

  throwIfCancellationRequested(): void {
    if (this.cancelled) {
      throw new CancellationError(this.reason);
    }
  }

  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.reason = reason;
    this.resolvePromise(reason);
    for (const cb of this.callbacks) {
      try {
        cb(reason);
      } catch (err) {
        // Every callback runs even if one throws
        createComponentLogger('Cancellation').warn('Cancellation callback failed', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    this.callbacks.clear();
  }
}

class CancellationTokenSourceImpl implements CancellationTokenSource {
  private readonly impl = new CancellationTokenImpl();
  private timeoutId?: ReturnType<typeof setTimeout>;
  private disposed = false;

  get token(): CancellationToken {
    return this.impl;
  }

  get isCancellationRequested(): boolean {
    return this.impl.isCancellationRequested;
  }

  cancel(reason?: string): void {
    if (this.disposed) return;
    this.impl.cancel(reason);
  }

  cancelAfter(ms: number): this {
    if (this.disposed || this.impl.isCancellationRequested) return this;
    this.timeoutId = setTimeout(() => this.cancel(`Operation timed out after ${ms}ms`), ms);
    this.timeoutId.unref?.();
    return this;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = undefined;
    }
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export function createCancellationTokenSource(): CancellationTokenSource {
  return new CancellationTokenSourceImpl();
}

/**
 * Create a token source that auto-cancels after timeout.
 */
export function createTimeoutToken(ms: number): CancellationTokenSource {
  return createCancellationTokenSource().cancelAfter(ms);
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Race a promise against cancellation. Rejects with `CancellationError`
 * when the token fires first.
 */
export function race<T>(promise: Promise<T>, token: CancellationToken): Promise<T> {
  if (token.isCancellationRequested) {
    return Promise.reject(new CancellationError(token.cancellationReason));
  }

  return Promise.race([
    promise,
    token.onCancellationRequested.then((reason): never => {
      throw new CancellationError(reason);
    }),
  ]);
}

/**
 * Create an AbortSignal from a CancellationToken, for APIs built on fetch.
 */
export function toAbortSignal(token: CancellationToken): AbortSignal {
  const controller = new AbortController();

  if (token.isCancellationRequested) {
    controller.abort(token.cancellationReason);
  } else {
    token.register((reason) => controller.abort(reason));
  }

  return controller.signal;
}

/**
 * Run `fn` with a token that cancels after `ms`. The timer is always
 * released, whether `fn` settles or the deadline passes first.
 *
 * Any rejection after the deadline surfaces as `CancellationError`, also
 * when `fn` rejected first in reaction to its aborted signal.
 */
export async function withTimeout<T>(
  ms: number,
  fn: (token: CancellationToken) => Promise<T>,
): Promise<T> {
  const source = createTimeoutToken(ms);
  try {
    return await race(fn(source.token), source.token);
  } catch (err) {
    if (source.token.isCancellationRequested && !(err instanceof CancellationError)) {
      throw new CancellationError(source.token.cancellationReason);
    }
    throw err;
  } finally {
    source.dispose();
  }
}
