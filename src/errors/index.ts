/**
 * Centralized Error Types
 *
 * Typed, categorized errors for session persistence and context management.
 *
 * Error Categories:
 * - TRANSIENT: may resolve on retry (busy file, timeout)
 * - PERMANENT: will not resolve on retry (missing session)
 * - RESOURCE: disk full, permission denied
 * - VALIDATION: malformed input or on-disk data
 * - INTERNAL: programming-contract violations
 * - CANCELLED: operation was cancelled or timed out
 *
 * @example
 * ```typescript
 * try {
 *   await store.load(id);
 * } catch (err) {
 *   if (err instanceof SessionCorruptedError) {
 *     await store.recoverFromBackup(id);
 *   }
 * }
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  TRANSIENT = 'TRANSIENT',
  PERMANENT = 'PERMANENT',
  RESOURCE = 'RESOURCE',
  VALIDATION = 'VALIDATION',
  INTERNAL = 'INTERNAL',
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all convoy errors.
 */
export class AgentError extends Error {
  readonly category: ErrorCategory;

  /** Whether the caller can reasonably recover (retry, restore, fall back) */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'AgentError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }

  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SESSION ERRORS
// =============================================================================

/**
 * The requested session id has no file on disk.
 */
export class SessionNotFoundError extends AgentError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, ErrorCategory.PERMANENT, true, { sessionId });
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/**
 * The session file exists but cannot be parsed or fails schema validation.
 * Recoverable through `SessionStore.recoverFromBackup()`.
 */
export class SessionCorruptedError extends AgentError {
  readonly sessionId: string;
  readonly path: string;

  constructor(sessionId: string, path: string, detail: string, cause?: Error) {
    super(
      `Session file is corrupted: ${sessionId} (${detail})`,
      ErrorCategory.VALIDATION,
      true,
      { sessionId, path, detail },
      cause,
    );
    this.name = 'SessionCorruptedError';
    this.sessionId = sessionId;
    this.path = path;
  }
}

export type StorageOperation =
  | 'save'
  | 'backup'
  | 'load'
  | 'delete'
  | 'list'
  | 'recover'
  | 'index';

/**
 * Disk-level failure (disk full, permission denied, rename failure).
 * The primary file is never left partially written when this is thrown.
 */
export class SessionStorageError extends AgentError {
  readonly operation: StorageOperation;
  readonly path: string;
  readonly code?: string;

  constructor(
    message: string,
    operation: StorageOperation,
    path: string,
    cause?: Error,
  ) {
    const code = cause ? errnoCode(cause) : undefined;
    const category =
      code === 'EBUSY' || code === 'EAGAIN' || code === 'EMFILE'
        ? ErrorCategory.TRANSIENT
        : ErrorCategory.RESOURCE;
    super(message, category, category === ErrorCategory.TRANSIENT, { operation, path, code }, cause);
    this.name = 'SessionStorageError';
    this.operation = operation;
    this.path = path;
    this.code = code;
  }

  static wrap(err: unknown, operation: StorageOperation, path: string): SessionStorageError {
    if (err instanceof SessionStorageError) return err;
    const cause = err instanceof Error ? err : new Error(String(err));
    const code = errnoCode(cause);
    const reason =
      code === 'ENOSPC'
        ? 'disk full'
        : code === 'EACCES' || code === 'EPERM'
          ? 'permission denied'
          : cause.message;
    return new SessionStorageError(`Failed to ${operation} ${path}: ${reason}`, operation, path, cause);
  }
}

/**
 * A caller broke the orchestrator's usage contract (e.g. mutating with no
 * current session). Indicates a bug, never a runtime condition.
 */
export class SessionContractError extends AgentError {
  readonly operation: string;

  constructor(operation: string, message?: string) {
    super(
      message ?? `${operation} requires a current session; call create() or resume() first`,
      ErrorCategory.INTERNAL,
      false,
      { operation },
    );
    this.name = 'SessionContractError';
    this.operation = operation;
  }
}

// =============================================================================
// GENERAL ERRORS
// =============================================================================

export class ValidationError extends AgentError {
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  /**
   * Create error from Zod validation result.
   */
  static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    return new ValidationError(`Validation failed: ${messages.join(', ')}`, fields);
  }
}

export class CancellationError extends AgentError {
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled') {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

/**
 * Compaction failed. Always handled inside the compactor; exported so
 * listeners can inspect the failure they are told about.
 */
export class CompactionError extends AgentError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCategory.TRANSIENT, true, {}, cause);
    this.name = 'CompactionError';
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

function errnoCode(error: Error): string | undefined {
  if (!('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Determine error category from a generic error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  const message = error.message.toLowerCase();
  const code = errnoCode(error);

  if (
    code === 'ETIMEDOUT' ||
    code === 'EBUSY' ||
    code === 'EAGAIN' ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('temporarily unavailable')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (
    code === 'ENOSPC' ||
    code === 'EACCES' ||
    code === 'EPERM' ||
    code === 'ENOMEM' ||
    message.includes('out of memory')
  ) {
    return { category: ErrorCategory.RESOURCE, recoverable: false };
  }

  if (code === 'ENOENT') {
    return { category: ErrorCategory.PERMANENT, recoverable: false };
  }

  if (message.includes('invalid') || message.includes('validation') || message.includes('json')) {
    return { category: ErrorCategory.VALIDATION, recoverable: false };
  }

  if (message.includes('cancelled') || message.includes('aborted')) {
    return { category: ErrorCategory.CANCELLED, recoverable: false };
  }

  return { category: ErrorCategory.INTERNAL, recoverable: false };
}

/**
 * Wrap an unknown error as an AgentError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): AgentError {
  if (error instanceof AgentError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const { category, recoverable } = categorizeError(err);

  return new AgentError(err.message, category, recoverable, context, err);
}

export function isRecoverable(error: unknown): boolean {
  if (error instanceof AgentError) {
    return error.recoverable;
  }
  const err = error instanceof Error ? error : new Error(String(error));
  return categorizeError(err).recoverable;
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof AgentError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
