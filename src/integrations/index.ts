/**
 * Integration Module Exports
 *
 * Re-exports of every session and context component.
 */

// Token accounting
export {
  MESSAGE_OVERHEAD,
  TOOL_CALL_OVERHEAD,
  BaseTokenEstimator,
  ApproximateTokenEstimator,
  TiktokenEstimator,
  CachingTokenEstimator,
  encodingForModelId,
  isPreciseModel,
  getTokenEstimator,
  type TokenEstimator,
  type CacheStats,
  type ApproximateEstimatorConfig,
  type TiktokenEstimatorConfig,
  type CachingEstimatorConfig,
} from './utilities/token-estimate.js';
export { ModelRegistry, modelRegistry, DEFAULT_MODEL_LIMITS, type ModelLimits } from './budget/model-registry.js';
export {
  ContextBudgetTracker,
  computeBudget,
  type ContextBudget,
  type ContextBudgetConfig,
} from './budget/context-budget.js';

// Eviction and compaction
export {
  SlidingWindowPolicy,
  TokenBudgetPolicy,
  SmartTruncationPolicy,
  SelectivePolicy,
  CompositePolicy,
  createTruncationPolicy,
  createOmissionMarker,
  isOmissionMarker,
  buildEvictionUnits,
  type TruncationPolicy,
  type TruncationMode,
  type TruncationOptions,
} from './context/truncation.js';
export {
  Compactor,
  createCompactor,
  ToolResultCompactor,
  selectCompactionRun,
  formatForSummary,
  isCompactionSummary,
  SUMMARY_PREFIX,
  type CompactionConfig,
  type CompactionResult,
  type CompactionEvent,
  type CompactionEventListener,
  type CompactionSkipReason,
  type ToolResultCompactorConfig,
} from './compaction.js';
export {
  ContextManager,
  CONTEXT_MODES,
  createContextManager,
  isContextMode,
  formatContextStats,
  type ContextMode,
  type ContextManagerConfig,
  type CreateContextManagerOptions,
  type ContextStats,
  type PreparedContext,
} from './context/context-manager.js';

// Persistence
export {
  Session,
  SESSION_ID_PATTERN,
  isValidSessionId,
  assertValidSessionId,
  generateSessionId,
  createSessionSummary,
  SessionFileSchema,
  SessionSummarySchema,
  type SessionData,
  type SessionFileData,
  type SessionInit,
  type SessionSummary,
  type ToolCallRecord,
} from './persistence/session.js';
export {
  SessionStore,
  createSessionStore,
  nodeFileIO,
  writeFileAtomic,
  isNotFoundError,
  type SessionFileIO,
  type SessionStoreConfig,
  type SessionStoreEvent,
  type SessionStoreEventListener,
  type SaveState,
} from './persistence/session-store.js';
export {
  SessionIndex,
  createSessionIndex,
  formatSessionList,
  INDEX_VERSION,
  INDEX_FILE_NAME,
  type SessionIndexConfig,
  type SessionListOptions,
  type SessionSortField,
  type RebuildReason,
} from './persistence/session-index.js';
export {
  SessionManager,
  createSessionManager,
  generateTitle,
  TITLE_MAX_LENGTH,
  type SessionManagerConfig,
  type CreateSessionManagerOptions,
  type CreateSessionOptions,
  type AddMessageOptions,
  type ResumeLatestOptions,
} from './persistence/session-manager.js';

// Lifecycle
export {
  SessionHooks,
  type SessionHookPayloads,
  type SessionHookEvent,
  type SessionHookListener,
  type SessionHooksConfig,
  type HookError,
  type HookErrorListener,
} from './utilities/hooks.js';
export {
  AutoCheckpointManager,
  createAutoCheckpointManager,
  type AutoCheckpointConfig,
  type CheckpointStats,
  type CheckpointTask,
} from './quality/auto-checkpoint.js';

// Cancellation
export {
  createCancellationTokenSource,
  createTimeoutToken,
  race,
  toAbortSignal,
  withTimeout,
  type CancellationToken,
  type CancellationTokenSource,
} from './cancellation.js';

// Logging
export {
  StructuredLogger,
  ConsoleSink,
  MemorySink,
  FileSink,
  logger,
  configureLogger,
  createComponentLogger,
  formatLogLine,
  type LogLevel,
  type LogBindings,
  type LogEntry,
  type LogFilter,
  type LogSink,
  type LoggerConfig,
} from './utilities/logger.js';
