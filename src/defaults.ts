/**
 * Default Configurations
 *
 * Defaults for every configuration section, and the resolution step that
 * lays a loaded (possibly partial) config over them.
 */

import type { ValidatedUserConfig } from './config/schema.js';
import type { ContextMode } from './integrations/context/context-manager.js';
import { FileSink, configureLogger, logger, type LogLevel } from './integrations/utilities/logger.js';
import { getSessionsDir } from './paths.js';

// =============================================================================
// SECTION TYPES
// =============================================================================

export interface SessionsConfig {
  dir: string;
  autoCheckpoint: boolean;
  checkpointIntervalMs: number;
  backup: boolean;
  /** Sessions untouched for longer are removed by cleanup */
  retentionDays: number;
  keepMinimum: number;
}

export interface ContextConfig {
  mode: ContextMode;
  /** Overrides the model's reserved output when set */
  reservedOutputTokens: number | null;
  windowSize: number;
  preserveFirst: number;
  preserveLast: number;
  toolResultMaxTokens: number;
}

export interface CompactionSettings {
  enabled: boolean;
  minMessages: number;
  preserveRecent: number;
  timeoutMs: number;
  summaryMaxTokens: number;
}

export interface LoggingConfig {
  level: LogLevel;
  file: string | null;
}

export interface ResolvedConfig {
  model: string;
  sessions: SessionsConfig;
  context: ContextConfig;
  compaction: CompactionSettings;
  logging: LoggingConfig;
}

// =============================================================================
// FEATURE DEFAULTS
// =============================================================================

export const DEFAULT_MODEL = 'claude-sonnet-4';

/**
 * Default sessions configuration. `dir` is resolved against XDG paths at
 * call time, so it is not part of the constant.
 */
export const DEFAULT_SESSIONS_CONFIG: Omit<SessionsConfig, 'dir'> = {
  autoCheckpoint: true,
  checkpointIntervalMs: 30000,
  backup: true,
  retentionDays: 30,
  keepMinimum: 10,
};

export const DEFAULT_CONTEXT_CONFIG: ContextConfig = {
  mode: 'smart',
  reservedOutputTokens: null,
  windowSize: 20,
  preserveFirst: 2,
  preserveLast: 10,
  toolResultMaxTokens: 1000,
};

/**
 * Compaction is on by default but only runs in `summarize` context mode
 * and when a provider is supplied.
 */
export const DEFAULT_COMPACTION_CONFIG: CompactionSettings = {
  enabled: true,
  minMessages: 20,
  preserveRecent: 10,
  timeoutMs: 30000,
  summaryMaxTokens: 500,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'warn',
  file: null,
};

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Merge a loaded config over the defaults. `compaction: false` disables
 * compaction while keeping the default tuning values.
 */
export function resolveConfig(loaded: ValidatedUserConfig = {}): ResolvedConfig {
  const compaction =
    loaded.compaction === false
      ? { ...DEFAULT_COMPACTION_CONFIG, enabled: false }
      : { ...DEFAULT_COMPACTION_CONFIG, ...loaded.compaction };

  return {
    model: loaded.model ?? DEFAULT_MODEL,
    sessions: { dir: getSessionsDir(), ...DEFAULT_SESSIONS_CONFIG, ...loaded.sessions },
    context: { ...DEFAULT_CONTEXT_CONFIG, ...loaded.context },
    compaction,
    logging: { ...DEFAULT_LOGGING_CONFIG, ...loaded.logging },
  };
}

/**
 * Apply the logging section to the global logger. Call before creating
 * components: component loggers bind the global logger's sinks when made.
 */
export function configureLoggingFromConfig(config: LoggingConfig): void {
  configureLogger({ level: config.level });
  if (config.file) {
    logger.addSink(new FileSink(config.file));
  }
}
