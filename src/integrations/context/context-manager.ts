/**
 * Context Manager
 *
 * Assembles the message list for the next model request: tracks the
 * budget, runs the configured truncation mode when the conversation no
 * longer fits, and in `summarize` mode compacts old history once the
 * window fills past a threshold.
 */

import type { LLMProvider, Message, ToolSchema } from '../../types.js';
import type { ResolvedConfig } from '../../defaults.js';
import { ContextBudgetTracker, type ContextBudget } from '../budget/context-budget.js';
import type { ModelRegistry } from '../budget/model-registry.js';
import {
  CompositePolicy,
  TokenBudgetPolicy,
  createTruncationPolicy,
  type TruncationMode,
  type TruncationOptions,
  type TruncationPolicy,
} from './truncation.js';
import { Compactor } from '../compaction.js';
import { getTokenEstimator, type TokenEstimator } from '../utilities/token-estimate.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { ValidationError } from '../../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export type ContextMode = TruncationMode | 'summarize';

export const CONTEXT_MODES: readonly ContextMode[] = [
  'sliding_window',
  'token_budget',
  'smart',
  'selective',
  'summarize',
];

export interface ContextManagerConfig {
  model: string;
  mode?: ContextMode;
  contextWindow?: number;
  reservedOutput?: number;
  estimator?: TokenEstimator;
  registry?: ModelRegistry;
  policyOptions?: TruncationOptions;
  compactor?: Compactor;
  logger?: StructuredLogger;
}

export interface PreparedContext {
  messages: Message[];
  tokens: number;
  budget: ContextBudget;
  truncated: boolean;
  /** False when even the protected messages exceed the budget; do not send */
  withinBudget: boolean;
}

export interface ContextStats {
  model: string;
  mode: ContextMode;
  contextWindow: number;
  reservedOutput: number;
  systemTokens: number;
  toolTokens: number;
  messageTokens: number;
  messageCount: number;
  currentTokens: number;
  available: number;
  utilizationPercent: number;
  prepareCount: number;
  truncationCount: number;
  compactionCount: number;
}

export function isContextMode(value: string): value is ContextMode {
  return CONTEXT_MODES.some((m) => m === value);
}

// =============================================================================
// CONTEXT MANAGER
// =============================================================================

export class ContextManager {
  readonly model: string;
  private tracker: ContextBudgetTracker;
  private policyOptions: TruncationOptions;
  private compactor?: Compactor;
  private log: StructuredLogger;
  private currentMode: ContextMode;
  private policy: TruncationPolicy;

  private prepareCount = 0;
  private truncationCount = 0;
  private compactionCount = 0;

  constructor(config: ContextManagerConfig) {
    this.model = config.model;
    this.log = config.logger ?? createComponentLogger('ContextManager');
    this.tracker = new ContextBudgetTracker({
      model: config.model,
      contextWindow: config.contextWindow,
      reservedOutput: config.reservedOutput,
      estimator: config.estimator,
      registry: config.registry,
      logger: this.log,
    });
    this.policyOptions = config.policyOptions ?? {};
    this.compactor = config.compactor;
    this.currentMode = config.mode ?? 'smart';
    this.policy = this.buildPolicy(this.currentMode);
  }

  get mode(): ContextMode {
    return this.currentMode;
  }

  get estimator(): TokenEstimator {
    return this.tracker.estimator;
  }

  setMode(mode: ContextMode): void {
    if (!isContextMode(mode)) {
      throw new ValidationError(`Unknown context mode: ${String(mode)}`, ['mode']);
    }
    this.currentMode = mode;
    this.policy = this.buildPolicy(mode);
    this.log.debug('Context mode changed', { mode });
  }

  setSystemPrompt(text: string): void {
    this.tracker.setSystemPrompt(text);
  }

  setToolSchemas(tools: readonly ToolSchema[]): void {
    this.tracker.setToolSchemas(tools);
  }

  /**
   * Fit messages into the conversation budget. Input within budget is
   * returned as a copy, untouched.
   */
  prepare(messages: readonly Message[]): PreparedContext {
    this.prepareCount++;
    const budget = this.tracker.getBudget();
    const tokens = this.estimator.countMessages(messages);

    if (tokens <= budget.available) {
      this.tracker.setMessages(messages);
      return { messages: [...messages], tokens, budget, truncated: false, withinBudget: true };
    }

    const result = this.policy.truncate(messages, budget.available, this.estimator);
    const resultTokens = this.estimator.countMessages(result);
    const withinBudget = resultTokens <= budget.available;
    this.truncationCount++;
    this.tracker.setMessages(result);

    if (withinBudget) {
      this.log.debug('Truncated context', {
        mode: this.currentMode,
        before: messages.length,
        after: result.length,
        tokens: resultTokens,
        budget: budget.available,
      });
    } else {
      this.log.warn('Protected messages exceed the context budget', {
        tokens: resultTokens,
        budget: budget.available,
      });
    }

    return { messages: result, tokens: resultTokens, budget, truncated: true, withinBudget };
  }

  /**
   * In `summarize` mode, compact when utilization reaches `threshold`.
   * Resolves with the input array when nothing was done.
   */
  async compactIfNeeded(messages: Message[], threshold = 0.8): Promise<Message[]> {
    if (this.currentMode !== 'summarize' || !this.compactor) {
      return messages;
    }

    const limit = this.tracker.limit;
    const budget = this.tracker.getBudget();
    const used = budget.systemOverhead + budget.toolOverhead + this.estimator.countMessages(messages);
    const utilization = limit > 0 ? used / limit : 1;
    if (utilization < threshold) {
      return messages;
    }

    this.log.debug('Context utilization over threshold, compacting', { utilization, threshold });
    const result = await this.compactor.compact(messages);
    if (result !== messages) {
      this.compactionCount++;
    }
    return result;
  }

  getStats(): ContextStats {
    const budget = this.tracker.getBudget();
    const currentTokens = this.tracker.currentTokens();
    return {
      model: this.model,
      mode: this.currentMode,
      contextWindow: budget.totalContext,
      reservedOutput: budget.reservedOutput,
      systemTokens: budget.systemOverhead,
      toolTokens: budget.toolOverhead,
      messageTokens: currentTokens - budget.systemOverhead - budget.toolOverhead,
      messageCount: this.tracker.trackedMessages,
      currentTokens,
      available: this.tracker.available(),
      utilizationPercent: Math.round(this.tracker.utilizationFraction() * 100),
      prepareCount: this.prepareCount,
      truncationCount: this.truncationCount,
      compactionCount: this.compactionCount,
    };
  }

  /** Forget tracked messages and counters; prompt and tools stay */
  reset(): void {
    this.tracker.reset();
    this.prepareCount = 0;
    this.truncationCount = 0;
    this.compactionCount = 0;
  }

  private buildPolicy(mode: ContextMode): TruncationPolicy {
    const base = createTruncationPolicy(mode === 'summarize' ? 'smart' : mode, this.policyOptions);
    return new CompositePolicy([base, new TokenBudgetPolicy()]);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export interface CreateContextManagerOptions {
  config: ResolvedConfig;
  /** Overrides `config.model` */
  model?: string;
  /** Summarizes history in `summarize` mode; without one nothing is compacted */
  provider?: LLMProvider;
  estimator?: TokenEstimator;
  logger?: StructuredLogger;
}

/**
 * Build a context manager from the `context` and `compaction` sections.
 */
export function createContextManager(options: CreateContextManagerOptions): ContextManager {
  const { config, provider, logger } = options;
  const model = options.model ?? config.model;
  const estimator = options.estimator ?? getTokenEstimator(model, { logger });

  const compactor =
    provider && config.compaction.enabled
      ? new Compactor(provider, {
          minMessages: config.compaction.minMessages,
          preserveRecent: config.compaction.preserveRecent,
          timeoutMs: config.compaction.timeoutMs,
          summaryMaxTokens: config.compaction.summaryMaxTokens,
          estimator,
          logger,
        })
      : undefined;

  return new ContextManager({
    model,
    mode: config.context.mode,
    reservedOutput: config.context.reservedOutputTokens ?? undefined,
    estimator,
    policyOptions: {
      windowSize: config.context.windowSize,
      preserveFirst: config.context.preserveFirst,
      preserveLast: config.context.preserveLast,
    },
    compactor,
    logger,
  });
}

// =============================================================================
// UTILITIES
// =============================================================================

export function formatContextStats(stats: ContextStats): string {
  return `Context (${stats.model}, ${stats.mode}):
  Window: ${stats.contextWindow.toLocaleString('en-US')} tokens (${stats.reservedOutput.toLocaleString('en-US')} reserved for output)
  System: ${stats.systemTokens.toLocaleString('en-US')}
  Tools: ${stats.toolTokens.toLocaleString('en-US')}
  Messages: ${stats.messageTokens.toLocaleString('en-US')} (${stats.messageCount} messages)
  Used: ${stats.currentTokens.toLocaleString('en-US')} (${stats.utilizationPercent}%)
  Available: ${stats.available.toLocaleString('en-US')}
  Truncations: ${stats.truncationCount}, compactions: ${stats.compactionCount}`;
}
