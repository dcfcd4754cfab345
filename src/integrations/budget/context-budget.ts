/**
 * Context Budget Tracker
 *
 * Running token count of everything that will be sent with the next model
 * request: system prompt, tool schemas and conversation messages.
 *
 * Exhaustion is a query, not an exception: callers check `exceedsLimit()`
 * and run a truncation policy before sending.
 */

import type { Message, ToolSchema } from '../../types.js';
import {
  ApproximateTokenEstimator,
  CachingTokenEstimator,
  getTokenEstimator,
  type TokenEstimator,
} from '../utilities/token-estimate.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { ValidationError } from '../../errors/index.js';
import { DEFAULT_MODEL_LIMITS, modelRegistry, type ModelRegistry } from './model-registry.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ContextBudget {
  totalContext: number;
  reservedOutput: number;
  systemOverhead: number;
  toolOverhead: number;
  /** Tokens left for conversation messages */
  available: number;
}

export interface ContextBudgetConfig {
  model?: string;
  /** Overrides the registry's window for `model` */
  contextWindow?: number;
  reservedOutput?: number;
  estimator?: TokenEstimator;
  registry?: ModelRegistry;
  logger?: StructuredLogger;
}

/**
 * Derive the conversation budget from its parts.
 */
export function computeBudget(
  totalContext: number,
  reservedOutput: number,
  systemOverhead: number,
  toolOverhead: number,
): ContextBudget {
  return {
    totalContext,
    reservedOutput,
    systemOverhead,
    toolOverhead,
    available: Math.max(0, totalContext - reservedOutput - systemOverhead - toolOverhead),
  };
}

// =============================================================================
// TRACKER
// =============================================================================

export class ContextBudgetTracker {
  readonly model?: string;
  readonly contextWindow: number;
  readonly reservedOutput: number;
  readonly estimator: TokenEstimator;

  private systemTokens = 0;
  private toolTokens = 0;
  private messageTokens = 0;
  private messageCount = 0;

  constructor(config: ContextBudgetConfig = {}) {
    const log = config.logger ?? createComponentLogger('ContextBudget');
    const registry = config.registry ?? modelRegistry;

    this.model = config.model;
    const known = config.model ? registry.lookup(config.model) : undefined;

    if (config.contextWindow === undefined && !known) {
      log.warn('Unknown model, using conservative context window', {
        model: config.model,
        contextWindow: DEFAULT_MODEL_LIMITS.maxContextTokens,
      });
    }

    this.contextWindow =
      config.contextWindow ?? known?.maxContextTokens ?? DEFAULT_MODEL_LIMITS.maxContextTokens;
    this.reservedOutput =
      config.reservedOutput ?? known?.reservedOutputTokens ?? DEFAULT_MODEL_LIMITS.reservedOutputTokens;

    if (this.contextWindow <= 0 || this.reservedOutput < 0) {
      throw new ValidationError(
        `Invalid context window ${this.contextWindow} / reserved output ${this.reservedOutput}`,
        ['contextWindow', 'reservedOutput'],
      );
    }

    this.estimator =
      config.estimator ??
      (config.model
        ? getTokenEstimator(config.model, { logger: config.logger })
        : new CachingTokenEstimator(new ApproximateTokenEstimator()));
  }

  /** Maximum request size, excluding the reply */
  get limit(): number {
    return Math.max(0, this.contextWindow - this.reservedOutput);
  }

  setSystemPrompt(text: string): void {
    this.systemTokens = text ? this.estimator.countMessage({ role: 'system', content: text }) : 0;
  }

  setToolSchemas(tools: readonly ToolSchema[]): void {
    let tokens = 0;
    for (const tool of tools) {
      tokens += this.estimator.count(tool.name) + this.estimator.count(tool.description);
      if (tool.inputSchema !== undefined) {
        tokens += this.estimator.count(JSON.stringify(tool.inputSchema));
      }
    }
    this.toolTokens = tokens;
  }

  add(message: Message): number {
    const tokens = this.estimator.countMessage(message);
    this.messageTokens += tokens;
    this.messageCount++;
    return tokens;
  }

  addAll(messages: readonly Message[]): void {
    for (const message of messages) {
      this.add(message);
    }
  }

  /** Replace the tracked messages */
  setMessages(messages: readonly Message[]): void {
    this.reset();
    this.addAll(messages);
  }

  currentTokens(): number {
    return this.systemTokens + this.toolTokens + this.messageTokens;
  }

  get trackedMessages(): number {
    return this.messageCount;
  }

  exceedsLimit(): boolean {
    return this.currentTokens() > this.limit;
  }

  available(): number {
    return Math.max(0, this.limit - this.currentTokens());
  }

  utilizationFraction(): number {
    const limit = this.limit;
    if (limit === 0) return this.currentTokens() > 0 ? 1 : 0;
    return this.currentTokens() / limit;
  }

  getBudget(): ContextBudget {
    return computeBudget(this.contextWindow, this.reservedOutput, this.systemTokens, this.toolTokens);
  }

  /** Clear tracked messages; system prompt and tool schemas stay */
  reset(): void {
    this.messageTokens = 0;
    this.messageCount = 0;
  }
}
