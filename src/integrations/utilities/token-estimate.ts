/**
 * Token estimation.
 *
 * Two estimators share one message-costing rule so that every subsystem
 * agrees on context fullness:
 * - ApproximateTokenEstimator: word/punctuation heuristic, no dependencies
 * - TiktokenEstimator: exact BPE counts via js-tiktoken
 *
 * `CachingTokenEstimator` memoizes both text and per-message counts; the
 * truncation policies call the estimator many times per decision.
 *
 * `countMessages` is additive (the sum of `countMessage`), which lets the
 * policies cost a candidate list incrementally.
 */

import { createHash } from 'node:crypto';
import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import type { Message } from '../../types.js';
import { ValidationError } from '../../errors/index.js';
import { createComponentLogger, type StructuredLogger } from './logger.js';

// =============================================================================
// CONSTANTS
// =============================================================================

/** Fixed framing cost of one message (role, separators) */
export const MESSAGE_OVERHEAD = 4;

/** Fixed framing cost of one tool call inside an assistant message */
export const TOOL_CALL_OVERHEAD = 3;

// Keeps products like 10 * 1.3 from rounding up past the exact value
const FLOAT_EPSILON = 1e-9;

// =============================================================================
// TYPES
// =============================================================================

export interface TokenEstimator {
  readonly name: string;
  count(text: string): number;
  countMessage(message: Message): number;
  countMessages(messages: readonly Message[]): number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  hitRatePercent: number;
}

// =============================================================================
// BASE
// =============================================================================

export abstract class BaseTokenEstimator implements TokenEstimator {
  abstract readonly name: string;

  abstract count(text: string): number;

  countMessage(message: Message): number {
    let tokens = MESSAGE_OVERHEAD + this.count(message.content);

    if (message.name) {
      tokens += this.count(message.name) + 1;
    }
    if (message.toolCallId) {
      tokens += this.count(message.toolCallId);
    }
    for (const call of message.toolCalls ?? []) {
      tokens += TOOL_CALL_OVERHEAD + this.count(call.name) + this.count(JSON.stringify(call.arguments));
    }

    return tokens;
  }

  countMessages(messages: readonly Message[]): number {
    let total = 0;
    for (const message of messages) {
      total += this.countMessage(message);
    }
    return total;
  }
}

// =============================================================================
// APPROXIMATE
// =============================================================================

export interface ApproximateEstimatorConfig {
  /** Tokens per word-like run (default: 1.3) */
  tokensPerWord?: number;
  /** Tokens per punctuation/symbol character (default: 0.25) */
  tokensPerChar?: number;
}

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;
const SYMBOL_PATTERN = /[^\s\p{L}\p{N}_]/gu;

export class ApproximateTokenEstimator extends BaseTokenEstimator {
  readonly name = 'approximate';
  readonly tokensPerWord: number;
  readonly tokensPerChar: number;

  constructor(config: ApproximateEstimatorConfig = {}) {
    super();
    this.tokensPerWord = config.tokensPerWord ?? 1.3;
    this.tokensPerChar = config.tokensPerChar ?? 0.25;
  }

  count(text: string): number {
    if (!text) return 0;

    const words = text.match(WORD_PATTERN)?.length ?? 0;
    const symbols = text.match(SYMBOL_PATTERN)?.length ?? 0;
    const raw = words * this.tokensPerWord + symbols * this.tokensPerChar;

    return Math.max(0, Math.ceil(raw - FLOAT_EPSILON));
  }
}

// =============================================================================
// TIKTOKEN
// =============================================================================

// Encoders are large; build each one once, on first use
const encoders = new Map<TiktokenEncoding, Tiktoken>();

function getEncoder(encoding: TiktokenEncoding): Tiktoken {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

/**
 * Pick the BPE vocabulary for a model id.
 */
export function encodingForModelId(model: string): TiktokenEncoding {
  const id = model.toLowerCase();
  if (id.includes('gpt-4o') || /(^|\/)o[134](-|$)/.test(id) || id.includes('gpt-4.1')) {
    return 'o200k_base';
  }
  return 'cl100k_base';
}

export interface TiktokenEstimatorConfig {
  model?: string;
  encoding?: TiktokenEncoding;
}

export class TiktokenEstimator extends BaseTokenEstimator {
  readonly name = 'tiktoken';
  readonly encoding: TiktokenEncoding;
  private fallback = new ApproximateTokenEstimator();

  constructor(config: TiktokenEstimatorConfig = {}) {
    super();
    this.encoding = config.encoding ?? encodingForModelId(config.model ?? '');
  }

  count(text: string): number {
    if (!text) return 0;
    try {
      return getEncoder(this.encoding).encode(text).length;
    } catch {
      // Special-token text and similar encoder rejections
      return this.fallback.count(text);
    }
  }
}

// =============================================================================
// CACHING DECORATOR
// =============================================================================

export interface CachingEstimatorConfig {
  /** Maximum memoized entries, shared by text and message counts (default: 1000) */
  maxEntries?: number;
}

export class CachingTokenEstimator extends BaseTokenEstimator {
  readonly inner: TokenEstimator;
  private readonly maxEntries: number;
  private cache = new Map<string, number>();
  private hits = 0;
  private misses = 0;

  constructor(inner: TokenEstimator, config: CachingEstimatorConfig = {}) {
    super();
    const maxEntries = config.maxEntries ?? 1000;
    if (maxEntries <= 0) {
      throw new ValidationError(`Cache size must be positive, got ${maxEntries}`, ['maxEntries']);
    }
    this.inner = inner;
    this.maxEntries = maxEntries;
  }

  get name(): string {
    return `caching(${this.inner.name})`;
  }

  count(text: string): number {
    return this.memo(`t:${hashOf(text)}`, () => this.inner.count(text));
  }

  countMessage(message: Message): number {
    return this.memo(`m:${hashOf(JSON.stringify(message))}`, () => this.inner.countMessage(message));
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      hitRatePercent: lookups > 0 ? Math.round((this.hits / lookups) * 100) : 0,
    };
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  private memo(key: string, compute: () => number): number {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.hits++;
      // Re-insert to mark as most recently used
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    this.misses++;
    const value = compute();
    this.cache.set(key, value);
    if (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    return value;
  }
}

function hashOf(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Whether the model family has a known BPE vocabulary.
 */
export function isPreciseModel(model: string): boolean {
  const id = model.toLowerCase();
  return (
    id.includes('gpt-') ||
    id.includes('claude') ||
    id.includes('anthropic') ||
    /(^|\/)o[134](-|$)/.test(id)
  );
}

/**
 * Get a cached estimator for a model. Unknown models fall back to the
 * approximate estimator with a warning; this never throws.
 */
export function getTokenEstimator(
  model: string,
  options: CachingEstimatorConfig & { logger?: StructuredLogger } = {},
): CachingTokenEstimator {
  if (isPreciseModel(model)) {
    return new CachingTokenEstimator(new TiktokenEstimator({ model }), options);
  }

  const log = options.logger ?? createComponentLogger('TokenEstimator');
  log.warn('No tokenizer for model, using approximate estimator', { model });
  return new CachingTokenEstimator(new ApproximateTokenEstimator(), options);
}
