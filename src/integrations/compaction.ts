/**
 * Context Compaction
 *
 * Replaces the oldest run of conversation with a model-written summary.
 * Recent messages, system messages and pinned messages stay verbatim, and
 * a run is never cut between a tool call and its results.
 *
 * Compaction is best-effort: any provider failure, an empty summary or a
 * timeout leaves the messages untouched and is reported as an event and a
 * warning. `compact()` never rejects.
 */

import type { LLMProvider, Message } from '../types.js';
import { CancellationError, CompactionError } from '../errors/index.js';
import { toAbortSignal, withTimeout } from './cancellation.js';
import {
  ApproximateTokenEstimator,
  CachingTokenEstimator,
  type TokenEstimator,
} from './utilities/token-estimate.js';
import { createComponentLogger, type StructuredLogger } from './utilities/logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface CompactionConfig {
  /** Skip compaction below this many messages (default: 20) */
  minMessages?: number;
  /** Number of recent messages always kept verbatim (default: 10) */
  preserveRecent?: number;
  /** Shortest run worth summarizing (default: 2) */
  minRunLength?: number;
  /** Deadline for the summary request (default: 30000) */
  timeoutMs?: number;
  /** Maximum tokens for the summary (default: 500) */
  summaryMaxTokens?: number;
  /** Model for summarization (optional, provider default) */
  summaryModel?: string;
  /** Used for before/after token counts in events */
  estimator?: TokenEstimator;
  logger?: StructuredLogger;
}

export interface CompactionResult {
  summary: string;
  compactedCount: number;
  tokensBefore: number;
  tokensAfter: number;
  compactedAt: string;
}

export type CompactionSkipReason = 'too-few-messages' | 'no-eligible-run';

export type CompactionEvent =
  | { type: 'compaction.start'; messageCount: number }
  | { type: 'compaction.complete'; result: CompactionResult }
  | { type: 'compaction.skipped'; reason: CompactionSkipReason }
  | { type: 'compaction.error'; error: string; timedOut: boolean };

export type CompactionEventListener = (event: CompactionEvent) => void;

export const SUMMARY_PREFIX = '[Previous conversation summary]';

const SUMMARY_SYSTEM_PROMPT =
  'You are a conversation summarizer. Create concise, structured summaries that preserve key context.';

const MAX_ENTRY_CHARS = 500;

// =============================================================================
// RUN SELECTION
// =============================================================================

function isCompactable(message: Message): boolean {
  return message.role !== 'system' && message.pinned !== true;
}

function callIdsOf(message: Message): Set<string> {
  return new Set((message.toolCalls ?? []).map((c) => c.id));
}

/**
 * Find the oldest contiguous run of compactable messages before `limit`,
 * shrunk so that no tool call is separated from its results.
 * Returns `[start, end)`, or null when there is none.
 */
export function selectCompactionRun(
  messages: readonly Message[],
  limit: number,
): { start: number; end: number } | null {
  let start = 0;
  while (start < limit && !isCompactable(messages[start])) start++;
  // Leading tool results answer a call that is not in the run
  while (start < limit && messages[start].role === 'tool') start++;
  if (start >= limit) return null;

  let end = start;
  while (end < limit && isCompactable(messages[end])) end++;

  for (;;) {
    let cut = end;
    const answered = new Set<string>();

    for (let i = start; i < end; i++) {
      const message = messages[i];

      if (message.role === 'tool') {
        if (!message.toolCallId || !answered.has(message.toolCallId)) {
          cut = i;
          break;
        }
        continue;
      }

      const ids = callIdsOf(message);
      if (ids.size === 0) continue;
      for (const id of ids) answered.add(id);

      const resultOutside = messages.some(
        (r, j) => j >= end && r.role === 'tool' && r.toolCallId !== undefined && ids.has(r.toolCallId),
      );
      if (resultOutside) {
        cut = i;
        break;
      }
    }

    if (cut === end) break;
    end = cut;
  }

  return end > start ? { start, end } : null;
}

/**
 * Render messages as plain text for the summary prompt.
 */
export function formatForSummary(messages: readonly Message[]): string {
  return messages
    .map((m) => {
      let content = m.content;
      if (content.length > MAX_ENTRY_CHARS) {
        content = content.slice(0, MAX_ENTRY_CHARS) + '...';
      }
      if (m.toolCalls && m.toolCalls.length > 0) {
        content += `\n[Used tools: ${m.toolCalls.map((tc) => tc.name).join(', ')}]`;
      }
      return `${m.role}: ${content}`;
    })
    .join('\n');
}

export function isCompactionSummary(message: Message): boolean {
  return message.metadata?.compaction !== undefined;
}

// =============================================================================
// COMPACTOR
// =============================================================================

export class Compactor {
  private config: Required<Omit<CompactionConfig, 'estimator' | 'logger'>>;
  private provider: LLMProvider;
  private estimator: TokenEstimator;
  private log: StructuredLogger;
  private listeners: CompactionEventListener[] = [];

  constructor(provider: LLMProvider, config: CompactionConfig = {}) {
    this.provider = provider;
    this.config = {
      minMessages: config.minMessages ?? 20,
      preserveRecent: config.preserveRecent ?? 10,
      minRunLength: config.minRunLength ?? 2,
      timeoutMs: config.timeoutMs ?? 30000,
      summaryMaxTokens: config.summaryMaxTokens ?? 500,
      summaryModel: config.summaryModel ?? '',
    };
    this.estimator = config.estimator ?? new CachingTokenEstimator(new ApproximateTokenEstimator());
    this.log = config.logger ?? createComponentLogger('Compactor');
  }

  /**
   * Compact messages. Resolves with the input array itself when nothing
   * was compacted.
   */
  async compact(messages: Message[]): Promise<Message[]> {
    if (messages.length < this.config.minMessages) {
      this.emit({ type: 'compaction.skipped', reason: 'too-few-messages' });
      return messages;
    }

    const limit = Math.max(0, messages.length - this.config.preserveRecent);
    const run = selectCompactionRun(messages, limit);
    if (!run || run.end - run.start < this.config.minRunLength) {
      this.emit({ type: 'compaction.skipped', reason: 'no-eligible-run' });
      return messages;
    }

    const toSummarize = messages.slice(run.start, run.end);
    this.emit({ type: 'compaction.start', messageCount: toSummarize.length });

    let summary: string;
    try {
      summary = await this.generateSummary(toSummarize);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      const timedOut = err instanceof CancellationError;
      this.log.warn('Compaction failed, keeping original messages', {
        error,
        timedOut,
        messageCount: toSummarize.length,
      });
      this.emit({ type: 'compaction.error', error, timedOut });
      return messages;
    }

    const compactedAt = new Date().toISOString();
    const summaryMessage: Message = {
      role: 'system',
      content: `${SUMMARY_PREFIX}\n${summary}`,
      timestamp: compactedAt,
      metadata: { compaction: { compactedCount: toSummarize.length, compactedAt } },
    };

    const result = [...messages.slice(0, run.start), summaryMessage, ...messages.slice(run.end)];

    const compactionResult: CompactionResult = {
      summary,
      compactedCount: toSummarize.length,
      tokensBefore: this.estimator.countMessages(messages),
      tokensAfter: this.estimator.countMessages(result),
      compactedAt,
    };
    this.log.info('Compacted conversation', {
      compactedCount: compactionResult.compactedCount,
      tokensBefore: compactionResult.tokensBefore,
      tokensAfter: compactionResult.tokensAfter,
    });
    this.emit({ type: 'compaction.complete', result: compactionResult });

    return result;
  }

  private async generateSummary(messages: Message[]): Promise<string> {
    const prompt = `Summarize the following conversation concisely.
Preserve key decisions, code changes, and important context.
The summary will be used to continue the conversation.

Conversation:
${formatForSummary(messages)}

Provide a brief summary (max ${this.config.summaryMaxTokens} tokens):`;

    const response = await withTimeout(this.config.timeoutMs, (token) =>
      this.provider.chat(
        [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        {
          model: this.config.summaryModel || undefined,
          maxTokens: this.config.summaryMaxTokens,
          signal: toAbortSignal(token),
        },
      ),
    );

    const summary = response.content.trim();
    if (!summary) {
      throw new CompactionError('Provider returned an empty summary');
    }
    return summary;
  }

  getConfig(): Required<Omit<CompactionConfig, 'estimator' | 'logger'>> {
    return { ...this.config };
  }

  /**
   * Subscribe to events.
   */
  on(listener: CompactionEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private emit(event: CompactionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch {
        // Ignore listener errors
      }
    }
  }
}

export function createCompactor(provider: LLMProvider, config?: CompactionConfig): Compactor {
  return new Compactor(provider, config);
}

// =============================================================================
// TOOL RESULT COMPACTION
// =============================================================================

export interface ToolResultCompactorConfig {
  /** Ceiling for one tool result (default: 1000) */
  maxResultTokens?: number;
  /** Appended notice; `{removed}` is replaced with the token count */
  truncationMessage?: string;
  estimator?: TokenEstimator;
}

/** Tokens held back for the truncation notice */
const NOTICE_RESERVE = 50;
const BREAK_SEARCH_WINDOW = 100;

/**
 * Caps oversized tool output before it enters the conversation.
 */
export class ToolResultCompactor {
  readonly maxResultTokens: number;
  readonly truncationMessage: string;
  private estimator: TokenEstimator;

  constructor(config: ToolResultCompactorConfig = {}) {
    this.maxResultTokens = config.maxResultTokens ?? 1000;
    this.truncationMessage = config.truncationMessage ?? '\n[Output truncated - {removed} tokens removed]';
    this.estimator = config.estimator ?? new CachingTokenEstimator(new ApproximateTokenEstimator());
  }

  compactResult(result: string): string {
    if (!result) return result;

    const tokens = this.estimator.count(result);
    if (tokens <= this.maxResultTokens) return result;

    const targetTokens = Math.max(0, this.maxResultTokens - NOTICE_RESERVE);
    const charsPerToken = result.length / tokens;
    const estimatedChars = Math.floor(targetTokens * charsPerToken);

    let truncated = result.slice(0, estimatedChars);
    const window = Math.min(BREAK_SEARCH_WINDOW, truncated.length);
    for (let i = 0; i < window; i++) {
      const pos = estimatedChars - i;
      if (pos > 0 && (result[pos] === '\n' || result[pos] === ' ')) {
        truncated = result.slice(0, pos);
        break;
      }
    }

    const removed = tokens - this.estimator.count(truncated);
    return truncated + this.truncationMessage.replace('{removed}', String(removed));
  }

  /**
   * Compact a tool message; other roles pass through untouched.
   */
  compactMessage(message: Message): Message {
    if (message.role !== 'tool') return message;

    const compacted = this.compactResult(message.content);
    return compacted === message.content ? message : { ...message, content: compacted };
  }
}
