/**
 * Truncation Policies
 *
 * Deterministic rules that shrink a message list to fit a token budget.
 * Every policy keeps the relative order of surviving messages; the only
 * content a policy ever fabricates is an omission marker.
 *
 * Budget-driven policies (token budget, selective) treat an assistant
 * message with tool calls and the tool results answering it as one unit,
 * so they never leave a tool result without its call.
 */

import type { Message } from '../../types.js';
import type { TokenEstimator } from '../utilities/token-estimate.js';
import { ValidationError } from '../../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface TruncationPolicy {
  readonly name: string;
  truncate(messages: readonly Message[], budget: number, estimator: TokenEstimator): Message[];
}

export type TruncationMode = 'sliding_window' | 'token_budget' | 'smart' | 'selective';

export interface TruncationOptions {
  windowSize?: number;
  preserveFirst?: number;
  preserveLast?: number;
  preserveSystem?: boolean;
  preserveRoles?: Message['role'][];
  preservePinned?: boolean;
}

// =============================================================================
// OMISSION MARKERS
// =============================================================================

export function createOmissionMarker(omitted: number): Message {
  return {
    role: 'system',
    content: `[${omitted} messages omitted]`,
    metadata: { omissionMarker: omitted },
  };
}

export function isOmissionMarker(message: Message): boolean {
  return typeof message.metadata?.omissionMarker === 'number';
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Group indices into eviction units: an assistant message with tool calls
 * plus every later tool result answering one of its calls. Everything else
 * is a unit of one. Units are ordered by their first index.
 */
export function buildEvictionUnits(messages: readonly Message[]): number[][] {
  const units: number[][] = [];
  const assigned = new Set<number>();

  for (let i = 0; i < messages.length; i++) {
    if (assigned.has(i)) continue;
    const message = messages[i];
    const unit = [i];

    if (message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0) {
      const callIds = new Set(message.toolCalls.map((c) => c.id));
      for (let j = i + 1; j < messages.length; j++) {
        const candidate = messages[j];
        if (
          !assigned.has(j) &&
          candidate.role === 'tool' &&
          candidate.toolCallId !== undefined &&
          callIds.has(candidate.toolCallId)
        ) {
          unit.push(j);
          assigned.add(j);
        }
      }
    }

    units.push(unit);
  }

  return units;
}

/**
 * Evict the oldest unprotected units until the list fits `budget`.
 * A unit with any protected member is kept whole.
 */
function evictOldest(
  messages: readonly Message[],
  budget: number,
  estimator: TokenEstimator,
  isProtected: (message: Message) => boolean,
): Message[] {
  const costs = messages.map((m) => estimator.countMessage(m));
  let total = costs.reduce((sum, c) => sum + c, 0);
  if (total <= budget) return [...messages];

  const removed = new Set<number>();
  for (const unit of buildEvictionUnits(messages)) {
    if (total <= budget) break;
    if (unit.some((i) => isProtected(messages[i]))) continue;
    for (const i of unit) {
      removed.add(i);
      total -= costs[i];
    }
  }

  return messages.filter((_, i) => !removed.has(i));
}

function requireNonNegative(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer, got ${value}`, [field]);
  }
  return value;
}

// =============================================================================
// POLICIES
// =============================================================================

/**
 * Keep the last N messages, ignoring the budget. System messages are kept
 * on top of the window when `preserveSystem` is set.
 */
export class SlidingWindowPolicy implements TruncationPolicy {
  readonly name = 'sliding_window';
  readonly windowSize: number;
  readonly preserveSystem: boolean;

  constructor(options: { windowSize?: number; preserveSystem?: boolean } = {}) {
    this.windowSize = requireNonNegative(options.windowSize ?? 20, 'windowSize');
    this.preserveSystem = options.preserveSystem ?? true;
  }

  truncate(messages: readonly Message[]): Message[] {
    if (!this.preserveSystem) {
      return this.windowSize === 0 ? [] : messages.slice(-this.windowSize);
    }

    const nonSystem: number[] = [];
    messages.forEach((m, i) => {
      if (m.role !== 'system') nonSystem.push(i);
    });
    const keep = new Set(nonSystem.slice(Math.max(0, nonSystem.length - this.windowSize)));

    return messages.filter((m, i) => m.role === 'system' || keep.has(i));
  }
}

/**
 * Drop the oldest non-system messages until the list fits.
 */
export class TokenBudgetPolicy implements TruncationPolicy {
  readonly name = 'token_budget';

  truncate(messages: readonly Message[], budget: number, estimator: TokenEstimator): Message[] {
    return evictOldest(messages, budget, estimator, (m) => m.role === 'system');
  }
}

/**
 * Keep the opening and the most recent turns, replacing the middle with a
 * single omission marker.
 */
export class SmartTruncationPolicy implements TruncationPolicy {
  readonly name = 'smart';
  readonly preserveFirst: number;
  readonly preserveLast: number;
  readonly preserveSystem: boolean;

  constructor(options: { preserveFirst?: number; preserveLast?: number; preserveSystem?: boolean } = {}) {
    this.preserveFirst = requireNonNegative(options.preserveFirst ?? 2, 'preserveFirst');
    this.preserveLast = requireNonNegative(options.preserveLast ?? 10, 'preserveLast');
    this.preserveSystem = options.preserveSystem ?? true;
  }

  truncate(messages: readonly Message[], budget: number, estimator: TokenEstimator): Message[] {
    // Markers from an earlier pass are never candidates, so a second pass is a no-op
    const candidates: number[] = [];
    messages.forEach((m, i) => {
      if (isOmissionMarker(m)) return;
      if (this.preserveSystem && m.role === 'system') return;
      candidates.push(i);
    });

    if (candidates.length <= this.preserveFirst + this.preserveLast) {
      return [...messages];
    }

    let tail = this.preserveLast;
    for (;;) {
      const result = this.assemble(messages, candidates, tail);
      if (tail <= 1 || estimator.countMessages(result) <= budget) {
        return result;
      }
      tail--;
    }
  }

  private assemble(messages: readonly Message[], candidates: number[], tail: number): Message[] {
    const dropped = candidates.slice(this.preserveFirst, candidates.length - tail);
    const droppedSet = new Set(dropped);
    const result: Message[] = [];

    messages.forEach((m, i) => {
      if (!droppedSet.has(i)) {
        result.push(m);
      } else if (i === dropped[0]) {
        result.push(createOmissionMarker(dropped.length));
      }
    });

    return result;
  }
}

/**
 * Protect messages by role or pin; evict the rest oldest first.
 */
export class SelectivePolicy implements TruncationPolicy {
  readonly name = 'selective';
  readonly preserveRoles: ReadonlySet<Message['role']>;
  readonly preservePinned: boolean;

  constructor(options: { preserveRoles?: Message['role'][]; preservePinned?: boolean } = {}) {
    this.preserveRoles = new Set(options.preserveRoles ?? ['system']);
    this.preservePinned = options.preservePinned ?? true;
  }

  truncate(messages: readonly Message[], budget: number, estimator: TokenEstimator): Message[] {
    return evictOldest(
      messages,
      budget,
      estimator,
      (m) => this.preserveRoles.has(m.role) || (this.preservePinned && m.pinned === true),
    );
  }
}

/**
 * Chain policies. The first stage always runs; later stages run only while
 * the result is still over budget.
 */
export class CompositePolicy implements TruncationPolicy {
  readonly policies: readonly TruncationPolicy[];

  constructor(policies: readonly TruncationPolicy[]) {
    this.policies = policies;
  }

  get name(): string {
    return this.policies.map((p) => p.name).join('+') || 'composite';
  }

  truncate(messages: readonly Message[], budget: number, estimator: TokenEstimator): Message[] {
    const [first, ...rest] = this.policies;
    if (!first) return [...messages];

    let result = first.truncate(messages, budget, estimator);
    for (const policy of rest) {
      if (estimator.countMessages(result) <= budget) break;
      result = policy.truncate(result, budget, estimator);
    }
    return result;
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createTruncationPolicy(
  mode: TruncationMode,
  options: TruncationOptions = {},
): TruncationPolicy {
  switch (mode) {
    case 'sliding_window':
      return new SlidingWindowPolicy(options);
    case 'token_budget':
      return new TokenBudgetPolicy();
    case 'smart':
      return new SmartTruncationPolicy(options);
    case 'selective':
      return new SelectivePolicy(options);
  }
}
