/**
 * Core conversation types shared by every convoy module.
 *
 * Messages are the unit the token estimator, the truncation policies, the
 * compactor and the session store all operate on. The model boundary is
 * described by `LLMProvider`; convoy never talks to a model directly.
 */

// =============================================================================
// CONVERSATION
// =============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * Tool call requested by the model.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * One conversation turn.
 */
export interface Message {
  role: MessageRole;
  content: string;
  toolCalls?: ToolCall[];
  /** For tool role messages, references the tool call this responds to */
  toolCallId?: string;
  /** Tool name (tool results) or participant name */
  name?: string;
  /** ISO-8601 UTC creation time */
  timestamp?: string;
  /** Protected from selective eviction and compaction */
  pinned?: boolean;
  /** Synthetic-message markers (omission markers, compaction summaries) */
  metadata?: Record<string, unknown>;
}

/**
 * Record of one executed tool call.
 */
export interface ToolInvocation {
  id: string;
  toolName: string;
  arguments: Record<string, unknown>;
  result: unknown;
  /** ISO-8601 UTC time the call finished */
  timestamp: string;
  /** Wall-clock duration in milliseconds */
  duration: number;
  success: boolean;
  error: string | null;
}

/**
 * Tool schema as sent to the model, used for budget overhead.
 */
export interface ToolSchema {
  name: string;
  description: string;
  inputSchema?: unknown;
}

// =============================================================================
// MODEL BOUNDARY
// =============================================================================

export interface ChatOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Aborted when the caller gives up on the request */
  signal?: AbortSignal;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ChatResponse {
  content: string;
  usage?: TokenUsage;
  model?: string;
}

/**
 * Opaque request/response boundary to a language model.
 * Implementations must not retry; convoy degrades to "skip" on failure.
 */
export interface LLMProvider {
  name?: string;
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
