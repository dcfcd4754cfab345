/**
 * Shared test fixtures: silent loggers, temp directories and a scripted
 * in-process model provider.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ChatOptions, ChatResponse, LLMProvider, Message } from '../../src/types.js';
import { MemorySink, StructuredLogger } from '../../src/integrations/utilities/logger.js';

export function memoryLogger(level: 'debug' | 'warn' = 'debug'): { logger: StructuredLogger; sink: MemorySink } {
  const sink = new MemorySink();
  return { logger: new StructuredLogger({ level, sinks: [sink] }), sink };
}

export function messagesOf(sink: MemorySink, level: 'warn' | 'error' | 'info' = 'warn'): string[] {
  return sink.getEntries({ level }).map((e) => e.message);
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `convoy-${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

type Reply = string | Error | 'hang';

/**
 * Provider that answers from a script. `'hang'` never resolves unless the
 * request is aborted, in which case it rejects.
 */
export class FakeProvider implements LLMProvider {
  readonly name = 'fake';
  readonly calls: Array<{ messages: Message[]; options?: ChatOptions }> = [];
  private replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages, options });
    const reply = this.replies.shift() ?? '';

    if (reply instanceof Error) throw reply;
    if (reply === 'hang') {
      return new Promise<ChatResponse>((_resolve, reject) => {
        options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    return { content: reply };
  }
}

export function user(content: string, extra: Partial<Message> = {}): Message {
  return { role: 'user', content, ...extra };
}

export function assistant(content: string, extra: Partial<Message> = {}): Message {
  return { role: 'assistant', content, ...extra };
}

export function system(content: string, extra: Partial<Message> = {}): Message {
  return { role: 'system', content, ...extra };
}

export function toolResult(toolCallId: string, content: string): Message {
  return { role: 'tool', content, toolCallId };
}
