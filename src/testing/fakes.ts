import {
  type AgentInput,
  PrivacyMode,
  TaskType,
} from '../agents/agent.types';
import { StoreError } from '../common/errors';
import type {
  ChatMessage,
  Completion,
  CompletionChunk,
  CompletionOptions,
  LlmProvider,
} from '../llm/llm.types';
import type {
  MemoryMetadata,
  MemoryRecord,
  MemoryStore,
} from '../memory/memory.types';

type Scripted = Completion | Error;

/**
 * Scripted LLM. Conversation calls and extraction calls (model 'small')
 * have separate queues; an empty queue falls back to a fixed answer.
 */
export class FakeLlmProvider implements LlmProvider {
  readonly calls: { messages: ChatMessage[]; options: CompletionOptions }[] = [];
  readonly replies: Scripted[] = [];
  readonly extractions: Scripted[] = [];
  defaultReply: Completion = {
    text: 'Hello there!',
    tokensUsed: 120,
    finishReason: 'stop',
  };
  defaultExtraction: Completion = {
    text: '{"memories": []}',
    tokensUsed: 40,
    finishReason: 'stop',
  };
  /** Next stream call emits these fragments, then throws. */
  brokenStream?: { fragments: string[]; error: Error };
  beforeComplete?: (options: CompletionOptions) => void;

  async complete(
    messages: ChatMessage[],
    options: CompletionOptions = {},
  ): Promise<Completion> {
    this.calls.push({ messages, options });
    this.beforeComplete?.(options);
    const next =
      options.model === 'small'
        ? (this.extractions.shift() ?? this.defaultExtraction)
        : (this.replies.shift() ?? this.defaultReply);
    if (next instanceof Error) throw next;
    return next;
  }

  async *stream(
    messages: ChatMessage[],
    options: CompletionOptions = {},
  ): AsyncGenerator<CompletionChunk> {
    const broken = this.brokenStream;
    if (broken) {
      this.brokenStream = undefined;
      this.calls.push({ messages, options });
      for (const fragment of broken.fragments) yield { textDelta: fragment };
      throw broken.error;
    }

    const completion = await this.complete(messages, options);
    for (const fragment of completion.text.match(/\s*\S+/g) ?? []) {
      yield { textDelta: fragment };
    }
    yield {
      textDelta: '',
      finishReason: completion.finishReason,
      tokensUsed: completion.tokensUsed,
    };
  }

  lastUserMessage(): string | undefined {
    const last = this.calls[this.calls.length - 1];
    return last?.messages[last.messages.length - 1]?.content;
  }
}

export class InMemoryMemoryStore implements MemoryStore {
  readonly namespaces = new Map<string, MemoryRecord[]>();
  readonly searches: { namespace: string; query: string; limit: number }[] = [];
  failSearch = false;
  failAdd = false;
  private counter = 0;

  seed(namespace: string, ...texts: string[]): void {
    for (const text of texts) {
      this.insert(namespace, text, {});
    }
  }

  async search(
    namespace: string,
    query: string,
    limit: number,
  ): Promise<MemoryRecord[]> {
    this.searches.push({ namespace, query, limit });
    if (this.failSearch) throw new StoreError('Memory search failed: store offline');
    return (this.namespaces.get(namespace) ?? []).slice(0, limit);
  }

  async add(
    namespace: string,
    text: string,
    metadata: MemoryMetadata = {},
  ): Promise<string> {
    if (this.failAdd) throw new StoreError('Memory add failed: store offline');
    return this.insert(namespace, text, metadata);
  }

  texts(namespace: string): string[] {
    return (this.namespaces.get(namespace) ?? []).map((m) => m.text);
  }

  private insert(namespace: string, text: string, metadata: MemoryMetadata): string {
    const id = `mem-${++this.counter}`;
    const records = this.namespaces.get(namespace) ?? [];
    records.push({ id, text, metadata: { ...metadata } });
    this.namespaces.set(namespace, records);
    return id;
  }
}

export function agentInput(overrides: Partial<AgentInput> = {}): AgentInput {
  return {
    sessionId: 'session-1',
    userId: 'user-1',
    message: 'What should I cook tonight?',
    privacyMode: PrivacyMode.NORMAL,
    profileId: null,
    taskType: TaskType.REPLY,
    context: { history: [] },
    ...overrides,
  };
}
