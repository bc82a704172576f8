export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type ModelSize = 'small' | 'medium' | 'large';

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Defaults to 'medium', the main conversation model. */
  model?: ModelSize;
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  tokensUsed: number;
  finishReason: string;
}

export interface CompletionChunk {
  textDelta: string;
  /** Present on the final chunk only. */
  finishReason?: string;
  tokensUsed?: number;
}

/**
 * Chat-completion provider. Implementations throw `ProviderTransientError`
 * for retryable failures and `ProviderFatalError` for everything else the
 * provider rejects.
 */
export interface LlmProvider {
  complete(
    messages: ChatMessage[],
    options?: CompletionOptions,
  ): Promise<Completion>;

  stream(
    messages: ChatMessage[],
    options?: CompletionOptions,
  ): AsyncIterable<CompletionChunk>;
}

export const LLM_PROVIDER = Symbol('LLM_PROVIDER');
