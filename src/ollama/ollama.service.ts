import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { scopedSignal, type ScopedSignal } from '../common/abort';
import {
  CancelledError,
  ChatError,
  ProviderFatalError,
  ProviderTransientError,
  isTransientStatus,
} from '../common/errors';
import type {
  ChatMessage,
  Completion,
  CompletionChunk,
  CompletionOptions,
  LlmProvider,
  ModelSize,
} from '../llm/llm.types';

type OllamaEmbedResponse = {
  model: string;
  embeddings: number[][];
};

type OllamaChatResponse = {
  model: string;
  message?: { role: string; content: string };
  done: boolean;
  done_reason?: string;
  prompt_eval_count?: number;
  eval_count?: number;
  error?: string;
};

@Injectable()
export class OllamaService implements LlmProvider {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  private readonly llmModel: string;
  private readonly embedModel: string;
  private readonly smallModel: string;
  private readonly largeModel: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: ConfigService) {
    this.baseUrl =
      this.config.get<string>('OLLAMA_BASE_URL') ?? 'http://127.0.0.1:11434';
    this.llmModel =
      this.config.get<string>('OLLAMA_LLM_MODEL') ?? 'mistral:latest';
    this.embedModel =
      this.config.get<string>('OLLAMA_EMBED_MODEL') ?? 'nomic-embed-text';
    this.smallModel =
      this.config.get<string>('OLLAMA_SMALL_MODEL') ?? 'qwen3:4b';
    this.largeModel =
      this.config.get<string>('OLLAMA_LARGE_MODEL') ?? 'gpt-oss:20b';
    this.timeoutMs = Number(this.config.get('LLM_TIMEOUT_MS') ?? 60_000);
  }

  private resolveModel(model: ModelSize = 'medium'): string {
    switch (model) {
      case 'small':
        return this.smallModel;
      case 'medium':
        return this.llmModel;
      case 'large':
        return this.largeModel;
    }
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const scoped = scopedSignal(this.timeoutMs, signal);
    try {
      const res = await this.post(
        '/api/embed',
        { model: this.embedModel, input: texts, truncate: true },
        scoped.signal,
      );
      const json = (await res.json()) as OllamaEmbedResponse;
      if (!Array.isArray(json.embeddings)) {
        throw new ProviderFatalError('Ollama embed returned no embeddings');
      }
      return json.embeddings;
    } catch (error) {
      throw this.classify(error, scoped, signal);
    } finally {
      scoped.dispose();
    }
  }

  async complete(
    messages: ChatMessage[],
    options: CompletionOptions = {},
  ): Promise<Completion> {
    const scoped = scopedSignal(this.timeoutMs, options.signal);
    try {
      const res = await this.post(
        '/api/chat',
        this.chatBody(messages, options, false),
        scoped.signal,
      );
      const json = (await res.json()) as OllamaChatResponse;
      if (json.error) {
        throw new ProviderFatalError(`Ollama chat error: ${json.error}`);
      }
      if (typeof json.message?.content !== 'string') {
        throw new ProviderFatalError('Ollama chat returned no message');
      }
      return {
        text: json.message.content,
        tokensUsed: this.tokensOf(json),
        finishReason: json.done_reason ?? 'stop',
      };
    } catch (error) {
      throw this.classify(error, scoped, options.signal);
    } finally {
      scoped.dispose();
    }
  }

  async *stream(
    messages: ChatMessage[],
    options: CompletionOptions = {},
  ): AsyncGenerator<CompletionChunk> {
    const scoped = scopedSignal(this.timeoutMs, options.signal);
    try {
      const res = await this.post(
        '/api/chat',
        this.chatBody(messages, options, true),
        scoped.signal,
      );
      if (!res.body) {
        throw new ProviderFatalError('Ollama chat stream has no body');
      }

      const reader = res.body.getReader();
      const decoder = new TextDecoder();
      let buffer = '';

      while (true) {
        // Past the headers, the deadline bounds each wait for a chunk
        scoped.refresh();
        const { done, value } = await reader.read();
        if (done) break;
        buffer += decoder.decode(value, { stream: true });

        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (!line.trim()) continue;
          yield this.toChunk(JSON.parse(line) as OllamaChatResponse);
        }
      }

      if (buffer.trim()) {
        yield this.toChunk(JSON.parse(buffer) as OllamaChatResponse);
      }
    } catch (error) {
      throw this.classify(error, scoped, options.signal);
    } finally {
      scoped.dispose();
    }
  }

  private chatBody(
    messages: ChatMessage[],
    options: CompletionOptions,
    stream: boolean,
  ) {
    return {
      model: this.resolveModel(options.model),
      messages,
      stream,
      options: {
        ...(options.temperature !== undefined
          ? { temperature: options.temperature }
          : {}),
        ...(options.maxTokens !== undefined
          ? { num_predict: options.maxTokens }
          : {}),
      },
    };
  }

  private toChunk(json: OllamaChatResponse): CompletionChunk {
    if (json.error) {
      throw new ProviderTransientError(`Ollama stream error: ${json.error}`);
    }
    const textDelta = json.message?.content ?? '';
    return json.done
      ? {
          textDelta,
          finishReason: json.done_reason ?? 'stop',
          tokensUsed: this.tokensOf(json),
        }
      : { textDelta };
  }

  private tokensOf(json: OllamaChatResponse): number {
    return (json.prompt_eval_count ?? 0) + (json.eval_count ?? 0);
  }

  private async post(
    path: string,
    body: unknown,
    signal: AbortSignal,
  ): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug(`Calling Ollama ${path}: ${url}`);
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    if (!res.ok) {
      const detail = `Ollama ${path} failed: ${res.status} ${await res.text()}`;
      throw isTransientStatus(res.status)
        ? new ProviderTransientError(detail, res.status)
        : new ProviderFatalError(detail, res.status);
    }
    return res;
  }

  private classify(
    error: unknown,
    scoped: ScopedSignal,
    callerSignal?: AbortSignal,
  ): ChatError {
    if (error instanceof ChatError) return error;
    if (callerSignal?.aborted) {
      return new CancelledError('Request cancelled by caller', {
        cause: error,
      });
    }
    if (scoped.timedOut()) {
      return new ProviderTransientError(
        `Ollama request timed out after ${this.timeoutMs}ms`,
        undefined,
        { cause: error },
      );
    }
    if (error instanceof SyntaxError) {
      return new ProviderFatalError(
        `Ollama returned malformed JSON: ${error.message}`,
        undefined,
        { cause: error },
      );
    }
    this.logger.warn(
      `Ollama unreachable at ${this.baseUrl}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return new ProviderTransientError('LLM service unreachable', undefined, {
      cause: error,
    });
  }
}
