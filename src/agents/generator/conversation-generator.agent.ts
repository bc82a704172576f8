import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StreamingAgent } from '../base.agent';
import { type AgentInput, type AgentOutput, StageName } from '../agent.types';
import {
  ProviderTransientError,
  errorMessageOf,
} from '../../common/errors';
import { sleep, throwIfCancelled } from '../../common/abort';
import { estimateTokens } from '../../common/text.util';
import {
  type ChatMessage,
  type CompletionOptions,
  LLM_PROVIDER,
  type LlmProvider,
} from '../../llm/llm.types';
import { CONVERSATION_SYSTEM_PROMPT, MEMORY_CONTEXT_HEADING } from '../prompts';

export interface GeneratedReply {
  reply: string;
  finishReason: string;
  attempts: number;
}

export const MAX_HISTORY_TURNS = 20;

@Injectable()
export class ConversationGeneratorAgent extends StreamingAgent<GeneratedReply> {
  readonly stage = StageName.CONVERSATION_GENERATOR;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;

  constructor(
    @Inject(LLM_PROVIDER) private readonly llm: LlmProvider,
    config: ConfigService,
  ) {
    super();
    this.temperature = Number(config.get('LLM_TEMPERATURE') ?? 0.7);
    this.maxTokens = Number(config.get('LLM_MAX_TOKENS') ?? 500);
    this.maxAttempts = Math.max(1, Number(config.get('LLM_MAX_ATTEMPTS') ?? 3));
    this.baseDelayMs = Number(config.get('LLM_RETRY_BASE_DELAY_MS') ?? 1000);
  }

  buildMessages(input: AgentInput): ChatMessage[] {
    const { memoryContext, history, sanitizedMessage } = input.context;
    const system = memoryContext
      ? `${CONVERSATION_SYSTEM_PROMPT}\n\n${MEMORY_CONTEXT_HEADING}\n${memoryContext}`
      : CONVERSATION_SYSTEM_PROMPT;

    return [
      { role: 'system', content: system },
      ...history
        .slice(-MAX_HISTORY_TURNS)
        .map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: sanitizedMessage ?? input.message },
    ];
  }

  protected async execute(
    input: AgentInput,
  ): Promise<AgentOutput<GeneratedReply>> {
    const messages = this.buildMessages(input);

    for (let attempt = 0; ; attempt++) {
      throwIfCancelled(input.signal);
      try {
        const completion = await this.llm.complete(
          messages,
          this.options(input),
        );
        if (!completion.text.trim()) {
          throw new ProviderTransientError('LLM returned an empty completion');
        }
        return this.ok(
          {
            reply: completion.text,
            finishReason: completion.finishReason,
            attempts: attempt + 1,
          },
          completion.tokensUsed,
          this.warningsFor(completion.finishReason),
        );
      } catch (error) {
        await this.backoffOrThrow(error, attempt, input);
      }
    }
  }

  protected async *executeStream(
    input: AgentInput,
  ): AsyncGenerator<string, AgentOutput<GeneratedReply>, undefined> {
    const messages = this.buildMessages(input);

    for (let attempt = 0; ; attempt++) {
      throwIfCancelled(input.signal);
      let text = '';
      let emitted = false;
      let finishReason = 'stop';
      let tokensUsed: number | undefined;

      try {
        for await (const chunk of this.llm.stream(
          messages,
          this.options(input),
        )) {
          if (chunk.textDelta) {
            emitted = true;
            text += chunk.textDelta;
            yield chunk.textDelta;
          }
          if (chunk.finishReason !== undefined) {
            finishReason = chunk.finishReason;
            tokensUsed = chunk.tokensUsed;
          }
        }
        if (!text.trim()) {
          throw new ProviderTransientError('LLM returned an empty completion');
        }
        return this.ok(
          { reply: text, finishReason, attempts: attempt + 1 },
          tokensUsed ?? estimateTokens(text),
          this.warningsFor(finishReason),
        );
      } catch (error) {
        // No retry once fragments have been emitted
        if (emitted) throw error;
        await this.backoffOrThrow(error, attempt, input);
      }
    }
  }

  private options(input: AgentInput): CompletionOptions {
    return {
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      signal: input.signal,
    };
  }

  private async backoffOrThrow(
    error: unknown,
    attempt: number,
    input: AgentInput,
  ): Promise<void> {
    const retryable = error instanceof ProviderTransientError;
    if (!retryable || attempt + 1 >= this.maxAttempts) {
      throw error;
    }
    const delay = this.baseDelayMs * 2 ** attempt;
    this.logger.warn(
      `[${input.sessionId}] Attempt ${attempt + 1}/${this.maxAttempts} failed (${errorMessageOf(error)}), retrying in ${delay}ms`,
    );
    await sleep(delay, input.signal);
  }

  private warningsFor(finishReason: string): string[] {
    return finishReason === 'length'
      ? ['Reply was cut off at the maximum token length.']
      : [];
  }
}
