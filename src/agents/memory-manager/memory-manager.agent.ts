import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BaseAgent } from '../base.agent';
import { type AgentInput, type AgentOutput, StageName } from '../agent.types';
import {
  CancelledError,
  StoreError,
  errorMessageOf,
} from '../../common/errors';
import { LLM_PROVIDER, type LlmProvider } from '../../llm/llm.types';
import {
  MEMORY_STORE,
  type MemoryStore,
  memoryNamespace,
} from '../../memory/memory.types';
import { MEMORY_EXTRACTION_PROMPT } from '../prompts';
import { formatMemoryContext } from '../retrieval/memory-retrieval.agent';
import {
  type ExtractedMemory,
  consolidateMemories,
  enrichMemory,
  extractByPattern,
  parseExtraction,
} from './memory-extraction';

export interface StoredMemories {
  /** Memories actually written; failed writes are not counted. */
  count: number;
  ids: string[];
  memories: ExtractedMemory[];
  method: 'llm' | 'pattern';
}

@Injectable()
export class MemoryManagerAgent extends BaseAgent<StoredMemories> {
  readonly stage = StageName.MEMORY_MANAGER;
  private readonly minImportance: number;

  constructor(
    @Inject(LLM_PROVIDER) private readonly llm: LlmProvider,
    @Inject(MEMORY_STORE) private readonly store: MemoryStore,
    config: ConfigService,
  ) {
    super();
    this.minImportance = Number(config.get('MEMORY_MIN_IMPORTANCE') ?? 0.3);
  }

  protected async execute(
    input: AgentInput,
  ): Promise<AgentOutput<StoredMemories>> {
    const warnings: string[] = [];
    let tokensUsed = 0;
    let method: StoredMemories['method'] = 'llm';
    let extracted: ExtractedMemory[];

    try {
      const completion = await this.llm.complete(
        [
          { role: 'system', content: MEMORY_EXTRACTION_PROMPT },
          { role: 'user', content: this.exchangeOf(input) },
        ],
        { temperature: 0.3, maxTokens: 300, model: 'small', signal: input.signal },
      );
      tokensUsed = completion.tokensUsed;
      extracted = parseExtraction(completion.text);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      this.logger.warn(
        `[${input.sessionId}] LLM extraction failed, falling back to patterns: ${errorMessageOf(error)}`,
      );
      method = 'pattern';
      extracted = extractByPattern(input.message);
      warnings.push('Memory extraction fell back to pattern matching.');
    }

    const candidates = this.select(
      consolidateMemories(extracted.map(enrichMemory)),
      input,
    );
    const namespace = memoryNamespace(input.userId, input.profileId);
    const ids: string[] = [];
    const stored: ExtractedMemory[] = [];

    for (const memory of candidates) {
      if (input.signal?.aborted) {
        warnings.push(
          `Cancelled after saving ${ids.length} of ${candidates.length} memories.`,
        );
        break;
      }
      try {
        ids.push(
          await this.store.add(
            namespace,
            memory.content,
            {
              source: 'conversation',
              type: memory.type,
              importance: memory.importance,
              tags: memory.tags,
              ...(memory.entities ? { entities: memory.entities } : {}),
            },
            input.signal,
          ),
        );
        stored.push(memory);
      } catch (error) {
        if (!(error instanceof StoreError)) throw error;
        this.logger.warn(`[${input.sessionId}] ${error.message}`);
      }
    }

    const failed = candidates.length - stored.length;
    if (failed > 0 && !input.signal?.aborted) {
      warnings.push(`${failed} of ${candidates.length} memories could not be saved.`);
    }

    this.logger.log(
      `[${input.sessionId}] ${stored.length} memories saved to ${namespace} (${method})`,
    );
    return this.ok({ count: stored.length, ids, memories: stored, method }, tokensUsed, warnings);
  }

  private exchangeOf(input: AgentInput): string {
    const known = formatMemoryContext(input.context.memories ?? []);
    return [
      `Known memories:\n${known || 'none'}`,
      `User: ${input.message}`,
      `Assistant: ${input.context.reply ?? ''}`,
    ].join('\n\n');
  }

  /** Drops low-importance candidates and anything already known. */
  private select(
    extracted: ExtractedMemory[],
    input: AgentInput,
  ): ExtractedMemory[] {
    const seen = new Set(
      (input.context.memories ?? []).map((m) => m.text.trim().toLowerCase()),
    );
    return extracted.filter((memory) => {
      const key = memory.content.toLowerCase();
      if (memory.importance < this.minImportance || seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }
}
