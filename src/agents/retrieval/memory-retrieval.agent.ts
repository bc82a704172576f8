import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BaseAgent } from '../base.agent';
import { type AgentInput, type AgentOutput, StageName } from '../agent.types';
import { StoreError } from '../../common/errors';
import { estimateTokens } from '../../common/text.util';
import {
  MEMORY_STORE,
  type MemoryRecord,
  type MemoryStore,
  memoryNamespace,
} from '../../memory/memory.types';

export interface RetrievedMemories {
  memories: MemoryRecord[];
  /** Numbered block ready for the system prompt; empty when nothing matched. */
  context: string;
}

/** `1. text` lines; memories about a dated event carry the day in brackets. */
export function formatMemoryContext(memories: readonly MemoryRecord[]): string {
  return memories
    .map((m, i) => {
      const eventDate = m.metadata['eventDate'];
      const day =
        typeof eventDate === 'string' ? ` (on ${eventDate.slice(0, 10)})` : '';
      return `${i + 1}. ${m.text}${day}`;
    })
    .join('\n');
}

@Injectable()
export class MemoryRetrievalAgent extends BaseAgent<RetrievedMemories> {
  readonly stage = StageName.MEMORY_RETRIEVAL;
  private readonly topK: number;

  constructor(
    @Inject(MEMORY_STORE) private readonly store: MemoryStore,
    config: ConfigService,
  ) {
    super();
    this.topK = Number(config.get('MEMORY_TOP_K') ?? 5);
  }

  protected async execute(
    input: AgentInput,
  ): Promise<AgentOutput<RetrievedMemories>> {
    const namespace = memoryNamespace(input.userId, input.profileId);

    let memories: MemoryRecord[];
    try {
      memories = await this.store.search(
        namespace,
        input.message,
        this.topK,
        input.signal,
      );
    } catch (error) {
      if (!(error instanceof StoreError)) throw error;
      this.logger.warn(`[${input.sessionId}] ${error.message}`);
      return this.ok({ memories: [], context: '' }, 0, [
        'Memory retrieval is unavailable; replying without long-term memory.',
      ]);
    }

    const context = formatMemoryContext(memories);
    this.logger.debug(
      `[${input.sessionId}] ${memories.length} memories from ${namespace}`,
    );
    return this.ok({ memories, context }, estimateTokens(context));
  }
}
