import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { OllamaService } from '../ollama/ollama.service';
import { VectorstoreService } from '../vectorstore/vectorstore.service';
import { TemporalService } from '../temporal/temporal.service';
import { StoreError, errorMessageOf } from '../common/errors';
import { preview } from '../common/text.util';
import type {
  MemoryMetadata,
  MemoryPayload,
  MemoryRecord,
  MemoryStore,
} from './memory.types';
import {
  CHAT_EVENTS,
  type MemoryAddedEvent,
  type MemorySearchedEvent,
} from '../events/chat.events';

/** Qdrant-backed memory store; vectors come from the Ollama embedding model. */
@Injectable()
export class MemoryService implements MemoryStore {
  private readonly logger = new Logger(MemoryService.name);
  readonly defaultTopK: number;

  constructor(
    private readonly config: ConfigService,
    private readonly ollama: OllamaService,
    private readonly vs: VectorstoreService,
    private readonly temporal: TemporalService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.defaultTopK = Number(this.config.get('MEMORY_TOP_K') ?? 5);
  }

  async add(
    namespace: string,
    text: string,
    metadata: MemoryMetadata = {},
    signal?: AbortSignal,
  ): Promise<string> {
    const source = metadata.source ?? 'manual-input';
    try {
      const eventDate = this.temporal.parse(text)?.resolvedDate;

      const [vector] = await this.ollama.embed([text], signal);
      await this.vs.ensureMemoryCollection(vector.length);

      const memoryId = uuidv4();
      await this.vs.upsertMemory([
        {
          id: memoryId,
          vector,
          payload: {
            text,
            namespace,
            source,
            addedAt: new Date().toISOString(),
            type: metadata.type ?? 'other',
            importance: metadata.importance ?? 0.5,
            tags: metadata.tags ?? [],
            ...(metadata.entities ? { entities: metadata.entities } : {}),
            ...(eventDate !== undefined ? { eventDate } : {}),
          } satisfies MemoryPayload,
        },
      ]);

      this.eventEmitter.emit(CHAT_EVENTS.MEMORY_ADDED, {
        memoryId,
        namespace,
        text,
        source,
        ...(eventDate !== undefined ? { eventDate } : {}),
      } satisfies MemoryAddedEvent);

      return memoryId;
    } catch (error) {
      this.logger.error(`Memory add failed for namespace "${namespace}"`, error);
      throw new StoreError(`Memory add failed: ${errorMessageOf(error)}`, {
        cause: error,
      });
    }
  }

  async search(
    namespace: string,
    query: string,
    limit: number = this.defaultTopK,
    signal?: AbortSignal,
  ): Promise<MemoryRecord[]> {
    try {
      const [queryVector] = await this.ollama.embed([query], signal);
      await this.vs.ensureMemoryCollection(queryVector.length);
      const hits = await this.vs.searchMemory(queryVector, namespace, limit);

      const results: MemoryRecord[] = hits.map((h) => {
        const payload: Record<string, unknown> = h.payload ?? {};
        const { text, ...metadata } = payload;
        return {
          id: String(h.id),
          text: typeof text === 'string' ? text : '',
          score: h.score,
          metadata,
        };
      });

      this.eventEmitter.emit(CHAT_EVENTS.MEMORY_SEARCHED, {
        namespace,
        query: preview(query),
        resultCount: results.length,
        topK: limit,
      } satisfies MemorySearchedEvent);

      return results;
    } catch (error) {
      this.logger.error(`Memory search failed for namespace "${namespace}"`, error);
      throw new StoreError(`Memory search failed: ${errorMessageOf(error)}`, {
        cause: error,
      });
    }
  }
}
