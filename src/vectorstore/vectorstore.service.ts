import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import type { MemoryPayload } from '../memory/memory.types';

export type MemoryHit = {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
};

@Injectable()
export class VectorstoreService {
  private readonly logger = new Logger(VectorstoreService.name);
  private readonly client: QdrantClient;
  private readonly memoryCollection: string;
  private ready?: Promise<void>;

  constructor(private readonly config: ConfigService) {
    const url = this.config.get<string>('QDRANT_URL') ?? 'http://localhost:6333';
    this.memoryCollection =
      this.config.get<string>('QDRANT_MEMORY_COLLECTION') ?? 'chat_memories';
    const timeout = Number(this.config.get('MEMORY_TIMEOUT_MS') ?? 10_000);
    this.client = new QdrantClient({ url, timeout });
  }

  /** Creates the collection and its payload indexes once per process. */
  ensureMemoryCollection(vectorSize: number): Promise<void> {
    this.ready ??= this.createMemoryCollection(vectorSize).catch(
      (error: unknown) => {
        this.ready = undefined;
        throw error;
      },
    );
    return this.ready;
  }

  private async createMemoryCollection(vectorSize: number): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some(
      (c) => c.name === this.memoryCollection,
    );

    if (exists) {
      const info = await this.client.getCollection(this.memoryCollection);
      const vectors = info.config.params.vectors;
      const existingDim =
        vectors !== undefined && 'size' in vectors &&
        typeof vectors.size === 'number'
          ? vectors.size
          : undefined;

      if (existingDim !== undefined && existingDim !== vectorSize) {
        throw new ConflictException(
          `Dimension mismatch on collection "${this.memoryCollection}": ` +
            `existing dim=${existingDim}, current model=${vectorSize}. ` +
            `Drop the collection to recreate it.`,
        );
      }
    } else {
      await this.client.createCollection(this.memoryCollection, {
        vectors: { size: vectorSize, distance: 'Cosine' },
      });
      this.logger.log(
        `Memory collection "${this.memoryCollection}" created (dim=${vectorSize})`,
      );
    }

    // Idempotent: Qdrant ignores an index that already exists
    await this.client.createPayloadIndex(this.memoryCollection, {
      field_name: 'namespace',
      field_schema: 'keyword',
    });
  }

  async upsertMemory(
    points: { id: string; vector: number[]; payload: MemoryPayload }[],
  ): Promise<void> {
    await this.client.upsert(this.memoryCollection, {
      wait: true,
      points: points.map((p) => ({
        id: p.id,
        vector: p.vector,
        payload: p.payload,
      })),
    });
  }

  async searchMemory(
    queryVector: number[],
    namespace: string,
    limit: number,
  ): Promise<MemoryHit[]> {
    return this.client.search(this.memoryCollection, {
      vector: queryVector,
      limit,
      with_payload: true,
      with_vector: false,
      filter: {
        must: [{ key: 'namespace', match: { value: namespace } }],
      },
    });
  }
}
