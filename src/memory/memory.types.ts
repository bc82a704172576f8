export type MemoryType =
  | 'fact'
  | 'preference'
  | 'event'
  | 'relationship'
  | 'other';

export type MemoryPayload = {
  text: string;
  namespace: string; // "<userId>:<profileId>"
  source: string;
  addedAt: string; // ISO 8601, when stored
  type: MemoryType;
  importance: number; // 0.0–1.0
  tags: string[];
  entities?: string[];
  eventDate?: string; // ISO 8601, event date from TemporalService
};

export interface MemoryMetadata {
  source?: string;
  type?: MemoryType;
  importance?: number;
  tags?: string[];
  entities?: string[];
}

export interface MemoryRecord {
  id: string;
  text: string;
  score?: number;
  metadata: Record<string, unknown>;
}

/**
 * Per-namespace long-term memory. Implementations throw `StoreError` on any
 * failure and isolate namespaces from each other.
 */
export interface MemoryStore {
  search(
    namespace: string,
    query: string,
    limit: number,
    signal?: AbortSignal,
  ): Promise<MemoryRecord[]>;

  add(
    namespace: string,
    text: string,
    metadata?: MemoryMetadata,
    signal?: AbortSignal,
  ): Promise<string>;
}

export const MEMORY_STORE = Symbol('MEMORY_STORE');

export function memoryNamespace(
  userId: string,
  profileId?: string | null,
): string {
  return `${userId}:${profileId ?? 'default'}`;
}
