import type { ErrorKind } from '../common/errors';
import type { MemoryRecord } from '../memory/memory.types';

export enum PrivacyMode {
  NORMAL = 'normal',
  INCOGNITO = 'incognito',
  PAUSE_MEMORIES = 'pause_memories',
}

export enum TaskType {
  REPLY = 'reply',
  REPLY_WITH_ANALYSIS = 'reply_with_analysis',
}

export enum StageName {
  PRIVACY_GUARDIAN = 'PrivacyGuardian',
  MEMORY_RETRIEVAL = 'MemoryRetrieval',
  CONVERSATION_GENERATOR = 'ConversationGenerator',
  MEMORY_MANAGER = 'MemoryManager',
  CONVERSATION_ANALYST = 'ConversationAnalyst',
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

/** Read-only context handed from stage to stage; the coordinator extends it. */
export interface StageContext {
  readonly history: readonly ConversationTurn[];
  /** Profile the session is bound to, if any. */
  readonly sessionProfileId?: string | null;
  readonly sanitizedMessage?: string;
  readonly memoryContext?: string;
  readonly memories?: readonly MemoryRecord[];
  readonly reply?: string;
}

export interface AgentInput {
  readonly sessionId: string;
  readonly userId: string;
  readonly message: string;
  readonly privacyMode: PrivacyMode;
  readonly profileId: string | null;
  readonly taskType: TaskType;
  readonly context: StageContext;
  readonly signal?: AbortSignal;
}

interface AgentOutputBase {
  tokensUsed: number;
  executionTimeMs: number;
  warnings?: string[];
}

export interface AgentSuccess<T> extends AgentOutputBase {
  success: true;
  data: T;
  error?: undefined;
}

export interface AgentFailure extends AgentOutputBase {
  success: false;
  data?: undefined;
  error: { message: string; kind: ErrorKind };
}

export type AgentOutput<T> = AgentSuccess<T> | AgentFailure;
