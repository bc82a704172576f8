import type { PrivacyMode, StageName } from '../agents/agent.types';
import type { ErrorKind } from '../common/errors';

export const CHAT_EVENTS = {
  STAGE_COMPLETED: 'stage.completed',
  STAGE_SKIPPED: 'stage.skipped',
  TURN_COMPLETED: 'turn.completed',
  PRIVACY_FLAGGED: 'privacy.flagged',
  MEMORY_ADDED: 'memory.added',
  MEMORY_SEARCHED: 'memory.searched',
} as const;

export type ChatEventName = (typeof CHAT_EVENTS)[keyof typeof CHAT_EVENTS];

// ── Orchestration events ─────────────────────────────────────────────────────

export interface StageCompletedEvent {
  sessionId: string;
  stage: StageName;
  success: boolean;
  tokensUsed: number;
  executionTimeMs: number;
  errorKind?: ErrorKind;
}

export interface StageSkippedEvent {
  sessionId: string;
  stage: StageName;
  reason: 'budget' | 'cancelled';
}

export interface TurnCompletedEvent {
  sessionId: string;
  success: boolean;
  privacyMode: PrivacyMode;
  agentsExecuted: StageName[];
  totalTokens: number;
  warningCount: number;
}

export interface PrivacyFlaggedEvent {
  sessionId: string;
  violations: string[];
  mode: PrivacyMode;
}

// ── Memory events ────────────────────────────────────────────────────────────

export interface MemoryAddedEvent {
  memoryId: string;
  namespace: string;
  text: string;
  source: string;
  eventDate?: string;
}

export interface MemorySearchedEvent {
  namespace: string;
  query: string;
  resultCount: number;
  topK: number;
}
