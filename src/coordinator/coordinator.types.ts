import type { ConversationAnalysis } from '../agents/analyst/conversation-analyst.agent';
import type { PrivacyMode, StageName } from '../agents/agent.types';
import type { ErrorKind } from '../common/errors';

export interface TurnError {
  message: string;
  kind: ErrorKind;
}

export interface OrchestrationResult {
  reply: string | null;
  memoriesUsed: number;
  memoriesExtracted: number;
  agentsExecuted: StageName[];
  tokensByAgent: Partial<Record<StageName, number>>;
  totalTokens: number;
  warnings: string[];
  success: boolean;
  /** Mode the turn actually ran in, after the privacy check. */
  privacyMode: PrivacyMode;
  error?: TurnError;
  analysis?: ConversationAnalysis;
}

export type TurnChunk =
  | {
      type: 'metadata';
      sessionId: string;
      privacyMode: PrivacyMode;
      memoriesUsed: number;
      warnings: string[];
    }
  | { type: 'content'; delta: string }
  | { type: 'complete'; result: OrchestrationResult }
  | { type: 'error'; error: TurnError; result: OrchestrationResult };
